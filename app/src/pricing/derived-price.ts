import { ONE_18 } from '../config/constants';
import { SourceUnavailableError } from '../types';

/**
 * Asset/USD from native/USD and the asset-per-native ratio
 */
export function composeAssetPrice(nativeUsd18: bigint, ratio18: bigint): bigint {
  if (ratio18 <= 0n) {
    throw new SourceUnavailableError('Liquidity ratio is undefined');
  }
  if (nativeUsd18 <= 0n) {
    throw new SourceUnavailableError('Native price must be positive');
  }
  return (nativeUsd18 * ONE_18) / ratio18;
}
