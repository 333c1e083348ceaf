/**
 * Types for the liquidity ratio estimator
 */

export interface PoolReserves {
  reserve0: bigint;
  reserve1: bigint;
  lastTimestamp: number;
}

/**
 * Constant-product pair with UQ112x112 cumulative price accumulators
 */
export interface LiquidityPool {
  reserves(): Promise<PoolReserves>;
  token0(): Promise<string>;
  token1(): Promise<string>;
  cumulativePrice0(): Promise<bigint>;
  cumulativePrice1(): Promise<bigint>;
}

export interface PoolConnector {
  pool(ref: string): LiquidityPool;
}

export interface PoolConfig {
  poolRef: string;
  assetToken: string;
  assetDecimals: number;
  nativeDecimals: number;
}

export interface TwapState {
  /** Accumulator pricing the native token in asset units */
  cumulativePriceLast: bigint;
  lastTimestamp: number;
  ratio18: bigint;
  initialized: boolean;
}

export type RatioMethod = 'twap' | 'spot';

/**
 * Asset units per one native unit, 18 decimals
 */
export type RatioResult =
  | { valid: true; ratio18: bigint; method: RatioMethod }
  | { valid: false; reason: string };

export interface SpotReading {
  ratio18: bigint;
  nativeReserve: bigint;
}
