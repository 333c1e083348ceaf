/**
 * Asset/native ratio from pool reserves
 *
 * The primary pool carries the TWAP snapshot. When no TWAP window has
 * completed, the instantaneous reserve ratio of every configured pool is
 * combined, weighted by native-side reserves.
 */

import { ConfigurationError } from '../types';
import {
  DEFAULT_TWAP_PERIOD_SECONDS,
  MAX_POOLS,
  ONE_18,
  Q112_SHIFT,
  ZERO_REF,
} from '../config/constants';
import { applyDecimalCorrection, formatPrice18 } from '../utils/fixed-point';
import { Logger } from '../utils/logger';
import {
  LiquidityPool,
  PoolConfig,
  PoolConnector,
  RatioResult,
  SpotReading,
  TwapState,
} from './types';

export interface RatioEstimatorOptions {
  connector: PoolConnector;
  logger: Logger;
  pools?: PoolConfig[];
  twapEnabled?: boolean;
  twapPeriodSeconds?: number;
}

const MAX_TOKEN_DECIMALS = 77;

function emptyTwapState(): TwapState {
  return { cumulativePriceLast: 0n, lastTimestamp: 0, ratio18: 0n, initialized: false };
}

export class RatioEstimator {
  private pools: PoolConfig[] = [];
  private twap: TwapState = emptyTwapState();
  private twapEnabled: boolean;
  private twapPeriod: number;
  private readonly connector: PoolConnector;
  private readonly logger: Logger;

  constructor(options: RatioEstimatorOptions) {
    this.connector = options.connector;
    this.logger = options.logger.child('Liquidity');
    this.twapEnabled = options.twapEnabled ?? true;
    this.twapPeriod = DEFAULT_TWAP_PERIOD_SECONDS;

    if (options.twapPeriodSeconds !== undefined) {
      this.setTwapConfig(this.twapEnabled, options.twapPeriodSeconds);
    }
    if (options.pools) {
      this.setPools(options.pools);
    }
  }

  /**
   * Replace the pool set; the first pool is primary and resets the TWAP snapshot
   */
  setPools(pools: PoolConfig[]): void {
    if (pools.length > MAX_POOLS) {
      throw new ConfigurationError(`At most ${MAX_POOLS} pools are supported, got ${pools.length}`);
    }
    for (const pool of pools) {
      if (pool.poolRef.trim() === '' || pool.poolRef.toLowerCase() === ZERO_REF) {
        throw new ConfigurationError('Pool reference must be set');
      }
      if (pool.assetToken.trim() === '') {
        throw new ConfigurationError(`Pool ${pool.poolRef} has no asset token`);
      }
      for (const d of [pool.assetDecimals, pool.nativeDecimals]) {
        if (!Number.isInteger(d) || d < 0 || d > MAX_TOKEN_DECIMALS) {
          throw new ConfigurationError(`Pool ${pool.poolRef} has invalid decimals ${d}`);
        }
      }
    }
    this.pools = pools.map((p) => ({ ...p }));
    this.twap = emptyTwapState();
  }

  setTwapConfig(enabled: boolean, periodSeconds: number): void {
    if (!Number.isInteger(periodSeconds) || periodSeconds <= 0) {
      throw new ConfigurationError(`TWAP period must be a positive integer, got ${periodSeconds}`);
    }
    this.twapEnabled = enabled;
    this.twapPeriod = periodSeconds;
  }

  getTwapState(): TwapState {
    return { ...this.twap };
  }

  /**
   * Snapshot the primary pool's native-side accumulator
   */
  async init(): Promise<void> {
    const primary = this.pools[0];
    if (!primary) {
      this.logger.warn('No pool configured, TWAP not initialized');
      return;
    }

    try {
      const pool = this.connector.pool(primary.poolRef);
      const cumulative = await this.nativeCumulative(pool, primary);
      const { lastTimestamp } = await pool.reserves();
      this.twap = { cumulativePriceLast: cumulative, lastTimestamp, ratio18: 0n, initialized: true };
      this.logger.info(`TWAP initialized at pool time ${lastTimestamp}`);
    } catch (error) {
      this.logger.warn(`Pool ${primary.poolRef} unavailable, TWAP not initialized:`, error);
    }
  }

  /**
   * Advance the TWAP when a window has completed, else fall back to spot
   */
  async update(): Promise<RatioResult> {
    const primary = this.pools[0];
    if (!primary) {
      return { valid: false, reason: 'no pool configured' };
    }

    if (this.twapEnabled && this.twap.initialized) {
      try {
        const twapRatio = await this.advanceTwap(primary);
        if (twapRatio !== null) {
          return { valid: true, ratio18: twapRatio, method: 'twap' };
        }
      } catch (error) {
        this.logger.warn(`TWAP read failed on ${primary.poolRef}, using spot:`, error);
      }
    }

    return this.spotRatio();
  }

  /**
   * Reserve-weighted instantaneous ratio across all configured pools
   */
  async spotRatio(): Promise<RatioResult> {
    const readings: SpotReading[] = [];

    for (const config of this.pools) {
      try {
        const reading = await this.readSpot(config);
        if (reading) {
          readings.push(reading);
        } else {
          this.logger.debug(`Pool ${config.poolRef} has an undefined ratio`);
        }
      } catch (error) {
        this.logger.warn(`Pool ${config.poolRef} read failed:`, error);
      }
    }

    if (readings.length === 0) {
      return { valid: false, reason: 'no pool yielded a defined ratio' };
    }
    let weighted = 0n;
    let totalReserve = 0n;
    for (const r of readings) {
      weighted += r.ratio18 * r.nativeReserve;
      totalReserve += r.nativeReserve;
    }
    return { valid: true, ratio18: weighted / totalReserve, method: 'spot' };
  }

  private async advanceTwap(primary: PoolConfig): Promise<bigint | null> {
    const pool = this.connector.pool(primary.poolRef);
    const { lastTimestamp } = await pool.reserves();
    const elapsed = lastTimestamp - this.twap.lastTimestamp;

    if (elapsed < this.twapPeriod || elapsed <= 0) {
      return null;
    }

    const cumulative = await this.nativeCumulative(pool, primary);
    const delta = cumulative - this.twap.cumulativePriceLast;
    if (delta < 0n) {
      this.logger.warn('Cumulative price moved backwards, resetting TWAP snapshot');
      this.twap = { ...this.twap, cumulativePriceLast: cumulative, lastTimestamp };
      return null;
    }

    const average = delta / BigInt(elapsed);
    const ratio18 = applyDecimalCorrection(
      (average >> Q112_SHIFT) * ONE_18,
      primary.nativeDecimals,
      primary.assetDecimals
    );

    this.twap = { cumulativePriceLast: cumulative, lastTimestamp, ratio18, initialized: true };

    if (ratio18 === 0n) {
      this.logger.warn(`TWAP over ${elapsed}s truncated to zero`);
      return null;
    }
    this.logger.debug(`TWAP over ${elapsed}s → ${formatPrice18(ratio18)}`);
    return ratio18;
  }

  private async readSpot(config: PoolConfig): Promise<SpotReading | null> {
    const pool = this.connector.pool(config.poolRef);
    const assetIsToken0 = await this.assetIsToken0(pool, config);
    const { reserve0, reserve1 } = await pool.reserves();

    const assetReserve = assetIsToken0 ? reserve0 : reserve1;
    const nativeReserve = assetIsToken0 ? reserve1 : reserve0;
    if (assetReserve === 0n || nativeReserve === 0n) {
      return null;
    }

    const ratio18 = applyDecimalCorrection(
      (assetReserve * ONE_18) / nativeReserve,
      config.nativeDecimals,
      config.assetDecimals
    );
    return ratio18 > 0n ? { ratio18, nativeReserve } : null;
  }

  /**
   * Accumulator of native priced in asset: price1 when native is token1
   */
  private async nativeCumulative(pool: LiquidityPool, config: PoolConfig): Promise<bigint> {
    return (await this.assetIsToken0(pool, config))
      ? pool.cumulativePrice1()
      : pool.cumulativePrice0();
  }

  private async assetIsToken0(pool: LiquidityPool, config: PoolConfig): Promise<boolean> {
    const asset = config.assetToken.toLowerCase();
    if ((await pool.token0()).toLowerCase() === asset) return true;
    if ((await pool.token1()).toLowerCase() === asset) return false;
    throw new ConfigurationError(`Pool ${config.poolRef} does not contain asset ${config.assetToken}`);
  }
}
