/**
 * Price Validator
 *
 * Deviation gate in front of the local latest price. Once the grace period
 * that starts with the first accepted price has passed, a price that moves
 * more than maxDeviationBps away from the last accepted one trips the breaker.
 * A tripped breaker rejects everything until reset.
 */

import {
  DEFAULT_GRACE_PERIOD_SECONDS,
  DEFAULT_MAX_DEVIATION_BPS,
} from '../config/constants';
import { ConfigurationError } from '../types';
import { deviationBps } from '../utils/fixed-point';

export interface PriceValidationConfig {
  maxDeviationBps: number;
  gracePeriodSeconds: number;
}

export interface ValidationResult {
  valid: boolean;
  reason?: string;
  tripped?: boolean;
}

export class PriceValidator {
  private config: PriceValidationConfig;
  private lastAccepted: bigint | null = null;
  private firstAcceptedAt: number | null = null;
  private tripped = false;

  constructor(config: Partial<PriceValidationConfig> = {}) {
    this.config = {
      maxDeviationBps: DEFAULT_MAX_DEVIATION_BPS,
      gracePeriodSeconds: DEFAULT_GRACE_PERIOD_SECONDS,
    };
    this.configure(config);
  }

  configure(config: Partial<PriceValidationConfig>): void {
    const next: PriceValidationConfig = {
      maxDeviationBps: config.maxDeviationBps ?? this.config.maxDeviationBps,
      gracePeriodSeconds: config.gracePeriodSeconds ?? this.config.gracePeriodSeconds,
    };
    if (!Number.isInteger(next.maxDeviationBps) || next.maxDeviationBps < 0) {
      throw new ConfigurationError(`maxDeviationBps must be a non-negative integer, got ${next.maxDeviationBps}`);
    }
    if (!Number.isInteger(next.gracePeriodSeconds) || next.gracePeriodSeconds < 0) {
      throw new ConfigurationError(`Grace period must be a non-negative integer, got ${next.gracePeriodSeconds}`);
    }
    this.config = next;
  }

  getConfig(): PriceValidationConfig {
    return { ...this.config };
  }

  /**
   * Check a candidate price; trips the breaker on excessive deviation
   */
  validate(price18: bigint, now: number): ValidationResult {
    if (this.tripped) {
      return { valid: false, reason: 'Circuit breaker active', tripped: true };
    }
    if (price18 <= 0n) {
      return { valid: false, reason: `Non-positive price ${price18}` };
    }
    if (this.config.maxDeviationBps === 0 || this.lastAccepted === null || this.inGracePeriod(now)) {
      return { valid: true };
    }

    const deviation = deviationBps(this.lastAccepted, price18);
    if (deviation > BigInt(this.config.maxDeviationBps)) {
      this.tripped = true;
      return {
        valid: false,
        reason: `Price moved ${deviation} bps, limit ${this.config.maxDeviationBps} bps`,
        tripped: true,
      };
    }

    return { valid: true };
  }

  /**
   * Record an accepted price as the new deviation reference
   */
  recordPrice(price18: bigint, now: number): void {
    this.lastAccepted = price18;
    if (this.firstAcceptedAt === null) {
      this.firstAcceptedAt = now;
    }
  }

  /**
   * True until gracePeriodSeconds have passed since the first accepted price
   */
  inGracePeriod(now: number): boolean {
    if (this.firstAcceptedAt === null) {
      return true;
    }
    return now - this.firstAcceptedAt < this.config.gracePeriodSeconds;
  }

  isTripped(): boolean {
    return this.tripped;
  }

  /**
   * Clear the breaker; the next accepted price becomes the reference
   */
  reset(): void {
    this.tripped = false;
    this.lastAccepted = null;
  }

  getLastPrice(): bigint | null {
    return this.lastAccepted;
  }
}
