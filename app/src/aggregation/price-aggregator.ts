/**
 * Weighted price aggregator with minimum-source policy and fallback cache
 */

import {
  AggregatedResult,
  AggregationTier,
  Clock,
  ConfigurationError,
  FEED_KINDS,
  FallbackCache,
  FeedKind,
  FeedSource,
  InsufficientSourcesError,
  systemClock,
} from '../types';
import {
  DEFAULT_MIN_VALID_SOURCES,
  DEFAULT_QUOTE_SYMBOL,
  DEFAULT_STALENESS_SECONDS,
  MAX_PRICE_AGE_SECONDS,
  MAX_SOURCES,
  MAX_WEIGHT,
  ZERO_REF,
} from '../config/constants';
import { AdapterTable, FeedConnector, createAdapterTable } from '../sources';
import { formatPrice18 } from '../utils/fixed-point';
import { Logger } from '../utils/logger';
import { FeedSourceInput, OutcomeObserver, SourceOutcome } from './types';

export interface PriceAggregatorOptions {
  connector: FeedConnector;
  logger: Logger;
  adapters?: AdapterTable;
  clock?: Clock;
  quoteSymbol?: string;
  minValidSources?: number;
  observer?: OutcomeObserver;
}

function isZeroRef(ref: string): boolean {
  return ref.trim() === '' || ref.toLowerCase() === ZERO_REF || /^0x0*$/i.test(ref);
}

export class PriceAggregator {
  private sources = new Map<FeedKind, FeedSource>();
  private fallback: FallbackCache | null = null;
  private minValidSources = DEFAULT_MIN_VALID_SOURCES;
  private readonly adapters: AdapterTable;
  private readonly connector: FeedConnector;
  private readonly clock: Clock;
  private readonly quoteSymbol: string;
  private readonly logger: Logger;
  private readonly observer: OutcomeObserver | null;

  constructor(options: PriceAggregatorOptions) {
    this.connector = options.connector;
    this.adapters = options.adapters ?? createAdapterTable();
    this.clock = options.clock ?? systemClock;
    this.quoteSymbol = options.quoteSymbol ?? DEFAULT_QUOTE_SYMBOL;
    this.logger = options.logger.child('Aggregator');
    this.observer = options.observer ?? null;

    if (options.minValidSources !== undefined) {
      this.setMinValidSources(options.minValidSources);
    }
  }

  /**
   * Configure (or replace) the source for one feed kind
   */
  setFeedSource(kind: FeedKind, input: FeedSourceInput): FeedSource {
    if (!FEED_KINDS.includes(kind)) {
      throw new ConfigurationError(`Unknown feed kind: ${String(kind)}`);
    }
    this.assertWeight(input.weight);

    const maxStalenessSeconds = input.maxStalenessSeconds ?? DEFAULT_STALENESS_SECONDS;
    if (!Number.isInteger(maxStalenessSeconds) || maxStalenessSeconds <= 0) {
      throw new ConfigurationError(`Staleness must be a positive integer, got ${maxStalenessSeconds}`);
    }
    if (isZeroRef(input.endpointRef)) {
      throw new ConfigurationError(`Feed ${kind} has no endpoint reference`);
    }
    if (
      (kind === FeedKind.PushAggregate || kind === FeedKind.ConfidenceInterval) &&
      isZeroRef(input.extra)
    ) {
      throw new ConfigurationError(`Feed ${kind} requires a ${kind === FeedKind.PushAggregate ? 'symbol' : 'price id'}`);
    }

    const source: FeedSource = {
      kind,
      endpointRef: input.endpointRef,
      weight: input.weight,
      maxStalenessSeconds,
      active: input.active ?? true,
      extra: input.extra,
    };
    this.sources.set(kind, source);
    this.logger.info(`Configured ${kind} source ${source.endpointRef} (weight ${source.weight}, active ${source.active})`);
    return { ...source };
  }

  setSourceActive(kind: FeedKind, active: boolean): void {
    this.requireSource(kind).active = active;
  }

  setSourceWeight(kind: FeedKind, weight: number): void {
    this.assertWeight(weight);
    this.requireSource(kind).weight = weight;
  }

  removeFeedSource(kind: FeedKind): boolean {
    return this.sources.delete(kind);
  }

  setMinValidSources(n: number): void {
    if (!Number.isInteger(n) || n < 1 || n > MAX_SOURCES) {
      throw new ConfigurationError(`minValidSources must be within 1..${MAX_SOURCES}, got ${n}`);
    }
    this.minValidSources = n;
  }

  getMinValidSources(): number {
    return this.minValidSources;
  }

  getSources(): FeedSource[] {
    return Array.from(this.sources.values()).map((s) => ({ ...s }));
  }

  activeSourceCount(): number {
    return this.getSources().filter((s) => s.active).length;
  }

  getFallbackCache(): FallbackCache | null {
    return this.fallback ? { ...this.fallback } : null;
  }

  /**
   * Query every active source and reduce the valid quotes
   */
  async aggregate(): Promise<AggregatedResult> {
    const now = this.clock();
    const outcomes: SourceOutcome[] = [];

    let weightedSum = 0n;
    let totalWeight = 0n;
    let validCount = 0;
    let lonePrice = 0n;

    for (const source of this.sources.values()) {
      if (!source.active) continue;

      const result = await this.adapters[source.kind].quote(source, {
        connector: this.connector,
        now,
        quoteSymbol: this.quoteSymbol,
      });
      outcomes.push({ kind: source.kind, weight: source.weight, result });

      if (!result.valid) {
        this.logger.debug(`${source.kind} rejected (${result.error}): ${result.reason}`);
        continue;
      }

      weightedSum += result.price18 * BigInt(source.weight);
      totalWeight += BigInt(source.weight);
      validCount++;
      lonePrice = result.price18;
    }

    this.observer?.(outcomes);

    // 1. Enough sources: weighted mean, truncating
    if (validCount >= this.minValidSources && totalWeight > 0n) {
      const price18 = weightedSum / totalWeight;
      this.fallback = { price18, timestamp: now };
      this.logger.debug(`Aggregated ${validCount} sources → ${formatPrice18(price18)}`);
      return { price18, timestamp: now, degraded: false, tier: AggregationTier.Aggregated, validCount };
    }

    // 2. A single survivor is served but flagged
    if (validCount === 1 && this.minValidSources > 1) {
      this.logger.warn(`Only one valid source (need ${this.minValidSources}), serving degraded price`);
      return { price18: lonePrice, timestamp: now, degraded: true, tier: AggregationTier.SingleSource, validCount };
    }

    // 3. Last good aggregation, if young enough
    if (this.fallback && now - this.fallback.timestamp <= MAX_PRICE_AGE_SECONDS) {
      this.logger.warn(`${validCount} valid source(s), serving fallback from ${now - this.fallback.timestamp}s ago`);
      return {
        price18: this.fallback.price18,
        timestamp: this.fallback.timestamp,
        degraded: true,
        tier: AggregationTier.Fallback,
        validCount,
      };
    }

    throw new InsufficientSourcesError(
      `${validCount} valid source(s), ${this.minValidSources} required and no usable fallback`
    );
  }

  private requireSource(kind: FeedKind): FeedSource {
    const source = this.sources.get(kind);
    if (!source) {
      throw new ConfigurationError(`No ${kind} source configured`);
    }
    return source;
  }

  private assertWeight(weight: number): void {
    if (!Number.isInteger(weight) || weight < 0 || weight > MAX_WEIGHT) {
      throw new ConfigurationError(`Weight must be an integer within 0..${MAX_WEIGHT}, got ${weight}`);
    }
  }
}
