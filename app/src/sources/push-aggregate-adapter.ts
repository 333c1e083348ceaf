/**
 * Push-aggregate adapter
 *
 * Tries the structured 1e9 read first, then the legacy reference-rate read.
 */

import { FeedKind, FeedSource, QuoteResult } from '../types';
import { AdapterContext, FeedAdapter, PushAggregateFeed } from './types';
import { describeError, isStale, stale, unavailable, validQuote } from './quote-result';

const STRUCTURED_TO_18 = 10n ** 9n;

export class PushAggregateAdapter implements FeedAdapter {
  readonly kind = FeedKind.PushAggregate;

  async quote(source: FeedSource, ctx: AdapterContext): Promise<QuoteResult> {
    let feed: PushAggregateFeed;
    try {
      feed = ctx.connector.pushAggregate(source.endpointRef);
    } catch (error) {
      return unavailable(`cannot resolve feed: ${describeError(error)}`);
    }

    let structured: { price: bigint; timestamp: number } | null = null;
    try {
      structured = await feed.priceFor(source.extra);
    } catch {
      // older deployments only expose the reference-rate read
      structured = null;
    }

    if (structured) {
      if (structured.price <= 0n) {
        return unavailable('zero price');
      }
      if (isStale(ctx.now, structured.timestamp, source.maxStalenessSeconds)) {
        return stale(`updated ${ctx.now - structured.timestamp}s ago`);
      }
      return validQuote(structured.price * STRUCTURED_TO_18);
    }

    let legacy: { rate: bigint; updatedBase: number; updatedQuote: number };
    try {
      legacy = await feed.referenceRate(source.extra, ctx.quoteSymbol);
    } catch (error) {
      return unavailable(`both reads failed: ${describeError(error)}`);
    }

    if (legacy.rate <= 0n) {
      return unavailable('zero rate');
    }
    const updatedAt = Math.max(legacy.updatedBase, legacy.updatedQuote);
    if (isStale(ctx.now, updatedAt, source.maxStalenessSeconds)) {
      return stale(`updated ${ctx.now - updatedAt}s ago`);
    }
    return validQuote(legacy.rate);
  }
}
