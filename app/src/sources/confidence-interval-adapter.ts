/**
 * Confidence-interval adapter (price * 10^exponent)
 */

import { FeedKind, FeedSource, QuoteResult } from '../types';
import { scaleByExponent } from '../utils/fixed-point';
import { AdapterContext, FeedAdapter } from './types';
import { describeError, isStale, stale, unavailable, validQuote } from './quote-result';

export class ConfidenceIntervalAdapter implements FeedAdapter {
  readonly kind = FeedKind.ConfidenceInterval;

  async quote(source: FeedSource, ctx: AdapterContext): Promise<QuoteResult> {
    let reading: { price: bigint; exponent: number; publishTime: number };
    try {
      reading = await ctx.connector.confidenceInterval(source.endpointRef).priceUnsafe(source.extra);
    } catch (error) {
      return unavailable(`priceUnsafe failed: ${describeError(error)}`);
    }

    if (reading.price <= 0n) {
      return unavailable(`non-positive price ${reading.price}`);
    }
    if (isStale(ctx.now, reading.publishTime, source.maxStalenessSeconds)) {
      return stale(`published ${ctx.now - reading.publishTime}s ago`);
    }
    return validQuote(scaleByExponent(reading.price, reading.exponent));
  }
}
