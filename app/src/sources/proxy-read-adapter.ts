import { FeedKind, FeedSource, QuoteResult } from '../types';
import { AdapterContext, FeedAdapter } from './types';
import { describeError, isStale, stale, unavailable, validQuote } from './quote-result';

/**
 * Proxy-read adapter; values already carry 18 decimals
 */
export class ProxyReadAdapter implements FeedAdapter {
  readonly kind = FeedKind.ProxyRead;

  async quote(source: FeedSource, ctx: AdapterContext): Promise<QuoteResult> {
    let reading: { value: bigint; timestamp: number };
    try {
      reading = await ctx.connector.proxyRead(source.endpointRef).read();
    } catch (error) {
      return unavailable(`read failed: ${describeError(error)}`);
    }

    if (reading.value <= 0n) {
      return unavailable(`non-positive value ${reading.value}`);
    }
    if (reading.timestamp === 0) {
      return unavailable('feed never updated');
    }
    if (isStale(ctx.now, reading.timestamp, source.maxStalenessSeconds)) {
      return stale(`updated ${ctx.now - reading.timestamp}s ago`);
    }
    return validQuote(reading.value);
  }
}
