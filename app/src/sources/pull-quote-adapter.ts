/**
 * Pull-quote adapter (round-based latest value + reported decimals)
 */

import { FeedKind, FeedSource, QuoteResult } from '../types';
import { DEFAULT_FEED_DECIMALS } from '../config/constants';
import { rescaleTo18 } from '../utils/fixed-point';
import { AdapterContext, FeedAdapter, PullQuoteFeed } from './types';
import { describeError, isStale, stale, unavailable, validQuote } from './quote-result';

export class PullQuoteAdapter implements FeedAdapter {
  readonly kind = FeedKind.PullQuote;

  async quote(source: FeedSource, ctx: AdapterContext): Promise<QuoteResult> {
    let feed: PullQuoteFeed;
    let answer: { value: bigint; updatedAt: number };

    try {
      feed = ctx.connector.pullQuote(source.endpointRef);
      answer = await feed.latestValue();
    } catch (error) {
      return unavailable(`latestValue failed: ${describeError(error)}`);
    }

    if (answer.value <= 0n) {
      return unavailable(`non-positive answer ${answer.value}`);
    }
    if (isStale(ctx.now, answer.updatedAt, source.maxStalenessSeconds)) {
      return stale(`updated ${ctx.now - answer.updatedAt}s ago`);
    }

    let decimals = DEFAULT_FEED_DECIMALS;
    try {
      decimals = await feed.decimalCount();
    } catch {
      // most round-based feeds report 8 decimals
      decimals = DEFAULT_FEED_DECIMALS;
    }

    if (!Number.isInteger(decimals) || decimals < 0) {
      return unavailable(`invalid decimals ${decimals}`);
    }

    return validQuote(rescaleTo18(answer.value, decimals));
  }
}
