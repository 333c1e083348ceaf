/**
 * Feed adapter dispatch table
 */

import { FeedKind } from '../types';
import { FeedAdapter } from './types';
import { PullQuoteAdapter } from './pull-quote-adapter';
import { PushAggregateAdapter } from './push-aggregate-adapter';
import { ProxyReadAdapter } from './proxy-read-adapter';
import { ConfidenceIntervalAdapter } from './confidence-interval-adapter';

export type AdapterTable = Record<FeedKind, FeedAdapter>;

export function createAdapterTable(): AdapterTable {
  return {
    [FeedKind.PullQuote]: new PullQuoteAdapter(),
    [FeedKind.PushAggregate]: new PushAggregateAdapter(),
    [FeedKind.ProxyRead]: new ProxyReadAdapter(),
    [FeedKind.ConfidenceInterval]: new ConfidenceIntervalAdapter(),
  };
}

export * from './types';
export { PullQuoteAdapter, PushAggregateAdapter, ProxyReadAdapter, ConfidenceIntervalAdapter };
