/**
 * Feed collaborator contracts and the adapter interface
 */

import { FeedKind, FeedSource, QuoteResult } from '../types';

/**
 * Round-based latest-value feed
 */
export interface PullQuoteFeed {
  latestValue(): Promise<{ value: bigint; updatedAt: number }>;
  decimalCount(): Promise<number>;
}

/**
 * Externally pushed reference feed
 */
export interface PushAggregateFeed {
  /** Structured read, price scaled by 1e9 */
  priceFor(symbol: string): Promise<{ price: bigint; timestamp: number }>;
  /** Legacy read, rate scaled by 1e18 */
  referenceRate(
    base: string,
    quote: string
  ): Promise<{ rate: bigint; updatedBase: number; updatedQuote: number }>;
}

/**
 * Single read-call feed already at 18 decimals
 */
export interface ProxyReadFeed {
  read(): Promise<{ value: bigint; timestamp: number }>;
}

/**
 * Price + exponent feed with a confidence band
 */
export interface ConfidenceIntervalFeed {
  priceUnsafe(id: string): Promise<{
    price: bigint;
    confidence: bigint;
    exponent: number;
    publishTime: number;
  }>;
}

/**
 * Resolves endpoint references into feed collaborators
 */
export interface FeedConnector {
  pullQuote(ref: string): PullQuoteFeed;
  pushAggregate(ref: string): PushAggregateFeed;
  proxyRead(ref: string): ProxyReadFeed;
  confidenceInterval(ref: string): ConfidenceIntervalFeed;
}

export interface AdapterContext {
  connector: FeedConnector;
  now: number;
  quoteSymbol: string;
}

/**
 * Normalizes one feed kind into an 18-decimal quote; never throws
 */
export interface FeedAdapter {
  readonly kind: FeedKind;
  quote(source: FeedSource, ctx: AdapterContext): Promise<QuoteResult>;
}
