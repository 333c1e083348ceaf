import { QuoteResult } from '../types';

export function validQuote(price18: bigint): QuoteResult {
  return { valid: true, price18 };
}

export function unavailable(reason: string): QuoteResult {
  return { valid: false, error: 'SourceUnavailable', reason };
}

export function stale(reason: string): QuoteResult {
  return { valid: false, error: 'SourceStale', reason };
}

/**
 * True when `updatedAt` is older than the allowed staleness at `now`
 */
export function isStale(now: number, updatedAt: number, maxStalenessSeconds: number): boolean {
  return now - updatedAt > maxStalenessSeconds;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
