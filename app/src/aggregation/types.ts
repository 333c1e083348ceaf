/**
 * Types for price aggregation
 */

import { FeedKind, FeedSource, QuoteResult } from '../types';

export interface SourceOutcome {
  kind: FeedKind;
  weight: number;
  result: QuoteResult;
}

export type FeedSourceInput = Omit<FeedSource, 'kind' | 'active' | 'maxStalenessSeconds'> & {
  active?: boolean;
  maxStalenessSeconds?: number;
};

export type OutcomeObserver = (outcomes: SourceOutcome[]) => void;
