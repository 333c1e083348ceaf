/**
 * Type definitions for the cross-chain price oracle
 */

/**
 * External feed kinds supported by the adapter layer
 */
export enum FeedKind {
  PullQuote = 'pull-quote',
  PushAggregate = 'push-aggregate',
  ProxyRead = 'proxy-read',
  ConfidenceInterval = 'confidence-interval',
}

export const FEED_KINDS: readonly FeedKind[] = [
  FeedKind.PullQuote,
  FeedKind.PushAggregate,
  FeedKind.ProxyRead,
  FeedKind.ConfidenceInterval,
];

/**
 * Role of an oracle instance
 */
export enum OracleMode {
  Uninitialized = 0,
  Producer = 1,
  Consumer = 2,
}

/**
 * One configured external price input
 */
export interface FeedSource {
  kind: FeedKind;
  endpointRef: string;
  weight: number;
  maxStalenessSeconds: number;
  active: boolean;
  /** Price id for confidence-interval feeds, symbol for push feeds */
  extra: string;
}

export type QuoteError = 'SourceUnavailable' | 'SourceStale';

/**
 * Outcome of one adapter call
 */
export type QuoteResult =
  | { valid: true; price18: bigint }
  | { valid: false; error: QuoteError; reason: string };

export enum AggregationTier {
  Aggregated = 'aggregated',
  SingleSource = 'single-source',
  Fallback = 'fallback',
}

export interface AggregatedResult {
  price18: bigint;
  timestamp: number;
  degraded: boolean;
  tier: AggregationTier;
  validCount: number;
}

export interface FallbackCache {
  price18: bigint;
  timestamp: number;
}

/**
 * Local latest price held by an oracle instance
 */
export interface LatestPrice {
  assetPrice18: bigint;
  nativePrice18: bigint;
  timestamp: number;
}

/**
 * Caller-facing price; (0, 0) means no data
 */
export interface PriceReading {
  price: bigint;
  timestamp: number;
}

export interface PeerPrice {
  price: bigint;
  timestamp: number;
  valid: boolean;
}

export interface ValidationReport {
  localValid: boolean;
  crossChainValid: boolean;
}

export interface MessagingFee {
  nativeFee: bigint;
  tokenFee: bigint;
}

export interface OracleStatus {
  mode: OracleMode;
  emergencyMode: boolean;
  circuitBreakerActive: boolean;
  inGracePeriod: boolean;
  activeSources: number;
  maxDeviationBps: number;
  priceInitialized: boolean;
}

/**
 * Seconds-resolution clock, injectable for tests
 */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

/**
 * CLI configuration options
 */
export interface CliOptions {
  configPath: string | null;
  mode: 'producer' | 'consumer' | null;
  isDryRun: boolean;
  verbose: boolean;
  logFile: string | null;
}

/**
 * Custom error types
 */
export class OracleError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = 'OracleError';
  }
}

export class ConfigurationError extends OracleError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class InsufficientSourcesError extends OracleError {
  constructor(message: string) {
    super(message, 'INSUFFICIENT_SOURCES');
    this.name = 'InsufficientSourcesError';
  }
}

export class SourceUnavailableError extends OracleError {
  constructor(message: string) {
    super(message, 'SOURCE_UNAVAILABLE');
    this.name = 'SourceUnavailableError';
  }
}

export class ModeError extends OracleError {
  constructor(message: string) {
    super(message, 'MODE_ERROR');
    this.name = 'ModeError';
  }
}

export class PeerError extends OracleError {
  constructor(message: string) {
    super(message, 'PEER_ERROR');
    this.name = 'PeerError';
  }
}

export class InvalidResponseError extends OracleError {
  constructor(message: string) {
    super(message, 'INVALID_RESPONSE');
    this.name = 'InvalidResponseError';
  }
}

export class CircuitBreakerError extends OracleError {
  constructor(message: string) {
    super(message, 'CIRCUIT_BREAKER');
    this.name = 'CircuitBreakerError';
  }
}

export class UpdateInProgressError extends OracleError {
  constructor() {
    super('Price update already in progress', 'REENTRANT_UPDATE');
    this.name = 'UpdateInProgressError';
  }
}
