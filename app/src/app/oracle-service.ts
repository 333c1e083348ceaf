/**
 * Oracle service - one oracle instance on one chain
 *
 * Producers aggregate feeds, apply the pool ratio and serve the result to
 * peers. Consumers ingest peer prices through remote reads.
 *
 * Events:
 * - price_updated        { assetPrice18, nativePrice18, timestamp, origin, ... }
 * - mode_changed         { previous, next }
 * - price_requested      { chainId, correlationId, fee }
 * - peer_price_received  { chainId, price18, timestamp }
 * - emergency_mode       { active, price18 }
 * - circuit_breaker      { active, reason }
 * - source_alert         SourceAlert
 * - stopped
 */

import { EventEmitter } from 'events';
import {
  AggregatedResult,
  CircuitBreakerError,
  Clock,
  ConfigurationError,
  FeedKind,
  FeedSource,
  LatestPrice,
  MessagingFee,
  OracleMode,
  OracleStatus,
  PeerError,
  PeerPrice,
  PriceReading,
  SourceUnavailableError,
  UpdateInProgressError,
  ValidationReport,
  systemClock,
} from '../types';
import {
  DEFAULT_MAX_PEER_DIVERGENCE_BPS,
  DEFAULT_MIN_PEER_AGREEMENT,
  FRESHNESS_WINDOW_SECONDS,
  MAX_CLOCK_SKEW_SECONDS,
  MAX_PRICE_AGE_SECONDS,
  UPDATE_INTERVAL_MS,
} from '../config/constants';
import { PriceAggregator } from '../aggregation/price-aggregator';
import { FeedSourceInput } from '../aggregation/types';
import { FeedConnector } from '../sources';
import { RatioEstimator } from '../liquidity/ratio-estimator';
import { PoolConfig, PoolConnector, RatioMethod, TwapState } from '../liquidity/types';
import { composeAssetPrice } from '../pricing/derived-price';
import { PriceValidator } from '../controller/price-validator';
import { OracleModeMachine } from '../controller/oracle-mode';
import { SourceAlert, SourceHealthMonitor } from '../quality/source-health';
import { PeerSyncManager, PendingReadRequest, RemotePriceRequest } from '../peers/peer-sync-manager';
import { PeerEndpoint, PeerUpdateOutcome, isZeroPeerRef } from '../peers/peer-registry';
import { ReadChannel, ReadRequestHandler } from '../peers/read-channel';
import { LATEST_PRICE_SELECTOR, ReadRequest, encodePriceResponse } from '../peers/read-protocol';
import { OracleRegistry } from '../peers/oracle-registry';
import { deviationBps, formatPrice18 } from '../utils/fixed-point';
import { Logger } from '../utils/logger';

/**
 * Oracle service configuration
 */
export interface OracleServiceConfig {
  chainId: number;
  feedConnector: FeedConnector;
  poolConnector: PoolConnector;
  logger: Logger;
  clock?: Clock;
  quoteSymbol?: string;
  minValidSources?: number;
  pools?: PoolConfig[];
  twapEnabled?: boolean;
  twapPeriodSeconds?: number;
  maxDeviationBps?: number;
  gracePeriodSeconds?: number;
  minPeerAgreement?: number;
  maxPeerDivergenceBps?: number;
  requestTtlSeconds?: number;
  readConfirmations?: number;
  updateIntervalMs?: number;
}

export type PriceOrigin = 'local' | 'peer';

export interface PriceUpdatedEvent {
  assetPrice18: bigint;
  nativePrice18: bigint;
  timestamp: number;
  origin: PriceOrigin;
  degraded: boolean;
  ratioMethod: RatioMethod | null;
  peerChainId: number | null;
}

export interface ServiceStats {
  updateCount: number;
  errorCount: number;
}

export class OracleService extends EventEmitter implements ReadRequestHandler {
  readonly chainId: number;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly aggregator: PriceAggregator;
  private readonly estimator: RatioEstimator;
  private readonly validator: PriceValidator;
  private readonly modes = new OracleModeMachine();
  private readonly peers: PeerSyncManager;
  private readonly health: SourceHealthMonitor;

  private latest: LatestPrice | null = null;
  private updating = false;
  private minPeerAgreement: number;
  private maxPeerDivergenceBps: number;

  // Update loop
  private updateInterval: NodeJS.Timeout | null = null;
  private readonly updateIntervalMs: number;
  private updateCount = 0;
  private errorCount = 0;

  constructor(config: OracleServiceConfig) {
    super();
    if (!Number.isInteger(config.chainId) || config.chainId <= 0) {
      throw new ConfigurationError(`Invalid chain id: ${config.chainId}`);
    }

    this.chainId = config.chainId;
    this.logger = config.logger.child(`Oracle:${config.chainId}`);
    this.clock = config.clock ?? systemClock;
    this.updateIntervalMs = config.updateIntervalMs ?? UPDATE_INTERVAL_MS;

    this.health = new SourceHealthMonitor(this.clock);
    this.health.on('alert', (alert: SourceAlert) => this.emit('source_alert', alert));

    this.aggregator = new PriceAggregator({
      connector: config.feedConnector,
      logger: config.logger,
      clock: this.clock,
      quoteSymbol: config.quoteSymbol,
      minValidSources: config.minValidSources,
      observer: (outcomes) => this.health.recordPass(outcomes),
    });
    this.health.updateConfig({ minSources: this.aggregator.getMinValidSources() });

    this.estimator = new RatioEstimator({
      connector: config.poolConnector,
      logger: config.logger,
      pools: config.pools,
      twapEnabled: config.twapEnabled,
      twapPeriodSeconds: config.twapPeriodSeconds,
    });

    this.validator = new PriceValidator({
      maxDeviationBps: config.maxDeviationBps,
      gracePeriodSeconds: config.gracePeriodSeconds,
    });

    this.peers = new PeerSyncManager({
      localChainId: config.chainId,
      logger: config.logger,
      clock: this.clock,
      confirmations: config.readConfirmations,
      requestTtlSeconds: config.requestTtlSeconds,
      onResponse: (chainId, price18, timestamp) => {
        this.onRemoteResponse(chainId, price18, timestamp);
      },
    });

    this.minPeerAgreement = DEFAULT_MIN_PEER_AGREEMENT;
    this.maxPeerDivergenceBps = DEFAULT_MAX_PEER_DIVERGENCE_BPS;
    this.setPeerAgreement(
      config.minPeerAgreement ?? DEFAULT_MIN_PEER_AGREEMENT,
      config.maxPeerDivergenceBps ?? DEFAULT_MAX_PEER_DIVERGENCE_BPS
    );
  }

  /**
   * Snapshot pool accumulators so the first TWAP window can complete
   */
  async initialize(): Promise<void> {
    await this.estimator.init();
  }

  // ---------------------------------------------------------------------------
  // Feed and pool configuration
  // ---------------------------------------------------------------------------

  setFeedSource(kind: FeedKind, input: FeedSourceInput): FeedSource {
    return this.aggregator.setFeedSource(kind, input);
  }

  setSourceActive(kind: FeedKind, active: boolean): void {
    this.aggregator.setSourceActive(kind, active);
  }

  setSourceWeight(kind: FeedKind, weight: number): void {
    this.aggregator.setSourceWeight(kind, weight);
  }

  removeFeedSource(kind: FeedKind): boolean {
    return this.aggregator.removeFeedSource(kind);
  }

  setMinValidSources(n: number): void {
    this.aggregator.setMinValidSources(n);
    this.health.updateConfig({ minSources: n });
  }

  getSources(): FeedSource[] {
    return this.aggregator.getSources();
  }

  setPools(pools: PoolConfig[]): void {
    this.estimator.setPools(pools);
  }

  setTwapConfig(enabled: boolean, periodSeconds: number): void {
    this.estimator.setTwapConfig(enabled, periodSeconds);
  }

  getTwapState(): TwapState {
    return this.estimator.getTwapState();
  }

  setPeerAgreement(minPeers: number, maxDivergenceBps: number): void {
    if (!Number.isInteger(minPeers) || minPeers < 1) {
      throw new ConfigurationError(`minPeerAgreement must be a positive integer, got ${minPeers}`);
    }
    if (!Number.isInteger(maxDivergenceBps) || maxDivergenceBps < 0) {
      throw new ConfigurationError(`maxPeerDivergenceBps must be a non-negative integer, got ${maxDivergenceBps}`);
    }
    this.minPeerAgreement = minPeers;
    this.maxPeerDivergenceBps = maxDivergenceBps;
  }

  // ---------------------------------------------------------------------------
  // Mode, emergency override and circuit breaker
  // ---------------------------------------------------------------------------

  getMode(): OracleMode {
    return this.modes.getMode();
  }

  setMode(mode: OracleMode): void {
    const transition = this.modes.setMode(mode);
    if (transition.changed) {
      this.logger.info(`Mode ${OracleMode[transition.previous]} → ${OracleMode[transition.next]}`);
      this.emit('mode_changed', { previous: transition.previous, next: transition.next });
    }
  }

  activateEmergencyMode(price18: bigint): void {
    this.modes.activateEmergency(price18);
    this.logger.warn(`Emergency mode active, serving fixed price ${formatPrice18(price18)}`);
    this.emit('emergency_mode', { active: true, price18 });
  }

  deactivateEmergencyMode(): void {
    this.modes.deactivateEmergency();
    this.logger.info('Emergency mode cleared');
    this.emit('emergency_mode', { active: false, price18: 0n });
  }

  resetCircuitBreaker(): void {
    this.validator.reset();
    this.logger.info('Circuit breaker reset');
    this.emit('circuit_breaker', { active: false, reason: 'manual reset' });
  }

  // ---------------------------------------------------------------------------
  // Pricing
  // ---------------------------------------------------------------------------

  /**
   * Aggregate native/USD, apply the pool ratio and store the asset/USD price
   */
  async updatePrice(): Promise<LatestPrice> {
    if (this.updating) {
      throw new UpdateInProgressError();
    }
    this.modes.assertCanUpdate();

    this.updating = true;
    try {
      const native: AggregatedResult = await this.aggregator.aggregate();
      this.health.recordDegraded(native);

      const ratio = await this.estimator.update();
      if (!ratio.valid) {
        throw new SourceUnavailableError(`Liquidity ratio unavailable: ${ratio.reason}`);
      }

      const assetPrice18 = composeAssetPrice(native.price18, ratio.ratio18);
      if (assetPrice18 <= 0n) {
        throw new SourceUnavailableError('Derived asset price truncated to zero');
      }

      const now = this.clock();
      const wasTripped = this.validator.isTripped();
      const check = this.validator.validate(assetPrice18, now);
      if (!check.valid) {
        const reason = check.reason ?? 'Price rejected';
        if (check.tripped && !wasTripped) {
          this.logger.error(`Circuit breaker tripped: ${reason}`);
          this.emit('circuit_breaker', { active: true, reason });
        }
        throw new CircuitBreakerError(reason);
      }
      this.validator.recordPrice(assetPrice18, now);

      this.latest = {
        assetPrice18,
        nativePrice18: native.price18,
        timestamp: native.timestamp,
      };

      this.logger.info(
        `Price ${formatPrice18(assetPrice18)} (native ${formatPrice18(native.price18)}, ` +
          `${ratio.method} ratio${native.degraded ? `, ${native.tier}` : ''})`
      );
      const event: PriceUpdatedEvent = {
        ...this.latest,
        origin: 'local',
        degraded: native.degraded,
        ratioMethod: ratio.method,
        peerChainId: null,
      };
      this.emit('price_updated', event);

      return { ...this.latest };
    } finally {
      this.updating = false;
    }
  }

  /**
   * Caller-facing price; (0, 0) means no usable data
   */
  latestPrice(): PriceReading {
    const now = this.clock();
    if (this.modes.isEmergency()) {
      return { price: this.modes.getEmergencyPrice(), timestamp: now };
    }
    if (!this.latest) {
      return { price: 0n, timestamp: 0 };
    }
    return this.servable(this.latest.assetPrice18, this.latest.timestamp, now);
  }

  getAggregatedNativePrice(): PriceReading {
    if (!this.latest) {
      return { price: 0n, timestamp: 0 };
    }
    return this.servable(this.latest.nativePrice18, this.latest.timestamp, this.clock());
  }

  isFresh(): boolean {
    return this.latest !== null && this.clock() - this.latest.timestamp <= FRESHNESS_WINDOW_SECONDS;
  }

  validate(): ValidationReport {
    return {
      localValid: this.isFresh(),
      crossChainValid: this.peers.crossChainValid(),
    };
  }

  getOracleStatus(): OracleStatus {
    return {
      mode: this.modes.getMode(),
      emergencyMode: this.modes.isEmergency(),
      circuitBreakerActive: this.validator.isTripped(),
      inGracePeriod: this.validator.inGracePeriod(this.clock()),
      activeSources: this.aggregator.activeSourceCount(),
      maxDeviationBps: this.validator.getConfig().maxDeviationBps,
      priceInitialized: this.latest !== null,
    };
  }

  // ---------------------------------------------------------------------------
  // Peers
  // ---------------------------------------------------------------------------

  setReadChannel(channel: ReadChannel): void {
    this.peers.setReadChannel(channel);
  }

  registerPeer(chainId: number, ref: string): PeerEndpoint {
    return this.peers.registerPeer(chainId, ref);
  }

  deactivatePeer(chainId: number): PeerEndpoint {
    return this.peers.deactivatePeer(chainId);
  }

  getPeer(chainId: number): PeerEndpoint | undefined {
    return this.peers.getPeer(chainId);
  }

  getPeers(): PeerEndpoint[] {
    return this.peers.getPeers();
  }

  getActivePeerIds(): number[] {
    return this.peers.getActivePeerIds();
  }

  getPeerPrice(chainId: number): PeerPrice {
    return this.peers.getPeerPrice(chainId);
  }

  quoteFee(chainId: number): Promise<MessagingFee> {
    return this.peers.quoteFee(chainId);
  }

  async requestRemotePrice(chainId: number): Promise<RemotePriceRequest> {
    const sent = await this.peers.requestRemotePrice(chainId);
    this.emit('price_requested', {
      chainId,
      correlationId: sent.request.correlationId,
      fee: sent.fee,
    });
    return sent;
  }

  getPendingRequests(): PendingReadRequest[] {
    return this.peers.getPendingRequests();
  }

  prunePendingRequests(): number {
    return this.peers.prunePendingRequests();
  }

  /**
   * Cache a peer's price; consumers adopt it when enough peers agree
   */
  onRemoteResponse(chainId: number, price18: bigint, timestamp: number): PeerUpdateOutcome {
    const outcome = this.peers.onRemoteResponse(chainId, price18, timestamp);
    if (outcome !== 'updated') {
      return outcome;
    }

    this.emit('peer_price_received', { chainId, price18, timestamp });

    if (this.modes.getMode() === OracleMode.Consumer) {
      this.adoptPeerPrice(chainId, price18, timestamp);
    }
    return outcome;
  }

  /**
   * Answer a peer's read of getLatestPrice()
   */
  handleReadRequest(request: ReadRequest): string {
    if (request.callSelector.toLowerCase() !== LATEST_PRICE_SELECTOR) {
      throw new PeerError(`Unsupported read selector ${request.callSelector}`);
    }
    if (request.targetChainId !== this.chainId) {
      throw new PeerError(`Read for chain ${request.targetChainId} reached chain ${this.chainId}`);
    }
    const { price, timestamp } = this.latestPrice();
    return encodePriceResponse(price, timestamp);
  }

  /**
   * Register every configured peer the registry knows about
   */
  async configureFromRegistry(registry: OracleRegistry, peerChainIds: number[]): Promise<number> {
    const channelId = this.peers.getReadChannelId();
    let registered = 0;

    for (const chainId of peerChainIds) {
      if (chainId === this.chainId) continue;
      try {
        const config = await registry.oracleConfigFor(chainId);
        if (!config.configured || isZeroPeerRef(config.primaryRef)) {
          this.logger.warn(`Chain ${chainId} has no configured oracle, skipping`);
          continue;
        }
        const endpoint = await registry.endpointFor(chainId);
        if (isZeroPeerRef(endpoint)) {
          this.logger.warn(`Chain ${chainId} has no messaging endpoint, skipping`);
          continue;
        }
        if (channelId !== null && config.readChannelId !== channelId) {
          this.logger.warn(`Chain ${chainId} reads on channel ${config.readChannelId}, local channel is ${channelId}`);
        }
        this.peers.registerPeer(chainId, config.primaryRef);
        registered++;
      } catch (error) {
        this.logger.warn(`Registry lookup for chain ${chainId} failed:`, error);
      }
    }

    return registered;
  }

  // ---------------------------------------------------------------------------
  // Update loop
  // ---------------------------------------------------------------------------

  /**
   * Start the update loop: producers aggregate, consumers poll their peers
   */
  start(): void {
    if (this.updateInterval) return;

    this.updateInterval = setInterval(async () => {
      this.peers.prunePendingRequests();
      try {
        if (this.modes.canUpdate()) {
          await this.updatePrice();
          this.updateCount++;
        } else if (this.modes.getMode() === OracleMode.Consumer) {
          await this.pollPeers();
        }
      } catch (error) {
        if (error instanceof UpdateInProgressError) {
          this.logger.debug('Previous update still running, skipping tick');
          return;
        }
        this.errorCount++;
        this.logger.error('Update failed:', error);
      }
    }, this.updateIntervalMs);

    this.logger.info(`Update loop started (${this.updateIntervalMs}ms)`);
  }

  /**
   * Stop the oracle service
   */
  stop(): void {
    if (this.updateInterval) {
      clearInterval(this.updateInterval);
      this.updateInterval = null;
    }
    this.emit('stopped');
  }

  getStats(): ServiceStats {
    return { updateCount: this.updateCount, errorCount: this.errorCount };
  }

  private async pollPeers(): Promise<void> {
    if (this.peers.getReadChannelId() === null) return;

    for (const chainId of this.peers.getActivePeerIds()) {
      try {
        await this.requestRemotePrice(chainId);
      } catch (error) {
        this.errorCount++;
        this.logger.warn(`Read of chain ${chainId} not sent:`, error);
      }
    }
  }

  private adoptPeerPrice(chainId: number, price18: bigint, timestamp: number): void {
    if (price18 <= 0n) {
      this.logger.warn(`Chain ${chainId} reported non-positive price, not adopted`);
      return;
    }
    if (timestamp > this.clock() + MAX_CLOCK_SKEW_SECONDS) {
      this.logger.warn(`Chain ${chainId} price at ${timestamp} is ahead of the local clock, not adopted`);
      return;
    }
    if (this.latest && timestamp < this.latest.timestamp) {
      this.logger.debug(`Chain ${chainId} price at ${timestamp} predates local price, not adopted`);
      return;
    }

    const agreeing = this.peers.getActivePeerIds().filter((id) => {
      const peer = this.peers.getPeerPrice(id);
      return (
        peer.valid &&
        peer.price > 0n &&
        deviationBps(price18, peer.price) <= BigInt(this.maxPeerDivergenceBps)
      );
    }).length;

    if (agreeing < this.minPeerAgreement) {
      this.logger.warn(
        `Chain ${chainId} price ${formatPrice18(price18)} backed by ${agreeing} peer(s), ` +
          `${this.minPeerAgreement} required`
      );
      return;
    }

    this.latest = { assetPrice18: price18, nativePrice18: 0n, timestamp };
    const event: PriceUpdatedEvent = {
      ...this.latest,
      origin: 'peer',
      degraded: false,
      ratioMethod: null,
      peerChainId: chainId,
    };
    this.emit('price_updated', event);
  }

  private servable(price: bigint, timestamp: number, now: number): PriceReading {
    if (price <= 0n || now - timestamp > MAX_PRICE_AGE_SECONDS) {
      return { price: 0n, timestamp: 0 };
    }
    return { price, timestamp };
  }
}
