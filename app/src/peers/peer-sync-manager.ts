/**
 * Peer Synchronization Manager
 *
 * Issues remote reads against peer oracles, correlates the answers and
 * keeps the last price each peer reported.
 */

import { Clock, MessagingFee, PeerError, PeerPrice, systemClock } from '../types';
import {
  DEFAULT_READ_CONFIRMATIONS,
  DEFAULT_REQUEST_TTL_SECONDS,
  FRESHNESS_WINDOW_SECONDS,
  MAX_CLOCK_SKEW_SECONDS,
} from '../config/constants';
import { Logger } from '../utils/logger';
import { formatPrice18 } from '../utils/fixed-point';
import { PeerEndpoint, PeerRegistry, PeerUpdateOutcome, isZeroPeerRef } from './peer-registry';
import { ReadChannel } from './read-channel';
import {
  DecodedPrice,
  LATEST_PRICE_SELECTOR,
  ReadRequest,
  ReadResponse,
  decodePriceResponse,
  makeCorrelationId,
} from './read-protocol';

export interface PendingReadRequest {
  correlationId: string;
  chainId: number;
  issuedAt: number;
  expiresAt: number;
}

export interface RemotePriceRequest {
  request: ReadRequest;
  fee: MessagingFee;
}

export type PeerResponseSink = (chainId: number, price18: bigint, timestamp: number) => void;

export interface PeerSyncOptions {
  localChainId: number;
  logger: Logger;
  clock?: Clock;
  confirmations?: number;
  requestTtlSeconds?: number;
  onResponse?: PeerResponseSink;
}

export class PeerSyncManager {
  private readonly registry = new PeerRegistry();
  private pending = new Map<string, PendingReadRequest>();
  private channel: ReadChannel | null = null;
  private nonce = 0;
  private readonly localChainId: number;
  private readonly clock: Clock;
  private readonly confirmations: number;
  private readonly requestTtl: number;
  private readonly logger: Logger;
  private readonly sink: PeerResponseSink | null;

  constructor(options: PeerSyncOptions) {
    this.localChainId = options.localChainId;
    this.clock = options.clock ?? systemClock;
    this.confirmations = options.confirmations ?? DEFAULT_READ_CONFIRMATIONS;
    this.requestTtl = options.requestTtlSeconds ?? DEFAULT_REQUEST_TTL_SECONDS;
    this.logger = options.logger.child('PeerSync');
    this.sink = options.onResponse ?? null;
  }

  setReadChannel(channel: ReadChannel): void {
    this.channel = channel;
    channel.onResponse((response) => this.handleResponse(response));
    this.logger.info(`Read channel ${channel.channelId} attached`);
  }

  getReadChannelId(): number | null {
    return this.channel ? this.channel.channelId : null;
  }

  registerPeer(chainId: number, ref: string): PeerEndpoint {
    const peer = this.registry.registerPeer(chainId, ref);
    this.logger.info(`Peer ${chainId} ${peer.active ? `active at ${peer.remoteOracleRef}` : 'inactive'}`);
    return peer;
  }

  deactivatePeer(chainId: number): PeerEndpoint {
    return this.registerPeer(chainId, '');
  }

  getPeer(chainId: number): PeerEndpoint | undefined {
    return this.registry.getPeer(chainId);
  }

  getPeers(): PeerEndpoint[] {
    return this.registry.getPeers();
  }

  getActivePeerIds(): number[] {
    return this.registry.getActivePeerIds();
  }

  /**
   * Fee the channel charges for one read of a peer
   */
  async quoteFee(chainId: number): Promise<MessagingFee> {
    const { channel, request } = this.buildRequest(chainId);
    return this.quoteWith(channel, request);
  }

  /**
   * Send a read to a peer; the answer arrives later through the channel
   */
  async requestRemotePrice(chainId: number): Promise<RemotePriceRequest> {
    const { channel, request } = this.buildRequest(chainId);
    const fee = await this.quoteWith(channel, request);

    this.pending.set(request.correlationId, {
      correlationId: request.correlationId,
      chainId,
      issuedAt: request.timestampHint,
      expiresAt: request.timestampHint + this.requestTtl,
    });

    try {
      await channel.send(request);
    } catch (error) {
      this.pending.delete(request.correlationId);
      const message = error instanceof Error ? error.message : String(error);
      throw new PeerError(`Read to chain ${chainId} not sent: ${message}`);
    }

    this.logger.debug(`Requested price from chain ${chainId} (${request.correlationId})`);
    return { request, fee };
  }

  getPendingRequests(): PendingReadRequest[] {
    return Array.from(this.pending.values()).map((p) => ({ ...p }));
  }

  /**
   * Drop requests whose answer can no longer be accepted
   */
  prunePendingRequests(): number {
    const now = this.clock();
    let pruned = 0;
    for (const [id, entry] of this.pending) {
      if (now > entry.expiresAt) {
        this.pending.delete(id);
        pruned++;
      }
    }
    if (pruned > 0) {
      this.logger.debug(`Pruned ${pruned} expired read request(s)`);
    }
    return pruned;
  }

  /**
   * Correlate and decode a channel response, then hand it to the sink
   */
  handleResponse(response: ReadResponse): boolean {
    const entry = this.pending.get(response.correlationId);
    if (!entry) {
      this.logger.warn(`Dropping response with unknown correlation id ${response.correlationId}`);
      return false;
    }
    if (response.sourceChainId !== entry.chainId) {
      this.logger.warn(`Response for chain ${entry.chainId} arrived from chain ${response.sourceChainId}`);
      return false;
    }
    this.pending.delete(response.correlationId);

    if (this.clock() > entry.expiresAt) {
      this.logger.warn(`Dropping expired response from chain ${entry.chainId}`);
      return false;
    }

    let decoded: DecodedPrice;
    try {
      decoded = decodePriceResponse(response.payload);
    } catch (error) {
      this.logger.warn(`Chain ${entry.chainId} sent an unreadable response:`, error);
      return false;
    }

    if (this.sink) {
      this.sink(entry.chainId, decoded.price, decoded.timestamp);
    } else {
      this.onRemoteResponse(entry.chainId, decoded.price, decoded.timestamp);
    }
    return true;
  }

  /**
   * Cache a peer's price; zero, future-dated and out-of-order answers are dropped
   */
  onRemoteResponse(chainId: number, price18: bigint, timestamp: number): PeerUpdateOutcome {
    const outcome =
      timestamp > this.clock() + MAX_CLOCK_SKEW_SECONDS
        ? 'future-timestamp'
        : this.registry.recordPrice(chainId, price18, timestamp);
    switch (outcome) {
      case 'updated':
        this.logger.info(`Chain ${chainId} price ${formatPrice18(price18)} at ${timestamp}`);
        break;
      case 'zero-timestamp':
        this.logger.warn(`Chain ${chainId} answered with no price`);
        break;
      case 'future-timestamp':
        this.logger.warn(`Chain ${chainId} answer at ${timestamp} is ahead of the local clock`);
        break;
      case 'out-of-order':
        this.logger.warn(`Chain ${chainId} answer at ${timestamp} is older than the cached one`);
        break;
      case 'unknown-peer':
        this.logger.warn(`Ignoring answer from unregistered chain ${chainId}`);
        break;
    }
    return outcome;
  }

  getPeerPrice(chainId: number): PeerPrice {
    const peer = this.registry.getPeer(chainId);
    if (!peer) {
      return { price: 0n, timestamp: 0, valid: false };
    }
    return {
      price: peer.lastPrice18,
      timestamp: peer.lastTimestamp,
      valid: this.isPeerValid(peer),
    };
  }

  /**
   * True when at least one active peer holds a fresh price
   */
  crossChainValid(): boolean {
    return this.registry.getPeers().some((peer) => this.isPeerValid(peer));
  }

  private isPeerValid(peer: PeerEndpoint): boolean {
    return (
      peer.active &&
      peer.lastTimestamp > 0 &&
      this.clock() - peer.lastTimestamp <= FRESHNESS_WINDOW_SECONDS
    );
  }

  private buildRequest(chainId: number): { channel: ReadChannel; request: ReadRequest } {
    const channel = this.channel;
    if (!channel) {
      throw new PeerError('Read channel not set');
    }
    const peer = this.registry.getPeer(chainId);
    if (!peer || !peer.active) {
      throw new PeerError(`Peer ${chainId} is not active`);
    }
    if (isZeroPeerRef(peer.remoteOracleRef)) {
      throw new PeerError(`Peer ${chainId} has no oracle reference`);
    }

    const now = this.clock();
    const nonce = ++this.nonce;
    return {
      channel,
      request: {
        correlationId: makeCorrelationId(this.localChainId, chainId, nonce, now),
        channelId: channel.channelId,
        sourceChainId: this.localChainId,
        targetChainId: chainId,
        targetRef: peer.remoteOracleRef,
        callSelector: LATEST_PRICE_SELECTOR,
        timestampHint: now,
        confirmations: this.confirmations,
      },
    };
  }

  private async quoteWith(channel: ReadChannel, request: ReadRequest): Promise<MessagingFee> {
    try {
      return await channel.quote(request);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new PeerError(`Fee quote for chain ${request.targetChainId} failed: ${message}`);
    }
  }
}
