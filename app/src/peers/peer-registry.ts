/**
 * Remote oracle endpoints and their cached prices
 */

import { ConfigurationError } from '../types';
import { ZERO_REF } from '../config/constants';

export interface PeerEndpoint {
  chainId: number;
  remoteOracleRef: string;
  active: boolean;
  lastPrice18: bigint;
  lastTimestamp: number;
}

export type PeerUpdateOutcome =
  | 'updated'
  | 'zero-timestamp'
  | 'future-timestamp'
  | 'out-of-order'
  | 'unknown-peer';

export function isZeroPeerRef(ref: string): boolean {
  return ref.trim() === '' || /^0x0*$/i.test(ref) || ref.toLowerCase() === ZERO_REF;
}

export class PeerRegistry {
  private peers = new Map<number, PeerEndpoint>();
  // Order is irrelevant; removal swaps with the last element
  private activeIds: number[] = [];

  /**
   * Set a peer's reference; a zero reference deactivates it
   */
  registerPeer(chainId: number, ref: string): PeerEndpoint {
    if (!Number.isInteger(chainId) || chainId <= 0) {
      throw new ConfigurationError(`Invalid chain id: ${chainId}`);
    }

    const active = !isZeroPeerRef(ref);
    const existing = this.peers.get(chainId);
    const wasActive = existing?.active ?? false;

    const peer: PeerEndpoint = {
      chainId,
      remoteOracleRef: active ? ref : ZERO_REF,
      active,
      lastPrice18: existing?.lastPrice18 ?? 0n,
      lastTimestamp: existing?.lastTimestamp ?? 0,
    };
    this.peers.set(chainId, peer);

    if (active && !wasActive) {
      this.activeIds.push(chainId);
    } else if (!active && wasActive) {
      this.removeActive(chainId);
    }

    return { ...peer };
  }

  deactivatePeer(chainId: number): PeerEndpoint {
    return this.registerPeer(chainId, ZERO_REF);
  }

  getPeer(chainId: number): PeerEndpoint | undefined {
    const peer = this.peers.get(chainId);
    return peer ? { ...peer } : undefined;
  }

  getActivePeerIds(): number[] {
    return [...this.activeIds];
  }

  getPeers(): PeerEndpoint[] {
    return Array.from(this.peers.values()).map((p) => ({ ...p }));
  }

  /**
   * Store a peer's reported price unless it is empty or older than the cached one
   */
  recordPrice(chainId: number, price18: bigint, timestamp: number): PeerUpdateOutcome {
    if (timestamp === 0) {
      return 'zero-timestamp';
    }
    const peer = this.peers.get(chainId);
    if (!peer) {
      return 'unknown-peer';
    }
    if (timestamp < peer.lastTimestamp) {
      return 'out-of-order';
    }
    peer.lastPrice18 = price18;
    peer.lastTimestamp = timestamp;
    return 'updated';
  }

  private removeActive(chainId: number): void {
    const index = this.activeIds.indexOf(chainId);
    if (index === -1) return;

    const last = this.activeIds.length - 1;
    const tail = this.activeIds[last];
    if (index !== last && tail !== undefined) {
      this.activeIds[index] = tail;
    }
    this.activeIds.pop();
  }
}
