/**
 * Status HTTP server
 */

import express from 'express';
import { Server, createServer } from 'http';
import { OracleMode } from '../types';
import { formatPrice18 } from '../utils/fixed-point';
import { Logger } from '../utils/logger';
import { OracleService } from './oracle-service';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Convert a value holding bigints into something JSON.stringify accepts
 */
export function toJsonSnapshot(value: unknown): JsonValue {
  if (typeof value === 'bigint') return value.toString();
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) return value.map(toJsonSnapshot);
  if (typeof value === 'object') {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, v] of Object.entries(value)) {
      if (v !== undefined) out[key] = toJsonSnapshot(v);
    }
    return out;
  }
  return String(value);
}

export function priceSnapshot(service: OracleService): JsonValue {
  const asset = service.latestPrice();
  const native = service.getAggregatedNativePrice();
  return toJsonSnapshot({
    chainId: service.chainId,
    price: asset.price,
    timestamp: asset.timestamp,
    display: formatPrice18(asset.price),
    nativePrice: native.price,
    nativeTimestamp: native.timestamp,
    fresh: service.isFresh(),
  });
}

export function statusSnapshot(service: OracleService): JsonValue {
  const status = service.getOracleStatus();
  return toJsonSnapshot({
    chainId: service.chainId,
    ...status,
    mode: OracleMode[status.mode],
    sources: service.getSources(),
    twap: service.getTwapState(),
    pendingRequests: service.getPendingRequests().length,
    stats: service.getStats(),
  });
}

export function peersSnapshot(service: OracleService): JsonValue {
  return toJsonSnapshot({
    activePeerIds: service.getActivePeerIds(),
    peers: service.getPeers().map((peer) => ({
      ...peer,
      valid: service.getPeerPrice(peer.chainId).valid,
    })),
  });
}

export function createStatusApp(service: OracleService): express.Express {
  const app = express();

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', chainId: service.chainId, mode: OracleMode[service.getMode()] });
  });

  app.get('/api/price', (_req, res) => {
    res.json(priceSnapshot(service));
  });

  app.get('/api/status', (_req, res) => {
    res.json(statusSnapshot(service));
  });

  app.get('/api/peers', (_req, res) => {
    res.json(peersSnapshot(service));
  });

  app.get('/api/validate', (_req, res) => {
    res.json(service.validate());
  });

  return app;
}

export class StatusServer {
  private server: Server | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly service: OracleService,
    private readonly port: number,
    logger: Logger
  ) {
    this.logger = logger.child('Status');
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = createServer(createStatusApp(this.service));
      server.once('error', reject);
      server.listen(this.port, () => {
        this.logger.info(`Status server running on http://localhost:${this.port}`);
        resolve();
      });
      this.server = server;
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close((error) => (error ? reject(error) : resolve()));
      this.server = null;
    });
  }
}
