/**
 * WebSocket read transport
 *
 * Each oracle runs a WsReadServer; peers connect with a WsReadChannel and
 * exchange JSON frames: { type: 'read_request', request } and
 * { type: 'read_response', response } or { type: 'read_error', correlationId, error }.
 */

import WebSocket, { WebSocketServer } from 'ws';
import type { RawData } from 'ws';
import { MessagingFee } from '../types';
import { Logger } from '../utils/logger';
import { ReadRequest, ReadResponse } from './read-protocol';
import { ReadChannel, ReadRequestHandler, ResponseHandler } from './read-channel';

type Frame =
  | { type: 'read_request'; request: ReadRequest }
  | { type: 'read_response'; response: ReadResponse }
  | { type: 'read_error'; correlationId: string; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isReadRequest(value: unknown): value is ReadRequest {
  return (
    isRecord(value) &&
    typeof value.correlationId === 'string' &&
    typeof value.channelId === 'number' &&
    typeof value.sourceChainId === 'number' &&
    typeof value.targetChainId === 'number' &&
    typeof value.targetRef === 'string' &&
    typeof value.callSelector === 'string' &&
    typeof value.timestampHint === 'number' &&
    typeof value.confirmations === 'number'
  );
}

function isReadResponse(value: unknown): value is ReadResponse {
  return (
    isRecord(value) &&
    typeof value.correlationId === 'string' &&
    typeof value.sourceChainId === 'number' &&
    typeof value.payload === 'string'
  );
}

export function parseFrame(data: string): Frame | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  if (parsed.type === 'read_request' && isReadRequest(parsed.request)) {
    return { type: 'read_request', request: parsed.request };
  }
  if (parsed.type === 'read_response' && isReadResponse(parsed.response)) {
    return { type: 'read_response', response: parsed.response };
  }
  if (
    parsed.type === 'read_error' &&
    typeof parsed.correlationId === 'string' &&
    typeof parsed.error === 'string'
  ) {
    return { type: 'read_error', correlationId: parsed.correlationId, error: parsed.error };
  }
  return null;
}

function frameText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

/**
 * Serves the local oracle's price to connected peers
 */
export class WsReadServer {
  private wss: WebSocketServer | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly port: number,
    private readonly handler: ReadRequestHandler,
    logger: Logger
  ) {
    this.logger = logger.child('ReadServer');
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ port: this.port });
      wss.once('listening', () => {
        this.logger.info(`Read server listening on port ${this.port}`);
        wss.on('error', (error) => this.logger.error('Read server error:', error));
        resolve();
      });
      wss.once('error', reject);
      wss.on('connection', (ws) => {
        ws.on('error', (error) => this.logger.warn('Peer connection error:', error));
        ws.on('message', (data) => this.handleMessage(ws, frameText(data)));
      });
      this.wss = wss;
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.wss) {
        resolve();
        return;
      }
      for (const client of this.wss.clients) {
        client.terminate();
      }
      this.wss.close((error) => (error ? reject(error) : resolve()));
      this.wss = null;
    });
  }

  /**
   * Port actually bound, which differs from the configured one when that was 0
   */
  boundPort(): number | null {
    const address = this.wss?.address();
    return address && typeof address !== 'string' ? address.port : null;
  }

  connectionCount(): number {
    return this.wss ? this.wss.clients.size : 0;
  }

  private handleMessage(ws: WebSocket, data: string): void {
    const frame = parseFrame(data);
    if (!frame || frame.type !== 'read_request') {
      this.logger.warn('Ignoring malformed frame');
      return;
    }

    const { request } = frame;
    let reply: Frame;
    try {
      const payload = this.handler.handleReadRequest(request);
      reply = {
        type: 'read_response',
        response: { correlationId: request.correlationId, sourceChainId: request.targetChainId, payload },
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Refused read ${request.correlationId}: ${message}`);
      reply = { type: 'read_error', correlationId: request.correlationId, error: message };
    }
    ws.send(JSON.stringify(reply));
  }
}

/**
 * Sends reads to peer read servers, one connection per target chain
 */
export class WsReadChannel implements ReadChannel {
  private sockets = new Map<number, WebSocket>();
  private connecting = new Map<number, Promise<WebSocket>>();
  private handlers: ResponseHandler[] = [];
  private readonly logger: Logger;

  constructor(
    readonly channelId: number,
    private readonly peerUrls: Map<number, string>,
    logger: Logger,
    private readonly fee: MessagingFee = { nativeFee: 0n, tokenFee: 0n }
  ) {
    this.logger = logger.child('ReadChannel');
  }

  async quote(request: ReadRequest): Promise<MessagingFee> {
    if (!this.peerUrls.has(request.targetChainId)) {
      throw new Error(`No read server known for chain ${request.targetChainId}`);
    }
    return { ...this.fee };
  }

  async send(request: ReadRequest): Promise<void> {
    const ws = await this.connect(request.targetChainId);
    ws.send(JSON.stringify({ type: 'read_request', request }));
  }

  onResponse(handler: ResponseHandler): void {
    this.handlers.push(handler);
  }

  close(): void {
    for (const ws of this.sockets.values()) {
      ws.close();
    }
    this.sockets.clear();
    this.connecting.clear();
  }

  private connect(chainId: number): Promise<WebSocket> {
    const open = this.sockets.get(chainId);
    if (open && open.readyState === WebSocket.OPEN) {
      return Promise.resolve(open);
    }
    const inFlight = this.connecting.get(chainId);
    if (inFlight) {
      return inFlight;
    }

    const url = this.peerUrls.get(chainId);
    if (!url) {
      return Promise.reject(new Error(`No read server known for chain ${chainId}`));
    }

    const attempt = new Promise<WebSocket>((resolve, reject) => {
      const ws = new WebSocket(url);
      // tracked while connecting so close() also aborts it
      this.sockets.set(chainId, ws);
      const settled = (): void => {
        if (this.sockets.get(chainId) === ws) {
          this.connecting.delete(chainId);
        }
      };
      ws.once('open', () => {
        settled();
        resolve(ws);
      });
      ws.on('error', (error) => {
        this.logger.warn(`Connection to chain ${chainId} failed:`, error);
        settled();
        reject(error);
      });
      ws.on('message', (data) => this.handleMessage(frameText(data)));
      ws.on('close', () => {
        if (this.sockets.get(chainId) === ws) {
          this.sockets.delete(chainId);
          this.connecting.delete(chainId);
        }
      });
    });
    this.connecting.set(chainId, attempt);
    return attempt;
  }

  private handleMessage(data: string): void {
    const frame = parseFrame(data);
    if (!frame) {
      this.logger.warn('Ignoring malformed frame');
      return;
    }
    if (frame.type === 'read_error') {
      this.logger.warn(`Peer refused read ${frame.correlationId}: ${frame.error}`);
      return;
    }
    if (frame.type === 'read_response') {
      for (const handler of this.handlers) {
        handler(frame.response);
      }
    }
  }
}
