/**
 * Remote read transport
 */

import { MessagingFee } from '../types';
import { Logger } from '../utils/logger';
import { ReadRequest, ReadResponse } from './read-protocol';

export type ResponseHandler = (response: ReadResponse) => void;

export interface ReadChannel {
  readonly channelId: number;
  quote(request: ReadRequest): Promise<MessagingFee>;
  send(request: ReadRequest): Promise<void>;
  onResponse(handler: ResponseHandler): void;
}

/**
 * Answers reads addressed to the local oracle; returns the encoded payload
 */
export interface ReadRequestHandler {
  handleReadRequest(request: ReadRequest): string;
}

interface LoopbackEndpoint {
  ref: string;
  handler: ReadRequestHandler;
}

interface QueuedRead {
  request: ReadRequest;
  origin: LoopbackReadChannel;
}

/**
 * In-process network of oracle instances keyed by chain id.
 * Sends are queued until flush(), so responses arrive asynchronously.
 */
export class LoopbackNetwork {
  private endpoints = new Map<number, LoopbackEndpoint>();
  private queue: QueuedRead[] = [];
  private readonly logger: Logger;

  constructor(logger: Logger, private readonly fee: MessagingFee = { nativeFee: 0n, tokenFee: 0n }) {
    this.logger = logger.child('Loopback');
  }

  attach(chainId: number, ref: string, handler: ReadRequestHandler): void {
    this.endpoints.set(chainId, { ref: ref.toLowerCase(), handler });
  }

  channel(channelId: number): LoopbackReadChannel {
    return new LoopbackReadChannel(this, channelId);
  }

  quoteFee(): MessagingFee {
    return { ...this.fee };
  }

  enqueue(request: ReadRequest, origin: LoopbackReadChannel): void {
    this.queue.push({ request, origin });
  }

  /**
   * Deliver every queued read; returns the number of responses delivered
   */
  flush(): number {
    const batch = this.queue;
    this.queue = [];
    let delivered = 0;

    for (const { request, origin } of batch) {
      const endpoint = this.endpoints.get(request.targetChainId);
      if (!endpoint || endpoint.ref !== request.targetRef.toLowerCase()) {
        this.logger.warn(`No oracle at ${request.targetRef} on chain ${request.targetChainId}, dropping read`);
        continue;
      }

      let payload: string;
      try {
        payload = endpoint.handler.handleReadRequest(request);
      } catch (error) {
        this.logger.warn(`Chain ${request.targetChainId} refused read:`, error);
        continue;
      }

      origin.deliver({
        correlationId: request.correlationId,
        sourceChainId: request.targetChainId,
        payload,
      });
      delivered++;
    }

    return delivered;
  }
}

export class LoopbackReadChannel implements ReadChannel {
  private handlers: ResponseHandler[] = [];

  constructor(private readonly network: LoopbackNetwork, readonly channelId: number) {}

  async quote(_request: ReadRequest): Promise<MessagingFee> {
    return this.network.quoteFee();
  }

  async send(request: ReadRequest): Promise<void> {
    this.network.enqueue(request, this);
  }

  onResponse(handler: ResponseHandler): void {
    this.handlers.push(handler);
  }

  deliver(response: ReadResponse): void {
    for (const handler of this.handlers) {
      handler(response);
    }
  }
}
