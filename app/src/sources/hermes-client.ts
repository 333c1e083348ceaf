/**
 * Pyth Hermes confidence-interval feed
 *
 * Reads the latest off-chain price update for a feed id over HTTP.
 */

import { PriceServiceConnection } from '@pythnetwork/price-service-client';
import { PYTH_HERMES_URL } from '../config/constants';
import { ConfidenceIntervalFeed } from './types';

/**
 * Normalize feed ID (remove 0x prefix and convert to lowercase)
 */
export function normalizeFeedId(id: string): string {
  return (id || '').toLowerCase().replace(/^0x/, '');
}

export class HermesPriceFeed implements ConfidenceIntervalFeed {
  private priceService: PriceServiceConnection;

  constructor(endpoint: string = PYTH_HERMES_URL) {
    this.priceService = new PriceServiceConnection(endpoint, { timeout: 5000 });
  }

  async priceUnsafe(id: string): Promise<{
    price: bigint;
    confidence: bigint;
    exponent: number;
    publishTime: number;
  }> {
    const wanted = normalizeFeedId(id);
    const feeds = await this.priceService.getLatestPriceFeeds([wanted]);
    const feed = feeds?.find((f) => normalizeFeedId(f.id) === wanted);

    if (!feed) {
      throw new Error(`Hermes returned no update for feed ${wanted}`);
    }

    const p = feed.getPriceUnchecked();
    return {
      price: BigInt(p.price),
      confidence: BigInt(p.conf),
      exponent: p.expo,
      publishTime: p.publishTime,
    };
  }

  /**
   * Close any streaming connection held by the client
   */
  close(): void {
    this.priceService.closeWebSocket();
  }
}
