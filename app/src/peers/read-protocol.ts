/**
 * Remote read wire format
 *
 * Requests name the peer oracle's read entry point by its 4-byte selector.
 * Responses carry the ABI tuple (int256 price, uint256 timestamp).
 */

import { AbiCoder, Result, dataSlice, id, isHexString, solidityPackedKeccak256, toBigInt } from 'ethers';
import { READ_ENTRY_POINT } from '../config/constants';
import { InvalidResponseError } from '../types';

export const LATEST_PRICE_SELECTOR = dataSlice(id(READ_ENTRY_POINT), 0, 4);

export interface ReadRequest {
  correlationId: string;
  channelId: number;
  sourceChainId: number;
  targetChainId: number;
  targetRef: string;
  callSelector: string;
  timestampHint: number;
  confirmations: number;
}

export interface ReadResponse {
  correlationId: string;
  /** Chain that answered */
  sourceChainId: number;
  payload: string;
}

export interface DecodedPrice {
  price: bigint;
  timestamp: number;
}

const RESPONSE_TYPES = ['int256', 'uint256'];

export function encodePriceResponse(price: bigint, timestamp: number): string {
  return AbiCoder.defaultAbiCoder().encode(RESPONSE_TYPES, [price, timestamp]);
}

export function decodePriceResponse(payload: string): DecodedPrice {
  if (!isHexString(payload)) {
    throw new InvalidResponseError('Response payload is not hex data');
  }

  let decoded: Result;
  try {
    decoded = AbiCoder.defaultAbiCoder().decode(RESPONSE_TYPES, payload);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidResponseError(`Malformed price response: ${message}`);
  }

  const timestamp = toBigInt(decoded[1]);
  if (timestamp > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new InvalidResponseError(`Response timestamp out of range: ${timestamp}`);
  }
  return { price: toBigInt(decoded[0]), timestamp: Number(timestamp) };
}

export function makeCorrelationId(
  sourceChainId: number,
  targetChainId: number,
  nonce: number,
  issuedAt: number
): string {
  return solidityPackedKeccak256(
    ['uint64', 'uint64', 'uint64', 'uint64'],
    [sourceChainId, targetChainId, nonce, issuedAt]
  );
}
