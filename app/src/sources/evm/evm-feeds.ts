/**
 * On-chain feed readers backed by ethers contracts
 */

import { Contract, ContractRunner, Result, toBigInt } from 'ethers';
import {
  ConfidenceIntervalFeed,
  FeedConnector,
  ProxyReadFeed,
  PullQuoteFeed,
  PushAggregateFeed,
} from '../types';

const AGGREGATOR_V3_ABI = [
  'function decimals() external view returns (uint8)',
  'function latestRoundData() external view returns (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)',
];

const PUSH_REFERENCE_ABI = [
  'function getPriceData(string symbol) external view returns (uint64 price, uint64 timestamp)',
  'function getReferenceData(string base, string quote) external view returns (tuple(uint256 rate, uint256 lastUpdatedBase, uint256 lastUpdatedQuote))',
];

const DAPI_PROXY_ABI = [
  'function read() external view returns (int224 value, uint32 timestamp)',
];

const PYTH_ABI = [
  'function getPriceUnsafe(bytes32 id) external view returns (tuple(int64 price, uint64 conf, int32 expo, uint256 publishTime))',
];

export class AggregatorV3Feed implements PullQuoteFeed {
  private contract: Contract;

  constructor(address: string, runner: ContractRunner) {
    this.contract = new Contract(address, AGGREGATOR_V3_ABI, runner);
  }

  async latestValue(): Promise<{ value: bigint; updatedAt: number }> {
    const round: Result = await this.contract.getFunction('latestRoundData').staticCall();
    return { value: toBigInt(round[1]), updatedAt: Number(round[3]) };
  }

  async decimalCount(): Promise<number> {
    const decimals: bigint = await this.contract.getFunction('decimals').staticCall();
    return Number(decimals);
  }
}

export class ReferenceDataFeed implements PushAggregateFeed {
  private contract: Contract;

  constructor(address: string, runner: ContractRunner) {
    this.contract = new Contract(address, PUSH_REFERENCE_ABI, runner);
  }

  async priceFor(symbol: string): Promise<{ price: bigint; timestamp: number }> {
    const data: Result = await this.contract.getFunction('getPriceData').staticCall(symbol);
    return { price: toBigInt(data[0]), timestamp: Number(data[1]) };
  }

  async referenceRate(
    base: string,
    quote: string
  ): Promise<{ rate: bigint; updatedBase: number; updatedQuote: number }> {
    const data: Result = await this.contract.getFunction('getReferenceData').staticCall(base, quote);
    return {
      rate: toBigInt(data[0]),
      updatedBase: Number(data[1]),
      updatedQuote: Number(data[2]),
    };
  }
}

export class DapiProxyFeed implements ProxyReadFeed {
  private contract: Contract;

  constructor(address: string, runner: ContractRunner) {
    this.contract = new Contract(address, DAPI_PROXY_ABI, runner);
  }

  async read(): Promise<{ value: bigint; timestamp: number }> {
    const data: Result = await this.contract.getFunction('read').staticCall();
    return { value: toBigInt(data[0]), timestamp: Number(data[1]) };
  }
}

export class PythContractFeed implements ConfidenceIntervalFeed {
  private contract: Contract;

  constructor(address: string, runner: ContractRunner) {
    this.contract = new Contract(address, PYTH_ABI, runner);
  }

  async priceUnsafe(id: string): Promise<{
    price: bigint;
    confidence: bigint;
    exponent: number;
    publishTime: number;
  }> {
    const data: Result = await this.contract.getFunction('getPriceUnsafe').staticCall(id);
    return {
      price: toBigInt(data[0]),
      confidence: toBigInt(data[1]),
      exponent: Number(data[2]),
      publishTime: Number(data[3]),
    };
  }
}

/**
 * Resolves feed addresses into contract readers on one provider
 */
export class EvmFeedConnector implements FeedConnector {
  private confidenceOverride: ConfidenceIntervalFeed | null;

  constructor(private readonly runner: ContractRunner, confidenceOverride?: ConfidenceIntervalFeed) {
    this.confidenceOverride = confidenceOverride ?? null;
  }

  pullQuote(ref: string): PullQuoteFeed {
    return new AggregatorV3Feed(ref, this.runner);
  }

  pushAggregate(ref: string): PushAggregateFeed {
    return new ReferenceDataFeed(ref, this.runner);
  }

  proxyRead(ref: string): ProxyReadFeed {
    return new DapiProxyFeed(ref, this.runner);
  }

  confidenceInterval(ref: string): ConfidenceIntervalFeed {
    // Off-chain Hermes reads replace the on-chain contract when configured
    return this.confidenceOverride ?? new PythContractFeed(ref, this.runner);
  }
}
