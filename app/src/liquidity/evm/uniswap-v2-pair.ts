/**
 * Uniswap-V2-style pair reader
 */

import { Contract, ContractRunner, Result, toBigInt } from 'ethers';
import { LiquidityPool, PoolConnector, PoolReserves } from '../types';

const PAIR_ABI = [
  'function getReserves() external view returns (uint112 reserve0, uint112 reserve1, uint32 blockTimestampLast)',
  'function token0() external view returns (address)',
  'function token1() external view returns (address)',
  'function price0CumulativeLast() external view returns (uint256)',
  'function price1CumulativeLast() external view returns (uint256)',
];

export class UniswapV2Pair implements LiquidityPool {
  private contract: Contract;
  private tokens: { token0: string; token1: string } | null = null;

  constructor(address: string, runner: ContractRunner) {
    this.contract = new Contract(address, PAIR_ABI, runner);
  }

  async reserves(): Promise<PoolReserves> {
    const r: Result = await this.contract.getFunction('getReserves').staticCall();
    return { reserve0: toBigInt(r[0]), reserve1: toBigInt(r[1]), lastTimestamp: Number(r[2]) };
  }

  async token0(): Promise<string> {
    return (await this.loadTokens()).token0;
  }

  async token1(): Promise<string> {
    return (await this.loadTokens()).token1;
  }

  async cumulativePrice0(): Promise<bigint> {
    return toBigInt(await this.contract.getFunction('price0CumulativeLast').staticCall());
  }

  async cumulativePrice1(): Promise<bigint> {
    return toBigInt(await this.contract.getFunction('price1CumulativeLast').staticCall());
  }

  // Pair tokens never change
  private async loadTokens(): Promise<{ token0: string; token1: string }> {
    if (!this.tokens) {
      const token0: string = await this.contract.getFunction('token0').staticCall();
      const token1: string = await this.contract.getFunction('token1').staticCall();
      this.tokens = { token0, token1 };
    }
    return this.tokens;
  }
}

export class EvmPoolConnector implements PoolConnector {
  private pairs = new Map<string, UniswapV2Pair>();

  constructor(private readonly runner: ContractRunner) {}

  pool(ref: string): LiquidityPool {
    const key = ref.toLowerCase();
    let pair = this.pairs.get(key);
    if (!pair) {
      pair = new UniswapV2Pair(ref, this.runner);
      this.pairs.set(key, pair);
    }
    return pair;
  }
}
