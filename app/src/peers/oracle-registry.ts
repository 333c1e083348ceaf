/**
 * Registry of oracle deployments per chain
 */

import { Contract, ContractRunner, Result } from 'ethers';

export interface OracleChainConfig {
  primaryRef: string;
  readChannelId: number;
  configured: boolean;
}

export interface OracleRegistry {
  endpointFor(chainId: number): Promise<string>;
  oracleConfigFor(chainId: number): Promise<OracleChainConfig>;
}

const REGISTRY_ABI = [
  'function getLayerZeroEndpoint(uint16 chainId) external view returns (address)',
  'function getOracleConfig(uint256 chainId) external view returns (address primaryOracle, uint32 lzReadChannelId, bool isConfigured)',
];

export class RegistryContract implements OracleRegistry {
  private contract: Contract;

  constructor(address: string, runner: ContractRunner) {
    this.contract = new Contract(address, REGISTRY_ABI, runner);
  }

  async endpointFor(chainId: number): Promise<string> {
    return this.contract.getFunction('getLayerZeroEndpoint').staticCall(chainId);
  }

  async oracleConfigFor(chainId: number): Promise<OracleChainConfig> {
    const r: Result = await this.contract.getFunction('getOracleConfig').staticCall(chainId);
    return {
      primaryRef: String(r[0]),
      readChannelId: Number(r[1]),
      configured: Boolean(r[2]),
    };
  }
}
