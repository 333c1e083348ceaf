import { expect } from 'chai';
import { Interface } from 'ethers';
import {
  AggregatorV3Feed,
  DapiProxyFeed,
  EvmFeedConnector,
  PythContractFeed,
  ReferenceDataFeed,
} from '../app/src/sources/evm/evm-feeds';
import { EvmPoolConnector, UniswapV2Pair } from '../app/src/liquidity/evm/uniswap-v2-pair';
import { RegistryContract } from '../app/src/peers/oracle-registry';
import { FakeConfidenceFeed, e18 } from './helpers/fakes';
import { FakeContractRunner } from './helpers/fake-contract-runner';

const CONTRACT = '0x1111111111111111111111111111111111111111';
const TOKEN_A = '0x00000000000000000000000000000000000000a1';
const TOKEN_B = '0x00000000000000000000000000000000000000b2';
const PRICE_ID = `0x${'11'.repeat(32)}`;

describe('EVM readers', () => {
  it('reads round data and decimals from an aggregator', async () => {
    const runner = new FakeContractRunner(
      new Interface([
        'function decimals() view returns (uint8)',
        'function latestRoundData() view returns (uint80, int256, uint256, uint256, uint80)',
      ]),
      {
        latestRoundData: () => [7, 250_000_000_000n, 900, 1000, 7],
        decimals: () => [8],
      }
    );
    const feed = new AggregatorV3Feed(CONTRACT, runner);
    expect(await feed.latestValue()).to.deep.equal({ value: 250_000_000_000n, updatedAt: 1000 });
    expect(await feed.decimalCount()).to.equal(8);
  });

  it('reads structured and reference prices from a push feed', async () => {
    const symbols: string[] = [];
    const runner = new FakeContractRunner(
      new Interface([
        'function getPriceData(string) view returns (uint64, uint64)',
        'function getReferenceData(string, string) view returns (tuple(uint256, uint256, uint256))',
      ]),
      {
        getPriceData: (args) => {
          symbols.push(String(args[0]));
          return [2_345_000_000_000n, 500];
        },
        getReferenceData: (args) => {
          symbols.push(`${String(args[0])}/${String(args[1])}`);
          return [[e18(2), 10, 20]];
        },
      }
    );
    const feed = new ReferenceDataFeed(CONTRACT, runner);
    expect(await feed.priceFor('ETH')).to.deep.equal({ price: 2_345_000_000_000n, timestamp: 500 });
    expect(await feed.referenceRate('ETH', 'USD')).to.deep.equal({ rate: e18(2), updatedBase: 10, updatedQuote: 20 });
    expect(symbols).to.deep.equal(['ETH', 'ETH/USD']);
  });

  it('reads a proxy value', async () => {
    const runner = new FakeContractRunner(new Interface(['function read() view returns (int224, uint32)']), {
      read: () => [e18(3), 1234],
    });
    expect(await new DapiProxyFeed(CONTRACT, runner).read()).to.deep.equal({ value: e18(3), timestamp: 1234 });
  });

  it('reads an unchecked confidence-interval price', async () => {
    const runner = new FakeContractRunner(
      new Interface(['function getPriceUnsafe(bytes32) view returns (tuple(int64, uint64, int32, uint256))']),
      { getPriceUnsafe: () => [[180_250_000n, 12_000n, -6, 4321]] }
    );
    expect(await new PythContractFeed(CONTRACT, runner).priceUnsafe(PRICE_ID)).to.deep.equal({
      price: 180_250_000n,
      confidence: 12_000n,
      exponent: -6,
      publishTime: 4321,
    });
  });

  it('surfaces reverted reads as rejections', async () => {
    const runner = new FakeContractRunner(new Interface(['function read() view returns (int224, uint32)']), {});
    try {
      await new DapiProxyFeed(CONTRACT, runner).read();
      expect.fail('read should have thrown');
    } catch (error) {
      expect(error instanceof Error ? error.message : '').to.equal('execution reverted: read');
    }
  });

  it('prefers the configured off-chain confidence feed', () => {
    const runner = new FakeContractRunner(new Interface([]), {});
    const hermes = new FakeConfidenceFeed({ price: 1n, confidence: 0n, exponent: 0, publishTime: 1 });
    expect(new EvmFeedConnector(runner, hermes).confidenceInterval(CONTRACT)).to.equal(hermes);
    expect(new EvmFeedConnector(runner).confidenceInterval(CONTRACT)).to.be.instanceOf(PythContractFeed);
  });

  describe('UniswapV2Pair', () => {
    let runner: FakeContractRunner;

    beforeEach(() => {
      runner = new FakeContractRunner(
        new Interface([
          'function getReserves() view returns (uint112, uint112, uint32)',
          'function token0() view returns (address)',
          'function token1() view returns (address)',
          'function price0CumulativeLast() view returns (uint256)',
          'function price1CumulativeLast() view returns (uint256)',
        ]),
        {
          getReserves: () => [2_000_000_000n, e18(1), 1700],
          token0: () => [TOKEN_A],
          token1: () => [TOKEN_B],
          price0CumulativeLast: () => [5n],
          price1CumulativeLast: () => [6n << 112n],
        }
      );
    });

    it('reads reserves and accumulators', async () => {
      const pair = new UniswapV2Pair(CONTRACT, runner);
      expect(await pair.reserves()).to.deep.equal({ reserve0: 2_000_000_000n, reserve1: e18(1), lastTimestamp: 1700 });
      expect(await pair.cumulativePrice0()).to.equal(5n);
      expect(await pair.cumulativePrice1()).to.equal(6n << 112n);
    });

    it('reads the pair tokens once', async () => {
      const pair = new UniswapV2Pair(CONTRACT, runner);
      expect((await pair.token0()).toLowerCase()).to.equal(TOKEN_A);
      expect((await pair.token1()).toLowerCase()).to.equal(TOKEN_B);
      await pair.token0();
      expect(runner.calls).to.deep.equal(['token0', 'token1']);
    });

    it('reuses pairs per address', () => {
      const connector = new EvmPoolConnector(runner);
      expect(connector.pool('0x00000000000000000000000000000000000000AB')).to.equal(
        connector.pool('0x00000000000000000000000000000000000000ab')
      );
    });
  });

  it('reads oracle deployments from the registry', async () => {
    const runner = new FakeContractRunner(
      new Interface([
        'function getLayerZeroEndpoint(uint16) view returns (address)',
        'function getOracleConfig(uint256) view returns (address, uint32, bool)',
      ]),
      {
        getLayerZeroEndpoint: () => [TOKEN_B],
        getOracleConfig: (args) => [TOKEN_A, Number(args[0]) * 2, true],
      }
    );
    const registry = new RegistryContract(CONTRACT, runner);
    const config = await registry.oracleConfigFor(21);
    expect({ ...config, primaryRef: config.primaryRef.toLowerCase() }).to.deep.equal({
      primaryRef: TOKEN_A,
      readChannelId: 42,
      configured: true,
    });
    expect((await registry.endpointFor(21)).toLowerCase()).to.equal(TOKEN_B);
  });
});
