import { expect } from 'chai';
import { PriceAggregator } from '../app/src/aggregation/price-aggregator';
import { SourceOutcome } from '../app/src/aggregation/types';
import {
  AggregationTier,
  ConfigurationError,
  FeedKind,
  InsufficientSourcesError,
} from '../app/src/types';
import {
  FakeClock,
  FakeFeedConnector,
  FakeProxyReadFeed,
  FakePullQuoteFeed,
  FakePushAggregateFeed,
  e18,
  silentLogger,
} from './helpers/fakes';

const T0 = 1_700_000_000;

describe('PriceAggregator', () => {
  let clock: FakeClock;
  let connector: FakeFeedConnector;
  let pull: FakePullQuoteFeed;
  let push: FakePushAggregateFeed;
  let proxy: FakeProxyReadFeed;
  let observed: SourceOutcome[][];
  let aggregator: PriceAggregator;

  beforeEach(() => {
    clock = new FakeClock(T0);
    connector = new FakeFeedConnector();
    pull = new FakePullQuoteFeed({ value: 10_000_000_000n, updatedAt: T0 }, 8);
    push = new FakePushAggregateFeed({ price: 102_000_000_000n, timestamp: T0 });
    proxy = new FakeProxyReadFeed({ value: e18(98), timestamp: T0 });
    connector.pull.set('0xpull', pull);
    connector.push.set('0xpush', push);
    connector.proxy.set('0xproxy', proxy);
    observed = [];

    aggregator = new PriceAggregator({
      connector,
      logger: silentLogger,
      clock: clock.fn,
      observer: (outcomes) => observed.push(outcomes),
    });
    aggregator.setFeedSource(FeedKind.PullQuote, { endpointRef: '0xpull', weight: 40, extra: '' });
    aggregator.setFeedSource(FeedKind.PushAggregate, { endpointRef: '0xpush', weight: 30, extra: 'ETH' });
    aggregator.setFeedSource(FeedKind.ProxyRead, { endpointRef: '0xproxy', weight: 30, extra: '' });
  });

  describe('configuration', () => {
    it('fills staleness and activity defaults', () => {
      expect(aggregator.getSources()[0]).to.deep.equal({
        kind: FeedKind.PullQuote,
        endpointRef: '0xpull',
        weight: 40,
        maxStalenessSeconds: 3600,
        active: true,
        extra: '',
      });
    });

    it('rejects weights outside 0..255', () => {
      expect(() => aggregator.setFeedSource(FeedKind.PullQuote, { endpointRef: '0xpull', weight: 256, extra: '' }))
        .to.throw(ConfigurationError);
      expect(() => aggregator.setSourceWeight(FeedKind.PullQuote, 1.5)).to.throw(ConfigurationError);
    });

    it('rejects zero endpoint references', () => {
      expect(() =>
        aggregator.setFeedSource(FeedKind.ProxyRead, {
          endpointRef: '0x0000000000000000000000000000000000000000',
          weight: 1,
          extra: '',
        })
      ).to.throw(ConfigurationError, 'has no endpoint reference');
    });

    it('requires a price id for confidence-interval feeds', () => {
      expect(() =>
        aggregator.setFeedSource(FeedKind.ConfidenceInterval, { endpointRef: '0xconf', weight: 1, extra: '' })
      ).to.throw(ConfigurationError, 'requires a price id');
    });

    it('bounds minValidSources to the number of feed kinds', () => {
      expect(() => aggregator.setMinValidSources(0)).to.throw(ConfigurationError);
      expect(() => aggregator.setMinValidSources(5)).to.throw(ConfigurationError);
      aggregator.setMinValidSources(4);
      expect(aggregator.getMinValidSources()).to.equal(4);
    });

    it('rejects updates to unconfigured kinds', () => {
      expect(() => aggregator.setSourceActive(FeedKind.ConfidenceInterval, false)).to.throw(
        ConfigurationError,
        'No confidence-interval source configured'
      );
    });

    it('counts only active sources', () => {
      aggregator.setSourceActive(FeedKind.ProxyRead, false);
      expect(aggregator.activeSourceCount()).to.equal(2);
      expect(aggregator.removeFeedSource(FeedKind.ProxyRead)).to.equal(true);
      expect(aggregator.getSources().map((s) => s.kind)).to.deep.equal([FeedKind.PullQuote, FeedKind.PushAggregate]);
    });
  });

  describe('aggregate', () => {
    it('returns the weighted mean of valid sources and caches it', async () => {
      const result = await aggregator.aggregate();
      expect(result).to.deep.equal({
        price18: e18(100),
        timestamp: T0,
        degraded: false,
        tier: AggregationTier.Aggregated,
        validCount: 3,
      });
      expect(aggregator.getFallbackCache()).to.deep.equal({ price18: e18(100), timestamp: T0 });
    });

    it('truncates the weighted mean', async () => {
      aggregator.setSourceWeight(FeedKind.PullQuote, 1);
      aggregator.setSourceWeight(FeedKind.PushAggregate, 1);
      aggregator.setSourceWeight(FeedKind.ProxyRead, 1);
      proxy.answer = { value: e18(98) + 1n, timestamp: T0 };
      // (100 + 102 + 98)e18 + 1 over 3
      expect((await aggregator.aggregate()).price18).to.equal(e18(100));
    });

    it('skips inactive sources', async () => {
      aggregator.setSourceActive(FeedKind.PushAggregate, false);
      // (100*40 + 98*30) / 70
      expect((await aggregator.aggregate()).price18).to.equal(99_142_857_142_857_142_857n);
      expect(observed[0]?.map((o) => o.kind)).to.deep.equal([FeedKind.PullQuote, FeedKind.ProxyRead]);
    });

    it('serves a lone survivor as a degraded single-source price', async () => {
      push.structured = new Error('down');
      proxy.answer = { value: e18(98), timestamp: T0 - 7200 };
      const result = await aggregator.aggregate();
      expect(result).to.deep.equal({
        price18: e18(100),
        timestamp: T0,
        degraded: true,
        tier: AggregationTier.SingleSource,
        validCount: 1,
      });
      expect(aggregator.getFallbackCache()).to.equal(null);
    });

    it('falls back to the cached aggregate when every source fails', async () => {
      await aggregator.aggregate();
      clock.advance(600);
      pull.answer = new Error('down');
      push.structured = new Error('down');
      proxy.answer = new Error('down');

      expect(await aggregator.aggregate()).to.deep.equal({
        price18: e18(100),
        timestamp: T0,
        degraded: true,
        tier: AggregationTier.Fallback,
        validCount: 0,
      });
    });

    it('throws once the fallback is older than a day', async () => {
      await aggregator.aggregate();
      clock.advance(86_401);
      pull.answer = new Error('down');
      push.structured = new Error('down');
      proxy.answer = new Error('down');

      try {
        await aggregator.aggregate();
        expect.fail('aggregate should have thrown');
      } catch (error) {
        expect(error).to.be.instanceOf(InsufficientSourcesError);
      }
    });

    it('treats zero total weight as too few sources', async () => {
      aggregator.setSourceWeight(FeedKind.PullQuote, 0);
      aggregator.setSourceWeight(FeedKind.PushAggregate, 0);
      aggregator.setSourceWeight(FeedKind.ProxyRead, 0);
      try {
        await aggregator.aggregate();
        expect.fail('aggregate should have thrown');
      } catch (error) {
        expect(error).to.be.instanceOf(InsufficientSourcesError);
      }
    });

    it('accepts a single source when minValidSources is 1', async () => {
      aggregator.setMinValidSources(1);
      aggregator.setSourceActive(FeedKind.PullQuote, false);
      aggregator.setSourceActive(FeedKind.PushAggregate, false);
      const result = await aggregator.aggregate();
      expect(result.tier).to.equal(AggregationTier.Aggregated);
      expect(result.price18).to.equal(e18(98));
    });

    it('reports every queried outcome to the observer', async () => {
      push.structured = new Error('down');
      push.legacy = new Error('down');
      await aggregator.aggregate();
      const outcomes = observed[0] ?? [];
      expect(outcomes.map((o) => o.result.valid)).to.deep.equal([true, false, true]);
    });
  });
});
