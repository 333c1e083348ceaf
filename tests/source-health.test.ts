import { expect } from 'chai';
import { SourceOutcome } from '../app/src/aggregation/types';
import { SourceAlert, SourceHealthMonitor } from '../app/src/quality/source-health';
import { AggregationTier, FeedKind } from '../app/src/types';
import { FakeClock, e18 } from './helpers/fakes';

const ok = (kind: FeedKind): SourceOutcome => ({ kind, weight: 1, result: { valid: true, price18: e18(1) } });
const staleOutcome = (kind: FeedKind): SourceOutcome => ({
  kind,
  weight: 1,
  result: { valid: false, error: 'SourceStale', reason: 'old' },
});
const failed = (kind: FeedKind): SourceOutcome => ({
  kind,
  weight: 1,
  result: { valid: false, error: 'SourceUnavailable', reason: 'down' },
});

describe('SourceHealthMonitor', () => {
  let clock: FakeClock;
  let monitor: SourceHealthMonitor;
  let alerts: SourceAlert[];

  beforeEach(() => {
    clock = new FakeClock(500);
    monitor = new SourceHealthMonitor(clock.fn);
    alerts = [];
    monitor.on('alert', (alert: SourceAlert) => alerts.push(alert));
  });

  it('records a healthy pass without alerts', () => {
    const metrics = monitor.recordPass([ok(FeedKind.PullQuote), ok(FeedKind.ProxyRead)]);
    expect(metrics).to.deep.equal({
      timestamp: 500,
      queried: 2,
      validCount: 2,
      staleSources: [],
      failedSources: [],
    });
    expect(alerts).to.deep.equal([]);
  });

  it('raises low source, stale and failure alerts', () => {
    monitor.recordPass([ok(FeedKind.PullQuote), staleOutcome(FeedKind.ProxyRead), failed(FeedKind.PushAggregate)]);
    expect(alerts.map((a) => [a.type, a.severity])).to.deep.equal([
      ['low_sources', 'error'],
      ['stale_data', 'warning'],
      ['source_failure', 'error'],
    ]);
    expect(alerts[2]?.message).to.equal('push-aggregate unavailable');
    expect(alerts[1]?.sources).to.deep.equal([FeedKind.ProxyRead]);
  });

  it('escalates to critical when nothing is valid', () => {
    monitor.recordPass([failed(FeedKind.PullQuote)]);
    expect(alerts[0]).to.deep.equal({
      type: 'low_sources',
      severity: 'critical',
      message: 'Only 0 of 1 source(s) valid',
      sources: [],
      timestamp: 500,
    });
  });

  it('emits typed alert events', () => {
    const degraded: SourceAlert[] = [];
    monitor.on('degraded', (alert: SourceAlert) => degraded.push(alert));
    monitor.recordDegraded({
      price18: e18(1),
      timestamp: 400,
      degraded: true,
      tier: AggregationTier.Fallback,
      validCount: 0,
    });
    expect(degraded.map((a) => a.message)).to.deep.equal(['Serving fallback price from 0 valid source(s)']);
  });

  it('ignores results that are not degraded', () => {
    monitor.recordDegraded({
      price18: e18(1),
      timestamp: 400,
      degraded: false,
      tier: AggregationTier.Aggregated,
      validCount: 2,
    });
    expect(alerts).to.deep.equal([]);
  });

  it('computes per-source reliability', () => {
    monitor.recordPass([ok(FeedKind.PullQuote), ok(FeedKind.ProxyRead)]);
    monitor.recordPass([ok(FeedKind.PullQuote), failed(FeedKind.ProxyRead)]);
    monitor.recordPass([ok(FeedKind.PullQuote), staleOutcome(FeedKind.ProxyRead)]);
    monitor.recordPass([ok(FeedKind.PullQuote), ok(FeedKind.ProxyRead)]);

    expect(monitor.getSourceReliability(FeedKind.PullQuote)).to.equal(1);
    expect(monitor.getSourceReliability(FeedKind.ProxyRead)).to.equal(0.5);
  });

  it('bounds the history', () => {
    monitor.updateConfig({ metricsHistorySize: 2 });
    clock.advance(1);
    monitor.recordPass([ok(FeedKind.PullQuote)]);
    clock.advance(1);
    monitor.recordPass([ok(FeedKind.PullQuote)]);
    clock.advance(1);
    monitor.recordPass([ok(FeedKind.PullQuote)]);

    expect(monitor.getMetricsHistory().map((m) => m.timestamp)).to.deep.equal([502, 503]);
    expect(monitor.getLatestMetrics()?.timestamp).to.equal(503);
    monitor.clearMetrics();
    expect(monitor.getLatestMetrics()).to.equal(null);
  });
});
