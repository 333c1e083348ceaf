/**
 * Source Health Monitor - tracks feed outcomes per aggregation pass and emits alerts
 */

import { EventEmitter } from 'events';
import { AggregatedResult, FeedKind } from '../types';
import { SourceOutcome } from '../aggregation/types';

export interface SourceMetrics {
  timestamp: number;
  queried: number;
  validCount: number;
  staleSources: FeedKind[];
  failedSources: FeedKind[];
}

export type SourceAlertType = 'low_sources' | 'stale_data' | 'source_failure' | 'degraded';

export interface SourceAlert {
  type: SourceAlertType;
  severity: 'warning' | 'error' | 'critical';
  message: string;
  sources: FeedKind[];
  timestamp: number;
}

export interface SourceHealthConfig {
  minSources: number;           // Valid quotes below this raise low_sources
  metricsHistorySize: number;   // How many passes to keep
}

export class SourceHealthMonitor extends EventEmitter {
  private history: SourceMetrics[] = [];
  private config: SourceHealthConfig;

  constructor(private readonly clock: () => number, config?: Partial<SourceHealthConfig>) {
    super();
    this.config = {
      minSources: 2,
      metricsHistorySize: 500,
      ...config,
    };
  }

  /**
   * Record the outcomes of one aggregation pass
   */
  recordPass(outcomes: SourceOutcome[]): SourceMetrics {
    const metrics: SourceMetrics = {
      timestamp: this.clock(),
      queried: outcomes.length,
      validCount: outcomes.filter((o) => o.result.valid).length,
      staleSources: [],
      failedSources: [],
    };

    for (const { kind, result } of outcomes) {
      if (result.valid) continue;
      if (result.error === 'SourceStale') {
        metrics.staleSources.push(kind);
      } else {
        metrics.failedSources.push(kind);
      }
    }

    this.history.push(metrics);
    if (this.history.length > this.config.metricsHistorySize) {
      this.history.shift();
    }

    this.checkAlerts(metrics);
    this.emit('metrics', metrics);
    return metrics;
  }

  /**
   * Flag a served price that came from a lower ladder rung
   */
  recordDegraded(result: AggregatedResult): void {
    if (!result.degraded) return;
    this.emitAlert({
      type: 'degraded',
      severity: 'warning',
      message: `Serving ${result.tier} price from ${result.validCount} valid source(s)`,
      sources: [],
      timestamp: this.clock(),
    });
  }

  private checkAlerts(metrics: SourceMetrics): void {
    if (metrics.validCount < this.config.minSources) {
      this.emitAlert({
        type: 'low_sources',
        severity: metrics.validCount === 0 ? 'critical' : 'error',
        message: `Only ${metrics.validCount} of ${metrics.queried} source(s) valid`,
        sources: [],
        timestamp: metrics.timestamp,
      });
    }

    if (metrics.staleSources.length > 0) {
      this.emitAlert({
        type: 'stale_data',
        severity: 'warning',
        message: `${metrics.staleSources.length} source(s) have stale data`,
        sources: [...metrics.staleSources],
        timestamp: metrics.timestamp,
      });
    }

    if (metrics.failedSources.length > 0) {
      this.emitAlert({
        type: 'source_failure',
        severity: 'error',
        message: `${metrics.failedSources.join(', ')} unavailable`,
        sources: [...metrics.failedSources],
        timestamp: metrics.timestamp,
      });
    }
  }

  private emitAlert(alert: SourceAlert): void {
    this.emit('alert', alert);
    this.emit(alert.type, alert);
  }

  getMetricsHistory(limit?: number): SourceMetrics[] {
    return limit ? this.history.slice(-limit) : [...this.history];
  }

  getLatestMetrics(): SourceMetrics | null {
    return this.history[this.history.length - 1] ?? null;
  }

  /**
   * Share of recent passes (last 100) in which the source answered validly
   */
  getSourceReliability(kind: FeedKind): number {
    const recent = this.history.slice(-100).filter((m) => m.queried > 0);
    if (recent.length === 0) {
      return 1.0;
    }
    const failures = recent.filter(
      (m) => m.failedSources.includes(kind) || m.staleSources.includes(kind)
    ).length;
    return 1 - failures / recent.length;
  }

  updateConfig(config: Partial<SourceHealthConfig>): void {
    this.config = { ...this.config, ...config };
  }

  getConfig(): SourceHealthConfig {
    return { ...this.config };
  }

  clearMetrics(): void {
    this.history = [];
  }
}
