import { Counter, Gauge, Histogram, Registry } from 'prom-client';
import { performance } from 'node:perf_hooks';

export type SyncOperation = 'clone' | 'fetch' | 'checkout' | 'resolve' | 'reuse';
export type SyncOutcome = 'success' | 'failure';

export interface SyncMetrics {
  operation: SyncOperation;
  outcome: SyncOutcome;
  durationMs: number;
}

const registry = new Registry();

const syncCounter = new Counter({
  name: 'gitrevfs_sync_operations_total',
  help: 'Number of mirror operations by kind and outcome',
  labelNames: ['operation', 'outcome'],
  registers: [registry],
});

const syncDuration = new Histogram({
  name: 'gitrevfs_sync_duration_seconds',
  help: 'Duration of mirror operations in seconds',
  labelNames: ['operation'],
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [registry],
});

const lastSyncGauge = new Gauge({
  name: 'gitrevfs_last_sync_timestamp_seconds',
  help: 'Unix timestamp (seconds) of the last successful clone or fetch',
  registers: [registry],
});

export function recordSyncMetrics(metrics: SyncMetrics): void {
  syncCounter.inc({ operation: metrics.operation, outcome: metrics.outcome });
  syncDuration.observe({ operation: metrics.operation }, metrics.durationMs / 1000);
  if (metrics.outcome === 'success' && (metrics.operation === 'clone' || metrics.operation === 'fetch')) {
    lastSyncGauge.set(Date.now() / 1000);
  }
}

/**
 * Time `fn`, recording its outcome whether it resolves or rejects.
 */
export async function measureSync<T>(operation: SyncOperation, fn: () => Promise<T>): Promise<T> {
  const started = performance.now();
  try {
    const result = await fn();
    recordSyncMetrics({ operation, outcome: 'success', durationMs: performance.now() - started });
    return result;
  } catch (error) {
    recordSyncMetrics({ operation, outcome: 'failure', durationMs: performance.now() - started });
    throw error;
  }
}

export async function getMetricsSnapshot(): Promise<string> {
  return registry.metrics();
}
