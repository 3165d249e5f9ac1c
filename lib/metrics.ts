/**
 * Prometheus metrics using `prom-client`.
 *
 * Metrics:
 * - `origin_intel_records_total{outcome}` (Counter), one per emitted result
 * - `origin_intel_record_errors_total{kind}` (Counter)
 * - `origin_intel_tls_probe_failures_total{kind}` (Counter)
 * - `origin_intel_pipeline_duration_seconds` (Histogram)
 * - `origin_intel_cache_hit_ratio` (Gauge)
 *
 * The CLI can dump `register.metrics()` to a file at the end of a run.
 */

import { Counter, Gauge, Histogram, register } from 'prom-client';

export const recordsTotal = new Counter({
  name: 'origin_intel_records_total',
  help: 'Records that produced a result, by outcome',
  labelNames: ['outcome'] as const,
});

export const recordErrorsTotal = new Counter({
  name: 'origin_intel_record_errors_total',
  help: 'Records that ended as an error result, by error kind',
  labelNames: ['kind'] as const,
});

export const tlsProbeFailuresTotal = new Counter({
  name: 'origin_intel_tls_probe_failures_total',
  help: 'TLS issuer probes that failed, by error kind',
  labelNames: ['kind'] as const,
});

export const pipelineDuration = new Histogram({
  name: 'origin_intel_pipeline_duration_seconds',
  help: 'Wall time of one record enrichment in seconds',
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30, 60, 120],
});

export const cacheHitRatio = new Gauge({
  name: 'origin_intel_cache_hit_ratio',
  help: 'Cache hit ratio (0.0 - 1.0) for name server address lookups',
});

export function incRecord(outcome: 'success' | 'error', kind?: string): void {
  recordsTotal.inc({ outcome });
  if (outcome === 'error' && kind) recordErrorsTotal.inc({ kind });
}

export function incTlsProbeFailure(kind: string): void {
  tlsProbeFailuresTotal.inc({ kind });
}

/**
 * Set cache hit ratio (0..1). Use `null` to indicate unknown/no-op.
 */
export function setCacheHitRatio(ratio: number | null): void {
  if (ratio == null || Number.isNaN(ratio)) return;
  cacheHitRatio.set(Math.max(0, Math.min(1, ratio)));
}

export function observePipelineDuration(seconds: number): void {
  if (!isFinite(seconds) || seconds < 0) return;
  pipelineDuration.observe(seconds);
}

export { register };
const metrics = { register, incRecord, incTlsProbeFailure, setCacheHitRatio, observePipelineDuration };
export default metrics;
