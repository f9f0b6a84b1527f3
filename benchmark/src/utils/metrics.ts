/**
 * @cohort/benchmark - Metrics Utilities
 *
 * Statistical functions for computing benchmark metrics.
 */

import type { LatencyMetrics } from '../types.js';

/**
 * Compute latency metrics from samples
 */
export function computeLatencyMetrics(samples: readonly number[]): LatencyMetrics {
  if (samples.length === 0) {
    return {
      min: 0,
      max: 0,
      mean: 0,
      p50: 0,
      p95: 0,
      p99: 0,
      stdDev: 0,
    };
  }

  const sorted = [...samples].sort((a, b) => a - b);
  const n = sorted.length;

  const min = sorted[0];
  const max = sorted[n - 1];
  const mean = samples.reduce((a, b) => a + b, 0) / n;

  // Percentiles
  const p50 = percentile(sorted, 50);
  const p95 = percentile(sorted, 95);
  const p99 = percentile(sorted, 99);

  // Population standard deviation
  const variance = samples.reduce((acc, val) => acc + Math.pow(val - mean, 2), 0) / n;
  const stdDev = Math.sqrt(variance);

  return { min, max, mean, p50, p95, p99, stdDev };
}

/**
 * Compute percentile from sorted array, interpolating between neighbours
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return 0;
  if (sorted.length === 1) return sorted[0];

  const index = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  const weight = index - lower;

  if (upper >= sorted.length) return sorted[sorted.length - 1];

  return sorted[lower] * (1 - weight) + sorted[upper] * weight;
}

/**
 * Format duration to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1) return `${(ms * 1000).toFixed(2)}us`;
  if (ms < 1000) return `${ms.toFixed(2)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(2)}s`;
  return `${(ms / 60000).toFixed(2)}min`;
}

/**
 * Format number with SI prefix
 */
export function formatNumber(n: number): string {
  const prefixes = ['', 'K', 'M', 'G', 'T'];
  let prefixIndex = 0;
  let value = n;

  while (value >= 1000 && prefixIndex < prefixes.length - 1) {
    value /= 1000;
    prefixIndex++;
  }

  return `${value.toFixed(prefixIndex > 0 ? 2 : 0)}${prefixes[prefixIndex]}`;
}
