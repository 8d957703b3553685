/**
 * Prometheus Metrics
 *
 * Per-run metrics for statement extraction. The CLI can dump them in the
 * text exposition format for a node_exporter textfile collector.
 */

import * as promClient from 'prom-client';
import { config } from './config';

// Create a Registry for metrics
export const register = new promClient.Registry();

const prefix = config.metricsPrefix;

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const documentsProcessedCounter = new promClient.Counter({
  name: `${prefix}_documents_processed_total`,
  help: 'Total number of statements processed',
  labelNames: ['issuer', 'status'],
  registers: [register],
});

export const fieldMissesCounter = new promClient.Counter({
  name: `${prefix}_field_misses_total`,
  help: 'Total number of fields that could not be extracted',
  labelNames: ['issuer', 'field'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: `${prefix}_extraction_duration_seconds`,
  help: 'Duration of single statement extraction',
  labelNames: ['issuer'],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
  registers: [register],
});

/**
 * Get metrics in the Prometheus text exposition format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Reset all metric values (between batch runs and in tests)
 */
export function resetMetrics(): void {
  register.resetMetrics();
}
