/**
 * Prometheus Metrics
 *
 * Metrics for batch processing, field extraction outcomes, exports and HTTP traffic.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Extraction Metrics
// ============================================================================

export const documentsProcessedCounter = new promClient.Counter({
  name: 'policy_extractor_documents_processed_total',
  help: 'Total number of documents processed',
  labelNames: ['status'],
  registers: [register],
});

export const fieldOutcomesCounter = new promClient.Counter({
  name: 'policy_extractor_field_outcomes_total',
  help: 'Field extraction outcomes (matched, missing, fault)',
  labelNames: ['field', 'outcome'],
  registers: [register],
});

export const batchDurationHistogram = new promClient.Histogram({
  name: 'policy_extractor_batch_duration_seconds',
  help: 'Duration of batch processing',
  labelNames: ['field_set'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

export const exportsCounter = new promClient.Counter({
  name: 'policy_extractor_exports_total',
  help: 'Total number of spreadsheet exports',
  labelNames: ['status'],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'policy_extractor_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'policy_extractor_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
