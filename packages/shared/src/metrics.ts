/**
 * Prometheus Metrics
 *
 * Metrics for roster scans and the query API.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Roster Scan Metrics
// ============================================================================

export const linesClassifiedCounter = new promClient.Counter({
  name: 'roster_lines_classified_total',
  help: 'Roster lines by classification',
  labelNames: ['kind'],
  registers: [register],
});

export const recordsExtractedCounter = new promClient.Counter({
  name: 'roster_records_total',
  help: 'Assignment records extracted, by member-line rule',
  labelNames: ['rule'],
  registers: [register],
});

export const scansCounter = new promClient.Counter({
  name: 'roster_scans_total',
  help: 'Completed roster scans by status',
  labelNames: ['status'],
  registers: [register],
});

export const scanDurationHistogram = new promClient.Histogram({
  name: 'roster_scan_duration_seconds',
  help: 'Duration of a roster scan',
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'roster_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'roster_http_requests_total',
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
