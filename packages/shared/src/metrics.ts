/**
 * Prometheus Metrics
 *
 * Metrics for HTTP traffic, document extraction and model calls.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

let defaultMetricsEnabled = false;

/**
 * Default metrics (CPU, memory, etc.). Called by the server entry point only,
 * wrapped to avoid crashes on restricted environments.
 */
export function enableDefaultMetrics(): void {
  if (defaultMetricsEnabled) return;

  try {
    promClient.collectDefaultMetrics({ register });
    defaultMetricsEnabled = true;
  } catch (err) {
    logger.warn('Default Prometheus metrics collection skipped', {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

// ============================================================================
// Extraction Metrics
// ============================================================================

export const documentsProcessedCounter = new promClient.Counter({
  name: 'finsheet_documents_processed_total',
  help: 'Total number of documents run through an extraction strategy',
  labelNames: ['strategy', 'status'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'finsheet_extraction_duration_seconds',
  help: 'Duration of financial data extraction',
  labelNames: ['strategy'],
  buckets: [0.01, 0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

export const llmRequestsCounter = new promClient.Counter({
  name: 'finsheet_llm_requests_total',
  help: 'Total number of LLM requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'finsheet_llm_request_duration_seconds',
  help: 'Duration of LLM requests',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'finsheet_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'finsheet_http_requests_total',
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
