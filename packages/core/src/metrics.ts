/**
 * Prometheus Metrics
 *
 * Counters for routing outcomes and extraction gaps. The CLI prints the text
 * exposition with --metrics; there is no scrape endpoint.
 */

import * as promClient from 'prom-client';

export const register = new promClient.Registry();

// ============================================================================
// Routing Metrics
// ============================================================================

export const claimsProcessedCounter = new promClient.Counter({
  name: 'claim_triage_claims_processed_total',
  help: 'Total number of claims routed, by recommended route',
  labelNames: ['route'],
  registers: [register],
});

export const fraudKeywordHitsCounter = new promClient.Counter({
  name: 'claim_triage_fraud_keyword_hits_total',
  help: 'Fraud keyword matches found in free-text fields',
  labelNames: ['keyword'],
  registers: [register],
});

// ============================================================================
// Extraction Metrics
// ============================================================================

export const missingFieldsCounter = new promClient.Counter({
  name: 'claim_triage_missing_fields_total',
  help: 'Mandatory fields absent from processed claims',
  labelNames: ['field'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'claim_triage_extraction_duration_seconds',
  help: 'Duration of field extraction and routing for one claim',
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
  registers: [register],
});

/**
 * Prometheus text exposition of every claim metric
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function resetMetrics(): void {
  register.resetMetrics();
}
