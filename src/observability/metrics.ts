import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'cid-ledger' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ============================================
// Ledger Metrics
// ============================================

/**
 * Ledger entries by type and final status
 */
export const ledgerEntriesTotal = new Counter({
  name: 'ledger_entries_total',
  help: 'Ledger entries written, by type and status',
  labelNames: ['type', 'status'] as const,
  registers: [registry],
});

/**
 * Rejected money movements by operation and error code
 */
export const ledgerRejectionsTotal = new Counter({
  name: 'ledger_rejections_total',
  help: 'Money movements rejected before any balance effect',
  labelNames: ['operation', 'code'] as const,
  registers: [registry],
});

export const cidRequestsTotal = new Counter({
  name: 'cid_requests_total',
  help: 'CID requests by terminal status',
  labelNames: ['status'] as const,
  registers: [registry],
});

/**
 * Confirmation ids obtained whose ledger debit did not commit
 */
export const reconciliationRequiredTotal = new Counter({
  name: 'cid_reconciliation_required_total',
  help: 'Confirmation ids awaiting manual reconciliation',
  registers: [registry],
});

// ============================================
// External Collaborator Metrics
// ============================================

export const externalCallDuration = new Histogram({
  name: 'external_call_duration_seconds',
  help: 'Duration of calls to external collaborators',
  labelNames: ['service', 'outcome'] as const,
  buckets: [0.1, 0.5, 1, 2.5, 5, 10, 30, 60, 120],
  registers: [registry],
});

// ============================================
// Queue Metrics
// ============================================

export const queueJobsTotal = new Counter({
  name: 'queue_jobs_total',
  help: 'Total queue jobs processed',
  labelNames: ['queue', 'status'] as const,
  registers: [registry],
});

/**
 * Reset all metrics (useful for testing)
 */
export const resetMetrics = (): void => {
  registry.resetMetrics();
};

export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

export const getMetricsContentType = (): string => {
  return registry.contentType;
};
