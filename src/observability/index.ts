// Logger exports
export { logger, createServiceLogger } from './logger';

// Log context exports
export {
  LogContext,
  getCorrelationId,
  getLogContext,
  addLogContext,
  withLogContext,
} from './log-context';

// Correlation middleware
export { correlationMiddleware } from './correlation';

// Metrics exports
export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  ledgerEntriesTotal,
  ledgerRejectionsTotal,
  cidRequestsTotal,
  reconciliationRequiredTotal,
  externalCallDuration,
  queueJobsTotal,
  resetMetrics,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Metrics middleware
export { metricsMiddleware } from './metrics.middleware';
