// Logger exports
export { logger, createServiceLogger } from './logger';

// Log context exports
export {
  LogContext,
  asyncLocalStorage,
  getCorrelationId,
  getLogContext,
  addLogContext,
  runWithContext,
} from './log-context';

// Correlation middleware
export { correlationMiddleware } from './correlation';

// Metrics exports
export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  ordersCreatedTotal,
  orderTransitionsTotal,
  observedTransactionsTotal,
  pollerCyclesTotal,
  pollerCycleDuration,
  pollerConsecutiveFailures,
  campaignsProvisionedTotal,
  provisioningFailuresTotal,
  scheduledPostsTotal,
  queueJobsTotal,
  queueJobDuration,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Metrics middleware
export { metricsMiddleware, normalizePath } from './metrics.middleware';
