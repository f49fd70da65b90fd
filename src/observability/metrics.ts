import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'channelcast' });

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
// Order Metrics
// ============================================

export const ordersCreatedTotal = new Counter({
  name: 'orders_created_total',
  help: 'Orders accepted at intake',
  registers: [registry],
});

/**
 * Orders leaving pending, by terminal status
 */
export const orderTransitionsTotal = new Counter({
  name: 'order_transitions_total',
  help: 'Order status transitions by target status',
  labelNames: ['status'] as const, // matched, expired, cancelled
  registers: [registry],
});

// ============================================
// Payment Metrics
// ============================================

export const observedTransactionsTotal = new Counter({
  name: 'observed_transactions_total',
  help: 'Classified incoming transfers by outcome and reason',
  labelNames: ['outcome', 'reason'] as const,
  registers: [registry],
});

export const pollerCyclesTotal = new Counter({
  name: 'poller_cycles_total',
  help: 'Payment poller cycles by result',
  labelNames: ['status'] as const, // success, failure
  registers: [registry],
});

export const pollerCycleDuration = new Histogram({
  name: 'poller_cycle_duration_seconds',
  help: 'Payment poller cycle duration in seconds',
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [registry],
});

export const pollerConsecutiveFailures = new Gauge({
  name: 'poller_consecutive_failures',
  help: 'Consecutive failed cycles per receiving address',
  labelNames: ['address'] as const,
  registers: [registry],
});

// ============================================
// Campaign Metrics
// ============================================

export const campaignsProvisionedTotal = new Counter({
  name: 'campaigns_provisioned_total',
  help: 'Campaigns created from matched orders',
  registers: [registry],
});

export const provisioningFailuresTotal = new Counter({
  name: 'provisioning_failures_total',
  help: 'Failed provisioning attempts, retried by the sweeper',
  registers: [registry],
});

export const scheduledPostsTotal = new Counter({
  name: 'scheduled_posts_total',
  help: 'Scheduled post status updates by status',
  labelNames: ['status'] as const,
  registers: [registry],
});

// ============================================
// Queue Metrics
// ============================================

export const queueJobsTotal = new Counter({
  name: 'queue_jobs_total',
  help: 'Queue jobs by queue and status',
  labelNames: ['queue', 'status'] as const, // queue name, completed/failed
  registers: [registry],
});

export const queueJobDuration = new Histogram({
  name: 'queue_job_duration_seconds',
  help: 'Queue job processing duration in seconds',
  labelNames: ['queue'] as const,
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

export const getMetricsContentType = (): string => {
  return registry.contentType;
};
