/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, MONGODB_URI, PRICING_CONFIG } from './environments';
 *
 *   if (isProduction) { ... }
 *   const rate = PRICING_CONFIG.baseRatePerPostPerDay;
 */

import { toMicros } from '../utils/amount';

// =============================================================================
// HELPERS
// =============================================================================

const intFromEnv = (key: string, fallback: number): number => {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const floatFromEnv = (key: string, fallback: number): number => {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = parseFloat(raw);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const listFromEnv = (key: string): string[] =>
  (process.env[key] || '')
    .split(',')
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

/**
 * Convert a percentage such as "0.8" or "2" into integer basis points
 */
const basisPointsFromEnv = (key: string, fallbackPercent: number): number =>
  Math.round(floatFromEnv(key, fallbackPercent) * 100);

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

// =============================================================================
// STORAGE
// =============================================================================

export type StorageDriver = 'mongo' | 'memory';

/**
 * Storage driver. `memory` keeps every record in process and is meant for
 * local runs; production always uses MongoDB.
 */
export const STORAGE_DRIVER: StorageDriver =
  process.env.STORAGE_DRIVER === 'memory' || (isTest && process.env.STORAGE_DRIVER !== 'mongo')
    ? 'memory'
    : 'mongo';

/**
 * MongoDB URI by environment. Multi-document transactions need a replica set.
 */
export const MONGODB_URI = isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018/channelcast-test?replicaSet=rs0'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017/channelcast?replicaSet=rs0';

/**
 * MongoDB connection pool settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 50 : 10,
  minPoolSize: isProduction ? 5 : 2,
  maxIdleTimeMS: isProduction ? 60000 : 30000,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
};

// =============================================================================
// REDIS CONFIGURATION (BullMQ)
// =============================================================================

export const REDIS_HOST = process.env.REDIS_HOST || 'localhost';

export const REDIS_PORT = intFromEnv('REDIS_PORT', 6379);

/**
 * Redis password (production only)
 */
export const REDIS_PASSWORD = isProduction ? process.env.REDIS_PASSWORD || undefined : undefined;

// =============================================================================
// JWT / AUTHENTICATION CONFIGURATION
// =============================================================================

/**
 * JWT Secret - MUST be set in production. Tokens are minted by the
 * surrounding product and verified here.
 */
export const JWT_SECRET = process.env.JWT_SECRET || 'dev-secret-do-not-use-in-production';

export const JWT_CONFIG = {
  secret: JWT_SECRET,
  // Lifetime in seconds of tokens issued by this service (operators, tests)
  expiresInSeconds: intFromEnv('JWT_EXPIRES_IN_SECONDS', isProduction ? 900 : 3600),
};

// =============================================================================
// PRICING CONFIGURATION
// =============================================================================

const BASE_RATE_MICROS = toMicros(process.env.BASE_RATE_PER_POST_PER_DAY || '0.29');

/**
 * Pricing parameters. Amounts are micro-units, percentages are basis points.
 */
export const PRICING_CONFIG = {
  currency: process.env.CURRENCY || 'TON',
  baseRatePerPostPerDay: BASE_RATE_MICROS,
  minimumOrderAmount: process.env.MIN_ORDER_AMOUNT
    ? toMicros(process.env.MIN_ORDER_AMOUNT)
    : BASE_RATE_MICROS,
  maxDiscountBasisPoints: basisPointsFromEnv('MAX_DISCOUNT_PERCENT', 25),
  discountPerDayBasisPoints: basisPointsFromEnv('DISCOUNT_PER_DAY_PERCENT', 0.8),
  maxPostsPerDay: intFromEnv('MAX_POSTS_PER_DAY', 12),
  minDurationDays: 1,
  maxDurationDays: 365,
};

// =============================================================================
// ORDER / RECONCILIATION CONFIGURATION
// =============================================================================

export const ORDER_CONFIG = {
  ttlSeconds: intFromEnv('ORDER_TTL_SECONDS', 1200),
  referenceRetries: intFromEnv('ORDER_REFERENCE_RETRIES', 10),
  maxChannelsPerOrder: intFromEnv('ORDER_MAX_CHANNELS', 50),
};

export const RECONCILIATION_CONFIG = {
  toleranceBasisPoints: basisPointsFromEnv('AMOUNT_TOLERANCE_PERCENT', 2),
  sweepIntervalMs: intFromEnv('SWEEP_INTERVAL_SECONDS', 60) * 1000,
  sweepBatchLimit: intFromEnv('SWEEP_BATCH_LIMIT', 200),
};

// =============================================================================
// PAYMENT POLLER / LEDGER SOURCE
// =============================================================================

/**
 * Addresses the service receives payments on. One poller runs per address;
 * new orders quote the first one.
 */
export const RECEIVING_ADDRESSES = listFromEnv('RECEIVING_ADDRESSES');

export const POLLER_CONFIG = {
  intervalMs: intFromEnv('POLL_INTERVAL_SECONDS', 30) * 1000,
  lookbackSeconds: intFromEnv('POLL_LOOKBACK_SECONDS', 300),
  initialLookbackSeconds: intFromEnv('POLL_INITIAL_LOOKBACK_SECONDS', 3600),
  maxBackoffMs: intFromEnv('POLL_MAX_BACKOFF_SECONDS', 600) * 1000,
  batchLimit: intFromEnv('POLL_BATCH_LIMIT', 100),
};

export const LEDGER_SOURCE_CONFIG = {
  baseUrl: process.env.LEDGER_API_URL || 'https://toncenter.com/api/v2',
  apiKey: process.env.LEDGER_API_KEY || undefined,
  timeoutMs: intFromEnv('LEDGER_REQUEST_TIMEOUT_MS', 10000),
  pageSize: intFromEnv('LEDGER_PAGE_SIZE', 50),
  maxPages: intFromEnv('LEDGER_MAX_PAGES', 5),
};

// =============================================================================
// NOTIFICATIONS
// =============================================================================

export const NOTIFICATION_CONFIG = {
  webhookUrl: process.env.NOTIFICATION_WEBHOOK_URL || undefined,
  // When set, deliveries carry an HMAC-SHA256 signature of the body
  signingSecret: process.env.NOTIFICATION_WEBHOOK_SECRET || undefined,
  timeoutMs: intFromEnv('NOTIFICATION_TIMEOUT_MS', isProduction ? 10000 : 5000),
};

// =============================================================================
// RATE LIMITING CONFIGURATION
// =============================================================================

export const RATE_LIMIT_CONFIG = {
  disabled: process.env.RATE_LIMIT_DISABLED === 'true',

  // Global (per IP)
  global: {
    windowMs: intFromEnv('RATE_LIMIT_WINDOW_MS', 900000), // 15 minutes
    maxRequests: isTest ? 10000 : intFromEnv('RATE_LIMIT_MAX_REQUESTS', isProduction ? 300 : 1000),
  },

  // Order intake (per user)
  orders: {
    windowMs: intFromEnv('ORDER_RATE_LIMIT_WINDOW_MS', 60000), // 1 minute
    maxRequests: isTest ? 10000 : intFromEnv('ORDER_RATE_LIMIT_MAX', isProduction ? 10 : 100),
  },
};

// =============================================================================
// API / LOGGING
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: intFromEnv('PORT', 3000),
};

export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: isDevelopment,
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = ['JWT_SECRET', 'MONGODB_URI', 'RECEIVING_ADDRESSES', 'REDIS_HOST'];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }

  if (process.env.JWT_SECRET && process.env.JWT_SECRET.length < 32) {
    throw new Error('JWT_SECRET must be at least 32 characters in production');
  }

  if (STORAGE_DRIVER === 'memory') {
    throw new Error('STORAGE_DRIVER=memory is not allowed in production');
  }
};

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  storageDriver: STORAGE_DRIVER,
  mongoHost: MONGODB_URI.split('@').pop()?.split('/')[0] || 'localhost', // Don't leak credentials
  redisHost: REDIS_HOST,
  receivingAddresses: RECEIVING_ADDRESSES.length,
});
