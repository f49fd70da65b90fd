import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  STORAGE_DRIVER,
  MONGODB_URI,
  MONGODB_CONFIG,
  REDIS_HOST,
  REDIS_PORT,
  REDIS_PASSWORD,
  JWT_CONFIG,
  PRICING_CONFIG,
  ORDER_CONFIG,
  RECONCILIATION_CONFIG,
  RECEIVING_ADDRESSES,
  POLLER_CONFIG,
  LEDGER_SOURCE_CONFIG,
  NOTIFICATION_CONFIG,
  RATE_LIMIT_CONFIG,
  API_CONFIG,
  LOG_CONFIG,
  validateProductionEnv,
} from './environments';

// Re-export environment-specific configs for direct access
export * from './environments';

// Validate production environment variables on startup
if (isProduction) {
  validateProductionEnv();
}

/**
 * Main application configuration object
 *
 * Services never read this directly; `createContainer` passes the relevant
 * slices into their constructors so tests can build them with other values.
 */
export const config = {
  // Environment
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,

  // Server
  port: API_CONFIG.port,
  api: {
    bodyLimit: API_CONFIG.bodyLimit,
  },

  // Storage
  storageDriver: STORAGE_DRIVER,
  mongodb: {
    uri: MONGODB_URI,
    ...MONGODB_CONFIG,
  },

  // Redis (BullMQ)
  redis: {
    host: REDIS_HOST,
    port: REDIS_PORT,
    password: REDIS_PASSWORD,
  },

  // JWT Authentication
  jwt: JWT_CONFIG,

  // Domain
  pricing: PRICING_CONFIG,
  order: ORDER_CONFIG,
  reconciliation: RECONCILIATION_CONFIG,
  receivingAddresses: RECEIVING_ADDRESSES,
  poller: POLLER_CONFIG,
  ledgerSource: LEDGER_SOURCE_CONFIG,
  notification: NOTIFICATION_CONFIG,

  // Rate Limiting
  rateLimit: RATE_LIMIT_CONFIG,

  // Logging
  logging: LOG_CONFIG,
};

export type AppConfig = typeof config;
