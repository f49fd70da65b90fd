import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { createAuthMiddleware } from './auth';
import { Container } from './container';
import { asyncHandler, errorHandler, globalLimiter, notFoundHandler } from './middlewares';
import {
  correlationMiddleware,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
} from './observability';
import { getNotificationQueueStats, isNotificationWorkerRunning } from './queues';
import { createHealthRoutes, NotificationHealth } from './routes/health';
import { createAdminRoutes } from './services/admin';
import { createCampaignRoutes } from './services/campaign';
import { createOrderRoutes } from './services/order';

const notificationHealth = async (): Promise<NotificationHealth> => ({
  workerRunning: isNotificationWorkerRunning(),
  queue: await getNotificationQueueStats(),
});

export const createApp = (container: Container): Application => {
  const app = express();
  const authenticate = createAuthMiddleware(container.auth);
  const usesQueue = container.config.storageDriver === 'mongo';

  // Security middleware
  app.use(helmet());
  app.use(cors());

  // Request parsing
  app.use(express.json({ limit: container.config.api.bodyLimit }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);

  app.use(globalLimiter);

  // Routes
  app.use(
    '/health',
    createHealthRoutes({
      storageDriver: container.config.storageDriver,
      pollers: container.pollers,
      notifications: usesQueue ? notificationHealth : undefined,
    })
  );
  app.use('/orders', createOrderRoutes(container.controllers.orders, authenticate));
  app.use('/campaigns', createCampaignRoutes(container.controllers.campaigns, authenticate));
  app.use('/admin', createAdminRoutes(container.controllers.admin, authenticate));

  // Metrics endpoint (Prometheus format)
  app.get(
    '/metrics',
    asyncHandler(async (_req, res) => {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    })
  );

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: 'Channelcast API',
      version: '1.0.0',
      description: 'Paid distribution campaigns settled by on-chain payment',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
