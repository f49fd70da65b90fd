import { Router, Request, Response } from 'express';

import { getDatabaseStatus } from '../config/database';
import { StorageDriver } from '../config/environments';
import { asyncHandler } from '../middlewares/errorHandler';
import { PaymentPoller } from '../services/payment';

export interface NotificationHealth {
  workerRunning: boolean;
  queue: {
    waiting: number;
    active: number;
    completed: number;
    failed: number;
    delayed: number;
  };
}

export interface HealthDeps {
  storageDriver: StorageDriver;
  pollers: PaymentPoller[];
  /** Queue and worker state; absent when confirmations are only logged */
  notifications?: () => Promise<NotificationHealth>;
}

export const createHealthRoutes = ({ storageDriver, pollers, notifications }: HealthDeps): Router => {
  const router = Router();

  const databaseStatus = () =>
    storageDriver === 'mongo'
      ? { driver: storageDriver, ...getDatabaseStatus() }
      : { driver: storageDriver, connected: true, readyState: 1 };

  const notificationStatus = async (): Promise<NotificationHealth | { error: string } | null> => {
    if (!notifications) {
      return null;
    }
    try {
      return await notifications();
    } catch (error) {
      return { error: error instanceof Error ? error.message : String(error) };
    }
  };

  router.get(
    '/',
    asyncHandler(async (_req: Request, res: Response) => {
      const database = databaseStatus();
      const pollerStatuses = pollers.map((poller) => poller.getStatus());
      const notificationState = await notificationStatus();
      // A failing poller or queue degrades the service but does not take it out of rotation
      const degraded =
        pollerStatuses.some((status) => status.consecutiveFailures > 0) ||
        (notificationState !== null && 'error' in notificationState);

      res.status(database.connected ? 200 : 503).json({
        status: !database.connected ? 'unhealthy' : degraded ? 'degraded' : 'healthy',
        timestamp: new Date().toISOString(),
        services: {
          database,
          pollers: pollerStatuses,
          ...(notificationState ? { notifications: notificationState } : {}),
        },
      });
    })
  );

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/ready', (_req: Request, res: Response) => {
    const isReady = databaseStatus().connected;

    res.status(isReady ? 200 : 503).json({
      status: isReady ? 'ready' : 'not ready',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
