import { createApp } from './app';
import { config } from './config';
import { getEnvironmentInfo } from './config/environments';
import { connectDatabase, disconnectDatabase } from './config/database';
import { createContainer } from './container';
import { logger } from './observability';
import { closeNotificationQueue, startNotificationWorker, stopNotificationWorker } from './queues';

const SHUTDOWN_TIMEOUT_MS = 10000;

const startServer = async (): Promise<void> => {
  try {
    const usesMongo = config.storageDriver === 'mongo';

    if (usesMongo) {
      await connectDatabase();
      startNotificationWorker();
    } else {
      logger.warn('Using the in-memory store; state is lost on restart');
    }

    if (config.receivingAddresses.length === 0) {
      throw new Error('RECEIVING_ADDRESSES must list at least one address');
    }

    const container = createContainer({ config });
    const app = createApp(container);

    container.pollers.forEach((poller) => poller.start());
    container.sweeper.start();

    const server = app.listen(config.port, () => {
      logger.info(
        { port: config.port, ...getEnvironmentInfo() },
        'Server started'
      );
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Starting graceful shutdown');

      server.close(() => {
        logger.info('HTTP server closed');

        Promise.all([...container.pollers.map((poller) => poller.stop()), container.sweeper.stop()])
          .then(async () => {
            if (usesMongo) {
              await stopNotificationWorker();
              await closeNotificationQueue();
              await disconnectDatabase();
            }
            logger.info('Graceful shutdown completed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error({ err: error }, 'Error during shutdown');
            process.exit(1);
          });
      });

      // Force exit after the timeout
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, SHUTDOWN_TIMEOUT_MS).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

void startServer();
