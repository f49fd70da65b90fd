import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';

import { runWithContext } from './log-context';
import { logger } from './logger';

/**
 * Runs each request inside its own log context. The correlation ID is taken
 * from x-correlation-id or x-request-id when the caller sends one, and is
 * echoed back in x-correlation-id.
 */
export const correlationMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const correlationId = req.get('x-correlation-id') || req.get('x-request-id') || uuid();
  res.setHeader('x-correlation-id', correlationId);

  runWithContext({ correlationId }, () => {
    const startedAt = Date.now();
    logger.debug({ method: req.method, path: req.path, userAgent: req.get('user-agent') }, 'Request started');

    res.on('finish', () => {
      logger.info(
        {
          method: req.method,
          path: req.originalUrl.split('?')[0],
          statusCode: res.statusCode,
          durationMs: Date.now() - startedAt,
        },
        'Request completed'
      );
    });

    next();
  });
};
