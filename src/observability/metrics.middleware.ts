import { Request, Response, NextFunction } from 'express';
import { httpRequestsTotal, httpRequestDuration } from './metrics';

/**
 * Replaces identifiers in a path with placeholders to keep label
 * cardinality bounded
 */
export const normalizePath = (path: string): string =>
  path
    .replace(/\b(ord|pst|aud)_[0-9a-f]+/gi, ':id')
    .replace(/CAM-\d{4}-\d{2}-[A-Z0-9]{4}/g, ':id')
    .replace(/\/\d+/g, '/:id');

/**
 * Matched route pattern, or the normalized path when no route matched
 */
const getRoutePath = (req: Request): string => {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') {
    return (req.baseUrl || '') + routePath;
  }
  return normalizePath(req.path);
};

/**
 * HTTP metrics middleware
 * Records request count and duration for Prometheus
 */
export const metricsMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  if (req.path === '/metrics') {
    next();
    return;
  }

  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationSeconds = Number(process.hrtime.bigint() - start) / 1e9;

    const labels = {
      method: req.method,
      path: getRoutePath(req),
      status: res.statusCode.toString(),
    };

    httpRequestsTotal.inc(labels);
    httpRequestDuration.observe(labels, durationSeconds);
  });

  next();
};
