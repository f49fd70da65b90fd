/**
 * Rate Limiting Middleware
 *
 * In-process limits per instance. Test runs get lenient limits; set
 * RATE_LIMIT_DISABLED=true to turn limiting off entirely.
 */

import { NextFunction, Request, Response } from 'express';
import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';

import { RATE_LIMIT_CONFIG } from '../config/environments';
import { logger } from '../observability';
import { ErrorCode } from '../types/errors';
import { AuthRequest } from '../auth/auth.types';

type Limiter = (req: Request, res: Response, next: NextFunction) => void;

const noopLimiter: Limiter = (_req, _res, next) => next();

const createLimiter = (limiter: RateLimitRequestHandler): Limiter => {
  if (RATE_LIMIT_CONFIG.disabled) {
    logger.warn('Rate limiting is DISABLED via RATE_LIMIT_DISABLED=true');
    return noopLimiter;
  }
  return limiter;
};

/**
 * Global rate limiter
 * Configurable via RATE_LIMIT_WINDOW_MS and RATE_LIMIT_MAX_REQUESTS
 */
export const globalLimiter: Limiter = createLimiter(
  rateLimit({
    windowMs: RATE_LIMIT_CONFIG.global.windowMs,
    max: RATE_LIMIT_CONFIG.global.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      success: false,
      error: {
        code: ErrorCode.RATE_LIMIT_EXCEEDED,
        message: 'Too many requests, please try again later',
      },
    },
    skip: (req) => req.path.startsWith('/health') || req.path === '/metrics',
  })
);

/**
 * Order intake limiter, keyed by user
 * Configurable via ORDER_RATE_LIMIT_WINDOW_MS and ORDER_RATE_LIMIT_MAX
 */
export const orderLimiter: Limiter = createLimiter(
  rateLimit({
    windowMs: RATE_LIMIT_CONFIG.orders.windowMs,
    max: RATE_LIMIT_CONFIG.orders.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      success: false,
      error: {
        code: ErrorCode.TOO_MANY_ORDERS,
        message: 'Too many orders, please try again later',
      },
    },
    keyGenerator: (req: AuthRequest) => req.user?.userId || req.ip || 'unknown',
    validate: false,
  })
);
