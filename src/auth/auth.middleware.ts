import { Response, NextFunction } from 'express';

import { ApiError } from '../middlewares/errorHandler';
import { addLogContext } from '../observability/log-context';

import { AuthService } from './auth.service';
import { AuthRequest, AuthUser, UserRole } from './auth.types';

export const createAuthMiddleware =
  (authService: AuthService) =>
  (req: AuthRequest, _res: Response, next: NextFunction): void => {
    try {
      const authHeader = req.headers.authorization;

      if (!authHeader) {
        throw ApiError.unauthorized('No authorization header provided');
      }

      if (!authHeader.startsWith('Bearer ')) {
        throw ApiError.unauthorized('Invalid authorization format. Use: Bearer <token>');
      }

      const token = authHeader.substring(7);

      if (!token) {
        throw ApiError.unauthorized('No token provided');
      }

      req.user = authService.verifyToken(token);
      addLogContext({ userId: req.user.userId });
      next();
    } catch (error) {
      next(error);
    }
  };

/**
 * Must run after the auth middleware. Admins pass every role check.
 */
export const requireRole =
  (...roles: UserRole[]) =>
  (req: AuthRequest, _res: Response, next: NextFunction): void => {
    const user = req.user;
    if (!user) {
      next(ApiError.unauthorized());
      return;
    }
    if (user.role !== 'admin' && !roles.includes(user.role)) {
      next(ApiError.forbidden(`Requires role: ${roles.join(' or ')}`));
      return;
    }
    next();
  };

/**
 * The authenticated caller, for handlers mounted behind the auth middleware
 */
export const getAuthUser = (req: AuthRequest): AuthUser => {
  const { user } = req;
  if (!user) {
    throw ApiError.unauthorized();
  }
  return user;
};
