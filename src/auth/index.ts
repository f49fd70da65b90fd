export { AuthService } from './auth.service';
export { createAuthMiddleware, requireRole, getAuthUser } from './auth.middleware';
export * from './auth.types';
