import { Request } from 'express';

export const USER_ROLES = ['user', 'publisher', 'admin'] as const;

export type UserRole = (typeof USER_ROLES)[number];

export interface JWTPayload {
  userId: string;
  role: UserRole;
  iat?: number;
  exp?: number;
}

export interface AuthUser {
  userId: string;
  role: UserRole;
}

export interface AuthRequest extends Request {
  user?: AuthUser;
}
