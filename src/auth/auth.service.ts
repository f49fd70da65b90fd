import jwt from 'jsonwebtoken';

import { config } from '../config';
import { ApiError } from '../middlewares/errorHandler';

import { AuthUser, JWTPayload, USER_ROLES, UserRole } from './auth.types';

export interface AuthServiceOptions {
  secret: string;
  expiresInSeconds: number;
}

const isRole = (value: unknown): value is UserRole =>
  typeof value === 'string' && USER_ROLES.some((role) => role === value);

/**
 * Verifies bearer tokens minted by the surrounding product. There is no
 * user store here: the token's claims are the caller's identity.
 */
export class AuthService {
  constructor(private readonly options: AuthServiceOptions = config.jwt) {}

  issueToken(user: AuthUser): string {
    const payload: JWTPayload = { userId: user.userId, role: user.role };
    return jwt.sign(payload, this.options.secret, { expiresIn: this.options.expiresInSeconds });
  }

  verifyToken(token: string): AuthUser {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.options.secret);
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw ApiError.tokenExpired();
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw ApiError.invalidToken();
      }
      throw ApiError.invalidToken('Token verification failed');
    }

    if (typeof decoded === 'string' || typeof decoded.userId !== 'string' || !isRole(decoded.role)) {
      throw ApiError.invalidToken('Token is missing required claims');
    }

    return { userId: decoded.userId, role: decoded.role };
  }
}
