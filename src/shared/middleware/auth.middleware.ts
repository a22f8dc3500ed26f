/**
 * =============================================================================
 * AUTH MIDDLEWARE
 * =============================================================================
 *
 * Admin authentication and authorization middleware.
 *
 * SECURITY:
 * - Token validation on every admin request
 * - Role-based access control
 * - No trust by default
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '../../config/environment';
import { AppError, AuthenticationError, AuthorizationError, ErrorCode } from '../types/error.types';
import { logger } from '../services/logger.service';

/**
 * Claims carried by an admin access token
 */
export const tokenPayloadSchema = z.object({
  userId: z.string().min(1),
  username: z.string().min(1),
  role: z.string().min(1),
});

export type TokenPayload = z.infer<typeof tokenPayloadSchema>;

/**
 * Extended Request type with admin info
 */
declare global {
  namespace Express {
    interface Request {
      admin?: TokenPayload;
    }
  }
}

/**
 * Verify a bearer token and return its claims
 */
export function verifyAccessToken(token: string): TokenPayload {
  const decoded = jwt.verify(token, config.jwt.secret);
  const parsed = tokenPayloadSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new AuthenticationError('Invalid token', ErrorCode.INVALID_TOKEN);
  }
  return parsed.data;
}

/**
 * Auth middleware - validates JWT token
 */
export function authMiddleware(
  req: Request,
  _res: Response,
  next: NextFunction
): void {
  try {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      throw new AuthenticationError();
    }

    req.admin = verifyAccessToken(authHeader.substring(7));
    next();
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      next(new AuthenticationError('Token has expired', ErrorCode.TOKEN_EXPIRED));
    } else if (error instanceof jwt.JsonWebTokenError) {
      next(new AuthenticationError('Invalid token', ErrorCode.INVALID_TOKEN));
    } else if (error instanceof AppError) {
      next(error);
    } else {
      logger.error('Auth middleware error', { error });
      next(new AuthenticationError('Authentication failed'));
    }
  }
}

/**
 * Role guard - restricts access to specific roles
 * Must be used after authMiddleware
 */
export function roleGuard(allowedRoles: string[]) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!req.admin) {
      next(new AuthenticationError());
      return;
    }

    if (!allowedRoles.includes(req.admin.role)) {
      logger.warn('Access denied - insufficient role', {
        userId: req.admin.userId,
        role: req.admin.role,
        requiredRoles: allowedRoles,
        path: req.path
      });
      next(new AuthorizationError('Insufficient permissions'));
      return;
    }

    next();
  };
}
