/**
 * =============================================================================
 * SECURITY MIDDLEWARE
 * =============================================================================
 *
 * - Request ID tracking
 * - Helmet security headers
 * - Suspicious request blocking (path traversal, script and SQL injection)
 * - Parameter pollution guard
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../services/logger.service';
import { errorResponse } from '../types/api.types';
import { ErrorCode } from '../types/error.types';

const SUSPICIOUS_PATTERNS = [
  /\.\.\//,           // Path traversal
  /<script/i,         // XSS attempt
  /union.*select/i,   // SQL injection
  /exec\s*\(/i,       // Command injection
  /\$\{.*\}/,         // Template injection
];

/**
 * Generate and attach request ID for tracking
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const requestId = req.get('x-request-id')?.trim() || uuidv4();

  req.headers['x-request-id'] = requestId;
  res.setHeader('X-Request-ID', requestId);

  next();
}

/**
 * Security headers using Helmet
 * JSON API only: nothing is ever rendered, so the CSP denies everything
 */
export const securityHeaders = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginResourcePolicy: { policy: 'cross-origin' },
  frameguard: { action: 'deny' },
  hidePoweredBy: true,
  hsts: {
    maxAge: 31536000, // 1 year
    includeSubDomains: true,
  },
  noSniff: true,
  referrerPolicy: { policy: 'no-referrer' },
});

/**
 * Prevent parameter pollution
 * `?search=a&search=b` keeps the first value only
 */
export function preventParamPollution(
  req: Request,
  _res: Response,
  next: NextFunction
): void {
  for (const [key, value] of Object.entries(req.query)) {
    if (Array.isArray(value)) {
      req.query[key] = value[0];
    }
  }
  next();
}

/**
 * Block suspicious requests
 * Only the URL is checked (the decoded query included), never the body
 */
export function blockSuspiciousRequests(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const requestString = `${req.url} ${JSON.stringify(req.query)}`;

  for (const pattern of SUSPICIOUS_PATTERNS) {
    if (pattern.test(requestString)) {
      logger.warn('Blocked suspicious request', {
        ip: req.ip,
        path: req.path,
        pattern: pattern.toString(),
      });

      res.status(400).json(errorResponse(ErrorCode.BAD_REQUEST, 'Invalid request'));
      return;
    }
  }

  next();
}
