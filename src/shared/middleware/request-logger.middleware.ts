/**
 * =============================================================================
 * REQUEST LOGGER MIDDLEWARE
 * =============================================================================
 *
 * One log line per lookup, written once the response is sent. The line names
 * the resource (countries, weather, ...) and the normalized lookup key
 * (alpha2code, city, search, base), so repeated lookups of the same place can
 * be grepped together.
 *
 * SECURITY:
 * - Does not log request bodies (login carries a password)
 * - Does not log authorization headers
 * - Masks provider key names and credentials passed as query parameters
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';

const MASKED_PARAMS = ['apikey', 'api_key', 'appid', 'access_key', 'token', 'secret', 'password'];

// Lookup parameters, with the normalization the validators apply
const LOOKUP_PARAMS: Record<string, (value: string) => string> = {
  alpha2code: value => value.trim().toUpperCase(),
  base: value => value.trim().toUpperCase(),
  city: value => value.trim(),
  search: value => value.trim(),
  page: value => value.trim(),
  limit: value => value.trim(),
};

const API_PATH = /^\/api\/v\d+\/([^/]+)(?:\/(.+))?$/;

export interface LookupDescription {
  resource: string;
  /** Path segment after the resource (`DE` in /countries/DE) */
  target?: string;
  key: Record<string, string>;
  /** Any other query parameters, masked */
  extra?: Record<string, unknown>;
}

/**
 * Mask query parameters that carry credentials
 */
export function maskQueryParams(query: Record<string, unknown>): Record<string, unknown> {
  const masked: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(query)) {
    const isSensitive = MASKED_PARAMS.some(param => key.toLowerCase().includes(param));
    masked[key] = isSensitive ? '[MASKED]' : value;
  }

  return masked;
}

/**
 * Resource and lookup key of an API request, null for anything outside the API
 */
export function describeLookup(path: string, query: Record<string, unknown>): LookupDescription | null {
  const match = API_PATH.exec(path);
  if (!match) return null;

  const key: Record<string, string> = {};
  const rest: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(query)) {
    const normalize = LOOKUP_PARAMS[name];
    if (normalize && typeof value === 'string') {
      key[name] = normalize(value);
    } else {
      rest[name] = value;
    }
  }

  const description: LookupDescription = { resource: match[1], key };
  if (match[2]) description.target = match[2];
  if (Object.keys(rest).length > 0) description.extra = maskQueryParams(rest);
  return description;
}

/**
 * Request logger middleware
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();

  res.on('finish', () => {
    const lookup = describeLookup(req.path, req.query);
    const logData = {
      requestId: req.get('x-request-id'),
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration: `${Date.now() - startTime}ms`,
      ...(lookup && { lookup }),
    };

    if (!lookup) {
      // Health checks and other non-API traffic
      logger.debug('Request completed', logData);
    } else if (res.statusCode >= 500) {
      logger.error('Lookup failed', { ...logData, ip: req.ip });
    } else if (res.statusCode >= 400) {
      logger.warn('Lookup rejected', logData);
    } else {
      logger.info('Lookup served', logData);
    }
  });

  next();
}
