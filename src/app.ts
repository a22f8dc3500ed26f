/**
 * =============================================================================
 * EXPRESS APPLICATION
 * =============================================================================
 *
 * Builds the app without listening, so tests can mount it on an ephemeral port.
 *
 * MODULES:
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ COUNTRY    │ Country search and lookup by ISO code                     │
 * │ CITY       │ City search, tied to stored countries                     │
 * │ WEATHER    │ Current weather (stored as snapshots) and history         │
 * │ CURRENCY   │ Latest exchange rates                                     │
 * │ LOCATION   │ Country + weather + rates in one response                 │
 * │ NEWS       │ Country headlines, stored under the country               │
 * │ ADMIN      │ Superuser login, stats, maintenance of stored lookups     │
 * └─────────────────────────────────────────────────────────────────────────┘
 * =============================================================================
 */

import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';

import { config } from './config/environment';

// Middleware
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import {
  requestIdMiddleware,
  securityHeaders,
  preventParamPollution,
  blockSuspiciousRequests
} from './shared/middleware/security.middleware';

// Routes
import { healthRoutes } from './shared/routes/health.routes';
import { countryRouter } from './modules/country/country.routes';
import { cityRouter } from './modules/city/city.routes';
import { weatherRouter } from './modules/weather/weather.routes';
import { currencyRouter } from './modules/currency/currency.routes';
import { locationRouter } from './modules/location/location.routes';
import { newsRouter } from './modules/news/news.routes';
import { adminRouter } from './modules/admin/admin.routes';

export const API_PREFIX = '/api/v1';

export function createApp(): Express {
  const app = express();

  // Correct req.ip behind one reverse proxy
  app.set('trust proxy', 1);

  // ===========================================================================
  // MIDDLEWARE - Security & Performance
  // ===========================================================================

  // Request ID for tracking (must be first)
  app.use(requestIdMiddleware);

  app.use(compression({
    level: 6,
    threshold: 1024, // Only compress responses > 1KB
    filter: (req, res) => {
      if (req.headers['x-no-compression']) return false;
      return compression.filter(req, res);
    }
  }));

  // Security headers (Helmet)
  app.use(securityHeaders);

  app.use(cors({
    origin: config.cors.origin,
    methods: ['GET', 'POST', 'DELETE'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
    maxAge: 86400 // 24 hours preflight cache
  }));

  // Parse JSON bodies with size limit
  app.use(express.json({ limit: '100kb' }));

  // Block suspicious requests (path traversal, script and SQL injection)
  app.use(blockSuspiciousRequests);

  app.use(preventParamPollution);

  if (config.security.enableRequestLogging) {
    app.use(requestLogger);
  }

  // ===========================================================================
  // ROUTES
  // ===========================================================================

  // Health & monitoring (no auth)
  app.use('/', healthRoutes);

  app.use(`${API_PREFIX}/countries`, countryRouter);
  app.use(`${API_PREFIX}/cities`, cityRouter);
  app.use(`${API_PREFIX}/weather`, weatherRouter);
  app.use(`${API_PREFIX}/currency`, currencyRouter);
  app.use(`${API_PREFIX}/location`, locationRouter);
  app.use(`${API_PREFIX}/news`, newsRouter);
  app.use(`${API_PREFIX}/admin`, adminRouter);

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
