/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * SECURITY:
 * - No secrets are logged or exposed in error messages
 * - Production requires a proper JWT secret (validated at startup)
 * - Development uses an auto-generated secret if not provided
 *
 * FOR BACKEND DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Use getRequired() for mandatory production values
 * - Use getOptional() for values with sensible defaults
 * =============================================================================
 */

import dotenv from 'dotenv';
import { randomBytes } from 'crypto';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get required environment variable (throws if missing in production)
 */
function getRequired(key: string, devDefault?: string): string {
  const value = process.env[key];

  if (value && value.trim() !== '') {
    return value;
  }

  if (process.env.NODE_ENV !== 'production') {
    if (devDefault) {
      console.warn(`⚠️  [CONFIG] ${key} not set, using development default`);
      return devDefault;
    }
    const generated = randomBytes(32).toString('hex');
    if (process.env.NODE_ENV !== 'test') {
      console.warn(`⚠️  [CONFIG] ${key} not set, auto-generated for development`);
    }
    return generated;
  }

  throw new Error(
    `❌ FATAL: ${key} is required in production!\n` +
    `   Set it in your environment variables or .env file.`
  );
}

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get number environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse CORS origins from comma-separated string
 */
function parseCorsOrigins(value: string): string | string[] {
  if (value === '*') return '*';
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

export type DatabaseDriver = 'postgres' | 'memory';

function getDatabaseDriver(): DatabaseDriver {
  const value = getOptional('DATABASE_DRIVER', 'postgres').toLowerCase();
  if (value === 'postgres' || value === 'memory') {
    return value;
  }
  throw new Error(`DATABASE_DRIVER must be "postgres" or "memory", got "${value}"`);
}

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

const nodeEnv = getOptional('NODE_ENV', 'development');

/**
 * Application configuration object
 * All configuration is validated at startup
 */
export const config = {
  // Server
  nodeEnv,
  port: getNumber('PORT', 3000),
  host: getOptional('HOST', '0.0.0.0'),

  // Database
  database: {
    driver: getDatabaseDriver(),
    url: getOptional('DATABASE_URL', 'postgresql://localhost:5432/geo_db'),
    poolSize: getNumber('DATABASE_POOL_SIZE', 10),
  },

  // Third-party data providers
  providers: {
    apilayerKey: getOptional('API_KEY_APILAYER', ''),
    openWeatherKey: getOptional('API_KEY_OPENWEATHER', ''),
    newsApiKey: getOptional('API_KEY_NEWSAPI', ''),
    geoBaseUrl: getOptional('GEO_API_BASE_URL', 'https://api.apilayer.com/geo'),
    currencyBaseUrl: getOptional('CURRENCY_API_BASE_URL', 'https://api.apilayer.com/exchangerates_data'),
    weatherBaseUrl: getOptional('WEATHER_API_BASE_URL', 'https://api.openweathermap.org/data/2.5'),
    newsBaseUrl: getOptional('NEWS_API_BASE_URL', 'https://newsapi.org/v2'),
    requestTimeoutMs: getNumber('REQUESTS_TIMEOUT_MS', 10000),
  },

  // Currency rates shown next to a location are quoted against this code
  baseCurrency: getOptional('BASE_CURRENCY', 'USD').toUpperCase(),

  // JWT (admin tokens)
  jwt: {
    secret: getRequired('JWT_SECRET'),
    expiresInSeconds: getNumber('JWT_EXPIRES_IN_SECONDS', 12 * 60 * 60),
  },

  // Logging
  logLevel: getOptional('LOG_LEVEL', 'debug'),

  cors: {
    origin: parseCorsOrigins(getOptional('CORS_ORIGIN', '*')),
  },

  // Helpers
  isProduction: nodeEnv === 'production',
  isDevelopment: nodeEnv === 'development',
  isTest: nodeEnv === 'test',

  security: {
    enableRequestLogging: getBoolean('ENABLE_REQUEST_LOGGING', true),
  },
} as const;

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

/**
 * Validate configuration at startup
 * Fails fast if critical config is missing
 */
function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (config.isProduction) {
    if (config.cors.origin === '*') {
      warnings.push('CORS_ORIGIN is set to "*" - this should be restricted in production');
    }

    if (!config.providers.apilayerKey) {
      errors.push('API_KEY_APILAYER is required in production for country/city/currency lookups');
    }

    if (!config.providers.openWeatherKey) {
      errors.push('API_KEY_OPENWEATHER is required in production for weather lookups');
    }

    if (!config.providers.newsApiKey) {
      errors.push('API_KEY_NEWSAPI is required in production for news lookups');
    }

    if (config.database.driver === 'memory') {
      warnings.push('DATABASE_DRIVER is "memory" - lookups will not survive a restart');
    }
  }

  if (warnings.length > 0) {
    console.warn('\n⚠️  Configuration Warnings:');
    warnings.forEach(w => console.warn(`   - ${w}`));
    console.warn('');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration Errors:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }
}

validateConfig();
