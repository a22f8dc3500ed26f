/**
 * =============================================================================
 * HEALTH CHECK ROUTES - Monitoring Endpoints
 * =============================================================================
 *
 * ENDPOINTS:
 * - GET /health          - Quick health check (for load balancers)
 * - GET /health/live     - Liveness check (is the process running?)
 * - GET /health/ready    - Readiness check (is the database reachable?)
 * - GET /version         - Build information
 *
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { db } from '../database/db';
import { logError } from '../services/logger.service';
import { config } from '../../config/environment';

const router = Router();

// Track server start time
const startTime = Date.now();

/**
 * Basic health check - for load balancers
 * Returns 200 if server is running, nothing else
 */
router.get('/health', (_req: Request, res: Response) => {
  res.status(200).json({
    status: 'healthy',
    timestamp: new Date().toISOString()
  });
});

/**
 * Liveness check - is the process alive?
 */
router.get('/health/live', (_req: Request, res: Response) => {
  const uptimeSeconds = Math.floor((Date.now() - startTime) / 1000);
  res.status(200).json({
    status: 'alive',
    pid: process.pid,
    uptime: formatUptime(uptimeSeconds),
    uptimeSeconds
  });
});

/**
 * Readiness check - can the service accept traffic?
 */
router.get('/health/ready', async (_req: Request, res: Response) => {
  const checks: Record<string, boolean> = {};

  try {
    await db.ping();
    checks.database = true;
  } catch (error) {
    logError('Readiness check failed: database unreachable', error);
    checks.database = false;
  }

  const isReady = Object.values(checks).every(v => v);

  res.status(isReady ? 200 : 503).json({
    status: isReady ? 'ready' : 'not_ready',
    checks,
    timestamp: new Date().toISOString()
  });
});

/**
 * Version endpoint
 */
router.get('/version', (_req: Request, res: Response) => {
  res.json({
    name: 'geo-backend',
    version: process.env.npm_package_version || '1.0.0',
    environment: config.nodeEnv,
    nodeVersion: process.version
  });
});

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  parts.push(`${secs}s`);

  return parts.join(' ');
}

export { router as healthRoutes };
