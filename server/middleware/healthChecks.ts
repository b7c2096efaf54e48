/**
 * Health Check Endpoints
 *
 * - GET /health: Liveness check (is process alive?)
 * - GET /ready: Readiness check (can the service reach its database?)
 *
 * Both are mounted ahead of authentication.
 */

import type { Request, Response } from 'express';
import { logger } from '../logger';

const DB_CHECK_TIMEOUT_MS = parseInt(process.env.HEALTH_DB_TIMEOUT_MS || '2000', 10);
const DB_CHECK_CACHE_MS = 5000;

export type DatabasePing = () => Promise<unknown>;

export interface HealthHandlers {
  healthCheck(req: Request, res: Response): void;
  readinessCheck(req: Request, res: Response): Promise<void>;
}

/**
 * Builds the health handlers around a database ping. The readiness result is
 * cached briefly so load balancers polling /ready do not hammer the database.
 */
export function createHealthHandlers(ping: DatabasePing): HealthHandlers {
  let dbConnected = false;
  let lastDbCheck = 0;

  async function checkDatabaseConnectivity(): Promise<boolean> {
    const now = Date.now();
    if (lastDbCheck > 0 && now - lastDbCheck < DB_CHECK_CACHE_MS) {
      return dbConnected;
    }

    let timer: NodeJS.Timeout | undefined;
    try {
      const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error('Database check timeout')), DB_CHECK_TIMEOUT_MS);
      });
      await Promise.race([ping(), timeoutPromise]);
      dbConnected = true;
    } catch (error) {
      dbConnected = false;
      logger.error('Database connectivity check failed', {
        error: error instanceof Error ? error.message : String(error),
        timeout: DB_CHECK_TIMEOUT_MS,
      });
    } finally {
      if (timer) clearTimeout(timer);
      lastDbCheck = now;
    }
    return dbConnected;
  }

  return {
    healthCheck(_req, res) {
      res.status(200).json({
        status: 'ok',
        uptime: Math.floor(process.uptime()),
        timestamp: new Date().toISOString(),
      });
    },

    async readinessCheck(_req, res) {
      const isReady = await checkDatabaseConnectivity();
      res.status(isReady ? 200 : 503).json({
        status: isReady ? 'ready' : 'not_ready',
        database: isReady ? 'connected' : 'disconnected',
        timestamp: new Date().toISOString(),
      });
    },
  };
}
