/**
 * Graceful Shutdown Handler
 *
 * On SIGTERM/SIGINT:
 * 1. Stop accepting new HTTP requests
 * 2. Wait for in-flight requests to finish (with timeout)
 * 3. Close database connections
 * 4. Exit
 */

import type { Server } from 'http';
import type { NextFunction, Request, Response } from 'express';
import { logger } from '../logger';

const SHUTDOWN_TIMEOUT_MS = parseInt(process.env.GRACEFUL_SHUTDOWN_TIMEOUT_MS || '30000', 10);

let inFlightRequests = 0;

/**
 * Counts a request as in flight until its response finishes or the socket closes.
 */
export function trackInFlight(_req: Request, res: Response, next: NextFunction): void {
  inFlightRequests++;
  let released = false;
  const release = () => {
    if (released) return;
    released = true;
    inFlightRequests = Math.max(0, inFlightRequests - 1);
  };
  res.on('finish', release);
  res.on('close', release);
  next();
}

export function getInFlightRequestCount(): number {
  return inFlightRequests;
}

export function setupGracefulShutdown(server: Server, closeDatabase: () => Promise<void>): void {
  let isShuttingDown = false;

  const shutdown = async (signal: string) => {
    if (isShuttingDown) {
      logger.warn('Shutdown already in progress, ignoring signal', { signal });
      return;
    }
    isShuttingDown = true;
    logger.info('Graceful shutdown initiated', { signal, inFlightRequests });

    server.close(() => {
      logger.info('HTTP server closed, no longer accepting connections');
    });

    const shutdownStart = Date.now();
    await new Promise<void>((resolve) => {
      const check = () => {
        const elapsed = Date.now() - shutdownStart;
        if (inFlightRequests === 0) {
          logger.info('All in-flight requests completed', { elapsed });
          resolve();
        } else if (elapsed >= SHUTDOWN_TIMEOUT_MS) {
          logger.warn('Shutdown timeout reached, forcing exit', {
            elapsed,
            abandonedRequests: inFlightRequests,
          });
          resolve();
        } else {
          setTimeout(check, 100);
        }
      };
      check();
    });

    try {
      await closeDatabase();
      logger.info('Database connections closed');
    } catch (error) {
      logger.error('Error closing database connections', {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    logger.info('Graceful shutdown complete', { totalElapsed: Date.now() - shutdownStart });
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  logger.info('Graceful shutdown handlers registered', { timeout: SHUTDOWN_TIMEOUT_MS });
}
