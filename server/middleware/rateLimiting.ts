/**
 * Rate Limiting Middleware
 *
 * Two layers:
 * 1. Global IP-based limit over all /api routes
 * 2. Per-user limit on money-moving writes (payments, verification, refunds)
 *
 * Limits are configurable via environment variables.
 * Rate limiting can be disabled via FEATURE_RATE_LIMITING_ENABLED=false.
 *
 * NOTE: In-memory store is best-effort in multi-instance deployments.
 */

import rateLimit, { ipKeyGenerator } from 'express-rate-limit';
import type { Request, Response } from 'express';
import { logger } from '../logger';

export function isRateLimitingEnabled(): boolean {
  const enabled = process.env.FEATURE_RATE_LIMITING_ENABLED;
  if (enabled === undefined || enabled === '') return true;
  return !['0', 'false', 'off', 'no'].includes(enabled.toLowerCase().trim());
}

function parsePositiveInt(envVar: string | undefined, defaultValue: number): number {
  if (!envVar) return defaultValue;
  const parsed = parseInt(envVar, 10);
  return isNaN(parsed) || parsed <= 0 ? defaultValue : parsed;
}

function rateLimitHandler(req: Request, res: Response): void {
  logger.warn('Rate limit exceeded', {
    requestId: req.requestId,
    companyId: req.actor?.companyId,
    userId: req.actor?.userId,
    ip: req.ip,
    path: req.path,
    method: req.method,
  });
  res.status(429).json({
    error: 'Too many requests. Please try again later.',
    code: 'RATE_LIMITED',
  });
}

const ipKey = (req: Request) => `ip:${ipKeyGenerator(req.ip || 'unknown')}`;

export const globalIpRateLimit = rateLimit({
  windowMs: parsePositiveInt(process.env.RATE_LIMIT_GLOBAL_WINDOW_MIN, 15) * 60 * 1000,
  limit: parsePositiveInt(process.env.RATE_LIMIT_GLOBAL_PER_IP, 1000),
  standardHeaders: true,
  legacyHeaders: false,
  skip: () => !isRateLimitingEnabled(),
  handler: rateLimitHandler,
  keyGenerator: ipKey,
});

/**
 * Mounted after isAuthenticated so the key is the caller, not the gateway's IP.
 */
export const paymentWriteRateLimit = rateLimit({
  windowMs: parsePositiveInt(process.env.RATE_LIMIT_PAYMENT_WINDOW_MIN, 1) * 60 * 1000,
  limit: parsePositiveInt(process.env.RATE_LIMIT_PAYMENT_PER_MIN, 30),
  standardHeaders: true,
  legacyHeaders: false,
  skip: () => !isRateLimitingEnabled(),
  handler: rateLimitHandler,
  keyGenerator: (req) => {
    const actor = req.actor;
    return actor ? `company:${actor.companyId}:user:${actor.userId}` : ipKey(req);
  },
});
