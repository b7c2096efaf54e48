/**
 * Structured Logger
 *
 * Production-safe structured logging with correlation IDs and sensitive data redaction.
 *
 * Key behaviors:
 * - All logs include: level, msg, timestamp, requestId (if available), companyId (if available), userId (if available)
 * - Automatic redaction of credentials, tokens, secrets, passwords
 * - JSON output for production log aggregation
 * - Human-readable output for development
 *
 * Usage:
 *   import { logger } from './logger';
 *   logger.info('Payment recorded', { invoiceId: 'inv_1', amountCents: 25000 });
 *   logger.error('Payment verification failed', { error, paymentId: 'pay_1' });
 */

import type { Request } from 'express';
import { resolveActor } from './auth/actorContext';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  requestId?: string;
  companyId?: string;
  userId?: string;
  [key: string]: unknown;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const isProduction = () => process.env.NODE_ENV === 'production';

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function configuredLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || '').trim().toLowerCase();
  if (isLogLevel(raw)) return raw;
  return isProduction() ? 'info' : 'debug';
}

/**
 * Sensitive field patterns that should be redacted from logs
 */
const SENSITIVE_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /authorization/i,
  /bearer/i,
  /api[_-]?key/i,
  /private[_-]?key/i,
  /credential/i,
  /credit[_-]?card/i,
  /cvv/i,
  /^pin$/i,
];

/**
 * Redact sensitive fields from objects before logging
 */
export function redactSensitiveData(obj: unknown, depth: number = 0): unknown {
  if (depth > 5) return '[max depth]';

  if (obj === null || obj === undefined) return obj;

  if (typeof obj !== 'object') return obj;

  if (obj instanceof Error) {
    return {
      name: obj.name,
      message: obj.message,
      stack: isProduction() ? undefined : obj.stack,
    };
  }

  if (obj instanceof Date) return obj.toISOString();

  if (Array.isArray(obj)) {
    return obj.map(item => redactSensitiveData(item, depth + 1));
  }

  const redacted: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    const isSensitive = SENSITIVE_PATTERNS.some(pattern => pattern.test(key));

    if (isSensitive) {
      redacted[key] = '[REDACTED]';
    } else if (value && typeof value === 'object') {
      redacted[key] = redactSensitiveData(value, depth + 1);
    } else {
      redacted[key] = value;
    }
  }

  return redacted;
}

/**
 * Extract correlation context from Express request
 */
function extractRequestContext(req?: Request): LogContext {
  if (!req) return {};

  const actor = req.actor ?? resolveActor(req);
  return {
    requestId: req.requestId,
    companyId: actor?.companyId,
    userId: actor?.userId,
  };
}

/**
 * Format log entry for output
 */
function formatLog(level: LogLevel, message: string, context: LogContext): string {
  const timestamp = new Date().toISOString();
  const safeContext = redactSensitiveData(context);

  if (isProduction()) {
    // JSON output for log aggregation
    return JSON.stringify({
      level,
      msg: message,
      timestamp,
      ...(safeContext && typeof safeContext === 'object' ? safeContext : {}),
    });
  }

  const contextStr = Object.keys(context).length > 0
    ? ' ' + JSON.stringify(safeContext, null, 0)
    : '';
  return `[${timestamp}] ${level.toUpperCase()} ${message}${contextStr}`;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[configuredLevel()];
}

function log(level: LogLevel, message: string, context: LogContext = {}): void {
  if (!shouldLog(level)) return;

  const output = formatLog(level, message, context);

  if (level === 'error') {
    console.error(output);
  } else if (level === 'warn') {
    console.warn(output);
  } else {
    console.log(output);
  }
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

function bind(baseContext: LogContext): Logger {
  return {
    debug: (message, context = {}) => log('debug', message, { ...baseContext, ...context }),
    info: (message, context = {}) => log('info', message, { ...baseContext, ...context }),
    warn: (message, context = {}) => log('warn', message, { ...baseContext, ...context }),
    error: (message, context = {}) => log('error', message, { ...baseContext, ...context }),
  };
}

/**
 * Structured logger instance
 */
export const logger = {
  ...bind({}),

  /**
   * Create a child logger with request context pre-attached
   * Use this at route entry points to avoid repeating context
   */
  withRequest(req: Request): Logger {
    return bind(extractRequestContext(req));
  },

  /**
   * Child logger with fixed fields, e.g. { service: 'payments' }
   */
  child(context: LogContext): Logger {
    return bind(context);
  },
};

/**
 * Helper to log errors with full context
 */
export function logError(error: unknown, context: LogContext = {}): void {
  if (error instanceof Error) {
    logger.error(error.message, {
      ...context,
      error: {
        name: error.name,
        message: error.message,
        stack: isProduction() ? undefined : error.stack,
      },
    });
  } else {
    logger.error('Unknown error', {
      ...context,
      error: String(error),
    });
  }
}
