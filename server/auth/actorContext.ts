/**
 * Actor context
 *
 * Authentication happens upstream (gateway or session layer). By the time a
 * request reaches the billing routes the authenticator has stamped the
 * caller's identity into headers; this middleware lifts it onto req.actor.
 */

import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'crypto';
import type { Actor } from '../../shared/permissions';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      actor?: Actor;
    }
  }
}

export const ACTOR_HEADERS = {
  userId: 'x-user-id',
  role: 'x-user-role',
  companyId: 'x-company-id',
} as const;

function headerValue(req: Request, name: string): string | undefined {
  const raw = req.headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function requestId(req: Request, _res: Response, next: NextFunction): void {
  req.requestId = headerValue(req, 'x-request-id') ?? randomUUID();
  next();
}

export function resolveActor(req: Request): Actor | undefined {
  const userId = headerValue(req, ACTOR_HEADERS.userId);
  const role = headerValue(req, ACTOR_HEADERS.role);
  const companyId = headerValue(req, ACTOR_HEADERS.companyId);
  if (!userId || !role || !companyId) return undefined;
  return { userId, role, companyId };
}

export function isAuthenticated(req: Request, res: Response, next: NextFunction): void {
  const actor = resolveActor(req);
  if (!actor) {
    res.status(401).json({ error: 'Unauthorized', code: 'UNAUTHENTICATED' });
    return;
  }
  req.actor = actor;
  next();
}

/**
 * The actor stamped by isAuthenticated. Throws if the route forgot the middleware.
 */
export function requireActor(req: Request): Actor {
  if (!req.actor) {
    throw new Error('isAuthenticated middleware must run before this handler');
  }
  return req.actor;
}
