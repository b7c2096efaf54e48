import type { Request, Response } from "express";
import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { isBillingError } from "../errors";
import { logError, logger } from "../logger";

/**
 * Renders a failure from a route handler. Billing errors answer with their
 * own status and code; zod errors with 400; anything else is logged and
 * answered with 500.
 */
export function sendError(req: Request, res: Response, error: unknown, action: string): void {
  if (error instanceof z.ZodError) {
    res.status(400).json({
      error: fromZodError(error).message,
      code: "VALIDATION_FAILED",
      issues: error.errors,
    });
    return;
  }

  if (isBillingError(error)) {
    if (error.httpStatus >= 500) {
      logError(error, { action, requestId: req.requestId });
    } else {
      logger.withRequest(req).debug(`${action} rejected`, { code: error.code, reason: error.reason });
    }
    res.status(error.httpStatus).json(error.toJSON());
    return;
  }

  logError(error, {
    action,
    requestId: req.requestId,
    companyId: req.actor?.companyId,
    userId: req.actor?.userId,
  });
  res.status(500).json({ error: `Failed to ${action}`, code: "INTERNAL" });
}
