import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createRolePermissionChecker, type PermissionChecker } from "../shared/permissions";
import { isAuthenticated, requestId } from "./auth/actorContext";
import { InvoiceLocks } from "./lib/invoiceLocks";
import { logError, logger } from "./logger";
import { trackInFlight } from "./middleware/gracefulShutdown";
import { createHealthHandlers, type DatabasePing } from "./middleware/healthChecks";
import { globalIpRateLimit, paymentWriteRateLimit } from "./middleware/rateLimiting";
import { registerInvoicingRoutes } from "./routes/invoicing.routes";
import { registerProductionRoutes } from "./routes/production.routes";
import { InvoiceService } from "./services/invoiceService";
import { PaymentService } from "./services/paymentService";
import { PrintJobService } from "./services/printJobService";
import type { ServiceDeps } from "./services/serviceContext";
import { WeightPricingService } from "./services/weightPricingService";
import type { BillingStore } from "./storage/types";

export interface AppOptions {
  store: BillingStore;
  permissions?: PermissionChecker;
  locks?: InvoiceLocks;
  now?: () => Date;
  /** Pings the database for /ready. Defaults to a trivial store read. */
  databasePing?: DatabasePing;
}

export function createApp(options: AppOptions): Express {
  const deps: ServiceDeps = {
    store: options.store,
    permissions: options.permissions ?? createRolePermissionChecker(),
    locks: options.locks ?? new InvoiceLocks(),
    now: options.now,
  };

  const app = express();
  app.use(express.json({ limit: "1mb" }));
  app.use(requestId);
  app.use(trackInFlight);

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      if (!req.path.startsWith("/api")) return;
      logger.withRequest(req).info(`${req.method} ${req.path} ${res.statusCode}`, {
        durationMs: Date.now() - start,
      });
    });
    next();
  });

  const health = createHealthHandlers(
    options.databasePing ?? (() => options.store.invoices.getInvoice("00000000-0000-0000-0000-000000000000")),
  );
  app.get("/health", health.healthCheck);
  app.get("/ready", health.readinessCheck);

  app.use("/api", globalIpRateLimit);

  registerInvoicingRoutes(app, {
    isAuthenticated,
    paymentRateLimit: paymentWriteRateLimit,
    invoices: new InvoiceService(deps),
    payments: new PaymentService(deps),
    weightPricing: new WeightPricingService(deps),
  });
  registerProductionRoutes(app, {
    isAuthenticated,
    printJobs: new PrintJobService(deps),
  });

  // Malformed JSON bodies and anything a handler let escape.
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body", code: "VALIDATION_FAILED" });
      return;
    }
    logError(err, { requestId: req.requestId, path: req.path });
    res.status(500).json({ error: "Internal Server Error", code: "INTERNAL" });
  });

  return app;
}
