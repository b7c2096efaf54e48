/**
 * Invoicing Routes Module
 *
 * Invoices, quotes, payments and weight pricing:
 * - Invoice CRUD, duplication and pricing quotes
 * - Payment recording, editing, verification, rejection and refunds
 * - Weight surcharge quotes and company tiers
 */

import type { Express, RequestHandler } from "express";
import { z } from "zod";
import {
  createInvoiceSchema,
  INVOICE_PAYMENT_STATUSES,
  INVOICE_STATUSES,
  insertWeightPricingTierSchema,
  invoiceItemInputSchema,
  recordPaymentSchema,
  updateInvoiceSchema,
  updatePaymentSchema,
  updateWeightPricingTierSchema,
} from "../../shared/schema";
import { requireActor } from "../auth/actorContext";
import { logger } from "../logger";
import type { InvoiceService } from "../services/invoiceService";
import type { PaymentService } from "../services/paymentService";
import type { WeightPricingService } from "../services/weightPricingService";
import { sendError } from "./respond";

const listInvoicesQuerySchema = z.object({
  status: z.enum(INVOICE_STATUSES).optional(),
  paymentStatus: z.enum(INVOICE_PAYMENT_STATUSES).optional(),
  branchId: z.string().min(1).optional(),
  customerId: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(200).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

const quoteSchema = z.object({
  items: z.array(invoiceItemInputSchema).default([]),
  discountAmountCents: z.number().int().min(0).default(0),
});

const reasonSchema = z.object({
  reason: z.string().trim().max(1000).default(""),
});

const weightQuerySchema = z.object({
  weightKg: z.string().trim().min(1).pipe(z.coerce.number().min(0).max(99_999.999)),
});

export function registerInvoicingRoutes(
  app: Express,
  deps: {
    isAuthenticated: RequestHandler;
    paymentRateLimit: RequestHandler;
    invoices: InvoiceService;
    payments: PaymentService;
    weightPricing: WeightPricingService;
  }
): void {
  const { isAuthenticated, paymentRateLimit, invoices, payments, weightPricing } = deps;

  // ------------------------------------------------------------
  // Invoices
  // ------------------------------------------------------------
  app.get("/api/invoices", isAuthenticated, async (req, res) => {
    try {
      const filters = listInvoicesQuerySchema.parse(req.query);
      res.json(await invoices.listInvoices(requireActor(req), filters));
    } catch (error) {
      sendError(req, res, error, "list invoices");
    }
  });

  app.post("/api/invoices/quote", isAuthenticated, async (req, res) => {
    try {
      const input = quoteSchema.parse(req.body);
      res.json(await invoices.quote(requireActor(req), input));
    } catch (error) {
      sendError(req, res, error, "price invoice");
    }
  });

  app.post("/api/invoices", isAuthenticated, async (req, res) => {
    try {
      const input = createInvoiceSchema.parse(req.body);
      res.status(201).json(await invoices.createInvoice(requireActor(req), input));
    } catch (error) {
      sendError(req, res, error, "create invoice");
    }
  });

  app.get("/api/invoices/:id", isAuthenticated, async (req, res) => {
    try {
      res.json(await invoices.getInvoice(requireActor(req), req.params.id));
    } catch (error) {
      sendError(req, res, error, "load invoice");
    }
  });

  app.patch("/api/invoices/:id", isAuthenticated, async (req, res) => {
    try {
      const input = updateInvoiceSchema.parse(req.body);
      res.json(await invoices.updateInvoice(requireActor(req), req.params.id, input));
    } catch (error) {
      sendError(req, res, error, "update invoice");
    }
  });

  app.delete("/api/invoices/:id", isAuthenticated, async (req, res) => {
    try {
      await invoices.deleteInvoice(requireActor(req), req.params.id);
      res.status(204).end();
    } catch (error) {
      sendError(req, res, error, "delete invoice");
    }
  });

  app.post("/api/invoices/:id/duplicate", isAuthenticated, async (req, res) => {
    try {
      res.status(201).json(await invoices.duplicateInvoice(requireActor(req), req.params.id));
    } catch (error) {
      sendError(req, res, error, "duplicate invoice");
    }
  });

  // ------------------------------------------------------------
  // Payments
  // ------------------------------------------------------------
  app.get("/api/invoices/:id/payments", isAuthenticated, async (req, res) => {
    try {
      res.json(await payments.getPaymentSummary(requireActor(req), req.params.id));
    } catch (error) {
      sendError(req, res, error, "load payments");
    }
  });

  app.post("/api/invoices/:id/payments", isAuthenticated, paymentRateLimit, async (req, res) => {
    try {
      const input = recordPaymentSchema.parse(req.body);
      const outcome = await payments.recordPayment(requireActor(req), req.params.id, input);
      logger.withRequest(req).debug("Payment accepted", { paymentId: outcome.payment.id });
      res.status(201).json(outcome);
    } catch (error) {
      sendError(req, res, error, "record payment");
    }
  });

  app.get("/api/payments/pending-verification", isAuthenticated, async (req, res) => {
    try {
      res.json(await payments.listPendingVerification(requireActor(req)));
    } catch (error) {
      sendError(req, res, error, "list pending payments");
    }
  });

  app.patch("/api/payments/:id", isAuthenticated, paymentRateLimit, async (req, res) => {
    try {
      const input = updatePaymentSchema.parse(req.body);
      res.json(await payments.updatePayment(requireActor(req), req.params.id, input));
    } catch (error) {
      sendError(req, res, error, "update payment");
    }
  });

  app.post("/api/payments/:id/verify", isAuthenticated, paymentRateLimit, async (req, res) => {
    try {
      res.json(await payments.verifyPayment(requireActor(req), req.params.id));
    } catch (error) {
      sendError(req, res, error, "verify payment");
    }
  });

  app.post("/api/payments/:id/reject", isAuthenticated, paymentRateLimit, async (req, res) => {
    try {
      const { reason } = reasonSchema.parse(req.body ?? {});
      res.json(await payments.rejectPayment(requireActor(req), req.params.id, reason));
    } catch (error) {
      sendError(req, res, error, "reject payment");
    }
  });

  app.post("/api/payments/:id/refund", isAuthenticated, paymentRateLimit, async (req, res) => {
    try {
      const { reason } = reasonSchema.parse(req.body ?? {});
      res.json(await payments.refundPayment(requireActor(req), req.params.id, reason));
    } catch (error) {
      sendError(req, res, error, "refund payment");
    }
  });

  // ------------------------------------------------------------
  // Weight pricing
  // ------------------------------------------------------------
  app.get("/api/weight-pricing/quote", isAuthenticated, async (req, res) => {
    try {
      const { weightKg } = weightQuerySchema.parse(req.query);
      res.json(await weightPricing.quoteWeight(requireActor(req), weightKg));
    } catch (error) {
      sendError(req, res, error, "quote weight charge");
    }
  });

  app.get("/api/weight-pricing/sample", isAuthenticated, async (req, res) => {
    try {
      res.json(await weightPricing.samplePricingTable(requireActor(req)));
    } catch (error) {
      sendError(req, res, error, "build pricing table");
    }
  });

  app.get("/api/weight-pricing/tiers", isAuthenticated, async (req, res) => {
    try {
      res.json(await weightPricing.listTiers(requireActor(req)));
    } catch (error) {
      sendError(req, res, error, "list weight tiers");
    }
  });

  app.post("/api/weight-pricing/tiers", isAuthenticated, async (req, res) => {
    try {
      const input = insertWeightPricingTierSchema.parse(req.body);
      res.status(201).json(await weightPricing.createTier(requireActor(req), input));
    } catch (error) {
      sendError(req, res, error, "create weight tier");
    }
  });

  app.patch("/api/weight-pricing/tiers/:id", isAuthenticated, async (req, res) => {
    try {
      const input = updateWeightPricingTierSchema.parse(req.body);
      res.json(await weightPricing.updateTier(requireActor(req), req.params.id, input));
    } catch (error) {
      sendError(req, res, error, "update weight tier");
    }
  });
}
