/**
 * Production Routes Module
 *
 * Print job eligibility, creation from an invoice, and production updates.
 */

import type { Express, RequestHandler } from "express";
import { z } from "zod";
import { createPrintJobSchema, PRODUCTION_STATUSES } from "../../shared/schema";
import { requireActor } from "../auth/actorContext";
import type { PrintJobService } from "../services/printJobService";
import { sendError } from "./respond";

const statusChangeSchema = z.object({
  status: z.enum(PRODUCTION_STATUSES),
  productionNotes: z.string().trim().max(2000).optional().nullable(),
});

const progressSchema = z.object({
  progressPercentage: z.number(),
});

const listPrintJobsQuerySchema = z.object({
  productionStatus: z.enum(PRODUCTION_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(200).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

export function registerProductionRoutes(
  app: Express,
  deps: {
    isAuthenticated: RequestHandler;
    printJobs: PrintJobService;
  }
): void {
  const { isAuthenticated, printJobs } = deps;

  app.get("/api/invoices/:id/print-job-eligibility", isAuthenticated, async (req, res) => {
    try {
      res.json(await printJobs.getEligibility(requireActor(req), req.params.id));
    } catch (error) {
      sendError(req, res, error, "check print job eligibility");
    }
  });

  app.post("/api/invoices/:id/print-job", isAuthenticated, async (req, res) => {
    try {
      const input = createPrintJobSchema.parse(req.body ?? {});
      res.status(201).json(await printJobs.createFromInvoice(requireActor(req), req.params.id, input));
    } catch (error) {
      sendError(req, res, error, "create print job");
    }
  });

  app.get("/api/print-jobs", isAuthenticated, async (req, res) => {
    try {
      const filters = listPrintJobsQuerySchema.parse(req.query);
      res.json(await printJobs.listPrintJobs(requireActor(req), filters));
    } catch (error) {
      sendError(req, res, error, "list print jobs");
    }
  });

  app.get("/api/print-jobs/:id", isAuthenticated, async (req, res) => {
    try {
      res.json(await printJobs.getPrintJob(requireActor(req), req.params.id));
    } catch (error) {
      sendError(req, res, error, "load print job");
    }
  });

  app.patch("/api/print-jobs/:id/status", isAuthenticated, async (req, res) => {
    try {
      const { status, productionNotes } = statusChangeSchema.parse(req.body);
      res.json(await printJobs.transitionStatus(requireActor(req), req.params.id, status, productionNotes));
    } catch (error) {
      sendError(req, res, error, "update print job status");
    }
  });

  app.patch("/api/print-jobs/:id/progress", isAuthenticated, async (req, res) => {
    try {
      const { progressPercentage } = progressSchema.parse(req.body);
      res.json(await printJobs.updateProgress(requireActor(req), req.params.id, progressPercentage));
    } catch (error) {
      sendError(req, res, error, "update print job progress");
    }
  });
}
