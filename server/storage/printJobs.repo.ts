import type { Executor } from "../db";
import { invoices, printJobs, type InsertPrintJob, type PrintJob } from "../../shared/schema";
import { and, desc, eq, like, type SQL } from "drizzle-orm";
import type { PrintJobFilters, PrintJobPatch, PrintJobsRepository } from "./types";

export class DrizzlePrintJobsRepository implements PrintJobsRepository {
    constructor(private readonly dbInstance: Executor) { }

    async findByInvoice(invoiceId: string): Promise<PrintJob | undefined> {
        const [job] = await this.dbInstance
            .select()
            .from(printJobs)
            .where(eq(printJobs.invoiceId, invoiceId))
            .limit(1);
        return job;
    }

    async getPrintJob(id: string): Promise<PrintJob | undefined> {
        const [job] = await this.dbInstance.select().from(printJobs).where(eq(printJobs.id, id));
        return job;
    }

    async listPrintJobs(companyId: string, filters: PrintJobFilters = {}): Promise<PrintJob[]> {
        const conditions: SQL[] = [eq(invoices.companyId, companyId)];
        if (filters.productionStatus) conditions.push(eq(printJobs.productionStatus, filters.productionStatus));

        const rows = await this.dbInstance
            .select()
            .from(printJobs)
            .innerJoin(invoices, eq(printJobs.invoiceId, invoices.id))
            .where(and(...conditions))
            .orderBy(desc(printJobs.createdAt))
            .limit(Math.min(filters.limit ?? 50, 200))
            .offset(filters.offset ?? 0);
        return rows.map((r) => r.print_jobs);
    }

    async createPrintJob(data: InsertPrintJob): Promise<PrintJob> {
        const [job] = await this.dbInstance.insert(printJobs).values(data).returning();
        return job;
    }

    async updatePrintJob(id: string, patch: PrintJobPatch): Promise<PrintJob> {
        const [job] = await this.dbInstance
            .update(printJobs)
            .set({ ...patch, updatedAt: new Date() })
            .where(eq(printJobs.id, id))
            .returning();
        if (!job) throw new Error(`Print job ${id} disappeared during update`);
        return job;
    }

    async getLastJobNumber(branchId: string, prefix: string): Promise<string | null> {
        const [row] = await this.dbInstance
            .select({ jobNumber: printJobs.jobNumber })
            .from(printJobs)
            .where(and(eq(printJobs.branchId, branchId), like(printJobs.jobNumber, `${prefix}%`)))
            .orderBy(desc(printJobs.jobNumber))
            .limit(1);
        return row?.jobNumber ?? null;
    }
}
