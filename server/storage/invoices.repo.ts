import type { Executor } from "../db";
import {
    invoiceItems,
    invoices,
    type InsertInvoice,
    type InsertInvoiceItem,
    type Invoice,
    type InvoiceItem,
} from "../../shared/schema";
import { and, asc, desc, eq, isNull, like, type SQL } from "drizzle-orm";
import type { InvoiceFilters, InvoicePatch, InvoicesRepository } from "./types";

export class DrizzleInvoicesRepository implements InvoicesRepository {
    constructor(private readonly dbInstance: Executor) { }

    async getInvoice(id: string): Promise<Invoice | undefined> {
        const [invoice] = await this.dbInstance.select().from(invoices).where(eq(invoices.id, id));
        return invoice;
    }

    async lockInvoice(id: string): Promise<Invoice | undefined> {
        const [invoice] = await this.dbInstance
            .select()
            .from(invoices)
            .where(eq(invoices.id, id))
            .for('update');
        return invoice;
    }

    async listInvoices(companyId: string, filters: InvoiceFilters = {}): Promise<Invoice[]> {
        const conditions: SQL[] = [eq(invoices.companyId, companyId)];
        if (!filters.includeDeleted) conditions.push(isNull(invoices.deletedAt));
        if (filters.branchId) conditions.push(eq(invoices.branchId, filters.branchId));
        if (filters.customerId) conditions.push(eq(invoices.customerId, filters.customerId));
        if (filters.status) conditions.push(eq(invoices.status, filters.status));
        if (filters.paymentStatus) conditions.push(eq(invoices.paymentStatus, filters.paymentStatus));

        const limit = Math.min(filters.limit ?? 50, 200);
        return this.dbInstance
            .select()
            .from(invoices)
            .where(and(...conditions))
            .orderBy(desc(invoices.invoiceDate))
            .limit(limit)
            .offset(filters.offset ?? 0);
    }

    async getItems(invoiceId: string): Promise<InvoiceItem[]> {
        return this.dbInstance
            .select()
            .from(invoiceItems)
            .where(eq(invoiceItems.invoiceId, invoiceId))
            .orderBy(asc(invoiceItems.createdAt));
    }

    async createInvoice(data: InsertInvoice): Promise<Invoice> {
        const [invoice] = await this.dbInstance.insert(invoices).values(data).returning();
        return invoice;
    }

    async updateInvoice(id: string, patch: InvoicePatch): Promise<Invoice> {
        const [invoice] = await this.dbInstance
            .update(invoices)
            .set({ ...patch, updatedAt: new Date() })
            .where(eq(invoices.id, id))
            .returning();
        if (!invoice) throw new Error(`Invoice ${id} disappeared during update`);
        return invoice;
    }

    async replaceItems(invoiceId: string, items: InsertInvoiceItem[]): Promise<InvoiceItem[]> {
        await this.dbInstance.delete(invoiceItems).where(eq(invoiceItems.invoiceId, invoiceId));
        if (items.length === 0) return [];
        return this.dbInstance
            .insert(invoiceItems)
            .values(items.map((item) => ({ ...item, invoiceId })))
            .returning();
    }

    async getLastInvoiceNumber(branchId: string, prefix: string): Promise<string | null> {
        const [row] = await this.dbInstance
            .select({ invoiceNumber: invoices.invoiceNumber })
            .from(invoices)
            .where(and(eq(invoices.branchId, branchId), like(invoices.invoiceNumber, `${prefix}%`)))
            .orderBy(desc(invoices.invoiceNumber))
            .limit(1);
        return row?.invoiceNumber ?? null;
    }
}
