import type { Executor } from "../db";
import { invoices, payments, type InsertPayment, type Payment } from "../../shared/schema";
import { and, asc, desc, eq, isNull, like } from "drizzle-orm";
import type { PaymentPatch, PaymentsRepository } from "./types";

export class DrizzlePaymentsRepository implements PaymentsRepository {
    constructor(private readonly dbInstance: Executor) { }

    async listByInvoice(invoiceId: string): Promise<Payment[]> {
        return this.dbInstance
            .select()
            .from(payments)
            .where(eq(payments.invoiceId, invoiceId))
            .orderBy(desc(payments.paymentDate));
    }

    async listPendingVerification(companyId: string): Promise<Payment[]> {
        const rows = await this.dbInstance
            .select()
            .from(payments)
            .innerJoin(invoices, eq(payments.invoiceId, invoices.id))
            .where(and(
                eq(invoices.companyId, companyId),
                isNull(invoices.deletedAt),
                eq(payments.verificationStatus, 'pending'),
            ))
            .orderBy(asc(payments.paymentDate));
        return rows.map((r) => r.payments);
    }

    async getPayment(id: string): Promise<Payment | undefined> {
        const [payment] = await this.dbInstance.select().from(payments).where(eq(payments.id, id));
        return payment;
    }

    async createPayment(data: InsertPayment): Promise<Payment> {
        const [payment] = await this.dbInstance.insert(payments).values(data).returning();
        return payment;
    }

    async updatePayment(id: string, patch: PaymentPatch): Promise<Payment> {
        const [payment] = await this.dbInstance
            .update(payments)
            .set({ ...patch, updatedAt: new Date() })
            .where(eq(payments.id, id))
            .returning();
        if (!payment) throw new Error(`Payment ${id} disappeared during update`);
        return payment;
    }

    async getLastReference(branchId: string, prefix: string): Promise<string | null> {
        const [row] = await this.dbInstance
            .select({ paymentReference: payments.paymentReference })
            .from(payments)
            .where(and(eq(payments.branchId, branchId), like(payments.paymentReference, `${prefix}%`)))
            .orderBy(desc(payments.paymentReference))
            .limit(1);
        return row?.paymentReference ?? null;
    }
}
