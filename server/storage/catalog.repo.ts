import type { Executor } from "../db";
import {
    branches,
    customers,
    products,
    weightPricingTiers,
    type Branch,
    type Customer,
    type InsertWeightPricingTier,
    type Product,
    type UpdateWeightPricingTier,
    type WeightPricingTier,
} from "../../shared/schema";
import { formatDecimal } from "../../shared/money";
import { and, asc, eq, inArray } from "drizzle-orm";
import type { CatalogRepository } from "./types";

export class DrizzleCatalogRepository implements CatalogRepository {
    constructor(private readonly dbInstance: Executor) { }

    async getBranch(id: string): Promise<Branch | undefined> {
        const [branch] = await this.dbInstance.select().from(branches).where(eq(branches.id, id));
        return branch;
    }

    async lockBranch(id: string): Promise<Branch | undefined> {
        const [branch] = await this.dbInstance
            .select()
            .from(branches)
            .where(eq(branches.id, id))
            .for('update');
        return branch;
    }

    async getCustomer(id: string): Promise<Customer | undefined> {
        const [customer] = await this.dbInstance.select().from(customers).where(eq(customers.id, id));
        return customer;
    }

    async getProducts(ids: readonly string[]): Promise<Product[]> {
        if (ids.length === 0) return [];
        return this.dbInstance.select().from(products).where(inArray(products.id, [...ids]));
    }

    async listWeightTiers(companyId: string, opts: { activeOnly?: boolean } = {}): Promise<WeightPricingTier[]> {
        const conditions = [eq(weightPricingTiers.companyId, companyId)];
        if (opts.activeOnly) conditions.push(eq(weightPricingTiers.status, 'active'));
        return this.dbInstance
            .select()
            .from(weightPricingTiers)
            .where(and(...conditions))
            .orderBy(asc(weightPricingTiers.minWeightKg), asc(weightPricingTiers.sortOrder));
    }

    async getWeightTier(id: string): Promise<WeightPricingTier | undefined> {
        const [tier] = await this.dbInstance.select().from(weightPricingTiers).where(eq(weightPricingTiers.id, id));
        return tier;
    }

    async createWeightTier(companyId: string, data: InsertWeightPricingTier): Promise<WeightPricingTier> {
        const [tier] = await this.dbInstance
            .insert(weightPricingTiers)
            .values({
                companyId,
                tierName: data.tierName,
                minWeightKg: formatDecimal(data.minWeightKg),
                maxWeightKg: data.maxWeightKg === null || data.maxWeightKg === undefined ? null : formatDecimal(data.maxWeightKg),
                basePriceCents: data.basePriceCents,
                pricePerKgCents: data.pricePerKgCents,
                status: data.status,
                sortOrder: data.sortOrder,
            })
            .returning();
        return tier;
    }

    async updateWeightTier(id: string, patch: UpdateWeightPricingTier): Promise<WeightPricingTier> {
        const { minWeightKg, maxWeightKg, ...rest } = patch;
        const [tier] = await this.dbInstance
            .update(weightPricingTiers)
            .set({
                ...rest,
                ...(minWeightKg !== undefined ? { minWeightKg: formatDecimal(minWeightKg) } : {}),
                ...(maxWeightKg !== undefined
                    ? { maxWeightKg: maxWeightKg === null ? null : formatDecimal(maxWeightKg) }
                    : {}),
                updatedAt: new Date(),
            })
            .where(eq(weightPricingTiers.id, id))
            .returning();
        if (!tier) throw new Error(`Weight tier ${id} disappeared during update`);
        return tier;
    }
}
