import { sql } from 'drizzle-orm';
import { relations } from 'drizzle-orm';
import {
  decimal,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  varchar,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";
import { MAX_AMOUNT_CENTS, MAX_WEIGHT_KG } from "./money";

// ============================================================
// STATUS VOCABULARIES
// ============================================================

export const INVOICE_STATUSES = ['draft', 'pending', 'processing', 'completed', 'cancelled'] as const;
export type InvoiceStatus = typeof INVOICE_STATUSES[number];

export const INVOICE_PAYMENT_STATUSES = ['pending', 'partially_paid', 'paid', 'refunded'] as const;
export type InvoicePaymentStatus = typeof INVOICE_PAYMENT_STATUSES[number];

export const PAYMENT_METHODS = ['cash', 'bank_transfer', 'cheque', 'online'] as const;
export type PaymentMethod = typeof PAYMENT_METHODS[number];

export const PAYMENT_STATUSES = ['pending', 'completed', 'failed', 'refunded'] as const;
export type PaymentStatus = typeof PAYMENT_STATUSES[number];

export const VERIFICATION_STATUSES = ['pending', 'verified', 'rejected'] as const;
export type VerificationStatus = typeof VERIFICATION_STATUSES[number];

export const PRODUCTION_STATUSES = ['pending', 'in_progress', 'quality_check', 'completed', 'on_hold'] as const;
export type ProductionStatus = typeof PRODUCTION_STATUSES[number];

export const JOB_PRIORITIES = ['low', 'normal', 'medium', 'high', 'urgent'] as const;
export type JobPriority = typeof JOB_PRIORITIES[number];

export const CUSTOMER_TYPES = ['regular', 'vip', 'corporate'] as const;
export type CustomerType = typeof CUSTOMER_TYPES[number];

// ============================================================
// COMPANIES & BRANCHES
// ============================================================

export const companies = pgTable("companies", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: varchar("name", { length: 255 }).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

export type Company = typeof companies.$inferSelect;

export const branches = pgTable("branches", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  companyId: varchar("company_id").notNull().references(() => companies.id, { onDelete: 'cascade' }),
  name: varchar("name", { length: 255 }).notNull(),
  code: varchar("code", { length: 20 }).notNull(), // prefix for invoice, payment and job numbers
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  index("branches_company_id_idx").on(table.companyId),
  uniqueIndex("branches_company_code_uq").on(table.companyId, table.code),
]);

export type Branch = typeof branches.$inferSelect;

// ============================================================
// CUSTOMERS & PRODUCTS
// ============================================================

export const customers = pgTable("customers", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  companyId: varchar("company_id").notNull().references(() => companies.id, { onDelete: 'cascade' }),
  name: varchar("name", { length: 255 }).notNull(),
  email: varchar("email", { length: 255 }),
  phone: varchar("phone", { length: 50 }),
  customerType: varchar("customer_type", { length: 20 }).$type<CustomerType>().notNull().default('regular'),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  index("customers_company_id_idx").on(table.companyId),
]);

export type Customer = typeof customers.$inferSelect;

export const products = pgTable("products", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  companyId: varchar("company_id").notNull().references(() => companies.id, { onDelete: 'cascade' }),
  name: varchar("name", { length: 255 }).notNull(),
  basePriceCents: integer("base_price_cents").notNull().default(0),
  weightPerUnitKg: decimal("weight_per_unit_kg", { precision: 10, scale: 3 }).notNull().default('0'),
  taxRate: decimal("tax_rate", { precision: 5, scale: 2 }).notNull().default('0'), // percent
  status: varchar("status", { length: 20 }).notNull().default('active'),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  index("products_company_id_idx").on(table.companyId),
]);

export type Product = typeof products.$inferSelect;

// ============================================================
// WEIGHT PRICING TIERS
// ============================================================

export const weightPricingTiers = pgTable("weight_pricing_tiers", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  companyId: varchar("company_id").notNull().references(() => companies.id, { onDelete: 'cascade' }),
  tierName: varchar("tier_name", { length: 100 }).notNull(),
  minWeightKg: decimal("min_weight_kg", { precision: 10, scale: 3 }).notNull(),
  maxWeightKg: decimal("max_weight_kg", { precision: 10, scale: 3 }), // null = open-ended
  basePriceCents: integer("base_price_cents").notNull(),
  pricePerKgCents: integer("price_per_kg_cents").notNull().default(0),
  status: varchar("status", { length: 20 }).$type<'active' | 'inactive'>().notNull().default('active'),
  sortOrder: integer("sort_order").notNull().default(0),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  index("weight_pricing_tiers_company_id_idx").on(table.companyId),
]);

export const insertWeightPricingTierSchema = createInsertSchema(weightPricingTiers).omit({
  id: true,
  companyId: true,
  createdAt: true,
  updatedAt: true,
}).extend({
  tierName: z.string().trim().min(1).max(100),
  minWeightKg: z.coerce.number().min(0).max(MAX_WEIGHT_KG),
  maxWeightKg: z.coerce.number().min(0).max(MAX_WEIGHT_KG).nullable().optional(),
  basePriceCents: z.number().int().min(0).max(MAX_AMOUNT_CENTS),
  pricePerKgCents: z.number().int().min(0).max(MAX_AMOUNT_CENTS).default(0),
  status: z.enum(['active', 'inactive']).default('active'),
  sortOrder: z.number().int().min(0).default(0),
});

export type InsertWeightPricingTier = z.infer<typeof insertWeightPricingTierSchema>;

export const updateWeightPricingTierSchema = insertWeightPricingTierSchema.partial();

export type UpdateWeightPricingTier = z.infer<typeof updateWeightPricingTierSchema>;
export type WeightPricingTier = typeof weightPricingTiers.$inferSelect;

// ============================================================
// INVOICES
// ============================================================

export const invoices = pgTable("invoices", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  companyId: varchar("company_id").notNull().references(() => companies.id, { onDelete: 'cascade' }),
  branchId: varchar("branch_id").notNull().references(() => branches.id, { onDelete: 'restrict' }),
  customerId: varchar("customer_id").notNull().references(() => customers.id, { onDelete: 'restrict' }),
  invoiceNumber: varchar("invoice_number", { length: 50 }).notNull(),
  invoiceDate: timestamp("invoice_date", { withTimezone: true }).defaultNow().notNull(),
  dueDate: timestamp("due_date", { withTimezone: true }),
  status: varchar("status", { length: 20 }).$type<InvoiceStatus>().notNull().default('draft'),
  paymentStatus: varchar("payment_status", { length: 20 }).$type<InvoicePaymentStatus>().notNull().default('pending'),
  subtotalCents: integer("subtotal_cents").notNull().default(0),
  weightChargeCents: integer("weight_charge_cents").notNull().default(0),
  taxAmountCents: integer("tax_amount_cents").notNull().default(0),
  discountAmountCents: integer("discount_amount_cents").notNull().default(0),
  totalAmountCents: integer("total_amount_cents").notNull().default(0),
  totalWeightKg: decimal("total_weight_kg", { precision: 10, scale: 3 }).notNull().default('0'),
  notes: text("notes"),
  createdByUserId: varchar("created_by_user_id").notNull(),
  deletedAt: timestamp("deleted_at", { withTimezone: true }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  index("invoices_company_id_idx").on(table.companyId),
  index("invoices_branch_id_idx").on(table.branchId),
  index("invoices_customer_id_idx").on(table.customerId),
  index("invoices_status_idx").on(table.status),
  index("invoices_payment_status_idx").on(table.paymentStatus),
  uniqueIndex("invoices_branch_number_uq").on(table.branchId, table.invoiceNumber),
]);

export type Invoice = typeof invoices.$inferSelect;
export type InsertInvoice = typeof invoices.$inferInsert;

// Invoice items: quantities and prices are snapshotted at pricing time
export const invoiceItems = pgTable("invoice_items", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  invoiceId: varchar("invoice_id").notNull().references(() => invoices.id, { onDelete: 'cascade' }),
  productId: varchar("product_id").references(() => products.id, { onDelete: 'set null' }),
  description: text("description").notNull(),
  quantity: integer("quantity").notNull(),
  unitPriceCents: integer("unit_price_cents").notNull(),
  unitWeightKg: decimal("unit_weight_kg", { precision: 10, scale: 3 }).notNull().default('0'),
  lineTotalCents: integer("line_total_cents").notNull(),
  lineWeightKg: decimal("line_weight_kg", { precision: 10, scale: 3 }).notNull().default('0'),
  taxRate: decimal("tax_rate", { precision: 5, scale: 2 }).notNull().default('0'),
  taxAmountCents: integer("tax_amount_cents").notNull().default(0),
  specifications: jsonb("specifications").$type<Record<string, unknown>>(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => [
  index("invoice_items_invoice_id_idx").on(table.invoiceId),
]);

export type InvoiceItem = typeof invoiceItems.$inferSelect;
export type InsertInvoiceItem = typeof invoiceItems.$inferInsert;

// ============================================================
// PAYMENTS
// ============================================================

export const payments = pgTable("payments", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  invoiceId: varchar("invoice_id").notNull().references(() => invoices.id, { onDelete: 'cascade' }),
  branchId: varchar("branch_id").notNull().references(() => branches.id, { onDelete: 'restrict' }),
  paymentReference: varchar("payment_reference", { length: 50 }).notNull(),
  amountCents: integer("amount_cents").notNull(),
  paymentMethod: varchar("payment_method", { length: 20 }).$type<PaymentMethod>().notNull(),
  paymentDate: timestamp("payment_date", { withTimezone: true }).notNull(),
  bankName: varchar("bank_name", { length: 100 }),
  chequeNumber: varchar("cheque_number", { length: 50 }),
  gatewayReference: varchar("gateway_reference", { length: 100 }),
  transactionId: varchar("transaction_id", { length: 100 }),
  status: varchar("status", { length: 20 }).$type<PaymentStatus>().notNull().default('pending'),
  verificationStatus: varchar("verification_status", { length: 20 }).$type<VerificationStatus>().notNull().default('pending'),
  rejectionReason: text("rejection_reason"),
  refundReason: text("refund_reason"),
  notes: text("notes"),
  receivedByUserId: varchar("received_by_user_id").notNull(),
  verifiedByUserId: varchar("verified_by_user_id"),
  verifiedAt: timestamp("verified_at", { withTimezone: true }),
  refundedAt: timestamp("refunded_at", { withTimezone: true }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  index("payments_invoice_id_idx").on(table.invoiceId),
  index("payments_verification_status_idx").on(table.verificationStatus),
  uniqueIndex("payments_branch_reference_uq").on(table.branchId, table.paymentReference),
]);

export type Payment = typeof payments.$inferSelect;
export type InsertPayment = typeof payments.$inferInsert;

// ============================================================
// PRINT JOBS
// ============================================================

export const printJobs = pgTable("print_jobs", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  invoiceId: varchar("invoice_id").notNull().references(() => invoices.id, { onDelete: 'cascade' }),
  branchId: varchar("branch_id").notNull().references(() => branches.id, { onDelete: 'restrict' }),
  jobNumber: varchar("job_number", { length: 50 }).notNull(),
  jobType: varchar("job_type", { length: 50 }).notNull(),
  productionStatus: varchar("production_status", { length: 20 }).$type<ProductionStatus>().notNull().default('pending'),
  priority: varchar("priority", { length: 20 }).$type<JobPriority>().notNull().default('normal'),
  progressPercentage: integer("progress_percentage").notNull().default(0),
  estimatedCompletion: timestamp("estimated_completion", { withTimezone: true }),
  startedAt: timestamp("started_at", { withTimezone: true }),
  completedAt: timestamp("completed_at", { withTimezone: true }),
  customerInstructions: text("customer_instructions"),
  specifications: jsonb("specifications").$type<PrintJobSpecification[]>(),
  productionNotes: text("production_notes"),
  createdByUserId: varchar("created_by_user_id").notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  index("print_jobs_invoice_id_idx").on(table.invoiceId),
  index("print_jobs_production_status_idx").on(table.productionStatus),
  uniqueIndex("print_jobs_branch_job_number_uq").on(table.branchId, table.jobNumber),
]);

export type PrintJobSpecification = {
  description: string;
  quantity: number;
  weightKg: number;
  specifications?: Record<string, unknown> | null;
};

export type PrintJob = typeof printJobs.$inferSelect;
export type InsertPrintJob = typeof printJobs.$inferInsert;

// ============================================================
// RELATIONS
// ============================================================

export const invoicesRelations = relations(invoices, ({ one, many }) => ({
  customer: one(customers, { fields: [invoices.customerId], references: [customers.id] }),
  branch: one(branches, { fields: [invoices.branchId], references: [branches.id] }),
  items: many(invoiceItems),
  payments: many(payments),
}));

export const invoiceItemsRelations = relations(invoiceItems, ({ one }) => ({
  invoice: one(invoices, { fields: [invoiceItems.invoiceId], references: [invoices.id] }),
  product: one(products, { fields: [invoiceItems.productId], references: [products.id] }),
}));

export const paymentsRelations = relations(payments, ({ one }) => ({
  invoice: one(invoices, { fields: [payments.invoiceId], references: [invoices.id] }),
}));

export const printJobsRelations = relations(printJobs, ({ one }) => ({
  invoice: one(invoices, { fields: [printJobs.invoiceId], references: [invoices.id] }),
}));

// ============================================================
// REQUEST SCHEMAS
// ============================================================

export const MAX_ITEM_QUANTITY = 999_999;
export const MAX_UNIT_WEIGHT_KG = 99_999.999;
export const MAX_INVOICE_ITEMS = 500;

const optionalText = (max: number) => z.string().trim().max(max).optional().nullable();

export const invoiceItemInputSchema = z.object({
  productId: z.string().min(1).optional().nullable(),
  description: optionalText(500),
  quantity: z.number().int().positive().max(MAX_ITEM_QUANTITY),
  unitPriceCents: z.number().int().min(0).max(MAX_AMOUNT_CENTS).optional(),
  unitWeightKg: z.number().min(0).max(MAX_UNIT_WEIGHT_KG).optional(),
  taxRate: z.number().min(0).max(100).optional(),
  specifications: z.record(z.unknown()).optional().nullable(),
});

export type InvoiceItemInput = z.infer<typeof invoiceItemInputSchema>;

const dateInput = z.preprocess((val) => {
  if (val === undefined || val === null || val === '') return undefined;
  if (val instanceof Date) return val;
  if (typeof val === 'string' || typeof val === 'number') return new Date(val);
  return val;
}, z.date().optional());

export const createInvoiceSchema = z.object({
  branchId: z.string().min(1),
  customerId: z.string().min(1),
  invoiceDate: dateInput,
  dueDate: dateInput,
  notes: optionalText(2000),
  discountAmountCents: z.number().int().min(0).max(MAX_AMOUNT_CENTS).default(0),
  status: z.enum(['draft', 'pending']).default('draft'),
  items: z.array(invoiceItemInputSchema).max(MAX_INVOICE_ITEMS).default([]),
});

export type CreateInvoiceInput = z.infer<typeof createInvoiceSchema>;

export const updateInvoiceSchema = z.object({
  dueDate: dateInput,
  notes: optionalText(2000),
  discountAmountCents: z.number().int().min(0).max(MAX_AMOUNT_CENTS).optional(),
  status: z.enum(INVOICE_STATUSES).optional(),
  items: z.array(invoiceItemInputSchema).max(MAX_INVOICE_ITEMS).optional(),
});

export type UpdateInvoiceInput = z.infer<typeof updateInvoiceSchema>;

export const recordPaymentSchema = z.object({
  amountCents: z.number().int().max(MAX_AMOUNT_CENTS),
  paymentMethod: z.enum(PAYMENT_METHODS),
  paymentDate: dateInput,
  bankName: optionalText(100),
  chequeNumber: optionalText(50),
  gatewayReference: optionalText(100),
  transactionId: optionalText(100),
  notes: optionalText(1000),
});

export type RecordPaymentInput = z.infer<typeof recordPaymentSchema>;

export const updatePaymentSchema = recordPaymentSchema.partial();

export type UpdatePaymentInput = z.infer<typeof updatePaymentSchema>;

export const createPrintJobSchema = z.object({
  jobType: z.string().trim().min(1).max(50).optional(),
  priority: z.enum(JOB_PRIORITIES).optional(),
  estimatedCompletion: dateInput,
  customerInstructions: optionalText(2000),
});

export type CreatePrintJobInput = z.infer<typeof createPrintJobSchema>;
