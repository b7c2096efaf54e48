import type {
  Branch,
  Customer,
  InsertInvoice,
  InsertInvoiceItem,
  InsertPayment,
  InsertPrintJob,
  InsertWeightPricingTier,
  Invoice,
  InvoiceItem,
  InvoicePaymentStatus,
  InvoiceStatus,
  Payment,
  PrintJob,
  Product,
  ProductionStatus,
  UpdateWeightPricingTier,
  WeightPricingTier,
} from "../../shared/schema";

export type InvoiceFilters = {
  branchId?: string;
  customerId?: string;
  status?: InvoiceStatus;
  paymentStatus?: InvoicePaymentStatus;
  includeDeleted?: boolean;
  limit?: number;
  offset?: number;
};

export type PrintJobFilters = {
  productionStatus?: ProductionStatus;
  limit?: number;
  offset?: number;
};

export type InvoicePatch = Partial<Omit<InsertInvoice, "id" | "companyId" | "createdAt">>;
export type PaymentPatch = Partial<Omit<InsertPayment, "id" | "invoiceId" | "createdAt">>;
export type PrintJobPatch = Partial<Omit<InsertPrintJob, "id" | "invoiceId" | "createdAt">>;

export interface CatalogRepository {
  getBranch(id: string): Promise<Branch | undefined>;
  /**
   * Reads the branch row and holds a write lock on it until the transaction
   * ends. Serializes allocation of the branch's invoice, payment and job numbers.
   */
  lockBranch(id: string): Promise<Branch | undefined>;
  getCustomer(id: string): Promise<Customer | undefined>;
  getProducts(ids: readonly string[]): Promise<Product[]>;
  listWeightTiers(companyId: string, opts?: { activeOnly?: boolean }): Promise<WeightPricingTier[]>;
  getWeightTier(id: string): Promise<WeightPricingTier | undefined>;
  createWeightTier(companyId: string, data: InsertWeightPricingTier): Promise<WeightPricingTier>;
  updateWeightTier(id: string, patch: UpdateWeightPricingTier): Promise<WeightPricingTier>;
}

export interface InvoicesRepository {
  /** Returns soft-deleted invoices too; callers check deletedAt. */
  getInvoice(id: string): Promise<Invoice | undefined>;
  /** Reads the invoice row and holds a write lock on it until the transaction ends. */
  lockInvoice(id: string): Promise<Invoice | undefined>;
  listInvoices(companyId: string, filters?: InvoiceFilters): Promise<Invoice[]>;
  getItems(invoiceId: string): Promise<InvoiceItem[]>;
  createInvoice(data: InsertInvoice): Promise<Invoice>;
  updateInvoice(id: string, patch: InvoicePatch): Promise<Invoice>;
  replaceItems(invoiceId: string, items: InsertInvoiceItem[]): Promise<InvoiceItem[]>;
  getLastInvoiceNumber(branchId: string, prefix: string): Promise<string | null>;
}

export interface PaymentsRepository {
  listByInvoice(invoiceId: string): Promise<Payment[]>;
  listPendingVerification(companyId: string): Promise<Payment[]>;
  getPayment(id: string): Promise<Payment | undefined>;
  createPayment(data: InsertPayment): Promise<Payment>;
  updatePayment(id: string, patch: PaymentPatch): Promise<Payment>;
  getLastReference(branchId: string, prefix: string): Promise<string | null>;
}

export interface PrintJobsRepository {
  findByInvoice(invoiceId: string): Promise<PrintJob | undefined>;
  getPrintJob(id: string): Promise<PrintJob | undefined>;
  listPrintJobs(companyId: string, filters?: PrintJobFilters): Promise<PrintJob[]>;
  createPrintJob(data: InsertPrintJob): Promise<PrintJob>;
  updatePrintJob(id: string, patch: PrintJobPatch): Promise<PrintJob>;
  getLastJobNumber(branchId: string, prefix: string): Promise<string | null>;
}

export interface BillingRepositories {
  catalog: CatalogRepository;
  invoices: InvoicesRepository;
  payments: PaymentsRepository;
  printJobs: PrintJobsRepository;
}

/**
 * Unit of work over the billing tables. Everything done through the
 * repositories handed to fn commits or rolls back together.
 */
export interface BillingStore extends BillingRepositories {
  transaction<T>(fn: (repos: BillingRepositories) => Promise<T>): Promise<T>;
}
