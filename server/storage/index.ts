/**
 * Storage Layer Index
 *
 * Builds the billing repositories over a database handle. The same
 * repository classes run against the pooled handle and against a
 * transaction handle, so a service can move any unit of work inside
 * `transaction()` without changing its queries.
 */

import { getDb, type Database, type Executor } from "../db";
import { DrizzleCatalogRepository } from "./catalog.repo";
import { DrizzleInvoicesRepository } from "./invoices.repo";
import { DrizzlePaymentsRepository } from "./payments.repo";
import { DrizzlePrintJobsRepository } from "./printJobs.repo";
import type { BillingRepositories, BillingStore } from "./types";

export * from "./types";

function buildRepositories(executor: Executor): BillingRepositories {
    return {
        catalog: new DrizzleCatalogRepository(executor),
        invoices: new DrizzleInvoicesRepository(executor),
        payments: new DrizzlePaymentsRepository(executor),
        printJobs: new DrizzlePrintJobsRepository(executor),
    };
}

export class DrizzleBillingStore implements BillingStore {
    readonly catalog: BillingRepositories["catalog"];
    readonly invoices: BillingRepositories["invoices"];
    readonly payments: BillingRepositories["payments"];
    readonly printJobs: BillingRepositories["printJobs"];

    constructor(private readonly dbInstance: Database = getDb()) {
        const repos = buildRepositories(dbInstance);
        this.catalog = repos.catalog;
        this.invoices = repos.invoices;
        this.payments = repos.payments;
        this.printJobs = repos.printJobs;
    }

    async transaction<T>(fn: (repos: BillingRepositories) => Promise<T>): Promise<T> {
        return this.dbInstance.transaction(async (tx) => fn(buildRepositories(tx)));
    }
}

export function createBillingStore(): BillingStore {
    return new DrizzleBillingStore();
}
