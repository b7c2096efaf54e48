import "dotenv/config";
import { sql } from "drizzle-orm";
import { createApp } from "./app";
import { closeDb, getDb } from "./db";
import { resolvePort, validateEnvironmentOrExit } from "./envValidation";
import { logError, logger } from "./logger";
import { setupGracefulShutdown } from "./middleware/gracefulShutdown";
import { DrizzleBillingStore } from "./storage";

process.on("unhandledRejection", (reason) => {
  logError(reason, { source: "unhandledRejection" });
});

process.on("uncaughtException", (error) => {
  logError(error, { source: "uncaughtException" });
});

function main(): void {
  validateEnvironmentOrExit();

  const db = getDb();
  const app = createApp({
    store: new DrizzleBillingStore(db),
    databasePing: () => db.execute(sql`select 1 as health_check`),
  });

  const port = resolvePort();
  const server = app.listen(port, "0.0.0.0", () => {
    logger.info("Server ready to accept connections", { port });
  });

  server.on("error", (error) => {
    logError(error, { source: "http-server" });
    process.exit(1);
  });

  setupGracefulShutdown(server, closeDb);
}

main();
