import "dotenv/config";
import { Pool, neonConfig } from "@neondatabase/serverless";
import { drizzle, type NeonDatabase } from "drizzle-orm/neon-serverless";
import ws from "ws";
import * as schema from "../shared/schema";

// Configure Neon to use WebSocket in Node
neonConfig.webSocketConstructor = ws;

export type Database = NeonDatabase<typeof schema>;

/**
 * Query surface shared by the database handle and a transaction handle.
 * Repositories take this so the same code runs inside and outside transactions.
 */
export type Executor = Pick<Database, "select" | "insert" | "update" | "delete" | "execute">;

let _pool: Pool | null = null;
let _db: Database | null = null;

/**
 * Lazily connects on first use so modules that only need types or pure
 * helpers can be imported without DATABASE_URL.
 */
export function getDb(): Database {
  if (_db) return _db;

  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error(
      "DATABASE_URL must be set (in your environment or .env file) before starting the server or running migrations."
    );
  }

  _pool = new Pool({ connectionString });
  _db = drizzle({ client: _pool, schema });
  return _db;
}

export async function closeDb(): Promise<void> {
  if (_pool) {
    await _pool.end();
  }
  _pool = null;
  _db = null;
}
