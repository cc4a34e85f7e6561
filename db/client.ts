import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool, type PoolConfig } from "pg";

import * as schema from "./schema.js";

export type Database = NodePgDatabase<typeof schema>;

export interface DatabasePoolOptions {
  connectionString?: string;
  ssl?: PoolConfig["ssl"] | boolean;
}

let poolInstance: Pool | undefined;
let dbInstance: Database | undefined;

function resolveSslOption(options: DatabasePoolOptions = {}): PoolConfig["ssl"] | undefined {
  if (options.ssl === false) {
    return false;
  }

  if (options.ssl && options.ssl !== true) {
    return options.ssl;
  }

  if (options.ssl === true) {
    return { rejectUnauthorized: false };
  }

  const sslMode = (process.env.DATABASE_SSL ?? process.env.PGSSLMODE ?? "").toLowerCase();
  if (["disable", "allow", "prefer"].includes(sslMode)) {
    return false;
  }

  return { rejectUnauthorized: false };
}

export function createPool(options: DatabasePoolOptions = {}): Pool {
  const connectionString = options.connectionString ?? process.env.DATABASE_URL;

  if (!connectionString) {
    throw new Error(
      "DATABASE_URL is not configured. Set a connection string before using the database client.",
    );
  }

  const poolConfig: PoolConfig = {
    connectionString,
  };

  const ssl = resolveSslOption(options);
  if (ssl !== undefined) {
    poolConfig.ssl = ssl;
  }

  return new Pool(poolConfig);
}

export function getPool(): Pool {
  if (!poolInstance) {
    poolInstance = createPool();
  }

  return poolInstance;
}

export function createDb(pool: Pool = getPool()): Database {
  return drizzle(pool, { schema });
}

export function getDb(): Database {
  if (!dbInstance) {
    dbInstance = createDb();
  }

  return dbInstance;
}

async function listExistingTables(pool: Pool): Promise<Set<string>> {
  const result = await pool.query<{ table_name: string }>(
    "SELECT table_name FROM information_schema.tables WHERE table_schema = 'public'",
  );
  return new Set(result.rows.map((row) => row.table_name));
}

/**
 * Creates missing tables and their indexes; existing tables are left untouched.
 * Returns the names of the tables it created.
 */
export async function ensureSchema(pool: Pool = getPool()): Promise<string[]> {
  const existing = await listExistingTables(pool);
  const created: string[] = [];

  for (const table of schema.SCHEMA_TABLES) {
    if (existing.has(table.name)) {
      continue;
    }
    for (const statement of table.statements) {
      await pool.query(statement);
    }
    created.push(table.name);
  }

  return created;
}
