export { createDb, createPool, ensureSchema, getDb, getPool, type Database } from "./client.js";

export * from "./schema.js";
