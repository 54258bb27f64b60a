import { Kysely, PostgresDialect, sql, type RawBuilder } from "kysely";
import pg from "pg";

import { dbLogger } from "../logger.js";

import type { Database } from "./types.js";

const { Pool, types } = pg;

// JSON columns (payloads, metrics, failure details) arrive parsed
const parseJson = (val: string): unknown => JSON.parse(val);
types.setTypeParser(types.builtins.JSON, parseJson);
types.setTypeParser(types.builtins.JSONB, parseJson);

// Money and measurement columns and bigint ids/counts come back as numbers,
// calendar dates as plain YYYY-MM-DD strings (no timezone shift)
types.setTypeParser(types.builtins.NUMERIC, (val: string) => Number(val));
types.setTypeParser(types.builtins.INT8, (val: string) => Number(val));
types.setTypeParser(types.builtins.DATE, (val: string) => val);

/**
 * Serialize a value for a jsonb column
 */
export function jsonb<T>(value: T): RawBuilder<T> {
  return sql<T>`${JSON.stringify(value)}::jsonb`;
}

// ============================================================================
// Pool and Kysely Instance
// ============================================================================

const DATABASE_URL =
  process.env.DATABASE_URL ?? "postgresql://localhost:5432/property_ingest";

function readPositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

// No connection is opened until the first query
export const pool = new Pool({
  connectionString: DATABASE_URL,
  application_name: "property-ingest",
  max: readPositiveInt(process.env.DB_POOL_MAX, 10),
  statement_timeout: readPositiveInt(process.env.DB_STATEMENT_TIMEOUT_MS, 60_000),
  idleTimeoutMillis: 30_000,
  connectionTimeoutMillis: 5000,
});

// Errors raised by idle clients
pool.on("error", (error) => {
  dbLogger.error({ error: error.message }, "Idle database client error");
});

export const db = new Kysely<Database>({
  dialect: new PostgresDialect({ pool }),
});

// ============================================================================
// Connection Management
// ============================================================================

export async function checkConnection(): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(db);
    return true;
  } catch (error) {
    dbLogger.warn({ error }, "Database health check failed");
    return false;
  }
}

/**
 * Destroy the Kysely instance, which ends the pool
 */
export async function closeConnection(): Promise<void> {
  try {
    await db.destroy();
    dbLogger.debug("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}

/**
 * The configured URL with its password masked
 */
export function getDatabaseUrl(): string {
  const url = new URL(DATABASE_URL);
  if (url.password !== "") {
    url.password = "****";
  }
  return url.toString();
}

export function getPoolStats(): {
  totalCount: number;
  idleCount: number;
  waitingCount: number;
} {
  return {
    totalCount: pool.totalCount,
    idleCount: pool.idleCount,
    waitingCount: pool.waitingCount,
  };
}
