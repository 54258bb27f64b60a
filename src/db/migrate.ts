import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import { dbLogger as logger } from "../logger.js";
import { pool } from "./connection.js";

const schemaPath = join(
  dirname(fileURLToPath(import.meta.url)),
  "postgres-schema.sql"
);

/**
 * Tables created by postgres-schema.sql, parents before children
 */
export const SCHEMA_TABLES = [
  "settings",
  "connections",
  "sync_runs",
  "raw_events",
  "sync_failure_alerts",
  "properties",
  "units",
  "vendors",
  "leases",
  "work_orders",
  "expenses",
] as const;

export type SchemaTable = (typeof SCHEMA_TABLES)[number];

export interface SchemaStatus {
  present: SchemaTable[];
  missing: SchemaTable[];
}

export interface TableStat {
  table: SchemaTable;
  rows: number;
}

// ============================================================================
// Migration
// ============================================================================

/**
 * Apply postgres-schema.sql in one transaction. The script is idempotent;
 * `fresh` drops this service's tables first and leaves anything else in the
 * database alone.
 */
export async function runMigration(options?: { fresh?: boolean }): Promise<void> {
  const schema = readFileSync(schemaPath, "utf8");
  const client = await pool.connect();

  try {
    await client.query("BEGIN");

    if (options?.fresh === true) {
      const dropOrder = [...SCHEMA_TABLES].reverse();
      logger.warn({ tables: dropOrder }, "Dropping tables");
      await client.query(`DROP TABLE IF EXISTS ${dropOrder.join(", ")} CASCADE`);
    }

    await client.query(schema);
    await client.query("COMMIT");

    logger.info({ fresh: options?.fresh === true }, "Schema migration applied");
  } catch (error) {
    await client.query("ROLLBACK");
    logger.error({ error }, "Schema migration failed");
    throw error;
  } finally {
    client.release();
  }
}

// ============================================================================
// Inspection
// ============================================================================

function isSchemaTable(name: string): name is SchemaTable {
  return SCHEMA_TABLES.some((table) => table === name);
}

export async function getSchemaStatus(): Promise<SchemaStatus> {
  const result = await pool.query<{ table_name: string }>(
    `SELECT table_name
     FROM information_schema.tables
     WHERE table_schema = 'public' AND table_name = ANY($1::text[])`,
    [SCHEMA_TABLES]
  );
  const found = new Set(result.rows.map((row) => row.table_name));

  return {
    present: SCHEMA_TABLES.filter((table) => found.has(table)),
    missing: SCHEMA_TABLES.filter((table) => !found.has(table)),
  };
}

/**
 * Estimated row counts from pg_stat_user_tables, in schema order
 */
export async function getTableStats(): Promise<TableStat[]> {
  const result = await pool.query<{ relname: string; rows: number }>(
    `SELECT relname, n_live_tup::int AS rows
     FROM pg_stat_user_tables
     WHERE schemaname = 'public' AND relname = ANY($1::text[])`,
    [SCHEMA_TABLES]
  );

  const counts = new Map<SchemaTable, number>();
  for (const row of result.rows) {
    if (isSchemaTable(row.relname)) {
      counts.set(row.relname, row.rows);
    }
  }

  return SCHEMA_TABLES.filter((table) => counts.has(table)).map((table) => ({
    table,
    rows: counts.get(table) ?? 0,
  }));
}
