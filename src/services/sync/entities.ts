/**
 * Entity Repository - Idempotent upserts of canonical rows by external id
 *
 * The update set only contains the synchronized columns, so columns owned
 * by other subsystems (property notes, coordinates) survive a re-sync.
 */

import { sql, type Kysely } from "kysely";

import type { Database } from "../../db/types.js";
import type {
  ExpenseValues,
  LeaseValues,
  PropertyValues,
  UnitValues,
  VendorValues,
  WorkOrderValues,
} from "./mappers.js";

// ============================================================================
// Types
// ============================================================================

export type ReferenceTable = "properties" | "units" | "vendors";

export interface UpsertOutcome {
  id: number;
  created: boolean;
}

export type UnitRow = UnitValues & { property_id: number };

export type LeaseRow = LeaseValues & { unit_id: number };

export type WorkOrderRow = WorkOrderValues & {
  property_id: number;
  unit_id: number | null;
  vendor_id: number | null;
};

export type ExpenseRow = ExpenseValues & {
  property_id: number;
  unit_id: number | null;
  vendor_id: number | null;
};

export interface EntityRepository {
  findIdsByExternalIds(
    table: ReferenceTable,
    externalIds: readonly string[]
  ): Promise<Map<string, number>>;
  upsertProperty(
    externalId: string,
    values: PropertyValues
  ): Promise<UpsertOutcome>;
  upsertUnit(externalId: string, values: UnitRow): Promise<UpsertOutcome>;
  upsertVendor(
    externalId: string,
    values: VendorValues
  ): Promise<UpsertOutcome>;
  upsertLease(externalId: string, values: LeaseRow): Promise<UpsertOutcome>;
  upsertWorkOrder(
    externalId: string,
    values: WorkOrderRow
  ): Promise<UpsertOutcome>;
  upsertExpense(
    externalId: string,
    values: ExpenseRow
  ): Promise<UpsertOutcome>;
  /**
   * Derive occupied/vacant from current leases; not_ready units are left
   * alone. Returns the number of units changed.
   */
  refreshUnitOccupancy(today: string): Promise<number>;
}

// ============================================================================
// Helpers
// ============================================================================

// xmax = 0 means the row was inserted, anything else means it was updated
const xmax = sql<string>`xmax::text`.as("xmax");

function toOutcome(row: { id: number; xmax: string }): UpsertOutcome {
  return { id: row.id, created: row.xmax === "0" };
}

const now = sql<Date>`now()`;

// ============================================================================
// Kysely Implementation
// ============================================================================

export class KyselyEntityRepository implements EntityRepository {
  constructor(private db: Kysely<Database>) {}

  async findIdsByExternalIds(
    table: ReferenceTable,
    externalIds: readonly string[]
  ): Promise<Map<string, number>> {
    const ids = [...new Set(externalIds)];
    if (ids.length === 0) {
      return new Map();
    }

    const rows = await this.selectIds(table, ids);
    return new Map(rows.map((row) => [row.external_id, row.id]));
  }

  private selectIds(
    table: ReferenceTable,
    ids: string[]
  ): Promise<{ id: number; external_id: string }[]> {
    switch (table) {
      case "properties":
        return this.db
          .selectFrom("properties")
          .select(["id", "external_id"])
          .where("external_id", "in", ids)
          .execute();
      case "units":
        return this.db
          .selectFrom("units")
          .select(["id", "external_id"])
          .where("external_id", "in", ids)
          .execute();
      case "vendors":
        return this.db
          .selectFrom("vendors")
          .select(["id", "external_id"])
          .where("external_id", "in", ids)
          .execute();
    }
  }

  async upsertProperty(
    externalId: string,
    values: PropertyValues
  ): Promise<UpsertOutcome> {
    const row = await this.db
      .insertInto("properties")
      .values({
        ...values,
        external_id: externalId,
        notes: null,
        latitude: null,
        longitude: null,
      })
      .onConflict((oc) =>
        oc.column("external_id").doUpdateSet({ ...values, updated_at: now })
      )
      .returning(["id", xmax])
      .executeTakeFirstOrThrow();
    return toOutcome(row);
  }

  async upsertUnit(
    externalId: string,
    values: UnitRow
  ): Promise<UpsertOutcome> {
    const row = await this.db
      .insertInto("units")
      .values({ ...values, external_id: externalId })
      .onConflict((oc) =>
        oc.column("external_id").doUpdateSet({ ...values, updated_at: now })
      )
      .returning(["id", xmax])
      .executeTakeFirstOrThrow();
    return toOutcome(row);
  }

  async upsertVendor(
    externalId: string,
    values: VendorValues
  ): Promise<UpsertOutcome> {
    const row = await this.db
      .insertInto("vendors")
      .values({ ...values, external_id: externalId })
      .onConflict((oc) =>
        oc.column("external_id").doUpdateSet({ ...values, updated_at: now })
      )
      .returning(["id", xmax])
      .executeTakeFirstOrThrow();
    return toOutcome(row);
  }

  async upsertLease(
    externalId: string,
    values: LeaseRow
  ): Promise<UpsertOutcome> {
    const row = await this.db
      .insertInto("leases")
      .values({ ...values, external_id: externalId })
      .onConflict((oc) =>
        oc.column("external_id").doUpdateSet({ ...values, updated_at: now })
      )
      .returning(["id", xmax])
      .executeTakeFirstOrThrow();
    return toOutcome(row);
  }

  async upsertWorkOrder(
    externalId: string,
    values: WorkOrderRow
  ): Promise<UpsertOutcome> {
    const row = await this.db
      .insertInto("work_orders")
      .values({ ...values, external_id: externalId })
      .onConflict((oc) =>
        oc.column("external_id").doUpdateSet({ ...values, updated_at: now })
      )
      .returning(["id", xmax])
      .executeTakeFirstOrThrow();
    return toOutcome(row);
  }

  async upsertExpense(
    externalId: string,
    values: ExpenseRow
  ): Promise<UpsertOutcome> {
    const row = await this.db
      .insertInto("expenses")
      .values({ ...values, external_id: externalId })
      .onConflict((oc) =>
        oc.column("external_id").doUpdateSet({ ...values, updated_at: now })
      )
      .returning(["id", xmax])
      .executeTakeFirstOrThrow();
    return toOutcome(row);
  }

  async refreshUnitOccupancy(today: string): Promise<number> {
    const result = await sql`
      WITH derived AS (
        SELECT
          u.id,
          CASE WHEN EXISTS (
            SELECT 1 FROM leases l
            WHERE l.unit_id = u.id
              AND l.status <> 'past'
              AND (l.start_date IS NULL OR l.start_date <= ${today}::date)
              AND (l.end_date IS NULL OR l.end_date >= ${today}::date)
          ) THEN 'occupied' ELSE 'vacant' END AS status
        FROM units u
        WHERE u.status <> 'not_ready'
      )
      UPDATE units
      SET status = derived.status, updated_at = now()
      FROM derived
      WHERE units.id = derived.id AND units.status <> derived.status
    `.execute(this.db);

    return Number(result.numAffectedRows ?? 0n);
  }
}
