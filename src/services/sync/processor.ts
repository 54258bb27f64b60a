/**
 * Record Processor - Map, resolve references, upsert
 *
 * Shared by live ingestion and raw-event replay. Holds a per-instance
 * external id → local id cache for referenced entities, filled in batches
 * per page and by every property/unit/vendor it writes.
 */

import {
  REQUIRED_REFERENCES,
  mapRecord,
  type MappedRecord,
  type RecordReferences,
} from "./mappers.js";

import type {
  EntityRepository,
  ReferenceTable,
  UpsertOutcome,
} from "./entities.js";
import type { RemoteRecord, ResourceType } from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export type ProcessOutcome =
  | { status: "created"; id: number }
  | { status: "updated"; id: number }
  | { status: "skipped"; reason: string };

type ResolvedReferences = Record<keyof RecordReferences, number | null>;

const REFERENCE_TABLES: Record<keyof RecordReferences, ReferenceTable> = {
  property: "properties",
  unit: "units",
  vendor: "vendors",
};

const REFERENCE_KEYS = ["property", "unit", "vendor"] as const;

// ============================================================================
// Processor
// ============================================================================

export class RecordProcessor {
  private readonly cache: Record<ReferenceTable, Map<string, number>> = {
    properties: new Map(),
    units: new Map(),
    vendors: new Map(),
  };

  constructor(private readonly entities: EntityRepository) {}

  /**
   * Throws RecordMappingError when the record cannot be mapped
   */
  map(resourceType: ResourceType, record: RemoteRecord): MappedRecord {
    return mapRecord(resourceType, record);
  }

  /**
   * Load every reference of a batch that is not cached yet, one query per
   * referenced table
   */
  async prefetchReferences(records: readonly MappedRecord[]): Promise<void> {
    for (const key of REFERENCE_KEYS) {
      const table = REFERENCE_TABLES[key];
      const missing = new Set<string>();
      for (const record of records) {
        const externalId = record.references[key] ?? null;
        if (externalId !== null && !this.cache[table].has(externalId)) {
          missing.add(externalId);
        }
      }
      if (missing.size === 0) {
        continue;
      }

      const found = await this.entities.findIdsByExternalIds(table, [
        ...missing,
      ]);
      for (const [externalId, id] of found) {
        this.cache[table].set(externalId, id);
      }
    }
  }

  /**
   * Resolve references and upsert. Records whose required references do
   * not exist locally are skipped, never stored as orphans.
   */
  async store(record: MappedRecord): Promise<ProcessOutcome> {
    const resolved: ResolvedReferences = {
      property: null,
      unit: null,
      vendor: null,
    };

    for (const key of REFERENCE_KEYS) {
      const externalId = record.references[key] ?? null;
      const required = REQUIRED_REFERENCES[record.resourceType].includes(key);

      if (externalId === null) {
        if (required) {
          return { status: "skipped", reason: `missing ${key} reference` };
        }
        continue;
      }

      const id = await this.lookup(REFERENCE_TABLES[key], externalId);
      if (id === null && required) {
        return {
          status: "skipped",
          reason: `${key} ${externalId} not found`,
        };
      }
      resolved[key] = id;
    }

    const outcome = await this.upsert(record, resolved);
    return outcome.created
      ? { status: "created", id: outcome.id }
      : { status: "updated", id: outcome.id };
  }

  private async lookup(
    table: ReferenceTable,
    externalId: string
  ): Promise<number | null> {
    const cached = this.cache[table].get(externalId);
    if (cached !== undefined) {
      return cached;
    }

    const found = await this.entities.findIdsByExternalIds(table, [
      externalId,
    ]);
    const id = found.get(externalId);
    if (id === undefined) {
      return null;
    }
    this.cache[table].set(externalId, id);
    return id;
  }

  private async upsert(
    record: MappedRecord,
    refs: ResolvedReferences
  ): Promise<UpsertOutcome> {
    switch (record.resourceType) {
      case "properties": {
        const outcome = await this.entities.upsertProperty(
          record.externalId,
          record.values
        );
        this.cache.properties.set(record.externalId, outcome.id);
        return outcome;
      }
      case "units": {
        const outcome = await this.entities.upsertUnit(record.externalId, {
          ...record.values,
          property_id: requireId(refs.property),
        });
        this.cache.units.set(record.externalId, outcome.id);
        return outcome;
      }
      case "vendors": {
        const outcome = await this.entities.upsertVendor(
          record.externalId,
          record.values
        );
        this.cache.vendors.set(record.externalId, outcome.id);
        return outcome;
      }
      case "leases":
        return this.entities.upsertLease(record.externalId, {
          ...record.values,
          unit_id: requireId(refs.unit),
        });
      case "work_orders":
        return this.entities.upsertWorkOrder(record.externalId, {
          ...record.values,
          property_id: requireId(refs.property),
          unit_id: refs.unit,
          vendor_id: refs.vendor,
        });
      case "expenses":
        return this.entities.upsertExpense(record.externalId, {
          ...record.values,
          property_id: requireId(refs.property),
          unit_id: refs.unit,
          vendor_id: refs.vendor,
        });
    }
  }
}

// Required references were checked in store()
function requireId(id: number | null): number {
  if (id === null) {
    throw new Error("Required reference was not resolved");
  }
  return id;
}
