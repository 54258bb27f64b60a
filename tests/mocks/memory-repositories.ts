/**
 * In-memory repository fakes
 *
 * Implement the same interfaces as the Kysely repositories so services can
 * be exercised without PostgreSQL.
 */

import { MAX_FAILURE_DETAILS } from "../../src/services/alerts/repository.js";
import {
  RunStateError,
  SyncAlreadyRunningError,
} from "../../src/services/sync/errors.js";

import type {
  Connection,
  RawEvent,
  SyncFailureAlert,
  SyncRun,
} from "../../src/db/types.js";
import type { AlertRepository } from "../../src/services/alerts/repository.js";
import type { SettingOverride } from "../../src/config.js";
import type { SettingsRepository } from "../../src/services/settings.js";
import type {
  ConnectionRepository,
  ConnectionStatusUpdate,
  SaveConnectionInput,
} from "../../src/services/sync/connections.js";
import type {
  EntityRepository,
  ReferenceTable,
  UpsertOutcome,
} from "../../src/services/sync/entities.js";
import type {
  NewRawEventInput,
  RawEventRepository,
  UnprocessedQuery,
} from "../../src/services/sync/raw-events.js";
import type {
  NewRunInput,
  RunFinalization,
  RunListOptions,
  SyncRunRepository,
} from "../../src/services/sync/runs.js";
import type {
  FailureDetail,
  ResourceErrorEntry,
  ResourceMetrics,
  ResourceType,
} from "../../src/types/index.js";

const EPOCH = new Date("2024-01-01T00:00:00.000Z");

// ============================================================================
// Sync Runs
// ============================================================================

export class MemorySyncRunRepository implements SyncRunRepository {
  readonly rows: SyncRun[] = [];
  private nextId = 1;

  seed(overrides: Partial<SyncRun> = {}): SyncRun {
    const run: SyncRun = {
      id: this.nextId++,
      connection_id: 1,
      mode: "full",
      status: "pending",
      triggered_by: "cli",
      started_at: null,
      ended_at: null,
      resources_synced: 0,
      errors_count: 0,
      error_summary: null,
      resource_metrics: {},
      resource_errors: {},
      created_at: EPOCH,
      ...overrides,
    };
    if (run.id >= this.nextId) {
      this.nextId = run.id + 1;
    }
    this.rows.push(run);
    return { ...run };
  }

  async create(input: NewRunInput): Promise<SyncRun> {
    return this.seed({
      connection_id: input.connectionId,
      mode: input.mode,
      triggered_by: input.triggeredBy,
    });
  }

  async findById(runId: number): Promise<SyncRun | null> {
    const run = this.rows.find((row) => row.id === runId);
    return run !== undefined ? { ...run } : null;
  }

  async findRunning(connectionId: number): Promise<SyncRun | null> {
    const run = this.rows.find(
      (row) => row.connection_id === connectionId && row.status === "running"
    );
    return run !== undefined ? { ...run } : null;
  }

  async findPending(connectionId?: number): Promise<SyncRun | null> {
    const run = this.rows.find(
      (row) =>
        row.status === "pending" &&
        (connectionId === undefined || row.connection_id === connectionId)
    );
    return run !== undefined ? { ...run } : null;
  }

  async findLastCompleted(connectionId: number): Promise<SyncRun | null> {
    const completed = this.rows
      .filter(
        (row) =>
          row.connection_id === connectionId && row.status === "completed"
      )
      .sort(
        (a, b) =>
          (b.started_at?.getTime() ?? 0) - (a.started_at?.getTime() ?? 0)
      );
    const [run] = completed;
    return run !== undefined ? { ...run } : null;
  }

  async markRunning(runId: number, startedAt: Date): Promise<SyncRun> {
    const run = this.require(runId);
    if (run.status !== "pending") {
      throw new RunStateError(`Sync run ${String(runId)} is not pending`);
    }
    const running = this.rows.find(
      (row) =>
        row.connection_id === run.connection_id && row.status === "running"
    );
    if (running !== undefined) {
      throw new SyncAlreadyRunningError(run.connection_id, running.id);
    }
    run.status = "running";
    run.started_at = startedAt;
    return { ...run };
  }

  async saveResourceResult(
    runId: number,
    resourceType: ResourceType,
    metrics: ResourceMetrics,
    errors: ResourceErrorEntry[]
  ): Promise<void> {
    const run = this.require(runId);
    if (run.status !== "running" || resourceType in run.resource_metrics) {
      throw new RunStateError(
        `Cannot record '${resourceType}' metrics for run ${String(runId)}`
      );
    }
    run.resource_metrics = { ...run.resource_metrics, [resourceType]: metrics };
    if (errors.length > 0) {
      run.resource_errors = { ...run.resource_errors, [resourceType]: errors };
    }
  }

  async finalize(
    runId: number,
    finalization: RunFinalization
  ): Promise<SyncRun> {
    const run = this.require(runId);
    if (run.status !== "running") {
      throw new RunStateError(`Sync run ${String(runId)} is not running`);
    }
    run.status = finalization.status;
    run.ended_at = finalization.endedAt;
    run.resources_synced = finalization.resourcesSynced;
    run.errors_count = finalization.errorsCount;
    run.error_summary = finalization.errorSummary;
    return { ...run };
  }

  async discardPending(runId: number): Promise<void> {
    const index = this.rows.findIndex(
      (row) => row.id === runId && row.status === "pending"
    );
    if (index !== -1) {
      this.rows.splice(index, 1);
    }
  }

  async list(options: RunListOptions): Promise<SyncRun[]> {
    return this.rows
      .filter(
        (row) =>
          (options.connectionId === undefined ||
            row.connection_id === options.connectionId) &&
          (options.status === undefined || row.status === options.status) &&
          (options.cursor == null || row.id < options.cursor.id)
      )
      .sort((a, b) => b.id - a.id)
      .slice(0, options.limit)
      .map((row) => ({ ...row }));
  }

  private require(runId: number): SyncRun {
    const run = this.rows.find((row) => row.id === runId);
    if (run === undefined) {
      throw new RunStateError(`Sync run ${String(runId)} does not exist`);
    }
    return run;
  }
}

// ============================================================================
// Raw Events
// ============================================================================

export class MemoryRawEventRepository implements RawEventRepository {
  readonly rows: RawEvent[] = [];
  private nextId = 1;

  async insert(event: NewRawEventInput): Promise<number> {
    const id = this.nextId++;
    this.rows.push({
      id,
      sync_run_id: event.syncRunId,
      resource_type: event.resourceType,
      external_id: event.externalId,
      payload: event.payload,
      pulled_at: EPOCH,
      processed_at: null,
    });
    return id;
  }

  async markProcessed(eventId: number, processedAt: Date): Promise<void> {
    const row = this.rows.find((r) => r.id === eventId);
    if (row !== undefined && row.processed_at === null) {
      row.processed_at = processedAt;
    }
  }

  async listUnprocessed(query: UnprocessedQuery): Promise<RawEvent[]> {
    return this.rows
      .filter(
        (row) =>
          this.isPending(row) &&
          (query.resourceType === undefined ||
            row.resource_type === query.resourceType) &&
          (query.afterId === undefined || row.id > query.afterId)
      )
      .slice(0, query.limit)
      .map((row) => ({ ...row }));
  }

  async countUnprocessed(resourceType?: ResourceType): Promise<number> {
    return this.rows.filter(
      (row) =>
        this.isPending(row) &&
        (resourceType === undefined || row.resource_type === resourceType)
    ).length;
  }

  private isPending(row: RawEvent): boolean {
    return (
      row.processed_at === null &&
      !this.rows.some(
        (other) =>
          other.id > row.id &&
          other.resource_type === row.resource_type &&
          row.external_id !== null &&
          other.external_id === row.external_id
      )
    );
  }

  unprocessedIds(): number[] {
    return this.rows.filter((r) => r.processed_at === null).map((r) => r.id);
  }
}

// ============================================================================
// Canonical Entities
// ============================================================================

type EntityTable =
  | "properties"
  | "units"
  | "vendors"
  | "leases"
  | "work_orders"
  | "expenses";

interface StoredEntity {
  id: number;
  values: Record<string, unknown>;
}

export class MemoryEntityRepository implements EntityRepository {
  readonly tables: Record<EntityTable, Map<string, StoredEntity>> = {
    properties: new Map(),
    units: new Map(),
    vendors: new Map(),
    leases: new Map(),
    work_orders: new Map(),
    expenses: new Map(),
  };
  readonly lookups: { table: ReferenceTable; externalIds: string[] }[] = [];
  occupancyRefreshes: string[] = [];
  private nextId = 100;

  /** External ids whose upsert throws */
  readonly failOn = new Set<string>();

  seed(table: EntityTable, externalId: string, id?: number): number {
    const assigned = id ?? this.nextId++;
    this.tables[table].set(externalId, { id: assigned, values: {} });
    return assigned;
  }

  async findIdsByExternalIds(
    table: ReferenceTable,
    externalIds: readonly string[]
  ): Promise<Map<string, number>> {
    this.lookups.push({ table, externalIds: [...externalIds] });
    const found = new Map<string, number>();
    for (const externalId of externalIds) {
      const row = this.tables[table].get(externalId);
      if (row !== undefined) {
        found.set(externalId, row.id);
      }
    }
    return found;
  }

  upsertProperty(externalId: string, values: object): Promise<UpsertOutcome> {
    return this.upsert("properties", externalId, values);
  }

  upsertUnit(externalId: string, values: object): Promise<UpsertOutcome> {
    return this.upsert("units", externalId, values);
  }

  upsertVendor(externalId: string, values: object): Promise<UpsertOutcome> {
    return this.upsert("vendors", externalId, values);
  }

  upsertLease(externalId: string, values: object): Promise<UpsertOutcome> {
    return this.upsert("leases", externalId, values);
  }

  upsertWorkOrder(externalId: string, values: object): Promise<UpsertOutcome> {
    return this.upsert("work_orders", externalId, values);
  }

  upsertExpense(externalId: string, values: object): Promise<UpsertOutcome> {
    return this.upsert("expenses", externalId, values);
  }

  async refreshUnitOccupancy(today: string): Promise<number> {
    this.occupancyRefreshes.push(today);
    return 0;
  }

  valuesOf(table: EntityTable, externalId: string): Record<string, unknown> | undefined {
    return this.tables[table].get(externalId)?.values;
  }

  private async upsert(
    table: EntityTable,
    externalId: string,
    values: object
  ): Promise<UpsertOutcome> {
    if (this.failOn.has(externalId)) {
      throw new Error(`constraint violation on ${externalId}`);
    }
    const existing = this.tables[table].get(externalId);
    if (existing !== undefined) {
      existing.values = { ...values };
      return { id: existing.id, created: false };
    }
    const id = this.nextId++;
    this.tables[table].set(externalId, { id, values: { ...values } });
    return { id, created: true };
  }
}

// ============================================================================
// Connections
// ============================================================================

export function buildConnection(overrides: Partial<Connection> = {}): Connection {
  return {
    id: 1,
    name: "Primary",
    base_url: "https://api.example.test",
    client_id: "test-client",
    client_secret_encrypted: "encrypted-placeholder",
    status: "configured",
    last_success_at: null,
    last_error: null,
    created_at: EPOCH,
    updated_at: EPOCH,
    ...overrides,
  };
}

export class MemoryConnectionRepository implements ConnectionRepository {
  readonly rows: Connection[];
  readonly statusUpdates: { connectionId: number; update: ConnectionStatusUpdate }[] = [];

  constructor(rows: Connection[] = [buildConnection()]) {
    this.rows = rows;
  }

  async findById(connectionId: number): Promise<Connection | null> {
    return this.rows.find((row) => row.id === connectionId) ?? null;
  }

  async findDefault(): Promise<Connection | null> {
    return [...this.rows].sort((a, b) => a.id - b.id)[0] ?? null;
  }

  async list(): Promise<Connection[]> {
    return [...this.rows];
  }

  async save(
    input: SaveConnectionInput,
    connectionId?: number
  ): Promise<Connection> {
    const connection = buildConnection({
      id: connectionId ?? this.rows.length + 1,
      name: input.name,
      base_url: input.baseUrl,
      client_id: input.clientId,
      client_secret_encrypted: input.clientSecretEncrypted,
    });
    const index = this.rows.findIndex((row) => row.id === connection.id);
    if (index >= 0) {
      this.rows[index] = connection;
    } else {
      this.rows.push(connection);
    }
    return connection;
  }

  async updateStatus(
    connectionId: number,
    update: ConnectionStatusUpdate
  ): Promise<void> {
    this.statusUpdates.push({ connectionId, update });
    const row = this.rows.find((r) => r.id === connectionId);
    if (row === undefined) return;
    row.status = update.status;
    if (update.lastError !== undefined) row.last_error = update.lastError;
    if (update.lastSuccessAt !== undefined) row.last_success_at = update.lastSuccessAt;
  }
}

// ============================================================================
// Alerts
// ============================================================================

export class MemoryAlertRepository implements AlertRepository {
  readonly rows: SyncFailureAlert[] = [];
  private nextId = 1;

  async findById(alertId: number): Promise<SyncFailureAlert | null> {
    const row = this.rows.find((r) => r.id === alertId);
    return row !== undefined ? { ...row } : null;
  }

  async findByConnection(
    connectionId: number
  ): Promise<SyncFailureAlert | null> {
    const row = this.rows.find((r) => r.connection_id === connectionId);
    return row !== undefined ? { ...row } : null;
  }

  async listActive(): Promise<SyncFailureAlert[]> {
    return this.rows
      .filter((r) => r.consecutive_failures > 0 && r.acknowledged_at === null)
      .sort(
        (a, b) =>
          b.consecutive_failures - a.consecutive_failures ||
          a.connection_id - b.connection_id
      )
      .map((r) => ({ ...r }));
  }

  async recordFailure(
    connectionId: number,
    detail: FailureDetail,
    maxDetails = MAX_FAILURE_DETAILS
  ): Promise<SyncFailureAlert> {
    const row = this.getOrCreate(connectionId);
    row.consecutive_failures++;
    row.failure_details = [...row.failure_details, detail].slice(-maxDetails);
    row.acknowledged_at = null;
    row.acknowledged_by = null;
    return { ...row };
  }

  async resetFailures(
    connectionId: number,
    at: Date
  ): Promise<SyncFailureAlert> {
    const row = this.getOrCreate(connectionId);
    row.consecutive_failures = 0;
    row.failure_details = [];
    row.updated_at = at;
    return { ...row };
  }

  async markAlertSent(alertId: number, at: Date): Promise<void> {
    const row = this.rows.find((r) => r.id === alertId);
    if (row !== undefined) {
      row.last_alert_sent_at = at;
    }
  }

  async acknowledge(
    alertId: number,
    user: string,
    at: Date
  ): Promise<SyncFailureAlert | null> {
    const row = this.rows.find((r) => r.id === alertId);
    if (row === undefined) {
      return null;
    }
    row.acknowledged_at = at;
    row.acknowledged_by = user;
    return { ...row };
  }

  private getOrCreate(connectionId: number): SyncFailureAlert {
    let row = this.rows.find((r) => r.connection_id === connectionId);
    if (row === undefined) {
      row = {
        id: this.nextId++,
        connection_id: connectionId,
        consecutive_failures: 0,
        last_alert_sent_at: null,
        acknowledged_at: null,
        acknowledged_by: null,
        failure_details: [],
        created_at: EPOCH,
        updated_at: EPOCH,
      };
      this.rows.push(row);
    }
    return row;
  }
}

// ============================================================================
// Settings
// ============================================================================

export class MemorySettingsRepository implements SettingsRepository {
  constructor(readonly rows: SettingOverride[] = []) {}

  async list(): Promise<SettingOverride[]> {
    return [...this.rows];
  }

  async set(category: string, key: string, value: unknown): Promise<void> {
    const existing = this.rows.find(
      (row) => row.category === category && row.key === key
    );
    if (existing !== undefined) {
      existing.value = value;
    } else {
      this.rows.push({ category, key, value });
    }
  }
}
