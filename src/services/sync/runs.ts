/**
 * Sync Run Repository - Lifecycle persistence for sync runs
 *
 * Every write after start is guarded by `status = 'running'`, so a
 * terminal run is never modified again.
 */

import { sql, type Kysely } from "kysely";

import { jsonb } from "../../db/connection.js";
import {
  RunStateError,
  SyncAlreadyRunningError,
  isUniqueViolation,
} from "./errors.js";

import type { Database, SyncRun } from "../../db/types.js";
import type {
  ResourceErrorEntry,
  ResourceErrorsMap,
  ResourceMetrics,
  ResourceMetricsMap,
  ResourceType,
  SyncMode,
  SyncRunStatus,
  SyncTrigger,
} from "../../types/index.js";
import type { CursorPayload } from "../../utils/pagination.js";

// ============================================================================
// Types
// ============================================================================

export interface NewRunInput {
  connectionId: number;
  mode: SyncMode;
  triggeredBy: SyncTrigger;
}

export interface RunFinalization {
  status: "completed" | "failed";
  endedAt: Date;
  resourcesSynced: number;
  errorsCount: number;
  errorSummary: string | null;
}

export interface RunListOptions {
  connectionId?: number;
  status?: SyncRunStatus;
  /** Keyset position: runs with a smaller id than `cursor.id` */
  cursor?: CursorPayload | null;
  limit: number;
}

export interface SyncRunRepository {
  create(input: NewRunInput): Promise<SyncRun>;
  findById(runId: number): Promise<SyncRun | null>;
  findRunning(connectionId: number): Promise<SyncRun | null>;
  /** Oldest pending run, optionally for one connection */
  findPending(connectionId?: number): Promise<SyncRun | null>;
  findLastCompleted(connectionId: number): Promise<SyncRun | null>;
  /**
   * pending → running. Throws SyncAlreadyRunningError when the connection
   * already has a running run, RunStateError when the run is not pending.
   */
  markRunning(runId: number, startedAt: Date): Promise<SyncRun>;
  /**
   * Store a resource's metrics and error entries. Refuses a second write
   * for the same resource.
   */
  saveResourceResult(
    runId: number,
    resourceType: ResourceType,
    metrics: ResourceMetrics,
    errors: ResourceErrorEntry[]
  ): Promise<void>;
  finalize(runId: number, finalization: RunFinalization): Promise<SyncRun>;
  /** Delete a run that never left `pending` */
  discardPending(runId: number): Promise<void>;
  list(options: RunListOptions): Promise<SyncRun[]>;
}

// ============================================================================
// Kysely Implementation
// ============================================================================

export class KyselySyncRunRepository implements SyncRunRepository {
  constructor(private db: Kysely<Database>) {}

  async create(input: NewRunInput): Promise<SyncRun> {
    return this.db
      .insertInto("sync_runs")
      .values({
        connection_id: input.connectionId,
        mode: input.mode,
        triggered_by: input.triggeredBy,
        status: "pending",
        started_at: null,
        ended_at: null,
        error_summary: null,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  async findById(runId: number): Promise<SyncRun | null> {
    const run = await this.db
      .selectFrom("sync_runs")
      .selectAll()
      .where("id", "=", runId)
      .executeTakeFirst();
    return run ?? null;
  }

  async findRunning(connectionId: number): Promise<SyncRun | null> {
    const run = await this.db
      .selectFrom("sync_runs")
      .selectAll()
      .where("connection_id", "=", connectionId)
      .where("status", "=", "running")
      .executeTakeFirst();
    return run ?? null;
  }

  async findPending(connectionId?: number): Promise<SyncRun | null> {
    let query = this.db
      .selectFrom("sync_runs")
      .selectAll()
      .where("status", "=", "pending");

    if (connectionId !== undefined) {
      query = query.where("connection_id", "=", connectionId);
    }

    const run = await query.orderBy("id", "asc").limit(1).executeTakeFirst();
    return run ?? null;
  }

  async findLastCompleted(connectionId: number): Promise<SyncRun | null> {
    const run = await this.db
      .selectFrom("sync_runs")
      .selectAll()
      .where("connection_id", "=", connectionId)
      .where("status", "=", "completed")
      .orderBy("started_at", "desc")
      .limit(1)
      .executeTakeFirst();
    return run ?? null;
  }

  async markRunning(runId: number, startedAt: Date): Promise<SyncRun> {
    let updated: SyncRun | undefined;
    try {
      updated = await this.db
        .updateTable("sync_runs")
        .set({ status: "running", started_at: startedAt })
        .where("id", "=", runId)
        .where("status", "=", "pending")
        .returningAll()
        .executeTakeFirst();
    } catch (error) {
      if (isUniqueViolation(error)) {
        const run = await this.findById(runId);
        const running =
          run !== null ? await this.findRunning(run.connection_id) : null;
        throw new SyncAlreadyRunningError(
          run?.connection_id ?? 0,
          running?.id ?? null
        );
      }
      throw error;
    }

    if (updated === undefined) {
      throw new RunStateError(`Sync run ${String(runId)} is not pending`);
    }
    return updated;
  }

  async saveResourceResult(
    runId: number,
    resourceType: ResourceType,
    metrics: ResourceMetrics,
    errors: ResourceErrorEntry[]
  ): Promise<void> {
    const result = await this.db
      .updateTable("sync_runs")
      .set({
        resource_metrics: sql<ResourceMetricsMap>`resource_metrics || jsonb_build_object(${resourceType}::text, ${jsonb(metrics)})`,
        resource_errors:
          errors.length > 0
            ? sql<ResourceErrorsMap>`resource_errors || jsonb_build_object(${resourceType}::text, ${jsonb(errors)})`
            : sql<ResourceErrorsMap>`resource_errors`,
      })
      .where("id", "=", runId)
      .where("status", "=", "running")
      .where(sql<boolean>`NOT (resource_metrics ? ${resourceType})`)
      .executeTakeFirst();

    if (result.numUpdatedRows === 0n) {
      throw new RunStateError(
        `Cannot record '${resourceType}' metrics for run ${String(runId)}: run is not running or resource already recorded`
      );
    }
  }

  async finalize(
    runId: number,
    finalization: RunFinalization
  ): Promise<SyncRun> {
    const run = await this.db
      .updateTable("sync_runs")
      .set({
        status: finalization.status,
        ended_at: finalization.endedAt,
        resources_synced: finalization.resourcesSynced,
        errors_count: finalization.errorsCount,
        error_summary: finalization.errorSummary,
      })
      .where("id", "=", runId)
      .where("status", "=", "running")
      .returningAll()
      .executeTakeFirst();

    if (run === undefined) {
      throw new RunStateError(`Sync run ${String(runId)} is not running`);
    }
    return run;
  }

  async discardPending(runId: number): Promise<void> {
    await this.db
      .deleteFrom("sync_runs")
      .where("id", "=", runId)
      .where("status", "=", "pending")
      .execute();
  }

  async list(options: RunListOptions): Promise<SyncRun[]> {
    let query = this.db.selectFrom("sync_runs").selectAll();

    if (options.connectionId !== undefined) {
      query = query.where("connection_id", "=", options.connectionId);
    }
    if (options.status !== undefined) {
      query = query.where("status", "=", options.status);
    }
    if (options.cursor) {
      query = query.where("id", "<", options.cursor.id);
    }

    return query.orderBy("id", "desc").limit(options.limit).execute();
  }
}
