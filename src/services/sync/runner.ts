/**
 * Sync Runner - The body of one scheduler trigger
 *
 * No timers live here: cron (or any external trigger) calls `tick()`, which
 * asks the scheduling policy whether anything is due and runs at most one
 * sync for the connection. Mutual exclusion per connection comes from the
 * orchestrator's running-run check backed by a partial unique index.
 */

import { scheduleLogger, type Logger } from "../../logger.js";
import { IngestionOrchestrator, type SyncCompletionListener } from "./orchestrator.js";
import { SyncAlreadyPendingError, SyncAlreadyRunningError } from "./errors.js";

import type { ConnectionRepository } from "./connections.js";
import type { EntityRepository } from "./entities.js";
import type { RawEventRepository } from "./raw-events.js";
import type { SyncRunRepository } from "./runs.js";
import type { AppConfig } from "../../config.js";
import type { Connection, SyncRun } from "../../db/types.js";
import type { ResourceSource } from "../../remote/client.js";
import type { SyncMode, SyncTrigger } from "../../types/index.js";
import type { SchedulingPolicy } from "../scheduling/policy.js";

export interface SyncRuntime {
  config: AppConfig;
  runs: SyncRunRepository;
  rawEvents: RawEventRepository;
  entities: EntityRepository;
  connections: ConnectionRepository;
  escalation: SyncCompletionListener;
  createSource(connection: Connection): ResourceSource;
  now?: () => Date;
  clock?: () => number;
  logger?: Logger;
}

export type TickOutcome =
  | {
      action: "executed";
      reason: "pending" | "full" | "incremental";
      run: SyncRun;
    }
  | {
      action: "idle";
      reason: "no_connection" | "already_running" | "not_due";
    };

export class ConnectionNotFoundError extends Error {
  constructor(public connectionId: number | null) {
    super(
      connectionId === null
        ? "No connection configured"
        : `Connection ${String(connectionId)} not found`
    );
    this.name = "ConnectionNotFoundError";
  }
}

export class SyncScheduler {
  private readonly log: Logger;

  constructor(
    private readonly runtime: SyncRuntime,
    private readonly policy: SchedulingPolicy
  ) {
    this.log = runtime.logger ?? scheduleLogger;
  }

  /**
   * A queued run first, then a due full sync, then a due incremental sync
   */
  async tick(connectionId?: number): Promise<TickOutcome> {
    const connection = await this.findConnection(connectionId);
    if (connection === null) {
      this.log.warn({ connectionId }, "Tick skipped: no connection");
      return { action: "idle", reason: "no_connection" };
    }

    const running = await this.runtime.runs.findRunning(connection.id);
    if (running !== null) {
      this.log.info(
        { connectionId: connection.id, runId: running.id },
        "Tick skipped: a sync is already running"
      );
      return { action: "idle", reason: "already_running" };
    }

    const pending = await this.runtime.runs.findPending(connection.id);
    if (pending !== null) {
      return {
        action: "executed",
        reason: "pending",
        run: await this.execute(connection, pending),
      };
    }

    if (this.policy.isFullSyncDue()) {
      return {
        action: "executed",
        reason: "full",
        run: await this.runNow(connection.id, "full", "schedule"),
      };
    }

    if (
      this.runtime.config.features.incrementalSync &&
      this.policy.shouldSyncNow()
    ) {
      return {
        action: "executed",
        reason: "incremental",
        run: await this.runNow(connection.id, "incremental", "schedule"),
      };
    }

    this.log.debug(
      {
        connectionId: connection.id,
        next: this.policy.getNextSyncTime().toISOString(),
      },
      "Tick: nothing due"
    );
    return { action: "idle", reason: "not_due" };
  }

  /**
   * Create a run and execute it immediately. When another trigger starts a
   * run first, the new run is deleted before the conflict is rethrown.
   */
  async runNow(
    connectionId: number,
    mode: SyncMode,
    triggeredBy: SyncTrigger
  ): Promise<SyncRun> {
    const connection = await this.findConnection(connectionId);
    if (connection === null) {
      throw new ConnectionNotFoundError(connectionId);
    }

    const running = await this.runtime.runs.findRunning(connection.id);
    if (running !== null) {
      throw new SyncAlreadyRunningError(connection.id, running.id);
    }

    const run = await this.runtime.runs.create({
      connectionId: connection.id,
      mode,
      triggeredBy,
    });
    try {
      return await this.execute(connection, run);
    } catch (error) {
      if (error instanceof SyncAlreadyRunningError) {
        await this.runtime.runs.discardPending(run.id);
        this.log.warn(
          {
            connectionId: connection.id,
            runId: run.id,
            runningRunId: error.runningRunId,
          },
          "Sync run discarded: another run started first"
        );
      }
      throw error;
    }
  }

  /**
   * Queue a run for the next tick. Refuses while another run of the
   * connection is queued or running.
   */
  async requestRun(
    connectionId: number,
    mode: SyncMode,
    triggeredBy: SyncTrigger = "api"
  ): Promise<SyncRun> {
    const connection = await this.findConnection(connectionId);
    if (connection === null) {
      throw new ConnectionNotFoundError(connectionId);
    }

    const running = await this.runtime.runs.findRunning(connection.id);
    if (running !== null) {
      throw new SyncAlreadyRunningError(connection.id, running.id);
    }
    const pending = await this.runtime.runs.findPending(connection.id);
    if (pending !== null) {
      throw new SyncAlreadyPendingError(connection.id, pending.id);
    }

    const run = await this.runtime.runs.create({
      connectionId: connection.id,
      mode,
      triggeredBy,
    });
    this.log.info(
      { connectionId: connection.id, runId: run.id, mode, triggeredBy },
      "Sync run queued"
    );
    return run;
  }

  private async execute(connection: Connection, run: SyncRun): Promise<SyncRun> {
    const orchestrator = new IngestionOrchestrator({
      source: this.runtime.createSource(connection),
      runs: this.runtime.runs,
      rawEvents: this.runtime.rawEvents,
      entities: this.runtime.entities,
      connections: this.runtime.connections,
      escalation: this.runtime.escalation,
      config: this.runtime.config,
      now: this.runtime.now,
      clock: this.runtime.clock,
      logger: this.runtime.logger,
    });
    return orchestrator.execute(run);
  }

  private async findConnection(
    connectionId: number | undefined
  ): Promise<Connection | null> {
    return connectionId === undefined
      ? this.runtime.connections.findDefault()
      : this.runtime.connections.findById(connectionId);
  }
}
