/**
 * Ingestion Orchestrator - Drives one sync run end to end
 *
 * Lifecycle: startSync → processResource (per type, at most once) →
 * completeSync | failSync. Record-level errors are recorded on the
 * resource's tracker and processing continues; a resource-level error
 * aborts that resource and makes the run fail. Completion always hands the
 * finished run to the escalation service.
 *
 * One orchestrator instance drives exactly one run.
 */

import { syncLogger, type Logger } from "../../logger.js";
import { RESOURCE_TYPES } from "../../types/index.js";
import { errorMessage } from "../../utils/guards.js";
import { localDateString } from "../../utils/time.js";
import {
  ResourceAlreadyProcessedError,
  RunStateError,
  SyncAlreadyRunningError,
} from "./errors.js";
import { extractExternalId, type MappedRecord } from "./mappers.js";
import { RecordProcessor } from "./processor.js";
import { ResourceSyncTracker } from "./tracker.js";

import type { ConnectionRepository } from "./connections.js";
import type { EntityRepository } from "./entities.js";
import type { RawEventRepository } from "./raw-events.js";
import type { RunFinalization, SyncRunRepository } from "./runs.js";
import type { AppConfig } from "../../config.js";
import type { SyncRun } from "../../db/types.js";
import type { ResourceSource } from "../../remote/client.js";
import type {
  ResourceMetrics,
  ResourcePage,
  ResourceType,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Receives every finished run, completed or failed
 */
export interface SyncCompletionListener {
  handleSyncCompleted(run: SyncRun): Promise<unknown>;
}

export interface IngestionDependencies {
  source: ResourceSource;
  runs: SyncRunRepository;
  rawEvents: RawEventRepository;
  entities: EntityRepository;
  connections: Pick<ConnectionRepository, "updateStatus">;
  escalation: SyncCompletionListener;
  config: AppConfig;
  now?: () => Date;
  /** Monotonic milliseconds, for durations */
  clock?: () => number;
  logger?: Logger;
}

/** Record errors listed in a completed run's summary */
const SUMMARY_ERROR_LIMIT = 10;

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// Orchestrator
// ============================================================================

export class IngestionOrchestrator {
  private run: SyncRun | null = null;
  private modifiedSince: Date | undefined;
  private readonly trackers = new Map<ResourceType, ResourceSyncTracker>();
  /** Resource failures that could not be recorded on a tracker */
  private readonly untrackedFailures: { resourceType: ResourceType; message: string }[] = [];
  private readonly processor: RecordProcessor;
  private readonly now: () => Date;
  private log: Logger;

  constructor(private readonly deps: IngestionDependencies) {
    this.processor = new RecordProcessor(deps.entities);
    this.now = deps.now ?? (() => new Date());
    this.log = deps.logger ?? syncLogger;
  }

  getRun(): SyncRun | null {
    return this.run;
  }

  /**
   * pending → running. Refuses when another run of the same connection is
   * already running.
   */
  async startSync(run: SyncRun): Promise<SyncRun> {
    if (this.run !== null) {
      throw new RunStateError("This orchestrator has already started a run");
    }
    if (run.status !== "pending") {
      throw new RunStateError(
        `Sync run ${String(run.id)} is ${run.status}, expected pending`
      );
    }

    const running = await this.deps.runs.findRunning(run.connection_id);
    if (running !== null && running.id !== run.id) {
      throw new SyncAlreadyRunningError(run.connection_id, running.id);
    }

    const started = await this.deps.runs.markRunning(run.id, this.now());
    this.run = started;
    this.log = this.log.child({
      runId: started.id,
      connectionId: started.connection_id,
    });

    if (started.mode === "incremental") {
      this.modifiedSince = await this.resolveModifiedSince(
        started.connection_id
      );
    }

    this.log.info(
      {
        mode: started.mode,
        triggeredBy: started.triggered_by,
        modifiedSince: this.modifiedSince?.toISOString(),
      },
      "Sync run started"
    );

    return started;
  }

  /**
   * Pull every page of one resource type and upsert its records
   */
  async processResource(resourceType: ResourceType): Promise<ResourceMetrics> {
    const run = this.requireRunning();
    if (this.trackers.has(resourceType)) {
      throw new ResourceAlreadyProcessedError(resourceType, run.id);
    }

    const tracker = new ResourceSyncTracker(
      run.id,
      resourceType,
      this.deps.runs,
      { now: this.now, clock: this.deps.clock, logger: this.log }
    );
    this.trackers.set(resourceType, tracker);

    let nextPage = 1;
    try {
      const pages = this.deps.source.pages(resourceType, {
        perPage: this.deps.config.sync.perPage,
        modifiedSince: this.modifiedSince,
      });
      for await (const page of pages) {
        await this.processPage(tracker, page);
        nextPage = page.page + 1;
      }
    } catch (error) {
      tracker.recordFatal(
        `Failed to fetch ${resourceType} page ${String(nextPage)}: ${errorMessage(error)}`,
        {
          page: nextPage,
          ...(hasStatus(error) ? { status: error.status } : {}),
        }
      );
    }

    return tracker.finish();
  }

  /**
   * Process every configured resource type in dependency order. A failure
   * in one resource never stops the next.
   */
  async processAll(): Promise<void> {
    this.requireRunning();
    const enabled = this.deps.config.sync.resources;

    for (const resourceType of RESOURCE_TYPES) {
      if (!enabled.includes(resourceType)) {
        continue;
      }

      try {
        await this.processResource(resourceType);
      } catch (error) {
        this.recordResourceFailure(resourceType, errorMessage(error));
      }
    }
  }

  /**
   * Finalize the run: completed unless a resource failed
   */
  async completeSync(): Promise<SyncRun> {
    this.requireRunning();
    await this.finishOpenTrackers();

    const trackers = [...this.trackers.values()];
    const fatal = [
      ...trackers.flatMap((tracker) =>
        tracker
          .getFatalErrors()
          .map((message) => `${tracker.resourceType}: ${message}`)
      ),
      ...this.untrackedFailures.map(
        (failure) => `${failure.resourceType}: ${failure.message}`
      ),
    ];
    const errorsCount =
      trackers.reduce((sum, tracker) => sum + tracker.getMetrics().errors, 0) +
      this.untrackedFailures.length;
    const failed = fatal.length > 0;

    let errorSummary: string | null = null;
    if (failed) {
      const [first] = fatal;
      errorSummary =
        errorsCount > 1
          ? `${first ?? ""} (and ${String(errorsCount - 1)} more errors)`
          : (first ?? null);
    } else if (errorsCount > 0) {
      errorSummary = trackers
        .flatMap((tracker) =>
          tracker
            .getErrorMessages()
            .map((message) => `${tracker.resourceType}: ${message}`)
        )
        .slice(0, SUMMARY_ERROR_LIMIT)
        .join("; ");
    }

    if (!failed && this.trackers.has("leases")) {
      await this.refreshUnitOccupancy();
    }

    return this.finalize({
      status: failed ? "failed" : "completed",
      endedAt: this.now(),
      resourcesSynced: this.processedCount(),
      errorsCount,
      errorSummary,
    });
  }

  /**
   * Explicitly fail the run, e.g. after an unexpected exception
   */
  async failSync(message: string): Promise<SyncRun> {
    this.requireRunning();
    await this.finishOpenTrackers();

    const recorded = [...this.trackers.values()].reduce(
      (sum, tracker) => sum + tracker.getMetrics().errors,
      0
    );

    return this.finalize({
      status: "failed",
      endedAt: this.now(),
      resourcesSynced: this.processedCount(),
      errorsCount: recorded + this.untrackedFailures.length + 1,
      errorSummary: message,
    });
  }

  /**
   * start → processAll → complete, failing the run on any unexpected
   * exception after it started
   */
  async execute(run: SyncRun): Promise<SyncRun> {
    await this.startSync(run);

    try {
      await this.processAll();
      return await this.completeSync();
    } catch (error) {
      if (this.run?.status === "running") {
        this.log.error({ error }, "Sync run crashed");
        return this.failSync(errorMessage(error));
      }
      throw error;
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async processPage(
    tracker: ResourceSyncTracker,
    page: ResourcePage
  ): Promise<void> {
    const run = this.requireRunning();
    const { resourceType } = page;
    const mapped: { eventId: number; record: MappedRecord }[] = [];

    for (const item of page.items) {
      const externalId = extractExternalId(resourceType, item);
      try {
        const eventId = await this.deps.rawEvents.insert({
          syncRunId: run.id,
          resourceType,
          externalId,
          payload: item,
        });
        mapped.push({
          eventId,
          record: this.processor.map(resourceType, item),
        });
      } catch (error) {
        tracker.recordError(
          `record ${externalId ?? "(no id)"}: ${errorMessage(error)}`,
          { externalId, page: page.page }
        );
      }
    }

    try {
      await this.processor.prefetchReferences(mapped.map((m) => m.record));
    } catch (error) {
      this.log.warn(
        { error: errorMessage(error), resourceType },
        "Reference prefetch failed, resolving per record"
      );
    }

    for (const { eventId, record } of mapped) {
      try {
        const outcome = await this.processor.store(record);
        switch (outcome.status) {
          case "created":
            tracker.recordCreated();
            break;
          case "updated":
            tracker.recordUpdated();
            break;
          case "skipped":
            // Left unprocessed so a replay can pick it up once the
            // reference exists
            tracker.recordSkipped(outcome.reason, {
              externalId: record.externalId,
            });
            continue;
        }
        await this.deps.rawEvents.markProcessed(eventId, this.now());
      } catch (error) {
        tracker.recordError(
          `record ${record.externalId}: ${errorMessage(error)}`,
          { externalId: record.externalId, page: page.page }
        );
      }
    }
  }

  private recordResourceFailure(
    resourceType: ResourceType,
    message: string
  ): void {
    const tracker = this.trackers.get(resourceType);
    if (tracker !== undefined && !tracker.isFinished()) {
      tracker.recordFatal(message);
      return;
    }
    this.log.error({ resourceType, error: message }, "Resource sync failed");
    this.untrackedFailures.push({ resourceType, message });
  }

  private async finishOpenTrackers(): Promise<void> {
    for (const tracker of this.trackers.values()) {
      if (tracker.isFinished()) {
        continue;
      }
      try {
        await tracker.finish();
      } catch (error) {
        this.log.error(
          { resourceType: tracker.resourceType, error: errorMessage(error) },
          "Failed to persist resource metrics"
        );
      }
    }
  }

  private processedCount(): number {
    let total = 0;
    for (const tracker of this.trackers.values()) {
      total += tracker.getProcessedCount();
    }
    return total;
  }

  private async finalize(finalization: RunFinalization): Promise<SyncRun> {
    const run = this.requireRunning();
    const finished = await this.deps.runs.finalize(run.id, finalization);
    this.run = finished;

    this.log.info(
      {
        status: finished.status,
        resourcesSynced: finished.resources_synced,
        errorsCount: finished.errors_count,
        errorSummary: finished.error_summary,
      },
      finished.status === "completed" ? "Sync run completed" : "Sync run failed"
    );

    try {
      await this.deps.connections.updateStatus(
        finished.connection_id,
        finished.status === "completed"
          ? {
              status: "connected",
              lastError: null,
              lastSuccessAt: finished.ended_at ?? finalization.endedAt,
            }
          : { status: "error", lastError: finished.error_summary }
      );
    } catch (error) {
      this.log.error(
        { error: errorMessage(error) },
        "Failed to update connection status"
      );
    }

    try {
      await this.deps.escalation.handleSyncCompleted(finished);
    } catch (error) {
      this.log.error(
        { error: errorMessage(error) },
        "Failure escalation raised an error"
      );
    }

    return finished;
  }

  private async resolveModifiedSince(connectionId: number): Promise<Date> {
    const last = await this.deps.runs.findLastCompleted(connectionId);
    if (last?.started_at) {
      return last.started_at;
    }
    const days = this.deps.config.sync.incrementalLookbackDays;
    return new Date(this.now().getTime() - days * DAY_MS);
  }

  private async refreshUnitOccupancy(): Promise<void> {
    const today = localDateString(
      this.now(),
      this.deps.config.businessHours.timezone
    );
    try {
      const changed = await this.deps.entities.refreshUnitOccupancy(today);
      this.log.info({ changed, today }, "Refreshed unit occupancy from leases");
    } catch (error) {
      this.log.warn(
        { error: errorMessage(error) },
        "Unit occupancy refresh failed"
      );
    }
  }

  private requireRunning(): SyncRun {
    if (this.run?.status !== "running") {
      throw new RunStateError("No running sync run");
    }
    return this.run;
  }
}

function hasStatus(error: unknown): error is { status: number | null } {
  return (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    (typeof error.status === "number" || error.status === null)
  );
}
