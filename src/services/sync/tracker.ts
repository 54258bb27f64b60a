/**
 * Resource Sync Tracker - Per-resource outcome counters for one run
 *
 * Bound to a (run, resource type) pair. Counters accumulate in memory;
 * finish() persists the metrics snapshot and the resource's error entries
 * to the owning run in one write and freezes the tracker.
 */

import { syncLogger, type Logger } from "../../logger.js";
import { RunStateError } from "./errors.js";

import type { SyncRunRepository } from "./runs.js";
import type {
  ResourceErrorEntry,
  ResourceMetrics,
  ResourceType,
} from "../../types/index.js";

/** Error entries stored per resource on the run */
export const MAX_ERROR_ENTRIES = 10;

/** Messages kept in memory for the run's error summary */
const MAX_ERROR_MESSAGES = 100;

export interface TrackerOptions {
  /** Monotonic milliseconds */
  clock?: () => number;
  now?: () => Date;
  logger?: Logger;
}

export class ResourceSyncTracker {
  private created = 0;
  private updated = 0;
  private skipped = 0;
  private errors = 0;
  private readonly entries: ResourceErrorEntry[] = [];
  private readonly messages: string[] = [];
  private readonly fatalMessages: string[] = [];
  private readonly startedAt: number;
  private finished: ResourceMetrics | null = null;

  private readonly clock: () => number;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    readonly runId: number,
    readonly resourceType: ResourceType,
    private readonly runs: Pick<SyncRunRepository, "saveResourceResult">,
    options: TrackerOptions = {}
  ) {
    this.clock = options.clock ?? (() => performance.now());
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? syncLogger).child({
      runId,
      resourceType,
    });
    this.startedAt = this.clock();
    this.log.info("Starting resource sync");
  }

  recordCreated(): void {
    this.assertOpen();
    this.created++;
  }

  recordUpdated(): void {
    this.assertOpen();
    this.updated++;
  }

  recordSkipped(reason: string, context?: Record<string, unknown>): void {
    this.assertOpen();
    this.skipped++;
    this.log.debug({ reason, ...context }, "Skipped record");
  }

  /**
   * A record-level error: the record is dropped, processing continues
   */
  recordError(message: string, context?: Record<string, unknown>): void {
    this.addError(message, false, context);
    this.log.warn({ error: message, ...context }, "Record failed");
  }

  /**
   * A resource-level error: the resource could not be processed and the
   * run will be marked failed
   */
  recordFatal(message: string, context?: Record<string, unknown>): void {
    this.addError(message, true, context);
    this.fatalMessages.push(message);
    this.log.error({ error: message, ...context }, "Resource sync aborted");
  }

  getMetrics(): ResourceMetrics {
    if (this.finished !== null) {
      return { ...this.finished };
    }
    return {
      created: this.created,
      updated: this.updated,
      skipped: this.skipped,
      errors: this.errors,
      duration_ms: Math.round(this.clock() - this.startedAt),
    };
  }

  /** Records written (created + updated) */
  getProcessedCount(): number {
    return this.created + this.updated;
  }

  hasErrors(): boolean {
    return this.errors > 0;
  }

  hasFatalError(): boolean {
    return this.fatalMessages.length > 0;
  }

  getErrorMessages(): string[] {
    return [...this.messages];
  }

  getFatalErrors(): string[] {
    return [...this.fatalMessages];
  }

  isFinished(): boolean {
    return this.finished !== null;
  }

  /**
   * Freeze the counters and persist them to the owning run. May be called
   * once.
   */
  async finish(): Promise<ResourceMetrics> {
    this.assertOpen();
    const metrics = this.getMetrics();
    this.finished = metrics;

    await this.runs.saveResourceResult(this.runId, this.resourceType, metrics, [
      ...this.entries,
    ]);

    this.log.info({ metrics }, "Finished resource sync");
    return { ...metrics };
  }

  private addError(
    message: string,
    fatal: boolean,
    context?: Record<string, unknown>
  ): void {
    this.assertOpen();
    this.errors++;

    if (this.messages.length < MAX_ERROR_MESSAGES) {
      this.messages.push(message);
    }

    this.entries.push({
      message,
      timestamp: this.now().toISOString(),
      fatal,
      ...(context !== undefined ? { context } : {}),
    });
    if (this.entries.length > MAX_ERROR_ENTRIES) {
      this.entries.shift();
    }
  }

  private assertOpen(): void {
    if (this.finished !== null) {
      throw new RunStateError(
        `Tracker for '${this.resourceType}' in run ${String(this.runId)} is already finished`
      );
    }
  }
}
