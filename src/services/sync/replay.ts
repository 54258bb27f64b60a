/**
 * Raw Event Replay - Re-run mapping and upserts for unprocessed raw events
 *
 * Events skipped for a missing reference or failed during a live run stay
 * unprocessed; replaying them after the referenced entity arrived (or a
 * mapping fix shipped) brings the canonical tables up to date without
 * calling the remote API. An event superseded by a later pull of the same
 * record is never replayed over the newer data.
 */

import { syncLogger, type Logger } from "../../logger.js";
import { errorMessage } from "../../utils/guards.js";
import { encodeCursor, validateCursor } from "../../utils/pagination.js";
import { RecordProcessor } from "./processor.js";

import type { EntityRepository } from "./entities.js";
import type { RawEventRepository } from "./raw-events.js";
import type { MappedRecord } from "./mappers.js";
import type { ResourceType } from "../../types/index.js";

export interface ReplayOptions {
  resourceType?: ResourceType;
  /** Opaque position returned by a previous batch */
  continuation?: string;
  limit: number;
}

export interface ReplayError {
  eventId: number;
  externalId: string | null;
  message: string;
}

export interface ReplayResult {
  processed: number;
  created: number;
  updated: number;
  skipped: number;
  errors: ReplayError[];
  moreRemain: boolean;
  continuation: string | null;
}

export class InvalidContinuationError extends Error {
  constructor() {
    super("Invalid replay continuation");
    this.name = "InvalidContinuationError";
  }
}

export class RawEventReplayer {
  private readonly processor: RecordProcessor;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    private readonly rawEvents: RawEventRepository,
    entities: EntityRepository,
    options: { now?: () => Date; logger?: Logger } = {}
  ) {
    this.processor = new RecordProcessor(entities);
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? syncLogger.child({ task: "replay" });
  }

  /**
   * Events a replay would still pick up
   */
  async countPending(resourceType?: ResourceType): Promise<number> {
    return this.rawEvents.countUnprocessed(resourceType);
  }

  /**
   * Replay one batch of unprocessed events in id order. Events that are
   * still skipped or fail stay unprocessed; the continuation moves past
   * them so the next batch does not see them again.
   */
  async replayBatch(options: ReplayOptions): Promise<ReplayResult> {
    let afterId: number | undefined;
    if (options.continuation !== undefined) {
      const cursor = validateCursor(options.continuation);
      if (cursor === null) {
        throw new InvalidContinuationError();
      }
      afterId = cursor.id;
    }

    // One extra row tells whether more remain
    const events = await this.rawEvents.listUnprocessed({
      resourceType: options.resourceType,
      afterId,
      limit: options.limit + 1,
    });
    const moreRemain = events.length > options.limit;
    const batch = events.slice(0, options.limit);

    const result: ReplayResult = {
      processed: 0,
      created: 0,
      updated: 0,
      skipped: 0,
      errors: [],
      moreRemain,
      continuation: null,
    };

    const mapped: { eventId: number; record: MappedRecord }[] = [];
    for (const event of batch) {
      try {
        mapped.push({
          eventId: event.id,
          record: this.processor.map(event.resource_type, event.payload),
        });
      } catch (error) {
        result.errors.push({
          eventId: event.id,
          externalId: event.external_id,
          message: errorMessage(error),
        });
      }
    }

    await this.processor.prefetchReferences(mapped.map((m) => m.record));

    for (const { eventId, record } of mapped) {
      try {
        const outcome = await this.processor.store(record);
        if (outcome.status === "skipped") {
          result.skipped++;
          continue;
        }
        if (outcome.status === "created") {
          result.created++;
        } else {
          result.updated++;
        }
        await this.rawEvents.markProcessed(eventId, this.now());
        result.processed++;
      } catch (error) {
        result.errors.push({
          eventId,
          externalId: record.externalId,
          message: errorMessage(error),
        });
      }
    }

    const last = batch[batch.length - 1];
    if (moreRemain && last !== undefined) {
      result.continuation = encodeCursor({
        sortValue: last.id,
        id: last.id,
        direction: "forward",
      });
    }

    this.log.info(
      {
        resourceType: options.resourceType,
        processed: result.processed,
        created: result.created,
        updated: result.updated,
        skipped: result.skipped,
        errors: result.errors.length,
        moreRemain,
      },
      "Replayed raw events"
    );

    return result;
  }
}
