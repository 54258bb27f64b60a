/**
 * Raw Event Repository - Append-only store of fetched remote records
 */

import { jsonb } from "../../db/connection.js";

import type { Database, RawEvent } from "../../db/types.js";
import type { RemoteRecord, ResourceType } from "../../types/index.js";
import type { ExpressionBuilder, Kysely } from "kysely";

export interface NewRawEventInput {
  syncRunId: number;
  resourceType: ResourceType;
  externalId: string | null;
  payload: RemoteRecord;
}

export interface UnprocessedQuery {
  resourceType?: ResourceType;
  /** Only events with a greater id */
  afterId?: number;
  limit: number;
}

/**
 * Unprocessed events only count while they are the newest event for their
 * record: a later pull of the same external id supersedes them.
 */
export interface RawEventRepository {
  insert(event: NewRawEventInput): Promise<number>;
  markProcessed(eventId: number, processedAt: Date): Promise<void>;
  /** Unprocessed, unsuperseded events in id order */
  listUnprocessed(query: UnprocessedQuery): Promise<RawEvent[]>;
  countUnprocessed(resourceType?: ResourceType): Promise<number>;
}

function hasNewerEvent(eb: ExpressionBuilder<Database, "raw_events">) {
  return eb.exists(
    eb
      .selectFrom("raw_events as newer")
      .select("newer.id")
      .whereRef("newer.resource_type", "=", "raw_events.resource_type")
      .whereRef("newer.external_id", "=", "raw_events.external_id")
      .whereRef("newer.id", ">", "raw_events.id")
  );
}

export class KyselyRawEventRepository implements RawEventRepository {
  constructor(private db: Kysely<Database>) {}

  async insert(event: NewRawEventInput): Promise<number> {
    const row = await this.db
      .insertInto("raw_events")
      .values({
        sync_run_id: event.syncRunId,
        resource_type: event.resourceType,
        external_id: event.externalId,
        payload: jsonb(event.payload),
        processed_at: null,
      })
      .returning("id")
      .executeTakeFirstOrThrow();
    return row.id;
  }

  async markProcessed(eventId: number, processedAt: Date): Promise<void> {
    await this.db
      .updateTable("raw_events")
      .set({ processed_at: processedAt })
      .where("id", "=", eventId)
      .where("processed_at", "is", null)
      .execute();
  }

  async listUnprocessed(query: UnprocessedQuery): Promise<RawEvent[]> {
    let builder = this.db
      .selectFrom("raw_events")
      .selectAll()
      .where("processed_at", "is", null)
      .where((eb) => eb.not(hasNewerEvent(eb)));

    if (query.resourceType !== undefined) {
      builder = builder.where("resource_type", "=", query.resourceType);
    }
    if (query.afterId !== undefined) {
      builder = builder.where("id", ">", query.afterId);
    }

    return builder.orderBy("id", "asc").limit(query.limit).execute();
  }

  async countUnprocessed(resourceType?: ResourceType): Promise<number> {
    let builder = this.db
      .selectFrom("raw_events")
      .select((eb) => eb.fn.countAll<number>().as("count"))
      .where("processed_at", "is", null)
      .where((eb) => eb.not(hasNewerEvent(eb)));

    if (resourceType !== undefined) {
      builder = builder.where("resource_type", "=", resourceType);
    }

    const row = await builder.executeTakeFirst();
    return Number(row?.count ?? 0);
  }
}
