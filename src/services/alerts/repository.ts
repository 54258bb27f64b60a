/**
 * Alert Repository - Consecutive-failure state per connection
 *
 * One row per connection. The failure increment reads and writes the row
 * under a row lock, so overlapping completions never lose a count.
 */

import { jsonb } from "../../db/connection.js";

import type { Database, SyncFailureAlert } from "../../db/types.js";
import type { FailureDetail } from "../../types/index.js";
import type { Kysely } from "kysely";

/** Failure details kept per alert row */
export const MAX_FAILURE_DETAILS = 10;

export interface AlertRepository {
  findById(alertId: number): Promise<SyncFailureAlert | null>;
  findByConnection(connectionId: number): Promise<SyncFailureAlert | null>;
  /** Unacknowledged rows with at least one consecutive failure */
  listActive(): Promise<SyncFailureAlert[]>;
  /**
   * Increment the counter, append the detail (keeping the newest
   * `maxDetails`) and clear any acknowledgment
   */
  recordFailure(
    connectionId: number,
    detail: FailureDetail,
    maxDetails?: number
  ): Promise<SyncFailureAlert>;
  /** Counter back to zero; acknowledgment is left as it is */
  resetFailures(connectionId: number, at: Date): Promise<SyncFailureAlert>;
  markAlertSent(alertId: number, at: Date): Promise<void>;
  acknowledge(
    alertId: number,
    user: string,
    at: Date
  ): Promise<SyncFailureAlert | null>;
}

export class KyselyAlertRepository implements AlertRepository {
  constructor(private db: Kysely<Database>) {}

  async findById(alertId: number): Promise<SyncFailureAlert | null> {
    const alert = await this.db
      .selectFrom("sync_failure_alerts")
      .selectAll()
      .where("id", "=", alertId)
      .executeTakeFirst();
    return alert ?? null;
  }

  async findByConnection(
    connectionId: number
  ): Promise<SyncFailureAlert | null> {
    const alert = await this.db
      .selectFrom("sync_failure_alerts")
      .selectAll()
      .where("connection_id", "=", connectionId)
      .executeTakeFirst();
    return alert ?? null;
  }

  async listActive(): Promise<SyncFailureAlert[]> {
    return this.db
      .selectFrom("sync_failure_alerts")
      .selectAll()
      .where("consecutive_failures", ">", 0)
      .where("acknowledged_at", "is", null)
      .orderBy("consecutive_failures", "desc")
      .orderBy("connection_id", "asc")
      .execute();
  }

  async recordFailure(
    connectionId: number,
    detail: FailureDetail,
    maxDetails = MAX_FAILURE_DETAILS
  ): Promise<SyncFailureAlert> {
    return this.db.transaction().execute(async (trx) => {
      await trx
        .insertInto("sync_failure_alerts")
        .values({
          connection_id: connectionId,
          consecutive_failures: 0,
          failure_details: jsonb<FailureDetail[]>([]),
        })
        .onConflict((oc) => oc.column("connection_id").doNothing())
        .execute();

      const current = await trx
        .selectFrom("sync_failure_alerts")
        .selectAll()
        .where("connection_id", "=", connectionId)
        .forUpdate()
        .executeTakeFirstOrThrow();

      const details = [...current.failure_details, detail].slice(-maxDetails);

      return trx
        .updateTable("sync_failure_alerts")
        .set({
          consecutive_failures: current.consecutive_failures + 1,
          failure_details: jsonb(details),
          acknowledged_at: null,
          acknowledged_by: null,
          updated_at: new Date(),
        })
        .where("id", "=", current.id)
        .returningAll()
        .executeTakeFirstOrThrow();
    });
  }

  async resetFailures(
    connectionId: number,
    at: Date
  ): Promise<SyncFailureAlert> {
    return this.db
      .insertInto("sync_failure_alerts")
      .values({
        connection_id: connectionId,
        consecutive_failures: 0,
        failure_details: jsonb<FailureDetail[]>([]),
      })
      .onConflict((oc) =>
        oc.column("connection_id").doUpdateSet({
          consecutive_failures: 0,
          failure_details: jsonb<FailureDetail[]>([]),
          updated_at: at,
        })
      )
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  async markAlertSent(alertId: number, at: Date): Promise<void> {
    await this.db
      .updateTable("sync_failure_alerts")
      .set({ last_alert_sent_at: at, updated_at: at })
      .where("id", "=", alertId)
      .execute();
  }

  async acknowledge(
    alertId: number,
    user: string,
    at: Date
  ): Promise<SyncFailureAlert | null> {
    const alert = await this.db
      .updateTable("sync_failure_alerts")
      .set({ acknowledged_at: at, acknowledged_by: user, updated_at: at })
      .where("id", "=", alertId)
      .returningAll()
      .executeTakeFirst();
    return alert ?? null;
  }
}
