/**
 * Connection Repository - Remote API connections and their health status
 */

import type { Connection, Database } from "../../db/types.js";
import type { ConnectionStatus } from "../../types/index.js";
import type { Kysely } from "kysely";

export interface SaveConnectionInput {
  name: string;
  baseUrl: string;
  clientId: string;
  /** Already encrypted with the secret cipher */
  clientSecretEncrypted: string;
}

export interface ConnectionStatusUpdate {
  status: ConnectionStatus;
  lastError?: string | null;
  lastSuccessAt?: Date;
}

export interface ConnectionRepository {
  findById(connectionId: number): Promise<Connection | null>;
  /** The oldest connection; single-tenant deployments have exactly one */
  findDefault(): Promise<Connection | null>;
  list(): Promise<Connection[]>;
  save(input: SaveConnectionInput, connectionId?: number): Promise<Connection>;
  updateStatus(
    connectionId: number,
    update: ConnectionStatusUpdate
  ): Promise<void>;
}

export class KyselyConnectionRepository implements ConnectionRepository {
  constructor(private db: Kysely<Database>) {}

  async findById(connectionId: number): Promise<Connection | null> {
    const connection = await this.db
      .selectFrom("connections")
      .selectAll()
      .where("id", "=", connectionId)
      .executeTakeFirst();
    return connection ?? null;
  }

  async findDefault(): Promise<Connection | null> {
    const connection = await this.db
      .selectFrom("connections")
      .selectAll()
      .orderBy("id", "asc")
      .limit(1)
      .executeTakeFirst();
    return connection ?? null;
  }

  async list(): Promise<Connection[]> {
    return this.db
      .selectFrom("connections")
      .selectAll()
      .orderBy("id", "asc")
      .execute();
  }

  /**
   * Create a connection, or replace the credentials of an existing one.
   * Saving credentials always resets the status to `configured`.
   */
  async save(
    input: SaveConnectionInput,
    connectionId?: number
  ): Promise<Connection> {
    const values = {
      name: input.name,
      base_url: input.baseUrl,
      client_id: input.clientId,
      client_secret_encrypted: input.clientSecretEncrypted,
      status: "configured" as const,
      last_error: null,
    };

    if (connectionId === undefined) {
      return this.db
        .insertInto("connections")
        .values({ ...values, last_success_at: null })
        .returningAll()
        .executeTakeFirstOrThrow();
    }

    return this.db
      .updateTable("connections")
      .set({ ...values, updated_at: new Date() })
      .where("id", "=", connectionId)
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  async updateStatus(
    connectionId: number,
    update: ConnectionStatusUpdate
  ): Promise<void> {
    await this.db
      .updateTable("connections")
      .set({
        status: update.status,
        updated_at: new Date(),
        ...(update.lastError !== undefined
          ? { last_error: update.lastError }
          : {}),
        ...(update.lastSuccessAt !== undefined
          ? { last_success_at: update.lastSuccessAt }
          : {}),
      })
      .where("id", "=", connectionId)
      .execute();
  }
}
