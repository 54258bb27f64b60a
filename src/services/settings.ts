/**
 * Settings - Configuration overrides stored in the database
 */

import { loadConfig, type AppConfig, type SettingOverride } from "../config.js";
import { jsonb } from "../db/connection.js";

import type { Database } from "../db/types.js";
import type { Kysely } from "kysely";

export interface SettingsRepository {
  list(): Promise<SettingOverride[]>;
  set(category: string, key: string, value: unknown): Promise<void>;
}

export class KyselySettingsRepository implements SettingsRepository {
  constructor(private db: Kysely<Database>) {}

  async list(): Promise<SettingOverride[]> {
    return this.db
      .selectFrom("settings")
      .select(["category", "key", "value"])
      .orderBy("category", "asc")
      .orderBy("key", "asc")
      .execute();
  }

  async set(category: string, key: string, value: unknown): Promise<void> {
    await this.db
      .insertInto("settings")
      .values({ category, key, value: jsonb(value) })
      .onConflict((oc) =>
        oc
          .columns(["category", "key"])
          .doUpdateSet({ value: jsonb(value), updated_at: new Date() })
      )
      .execute();
  }
}

/**
 * Defaults, then environment, then the settings table
 */
export async function loadConfigFromDatabase(
  settings: SettingsRepository,
  env: Record<string, string | undefined> = process.env
): Promise<AppConfig> {
  return loadConfig({ env, settings: await settings.list() });
}
