/**
 * Application configuration
 *
 * One immutable struct per run, built from defaults, then environment
 * variables, then rows of the `settings` table. Components receive the
 * sections they need; nothing in the pipeline reads process.env directly.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { logger } from "./logger.js";
import { RESOURCE_TYPES } from "./types/index.js";

// ============================================================================
// Schema
// ============================================================================

const ResourceTypeSchema = Type.Union([
  Type.Literal("properties"),
  Type.Literal("units"),
  Type.Literal("vendors"),
  Type.Literal("leases"),
  Type.Literal("work_orders"),
  Type.Literal("expenses"),
]);

const BusinessHoursConfigSchema = Type.Object({
  enabled: Type.Boolean(),
  timezone: Type.String({ minLength: 1 }),
  startHour: Type.Integer({ minimum: 0, maximum: 24 }),
  endHour: Type.Integer({ minimum: 0, maximum: 24 }),
  weekdaysOnly: Type.Boolean(),
  businessHoursInterval: Type.Integer({ minimum: 1, maximum: 60 }),
  offHoursInterval: Type.Integer({ minimum: 1, maximum: 60 }),
});

const ScheduleConfigSchema = Type.Object({
  fullSyncTime: Type.String({ pattern: "^([01][0-9]|2[0-3]):[0-5][0-9]$" }),
});

const SyncConfigSchema = Type.Object({
  maxRetries: Type.Integer({ minimum: 0, maximum: 10 }),
  perPage: Type.Integer({ minimum: 1, maximum: 1000 }),
  maxPages: Type.Integer({ minimum: 1 }),
  initialBackoffMs: Type.Integer({ minimum: 0 }),
  maxBackoffMs: Type.Integer({ minimum: 0 }),
  requestTimeoutMs: Type.Integer({ minimum: 1 }),
  incrementalLookbackDays: Type.Integer({ minimum: 1 }),
  resources: Type.Array(ResourceTypeSchema, { minItems: 1, uniqueItems: true }),
  replayBatchSize: Type.Integer({ minimum: 1, maximum: 10_000 }),
});

const AlertsConfigSchema = Type.Object({
  failureThreshold: Type.Integer({ minimum: 1 }),
  cooldownMinutes: Type.Integer({ minimum: 0 }),
  recipients: Type.Array(Type.String({ minLength: 1 })),
  webhookUrl: Type.Union([Type.String({ minLength: 1 }), Type.Null()]),
});

const FeaturesConfigSchema = Type.Object({
  notifications: Type.Boolean(),
  incrementalSync: Type.Boolean(),
});

export const AppConfigSchema = Type.Object({
  businessHours: BusinessHoursConfigSchema,
  schedule: ScheduleConfigSchema,
  sync: SyncConfigSchema,
  alerts: AlertsConfigSchema,
  features: FeaturesConfigSchema,
});

type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type AppConfig = DeepReadonly<Static<typeof AppConfigSchema>>;
export type BusinessHoursConfig = AppConfig["businessHours"];
export type ScheduleConfig = AppConfig["schedule"];
export type SyncConfig = AppConfig["sync"];
export type AlertsConfig = AppConfig["alerts"];
export type FeaturesConfig = AppConfig["features"];

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CONFIG: Static<typeof AppConfigSchema> = {
  businessHours: {
    enabled: true,
    timezone: "America/Los_Angeles",
    startHour: 9,
    endHour: 17,
    weekdaysOnly: true,
    businessHoursInterval: 15,
    offHoursInterval: 60,
  },
  schedule: {
    fullSyncTime: "02:00",
  },
  sync: {
    maxRetries: 1,
    perPage: 100,
    maxPages: 1000,
    initialBackoffMs: 1000,
    maxBackoffMs: 60_000,
    requestTimeoutMs: 30_000,
    incrementalLookbackDays: 7,
    resources: [...RESOURCE_TYPES],
    replayBatchSize: 500,
  },
  alerts: {
    failureThreshold: 3,
    cooldownMinutes: 60,
    recipients: [],
    webhookUrl: null,
  },
  features: {
    notifications: true,
    incrementalSync: true,
  },
};

// ============================================================================
// Field Registry
// ============================================================================

type FieldKind = "boolean" | "integer" | "string" | "list" | "nullable";

interface ConfigField {
  section: keyof Static<typeof AppConfigSchema>;
  property: string;
  env: string;
  /** `category.key` in the settings table */
  setting: string;
  kind: FieldKind;
}

const FIELDS: readonly ConfigField[] = [
  { section: "businessHours", property: "enabled", env: "BUSINESS_HOURS_ENABLED", setting: "business_hours.enabled", kind: "boolean" },
  { section: "businessHours", property: "timezone", env: "BUSINESS_HOURS_TIMEZONE", setting: "business_hours.timezone", kind: "string" },
  { section: "businessHours", property: "startHour", env: "BUSINESS_HOURS_START", setting: "business_hours.start_hour", kind: "integer" },
  { section: "businessHours", property: "endHour", env: "BUSINESS_HOURS_END", setting: "business_hours.end_hour", kind: "integer" },
  { section: "businessHours", property: "weekdaysOnly", env: "BUSINESS_HOURS_WEEKDAYS_ONLY", setting: "business_hours.weekdays_only", kind: "boolean" },
  { section: "businessHours", property: "businessHoursInterval", env: "BUSINESS_HOURS_INTERVAL", setting: "business_hours.business_hours_interval", kind: "integer" },
  { section: "businessHours", property: "offHoursInterval", env: "OFF_HOURS_INTERVAL", setting: "business_hours.off_hours_interval", kind: "integer" },
  { section: "schedule", property: "fullSyncTime", env: "FULL_SYNC_TIME", setting: "schedule.full_sync_time", kind: "string" },
  { section: "sync", property: "maxRetries", env: "SYNC_MAX_RETRIES", setting: "sync.max_retries", kind: "integer" },
  { section: "sync", property: "perPage", env: "SYNC_PER_PAGE", setting: "sync.per_page", kind: "integer" },
  { section: "sync", property: "maxPages", env: "SYNC_MAX_PAGES", setting: "sync.max_pages", kind: "integer" },
  { section: "sync", property: "initialBackoffMs", env: "SYNC_INITIAL_BACKOFF_MS", setting: "sync.initial_backoff_ms", kind: "integer" },
  { section: "sync", property: "maxBackoffMs", env: "SYNC_MAX_BACKOFF_MS", setting: "sync.max_backoff_ms", kind: "integer" },
  { section: "sync", property: "requestTimeoutMs", env: "SYNC_REQUEST_TIMEOUT_MS", setting: "sync.request_timeout_ms", kind: "integer" },
  { section: "sync", property: "incrementalLookbackDays", env: "SYNC_INCREMENTAL_LOOKBACK_DAYS", setting: "sync.incremental_lookback_days", kind: "integer" },
  { section: "sync", property: "resources", env: "SYNC_RESOURCES", setting: "sync.resources", kind: "list" },
  { section: "sync", property: "replayBatchSize", env: "SYNC_REPLAY_BATCH_SIZE", setting: "sync.replay_batch_size", kind: "integer" },
  { section: "alerts", property: "failureThreshold", env: "ALERT_FAILURE_THRESHOLD", setting: "alerts.failure_threshold", kind: "integer" },
  { section: "alerts", property: "cooldownMinutes", env: "ALERT_COOLDOWN_MINUTES", setting: "alerts.cooldown_minutes", kind: "integer" },
  { section: "alerts", property: "recipients", env: "ALERT_RECIPIENTS", setting: "alerts.recipients", kind: "list" },
  { section: "alerts", property: "webhookUrl", env: "ALERT_WEBHOOK_URL", setting: "alerts.webhook_url", kind: "nullable" },
  { section: "features", property: "notifications", env: "FEATURE_NOTIFICATIONS", setting: "features.notifications", kind: "boolean" },
  { section: "features", property: "incrementalSync", env: "FEATURE_INCREMENTAL_SYNC", setting: "features.incremental_sync", kind: "boolean" },
];

// ============================================================================
// Errors
// ============================================================================

export class ConfigError extends Error {
  code = "CONFIG_ERROR" as const;
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// ============================================================================
// Parsing
// ============================================================================

export interface SettingOverride {
  category: string;
  key: string;
  value: unknown;
}

function parseString(raw: string, kind: FieldKind): unknown {
  const value = raw.trim();
  switch (kind) {
    case "boolean": {
      const lower = value.toLowerCase();
      if (["true", "1", "yes", "on"].includes(lower)) return true;
      if (["false", "0", "no", "off"].includes(lower)) return false;
      return value;
    }
    case "integer":
      return /^-?\d+$/.test(value) ? Number(value) : value;
    case "list":
      return value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item !== "");
    case "nullable":
      return value === "" ? null : value;
    case "string":
      return value;
  }
}

function parseSettingValue(value: unknown, kind: FieldKind): unknown {
  return typeof value === "string" ? parseString(value, kind) : value;
}

function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

// ============================================================================
// Loader
// ============================================================================

export interface LoadConfigOptions {
  env?: Record<string, string | undefined>;
  settings?: readonly SettingOverride[];
}

/**
 * Build and validate the configuration. Throws ConfigError listing every
 * offending path when validation fails.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const settings = options.settings ?? [];

  const raw: Record<string, Record<string, unknown>> = structuredClone(
    DEFAULT_CONFIG
  );

  for (const field of FIELDS) {
    const envValue = env[field.env];
    if (envValue !== undefined) {
      raw[field.section] = {
        ...raw[field.section],
        [field.property]: parseString(envValue, field.kind),
      };
    }
  }

  const fieldsBySetting = new Map(FIELDS.map((f) => [f.setting, f]));
  for (const setting of settings) {
    const name = `${setting.category}.${setting.key}`;
    const field = fieldsBySetting.get(name);
    if (field === undefined) {
      logger.warn({ setting: name }, "Ignoring unknown configuration setting");
      continue;
    }
    raw[field.section] = {
      ...raw[field.section],
      [field.property]: parseSettingValue(setting.value, field.kind),
    };
  }

  if (!Value.Check(AppConfigSchema, raw)) {
    const issues = [...Value.Errors(AppConfigSchema, raw)].map(
      (error) => `${error.path}: ${error.message}`
    );
    throw new ConfigError(issues);
  }

  const issues: string[] = [];
  if (!isValidTimezone(raw.businessHours.timezone)) {
    issues.push(
      `/businessHours/timezone: unknown time zone '${raw.businessHours.timezone}'`
    );
  }
  if (raw.sync.maxBackoffMs < raw.sync.initialBackoffMs) {
    issues.push(
      "/sync/maxBackoffMs: must be greater than or equal to initialBackoffMs"
    );
  }
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return deepFreeze(raw);
}
