/**
 * Shared domain types for the ingestion pipeline
 */

// ============================================================================
// Resources
// ============================================================================

/**
 * Resource types in dependency order: a resource may only reference
 * resources that appear before it.
 */
export const RESOURCE_TYPES = [
  "properties",
  "units",
  "vendors",
  "leases",
  "work_orders",
  "expenses",
] as const;

export type ResourceType = (typeof RESOURCE_TYPES)[number];

export function isResourceType(value: string): value is ResourceType {
  return RESOURCE_TYPES.some((type) => type === value);
}

/**
 * A record as returned by the remote API, before mapping
 */
export type RemoteRecord = Record<string, unknown>;

export interface ResourcePage {
  resourceType: ResourceType;
  page: number;
  perPage: number;
  items: RemoteRecord[];
  hasMore: boolean;
}

export interface FetchParams {
  page?: number;
  perPage?: number;
  modifiedSince?: Date;
}

// ============================================================================
// Sync Runs
// ============================================================================

export type SyncMode = "full" | "incremental";

export type SyncRunStatus = "pending" | "running" | "completed" | "failed";

export type SyncTrigger = "schedule" | "cli" | "api";

export type ConnectionStatus =
  | "unconfigured"
  | "configured"
  | "connected"
  | "error";

/**
 * Per-resource outcome counters, persisted as JSON on the owning run
 */
export interface ResourceMetrics {
  created: number;
  updated: number;
  skipped: number;
  errors: number;
  duration_ms: number;
}

export interface ResourceErrorEntry {
  message: string;
  timestamp: string;
  fatal: boolean;
  context?: Record<string, unknown>;
}

export type ResourceMetricsMap = Partial<Record<ResourceType, ResourceMetrics>>;

export type ResourceErrorsMap = Partial<
  Record<ResourceType, ResourceErrorEntry[]>
>;

// ============================================================================
// Alerts
// ============================================================================

export interface FailureDetail {
  timestamp: string;
  syncRunId: number;
  error: string | null;
  errorsCount: number;
  mode: SyncMode;
}
