/**
 * API Request/Response Types
 */

import type {
  FailureDetail,
  ResourceErrorsMap,
  ResourceMetricsMap,
  SyncMode,
  SyncRunStatus,
  SyncTrigger,
} from "./index.js";

// ============================================================================
// Common Response Types
// ============================================================================

export interface ApiError {
  error: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

// ============================================================================
// Sync Types
// ============================================================================

export interface SyncRunTotals {
  created: number;
  updated: number;
  skipped: number;
  errors: number;
  durationMs: number;
}

export interface SyncRunDto {
  id: number;
  connectionId: number;
  mode: SyncMode;
  status: SyncRunStatus;
  triggeredBy: SyncTrigger;
  startedAt: string | null;
  endedAt: string | null;
  resourcesSynced: number;
  errorsCount: number;
  errorSummary: string | null;
  createdAt: string;
}

export interface SyncRunDetailDto extends SyncRunDto {
  totals: SyncRunTotals;
  resourceMetrics: ResourceMetricsMap;
  resourceErrors: ResourceErrorsMap;
}

// ============================================================================
// Alert Types
// ============================================================================

export interface SyncAlertDto {
  id: number;
  connectionId: number;
  consecutiveFailures: number;
  lastAlertSentAt: string | null;
  acknowledgedAt: string | null;
  acknowledgedBy: string | null;
  failureDetails: FailureDetail[];
}
