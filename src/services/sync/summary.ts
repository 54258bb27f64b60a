/**
 * Run DTOs shared by the HTTP API and the CLI
 */

import { RESOURCE_TYPES } from "../../types/index.js";

import type { SyncFailureAlert, SyncRun } from "../../db/types.js";
import type {
  SyncAlertDto,
  SyncRunDetailDto,
  SyncRunDto,
  SyncRunTotals,
} from "../../types/api.js";

export function toSyncRunDto(run: SyncRun): SyncRunDto {
  return {
    id: run.id,
    connectionId: run.connection_id,
    mode: run.mode,
    status: run.status,
    triggeredBy: run.triggered_by,
    startedAt: run.started_at?.toISOString() ?? null,
    endedAt: run.ended_at?.toISOString() ?? null,
    resourcesSynced: run.resources_synced,
    errorsCount: run.errors_count,
    errorSummary: run.error_summary,
    createdAt: run.created_at.toISOString(),
  };
}

/**
 * Sum of every resource's metrics
 */
export function computeRunTotals(run: SyncRun): SyncRunTotals {
  const totals: SyncRunTotals = {
    created: 0,
    updated: 0,
    skipped: 0,
    errors: 0,
    durationMs: 0,
  };

  for (const resourceType of RESOURCE_TYPES) {
    const metrics = run.resource_metrics[resourceType];
    if (metrics === undefined) continue;
    totals.created += metrics.created;
    totals.updated += metrics.updated;
    totals.skipped += metrics.skipped;
    totals.errors += metrics.errors;
    totals.durationMs += metrics.duration_ms;
  }

  return totals;
}

export function toSyncRunDetailDto(run: SyncRun): SyncRunDetailDto {
  return {
    ...toSyncRunDto(run),
    totals: computeRunTotals(run),
    resourceMetrics: run.resource_metrics,
    resourceErrors: run.resource_errors,
  };
}

export function toSyncAlertDto(alert: SyncFailureAlert): SyncAlertDto {
  return {
    id: alert.id,
    connectionId: alert.connection_id,
    consecutiveFailures: alert.consecutive_failures,
    lastAlertSentAt: alert.last_alert_sent_at?.toISOString() ?? null,
    acknowledgedAt: alert.acknowledged_at?.toISOString() ?? null,
    acknowledgedBy: alert.acknowledged_by,
    failureDetails: alert.failure_details,
  };
}
