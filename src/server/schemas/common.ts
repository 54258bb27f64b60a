/**
 * Common TypeBox schemas for API validation
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";

// ============================================================================
// Pagination Schemas
// ============================================================================

export const PaginationQuerySchema = Type.Object({
  limit: Type.Optional(Type.Number({ minimum: 1, maximum: 100, default: 20 })),
  cursor: Type.Optional(Type.String()),
});

export type PaginationQuery = Static<typeof PaginationQuerySchema>;

export const PaginationMetaSchema = Type.Object({
  cursor: Type.Union([Type.String(), Type.Null()]),
  hasMore: Type.Boolean(),
  limit: Type.Number(),
  total: Type.Optional(Type.Number()),
});

// ============================================================================
// Error Schemas
// ============================================================================

export const ApiErrorSchema = Type.Object({
  error: Type.String(),
  message: Type.String(),
  details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  requestId: Type.Optional(Type.String()),
});

export type ApiErrorType = Static<typeof ApiErrorSchema>;

// ============================================================================
// Response Wrapper Schemas
// ============================================================================

export function createResponseSchema<T extends TSchema>(dataSchema: T) {
  return Type.Object({
    data: dataSchema,
  });
}

export function createListResponseSchema<T extends TSchema>(itemSchema: T) {
  return Type.Object({
    data: Type.Array(itemSchema),
    meta: Type.Object({
      pagination: PaginationMetaSchema,
    }),
  });
}

// ============================================================================
// Common Field Schemas
// ============================================================================

const DateTimeSchema = Type.String({ format: "date-time" });
const NullableDateTimeSchema = Type.Union([DateTimeSchema, Type.Null()]);

export const SyncModeSchema = Type.Union([
  Type.Literal("full"),
  Type.Literal("incremental"),
]);

export const SyncRunStatusSchema = Type.Union([
  Type.Literal("pending"),
  Type.Literal("running"),
  Type.Literal("completed"),
  Type.Literal("failed"),
]);

export const SyncTriggerSchema = Type.Union([
  Type.Literal("schedule"),
  Type.Literal("cli"),
  Type.Literal("api"),
]);

export const ResourceMetricsSchema = Type.Object({
  created: Type.Number(),
  updated: Type.Number(),
  skipped: Type.Number(),
  errors: Type.Number(),
  duration_ms: Type.Number(),
});

export const ResourceErrorEntrySchema = Type.Object({
  message: Type.String(),
  timestamp: Type.String(),
  fatal: Type.Boolean(),
  context: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
});

export const FailureDetailSchema = Type.Object({
  timestamp: Type.String(),
  syncRunId: Type.Number(),
  error: Type.Union([Type.String(), Type.Null()]),
  errorsCount: Type.Number(),
  mode: SyncModeSchema,
});

// ============================================================================
// Entity Schemas
// ============================================================================

export const SyncRunSchema = Type.Object({
  id: Type.Number(),
  connectionId: Type.Number(),
  mode: SyncModeSchema,
  status: SyncRunStatusSchema,
  triggeredBy: SyncTriggerSchema,
  startedAt: NullableDateTimeSchema,
  endedAt: NullableDateTimeSchema,
  resourcesSynced: Type.Number(),
  errorsCount: Type.Number(),
  errorSummary: Type.Union([Type.String(), Type.Null()]),
  createdAt: DateTimeSchema,
});

export const SyncRunDetailSchema = Type.Composite([
  SyncRunSchema,
  Type.Object({
    totals: Type.Object({
      created: Type.Number(),
      updated: Type.Number(),
      skipped: Type.Number(),
      errors: Type.Number(),
      durationMs: Type.Number(),
    }),
    resourceMetrics: Type.Record(Type.String(), ResourceMetricsSchema),
    resourceErrors: Type.Record(
      Type.String(),
      Type.Array(ResourceErrorEntrySchema)
    ),
  }),
]);

export const SyncAlertSchema = Type.Object({
  id: Type.Number(),
  connectionId: Type.Number(),
  consecutiveFailures: Type.Number(),
  lastAlertSentAt: NullableDateTimeSchema,
  acknowledgedAt: NullableDateTimeSchema,
  acknowledgedBy: Type.Union([Type.String(), Type.Null()]),
  failureDetails: Type.Array(FailureDetailSchema),
});

// ============================================================================
// ID Parameter Schemas
// ============================================================================

export const RunIdParamSchema = Type.Object({
  runId: Type.Integer({ minimum: 1 }),
});

export type RunIdParam = Static<typeof RunIdParamSchema>;

export const ConnectionIdParamSchema = Type.Object({
  connectionId: Type.Integer({ minimum: 1 }),
});

export type ConnectionIdParam = Static<typeof ConnectionIdParamSchema>;

export const AlertIdParamSchema = Type.Object({
  alertId: Type.Integer({ minimum: 1 }),
});

export type AlertIdParam = Static<typeof AlertIdParamSchema>;
