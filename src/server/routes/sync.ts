/**
 * Sync API Routes
 *
 * Run history, on-demand run requests, the current schedule and failure
 * alerts. Runs requested here are queued as `pending` and executed by the
 * next scheduler tick.
 */

import { Type, type Static } from "@sinclair/typebox";

import {
  toSyncAlertDto,
  toSyncRunDetailDto,
  toSyncRunDto,
} from "../../services/sync/summary.js";
import { createPaginationMeta, validateCursor } from "../../utils/pagination.js";
import { NotFoundError, ValidationError } from "../plugins/error-handler.js";
import {
  AlertIdParamSchema,
  ConnectionIdParamSchema,
  FailureDetailSchema,
  PaginationQuerySchema,
  RunIdParamSchema,
  SyncAlertSchema,
  SyncModeSchema,
  SyncRunDetailSchema,
  SyncRunSchema,
  SyncRunStatusSchema,
  createListResponseSchema,
  createResponseSchema,
  type AlertIdParam,
  type ConnectionIdParam,
  type RunIdParam,
} from "../schemas/common.js";

import type { FailureEscalationService } from "../../services/alerts/escalation.js";
import type { SchedulingPolicy } from "../../services/scheduling/policy.js";
import type { SyncScheduler } from "../../services/sync/runner.js";
import type { SyncRunRepository } from "../../services/sync/runs.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Dependencies
// ============================================================================

export interface SyncRouteDeps {
  runs: Pick<SyncRunRepository, "findById" | "list">;
  scheduler: Pick<SyncScheduler, "requestRun">;
  policy: Pick<SchedulingPolicy, "getConfiguration" | "describe">;
  escalation: Pick<
    FailureEscalationService,
    "getActiveAlerts" | "getAlertStatus" | "acknowledgeAlert"
  >;
}

// ============================================================================
// Schemas
// ============================================================================

const SyncRunsQuerySchema = Type.Composite([
  PaginationQuerySchema,
  Type.Object({
    status: Type.Optional(SyncRunStatusSchema),
    connectionId: Type.Optional(Type.Integer({ minimum: 1 })),
  }),
]);

type SyncRunsQuery = Static<typeof SyncRunsQuerySchema>;

const CreateSyncRunBodySchema = Type.Object({
  connectionId: Type.Integer({ minimum: 1 }),
  mode: Type.Optional(SyncModeSchema),
});

type CreateSyncRunBody = Static<typeof CreateSyncRunBodySchema>;

const AcknowledgeBodySchema = Type.Object({
  user: Type.String({ minLength: 1 }),
});

type AcknowledgeBody = Static<typeof AcknowledgeBodySchema>;

const ScheduleSchema = Type.Object({
  enabled: Type.Boolean(),
  timezone: Type.String(),
  businessHours: Type.String(),
  weekdaysOnly: Type.Boolean(),
  businessHoursInterval: Type.Number(),
  offHoursInterval: Type.Number(),
  fullSyncTime: Type.String(),
  isBusinessHours: Type.Boolean(),
  currentInterval: Type.Number(),
  shouldSyncNow: Type.Boolean(),
  nextSync: Type.String({ format: "date-time" }),
  description: Type.String(),
});

const AlertStatusSchema = Type.Object({
  connectionId: Type.Number(),
  hasAlert: Type.Boolean(),
  consecutiveFailures: Type.Number(),
  isAcknowledged: Type.Boolean(),
  acknowledgedAt: Type.Union([Type.String(), Type.Null()]),
  acknowledgedBy: Type.Union([Type.String(), Type.Null()]),
  lastAlertSentAt: Type.Union([Type.String(), Type.Null()]),
  failureDetails: Type.Array(FailureDetailSchema),
});

// ============================================================================
// Route Registration
// ============================================================================

export function registerSyncRoutes(
  app: FastifyInstance,
  deps: SyncRouteDeps
): void {
  // GET /sync/runs - Run history, newest first
  app.get<{ Querystring: SyncRunsQuery }>(
    "/sync/runs",
    {
      schema: {
        summary: "List sync runs",
        description:
          "Returns sync runs newest first, optionally filtered by status or connection",
        tags: ["Sync"],
        querystring: SyncRunsQuerySchema,
        response: {
          200: createListResponseSchema(SyncRunSchema),
        },
      },
    },
    async (request, reply) => {
      const { limit = 20, cursor, status, connectionId } = request.query;

      const cursorPayload = validateCursor(cursor);
      if (cursor !== undefined && cursorPayload === null) {
        throw new ValidationError("Invalid cursor", { cursor });
      }

      // Fetch one extra to determine hasMore
      const rows = await deps.runs.list({
        status,
        connectionId,
        cursor: cursorPayload,
        limit: limit + 1,
      });

      const hasMore = rows.length > limit;
      const runs = rows.slice(0, limit);

      return reply.send({
        data: runs.map(toSyncRunDto),
        meta: {
          pagination: createPaginationMeta(runs, limit, "id", hasMore),
        },
      });
    }
  );

  // GET /sync/runs/:runId - One run with per-resource metrics
  app.get<{ Params: RunIdParam }>(
    "/sync/runs/:runId",
    {
      schema: {
        summary: "Get sync run",
        description:
          "Returns a sync run with totals, per-resource metrics and recorded errors",
        tags: ["Sync"],
        params: RunIdParamSchema,
        response: {
          200: createResponseSchema(SyncRunDetailSchema),
        },
      },
    },
    async (request, reply) => {
      const run = await deps.runs.findById(request.params.runId);
      if (run === null) {
        throw new NotFoundError(
          `Sync run ${String(request.params.runId)} not found`
        );
      }

      return reply.send({ data: toSyncRunDetailDto(run) });
    }
  );

  // POST /sync/runs - Queue a run for the next tick
  app.post<{ Body: CreateSyncRunBody }>(
    "/sync/runs",
    {
      schema: {
        summary: "Request a sync run",
        description:
          "Queues a pending run executed by the next scheduler tick. Responds 409 when the connection already has a pending or running run.",
        tags: ["Sync"],
        body: CreateSyncRunBodySchema,
        response: {
          202: createResponseSchema(SyncRunSchema),
        },
      },
    },
    async (request, reply) => {
      const { connectionId, mode = "incremental" } = request.body;
      const run = await deps.scheduler.requestRun(connectionId, mode, "api");
      return reply.status(202).send({ data: toSyncRunDto(run) });
    }
  );

  // GET /sync/schedule - Current scheduling decision
  app.get(
    "/sync/schedule",
    {
      schema: {
        summary: "Get sync schedule",
        description:
          "Returns the business-hours configuration and the current scheduling decision",
        tags: ["Sync"],
        response: {
          200: createResponseSchema(ScheduleSchema),
        },
      },
    },
    async (_request, reply) => {
      return reply.send({
        data: {
          ...deps.policy.getConfiguration(),
          description: deps.policy.describe(),
        },
      });
    }
  );

  // GET /sync/alerts - Unacknowledged alerts
  app.get(
    "/sync/alerts",
    {
      schema: {
        summary: "List active alerts",
        description:
          "Returns connections with consecutive failures that are not acknowledged",
        tags: ["Alerts"],
        response: {
          200: createResponseSchema(Type.Array(SyncAlertSchema)),
        },
      },
    },
    async (_request, reply) => {
      const alerts = await deps.escalation.getActiveAlerts();
      return reply.send({ data: alerts.map(toSyncAlertDto) });
    }
  );

  // GET /sync/alerts/:connectionId - Alert status of one connection
  app.get<{ Params: ConnectionIdParam }>(
    "/sync/alerts/:connectionId",
    {
      schema: {
        summary: "Get alert status",
        description: "Returns the failure alert state of a connection",
        tags: ["Alerts"],
        params: ConnectionIdParamSchema,
        response: {
          200: createResponseSchema(AlertStatusSchema),
        },
      },
    },
    async (request, reply) => {
      const { connectionId } = request.params;
      const status = await deps.escalation.getAlertStatus(connectionId);
      return reply.send({ data: { connectionId, ...status } });
    }
  );

  // POST /sync/alerts/:alertId/acknowledge
  app.post<{ Params: AlertIdParam; Body: AcknowledgeBody }>(
    "/sync/alerts/:alertId/acknowledge",
    {
      schema: {
        summary: "Acknowledge an alert",
        description:
          "Suppresses notifications until the next failure. The failure counter is left unchanged.",
        tags: ["Alerts"],
        params: AlertIdParamSchema,
        body: AcknowledgeBodySchema,
        response: {
          200: createResponseSchema(SyncAlertSchema),
        },
      },
    },
    async (request, reply) => {
      const alert = await deps.escalation.acknowledgeAlert(
        request.params.alertId,
        request.body.user
      );
      return reply.send({ data: toSyncAlertDto(alert) });
    }
  );
}
