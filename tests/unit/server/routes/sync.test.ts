import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { buildServer } from "../../../../src/server/app.js";
import { FailureEscalationService } from "../../../../src/services/alerts/escalation.js";
import { SchedulingPolicy } from "../../../../src/services/scheduling/policy.js";
import { SyncScheduler } from "../../../../src/services/sync/runner.js";
import { encodeCursor } from "../../../../src/utils/pagination.js";
import { FakeSource, testConfig } from "../../../fixtures/remote.js";
import {
  MemoryAlertRepository,
  MemoryConnectionRepository,
  MemoryEntityRepository,
  MemoryRawEventRepository,
  MemorySyncRunRepository,
} from "../../../mocks/memory-repositories.js";

import type { FastifyInstance } from "fastify";

// 10:07 on a Wednesday in Los Angeles
const NOW = new Date("2024-06-05T17:07:00.000Z");

describe("Sync API", () => {
  let app: FastifyInstance;
  let runs: MemorySyncRunRepository;
  let alerts: MemoryAlertRepository;
  let escalation: FailureEscalationService;
  let databaseUp: boolean;

  beforeEach(async () => {
    const config = testConfig();
    runs = new MemorySyncRunRepository();
    alerts = new MemoryAlertRepository();
    const connections = new MemoryConnectionRepository();
    escalation = new FailureEscalationService({
      alerts,
      notifier: { send: vi.fn().mockResolvedValue(undefined) },
      connections,
      config,
      now: () => NOW,
    });
    const scheduler = new SyncScheduler(
      {
        config,
        runs,
        rawEvents: new MemoryRawEventRepository(),
        entities: new MemoryEntityRepository(),
        connections,
        escalation,
        createSource: () => new FakeSource(),
        now: () => NOW,
      },
      new SchedulingPolicy(config, () => NOW)
    );
    databaseUp = true;

    app = await buildServer({
      runs,
      scheduler,
      policy: new SchedulingPolicy(config, () => NOW),
      escalation,
      checkDatabase: () => Promise.resolve(databaseUp),
    });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  describe("GET /health", () => {
    it("should report ok when the database answers", async () => {
      const response = await app.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: "ok", database: true });
    });

    it("should report degraded without the database", async () => {
      databaseUp = false;

      const response = await app.inject({ method: "GET", url: "/health" });

      expect(response.json()).toEqual({ status: "degraded", database: false });
    });
  });

  describe("GET /api/v1/sync/runs", () => {
    beforeEach(() => {
      runs.seed({ status: "completed" });
      runs.seed({ status: "failed", error_summary: "properties: timeout" });
      runs.seed({ status: "completed" });
    });

    it("should list runs newest first with a cursor", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/api/v1/sync/runs?limit=2",
      });

      expect(response.statusCode).toBe(200);
      const body = response.json<{
        data: { id: number }[];
        meta: { pagination: { cursor: string | null; hasMore: boolean } };
      }>();
      expect(body.data.map((run) => run.id)).toEqual([3, 2]);
      expect(body.meta.pagination).toEqual({
        cursor: encodeCursor({ sortValue: 2, id: 2, direction: "forward" }),
        hasMore: true,
        limit: 2,
      });
    });

    it("should continue from a cursor", async () => {
      const cursor = encodeCursor({ sortValue: 2, id: 2, direction: "forward" });

      const response = await app.inject({
        method: "GET",
        url: `/api/v1/sync/runs?limit=2&cursor=${cursor}`,
      });

      const body = response.json<{
        data: { id: number }[];
        meta: { pagination: { hasMore: boolean; cursor: string | null } };
      }>();
      expect(body.data.map((run) => run.id)).toEqual([1]);
      expect(body.meta.pagination).toMatchObject({ hasMore: false, cursor: null });
    });

    it("should filter by status", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/api/v1/sync/runs?status=failed",
      });

      expect(response.json<{ data: unknown[] }>().data).toEqual([
        {
          id: 2,
          connectionId: 1,
          mode: "full",
          status: "failed",
          triggeredBy: "cli",
          startedAt: null,
          endedAt: null,
          resourcesSynced: 0,
          errorsCount: 0,
          errorSummary: "properties: timeout",
          createdAt: "1970-01-01T00:00:00.000Z",
        },
      ]);
    });

    it("should reject an invalid cursor", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/api/v1/sync/runs?cursor=not-a-cursor",
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        error: "VALIDATION_ERROR",
        message: "Invalid cursor",
      });
    });

    it("should reject an unknown status", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/api/v1/sync/runs?status=paused",
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ error: "VALIDATION_ERROR" });
    });
  });

  describe("GET /api/v1/sync/runs/:runId", () => {
    it("should return totals and per-resource metrics", async () => {
      runs.seed({
        status: "completed",
        resource_metrics: {
          properties: { created: 2, updated: 1, skipped: 0, errors: 0, duration_ms: 40 },
          units: { created: 5, updated: 0, skipped: 1, errors: 1, duration_ms: 60 },
        },
      });

      const response = await app.inject({ method: "GET", url: "/api/v1/sync/runs/1" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        data: {
          id: 1,
          totals: { created: 7, updated: 1, skipped: 1, errors: 1, durationMs: 100 },
          resourceMetrics: {
            units: { created: 5, updated: 0, skipped: 1, errors: 1, duration_ms: 60 },
          },
        },
      });
    });

    it("should return 404 for an unknown run", async () => {
      const response = await app.inject({ method: "GET", url: "/api/v1/sync/runs/99" });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({
        error: "NOT_FOUND",
        message: "Sync run 99 not found",
      });
    });
  });

  describe("POST /api/v1/sync/runs", () => {
    it("should queue an incremental run by default", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/api/v1/sync/runs",
        payload: { connectionId: 1 },
      });

      expect(response.statusCode).toBe(202);
      expect(response.json()).toMatchObject({
        data: {
          id: 1,
          connectionId: 1,
          mode: "incremental",
          status: "pending",
          triggeredBy: "api",
        },
      });
    });

    it("should refuse a second request while one is queued", async () => {
      await app.inject({
        method: "POST",
        url: "/api/v1/sync/runs",
        payload: { connectionId: 1, mode: "full" },
      });

      const response = await app.inject({
        method: "POST",
        url: "/api/v1/sync/runs",
        payload: { connectionId: 1 },
      });

      expect(response.statusCode).toBe(409);
      expect(response.json()).toMatchObject({
        error: "CONFLICT",
        message: "Sync run 1 is already queued for connection 1",
        details: { connectionId: 1, pendingRunId: 1 },
      });
    });

    it("should refuse while a run is in progress", async () => {
      runs.seed({ status: "running", started_at: NOW });

      const response = await app.inject({
        method: "POST",
        url: "/api/v1/sync/runs",
        payload: { connectionId: 1 },
      });

      expect(response.statusCode).toBe(409);
      expect(response.json()).toMatchObject({
        details: { connectionId: 1, runningRunId: 1 },
      });
    });

    it("should return 404 for an unknown connection", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/api/v1/sync/runs",
        payload: { connectionId: 5 },
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({ message: "Connection 5 not found" });
    });

    it("should validate the mode", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/api/v1/sync/runs",
        payload: { connectionId: 1, mode: "partial" },
      });

      expect(response.statusCode).toBe(400);
      expect(runs.rows).toHaveLength(0);
    });
  });

  describe("GET /api/v1/sync/schedule", () => {
    it("should describe the current scheduling decision", async () => {
      const response = await app.inject({ method: "GET", url: "/api/v1/sync/schedule" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        data: {
          enabled: true,
          timezone: "America/Los_Angeles",
          businessHours: "9:00 - 17:00",
          weekdaysOnly: true,
          businessHoursInterval: 15,
          offHoursInterval: 60,
          fullSyncTime: "02:00",
          isBusinessHours: true,
          currentInterval: 15,
          shouldSyncNow: false,
          nextSync: "2024-06-05T17:15:00.000Z",
          description: "Business hours: syncing every 15 minutes (America/Los_Angeles)",
        },
      });
    });
  });

  describe("alerts", () => {
    beforeEach(async () => {
      await escalation.handleSyncCompleted(
        runs.seed({ status: "failed", error_summary: "properties: timeout" })
      );
    });

    it("should list active alerts", async () => {
      const response = await app.inject({ method: "GET", url: "/api/v1/sync/alerts" });

      expect(response.json()).toMatchObject({
        data: [{ id: 1, connectionId: 1, consecutiveFailures: 1, acknowledgedAt: null }],
      });
    });

    it("should return the alert status of a connection", async () => {
      const response = await app.inject({ method: "GET", url: "/api/v1/sync/alerts/1" });

      expect(response.json()).toMatchObject({
        data: {
          connectionId: 1,
          hasAlert: true,
          consecutiveFailures: 1,
          isAcknowledged: false,
        },
      });
    });

    it("should acknowledge an alert", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/api/v1/sync/alerts/1/acknowledge",
        payload: { user: "operator" },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        data: {
          id: 1,
          acknowledgedBy: "operator",
          acknowledgedAt: "2024-06-05T17:07:00.000Z",
        },
      });
      expect(await escalation.getActiveAlerts()).toEqual([]);
    });

    it("should return 404 when acknowledging an unknown alert", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/api/v1/sync/alerts/7/acknowledge",
        payload: { user: "operator" },
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({ message: "Alert 7 not found" });
    });
  });
});
