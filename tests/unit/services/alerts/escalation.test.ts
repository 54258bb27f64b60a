import { describe, it, expect, beforeEach, vi, type Mock } from "vitest";

import {
  AlertNotFoundError,
  FailureEscalationService,
} from "../../../../src/services/alerts/escalation.js";
import { testConfig } from "../../../fixtures/remote.js";
import {
  MemoryAlertRepository,
  MemoryConnectionRepository,
  MemorySyncRunRepository,
} from "../../../mocks/memory-repositories.js";

import type { AlertMessage } from "../../../../src/services/alerts/notifier.js";
import type { SyncRun } from "../../../../src/db/types.js";

const START = new Date("2024-06-05T17:00:00.000Z");

describe("FailureEscalationService", () => {
  let alerts: MemoryAlertRepository;
  let runs: MemorySyncRunRepository;
  let send: Mock<(message: AlertMessage) => Promise<void>>;
  let time: Date;

  function createService(env: Record<string, string> = {}) {
    return new FailureEscalationService({
      alerts,
      notifier: { send },
      connections: new MemoryConnectionRepository(),
      config: testConfig({ ALERT_RECIPIENTS: "ops@example.test", ...env }),
      now: () => time,
    });
  }

  function failedRun(summary = "properties: timeout"): SyncRun {
    return runs.seed({
      status: "failed",
      mode: "incremental",
      started_at: time,
      ended_at: time,
      errors_count: 1,
      error_summary: summary,
    });
  }

  function completedRun(): SyncRun {
    return runs.seed({ status: "completed", started_at: time, ended_at: time });
  }

  function advance(minutes: number): void {
    time = new Date(time.getTime() + minutes * 60_000);
  }

  beforeEach(() => {
    alerts = new MemoryAlertRepository();
    runs = new MemorySyncRunRepository();
    send = vi.fn<(message: AlertMessage) => Promise<void>>().mockResolvedValue(undefined);
    time = START;
  });

  it("should notify once the threshold is reached", async () => {
    const service = createService();

    const first = await service.handleSyncCompleted(failedRun());
    const second = await service.handleSyncCompleted(failedRun());
    const third = await service.handleSyncCompleted(failedRun());

    expect(first).toEqual({
      action: "recorded",
      connectionId: 1,
      consecutiveFailures: 1,
      notified: false,
      reason: "below_threshold",
    });
    expect(second).toMatchObject({ consecutiveFailures: 2, notified: false });
    expect(third).toEqual({
      action: "recorded",
      connectionId: 1,
      consecutiveFailures: 3,
      notified: true,
    });
    expect(send).toHaveBeenCalledTimes(1);
    expect(alerts.rows[0]?.last_alert_sent_at).toEqual(START);
  });

  it("should rate limit notifications within the cooldown", async () => {
    const service = createService();
    for (let i = 0; i < 3; i++) {
      await service.handleSyncCompleted(failedRun());
    }

    advance(30);
    const limited = await service.handleSyncCompleted(failedRun());
    advance(30);
    const resent = await service.handleSyncCompleted(failedRun());

    expect(limited).toMatchObject({
      consecutiveFailures: 4,
      notified: false,
      reason: "cooldown",
    });
    expect(resent).toMatchObject({ consecutiveFailures: 5, notified: true });
    expect(send).toHaveBeenCalledTimes(2);
  });

  it("should address the message to the configured recipients", async () => {
    const service = createService({ ALERT_FAILURE_THRESHOLD: "1" });
    const run = failedRun("units: Failed to fetch units page 2: timeout");

    await service.handleSyncCompleted(run);

    expect(send).toHaveBeenCalledWith(
      expect.objectContaining({
        subject: "Sync alert: 1 consecutive sync failures",
        recipients: ["ops@example.test"],
        connectionId: 1,
        syncRunId: run.id,
      })
    );
  });

  it("should reset the counter on success", async () => {
    const service = createService();
    await service.handleSyncCompleted(failedRun());
    await service.handleSyncCompleted(failedRun());

    const outcome = await service.handleSyncCompleted(completedRun());

    expect(outcome).toEqual({ action: "reset", connectionId: 1 });
    expect(alerts.rows[0]).toMatchObject({
      consecutive_failures: 0,
      failure_details: [],
    });
  });

  it("should keep an acknowledgment across a success and clear it on the next failure", async () => {
    const service = createService();
    await service.handleSyncCompleted(failedRun());
    const alertId = alerts.rows[0]?.id ?? -1;
    await service.acknowledgeAlert(alertId, "operator");

    await service.handleSyncCompleted(completedRun());
    expect(alerts.rows[0]?.acknowledged_by).toBe("operator");

    await service.handleSyncCompleted(failedRun());
    expect(alerts.rows[0]).toMatchObject({
      consecutive_failures: 1,
      acknowledged_at: null,
      acknowledged_by: null,
    });
  });

  it("should ignore runs that have not finished", async () => {
    const service = createService();
    const run = runs.seed({ status: "running" });

    await expect(service.handleSyncCompleted(run)).resolves.toEqual({
      action: "ignored",
      connectionId: 1,
      status: "running",
    });
    expect(alerts.rows).toHaveLength(0);
  });

  it("should record failures without notifying when notifications are disabled", async () => {
    const service = createService({
      FEATURE_NOTIFICATIONS: "false",
      ALERT_FAILURE_THRESHOLD: "1",
    });

    const outcome = await service.handleSyncCompleted(failedRun());

    expect(outcome).toMatchObject({
      consecutiveFailures: 1,
      reason: "notifications_disabled",
    });
    expect(send).not.toHaveBeenCalled();
  });

  it("should skip sending without recipients", async () => {
    const service = createService({
      ALERT_RECIPIENTS: "",
      ALERT_FAILURE_THRESHOLD: "1",
    });

    const outcome = await service.handleSyncCompleted(failedRun());

    expect(outcome).toMatchObject({ reason: "no_recipients" });
    expect(send).not.toHaveBeenCalled();
  });

  it("should not stamp the send time when delivery fails", async () => {
    const service = createService({ ALERT_FAILURE_THRESHOLD: "1" });
    send.mockRejectedValueOnce(new Error("relay unavailable"));

    const failed = await service.handleSyncCompleted(failedRun());
    advance(1);
    const retried = await service.handleSyncCompleted(failedRun());

    expect(failed).toMatchObject({ notified: false, reason: "notifier_failed" });
    expect(retried).toMatchObject({ consecutiveFailures: 2, notified: true });
    expect(alerts.rows[0]?.last_alert_sent_at).toEqual(
      new Date("2024-06-05T17:01:00.000Z")
    );
  });

  describe("acknowledgeAlert", () => {
    it("should reject an unknown alert", async () => {
      await expect(createService().acknowledgeAlert(99, "operator")).rejects.toThrow(
        new AlertNotFoundError(99)
      );
    });

    it("should drop the alert from the active list", async () => {
      const service = createService();
      await service.handleSyncCompleted(failedRun());
      expect(await service.getActiveAlerts()).toHaveLength(1);

      await service.acknowledgeAlert(alerts.rows[0]?.id ?? -1, "operator");

      expect(await service.getActiveAlerts()).toEqual([]);
    });
  });

  describe("getAlertStatus", () => {
    it("should report no alert for a healthy connection", async () => {
      await expect(createService().getAlertStatus(1)).resolves.toEqual({
        hasAlert: false,
        consecutiveFailures: 0,
        isAcknowledged: false,
        acknowledgedAt: null,
        acknowledgedBy: null,
        lastAlertSentAt: null,
        failureDetails: [],
      });
    });

    it("should report failures and acknowledgment", async () => {
      const service = createService({ ALERT_FAILURE_THRESHOLD: "1" });
      const run = failedRun();
      await service.handleSyncCompleted(run);
      await service.acknowledgeAlert(alerts.rows[0]?.id ?? -1, "operator");

      await expect(service.getAlertStatus(1)).resolves.toEqual({
        hasAlert: false,
        consecutiveFailures: 1,
        isAcknowledged: true,
        acknowledgedAt: "2024-06-05T17:00:00.000Z",
        acknowledgedBy: "operator",
        lastAlertSentAt: "2024-06-05T17:00:00.000Z",
        failureDetails: [
          {
            timestamp: "2024-06-05T17:00:00.000Z",
            syncRunId: run.id,
            error: "properties: timeout",
            errorsCount: 1,
            mode: "incremental",
          },
        ],
      });
    });
  });
});
