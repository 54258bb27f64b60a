import { describe, it, expect, vi } from "vitest";

import {
  LogNotifier,
  NotificationError,
  WebhookNotifier,
  buildSyncFailureMessage,
  createNotifier,
  type AlertMessage,
} from "../../../../src/services/alerts/notifier.js";
import { MemorySyncRunRepository } from "../../../mocks/memory-repositories.js";

import type { SyncFailureAlert } from "../../../../src/db/types.js";

const EPOCH = new Date(0);

function buildAlert(overrides: Partial<SyncFailureAlert> = {}): SyncFailureAlert {
  return {
    id: 4,
    connection_id: 1,
    consecutive_failures: 3,
    last_alert_sent_at: null,
    acknowledged_at: null,
    acknowledged_by: null,
    failure_details: [],
    created_at: EPOCH,
    updated_at: EPOCH,
    ...overrides,
  };
}

describe("services/alerts/notifier", () => {
  describe("buildSyncFailureMessage", () => {
    it("should describe the last run and the recent failures", () => {
      const run = new MemorySyncRunRepository().seed({
        id: 12,
        status: "failed",
        mode: "full",
        started_at: new Date("2024-06-05T09:00:00.000Z"),
        error_summary: "leases: Failed to fetch leases page 1: timeout",
      });
      const alert = buildAlert({
        failure_details: [
          { timestamp: "t1", syncRunId: 9, error: "first", errorsCount: 1, mode: "full" },
          { timestamp: "t2", syncRunId: 10, error: "second", errorsCount: 1, mode: "full" },
          { timestamp: "t3", syncRunId: 11, error: null, errorsCount: 1, mode: "full" },
          { timestamp: "t4", syncRunId: 12, error: "fourth", errorsCount: 1, mode: "full" },
        ],
      });

      const message = buildSyncFailureMessage(alert, run, "Primary", [
        "ops@example.test",
      ]);

      expect(message.subject).toBe("Sync alert: 3 consecutive sync failures");
      expect(message.body).toEqual([
        "The Primary sync has failed 3 consecutive times.",
        "",
        "Last sync attempt:",
        "Mode: full",
        "Started: 2024-06-05T09:00:00.000Z",
        "",
        "Error summary:",
        "leases: Failed to fetch leases page 1: timeout",
        "",
        "Recent failures:",
        "- t2: second",
        "- t3: No details available",
        "- t4: fourth",
        "",
        "Acknowledge the alert to stop further notifications until the next failure.",
      ]);
      expect(message).toMatchObject({
        recipients: ["ops@example.test"],
        alertId: 4,
        connectionId: 1,
        consecutiveFailures: 3,
        syncRunId: 12,
      });
    });

    it("should note a run that never started", () => {
      const run = new MemorySyncRunRepository().seed({ status: "failed" });

      const message = buildSyncFailureMessage(buildAlert(), run, "Primary", []);

      expect(message.body[4]).toBe("Started: never started");
      expect(message.body).not.toContain("Error summary:");
    });
  });

  describe("WebhookNotifier", () => {
    const message: AlertMessage = {
      subject: "Sync alert: 3 consecutive sync failures",
      recipients: ["ops@example.test"],
      body: ["line"],
      alertId: 4,
      connectionId: 1,
      consecutiveFailures: 3,
      syncRunId: 12,
    };

    it("should post the message as JSON", async () => {
      const fetchMock = vi
        .fn<typeof fetch>()
        .mockResolvedValue(new Response(null, { status: 204 }));

      await new WebhookNotifier("https://hooks.example.test/alerts", fetchMock).send(
        message
      );

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe("https://hooks.example.test/alerts");
      expect(init?.method).toBe("POST");
      expect(init?.body).toBe(JSON.stringify(message));
    });

    it("should fail on an error response", async () => {
      const fetchMock = vi
        .fn<typeof fetch>()
        .mockResolvedValue(new Response("busy", { status: 502 }));
      const notifier = new WebhookNotifier("https://hooks.example.test/alerts", fetchMock);

      await expect(notifier.send(message)).rejects.toThrow(
        new NotificationError("Webhook responded with 502", 502)
      );
    });
  });

  describe("createNotifier", () => {
    it("should pick the channel from the webhook setting", () => {
      const base = {
        failureThreshold: 3,
        cooldownMinutes: 60,
        recipients: [],
      };

      expect(createNotifier({ ...base, webhookUrl: null })).toBeInstanceOf(LogNotifier);
      expect(
        createNotifier({ ...base, webhookUrl: "https://hooks.example.test/alerts" })
      ).toBeInstanceOf(WebhookNotifier);
    });
  });
});
