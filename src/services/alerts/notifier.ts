/**
 * Notifiers - Delivery channels for sync failure alerts
 */

import { alertLogger, type Logger } from "../../logger.js";

import type { AlertsConfig } from "../../config.js";
import type { SyncFailureAlert, SyncRun } from "../../db/types.js";

// ============================================================================
// Message
// ============================================================================

export interface AlertMessage {
  subject: string;
  recipients: string[];
  body: string[];
  alertId: number;
  connectionId: number;
  consecutiveFailures: number;
  syncRunId: number;
}

export interface Notifier {
  send(message: AlertMessage): Promise<void>;
}

/** Recent failures listed in a message */
const RECENT_FAILURES = 3;

export function buildSyncFailureMessage(
  alert: SyncFailureAlert,
  run: SyncRun,
  connectionName: string,
  recipients: readonly string[]
): AlertMessage {
  const failures = alert.consecutive_failures;
  const body = [
    `The ${connectionName} sync has failed ${String(failures)} consecutive times.`,
    "",
    "Last sync attempt:",
    `Mode: ${run.mode}`,
    `Started: ${run.started_at?.toISOString() ?? "never started"}`,
  ];

  if (run.error_summary) {
    body.push("", "Error summary:", run.error_summary);
  }

  const recent = alert.failure_details.slice(-RECENT_FAILURES);
  if (recent.length > 0) {
    body.push("", "Recent failures:");
    for (const failure of recent) {
      body.push(`- ${failure.timestamp}: ${failure.error ?? "No details available"}`);
    }
  }

  body.push(
    "",
    "Acknowledge the alert to stop further notifications until the next failure."
  );

  return {
    subject: `Sync alert: ${String(failures)} consecutive sync failures`,
    recipients: [...recipients],
    body,
    alertId: alert.id,
    connectionId: alert.connection_id,
    consecutiveFailures: failures,
    syncRunId: run.id,
  };
}

// ============================================================================
// Channels
// ============================================================================

export class NotificationError extends Error {
  constructor(
    message: string,
    public status: number | null = null
  ) {
    super(message);
    this.name = "NotificationError";
  }
}

/**
 * POSTs the message as JSON to a webhook (mail relay, chat integration)
 */
export class WebhookNotifier implements Notifier {
  constructor(
    private readonly url: string,
    private readonly fetchFn: typeof fetch = fetch,
    private readonly timeoutMs = 10_000
  ) {}

  async send(message: AlertMessage): Promise<void> {
    const response = await this.fetchFn(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(message),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new NotificationError(
        `Webhook responded with ${String(response.status)}`,
        response.status
      );
    }
  }
}

/**
 * Writes the message to the alert log; the channel used when no webhook
 * is configured
 */
export class LogNotifier implements Notifier {
  constructor(private readonly log: Logger = alertLogger) {}

  send(message: AlertMessage): Promise<void> {
    this.log.warn(
      {
        alertId: message.alertId,
        connectionId: message.connectionId,
        recipients: message.recipients,
        consecutiveFailures: message.consecutiveFailures,
      },
      `${message.subject}\n${message.body.join("\n")}`
    );
    return Promise.resolve();
  }
}

export function createNotifier(config: AlertsConfig): Notifier {
  return config.webhookUrl !== null
    ? new WebhookNotifier(config.webhookUrl)
    : new LogNotifier();
}
