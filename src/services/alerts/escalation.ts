/**
 * Failure Escalation Service - Turns repeated sync failures into alerts
 *
 * A completed run resets the connection's counter. A failed run increments
 * it and, once the threshold is reached, notifies at most once per cooldown
 * window. A new failure always clears a previous acknowledgment.
 */

import { alertLogger, type Logger } from "../../logger.js";
import { errorMessage } from "../../utils/guards.js";
import { minutesBetween } from "../../utils/time.js";
import { buildSyncFailureMessage, type Notifier } from "./notifier.js";

import type { AlertRepository } from "./repository.js";
import type { AlertsConfig, FeaturesConfig } from "../../config.js";
import type { SyncFailureAlert, SyncRun } from "../../db/types.js";
import type { ConnectionRepository } from "../sync/connections.js";
import type { SyncCompletionListener } from "../sync/orchestrator.js";
import type { FailureDetail } from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export type SkipReason =
  | "below_threshold"
  | "cooldown"
  | "notifications_disabled"
  | "no_recipients"
  | "notifier_failed";

export type EscalationOutcome =
  | { action: "reset"; connectionId: number }
  | { action: "ignored"; connectionId: number; status: SyncRun["status"] }
  | {
      action: "recorded";
      connectionId: number;
      consecutiveFailures: number;
      notified: true;
    }
  | {
      action: "recorded";
      connectionId: number;
      consecutiveFailures: number;
      notified: false;
      reason: SkipReason;
    };

export interface AlertStatus {
  hasAlert: boolean;
  consecutiveFailures: number;
  isAcknowledged: boolean;
  acknowledgedAt: string | null;
  acknowledgedBy: string | null;
  lastAlertSentAt: string | null;
  failureDetails: FailureDetail[];
}

export interface EscalationDependencies {
  alerts: AlertRepository;
  notifier: Notifier;
  connections: Pick<ConnectionRepository, "findById">;
  config: { alerts: AlertsConfig; features: FeaturesConfig };
  now?: () => Date;
  logger?: Logger;
}

export class AlertNotFoundError extends Error {
  constructor(public alertId: number) {
    super(`Alert ${String(alertId)} not found`);
    this.name = "AlertNotFoundError";
  }
}

// ============================================================================
// Service
// ============================================================================

export class FailureEscalationService implements SyncCompletionListener {
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(private readonly deps: EscalationDependencies) {
    this.now = deps.now ?? (() => new Date());
    this.log = deps.logger ?? alertLogger;
  }

  async handleSyncCompleted(run: SyncRun): Promise<EscalationOutcome> {
    const connectionId = run.connection_id;

    if (run.status === "completed") {
      const previous = await this.deps.alerts.findByConnection(connectionId);
      await this.deps.alerts.resetFailures(connectionId, this.now());
      if (previous !== null && previous.consecutive_failures > 0) {
        this.log.info(
          { connectionId, previousFailures: previous.consecutive_failures },
          "Sync succeeded, failure count reset"
        );
      }
      return { action: "reset", connectionId };
    }

    if (run.status !== "failed") {
      this.log.warn(
        { connectionId, runId: run.id, status: run.status },
        "Escalation called for an unfinished run"
      );
      return { action: "ignored", connectionId, status: run.status };
    }

    const alert = await this.deps.alerts.recordFailure(connectionId, {
      timestamp: this.now().toISOString(),
      syncRunId: run.id,
      error: run.error_summary ?? "Unknown error",
      errorsCount: run.errors_count,
      mode: run.mode,
    });

    this.log.info(
      { connectionId, consecutiveFailures: alert.consecutive_failures },
      "Sync failure recorded"
    );

    const skip = (reason: SkipReason): EscalationOutcome => ({
      action: "recorded",
      connectionId,
      consecutiveFailures: alert.consecutive_failures,
      notified: false,
      reason,
    });

    const { alerts: alertsConfig, features } = this.deps.config;

    if (!features.notifications) {
      this.log.info("Notifications disabled, skipping sync failure alert");
      return skip("notifications_disabled");
    }

    if (alert.consecutive_failures < alertsConfig.failureThreshold) {
      this.log.debug(
        {
          current: alert.consecutive_failures,
          threshold: alertsConfig.failureThreshold,
        },
        "Failure threshold not reached"
      );
      return skip("below_threshold");
    }

    if (!this.cooldownElapsed(alert)) {
      this.log.info(
        {
          lastAlertSentAt: alert.last_alert_sent_at?.toISOString(),
          cooldownMinutes: alertsConfig.cooldownMinutes,
        },
        "Alert rate limited, skipping notification"
      );
      return skip("cooldown");
    }

    if (alertsConfig.recipients.length === 0) {
      this.log.warn("No recipients configured for sync failure alerts");
      return skip("no_recipients");
    }

    const connection = await this.deps.connections.findById(connectionId);
    const message = buildSyncFailureMessage(
      alert,
      run,
      connection?.name ?? `connection ${String(connectionId)}`,
      alertsConfig.recipients
    );

    try {
      await this.deps.notifier.send(message);
    } catch (error) {
      this.log.error(
        { connectionId, error: errorMessage(error) },
        "Failed to send sync failure alert"
      );
      return skip("notifier_failed");
    }

    await this.deps.alerts.markAlertSent(alert.id, this.now());
    this.log.info(
      {
        connectionId,
        consecutiveFailures: alert.consecutive_failures,
        recipients: alertsConfig.recipients,
      },
      "Sync failure alert sent"
    );

    return {
      action: "recorded",
      connectionId,
      consecutiveFailures: alert.consecutive_failures,
      notified: true,
    };
  }

  /**
   * Acknowledging leaves the counter untouched; the next failure clears it
   */
  async acknowledgeAlert(
    alertId: number,
    user: string
  ): Promise<SyncFailureAlert> {
    const alert = await this.deps.alerts.acknowledge(alertId, user, this.now());
    if (alert === null) {
      throw new AlertNotFoundError(alertId);
    }

    this.log.info(
      { alertId, connectionId: alert.connection_id, acknowledgedBy: user },
      "Sync failure alert acknowledged"
    );
    return alert;
  }

  async getAlertStatus(connectionId: number): Promise<AlertStatus> {
    const alert = await this.deps.alerts.findByConnection(connectionId);
    if (alert === null) {
      return {
        hasAlert: false,
        consecutiveFailures: 0,
        isAcknowledged: false,
        acknowledgedAt: null,
        acknowledgedBy: null,
        lastAlertSentAt: null,
        failureDetails: [],
      };
    }

    return {
      hasAlert: alert.consecutive_failures > 0 && alert.acknowledged_at === null,
      consecutiveFailures: alert.consecutive_failures,
      isAcknowledged: alert.acknowledged_at !== null,
      acknowledgedAt: alert.acknowledged_at?.toISOString() ?? null,
      acknowledgedBy: alert.acknowledged_by,
      lastAlertSentAt: alert.last_alert_sent_at?.toISOString() ?? null,
      failureDetails: alert.failure_details,
    };
  }

  async getActiveAlerts(): Promise<SyncFailureAlert[]> {
    return this.deps.alerts.listActive();
  }

  private cooldownElapsed(alert: SyncFailureAlert): boolean {
    if (alert.last_alert_sent_at === null) {
      return true;
    }
    return (
      minutesBetween(alert.last_alert_sent_at, this.now()) >=
      this.deps.config.alerts.cooldownMinutes
    );
  }
}
