/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import { computeRunTotals } from "../../services/sync/summary.js";
import { RESOURCE_TYPES } from "../../types/index.js";

import type { TableStat } from "../../db/migrate.js";
import type { Connection, SyncFailureAlert, SyncRun } from "../../db/types.js";
import type { ReplayResult } from "../../services/sync/replay.js";
import type { ScheduleSnapshot } from "../../services/scheduling/policy.js";
import type { SyncRunStatus } from "../../types/index.js";

function formatDate(date: Date | null): string {
  return date !== null
    ? date.toISOString().replace("T", " ").slice(0, 19)
    : chalk.gray("-");
}

export function formatStatus(status: SyncRunStatus): string {
  switch (status) {
    case "completed":
      return chalk.green(status);
    case "failed":
      return chalk.red(status);
    case "running":
      return chalk.yellow(status);
    case "pending":
      return chalk.gray(status);
  }
}

function formatDuration(run: SyncRun): string {
  if (run.started_at === null || run.ended_at === null) {
    return chalk.gray("-");
  }
  const seconds = (run.ended_at.getTime() - run.started_at.getTime()) / 1000;
  return `${seconds.toFixed(1)}s`;
}

/**
 * Display sync runs in a formatted table
 */
export function displayRunsTable(runs: SyncRun[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("ID"),
      chalk.cyan("Mode"),
      chalk.cyan("Status"),
      chalk.cyan("Trigger"),
      chalk.cyan("Started"),
      chalk.cyan("Duration"),
      chalk.cyan("Synced"),
      chalk.cyan("Errors"),
    ],
  });

  for (const run of runs) {
    table.push([
      String(run.id),
      run.mode,
      formatStatus(run.status),
      run.triggered_by,
      formatDate(run.started_at),
      formatDuration(run),
      String(run.resources_synced),
      run.errors_count > 0 ? chalk.red(String(run.errors_count)) : "0",
    ]);
  }

  console.log(table.toString());
}

/**
 * Display one run with per-resource metrics and recorded errors
 */
export function displayRunDetails(run: SyncRun): void {
  console.log(chalk.bold.underline(`\nSync run ${String(run.id)}\n`));

  console.log(`  Connection: ${String(run.connection_id)}`);
  console.log(`  Mode:       ${run.mode}`);
  console.log(`  Status:     ${formatStatus(run.status)}`);
  console.log(`  Trigger:    ${run.triggered_by}`);
  console.log(`  Started:    ${formatDate(run.started_at)}`);
  console.log(`  Ended:      ${formatDate(run.ended_at)}`);
  console.log(`  Duration:   ${formatDuration(run)}`);
  if (run.error_summary !== null) {
    console.log(`  Summary:    ${chalk.red(run.error_summary)}`);
  }
  console.log();

  const table = new CliTable3({
    head: [
      chalk.cyan("Resource"),
      chalk.cyan("Created"),
      chalk.cyan("Updated"),
      chalk.cyan("Skipped"),
      chalk.cyan("Errors"),
      chalk.cyan("Duration"),
    ],
  });

  for (const resourceType of RESOURCE_TYPES) {
    const metrics = run.resource_metrics[resourceType];
    if (metrics === undefined) continue;
    table.push([
      resourceType,
      String(metrics.created),
      String(metrics.updated),
      String(metrics.skipped),
      metrics.errors > 0 ? chalk.red(String(metrics.errors)) : "0",
      `${String(metrics.duration_ms)}ms`,
    ]);
  }

  const totals = computeRunTotals(run);
  table.push([
    chalk.bold("total"),
    chalk.bold(String(totals.created)),
    chalk.bold(String(totals.updated)),
    chalk.bold(String(totals.skipped)),
    chalk.bold(String(totals.errors)),
    chalk.bold(`${String(totals.durationMs)}ms`),
  ]);
  console.log(table.toString());

  for (const resourceType of RESOURCE_TYPES) {
    const errors = run.resource_errors[resourceType] ?? [];
    if (errors.length === 0) continue;
    console.log(chalk.bold(`\n${resourceType} errors:`));
    for (const entry of errors) {
      const marker = entry.fatal ? chalk.red("fatal") : chalk.yellow("error");
      console.log(`  [${marker}] ${entry.message}`);
    }
  }
  console.log();
}

export function displaySchedule(
  schedule: ScheduleSnapshot,
  description: string
): void {
  console.log(chalk.bold("\nSync schedule:\n"));
  console.log(`  ${description}`);
  console.log(
    `  Business hours:  ${schedule.enabled ? schedule.businessHours : chalk.gray("disabled")}`
  );
  console.log(`  Weekdays only:   ${schedule.weekdaysOnly ? "yes" : "no"}`);
  console.log(
    `  Intervals:       ${String(schedule.businessHoursInterval)}m business / ${String(schedule.offHoursInterval)}m off hours`
  );
  console.log(`  Full sync at:    ${schedule.fullSyncTime} (${schedule.timezone})`);
  console.log(
    `  Sync now:        ${schedule.shouldSyncNow ? chalk.green("yes") : "no"}`
  );
  console.log(`  Next sync:       ${schedule.nextSync}`);
  console.log();
}

export function displayAlertsTable(alerts: SyncFailureAlert[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("ID"),
      chalk.cyan("Connection"),
      chalk.cyan("Failures"),
      chalk.cyan("Last alert"),
      chalk.cyan("Last error"),
    ],
    colWidths: [6, 12, 10, 21, 60],
    wordWrap: true,
  });

  for (const alert of alerts) {
    const last = alert.failure_details[alert.failure_details.length - 1];
    table.push([
      String(alert.id),
      String(alert.connection_id),
      chalk.red(String(alert.consecutive_failures)),
      formatDate(alert.last_alert_sent_at),
      last?.error ?? chalk.gray("-"),
    ]);
  }

  console.log(table.toString());
}

export function displayConnection(connection: Connection): void {
  console.log(chalk.bold(`\nConnection ${String(connection.id)}: ${connection.name}\n`));
  console.log(`  Base URL:     ${connection.base_url}`);
  console.log(`  Client ID:    ${connection.client_id}`);
  console.log(
    `  Secret:       ${connection.client_secret_encrypted !== null ? "stored (encrypted)" : chalk.red("missing")}`
  );
  console.log(`  Status:       ${connection.status}`);
  console.log(`  Last success: ${formatDate(connection.last_success_at)}`);
  if (connection.last_error !== null) {
    console.log(`  Last error:   ${chalk.red(connection.last_error)}`);
  }
  console.log();
}

export function displayReplayResult(result: ReplayResult): void {
  console.log(
    `  processed ${String(result.processed)} (created ${String(result.created)}, updated ${String(result.updated)}), skipped ${String(result.skipped)}, errors ${String(result.errors.length)}`
  );
  for (const error of result.errors.slice(0, 10)) {
    console.log(
      chalk.red(`  event ${String(error.eventId)} (${error.externalId ?? "no id"}): ${error.message}`)
    );
  }
}

export function displayTableStats(stats: TableStat[]): void {
  const table = new CliTable3({
    head: [chalk.cyan("Table"), chalk.cyan("Rows (est.)")],
    colAligns: ["left", "right"],
  });
  for (const stat of stats) {
    table.push([stat.table, String(stat.rows)]);
  }
  console.log(table.toString());
}
