import chalk from "chalk";
import ora from "ora";

import { db, closeConnection } from "../../db/connection.js";
import { bootstrapServices, type Services } from "../../services/container.js";
import { ConnectionNotFoundError } from "../../services/sync/runner.js";
import { errorMessage } from "../../utils/guards.js";
import {
  displayReplayResult,
  displayRunDetails,
  displayRunsTable,
  displaySchedule,
} from "../utils/display.js";
import {
  parsePositiveInt,
  parseResourceType,
  parseSyncMode,
} from "../utils/options.js";

import type { ResourceType, SyncMode } from "../../types/index.js";
import type { Command } from "commander";

// ============================================================================
// Helpers
// ============================================================================

async function resolveConnectionId(
  services: Services,
  connectionId: number | undefined
): Promise<number> {
  if (connectionId !== undefined) {
    return connectionId;
  }
  const connection = await services.connections.findDefault();
  if (connection === null) {
    throw new ConnectionNotFoundError(null);
  }
  return connection.id;
}

/**
 * Recent runs; shared with the top-level `status` alias
 */
export async function showSyncStatus(options: {
  limit: number;
  failed?: boolean;
}): Promise<void> {
  try {
    const services = await bootstrapServices(db);
    const runs = await services.runs.list({
      status: options.failed === true ? "failed" : undefined,
      limit: options.limit,
    });

    if (runs.length === 0) {
      console.log("No sync runs found matching criteria");
      return;
    }

    console.log(chalk.bold("\nRecent sync runs:\n"));
    displayRunsTable(runs);

    const alerts = await services.escalation.getActiveAlerts();
    for (const alert of alerts) {
      console.log(
        chalk.red(
          `\nConnection ${String(alert.connection_id)} has ${String(alert.consecutive_failures)} consecutive failed syncs`
        )
      );
    }
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    await closeConnection();
  }
}

// ============================================================================
// Sync Commands
// ============================================================================

export function registerSyncCommand(program: Command): void {
  const sync = program
    .command("sync")
    .description("Ingest data from the remote property-management API")
    .addHelpText(
      "after",
      `
SCHEDULING:
══════════════════════════════════════════════════════════════════════════════
Run 'sync tick' from cron every minute. Each tick runs at most one sync:

  1. a run queued through the API (POST /api/v1/sync/runs)
  2. a full sync at the configured full-sync time
  3. an incremental sync when the minute is on the current interval
     (business hours: every 15 minutes, off hours: every 60 by default)

Use 'sync schedule' to see the current decision.
══════════════════════════════════════════════════════════════════════════════
`
    );

  // sync run
  sync
    .command("run")
    .description("Run a sync now, regardless of the schedule")
    .option("--mode <mode>", "full or incremental", parseSyncMode, "full")
    .option("--connection <id>", "Connection ID (default: first)", parsePositiveInt)
    .action(async (options: { mode: SyncMode; connection?: number }) => {
      const spinner = ora(`Running ${options.mode} sync...`).start();

      try {
        const services = await bootstrapServices(db);
        const connectionId = await resolveConnectionId(
          services,
          options.connection
        );
        const run = await services.scheduler.runNow(
          connectionId,
          options.mode,
          "cli"
        );

        if (run.status === "completed") {
          spinner.succeed(
            `Sync run ${String(run.id)} completed: ${String(run.resources_synced)} records synced`
          );
        } else {
          spinner.fail(
            `Sync run ${String(run.id)} failed: ${run.error_summary ?? "unknown error"}`
          );
          process.exitCode = 1;
        }
        displayRunDetails(run);
      } catch (error) {
        spinner.fail(`Failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // sync tick
  sync
    .command("tick")
    .description("Scheduler entry point: run whatever is due now")
    .option("--connection <id>", "Connection ID (default: first)", parsePositiveInt)
    .action(async (options: { connection?: number }) => {
      try {
        const services = await bootstrapServices(db);
        const outcome = await services.scheduler.tick(options.connection);

        if (outcome.action === "idle") {
          console.log(`Nothing to do (${outcome.reason.replace("_", " ")})`);
          return;
        }

        console.log(
          `Executed ${outcome.reason} sync run ${String(outcome.run.id)}: ${outcome.run.status}`
        );
        if (outcome.run.status === "failed") {
          process.exitCode = 1;
        }
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // sync status
  sync
    .command("status")
    .description("Show recent sync runs")
    .option("--failed", "Show only failed runs")
    .option("--limit <n>", "Number of runs", parsePositiveInt, 20)
    .action(async (options: { failed?: boolean; limit: number }) => {
      await showSyncStatus(options);
    });

  // sync show
  sync
    .command("show <runId>")
    .description("Show one sync run with per-resource metrics")
    .action(async (runId: string) => {
      try {
        const services = await bootstrapServices(db);
        const run = await services.runs.findById(parsePositiveInt(runId));
        if (run === null) {
          console.error(`Sync run ${runId} not found`);
          process.exitCode = 1;
          return;
        }
        displayRunDetails(run);
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // sync schedule
  sync
    .command("schedule")
    .description("Show the business-hours schedule and the current decision")
    .action(async () => {
      try {
        const services = await bootstrapServices(db);
        displaySchedule(
          services.policy.getConfiguration(),
          services.policy.describe()
        );
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // sync replay
  sync
    .command("replay")
    .description("Re-process raw events that were skipped or failed")
    .option("--resource <type>", "Only one resource type", parseResourceType)
    .option("--limit <n>", "Events per batch (default: sync.replay_batch_size)", parsePositiveInt)
    .option("--continuation <token>", "Resume after a previous batch")
    .option("--all", "Keep replaying batches until none remain")
    .action(
      async (options: {
        resource?: ResourceType;
        limit?: number;
        continuation?: string;
        all?: boolean;
      }) => {
        const spinner = ora("Replaying raw events...").start();

        try {
          const services = await bootstrapServices(db);
          const limit = options.limit ?? services.config.sync.replayBatchSize;
          let continuation = options.continuation;
          let batch = 0;

          const pending = await services.replayer.countPending(options.resource);
          spinner.info(`${String(pending)} raw events awaiting replay`);
          if (pending === 0) {
            return;
          }
          spinner.start();

          for (;;) {
            batch++;
            spinner.text = `Replaying batch ${String(batch)}...`;
            const result = await services.replayer.replayBatch({
              resourceType: options.resource,
              continuation,
              limit,
            });

            spinner.stop();
            console.log(chalk.bold(`Batch ${String(batch)}:`));
            displayReplayResult(result);

            if (!result.moreRemain || result.continuation === null) {
              spinner.succeed("Replay finished");
              break;
            }
            if (options.all !== true) {
              console.log(
                `\nMore events remain. Continue with --continuation ${result.continuation}`
              );
              break;
            }
            continuation = result.continuation;
            spinner.start();
          }
        } catch (error) {
          spinner.fail(`Failed: ${errorMessage(error)}`);
          process.exitCode = 1;
        } finally {
          await closeConnection();
        }
      }
    );
}
