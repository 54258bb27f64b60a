import { confirm } from "@inquirer/prompts";
import chalk from "chalk";
import ora from "ora";

import {
  checkConnection,
  closeConnection,
  getDatabaseUrl,
  getPoolStats,
} from "../../db/connection.js";
import {
  SCHEMA_TABLES,
  getSchemaStatus,
  getTableStats,
  runMigration,
} from "../../db/migrate.js";
import { errorMessage } from "../../utils/guards.js";
import { displayTableStats } from "../utils/display.js";

import type { Command } from "commander";

async function migrate(fresh: boolean, label: string): Promise<void> {
  const spinner = ora(fresh ? "Dropping and recreating tables..." : "Applying schema...").start();

  try {
    await runMigration({ fresh });
    spinner.succeed(label);
    displayTableStats(await getTableStats());
  } catch (error) {
    spinner.fail(`${label} failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    await closeConnection();
  }
}

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("Database schema and health");

  db.command("migrate")
    .description("Apply postgres-schema.sql (idempotent)")
    .action(async () => {
      await migrate(false, "Migration");
    });

  db.command("status")
    .description("Check the connection, the schema and table sizes")
    .action(async () => {
      const spinner = ora(`Connecting to ${getDatabaseUrl()}...`).start();

      try {
        if (!(await checkConnection())) {
          spinner.fail(`Cannot reach ${getDatabaseUrl()}`);
          process.exitCode = 1;
          return;
        }
        spinner.succeed(`Connected to ${getDatabaseUrl()}`);

        const { totalCount, idleCount, waitingCount } = getPoolStats();
        console.log(
          chalk.gray(
            `Pool: ${String(totalCount)} open, ${String(idleCount)} idle, ${String(waitingCount)} waiting`
          )
        );

        const { present, missing } = await getSchemaStatus();
        if (missing.length === SCHEMA_TABLES.length) {
          console.log(chalk.yellow("\nSchema not initialized (run 'db migrate')"));
          return;
        }
        if (missing.length > 0) {
          console.log(chalk.yellow(`\nMissing tables: ${missing.join(", ")}`));
          process.exitCode = 1;
        }
        console.log(`\n${String(present.length)}/${String(SCHEMA_TABLES.length)} tables present`);
        displayTableStats(await getTableStats());
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  db.command("reset")
    .description("Drop this service's tables and recreate them")
    .option("-y, --yes", "Skip the confirmation prompt")
    .action(async (options: { yes?: boolean }) => {
      if (options.yes !== true) {
        const proceed = await confirm({
          message: `Drop all ingestion tables in ${getDatabaseUrl()}? Synced data and run history are lost.`,
          default: false,
        });
        if (!proceed) {
          await closeConnection();
          return;
        }
      }

      await migrate(true, "Reset");
    });
}
