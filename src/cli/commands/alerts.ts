import chalk from "chalk";

import { db, closeConnection } from "../../db/connection.js";
import { bootstrapServices } from "../../services/container.js";
import { errorMessage } from "../../utils/guards.js";
import { displayAlertsTable } from "../utils/display.js";
import { parsePositiveInt } from "../utils/options.js";

import type { Command } from "commander";

// ============================================================================
// Alert Commands
// ============================================================================

export function registerAlertsCommand(program: Command): void {
  const alerts = program
    .command("alerts")
    .description("Consecutive sync failure alerts");

  // alerts list
  alerts
    .command("list")
    .description("Show unacknowledged alerts")
    .action(async () => {
      try {
        const services = await bootstrapServices(db);
        const active = await services.escalation.getActiveAlerts();

        if (active.length === 0) {
          console.log(chalk.green("No active alerts"));
          return;
        }
        displayAlertsTable(active);
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // alerts ack
  alerts
    .command("ack <alertId>")
    .description("Acknowledge an alert until the next failure")
    .requiredOption("--user <user>", "Who is acknowledging")
    .action(async (alertId: string, options: { user: string }) => {
      try {
        const services = await bootstrapServices(db);
        const alert = await services.escalation.acknowledgeAlert(
          parsePositiveInt(alertId),
          options.user
        );
        console.log(
          chalk.green(
            `Alert ${String(alert.id)} acknowledged by ${options.user} (${String(alert.consecutive_failures)} consecutive failures)`
          )
        );
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
