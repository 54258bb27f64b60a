#!/usr/bin/env node

/**
 * Property Ingest CLI
 *
 * Scheduler entry point and operator tooling for the property-management
 * ingestion service.
 */

import { Command } from "commander";

import { registerAlertsCommand } from "./commands/alerts.js";
import { registerConnectionCommand } from "./commands/connection.js";
import { registerDbCommand } from "./commands/db.js";
import { registerSyncCommand, showSyncStatus } from "./commands/sync.js";
import { parsePositiveInt } from "./utils/options.js";

const program = new Command();

program
  .name("property-ingest")
  .description("Property-management data ingestion CLI")
  .version("0.1.0");

// Register all commands
registerDbCommand(program);
registerConnectionCommand(program);
registerSyncCommand(program);
registerAlertsCommand(program);

// Top-level alias for 'sync status'
program
  .command("status")
  .description("Show recent sync runs (alias for 'sync status')")
  .option("--failed", "Show only failed runs")
  .option("--limit <n>", "Number of runs", parsePositiveInt, 20)
  .action(async (options: { failed?: boolean; limit: number }) => {
    await showSyncStatus(options);
  });

program.action(() => {
  // Show help by default
  program.outputHelp();
});

await program.parseAsync();
