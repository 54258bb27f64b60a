import { input, password } from "@inquirer/prompts";
import chalk from "chalk";
import ora from "ora";

import { db, closeConnection } from "../../db/connection.js";
import { RemoteApiClient } from "../../remote/client.js";
import { bootstrapServices } from "../../services/container.js";
import { getSecretCipher } from "../../utils/crypto.js";
import { errorMessage } from "../../utils/guards.js";
import { displayConnection } from "../utils/display.js";
import { parsePositiveInt } from "../utils/options.js";

import type { Command } from "commander";

// ============================================================================
// Connection Commands
// ============================================================================

export function registerConnectionCommand(program: Command): void {
  const connection = program
    .command("connection")
    .description("Manage remote API connections");

  // connection configure
  connection
    .command("configure")
    .description("Create a connection or replace its credentials")
    .option("--id <id>", "Update an existing connection", parsePositiveInt)
    .option("--name <name>", "Display name")
    .option("--base-url <url>", "API base URL, e.g. https://example.test/api")
    .option("--client-id <clientId>", "API client ID")
    .action(
      async (options: {
        id?: number;
        name?: string;
        baseUrl?: string;
        clientId?: string;
      }) => {
        try {
          const services = await bootstrapServices(db);
          const existing =
            options.id !== undefined
              ? await services.connections.findById(options.id)
              : null;
          if (options.id !== undefined && existing === null) {
            console.error(`Connection ${String(options.id)} not found`);
            process.exitCode = 1;
            return;
          }

          const name =
            options.name ??
            (await input({
              message: "Connection name:",
              default: existing?.name ?? "Primary",
            }));
          const baseUrl =
            options.baseUrl ??
            (await input({
              message: "API base URL:",
              default: existing?.base_url,
              validate: (value) =>
                URL.canParse(value) ? true : "Enter an absolute URL",
            }));
          const clientId =
            options.clientId ??
            (await input({
              message: "Client ID:",
              default: existing?.client_id,
              required: true,
            }));
          const secret = await password({
            message: "Client secret:",
            mask: "*",
            validate: (value) => (value !== "" ? true : "Required"),
          });

          const saved = await services.connections.save(
            {
              name,
              baseUrl: baseUrl.replace(/\/+$/, ""),
              clientId,
              clientSecretEncrypted: getSecretCipher().encrypt(secret),
            },
            existing?.id
          );

          console.log(
            chalk.green(`\nConnection ${String(saved.id)} saved (${saved.name})`)
          );
        } catch (error) {
          console.error(`Error: ${errorMessage(error)}`);
          process.exitCode = 1;
        } finally {
          await closeConnection();
        }
      }
    );

  // connection show
  connection
    .command("show")
    .description("Show configured connections and their health")
    .action(async () => {
      try {
        const services = await bootstrapServices(db);
        const connections = await services.connections.list();

        if (connections.length === 0) {
          console.log("No connections configured (run 'connection configure')");
          return;
        }
        for (const row of connections) {
          displayConnection(row);
        }
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // connection test
  connection
    .command("test")
    .description("Probe the remote API with the stored credentials")
    .option("--id <id>", "Connection ID (default: first)", parsePositiveInt)
    .action(async (options: { id?: number }) => {
      const spinner = ora("Testing connection...").start();

      try {
        const services = await bootstrapServices(db);
        const row =
          options.id !== undefined
            ? await services.connections.findById(options.id)
            : await services.connections.findDefault();
        if (row === null) {
          spinner.fail("Connection not found");
          process.exitCode = 1;
          return;
        }

        const client = new RemoteApiClient(row, {
          config: services.config.sync,
          credentials: services.credentials,
        });
        if (!client.isConfigured()) {
          spinner.fail("Connection is missing credentials");
          process.exitCode = 1;
          return;
        }

        const ok = await client.testConnection();
        await services.connections.updateStatus(
          row.id,
          ok
            ? { status: "connected", lastError: null }
            : { status: "error", lastError: "Connection test failed" }
        );

        if (ok) {
          spinner.succeed(`Connected to ${row.base_url}`);
        } else {
          spinner.fail(`Could not reach ${row.base_url} (see logs)`);
          process.exitCode = 1;
        }
      } catch (error) {
        spinner.fail(`Failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
