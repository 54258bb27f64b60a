import { checkConnection, closeConnection, db } from "../db/connection.js";
import { fastifyLoggerConfig } from "../logger.js";
import { bootstrapServices } from "../services/container.js";
import { buildServer } from "./app.js";

const PORT = Number.parseInt(process.env.PORT ?? "3000", 10);
const HOST = process.env.HOST ?? "0.0.0.0";

const services = await bootstrapServices(db);

const app = await buildServer(
  {
    runs: services.runs,
    scheduler: services.scheduler,
    policy: services.policy,
    escalation: services.escalation,
    checkDatabase: checkConnection,
  },
  { logger: fastifyLoggerConfig }
);

app.addHook("onClose", async () => {
  await closeConnection();
});

// Start server
try {
  await app.listen({ port: PORT, host: HOST });
  app.log.info({ host: HOST, port: PORT }, "Server started");
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}
