/**
 * Service wiring shared by the CLI and the HTTP server
 */

import { RemoteApiClient } from "../remote/client.js";
import { BasicAuthCredentials } from "../remote/credentials.js";
import { getSecretCipher } from "../utils/crypto.js";
import { FailureEscalationService } from "./alerts/escalation.js";
import { createNotifier } from "./alerts/notifier.js";
import { KyselyAlertRepository } from "./alerts/repository.js";
import { SchedulingPolicy } from "./scheduling/policy.js";
import { KyselySettingsRepository, loadConfigFromDatabase } from "./settings.js";
import {
  KyselyConnectionRepository,
  KyselyEntityRepository,
  KyselyRawEventRepository,
  KyselySyncRunRepository,
  RawEventReplayer,
  SyncScheduler,
} from "./sync/index.js";

import type { AppConfig } from "../config.js";
import type { Database } from "../db/types.js";
import type { Kysely } from "kysely";

export type Services = ReturnType<typeof createServices>;

export function createServices(db: Kysely<Database>, config: AppConfig) {
  const runs = new KyselySyncRunRepository(db);
  const rawEvents = new KyselyRawEventRepository(db);
  const entities = new KyselyEntityRepository(db);
  const connections = new KyselyConnectionRepository(db);
  const alerts = new KyselyAlertRepository(db);

  const escalation = new FailureEscalationService({
    alerts,
    notifier: createNotifier(config.alerts),
    connections,
    config,
  });
  const policy = new SchedulingPolicy(config);
  const credentials = new BasicAuthCredentials(getSecretCipher);

  const scheduler = new SyncScheduler(
    {
      config,
      runs,
      rawEvents,
      entities,
      connections,
      escalation,
      createSource: (connection) =>
        new RemoteApiClient(connection, { config: config.sync, credentials }),
    },
    policy
  );

  return {
    config,
    runs,
    rawEvents,
    entities,
    connections,
    alerts,
    escalation,
    policy,
    scheduler,
    credentials,
    replayer: new RawEventReplayer(rawEvents, entities),
  };
}

/**
 * Load the configuration (with settings-table overrides) and wire services
 */
export async function bootstrapServices(db: Kysely<Database>): Promise<Services> {
  const config = await loadConfigFromDatabase(new KyselySettingsRepository(db));
  return createServices(db, config);
}
