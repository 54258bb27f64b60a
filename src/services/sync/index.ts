// Sync Services - Re-exports
export { IngestionOrchestrator, type SyncCompletionListener } from "./orchestrator.js";
export { ResourceSyncTracker } from "./tracker.js";
export { RecordProcessor, type ProcessOutcome } from "./processor.js";
export { RawEventReplayer, type ReplayResult } from "./replay.js";
export {
  SyncScheduler,
  ConnectionNotFoundError,
  type SyncRuntime,
  type TickOutcome,
} from "./runner.js";
export { KyselySyncRunRepository, type SyncRunRepository } from "./runs.js";
export { KyselyRawEventRepository, type RawEventRepository } from "./raw-events.js";
export { KyselyEntityRepository, type EntityRepository } from "./entities.js";
export {
  KyselyConnectionRepository,
  type ConnectionRepository,
} from "./connections.js";
export {
  SyncAlreadyPendingError,
  SyncAlreadyRunningError,
  RunStateError,
  ResourceAlreadyProcessedError,
} from "./errors.js";
