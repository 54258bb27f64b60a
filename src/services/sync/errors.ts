/**
 * Ingestion pipeline errors
 */

export class SyncAlreadyRunningError extends Error {
  code = "SYNC_ALREADY_RUNNING" as const;
  connectionId: number;
  runningRunId: number | null;

  constructor(connectionId: number, runningRunId: number | null) {
    super(
      runningRunId === null
        ? `A sync is already running for connection ${String(connectionId)}`
        : `Sync run ${String(runningRunId)} is already running for connection ${String(connectionId)}`
    );
    this.name = "SyncAlreadyRunningError";
    this.connectionId = connectionId;
    this.runningRunId = runningRunId;
  }
}

export class SyncAlreadyPendingError extends Error {
  code = "SYNC_ALREADY_PENDING" as const;

  constructor(
    public connectionId: number,
    public pendingRunId: number
  ) {
    super(
      `Sync run ${String(pendingRunId)} is already queued for connection ${String(connectionId)}`
    );
    this.name = "SyncAlreadyPendingError";
  }
}

/**
 * An operation was attempted on a run in the wrong lifecycle state
 */
export class RunStateError extends Error {
  code = "RUN_STATE_ERROR" as const;

  constructor(message: string) {
    super(message);
    this.name = "RunStateError";
  }
}

export class ResourceAlreadyProcessedError extends Error {
  code = "RESOURCE_ALREADY_PROCESSED" as const;

  constructor(resourceType: string, runId: number) {
    super(
      `Resource '${resourceType}' was already processed in run ${String(runId)}`
    );
    this.name = "ResourceAlreadyProcessedError";
  }
}

/**
 * PostgreSQL unique_violation
 */
export function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "23505"
  );
}
