/**
 * Remote API error types
 */

const MAX_BODY_LENGTH = 500;

export interface RemoteApiErrorDetails {
  /** Last HTTP status seen, or null for network failures and timeouts */
  status: number | null;
  endpoint: string;
  attempts: number;
  body?: string;
}

/**
 * A request that could not be completed, either because the remote API
 * rejected it or because every retry was used up.
 */
export class RemoteApiError extends Error {
  code = "REMOTE_API_ERROR" as const;
  status: number | null;
  endpoint: string;
  attempts: number;
  body?: string;

  constructor(message: string, details: RemoteApiErrorDetails) {
    super(message);
    this.name = "RemoteApiError";
    this.status = details.status;
    this.endpoint = details.endpoint;
    this.attempts = details.attempts;
    this.body =
      details.body !== undefined && details.body.length > MAX_BODY_LENGTH
        ? `${details.body.slice(0, MAX_BODY_LENGTH)}...`
        : details.body;
  }
}

export class ConnectionNotConfiguredError extends Error {
  code = "CONNECTION_NOT_CONFIGURED" as const;

  constructor(message = "Remote API connection is not configured") {
    super(message);
    this.name = "ConnectionNotConfiguredError";
  }
}
