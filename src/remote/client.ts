/**
 * Remote property-management API client
 *
 * One request primitive shared by every resource. Transient failures
 * (429, 5xx, network errors) are retried up to `sync.maxRetries` times;
 * other 4xx responses fail immediately.
 */

import { apiLogger, type Logger } from "../logger.js";
import { errorMessage, isRecord } from "../utils/guards.js";
import { RemoteApiError } from "./errors.js";

import type { SyncConfig } from "../config.js";
import type {
  FetchParams,
  RemoteRecord,
  ResourcePage,
  ResourceType,
} from "../types/index.js";
import type { CredentialProvider, RemoteConnection } from "./credentials.js";

// ============================================================================
// Types
// ============================================================================

/**
 * What the ingestion pipeline needs from a remote source
 */
export interface ResourceSource {
  pages(
    resourceType: ResourceType,
    params?: Omit<FetchParams, "page">
  ): AsyncIterable<ResourcePage>;
}

export interface RemoteApiClientOptions {
  config: SyncConfig;
  credentials: CredentialProvider;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  logger?: Logger;
}

const RESOURCE_PATHS: Record<ResourceType, string> = {
  properties: "properties",
  units: "units",
  vendors: "vendors",
  leases: "leases",
  work_orders: "work-orders",
  expenses: "expenses",
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return "";
  }
}

// ============================================================================
// Client
// ============================================================================

export class RemoteApiClient implements ResourceSource {
  private readonly fetchFn: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    private readonly connection: RemoteConnection,
    private readonly options: RemoteApiClientOptions
  ) {
    this.fetchFn = options.fetch ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? apiLogger).child({
      connectionId: connection.id,
    });
  }

  /**
   * Whether the connection carries everything a request needs
   */
  isConfigured(): boolean {
    return (
      this.connection.base_url !== "" &&
      this.connection.client_id !== "" &&
      this.connection.client_secret_encrypted !== null &&
      this.connection.client_secret_encrypted !== ""
    );
  }

  /**
   * Probe the API with a single-item request. Never throws.
   */
  async testConnection(): Promise<boolean> {
    if (!this.isConfigured()) {
      this.log.warn("Connection test skipped: connection is not configured");
      return false;
    }

    try {
      await this.fetchResource("properties", { page: 1, perPage: 1 });
      this.log.info("Connection test succeeded");
      return true;
    } catch (error) {
      this.log.warn(
        { error: errorMessage(error) },
        "Connection test failed"
      );
      return false;
    }
  }

  /**
   * Fetch one page of a resource
   */
  async fetchResource(
    resourceType: ResourceType,
    params: FetchParams = {}
  ): Promise<ResourcePage> {
    const page = params.page ?? 1;
    const perPage = params.perPage ?? this.options.config.perPage;
    const url = this.buildUrl(resourceType, page, perPage, params.modifiedSince);

    const body = await this.request(url);
    const envelope = this.parseEnvelope(body, url);

    this.log.debug(
      { resourceType, page, perPage, itemCount: envelope.items.length },
      "Fetched resource page"
    );

    return {
      resourceType,
      page,
      perPage,
      items: envelope.items,
      hasMore: envelope.hasMore ?? envelope.items.length === perPage,
    };
  }

  fetchProperties(params?: FetchParams): Promise<ResourcePage> {
    return this.fetchResource("properties", params);
  }

  fetchUnits(params?: FetchParams): Promise<ResourcePage> {
    return this.fetchResource("units", params);
  }

  fetchVendors(params?: FetchParams): Promise<ResourcePage> {
    return this.fetchResource("vendors", params);
  }

  fetchLeases(params?: FetchParams): Promise<ResourcePage> {
    return this.fetchResource("leases", params);
  }

  fetchWorkOrders(params?: FetchParams): Promise<ResourcePage> {
    return this.fetchResource("work_orders", params);
  }

  fetchExpenses(params?: FetchParams): Promise<ResourcePage> {
    return this.fetchResource("expenses", params);
  }

  /**
   * Iterate pages from 1 until the API reports no more data or the page
   * cap is reached
   */
  async *pages(
    resourceType: ResourceType,
    params: Omit<FetchParams, "page"> = {}
  ): AsyncGenerator<ResourcePage> {
    const { maxPages } = this.options.config;

    for (let page = 1; page <= maxPages; page++) {
      const result = await this.fetchResource(resourceType, {
        ...params,
        page,
      });
      yield result;

      if (!result.hasMore) {
        return;
      }
    }

    this.log.warn(
      { resourceType, maxPages },
      "Stopped paging: page limit reached"
    );
  }

  // ==========================================================================
  // Request primitive
  // ==========================================================================

  private buildUrl(
    resourceType: ResourceType,
    page: number,
    perPage: number,
    modifiedSince?: Date
  ): URL {
    const base = this.connection.base_url.replace(/\/+$/, "");
    const url = new URL(`${base}/v1/${RESOURCE_PATHS[resourceType]}`);
    url.searchParams.set("page", String(page));
    url.searchParams.set("per_page", String(perPage));
    if (modifiedSince !== undefined) {
      url.searchParams.set("modified_since", modifiedSince.toISOString());
    }
    return url;
  }

  private async request(url: URL): Promise<unknown> {
    const { maxRetries, requestTimeoutMs } = this.options.config;
    const endpoint = url.pathname;
    const maxAttempts = maxRetries + 1;

    const headers = {
      ...(await this.options.credentials.getHeaders(this.connection)),
      Accept: "application/json",
    };

    let lastStatus: number | null = null;
    let lastBody = "";

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const startTime = performance.now();
      let response: Response;

      try {
        response = await this.fetchFn(url, {
          method: "GET",
          headers,
          signal: AbortSignal.timeout(requestTimeoutMs),
        });
      } catch (error) {
        lastStatus = null;
        lastBody = errorMessage(error);
        this.log.warn(
          { endpoint, attempt, error: lastBody },
          "Request failed before a response was received"
        );
        if (attempt < maxAttempts) {
          await this.sleep(this.backoffDelay(attempt));
        }
        continue;
      }

      const duration = Math.round(performance.now() - startTime);
      this.log.debug(
        { endpoint, attempt, status: response.status, duration },
        "Received response from remote API"
      );

      if (response.ok) {
        try {
          return (await response.json()) as unknown;
        } catch {
          throw new RemoteApiError("Response body is not valid JSON", {
            status: response.status,
            endpoint,
            attempts: attempt,
          });
        }
      }

      const body = await readBody(response);

      if (response.status === 429 || response.status >= 500) {
        lastStatus = response.status;
        lastBody = body;
        if (attempt < maxAttempts) {
          const delay =
            response.status === 429
              ? this.retryAfterDelay(response.headers.get("retry-after"), attempt)
              : this.backoffDelay(attempt);
          this.log.warn(
            { endpoint, attempt, status: response.status, delay },
            "Transient error from remote API, retrying"
          );
          await this.sleep(delay);
        }
        continue;
      }

      this.log.error(
        { endpoint, status: response.status },
        "Remote API rejected request"
      );
      throw new RemoteApiError(
        `API error: ${String(response.status)} - ${body}`,
        { status: response.status, endpoint, attempts: attempt, body }
      );
    }

    const reason =
      lastStatus === null ? lastBody : `last status ${String(lastStatus)}`;
    this.log.error(
      { endpoint, attempts: maxAttempts, status: lastStatus },
      "Request failed after retries"
    );
    throw new RemoteApiError(
      `Request failed after ${String(maxRetries)} retries (${reason})`,
      { status: lastStatus, endpoint, attempts: maxAttempts, body: lastBody }
    );
  }

  /**
   * Exponential backoff: initial * 2^(attempt-1), capped
   */
  private backoffDelay(attempt: number): number {
    const { initialBackoffMs, maxBackoffMs } = this.options.config;
    return Math.min(initialBackoffMs * 2 ** (attempt - 1), maxBackoffMs);
  }

  /**
   * Retry-After as delta-seconds or HTTP date, capped at maxBackoffMs
   */
  private retryAfterDelay(header: string | null, attempt: number): number {
    const { maxBackoffMs } = this.options.config;
    if (header === null || header.trim() === "") {
      return this.backoffDelay(attempt);
    }

    const value = header.trim();
    let delay: number;
    if (/^\d+$/.test(value)) {
      delay = Number(value) * 1000;
    } else {
      const date = Date.parse(value);
      if (Number.isNaN(date)) {
        return this.backoffDelay(attempt);
      }
      delay = date - this.now().getTime();
    }

    return Math.min(Math.max(delay, 0), maxBackoffMs);
  }

  private parseEnvelope(
    body: unknown,
    url: URL
  ): { items: RemoteRecord[]; hasMore?: boolean } {
    if (!isRecord(body) || !Array.isArray(body.data)) {
      throw new RemoteApiError("Malformed response: missing data array", {
        status: 200,
        endpoint: url.pathname,
        attempts: 1,
      });
    }

    const items: RemoteRecord[] = [];
    for (const item of body.data) {
      if (!isRecord(item)) {
        throw new RemoteApiError("Malformed response: data item is not an object", {
          status: 200,
          endpoint: url.pathname,
          attempts: 1,
        });
      }
      items.push(item);
    }

    const meta = body.meta;
    const hasMore =
      isRecord(meta) && typeof meta.has_more === "boolean"
        ? meta.has_more
        : undefined;

    return { items, hasMore };
  }
}
