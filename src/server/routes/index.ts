/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { registerSyncRoutes, type SyncRouteDeps } from "./sync.js";

import type { FastifyInstance } from "fastify";

export interface ApiRouteDeps extends SyncRouteDeps {
  checkDatabase: () => Promise<boolean>;
}

// Health check response schema
const HealthResponseSchema = Type.Object(
  {
    status: Type.Union([Type.Literal("ok"), Type.Literal("degraded")]),
    database: Type.Boolean(),
  },
  {
    examples: [{ status: "ok", database: true }],
  }
);

/**
 * Register all API v1 routes
 */
export async function registerApiRoutes(
  app: FastifyInstance,
  deps: ApiRouteDeps
): Promise<void> {
  // Health check (no version prefix)
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        description:
          "Returns the health status of the API and whether the database answers",
        tags: ["Health"],
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    async () => {
      const database = await deps.checkDatabase();
      return { status: database ? ("ok" as const) : ("degraded" as const), database };
    }
  );

  // API v1 routes
  await app.register(
    (api) => {
      registerSyncRoutes(api, deps);
    },
    { prefix: "/api/v1" }
  );
}
