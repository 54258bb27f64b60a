/**
 * OpenAPI Plugin - Generates OpenAPI 3.0 specification
 */

import swagger from "@fastify/swagger";
import fp from "fastify-plugin";

import type { FastifyInstance } from "fastify";

function openapiPlugin(
  fastify: FastifyInstance,
  _opts: Record<string, unknown>,
  done: () => void
): void {
  void fastify.register(swagger, {
    openapi: {
      openapi: "3.0.3",
      info: {
        title: "Property Ingest API",
        description:
          "Operational API of the property-management ingestion service: sync run history, " +
          "on-demand run requests, the business-hours schedule and consecutive-failure alerts.",
        version: "1.0.0",
      },
      servers: [
        {
          url: "http://localhost:3000",
          description: "Local development server",
        },
      ],
      tags: [
        {
          name: "Health",
          description: "Liveness of the API and its database",
        },
        {
          name: "Sync",
          description: "Sync runs, run requests and the sync schedule",
        },
        {
          name: "Alerts",
          description: "Consecutive sync failure alerts per connection",
        },
      ],
    },
  });

  done();
}

export const openapi = fp(openapiPlugin, { name: "openapi" });
