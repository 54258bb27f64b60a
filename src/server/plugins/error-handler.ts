/**
 * Fastify error handler plugin
 */

import fp from "fastify-plugin";

import { AlertNotFoundError } from "../../services/alerts/escalation.js";
import {
  SyncAlreadyPendingError,
  SyncAlreadyRunningError,
} from "../../services/sync/errors.js";
import { ConnectionNotFoundError } from "../../services/sync/runner.js";

import type { ApiError } from "../../types/api.js";
import type {
  FastifyInstance,
  FastifyError,
  FastifyRequest,
  FastifyReply,
} from "fastify";

// ============================================================================
// Custom Error Classes
// ============================================================================

export class NotFoundError extends Error {
  code = "NOT_FOUND" as const;
  statusCode = 404;

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class ValidationError extends Error {
  code = "VALIDATION_ERROR" as const;
  statusCode = 400;
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ValidationError";
    this.details = details;
  }
}

export class ConflictError extends Error {
  code = "CONFLICT" as const;
  statusCode = 409;
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ConflictError";
    this.details = details;
  }
}

type HttpError = NotFoundError | ValidationError | ConflictError;

/**
 * Translate service-layer errors into their HTTP counterparts
 */
function toHttpError(error: unknown): HttpError | null {
  if (
    error instanceof NotFoundError ||
    error instanceof ValidationError ||
    error instanceof ConflictError
  ) {
    return error;
  }
  if (error instanceof SyncAlreadyRunningError) {
    return new ConflictError(error.message, {
      connectionId: error.connectionId,
      runningRunId: error.runningRunId,
    });
  }
  if (error instanceof SyncAlreadyPendingError) {
    return new ConflictError(error.message, {
      connectionId: error.connectionId,
      pendingRunId: error.pendingRunId,
    });
  }
  if (
    error instanceof ConnectionNotFoundError ||
    error instanceof AlertNotFoundError
  ) {
    return new NotFoundError(error.message);
  }
  return null;
}

// ============================================================================
// Error Handler Plugin
// ============================================================================

function errorHandlerPlugin(fastify: FastifyInstance): void {
  fastify.setErrorHandler(
    (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
      const requestId = request.id;

      // Handle Fastify validation errors
      if (error.validation) {
        const response: ApiError = {
          error: "VALIDATION_ERROR",
          message: "Invalid request parameters",
          details: {
            validation: error.validation,
          },
          requestId,
        };
        return reply.status(400).send(response);
      }

      const httpError = toHttpError(error);
      if (httpError !== null) {
        const response: ApiError = {
          error: httpError.code,
          message: httpError.message,
          requestId,
        };
        if ("details" in httpError && httpError.details !== undefined) {
          response.details = httpError.details;
        }
        return reply.status(httpError.statusCode).send(response);
      }

      // Handle 404 errors
      if (error.statusCode === 404) {
        const response: ApiError = {
          error: "NOT_FOUND",
          message: error.message || "Resource not found",
          requestId,
        };
        return reply.status(404).send(response);
      }

      // Log unexpected errors
      request.log.error(error, "Unhandled error");

      // Return generic error for unexpected errors
      const response: ApiError = {
        error: "INTERNAL_ERROR",
        message: "An unexpected error occurred",
        requestId,
      };
      return reply.status(500).send(response);
    }
  );

  // Handle 404 for unknown routes
  fastify.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
    const response: ApiError = {
      error: "NOT_FOUND",
      message: `Route ${request.method} ${request.url} not found`,
      requestId: request.id,
    };
    return reply.status(404).send(response);
  });
}

export const errorHandler = fp(errorHandlerPlugin, {
  name: "error-handler",
});
