import type { FastifyInstance } from "fastify";
import { ZodError } from "zod";
import { ApiError } from "../lib/errors.js";
import { fail } from "./response.js";

function hasStatusCode(err: unknown): err is Error & { statusCode: number } {
  return err instanceof Error && "statusCode" in err && typeof err.statusCode === "number";
}

/** Centralized error handling: every failure leaves as the response envelope */
export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err, request, reply) => {
    if (err instanceof ApiError) {
      return reply.code(err.statusCode).send(fail(err.message, err.code));
    }

    if (err instanceof ZodError) {
      const issue = err.issues[0];
      const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      return reply.code(400).send(fail(`${where}${issue.message}`, "VALIDATION_ERROR"));
    }

    if (hasStatusCode(err) && err.statusCode < 500) {
      return reply.code(err.statusCode).send(fail(err.message, "BAD_REQUEST"));
    }

    request.log.error({ err, method: request.method, url: request.url }, "Request error");
    return reply.code(500).send(fail("Internal server error", "INTERNAL_ERROR"));
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.code(404).send(fail(`Route ${request.method} ${request.url} not found`, "NOT_FOUND"));
  });
}
