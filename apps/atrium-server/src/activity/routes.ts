import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { createActivityLog, listActivityLogs } from "./store.js";
import { requireSuperAdmin } from "../http/auth.js";
import { ok } from "../http/response.js";

declare module "fastify" {
  interface FastifyContextConfig {
    /** Action name recorded in the activity log when an authenticated request completes */
    activity?: string;
  }
}

const pageSchema = z.object({
  limit: z.coerce.number().int().positive().max(500).default(100),
  skip: z.coerce.number().int().nonnegative().default(0),
});

/** Record every completed request whose route names an activity. Never fails the request. */
export function registerActivityHook(app: FastifyInstance): void {
  app.addHook("onResponse", async (request, reply) => {
    const action = request.routeOptions.config.activity;
    if (!action || !request.user) return;
    try {
      createActivityLog({
        userId: request.user.id,
        action,
        method: request.method,
        endpoint: request.url,
        statusCode: reply.statusCode,
        ipAddress: request.ip,
      });
    } catch (err) {
      request.log.warn({ err, action }, "Failed to record activity");
    }
  });
}

export function registerActivityRoutes(app: FastifyInstance): void {
  app.get("/api/v1/activity-logs", { preHandler: requireSuperAdmin }, async (request) => {
    const page = pageSchema.parse(request.query);
    return ok("Activity logs retrieved", listActivityLogs(page.limit, page.skip));
  });
}
