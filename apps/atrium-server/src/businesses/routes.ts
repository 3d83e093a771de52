import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { createBusiness, deleteBusiness, getBusiness, listBusinesses, updateBusiness } from "./store.js";
import { addUserBusiness } from "../users/store.js";
import { currentUser, requireAuth } from "../http/auth.js";
import { idParamsSchema } from "../http/schemas.js";
import { ok } from "../http/response.js";
import { errors } from "../lib/errors.js";

const settingsSchema = z.object({
  theme: z.string().min(1).optional(),
  notifications: z.boolean().optional(),
});

const createSchema = z.object({
  name: z.string().min(1).max(100),
  settings: settingsSchema.optional(),
  avatar: z.string().optional(),
});

const updateSchema = createSchema.partial();

export function registerBusinessRoutes(app: FastifyInstance): void {
  app.post(
    "/api/v1/businesses",
    { preHandler: requireAuth, config: { activity: "business.create" } },
    async (request, reply) => {
      const user = currentUser(request);
      const body = createSchema.parse(request.body);
      const business = createBusiness(user.id, body);
      addUserBusiness(user.id, business.id);
      return reply.code(201).send(ok("Business created", business));
    }
  );

  app.get("/api/v1/businesses", { preHandler: requireAuth }, async () => {
    return ok("Businesses retrieved", listBusinesses());
  });

  app.get("/api/v1/businesses/:id", { preHandler: requireAuth }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const business = getBusiness(id);
    if (!business) throw errors.notFound("Business");
    return ok("Business retrieved", business);
  });

  app.put(
    "/api/v1/businesses/:id",
    { preHandler: requireAuth, config: { activity: "business.update" } },
    async (request) => {
      const user = currentUser(request);
      const { id } = idParamsSchema.parse(request.params);
      const body = updateSchema.parse(request.body);
      const business = getBusiness(id);
      if (!business) throw errors.notFound("Business");
      if (business.ownerId !== user.id && !user.isSuperAdmin) {
        throw errors.forbidden("Only the owner can update this business");
      }
      return ok("Business updated", updateBusiness(id, body));
    }
  );

  app.delete(
    "/api/v1/businesses/:id",
    { preHandler: requireAuth, config: { activity: "business.delete" } },
    async (request) => {
      const user = currentUser(request);
      const { id } = idParamsSchema.parse(request.params);
      const business = getBusiness(id);
      if (!business) throw errors.notFound("Business");
      if (business.ownerId !== user.id && !user.isSuperAdmin) {
        throw errors.forbidden("Only the owner can delete this business");
      }
      deleteBusiness(id);
      return ok("Business deleted");
    }
  );
}
