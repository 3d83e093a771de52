import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { createCategory, deleteCategory, getCategory, listCategories, renameCategory } from "./store.js";
import { currentUser, requireAuth } from "../http/auth.js";
import { assertPermission } from "../http/permissions.js";
import { businessParamsSchema, idParamsSchema, idSchema } from "../http/schemas.js";
import { ok } from "../http/response.js";
import { errors } from "../lib/errors.js";

const nameSchema = z.string().min(3).max(100);

const createSchema = z.object({
  businessId: idSchema,
  name: nameSchema,
});

const updateSchema = z.object({
  name: nameSchema,
});

export function registerCategoryRoutes(app: FastifyInstance): void {
  app.post(
    "/api/v1/channel-categories",
    { preHandler: requireAuth, config: { activity: "category.create" } },
    async (request, reply) => {
      const body = createSchema.parse(request.body);
      assertPermission(currentUser(request), body.businessId, "categories", "create");
      return reply.code(201).send(ok("Channel category created", createCategory(body.businessId, body.name)));
    }
  );

  app.get("/api/v1/channel-categories", { preHandler: requireAuth }, async () => {
    return ok("Channel categories retrieved", listCategories());
  });

  app.get("/api/v1/channel-categories/business/:businessId", { preHandler: requireAuth }, async (request) => {
    const { businessId } = businessParamsSchema.parse(request.params);
    return ok("Channel categories retrieved", listCategories(businessId));
  });

  app.get("/api/v1/channel-categories/:id", { preHandler: requireAuth }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const category = getCategory(id);
    if (!category) throw errors.notFound("Channel category");
    return ok("Channel category retrieved", category);
  });

  app.put(
    "/api/v1/channel-categories/:id",
    { preHandler: requireAuth, config: { activity: "category.update" } },
    async (request) => {
      const { id } = idParamsSchema.parse(request.params);
      const body = updateSchema.parse(request.body);
      const category = getCategory(id);
      if (!category) throw errors.notFound("Channel category");
      assertPermission(currentUser(request), category.businessId, "categories", "update");
      return ok("Channel category updated", renameCategory(id, body.name));
    }
  );

  app.delete(
    "/api/v1/channel-categories/:id",
    { preHandler: requireAuth, config: { activity: "category.delete" } },
    async (request) => {
      const { id } = idParamsSchema.parse(request.params);
      const category = getCategory(id);
      if (!category) throw errors.notFound("Channel category");
      assertPermission(currentUser(request), category.businessId, "categories", "delete");
      deleteCategory(id);
      return ok("Channel category deleted");
    }
  );
}
