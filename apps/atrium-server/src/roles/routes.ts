import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { createRole, deleteRole, getRole, listRoles, permissionMapSchema, updateRole } from "./store.js";
import { currentUser, requireAuth } from "../http/auth.js";
import { assertPermission } from "../http/permissions.js";
import { idParamsSchema, idSchema } from "../http/schemas.js";
import { ok } from "../http/response.js";
import { errors } from "../lib/errors.js";

const createSchema = z.object({
  businessId: idSchema,
  name: z.string().min(1).max(100),
  permissions: permissionMapSchema.default({}),
});

const updateSchema = z.object({
  name: z.string().min(1).max(100).optional(),
  permissions: permissionMapSchema.optional(),
});

const listQuerySchema = z.object({
  businessId: idSchema.optional(),
});

export function registerRoleRoutes(app: FastifyInstance): void {
  app.post(
    "/api/v1/roles",
    { preHandler: requireAuth, config: { activity: "role.create" } },
    async (request, reply) => {
      const body = createSchema.parse(request.body);
      assertPermission(currentUser(request), body.businessId, "roles", "create");
      return reply.code(201).send(ok("Role created", createRole(body.businessId, body.name, body.permissions)));
    }
  );

  app.get("/api/v1/roles", { preHandler: requireAuth }, async (request) => {
    const { businessId } = listQuerySchema.parse(request.query);
    return ok("Roles retrieved", listRoles(businessId));
  });

  app.get("/api/v1/roles/:id", { preHandler: requireAuth }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const role = getRole(id);
    if (!role) throw errors.notFound("Role");
    return ok("Role retrieved", role);
  });

  app.put(
    "/api/v1/roles/:id",
    { preHandler: requireAuth, config: { activity: "role.update" } },
    async (request) => {
      const { id } = idParamsSchema.parse(request.params);
      const body = updateSchema.parse(request.body);
      const role = getRole(id);
      if (!role) throw errors.notFound("Role");
      assertPermission(currentUser(request), role.businessId, "roles", "update");
      return ok("Role updated", updateRole(id, body));
    }
  );

  app.delete(
    "/api/v1/roles/:id",
    { preHandler: requireAuth, config: { activity: "role.delete" } },
    async (request) => {
      const { id } = idParamsSchema.parse(request.params);
      const role = getRole(id);
      if (!role) throw errors.notFound("Role");
      assertPermission(currentUser(request), role.businessId, "roles", "delete");
      deleteRole(id);
      return ok("Role deleted");
    }
  );
}
