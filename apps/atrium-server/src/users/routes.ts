import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { hashPassword } from "@atrium/crypto";
import {
  createUser,
  deleteUser,
  findConflictingUser,
  getUserRecord,
  listUsers,
  toPublicUser,
  updateUser,
} from "./store.js";
import { newAccountSchema } from "../auth/routes.js";
import { requireSuperAdmin } from "../http/auth.js";
import { idParamsSchema, idSchema } from "../http/schemas.js";
import { ok } from "../http/response.js";
import { errors } from "../lib/errors.js";
import config from "../config.js";

const rolesSchema = z.record(z.array(z.string()));

const registerSchema = newAccountSchema.extend({
  roles: rolesSchema.optional(),
  businessIds: z.array(idSchema).optional(),
});

const updateSchema = z.object({
  username: z.string().min(3).max(50).optional(),
  email: z.string().email().optional(),
  password: z.string().min(6).optional(),
  avatar: z.string().optional(),
  isActive: z.boolean().optional(),
  roles: rolesSchema.optional(),
  businessIds: z.array(idSchema).optional(),
});

export function registerUserRoutes(app: FastifyInstance): void {
  app.post(
    "/api/v1/users/register",
    { preHandler: requireSuperAdmin, config: { activity: "user.register" } },
    async (request, reply) => {
      const body = registerSchema.parse(request.body);
      if (findConflictingUser(body.username, body.email)) {
        throw errors.conflict("Username or email already in use");
      }
      const record = createUser({
        username: body.username,
        email: body.email,
        passwordHash: await hashPassword(body.password, config.passwordHashing),
        avatar: body.avatar,
        roles: body.roles,
        businessIds: body.businessIds,
      });
      return reply.code(201).send(ok("User registered", toPublicUser(record)));
    }
  );

  app.get("/api/v1/users", { preHandler: requireSuperAdmin }, async () => {
    return ok("Users retrieved", listUsers().map(toPublicUser));
  });

  app.get("/api/v1/users/:id", { preHandler: requireSuperAdmin }, async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const record = getUserRecord(id);
    if (!record) throw errors.notFound("User");
    return ok("User retrieved", toPublicUser(record));
  });

  app.put(
    "/api/v1/users/:id",
    { preHandler: requireSuperAdmin, config: { activity: "user.update" } },
    async (request) => {
      const { id } = idParamsSchema.parse(request.params);
      const body = updateSchema.parse(request.body);
      if (!getUserRecord(id)) throw errors.notFound("User");
      if ((body.username || body.email) && findConflictingUser(body.username, body.email, id)) {
        throw errors.conflict("Username or email already in use");
      }

      const { password, ...fields } = body;
      const updated = updateUser(id, {
        ...fields,
        passwordHash: password ? await hashPassword(password, config.passwordHashing) : undefined,
      });
      if (!updated) throw errors.notFound("User");
      return ok("User updated", toPublicUser(updated));
    }
  );

  app.delete(
    "/api/v1/users/:id",
    { preHandler: requireSuperAdmin, config: { activity: "user.delete" } },
    async (request) => {
      const { id } = idParamsSchema.parse(request.params);
      if (!deleteUser(id)) throw errors.notFound("User");
      return ok("User deleted");
    }
  );
}
