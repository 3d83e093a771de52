import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { hashPassword, verifyPassword } from "@atrium/crypto";
import type { AuthResult } from "@atrium/protocol";
import {
  SUPER_ADMIN_ROLE,
  createUser,
  findConflictingUser,
  findUserByLogin,
  hasSuperAdmin,
  toPublicUser,
} from "../users/store.js";
import { issueToken } from "./tokens.js";
import { errors } from "../lib/errors.js";
import { ok } from "../http/response.js";
import config from "../config.js";

const loginSchema = z
  .object({
    email: z.string().min(1).optional(),
    username: z.string().min(1).optional(),
    password: z.string().min(1),
  })
  .refine((body) => body.email !== undefined || body.username !== undefined, {
    message: "email or username is required",
  });

export const newAccountSchema = z.object({
  username: z.string().min(3).max(50),
  email: z.string().email(),
  password: z.string().min(6),
  avatar: z.string().optional(),
});

export function registerAuthRoutes(app: FastifyInstance): void {
  app.post("/api/v1/auth/login", async (request) => {
    const body = loginSchema.parse(request.body);
    const login = body.email ?? body.username ?? "";

    const record = findUserByLogin(login);
    if (!record || !(await verifyPassword(body.password, record.passwordHash))) {
      throw errors.unauthorized("Invalid credentials");
    }
    if (!record.isActive) {
      throw errors.unauthorized("Account is inactive");
    }

    const user = toPublicUser(record);
    const result: AuthResult = { token: await issueToken(user), user };
    return ok("Login successful", result);
  });

  // Bootstrap: only usable until the first super admin exists
  app.post("/api/v1/superadmin/create", async (request, reply) => {
    const body = newAccountSchema.parse(request.body);
    if (hasSuperAdmin()) {
      throw errors.conflict("Super admin already exists");
    }
    if (findConflictingUser(body.username, body.email)) {
      throw errors.conflict("Username or email already in use");
    }

    const record = createUser({
      username: body.username,
      email: body.email,
      passwordHash: await hashPassword(body.password, config.passwordHashing),
      avatar: body.avatar,
      roles: { system: [SUPER_ADMIN_ROLE] },
    });
    const user = toPublicUser(record);
    const result: AuthResult = { token: await issueToken(user), user };
    return reply.code(201).send(ok("Super admin created", result));
  });
}
