import type { FastifyReply, FastifyRequest } from "fastify";
import { verifyToken } from "@atrium/crypto";
import type { UserRoles } from "@atrium/protocol";
import { getUserRecord, isSuperAdmin } from "../users/store.js";
import { errors } from "../lib/errors.js";
import config from "../config.js";

export interface AuthUser {
  id: string;
  email: string;
  roles: UserRoles;
  isSuperAdmin: boolean;
}

declare module "fastify" {
  interface FastifyRequest {
    user: AuthUser | null;
  }
}

/** Resolve a bearer token to a live, active user; null for anything else */
export async function authenticateToken(token: string): Promise<AuthUser | null> {
  const claims = await verifyToken(token, config.jwtSecret);
  if (!claims) return null;

  const record = getUserRecord(claims.sub);
  if (!record || !record.isActive) return null;

  return {
    id: record.id,
    email: record.email,
    roles: record.roles,
    isSuperAdmin: isSuperAdmin(record.roles),
  };
}

function bearerToken(request: FastifyRequest): string | undefined {
  const header = request.headers.authorization;
  if (!header?.startsWith("Bearer ")) return undefined;
  return header.slice("Bearer ".length).trim() || undefined;
}

export async function requireAuth(request: FastifyRequest, _reply: FastifyReply): Promise<void> {
  const token = bearerToken(request);
  if (!token) {
    throw errors.unauthorized("Missing bearer token");
  }
  const user = await authenticateToken(token);
  if (!user) {
    throw errors.unauthorized("Invalid or expired token");
  }
  request.user = user;
}

export async function requireSuperAdmin(request: FastifyRequest, reply: FastifyReply): Promise<void> {
  await requireAuth(request, reply);
  if (!currentUser(request).isSuperAdmin) {
    throw errors.forbidden("Super admin access required");
  }
}

export function currentUser(request: FastifyRequest): AuthUser {
  if (!request.user) {
    throw errors.unauthorized();
  }
  return request.user;
}
