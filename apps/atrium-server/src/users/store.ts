import { z } from "zod";
import type { User, UserRoles } from "@atrium/protocol";
import { getDb } from "../db/database.js";
import { newId } from "../lib/ids.js";
import { readJson, toIso } from "../lib/json.js";

export const SUPER_ADMIN_ROLE = "super_admin";

const rolesSchema = z.record(z.array(z.string()));
const businessIdsSchema = z.array(z.string());

interface UserRow {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  avatar: string | null;
  is_active: number;
  roles: string;
  business_ids: string;
  created_at: number;
  updated_at: number;
}

/** Server-side view that still carries the password hash */
export interface UserRecord extends User {
  passwordHash: string;
}

export interface NewUser {
  username: string;
  email: string;
  passwordHash: string;
  avatar?: string;
  roles?: UserRoles;
  businessIds?: string[];
}

export interface UserUpdate {
  username?: string;
  email?: string;
  passwordHash?: string;
  avatar?: string;
  isActive?: boolean;
  roles?: UserRoles;
  businessIds?: string[];
}

function rowToRecord(row: UserRow): UserRecord {
  const user: UserRecord = {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    isActive: row.is_active === 1,
    roles: readJson(row.roles, rolesSchema),
    businessIds: readJson(row.business_ids, businessIdsSchema),
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at),
  };
  if (row.avatar !== null) user.avatar = row.avatar;
  return user;
}

/** Strip the password hash before a user leaves the server */
export function toPublicUser(record: UserRecord): User {
  const { passwordHash: _hash, ...user } = record;
  return user;
}

export function isSuperAdmin(roles: UserRoles): boolean {
  return roles.system?.includes(SUPER_ADMIN_ROLE) ?? false;
}

export function createUser(input: NewUser): UserRecord {
  const id = newId();
  const now = Date.now();
  getDb()
    .prepare(
      `INSERT INTO users (id, username, email, password_hash, avatar, is_active, roles, business_ids, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, 1, ?, ?, ?, ?)`
    )
    .run(
      id,
      input.username,
      input.email,
      input.passwordHash,
      input.avatar ?? null,
      JSON.stringify(input.roles ?? {}),
      JSON.stringify(input.businessIds ?? []),
      now,
      now
    );

  const created = getUserRecord(id);
  if (!created) {
    throw new Error(`User ${id} vanished after insert`);
  }
  return created;
}

export function getUserRecord(id: string): UserRecord | undefined {
  const row = getDb().prepare<[string], UserRow>("SELECT * FROM users WHERE id = ?").get(id);
  return row ? rowToRecord(row) : undefined;
}

/** Look up by email or username, whichever the login form supplied */
export function findUserByLogin(login: string): UserRecord | undefined {
  const row = getDb()
    .prepare<[string, string], UserRow>("SELECT * FROM users WHERE email = ? OR username = ?")
    .get(login, login);
  return row ? rowToRecord(row) : undefined;
}

export function findConflictingUser(
  username: string | undefined,
  email: string | undefined,
  exceptId?: string
): UserRecord | undefined {
  const row = getDb()
    .prepare<[string | null, string | null, string], UserRow>(
      "SELECT * FROM users WHERE (username = ? OR email = ?) AND id != ?"
    )
    .get(username ?? null, email ?? null, exceptId ?? "");
  return row ? rowToRecord(row) : undefined;
}

export function listUsers(): UserRecord[] {
  return getDb()
    .prepare<[], UserRow>("SELECT * FROM users ORDER BY created_at ASC")
    .all()
    .map(rowToRecord);
}

export function hasSuperAdmin(): boolean {
  return listUsers().some((u) => isSuperAdmin(u.roles));
}

export function updateUser(id: string, update: UserUpdate): UserRecord | undefined {
  const current = getUserRecord(id);
  if (!current) return undefined;

  getDb()
    .prepare(
      `UPDATE users SET username = ?, email = ?, password_hash = ?, avatar = ?, is_active = ?,
       roles = ?, business_ids = ?, updated_at = ? WHERE id = ?`
    )
    .run(
      update.username ?? current.username,
      update.email ?? current.email,
      update.passwordHash ?? current.passwordHash,
      update.avatar ?? current.avatar ?? null,
      (update.isActive ?? current.isActive) ? 1 : 0,
      JSON.stringify(update.roles ?? current.roles),
      JSON.stringify(update.businessIds ?? current.businessIds),
      Date.now(),
      id
    );
  return getUserRecord(id);
}

export function addUserBusiness(userId: string, businessId: string): void {
  const user = getUserRecord(userId);
  if (!user || user.businessIds.includes(businessId)) return;
  updateUser(userId, { businessIds: [...user.businessIds, businessId] });
}

export function deleteUser(id: string): boolean {
  return getDb().prepare("DELETE FROM users WHERE id = ?").run(id).changes > 0;
}
