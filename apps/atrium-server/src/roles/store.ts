import { z } from "zod";
import type { PermissionMap, Role } from "@atrium/protocol";
import { getDb } from "../db/database.js";
import { newId } from "../lib/ids.js";
import { readJson, toIso } from "../lib/json.js";

export const permissionActionSchema = z.enum(["create", "read", "update", "delete"]);
export const permissionMapSchema = z.record(z.array(permissionActionSchema));

interface RoleRow {
  id: string;
  business_id: string;
  name: string;
  permissions: string;
  created_at: number;
  updated_at: number;
}

function rowToRole(row: RoleRow): Role {
  return {
    id: row.id,
    businessId: row.business_id,
    name: row.name,
    permissions: readJson(row.permissions, permissionMapSchema),
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at),
  };
}

export function createRole(businessId: string, name: string, permissions: PermissionMap): Role {
  const id = newId();
  const now = Date.now();
  getDb()
    .prepare(
      "INSERT INTO roles (id, business_id, name, permissions, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?)"
    )
    .run(id, businessId, name, JSON.stringify(permissions), now, now);
  return { id, businessId, name, permissions, createdAt: toIso(now), updatedAt: toIso(now) };
}

export function getRole(id: string): Role | undefined {
  const row = getDb().prepare<[string], RoleRow>("SELECT * FROM roles WHERE id = ?").get(id);
  return row ? rowToRole(row) : undefined;
}

export function listRoles(businessId?: string): Role[] {
  const rows = businessId
    ? getDb().prepare<[string], RoleRow>("SELECT * FROM roles WHERE business_id = ? ORDER BY created_at ASC").all(businessId)
    : getDb().prepare<[], RoleRow>("SELECT * FROM roles ORDER BY created_at ASC").all();
  return rows.map(rowToRole);
}

export function updateRole(
  id: string,
  input: { name?: string; permissions?: PermissionMap }
): Role | undefined {
  const current = getRole(id);
  if (!current) return undefined;
  getDb()
    .prepare("UPDATE roles SET name = ?, permissions = ?, updated_at = ? WHERE id = ?")
    .run(input.name ?? current.name, JSON.stringify(input.permissions ?? current.permissions), Date.now(), id);
  return getRole(id);
}

export function deleteRole(id: string): boolean {
  return getDb().prepare("DELETE FROM roles WHERE id = ?").run(id).changes > 0;
}
