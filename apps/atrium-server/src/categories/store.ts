import type { ChannelCategory } from "@atrium/protocol";
import { getDb } from "../db/database.js";
import { newId } from "../lib/ids.js";
import { toIso } from "../lib/json.js";

interface CategoryRow {
  id: string;
  business_id: string;
  name: string;
  created_at: number;
  updated_at: number;
}

function rowToCategory(row: CategoryRow): ChannelCategory {
  return {
    id: row.id,
    businessId: row.business_id,
    name: row.name,
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at),
  };
}

export function createCategory(businessId: string, name: string): ChannelCategory {
  const id = newId();
  const now = Date.now();
  getDb()
    .prepare("INSERT INTO channel_categories (id, business_id, name, created_at, updated_at) VALUES (?, ?, ?, ?, ?)")
    .run(id, businessId, name, now, now);
  return { id, businessId, name, createdAt: toIso(now), updatedAt: toIso(now) };
}

export function getCategory(id: string): ChannelCategory | undefined {
  const row = getDb().prepare<[string], CategoryRow>("SELECT * FROM channel_categories WHERE id = ?").get(id);
  return row ? rowToCategory(row) : undefined;
}

export function listCategories(businessId?: string): ChannelCategory[] {
  const rows = businessId
    ? getDb()
        .prepare<[string], CategoryRow>("SELECT * FROM channel_categories WHERE business_id = ? ORDER BY created_at ASC")
        .all(businessId)
    : getDb().prepare<[], CategoryRow>("SELECT * FROM channel_categories ORDER BY created_at ASC").all();
  return rows.map(rowToCategory);
}

export function renameCategory(id: string, name: string): ChannelCategory | undefined {
  const result = getDb()
    .prepare("UPDATE channel_categories SET name = ?, updated_at = ? WHERE id = ?")
    .run(name, Date.now(), id);
  return result.changes > 0 ? getCategory(id) : undefined;
}

export function deleteCategory(id: string): boolean {
  return getDb().prepare("DELETE FROM channel_categories WHERE id = ?").run(id).changes > 0;
}
