import type { Business, BusinessSettings } from "@atrium/protocol";
import { getDb } from "../db/database.js";
import { newId } from "../lib/ids.js";
import { toIso } from "../lib/json.js";

interface BusinessRow {
  id: string;
  name: string;
  owner_id: string;
  theme: string;
  notifications: number;
  avatar: string | null;
  created_at: number;
  updated_at: number;
}

export interface BusinessInput {
  name: string;
  settings?: Partial<BusinessSettings>;
  avatar?: string;
}

const defaultSettings: BusinessSettings = { theme: "light", notifications: true };

function rowToBusiness(row: BusinessRow): Business {
  const business: Business = {
    id: row.id,
    name: row.name,
    ownerId: row.owner_id,
    settings: { theme: row.theme, notifications: row.notifications === 1 },
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at),
  };
  if (row.avatar !== null) business.avatar = row.avatar;
  return business;
}

export function createBusiness(ownerId: string, input: BusinessInput): Business {
  const id = newId();
  const now = Date.now();
  const settings = { ...defaultSettings, ...input.settings };
  getDb()
    .prepare(
      `INSERT INTO businesses (id, name, owner_id, theme, notifications, avatar, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(id, input.name, ownerId, settings.theme, settings.notifications ? 1 : 0, input.avatar ?? null, now, now);

  const business: Business = { id, name: input.name, ownerId, settings, createdAt: toIso(now), updatedAt: toIso(now) };
  if (input.avatar !== undefined) business.avatar = input.avatar;
  return business;
}

export function getBusiness(id: string): Business | undefined {
  const row = getDb().prepare<[string], BusinessRow>("SELECT * FROM businesses WHERE id = ?").get(id);
  return row ? rowToBusiness(row) : undefined;
}

export function listBusinesses(): Business[] {
  return getDb()
    .prepare<[], BusinessRow>("SELECT * FROM businesses ORDER BY created_at ASC")
    .all()
    .map(rowToBusiness);
}

export function updateBusiness(id: string, input: Partial<BusinessInput>): Business | undefined {
  const current = getBusiness(id);
  if (!current) return undefined;
  const settings = { ...current.settings, ...input.settings };
  getDb()
    .prepare(
      "UPDATE businesses SET name = ?, theme = ?, notifications = ?, avatar = ?, updated_at = ? WHERE id = ?"
    )
    .run(
      input.name ?? current.name,
      settings.theme,
      settings.notifications ? 1 : 0,
      input.avatar ?? current.avatar ?? null,
      Date.now(),
      id
    );
  return getBusiness(id);
}

export function deleteBusiness(id: string): boolean {
  return getDb().prepare("DELETE FROM businesses WHERE id = ?").run(id).changes > 0;
}
