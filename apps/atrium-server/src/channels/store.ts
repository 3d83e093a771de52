import { z } from "zod";
import type { Channel, ChannelType } from "@atrium/protocol";
import { getDb } from "../db/database.js";
import { newId } from "../lib/ids.js";
import { toIso } from "../lib/json.js";

export const channelTypeSchema = z.enum(["messages", "voices", "drawings", "documents", "databases", "reports"]);

interface ChannelRow {
  id: string;
  business_id: string;
  name: string;
  type: string;
  category_id: string | null;
  position: number;
  created_at: number;
  updated_at: number;
}

export interface ChannelInput {
  businessId: string;
  name: string;
  type: ChannelType;
  categoryId?: string;
  order?: number;
}

function rowToChannel(row: ChannelRow): Channel {
  const channel: Channel = {
    id: row.id,
    businessId: row.business_id,
    name: row.name,
    type: channelTypeSchema.parse(row.type),
    order: row.position,
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at),
  };
  if (row.category_id !== null) channel.categoryId = row.category_id;
  return channel;
}

export function getChannel(id: string): Channel | undefined {
  const row = getDb().prepare<[string], ChannelRow>("SELECT * FROM channels WHERE id = ?").get(id);
  return row ? rowToChannel(row) : undefined;
}

export function listChannels(): Channel[] {
  return getDb()
    .prepare<[], ChannelRow>("SELECT * FROM channels ORDER BY position ASC, created_at ASC")
    .all()
    .map(rowToChannel);
}

export function listBusinessChannels(businessId: string): Channel[] {
  return getDb()
    .prepare<[string], ChannelRow>(
      "SELECT * FROM channels WHERE business_id = ? ORDER BY position ASC, created_at ASC"
    )
    .all(businessId)
    .map(rowToChannel);
}

/** Without an explicit order, a channel goes after the business's last one */
export function createChannel(input: ChannelInput): Channel {
  const id = newId();
  const now = Date.now();
  const maxPos = getDb()
    .prepare<[string], { max: number }>(
      "SELECT COALESCE(MAX(position), -1) as max FROM channels WHERE business_id = ?"
    )
    .get(input.businessId);
  const position = input.order ?? (maxPos?.max ?? -1) + 1;

  getDb()
    .prepare(
      `INSERT INTO channels (id, business_id, name, type, category_id, position, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(id, input.businessId, input.name, input.type, input.categoryId ?? null, position, now, now);

  const channel: Channel = {
    id,
    businessId: input.businessId,
    name: input.name,
    type: input.type,
    order: position,
    createdAt: toIso(now),
    updatedAt: toIso(now),
  };
  if (input.categoryId !== undefined) channel.categoryId = input.categoryId;
  return channel;
}

export function updateChannel(
  id: string,
  input: Partial<Omit<ChannelInput, "businessId">>
): Channel | undefined {
  const current = getChannel(id);
  if (!current) return undefined;
  getDb()
    .prepare("UPDATE channels SET name = ?, type = ?, category_id = ?, position = ?, updated_at = ? WHERE id = ?")
    .run(
      input.name ?? current.name,
      input.type ?? current.type,
      input.categoryId ?? current.categoryId ?? null,
      input.order ?? current.order,
      Date.now(),
      id
    );
  return getChannel(id);
}

export function deleteChannel(id: string): boolean {
  return getDb().prepare("DELETE FROM channels WHERE id = ?").run(id).changes > 0;
}
