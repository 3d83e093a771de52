import { z } from "zod";
import type { Database, DatabaseColumn } from "@atrium/protocol";
import { getDb } from "../db/database.js";
import { newId } from "../lib/ids.js";
import { readJson, toIso } from "../lib/json.js";

const selectOptionSchema = z.object({
  id: z.string(),
  value: z.string(),
  order: z.number(),
  createdAt: z.string(),
});

const columnsSchema = z.array(
  z.object({
    id: z.string(),
    name: z.string(),
    type: z.enum(["date", "text", "select", "boolean", "number"]),
    options: z.array(selectOptionSchema),
    order: z.number(),
  })
);

export const cellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const rowsSchema = z.array(
  z.object({
    id: z.string(),
    values: z.record(cellValueSchema),
  })
);

interface DatabaseRecordRow {
  id: string;
  channel_id: string;
  author_id: string;
  title: string;
  columns: string;
  rows: string;
  created_at: number;
  updated_at: number;
}

function rowToDatabase(row: DatabaseRecordRow): Database {
  return {
    id: row.id,
    channelId: row.channel_id,
    authorId: row.author_id,
    title: row.title,
    columns: readJson(row.columns, columnsSchema),
    rows: readJson(row.rows, rowsSchema),
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at),
  };
}

export function createDatabase(input: {
  channelId: string;
  authorId: string;
  title: string;
  columns: DatabaseColumn[];
}): Database {
  const id = newId();
  const now = Date.now();
  getDb()
    .prepare(
      `INSERT INTO databases (id, channel_id, author_id, title, columns, rows, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, '[]', ?, ?)`
    )
    .run(id, input.channelId, input.authorId, input.title, JSON.stringify(input.columns), now, now);
  return { id, ...input, rows: [], createdAt: toIso(now), updatedAt: toIso(now) };
}

export function getDatabase(id: string): Database | undefined {
  const row = getDb().prepare<[string], DatabaseRecordRow>("SELECT * FROM databases WHERE id = ?").get(id);
  return row ? rowToDatabase(row) : undefined;
}

export function listChannelDatabases(channelId: string): Database[] {
  return getDb()
    .prepare<[string], DatabaseRecordRow>("SELECT * FROM databases WHERE channel_id = ? ORDER BY created_at ASC")
    .all(channelId)
    .map(rowToDatabase);
}

/**
 * Read, transform and write the document in one transaction. Anything `fn`
 * throws rolls the transaction back and propagates.
 */
export function updateDatabase<T>(
  id: string,
  fn: (doc: Database) => { doc: Database; item: T }
): { doc: Database; item: T } | undefined {
  const db = getDb();
  const apply = db.transaction(() => {
    const current = getDatabase(id);
    if (!current) return undefined;
    const { doc, item } = fn(current);
    const now = Date.now();
    db.prepare("UPDATE databases SET title = ?, columns = ?, rows = ?, updated_at = ? WHERE id = ?").run(
      doc.title,
      JSON.stringify(doc.columns),
      JSON.stringify(doc.rows),
      now,
      id
    );
    return { doc: { ...doc, updatedAt: toIso(now) }, item };
  });
  return apply();
}

export function deleteDatabase(id: string): boolean {
  return getDb().prepare("DELETE FROM databases WHERE id = ?").run(id).changes > 0;
}
