import type { ActivityLog } from "@atrium/protocol";
import { getDb } from "../db/database.js";
import { newId } from "../lib/ids.js";
import { toIso } from "../lib/json.js";

interface ActivityRow {
  id: string;
  user_id: string;
  action: string;
  method: string;
  endpoint: string;
  status_code: number;
  ip_address: string;
  created_at: number;
}

export type NewActivityLog = Omit<ActivityLog, "id" | "createdAt">;

export function createActivityLog(entry: NewActivityLog): void {
  getDb()
    .prepare(
      `INSERT INTO activity_logs (id, user_id, action, method, endpoint, status_code, ip_address, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(newId(), entry.userId, entry.action, entry.method, entry.endpoint, entry.statusCode, entry.ipAddress, Date.now());
}

/** Newest first */
export function listActivityLogs(limit: number, skip: number): ActivityLog[] {
  return getDb()
    .prepare<[number, number], ActivityRow>(
      "SELECT * FROM activity_logs ORDER BY created_at DESC, rowid DESC LIMIT ? OFFSET ?"
    )
    .all(limit, skip)
    .map((row) => ({
      id: row.id,
      userId: row.user_id,
      action: row.action,
      method: row.method,
      endpoint: row.endpoint,
      statusCode: row.status_code,
      ipAddress: row.ip_address,
      createdAt: toIso(row.created_at),
    }));
}
