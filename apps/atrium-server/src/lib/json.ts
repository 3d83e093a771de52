import type { z } from "zod";

/** Parse a JSON column and check it against its schema */
export function readJson<T extends z.ZodTypeAny>(raw: string, schema: T): z.output<T> {
  return schema.parse(JSON.parse(raw));
}

export function toIso(ms: number): string {
  return new Date(ms).toISOString();
}
