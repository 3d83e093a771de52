import { z } from "zod";
import type { InboundOperation } from "@atrium/protocol";
import { mediaMetadataSchema, messageTypeSchema } from "../messages/schemas.js";

const envelopeSchema = z.object({
  type: z.string(),
  payload: z.unknown(),
});

const createMessageSchema = z.object({
  userId: z.string().optional(),
  content: z.string().optional(),
  messageType: messageTypeSchema.default("text"),
  mediaPath: z.string().optional(),
  mediaMetadata: mediaMetadataSchema.optional(),
});

const historySchema = z
  .object({
    limit: z.number().int().optional(),
    skip: z.number().int().optional(),
  })
  .default({});

const updateMessageSchema = z.object({
  id: z.string(),
  content: z.string().optional(),
  messageType: messageTypeSchema.optional(),
  mediaPath: z.string().optional(),
  mediaMetadata: mediaMetadataSchema.optional(),
  isPinned: z.boolean().optional(),
});

const deleteMessageSchema = z.object({
  id: z.string(),
});

const reactionSchema = z.object({
  messageId: z.string(),
  userId: z.string().optional(),
  emoji: z.string().min(1),
});

export type DecodeResult =
  | { ok: true; operation: InboundOperation }
  | { ok: false; error: string };

function invalid(type: string, error: z.ZodError): DecodeResult {
  const issue = error.issues[0];
  const where = issue.path.length > 0 ? issue.path.join(".") : "payload";
  return { ok: false, error: `Invalid ${type} payload: ${where}: ${issue.message}` };
}

/**
 * Two-step decode: the envelope first, then the payload against the
 * schema registered for its type.
 */
export function decodeFrame(frame: string): DecodeResult {
  let raw: unknown;
  try {
    raw = JSON.parse(frame);
  } catch {
    return { ok: false, error: "Invalid message format" };
  }

  const envelope = envelopeSchema.safeParse(raw);
  if (!envelope.success) {
    return { ok: false, error: "Invalid message envelope" };
  }
  const { type, payload } = envelope.data;

  switch (type) {
    case "client_message":
    case "create_message": {
      const parsed = createMessageSchema.safeParse(payload);
      return parsed.success
        ? { ok: true, operation: { type: "create_message", payload: parsed.data } }
        : invalid(type, parsed.error);
    }
    case "get_message_history": {
      const parsed = historySchema.safeParse(payload);
      return parsed.success
        ? { ok: true, operation: { type, payload: parsed.data } }
        : invalid(type, parsed.error);
    }
    case "update_message": {
      const parsed = updateMessageSchema.safeParse(payload);
      return parsed.success
        ? { ok: true, operation: { type, payload: parsed.data } }
        : invalid(type, parsed.error);
    }
    case "delete_message": {
      const parsed = deleteMessageSchema.safeParse(payload);
      return parsed.success
        ? { ok: true, operation: { type, payload: parsed.data } }
        : invalid(type, parsed.error);
    }
    case "add_reaction":
    case "remove_reaction": {
      const parsed = reactionSchema.safeParse(payload);
      return parsed.success
        ? { ok: true, operation: { type, payload: parsed.data } }
        : invalid(type, parsed.error);
    }
    default:
      return { ok: false, error: `Unknown message type: ${type}` };
  }
}
