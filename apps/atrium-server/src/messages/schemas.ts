import { z } from "zod";

export const messageTypeSchema = z.enum(["text", "image", "file", "voice"]);

export const mediaMetadataSchema = z.object({
  filename: z.string(),
  size: z.number().int().nonnegative(),
  width: z.number().int().nonnegative().optional(),
  height: z.number().int().nonnegative().optional(),
});

export const reactionSchema = z.object({
  emoji: z.string(),
  userIds: z.array(z.string()),
});

export const reactionsSchema = z.array(reactionSchema);
