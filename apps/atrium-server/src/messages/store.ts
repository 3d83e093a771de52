import type Database from "better-sqlite3";
import { v4 as uuid } from "uuid";
import type { ChatMessage, MediaMetadata, MessageType, Reaction } from "@atrium/protocol";
import { addUserReaction, findReaction, pruneEmptyReactions, pullUserReaction } from "./reactions.js";
import { mediaMetadataSchema, messageTypeSchema, reactionsSchema } from "./schemas.js";
import { moduleLogger, type Logger } from "../lib/logger.js";
import { errorMessage } from "../lib/errors.js";

export interface NewMessage {
  channelId: string;
  userId: string;
  content: string;
  messageType: MessageType;
  mediaPath?: string;
  mediaMetadata?: MediaMetadata;
}

/** Fields left undefined are untouched */
export interface MessagePatch {
  content?: string;
  messageType?: MessageType;
  mediaPath?: string;
  mediaMetadata?: MediaMetadata;
  isPinned?: boolean;
}

/**
 * Persistence used by the WebSocket handlers. Calls are async so the
 * caller can bound each one with a timeout, whatever the backing store.
 */
export interface MessageStore {
  create(message: NewMessage): Promise<ChatMessage>;
  getById(id: string): Promise<ChatMessage | undefined>;
  /** Newest first */
  listByChannel(channelId: string, limit: number, skip: number): Promise<ChatMessage[]>;
  update(id: string, patch: MessagePatch): Promise<ChatMessage | undefined>;
  delete(id: string): Promise<boolean>;
  /** Atomic merge into the emoji's bucket; undefined when the message is gone */
  addReaction(id: string, userId: string, emoji: string): Promise<ChatMessage | undefined>;
  /** Undefined when the message or the emoji's bucket is gone */
  removeReaction(id: string, userId: string, emoji: string): Promise<ChatMessage | undefined>;
}

interface MessageRow {
  id: string;
  channel_id: string;
  user_id: string;
  content: string;
  message_type: string;
  media_path: string | null;
  media_metadata: string | null;
  is_pinned: number;
  reactions: string;
  created_at: number;
  updated_at: number | null;
}

export interface SqliteMessageStoreOptions {
  log?: Logger;
  now?: () => number;
}

export function createSqliteMessageStore(
  db: Database.Database,
  options: SqliteMessageStoreOptions = {}
): MessageStore {
  const log = options.log ?? moduleLogger("messages");
  const now = options.now ?? Date.now;

  const selectById = db.prepare<[string], MessageRow>("SELECT * FROM messages WHERE id = ?");
  const selectPage = db.prepare<[string, number, number], MessageRow>(
    `SELECT * FROM messages WHERE channel_id = ?
     ORDER BY created_at DESC, rowid DESC LIMIT ? OFFSET ?`
  );
  const writeReactions = db.prepare<[string, string]>("UPDATE messages SET reactions = ? WHERE id = ?");

  function load(id: string): ChatMessage | undefined {
    const row = selectById.get(id);
    return row ? rowToMessage(row) : undefined;
  }

  // Read-merge-write inside one transaction; better-sqlite3 runs it synchronously,
  // so no other writer can interleave between the read and the write.
  const mergeReaction = db.transaction(
    (id: string, merge: (reactions: Reaction[]) => Reaction[] | undefined): ChatMessage | undefined => {
      const row = selectById.get(id);
      if (!row) return undefined;
      const current = readReactions(row.reactions);
      const next = merge(current);
      if (!next) return undefined;
      if (next !== current) {
        writeReactions.run(JSON.stringify(next), id);
      }
      return load(id);
    }
  );

  return {
    async create(input) {
      const id = uuid();
      const createdAt = now();
      db.prepare(
        `INSERT INTO messages (id, channel_id, user_id, content, message_type, media_path, media_metadata, is_pinned, reactions, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, 0, '[]', ?)`
      ).run(
        id,
        input.channelId,
        input.userId,
        input.content,
        input.messageType,
        input.mediaPath ?? null,
        input.mediaMetadata ? JSON.stringify(input.mediaMetadata) : null,
        createdAt
      );

      const message: ChatMessage = {
        id,
        channelId: input.channelId,
        userId: input.userId,
        content: input.content,
        messageType: input.messageType,
        createdAt: new Date(createdAt).toISOString(),
        isPinned: false,
        reactions: [],
      };
      if (input.mediaPath !== undefined) message.mediaPath = input.mediaPath;
      if (input.mediaMetadata !== undefined) message.mediaMetadata = input.mediaMetadata;
      return message;
    },

    async getById(id) {
      return load(id);
    },

    async listByChannel(channelId, limit, skip) {
      return selectPage.all(channelId, limit, skip).map(rowToMessage);
    },

    async update(id, patch) {
      const sets: string[] = [];
      const params: (string | number | null)[] = [];
      if (patch.content !== undefined) {
        sets.push("content = ?");
        params.push(patch.content);
      }
      if (patch.messageType !== undefined) {
        sets.push("message_type = ?");
        params.push(patch.messageType);
      }
      if (patch.mediaPath !== undefined) {
        sets.push("media_path = ?");
        params.push(patch.mediaPath);
      }
      if (patch.mediaMetadata !== undefined) {
        sets.push("media_metadata = ?");
        params.push(JSON.stringify(patch.mediaMetadata));
      }
      if (patch.isPinned !== undefined) {
        sets.push("is_pinned = ?");
        params.push(patch.isPinned ? 1 : 0);
      }
      sets.push("updated_at = ?");
      params.push(now());

      const apply = db.transaction((): ChatMessage | undefined => {
        const result = db.prepare(`UPDATE messages SET ${sets.join(", ")} WHERE id = ?`).run(...params, id);
        return result.changes > 0 ? load(id) : undefined;
      });
      return apply();
    },

    async delete(id) {
      return db.prepare("DELETE FROM messages WHERE id = ?").run(id).changes > 0;
    },

    async addReaction(id, userId, emoji) {
      return mergeReaction(id, (reactions) => addUserReaction(reactions, emoji, userId));
    },

    async removeReaction(id, userId, emoji) {
      const pulled = mergeReaction(id, (reactions) =>
        findReaction(reactions, emoji) ? pullUserReaction(reactions, emoji, userId) : undefined
      );
      if (!pulled) return undefined;

      // The pull has been committed; dropping an emptied bucket is a follow-up write
      try {
        return mergeReaction(id, pruneEmptyReactions) ?? pulled;
      } catch (err) {
        log.warn({ messageId: id, emoji, err: errorMessage(err) }, "Failed to prune empty reaction buckets");
        return pulled;
      }
    },
  };
}

function readReactions(raw: string): Reaction[] {
  return reactionsSchema.parse(JSON.parse(raw));
}

function rowToMessage(row: MessageRow): ChatMessage {
  const message: ChatMessage = {
    id: row.id,
    channelId: row.channel_id,
    userId: row.user_id,
    content: row.content,
    messageType: messageTypeSchema.parse(row.message_type),
    createdAt: new Date(row.created_at).toISOString(),
    isPinned: row.is_pinned === 1,
    reactions: readReactions(row.reactions),
  };
  if (row.media_path !== null) message.mediaPath = row.media_path;
  if (row.media_metadata !== null) {
    message.mediaMetadata = mediaMetadataSchema.parse(JSON.parse(row.media_metadata));
  }
  if (row.updated_at !== null) message.updatedAt = new Date(row.updated_at).toISOString();
  return message;
}
