import type { MediaMetadata, MessageType } from "./messages.js";

/** Client → Server commands */

export interface CreateMessageCommand {
  /** Optional; must match the authenticated user when present */
  userId?: string;
  content?: string;
  messageType: MessageType;
  mediaPath?: string;
  mediaMetadata?: MediaMetadata;
}

export interface MessageHistoryCommand {
  limit?: number;
  skip?: number;
}

export interface UpdateMessageCommand {
  id: string;
  content?: string;
  messageType?: MessageType;
  mediaPath?: string;
  mediaMetadata?: MediaMetadata;
  isPinned?: boolean;
}

export interface DeleteMessageCommand {
  id: string;
}

export interface ReactionCommand {
  messageId: string;
  userId?: string;
  emoji: string;
}

/** Union of all command types for the type field */
export type CommandType =
  | "client_message"
  | "create_message"
  | "get_message_history"
  | "update_message"
  | "delete_message"
  | "add_reaction"
  | "remove_reaction";

/** Decoded inbound operation, discriminated on type */
export type InboundOperation =
  | { type: "create_message"; payload: CreateMessageCommand }
  | { type: "get_message_history"; payload: MessageHistoryCommand }
  | { type: "update_message"; payload: UpdateMessageCommand }
  | { type: "delete_message"; payload: DeleteMessageCommand }
  | { type: "add_reaction"; payload: ReactionCommand }
  | { type: "remove_reaction"; payload: ReactionCommand };
