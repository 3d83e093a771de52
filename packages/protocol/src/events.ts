import type { ChatMessage } from "./messages.js";

/** Server → Client events */

export interface ChannelJoinedEvent {
  channelId: string;
}

export interface MessageDeletedEvent {
  id: string;
}

/** Error events carry a human-readable string payload */
export type ErrorEvent = string;

export interface EventPayloads {
  channel_joined: ChannelJoinedEvent;
  message_created: ChatMessage;
  new_message: ChatMessage;
  message_history: ChatMessage[];
  message_updated: ChatMessage;
  message_deleted: MessageDeletedEvent;
  reaction_added: ChatMessage;
  reaction_removed: ChatMessage;
  error: ErrorEvent;
}

/** Union of all event types for the type field */
export type EventType = keyof EventPayloads;
