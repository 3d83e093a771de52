/** Every WebSocket frame follows this envelope shape */
export interface Envelope<T = unknown> {
  type: string;
  id: string;
  timestamp: number;
  payload: T;
}

export type MessageType = "text" | "image" | "file" | "voice";

export interface MediaMetadata {
  filename: string;
  size: number;
  width?: number;
  height?: number;
}

/** One bucket per distinct emoji on a message */
export interface Reaction {
  emoji: string;
  userIds: string[];
}

/** A stored/transmitted chat message */
export interface ChatMessage {
  id: string;
  channelId: string;
  userId: string;
  content: string;
  messageType: MessageType;
  mediaPath?: string;
  mediaMetadata?: MediaMetadata;
  createdAt: string;
  updatedAt?: string;
  isPinned: boolean;
  reactions: Reaction[];
}
