import type {
  ChatMessage,
  CreateMessageCommand,
  DeleteMessageCommand,
  MessageHistoryCommand,
  ReactionCommand,
  UpdateMessageCommand,
} from "@atrium/protocol";
import type { MessagePatch, MessageStore } from "../messages/store.js";
import type { Broadcaster } from "./broadcast.js";
import { send } from "./broadcast.js";
import type { ChannelConnection } from "./connections.js";
import { OperationError, errorMessage } from "../lib/errors.js";
import { withTimeout } from "../lib/timeout.js";
import { isId } from "../lib/ids.js";

/** The authenticated connection an operation runs on behalf of */
export interface Session {
  conn: ChannelConnection;
  channelId: string;
  userId: string;
}

export interface OperationDeps {
  store: MessageStore;
  broadcaster: Broadcaster;
  timeoutMs: number;
  historyDefaultLimit: number;
}

async function callStore<T>(
  deps: OperationDeps,
  label: string,
  failure: string,
  work: () => Promise<T>
): Promise<T> {
  try {
    return await withTimeout(work(), deps.timeoutMs, `message store ${label}`);
  } catch (err) {
    throw new OperationError("backend", `${failure}: ${errorMessage(err)}`, { cause: err });
  }
}

/** Payload user ids are optional, but never allowed to differ from the session's */
function resolveActor(session: Session, claimed: string | undefined): string {
  if (claimed === undefined || claimed === "") return session.userId;
  if (!isId(claimed)) {
    throw new OperationError("validation", "Invalid user ID");
  }
  if (claimed !== session.userId) {
    throw new OperationError("validation", "userId does not match the authenticated user");
  }
  return session.userId;
}

function requireMessageId(id: string): void {
  if (!isId(id)) {
    throw new OperationError("validation", "Invalid message ID");
  }
}

/** Load a message and make sure it belongs to the session's channel */
async function loadChannelMessage(session: Session, id: string, deps: OperationDeps): Promise<ChatMessage> {
  const message = await callStore(deps, "getById", "Failed to load message", () => deps.store.getById(id));
  if (!message || message.channelId !== session.channelId) {
    throw new OperationError("not_found", "Message not found");
  }
  return message;
}

export async function createMessage(
  session: Session,
  cmd: CreateMessageCommand,
  deps: OperationDeps
): Promise<void> {
  if (!isId(session.channelId)) {
    throw new OperationError("validation", "Invalid channel ID");
  }
  const userId = resolveActor(session, cmd.userId);

  const message = await callStore(deps, "create", "Failed to create message", () =>
    deps.store.create({
      channelId: session.channelId,
      userId,
      content: cmd.content ?? "",
      messageType: cmd.messageType,
      mediaPath: cmd.mediaPath,
      mediaMetadata: cmd.mediaMetadata,
    })
  );

  send(session.conn, "message_created", message);
  deps.broadcaster.broadcast(session.channelId, "new_message", message, session.conn);
}

export async function getMessageHistory(
  session: Session,
  cmd: MessageHistoryCommand,
  deps: OperationDeps
): Promise<void> {
  const limit = cmd.limit !== undefined && cmd.limit > 0 ? cmd.limit : deps.historyDefaultLimit;
  const skip = Math.max(cmd.skip ?? 0, 0);

  const messages = await callStore(deps, "listByChannel", "Failed to fetch message history", () =>
    deps.store.listByChannel(session.channelId, limit, skip)
  );
  send(session.conn, "message_history", messages);
}

function toPatch(cmd: UpdateMessageCommand): MessagePatch {
  const patch: MessagePatch = {};
  if (cmd.content !== undefined) patch.content = cmd.content;
  if (cmd.messageType !== undefined) patch.messageType = cmd.messageType;
  if (cmd.mediaPath !== undefined) patch.mediaPath = cmd.mediaPath;
  if (cmd.mediaMetadata !== undefined) patch.mediaMetadata = cmd.mediaMetadata;
  if (cmd.isPinned !== undefined) patch.isPinned = cmd.isPinned;
  return patch;
}

export async function updateMessage(
  session: Session,
  cmd: UpdateMessageCommand,
  deps: OperationDeps
): Promise<void> {
  requireMessageId(cmd.id);
  const patch = toPatch(cmd);
  if (Object.keys(patch).length === 0) {
    throw new OperationError("validation", "No data to update");
  }

  await loadChannelMessage(session, cmd.id, deps);
  const updated = await callStore(deps, "update", "Failed to update message", () =>
    deps.store.update(cmd.id, patch)
  );
  if (!updated) {
    throw new OperationError("not_found", "Message not found");
  }

  send(session.conn, "message_updated", updated);
  deps.broadcaster.broadcast(session.channelId, "message_updated", updated, session.conn);
}

export async function deleteMessage(
  session: Session,
  cmd: DeleteMessageCommand,
  deps: OperationDeps
): Promise<void> {
  requireMessageId(cmd.id);
  await loadChannelMessage(session, cmd.id, deps);

  const deleted = await callStore(deps, "delete", "Failed to delete message", () =>
    deps.store.delete(cmd.id)
  );
  if (!deleted) {
    throw new OperationError("not_found", "Message not found");
  }

  const payload = { id: cmd.id };
  send(session.conn, "message_deleted", payload);
  deps.broadcaster.broadcast(session.channelId, "message_deleted", payload, session.conn);
}

export async function addReaction(
  session: Session,
  cmd: ReactionCommand,
  deps: OperationDeps
): Promise<void> {
  requireMessageId(cmd.messageId);
  const userId = resolveActor(session, cmd.userId);
  await loadChannelMessage(session, cmd.messageId, deps);

  const message = await callStore(deps, "addReaction", "Failed to add reaction", () =>
    deps.store.addReaction(cmd.messageId, userId, cmd.emoji)
  );
  if (!message) {
    throw new OperationError("not_found", "Message not found");
  }

  send(session.conn, "reaction_added", message);
  deps.broadcaster.broadcast(session.channelId, "reaction_added", message, session.conn);
}

export async function removeReaction(
  session: Session,
  cmd: ReactionCommand,
  deps: OperationDeps
): Promise<void> {
  requireMessageId(cmd.messageId);
  const userId = resolveActor(session, cmd.userId);
  await loadChannelMessage(session, cmd.messageId, deps);

  const message = await callStore(deps, "removeReaction", "Failed to remove reaction", () =>
    deps.store.removeReaction(cmd.messageId, userId, cmd.emoji)
  );
  if (!message) {
    throw new OperationError("not_found", "Message or reaction not found");
  }

  send(session.conn, "reaction_removed", message);
  deps.broadcaster.broadcast(session.channelId, "reaction_removed", message, session.conn);
}
