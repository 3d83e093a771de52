import type { WebSocket, RawData } from "ws";
import type { InboundOperation } from "@atrium/protocol";
import { SocketConnection, type ChannelConnection, type ConnectionRegistry } from "./connections.js";
import { send } from "./broadcast.js";
import { decodeFrame } from "./decode.js";
import {
  addReaction,
  createMessage,
  deleteMessage,
  getMessageHistory,
  removeReaction,
  updateMessage,
  type OperationDeps,
  type Session,
} from "./operations.js";
import { OperationError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";

export interface MessagingContext extends OperationDeps {
  registry: ConnectionRegistry;
  log: Logger;
}

export type SessionState = "connecting" | "active" | "closed";

/**
 * One connection's lifecycle: registered on open, frames handled strictly
 * in arrival order, unregistered exactly once on close.
 */
export class MessageSession implements Session {
  private state: SessionState = "connecting";
  private queue: Promise<void> = Promise.resolve();
  private readonly log: Logger;

  constructor(
    readonly conn: ChannelConnection,
    readonly channelId: string,
    readonly userId: string,
    private readonly ctx: MessagingContext
  ) {
    this.log = ctx.log.child({ channelId, userId, connectionId: conn.id });
  }

  get status(): SessionState {
    return this.state;
  }

  open(): void {
    if (this.state !== "connecting") return;
    this.ctx.registry.register(this.channelId, this.conn);
    this.state = "active";
    send(this.conn, "channel_joined", { channelId: this.channelId });
    this.log.debug("Connection joined channel");
  }

  /** Queue a text frame; resolves once it (and everything before it) is handled */
  receive(frame: string): Promise<void> {
    if (this.state !== "active") return this.queue;
    this.queue = this.queue
      .then(() => this.process(frame))
      .catch((err: unknown) => {
        this.log.error({ err }, "Unhandled error while processing frame");
      });
    return this.queue;
  }

  close(): void {
    if (this.state === "closed") return;
    this.state = "closed";
    this.ctx.registry.unregister(this.channelId, this.conn);
    this.log.debug("Connection left channel");
  }

  private async process(frame: string): Promise<void> {
    const decoded = decodeFrame(frame);
    if (!decoded.ok) {
      send(this.conn, "error", decoded.error);
      return;
    }

    try {
      await this.dispatch(decoded.operation);
    } catch (err) {
      this.report(decoded.operation.type, err);
    }
  }

  private dispatch(operation: InboundOperation): Promise<void> {
    switch (operation.type) {
      case "create_message":
        return createMessage(this, operation.payload, this.ctx);
      case "get_message_history":
        return getMessageHistory(this, operation.payload, this.ctx);
      case "update_message":
        return updateMessage(this, operation.payload, this.ctx);
      case "delete_message":
        return deleteMessage(this, operation.payload, this.ctx);
      case "add_reaction":
        return addReaction(this, operation.payload, this.ctx);
      case "remove_reaction":
        return removeReaction(this, operation.payload, this.ctx);
    }
  }

  private report(type: string, err: unknown): void {
    if (err instanceof OperationError) {
      if (err.kind === "backend") {
        this.log.error({ err, type }, err.message);
      } else {
        this.log.debug({ type, kind: err.kind }, err.message);
      }
      send(this.conn, "error", err.message);
      return;
    }
    this.log.error({ err, type }, "Operation failed");
    send(this.conn, "error", "Internal server error");
  }
}

/** Bind an admitted socket to its channel and start reading frames */
export function handleConnection(
  ws: WebSocket,
  identity: { channelId: string; userId: string },
  ctx: MessagingContext
): MessageSession {
  const session = new MessageSession(new SocketConnection(ws), identity.channelId, identity.userId, ctx);
  session.open();

  ws.on("message", (data: RawData, isBinary: boolean) => {
    if (isBinary) return;
    void session.receive(data.toString());
  });

  ws.on("close", () => {
    session.close();
  });

  ws.on("error", (err) => {
    ctx.log.warn({ err, channelId: identity.channelId }, "WebSocket transport error");
    session.close();
  });

  return session;
}
