import type { WebSocket } from "ws";
import { v4 as uuid } from "uuid";

/** One open duplex transport bound to a single channel */
export interface ChannelConnection {
  readonly id: string;
  /** Queue a text frame; false when the transport refused it */
  send(frame: string): boolean;
  close(code?: number, reason?: string): void;
}

/** Adapts a `ws` socket to ChannelConnection */
export class SocketConnection implements ChannelConnection {
  readonly id = uuid();

  constructor(private readonly ws: WebSocket) {}

  send(frame: string): boolean {
    if (this.ws.readyState !== this.ws.OPEN) {
      return false;
    }
    try {
      this.ws.send(frame, (err) => {
        // Async write failure: drop the socket; its close handler unregisters it
        if (err) this.ws.terminate();
      });
      return true;
    } catch {
      return false;
    }
  }

  close(code?: number, reason?: string): void {
    if (this.ws.readyState === this.ws.OPEN || this.ws.readyState === this.ws.CONNECTING) {
      this.ws.close(code, reason);
    }
  }
}

/**
 * Channel id → live connections.
 *
 * Every method runs to completion on the event loop, so register/unregister
 * are exclusive with respect to each other and to iteration. No empty set is
 * ever left behind under a channel key.
 */
export class ConnectionRegistry {
  private readonly channels = new Map<string, Set<ChannelConnection>>();

  register(channelId: string, conn: ChannelConnection): void {
    let members = this.channels.get(channelId);
    if (!members) {
      members = new Set();
      this.channels.set(channelId, members);
    }
    members.add(conn);
  }

  unregister(channelId: string, conn: ChannelConnection): void {
    const members = this.channels.get(channelId);
    if (!members) return;
    members.delete(conn);
    if (members.size === 0) {
      this.channels.delete(channelId);
    }
  }

  /**
   * Visit a snapshot of the channel's members. A member unregistered while
   * the walk is in progress is skipped; `fn` must not mutate the registry.
   */
  forEach(channelId: string, fn: (conn: ChannelConnection) => void): void {
    const members = this.channels.get(channelId);
    if (!members) return;
    for (const conn of Array.from(members)) {
      if (this.channels.get(channelId)?.has(conn)) {
        fn(conn);
      }
    }
  }

  has(channelId: string, conn: ChannelConnection): boolean {
    return this.channels.get(channelId)?.has(conn) ?? false;
  }

  count(channelId: string): number {
    return this.channels.get(channelId)?.size ?? 0;
  }

  channelIds(): string[] {
    return Array.from(this.channels.keys());
  }
}
