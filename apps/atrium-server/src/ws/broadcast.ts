import { v4 as uuid } from "uuid";
import type { Envelope, EventPayloads, EventType } from "@atrium/protocol";
import type { ChannelConnection, ConnectionRegistry } from "./connections.js";
import type { Logger } from "../lib/logger.js";

export function encodeEvent<T extends EventType>(type: T, payload: EventPayloads[T]): string {
  const envelope: Envelope<EventPayloads[T]> = {
    type,
    id: uuid(),
    timestamp: Date.now(),
    payload,
  };
  return JSON.stringify(envelope);
}

/** Send an event to a single connection */
export function send<T extends EventType>(
  conn: ChannelConnection,
  type: T,
  payload: EventPayloads[T]
): boolean {
  return conn.send(encodeEvent(type, payload));
}

export class Broadcaster {
  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly log: Logger
  ) {}

  /**
   * Serialize once and write to every connection on the channel except
   * `exclude`. Connections that refuse the write are unregistered and closed
   * after the walk. Returns the number of successful writes.
   */
  broadcast<T extends EventType>(
    channelId: string,
    type: T,
    payload: EventPayloads[T],
    exclude?: ChannelConnection
  ): number {
    const frame = encodeEvent(type, payload);
    const failed: ChannelConnection[] = [];
    let delivered = 0;

    this.registry.forEach(channelId, (conn) => {
      if (conn === exclude) return;
      if (conn.send(frame)) {
        delivered++;
      } else {
        failed.push(conn);
      }
    });

    for (const conn of failed) {
      this.registry.unregister(channelId, conn);
      conn.close(1011, "write failed");
    }
    if (failed.length > 0) {
      this.log.warn({ channelId, type, dropped: failed.length }, "Dropped connections after failed write");
    }
    return delivered;
  }
}
