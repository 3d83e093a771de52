import { pino } from "pino";
import type { Envelope } from "@atrium/protocol";
import type { ChannelConnection } from "./ws/connections.js";
import type { Logger } from "./lib/logger.js";
import { initDb } from "./db/database.js";
import { createBusiness } from "./businesses/store.js";
import { createChannel } from "./channels/store.js";
import { newId } from "./lib/ids.js";

export const silentLogger: Logger = pino({ level: "silent" });

/** In-process stand-in for a socket: records frames, can be told to refuse writes */
export class FakeConnection implements ChannelConnection {
  readonly id = newId();
  readonly frames: string[] = [];
  accept = true;
  closed: { code?: number; reason?: string } | undefined;

  send(frame: string): boolean {
    if (!this.accept || this.closed) return false;
    this.frames.push(frame);
    return true;
  }

  close(code?: number, reason?: string): void {
    this.closed = { code, reason };
  }

  envelopes(): Envelope[] {
    return this.frames.map((frame): Envelope => JSON.parse(frame));
  }

  last(): Envelope | undefined {
    const all = this.envelopes();
    return all[all.length - 1];
  }
}

/** Fresh in-memory database with one business owning one messages channel */
export function seedChannel(): { ownerId: string; businessId: string; channelId: string } {
  initDb(":memory:");
  const ownerId = newId();
  const business = createBusiness(ownerId, { name: "Acme" });
  const channel = createChannel({ businessId: business.id, name: "general", type: "messages" });
  return { ownerId, businessId: business.id, channelId: channel.id };
}
