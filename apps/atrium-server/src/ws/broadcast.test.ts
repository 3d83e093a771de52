import { describe, it, expect } from "vitest";
import { Broadcaster, encodeEvent } from "./broadcast.js";
import { ConnectionRegistry } from "./connections.js";
import { FakeConnection, silentLogger } from "../test-utils.js";

function setup(count: number) {
  const registry = new ConnectionRegistry();
  const broadcaster = new Broadcaster(registry, silentLogger);
  const conns = Array.from({ length: count }, () => new FakeConnection());
  for (const conn of conns) registry.register("c1", conn);
  return { registry, broadcaster, conns };
}

describe("encodeEvent", () => {
  it("wraps the payload in a typed envelope", () => {
    const envelope = JSON.parse(encodeEvent("message_deleted", { id: "m1" }));
    expect(envelope.type).toBe("message_deleted");
    expect(envelope.payload).toEqual({ id: "m1" });
    expect(typeof envelope.id).toBe("string");
    expect(typeof envelope.timestamp).toBe("number");
  });
});

describe("Broadcaster", () => {
  it("writes the same serialized frame to every connection", () => {
    const { broadcaster, conns } = setup(3);

    const delivered = broadcaster.broadcast("c1", "message_deleted", { id: "m1" });

    expect(delivered).toBe(3);
    const frames = conns.map((c) => c.frames[0]);
    expect(new Set(frames).size).toBe(1);
  });

  it("skips the excluded connection", () => {
    const { broadcaster, conns } = setup(3);

    const delivered = broadcaster.broadcast("c1", "message_deleted", { id: "m1" }, conns[0]);

    expect(delivered).toBe(2);
    expect(conns[0].frames).toEqual([]);
    expect(conns[1].frames).toHaveLength(1);
  });

  it("delivers to the healthy peers and drops the one whose write fails", () => {
    const { registry, broadcaster, conns } = setup(4);
    conns[1].accept = false;

    const delivered = broadcaster.broadcast("c1", "message_deleted", { id: "m1" });

    expect(delivered).toBe(3);
    expect(registry.has("c1", conns[1])).toBe(false);
    expect(registry.count("c1")).toBe(3);
    expect(conns[1].closed).toEqual({ code: 1011, reason: "write failed" });
    expect(conns[0].frames).toHaveLength(1);
    expect(conns[2].frames).toHaveLength(1);
    expect(conns[3].frames).toHaveLength(1);
  });

  it("does nothing for a channel nobody is in", () => {
    const { broadcaster } = setup(0);
    expect(broadcaster.broadcast("empty", "message_deleted", { id: "m1" })).toBe(0);
  });
});
