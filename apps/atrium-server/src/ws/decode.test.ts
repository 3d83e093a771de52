import { describe, it, expect } from "vitest";
import { decodeFrame } from "./decode.js";

describe("decodeFrame", () => {
  it("maps client_message onto the create operation with a default type", () => {
    expect(decodeFrame(JSON.stringify({ type: "client_message", payload: { content: "hi" } }))).toEqual({
      ok: true,
      operation: { type: "create_message", payload: { content: "hi", messageType: "text" } },
    });
  });

  it("accepts history without a payload", () => {
    expect(decodeFrame(JSON.stringify({ type: "get_message_history" }))).toEqual({
      ok: true,
      operation: { type: "get_message_history", payload: {} },
    });
  });

  it("keeps an explicit false pin flag", () => {
    const result = decodeFrame(JSON.stringify({ type: "update_message", payload: { id: "m1", isPinned: false } }));
    expect(result).toEqual({
      ok: true,
      operation: { type: "update_message", payload: { id: "m1", isPinned: false } },
    });
  });

  it("rejects text that is not JSON", () => {
    expect(decodeFrame("{nope")).toEqual({ ok: false, error: "Invalid message format" });
  });

  it("rejects an envelope without a type", () => {
    expect(decodeFrame(JSON.stringify({ payload: {} }))).toEqual({ ok: false, error: "Invalid message envelope" });
  });

  it("rejects an unknown type", () => {
    expect(decodeFrame(JSON.stringify({ type: "shout", payload: {} }))).toEqual({
      ok: false,
      error: "Unknown message type: shout",
    });
  });

  it("names the offending field of a bad payload", () => {
    expect(decodeFrame(JSON.stringify({ type: "add_reaction", payload: { messageId: "m1" } }))).toEqual({
      ok: false,
      error: "Invalid add_reaction payload: emoji: Required",
    });
  });

  it("rejects an unsupported message type", () => {
    const result = decodeFrame(JSON.stringify({ type: "client_message", payload: { messageType: "video" } }));
    expect(result.ok).toBe(false);
  });
});
