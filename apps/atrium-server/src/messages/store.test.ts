import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { pino } from "pino";
import { createSqliteMessageStore, type MessageStore } from "./store.js";
import { closeDb, getDb } from "../db/database.js";
import { newId } from "../lib/ids.js";
import { seedChannel, silentLogger } from "../test-utils.js";

describe("createSqliteMessageStore", () => {
  let channelId: string;
  let store: MessageStore;
  let clock: number;
  const alice = newId();
  const bob = newId();

  beforeEach(() => {
    ({ channelId } = seedChannel());
    clock = Date.UTC(2024, 4, 1, 12, 0, 0);
    store = createSqliteMessageStore(getDb(), { log: silentLogger, now: () => clock });
  });

  afterEach(() => {
    closeDb();
  });

  it("creates unpinned messages with no reactions", async () => {
    const created = await store.create({ channelId, userId: alice, content: "hello", messageType: "text" });

    expect(created).toEqual({
      id: created.id,
      channelId,
      userId: alice,
      content: "hello",
      messageType: "text",
      createdAt: "2024-05-01T12:00:00.000Z",
      isPinned: false,
      reactions: [],
    });
    expect(await store.getById(created.id)).toEqual(created);
  });

  it("keeps media details", async () => {
    const created = await store.create({
      channelId,
      userId: alice,
      content: "",
      messageType: "image",
      mediaPath: "uploads/cat.png",
      mediaMetadata: { filename: "cat.png", size: 2048, width: 640, height: 480 },
    });

    const loaded = await store.getById(created.id);
    expect(loaded?.mediaPath).toBe("uploads/cat.png");
    expect(loaded?.mediaMetadata).toEqual({ filename: "cat.png", size: 2048, width: 640, height: 480 });
  });

  it("lists newest first, breaking timestamp ties by insertion order", async () => {
    const first = await store.create({ channelId, userId: alice, content: "1", messageType: "text" });
    clock += 1000;
    const second = await store.create({ channelId, userId: alice, content: "2", messageType: "text" });
    const third = await store.create({ channelId, userId: bob, content: "3", messageType: "text" });

    const page = await store.listByChannel(channelId, 50, 0);
    expect(page.map((m) => m.id)).toEqual([third.id, second.id, first.id]);

    const skipped = await store.listByChannel(channelId, 1, 1);
    expect(skipped.map((m) => m.id)).toEqual([second.id]);
  });

  it("applies only the fields present in a patch", async () => {
    const created = await store.create({ channelId, userId: alice, content: "draft", messageType: "text" });
    clock += 5000;

    const pinned = await store.update(created.id, { isPinned: true });
    expect(pinned?.content).toBe("draft");
    expect(pinned?.isPinned).toBe(true);
    expect(pinned?.updatedAt).toBe("2024-05-01T12:00:05.000Z");

    const edited = await store.update(created.id, { content: "final" });
    expect(edited?.content).toBe("final");
    expect(edited?.isPinned).toBe(true);

    const unpinned = await store.update(created.id, { isPinned: false });
    expect(unpinned?.isPinned).toBe(false);
  });

  it("reports a missing message on update and delete", async () => {
    expect(await store.update(newId(), { content: "x" })).toBeUndefined();
    expect(await store.delete(newId())).toBe(false);
  });

  it("deletes a message", async () => {
    const created = await store.create({ channelId, userId: alice, content: "bye", messageType: "text" });
    expect(await store.delete(created.id)).toBe(true);
    expect(await store.getById(created.id)).toBeUndefined();
  });

  it("merges reactions for the same emoji into one bucket", async () => {
    const created = await store.create({ channelId, userId: alice, content: "hi", messageType: "text" });

    await store.addReaction(created.id, alice, "👍");
    await store.addReaction(created.id, bob, "👍");
    const again = await store.addReaction(created.id, bob, "👍");

    expect(again?.reactions).toEqual([{ emoji: "👍", userIds: [alice, bob] }]);
  });

  it("keeps one bucket when first reactions race", async () => {
    const created = await store.create({ channelId, userId: alice, content: "hi", messageType: "text" });

    await Promise.all([
      store.addReaction(created.id, alice, "🎉"),
      store.addReaction(created.id, bob, "🎉"),
    ]);

    const loaded = await store.getById(created.id);
    expect(loaded?.reactions).toEqual([{ emoji: "🎉", userIds: [alice, bob] }]);
  });

  it("prunes the bucket when its last user leaves", async () => {
    const created = await store.create({ channelId, userId: alice, content: "hi", messageType: "text" });
    await store.addReaction(created.id, alice, "👍");
    await store.addReaction(created.id, alice, "🎉");

    const removed = await store.removeReaction(created.id, alice, "👍");

    expect(removed?.reactions).toEqual([{ emoji: "🎉", userIds: [alice] }]);
    expect((await store.getById(created.id))?.reactions).toEqual([{ emoji: "🎉", userIds: [alice] }]);
  });

  it("leaves the bucket alone when a non-member removes", async () => {
    const created = await store.create({ channelId, userId: alice, content: "hi", messageType: "text" });
    await store.addReaction(created.id, alice, "👍");

    const removed = await store.removeReaction(created.id, bob, "👍");
    expect(removed?.reactions).toEqual([{ emoji: "👍", userIds: [alice] }]);
  });

  it("returns undefined when the message or the emoji bucket is missing", async () => {
    const created = await store.create({ channelId, userId: alice, content: "hi", messageType: "text" });

    expect(await store.removeReaction(created.id, alice, "👍")).toBeUndefined();
    expect(await store.removeReaction(newId(), alice, "👍")).toBeUndefined();
    expect(await store.addReaction(newId(), alice, "👍")).toBeUndefined();
  });

  it("logs and still succeeds when pruning fails", async () => {
    const log = pino({ level: "silent" });
    const warn = vi.spyOn(log, "warn");
    const guarded = createSqliteMessageStore(getDb(), { log, now: () => clock });
    const created = await guarded.create({ channelId, userId: alice, content: "hi", messageType: "text" });
    await guarded.addReaction(created.id, alice, "👍");

    // Any write that shrinks the reaction list is refused
    getDb().exec(`
      CREATE TRIGGER block_prune BEFORE UPDATE OF reactions ON messages
      WHEN json_array_length(NEW.reactions) < json_array_length(OLD.reactions)
      BEGIN SELECT RAISE(ABORT, 'prune blocked'); END;
    `);

    const removed = await guarded.removeReaction(created.id, alice, "👍");

    expect(removed?.reactions).toEqual([{ emoji: "👍", userIds: [] }]);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
