import type { Reaction } from "@atrium/protocol";

// Emoji are compared as exact strings; no normalization.

export function findReaction(reactions: Reaction[], emoji: string): Reaction | undefined {
  return reactions.find((r) => r.emoji === emoji);
}

/**
 * Add `userId` to the bucket for `emoji`, creating the bucket if absent.
 * Returns the input array unchanged when the user already reacted.
 */
export function addUserReaction(
  reactions: Reaction[],
  emoji: string,
  userId: string
): Reaction[] {
  const bucket = findReaction(reactions, emoji);
  if (!bucket) {
    return [...reactions, { emoji, userIds: [userId] }];
  }
  if (bucket.userIds.includes(userId)) {
    return reactions;
  }
  return reactions.map((r) =>
    r === bucket ? { emoji: r.emoji, userIds: [...r.userIds, userId] } : r
  );
}

/** Remove `userId` from the bucket for `emoji`. Empty buckets are left for pruning. */
export function pullUserReaction(
  reactions: Reaction[],
  emoji: string,
  userId: string
): Reaction[] {
  const bucket = findReaction(reactions, emoji);
  if (!bucket || !bucket.userIds.includes(userId)) {
    return reactions;
  }
  return reactions.map((r) =>
    r === bucket ? { emoji: r.emoji, userIds: r.userIds.filter((id) => id !== userId) } : r
  );
}

export function pruneEmptyReactions(reactions: Reaction[]): Reaction[] {
  return reactions.every((r) => r.userIds.length > 0)
    ? reactions
    : reactions.filter((r) => r.userIds.length > 0);
}
