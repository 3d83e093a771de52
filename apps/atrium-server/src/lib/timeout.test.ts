import { describe, it, expect } from "vitest";
import { TimeoutError, withTimeout } from "./timeout.js";

describe("withTimeout", () => {
  it("resolves with the value when the work finishes first", async () => {
    await expect(withTimeout(Promise.resolve(7), 50, "quick")).resolves.toBe(7);
  });

  it("passes the work's own rejection through", async () => {
    await expect(withTimeout(Promise.reject(new Error("boom")), 50, "failing")).rejects.toThrow("boom");
  });

  it("rejects with a TimeoutError when the work is too slow", async () => {
    const never = new Promise<number>(() => {});
    const result = withTimeout(never, 10, "slow call");
    await expect(result).rejects.toBeInstanceOf(TimeoutError);
    await expect(result).rejects.toThrow("slow call timed out after 10ms");
  });
});
