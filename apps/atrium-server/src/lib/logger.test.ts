import { describe, it, expect } from "vitest";
import { selectTransport } from "./logger.js";

describe("selectTransport", () => {
  it("writes plain JSON in production and test", () => {
    expect(selectTransport("production", () => true)).toBeUndefined();
    expect(selectTransport("test", () => true)).toBeUndefined();
  });

  it("pretty-prints in development when pino-pretty is installed", () => {
    expect(selectTransport("development", () => true)?.target).toBe("pino-pretty");
  });

  it("falls back to plain JSON when pino-pretty is missing", () => {
    expect(selectTransport("development", () => false)).toBeUndefined();
  });
});
