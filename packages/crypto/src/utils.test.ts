import { describe, it, expect } from "vitest";
import { toBase64Url, fromBase64Url, encode, decode } from "./utils.js";

describe("base64url", () => {
  it("uses the url-safe alphabet without padding", () => {
    expect(toBase64Url(new Uint8Array([0xfb, 0xff]))).toBe("-_8");
  });

  it("decodes what it encodes", () => {
    expect(decode(fromBase64Url(toBase64Url(encode("héllo"))))).toBe("héllo");
  });

  it("throws on characters outside the alphabet", () => {
    expect(() => fromBase64Url("ab+/")).toThrow("Invalid base64url input");
  });
});
