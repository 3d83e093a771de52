import { describe, it, expect } from "vitest";
import { signToken, verifyToken, TOKEN_ISSUER } from "./token.js";
import { encode, toBase64Url } from "./utils.js";

const subject = {
  sub: "2b1f6a3e-4c57-4f0e-9d2a-1f3c5e7a9b0d",
  email: "ada@example.com",
  roles: { system: ["super_admin"] },
};

describe("signToken / verifyToken", () => {
  const now = Date.UTC(2024, 0, 1);

  it("accepts a fresh token and returns its claims", async () => {
    const token = await signToken(subject, "test-secret", 3600, now);
    const claims = await verifyToken(token, "test-secret", now + 1000);
    expect(claims).toEqual({
      ...subject,
      iss: TOKEN_ISSUER,
      iat: now / 1000,
      exp: now / 1000 + 3600,
    });
  });

  it("rejects a token signed with another secret", async () => {
    const token = await signToken(subject, "other-secret", 3600, now);
    expect(await verifyToken(token, "test-secret", now)).toBeNull();
  });

  it("rejects an expired token", async () => {
    const token = await signToken(subject, "test-secret", 60, now);
    expect(await verifyToken(token, "test-secret", now + 60_000)).toBeNull();
  });

  it("rejects a token whose payload was altered", async () => {
    const token = await signToken(subject, "test-secret", 3600, now);
    const [header, , signature] = token.split(".");
    const forged = toBase64Url(
      encode(JSON.stringify({ ...subject, roles: {}, iss: TOKEN_ISSUER, iat: 0, exp: 9999999999 }))
    );
    expect(await verifyToken(`${header}.${forged}.${signature}`, "test-secret", now)).toBeNull();
  });

  it("rejects malformed input", async () => {
    expect(await verifyToken("not-a-token", "test-secret")).toBeNull();
    expect(await verifyToken("a.b.c", "test-secret")).toBeNull();
  });
});
