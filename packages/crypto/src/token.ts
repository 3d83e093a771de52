import nacl from "tweetnacl";
import { createHMAC, createSHA256 } from "hash-wasm";
import { encode, decode, toBase64Url, fromBase64Url } from "./utils.js";

export const TOKEN_ISSUER = "atrium";

/** Identity carried inside an access token */
export interface TokenSubject {
  sub: string;
  email: string;
  roles: Record<string, string[]>;
}

export interface TokenClaims extends TokenSubject {
  iss: string;
  iat: number;
  exp: number;
}

const HEADER = toBase64Url(encode(JSON.stringify({ alg: "HS256", typ: "JWT" })));

async function hmacSha256(secret: string, data: string): Promise<Uint8Array> {
  const hmac = await createHMAC(createSHA256(), secret);
  hmac.init();
  hmac.update(data);
  return hmac.digest("binary");
}

function isRoleMap(value: unknown): value is Record<string, string[]> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(
    (ids) => Array.isArray(ids) && ids.every((id) => typeof id === "string")
  );
}

function isTokenClaims(value: unknown): value is TokenClaims {
  if (typeof value !== "object" || value === null) return false;
  return (
    "sub" in value && typeof value.sub === "string" &&
    "email" in value && typeof value.email === "string" &&
    "iss" in value && typeof value.iss === "string" &&
    "iat" in value && typeof value.iat === "number" &&
    "exp" in value && typeof value.exp === "number" &&
    "roles" in value && isRoleMap(value.roles)
  );
}

/** Issue an HS256 JWT for the subject, valid for `ttlSeconds` */
export async function signToken(
  subject: TokenSubject,
  secret: string,
  ttlSeconds: number,
  now = Date.now()
): Promise<string> {
  const iat = Math.floor(now / 1000);
  const claims: TokenClaims = { ...subject, iss: TOKEN_ISSUER, iat, exp: iat + ttlSeconds };
  const body = `${HEADER}.${toBase64Url(encode(JSON.stringify(claims)))}`;
  const signature = await hmacSha256(secret, body);
  return `${body}.${toBase64Url(signature)}`;
}

/**
 * Verify signature, issuer and expiry.
 * Returns null for anything that is not a currently valid token.
 */
export async function verifyToken(
  token: string,
  secret: string,
  now = Date.now()
): Promise<TokenClaims | null> {
  const parts = token.split(".");
  if (parts.length !== 3 || parts[0] !== HEADER) return null;
  const [header, payload, signature] = parts;

  let claims: unknown;
  let given: Uint8Array;
  try {
    given = fromBase64Url(signature);
    claims = JSON.parse(decode(fromBase64Url(payload)));
  } catch {
    return null;
  }

  const expected = await hmacSha256(secret, `${header}.${payload}`);
  // nacl.verify is constant-time and false on length mismatch
  if (!nacl.verify(given, expected)) return null;
  if (!isTokenClaims(claims)) return null;
  if (claims.iss !== TOKEN_ISSUER) return null;
  if (claims.exp <= Math.floor(now / 1000)) return null;
  return claims;
}
