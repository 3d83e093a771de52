import { argon2id, argon2Verify } from "hash-wasm";
import nacl from "tweetnacl";

export interface PasswordHashOptions {
  iterations?: number;
  /** Memory cost in KiB */
  memorySize?: number;
}

/**
 * Hash a password with Argon2id using a fresh 16-byte salt.
 * Returns the self-describing encoded form (`$argon2id$v=19$m=...`),
 * so cost parameters can change without invalidating stored hashes.
 */
export async function hashPassword(
  password: string,
  options: PasswordHashOptions = {}
): Promise<string> {
  return argon2id({
    password,
    salt: nacl.randomBytes(16),
    parallelism: 1,
    iterations: options.iterations ?? 2,
    memorySize: options.memorySize ?? 19456, // 19 MiB
    hashLength: 32,
    outputType: "encoded",
  });
}

/** Check a password against an encoded Argon2id hash. Malformed hashes never match. */
export async function verifyPassword(
  password: string,
  encodedHash: string
): Promise<boolean> {
  if (!encodedHash.startsWith("$argon2")) {
    return false;
  }
  return argon2Verify({ password, hash: encodedHash });
}
