import { signToken } from "@atrium/crypto";
import type { User } from "@atrium/protocol";
import config from "../config.js";

export function issueToken(user: User): Promise<string> {
  return signToken(
    { sub: user.id, email: user.email, roles: user.roles },
    config.jwtSecret,
    config.tokenTtlSeconds
  );
}
