export {
  hashPassword,
  verifyPassword,
  type PasswordHashOptions,
} from "./password.js";

export {
  signToken,
  verifyToken,
  TOKEN_ISSUER,
  type TokenClaims,
  type TokenSubject,
} from "./token.js";

export {
  encode,
  decode,
  toBase64Url,
  fromBase64Url,
} from "./utils.js";
