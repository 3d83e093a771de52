export interface ServerConfig {
  env: string;
  port: number;
  host: string;
  dataDir: string;
  /** HMAC key for access tokens */
  jwtSecret: string;
  tokenTtlSeconds: number;
  /** Upper bound on each message-store call made from a WebSocket handler */
  storeTimeoutMs: number;
  historyDefaultLimit: number;
  corsOrigin: string | boolean;
  logLevel: string;
  /** Argon2id cost; tests run with a cheap setting */
  passwordHashing: { iterations: number; memorySize: number };
}

const env = process.env.NODE_ENV ?? "development";

function parseCorsOrigin(raw: string | undefined): string | boolean {
  if (!raw || raw === "*") return true;
  return raw;
}

const config: ServerConfig = {
  env,
  port: parseInt(process.env.PORT ?? "9000", 10),
  host: process.env.HOST ?? "0.0.0.0",
  dataDir: process.env.DATA_DIR ?? "./data",
  jwtSecret: process.env.JWT_SECRET_KEY?.trim() || "dev-secret",
  tokenTtlSeconds: parseInt(process.env.TOKEN_TTL_SECONDS ?? String(24 * 60 * 60), 10),
  storeTimeoutMs: parseInt(process.env.STORE_TIMEOUT_MS ?? "5000", 10),
  historyDefaultLimit: 50,
  corsOrigin: parseCorsOrigin(process.env.CORS_ORIGIN),
  logLevel: process.env.LOG_LEVEL ?? (env === "test" ? "silent" : "info"),
  passwordHashing:
    env === "test"
      ? { iterations: 1, memorySize: 1024 }
      : {
          iterations: parseInt(process.env.ARGON2_ITERATIONS ?? "2", 10),
          memorySize: parseInt(process.env.ARGON2_MEMORY_KIB ?? "19456", 10),
        },
};

export function usesDefaultSecret(): boolean {
  return !process.env.JWT_SECRET_KEY?.trim();
}

export default config;
