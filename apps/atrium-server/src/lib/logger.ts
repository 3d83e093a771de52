import { createRequire } from "node:module";
import { pino, type Logger as PinoLogger, type LoggerOptions } from "pino";
import config from "../config.js";

export type Logger = PinoLogger;

interface PrettyTransport {
  target: string;
  options: Record<string, unknown>;
}

const prettyTransport: PrettyTransport = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "HH:MM:ss",
    ignore: "pid,hostname",
  },
};

/** pino-pretty is a dev dependency; a production-only install lacks it */
function prettyInstalled(): boolean {
  try {
    createRequire(import.meta.url).resolve("pino-pretty");
    return true;
  } catch {
    return false;
  }
}

/** Pretty output in development when pino-pretty is present, plain JSON otherwise */
export function selectTransport(
  env: string,
  prettyAvailable: () => boolean = prettyInstalled
): PrettyTransport | undefined {
  if (env === "production" || env === "test") return undefined;
  return prettyAvailable() ? prettyTransport : undefined;
}

export const loggerOptions: LoggerOptions = {
  level: config.logLevel,
  transport: selectTransport(config.env),
};

export const logger: Logger = pino(loggerOptions);

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
