import pino from "pino";
import type { AppConfig } from "./config.js";

export type Logger = pino.Logger;

export function createLogger(config: Pick<AppConfig, "logLevel">): Logger {
  return pino({
    level: config.logLevel,
    base: { service: "album-mirror" }
  });
}

/** Logger that drops everything; used where no output is wanted. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
