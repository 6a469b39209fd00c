import pino from "pino";
import { DEFAULT_CONFIG, loadConfig } from "./config";
import type { LogLevel } from "./config";

export type Logger = pino.Logger;

export const makeLogger = (level: LogLevel = "info", pretty = false): Logger =>
  pino({
    name: "ibc-wire",
    level,
    ...(pretty
      ? {
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "HH:MM:ss.l" },
          },
        }
      : {}),
  });

let shared: Logger | undefined;

/**
 * Library-wide logger, built from the environment on first use. An invalid
 * environment falls back to the defaults and is reported once.
 */
export const logger = (): Logger => {
  if (!shared) {
    let config = DEFAULT_CONFIG;
    let rejected: unknown;
    try {
      config = loadConfig();
    } catch (err) {
      rejected = err;
    }
    shared = makeLogger(config.logLevel, config.logPretty);
    if (rejected !== undefined) {
      shared.warn({ err: rejected }, "invalid logging environment, using defaults");
    }
  }
  return shared;
};

/** Drop the current logger so the next `logger()` call rebuilds it. */
export const resetLogger = (): void => {
  shared = undefined;
};

/** Route library logs into a host application's logger. */
export const setLogger = (next: Logger): void => {
  shared = next;
};
