import { object, optional, parse, picklist, pipe, transform } from "valibot";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const flagSchema = pipe(
  picklist(["1", "0", "true", "false"]),
  transform((v) => v === "1" || v === "true"),
);

const envSchema = object({
  IBC_WIRE_LOG_LEVEL: optional(picklist(LOG_LEVELS), "info"),
  IBC_WIRE_LOG_PRETTY: optional(flagSchema, "false"),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Config {
  readonly logLevel: LogLevel;
  readonly logPretty: boolean;
}

export const DEFAULT_CONFIG: Config = { logLevel: "info", logPretty: false };

/** Reads settings from the environment; throws `ValiError` on unknown values. */
export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
): Config => {
  const parsed = parse(envSchema, {
    IBC_WIRE_LOG_LEVEL: env.IBC_WIRE_LOG_LEVEL,
    IBC_WIRE_LOG_PRETTY: env.IBC_WIRE_LOG_PRETTY,
  });
  return {
    logLevel: parsed.IBC_WIRE_LOG_LEVEL,
    logPretty: parsed.IBC_WIRE_LOG_PRETTY,
  };
};
