/**
 * Library logger
 *
 * Writes structured records to stderr so purified output on stdout stays clean.
 * The level comes from PURIFY_LOG_LEVEL and defaults to "warn".
 */

import pino, { type Logger } from "pino";

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

type Level = typeof LEVELS[number];

function isLevel(value: string): value is Level {
  return (LEVELS as readonly string[]).includes(value);
}

export function resolveLogLevel(value: string | undefined): Level {
  const normalized = value?.trim().toLowerCase() ?? "";
  return isLevel(normalized) ? normalized : "warn";
}

let root: Logger | undefined;

function rootLogger(): Logger {
  if (!root) {
    root = pino(
      {
        name: "purifier",
        level: resolveLogLevel(process.env.PURIFY_LOG_LEVEL),
        base: undefined,
      },
      pino.destination(2),
    );
  }
  return root;
}

/**
 * Child logger for one pipeline stage.
 */
export function createLogger(stage: string): Logger {
  return rootLogger().child({ stage });
}

export type { Logger };
