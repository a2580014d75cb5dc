/**
 * packages/core/src/logging.ts — Structured logger factory.
 */

import { type DestinationStream, type Logger, type LoggerOptions, pino } from "pino";

export type { Logger };

export type CreateLoggerOptions = Readonly<{
  /** pino level; falls back to TWEEN_UI_LOG_LEVEL, then "warn". */
  level?: string;
  /** Child logger component name. */
  component?: string;
  /** Where lines go; stdout when omitted. */
  destination?: DestinationStream;
}>;

const LOG_LEVEL_ENV = "TWEEN_UI_LOG_LEVEL";
const DEFAULT_LOG_LEVEL = "warn";

function resolveLevel(level: string | undefined): string {
  if (level !== undefined && level.length > 0) return level;
  const fromEnv = process.env[LOG_LEVEL_ENV];
  if (fromEnv !== undefined && fromEnv.length > 0) return fromEnv;
  return DEFAULT_LOG_LEVEL;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions: LoggerOptions = {
    name: "tween-ui",
    level: resolveLevel(options.level),
  };
  const base =
    options.destination === undefined
      ? pino(loggerOptions)
      : pino(loggerOptions, options.destination);
  return options.component === undefined ? base : base.child({ component: options.component });
}

let sharedLogger: Logger | null = null;

/** Lazily created logger shared by instances that were not given one. */
export function defaultLogger(): Logger {
  if (sharedLogger === null) sharedLogger = createLogger();
  return sharedLogger;
}
