import pino, { type Logger } from "pino";

export type { Logger } from "pino";

export interface CreateLoggerOpts {
  level?: string;
  base?: Record<string, unknown>;
}

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

/**
 * JSON logger for the store. Level comes from LOG_LEVEL; tests run silent
 * unless LOG_LEVEL is set.
 */
export function createLogger(opts: CreateLoggerOpts = {}): Logger {
  return pino({
    level: opts.level ?? defaultLevel(),
    base: {
      service: "lineage-store",
      ...opts.base,
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Child logger tagged with the component name.
 */
export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
