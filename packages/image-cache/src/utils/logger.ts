/**
 * Leveled console logger.
 *
 * `error` takes the failure as its own argument so the stack survives;
 * everything else is a message plus a flat context object.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
  child(scope: string): Logger;
}

/** The subset of `console` the logger writes to. */
export type LogSink = Pick<Console, "debug" | "info" | "warn" | "error">;

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  sink?: LogSink;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "warn";
  const sink = options.sink ?? console;
  const prefix = options.scope ? `[${options.scope}] ` : "";

  const enabled = (target: Exclude<LogLevel, "silent">): boolean =>
    LEVEL_RANK[target] >= LEVEL_RANK[level];

  const write = (
    target: Exclude<LogLevel, "silent">,
    message: string,
    extra: unknown[]
  ): void => {
    if (!enabled(target)) return;
    sink[target](`${prefix}${message}`, ...extra);
  };

  return {
    debug(message, context) {
      write("debug", message, context ? [context] : []);
    },
    info(message, context) {
      write("info", message, context ? [context] : []);
    },
    warn(message, context) {
      write("warn", message, context ? [context] : []);
    },
    error(message, error, context) {
      const extra: unknown[] = [];
      if (error !== undefined) extra.push(error);
      if (context) extra.push(context);
      write("error", message, extra);
    },
    child(scope) {
      return createLogger({
        level,
        sink,
        scope: options.scope ? `${options.scope}:${scope}` : scope,
      });
    },
  };
}

export const logger = createLogger({ scope: "image-cache" });
