/***
 * Logger — Leveled console output with a scope prefix.
 *
 * The runtime never writes to the console directly; it goes through a
 * Logger so callers can raise the threshold, silence it, or hand in
 * their own sink through AppOptions.logger.
 *
 *   const log = create_logger("ecs", LOG_LEVEL.DEBUG);
 *   log.debug("phase UPDATE ran 3 systems");
 *   // → console.debug("[ecs] phase UPDATE ran 3 systems")
 *
 ***/

export enum LOG_LEVEL {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

type ConsoleMethod = "debug" | "info" | "warn" | "error";

export function create_logger(scope: string, level: LOG_LEVEL): Logger {
  const write = (
    at: LOG_LEVEL,
    method: ConsoleMethod,
    message: string,
    context?: Record<string, unknown>,
  ): void => {
    if (at < level) return;
    const line = `[${scope}] ${message}`;
    if (context === undefined) {
      console[method](line);
    } else {
      console[method](line, context);
    }
  };

  return {
    debug: (message, context) => write(LOG_LEVEL.DEBUG, "debug", message, context),
    info: (message, context) => write(LOG_LEVEL.INFO, "info", message, context),
    warn: (message, context) => write(LOG_LEVEL.WARN, "warn", message, context),
    error: (message, context) => write(LOG_LEVEL.ERROR, "error", message, context),
  };
}

/** A logger that drops everything. */
export const SILENT_LOGGER: Logger = create_logger("", LOG_LEVEL.SILENT);
