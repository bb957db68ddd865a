/**
 * ## Scoped Loggers
 *
 * Console loggers with a scope prefix and level filtering. Each state machine
 * entity gets its own scope under a common base, so a host running ticket and
 * order machines side by side sees `[FSM:Ticket] ...` and `[FSM:Order] ...`.
 *
 * @example
 * ```typescript
 * const loggerFor = createEntityLoggerFactory("FSM", "INFO");
 * const logger = loggerFor("Ticket");
 *
 * logger.debug("Transition applied");  // Not logged
 * logger.warn("Condition not found");  // [FSM:Ticket] Condition not found
 * ```
 */

import type { Logger, LoggerFactory, LogLevel, UnknownRecord } from "./types.js";
import { DEFAULT_LOG_LEVEL, shouldLog } from "./types.js";

/**
 * Create a scoped logger with level filtering.
 *
 * Messages are written as `[scope] message {json}` through the console method
 * matching their level; empty data is left out. The console is looked up on
 * every call so tests can spy on it after import.
 */
export function createScopedLogger(scope: string, level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  const prefix = `[${scope}]`;

  const format = (message: string, data?: UnknownRecord): string =>
    data && Object.keys(data).length > 0
      ? `${prefix} ${message} ${JSON.stringify(data)}`
      : `${prefix} ${message}`;

  return {
    debug(message, data) {
      if (shouldLog("DEBUG", level)) globalThis.console.debug(format(message, data));
    },
    info(message, data) {
      if (shouldLog("INFO", level)) globalThis.console.info(format(message, data));
    },
    warn(message, data) {
      if (shouldLog("WARN", level)) globalThis.console.warn(format(message, data));
    },
    error(message, data) {
      if (shouldLog("ERROR", level)) globalThis.console.error(format(message, data));
    },
  };
}

/**
 * Scope for one entity under a base scope: `FSM` + `Ticket` gives `FSM:Ticket`.
 * An empty label keeps the base scope.
 */
export function entityScope(baseScope: string, entityLabel: string): string {
  return entityLabel.length > 0 ? `${baseScope}:${entityLabel}` : baseScope;
}

/**
 * Create a factory handing out one scoped logger per entity label.
 * Loggers are cached, so every machine over "Ticket" shares one instance.
 */
export function createEntityLoggerFactory(
  baseScope: string,
  level: LogLevel = DEFAULT_LOG_LEVEL
): LoggerFactory {
  const loggers = new Map<string, Logger>();
  return (entityLabel) => {
    const existing = loggers.get(entityLabel);
    if (existing !== undefined) return existing;
    const logger = createScopedLogger(entityScope(baseScope, entityLabel), level);
    loggers.set(entityLabel, logger);
    return logger;
  };
}

/**
 * Create a logger that discards all messages. Default for builders and machines.
 */
export function createNoOpLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}
