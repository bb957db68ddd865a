/**
 * Logging Types
 *
 * Log levels (most to least verbose):
 * - DEBUG: Applied and rejected transitions, definitions built
 * - INFO: Host-level messages; the engine itself does not log at INFO
 * - WARN: Guard or side effect names replaced by fallbacks on load
 * - ERROR: Side effects that threw
 */

/**
 * Alias for Record<string, unknown>.
 *
 * Used for structured log data and error context.
 */
export type UnknownRecord = Record<string, unknown>;

/**
 * Every log level, ordered from most to least verbose.
 */
export const LOG_LEVELS = ["DEBUG", "INFO", "WARN", "ERROR"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Default log level. Keeps per-transition DEBUG output out of production logs.
 */
export const DEFAULT_LOG_LEVEL: LogLevel = "INFO";

/**
 * Logger interface.
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("FSM:Ticket", "DEBUG");
 *
 * logger.debug("Transition applied", { from: "Open", to: "InProgress" });
 * logger.warn("Condition not found in registry", { conditionName: "agentAssigned" });
 * ```
 */
export interface Logger {
  debug(message: string, data?: UnknownRecord): void;
  info(message: string, data?: UnknownRecord): void;
  warn(message: string, data?: UnknownRecord): void;
  error(message: string, data?: UnknownRecord): void;
}

/**
 * Produces the logger for one entity label, e.g. "Ticket" or "Order".
 */
export type LoggerFactory = (entityLabel: string) => Logger;

/**
 * Check if a message at the given level should be logged.
 *
 * @example
 * ```typescript
 * shouldLog("DEBUG", "INFO"); // false
 * shouldLog("WARN", "INFO");  // true
 * ```
 */
export function shouldLog(messageLevel: LogLevel, configuredLevel: LogLevel): boolean {
  return LOG_LEVELS.indexOf(messageLevel) >= LOG_LEVELS.indexOf(configuredLevel);
}
