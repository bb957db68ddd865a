/**
 * Logging Module
 *
 * Level-filtered scoped loggers for state machine builders and machines.
 *
 * @example
 * ```typescript
 * import { createEntityLoggerFactory, createNoOpLogger } from "@waypoint/logging";
 *
 * const loggerFor = createEntityLoggerFactory("FSM", "WARN");
 * const ticketLogger = loggerFor("Ticket"); // writes "[FSM:Ticket] ..."
 * const silentLogger = createNoOpLogger();
 * ```
 *
 * @module @waypoint/logging
 */

// Types
export type { Logger, LoggerFactory, LogLevel, UnknownRecord } from "./types.js";
export { LOG_LEVELS, DEFAULT_LOG_LEVEL, shouldLog } from "./types.js";

// Factories
export {
  createScopedLogger,
  createEntityLoggerFactory,
  createNoOpLogger,
  entityScope,
} from "./scoped.js";

// Testing utilities
export type { LogCall, MockLogger } from "./testing.js";
export { createMockLogger } from "./testing.js";

// Transition logging helpers
export type { BaseTransitionLogContext } from "./transitions.js";
export {
  logTransitionApplied,
  logTransitionRejected,
  logTransitionFailed,
  logNameResolutionFallback,
} from "./transitions.js";
