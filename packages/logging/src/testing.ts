/**
 * Mock logger that records calls for assertions.
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * FSMBuilder.create("Ticket", TICKET_STATES, { logger }).loadFrom(dto, registry);
 *
 * expect(logger.hasLoggedAt("WARN", "Condition not found in registry")).toBe(true);
 * ```
 */

import type { Logger, LogLevel, UnknownRecord } from "./types.js";

export interface LogCall {
  level: LogLevel;
  message: string;
  /** Undefined when the call passed no data */
  data: UnknownRecord | undefined;
}

export interface MockLogger extends Logger {
  readonly calls: ReadonlyArray<LogCall>;
  clear(): void;
  getCallsAtLevel(level: LogLevel): ReadonlyArray<LogCall>;
  getLastCallAt(level: LogLevel): LogCall | undefined;
  /** Partial match on the message */
  hasLoggedAt(level: LogLevel, message: string): boolean;
}

export function createMockLogger(): MockLogger {
  const calls: LogCall[] = [];
  const atLevel = (level: LogLevel) => calls.filter((call) => call.level === level);
  const record =
    (level: LogLevel) =>
    (message: string, data?: UnknownRecord): void => {
      calls.push({ level, message, data });
    };

  return {
    get calls(): ReadonlyArray<LogCall> {
      return calls;
    },
    clear() {
      calls.length = 0;
    },
    getCallsAtLevel: atLevel,
    getLastCallAt(level) {
      const matching = atLevel(level);
      return matching[matching.length - 1];
    },
    hasLoggedAt(level, message) {
      return atLevel(level).some((call) => call.message.includes(message));
    },
    debug: record("DEBUG"),
    info: record("INFO"),
    warn: record("WARN"),
    error: record("ERROR"),
  };
}
