/**
 * Engine configuration.
 *
 * Builders and machines take an {@link FSMOptions} object. Hosts that keep
 * their settings in plain data (a JSON file, environment-derived objects)
 * validate it with {@link FSMConfigSchema} and turn it into options with
 * {@link loadFSMOptions}.
 *
 * @module config
 */

import { z } from "zod";
import {
  createEntityLoggerFactory,
  createNoOpLogger,
  DEFAULT_LOG_LEVEL,
  LOG_LEVELS,
  type Logger,
  type LoggerFactory,
  type LogLevel,
} from "@waypoint/logging";
import { FSMError, FSM_ERROR_CODES } from "./errors.js";

/**
 * What `loadFrom()` does with a guard or side effect name that the registry
 * does not know.
 *
 * - `lenient`: substitute the always-eligible guard / no-op side effect and
 *   log a warning. Weakens guards silently from the machine's point of view.
 * - `strict`: throw `UNKNOWN_CONDITION` / `UNKNOWN_SIDE_EFFECT`.
 */
export type NameResolutionPolicy = "lenient" | "strict";

/**
 * Options accepted by `FSMBuilder` and `createStateMachine()`.
 */
export interface FSMOptions {
  /**
   * Logger for warnings and transition tracing (default: no-op). A factory
   * is called with the entity label, so each machine can log under its own
   * scope.
   */
  logger?: Logger | LoggerFactory | undefined;
  /** Policy for unresolved names during `loadFrom()` (default: lenient) */
  nameResolution?: NameResolutionPolicy | undefined;
}

/**
 * Options with every default applied.
 */
export interface ResolvedFSMOptions {
  loggerFor: LoggerFactory;
  nameResolution: NameResolutionPolicy;
}

/**
 * Default option values.
 */
export const FSM_DEFAULTS = {
  nameResolution: "lenient",
  logScope: "FSM",
  logLevel: DEFAULT_LOG_LEVEL,
} as const satisfies {
  nameResolution: NameResolutionPolicy;
  logScope: string;
  logLevel: LogLevel;
};

const NameResolutionSchema = z.enum(["lenient", "strict"]);

/**
 * Schema for plain-data engine configuration.
 */
export const FSMConfigSchema = z.object({
  /** Policy for unresolved names during `loadFrom()` */
  nameResolution: NameResolutionSchema.default(FSM_DEFAULTS.nameResolution),
  /** Minimum level for the scoped logger */
  logLevel: z.enum(LOG_LEVELS).default(FSM_DEFAULTS.logLevel),
  /** Base scope; each entity logs under `<logScope>:<entityLabel>` */
  logScope: z.string().min(1).default(FSM_DEFAULTS.logScope),
});

/**
 * Type inferred from FSMConfigSchema (defaults applied).
 */
export type FSMConfig = z.infer<typeof FSMConfigSchema>;

/**
 * Apply defaults to caller options.
 *
 * @throws FSMError INVALID_CONFIGURATION when `nameResolution` is not a known policy
 */
export function resolveFSMOptions(options: FSMOptions = {}): ResolvedFSMOptions {
  const policy = NameResolutionSchema.safeParse(
    options.nameResolution ?? FSM_DEFAULTS.nameResolution
  );
  if (!policy.success) {
    throw new FSMError(
      FSM_ERROR_CODES.INVALID_CONFIGURATION,
      `Unknown name resolution policy "${String(options.nameResolution)}"`,
      { nameResolution: options.nameResolution }
    );
  }

  const { logger } = options;
  let loggerFor: LoggerFactory;
  if (typeof logger === "function") {
    loggerFor = logger;
  } else {
    const fixed = logger ?? createNoOpLogger();
    loggerFor = () => fixed;
  }

  return { loggerFor, nameResolution: policy.data };
}

/**
 * Turn plain-data configuration into options whose logger writes to the
 * console under `<logScope>:<entityLabel>`, e.g. `[FSM:Order]`.
 *
 * @example
 * ```typescript
 * const options = loadFSMOptions(JSON.parse(await readFile("fsm.config.json", "utf8")));
 * const builder = FSMBuilder.create("Order", ORDER_STATES, options);
 * ```
 *
 * @throws FSMError INVALID_CONFIGURATION listing every schema issue
 */
export function loadFSMOptions(raw: unknown): FSMOptions {
  const result = FSMConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    throw new FSMError(
      FSM_ERROR_CODES.INVALID_CONFIGURATION,
      `Invalid engine configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`,
      { issues }
    );
  }

  const config = result.data;
  return {
    logger: createEntityLoggerFactory(config.logScope, config.logLevel),
    nameResolution: config.nameResolution,
  };
}
