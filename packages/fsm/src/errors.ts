import type { UnknownRecord } from "@waypoint/logging";

/**
 * Error codes raised by the engine.
 *
 * Configuration and decode errors indicate a programming mistake in the
 * embedding application and are always thrown, never recovered.
 */
export const FSM_ERROR_CODES = {
  /** Builder misuse: absent registry, name-only call without registry, invalid options */
  INVALID_CONFIGURATION: "INVALID_CONFIGURATION",
  /** Condition name not registered */
  UNKNOWN_CONDITION: "UNKNOWN_CONDITION",
  /** Side effect name not registered */
  UNKNOWN_SIDE_EFFECT: "UNKNOWN_SIDE_EFFECT",
  /** build() or toSerializable() before withInitialState() */
  MISSING_INITIAL_STATE: "MISSING_INITIAL_STATE",
  /** Serialized state name outside the state space */
  UNKNOWN_STATE_NAME: "UNKNOWN_STATE_NAME",
  /** Transition evaluated against a null or undefined context */
  NULL_CONTEXT: "NULL_CONTEXT",
  /** Initial state or transition endpoint missing from the state list */
  STRUCTURAL_INTEGRITY: "STRUCTURAL_INTEGRITY",
  /** Serialized definition does not have the DTO shape */
  INVALID_DTO: "INVALID_DTO",
} as const;

export type FSMErrorCode = (typeof FSM_ERROR_CODES)[keyof typeof FSM_ERROR_CODES];

/**
 * Error thrown for engine misuse.
 *
 * @example
 * ```typescript
 * try {
 *   builder.build();
 * } catch (error) {
 *   if (isFSMError(error, FSM_ERROR_CODES.MISSING_INITIAL_STATE)) {
 *     // ...
 *   }
 * }
 * ```
 */
export class FSMError<TCode extends FSMErrorCode = FSMErrorCode> extends Error {
  /**
   * Error code for programmatic handling.
   */
  public readonly code: TCode;

  /**
   * Additional context for debugging (entity label, names involved, ...).
   */
  public readonly context?: UnknownRecord;

  constructor(code: TCode, message: string, context?: UnknownRecord) {
    super(message);
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    this.name = "FSMError";
    Object.setPrototypeOf(this, FSMError.prototype);
  }
}

/**
 * Type guard for {@link FSMError}, optionally narrowed to one code.
 */
export function isFSMError<TCode extends FSMErrorCode>(
  error: unknown,
  code?: TCode
): error is FSMError<TCode> {
  if (!(error instanceof FSMError)) return false;
  return code === undefined || error.code === code;
}

/**
 * Error thrown when `transitionTo()` finds no eligible transition.
 */
export class FSMTransitionError extends Error {
  readonly code = "FSM_INVALID_TRANSITION";
  readonly from: string;
  readonly to: string;
  readonly validTransitions: readonly string[];

  constructor(from: string, to: string, validTransitions: readonly string[]) {
    const validList =
      validTransitions.length > 0 ? validTransitions.join(", ") : "(none - terminal state)";
    super(`Invalid transition from "${from}" to "${to}". Valid transitions: ${validList}`);
    this.name = "FSMTransitionError";
    this.from = from;
    this.to = to;
    this.validTransitions = validTransitions;
    Object.setPrototypeOf(this, FSMTransitionError.prototype);
  }
}
