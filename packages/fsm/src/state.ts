import { FSMError, FSM_ERROR_CODES } from "./errors.js";
import type { State, StateSpace } from "./types.js";

/**
 * Create a frozen state value for `name`.
 */
export function createState<TState extends string>(name: TState): State<TState> {
  return Object.freeze({ name });
}

/**
 * States compare by name.
 */
export function sameState(a: State, b: State): boolean {
  return a.name === b.name;
}

/**
 * Type guard for membership in a state space. Case-sensitive.
 */
export function isStateName<TState extends string>(
  space: StateSpace<TState>,
  name: string
): name is TState {
  return space.some((candidate) => candidate === name);
}

/**
 * Map a serialized name onto the state space.
 *
 * @throws FSMError UNKNOWN_STATE_NAME when `name` is not a member of `space`
 */
export function parseStateName<TState extends string>(
  space: StateSpace<TState>,
  name: string
): TState {
  if (!isStateName(space, name)) {
    throw new FSMError(
      FSM_ERROR_CODES.UNKNOWN_STATE_NAME,
      `Unknown state name "${name}". Expected one of: ${space.join(", ")}`,
      { name, stateSpace: [...space] }
    );
  }
  return name;
}
