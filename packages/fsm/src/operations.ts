/**
 * ## FSM Operations - Functional Evaluation
 *
 * Standalone functions over an {@link FSMDefinition}. The state machine
 * cursor is built on these; they are exported for callers that keep the
 * current state themselves (e.g. in a database column) and only need the
 * rules.
 *
 * ### Available Operations
 *
 * | Function | Returns | Purpose |
 * |----------|---------|---------|
 * | `findTransition(def, from, to, ctx)` | `Transition \| undefined` | First eligible transition |
 * | `canTransition(def, from, to, ctx)` | `boolean` | Check if eligible |
 * | `validTransitions(def, from)` | `TState[]` | Targets, ignoring guards |
 * | `isTerminal(def, state)` | `boolean` | No outgoing transitions |
 * | `isValidState(def, name)` | `boolean` | Type guard |
 * | `toDefinitionShape(def)` | `DefinitionShape` | Comparable projection |
 *
 * @example
 * ```typescript
 * import { canTransition } from "@waypoint/fsm";
 *
 * if (canTransition(ticketDefinition, ticket.status, "InProgress", ticket)) {
 *   // proceed
 * }
 * ```
 */

import { FSMError, FSM_ERROR_CODES } from "./errors.js";
import type { DefinitionShape, FSMDefinition, Transition } from "./types.js";

/**
 * Narrow a context to non-null.
 *
 * @throws FSMError NULL_CONTEXT when `context` is null or undefined
 */
export function requireContext<TContext>(
  context: TContext | null | undefined,
  detail: { entityLabel: string; from: string; to: string }
): TContext {
  if (context === null || context === undefined) {
    throw new FSMError(
      FSM_ERROR_CODES.NULL_CONTEXT,
      `Cannot evaluate ${detail.from} -> ${detail.to} for "${detail.entityLabel}" without a context`,
      { ...detail }
    );
  }
  return context;
}

/**
 * Find the first transition, in declaration order, from `from` to `to`
 * whose guard holds for `context`.
 *
 * @throws FSMError NULL_CONTEXT when `context` is null or undefined
 */
export function findTransition<TState extends string, TContext>(
  definition: FSMDefinition<TState, TContext>,
  from: TState,
  to: TState,
  context: TContext | null | undefined
): Transition<TState, TContext> | undefined {
  const ctx = requireContext(context, { entityLabel: definition.entityLabel, from, to });
  return firstEligible(definition, from, to, ctx);
}

/**
 * {@link findTransition} for a context already checked with {@link requireContext}.
 */
export function firstEligible<TState extends string, TContext>(
  definition: FSMDefinition<TState, TContext>,
  from: TState,
  to: TState,
  context: TContext
): Transition<TState, TContext> | undefined {
  return definition
    .transitionsFrom(from)
    .find((transition) => transition.to.name === to && transition.condition(context));
}

/**
 * Check if some transition from `from` to `to` is eligible for `context`.
 *
 * @throws FSMError NULL_CONTEXT when `context` is null or undefined
 */
export function canTransition<TState extends string, TContext>(
  definition: FSMDefinition<TState, TContext>,
  from: TState,
  to: TState,
  context: TContext | null | undefined
): boolean {
  return findTransition(definition, from, to, context) !== undefined;
}

/**
 * Get every target state declared from `from`, ignoring guards.
 */
export function validTransitions<TState extends string, TContext>(
  definition: FSMDefinition<TState, TContext>,
  from: TState
): readonly TState[] {
  return definition.validTransitions(from);
}

/**
 * Check if a state is terminal (no outgoing transitions).
 */
export function isTerminal<TState extends string, TContext>(
  definition: FSMDefinition<TState, TContext>,
  state: TState
): boolean {
  return definition.isTerminal(state);
}

/**
 * Check if a state name belongs to the definition.
 */
export function isValidState<TState extends string, TContext>(
  definition: FSMDefinition<TState, TContext>,
  state: string
): state is TState {
  return definition.hasState(state);
}

/**
 * Project a definition onto plain data: entity label, initial state, state
 * names and the ordered `(from, to, conditionName, sideEffectName)` list.
 *
 * Two definitions with equal shapes behave identically for every guard and
 * side effect name they resolve the same way.
 */
export function toDefinitionShape<TState extends string, TContext>(
  definition: FSMDefinition<TState, TContext>
): DefinitionShape {
  return {
    entityLabel: definition.entityLabel,
    initialState: definition.initialState.name,
    states: definition.states.map((state) => state.name),
    transitions: definition.transitions.map((t) => ({
      from: t.from.name,
      to: t.to.name,
      conditionName: t.conditionName,
      sideEffectName: t.sideEffectName,
    })),
  };
}
