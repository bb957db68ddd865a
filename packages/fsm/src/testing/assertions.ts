/**
 * FSM Assertion Helpers
 *
 * Assertion functions for state machine behavior in unit and BDD tests.
 * These use vitest's expect() for consistent test output formatting.
 *
 * @module @waypoint/fsm/testing
 */

import { expect } from "vitest";
import { FSMBuilder } from "../builder.js";
import { toDefinitionShape } from "../operations.js";
import type { TransitionRegistry } from "../registry.js";
import type { StateMachine } from "../machine.js";
import type { FSMDefinition } from "../types.js";

/**
 * Assert that the machine can move to `target` for `context`.
 *
 * @example
 * ```typescript
 * assertCanTransition(machine, "InProgress", { agentAssigned: true });
 * ```
 */
export function assertCanTransition<TState extends string, TContext>(
  machine: StateMachine<TState, TContext>,
  target: TState,
  context: TContext
): void {
  expect(machine.canTransitionTo(target, context)).toBe(true);
}

/**
 * Assert that the machine can NOT move to `target` for `context`.
 */
export function assertCannotTransition<TState extends string, TContext>(
  machine: StateMachine<TState, TContext>,
  target: TState,
  context: TContext
): void {
  expect(machine.canTransitionTo(target, context)).toBe(false);
}

/**
 * Assert the machine's current state.
 */
export function assertCurrentState<TState extends string, TContext>(
  machine: StateMachine<TState, TContext>,
  expected: TState
): void {
  expect(machine.current).toBe(expected);
}

/**
 * Assert that a state has no outgoing transitions.
 *
 * @example
 * ```typescript
 * assertIsTerminalState(orderDefinition, "Returned");
 * ```
 */
export function assertIsTerminalState<TState extends string, TContext>(
  definition: FSMDefinition<TState, TContext>,
  state: TState
): void {
  expect(definition.isTerminal(state)).toBe(true);
}

/**
 * Assert that a state has outgoing transitions.
 */
export function assertIsNotTerminalState<TState extends string, TContext>(
  definition: FSMDefinition<TState, TContext>,
  state: TState
): void {
  expect(definition.isTerminal(state)).toBe(false);
}

/**
 * Assert the definition's initial state, and that it is one of its states.
 */
export function assertIsInitialState<TState extends string, TContext>(
  definition: FSMDefinition<TState, TContext>,
  state: TState
): void {
  expect(definition.initialState.name).toBe(state);
  expect(definition.hasState(state)).toBe(true);
}

/**
 * Assert the distinct targets declared from `from` (order-insensitive).
 *
 * @example
 * ```typescript
 * assertValidTransitionsFrom(orderDefinition, "Created", ["Paid", "Cancelled"]);
 * ```
 */
export function assertValidTransitionsFrom<TState extends string, TContext>(
  definition: FSMDefinition<TState, TContext>,
  from: TState,
  expectedTargets: TState[]
): void {
  const actualTargets = definition.validTransitions(from);
  expect([...actualTargets].sort()).toEqual([...expectedTargets].sort());
}

/**
 * Assert that serializing the builder and loading the result against
 * `registry` yields a definition with the same shape as `builder.build()`.
 *
 * The DTO is loaded into a fresh builder; `builder` keeps its states and
 * transitions.
 */
export function assertRoundTrip<TState extends string, TContext>(
  builder: FSMBuilder<TState, TContext>,
  stateSpace: readonly TState[],
  registry: TransitionRegistry<TState, TContext>
): void {
  const reloaded = FSMBuilder.fromSerializable(
    builder.toSerializable(),
    stateSpace,
    registry
  ).build();
  expect(toDefinitionShape(reloaded)).toEqual(toDefinitionShape(builder.build()));
}

/**
 * Get every declared transition as a `[from, to]` pair, in declaration order.
 *
 * @example
 * ```typescript
 * getAllTransitions(ticketDefinition);
 * // [["Open", "InProgress"], ["InProgress", "Resolved"]]
 * ```
 */
export function getAllTransitions<TState extends string, TContext>(
  definition: FSMDefinition<TState, TContext>
): Array<[TState, TState]> {
  return definition.transitions.map((t): [TState, TState] => [t.from.name, t.to.name]);
}

/**
 * Get all states of the definition, in insertion order.
 */
export function getAllStates<TState extends string, TContext>(
  definition: FSMDefinition<TState, TContext>
): TState[] {
  return definition.states.map((state) => state.name);
}

/**
 * Get all terminal states of the definition.
 */
export function getTerminalStates<TState extends string, TContext>(
  definition: FSMDefinition<TState, TContext>
): TState[] {
  return getAllStates(definition).filter((state) => definition.isTerminal(state));
}

/**
 * Get all non-terminal states of the definition.
 */
export function getNonTerminalStates<TState extends string, TContext>(
  definition: FSMDefinition<TState, TContext>
): TState[] {
  return getAllStates(definition).filter((state) => !definition.isTerminal(state));
}
