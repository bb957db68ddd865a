/**
 * ## State Machine - The Runtime Cursor
 *
 * Wraps a shared, immutable {@link FSMDefinition} with a mutable current
 * state. The cursor starts at the definition's initial state and only moves
 * through a successful transition.
 *
 * ### Evaluation Rules
 *
 * - Candidates are the transitions leaving the current state toward the
 *   target, in declaration order; the first whose guard holds wins.
 * - The matched transition's side effect runs with `(context, from, to)`
 *   before the cursor moves. If it throws, the error propagates and the
 *   cursor stays where it was.
 * - Targeting the current state only succeeds through an explicit self
 *   transition.
 * - A null or undefined context throws `NULL_CONTEXT`.
 *
 * Everything runs synchronously on the caller's stack. A machine is not safe
 * for interleaved use from several owners; give each owner its own machine
 * over the shared definition.
 *
 * @example
 * ```typescript
 * const machine = createStateMachine(ticketDefinition);
 * const ticket = { agentAssigned: false };
 *
 * machine.tryTransitionTo("InProgress", ticket); // false, still "Open"
 * ticket.agentAssigned = true;
 * machine.tryTransitionTo("InProgress", ticket); // true
 * machine.current;                                // "InProgress"
 * ```
 */

import {
  logTransitionApplied,
  logTransitionFailed,
  logTransitionRejected,
} from "@waypoint/logging";
import { resolveFSMOptions, type FSMOptions } from "./config.js";
import { FSMTransitionError } from "./errors.js";
import { findTransition, firstEligible, requireContext } from "./operations.js";
import { createState } from "./state.js";
import type { FSMDefinition, State } from "./types.js";

/**
 * A running state machine instance.
 *
 * @typeParam TState - Union type of all valid states
 * @typeParam TContext - Context type passed to guards and side effects
 */
export interface StateMachine<TState extends string, TContext> {
  /**
   * The definition this machine evaluates. Shared, never mutated.
   */
  readonly definition: FSMDefinition<TState, TContext>;

  /**
   * Name of the current state.
   */
  readonly current: TState;

  /**
   * The current state as a {@link State} value.
   */
  readonly currentState: State<TState>;

  /**
   * Check if a transition from the current state to `target` is eligible.
   *
   * @throws FSMError NULL_CONTEXT when `context` is null or undefined
   */
  canTransitionTo(target: TState, context: TContext | null | undefined): boolean;

  /**
   * Take the first eligible transition to `target`, if any.
   *
   * @returns true if the transition was taken
   * @throws FSMError NULL_CONTEXT when `context` is null or undefined
   */
  tryTransitionTo(target: TState, context: TContext | null | undefined): boolean;

  /**
   * Take the first eligible transition to `target`, throwing if there is none.
   *
   * @throws FSMTransitionError when no transition is eligible
   * @throws FSMError NULL_CONTEXT when `context` is null or undefined
   */
  transitionTo(target: TState, context: TContext | null | undefined): void;

  /**
   * Distinct targets reachable from the current state for `context`.
   *
   * @throws FSMError NULL_CONTEXT when `context` is null or undefined
   */
  availableTransitions(context: TContext | null | undefined): readonly TState[];
}

/**
 * Create a machine positioned at the definition's initial state.
 */
export function createStateMachine<TState extends string, TContext>(
  definition: FSMDefinition<TState, TContext>,
  options: FSMOptions = {}
): StateMachine<TState, TContext> {
  const { entityLabel } = definition;
  const logger = resolveFSMOptions(options).loggerFor(entityLabel);
  let current: State<TState> = definition.initialState;

  const tryTransitionTo = (target: TState, context: TContext | null | undefined): boolean => {
    const from = current.name;
    const ctx = requireContext(context, { entityLabel, from, to: target });
    const transition = firstEligible(definition, from, target, ctx);

    if (transition === undefined) {
      logTransitionRejected(
        logger,
        { entityLabel, from, to: target },
        { candidates: definition.transitionsFrom(from).filter((t) => t.to.name === target).length }
      );
      return false;
    }

    if (transition.sideEffect !== undefined) {
      try {
        transition.sideEffect(ctx, from, target);
      } catch (error) {
        logTransitionFailed(logger, { entityLabel, from, to: target }, error);
        throw error;
      }
    }

    current = createState(target);
    logTransitionApplied(
      logger,
      { entityLabel, from, to: target },
      { conditionName: transition.conditionName, sideEffectName: transition.sideEffectName }
    );
    return true;
  };

  return {
    definition,

    get current(): TState {
      return current.name;
    },

    get currentState(): State<TState> {
      return current;
    },

    canTransitionTo(target: TState, context: TContext | null | undefined): boolean {
      return findTransition(definition, current.name, target, context) !== undefined;
    },

    tryTransitionTo,

    transitionTo(target: TState, context: TContext | null | undefined): void {
      if (!tryTransitionTo(target, context)) {
        throw new FSMTransitionError(
          current.name,
          target,
          definition.validTransitions(current.name)
        );
      }
    },

    availableTransitions(context: TContext | null | undefined): readonly TState[] {
      const from = current.name;
      const ctx = requireContext(context, { entityLabel, from, to: "*" });
      return definition
        .validTransitions(from)
        .filter((target) => firstEligible(definition, from, target, ctx) !== undefined);
    },
  };
}
