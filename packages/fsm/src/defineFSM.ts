/**
 * ## defineFSM - Validated State Machine Definitions
 *
 * Freezes a list of states, an ordered list of transitions and an initial
 * state into an immutable {@link FSMDefinition}, with pre-computed lookup
 * tables for state membership and outgoing transitions.
 *
 * ### When to Use
 *
 * - Assembling a definition from an externally supplied transition list
 * - Anywhere `FSMBuilder` is too much ceremony
 *
 * `FSMBuilder.build()` goes through here as well, so builder-made and
 * hand-made definitions obey the same invariants.
 *
 * ### Structural Integrity
 *
 * | Check | Error code |
 * |-------|------------|
 * | State listed twice | `STRUCTURAL_INTEGRITY` |
 * | Initial state not in states | `STRUCTURAL_INTEGRITY` |
 * | Transition endpoint not in states | `STRUCTURAL_INTEGRITY` |
 *
 * @example
 * ```typescript
 * const definition = defineFSM<TicketState, TicketContext>({
 *   entityLabel: "Ticket",
 *   states: ["Open", "InProgress", "Resolved"],
 *   initialState: "Open",
 *   transitions: [
 *     createTransition("Open", "InProgress", { condition: (ctx) => ctx.agentAssigned }),
 *     createTransition("InProgress", "Resolved"),
 *   ],
 * });
 *
 * definition.validTransitions("Open"); // ["InProgress"]
 * definition.isTerminal("Resolved");   // true
 * ```
 */

import { FSMError, FSM_ERROR_CODES } from "./errors.js";
import { createState } from "./state.js";
import type {
  Condition,
  FSMDefinition,
  FSMDefinitionInput,
  SideEffect,
  Transition,
} from "./types.js";
import { ALWAYS } from "./types.js";

/**
 * Optional parts of a transition.
 */
export interface TransitionParts<TState extends string, TContext> {
  condition?: Condition<TContext> | undefined;
  sideEffect?: SideEffect<TState, TContext> | undefined;
  conditionName?: string | undefined;
  sideEffectName?: string | undefined;
}

/**
 * Create a frozen transition. A missing guard becomes {@link ALWAYS}.
 */
export function createTransition<TState extends string, TContext>(
  from: TState,
  to: TState,
  parts: TransitionParts<TState, TContext> = {}
): Transition<TState, TContext> {
  const transition: Transition<TState, TContext> = {
    from: createState(from),
    to: createState(to),
    condition: parts.condition ?? ALWAYS,
    ...(parts.sideEffect !== undefined && { sideEffect: parts.sideEffect }),
    ...(parts.conditionName !== undefined && { conditionName: parts.conditionName }),
    ...(parts.sideEffectName !== undefined && { sideEffectName: parts.sideEffectName }),
  };
  return Object.freeze(transition);
}

/**
 * Create an immutable definition, validating its structure.
 *
 * @typeParam TState - Union type of all valid states
 * @typeParam TContext - Context type passed to guards and side effects
 * @throws FSMError STRUCTURAL_INTEGRITY when a state is duplicated, or the
 *   initial state or a transition endpoint is not among `states`
 */
export function defineFSM<TState extends string, TContext>(
  input: FSMDefinitionInput<TState, TContext>
): FSMDefinition<TState, TContext> {
  const { entityLabel } = input;

  // Pre-compute valid states for O(1) lookup
  const stateNames = new Set<string>();
  for (const name of input.states) {
    if (stateNames.has(name)) {
      throw new FSMError(
        FSM_ERROR_CODES.STRUCTURAL_INTEGRITY,
        `State "${name}" is listed more than once in "${entityLabel}"`,
        { entityLabel, state: name }
      );
    }
    stateNames.add(name);
  }

  const hasState = (name: string): name is TState => stateNames.has(name);

  if (!hasState(input.initialState)) {
    throw new FSMError(
      FSM_ERROR_CODES.STRUCTURAL_INTEGRITY,
      `Initial state "${input.initialState}" is not a state of "${entityLabel}"`,
      { entityLabel, initialState: input.initialState }
    );
  }

  const transitions: Transition<TState, TContext>[] = [];
  const outgoing = new Map<string, Transition<TState, TContext>[]>();

  for (const transition of input.transitions) {
    for (const endpoint of [transition.from.name, transition.to.name]) {
      if (!hasState(endpoint)) {
        throw new FSMError(
          FSM_ERROR_CODES.STRUCTURAL_INTEGRITY,
          `Transition ${transition.from.name} -> ${transition.to.name} references "${endpoint}", which is not a state of "${entityLabel}"`,
          { entityLabel, from: transition.from.name, to: transition.to.name, missing: endpoint }
        );
      }
    }

    const frozen = createTransition<TState, TContext>(transition.from.name, transition.to.name, {
      condition: transition.condition,
      sideEffect: transition.sideEffect,
      conditionName: transition.conditionName,
      sideEffectName: transition.sideEffectName,
    });
    transitions.push(frozen);

    const bucket = outgoing.get(frozen.from.name) ?? [];
    bucket.push(frozen);
    outgoing.set(frozen.from.name, bucket);
  }

  const states = Object.freeze([...stateNames].filter(hasState).map((name) => createState(name)));

  const transitionsFrom = (from: TState): readonly Transition<TState, TContext>[] =>
    outgoing.get(from) ?? [];

  const definition: FSMDefinition<TState, TContext> = {
    entityLabel,
    states,
    transitions: Object.freeze(transitions),
    initialState: createState(input.initialState),

    hasState,

    transitionsFrom,

    validTransitions(from: TState): readonly TState[] {
      const targets: TState[] = [];
      for (const transition of transitionsFrom(from)) {
        if (!targets.includes(transition.to.name)) {
          targets.push(transition.to.name);
        }
      }
      return targets;
    },

    isTerminal(state: TState): boolean {
      return transitionsFrom(state).length === 0;
    },
  };

  return Object.freeze(definition);
}
