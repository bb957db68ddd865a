/**
 * ## FSM Types - States, Transitions, Definitions
 *
 * A state machine is a fixed set of named states, an ordered list of
 * guarded, side-effecting transitions between them, and an initial state.
 * Transitions are evaluated against a caller-owned, mutable context object.
 *
 * ### Core Types
 *
 * | Type | Purpose |
 * |------|---------|
 * | `State<TState>` | Named, immutable point in the state space |
 * | `Transition<TState, TContext>` | Edge with optional guard and side effect |
 * | `FSMDefinition<TState, TContext>` | Frozen states + transitions + initial state |
 * | `StateSpace<TState>` | Runtime list of every valid state name |
 *
 * @example
 * ```typescript
 * const TICKET_STATES = ["Open", "InProgress", "Resolved"] as const;
 * type TicketState = (typeof TICKET_STATES)[number];
 *
 * interface TicketContext {
 *   agentAssigned: boolean;
 * }
 *
 * const definition: FSMDefinition<TicketState, TicketContext> = FSMBuilder
 *   .create<TicketState, TicketContext>("Ticket", TICKET_STATES)
 *   .withInitialState("Open")
 *   .addTransition("Open", "InProgress")
 *   .when((ctx) => ctx.agentAssigned, "agentAssigned")
 *   .done()
 *   .build();
 * ```
 */

/**
 * Runtime list of every valid state name.
 *
 * TypeScript string unions have no runtime presence, so anything that parses
 * names (DTO loading, `isValidState`) needs the enumerated values. Declare the
 * list `as const` and derive the union from it.
 */
export type StateSpace<TState extends string> = readonly TState[];

/**
 * A named state. Two states are equal iff their names are equal.
 */
export interface State<TState extends string = string> {
  readonly name: TState;
}

/**
 * Guard predicate. Must not mutate the context.
 */
export type Condition<TContext> = (context: TContext) => boolean;

/**
 * Action invoked when a transition is taken, before the cursor moves.
 */
export type SideEffect<TState extends string, TContext> = (
  context: TContext,
  from: TState,
  to: TState
) => void;

/**
 * A directed edge between two states.
 *
 * When `conditionName` is set, `condition` is whatever the registry held
 * under that name when the transition was created, or {@link ALWAYS} when
 * lenient name resolution found nothing.
 */
export interface Transition<TState extends string, TContext> {
  readonly from: State<TState>;
  readonly to: State<TState>;
  readonly condition: Condition<TContext>;
  readonly sideEffect?: SideEffect<TState, TContext> | undefined;
  readonly conditionName?: string | undefined;
  readonly sideEffectName?: string | undefined;
}

/**
 * Guard used by transitions that declare none.
 */
export const ALWAYS: Condition<unknown> = () => true;

/**
 * Immutable state machine definition.
 *
 * Created by `defineFSM()` or `FSMBuilder.build()`. Safe to share read-only
 * between any number of machines.
 *
 * @typeParam TState - Union type of all valid states
 * @typeParam TContext - Context object the guards and side effects receive
 */
export interface FSMDefinition<TState extends string, TContext> {
  /**
   * Label of the entity whose lifecycle this machine models (e.g. "Ticket").
   */
  readonly entityLabel: string;

  /**
   * Every state, unique, in insertion order.
   */
  readonly states: readonly State<TState>[];

  /**
   * Every transition, in declaration order. Declaration order breaks ties
   * between transitions sharing the same `(from, to)` pair.
   */
  readonly transitions: readonly Transition<TState, TContext>[];

  /**
   * State a new machine starts in.
   */
  readonly initialState: State<TState>;

  /**
   * Check if a state name belongs to this definition.
   */
  hasState(name: string): name is TState;

  /**
   * Transitions leaving `from`, in declaration order.
   */
  transitionsFrom(from: TState): readonly Transition<TState, TContext>[];

  /**
   * Distinct target states reachable from `from`, ignoring guards.
   */
  validTransitions(from: TState): readonly TState[];

  /**
   * Check if a state has no outgoing transitions.
   */
  isTerminal(state: TState): boolean;
}

/**
 * Input accepted by `defineFSM()`.
 */
export interface FSMDefinitionInput<TState extends string, TContext> {
  entityLabel: string;
  states: Iterable<TState>;
  transitions: Iterable<Transition<TState, TContext>>;
  initialState: TState;
}

/**
 * Registry-independent projection of a definition used to compare behavior,
 * e.g. before and after a serialization round trip.
 */
export interface DefinitionShape {
  entityLabel: string;
  initialState: string;
  states: string[];
  transitions: Array<{
    from: string;
    to: string;
    conditionName: string | undefined;
    sideEffectName: string | undefined;
  }>;
}
