/**
 * ## FSMBuilder - Fluent Definition Assembly
 *
 * Accumulates states and transitions, then freezes them into an
 * {@link FSMDefinition}. Also converts to and from the serializable
 * {@link DefinitionDto}, resolving guard and side effect names through a
 * {@link TransitionRegistry}.
 *
 * ### Phases
 *
 * | Phase | Entered by | Notes |
 * |-------|------------|-------|
 * | `configuring` | `create()`, any mutation | States and transitions can be added |
 * | `built` | `build()` | Further mutation returns to `configuring` |
 *
 * Every `build()` returns an independent snapshot; definitions already built
 * never see later changes.
 *
 * ### Name Resolution
 *
 * | Call | Unknown name |
 * |------|--------------|
 * | `when(name)` / `withSideEffect(name)` | Always throws `UNKNOWN_CONDITION` / `UNKNOWN_SIDE_EFFECT` |
 * | `loadFrom(dto, registry)`, lenient | Always-eligible guard / no-op, WARN logged |
 * | `loadFrom(dto, registry)`, strict | Throws `UNKNOWN_CONDITION` / `UNKNOWN_SIDE_EFFECT` |
 *
 * @example
 * ```typescript
 * const ORDER_STATES = ["Created", "Paid", "Shipped", "Cancelled"] as const;
 * type OrderState = (typeof ORDER_STATES)[number];
 *
 * const builder = FSMBuilder.create<OrderState, OrderContext>("Order", ORDER_STATES)
 *   .withRegistry(registry)
 *   .withInitialState("Created")
 *   .addTransition("Created", "Paid")
 *   .when("paymentReceived")
 *   .done()
 *   .addTransition("Paid", "Shipped")
 *   .when((ctx) => ctx.packed, "packed")
 *   .withSideEffect("notifyShipment")
 *   .done();
 *
 * const definition = builder.build();
 * const dto = builder.toSerializable(); // names only, ready to encode
 * ```
 */

import { logNameResolutionFallback } from "@waypoint/logging";
import { resolveFSMOptions, type FSMOptions, type ResolvedFSMOptions } from "./config.js";
import { createTransition, defineFSM } from "./defineFSM.js";
import { parseDefinitionDto, toTransitionDto, type DefinitionDto } from "./dto.js";
import { FSMError, FSM_ERROR_CODES } from "./errors.js";
import type { TransitionRegistry } from "./registry.js";
import { parseStateName } from "./state.js";
import type {
  Condition,
  FSMDefinition,
  SideEffect,
  StateSpace,
  Transition,
} from "./types.js";

/**
 * Builder phase.
 */
export type BuilderPhase = "configuring" | "built";

/**
 * A guard or side effect name looked up while loading a DTO.
 */
interface NameLookup<TState extends string> {
  kind: "condition" | "sideEffect";
  name: string | undefined;
  entityLabel: string;
  from: TState;
  to: TState;
}

/**
 * An unresolved name, logged once the load has been applied.
 */
type NameFallback<TState extends string> = NameLookup<TState> & { name: string };

/**
 * What a {@link TransitionBuilder} needs from its parent.
 */
interface TransitionScope<TState extends string, TContext> {
  parent: FSMBuilder<TState, TContext>;
  from: TState;
  to: TState;
  getRegistry(): TransitionRegistry<TState, TContext> | undefined;
  append(transition: Transition<TState, TContext>): void;
}

/**
 * Builder for a single transition, scoped to one `(from, to)` pair.
 *
 * Obtained from {@link FSMBuilder.addTransition}; `done()` appends the
 * transition to the parent and hands the parent back. A transition builder
 * that is never finalized adds nothing.
 */
export class TransitionBuilder<TState extends string, TContext> {
  private condition: Condition<TContext> | undefined;
  private conditionName: string | undefined;
  private sideEffect: SideEffect<TState, TContext> | undefined;
  private sideEffectName: string | undefined;
  private finalized = false;

  constructor(private readonly scope: TransitionScope<TState, TContext>) {}

  /**
   * Guard the transition with a registered condition.
   *
   * @throws FSMError INVALID_CONFIGURATION when the parent has no registry
   * @throws FSMError UNKNOWN_CONDITION when `name` is not registered
   */
  when(name: string): this;
  /**
   * Guard the transition with a predicate. `name` is what `toSerializable()`
   * writes; leave it out for guards that need not survive serialization.
   */
  when(condition: Condition<TContext>, name?: string): this;
  when(conditionOrName: Condition<TContext> | string, name?: string): this {
    this.assertOpen();
    if (typeof conditionOrName === "string") {
      const registry = this.requireRegistry("when");
      const condition = registry.getCondition(conditionOrName);
      if (condition === undefined) {
        throw new FSMError(
          FSM_ERROR_CODES.UNKNOWN_CONDITION,
          `Condition "${conditionOrName}" not found in registry`,
          { conditionName: conditionOrName, from: this.scope.from, to: this.scope.to }
        );
      }
      this.condition = condition;
      this.conditionName = conditionOrName;
    } else {
      this.condition = conditionOrName;
      this.conditionName = name;
    }
    return this;
  }

  /**
   * Run a registered side effect when the transition is taken.
   *
   * @throws FSMError INVALID_CONFIGURATION when the parent has no registry
   * @throws FSMError UNKNOWN_SIDE_EFFECT when `name` is not registered
   */
  withSideEffect(name: string): this;
  /**
   * Run `effect` when the transition is taken, before the cursor moves.
   */
  withSideEffect(effect: SideEffect<TState, TContext>, name?: string): this;
  withSideEffect(effectOrName: SideEffect<TState, TContext> | string, name?: string): this {
    this.assertOpen();
    if (typeof effectOrName === "string") {
      const registry = this.requireRegistry("withSideEffect");
      const sideEffect = registry.getSideEffect(effectOrName);
      if (sideEffect === undefined) {
        throw new FSMError(
          FSM_ERROR_CODES.UNKNOWN_SIDE_EFFECT,
          `Side effect "${effectOrName}" not found in registry`,
          { sideEffectName: effectOrName, from: this.scope.from, to: this.scope.to }
        );
      }
      this.sideEffect = sideEffect;
      this.sideEffectName = effectOrName;
    } else {
      this.sideEffect = effectOrName;
      this.sideEffectName = name;
    }
    return this;
  }

  /**
   * Append the transition to the parent builder and return the parent.
   *
   * @throws FSMError INVALID_CONFIGURATION when called twice
   */
  done(): FSMBuilder<TState, TContext> {
    this.assertOpen();
    this.finalized = true;
    this.scope.append(
      createTransition(this.scope.from, this.scope.to, {
        condition: this.condition,
        sideEffect: this.sideEffect,
        conditionName: this.conditionName,
        sideEffectName: this.sideEffectName,
      })
    );
    return this.scope.parent;
  }

  private requireRegistry(method: string): TransitionRegistry<TState, TContext> {
    const registry = this.scope.getRegistry();
    if (registry === undefined) {
      throw new FSMError(
        FSM_ERROR_CODES.INVALID_CONFIGURATION,
        `Transition registry is not set. Call withRegistry() before ${method}(name).`,
        { from: this.scope.from, to: this.scope.to }
      );
    }
    return registry;
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new FSMError(
        FSM_ERROR_CODES.INVALID_CONFIGURATION,
        `Transition ${this.scope.from} -> ${this.scope.to} is already finalized`,
        { from: this.scope.from, to: this.scope.to }
      );
    }
  }
}

/**
 * Fluent builder for {@link FSMDefinition}s.
 *
 * @typeParam TState - Union type of all valid states
 * @typeParam TContext - Context type passed to guards and side effects
 */
export class FSMBuilder<TState extends string, TContext> {
  private entityLabel: string;
  private initial: TState | undefined;
  private registry: TransitionRegistry<TState, TContext> | undefined;
  private readonly states = new Set<TState>();
  private readonly transitions: Transition<TState, TContext>[] = [];
  private currentPhase: BuilderPhase = "configuring";
  private readonly options: ResolvedFSMOptions;

  private constructor(
    entityLabel: string,
    private readonly stateSpace: StateSpace<TState>,
    options: FSMOptions
  ) {
    this.entityLabel = entityLabel;
    this.options = resolveFSMOptions(options);
  }

  /**
   * Start a builder for `entityLabel`. No states are added yet.
   *
   * @param stateSpace - Every valid state name; used to parse serialized names
   */
  static create<TState extends string, TContext>(
    entityLabel: string,
    stateSpace: StateSpace<TState>,
    options: FSMOptions = {}
  ): FSMBuilder<TState, TContext> {
    return new FSMBuilder<TState, TContext>(entityLabel, stateSpace, options);
  }

  /**
   * Start a builder from a serialized definition.
   *
   * Shorthand for `create(dto.entityLabel, stateSpace, options).loadFrom(dto, registry)`.
   */
  static fromSerializable<TState extends string, TContext>(
    dto: DefinitionDto,
    stateSpace: StateSpace<TState>,
    registry: TransitionRegistry<TState, TContext>,
    options: FSMOptions = {}
  ): FSMBuilder<TState, TContext> {
    return FSMBuilder.create<TState, TContext>(dto.entityLabel, stateSpace, options).loadFrom(
      dto,
      registry
    );
  }

  get phase(): BuilderPhase {
    return this.currentPhase;
  }

  get label(): string {
    return this.entityLabel;
  }

  /**
   * Set the initial state, adding it to the state set.
   */
  withInitialState(state: TState): this {
    const initial = parseStateName(this.stateSpace, state);
    this.touch();
    this.initial = initial;
    this.states.add(initial);
    return this;
  }

  /**
   * Set the registry used by `when(name)` and `withSideEffect(name)`.
   *
   * @throws FSMError INVALID_CONFIGURATION when `registry` is null or undefined
   */
  withRegistry(registry: TransitionRegistry<TState, TContext> | null | undefined): this {
    if (registry === null || registry === undefined) {
      throw new FSMError(FSM_ERROR_CODES.INVALID_CONFIGURATION, "Registry must not be null", {
        entityLabel: this.entityLabel,
      });
    }
    this.touch();
    this.registry = registry;
    return this;
  }

  /**
   * Begin a transition from `from` to `to`, adding both to the state set.
   */
  addTransition(from: TState, to: TState): TransitionBuilder<TState, TContext> {
    parseStateName(this.stateSpace, from);
    parseStateName(this.stateSpace, to);
    this.touch();
    this.states.add(from);
    this.states.add(to);
    return new TransitionBuilder<TState, TContext>({
      parent: this,
      from,
      to,
      getRegistry: () => this.registry,
      append: (transition) => {
        this.touch();
        this.transitions.push(transition);
      },
    });
  }

  /**
   * Freeze the current states, transitions and initial state.
   *
   * @throws FSMError MISSING_INITIAL_STATE when no initial state was set
   */
  build(): FSMDefinition<TState, TContext> {
    const initialState = this.requireInitialState("build");
    const definition = defineFSM<TState, TContext>({
      entityLabel: this.entityLabel,
      states: [...this.states],
      transitions: [...this.transitions],
      initialState,
    });
    this.currentPhase = "built";
    this.options.loggerFor(this.entityLabel).debug("Definition built", {
      entityLabel: this.entityLabel,
      states: definition.states.length,
      transitions: definition.transitions.length,
    });
    return definition;
  }

  /**
   * Project the builder onto the serializable DTO. Guards and side effects
   * are written by name; unnamed ones leave the name out.
   *
   * @throws FSMError MISSING_INITIAL_STATE when no initial state was set
   */
  toSerializable(): DefinitionDto {
    const initialState = this.requireInitialState("toSerializable");
    return {
      entityLabel: this.entityLabel,
      initialState,
      states: [...this.states],
      transitions: this.transitions.map((t) =>
        toTransitionDto(t.from.name, t.to.name, t.conditionName, t.sideEffectName)
      ),
    };
  }

  /**
   * Load a serialized definition into this builder.
   *
   * Adopts the DTO's entity label and initial state, adds its states in DTO
   * order and appends its transitions after any already configured. Nothing
   * is changed, and nothing is logged, when the DTO fails to load. The
   * registry also becomes the builder's registry if none was set.
   *
   * @throws FSMError INVALID_DTO when `dto` does not have the DTO shape
   * @throws FSMError UNKNOWN_STATE_NAME when a name is outside the state space
   * @throws FSMError UNKNOWN_CONDITION / UNKNOWN_SIDE_EFFECT for unresolved
   *   names under the strict policy
   */
  loadFrom(dto: DefinitionDto, registry: TransitionRegistry<TState, TContext>): this {
    const parsed = parseDefinitionDto(dto);
    const { entityLabel } = parsed;
    const initial = parseStateName(this.stateSpace, parsed.initialState);
    const states = parsed.states.map((name) => parseStateName(this.stateSpace, name));
    const fallbacks: NameFallback<TState>[] = [];

    const transitions = parsed.transitions.map((t) => {
      const from = parseStateName(this.stateSpace, t.from);
      const to = parseStateName(this.stateSpace, t.to);
      const condition = this.resolveName(
        (name) => registry.getCondition(name),
        { kind: "condition", name: t.conditionName, entityLabel, from, to },
        fallbacks
      );
      const sideEffect = this.resolveName(
        (name) => registry.getSideEffect(name),
        { kind: "sideEffect", name: t.sideEffectName, entityLabel, from, to },
        fallbacks
      );
      return createTransition<TState, TContext>(from, to, {
        condition,
        sideEffect,
        conditionName: t.conditionName,
        sideEffectName: t.sideEffectName,
      });
    });

    this.touch();
    this.entityLabel = entityLabel;
    this.initial = initial;
    // Serialized state order is kept
    for (const state of states) {
      this.states.add(state);
    }
    this.states.add(initial);
    for (const transition of transitions) {
      this.states.add(transition.from.name);
      this.states.add(transition.to.name);
      this.transitions.push(transition);
    }
    if (this.registry === undefined) {
      this.registry = registry;
    }

    const logger = this.options.loggerFor(entityLabel);
    for (const { kind, name, ...context } of fallbacks) {
      logNameResolutionFallback(logger, context, { kind, name });
    }
    return this;
  }

  /**
   * Look a name up with `find`; `undefined` when the name is absent or
   * unresolved. Unresolved names throw under the strict policy and
   * are queued in `fallbacks` otherwise.
   */
  private resolveName<T>(
    find: (name: string) => T | undefined,
    lookup: NameLookup<TState>,
    fallbacks: NameFallback<TState>[]
  ): T | undefined {
    const { kind, name, entityLabel, from, to } = lookup;
    if (name === undefined) return undefined;
    const found = find(name);
    if (found !== undefined) return found;

    if (this.options.nameResolution === "strict") {
      throw kind === "condition"
        ? new FSMError(
            FSM_ERROR_CODES.UNKNOWN_CONDITION,
            `Condition "${name}" not found in registry`,
            { entityLabel, conditionName: name, from, to }
          )
        : new FSMError(
            FSM_ERROR_CODES.UNKNOWN_SIDE_EFFECT,
            `Side effect "${name}" not found in registry`,
            { entityLabel, sideEffectName: name, from, to }
          );
    }
    fallbacks.push({ kind, name, entityLabel, from, to });
    return undefined;
  }

  private requireInitialState(method: string): TState {
    if (this.initial === undefined) {
      throw new FSMError(
        FSM_ERROR_CODES.MISSING_INITIAL_STATE,
        `Initial state not specified. Call withInitialState() before ${method}().`,
        { entityLabel: this.entityLabel }
      );
    }
    return this.initial;
  }

  private touch(): void {
    this.currentPhase = "configuring";
  }
}
