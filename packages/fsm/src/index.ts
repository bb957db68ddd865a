/**
 * Declarative finite state machines: build a definition once, persist it by
 * name, and run any number of cursors over it.
 *
 * @example
 * ```typescript
 * import {
 *   FSMBuilder,
 *   TransitionRegistry,
 *   createStateMachine,
 *   encodeDefinition,
 *   decodeDefinition,
 * } from "@waypoint/fsm";
 *
 * const TICKET_STATES = ["Open", "InProgress", "Resolved"] as const;
 * type TicketState = (typeof TICKET_STATES)[number];
 * interface TicketContext { agentAssigned: boolean }
 *
 * const registry = new TransitionRegistry<TicketState, TicketContext>()
 *   .registerCondition("agentAssigned", (ctx) => ctx.agentAssigned);
 *
 * const builder = FSMBuilder.create<TicketState, TicketContext>("Ticket", TICKET_STATES)
 *   .withRegistry(registry)
 *   .withInitialState("Open")
 *   .addTransition("Open", "InProgress")
 *   .when("agentAssigned")
 *   .done();
 *
 * const machine = createStateMachine(builder.build());
 * machine.tryTransitionTo("InProgress", { agentAssigned: true }); // true
 *
 * // Persist by name, reload later against the same registry
 * const json = encodeDefinition(builder.toSerializable());
 * const reloaded = FSMBuilder.fromSerializable(decodeDefinition(json), TICKET_STATES, registry);
 * ```
 *
 * @module @waypoint/fsm
 */

// Types
export type {
  StateSpace,
  State,
  Condition,
  SideEffect,
  Transition,
  FSMDefinition,
  FSMDefinitionInput,
  DefinitionShape,
} from "./types.js";
export { ALWAYS } from "./types.js";

// Errors
export type { FSMErrorCode } from "./errors.js";
export { FSMError, FSMTransitionError, FSM_ERROR_CODES, isFSMError } from "./errors.js";

// States
export { createState, sameState, isStateName, parseStateName } from "./state.js";

// Registry
export { TransitionRegistry } from "./registry.js";

// Definitions
export type { TransitionParts } from "./defineFSM.js";
export { defineFSM, createTransition } from "./defineFSM.js";

// Builder
export type { BuilderPhase } from "./builder.js";
export { FSMBuilder, TransitionBuilder } from "./builder.js";

// Runtime
export type { StateMachine } from "./machine.js";
export { createStateMachine } from "./machine.js";

// Operations
export {
  findTransition,
  canTransition,
  validTransitions,
  isTerminal,
  isValidState,
  toDefinitionShape,
} from "./operations.js";

// Serialization
export type { DefinitionDto, TransitionDto } from "./dto.js";
export { DefinitionDtoSchema, TransitionDtoSchema, parseDefinitionDto } from "./dto.js";
export type { EncodeOptions } from "./codec.js";
export { encodeDefinition, decodeDefinition } from "./codec.js";

// Configuration
export type { FSMOptions, ResolvedFSMOptions, NameResolutionPolicy, FSMConfig } from "./config.js";
export { FSM_DEFAULTS, FSMConfigSchema, resolveFSMOptions, loadFSMOptions } from "./config.js";
