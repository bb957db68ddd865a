/**
 * Unit tests for defineFSM and createTransition.
 *
 * Covers structural validation, lookup tables and immutability.
 */
import { describe, it, expect } from "vitest";
import {
  ALWAYS,
  createTransition,
  defineFSM,
  FSMError,
  FSM_ERROR_CODES,
} from "../../src/index.js";

type TicketState = "Open" | "InProgress" | "Resolved" | "Closed";
interface TicketContext {
  agentAssigned: boolean;
}

const ticketDefinition = () =>
  defineFSM<TicketState, TicketContext>({
    entityLabel: "Ticket",
    states: ["Open", "InProgress", "Resolved", "Closed"],
    initialState: "Open",
    transitions: [
      createTransition<TicketState, TicketContext>("Open", "InProgress", {
        condition: (ctx) => ctx.agentAssigned,
        conditionName: "agentAssigned",
      }),
      createTransition<TicketState, TicketContext>("Open", "Closed"),
      createTransition<TicketState, TicketContext>("InProgress", "Resolved"),
      createTransition<TicketState, TicketContext>("InProgress", "Resolved", { conditionName: "fallback" }),
      createTransition<TicketState, TicketContext>("Resolved", "Closed"),
    ],
  });

describe("createTransition", () => {
  it("should default the guard to ALWAYS", () => {
    const transition = createTransition<TicketState, TicketContext>("Open", "Closed");

    expect(transition.condition).toBe(ALWAYS);
    expect(transition.from.name).toBe("Open");
    expect(transition.to.name).toBe("Closed");
  });

  it("should leave absent names and side effect off the object", () => {
    const transition = createTransition<TicketState, TicketContext>("Open", "Closed");

    expect(Object.keys(transition)).toEqual(["from", "to", "condition"]);
  });

  it("should be frozen", () => {
    const transition = createTransition<TicketState, TicketContext>("Open", "Closed");

    expect(Object.isFrozen(transition)).toBe(true);
  });
});

describe("defineFSM", () => {
  it("should expose label, initial state and states in insertion order", () => {
    const definition = ticketDefinition();

    expect(definition.entityLabel).toBe("Ticket");
    expect(definition.initialState.name).toBe("Open");
    expect(definition.states.map((s) => s.name)).toEqual([
      "Open",
      "InProgress",
      "Resolved",
      "Closed",
    ]);
  });

  it("should keep transitions in declaration order", () => {
    const definition = ticketDefinition();

    expect(definition.transitions.map((t) => `${t.from.name}->${t.to.name}`)).toEqual([
      "Open->InProgress",
      "Open->Closed",
      "InProgress->Resolved",
      "InProgress->Resolved",
      "Resolved->Closed",
    ]);
  });

  it("should list outgoing transitions per state", () => {
    const definition = ticketDefinition();

    expect(definition.transitionsFrom("InProgress")).toHaveLength(2);
    expect(definition.transitionsFrom("Closed")).toHaveLength(0);
  });

  it("should return distinct targets in declaration order", () => {
    const definition = ticketDefinition();

    expect(definition.validTransitions("Open")).toEqual(["InProgress", "Closed"]);
    expect(definition.validTransitions("InProgress")).toEqual(["Resolved"]);
    expect(definition.validTransitions("Closed")).toEqual([]);
  });

  it("should identify terminal states", () => {
    const definition = ticketDefinition();

    expect(definition.isTerminal("Closed")).toBe(true);
    expect(definition.isTerminal("Open")).toBe(false);
  });

  it("should check state membership", () => {
    const definition = ticketDefinition();

    expect(definition.hasState("Resolved")).toBe(true);
    expect(definition.hasState("resolved")).toBe(false);
    expect(definition.hasState("Archived")).toBe(false);
  });

  it("should freeze the definition and its lists", () => {
    const definition = ticketDefinition();

    expect(Object.isFrozen(definition)).toBe(true);
    expect(Object.isFrozen(definition.states)).toBe(true);
    expect(Object.isFrozen(definition.transitions)).toBe(true);
  });

  it("should accept a definition without transitions", () => {
    const definition = defineFSM<TicketState, TicketContext>({
      entityLabel: "Ticket",
      states: ["Open"],
      initialState: "Open",
      transitions: [],
    });

    expect(definition.isTerminal("Open")).toBe(true);
  });

  describe("structural integrity", () => {
    it("should reject a state listed twice", () => {
      expect(() =>
        defineFSM<TicketState, TicketContext>({
          entityLabel: "Ticket",
          states: ["Open", "Closed", "Open"],
          initialState: "Open",
          transitions: [],
        })
      ).toThrow('State "Open" is listed more than once in "Ticket"');
    });

    it("should reject an initial state outside the states", () => {
      try {
        defineFSM<TicketState, TicketContext>({
          entityLabel: "Ticket",
          states: ["Open", "Closed"],
          initialState: "Resolved",
          transitions: [],
        });
        expect.fail("Expected FSMError");
      } catch (error) {
        expect(error).toBeInstanceOf(FSMError);
        const fsmError = error as FSMError;
        expect(fsmError.code).toBe(FSM_ERROR_CODES.STRUCTURAL_INTEGRITY);
        expect(fsmError.message).toBe('Initial state "Resolved" is not a state of "Ticket"');
      }
    });

    it("should reject a transition endpoint outside the states", () => {
      try {
        defineFSM<TicketState, TicketContext>({
          entityLabel: "Ticket",
          states: ["Open", "Closed"],
          initialState: "Open",
          transitions: [createTransition<TicketState, TicketContext>("Open", "Resolved")],
        });
        expect.fail("Expected FSMError");
      } catch (error) {
        const fsmError = error as FSMError;
        expect(fsmError.code).toBe(FSM_ERROR_CODES.STRUCTURAL_INTEGRITY);
        expect(fsmError.message).toBe(
          'Transition Open -> Resolved references "Resolved", which is not a state of "Ticket"'
        );
        expect(fsmError.context).toEqual({
          entityLabel: "Ticket",
          from: "Open",
          to: "Resolved",
          missing: "Resolved",
        });
      }
    });
  });
});
