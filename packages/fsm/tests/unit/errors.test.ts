/**
 * Unit tests for FSM error types.
 */
import { describe, it, expect } from "vitest";
import { FSMError, FSMTransitionError, FSM_ERROR_CODES, isFSMError } from "../../src/index.js";

describe("FSMError", () => {
  it("should carry code, message and context", () => {
    const error = new FSMError(FSM_ERROR_CODES.UNKNOWN_CONDITION, 'Condition "x" not found', {
      conditionName: "x",
    });

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(FSMError);
    expect(error.name).toBe("FSMError");
    expect(error.code).toBe("UNKNOWN_CONDITION");
    expect(error.message).toBe('Condition "x" not found');
    expect(error.context).toEqual({ conditionName: "x" });
  });

  it("should leave context undefined when not given", () => {
    const error = new FSMError(FSM_ERROR_CODES.INVALID_DTO, "bad");

    expect(error.context).toBeUndefined();
  });
});

describe("isFSMError", () => {
  it("should recognise FSMError instances", () => {
    expect(isFSMError(new FSMError(FSM_ERROR_CODES.NULL_CONTEXT, "no context"))).toBe(true);
    expect(isFSMError(new Error("plain"))).toBe(false);
    expect(isFSMError("NULL_CONTEXT")).toBe(false);
  });

  it("should narrow to a single code", () => {
    const error = new FSMError(FSM_ERROR_CODES.NULL_CONTEXT, "no context");

    expect(isFSMError(error, FSM_ERROR_CODES.NULL_CONTEXT)).toBe(true);
    expect(isFSMError(error, FSM_ERROR_CODES.INVALID_DTO)).toBe(false);
  });
});

describe("FSMTransitionError", () => {
  it("should list valid transitions", () => {
    const error = new FSMTransitionError("Open", "Closed", ["InProgress"]);

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("FSMTransitionError");
    expect(error.code).toBe("FSM_INVALID_TRANSITION");
    expect(error.message).toBe(
      'Invalid transition from "Open" to "Closed". Valid transitions: InProgress'
    );
  });

  it("should mark terminal states", () => {
    const error = new FSMTransitionError("Closed", "Open", []);

    expect(error.message).toBe(
      'Invalid transition from "Closed" to "Open". Valid transitions: (none - terminal state)'
    );
    expect(error.validTransitions).toEqual([]);
  });
});
