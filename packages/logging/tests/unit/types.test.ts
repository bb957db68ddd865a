/**
 * Unit tests for logging types.
 */
import { describe, it, expect } from "vitest";
import { LOG_LEVELS, DEFAULT_LOG_LEVEL, shouldLog } from "../../src/types.js";

describe("LOG_LEVELS", () => {
  it("should order levels from most to least verbose", () => {
    expect(LOG_LEVELS).toEqual(["DEBUG", "INFO", "WARN", "ERROR"]);
  });
});

describe("DEFAULT_LOG_LEVEL", () => {
  it("should be INFO", () => {
    expect(DEFAULT_LOG_LEVEL).toBe("INFO");
  });
});

describe("shouldLog", () => {
  it("should return true when message level >= configured level", () => {
    expect(shouldLog("INFO", "INFO")).toBe(true);
    expect(shouldLog("WARN", "INFO")).toBe(true);
    expect(shouldLog("ERROR", "INFO")).toBe(true);
  });

  it("should return false when message level < configured level", () => {
    expect(shouldLog("DEBUG", "INFO")).toBe(false);
    expect(shouldLog("INFO", "WARN")).toBe(false);
  });

  it("should only allow ERROR at ERROR level", () => {
    expect(shouldLog("WARN", "ERROR")).toBe(false);
    expect(shouldLog("ERROR", "ERROR")).toBe(true);
  });

  it("should let everything through at DEBUG level", () => {
    for (const level of LOG_LEVELS) {
      expect(shouldLog(level, "DEBUG")).toBe(true);
    }
  });
});
