import { describe, expect, test } from "vitest";
import { isSessionInvalidationError } from "./session-errors.js";

describe("isSessionInvalidationError", () => {
  test("matches known session failure text case-insensitively", () => {
    expect(isSessionInvalidationError({ message: "Session not found" })).toBe(true);
    expect(isSessionInvalidationError({ message: "Claude process exited with code 1" })).toBe(true);
    expect(isSessionInvalidationError({ message: "RESUME FAILED: missing transcript" })).toBe(true);
  });

  test("does not match unrelated errors", () => {
    expect(isSessionInvalidationError({ message: "Rate limit exceeded" })).toBe(false);
    expect(isSessionInvalidationError({ message: "" })).toBe(false);
    expect(isSessionInvalidationError({ message: null })).toBe(false);
  });

  test("a structured code takes precedence over the message", () => {
    expect(isSessionInvalidationError({ message: "Rate limit exceeded", code: "session_expired" })).toBe(true);
    expect(isSessionInvalidationError({ message: "Session not found", code: "rate_limited" })).toBe(false);
  });

  test("an empty code falls back to the message", () => {
    expect(isSessionInvalidationError({ message: "Invalid session", code: "  " })).toBe(true);
  });
});
