import { describe, expect, test } from "vitest";
import { BridgeError, describeUnknownError } from "./errors.js";

describe("BridgeError", () => {
  test("carries its kind and cause", () => {
    const cause = new Error("socket closed");
    const error = new BridgeError({ kind: "delivery_exhausted", message: "gave up", cause });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("BridgeError");
    expect(error.kind).toBe("delivery_exhausted");
    expect(error.message).toBe("gave up");
    expect(error.cause).toBe(cause);
  });
});

describe("describeUnknownError", () => {
  test("describes thrown values of any shape", () => {
    expect(describeUnknownError(new Error("boom"))).toBe("boom");
    expect(describeUnknownError("plain")).toBe("plain");
    expect(describeUnknownError({ code: 42 })).toBe('{"code":42}');
    expect(describeUnknownError(undefined)).toBe("undefined");
  });
});
