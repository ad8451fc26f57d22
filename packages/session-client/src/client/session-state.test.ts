import { describe, expect, test } from "vitest";
import { createTestLogger } from "../test-utils/test-logger.js";
import { SessionStateStore, type SessionSnapshot } from "./session-state.js";

describe("SessionStateStore", () => {
  test("notifies listeners with the keys that changed", () => {
    const store = new SessionStateStore(createTestLogger());
    const changes: Array<(keyof SessionSnapshot)[]> = [];
    store.subscribe((_snapshot, changed) => changes.push(changed));

    store.update({ isProcessing: true, currentText: "" });
    store.update({ isProcessing: true });
    store.update({ currentText: "hi", lastError: null });

    expect(changes).toEqual([["isProcessing"], ["currentText"]]);
  });

  test("replaces the snapshot instead of mutating it", () => {
    const store = new SessionStateStore(createTestLogger(), { sessionId: "s-1" });
    const before = store.get();

    store.update({ sessionId: null });

    expect(before.sessionId).toBe("s-1");
    expect(store.get().sessionId).toBeNull();
  });

  test("a throwing listener does not stop the others", () => {
    const store = new SessionStateStore(createTestLogger());
    const seen: boolean[] = [];
    store.subscribe(() => {
      throw new Error("listener failure");
    });
    const unsubscribe = store.subscribe((snapshot) => seen.push(snapshot.isAborting));

    store.update({ isAborting: true });
    unsubscribe();
    store.update({ isAborting: false });

    expect(seen).toEqual([true]);
  });
});
