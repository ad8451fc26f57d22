import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { createTestLogger } from "../test-utils/test-logger.js";
import type { TransmitCallback } from "./connection-supervisor.js";
import type { BridgeEvent } from "./events.js";
import { SerialExecutor } from "./serial-executor.js";
import { SessionRecoveryCoordinator, STATUS_CHECK_COMMAND, type RecoveryTarget } from "./session-recovery.js";
import { SessionStateStore } from "./session-state.js";

const SESSION_ID = "0a1b2c3d-4e5f-4a6b-8c7d-9e0f1a2b3c4d";

function createCoordinator() {
  const logger = createTestLogger();
  const state = new SessionStateStore(logger);
  const sends: Array<{ data: string; onResult: TransmitCallback }> = [];
  const supervisor = {
    isConnected: false,
    canTransmit: false,
    connect: vi.fn(),
    transmit: (data: string, onResult: TransmitCallback) => {
      sends.push({ data, onResult });
    },
  };
  const watchdog = { arm: vi.fn(), disarm: vi.fn() };
  const queue = { markTurnOpen: vi.fn(), onTurnEnded: vi.fn() };
  const events: BridgeEvent[] = [];
  const coordinator = new SessionRecoveryCoordinator({
    executor: new SerialExecutor(logger),
    logger,
    state,
    supervisor,
    watchdog,
    queue,
    buildCommandFrame: (command: string, target: RecoveryTarget) =>
      JSON.stringify({ command, cwd: target.projectPath, sessionId: target.sessionId }),
    emit: (event) => events.push(event),
  });
  const goOnline = () => {
    supervisor.isConnected = true;
    supervisor.canTransmit = true;
  };
  return { coordinator, state, supervisor, watchdog, queue, sends, events, goOnline };
}

describe("SessionRecoveryCoordinator", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("attaching sends a status check and opens a turn", () => {
    const { coordinator, state, watchdog, queue, sends, goOnline } = createCoordinator();
    goOnline();

    expect(coordinator.attachToSession(SESSION_ID.toUpperCase(), "/work/app")).toBe(true);

    expect(sends.map((send) => JSON.parse(send.data))).toEqual([
      { command: STATUS_CHECK_COMMAND, cwd: "/work/app", sessionId: SESSION_ID },
    ]);
    expect(state.get()).toMatchObject({ isReattaching: true, isProcessing: true, sessionId: SESSION_ID });
    expect(watchdog.arm).toHaveBeenCalledTimes(1);
    expect(queue.markTurnOpen).toHaveBeenCalledTimes(1);
  });

  test("refuses while disconnected or with a malformed id", () => {
    const { coordinator, sends, goOnline } = createCoordinator();

    expect(coordinator.attachToSession(SESSION_ID, "/work/app")).toBe(false);
    goOnline();
    expect(coordinator.attachToSession("local-draft", "/work/app")).toBe(false);
    expect(sends).toEqual([]);
  });

  test("a failed status check leaves the reattaching state", () => {
    const { coordinator, state, watchdog, queue, sends, goOnline } = createCoordinator();
    goOnline();
    coordinator.attachToSession(SESSION_ID, "/work/app");

    sends[0]?.onResult(new Error("socket closed"));

    expect(state.get()).toMatchObject({ isReattaching: false, isProcessing: false });
    expect(watchdog.disarm).toHaveBeenCalledTimes(1);
    expect(queue.onTurnEnded).toHaveBeenCalledTimes(1);
  });

  test("the first response confirms the reattach once", () => {
    const { coordinator, events, goOnline } = createCoordinator();
    goOnline();
    coordinator.attachToSession(SESSION_ID, "/work/app");

    coordinator.confirmReattach();
    coordinator.confirmReattach();

    expect(events).toEqual([{ type: "session_attached", sessionId: SESSION_ID }]);
  });

  test("recovering while connected attaches right away", () => {
    const { coordinator, supervisor, sends, goOnline } = createCoordinator();
    goOnline();

    coordinator.recoverFromBackground(SESSION_ID, "/work/app");

    expect(supervisor.connect).not.toHaveBeenCalled();
    expect(sends).toHaveLength(1);
  });

  test("recovering while disconnected waits for the connection to settle", () => {
    const { coordinator, supervisor, sends, goOnline } = createCoordinator();

    coordinator.recoverFromBackground(SESSION_ID, "/work/app");
    expect(supervisor.connect).toHaveBeenCalledTimes(1);
    expect(coordinator.pendingRecovery).toEqual({ sessionId: SESSION_ID, projectPath: "/work/app" });

    goOnline();
    coordinator.onConnected();
    vi.advanceTimersByTime(199);
    expect(sends).toEqual([]);

    vi.advanceTimersByTime(1);
    expect(sends).toHaveLength(1);
    expect(coordinator.pendingRecovery).toBeNull();
  });

  test("cancel drops a pending recovery", () => {
    const { coordinator, sends, goOnline } = createCoordinator();

    coordinator.recoverFromBackground(SESSION_ID, "/work/app");
    goOnline();
    coordinator.onConnected();
    coordinator.cancel();
    vi.advanceTimersByTime(1000);

    expect(sends).toEqual([]);
  });
});
