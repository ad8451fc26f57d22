import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { createMockTransportFactory } from "../test-utils/mock-transport.js";
import { createTestLogger } from "../test-utils/test-logger.js";
import {
  computeReconnectDelay,
  ConnectionSupervisor,
  type ConnectionState,
} from "./connection-supervisor.js";
import { SerialExecutor } from "./serial-executor.js";

function createSupervisor(options: { url?: string | null; random?: () => number } = {}) {
  const logger = createTestLogger();
  const mocks = createMockTransportFactory();
  const url = options.url === undefined ? "ws://bridge.test/ws" : options.url;
  const supervisor = new ConnectionSupervisor({
    resolveUrl: () => url,
    executor: new SerialExecutor(logger),
    logger,
    transportFactory: mocks.factory,
    random: options.random ?? (() => 0),
  });
  const frames: unknown[] = [];
  const failures: string[] = [];
  let connectedCount = 0;
  supervisor.setHandlers({
    onFrame: (data) => frames.push(data),
    onChannelLost: (reason) => failures.push(reason),
    onConnected: () => {
      connectedCount += 1;
    },
  });
  const states: ConnectionState[] = [];
  supervisor.subscribeConnectionStatus((state) => states.push(state));
  return {
    supervisor,
    mocks,
    frames,
    failures,
    states,
    connectedCount: () => connectedCount,
  };
}

describe("computeReconnectDelay", () => {
  test("doubles from one second and stops growing after the fourth attempt", () => {
    const delays = [1, 2, 3, 4, 5, 6, 10].map((attempt) => computeReconnectDelay(attempt, () => 0));
    expect(delays).toEqual([1000, 2000, 4000, 8000, 8000, 8000, 8000]);
  });

  test("adds jitter below half a second", () => {
    expect(computeReconnectDelay(1, () => 0.5)).toBe(1250);
    expect(computeReconnectDelay(5, () => 0.999)).toBeCloseTo(8499.5);
  });

  test("is non-decreasing for any fixed jitter", () => {
    for (const jitter of [0, 0.25, 0.99]) {
      const delays = Array.from({ length: 8 }, (_, index) => computeReconnectDelay(index + 1, () => jitter));
      for (let index = 1; index < delays.length; index += 1) {
        expect(delays[index]).toBeGreaterThanOrEqual(delays[index - 1] ?? 0);
      }
      expect(Math.max(...delays)).toBeLessThan(8500);
    }
  });
});

describe("ConnectionSupervisor", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("a successful liveness ping connects without waiting for a frame", () => {
    const { supervisor, mocks, states, connectedCount } = createSupervisor();

    supervisor.connect();
    expect(supervisor.getConnectionState()).toEqual({ status: "connecting" });
    expect(mocks.latest().url).toBe("ws://bridge.test/ws");

    mocks.latest().resolvePing();
    expect(supervisor.getConnectionState()).toEqual({ status: "connected" });
    expect(connectedCount()).toBe(1);
    expect(states).toEqual([
      { status: "disconnected" },
      { status: "connecting" },
      { status: "connected" },
    ]);
  });

  test("the first inbound frame also confirms the connection", () => {
    const { supervisor, mocks, frames } = createSupervisor();

    supervisor.connect();
    mocks.latest().triggerMessage('{"type":"projects_updated"}');

    expect(supervisor.isConnected).toBe(true);
    expect(frames).toEqual(['{"type":"projects_updated"}']);
  });

  test("a failed ping leaves the attempt open", () => {
    const { supervisor, mocks } = createSupervisor();

    supervisor.connect();
    mocks.latest().resolvePing(new Error("no pong"));

    expect(supervisor.getConnectionState()).toEqual({ status: "connecting" });
  });

  test("a receive failure schedules a reconnect with backoff", () => {
    const { supervisor, mocks, failures } = createSupervisor();

    supervisor.connect();
    const first = mocks.latest();
    first.resolvePing();
    first.triggerClose({ code: 1006, reason: "" });

    expect(failures).toEqual(["Transport closed (code 1006)"]);
    expect(supervisor.getConnectionState()).toEqual({ status: "reconnecting", attempt: 1 });
    expect(supervisor.isReconnectScheduled).toBe(true);
    expect(supervisor.lastError).toBe("Transport closed (code 1006)");

    vi.advanceTimersByTime(999);
    expect(mocks.transports).toHaveLength(1);

    vi.advanceTimersByTime(1);
    expect(mocks.transports).toHaveLength(2);
    expect(supervisor.getConnectionState()).toEqual({ status: "reconnecting", attempt: 1 });
  });

  test("backoff grows across consecutive failed attempts and resets on success", () => {
    const { supervisor, mocks } = createSupervisor();

    supervisor.connect();
    mocks.latest().triggerError(new Error("ECONNREFUSED"));
    expect(supervisor.getConnectionState()).toEqual({ status: "reconnecting", attempt: 1 });

    vi.advanceTimersByTime(1000);
    mocks.latest().triggerError(new Error("ECONNREFUSED"));
    expect(supervisor.getConnectionState()).toEqual({ status: "reconnecting", attempt: 2 });

    vi.advanceTimersByTime(1999);
    expect(mocks.transports).toHaveLength(2);
    vi.advanceTimersByTime(1);
    expect(mocks.transports).toHaveLength(3);

    mocks.latest().resolvePing();
    expect(supervisor.getConnectionState()).toEqual({ status: "connected" });

    mocks.latest().triggerClose();
    expect(supervisor.getConnectionState()).toEqual({ status: "reconnecting", attempt: 1 });
  });

  test("attempt five waits no longer than the capped delay", () => {
    const { supervisor, mocks } = createSupervisor();

    supervisor.connect();
    for (const delay of [1000, 2000, 4000, 8000]) {
      mocks.latest().triggerError("refused");
      vi.advanceTimersByTime(delay);
    }
    mocks.latest().triggerError("refused");
    expect(supervisor.getConnectionState()).toEqual({ status: "reconnecting", attempt: 5 });

    const before = mocks.transports.length;
    vi.advanceTimersByTime(8000);
    expect(mocks.transports).toHaveLength(before + 1);
  });

  test("manual connect cancels a scheduled reconnect", () => {
    const { supervisor, mocks } = createSupervisor();

    supervisor.connect();
    mocks.latest().triggerClose();
    expect(supervisor.isReconnectScheduled).toBe(true);

    supervisor.connect();
    expect(supervisor.isReconnectScheduled).toBe(false);
    mocks.latest().resolvePing();

    vi.advanceTimersByTime(10_000);
    expect(mocks.transports).toHaveLength(2);
    expect(supervisor.isConnected).toBe(true);
  });

  test("disconnect is terminal and closes the channel", () => {
    const { supervisor, mocks, failures } = createSupervisor();

    supervisor.connect();
    const transport = mocks.latest();
    transport.resolvePing();
    supervisor.disconnect();

    expect(supervisor.getConnectionState()).toEqual({ status: "disconnected" });
    expect(transport.closed).toEqual({ code: 1000, reason: "Client closed" });

    transport.triggerClose();
    vi.advanceTimersByTime(60_000);
    expect(failures).toEqual([]);
    expect(mocks.transports).toHaveLength(1);
  });

  test("connecting over a live channel closes it and reports the loss", () => {
    const { supervisor, mocks, failures } = createSupervisor();
    const results: Array<Error | undefined> = [];

    supervisor.connect();
    const first = mocks.latest();
    first.resolvePing();
    first.sendMode = "manual";
    supervisor.transmit("in flight", (error) => results.push(error));

    supervisor.connect();

    expect(first.closed).toEqual({ code: 1001, reason: "Reconnecting" });
    expect(failures).toEqual(["Connection restarted"]);
    expect(mocks.transports).toHaveLength(2);
    expect(supervisor.isReconnectScheduled).toBe(false);

    first.pendingSends[0]?.(undefined);
    expect(results).toEqual([]);

    mocks.latest().resolvePing();
    expect(supervisor.isConnected).toBe(true);
  });

  test("callbacks from a superseded generation change nothing", () => {
    const { supervisor, mocks, states, connectedCount } = createSupervisor();

    supervisor.connect();
    const stale = mocks.latest();
    supervisor.connect();
    const statesBefore = states.length;

    stale.resolvePing();

    expect(states).toHaveLength(statesBefore);
    expect(connectedCount()).toBe(0);
    expect(supervisor.getConnectionState()).toEqual({ status: "connecting" });
  });

  test("a send completing after a reconnect is ignored", () => {
    const { supervisor, mocks } = createSupervisor();
    const results: Array<Error | undefined> = [];

    supervisor.connect();
    const first = mocks.latest();
    first.resolvePing();
    first.sendMode = "manual";
    supervisor.transmit("payload", (error) => results.push(error));
    expect(first.sent).toEqual(["payload"]);

    first.triggerClose();
    vi.advanceTimersByTime(1000);
    mocks.latest().resolvePing();

    first.pendingSends[0]?.(new Error("late failure"));
    expect(results).toEqual([]);
  });

  test("transmissions wait for an opening connection", () => {
    const { supervisor, mocks } = createSupervisor();
    const results: Array<Error | undefined> = [];

    supervisor.connect();
    supervisor.transmit("queued", (error) => results.push(error));
    expect(mocks.latest().sent).toEqual([]);

    mocks.latest().resolvePing();
    expect(mocks.latest().sent).toEqual(["queued"]);
    expect(results).toEqual([undefined]);
  });

  test("a queued transmission times out if the connection never opens", () => {
    const { supervisor } = createSupervisor();
    const results: Array<Error | undefined> = [];

    supervisor.connect();
    supervisor.transmit("queued", (error) => results.push(error));
    vi.advanceTimersByTime(10_000);

    expect(results).toHaveLength(1);
    expect(results[0]?.message).toBe("Timed out waiting for connection to send message");
  });

  test("transmitting while disconnected fails immediately", () => {
    const { supervisor } = createSupervisor();
    const results: Array<Error | undefined> = [];

    supervisor.transmit("nowhere", (error) => results.push(error));

    expect(results[0]?.message).toBe("Transport not connected (status: disconnected)");
  });

  test("a missing endpoint leaves the client disconnected", () => {
    const { supervisor, mocks } = createSupervisor({ url: null });

    supervisor.connect();

    expect(supervisor.getConnectionState()).toEqual({ status: "disconnected" });
    expect(supervisor.lastError).toBe("Invalid WebSocket URL");
    expect(mocks.transports).toHaveLength(0);
  });
});
