import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { BridgeError } from "../shared/errors.js";
import { createTestLogger } from "../test-utils/test-logger.js";
import type { TransmitCallback } from "./connection-supervisor.js";
import { OutboundQueue, type OutboundQueuePort } from "./outbound-queue.js";
import { SerialExecutor } from "./serial-executor.js";

function createQueue(options: { rejectCommand?: string } = {}) {
  const logger = createTestLogger();
  const link = { canTransmit: true, connected: true };
  const transmitted: string[] = [];
  const callbacks: TransmitCallback[] = [];
  const events: string[] = [];
  const failures: BridgeError[] = [];
  const connect = vi.fn();

  const port: OutboundQueuePort = {
    canTransmit: () => link.canTransmit,
    isConnected: () => link.connected,
    connect,
    transmit: (data, onResult) => {
      transmitted.push(data);
      callbacks.push(onResult);
    },
    serialize: (command) => {
      if (command.command === options.rejectCommand) {
        throw new Error("unencodable");
      }
      return command.command;
    },
    beginTurn: (command) => events.push(`begin:${command.command}`),
    reportRetry: (command, delayMs) => events.push(`retry:${command.command}:${delayMs}`),
    failTurn: (error) => failures.push(error),
  };

  const queue = new OutboundQueue({ executor: new SerialExecutor(logger), logger, port });
  const lastCallback = (): TransmitCallback => {
    const callback = callbacks[callbacks.length - 1];
    if (!callback) {
      throw new Error("nothing transmitted");
    }
    return callback;
  };
  return { queue, link, transmitted, events, failures, connect, lastCallback };
}

describe("OutboundQueue", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("only one turn is open at a time", () => {
    const { queue, transmitted, lastCallback } = createQueue();

    queue.submit({ command: "first", projectPath: "/work" });
    queue.submit({ command: "second", projectPath: "/work" });
    expect(transmitted).toEqual(["first"]);

    lastCallback()();
    expect(queue.size).toBe(1);
    expect(queue.peek()?.command).toBe("second");
    expect(transmitted).toEqual(["first"]);

    queue.onTurnEnded();
    expect(transmitted).toEqual(["first", "second"]);
  });

  test("records the submission details", () => {
    const { queue } = createQueue();
    const pending = queue.submit({
      command: "hello",
      projectPath: "/work",
      sessionId: "3f2504e0-4f89-11d3-9a0c-0305e82c3301",
      permissionMode: "plan",
      model: "opus",
    });

    expect(pending).toMatchObject({
      command: "hello",
      projectPath: "/work",
      sessionId: "3f2504e0-4f89-11d3-9a0c-0305e82c3301",
      permissionMode: "plan",
      model: "opus",
      attempts: 0,
    });
    expect(pending.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  test("retries on the fixed schedule and gives up after three attempts", () => {
    const { queue, transmitted, events, failures, lastCallback } = createQueue();

    queue.submit({ command: "flaky", projectPath: "/work" });
    queue.submit({ command: "next", projectPath: "/work" });

    lastCallback()(new Error("socket hang up"));
    expect(queue.peek()?.attempts).toBe(1);
    expect(queue.size).toBe(2);
    vi.advanceTimersByTime(999);
    expect(transmitted).toEqual(["flaky"]);
    vi.advanceTimersByTime(1);
    expect(transmitted).toEqual(["flaky", "flaky"]);

    lastCallback()(new Error("socket hang up"));
    expect(queue.peek()?.attempts).toBe(2);
    vi.advanceTimersByTime(2000);
    expect(transmitted).toEqual(["flaky", "flaky", "flaky"]);

    lastCallback()(new Error("socket hang up"));
    expect(failures).toHaveLength(1);
    expect(failures[0]?.kind).toBe("delivery_exhausted");
    expect(failures[0]?.message).toBe("Message failed after 3 attempts. Please try again.");
    expect(transmitted).toEqual(["flaky", "flaky", "flaky", "next"]);
    expect(events).toEqual([
      "begin:flaky",
      "retry:flaky:1000",
      "begin:flaky",
      "retry:flaky:2000",
      "begin:flaky",
      "begin:next",
    ]);
  });

  test("a command leaves the queue only on success or exhaustion", () => {
    const { queue, lastCallback } = createQueue();

    queue.submit({ command: "a", projectPath: "/work" });
    lastCallback()(new Error("boom"));
    expect(queue.size).toBe(1);
    vi.advanceTimersByTime(1000);
    lastCallback()();
    expect(queue.size).toBe(0);
    expect(queue.hasScheduledRetry).toBe(false);
  });

  test("reconnects before a retry when the link is down", () => {
    const { queue, link, transmitted, connect, lastCallback } = createQueue();

    queue.submit({ command: "a", projectPath: "/work" });
    lastCallback()(new Error("boom"));
    link.connected = false;

    vi.advanceTimersByTime(1000);
    expect(connect).toHaveBeenCalledTimes(1);
    expect(transmitted).toHaveLength(1);

    vi.advanceTimersByTime(300);
    expect(transmitted).toEqual(["a", "a"]);
  });

  test("holds the command without using a retry when no connection comes up", () => {
    const { queue, link, transmitted, failures, connect } = createQueue();
    link.canTransmit = false;
    link.connected = false;

    queue.submit({ command: "offline", projectPath: "/work" });
    expect(connect).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(500);
    expect(failures).toHaveLength(1);
    expect(failures[0]?.kind).toBe("transport");
    expect(queue.size).toBe(1);
    expect(queue.peek()?.attempts).toBe(0);
    expect(transmitted).toEqual([]);

    link.canTransmit = true;
    link.connected = true;
    queue.onConnected();
    expect(transmitted).toEqual(["offline"]);
  });

  test("sends after the grace delay when the connection starts in time", () => {
    const { queue, link, transmitted, failures } = createQueue();
    link.canTransmit = false;

    queue.submit({ command: "soon", projectPath: "/work" });
    link.canTransmit = true;
    vi.advanceTimersByTime(500);

    expect(transmitted).toEqual(["soon"]);
    expect(failures).toEqual([]);
  });

  test("a dropped connection re-sends the head without counting an attempt", () => {
    const { queue, transmitted } = createQueue();

    queue.submit({ command: "a", projectPath: "/work" });
    queue.onConnectionLost();
    queue.onConnected();

    expect(transmitted).toEqual(["a", "a"]);
    expect(queue.peek()?.attempts).toBe(0);
  });

  test("clear drops everything and cancels the retry", () => {
    const { queue, transmitted, lastCallback } = createQueue();

    queue.submit({ command: "a", projectPath: "/work" });
    queue.submit({ command: "b", projectPath: "/work" });
    lastCallback()(new Error("boom"));
    queue.clear();

    vi.advanceTimersByTime(10_000);
    expect(queue.size).toBe(0);
    expect(queue.hasScheduledRetry).toBe(false);
    expect(transmitted).toEqual(["a"]);
  });

  test("a serialization failure drops the command and moves on", () => {
    const { queue, failures, transmitted, lastCallback } = createQueue({ rejectCommand: "bad" });

    queue.submit({ command: "first", projectPath: "/work" });
    queue.submit({ command: "bad", projectPath: "/work" });
    queue.submit({ command: "last", projectPath: "/work" });
    lastCallback()();
    queue.onTurnEnded();

    expect(failures).toHaveLength(1);
    expect(failures[0]?.kind).toBe("protocol");
    expect(transmitted).toEqual(["first", "last"]);
    expect(queue.size).toBe(1);
  });
});
