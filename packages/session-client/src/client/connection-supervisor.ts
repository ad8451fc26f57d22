import type { Logger } from "pino";
import {
  createWebSocketTransportFactory,
  describeTransportClose,
  describeTransportError,
  type BridgeTransport,
  type BridgeTransportFactory,
} from "./bridge-client-transport.js";
import { describeUnknownError } from "../shared/errors.js";
import type { SerialExecutor } from "./serial-executor.js";

export type ConnectionState =
  | { status: "disconnected" }
  | { status: "connecting" }
  | { status: "connected" }
  | { status: "reconnecting"; attempt: number };

/**
 * Epoch marker for one physical connection attempt. Compared by identity.
 */
export interface GenerationToken {
  readonly serial: number;
}

export interface ReconnectPolicy {
  baseDelayMs: number;
  /** Exponent stops growing after this many doublings. */
  maxExponent: number;
  jitterMs: number;
}

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
  baseDelayMs: 1000,
  maxExponent: 3,
  jitterMs: 500,
};

export const DEFAULT_SEND_QUEUE_TIMEOUT_MS = 10_000;

export function computeReconnectDelay(
  attempt: number,
  random: () => number = Math.random,
  policy: ReconnectPolicy = DEFAULT_RECONNECT_POLICY
): number {
  const exponent = Math.min(Math.max(attempt, 1) - 1, policy.maxExponent);
  return policy.baseDelayMs * 2 ** exponent + random() * policy.jitterMs;
}

export type TransmitCallback = (error?: Error) => void;

type PendingSend = {
  data: string;
  onResult: TransmitCallback;
  timeoutHandle: ReturnType<typeof setTimeout>;
};

export interface ConnectionSupervisorOptions {
  resolveUrl: () => string | null;
  executor: SerialExecutor;
  logger: Logger;
  transportFactory?: BridgeTransportFactory;
  headers?: Record<string, string>;
  reconnectPolicy?: Partial<ReconnectPolicy>;
  random?: () => number;
  sendQueueTimeoutMs?: number;
}

export interface ConnectionSupervisorHandlers {
  /** Raw frame from the current generation. */
  onFrame: (data: unknown, generation: GenerationToken) => void;
  /**
   * The current generation's channel is gone, through a failure or a restart;
   * in-flight state must be dropped.
   */
  onChannelLost: (reason: string) => void;
  onConnected: () => void;
}

export class ConnectionSupervisor {
  private readonly logger: Logger;
  private readonly executor: SerialExecutor;
  private readonly transportFactory: BridgeTransportFactory;
  private readonly policy: ReconnectPolicy;
  private readonly random: () => number;
  private readonly sendQueueTimeoutMs: number;
  private readonly connectionListeners = new Set<(state: ConnectionState) => void>();
  private handlers: ConnectionSupervisorHandlers | null = null;
  private transport: BridgeTransport | null = null;
  private transportCleanup: Array<() => void> = [];
  private pendingSendQueue: PendingSend[] = [];
  private reconnectTimeout: ReturnType<typeof setTimeout> | null = null;
  private reconnectAttempt = 0;
  private generationSerial = 0;
  private generation: GenerationToken = { serial: 0 };
  private connectionState: ConnectionState = { status: "disconnected" };
  private lastErrorValue: string | null = null;

  constructor(private readonly options: ConnectionSupervisorOptions) {
    this.logger = options.logger.child({ module: "connection-supervisor" });
    this.executor = options.executor;
    this.transportFactory = options.transportFactory ?? createWebSocketTransportFactory();
    this.policy = { ...DEFAULT_RECONNECT_POLICY, ...options.reconnectPolicy };
    this.random = options.random ?? Math.random;
    this.sendQueueTimeoutMs = options.sendQueueTimeoutMs ?? DEFAULT_SEND_QUEUE_TIMEOUT_MS;
  }

  setHandlers(handlers: ConnectionSupervisorHandlers): void {
    this.handlers = handlers;
  }

  // ============================================================================
  // Generation
  // ============================================================================

  get currentGeneration(): GenerationToken {
    return this.generation;
  }

  isCurrent(token: GenerationToken): boolean {
    return token === this.generation;
  }

  /**
   * Wraps a continuation so it only runs, on the serial executor, while the
   * generation captured now is still current.
   */
  guard<Args extends unknown[]>(
    label: string,
    callback: (...args: Args) => void
  ): (...args: Args) => void {
    const token = this.generation;
    return (...args: Args) => {
      this.executor.run(label, () => {
        if (!this.isCurrent(token)) {
          this.logger.debug({ label, stale: token.serial, current: this.generation.serial }, "Dropped stale callback");
          return;
        }
        callback(...args);
      });
    };
  }

  private mintGeneration(): GenerationToken {
    this.generationSerial += 1;
    this.generation = { serial: this.generationSerial };
    return this.generation;
  }

  // ============================================================================
  // Connection
  // ============================================================================

  connect(): void {
    this.clearReconnectTimeout();

    const url = this.options.resolveUrl();
    if (!url) {
      this.lastErrorValue = "Invalid WebSocket URL";
      this.logger.warn("Cannot connect without an endpoint URL");
      this.retireTransport("Invalid WebSocket URL", 1000, "Client closed");
      this.updateConnectionState({ status: "disconnected" });
      return;
    }

    this.retireTransport("Connection restarted");

    if (this.connectionState.status !== "reconnecting") {
      this.updateConnectionState({ status: "connecting" });
    }

    let transport: BridgeTransport;
    try {
      transport = this.transportFactory({ url, headers: this.options.headers });
    } catch (error) {
      this.handleReceiveFailure(`Failed to connect: ${describeUnknownError(error)}`);
      return;
    }
    this.transport = transport;

    this.transportCleanup = [
      transport.onMessage(
        this.guard("transport.message", (data: unknown) => {
          if (this.connectionState.status !== "connected") {
            this.markConnected("first_frame");
          }
          this.handlers?.onFrame(data, this.generation);
        })
      ),
      transport.onClose(
        this.guard("transport.close", (event?: unknown) => {
          this.handleReceiveFailure(describeTransportClose(event));
        })
      ),
      transport.onError(
        this.guard("transport.error", (event?: unknown) => {
          this.handleReceiveFailure(describeTransportError(event));
        })
      ),
    ];

    transport.ping(
      this.guard("transport.ping", (error?: Error) => {
        if (error) {
          this.logger.debug({ err: error }, "Liveness ping failed");
          return;
        }
        this.markConnected("ping");
      })
    );
  }

  /** Ends the current generation. A channel that was still up takes its in-flight state with it. */
  private retireTransport(reason: string, code?: number, closeReason?: string): void {
    const hadTransport = this.transport !== null;
    this.mintGeneration();
    this.disposeTransport(code, closeReason);
    if (!hadTransport) {
      return;
    }
    this.logger.info({ reason, status: this.connectionState.status }, "Replacing connection");
    this.dropPendingSendQueue();
    this.handlers?.onChannelLost(reason);
  }

  /** Terminal until the next connect(). */
  disconnect(): void {
    this.clearReconnectTimeout();
    this.reconnectAttempt = 0;
    this.mintGeneration();
    this.disposeTransport(1000, "Client closed");
    this.dropPendingSendQueue();
    this.updateConnectionState({ status: "disconnected" });
  }

  getConnectionState(): ConnectionState {
    return this.connectionState;
  }

  subscribeConnectionStatus(listener: (state: ConnectionState) => void): () => void {
    this.connectionListeners.add(listener);
    listener(this.connectionState);
    return () => {
      this.connectionListeners.delete(listener);
    };
  }

  get isConnected(): boolean {
    return this.connectionState.status === "connected";
  }

  /** Connected, or a transport exists that is still opening. */
  get canTransmit(): boolean {
    if (this.connectionState.status === "connected") {
      return this.transport !== null;
    }
    return this.transport !== null && this.connectionState.status !== "disconnected";
  }

  get lastError(): string | null {
    return this.lastErrorValue;
  }

  get isReconnectScheduled(): boolean {
    return this.reconnectTimeout !== null;
  }

  private markConnected(via: "ping" | "first_frame"): void {
    if (this.connectionState.status === "connected") {
      return;
    }
    this.reconnectAttempt = 0;
    this.lastErrorValue = null;
    this.logger.info({ via }, "Connected");
    this.updateConnectionState({ status: "connected" });
    this.flushPendingSendQueue();
    this.handlers?.onConnected();
  }

  private handleReceiveFailure(reason: string): void {
    if (this.connectionState.status === "disconnected") {
      return;
    }
    this.lastErrorValue = reason;
    this.logger.warn({ reason }, "Connection lost");
    // Frames still decoding from the dead channel must not land after the reset.
    this.mintGeneration();
    this.disposeTransport();
    this.dropPendingSendQueue();
    this.handlers?.onChannelLost(reason);
    this.scheduleReconnect(reason);
  }

  private scheduleReconnect(reason: string): void {
    if (this.reconnectTimeout) {
      this.logger.debug({ reason }, "Reconnect already scheduled");
      return;
    }

    this.reconnectAttempt += 1;
    const attempt = this.reconnectAttempt;
    const delayMs = computeReconnectDelay(attempt, this.random, this.policy);
    this.logger.info({ attempt, delayMs: Math.round(delayMs), reason }, "Scheduling reconnect");
    this.updateConnectionState({ status: "reconnecting", attempt });

    this.reconnectTimeout = setTimeout(() => {
      this.executor.run("reconnect", () => {
        this.reconnectTimeout = null;
        if (this.connectionState.status === "connected") {
          return;
        }
        this.connect();
      });
    }, delayMs);
  }

  private clearReconnectTimeout(): void {
    if (this.reconnectTimeout) {
      clearTimeout(this.reconnectTimeout);
      this.reconnectTimeout = null;
    }
  }

  private updateConnectionState(next: ConnectionState): void {
    const previous = this.connectionState;
    if (
      previous.status === next.status &&
      (previous.status !== "reconnecting" ||
        next.status !== "reconnecting" ||
        previous.attempt === next.attempt)
    ) {
      return;
    }
    this.connectionState = next;
    for (const listener of this.connectionListeners) {
      try {
        listener(next);
      } catch (error) {
        this.logger.warn({ err: error }, "Connection listener threw");
      }
    }
  }

  private disposeTransport(code = 1001, reason = "Reconnecting"): void {
    this.cleanupTransport();
    const transport = this.transport;
    this.transport = null;
    if (transport) {
      try {
        transport.close(code, reason);
      } catch {
        // no-op
      }
    }
  }

  private cleanupTransport(): void {
    for (const cleanup of this.transportCleanup) {
      try {
        cleanup();
      } catch {
        // no-op
      }
    }
    this.transportCleanup = [];
  }

  // ============================================================================
  // Transmit
  // ============================================================================

  /**
   * Sends a serialized frame. The result callback is tagged with the current
   * generation: if the connection is replaced before the send completes, it
   * never fires.
   */
  transmit(data: string, onResult: TransmitCallback): void {
    const guarded = this.guard("transport.send", onResult);

    if (this.transport && this.connectionState.status === "connected") {
      this.sendNow(this.transport, data, guarded);
      return;
    }

    if (this.canTransmit) {
      const timeoutHandle = setTimeout(() => {
        const index = this.pendingSendQueue.findIndex((pending) => pending.timeoutHandle === timeoutHandle);
        if (index !== -1) {
          this.pendingSendQueue.splice(index, 1);
        }
        guarded(new Error("Timed out waiting for connection to send message"));
      }, this.sendQueueTimeoutMs);
      this.pendingSendQueue.push({ data, onResult: guarded, timeoutHandle });
      return;
    }

    guarded(new Error(`Transport not connected (status: ${this.connectionState.status})`));
  }

  private sendNow(transport: BridgeTransport, data: string, onResult: TransmitCallback): void {
    try {
      transport.send(data, onResult);
    } catch (error) {
      onResult(error instanceof Error ? error : new Error(String(error)));
    }
  }

  private flushPendingSendQueue(): void {
    const queue = this.pendingSendQueue;
    this.pendingSendQueue = [];
    for (const pending of queue) {
      clearTimeout(pending.timeoutHandle);
      if (this.transport) {
        this.sendNow(this.transport, pending.data, pending.onResult);
      } else {
        pending.onResult(new Error("Connection lost before message could be sent"));
      }
    }
  }

  // Queued sends belong to the generation that just ended; their callbacks are stale.
  private dropPendingSendQueue(): void {
    for (const pending of this.pendingSendQueue) {
      clearTimeout(pending.timeoutHandle);
    }
    this.pendingSendQueue = [];
  }
}
