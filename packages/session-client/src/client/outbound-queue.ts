import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";
import { BridgeError } from "../shared/errors.js";
import type { SerialExecutor } from "./serial-executor.js";
import type { TransmitCallback } from "./connection-supervisor.js";
import type { PermissionMode } from "../shared/messages.js";

export const MAX_SEND_ATTEMPTS = 3;
export const RETRY_DELAYS_MS: readonly number[] = [1000, 2000, 4000];
export const CONNECT_GRACE_MS = 500;
export const RETRY_CONNECT_SETTLE_MS = 300;

export interface CommandInput {
  command: string;
  projectPath: string;
  sessionId?: string | null;
  permissionMode?: PermissionMode;
  imageData?: Uint8Array;
  model?: string;
}

export interface PendingCommand {
  readonly id: string;
  readonly command: string;
  readonly projectPath: string;
  readonly sessionId: string | null;
  readonly permissionMode?: PermissionMode;
  readonly imageData?: Uint8Array;
  readonly model?: string;
  attempts: number;
  readonly createdAt: Date;
}

/** What the queue needs from the rest of the client. */
export interface OutboundQueuePort {
  canTransmit(): boolean;
  isConnected(): boolean;
  connect(): void;
  transmit(data: string, onResult: TransmitCallback): void;
  /** Builds the wire frame; the queue owns retries, not serialization. */
  serialize(command: PendingCommand): string;
  beginTurn(command: PendingCommand): void;
  reportRetry(command: PendingCommand, delayMs: number, error: Error): void;
  failTurn(error: BridgeError): void;
}

export interface OutboundQueueOptions {
  executor: SerialExecutor;
  logger: Logger;
  port: OutboundQueuePort;
  now?: () => Date;
}

/**
 * FIFO of commands with at most one turn open. Send success removes the head;
 * the next command waits for the turn to end.
 */
export class OutboundQueue {
  private readonly logger: Logger;
  private readonly executor: SerialExecutor;
  private readonly port: OutboundQueuePort;
  private readonly now: () => Date;
  private readonly queue: PendingCommand[] = [];
  private turnOpen = false;
  private sendInFlight = false;
  private retryTimeout: ReturnType<typeof setTimeout> | null = null;
  private graceTimeout: ReturnType<typeof setTimeout> | null = null;

  constructor(options: OutboundQueueOptions) {
    this.logger = options.logger.child({ module: "outbound-queue" });
    this.executor = options.executor;
    this.port = options.port;
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.queue.length;
  }

  get isTurnOpen(): boolean {
    return this.turnOpen;
  }

  get hasScheduledRetry(): boolean {
    return this.retryTimeout !== null;
  }

  peek(): PendingCommand | undefined {
    return this.queue[0];
  }

  list(): readonly PendingCommand[] {
    return this.queue;
  }

  submit(input: CommandInput): PendingCommand {
    const pending: PendingCommand = {
      id: uuidv4(),
      command: input.command,
      projectPath: input.projectPath,
      sessionId: input.sessionId ?? null,
      permissionMode: input.permissionMode,
      imageData: input.imageData,
      model: input.model,
      attempts: 0,
      createdAt: this.now(),
    };
    this.queue.push(pending);
    this.logger.debug({ commandId: pending.id, queued: this.queue.length }, "Command queued");
    if (this.queue.length === 1) {
      this.sendNext();
    }
    return pending;
  }

  /** Marks a turn open that did not come from the queue (reattach). */
  markTurnOpen(): void {
    this.turnOpen = true;
  }

  /** Turn reached complete/error/abort/stall. */
  onTurnEnded(): void {
    this.turnOpen = false;
    this.sendNext();
  }

  /** The current generation died; whatever was in flight on it is abandoned. */
  onConnectionLost(): void {
    this.turnOpen = false;
    this.sendInFlight = false;
    this.clearGraceTimeout();
  }

  onConnected(): void {
    if (this.queue.length > 0 && !this.turnOpen && !this.retryTimeout) {
      this.sendNext();
    }
  }

  clear(): void {
    this.queue.length = 0;
    this.turnOpen = false;
    this.sendInFlight = false;
    this.clearRetryTimeout();
    this.clearGraceTimeout();
  }

  sendNext(): void {
    const head = this.queue[0];
    if (!head || this.turnOpen || this.sendInFlight || this.graceTimeout) {
      return;
    }
    this.clearRetryTimeout();

    if (!this.port.canTransmit()) {
      this.port.connect();
      this.graceTimeout = setTimeout(() => {
        this.executor.run("outbound.grace", () => {
          this.graceTimeout = null;
          if (this.queue[0] !== head) {
            return;
          }
          if (this.port.canTransmit()) {
            this.sendNext();
            return;
          }
          // No retry is consumed; the command goes out on the next connect.
          this.logger.warn({ commandId: head.id }, "Not connected, command held");
          this.port.failTurn(
            new BridgeError({
              kind: "transport",
              message: "Not connected - message will be sent when the connection is restored",
            })
          );
        });
      }, CONNECT_GRACE_MS);
      return;
    }

    let data: string;
    try {
      data = this.port.serialize(head);
    } catch (error) {
      this.logger.error({ err: error, commandId: head.id }, "Failed to serialize command");
      this.queue.shift();
      this.port.failTurn(
        new BridgeError({ kind: "protocol", message: "Failed to encode message", cause: error })
      );
      this.sendNext();
      return;
    }

    this.turnOpen = true;
    this.sendInFlight = true;
    this.port.beginTurn(head);
    this.port.transmit(data, (error) => {
      this.sendInFlight = false;
      if (this.queue[0] !== head) {
        return;
      }
      if (error) {
        this.handleSendFailure(head, error);
        return;
      }
      this.queue.shift();
      if (this.queue.length === 0) {
        this.clearRetryTimeout();
      }
      this.logger.debug({ commandId: head.id, attempts: head.attempts + 1 }, "Command sent");
    });
  }

  private handleSendFailure(head: PendingCommand, error: Error): void {
    head.attempts += 1;
    this.turnOpen = false;

    if (head.attempts >= MAX_SEND_ATTEMPTS) {
      this.queue.shift();
      this.logger.error({ commandId: head.id, attempts: head.attempts, err: error }, "Command delivery exhausted");
      this.port.failTurn(
        new BridgeError({
          kind: "delivery_exhausted",
          message: `Message failed after ${MAX_SEND_ATTEMPTS} attempts. Please try again.`,
          cause: error,
        })
      );
      if (this.queue.length === 0) {
        this.clearRetryTimeout();
      }
      this.sendNext();
      return;
    }

    const delayMs = RETRY_DELAYS_MS[head.attempts - 1] ?? RETRY_DELAYS_MS[RETRY_DELAYS_MS.length - 1] ?? 0;
    this.logger.warn({ commandId: head.id, attempts: head.attempts, delayMs, err: error }, "Send failed, retrying");
    this.port.reportRetry(head, delayMs, error);

    this.retryTimeout = setTimeout(() => {
      this.executor.run("outbound.retry", () => {
        this.retryTimeout = null;
        if (this.queue[0] !== head) {
          return;
        }
        if (this.port.isConnected()) {
          this.sendNext();
          return;
        }
        this.port.connect();
        this.retryTimeout = setTimeout(() => {
          this.executor.run("outbound.retry.settle", () => {
            this.retryTimeout = null;
            if (this.queue[0] === head) {
              this.sendNext();
            }
          });
        }, RETRY_CONNECT_SETTLE_MS);
      });
    }, delayMs);
  }

  private clearRetryTimeout(): void {
    if (this.retryTimeout) {
      clearTimeout(this.retryTimeout);
      this.retryTimeout = null;
    }
  }

  private clearGraceTimeout(): void {
    if (this.graceTimeout) {
      clearTimeout(this.graceTimeout);
      this.graceTimeout = null;
    }
  }
}
