import type { Logger } from "pino";
import { validateSessionId } from "../shared/session-id.js";
import type { ConnectionSupervisor } from "./connection-supervisor.js";
import type { BridgeEvent } from "./events.js";
import type { OutboundQueue } from "./outbound-queue.js";
import type { ProcessWatchdog } from "./process-watchdog.js";
import type { SerialExecutor } from "./serial-executor.js";
import type { SessionStateStore } from "./session-state.js";

export const RECOVERY_SETTLE_DELAY_MS = 200;
export const STATUS_CHECK_COMMAND = "/status";

export interface RecoveryTarget {
  sessionId: string;
  projectPath: string;
}

export interface SessionRecoveryOptions {
  executor: SerialExecutor;
  logger: Logger;
  state: SessionStateStore;
  supervisor: Pick<ConnectionSupervisor, "isConnected" | "canTransmit" | "connect" | "transmit">;
  watchdog: Pick<ProcessWatchdog, "arm" | "disarm">;
  queue: Pick<OutboundQueue, "markTurnOpen" | "onTurnEnded">;
  /** Serialized command frame scoped to the session. */
  buildCommandFrame: (command: string, target: RecoveryTarget) => string;
  emit: (event: BridgeEvent) => void;
  settleDelayMs?: number;
}

/**
 * Reattaches to a session the server may still be working on. The `/status`
 * check is a no-op command; its only purpose is to make the server flush
 * output produced while the client was away.
 */
export class SessionRecoveryCoordinator {
  private readonly logger: Logger;
  private pendingTarget: RecoveryTarget | null = null;
  private settleTimeout: ReturnType<typeof setTimeout> | null = null;

  constructor(private readonly options: SessionRecoveryOptions) {
    this.logger = options.logger.child({ module: "session-recovery" });
  }

  get pendingRecovery(): RecoveryTarget | null {
    return this.pendingTarget;
  }

  attachToSession(sessionId: string, projectPath: string): boolean {
    const { supervisor, state, watchdog, queue } = this.options;
    if (!supervisor.canTransmit) {
      this.logger.warn({ sessionId }, "Cannot reattach while disconnected");
      return false;
    }
    const validated = validateSessionId(sessionId);
    if (!validated) {
      this.logger.warn({ sessionId }, "Refusing to reattach to an invalid session id");
      return false;
    }

    const target: RecoveryTarget = { sessionId: validated, projectPath };
    let frame: string;
    try {
      frame = this.options.buildCommandFrame(STATUS_CHECK_COMMAND, target);
    } catch (error) {
      this.logger.error({ err: error }, "Failed to encode status check");
      return false;
    }

    this.logger.info({ sessionId: validated }, "Reattaching to session");
    state.update({
      isReattaching: true,
      isProcessing: true,
      sessionId: validated,
      lastError: null,
    });
    watchdog.arm();
    queue.markTurnOpen();

    supervisor.transmit(frame, (error) => {
      if (!error) {
        return;
      }
      this.logger.warn({ err: error, sessionId: validated }, "Status check failed");
      state.update({ isReattaching: false, isProcessing: false });
      watchdog.disarm();
      queue.onTurnEnded();
    });
    return true;
  }

  recoverFromBackground(sessionId: string, projectPath: string): void {
    if (this.options.supervisor.isConnected) {
      this.attachToSession(sessionId, projectPath);
      return;
    }
    this.pendingTarget = { sessionId, projectPath };
    this.logger.info({ sessionId }, "Reconnecting before reattach");
    this.options.supervisor.connect();
  }

  onConnected(): void {
    const target = this.pendingTarget;
    if (!target) {
      return;
    }
    this.clearSettleTimeout();
    this.settleTimeout = setTimeout(() => {
      this.options.executor.run("recovery.settle", () => {
        this.settleTimeout = null;
        if (this.pendingTarget !== target) {
          return;
        }
        this.pendingTarget = null;
        this.attachToSession(target.sessionId, target.projectPath);
      });
    }, this.options.settleDelayMs ?? RECOVERY_SETTLE_DELAY_MS);
  }

  confirmReattach(): void {
    const snapshot = this.options.state.get();
    if (!snapshot.isReattaching) {
      return;
    }
    this.options.state.update({ isReattaching: false });
    this.options.emit({ type: "session_attached", sessionId: snapshot.sessionId });
  }

  cancel(): void {
    this.pendingTarget = null;
    this.clearSettleTimeout();
  }

  private clearSettleTimeout(): void {
    if (this.settleTimeout) {
      clearTimeout(this.settleTimeout);
      this.settleTimeout = null;
    }
  }
}
