import { pino, type Logger } from "pino";
import { encodeImageAttachment } from "../shared/image-media-type.js";
import { BridgeError } from "../shared/errors.js";
import { serializeOutboundFrame, type PermissionMode } from "../shared/messages.js";
import type { AgentModel } from "../shared/models.js";
import { validateSessionId } from "../shared/session-id.js";
import { AttentionNotifications } from "./attention-notifications.js";
import { ApprovalProtocol } from "./approval-protocol.js";
import type { BridgeTransportFactory } from "./bridge-client-transport.js";
import { decodeMessageData } from "./bridge-client-transport.js";
import {
  alwaysForeground,
  noopHistoryWriter,
  type AppVisibility,
  type BridgeSettingsProvider,
  type LocalNotifier,
  type SessionHistoryWriter,
} from "./collaborators.js";
import {
  ConnectionSupervisor,
  type ConnectionState,
  type GenerationToken,
  type ReconnectPolicy,
} from "./connection-supervisor.js";
import type { BridgeEvent, BridgeEventListener } from "./events.js";
import { createWorkerPoolFrameDecoder, OrderedFrameJoiner, type FrameDecoder } from "./frame-decoder.js";
import { ModelSwitchProtocol } from "./model-switch.js";
import { MAX_SEND_ATTEMPTS, OutboundQueue, type PendingCommand } from "./outbound-queue.js";
import { describeStall, ProcessWatchdog, type WatchdogStall } from "./process-watchdog.js";
import { SerialExecutor } from "./serial-executor.js";
import { SessionRecoveryCoordinator } from "./session-recovery.js";
import { SessionStateStore, type SessionSnapshot, type SessionStateListener } from "./session-state.js";
import { StreamAssembler } from "./stream-assembler.js";

export const ABORT_TIMEOUT_MS = 3_000;

export interface BridgeClientConfig {
  settings: BridgeSettingsProvider;
  logger?: Logger;
  transportFactory?: BridgeTransportFactory;
  headers?: Record<string, string>;
  decoder?: FrameDecoder;
  history?: SessionHistoryWriter;
  notifier?: LocalNotifier;
  visibility?: AppVisibility;
  notificationsEnabled?: boolean;
  reconnectPolicy?: Partial<ReconnectPolicy>;
  random?: () => number;
  watchdogPollIntervalMs?: number;
  initialSessionId?: string | null;
}

export interface SendCommandInput {
  command: string;
  projectPath: string;
  /** Overrides the bound session for this command only. */
  resumeSessionId?: string | null;
  permissionMode?: PermissionMode;
  imageData?: Uint8Array;
  model?: string;
}

/**
 * Session client for the coding-agent bridge. All state changes run on one
 * serial executor; the components below never touch each other's state from
 * a timer or socket callback directly.
 */
export class BridgeClient {
  private readonly logger: Logger;
  private readonly executor: SerialExecutor;
  private readonly state: SessionStateStore;
  private readonly supervisor: ConnectionSupervisor;
  private readonly decoder: FrameDecoder;
  private readonly joiner: OrderedFrameJoiner<GenerationToken>;
  private readonly queue: OutboundQueue;
  private readonly watchdog: ProcessWatchdog;
  private readonly assembler: StreamAssembler;
  private readonly recovery: SessionRecoveryCoordinator;
  private readonly approvals: ApprovalProtocol;
  private readonly modelSwitch: ModelSwitchProtocol;
  private readonly attention: AttentionNotifications;
  private readonly history: SessionHistoryWriter;
  private readonly eventListeners = new Set<BridgeEventListener>();
  private abortTimeout: ReturnType<typeof setTimeout> | null = null;
  private lastProjectPath: string | null = null;

  constructor(private readonly config: BridgeClientConfig) {
    this.logger = (config.logger ?? pino({ level: "silent" })).child({ module: "bridge-client" });
    this.executor = new SerialExecutor(this.logger);
    this.history = config.history ?? noopHistoryWriter;
    this.state = new SessionStateStore(this.logger, {
      sessionId: validateSessionId(config.initialSessionId),
    });

    this.supervisor = new ConnectionSupervisor({
      resolveUrl: () => config.settings.getEndpointUrl(),
      executor: this.executor,
      logger: this.logger,
      transportFactory: config.transportFactory,
      headers: config.headers,
      reconnectPolicy: config.reconnectPolicy,
      random: config.random,
    });

    this.decoder = config.decoder ?? createWorkerPoolFrameDecoder();
    this.joiner = new OrderedFrameJoiner(this.decoder, (result) => {
      this.executor.run("frame.deliver", () => {
        if (!this.supervisor.isCurrent(result.tag)) {
          this.logger.debug("Dropped frame from a superseded connection");
          return;
        }
        if (result.error) {
          this.logger.warn({ err: result.error }, "Dropped undecodable frame");
          return;
        }
        this.assembler.handleDecoded(result.value);
      });
    });

    this.watchdog = new ProcessWatchdog({
      executor: this.executor,
      logger: this.logger,
      timeoutSeconds: () => config.settings.getProcessingTimeoutSeconds(),
      isInFlight: () => this.state.get().isProcessing,
      onStall: (stall) => this.handleStall(stall),
      pollIntervalMs: config.watchdogPollIntervalMs,
    });

    this.queue = new OutboundQueue({
      executor: this.executor,
      logger: this.logger,
      port: {
        canTransmit: () => this.supervisor.canTransmit,
        isConnected: () => this.supervisor.isConnected,
        connect: () => this.supervisor.connect(),
        transmit: (data, onResult) => this.supervisor.transmit(data, onResult),
        serialize: (command) => this.buildCommandFrame(command),
        beginTurn: (command) => this.beginTurn(command),
        reportRetry: (command, delayMs) => {
          this.state.update({
            lastError: `Send failed, retrying in ${Math.round(delayMs / 1000)}s (attempt ${command.attempts}/${MAX_SEND_ATTEMPTS})`,
          });
        },
        failTurn: (error) => this.failTurn(error),
      },
    });

    this.recovery = new SessionRecoveryCoordinator({
      executor: this.executor,
      logger: this.logger,
      state: this.state,
      supervisor: this.supervisor,
      watchdog: this.watchdog,
      queue: this.queue,
      buildCommandFrame: (command, target) => {
        this.lastProjectPath = target.projectPath;
        return this.serializeCommand(command, target.projectPath, target.sessionId);
      },
      emit: (event) => this.emit(event),
    });

    this.approvals = new ApprovalProtocol({
      logger: this.logger,
      state: this.state,
      supervisor: this.supervisor,
    });

    this.modelSwitch = new ModelSwitchProtocol({
      executor: this.executor,
      logger: this.logger,
      state: this.state,
      supervisor: this.supervisor,
      buildCommandFrame: (command, projectPath) =>
        this.serializeCommand(command, projectPath, this.state.get().sessionId),
      emit: (event) => this.emit(event),
    });

    this.assembler = new StreamAssembler({
      executor: this.executor,
      logger: this.logger,
      state: this.state,
      host: {
        emit: (event) => this.emit(event),
        bindSession: (sessionId) => this.bindSession(sessionId),
        confirmReattach: () => this.recovery.confirmReattach(),
        toolStarted: (name) => this.watchdog.noteTool(name),
        observeAssistantText: (text) => this.modelSwitch.observeText(text),
        completeModelSwitch: (text) => this.modelSwitch.completeTurn(text),
        cancelModelSwitch: () => this.modelSwitch.reset(),
        resetProcessing: () => this.resetProcessingState(),
        turnEnded: ({ finalText, kind }) => {
          this.watchdog.disarm();
          if (kind === "complete" && finalText && this.lastProjectPath) {
            this.history.recordAssistantTurn(this.lastProjectPath, finalText);
          }
          this.queue.onTurnEnded();
        },
      },
    });

    this.attention = new AttentionNotifications({
      logger: this.logger,
      notifier: config.notifier ?? null,
      visibility: config.visibility ?? alwaysForeground,
      enabled: config.notificationsEnabled ?? true,
      currentSessionId: () => this.state.get().sessionId,
    });

    this.supervisor.setHandlers({
      onFrame: (data, generation) => this.handleRawFrame(data, generation),
      onChannelLost: () => this.handleConnectionLost(),
      onConnected: () => {
        this.queue.onConnected();
        this.recovery.onConnected();
      },
    });
  }

  // ============================================================================
  // Connection
  // ============================================================================

  connect(): void {
    this.executor.run("connect", () => this.supervisor.connect());
  }

  disconnect(): void {
    this.executor.run("disconnect", () => {
      this.recovery.cancel();
      this.supervisor.disconnect();
      this.resetProcessingState();
    });
  }

  /** Disconnects and releases the decode workers. */
  async close(): Promise<void> {
    this.disconnect();
    await this.decoder.close();
  }

  getConnectionState(): ConnectionState {
    return this.supervisor.getConnectionState();
  }

  subscribeConnectionStatus(listener: (state: ConnectionState) => void): () => void {
    return this.supervisor.subscribeConnectionStatus(listener);
  }

  get isConnected(): boolean {
    return this.supervisor.isConnected;
  }

  // ============================================================================
  // State & events
  // ============================================================================

  getSnapshot(): SessionSnapshot {
    return this.state.get();
  }

  get sessionId(): string | null {
    return this.state.get().sessionId;
  }

  get isProcessing(): boolean {
    return this.state.get().isProcessing;
  }

  get lastError(): string | null {
    return this.state.get().lastError ?? this.supervisor.lastError;
  }

  get pendingCommandCount(): number {
    return this.queue.size;
  }

  subscribe(listener: BridgeEventListener): () => void {
    this.eventListeners.add(listener);
    return () => {
      this.eventListeners.delete(listener);
    };
  }

  subscribeState(listener: SessionStateListener): () => void {
    return this.state.subscribe(listener);
  }

  // ============================================================================
  // Commands
  // ============================================================================

  sendCommand(input: SendCommandInput): void {
    this.executor.run("sendCommand", () => {
      this.lastProjectPath = input.projectPath;
      this.queue.submit({
        command: input.command,
        projectPath: input.projectPath,
        sessionId: input.resumeSessionId ?? null,
        permissionMode: input.permissionMode,
        imageData: input.imageData,
        model: input.model,
      });
    });
  }

  abortSession(): void {
    this.executor.run("abortSession", () => {
      const snapshot = this.state.get();
      if (snapshot.isAborting) {
        return;
      }
      const sessionId = validateSessionId(snapshot.sessionId);
      if (!sessionId) {
        this.resetProcessingState();
        this.emit({ type: "aborted" });
        return;
      }

      this.state.update({ isAborting: true });
      this.abortTimeout = setTimeout(() => {
        this.executor.run("abort.timeout", () => {
          this.abortTimeout = null;
          if (this.state.get().isAborting) {
            this.logger.warn({ sessionId }, "No abort confirmation, resetting locally");
            this.forceAborted();
          }
        });
      }, ABORT_TIMEOUT_MS);

      this.supervisor.transmit(
        serializeOutboundFrame({ type: "abort-session", sessionId, provider: "claude" }),
        (error) => {
          if (error && this.state.get().isAborting) {
            this.logger.warn({ err: error, sessionId }, "Abort send failed, resetting locally");
            this.forceAborted();
          }
        }
      );
    });
  }

  /** Local equivalent of `/clear`: the next command starts a fresh session. */
  clearSession(): void {
    this.executor.run("clearSession", () => {
      this.state.update({ sessionId: null });
      if (this.lastProjectPath) {
        this.history.clearSessionId(this.lastProjectPath);
      }
    });
  }

  // ============================================================================
  // Recovery
  // ============================================================================

  attachToSession(sessionId: string, projectPath: string): void {
    this.executor.run("attachToSession", () => {
      this.recovery.attachToSession(sessionId, projectPath);
    });
  }

  recoverFromBackground(sessionId: string, projectPath: string): void {
    this.executor.run("recoverFromBackground", () => {
      this.recovery.recoverFromBackground(sessionId, projectPath);
    });
  }

  // ============================================================================
  // Interactive sub-protocols
  // ============================================================================

  respondToApproval(requestId: string, allow: boolean, alwaysAllow = false): void {
    this.executor.run("respondToApproval", () => {
      this.approvals.respond(requestId, allow, alwaysAllow);
    });
  }

  approvePendingRequest(alwaysAllow = false): void {
    this.executor.run("approvePendingRequest", () => {
      this.approvals.approvePending(alwaysAllow);
    });
  }

  denyPendingRequest(): void {
    this.executor.run("denyPendingRequest", () => {
      this.approvals.denyPending();
    });
  }

  switchModel(model: AgentModel, options: { customModelId?: string; projectPath?: string } = {}): void {
    this.executor.run("switchModel", () => {
      const projectPath = options.projectPath ?? this.lastProjectPath;
      if (!projectPath) {
        this.logger.warn({ model }, "Model switch needs a project path");
        return;
      }
      this.modelSwitch.switchModel(model, projectPath, options.customModelId);
    });
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private emit(event: BridgeEvent): void {
    for (const listener of this.eventListeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn({ err: error, event: event.type }, "Event listener threw");
      }
    }
    this.attention.handle(event);
  }

  private handleRawFrame(data: unknown, generation: GenerationToken): void {
    this.watchdog.touch();
    const raw = decodeMessageData(data);
    if (raw === null) {
      this.logger.warn("Dropped frame with unreadable payload");
      return;
    }
    this.joiner.push(raw, generation);
  }

  private handleConnectionLost(): void {
    this.state.update({
      isProcessing: false,
      isReattaching: false,
      lastActiveToolName: null,
    });
    this.watchdog.disarm();
    this.assembler.reset();
    this.modelSwitch.reset();
    this.queue.onConnectionLost();
  }

  private handleStall(stall: WatchdogStall): void {
    const message = describeStall(stall);
    this.state.update({
      isProcessing: false,
      isReattaching: false,
      lastActiveToolName: null,
      lastError: message,
    });
    this.assembler.reset();
    this.emit({ type: "error", error: new BridgeError({ kind: "timeout", message }) });
    this.queue.onTurnEnded();
  }

  private beginTurn(command: PendingCommand): void {
    this.assembler.reset();
    this.state.update({ isProcessing: true, lastError: null, lastActiveToolName: null });
    this.watchdog.arm();
    this.lastProjectPath = command.projectPath;
  }

  private failTurn(error: BridgeError): void {
    this.state.update({ isProcessing: false, lastError: error.message });
    this.watchdog.disarm();
    this.emit({ type: "error", error });
  }

  private bindSession(sessionId: string): void {
    const normalized = validateSessionId(sessionId);
    if (!normalized) {
      this.logger.warn({ sessionId }, "Server sent a session id that is not a UUID");
    }
    const bound = normalized ?? sessionId;
    this.state.update({ sessionId: bound });
    if (this.lastProjectPath) {
      this.history.saveSessionId(this.lastProjectPath, bound);
    }
  }

  private buildCommandFrame(command: PendingCommand): string {
    return this.serializeCommand(
      command.command,
      command.projectPath,
      command.sessionId ?? this.state.get().sessionId,
      command
    );
  }

  private serializeCommand(
    command: string,
    projectPath: string,
    sessionId: string | null,
    extras: Pick<PendingCommand, "imageData" | "model" | "permissionMode"> = {}
  ): string {
    const validated = validateSessionId(sessionId);
    if (sessionId && !validated) {
      this.logger.warn({ sessionId }, "Dropping invalid session id from outbound command");
    }
    return serializeOutboundFrame({
      type: "claude-command",
      command,
      options: {
        cwd: projectPath,
        sessionId: validated ?? undefined,
        model: extras.model,
        permissionMode: extras.permissionMode,
        images: extras.imageData ? [encodeImageAttachment(extras.imageData)] : undefined,
      },
    });
  }

  private forceAborted(): void {
    this.resetProcessingState();
    this.emit({ type: "aborted" });
  }

  private resetProcessingState(): void {
    if (this.abortTimeout) {
      clearTimeout(this.abortTimeout);
      this.abortTimeout = null;
    }
    this.state.update({
      isProcessing: false,
      isAborting: false,
      isReattaching: false,
      lastActiveToolName: null,
      pendingApproval: null,
      lastError: null,
    });
    this.modelSwitch.reset();
    this.assembler.reset();
    this.watchdog.disarm();
    this.queue.clear();
  }
}
