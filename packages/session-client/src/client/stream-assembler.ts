import type { Logger } from "pino";
import { toApprovalRequest } from "../shared/approval.js";
import { ASK_USER_QUESTION_TOOL, parseAskUserQuestion } from "../shared/ask-user-question.js";
import { BridgeError } from "../shared/errors.js";
import {
  AgentPayloadSchema,
  ContentBlockSchema,
  extractToolResultText,
  InboundFrameSchema,
  PermissionRequestDataSchema,
  SessionsUpdatedDataSchema,
  TokenBudgetSchema,
  type AgentPayload,
  type InboundFrame,
  type ToolUseBlock,
} from "../shared/messages.js";
import { parseModelFromId } from "../shared/models.js";
import { isSessionInvalidationError } from "../shared/session-errors.js";
import { summarizeToolInput } from "../shared/stringify-value.js";
import type { BridgeEvent } from "./events.js";
import type { SerialExecutor } from "./serial-executor.js";
import type { SessionStateStore } from "./session-state.js";

export const TEXT_FLUSH_DELAY_MS = 50;

export const SESSION_EXPIRED_MESSAGE = "Session expired, starting fresh...";

export interface StreamAssemblerHost {
  emit(event: BridgeEvent): void;
  bindSession(sessionId: string): void;
  /** Exits the reattaching sub-state if it is active. */
  confirmReattach(): void;
  toolStarted(name: string): void;
  observeAssistantText(text: string): void;
  completeModelSwitch(finalText: string): void;
  /** A failed turn cannot confirm a model switch. */
  cancelModelSwitch(): void;
  /** Full local reset used by aborts. */
  resetProcessing(): void;
  turnEnded(outcome: { finalText: string; kind: "complete" | "error" | "aborted" }): void;
}

export interface StreamAssemblerOptions {
  executor: SerialExecutor;
  logger: Logger;
  state: SessionStateStore;
  host: StreamAssemblerHost;
  flushDelayMs?: number;
}

/**
 * Turns decoded frames into client events. Text deltas accumulate in a buffer
 * that is published as `currentText` after a short quiet period, before any
 * tool call, and on every terminal frame.
 */
export class StreamAssembler {
  private readonly logger: Logger;
  private readonly state: SessionStateStore;
  private readonly host: StreamAssemblerHost;
  private readonly flushDelayMs: number;
  private textBuffer = "";
  /** Segments committed ahead of tool calls in the current turn. */
  private committedSegments: string[] = [];
  private flushTimeout: ReturnType<typeof setTimeout> | null = null;

  constructor(private readonly options: StreamAssemblerOptions) {
    this.logger = options.logger.child({ module: "stream-assembler" });
    this.state = options.state;
    this.host = options.host;
    this.flushDelayMs = options.flushDelayMs ?? TEXT_FLUSH_DELAY_MS;
  }

  get bufferedText(): string {
    return this.textBuffer;
  }

  /** Drops the buffer, the turn's committed text and the visible text without emitting anything. */
  reset(): void {
    this.cancelScheduledFlush();
    this.textBuffer = "";
    this.committedSegments = [];
    this.state.update({ currentText: "" });
  }

  handleDecoded(value: unknown): void {
    const parsed = InboundFrameSchema.safeParse(value);
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues }, "Dropped malformed frame");
      return;
    }
    this.handleFrame(parsed.data);
  }

  handleFrame(frame: InboundFrame): void {
    switch (frame.type) {
      case "session-created":
        this.handleSessionCreated(frame);
        return;
      case "claude-response":
        this.handleResponse(frame);
        return;
      case "token-budget":
        this.handleTokenBudget(frame);
        return;
      case "claude-complete":
        this.handleComplete(frame);
        return;
      case "claude-error":
        this.handleError(frame);
        return;
      case "session-aborted":
        this.handleAborted();
        return;
      case "permission-request":
        this.handlePermissionRequest(frame);
        return;
      case "sessions-updated":
        this.handleSessionsUpdated(frame);
        return;
      case "projects_updated":
        this.host.emit({ type: "projects_updated" });
        return;
      default:
        this.logger.debug({ type: frame.type }, "Ignored frame of unknown type");
    }
  }

  // ============================================================================
  // Frames
  // ============================================================================

  private handleSessionCreated(frame: InboundFrame): void {
    if (!frame.sessionId) {
      this.logger.warn("session-created frame without a session id");
      return;
    }
    this.host.bindSession(frame.sessionId);
    this.host.emit({ type: "session_created", sessionId: frame.sessionId });
  }

  private handleResponse(frame: InboundFrame): void {
    this.host.confirmReattach();

    const parsed = AgentPayloadSchema.safeParse(frame.data);
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues }, "Dropped malformed response payload");
      return;
    }
    const payload = parsed.data;

    if (payload.type === "assistant" && payload.message) {
      this.processContent(payload.message.content);
      return;
    }

    switch (payload.type) {
      case undefined:
        if (payload.content !== undefined) {
          this.processContent(payload.content);
        }
        return;
      case "system":
        this.handleSystemPayload(payload);
        return;
      case "assistant":
        this.processContent(payload.content);
        return;
      case "user":
        this.handleUserPayload(payload);
        return;
      case "result":
        return;
      default:
        this.logger.debug({ payloadType: payload.type }, "Ignored response payload");
    }
  }

  private handleSystemPayload(payload: AgentPayload): void {
    if (payload.subtype !== "init") {
      return;
    }
    if (payload.session_id && !this.state.get().sessionId) {
      this.host.bindSession(payload.session_id);
    }
    if (payload.model) {
      this.state.update({
        currentModel: parseModelFromId(payload.model),
        currentModelId: payload.model,
      });
    }
  }

  private handleUserPayload(payload: AgentPayload): void {
    const content = payload.message?.content ?? payload.content;
    if (!Array.isArray(content)) {
      return;
    }
    for (const raw of content) {
      const block = ContentBlockSchema.safeParse(raw);
      if (block.success && block.data.type === "tool_result") {
        this.host.emit({
          type: "tool_result",
          toolUseId: block.data.tool_use_id ?? null,
          content: extractToolResultText(block.data.content),
          isError: block.data.is_error ?? false,
        });
      }
    }
  }

  private processContent(content: unknown): void {
    if (typeof content === "string") {
      this.appendText(content);
      return;
    }
    if (!Array.isArray(content)) {
      return;
    }

    for (const raw of content) {
      const parsed = ContentBlockSchema.safeParse(raw);
      if (!parsed.success) {
        this.logger.debug({ block: raw }, "Skipped unrecognized content block");
        continue;
      }
      const block = parsed.data;
      switch (block.type) {
        case "text":
          if (block.text) {
            this.appendText(block.text);
          }
          break;
        case "tool_use":
          this.handleToolUse(block);
          break;
        case "tool_result":
          this.host.emit({
            type: "tool_result",
            toolUseId: block.tool_use_id ?? null,
            content: extractToolResultText(block.content),
            isError: block.is_error ?? false,
          });
          break;
        case "thinking":
          if (block.thinking) {
            this.host.emit({ type: "thinking", text: block.thinking });
          }
          break;
      }
    }
  }

  private handleToolUse(block: ToolUseBlock): void {
    this.commitText();

    const name = block.name ?? "tool";
    const input = block.input ?? {};
    this.state.update({ lastActiveToolName: name });
    this.host.toolStarted(name);

    if (name === ASK_USER_QUESTION_TOOL) {
      const request = parseAskUserQuestion({ toolUseId: block.id, input });
      if (request) {
        this.host.emit({ type: "question", request });
        return;
      }
    }

    this.host.emit({
      type: "tool_use",
      toolUseId: block.id ?? null,
      name,
      input,
      summary: summarizeToolInput(input),
    });
  }

  private handleTokenBudget(frame: InboundFrame): void {
    const parsed = TokenBudgetSchema.safeParse(frame.data);
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues }, "Dropped malformed token budget");
      return;
    }
    const usage = {
      used: Math.trunc(parsed.data.used),
      total: Math.trunc(parsed.data.total),
    };
    this.state.update({ tokenUsage: usage });
    this.host.emit({ type: "token_usage", usage });
  }

  private handleComplete(frame: InboundFrame): void {
    this.flushNow();
    this.host.confirmReattach();

    const finalText = this.turnText();
    this.state.update({ isProcessing: false, lastActiveToolName: null });
    if (frame.sessionId) {
      this.host.bindSession(frame.sessionId);
    }
    this.host.completeModelSwitch(finalText);
    this.host.emit({ type: "complete", sessionId: this.state.get().sessionId, text: finalText });
    this.reset();
    this.host.turnEnded({ finalText, kind: "complete" });
  }

  private handleError(frame: InboundFrame): void {
    this.flushNow();
    const finalText = this.turnText();
    const message = frame.error ?? "Unknown error";
    const boundSessionId = this.state.get().sessionId;

    this.state.update({ isProcessing: false, isReattaching: false, lastActiveToolName: null });
    this.reset();
    this.host.cancelModelSwitch();

    if (boundSessionId && isSessionInvalidationError({ message, code: frame.code })) {
      this.logger.info({ sessionId: boundSessionId, message }, "Session invalidated, starting fresh");
      this.state.update({ sessionId: null, lastError: SESSION_EXPIRED_MESSAGE });
      this.host.emit({
        type: "session_recovered",
        previousSessionId: boundSessionId,
        message: SESSION_EXPIRED_MESSAGE,
      });
    } else {
      this.state.update({ lastError: message });
      this.host.emit({
        type: "error",
        error: new BridgeError({ kind: "agent", message }),
      });
    }
    this.host.turnEnded({ finalText, kind: "error" });
  }

  private handleAborted(): void {
    this.flushNow();
    const finalText = this.turnText();
    this.host.resetProcessing();
    this.host.emit({ type: "aborted" });
    this.host.turnEnded({ finalText, kind: "aborted" });
  }

  private handlePermissionRequest(frame: InboundFrame): void {
    const parsed = PermissionRequestDataSchema.safeParse(frame.data);
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues }, "Dropped malformed permission request");
      return;
    }
    const pending = this.state.get().pendingApproval;
    if (pending) {
      this.logger.warn(
        { pendingRequestId: pending.id, droppedRequestId: parsed.data.requestId },
        "Approval already pending, dropping request"
      );
      return;
    }
    const request = toApprovalRequest(parsed.data);
    this.state.update({ pendingApproval: request });
    this.host.emit({ type: "permission_request", request });
  }

  private handleSessionsUpdated(frame: InboundFrame): void {
    const parsed = SessionsUpdatedDataSchema.safeParse(frame.data);
    if (!parsed.success) {
      this.logger.debug({ issues: parsed.error.issues }, "Dropped malformed sessions update");
      return;
    }
    this.host.emit({
      type: "sessions_updated",
      projectName: parsed.data.projectName,
      sessionId: parsed.data.sessionId ?? null,
      action: parsed.data.action,
    });
  }

  // ============================================================================
  // Text buffer
  // ============================================================================

  private appendText(text: string): void {
    this.textBuffer += text;
    this.scheduleFlush();
  }

  private scheduleFlush(): void {
    this.cancelScheduledFlush();
    this.flushTimeout = setTimeout(() => {
      this.options.executor.run("assembler.flush", () => {
        this.flushTimeout = null;
        this.flushNow();
      });
    }, this.flushDelayMs);
  }

  private cancelScheduledFlush(): void {
    if (this.flushTimeout) {
      clearTimeout(this.flushTimeout);
      this.flushTimeout = null;
    }
  }

  private flushNow(): void {
    this.cancelScheduledFlush();
    if (!this.textBuffer || this.textBuffer === this.state.get().currentText) {
      return;
    }
    this.state.update({ currentText: this.textBuffer });
    this.host.emit({ type: "text", text: this.textBuffer });
    this.host.observeAssistantText(this.textBuffer);
  }

  /** Everything the assistant wrote this turn, tool calls in between dropped. */
  private turnText(): string {
    const current = this.state.get().currentText;
    return [...this.committedSegments, ...(current ? [current] : [])].join("\n\n");
  }

  /** Closes the open text segment ahead of a tool call. */
  private commitText(): void {
    this.flushNow();
    const text = this.state.get().currentText;
    if (text) {
      this.committedSegments.push(text);
      this.host.emit({ type: "text_commit", text });
    }
    this.textBuffer = "";
    this.state.update({ currentText: "" });
  }
}
