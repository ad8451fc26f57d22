export { BridgeClient, ABORT_TIMEOUT_MS } from "./client/bridge-client.js";
export type { BridgeClientConfig, SendCommandInput } from "./client/bridge-client.js";
export {
  createWebSocketTransportFactory,
  defaultWebSocketFactory,
} from "./client/bridge-client-transport.js";
export type {
  BridgeTransport,
  BridgeTransportFactory,
  WebSocketFactory,
} from "./client/bridge-client-transport.js";
export type {
  AppVisibility,
  BridgeSettingsProvider,
  LocalNotifier,
  SessionHistoryWriter,
} from "./client/collaborators.js";
export { computeReconnectDelay, DEFAULT_RECONNECT_POLICY } from "./client/connection-supervisor.js";
export type { ConnectionState, ReconnectPolicy } from "./client/connection-supervisor.js";
export type { BridgeEvent, BridgeEventListener, BridgeEventType } from "./client/events.js";
export {
  createInlineFrameDecoder,
  createWorkerPoolFrameDecoder,
} from "./client/frame-decoder.js";
export type { FrameDecoder } from "./client/frame-decoder.js";
export type { SessionSnapshot, TokenUsage } from "./client/session-state.js";
export { BridgeError } from "./shared/errors.js";
export type { BridgeErrorKind } from "./shared/errors.js";
export type { ApprovalRequest } from "./shared/approval.js";
export type { QuestionRequest, QuestionItem } from "./shared/ask-user-question.js";
export type { AgentModel } from "./shared/models.js";
export type { PermissionMode } from "./shared/messages.js";
export { validateSessionId } from "./shared/session-id.js";
export { createChildLogger, createRootLogger, resolveLogConfig } from "./runtime/logger.js";
export {
  createSettingsProvider,
  loadBridgeConfig,
  resolveBridgeHome,
  toWebSocketUrl,
} from "./runtime/config.js";
export type { BridgeConfig } from "./runtime/config.js";
