import type { AttentionNotificationPayload } from "../shared/attention-notification.js";

export interface BridgeSettingsProvider {
  /** WebSocket endpoint, or null when no server is configured. */
  getEndpointUrl(): string | null;
  getProcessingTimeoutSeconds(): number;
}

/** Write-only from the client's side. */
export interface SessionHistoryWriter {
  saveSessionId(projectPath: string, sessionId: string): void;
  clearSessionId(projectPath: string): void;
  recordAssistantTurn(projectPath: string, text: string): void;
}

export interface LocalNotifier {
  notify(payload: AttentionNotificationPayload): void | Promise<void>;
}

export interface AppVisibility {
  isForeground(): boolean;
}

export const noopHistoryWriter: SessionHistoryWriter = {
  saveSessionId: () => {},
  clearSessionId: () => {},
  recordAssistantTurn: () => {},
};

export const alwaysForeground: AppVisibility = {
  isForeground: () => true,
};
