import type { Logger } from "pino";
import {
  buildAttentionNotification,
  type BuildAttentionNotificationInput,
} from "../shared/attention-notification.js";
import type { AppVisibility, LocalNotifier } from "./collaborators.js";
import type { BridgeEvent } from "./events.js";

export interface AttentionNotificationsOptions {
  logger: Logger;
  notifier: LocalNotifier | null;
  visibility: AppVisibility;
  enabled: boolean;
  currentSessionId: () => string | null;
}

/** Posts a local notification for events the user should see while the app is in the background. */
export class AttentionNotifications {
  private readonly logger: Logger;

  constructor(private readonly options: AttentionNotificationsOptions) {
    this.logger = options.logger.child({ module: "attention-notifications" });
  }

  handle(event: BridgeEvent): void {
    const { notifier, visibility, enabled } = this.options;
    if (!notifier || !enabled || visibility.isForeground()) {
      return;
    }
    const input = this.toNotificationInput(event);
    if (!input) {
      return;
    }
    const payload = buildAttentionNotification(input);
    void Promise.resolve()
      .then(() => notifier.notify(payload))
      .catch((error: unknown) => {
        this.logger.warn({ err: error, reason: payload.data.reason }, "Failed to post notification");
      });
  }

  private toNotificationInput(event: BridgeEvent): BuildAttentionNotificationInput | null {
    const sessionId = this.options.currentSessionId();
    switch (event.type) {
      case "complete":
        return { reason: "finished", sessionId, assistantText: event.text };
      case "permission_request":
        return { reason: "permission", sessionId, request: event.request };
      case "question":
        return { reason: "question", sessionId, request: event.request };
      case "error":
        return event.error.kind === "timeout"
          ? { reason: "error", sessionId, message: event.error.message }
          : null;
      default:
        return null;
    }
  }
}
