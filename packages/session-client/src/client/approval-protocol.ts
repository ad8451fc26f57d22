import type { Logger } from "pino";
import { serializeOutboundFrame } from "../shared/messages.js";
import type { ConnectionSupervisor } from "./connection-supervisor.js";
import type { SessionStateStore } from "./session-state.js";

export interface ApprovalProtocolOptions {
  logger: Logger;
  state: SessionStateStore;
  supervisor: Pick<ConnectionSupervisor, "transmit">;
}

export class ApprovalProtocol {
  private readonly logger: Logger;

  constructor(private readonly options: ApprovalProtocolOptions) {
    this.logger = options.logger.child({ module: "approval" });
  }

  /**
   * Sent once. The pending request is cleared right away whatever the send
   * outcome, so a flaky socket cannot leave the prompt stuck on screen.
   */
  respond(requestId: string, allow: boolean, alwaysAllow = false): void {
    const { state, supervisor } = this.options;
    const frame = serializeOutboundFrame({
      type: "permission-response",
      requestId,
      allow,
      alwaysAllow,
      decision: allow ? "allow" : "deny",
    });

    supervisor.transmit(frame, (error) => {
      if (!error) {
        return;
      }
      this.logger.warn({ err: error, requestId }, "Failed to send permission response");
      state.update({ lastError: "Failed to send permission response" });
    });
    this.logger.info({ requestId, allow, alwaysAllow }, "Answered permission request");
    state.update({ pendingApproval: null });
  }

  approvePending(alwaysAllow = false): boolean {
    const pending = this.options.state.get().pendingApproval;
    if (!pending) {
      return false;
    }
    this.respond(pending.id, true, alwaysAllow);
    return true;
  }

  denyPending(): boolean {
    const pending = this.options.state.get().pendingApproval;
    if (!pending) {
      return false;
    }
    this.respond(pending.id, false, false);
    return true;
  }
}
