import type { ApprovalRequest } from "../shared/approval.js";
import type { QuestionRequest } from "../shared/ask-user-question.js";
import type { BridgeError } from "../shared/errors.js";
import type { AgentModel } from "../shared/models.js";
import type { TokenUsage } from "./session-state.js";

export type BridgeEvent =
  | { type: "session_created"; sessionId: string }
  | { type: "session_attached"; sessionId: string | null }
  | { type: "session_recovered"; previousSessionId: string; message: string }
  | { type: "text"; text: string }
  | { type: "text_commit"; text: string }
  | {
      type: "tool_use";
      toolUseId: string | null;
      name: string;
      input: Record<string, unknown>;
      summary: string;
    }
  | { type: "tool_result"; toolUseId: string | null; content: string; isError: boolean }
  | { type: "thinking"; text: string }
  | { type: "question"; request: QuestionRequest }
  | { type: "token_usage"; usage: TokenUsage }
  | { type: "complete"; sessionId: string | null; text: string }
  | { type: "error"; error: BridgeError }
  | { type: "aborted" }
  | { type: "permission_request"; request: ApprovalRequest }
  | { type: "model_changed"; model: AgentModel; modelId: string }
  | { type: "sessions_updated"; projectName: string; sessionId: string | null; action: string }
  | { type: "projects_updated" };

export type BridgeEventType = BridgeEvent["type"];

export type BridgeEventListener = (event: BridgeEvent) => void;
