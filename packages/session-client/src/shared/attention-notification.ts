import type { ApprovalRequest } from "./approval.js";
import type { QuestionRequest } from "./ask-user-question.js";

const PREVIEW_LIMIT = 220;

export type AttentionReason = "finished" | "error" | "permission" | "question";

export type AttentionNotificationData = {
  reason: AttentionReason;
  sessionId: string | null;
  requestId?: string;
};

export type AttentionNotificationPayload = {
  title: string;
  body: string;
  data: AttentionNotificationData;
};

export type BuildAttentionNotificationInput =
  | { reason: "finished"; sessionId: string | null; assistantText: string | null }
  | { reason: "error"; sessionId: string | null; message: string }
  | { reason: "permission"; sessionId: string | null; request: ApprovalRequest }
  | { reason: "question"; sessionId: string | null; request: QuestionRequest };

const collapseWhitespace = (text: string): string => text.replace(/\s+/g, " ").trim();

const truncate = (text: string, limit: number): string => {
  if (text.length <= limit) {
    return text;
  }
  const trimmed = text.slice(0, Math.max(0, limit - 3)).trimEnd();
  return trimmed.length > 0 ? `${trimmed}...` : text.slice(0, limit);
};

// Keeps the words, drops the markup.
const stripMarkdown = (markdown: string): string =>
  markdown
    .replace(/\r\n/g, "\n")
    .replace(/^\s*(```|~~~)[^\n]*$/gm, "")
    .replace(/!?\[([^\]]*)\]\((?:[^()\\]|\\.)*\)/g, "$1")
    .replace(/^\s{0,3}#{1,6}\s+/gm, "")
    .replace(/^\s{0,3}>+\s?/gm, "")
    .replace(/^\s{0,3}(?:[*+-]|\d+\.)\s+/gm, "")
    .replace(/`([^`]+)`/g, "$1")
    .replace(/\*\*([^*]+)\*\*/g, "$1")
    .replace(/\*([^*\n]+)\*/g, "$1")
    .replace(/~~([^~]+)~~/g, "$1");

export function buildNotificationPreview(text: string | null | undefined): string | null {
  if (!text) {
    return null;
  }
  const normalized = collapseWhitespace(stripMarkdown(text));
  return normalized ? truncate(normalized, PREVIEW_LIMIT) : null;
}

export function buildAttentionNotification(
  input: BuildAttentionNotificationInput
): AttentionNotificationPayload {
  switch (input.reason) {
    case "finished":
      return {
        title: "Task complete",
        body: buildNotificationPreview(input.assistantText) ?? "Finished working.",
        data: { reason: input.reason, sessionId: input.sessionId },
      };
    case "error":
      return {
        title: "Agent needs attention",
        body: buildNotificationPreview(input.message) ?? "Encountered an error.",
        data: { reason: input.reason, sessionId: input.sessionId },
      };
    case "permission":
      return {
        title: "Approval needed",
        body:
          buildNotificationPreview(`${input.request.toolName}: ${input.request.description}`) ??
          "Permission requested.",
        data: { reason: input.reason, sessionId: input.sessionId, requestId: input.request.id },
      };
    case "question":
      return {
        title: "Question from agent",
        body:
          buildNotificationPreview(input.request.questions[0]?.question) ?? "Input requested.",
        data: { reason: input.reason, sessionId: input.sessionId, requestId: input.request.id },
      };
  }
}
