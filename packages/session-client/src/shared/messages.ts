import { z } from "zod";

// ============================================================================
// Outbound frames
// ============================================================================

export const PermissionModeSchema = z.enum([
  "default",
  "acceptEdits",
  "bypassPermissions",
  "plan",
]);

export type PermissionMode = z.infer<typeof PermissionModeSchema>;

export const ImageAttachmentSchema = z.object({
  mediaType: z.string(),
  base64Data: z.string(),
});

export type ImageAttachment = z.infer<typeof ImageAttachmentSchema>;

export const CommandFrameSchema = z.object({
  type: z.literal("claude-command"),
  command: z.string(),
  options: z.object({
    cwd: z.string(),
    sessionId: z.string().optional(),
    model: z.string().optional(),
    permissionMode: PermissionModeSchema.optional(),
    images: z.array(ImageAttachmentSchema).optional(),
  }),
});

export const AbortFrameSchema = z.object({
  type: z.literal("abort-session"),
  sessionId: z.string(),
  provider: z.literal("claude"),
});

export const PermissionResponseFrameSchema = z.object({
  type: z.literal("permission-response"),
  requestId: z.string(),
  allow: z.boolean(),
  alwaysAllow: z.boolean(),
  decision: z.enum(["allow", "deny"]),
});

export const OutboundFrameSchema = z.discriminatedUnion("type", [
  CommandFrameSchema,
  AbortFrameSchema,
  PermissionResponseFrameSchema,
]);

export type CommandFrame = z.infer<typeof CommandFrameSchema>;
export type AbortFrame = z.infer<typeof AbortFrameSchema>;
export type PermissionResponseFrame = z.infer<typeof PermissionResponseFrameSchema>;
export type OutboundFrame = z.infer<typeof OutboundFrameSchema>;

export function serializeOutboundFrame(frame: OutboundFrame): string {
  return JSON.stringify(OutboundFrameSchema.parse(frame));
}

// ============================================================================
// Inbound frames
// ============================================================================

export const INBOUND_FRAME_TYPES = [
  "session-created",
  "claude-response",
  "token-budget",
  "claude-complete",
  "claude-error",
  "session-aborted",
  "permission-request",
  "sessions-updated",
  "projects_updated",
] as const;

export type InboundFrameType = (typeof INBOUND_FRAME_TYPES)[number];

export const InboundFrameSchema = z
  .object({
    type: z.string(),
    sessionId: z.string().nullish(),
    data: z.unknown().optional(),
    error: z.string().nullish(),
    code: z.string().nullish(),
    exitCode: z.number().nullish(),
    isNewSession: z.boolean().nullish(),
  })
  .passthrough();

export type InboundFrame = z.infer<typeof InboundFrameSchema>;

export const TextBlockSchema = z.object({
  type: z.literal("text"),
  text: z.string(),
});

export const ToolUseBlockSchema = z.object({
  type: z.literal("tool_use"),
  id: z.string().optional(),
  name: z.string().optional(),
  input: z.record(z.unknown()).optional(),
});

export const ToolResultBlockSchema = z.object({
  type: z.literal("tool_result"),
  tool_use_id: z.string().optional(),
  content: z.unknown().optional(),
  is_error: z.boolean().optional(),
});

export const ThinkingBlockSchema = z.object({
  type: z.literal("thinking"),
  thinking: z.string(),
});

export const ContentBlockSchema = z.discriminatedUnion("type", [
  TextBlockSchema,
  ToolUseBlockSchema,
  ToolResultBlockSchema,
  ThinkingBlockSchema,
]);

export type ContentBlock = z.infer<typeof ContentBlockSchema>;
export type ToolUseBlock = z.infer<typeof ToolUseBlockSchema>;
export type ToolResultBlock = z.infer<typeof ToolResultBlockSchema>;

export const AgentPayloadSchema = z
  .object({
    type: z.string().optional(),
    subtype: z.string().optional(),
    session_id: z.string().optional(),
    model: z.string().optional(),
    message: z
      .object({
        content: z.unknown().optional(),
      })
      .passthrough()
      .optional(),
    content: z.unknown().optional(),
  })
  .passthrough();

export type AgentPayload = z.infer<typeof AgentPayloadSchema>;

export const TokenBudgetSchema = z.object({
  used: z.number().nonnegative(),
  total: z.number().nonnegative(),
});

export const PermissionRequestDataSchema = z.object({
  requestId: z.string().min(1),
  toolName: z.string().min(1),
  input: z.record(z.unknown()).optional(),
});

export type PermissionRequestData = z.infer<typeof PermissionRequestDataSchema>;

export const SessionsUpdatedDataSchema = z.object({
  projectName: z.string(),
  sessionId: z.string().nullish(),
  action: z.string(),
});

/** Flattens a tool_result content value into display text. */
export function extractToolResultText(content: unknown): string {
  if (typeof content === "string") {
    return content;
  }
  if (Array.isArray(content)) {
    const parts: string[] = [];
    for (const item of content) {
      if (typeof item === "string") {
        parts.push(item);
        continue;
      }
      if (item && typeof item === "object" && "text" in item && typeof item.text === "string") {
        parts.push(item.text);
      }
    }
    return parts.join("\n");
  }
  return "";
}
