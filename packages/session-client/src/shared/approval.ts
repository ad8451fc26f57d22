import type { PermissionRequestData } from "./messages.js";

export interface ApprovalRequest {
  id: string;
  toolName: string;
  input: Record<string, unknown>;
  description: string;
  receivedAt: Date;
}

const MAX_COMMAND_PREVIEW = 80;

function readString(input: Record<string, unknown>, key: string): string | null {
  const value = input[key];
  return typeof value === "string" && value.length > 0 ? value : null;
}

export function describeApprovalInput(input: Record<string, unknown>): string {
  const command = readString(input, "command");
  if (command) {
    return command.length > MAX_COMMAND_PREVIEW
      ? `${command.slice(0, MAX_COMMAND_PREVIEW)}...`
      : command;
  }
  return (
    readString(input, "file_path") ??
    readString(input, "pattern") ??
    readString(input, "description") ??
    "Requesting permission..."
  );
}

export function toApprovalRequest(
  data: PermissionRequestData,
  receivedAt: Date = new Date()
): ApprovalRequest {
  const input = data.input ?? {};
  return {
    id: data.requestId,
    toolName: data.toolName,
    input,
    description: describeApprovalInput(input),
    receivedAt,
  };
}
