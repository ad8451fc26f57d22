export const SESSION_ERROR_CODES = [
  "session_not_found",
  "session_expired",
  "invalid_session",
  "resume_failed",
] as const;

export type SessionErrorCode = (typeof SESSION_ERROR_CODES)[number];

const SESSION_ERROR_PATTERNS = [
  "session",
  "session not found",
  "invalid session",
  "process exited with code 1",
  "failed to resume",
  "resume failed",
];

function isSessionErrorCode(code: string): code is SessionErrorCode {
  return SESSION_ERROR_CODES.some((candidate) => candidate === code);
}

/**
 * Decides whether a server error means the bound session is gone.
 *
 * A structured `code` wins when the server sends one. Older servers only send
 * text, so the substring match remains as the fallback.
 */
export function isSessionInvalidationError(params: {
  message: string | null | undefined;
  code?: string | null;
}): boolean {
  const code = params.code?.trim().toLowerCase();
  if (code) {
    return isSessionErrorCode(code);
  }
  const message = params.message?.toLowerCase() ?? "";
  if (!message) {
    return false;
  }
  return SESSION_ERROR_PATTERNS.some((pattern) => message.includes(pattern));
}
