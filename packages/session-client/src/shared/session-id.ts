const SESSION_ID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Returns the lowercase form of a session id, or null when the value is not
 * UUID-shaped. Placeholder ids minted locally before the server has created a
 * session never make it onto the wire.
 */
export function validateSessionId(value: string | null | undefined): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  if (!SESSION_ID_PATTERN.test(trimmed)) {
    return null;
  }
  return trimmed.toLowerCase();
}

export function isValidSessionId(value: string | null | undefined): value is string {
  return validateSessionId(value) !== null;
}
