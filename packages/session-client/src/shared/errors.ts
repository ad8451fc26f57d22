export type BridgeErrorKind =
  | "transport"
  | "protocol"
  | "session_invalid"
  | "timeout"
  | "delivery_exhausted"
  | "agent";

export class BridgeError extends Error {
  readonly kind: BridgeErrorKind;

  constructor(params: { kind: BridgeErrorKind; message: string; cause?: unknown }) {
    super(params.message, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = "BridgeError";
    this.kind = params.kind;
  }
}

export function describeUnknownError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
