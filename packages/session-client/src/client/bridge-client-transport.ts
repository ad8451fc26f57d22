import WebSocket from "ws";

export type BridgeTransport = {
  send: (data: string, onSent?: (error?: Error) => void) => void;
  close: (code?: number, reason?: string) => void;
  /** Resolves once the peer answers a ping; waits for the socket to open first. */
  ping: (onResult: (error?: Error) => void) => void;
  onMessage: (handler: (data: unknown) => void) => () => void;
  onOpen: (handler: () => void) => () => void;
  onClose: (handler: (event?: unknown) => void) => () => void;
  onError: (handler: (event?: unknown) => void) => () => void;
};

export type BridgeTransportFactory = (options: {
  url: string;
  headers?: Record<string, string>;
}) => BridgeTransport;

export type WebSocketFactory = (
  url: string,
  options?: { headers?: Record<string, string> }
) => WebSocket;

export const DEFAULT_PING_TIMEOUT_MS = 10_000;

const OPEN = 1;

export function defaultWebSocketFactory(
  url: string,
  options?: { headers?: Record<string, string> }
): WebSocket {
  return new WebSocket(url, { headers: options?.headers });
}

type WsEvent = "open" | "close" | "error" | "message" | "pong";

function bindWsHandler(
  ws: WebSocket,
  event: WsEvent,
  handler: (...args: unknown[]) => void
): () => void {
  ws.on(event, handler);
  return () => {
    ws.off(event, handler);
  };
}

export function createWebSocketTransportFactory(
  factory: WebSocketFactory = defaultWebSocketFactory,
  options: { pingTimeoutMs?: number } = {}
): BridgeTransportFactory {
  const pingTimeoutMs = options.pingTimeoutMs ?? DEFAULT_PING_TIMEOUT_MS;

  return ({ url, headers }) => {
    const ws = factory(url, { headers });
    // ws rethrows an "error" event that has no listener, and subscribers come and go
    ws.on("error", () => undefined);

    const ping = (onResult: (error?: Error) => void) => {
      let settled = false;
      const unbinders: Array<() => void> = [];
      const finish = (error?: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        for (const unbind of unbinders) unbind();
        onResult(error);
      };
      const timeout = setTimeout(
        () => finish(new Error(`Ping timed out after ${pingTimeoutMs}ms`)),
        pingTimeoutMs
      );
      const sendPing = () => {
        try {
          ws.ping();
        } catch (error) {
          finish(error instanceof Error ? error : new Error(String(error)));
        }
      };

      unbinders.push(bindWsHandler(ws, "pong", () => finish()));
      unbinders.push(
        bindWsHandler(ws, "close", (event) => finish(new Error(describeTransportClose(event))))
      );
      if (ws.readyState === OPEN) {
        sendPing();
      } else {
        unbinders.push(bindWsHandler(ws, "open", sendPing));
      }
    };

    return {
      send: (data, onSent) => {
        if (ws.readyState !== OPEN) {
          const error = new Error(`WebSocket not open (readyState=${ws.readyState})`);
          if (onSent) {
            onSent(error);
            return;
          }
          throw error;
        }
        ws.send(data, (error) => onSent?.(error ?? undefined));
      },
      close: (code?: number, reason?: string) => ws.close(code, reason),
      ping,
      onOpen: (handler) => bindWsHandler(ws, "open", handler),
      onClose: (handler) =>
        bindWsHandler(ws, "close", (code, reason) =>
          handler({ code, reason: Buffer.isBuffer(reason) ? reason.toString("utf8") : reason })
        ),
      onError: (handler) => bindWsHandler(ws, "error", handler),
      onMessage: (handler) => bindWsHandler(ws, "message", handler),
    };
  };
}

export function describeTransportClose(event?: unknown): string {
  if (!event) {
    return "Transport closed";
  }
  if (event instanceof Error) {
    return event.message;
  }
  if (typeof event === "string") {
    return event;
  }
  if (typeof event === "object") {
    if ("reason" in event && typeof event.reason === "string" && event.reason.trim()) {
      return event.reason.trim();
    }
    if ("code" in event && typeof event.code === "number") {
      return `Transport closed (code ${event.code})`;
    }
  }
  return "Transport closed";
}

export function describeTransportError(event?: unknown): string {
  if (!event) {
    return "Transport error";
  }
  if (event instanceof Error) {
    return event.message;
  }
  if (typeof event === "string") {
    return event;
  }
  if (
    typeof event === "object" &&
    "message" in event &&
    typeof event.message === "string" &&
    event.message.trim()
  ) {
    return event.message.trim();
  }
  return "Transport error";
}

export function decodeMessageData(data: unknown): string | null {
  if (data === null || data === undefined) {
    return null;
  }
  if (typeof data === "string") {
    return data;
  }
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  if (Array.isArray(data) && data.every((chunk) => Buffer.isBuffer(chunk))) {
    return Buffer.concat(data).toString("utf8");
  }
  if (ArrayBuffer.isView(data)) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString("utf8");
  }
  return null;
}
