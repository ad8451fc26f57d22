import type { BridgeTransport, BridgeTransportFactory } from "../client/bridge-client-transport.js";

export type SendMode = "ok" | "fail" | "manual";

export interface MockTransport {
  transport: BridgeTransport;
  url: string;
  sent: string[];
  closed: { code?: number; reason?: string } | null;
  sendMode: SendMode;
  /** Send callbacks held back while `sendMode` is "manual". */
  pendingSends: Array<(error?: Error) => void>;
  triggerOpen: () => void;
  triggerClose: (event?: unknown) => void;
  triggerError: (event?: unknown) => void;
  triggerMessage: (data: unknown) => void;
  resolvePing: (error?: Error) => void;
  sentFrames: () => Array<Record<string, unknown>>;
}

function parseFrame(raw: string): Record<string, unknown> {
  const value: unknown = JSON.parse(raw);
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new Error(`Sent frame is not an object: ${raw}`);
  }
  return Object.fromEntries(Object.entries(value));
}

export function createMockTransport(url = "ws://test/ws"): MockTransport {
  let onMessage: (data: unknown) => void = () => {};
  let onOpen: () => void = () => {};
  let onClose: (event?: unknown) => void = () => {};
  let onError: (event?: unknown) => void = () => {};
  let onPing: ((error?: Error) => void) | null = null;

  const mock: MockTransport = {
    url,
    sent: [],
    closed: null,
    sendMode: "ok",
    pendingSends: [],
    transport: {
      send: (data, onSent) => {
        mock.sent.push(data);
        if (mock.sendMode === "ok") {
          onSent?.();
        } else if (mock.sendMode === "fail") {
          onSent?.(new Error("send failed"));
        } else if (onSent) {
          mock.pendingSends.push(onSent);
        }
      },
      close: (code, reason) => {
        mock.closed = { code, reason };
      },
      ping: (onResult) => {
        onPing = onResult;
      },
      onMessage: (handler) => {
        onMessage = handler;
        return () => {
          onMessage = () => {};
        };
      },
      onOpen: (handler) => {
        onOpen = handler;
        return () => {
          onOpen = () => {};
        };
      },
      onClose: (handler) => {
        onClose = handler;
        return () => {
          onClose = () => {};
        };
      },
      onError: (handler) => {
        onError = handler;
        return () => {
          onError = () => {};
        };
      },
    },
    triggerOpen: () => onOpen(),
    triggerClose: (event) => onClose(event),
    triggerError: (event) => onError(event),
    triggerMessage: (data) => onMessage(data),
    resolvePing: (error) => {
      const callback = onPing;
      onPing = null;
      callback?.(error);
    },
    sentFrames: () => mock.sent.map(parseFrame),
  };
  return mock;
}

export interface MockTransportFactory {
  factory: BridgeTransportFactory;
  transports: MockTransport[];
  latest: () => MockTransport;
}

/** Every connect() gets a fresh mock transport. */
export function createMockTransportFactory(): MockTransportFactory {
  const transports: MockTransport[] = [];
  return {
    transports,
    factory: ({ url }) => {
      const mock = createMockTransport(url);
      transports.push(mock);
      return mock.transport;
    },
    latest: () => {
      const mock = transports[transports.length - 1];
      if (!mock) {
        throw new Error("No transport has been created");
      }
      return mock;
    },
  };
}
