import os from "node:os";
import path from "node:path";
import type { Logger } from "pino";
import {
  DEFAULT_PROCESSING_TIMEOUT_SECONDS,
  loadPersistedConfig,
  type PersistedConfig,
} from "./persisted-config.js";
import type { BridgeSettingsProvider } from "../client/collaborators.js";

export interface BridgeConfig {
  bridgeHome: string;
  serverUrl: string | null;
  authToken: string | null;
  processingTimeoutSeconds: number;
  notificationsEnabled: boolean;
  persisted: PersistedConfig;
}

export function resolveBridgeHome(env: NodeJS.ProcessEnv = process.env): string {
  const raw = env.CODING_BRIDGE_HOME?.trim();
  if (raw) {
    return path.resolve(raw.replace(/^~(?=$|\/)/, os.homedir()));
  }
  return path.join(os.homedir(), ".coding-bridge");
}

function parsePositiveInt(value: string | undefined): number | null {
  if (!value) {
    return null;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

export function loadBridgeConfig(
  options: {
    env?: NodeJS.ProcessEnv;
    bridgeHome?: string;
    logger?: Logger;
  } = {}
): BridgeConfig {
  const env = options.env ?? process.env;
  const bridgeHome = options.bridgeHome ?? resolveBridgeHome(env);
  const persisted = loadPersistedConfig(bridgeHome, options.logger);

  return {
    bridgeHome,
    serverUrl: env.CODING_BRIDGE_SERVER_URL?.trim() || persisted.server?.url || null,
    authToken: env.CODING_BRIDGE_AUTH_TOKEN?.trim() || persisted.server?.authToken || null,
    processingTimeoutSeconds:
      parsePositiveInt(env.CODING_BRIDGE_PROCESSING_TIMEOUT) ??
      persisted.session?.processingTimeoutSeconds ??
      DEFAULT_PROCESSING_TIMEOUT_SECONDS,
    notificationsEnabled: persisted.notifications?.enabled ?? true,
    persisted,
  };
}

/**
 * Maps the HTTP base URL of the bridge server to its WebSocket endpoint.
 * Returns null for anything that is not an http(s) or ws(s) URL.
 */
export function toWebSocketUrl(serverUrl: string, authToken?: string | null): string | null {
  let url: URL;
  try {
    url = new URL(serverUrl.trim());
  } catch {
    return null;
  }

  switch (url.protocol) {
    case "http:":
      url.protocol = "ws:";
      break;
    case "https:":
      url.protocol = "wss:";
      break;
    case "ws:":
    case "wss:":
      break;
    default:
      return null;
  }

  if (!url.pathname.endsWith("/ws")) {
    url.pathname = `${url.pathname.replace(/\/+$/, "")}/ws`;
  }
  if (authToken) {
    url.searchParams.set("token", authToken);
  }
  return url.toString();
}

export function createSettingsProvider(config: BridgeConfig): BridgeSettingsProvider {
  return {
    getEndpointUrl: () =>
      config.serverUrl ? toWebSocketUrl(config.serverUrl, config.authToken) : null,
    getProcessingTimeoutSeconds: () => config.processingTimeoutSeconds,
  };
}
