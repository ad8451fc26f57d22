import { pino, type DestinationStream, type Logger } from "pino";
import type { PersistedConfig } from "./persisted-config.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";
export type LogFormat = "pretty" | "json";

export interface ResolvedLogConfig {
  level: LogLevel;
  format: LogFormat;
}

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value?.trim().toLowerCase());
}

function parseLogFormat(value: string | undefined): LogFormat | undefined {
  const normalized = value?.trim().toLowerCase();
  return normalized === "pretty" || normalized === "json" ? normalized : undefined;
}

export function resolveLogConfig(
  persistedConfig: PersistedConfig | undefined,
  env: NodeJS.ProcessEnv = process.env
): ResolvedLogConfig {
  const level: LogLevel =
    parseLogLevel(env.CODING_BRIDGE_LOG_LEVEL) ?? persistedConfig?.log?.level ?? "info";
  const format: LogFormat =
    parseLogFormat(env.CODING_BRIDGE_LOG_FORMAT) ??
    persistedConfig?.log?.format ??
    (process.stdout.isTTY ? "pretty" : "json");

  return { level, format };
}

const PRETTY_OPTIONS = {
  colorize: true,
  translateTime: "SYS:HH:MM:ss.l",
  ignore: "pid,hostname,name",
  messageFormat: "{if module}[{module}] {end}{msg}",
} as const;

/**
 * Root logger for the bridge. A `destination` receives JSON lines and
 * bypasses the pretty transport, which only writes to stdout.
 */
export function createRootLogger(
  persistedConfig: PersistedConfig | undefined,
  options: { env?: NodeJS.ProcessEnv; destination?: DestinationStream } = {}
): Logger {
  const { level, format } = resolveLogConfig(persistedConfig, options.env);
  const base = { name: "coding-bridge" };

  if (options.destination) {
    return pino({ level, base }, options.destination);
  }
  if (format === "json") {
    return pino({ level, base });
  }
  return pino({ level, base, transport: { target: "pino-pretty", options: PRETTY_OPTIONS } });
}

/** Components tag their records with `module`, matching `logger.child({ module })` elsewhere. */
export function createChildLogger(parent: Logger, module: string): Logger {
  return parent.child({ module });
}
