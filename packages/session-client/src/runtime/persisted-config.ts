import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import { z } from "zod";
import { describeUnknownError } from "../shared/errors.js";

const LogConfigSchema = z
  .object({
    level: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).optional(),
    format: z.enum(["pretty", "json"]).optional(),
  })
  .strict();

export const DEFAULT_PROCESSING_TIMEOUT_SECONDS = 300;

export const PersistedConfigSchema = z
  .object({
    $schema: z.string().optional(),
    version: z.literal(1).optional(),
    server: z
      .object({
        url: z.string().url(),
        authToken: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    session: z
      .object({
        processingTimeoutSeconds: z.number().int().min(30).max(3600).optional(),
      })
      .strict()
      .optional(),
    notifications: z
      .object({
        enabled: z.boolean().optional(),
      })
      .strict()
      .optional(),
    log: LogConfigSchema.optional(),
  })
  .strict();

export type PersistedConfig = z.infer<typeof PersistedConfigSchema>;

const CONFIG_FILENAME = "config.json";

const DEFAULT_PERSISTED_CONFIG: PersistedConfig = PersistedConfigSchema.parse({
  version: 1,
  session: {
    processingTimeoutSeconds: DEFAULT_PROCESSING_TIMEOUT_SECONDS,
  },
  notifications: {
    enabled: true,
  },
});

export function getConfigPath(bridgeHome: string): string {
  return path.join(bridgeHome, CONFIG_FILENAME);
}

export function loadPersistedConfig(bridgeHome: string, logger?: Logger): PersistedConfig {
  const log = logger?.child({ module: "config" });
  const configPath = getConfigPath(bridgeHome);

  if (!existsSync(configPath)) {
    try {
      mkdirSync(path.dirname(configPath), { recursive: true });
      writeFileSync(configPath, JSON.stringify(DEFAULT_PERSISTED_CONFIG, null, 2) + "\n");
      log?.info({ configPath }, "Initialized config file");
    } catch (err) {
      throw new Error(`[Config] Failed to initialize ${configPath}: ${describeUnknownError(err)}`);
    }
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new Error(`[Config] Failed to read ${configPath}: ${describeUnknownError(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`[Config] Invalid JSON in ${configPath}: ${describeUnknownError(err)}`);
  }

  const result = PersistedConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`[Config] Invalid config in ${configPath}:\n${issues}`);
  }

  log?.debug({ configPath }, "Loaded config");
  return result.data;
}
