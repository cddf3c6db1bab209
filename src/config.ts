import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import { BASE_OVERHEAD_TOKENS, DEFAULT_TOKEN_LIMIT } from "./budget/truncate.js";

export const DEFAULT_STATUS_FILE = path.join(
  os.homedir(),
  "Library",
  "Application Support",
  "Dash",
  ".dash_api_server",
  "status.json"
);

const LOG_LEVELS = ["debug", "info", "warning", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const intFromEnv = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const configSchema = z.object({
  DASH_MCP_STATUS_FILE: z.string().min(1).default(DEFAULT_STATUS_FILE),
  DASH_MCP_TOKEN_LIMIT: intFromEnv(DEFAULT_TOKEN_LIMIT, BASE_OVERHEAD_TOKENS),
  DASH_MCP_HTTP_TIMEOUT_MS: intFromEnv(30_000, 1),
  DASH_MCP_HEALTH_TIMEOUT_MS: intFromEnv(5_000, 1),
  DASH_MCP_COMMAND_TIMEOUT_MS: intFromEnv(10_000, 1),
  DASH_MCP_LAUNCH_SETTLE_MS: intFromEnv(4_000, 0),
  DASH_MCP_ENABLE_SETTLE_MS: intFromEnv(2_000, 0),
  DASH_MCP_POLL_INTERVAL_MS: intFromEnv(500, 1),
  DASH_MCP_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export interface DashConfig {
  statusFile: string;
  tokenLimit: number;
  httpTimeoutMs: number;
  healthTimeoutMs: number;
  commandTimeoutMs: number;
  launchSettleMs: number;
  enableSettleMs: number;
  pollIntervalMs: number;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Reads the server configuration from environment variables. Blank values
 * count as unset so that `DASH_MCP_TOKEN_LIMIT=` falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DashConfig {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(configSchema.shape)) {
    const value = env[key]?.trim();
    if (value) raw[key] = value;
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const c = parsed.data;
  return {
    statusFile: c.DASH_MCP_STATUS_FILE,
    tokenLimit: c.DASH_MCP_TOKEN_LIMIT,
    httpTimeoutMs: c.DASH_MCP_HTTP_TIMEOUT_MS,
    healthTimeoutMs: c.DASH_MCP_HEALTH_TIMEOUT_MS,
    commandTimeoutMs: c.DASH_MCP_COMMAND_TIMEOUT_MS,
    launchSettleMs: c.DASH_MCP_LAUNCH_SETTLE_MS,
    enableSettleMs: c.DASH_MCP_ENABLE_SETTLE_MS,
    pollIntervalMs: c.DASH_MCP_POLL_INTERVAL_MS,
    logLevel: c.DASH_MCP_LOG_LEVEL,
  };
}
