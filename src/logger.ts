import type { LogLevel } from "./config.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
}

/** Delivers a log entry to the connected MCP client. */
export type LogForwarder = (level: LogLevel, message: string) => Promise<void>;

export interface ServerLogger extends Logger {
  /** Starts mirroring entries to the client once the transport is up. */
  forwardTo(forwarder: LogForwarder): void;
}

/**
 * Leveled logger. Stdout carries the stdio transport, so every line goes to
 * stderr; after `forwardTo` entries are also sent as MCP log notifications.
 */
export function createLogger(
  minLevel: LogLevel = "info",
  write: (line: string) => void = (line) => console.error(line)
): ServerLogger {
  let forwarder: LogForwarder | null = null;

  const log = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    write(`[dash-mcp] ${level}: ${message}`);
    if (forwarder) {
      forwarder(level, message).catch((err: unknown) => {
        const reason = err instanceof Error ? err.message : String(err);
        write(`[dash-mcp] error: failed to forward log entry: ${reason}`);
      });
    }
  };

  return {
    debug: (message) => log("debug", message),
    info: (message) => log("info", message),
    warning: (message) => log("warning", message),
    error: (message) => log("error", message),
    forwardTo(next) {
      forwarder = next;
    },
  };
}
