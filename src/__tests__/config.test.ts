import { describe, expect, it } from "vitest";
import { ConfigError, DEFAULT_STATUS_FILE, loadConfig } from "../config.js";

describe("loadConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadConfig({})).toEqual({
      statusFile: DEFAULT_STATUS_FILE,
      tokenLimit: 25_000,
      httpTimeoutMs: 30_000,
      healthTimeoutMs: 5_000,
      commandTimeoutMs: 10_000,
      launchSettleMs: 4_000,
      enableSettleMs: 2_000,
      pollIntervalMs: 500,
      logLevel: "info",
    });
    expect(DEFAULT_STATUS_FILE.endsWith("/Library/Application Support/Dash/.dash_api_server/status.json")).toBe(true);
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      DASH_MCP_STATUS_FILE: "/tmp/status.json",
      DASH_MCP_TOKEN_LIMIT: "5000",
      DASH_MCP_LAUNCH_SETTLE_MS: "0",
      DASH_MCP_LOG_LEVEL: "debug",
    });

    expect(config.statusFile).toBe("/tmp/status.json");
    expect(config.tokenLimit).toBe(5_000);
    expect(config.launchSettleMs).toBe(0);
    expect(config.logLevel).toBe("debug");
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ DASH_MCP_TOKEN_LIMIT: "  " }).tokenLimit).toBe(25_000);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ DASH_MCP_TOKEN_LIMIT: "lots" })).toThrow(ConfigError);
    expect(() => loadConfig({ DASH_MCP_TOKEN_LIMIT: "50" })).toThrow(/^Invalid configuration: DASH_MCP_TOKEN_LIMIT:/);
    expect(() => loadConfig({ DASH_MCP_LOG_LEVEL: "verbose" })).toThrow(/DASH_MCP_LOG_LEVEL/);
  });
});
