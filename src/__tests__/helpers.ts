import { vi } from "vitest";
import { DashApiClient } from "../api/client.js";
import type { DashConfig } from "../config.js";
import type { ServerContext } from "../context.js";
import { LAUNCH_FAILED_MESSAGE, type BootstrapOutcome } from "../dash/bootstrap.js";
import { ProcessLaunchFailure } from "../errors.js";

export const BASE_URL = "http://127.0.0.1:5000";

export function makeLogger() {
  return {
    debug: vi.fn((_message: string) => {}),
    info: vi.fn((_message: string) => {}),
    warning: vi.fn((_message: string) => {}),
    error: vi.fn((_message: string) => {}),
  };
}

export function makeConfig(overrides: Partial<DashConfig> = {}): DashConfig {
  return {
    statusFile: "/tmp/dash-status-test.json",
    tokenLimit: 25_000,
    httpTimeoutMs: 1_000,
    healthTimeoutMs: 1_000,
    commandTimeoutMs: 1_000,
    launchSettleMs: 0,
    enableSettleMs: 0,
    pollIntervalMs: 100,
    logLevel: "debug",
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function textResponse(body: string, status: number, statusText = ""): Response {
  return new Response(body, { status, statusText });
}

export type Route = (url: URL) => Response | Promise<Response>;

/** Fake fetch that answers from a single route function and records requested URLs. */
export function fakeFetch(route: Route) {
  return vi.fn(async (input: string | URL | Request) => {
    const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
    return route(url);
  });
}

export const readyOutcome: BootstrapOutcome = {
  baseUrl: BASE_URL,
  status: { processRunning: true, apiEnabled: true, port: 5000, healthy: true },
  trace: ["NotChecked", "ProcessUp", "PortUnknown", "PortKnown", "Ready"],
};

export const launchFailedOutcome: BootstrapOutcome = {
  failureReason: LAUNCH_FAILED_MESSAGE,
  error: new ProcessLaunchFailure(LAUNCH_FAILED_MESSAGE),
  status: { processRunning: false, apiEnabled: false, healthy: false },
  trace: ["NotChecked", "ProcessDown", "Launching", "LaunchFailed"],
};

export function makeContext(options: {
  route?: Route;
  outcome?: BootstrapOutcome;
  config?: Partial<DashConfig>;
} = {}) {
  const logger = makeLogger();
  const fetchMock = fakeFetch(options.route ?? (() => textResponse("unexpected request", 500)));
  const resolve = vi.fn(async () => options.outcome ?? readyOutcome);
  const ctx: ServerContext = {
    config: makeConfig(options.config),
    logger,
    bootstrap: { resolve },
    createClient: (baseUrl) => new DashApiClient(baseUrl, { timeoutMs: 1_000, fetch: fetchMock }),
  };
  return { ctx, logger, fetchMock, resolve };
}

/** Parses the JSON text payload of a tool call result. */
export function parseToolText(result: unknown): unknown {
  if (typeof result !== "object" || result === null || !("content" in result)) {
    throw new Error(`Expected tool result with content: ${JSON.stringify(result)}`);
  }
  const content = result.content;
  const first: unknown = Array.isArray(content) ? content[0] : undefined;
  if (typeof first !== "object" || first === null || !("text" in first) || typeof first.text !== "string") {
    throw new Error(`Expected text content in tool result: ${JSON.stringify(result)}`);
  }
  return JSON.parse(first.text);
}
