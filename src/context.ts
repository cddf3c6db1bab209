import { DashApiClient } from "./api/client.js";
import type { DashConfig } from "./config.js";
import { BootstrapCoordinator, type BootstrapOutcome } from "./dash/bootstrap.js";
import { runCommand, type CommandRunner } from "./dash/command.js";
import { createHealthChecker, type FetchLike } from "./dash/health.js";
import { createProcessLauncher, createProcessProbe } from "./dash/process.js";
import { createCapabilityEnabler } from "./dash/settings.js";
import { createPortResolver } from "./dash/status.js";
import { DASH_TARGETS } from "./dash/targets.js";
import type { Logger } from "./logger.js";

export interface Bootstrapper {
  resolve(): Promise<BootstrapOutcome>;
}

/**
 * Everything a tool handler needs, built once at start-up. Holds no
 * per-request state; each call bootstraps from scratch.
 */
export interface ServerContext {
  config: DashConfig;
  logger: Logger;
  bootstrap: Bootstrapper;
  createClient(baseUrl: string): DashApiClient;
}

export interface ContextOverrides {
  run?: CommandRunner;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

export function createServerContext(
  config: DashConfig,
  logger: Logger,
  overrides: ContextOverrides = {}
): ServerContext {
  const run = overrides.run ?? runCommand;
  const bootstrap = new BootstrapCoordinator({
    probe: createProcessProbe(run, logger, Math.min(config.commandTimeoutMs, 5_000)),
    launcher: createProcessLauncher(run, logger, config.commandTimeoutMs),
    enabler: createCapabilityEnabler(run, logger, config.commandTimeoutMs),
    ports: createPortResolver(config.statusFile, logger),
    health: createHealthChecker(logger, { timeoutMs: config.healthTimeoutMs, fetch: overrides.fetch }),
    targets: DASH_TARGETS,
    timings: {
      launchSettleMs: config.launchSettleMs,
      enableSettleMs: config.enableSettleMs,
      pollIntervalMs: config.pollIntervalMs,
    },
    logger,
    sleep: overrides.sleep,
  });

  return {
    config,
    logger,
    bootstrap,
    createClient: (baseUrl) =>
      new DashApiClient(baseUrl, { timeoutMs: config.httpTimeoutMs, fetch: overrides.fetch }),
  };
}
