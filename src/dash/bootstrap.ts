import { CapabilityEnableFailure, ProcessLaunchFailure } from "../errors.js";
import type { Logger } from "../logger.js";
import type { HealthChecker } from "./health.js";
import type { ProcessLauncher, ProcessProbe } from "./process.js";
import type { CapabilityEnabler } from "./settings.js";
import type { PortResolver } from "./status.js";
import { baseUrlForPort, type DashTarget } from "./targets.js";

export type BootstrapState =
  | "NotChecked"
  | "ProcessDown"
  | "Launching"
  | "ProcessUp"
  | "PortUnknown"
  | "EnablingAPI"
  | "PortKnown"
  | "HealthFailed"
  | "Ready"
  | "LaunchFailed"
  | "EnableFailed";

/** Snapshot of what the last bootstrap pass observed. Never reused across calls. */
export interface ServiceStatus {
  processRunning: boolean;
  apiEnabled: boolean;
  port?: number;
  healthy: boolean;
}

interface OutcomeBase {
  status: ServiceStatus;
  /** States visited, in order. */
  trace: BootstrapState[];
}

export type BootstrapOutcome =
  | (OutcomeBase & { baseUrl: string; failureReason?: undefined })
  | (OutcomeBase & {
      baseUrl?: undefined;
      failureReason: string;
      error: ProcessLaunchFailure | CapabilityEnableFailure;
    });

export type BootstrapFailure = Extract<BootstrapOutcome, { failureReason: string }>;

export const LAUNCH_FAILED_MESSAGE =
  "Failed to launch Dash. Please make sure Dash is installed and start it manually, then try again.";

export const ENABLE_FAILED_MESSAGE =
  "Failed to enable Dash API Server automatically. Please enable it manually in Dash Settings > Integration.";

export interface BootstrapTimings {
  /** Total time to wait for Dash to come up after a launch. */
  launchSettleMs: number;
  /** Time to wait for Dash to pick up the API server setting. */
  enableSettleMs: number;
  /** Interval at which the process probe is repeated during the launch wait. */
  pollIntervalMs: number;
}

export interface BootstrapDeps {
  probe: ProcessProbe;
  launcher: ProcessLauncher;
  enabler: CapabilityEnabler;
  ports: PortResolver;
  health: HealthChecker;
  targets: readonly DashTarget[];
  timings: BootstrapTimings;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

/**
 * Brings Dash to a state where its API answers, and returns the base URL.
 * Every call starts from live process and file state, so a call after a
 * failure or a Dash restart converges again.
 */
export class BootstrapCoordinator {
  private readonly wait: (ms: number) => Promise<void>;

  constructor(private readonly deps: BootstrapDeps) {
    this.wait = deps.sleep ?? sleep;
  }

  async resolve(): Promise<BootstrapOutcome> {
    const { logger } = this.deps;
    const trace: BootstrapState[] = ["NotChecked"];
    const status: ServiceStatus = { processRunning: false, apiEnabled: false, healthy: false };

    status.processRunning = await this.deps.probe.isRunning();
    if (!status.processRunning) {
      trace.push("ProcessDown", "Launching");
      logger.info("Dash is not running. Launching Dash...");
      status.processRunning = await this.launch();
      if (!status.processRunning) {
        trace.push("LaunchFailed");
        logger.error(LAUNCH_FAILED_MESSAGE);
        return {
          status,
          trace,
          failureReason: LAUNCH_FAILED_MESSAGE,
          error: new ProcessLaunchFailure(LAUNCH_FAILED_MESSAGE),
        };
      }
      logger.info("Dash launched successfully");
    }
    trace.push("ProcessUp");

    const port = await this.verifiedPort(status, trace);
    if (port !== undefined) {
      trace.push("Ready");
      return { status, trace, baseUrl: baseUrlForPort(port) };
    }

    trace.push("EnablingAPI");
    logger.info("The Dash API Server is not enabled. Attempting to enable it automatically...");
    const report = await this.deps.enabler.enableApiServer(this.deps.targets);
    if (report.written.length === 0) {
      logger.warning("Could not write the API server setting for any Dash distribution");
    }
    await this.wait(this.deps.timings.enableSettleMs);

    const retried = await this.verifiedPort(status, trace);
    if (retried === undefined) {
      trace.push("EnableFailed");
      logger.error(ENABLE_FAILED_MESSAGE);
      return {
        status,
        trace,
        failureReason: ENABLE_FAILED_MESSAGE,
        error: new CapabilityEnableFailure(ENABLE_FAILED_MESSAGE),
      };
    }
    logger.info("Successfully enabled Dash API Server");
    trace.push("Ready");
    return { status, trace, baseUrl: baseUrlForPort(retried) };
  }

  /** Tries each distribution until one launch command succeeds, then waits for the process. */
  private async launch(): Promise<boolean> {
    for (const target of this.deps.targets) {
      if (await this.deps.launcher.launch(target)) {
        this.deps.logger.debug(`Launched ${target.label} (${target.bundleId})`);
        return this.waitForProcess();
      }
    }
    return false;
  }

  /** Polls the process probe until it reports Dash or the settle budget runs out. */
  private async waitForProcess(): Promise<boolean> {
    const { launchSettleMs, pollIntervalMs } = this.deps.timings;
    let waited = 0;
    do {
      const step = Math.min(pollIntervalMs, launchSettleMs - waited);
      await this.wait(step);
      waited += step;
      if (await this.deps.probe.isRunning()) return true;
    } while (waited < launchSettleMs);
    return false;
  }

  private async verifiedPort(
    status: ServiceStatus,
    trace: BootstrapState[]
  ): Promise<number | undefined> {
    trace.push("PortUnknown");
    const port = await this.deps.ports.resolvePort();
    status.port = port;
    if (port === undefined) {
      status.apiEnabled = false;
      status.healthy = false;
      return undefined;
    }
    trace.push("PortKnown");
    status.apiEnabled = true;
    status.healthy = await this.deps.health.probe(port);
    if (!status.healthy) {
      trace.push("HealthFailed");
      return undefined;
    }
    return port;
  }
}
