import type { Logger } from "../logger.js";
import type { CommandRunner } from "./command.js";
import { API_SERVER_ENABLED_KEY, type DashTarget } from "./targets.js";

export interface EnableReport {
  /** Preference domains the write succeeded for. */
  written: string[];
  /** Preference domains the write failed for, with the reason. */
  failed: Array<{ domain: string; reason: string }>;
}

export interface CapabilityEnabler {
  enableApiServer(targets: readonly DashTarget[]): Promise<EnableReport>;
}

/**
 * Turns on the API server setting in every given preferences domain. Writing
 * the same value again is harmless, so this runs for all distributions rather
 * than guessing which one is running.
 */
export function createCapabilityEnabler(
  run: CommandRunner,
  logger: Logger,
  timeoutMs = 10_000
): CapabilityEnabler {
  return {
    async enableApiServer(targets) {
      const report: EnableReport = { written: [], failed: [] };
      for (const target of targets) {
        const domain = target.preferenceDomain;
        const result = await run(
          "defaults",
          ["write", domain, API_SERVER_ENABLED_KEY, "-bool", "YES"],
          { timeoutMs }
        );
        if (result.exitCode === 0) {
          report.written.push(domain);
        } else {
          const reason = result.stderr.trim() || `exit code ${result.exitCode ?? "none"}`;
          logger.debug(`defaults write ${domain} failed: ${reason}`);
          report.failed.push({ domain, reason });
        }
      }
      return report;
    },
  };
}
