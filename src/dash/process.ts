import type { Logger } from "../logger.js";
import type { CommandRunner } from "./command.js";
import type { DashTarget } from "./targets.js";

export interface ProcessProbe {
  isRunning(): Promise<boolean>;
}

export interface ProcessLauncher {
  /** Starts the target in the background. Resolves false when the launch command fails. */
  launch(target: DashTarget): Promise<boolean>;
}

export function createProcessProbe(
  run: CommandRunner,
  logger: Logger,
  timeoutMs = 5_000
): ProcessProbe {
  return {
    async isRunning() {
      const result = await run("pgrep", ["-f", "Dash"], { timeoutMs });
      if (result.exitCode === null) {
        logger.debug(`pgrep did not complete: ${result.stderr.trim()}`);
      }
      return result.exitCode === 0;
    },
  };
}

export function createProcessLauncher(
  run: CommandRunner,
  logger: Logger,
  timeoutMs = 10_000
): ProcessLauncher {
  return {
    async launch(target) {
      // -g: stay in the background, -j: launch hidden
      const result = await run("open", ["-g", "-j", "-b", target.bundleId], { timeoutMs });
      if (result.exitCode !== 0) {
        logger.debug(`Launching ${target.label} (${target.bundleId}) failed: ${result.stderr.trim()}`);
        return false;
      }
      return true;
    },
  };
}
