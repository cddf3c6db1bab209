import type { BootstrapFailure } from "../dash/bootstrap.js";
import type { Logger } from "../logger.js";

export const CONNECTION_HINT =
  "Please ensure Dash is running and the API server is enabled (in Dash Settings > Integration).";

/** Logs where bootstrap stopped and returns the message shown to the caller. */
export function reportBootstrapFailure(logger: Logger, outcome: BootstrapFailure): string {
  const last = outcome.trace.at(-1) ?? "NotChecked";
  logger.debug(`Bootstrap ended in ${last} (${outcome.error.name})`);
  return outcome.failureReason;
}
