import { describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { baseUrlForPort } from "./targets.js";

export type FetchLike = typeof fetch;

export interface HealthChecker {
  probe(port: number): Promise<boolean>;
}

export const HEALTH_PATH = "/health";

export function createHealthChecker(
  logger: Logger,
  options: { timeoutMs?: number; fetch?: FetchLike } = {}
): HealthChecker {
  const timeoutMs = options.timeoutMs ?? 5_000;
  const doFetch = options.fetch ?? fetch;

  return {
    async probe(port) {
      const url = `${baseUrlForPort(port)}${HEALTH_PATH}`;
      try {
        const response = await doFetch(url, { signal: AbortSignal.timeout(timeoutMs) });
        if (!response.ok) {
          logger.debug(`Health check failed for ${url}: HTTP ${response.status}`);
          return false;
        }
        logger.debug(`Successfully connected to Dash API at ${baseUrlForPort(port)}`);
        return true;
      } catch (err) {
        logger.debug(`Health check failed for ${url}: ${describeError(err)}`);
        return false;
      }
    },
  };
}
