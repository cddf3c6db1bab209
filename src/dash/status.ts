import * as fs from "node:fs/promises";
import type { Logger } from "../logger.js";

export interface PortResolver {
  /** Port the API server bound to, or undefined when it cannot be determined. */
  resolvePort(): Promise<number | undefined>;
}

function isValidPort(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0 && value < 65536;
}

/**
 * Reads the status record Dash writes when its API server is running. A
 * missing file, bad JSON or an absent port are normal while the server is
 * off, so they all resolve to undefined.
 */
export function createPortResolver(statusFile: string, logger: Logger): PortResolver {
  return {
    async resolvePort() {
      let raw: string;
      try {
        raw = await fs.readFile(statusFile, "utf-8");
      } catch (err) {
        const code = err instanceof Error && "code" in err ? String(err.code) : "unknown";
        logger.debug(`Status file ${statusFile} not readable (${code})`);
        return undefined;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch {
        logger.debug(`Status file ${statusFile} is not valid JSON`);
        return undefined;
      }

      if (typeof parsed !== "object" || parsed === null || !("port" in parsed)) {
        return undefined;
      }
      return isValidPort(parsed.port) ? parsed.port : undefined;
    },
  };
}
