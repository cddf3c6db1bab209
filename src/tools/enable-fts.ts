import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { EnableFtsResult } from "../api/schemas.js";
import type { ServerContext } from "../context.js";
import { UpstreamHttpError, describeError } from "../errors.js";
import { reportBootstrapFailure } from "./messages.js";
import { present } from "./present.js";

export const ENABLE_FTS_DESCRIPTION =
  "Enable full-text search for a specific docset. Returns enabled=true if FTS was successfully enabled.";

export const EnableFtsSchema = {
  identifier: z.string().describe("The docset identifier (from list_installed_docsets)"),
};

export async function enableDocsetFts(ctx: ServerContext, identifier: string): Promise<EnableFtsResult> {
  const { logger } = ctx;
  if (!identifier.trim()) {
    logger.error("Docset identifier cannot be empty");
    return { enabled: false, error: "Docset identifier cannot be empty" };
  }

  const outcome = await ctx.bootstrap.resolve();
  if (outcome.baseUrl === undefined) {
    return { enabled: false, error: reportBootstrapFailure(logger, outcome) };
  }

  try {
    logger.debug(`Enabling FTS for docset: ${identifier}`);
    await ctx.createClient(outcome.baseUrl).enableFts(identifier);
    return { enabled: true };
  } catch (err) {
    let error: string;
    if (err instanceof UpstreamHttpError && err.status === 400) {
      error = `Bad request: ${err.body}`;
    } else if (err instanceof UpstreamHttpError && err.status === 404) {
      error = `Docset not found: ${identifier}`;
    } else if (err instanceof UpstreamHttpError) {
      error = `HTTP error: ${err.message}`;
    } else {
      error = `Failed to enable FTS: ${describeError(err)}`;
    }
    logger.error(error);
    return { enabled: false, error };
  }
}

export function handleEnableFts(
  ctx: ServerContext
): (args: { identifier: string }) => Promise<CallToolResult> {
  return async ({ identifier }) => {
    const result = await enableDocsetFts(ctx, identifier);
    return present(result, !result.enabled);
  };
}
