import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { DocsetResults } from "../api/schemas.js";
import { shapeToBudget } from "../budget/truncate.js";
import type { ServerContext } from "../context.js";
import { UpstreamHttpError, describeError } from "../errors.js";
import { reportBootstrapFailure } from "./messages.js";
import { present } from "./present.js";

export const LIST_DOCSETS_DESCRIPTION =
  "List all installed documentation sets in Dash. An empty list is returned if the user has no docsets installed. " +
  "Results are automatically truncated if they would exceed the token budget (25,000 tokens by default).";

export const ListDocsetsSchema = {};

export async function listInstalledDocsets(ctx: ServerContext): Promise<DocsetResults> {
  const { logger } = ctx;
  const outcome = await ctx.bootstrap.resolve();
  if (outcome.baseUrl === undefined) {
    return { docsets: [], total: 0, truncated: false, error: reportBootstrapFailure(logger, outcome) };
  }

  try {
    logger.debug("Fetching installed docsets from Dash API");
    const docsets = await ctx.createClient(outcome.baseUrl).listDocsets();
    logger.info(`Found ${docsets.length} installed docsets`);

    const shaped = shapeToBudget(docsets, ctx.config.tokenLimit);
    if (shaped.truncated) {
      logger.warning(
        `Token limit reached. Returning ${shaped.items.length} of ${docsets.length} docsets to stay under the ${ctx.config.tokenLimit} token limit.`
      );
    }
    return { docsets: shaped.items, total: docsets.length, truncated: shaped.truncated };
  } catch (err) {
    if (err instanceof UpstreamHttpError) {
      if (err.status === 404) {
        logger.warning("No docsets found. Install some in Settings > Downloads.");
        return {
          docsets: [],
          total: 0,
          truncated: false,
          error: "No docsets found. Instruct the user to install some docsets in Settings > Downloads.",
        };
      }
      logger.error(`HTTP error: ${err.message}`);
      return { docsets: [], total: 0, truncated: false, error: `HTTP error: ${err.message}` };
    }
    logger.error(`Failed to get installed docsets: ${describeError(err)}`);
    return {
      docsets: [],
      total: 0,
      truncated: false,
      error: `Failed to get installed docsets: ${describeError(err)}`,
    };
  }
}

export function handleListDocsets(ctx: ServerContext): () => Promise<CallToolResult> {
  return async () => {
    const result = await listInstalledDocsets(ctx);
    return present(result, result.error !== undefined);
  };
}
