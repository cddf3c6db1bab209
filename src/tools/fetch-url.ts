import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { FetchResult } from "../api/schemas.js";
import type { ServerContext } from "../context.js";
import { UpstreamHttpError, describeError } from "../errors.js";
import { reportBootstrapFailure } from "./messages.js";
import { present } from "./present.js";

export const FETCH_URL_DESCRIPTION =
  "Fetch the content of a documentation URL. The URL should be a load_url from search_documentation results. " +
  "Only URLs under the Dash API base (discovered from Dash's status) are allowed. Very large pages are returned as-is.";

export const FetchUrlSchema = {
  url: z.string().describe("A load_url value from search_documentation results"),
};

/** Only the discovered API base itself or paths beneath it may be fetched. */
export function isUnderBaseUrl(url: string, baseUrl: string): boolean {
  return url === baseUrl || url.startsWith(`${baseUrl}/`);
}

export async function fetchDocumentationUrl(ctx: ServerContext, rawUrl: string): Promise<FetchResult> {
  const { logger } = ctx;
  const url = rawUrl.trim();
  if (!url) {
    logger.error("URL cannot be empty");
    return { content: "", error: "URL cannot be empty" };
  }

  const outcome = await ctx.bootstrap.resolve();
  if (outcome.baseUrl === undefined) {
    return { content: "", error: reportBootstrapFailure(logger, outcome) };
  }
  const baseUrl = outcome.baseUrl;

  if (!isUnderBaseUrl(url, baseUrl)) {
    logger.error(`URL must start with the Dash API base (${baseUrl})`);
    return {
      content: "",
      error: `URL must start with the Dash API base (${baseUrl}). Only load_url values from search_documentation are allowed.`,
    };
  }

  try {
    logger.debug(`Fetching documentation URL: ${url}`);
    const content = await ctx.createClient(baseUrl).fetchText(url);
    logger.info("Fetched documentation content successfully");
    return { content };
  } catch (err) {
    if (err instanceof UpstreamHttpError) {
      logger.error(`HTTP error fetching URL: ${err.message}`);
      return { content: "", error: `HTTP error: ${err.message}` };
    }
    logger.error(`Failed to fetch URL: ${describeError(err)}`);
    return { content: "", error: `Failed to fetch URL: ${describeError(err)}` };
  }
}

export function handleFetchUrl(ctx: ServerContext): (args: { url: string }) => Promise<CallToolResult> {
  return async ({ url }) => {
    const result = await fetchDocumentationUrl(ctx, url);
    return present(result, result.error !== undefined);
  };
}
