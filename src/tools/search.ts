import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SearchResults } from "../api/schemas.js";
import { shapeToBudget } from "../budget/truncate.js";
import type { ServerContext } from "../context.js";
import { UpstreamHttpError, describeError } from "../errors.js";
import { CONNECTION_HINT, reportBootstrapFailure } from "./messages.js";
import { present } from "./present.js";

export const SEARCH_DESCRIPTION =
  "Search for documentation across docset identifiers and snippets. " +
  "Results are automatically truncated if they would exceed the token budget (25,000 tokens by default).";

export const MAX_RESULTS_LIMIT = 1000;

export const SearchSchema = {
  query: z.string().describe("The search query string"),
  docset_identifiers: z
    .string()
    .describe("Comma-separated list of docset identifiers to search in (from list_installed_docsets)"),
  search_snippets: z
    .boolean()
    .default(true)
    .describe("Whether to include snippets in search results"),
  max_results: z
    .number()
    .int()
    .default(100)
    .describe(`Maximum number of results to return (1-${MAX_RESULTS_LIMIT})`),
};

export interface SearchArgs {
  query: string;
  docset_identifiers: string;
  search_snippets: boolean;
  max_results: number;
}

const failure = (error: string): SearchResults => ({ results: [], total: 0, truncated: false, error });

/** Input checks that run before any bootstrap or network call. */
export function validateSearchArgs(args: SearchArgs): string | undefined {
  if (!args.query.trim()) return "Query cannot be empty";
  if (!args.docset_identifiers.trim()) {
    return "docset_identifiers cannot be empty. Get the docset identifiers using list_installed_docsets";
  }
  if (args.max_results < 1 || args.max_results > MAX_RESULTS_LIMIT) {
    return `max_results must be between 1 and ${MAX_RESULTS_LIMIT}`;
  }
  return undefined;
}

/** Maps an error response from /search to guidance for the caller. */
export function classifySearchError(err: UpstreamHttpError): { log: string; error: string } {
  const text = err.body;
  if (err.status === 400) {
    if (text.includes("Docset with identifier") && text.includes("not found")) {
      return {
        log: "Invalid docset identifier. Run list_installed_docsets to see available docsets.",
        error:
          "Invalid docset identifier. Run list_installed_docsets to see available docsets, then use the exact identifier from that list.",
      };
    }
    if (text.includes("No docsets found")) {
      return {
        log: "No valid docsets found for search.",
        error:
          "No valid docsets found for search. Either provide valid docset identifiers from list_installed_docsets, or set search_snippets=true to search snippets only.",
      };
    }
    return { log: `Bad request: ${text}`, error: `Bad request: ${text}. ${CONNECTION_HINT}` };
  }
  if (err.status === 403) {
    if (text.includes("API access blocked due to Dash trial expiration")) {
      return {
        log: "Dash trial expired. Purchase Dash to continue using the API.",
        error:
          "Your Dash trial has expired. Purchase Dash at https://kapeli.com/dash to continue using the API. During trial expiration, API access is blocked.",
      };
    }
    return { log: `Forbidden: ${text}`, error: `Forbidden: ${text}. ${CONNECTION_HINT}` };
  }
  return { log: `HTTP error: ${err.message}`, error: `HTTP error: ${err.message}. ${CONNECTION_HINT}` };
}

export async function searchDocumentation(ctx: ServerContext, args: SearchArgs): Promise<SearchResults> {
  const { logger } = ctx;
  const invalid = validateSearchArgs(args);
  if (invalid) {
    logger.error(invalid);
    return failure(invalid);
  }

  const outcome = await ctx.bootstrap.resolve();
  if (outcome.baseUrl === undefined) return failure(reportBootstrapFailure(logger, outcome));

  try {
    logger.debug(`Searching Dash API with query: '${args.query}'`);
    const response = await ctx.createClient(outcome.baseUrl).search({
      query: args.query,
      docsetIdentifiers: args.docset_identifiers,
      searchSnippets: args.search_snippets,
      maxResults: args.max_results,
    });

    const warning = response.message;
    if (warning !== undefined) logger.warning(warning);

    const results = response.results;
    if (results.length === 0 && args.query.includes(" ")) {
      return failure("Nothing found. Try to search for fewer terms.");
    }
    logger.info(`Found ${results.length} results`);

    const shaped = shapeToBudget(results, ctx.config.tokenLimit);
    if (shaped.truncated) {
      logger.warning(
        `Token limit reached. Returning ${shaped.items.length} of ${results.length} results to stay under the ${ctx.config.tokenLimit} token limit.`
      );
    }
    const shapedResults: SearchResults = {
      results: shaped.items,
      total: results.length,
      truncated: shaped.truncated,
    };
    if (warning !== undefined) shapedResults.error = warning;
    return shapedResults;
  } catch (err) {
    if (err instanceof UpstreamHttpError) {
      const { log, error } = classifySearchError(err);
      logger.error(log);
      return failure(error);
    }
    logger.error(`Search failed: ${describeError(err)}`);
    return failure(`Search failed: ${describeError(err)}. ${CONNECTION_HINT}`);
  }
}

export function handleSearch(ctx: ServerContext): (args: SearchArgs) => Promise<CallToolResult> {
  return async (args) => {
    const result = await searchDocumentation(ctx, args);
    return present(result, result.error !== undefined && result.results.length === 0);
  };
}
