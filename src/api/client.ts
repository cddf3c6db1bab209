import type { z } from "zod";
import { TransportError, UpstreamHttpError, ValidationError, describeError } from "../errors.js";
import type { FetchLike } from "../dash/health.js";
import {
  DocsetListResponseSchema,
  SearchResponseSchema,
  isStructurallyEmpty,
  type DocsetResult,
  type SearchResponse,
} from "./schemas.js";

export interface SearchParams {
  query: string;
  /** Comma-separated docset identifiers. */
  docsetIdentifiers: string;
  searchSnippets: boolean;
  maxResults: number;
}

export interface DashApiClientOptions {
  timeoutMs?: number;
  fetch?: FetchLike;
}

/**
 * Thin client for the Dash API server at a base URL obtained from bootstrap.
 * Non-2xx responses raise UpstreamHttpError with the body kept for matching.
 */
export class DashApiClient {
  private readonly timeoutMs: number;
  private readonly doFetch: FetchLike;

  constructor(
    readonly baseUrl: string,
    options: DashApiClientOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.doFetch = options.fetch ?? fetch;
  }

  async listDocsets(): Promise<DocsetResult[]> {
    const body = await this.getJson("/docsets/list");
    return this.validate(DocsetListResponseSchema, body, "docset list").docsets;
  }

  async search(params: SearchParams): Promise<SearchResponse> {
    const body = await this.getJson("/search", {
      query: params.query,
      docset_identifiers: params.docsetIdentifiers,
      search_snippets: String(params.searchSnippets),
      max_results: String(params.maxResults),
    });
    return this.validate(SearchResponseSchema, dropEmptyResults(body), "search response");
  }

  async enableFts(identifier: string): Promise<void> {
    await this.get("/docsets/enable_fts", { identifier });
  }

  /** Fetches an absolute URL as text. Callers are responsible for checking it is under baseUrl. */
  async fetchText(url: string): Promise<string> {
    const response = await this.send(url);
    return response.text();
  }

  private async get(pathname: string, query?: Record<string, string>): Promise<Response> {
    const url = new URL(pathname, this.baseUrl);
    if (query) {
      for (const [key, value] of Object.entries(query)) url.searchParams.set(key, value);
    }
    return this.send(url.toString());
  }

  private async getJson(pathname: string, query?: Record<string, string>): Promise<unknown> {
    const response = await this.get(pathname, query);
    const text = await response.text();
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new ValidationError(`Dash returned invalid JSON for ${pathname}: ${describeError(err)}`, {
        cause: err,
      });
    }
  }

  private async send(url: string): Promise<Response> {
    let response: Response;
    try {
      response = await this.doFetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (err) {
      throw new TransportError(`Request to ${url} failed: ${describeError(err)}`, url, { cause: err });
    }
    if (!response.ok) {
      const body = await response.text();
      throw new UpstreamHttpError(response.status, response.statusText, body, url);
    }
    return response;
  }

  private validate<S extends z.ZodTypeAny>(schema: S, body: unknown, what: string): z.output<S> {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown issue";
      throw new ValidationError(`Unexpected ${what} from Dash (${where})`);
    }
    return parsed.data;
  }
}

function dropEmptyResults(body: unknown): unknown {
  if (typeof body !== "object" || body === null || !("results" in body)) return body;
  const results = body.results;
  if (!Array.isArray(results)) return body;
  return { ...body, results: results.filter((item) => !isStructurallyEmpty(item)) };
}
