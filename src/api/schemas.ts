import { z } from "zod";

const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

export const DocsetSchema = z.object({
  name: z.string().describe("Display name of the docset"),
  identifier: z.string().describe("Unique identifier"),
  platform: z.string().describe("Platform/type of the docset"),
  full_text_search: z
    .string()
    .describe("Full-text search status: 'not supported', 'disabled', 'indexing', or 'enabled'"),
  notice: optionalString.describe("Optional notice about the docset status"),
});

export type DocsetResult = z.infer<typeof DocsetSchema>;

export const SearchHitSchema = z.object({
  name: z.string().describe("Name of the documentation entry"),
  type: z.string().describe("Type of result (Function, Class, etc.)"),
  platform: optionalString.describe("Platform of the result"),
  load_url: z.string().describe("URL to load the documentation"),
  docset: optionalString.describe("Name of the docset"),
  description: optionalString.describe("Additional description"),
  language: optionalString.describe("Programming language (snippet results only)"),
  tags: optionalString.describe("Tags (snippet results only)"),
});

export type SearchResult = z.infer<typeof SearchHitSchema>;

export const DocsetListResponseSchema = z.object({
  docsets: z.array(DocsetSchema).default([]),
});

export const SearchResponseSchema = z.object({
  results: z.array(SearchHitSchema).default([]),
  message: optionalString,
});

export type SearchResponse = z.infer<typeof SearchResponseSchema>;

/**
 * True for entries that carry no record: `null`, scalars, arrays and objects
 * with no fields. Dash sends these as "no results" placeholders.
 */
export function isStructurallyEmpty(value: unknown): boolean {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return true;
  return Object.keys(value).length === 0;
}

export interface DocsetResults {
  docsets: DocsetResult[];
  /** Number of docsets Dash reported before truncation. */
  total: number;
  truncated: boolean;
  error?: string;
}

export interface SearchResults {
  results: SearchResult[];
  total: number;
  truncated: boolean;
  error?: string;
}

export interface FetchResult {
  content: string;
  error?: string;
}

export interface EnableFtsResult {
  enabled: boolean;
  error?: string;
}
