import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "./context.js";
import { ENABLE_FTS_DESCRIPTION, EnableFtsSchema, handleEnableFts } from "./tools/enable-fts.js";
import { FETCH_URL_DESCRIPTION, FetchUrlSchema, handleFetchUrl } from "./tools/fetch-url.js";
import { LIST_DOCSETS_DESCRIPTION, ListDocsetsSchema, handleListDocsets } from "./tools/list-docsets.js";
import { SEARCH_DESCRIPTION, SearchSchema, handleSearch } from "./tools/search.js";

export const SERVER_NAME = "dash-docs-mcp";
export const SERVER_VERSION = "1.0.0";

export function createDashServer(ctx: ServerContext): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        logging: {},
      },
    }
  );

  // --- list_installed_docsets ---
  server.tool("list_installed_docsets", LIST_DOCSETS_DESCRIPTION, ListDocsetsSchema, handleListDocsets(ctx));

  // --- search_documentation ---
  server.tool("search_documentation", SEARCH_DESCRIPTION, SearchSchema, handleSearch(ctx));

  // --- fetch_documentation_url ---
  server.tool("fetch_documentation_url", FETCH_URL_DESCRIPTION, FetchUrlSchema, handleFetchUrl(ctx));

  // --- enable_docset_fts ---
  server.tool("enable_docset_fts", ENABLE_FTS_DESCRIPTION, EnableFtsSchema, handleEnableFts(ctx));

  return server;
}
