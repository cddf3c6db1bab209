#!/usr/bin/env node
/**
 * Dash Docs MCP Server
 *
 * Exposes the local Dash documentation browser to MCP clients
 * (list_installed_docsets, search_documentation, fetch_documentation_url,
 * enable_docset_fts). Each call first makes sure Dash is running with its
 * API server enabled, then talks to that API over HTTP.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { createServerContext } from "./context.js";
import { createLogger } from "./logger.js";
import { SERVER_NAME, createDashServer } from "./server.js";

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const server = createDashServer(createServerContext(config, logger));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.forwardTo((level, message) =>
    server.server.sendLoggingMessage({ level, logger: SERVER_NAME, data: message })
  );
}

main().catch((err) => {
  console.error("MCP server error:", err);
  process.exit(1);
});
