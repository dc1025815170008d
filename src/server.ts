#!/usr/bin/env node
/**
 * stdio entry point. Configuration comes from the environment (and .env).
 */

import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { createServer } from "./mcp.js";
import { createFileSystem } from "./workspace.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const fs = createFileSystem(config.workspace, config.restrictToWorkspace);
  const server = createServer(config, fs);
  await server.connect(new StdioServerTransport());
  logger.info(
    { workspace: config.workspace || undefined, restricted: config.restrictToWorkspace },
    "paper-harvest MCP server running on stdio"
  );
}

main().catch((err: unknown) => {
  logger.fatal({ err: errorMessage(err) }, "server failed to start");
  process.exit(1);
});
