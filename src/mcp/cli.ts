#!/usr/bin/env node
/**
 * Entry point for the MCP server over stdio.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { RemoteSession } from "../index.js";
import { createLogger } from "../log.js";
import { loadConfig } from "../config.js";
import { createServer } from "./server.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger({ verbose: config.verbose, prefix: "a11y-bridge-mcp" });
  const session = await RemoteSession.connect({
    config,
    dumpFile: process.env.A11Y_BRIDGE_DUMP || undefined,
    log,
  });

  const server = createServer(session);
  await server.connect(new StdioServerTransport());
  log.debug("listening on stdio");
}

main().catch((err) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
