#!/usr/bin/env node
/**
 * mcp-server.ts - MCP server entry point for plumbline
 *
 * When an MCP client connects, it spawns this process. The server exposes
 * one tool, "monitor", over stdio:
 *
 * 1. Create an McpServer with our server info
 * 2. Register the monitor tool (wraps the LangGraph monitoring agent)
 * 3. Start the stdio transport (JSON-RPC on stdin/stdout)
 */

// Initialize OpenTelemetry tracing before any other imports
import "./tracing";

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { registerMonitorTool } from "./tools/mcp";
import { VERSION } from "./cli";

async function main(): Promise<void> {
  const server = new McpServer({
    name: "plumbline",
    version: VERSION,
  });

  registerMonitorTool(server);

  // The client spawned this process; stdout belongs to the protocol
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  console.error("MCP server error:", error);
  process.exit(1);
});
