import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { createServerContext } from "./context.js";
import { CompanyToolRegistry } from "./tool-registry.js";
import { getToolDefinitions } from "./company-tools.js";
import { logInfo } from "../core/logging.js";

// Server configuration
const SERVER_NAME = "companies-registry-mcp";
const SERVER_VERSION = "1.0.0";

export async function startServer(): Promise<void> {
  const ctx = createServerContext();

  const registry = new CompanyToolRegistry(getToolDefinitions());

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.describe(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return registry.dispatch(name, args, ctx);
  });

  // Graceful shutdown
  process.on("SIGINT", () => {
    logInfo("Received SIGINT, shutting down...");
    process.exit(0);
  });
  process.on("SIGTERM", () => {
    logInfo("Received SIGTERM, shutting down...");
    process.exit(0);
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logInfo(`${SERVER_NAME} v${SERVER_VERSION} running on stdio`);
}
