#!/usr/bin/env node

import 'dotenv/config';
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { enableStdoutGuard, log, setLogLevel } from "./utils/logger.js";
import { loadConfig } from "./utils/config.js";
import { createClientRuntime } from "./utils/clientRuntime.js";
import { invokeOperation, listTools } from "./tools/index.js";
import { toErrorPayload } from "./utils/errorHandler.js";

// stdout carries the MCP protocol; guard it before anything can log
enableStdoutGuard();

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const runtime = createClientRuntime(config);
  log("INFO", `Loaded ${config.orgs.length} org(s); default org is "${config.defaultOrg}"`);

  const server = new Server(
    {
      name: "salesforce-org-mcp",
      version: "0.1.0",
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: listTools(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;
    const response = await invokeOperation(runtime, { operation_name: name, arguments: args }, extra.signal);

    if ("result" in response) {
      return {
        content: [{ type: "text", text: JSON.stringify(response.result ?? null, null, 2) }],
        isError: false,
      };
    }
    return {
      content: [{ type: "text", text: JSON.stringify(response, null, 2) }],
      isError: true,
    };
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log("INFO", "Salesforce MCP Server running on stdio");
}

main().catch((error: unknown) => {
  log("ERROR", "Fatal error running server:", toErrorPayload(error));
  process.exit(1);
});
