#!/usr/bin/env node
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { getVersionInfo, parseArgs } from './cli-options.js';
import { SessionManager } from './session-manager.js';
import { TOOL_DEFINITIONS, handleToolCall } from './tools.js';
import { startWebServer } from './web-server.js';

async function main() {
  const options = parseArgs(process.argv.slice(2));
  const versionInfo = getVersionInfo();

  if (options.showVersion) {
    console.log(`${versionInfo.name} v${versionInfo.version}`);
    if (versionInfo.description) {
      console.log(versionInfo.description);
    }
    if (versionInfo.license) {
      console.log(`License: ${versionInfo.license}`);
    }
    process.exit(0);
  }

  const sessionManager = new SessionManager({ timings: options.timings });

  const server = new Server({
    name: versionInfo.name,
    version: versionInfo.version
  }, {
    capabilities: {
      tools: {}
    }
  });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOL_DEFINITIONS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(sessionManager, name, args);
  });

  const shutdown = (signal: string) => {
    console.error(`Received ${signal}, closing ${sessionManager.listSessions().length} session(s)`);
    sessionManager.closeAll();
    process.exit(0);
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  // Start MCP server on stdio
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('Telnet MCP server running on stdio');

  if (!options.noWebUI) {
    // The MCP channel keeps working without the monitor
    startWebServer(sessionManager, options.webPort, versionInfo).catch((error) => {
      console.error(`Failed to start web monitor: ${error}`);
    });
  } else {
    console.error('Web monitor disabled by --no-web-ui flag');
  }
}

main().catch((error) => {
  console.error('Server error:', error);
  process.exit(1);
});
