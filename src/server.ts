#!/usr/bin/env node
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { loadConfig } from "./core/config.js";
import { Config } from "./core/types.js";
import { InvocationEngine } from "./engine/engine.js";
import { validateConfiguration } from "./providers/health.js";
import { handleToolCall, toolDefinitions } from "./tools.js";

let config: Config;
try {
  config = loadConfig(process.argv[2]);
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(message);
  process.exit(1);
}

for (const issue of validateConfiguration(config)) {
  console.error(`Config warning: ${issue}`);
}

const engine = new InvocationEngine(config);

const server = new Server(
  {
    name: config.server.name,
    version: config.server.version
  },
  {
    capabilities: {
      tools: {}
    }
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: toolDefinitions(engine)
}));

server.setRequestHandler(CallToolRequestSchema, async (request) =>
  handleToolCall(engine, request.params.name, request.params.arguments)
);

function shutdown(signal: NodeJS.Signals): void {
  console.error(`Received ${signal}, stopping in-flight provider commands.`);
  engine.stop();
  process.exit(0);
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  console.error("Server error:", error);
  engine.stop();
  process.exit(1);
});
