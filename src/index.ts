import { FastMCP } from "fastmcp";
import { ConfigError, loadConfig, type ServerConfig } from "./config.ts";
import { allResources } from "./resources/constants.ts";
import { calculateTangentTool, checkAngleTool, trigStepTool } from "./tools/index.ts";
import { NAME, VERSION } from "./version.ts";

function readConfig(): ServerConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

const config = readConfig();

const server = new FastMCP({
  name: NAME,
  version: VERSION,
});

// Register tools
server.addTool(calculateTangentTool);
server.addTool(checkAngleTool);
server.addTool(trigStepTool);

// Register resources
for (const resource of allResources) {
  server.addResource(resource);
}

// stdio for local MCP clients; httpStream when configured
if (config.transport === "httpStream") {
  await server.start({ transportType: "httpStream", httpStream: { port: config.port } });
} else {
  await server.start({ transportType: "stdio" });
}
