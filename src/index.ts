import { FastMCP } from "fastmcp";
import { z } from "zod";
import { schemaCache } from "./lib/schema-cache.ts";
import { analyzePatternTool, extractGroupsTool, findAllTool } from "./tools/index.ts";

// Schema cache size, overridable from the environment
const cacheSize = z.coerce
  .number()
  .int()
  .min(0)
  .default(256)
  .parse(process.env.REGEX_SLOTS_CACHE_SIZE);

schemaCache.configure({ maxSize: cacheSize });

const server = new FastMCP({
  name: "Regex Slots MCP",
  version: "0.1.0",
});

// Register tools
server.addTool(analyzePatternTool);
server.addTool(extractGroupsTool);
server.addTool(findAllTool);

// Start server (stdio for local MCP agents)
await server.start({ transportType: "stdio" });
