import type { Context } from "fastmcp";

type MCPContext = Context<Record<string, unknown> | undefined>;

/** The part of FastMCP's per-call context the tools use */
export type ToolContext = Pick<MCPContext, "log">;
