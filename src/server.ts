import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { APP_VERSION } from "./config";
import { callTool, TOOL_DEFINITIONS, type ToolContext } from "./tools";

/**
 * Factory to construct a new MCP Server instance with tool handlers.
 *
 * A fresh server instance is created per transport session (important for
 * HTTP streamable mode where multiple clients may connect). They all share
 * the one document session held by `ctx`.
 */
export function createServer(ctx: ToolContext): Server {
  const server = new Server(
    { name: "doc-rag-server", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOL_DEFINITIONS }));

  // The request's abort signal fires when the client cancels or disconnects;
  // indexing stops at the next embedding call.
  server.setRequestHandler(CallToolRequestSchema, async (req, extra) =>
    callTool(ctx, req.params.name, req.params.arguments, extra.signal),
  );

  return server;
}
