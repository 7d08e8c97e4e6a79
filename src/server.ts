import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";

import { logRequest, logResponse } from "./logging.js";
import { TOOLS, handleToolCall, setToolContext, type ToolContext } from "./tools.js";

export const SERVER_INFO = {
  name: "account-plan-research",
  version: "1.0.0",
};

/**
 * MCP server exposing the account plan tools.
 *
 * handleToolCall turns every failure, unknown tool names included, into an
 * `isError` result, so neither handler throws. A context passed here
 * replaces the one the tools would otherwise build from configuration.
 */
export function createServer(context?: ToolContext): Server {
  if (context) {
    setToolContext(context);
  }

  const server = new Server(SERVER_INFO, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    logRequest("tools/list", {});
    return { tools: TOOLS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args = {} } = request.params;
    logRequest("tools/call", { name });

    const result = await handleToolCall(name, args);
    logResponse("tools/call", { name, isError: result.isError === true });
    return result;
  });

  return server;
}
