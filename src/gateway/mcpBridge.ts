import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema, McpError } from "@modelcontextprotocol/sdk/types.js";

import { runWithRequestContext } from "../infra/requestContext.js";
import { StructuredLogger } from "../logger.js";
import { toGatewayError } from "../rpc/errors.js";
import type { GatewayDispatcher } from "./dispatcher.js";

/**
 * Builds the MCP server exposed over stdio. The SDK owns the session
 * handshake; `tools/list` and `tools/call` delegate to the same dispatcher the
 * HTTP endpoint uses, so both surfaces stay identical.
 */
export function createMcpServer(
  dispatcher: GatewayDispatcher,
  serverInfo: { name: string; version: string },
  logger?: StructuredLogger,
): Server {
  const server = new Server(serverInfo, { capabilities: { tools: { listChanged: false } } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: dispatcher.listTools() }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const context = { requestId: extra.requestId, method: "tools/call", transport: "stdio" } as const;
    return runWithRequestContext(context, async () => {
      try {
        return await dispatcher.callTool(request.params.name, request.params.arguments ?? {}, extra.signal);
      } catch (error) {
        const gatewayError = toGatewayError(error);
        logger?.warn("mcp_tool_call_failed", {
          tool: request.params.name,
          code: gatewayError.code,
          category: gatewayError.category,
          message: gatewayError.message,
        });
        throw new McpError(gatewayError.code, gatewayError.message, gatewayError.data);
      }
    });
  });

  return server;
}
