/**
 * MCPサーバーの構築（トランスポート非依存）
 */
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { SERVER_NAME, SERVER_VERSION, type ServerContext } from './core/context.js';
import { dispatchTool, TOOL_DEFINITIONS } from './core/handlers.js';

export function createMcpServer(context: ServerContext): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // ListToolsハンドラ登録
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOL_DEFINITIONS };
  });

  // ツールハンドラ登録
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return dispatchTool(context, name, args ?? {});
  });

  return server;
}
