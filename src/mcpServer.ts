// src/mcpServer.ts
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CanvasStore } from "./lib/canvasStore.js";
import { APP_VERSION } from "./lib/config.js";
import { TOOLS, dispatchToolCall } from "./lib/dispatch.js";

/**
 * ディスパッチテーブルの全ツールを MCP ツールとして登録する。
 * 結果は JSON テキスト、失敗は isError で返す
 */
export function createMcpServer(store: CanvasStore): McpServer {
  const server = new McpServer({ name: "mcp-arch-diagram", version: APP_VERSION });

  for (const tool of TOOLS) {
    server.registerTool(
      tool.name,
      {
        title: tool.title,
        description: tool.description,
        inputSchema: tool.inputShape,
      },
      async (args) => {
        const res = await dispatchToolCall(store, tool.name, args);
        if ("error" in res) {
          return { isError: true, content: [{ type: "text" as const, text: res.error }] };
        }
        return { content: [{ type: "text" as const, text: JSON.stringify(res.result) }] };
      }
    );
  }
  return server;
}
