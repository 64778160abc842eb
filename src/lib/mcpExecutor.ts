// src/lib/mcpExecutor.ts
import type { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { z } from "zod";
import type { ToolExecutor } from "./dispatch.js";
import type { ToolArgs, ToolResult } from "./types.js";

// --- MCP tool response minimal schema ---
const ToolResponseSchema = z.object({
  content: z
    .array(z.object({ type: z.string(), text: z.string().optional() }).passthrough())
    .default([]),
  isError: z.boolean().optional(),
});

export function textOf(res: unknown): { text: string; isError: boolean } {
  const parsed = ToolResponseSchema.parse(res);
  const text = parsed.content
    .filter((c) => c.type === "text" && typeof c.text === "string")
    .map((c) => c.text)
    .join("\n");
  return { text, isError: parsed.isError ?? false };
}

/** MCP サーバ側はツール結果を JSON 文字列で返す */
export function decodeToolResponse(res: unknown): ToolResult {
  const { text, isError } = textOf(res);
  if (isError) return { error: text || "Tool call failed" };
  try {
    return { result: JSON.parse(text) };
  } catch {
    return { result: text };
  }
}

/** MCP クライアント経由でツールを実行する（CLI の --mcp モード） */
export class McpToolExecutor implements ToolExecutor {
  constructor(private readonly client: Client) {}

  async call(name: string, args: ToolArgs): Promise<ToolResult> {
    const res = await this.client.callTool({ name, arguments: args });
    return decodeToolResponse(res);
  }
}
