#!/usr/bin/env node
// src/clientCli.ts
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import { promises as fs } from "node:fs";
import path from "node:path";
import { DiagramAgent } from "./lib/agent.js";
import { CanvasStore } from "./lib/canvasStore.js";
import { loadConfig } from "./lib/config.js";
import { LocalToolExecutor, type ToolExecutor } from "./lib/dispatch.js";
import { errorMessage } from "./lib/errors.js";
import { OpenAIToolPlanner } from "./lib/llmClient.js";
import { setLogLevel } from "./lib/logger.js";
import { McpToolExecutor } from "./lib/mcpExecutor.js";
import { D2Renderer } from "./lib/render.js";
import type { ImageFormat } from "./lib/types.js";

// 使い方:
//   npx tsx src/clientCli.ts "要件プロンプト..."
//   npx tsx src/clientCli.ts --mcp --svg "要件プロンプト..."
// --mcp で MCP サーバ（src/server.ts）を子プロセスで起動し、ツール実行をそちらに任せる

const DEFAULT_PROMPT =
  "Microservices for an online shop: API gateway, user, cart and checkout services, a shared database, an order queue and CloudWatch monitoring";

type CliArgs = { useMcp: boolean; format: ImageFormat; prompt: string };

function parseArgs(argv: string[]): CliArgs {
  const flags = new Set(argv.filter((a) => a.startsWith("--")));
  const rest = argv.filter((a) => !a.startsWith("--"));
  return {
    useMcp: flags.has("--mcp"),
    format: flags.has("--svg") ? "svg" : "png",
    prompt: rest.join(" ").trim() || DEFAULT_PROMPT,
  };
}

async function main() {
  const { useMcp, format, prompt } = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  setLogLevel(config.logLevel);
  if (!config.openaiApiKey) throw new Error("OPENAI_API_KEY が未設定です。");

  let executor: ToolExecutor;
  let close: () => Promise<void>;

  if (useMcp) {
    // env: convert NodeJS.ProcessEnv to Record<string,string>
    const envObj: Record<string, string> = Object.fromEntries(
      Object.entries(process.env).filter((kv): kv is [string, string] => typeof kv[1] === "string")
    );
    // すでに build 済みなら ["node","dist/server.js"] でもOK
    const transport = new StdioClientTransport({
      command: "npx",
      args: ["-y", "tsx", "src/server.ts"],
      env: envObj,
    });
    const client = new Client({ name: "arch-diagram-cli", version: "0.1.0" });
    await client.connect(transport);
    executor = new McpToolExecutor(client);
    close = () => client.close();
  } else {
    const store = new CanvasStore({
      tempDir: config.tempDir,
      renderer: new D2Renderer(config.renderTimeoutMs),
      d2: { direction: config.diagramDirection },
    });
    executor = new LocalToolExecutor(store);
    close = () => store.cleanupAllTempFiles();
  }

  try {
    const agent = new DiagramAgent({
      planner: new OpenAIToolPlanner({
        apiKey: config.openaiApiKey,
        model: config.openaiModel,
        timeoutMs: config.openaiTimeoutMs,
        maxRetries: config.openaiMaxRetries,
      }),
      executor,
    });
    const result = await agent.generateDiagram({ description: prompt, format });
    if (!result.success || !result.imagePath) {
      throw new Error(`図を生成できませんでした: ${result.error ?? "unknown error"}`);
    }

    // 出力フォルダ（一時ファイルは close で消えるので先にコピー）
    const outDir = path.join(process.cwd(), "out");
    await fs.mkdir(outDir, { recursive: true });
    const outPath = path.join(outDir, `diagram.${format}`);
    await fs.copyFile(result.imagePath, outPath);

    console.log("\n✅ 図を生成しました。");
    console.log(" - Image    :", outPath);
    console.log(" - Reasoning:", result.reasoning);
  } finally {
    await close();
  }
}

main().catch((e) => {
  console.error("Error:", errorMessage(e));
  process.exit(1);
});
