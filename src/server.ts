// src/server.ts
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CanvasStore } from "./lib/canvasStore.js";
import { loadConfig } from "./lib/config.js";
import { MODEL_TOOLS, TOOLS } from "./lib/dispatch.js";
import { createLogger, setLogLevel } from "./lib/logger.js";
import { D2Renderer } from "./lib/render.js";
import { createMcpServer } from "./mcpServer.js";

const config = loadConfig();
setLogLevel(config.logLevel);
const log = createLogger("mcp");

const store = new CanvasStore({
  tempDir: config.tempDir,
  renderer: new D2Renderer(config.renderTimeoutMs),
  d2: { direction: config.diagramDirection },
});
const server = createMcpServer(store);

async function shutdown(code: number) {
  await store.cleanupAllTempFiles();
  process.exit(code);
}

process.on("SIGINT", () => void shutdown(0));
process.on("SIGTERM", () => void shutdown(0));

// STDIO で待受
const transport = new StdioServerTransport();
transport.onclose = () => void shutdown(0);
await server.connect(transport);

// 起動確認ログ（STDIO衝突回避のため stderr に）
log.info(
  `MCP server ready (stdio). Tools: ${TOOLS.map((t) => t.name).join(", ")} ` +
    `(${MODEL_TOOLS.length} model-facing)`
);
