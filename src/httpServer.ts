// src/httpServer.ts
import { DiagramAgent } from "./lib/agent.js";
import { CanvasStore } from "./lib/canvasStore.js";
import { APP_NAME, APP_VERSION, isDiagramServiceAvailable, loadConfig } from "./lib/config.js";
import { LocalToolExecutor } from "./lib/dispatch.js";
import { OpenAIToolPlanner } from "./lib/llmClient.js";
import { createLogger, setLogLevel } from "./lib/logger.js";
import { D2Renderer } from "./lib/render.js";
import { createHttpApp } from "./httpApp.js";

const config = loadConfig();
setLogLevel(config.logLevel);
const log = createLogger("http");

const store = new CanvasStore({
  tempDir: config.tempDir,
  renderer: new D2Renderer(config.renderTimeoutMs),
  d2: { direction: config.diagramDirection },
});

const app = createHttpApp({
  config,
  store,
  createAgent: () =>
    new DiagramAgent({
      planner: new OpenAIToolPlanner({
        apiKey: config.openaiApiKey ?? "",
        model: config.openaiModel,
        timeoutMs: config.openaiTimeoutMs,
        maxRetries: config.openaiMaxRetries,
      }),
      executor: new LocalToolExecutor(store),
    }),
});

// ---- start ----
const server = app.listen(config.port, config.host, () => {
  log.info(`Starting ${APP_NAME} v${APP_VERSION}`);
  log.info(`Web API ready: http://${config.host}:${config.port}`);
  if (!isDiagramServiceAvailable(config)) {
    log.warn("OPENAI_API_KEY not set - diagram generation will be disabled");
  }
});

function shutdown(signal: string) {
  log.info(`Received ${signal}, shutting down ${APP_NAME}`);
  server.close(() => {
    store
      .cleanupAllTempFiles()
      .then(() => process.exit(0))
      .catch((e) => {
        log.error("cleanup failed", e);
        process.exit(1);
      });
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
