// src/httpApp.ts
import cors from "cors";
import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express";
import multer from "multer";
import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { DiagramGenerator } from "./lib/agent.js";
import type { CanvasStore } from "./lib/canvasStore.js";
import { APP_NAME, APP_VERSION, isDiagramServiceAvailable, type AppConfig } from "./lib/config.js";
import { HttpError, errorMessage } from "./lib/errors.js";
import { createLogger } from "./lib/logger.js";
import type { DiagramResult, ImageFormat } from "./lib/types.js";

const log = createLogger("http");

const MIME: Record<ImageFormat, string> = {
  png: "image/png",
  svg: "image/svg+xml",
};

const GenerateBodySchema = z.object({
  description: z.string({ required_error: "description is required" }),
  format: z.enum(["png", "svg"]).optional(),
});

export type HttpAppDeps = {
  config: AppConfig;
  store: CanvasStore;
  /** API キーがある場合のみ呼ばれる。初回リクエスト時に一度だけ生成 */
  createAgent: () => DiagramGenerator;
};

// Express 4 は async ハンドラの reject を拾わないので next へ流す
const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    fn(req, res, next).catch(next);
  };

async function fileExists(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch {
    return false;
  }
}

function clientErrorStatus(err: unknown): number | undefined {
  // multipart の不正（ファイル添付など）はクライアント側の誤り
  if (err instanceof multer.MulterError) return 400;
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  const status = err.status;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

export function createHttpApp(deps: HttpAppDeps) {
  const { config, store } = deps;
  let agent: DiagramGenerator | undefined;

  const getAgent = (): DiagramGenerator => {
    if (!isDiagramServiceAvailable(config)) {
      throw new HttpError(500, {
        error: "OPENAI_API_KEY environment variable not set",
        message: "Please configure the OpenAI API key to use diagram generation features",
      });
    }
    agent ??= deps.createAgent();
    return agent;
  };

  // multipart/form-data はテキスト項目のみ受け付ける
  const formFields = multer({ limits: { fieldSize: 1024 * 1024 } }).none();

  // この実行で作られた全キャンバスと画像を破棄
  const releaseRun = (result: DiagramResult) =>
    store.releaseAll(
      result.canvasId ? [...result.canvasIds, result.canvasId] : result.canvasIds,
      result.imagePath
    );

  const app = express();

  // ---- middlewares ----
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false, limit: "1mb" }));

  // ---- API ----
  app.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      service: APP_NAME,
      version: APP_VERSION,
      diagramServiceAvailable: isDiagramServiceAvailable(config),
    });
  });

  app.post(
    "/generate-diagram",
    formFields,
    asyncHandler(async (req, res, next) => {
      const body = GenerateBodySchema.safeParse(req.body ?? {});
      if (!body.success) {
        throw new HttpError(400, { error: body.error.issues.map((i) => i.message).join("; ") });
      }
      const { description, format = "png" } = body.data;
      if (description.trim().length < config.minDescriptionLength) {
        throw new HttpError(400, {
          error: `Description must be at least ${config.minDescriptionLength} characters long`,
        });
      }

      const generator = getAgent();
      let result: DiagramResult;
      try {
        result = await generator.generateDiagram({ description, format });
      } catch (e) {
        throw new HttpError(500, { error: `Error occurred during diagram generation: ${errorMessage(e)}` });
      }

      if (!result.success) {
        await releaseRun(result);
        throw new HttpError(500, {
          error: `Failed to generate diagram: ${result.error ?? "unknown error"}`,
          reasoning: result.reasoning,
        });
      }

      const imagePath = result.imagePath;
      if (!imagePath || !(await fileExists(imagePath))) {
        await releaseRun(result);
        throw new HttpError(500, { error: "Diagram was generated but image file was not found" });
      }

      res.type(MIME[format]);
      // 送信完了（または失敗）後に一時ファイルとキャンバスを破棄
      res.sendFile(path.resolve(imagePath), { dotfiles: "allow" }, (err) => {
        releaseRun(result).catch((e) => log.warn(`cleanup failed for ${imagePath}: ${errorMessage(e)}`));
        if (err && !res.headersSent) next(err);
      });
    })
  );

  // ---- 404 ----
  app.use((req, res) => {
    res.status(404).json({ error: "Not found", path: req.path });
  });

  // ---- error handler ----
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof HttpError) {
      if (err.status >= 500) log.error(err.message);
      res.status(err.status).json(err.body);
      return;
    }
    // body-parser 由来（不正な JSON など）は 4xx のまま返す
    const status = clientErrorStatus(err);
    if (status) {
      res.status(status).json({ error: errorMessage(err) });
      return;
    }
    log.error(`Unhandled error: ${errorMessage(err)}`);
    res.status(500).json({
      error: "Internal server error",
      message: errorMessage(err),
      type: err instanceof Error ? err.name : typeof err,
    });
  });

  return app;
}
