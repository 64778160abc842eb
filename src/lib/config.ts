// src/lib/config.ts
import "dotenv/config";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { parseLogLevel } from "./logger.js";

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  HOST: z.string().default("0.0.0.0"),
  PORT: intFromEnv(8000),
  LOG_LEVEL: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_TIMEOUT_MS: intFromEnv(60_000),
  OPENAI_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  DIAGRAM_TEMP_DIR: z.string().optional(),
  DIAGRAM_DIRECTION: z.enum(["right", "down"]).default("right"),
  RENDER_TIMEOUT_MS: intFromEnv(30_000),
  MIN_DESCRIPTION_LENGTH: intFromEnv(10),
});

export const APP_NAME = "Architecture Diagram Service";
export const APP_VERSION = "0.3.0";

export type AppConfig = {
  host: string;
  port: number;
  logLevel: ReturnType<typeof parseLogLevel>;
  openaiApiKey?: string;
  openaiModel: string;
  openaiTimeoutMs: number;
  openaiMaxRetries: number;
  tempDir: string;
  /** D2 のレイアウト方向 */
  diagramDirection: "right" | "down";
  renderTimeoutMs: number;
  minDescriptionLength: number;
};

/** 空文字は未設定扱い（.env のテンプレをそのまま置いた場合など） */
function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string> {
  return Object.fromEntries(
    Object.entries(env).filter(
      (kv): kv is [string, string] => typeof kv[1] === "string" && kv[1].trim() !== ""
    )
  );
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = EnvSchema.parse(blankToUndefined(env));
  return {
    host: e.HOST,
    port: e.PORT,
    logLevel: parseLogLevel(e.LOG_LEVEL, "info"),
    openaiApiKey: e.OPENAI_API_KEY?.trim(),
    openaiModel: e.OPENAI_MODEL,
    openaiTimeoutMs: e.OPENAI_TIMEOUT_MS,
    openaiMaxRetries: e.OPENAI_MAX_RETRIES,
    tempDir: path.resolve(e.DIAGRAM_TEMP_DIR ?? path.join(os.tmpdir(), "arch-diagrams")),
    diagramDirection: e.DIAGRAM_DIRECTION,
    renderTimeoutMs: e.RENDER_TIMEOUT_MS,
    minDescriptionLength: e.MIN_DESCRIPTION_LENGTH,
  };
}

export function isDiagramServiceAvailable(config: AppConfig): boolean {
  return Boolean(config.openaiApiKey);
}
