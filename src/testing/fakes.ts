// src/testing/fakes.ts
import os from "node:os";
import path from "node:path";
import { promises as fs } from "node:fs";
import { CanvasStore } from "../lib/canvasStore.js";
import type { ToolPlanner } from "../lib/llmClient.js";
import type { DiagramRenderer } from "../lib/render.js";
import type { ImageFormat, ToolPlan } from "../lib/types.js";

/** D2/sharp を使わず、受け取ったソースを記録してそのままバイト列で返す */
export class FakeRenderer implements DiagramRenderer {
  readonly sources: string[] = [];
  failWith?: Error;

  async render(source: string, format: ImageFormat): Promise<Buffer> {
    if (this.failWith) throw this.failWith;
    this.sources.push(source);
    return Buffer.from(`${format}:${source}`, "utf-8");
  }
}

export class FakePlanner implements ToolPlanner {
  readonly prompts: Array<{ system: string; user: string }> = [];

  constructor(private readonly response: ToolPlan | Error) {}

  async plan(system: string, user: string): Promise<ToolPlan> {
    this.prompts.push({ system, user });
    if (this.response instanceof Error) throw this.response;
    return this.response;
  }
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "arch-diagram-test-"));
}

export async function makeStore(renderer = new FakeRenderer()) {
  const tempDir = await makeTempDir();
  const store = new CanvasStore({ tempDir, renderer });
  return { store, renderer, tempDir };
}
