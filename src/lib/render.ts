// src/lib/render.ts
import { D2 } from "@terrastruct/d2";
import sharp from "sharp";
import type { ImageFormat } from "./types.js";

export interface DiagramRenderer {
  render(source: string, format: ImageFormat): Promise<Buffer>;
}

export function withTimeout<T>(p: Promise<T>, ms: number, label = "operation"): Promise<T> {
  return new Promise((resolve, reject) => {
    const id = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
    p.then(v => { clearTimeout(id); resolve(v); }, err => { clearTimeout(id); reject(err); });
  });
}

// Strip @font-face blocks (base64 WOFF). librsvg は埋め込みフォントを使わないので不要
export function stripFontFaces(svg: string): string {
  return svg.replace(/@font-face\s*\{[^{}]*\}/g, "");
}

/**
 * D2 (WASM) で SVG を生成し、PNG が要る場合は sharp でラスタライズする。
 * D2 インスタンスは初回利用時に作る（WASM 初期化が重い）
 */
export class D2Renderer implements DiagramRenderer {
  private d2: D2 | null = null;

  constructor(private readonly timeoutMs = 30_000, private readonly density = 144) {}

  private instance(): D2 {
    if (!this.d2) this.d2 = new D2();
    return this.d2;
  }

  async renderSvg(source: string): Promise<string> {
    const d2 = this.instance();
    const compiled = await withTimeout(d2.compile(source), this.timeoutMs, "D2 compile");
    return withTimeout(d2.render(compiled.diagram, compiled.renderOptions), this.timeoutMs, "D2 render");
  }

  async render(source: string, format: ImageFormat): Promise<Buffer> {
    const svg = await this.renderSvg(source);
    if (format === "svg") return Buffer.from(svg, "utf-8");
    return sharp(Buffer.from(stripFontFaces(svg)), { density: this.density })
      .flatten({ background: "#ffffff" })
      .png()
      .toBuffer();
  }
}
