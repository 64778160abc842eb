import { describe, expect, it } from "vitest";
import { emitD2 } from "./emitD2.js";
import { D2Renderer, stripFontFaces, withTimeout } from "./render.js";
import type { Canvas, CanvasCluster, CanvasNode } from "./types.js";

const PNG_MAGIC = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

function paymentsCanvas(): Canvas {
  return {
    id: "c1",
    title: "Payments",
    clusters: new Map<string, CanvasCluster>([["core", { id: "core", name: "Core" }]]),
    nodes: new Map<string, CanvasNode>([
      ["認証", { id: "認証", type: "service", label: "Auth", clusterId: "core" }],
      ["決済", { id: "決済", type: "database", label: "Ledger" }],
    ]),
    edges: [{ from: "認証", to: "決済" }],
  };
}

describe("stripFontFaces", () => {
  it("drops embedded @font-face blocks only", () => {
    const svg = '<style>@font-face { font-family: d2; src: url(data:x); } .a { fill: red; }</style>';
    expect(stripFontFaces(svg)).toBe("<style> .a { fill: red; }</style>");
  });
});

describe("withTimeout", () => {
  it("rejects once the limit passes", async () => {
    await expect(withTimeout(new Promise<never>(() => {}), 10, "D2 compile")).rejects.toThrow(
      "D2 compile timed out after 10ms"
    );
  });

  it("passes the value through when in time", async () => {
    await expect(withTimeout(Promise.resolve("ok"), 1000)).resolves.toBe("ok");
  });
});

// D2 (WASM) と sharp を実際に動かす
describe("D2Renderer", { timeout: 60_000 }, () => {
  const renderer = new D2Renderer();

  it("renders every node as SVG", async () => {
    const svg = (await renderer.render(emitD2(paymentsCanvas()), "svg")).toString("utf-8");

    expect(svg).toContain("<svg");
    expect(svg).toContain("Auth");
    expect(svg).toContain("Ledger");
  });

  it("rasterises to PNG", async () => {
    const png = await renderer.render(emitD2(paymentsCanvas()), "png");

    expect([...png.subarray(0, 8)]).toEqual(PNG_MAGIC);
  });

  it("surfaces D2 syntax errors", async () => {
    await expect(renderer.render("a -> {", "svg")).rejects.toThrow();
  });
});
