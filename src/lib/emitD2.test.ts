import { describe, expect, it } from "vitest";
import { allocateKeys, emitD2, esc, nodeLabel, nodePath, safeId } from "./emitD2.js";
import type { Canvas, CanvasCluster, CanvasNode } from "./types.js";

function shopCanvas(): Canvas {
  return {
    id: "c1",
    title: "Shop",
    clusters: new Map<string, CanvasCluster>([["routing", { id: "routing", name: "Routing" }]]),
    nodes: new Map<string, CanvasNode>([
      ["gw", { id: "gw", type: "api_gateway", label: "API Gateway", clusterId: "routing" }],
      ["svc", { id: "svc", type: "service", label: "Orders" }],
    ]),
    edges: [{ from: "gw", to: "svc" }],
  };
}

describe("esc / safeId", () => {
  it("escapes quotes, backslashes and newlines", () => {
    expect(esc('a "b"\\c\nd')).toBe('a \\"b\\"\\\\c\\nd');
  });

  it("replaces non-word characters in ids", () => {
    expect(safeId("svc-auth.v2")).toBe("svc_auth_v2");
  });
});

describe("nodeLabel / nodePath", () => {
  it("appends the cloud service name unless it equals the label", () => {
    expect(nodeLabel({ id: "a", type: "database", label: "Orders DB" })).toBe("Orders DB\n(RDS)");
    expect(nodeLabel({ id: "a", type: "queue", label: "SQS" })).toBe("SQS");
    expect(nodeLabel({ id: "a", type: "database", label: "Orders DB" }, false)).toBe("Orders DB");
  });

  it("prefixes clustered nodes with their container key", () => {
    const c = shopCanvas();
    c.clusters.set("edge-tier", { id: "edge-tier", name: "Edge" });
    const keys = allocateKeys(c);
    expect(nodePath({ id: "gw", type: "api_gateway", label: "x", clusterId: "edge-tier" }, keys)).toBe("grp_edge_tier.gw");
    expect(nodePath({ id: "svc", type: "service", label: "x" }, keys)).toBe("svc");
  });
});

describe("emitD2", () => {
  it("emits containers, shaped nodes and fully qualified edges", () => {
    const lines = emitD2(shopCanvas()).split("\n");

    expect(lines[0]).toBe("direction: right");
    expect(lines).toContain('  routing: { style.fill: "#FCE5E1"; style.stroke: "#E39A8A" }');
    expect(lines).toContain(
      'canvas_title: "Shop" { shape: text; near: top-center; style.font-size: 24; style.bold: true }'
    );

    const grp = lines.indexOf('grp_routing: "Routing" {');
    expect(grp).toBeGreaterThan(0);
    expect(lines[grp + 1]).toBe('  gw: "API Gateway" { shape: hexagon; class: routing }');
    expect(lines[grp + 2]).toBe("}");

    expect(lines).toContain('svc: "Orders\\n(EC2)" { shape: rectangle; class: svc }');
    expect(lines).toContain("grp_routing.gw -> svc");
  });

  it("honours direction, title and service-name options", () => {
    const out = emitD2(shopCanvas(), { direction: "down", showTitle: false, showServiceNames: false });
    const lines = out.split("\n");
    expect(lines[0]).toBe("direction: down");
    expect(out).not.toContain("canvas_title");
    expect(lines).toContain('svc: "Orders" { shape: rectangle; class: svc }');
  });

  it("skips edges whose endpoints are gone", () => {
    const c = shopCanvas();
    c.edges.push({ from: "svc", to: "ghost" });
    const edgeLines = emitD2(c).split("\n").filter((l) => l.includes(" -> "));
    expect(edgeLines).toEqual(["grp_routing.gw -> svc"]);
  });

  it("keeps empty clusters as containers", () => {
    const c = shopCanvas();
    c.clusters.set("infra", { id: "infra", name: "Shared Infra" });
    const lines = emitD2(c).split("\n");
    const i = lines.indexOf('grp_infra: "Shared Infra" {');
    expect(i).toBeGreaterThan(0);
    expect(lines[i + 1]).toBe("}");
  });

  it("gives ids that sanitise to the same key distinct keys", () => {
    const c: Canvas = {
      id: "c2",
      title: "",
      clusters: new Map<string, CanvasCluster>([
        ["edge-tier", { id: "edge-tier", name: "Edge A" }],
        ["edge_tier", { id: "edge_tier", name: "Edge B" }],
      ]),
      nodes: new Map<string, CanvasNode>([
        ["認証", { id: "認証", type: "service", label: "Auth" }],
        ["決済", { id: "決済", type: "database", label: "Payments DB" }],
        ["svc-a", { id: "svc-a", type: "service", label: "A", clusterId: "edge-tier" }],
        ["svc_a", { id: "svc_a", type: "service", label: "B", clusterId: "edge_tier" }],
        ["Label", { id: "Label", type: "queue", label: "Jobs" }],
      ]),
      edges: [
        { from: "認証", to: "決済" },
        { from: "svc-a", to: "svc_a" },
      ],
    };

    const lines = emitD2(c).split("\n");

    expect(lines).toContain('grp_edge_tier: "Edge A" {');
    expect(lines).toContain('grp_edge_tier_2: "Edge B" {');
    expect(lines).toContain('  svc_a: "A\\n(EC2)" { shape: rectangle; class: svc }');
    expect(lines).toContain('  svc_a_2: "B\\n(EC2)" { shape: rectangle; class: svc }');
    expect(lines).toContain('node: "Auth\\n(EC2)" { shape: rectangle; class: svc }');
    expect(lines).toContain('node_2: "Payments DB\\n(RDS)" { shape: cylinder; class: data }');
    expect(lines).toContain('Label_2: "Jobs\\n(SQS)" { shape: queue; class: msg }');
    expect(lines.filter((l) => l.includes(" -> "))).toEqual([
      "node -> node_2",
      "grp_edge_tier.svc_a -> grp_edge_tier_2.svc_a_2",
    ]);
  });
});
