// src/lib/emitD2.ts

import { CLOUD_SERVICE_OF } from "./constants.js";
import type { Canvas, CanvasNode, NodeType } from "./types.js";

// D2 のダブルクォート文字列用エスケープ
export const esc = (s: string) =>
  String(s ?? "")
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\r?\n/g, "\\n");

export const safeId = (s: string) => s.replace(/[^\w]/g, "_");

export type D2Options = {
  direction?: "right" | "down";   // 左→右が既定
  showServiceNames?: boolean;     // ラベル2行目に AWS サービス名
  showTitle?: boolean;
};

const SHAPE_OF: Record<NodeType, string> = {
  api_gateway: "hexagon",
  load_balancer: "diamond",
  service: "rectangle",
  database: "cylinder",
  queue: "queue",
  monitoring: "oval",
};

const CLASS_OF: Record<NodeType, string> = {
  api_gateway: "routing",
  load_balancer: "routing",
  service: "svc",
  database: "data",
  queue: "msg",
  monitoring: "mon",
};

const CLASS_STYLES: Array<[string, string, string]> = [
  ["routing", "#FCE5E1", "#E39A8A"],
  ["svc", "#EAE7FF", "#A79BEA"],
  ["data", "#FFF3C4", "#E2C35A"],
  ["msg", "#E6F4F1", "#7FB3AE"],
  ["mon", "#E7F0FF", "#89A6E8"],
];

// キーに使うと D2 が属性として解釈する語
const RESERVED_KEYS = [
  "canvas_title",
  "class",
  "classes",
  "constraint",
  "direction",
  "height",
  "icon",
  "label",
  "layers",
  "link",
  "near",
  "scenarios",
  "shape",
  "steps",
  "style",
  "tooltip",
  "vars",
  "width",
];

export type D2Keys = {
  nodes: Map<string, string>;
  clusters: Map<string, string>;
};

// 先頭の "_" は D2 で親参照になるので落とす。英数字が残らなければ fallback
function baseKey(id: string, fallback: string): string {
  const s = safeId(id).replace(/^_+/, "");
  return /[A-Za-z0-9]/.test(s) ? s : fallback;
}

/**
 * ID → D2 キーの割り当て。safeId だけだと "svc-a" と "svc_a" や非 ASCII の ID が
 * 同じキーになるため、衝突したら連番を付ける。D2 のキーは大文字小文字を区別しない
 */
export function allocateKeys(c: Canvas): D2Keys {
  const used = new Set(RESERVED_KEYS);
  const take = (base: string) => {
    let key = base;
    for (let i = 2; used.has(key.toLowerCase()); i++) key = `${base}_${i}`;
    used.add(key.toLowerCase());
    return key;
  };
  const clusters = new Map<string, string>();
  for (const cl of c.clusters.values()) clusters.set(cl.id, take(`grp_${baseKey(cl.id, "cluster")}`));
  const nodes = new Map<string, string>();
  for (const n of c.nodes.values()) nodes.set(n.id, take(baseKey(n.id, "node")));
  return { nodes, clusters };
}

/** エッジ参照用の完全パス（クラスタ内なら grp_x.node） */
export function nodePath(n: CanvasNode, keys: D2Keys): string {
  const key = keys.nodes.get(n.id) ?? baseKey(n.id, "node");
  const parent = n.clusterId ? keys.clusters.get(n.clusterId) : undefined;
  return parent ? `${parent}.${key}` : key;
}

export function nodeLabel(n: CanvasNode, showServiceNames = true): string {
  const service = CLOUD_SERVICE_OF[n.type];
  if (!showServiceNames || n.label === service) return n.label;
  return `${n.label}\n(${service})`;
}

export function emitD2(c: Canvas, opts: D2Options = {}): string {
  const dir = opts.direction ?? "right";
  const showServiceNames = opts.showServiceNames ?? true;
  const showTitle = opts.showTitle ?? true;

  const keys = allocateKeys(c);
  const L: string[] = [];
  push(`direction: ${dir}`);

  // Styles
  push("classes: {");
  for (const [name, fill, stroke] of CLASS_STYLES) {
    push(`  ${name}: { style.fill: "${fill}"; style.stroke: "${stroke}" }`);
  }
  push("}");

  if (showTitle && c.title) {
    push(`canvas_title: "${esc(c.title)}" { shape: text; near: top-center; style.font-size: 24; style.bold: true }`);
  }

  // Clusters（空のクラスタも枠として出す）
  for (const cl of c.clusters.values()) {
    const members = [...c.nodes.values()].filter((n) => n.clusterId === cl.id);
    push(`${keys.clusters.get(cl.id) ?? `grp_${baseKey(cl.id, "cluster")}`}: "${esc(cl.name)}" {`);
    for (const n of members) push(`  ${nodeLine(n)}`);
    push("}");
  }

  // クラスタ外ノード
  for (const n of c.nodes.values()) {
    if (!n.clusterId || !keys.clusters.has(n.clusterId)) push(nodeLine(n));
  }

  // Edges
  for (const e of c.edges) {
    const from = c.nodes.get(e.from);
    const to = c.nodes.get(e.to);
    if (!from || !to) continue;
    push(`${nodePath(from, keys)} -> ${nodePath(to, keys)}`);
  }

  return L.join("\n") + "\n";

  // ===== helpers =====

  function push(s: string) {
    L.push(s);
  }

  function nodeLine(n: CanvasNode) {
    return `${keys.nodes.get(n.id) ?? baseKey(n.id, "node")}: "${esc(nodeLabel(n, showServiceNames))}" { shape: ${SHAPE_OF[n.type]}; class: ${CLASS_OF[n.type]} }`;
  }
}
