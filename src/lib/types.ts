// src/lib/types.ts

// ===== Node types =====
// LLM の幻覚を減らすため 6 種類に絞る
export const NODE_TYPE_IDS = [
  "api_gateway",
  "load_balancer",
  "service",
  "database",
  "queue",
  "monitoring",
] as const;

export type NodeType = (typeof NODE_TYPE_IDS)[number];

export const isNodeType = (s: string): s is NodeType =>
  NODE_TYPE_IDS.some((t) => t === s);

// ===== Canvas =====
export type CanvasNode = {
  id: string;
  type: NodeType;
  label: string;
  clusterId?: string;
};

export type CanvasCluster = {
  id: string;
  name: string;
};

export type CanvasEdge = {
  from: string;
  to: string;
};

export type Canvas = {
  id: string;
  title: string;
  // 挿入順を保つため Map
  nodes: Map<string, CanvasNode>;
  clusters: Map<string, CanvasCluster>;
  edges: CanvasEdge[];
};

export type CanvasInfo = {
  canvasId: string;
  title: string;
  nodeCount: number;
  clusterCount: number;
};

export type NodeInfo = { nodeId: string; nodeType: NodeType };
export type ClusterInfo = { clusterId: string; clusterName: string };

export const IMAGE_FORMATS = ["png", "svg"] as const;
export type ImageFormat = (typeof IMAGE_FORMATS)[number];

// ===== Tool calls（LLM 出力） =====
export type ToolArgs = Record<string, unknown>;

export type ToolCall = {
  name: string;
  args: ToolArgs;
};

export type ToolResult = { result: unknown } | { error: string };

// tool_calls は未検証のまま持ち、実行時に1件ずつ検証する
export type ToolPlan = {
  reasoning: string;
  toolCalls: unknown[];
};

// ===== Agent =====
export type DiagramRequest = {
  description: string;
  format?: ImageFormat;
};

export type DiagramResult = {
  success: boolean;
  canvasId?: string;
  /** この実行で作られた全キャンバス（create_canvas が複数回呼ばれた場合を含む） */
  canvasIds: string[];
  imagePath?: string;
  error?: string;
  reasoning: string;
  toolCalls?: ToolCall[];
};
