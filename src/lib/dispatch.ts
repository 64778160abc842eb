// src/lib/dispatch.ts
import { z } from "zod";
import type { CanvasStore } from "./canvasStore.js";
import { DEFAULT_CANVAS_TITLE } from "./constants.js";
import { errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { NODE_TYPE_IDS, type ToolArgs, type ToolCall, type ToolResult } from "./types.js";

const log = createLogger("dispatch");

// 注: ツール説明でライブラリ名を出すと LLM がコードを書き始めるので伏せる
const WRAPS = "This tool wraps an internal library; do not reference that library.";

export interface ToolDefinition {
  name: string;
  title: string;
  description: string;
  inputShape: z.ZodRawShape;
  /** LLM に提示するツールか（false は MCP の参照系のみ） */
  modelFacing: boolean;
  run(store: CanvasStore, args: ToolArgs): Promise<unknown>;
}

function defineTool<S extends z.ZodRawShape>(def: {
  name: string;
  title: string;
  description: string;
  inputShape: S;
  modelFacing: boolean;
  handler: (store: CanvasStore, args: z.objectOutputType<S, z.ZodTypeAny, "strip">) => unknown;
}): ToolDefinition {
  const schema = z.object(def.inputShape);
  return {
    name: def.name,
    title: def.title,
    description: def.description,
    inputShape: def.inputShape,
    modelFacing: def.modelFacing,
    run: async (store, args) => def.handler(store, schema.parse(args)),
  };
}

const canvasId = z.string().min(1).describe("Target canvas identifier");
// LLM は省略可の引数に null を入れてくることがある
const optionalText = (d: string) => z.string().nullish().describe(d);

export const TOOLS: readonly ToolDefinition[] = [
  defineTool({
    name: "create_canvas",
    title: "Create Canvas",
    description: `Create a new empty diagram canvas for building architecture diagrams. ${WRAPS}`,
    inputShape: {
      title: z
        .string()
        .min(1)
        .default(DEFAULT_CANVAS_TITLE)
        .describe("Descriptive architecture name such as 'Basic Web Application' or 'Microservices Architecture'"),
    },
    modelFacing: true,
    handler: (store, a) => store.createCanvas(a.title),
  }),
  defineTool({
    name: "create_cluster",
    title: "Create Cluster",
    description: `Create a cluster to group related services (e.g. 'Routing', 'Web Tier', 'Shared Infra'). ${WRAPS}`,
    inputShape: {
      canvas_id: canvasId,
      cluster_id: z.string().min(1).describe("Unique identifier for the cluster"),
      cluster_name: z.string().min(1).describe("Display name for the cluster"),
    },
    modelFacing: true,
    handler: (store, a) => {
      store.createCluster(a.canvas_id, a.cluster_id, a.cluster_name);
      return "Cluster created successfully";
    },
  }),
  defineTool({
    name: "add_node",
    title: "Add Node",
    description: `Add a node of the specified type to an existing canvas or cluster. ${WRAPS}`,
    inputShape: {
      canvas_id: canvasId,
      node_id: z.string().min(1).describe("Unique identifier for the new node"),
      // enum にすると未対応タイプが zod エラーになりメッセージが分かりにくいので string で受ける
      node_type: z.string().min(1).describe(`Type of node to create, one of: ${NODE_TYPE_IDS.join(", ")}`),
      label: optionalText("Optional custom label for the node"),
      cluster_id: optionalText("Optional cluster to add the node to"),
    },
    modelFacing: true,
    handler: (store, a) => {
      store.addNode(a.canvas_id, a.node_id, a.node_type, a.label ?? undefined, a.cluster_id ?? undefined);
      return "Node added successfully";
    },
  }),
  defineTool({
    name: "add_edge",
    title: "Add Edge",
    description: `Connect two existing nodes on the same canvas with a directed edge. ${WRAPS}`,
    inputShape: {
      canvas_id: canvasId,
      source_node_id: z.string().min(1).describe("Source node identifier"),
      target_node_id: z.string().min(1).describe("Target node identifier"),
    },
    modelFacing: true,
    handler: (store, a) => {
      store.addEdge(a.canvas_id, a.source_node_id, a.target_node_id);
      return "Edge added successfully";
    },
  }),
  defineTool({
    name: "render_diagram",
    title: "Render Diagram",
    description: `Render the canvas to an image file and return the file path. ${WRAPS}`,
    inputShape: {
      canvas_id: canvasId,
      format: z.enum(["png", "svg"]).nullish().describe("Image format, png by default"),
    },
    modelFacing: true,
    handler: (store, a) => store.renderDiagram(a.canvas_id, a.format ?? undefined),
  }),
  defineTool({
    name: "list_canvas_nodes",
    title: "List Canvas Nodes",
    description: "List all nodes present on a specific canvas",
    inputShape: { canvas_id: canvasId },
    modelFacing: false,
    handler: (store, a) => store.listCanvasNodes(a.canvas_id),
  }),
  defineTool({
    name: "list_canvas_clusters",
    title: "List Canvas Clusters",
    description: "List all clusters present on a specific canvas",
    inputShape: { canvas_id: canvasId },
    modelFacing: false,
    handler: (store, a) => store.listCanvasClusters(a.canvas_id),
  }),
  defineTool({
    name: "get_canvas_info",
    title: "Get Canvas Info",
    description: "Get title, node count and cluster count of a canvas",
    inputShape: { canvas_id: canvasId },
    modelFacing: false,
    handler: (store, a) => store.getCanvasInfo(a.canvas_id),
  }),
  defineTool({
    name: "clear_canvas",
    title: "Clear Canvas",
    description: "Clear all nodes, edges and clusters from a canvas",
    inputShape: { canvas_id: canvasId },
    modelFacing: false,
    handler: (store, a) => {
      store.clearCanvas(a.canvas_id);
      return "Canvas cleared successfully";
    },
  }),
  defineTool({
    name: "get_available_node_types",
    title: "Get Available Node Types",
    description: "Get available node types and their descriptions",
    inputShape: {},
    modelFacing: false,
    handler: (store) => store.getAvailableNodeTypes(),
  }),
];

const TOOL_BY_NAME = new Map(TOOLS.map((t) => [t.name, t]));

export const MODEL_TOOLS = TOOLS.filter((t) => t.modelFacing);

export function getTool(name: string): ToolDefinition | undefined {
  return TOOL_BY_NAME.get(name);
}

export function requiredParams(tool: ToolDefinition): string[] {
  return Object.entries(tool.inputShape)
    .filter(([, s]) => !s.isOptional())
    .map(([k]) => k);
}

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

/** 形だけ整える（name が文字列、args がオブジェクト。args 省略は {}） */
export function parseToolCall(call: unknown): ToolCall | undefined {
  if (!isRecord(call) || typeof call.name !== "string") return undefined;
  const args = call.args ?? {};
  if (!isRecord(args)) return undefined;
  return { name: call.name, args };
}

/** LLM 向けツールかつ必須引数が揃っているか（型は dispatch 時に zod で見る） */
export function validateToolCall(call: unknown): boolean {
  const tc = parseToolCall(call);
  if (!tc) return false;
  const tool = TOOL_BY_NAME.get(tc.name);
  if (!tool || !tool.modelFacing) return false;
  return requiredParams(tool).every((p) => p in tc.args);
}

export async function dispatchToolCall(
  store: CanvasStore,
  name: string,
  args: ToolArgs
): Promise<ToolResult> {
  const tool = TOOL_BY_NAME.get(name);
  if (!tool) {
    log.error(`Error calling tool ${name}: unknown tool`);
    return { error: `Unknown tool: ${name}` };
  }
  try {
    return { result: await tool.run(store, args) };
  } catch (e) {
    const msg = e instanceof z.ZodError ? formatZodError(e) : errorMessage(e);
    log.error(`Error calling tool ${name}: ${msg}`);
    return { error: msg };
  }
}

function formatZodError(e: z.ZodError): string {
  return e.issues.map((i) => `${i.path.join(".") || "args"}: ${i.message}`).join("; ");
}

/** エージェントから見たツール実行口（ローカル or MCP クライアント） */
export interface ToolExecutor {
  call(name: string, args: ToolArgs): Promise<ToolResult>;
}

export class LocalToolExecutor implements ToolExecutor {
  constructor(readonly store: CanvasStore) {}

  call(name: string, args: ToolArgs): Promise<ToolResult> {
    return dispatchToolCall(this.store, name, args);
  }
}
