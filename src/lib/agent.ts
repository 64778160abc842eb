// src/lib/agent.ts
import {
  CANVAS_ID_PLACEHOLDER,
  CLUSTER_NAME_STANDARDS,
  MONITORING_KEYWORDS,
  NODE_TYPE_SYNONYMS,
  ROUTING_TYPES,
  SHARED_INFRA_TYPES,
} from "./constants.js";
import { parseToolCall, validateToolCall, type ToolExecutor } from "./dispatch.js";
import { errorMessage } from "./errors.js";
import type { ToolPlanner } from "./llmClient.js";
import { createLogger, type Logger } from "./logger.js";
import { buildSystemPrompt, buildUserPrompt } from "./prompts.js";
import {
  NODE_TYPE_IDS,
  isNodeType,
  type DiagramRequest,
  type DiagramResult,
  type NodeType,
  type ToolCall,
} from "./types.js";

/** HTTP 層から見た口 */
export interface DiagramGenerator {
  generateDiagram(request: DiagramRequest): Promise<DiagramResult>;
}

/** 説明文のキーワードから言及されているノードタイプを拾う */
export function findMentionedComponents(description: string): Set<NodeType> {
  const t = description.toLowerCase();
  return new Set(NODE_TYPE_IDS.filter((type) => NODE_TYPE_SYNONYMS[type].some((w) => t.includes(w))));
}

/** 最低限の図になるよう全タイプを常に許可する */
export function extractAllowedComponents(): Set<NodeType> {
  return new Set(NODE_TYPE_IDS);
}

export function isMonitoringRequested(description: string): boolean {
  const t = description.toLowerCase();
  return MONITORING_KEYWORDS.some((w) => t.includes(w));
}

export function standardizeClusterName(name: string): string {
  return CLUSTER_NAME_STANDARDS[name.trim().toLowerCase()] ?? name;
}

const edgeKey = (from: string, to: string) => `${from}\u0000${to}`;

export type DiagramAgentOptions = {
  planner: ToolPlanner;
  executor: ToolExecutor;
  logger?: Logger;
};

/**
 * 説明文 → LLM → tool call 列 → 順に実行 → 描画、のループ本体
 */
export class DiagramAgent implements DiagramGenerator {
  private readonly log: Logger;

  constructor(private readonly opts: DiagramAgentOptions) {
    this.log = opts.logger ?? createLogger("agent");
  }

  async generateDiagram(request: DiagramRequest): Promise<DiagramResult> {
    let reasoning = "";
    let canvasId: string | undefined;
    let imagePath: string | undefined;
    const canvasIds: string[] = [];
    try {
      const allowed = extractAllowedComponents();
      const mentioned = findMentionedComponents(request.description);
      const monitoringRequested = isMonitoringRequested(request.description);
      this.log.debug(`mentioned components: ${[...mentioned].join(", ") || "(none)"}`);

      const plan = await this.opts.planner.plan(buildSystemPrompt(), buildUserPrompt(request.description));
      reasoning = plan.reasoning;
      this.log.info(`Generated ${plan.toolCalls.length} tool calls`);
      this.log.debug(`Reasoning: ${reasoning}`);

      const createdNodes = new Map<string, NodeType>();
      const existingEdges = new Set<string>();
      const executed: ToolCall[] = [];

      for (const raw of plan.toolCalls) {
        const parsed = parseToolCall(raw);
        if (!parsed || !validateToolCall(parsed)) {
          this.log.warn(`Invalid tool call, skipping: ${JSON.stringify(raw)}`);
          continue;
        }
        const call = this.prepare(parsed, canvasId, request);

        if (call.name === "add_node") {
          const nodeId = String(call.args.node_id);
          const nodeType = String(call.args.node_type);
          if (nodeType === "monitoring" && !monitoringRequested) {
            this.log.info(`Skipping monitoring node ${nodeId} - not requested in description`);
            continue;
          }
          if (!isNodeType(nodeType) || !allowed.has(nodeType)) {
            this.log.info(`Skipping node ${nodeId} with type ${nodeType} - not in allowed components`);
            continue;
          }
        }

        if (call.name === "add_edge") {
          const from = String(call.args.source_node_id);
          const to = String(call.args.target_node_id);
          if (!createdNodes.has(from) || !createdNodes.has(to)) {
            this.log.info(`Skipping edge ${from} -> ${to} - node(s) not created`);
            continue;
          }
          existingEdges.add(edgeKey(from, to));
        }

        this.log.debug(`Calling tool: ${call.name} ${JSON.stringify(call.args)}`);
        const res = await this.opts.executor.call(call.name, call.args);
        if ("error" in res) {
          this.log.error(`Tool call failed: ${res.error}`);
          return {
            success: false,
            canvasId,
            canvasIds,
            imagePath,
            error: `Tool call failed: ${res.error}`,
            reasoning,
          };
        }
        executed.push(call);

        switch (call.name) {
          case "create_canvas":
            canvasId = String(res.result);
            canvasIds.push(canvasId);
            if (canvasIds.length > 1) {
              // 以降のプレースホルダは新しいキャンバスを指す。古いものは呼び出し側で破棄
              this.log.warn(`create_canvas called again; using ${canvasId} from now on`);
              createdNodes.clear();
              existingEdges.clear();
              imagePath = undefined;
            }
            this.log.info(`Canvas created with ID: ${canvasId}`);
            break;
          case "add_node": {
            const type = String(call.args.node_type);
            if (isNodeType(type)) createdNodes.set(String(call.args.node_id), type);
            break;
          }
          case "render_diagram":
            imagePath = String(res.result);
            this.log.info(`Diagram rendered to: ${imagePath}`);
            break;
        }
      }

      if (canvasId) {
        await this.enforceSharedEdges(canvasId, createdNodes, existingEdges);
        // エッジ補完を反映するため再描画
        const rerendered = await this.render(canvasId, request);
        if (rerendered) imagePath = rerendered;
      }

      if (!imagePath) {
        return { success: false, canvasId, canvasIds, error: "No diagram was rendered", reasoning };
      }

      return { success: true, canvasId, canvasIds, imagePath, reasoning, toolCalls: executed };
    } catch (e) {
      this.log.error(`Error generating diagram: ${errorMessage(e)}`);
      return {
        success: false,
        canvasId,
        canvasIds,
        imagePath,
        error: errorMessage(e),
        reasoning: "Error occurred during diagram generation",
      };
    }
  }

  /** プレースホルダ置換・クラスタ名統一・出力形式の指定 */
  private prepare(call: ToolCall, canvasId: string | undefined, request: DiagramRequest): ToolCall {
    const args = { ...call.args };
    if (canvasId && args.canvas_id === CANVAS_ID_PLACEHOLDER) args.canvas_id = canvasId;
    if (call.name === "create_cluster" && typeof args.cluster_name === "string") {
      args.cluster_name = standardizeClusterName(args.cluster_name);
    }
    if (call.name === "render_diagram" && request.format) args.format = request.format;
    return { name: call.name, args };
  }

  private async render(canvasId: string, request: DiagramRequest): Promise<string | undefined> {
    const res = await this.opts.executor.call("render_diagram", {
      canvas_id: canvasId,
      ...(request.format ? { format: request.format } : {}),
    });
    if ("error" in res) {
      this.log.error(`Re-render after enforcement failed: ${res.error}`);
      return undefined;
    }
    this.log.info(`Diagram re-rendered after enforcement to: ${String(res.result)}`);
    return String(res.result);
  }

  /**
   * LLM が落としがちなエッジを補う:
   * routing → 全 service、service → 全 shared infra、service/routing → monitoring
   */
  async enforceSharedEdges(
    canvasId: string,
    createdNodes: ReadonlyMap<string, NodeType>,
    existingEdges: Set<string>
  ) {
    if (createdNodes.size === 0) return;
    const ofTypes = (types: ReadonlySet<NodeType>) =>
      [...createdNodes].filter(([, t]) => types.has(t)).map(([id]) => id);

    const services = ofTypes(new Set<NodeType>(["service"]));
    const routing = ofTypes(ROUTING_TYPES);
    const shared = ofTypes(SHARED_INFRA_TYPES);
    const monitoring = ofTypes(new Set<NodeType>(["monitoring"]));

    const pairs: Array<[string, string]> = [
      ...routing.flatMap((r) => services.map((s): [string, string] => [r, s])),
      ...services.flatMap((s) => shared.map((x): [string, string] => [s, x])),
      ...[...services, ...routing].flatMap((n) => monitoring.map((m): [string, string] => [n, m])),
    ];

    for (const [from, to] of pairs) {
      const key = edgeKey(from, to);
      if (existingEdges.has(key)) continue;
      const res = await this.opts.executor.call("add_edge", {
        canvas_id: canvasId,
        source_node_id: from,
        target_node_id: to,
      });
      if ("error" in res) {
        this.log.debug(`Edge ${from}->${to} not added: ${res.error}`);
        continue;
      }
      existingEdges.add(key);
    }
  }
}
