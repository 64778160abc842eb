// src/lib/prompts.ts
import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { CANVAS_ID_PLACEHOLDER, NODE_TYPES } from "./constants.js";
import { MODEL_TOOLS } from "./dispatch.js";
import type { ToolCall } from "./types.js";

/** LLM に渡すツール一覧（引数は JSON Schema で） */
export function describeModelTools() {
  return Object.fromEntries(
    MODEL_TOOLS.map((t) => {
      const { $schema: _ignored, ...parameters } = zodToJsonSchema(z.object(t.inputShape), {
        $refStrategy: "none",
      });
      return [t.name, { description: t.description, parameters }];
    })
  );
}

const C = CANVAS_ID_PLACEHOLDER;

// few-shot: 「認証・決済・注文サービスのマイクロサービス構成」
export const EXAMPLE_TOOL_CALLS: ToolCall[] = [
  { name: "create_canvas", args: { title: "Microservices Architecture" } },
  { name: "create_cluster", args: { canvas_id: C, cluster_id: "routing", cluster_name: "Routing" } },
  { name: "create_cluster", args: { canvas_id: C, cluster_id: "services", cluster_name: "Microservices" } },
  { name: "create_cluster", args: { canvas_id: C, cluster_id: "infra", cluster_name: "Shared Infra" } },
  { name: "add_node", args: { canvas_id: C, node_id: "routing_gw", node_type: "api_gateway", cluster_id: "routing", label: "API Gateway" } },
  { name: "add_node", args: { canvas_id: C, node_id: "svc_auth", node_type: "service", cluster_id: "services", label: "Auth Service" } },
  { name: "add_node", args: { canvas_id: C, node_id: "svc_payment", node_type: "service", cluster_id: "services", label: "Payment Service" } },
  { name: "add_node", args: { canvas_id: C, node_id: "svc_order", node_type: "service", cluster_id: "services", label: "Order Service" } },
  { name: "add_node", args: { canvas_id: C, node_id: "infra_db", node_type: "database", cluster_id: "infra", label: "Orders DB" } },
  { name: "add_node", args: { canvas_id: C, node_id: "infra_queue", node_type: "queue", cluster_id: "infra", label: "Event Queue" } },
  { name: "add_node", args: { canvas_id: C, node_id: "infra_metrics", node_type: "monitoring", cluster_id: "infra", label: "Metrics" } },
  { name: "add_edge", args: { canvas_id: C, source_node_id: "routing_gw", target_node_id: "svc_auth" } },
  { name: "add_edge", args: { canvas_id: C, source_node_id: "routing_gw", target_node_id: "svc_order" } },
  { name: "add_edge", args: { canvas_id: C, source_node_id: "svc_order", target_node_id: "infra_db" } },
  { name: "add_edge", args: { canvas_id: C, source_node_id: "svc_payment", target_node_id: "infra_queue" } },
  { name: "add_edge", args: { canvas_id: C, source_node_id: "svc_auth", target_node_id: "infra_metrics" } },
  { name: "render_diagram", args: { canvas_id: C } },
];

export function buildSystemPrompt(): string {
  return `YOU ARE A DIAGRAM TOOL AGENT.
You must:
- Think step-by-step.
- Call the provided tools only.
- Never output source code or mention the underlying library.

You are an expert cloud architect who turns descriptions of distributed systems, microservices and cloud infrastructure into architecture diagrams.

AVAILABLE TOOLS:
${JSON.stringify(describeModelTools(), null, 2)}

SUPPORTED NODE TYPES:
${JSON.stringify(NODE_TYPES, null, 2)}

VISUAL STYLE:
Flow left to right in three columns:
1. Routing (API Gateway, load balancer)
2. Services (Web Tier or Microservices cluster)
3. Shared Infrastructure (database, queue, monitoring)

EXAMPLE: for "a microservices architecture with auth, payment and order services" respond with:
${JSON.stringify({ reasoning: "Gateway routes to three services that share a database, a queue and metrics.", tool_calls: EXAMPLE_TOOL_CALLS }, null, 2)}

RULES:
- Create clusters for logical grouping and use clear, descriptive labels.
- The API Gateway routes traffic to services; services connect to shared infrastructure.
- Only use the ${Object.keys(NODE_TYPES).length} node types listed above.
- Canvas IDs are placeholders: always pass "${C}" as canvas_id.
- Always call render_diagram as the final step.
- If the request cannot be expressed with these tools, explain the limitation in "reasoning" and return the closest diagram.

Respond with a single JSON object only:
{
  "reasoning": "Brief explanation of architecture choices",
  "tool_calls": [ { "name": "...", "args": { ... } } ]
}`;
}

export function buildUserPrompt(description: string): string {
  return `Generate an architecture diagram for the following requirements:

DESCRIPTION: ${description}

REQUIREMENTS:
- Use the available tools to create a complete diagram, left-to-right.
- Group related components into clusters.
- Connect every service to the shared infrastructure it uses.
- Use clear, descriptive labels for all components.
- Render the final diagram.

Output valid JSON with "reasoning" and "tool_calls" only.`;
}
