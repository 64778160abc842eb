import { describe, expect, it } from "vitest";
import { makeStore } from "../testing/fakes.js";
import { NODE_TYPES } from "./constants.js";
import {
  LocalToolExecutor,
  MODEL_TOOLS,
  TOOLS,
  dispatchToolCall,
  getTool,
  parseToolCall,
  requiredParams,
  validateToolCall,
} from "./dispatch.js";

describe("tool table", () => {
  it("exposes the model-facing vocabulary in order", () => {
    expect(MODEL_TOOLS.map((t) => t.name)).toEqual([
      "create_canvas",
      "create_cluster",
      "add_node",
      "add_edge",
      "render_diagram",
    ]);
    expect(TOOLS).toHaveLength(10);
  });

  it("derives required parameters from the schemas", () => {
    const req = (name: string) => {
      const tool = getTool(name);
      if (!tool) throw new Error(`missing ${name}`);
      return requiredParams(tool);
    };
    expect(req("create_canvas")).toEqual([]);
    expect(req("create_cluster")).toEqual(["canvas_id", "cluster_id", "cluster_name"]);
    expect(req("add_node")).toEqual(["canvas_id", "node_id", "node_type"]);
    expect(req("add_edge")).toEqual(["canvas_id", "source_node_id", "target_node_id"]);
    expect(req("render_diagram")).toEqual(["canvas_id"]);
  });
});

describe("parseToolCall / validateToolCall", () => {
  it("fills in missing args", () => {
    expect(parseToolCall({ name: "create_canvas" })).toEqual({ name: "create_canvas", args: {} });
  });

  it.each([
    ["not an object", "add_node"],
    ["array", []],
    ["missing name", { args: {} }],
    ["unknown tool", { name: "drop_table", args: {} }],
    ["inspection tool", { name: "list_canvas_nodes", args: { canvas_id: "c" } }],
    ["args not an object", { name: "render_diagram", args: "c" }],
    ["missing required param", { name: "add_edge", args: { canvas_id: "c", source_node_id: "a" } }],
  ])("rejects %s", (_label, call) => {
    expect(validateToolCall(call)).toBe(false);
  });

  it("accepts complete calls", () => {
    expect(validateToolCall({ name: "create_canvas", args: {} })).toBe(true);
    expect(
      validateToolCall({ name: "add_node", args: { canvas_id: "c", node_id: "a", node_type: "service" } })
    ).toBe(true);
  });
});

describe("dispatchToolCall", () => {
  it("runs the adapter operations and reports their results", async () => {
    const { store, tempDir } = await makeStore();

    const created = await dispatchToolCall(store, "create_canvas", { title: "Shop" });
    if (!("result" in created)) throw new Error(created.error);
    const canvasId = String(created.result);
    expect(store.getCanvasInfo(canvasId).title).toBe("Shop");

    expect(
      await dispatchToolCall(store, "create_cluster", { canvas_id: canvasId, cluster_id: "svc", cluster_name: "Services" })
    ).toEqual({ result: "Cluster created successfully" });
    expect(
      await dispatchToolCall(store, "add_node", {
        canvas_id: canvasId,
        node_id: "a",
        node_type: "service",
        label: null,
        cluster_id: "svc",
      })
    ).toEqual({ result: "Node added successfully" });
    await dispatchToolCall(store, "add_node", { canvas_id: canvasId, node_id: "b", node_type: "queue" });
    expect(
      await dispatchToolCall(store, "add_edge", { canvas_id: canvasId, source_node_id: "a", target_node_id: "b" })
    ).toEqual({ result: "Edge added successfully" });
    expect(await dispatchToolCall(store, "render_diagram", { canvas_id: canvasId, format: "svg" })).toEqual({
      result: `${tempDir}/diagram_${canvasId}.svg`,
    });
    expect(await dispatchToolCall(store, "get_canvas_info", { canvas_id: canvasId })).toEqual({
      result: { canvasId, title: "Shop", nodeCount: 2, clusterCount: 1 },
    });
    expect(await dispatchToolCall(store, "clear_canvas", { canvas_id: canvasId })).toEqual({
      result: "Canvas cleared successfully",
    });
    expect(await dispatchToolCall(store, "get_available_node_types", {})).toEqual({ result: NODE_TYPES });
  });

  it("uses the default title when none is given", async () => {
    const { store } = await makeStore();
    const res = await dispatchToolCall(store, "create_canvas", {});
    if (!("result" in res)) throw new Error(res.error);
    expect(store.getCanvasInfo(String(res.result)).title).toBe("Architecture Diagram");
  });

  it("turns adapter errors into error results", async () => {
    const { store } = await makeStore();
    expect(await dispatchToolCall(store, "add_node", { canvas_id: "nope", node_id: "a", node_type: "service" })).toEqual({
      error: "Canvas nope not found",
    });
  });

  it("reports argument validation failures by path", async () => {
    const { store } = await makeStore();
    expect(await dispatchToolCall(store, "add_node", { canvas_id: "c", node_type: "service" })).toEqual({
      error: "node_id: Required",
    });
  });

  it("rejects unknown tools", async () => {
    const { store } = await makeStore();
    expect(await dispatchToolCall(store, "drop_table", {})).toEqual({ error: "Unknown tool: drop_table" });
  });

  it("is reachable through the local executor", async () => {
    const { store } = await makeStore();
    const executor = new LocalToolExecutor(store);
    const res = await executor.call("create_canvas", { title: "Via executor" });
    expect("result" in res && store.hasCanvas(String(res.result))).toBe(true);
  });
});
