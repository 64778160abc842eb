// src/lib/canvasStore.ts
import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { DEFAULT_CANVAS_TITLE, NODE_TYPES } from "./constants.js";
import { emitD2, type D2Options } from "./emitD2.js";
import { CanvasError, errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { DiagramRenderer } from "./render.js";
import {
  IMAGE_FORMATS,
  NODE_TYPE_IDS,
  isNodeType,
  type Canvas,
  type CanvasInfo,
  type ClusterInfo,
  type ImageFormat,
  type NodeInfo,
  type NodeType,
} from "./types.js";

export type CanvasStoreOptions = {
  tempDir: string;
  renderer: DiagramRenderer;
  defaultFormat?: ImageFormat;
  d2?: D2Options;
  logger?: Logger;
};

const DIAGRAM_FILE_PREFIX = "diagram_";

/**
 * キャンバス（ノード／エッジ／クラスタ）をメモリ上に保持し、
 * render 時に D2 ソースへ変換して画像ファイルを書き出す
 */
export class CanvasStore {
  private readonly canvases = new Map<string, Canvas>();
  private readonly createdFiles = new Set<string>();
  private readonly log: Logger;

  constructor(private readonly opts: CanvasStoreOptions) {
    this.log = opts.logger ?? createLogger("canvas");
  }

  get tempDir(): string {
    return this.opts.tempDir;
  }

  get trackedFiles(): ReadonlySet<string> {
    return this.createdFiles;
  }

  trackCreatedFile(filePath: string) {
    this.createdFiles.add(filePath);
  }

  createCanvas(title: string = DEFAULT_CANVAS_TITLE): string {
    const id = randomUUID();
    this.canvases.set(id, {
      id,
      title,
      nodes: new Map(),
      clusters: new Map(),
      edges: [],
    });
    return id;
  }

  getCanvas(canvasId: string): Canvas {
    const c = this.canvases.get(canvasId);
    if (!c) throw new CanvasError(`Canvas ${canvasId} not found`);
    return c;
  }

  hasCanvas(canvasId: string): boolean {
    return this.canvases.has(canvasId);
  }

  createCluster(canvasId: string, clusterId: string, clusterName: string) {
    const c = this.getCanvas(canvasId);
    if (c.clusters.has(clusterId)) {
      throw new CanvasError(`Cluster ${clusterId} already exists on canvas ${canvasId}`);
    }
    c.clusters.set(clusterId, { id: clusterId, name: clusterName });
  }

  addNode(canvasId: string, nodeId: string, nodeType: string, label?: string, clusterId?: string) {
    const c = this.getCanvas(canvasId);
    if (c.nodes.has(nodeId)) {
      throw new CanvasError(`Node ${nodeId} already exists on canvas ${canvasId}`);
    }
    if (clusterId && !c.clusters.has(clusterId)) {
      throw new CanvasError(`Cluster ${clusterId} not found on canvas ${canvasId}`);
    }
    if (!isNodeType(nodeType)) {
      throw new CanvasError(
        `Unsupported node type: ${nodeType}. Supported types: ${NODE_TYPE_IDS.join(", ")}`
      );
    }
    c.nodes.set(nodeId, {
      id: nodeId,
      type: nodeType,
      label: label || nodeId,
      ...(clusterId ? { clusterId } : {}),
    });
  }

  addEdge(canvasId: string, sourceNodeId: string, targetNodeId: string) {
    const c = this.getCanvas(canvasId);
    if (!c.nodes.has(sourceNodeId)) {
      throw new CanvasError(`Source node ${sourceNodeId} not found on canvas ${canvasId}`);
    }
    if (!c.nodes.has(targetNodeId)) {
      throw new CanvasError(`Target node ${targetNodeId} not found on canvas ${canvasId}`);
    }
    const dup = c.edges.some((e) => e.from === sourceNodeId && e.to === targetNodeId);
    if (!dup) c.edges.push({ from: sourceNodeId, to: targetNodeId });
  }

  listCanvasNodes(canvasId: string): Record<string, NodeInfo> {
    const c = this.getCanvas(canvasId);
    return Object.fromEntries(
      [...c.nodes.values()].map((n) => [n.id, { nodeId: n.id, nodeType: n.type }])
    );
  }

  listCanvasClusters(canvasId: string): Record<string, ClusterInfo> {
    const c = this.getCanvas(canvasId);
    return Object.fromEntries(
      [...c.clusters.values()].map((cl) => [cl.id, { clusterId: cl.id, clusterName: cl.name }])
    );
  }

  getCanvasInfo(canvasId: string): CanvasInfo {
    const c = this.getCanvas(canvasId);
    return {
      canvasId: c.id,
      title: c.title,
      nodeCount: c.nodes.size,
      clusterCount: c.clusters.size,
    };
  }

  clearCanvas(canvasId: string) {
    const c = this.getCanvas(canvasId);
    c.nodes.clear();
    c.clusters.clear();
    c.edges = [];
  }

  deleteCanvas(canvasId: string): boolean {
    return this.canvases.delete(canvasId);
  }

  getAvailableNodeTypes(): Record<NodeType, string> {
    return { ...NODE_TYPES };
  }

  toD2(canvasId: string): string {
    return emitD2(this.getCanvas(canvasId), this.opts.d2);
  }

  /** 同じキャンバスを再描画した場合は同じファイルを上書き */
  async renderDiagram(canvasId: string, format?: ImageFormat): Promise<string> {
    const source = this.toD2(canvasId);
    const fmt = format ?? this.opts.defaultFormat ?? "png";
    const image = await this.opts.renderer.render(source, fmt);

    await fs.mkdir(this.opts.tempDir, { recursive: true });
    const filePath = this.diagramPath(canvasId, fmt);
    await fs.writeFile(filePath, image);
    this.trackCreatedFile(filePath);
    this.log.debug(`rendered ${canvasId} -> ${filePath} (${image.length} bytes)`);
    return filePath;
  }

  async removeFile(filePath: string) {
    await fs.rm(filePath, { force: true });
    this.createdFiles.delete(filePath);
  }

  diagramPath(canvasId: string, format: ImageFormat): string {
    return path.join(this.opts.tempDir, `${DIAGRAM_FILE_PREFIX}${canvasId}.${format}`);
  }

  /** リクエスト完了後の後始末：画像ファイル削除＋キャンバス破棄（そのキャンバスの描画結果も消す） */
  async release(canvasId: string | undefined, filePath?: string) {
    if (filePath) await this.removeFile(filePath);
    if (!canvasId) return;
    for (const fmt of IMAGE_FORMATS) await this.removeFile(this.diagramPath(canvasId, fmt));
    this.deleteCanvas(canvasId);
  }

  async releaseAll(canvasIds: Iterable<string>, filePath?: string) {
    if (filePath) await this.removeFile(filePath);
    for (const id of new Set(canvasIds)) await this.release(id);
  }

  /** 失敗してもログのみ（終了処理を止めない） */
  async cleanupAllTempFiles() {
    try {
      for (const f of this.createdFiles) {
        await fs.rm(f, { force: true });
      }
      this.createdFiles.clear();

      const entries = await fs.readdir(this.opts.tempDir).catch((e: NodeJS.ErrnoException) => {
        if (e.code === "ENOENT") return [];
        throw e;
      });
      for (const name of entries) {
        if (name.startsWith(DIAGRAM_FILE_PREFIX)) {
          await fs.rm(path.join(this.opts.tempDir, name), { force: true });
        }
      }
    } catch (e) {
      this.log.warn(`Could not clean up all temporary files: ${errorMessage(e)}`);
    }
  }
}
