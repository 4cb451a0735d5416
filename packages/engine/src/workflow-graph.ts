// ──────────────────────────────────────────────
// Weft - Workflow Graph
// Authoring model for nodes, edges and parameters, plus the
// conversation state the engine keeps alongside them
// ──────────────────────────────────────────────

import type {
  ComponentDocument,
  HistoryEntry,
  WorkflowDocument,
  WorkflowGraphInit,
  WorkflowNode,
} from "@weft/types";
import { DEFAULT_WORKFLOW_DESCRIPTION, DEFAULT_WORKFLOW_ID } from "@weft/types";
import {
  ConfigurationError,
  DuplicateNodeIdError,
  NodeNotFoundError,
  ParentCycleError,
  UnknownComponentTypeError,
  WorkflowDocumentError,
  safeJsonParse,
} from "@weft/utils";
import { registerAllComponents } from "./components/index.js";
import { describeIssues, workflowDocumentSchema } from "./document-schema.js";
import { findParentCycle, validateGraph } from "./graph-validator.js";
import { isComponentRegistered, listAvailableComponents } from "./registry.js";

export class WorkflowGraph {
  readonly id: string;
  readonly description: string;
  private readonly nodes = new Map<string, WorkflowNode>();

  // Conversation state, owned by the engine
  history: HistoryEntry[] = [];
  messages: unknown[] = [];
  reference: unknown[] = [];
  path: string[] = [];
  answer: string[] = [];

  constructor(init: WorkflowGraphInit = {}) {
    this.id = init.id ?? DEFAULT_WORKFLOW_ID;
    this.description = init.description ?? DEFAULT_WORKFLOW_DESCRIPTION;
  }

  addNode(id: string, componentName: string, params: Record<string, unknown> = {}): WorkflowNode {
    if (!id.trim()) {
      throw new ConfigurationError("Node id must be a non-empty string");
    }
    assertRegistered(componentName);
    if (this.nodes.has(id)) {
      throw new DuplicateNodeIdError(id);
    }

    const node: WorkflowNode = {
      id,
      componentName,
      params: { ...params },
      upstream: [],
      downstream: [],
      parentId: null,
    };
    this.nodes.set(id, node);
    return copyNode(node);
  }

  removeNode(id: string): void {
    this.requireNode(id);
    this.nodes.delete(id);

    for (const node of this.nodes.values()) {
      node.upstream = node.upstream.filter((other) => other !== id);
      node.downstream = node.downstream.filter((other) => other !== id);
      if (node.parentId === id) {
        node.parentId = null;
      }
    }
  }

  connect(upstreamId: string, downstreamId: string): void {
    const up = this.requireNode(upstreamId, "Upstream node");
    const down = this.requireNode(downstreamId, "Downstream node");

    if (!up.downstream.includes(downstreamId)) up.downstream.push(downstreamId);
    if (!down.upstream.includes(upstreamId)) down.upstream.push(upstreamId);
  }

  disconnect(upstreamId: string, downstreamId: string): void {
    const up = this.requireNode(upstreamId, "Upstream node");
    const down = this.requireNode(downstreamId, "Downstream node");

    up.downstream = up.downstream.filter((id) => id !== downstreamId);
    down.upstream = down.upstream.filter((id) => id !== upstreamId);
  }

  // Shallow merge: each patch key overwrites the existing value
  setParameters(id: string, patch: Record<string, unknown>): void {
    const node = this.requireNode(id);
    node.params = { ...node.params, ...patch };
  }

  setParent(id: string, parentId: string | null): void {
    const node = this.requireNode(id);
    if (parentId === null) {
      node.parentId = null;
      return;
    }
    this.requireNode(parentId, "Parent node");

    const parentOf = (candidate: string): string | null =>
      candidate === id ? parentId : this.nodes.get(candidate)?.parentId ?? null;
    if (findParentCycle(id, parentOf) !== null) {
      throw new ParentCycleError(id, parentId);
    }
    node.parentId = parentId;
  }

  // Callers get copies; edges change only through connect/disconnect
  getNode(id: string): WorkflowNode | undefined {
    const node = this.nodes.get(id);
    return node ? copyNode(node) : undefined;
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  listNodes(): WorkflowNode[] {
    return Array.from(this.nodes.values(), copyNode);
  }

  toDocument(): WorkflowDocument {
    const components: Record<string, ComponentDocument> = {};
    for (const node of this.nodes.values()) {
      components[node.id] = {
        obj: { component_name: node.componentName, params: structuredClone(node.params) },
        downstream: [...node.downstream],
        upstream: [...node.upstream],
        parent_id: node.parentId ?? "",
      };
    }

    return {
      components,
      history: this.history.map(([role, content]): HistoryEntry => [role, content]),
      messages: structuredClone(this.messages),
      reference: structuredClone(this.reference),
      path: [...this.path],
      answer: [...this.answer],
    };
  }

  toJson(indent = 4): string {
    return JSON.stringify(this.toDocument(), null, indent);
  }

  static fromDocument(document: unknown, init: WorkflowGraphInit = {}): WorkflowGraph {
    const parsed = workflowDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new WorkflowDocumentError(describeIssues(parsed.error));
    }

    const graph = new WorkflowGraph(init);
    for (const [id, component] of Object.entries(parsed.data.components)) {
      assertRegistered(component.obj.component_name);
      graph.nodes.set(id, {
        id,
        componentName: component.obj.component_name,
        params: { ...component.obj.params },
        upstream: [...component.upstream],
        downstream: [...component.downstream],
        parentId: component.parent_id === "" ? null : component.parent_id,
      });
    }

    const { issues } = validateGraph(graph.nodes.values());
    const cycle = issues.find((issue) => issue.kind === "parent-cycle");
    if (cycle) {
      throw new ParentCycleError(cycle.nodeId, cycle.otherId);
    }
    const broken = issues.filter((issue) => issue.kind === "dangling-edge" || issue.kind === "missing-parent");
    if (broken.length > 0) {
      throw new WorkflowDocumentError(broken.map((issue) => issue.message));
    }

    graph.history = parsed.data.history;
    graph.messages = parsed.data.messages;
    graph.reference = parsed.data.reference;
    graph.path = parsed.data.path;
    graph.answer = parsed.data.answer;
    return graph;
  }

  static parse(json: string, init: WorkflowGraphInit = {}): WorkflowGraph {
    const result = safeJsonParse(json);
    if (!result.success) {
      throw new WorkflowDocumentError([`document: ${result.error}`]);
    }
    return WorkflowGraph.fromDocument(result.data, init);
  }

  private requireNode(id: string, role = "Node"): WorkflowNode {
    const node = this.nodes.get(id);
    if (!node) {
      throw new NodeNotFoundError(id, role);
    }
    return node;
  }
}

function copyNode(node: WorkflowNode): WorkflowNode {
  return {
    ...node,
    params: { ...node.params },
    upstream: [...node.upstream],
    downstream: [...node.downstream],
  };
}

function assertRegistered(componentName: string): void {
  registerAllComponents();
  if (!isComponentRegistered(componentName)) {
    throw new UnknownComponentTypeError(componentName, listAvailableComponents());
  }
}
