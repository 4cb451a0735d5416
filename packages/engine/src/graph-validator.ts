// ──────────────────────────────────────────────
// Weft - Graph Validator
// Checks edge symmetry, dangling ids and the parent chain.
// Whole-graph cycles are allowed: conversational workflows loop.
// ──────────────────────────────────────────────

import type { WorkflowNode } from "@weft/types";

export type GraphIssueKind =
  | "dangling-edge"
  | "asymmetric-edge"
  | "self-loop"
  | "missing-parent"
  | "parent-cycle";

export interface GraphIssue {
  kind: GraphIssueKind;
  nodeId: string;
  otherId: string;
  message: string;
}

export interface GraphValidationResult {
  valid: boolean;
  errors: string[];
  issues: GraphIssue[];
}

// Issues that make a document unusable; the rest are only warned about
export const FATAL_ISSUES: ReadonlySet<GraphIssueKind> = new Set<GraphIssueKind>([
  "dangling-edge",
  "missing-parent",
  "parent-cycle",
]);

export function validateGraph(nodes: Iterable<WorkflowNode>): GraphValidationResult {
  const byId = new Map<string, WorkflowNode>();
  for (const node of nodes) {
    byId.set(node.id, node);
  }

  const issues: GraphIssue[] = [];
  const report = (kind: GraphIssueKind, nodeId: string, otherId: string, message: string) => {
    issues.push({ kind, nodeId, otherId, message });
  };

  for (const node of byId.values()) {
    for (const downId of node.downstream) {
      const down = byId.get(downId);
      if (!down) {
        report("dangling-edge", node.id, downId, `Node "${node.id}" lists unknown downstream node "${downId}"`);
        continue;
      }
      if (downId === node.id) {
        report("self-loop", node.id, downId, `Node "${node.id}" is connected to itself`);
        continue;
      }
      if (!down.upstream.includes(node.id)) {
        report(
          "asymmetric-edge",
          node.id,
          downId,
          `Node "${node.id}" lists "${downId}" downstream, but "${downId}" does not list it upstream`
        );
      }
    }

    for (const upId of node.upstream) {
      const up = byId.get(upId);
      if (!up) {
        report("dangling-edge", node.id, upId, `Node "${node.id}" lists unknown upstream node "${upId}"`);
        continue;
      }
      if (upId !== node.id && !up.downstream.includes(node.id)) {
        report(
          "asymmetric-edge",
          node.id,
          upId,
          `Node "${node.id}" lists "${upId}" upstream, but "${upId}" does not list it downstream`
        );
      }
    }

    if (node.parentId !== null && !byId.has(node.parentId)) {
      report("missing-parent", node.id, node.parentId, `Node "${node.id}" has unknown parent "${node.parentId}"`);
    }
  }

  for (const node of byId.values()) {
    const cycleAt = findParentCycle(node.id, (id) => byId.get(id)?.parentId ?? null);
    if (cycleAt !== null) {
      report("parent-cycle", node.id, cycleAt, `Parent chain of "${node.id}" loops back through "${cycleAt}"`);
    }
  }

  return {
    valid: issues.length === 0,
    errors: issues.map((issue) => issue.message),
    issues,
  };
}

// Walks parents from `startId`; returns the id seen twice, or null when the chain ends
export function findParentCycle(startId: string, parentOf: (id: string) => string | null): string | null {
  const seen = new Set<string>([startId]);
  let current = parentOf(startId);
  while (current !== null) {
    if (seen.has(current)) return current;
    seen.add(current);
    current = parentOf(current);
  }
  return null;
}
