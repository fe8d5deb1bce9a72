/**
 * Read-only queries over a workflow's connection graph.
 */

import type { TConnection, TNode, TNodeId, TWorkflow } from '../ast/types.js';

export function findNode(workflow: TWorkflow, nodeId: TNodeId): TNode | undefined {
  return workflow.nodes.find((n) => n.id === nodeId);
}

export function hasNode(workflow: TWorkflow, nodeId: TNodeId): boolean {
  return workflow.nodes.some((n) => n.id === nodeId);
}

export function getOutgoing(workflow: TWorkflow, nodeId: TNodeId): TConnection[] {
  return workflow.connections.filter((c) => c.source === nodeId);
}

export function getIncoming(workflow: TWorkflow, nodeId: TNodeId): TConnection[] {
  return workflow.connections.filter((c) => c.target === nodeId);
}

/**
 * Is `to` reachable from `from` by following connections forward?
 *
 * Iterative depth-first search; the visited set keeps it linear on graphs
 * where several paths share ancestors (and terminates on cyclic input).
 */
export function pathExists(workflow: TWorkflow, from: TNodeId, to: TNodeId): boolean {
  const successors = buildSuccessorMap(workflow.connections);
  const visited = new Set<TNodeId>();
  const stack: TNodeId[] = [from];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;
    if (current === to) return true;
    if (visited.has(current)) continue;
    visited.add(current);

    for (const next of successors.get(current) ?? []) {
      if (!visited.has(next)) stack.push(next);
    }
  }
  return false;
}

/**
 * Nodes reachable from any of `roots` (roots included).
 */
export function collectReachable(workflow: TWorkflow, roots: Iterable<TNodeId>): Set<TNodeId> {
  const successors = buildSuccessorMap(workflow.connections);
  const reachable = new Set<TNodeId>();
  const stack = [...roots];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;
    if (reachable.has(current)) continue;
    reachable.add(current);
    for (const next of successors.get(current) ?? []) {
      if (!reachable.has(next)) stack.push(next);
    }
  }
  return reachable;
}

/**
 * Kahn's algorithm over the workflow's nodes, ties broken by insertion order.
 * Returns `null` when the connection graph contains a cycle. Connections
 * whose endpoints are missing are ignored.
 */
export function topologicalOrder(workflow: TWorkflow): TNodeId[] | null {
  const ids = workflow.nodes.map((n) => n.id);
  const known = new Set(ids);
  const inDegree = new Map<TNodeId, number>(ids.map((id) => [id, 0]));
  const successors = new Map<TNodeId, TNodeId[]>(ids.map((id) => [id, []]));

  for (const conn of workflow.connections) {
    if (!known.has(conn.source) || !known.has(conn.target)) continue;
    successors.get(conn.source)?.push(conn.target);
    inDegree.set(conn.target, (inDegree.get(conn.target) ?? 0) + 1);
  }

  const order: TNodeId[] = [];
  const position = new Map(ids.map((id, index) => [id, index]));
  let ready = ids.filter((id) => inDegree.get(id) === 0);
  let head = 0;

  while (head < ready.length) {
    const current = ready[head++];
    order.push(current);

    const released: TNodeId[] = [];
    for (const next of successors.get(current) ?? []) {
      const remaining = (inDegree.get(next) ?? 0) - 1;
      inDegree.set(next, remaining);
      if (remaining === 0) released.push(next);
    }
    if (released.length > 0) {
      ready = ready
        .slice(head)
        .concat(released)
        .sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
      head = 0;
    }
  }

  return order.length === ids.length ? order : null;
}

export function isAcyclic(workflow: TWorkflow): boolean {
  return topologicalOrder(workflow) !== null;
}

function buildSuccessorMap(connections: readonly TConnection[]): Map<TNodeId, TNodeId[]> {
  const successors = new Map<TNodeId, TNodeId[]>();
  for (const conn of connections) {
    const list = successors.get(conn.source);
    if (list) {
      list.push(conn.target);
    } else {
      successors.set(conn.source, [conn.target]);
    }
  }
  return successors;
}
