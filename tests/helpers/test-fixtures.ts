/**
 * Shared test fixtures and factories
 * Deterministic ids so documents pass the UUID checks of the serializer
 */

import type { TConnection, TNode, TNodeId, TPortName, TWorkflow } from '../../src/ast/types.js';
import { createNode } from '../../src/api/manipulation/nodes.js';
import { createWorkflow } from '../../src/api/manipulation/workflow.js';
import { portName, toNodeId } from '../../src/types/branded-ids.js';

export const MAIN: TPortName = portName('main');

/** `00000000-0000-4000-8000-00000000000n` */
export function testNodeId(n: number): TNodeId {
  return toNodeId(`00000000-0000-4000-8000-${n.toString().padStart(12, '0')}`);
}

/** `00000000-0000-4000-9000-00000000000n` */
export function testConnectionId(n: number): string {
  return `00000000-0000-4000-9000-${n.toString().padStart(12, '0')}`;
}

/**
 * Node `n` of `nodeType` at the origin, named `"<nodeType> <n>"`.
 */
export function makeNode(n: number, nodeType: string, overrides: Partial<TNode> = {}): TNode {
  return { ...createNode(nodeType, 0, 0, n, testNodeId(n)), ...overrides };
}

export function makeConnection(
  n: number,
  source: TNodeId,
  target: TNodeId,
  sourcePort: TPortName = MAIN,
  targetPort: TPortName = MAIN,
): TConnection {
  return { id: testConnectionId(n), source, target, sourcePort, targetPort };
}

/**
 * Build a workflow directly from parts. Connections are not checked, so
 * this can produce cyclic or dangling graphs on purpose.
 */
export function makeWorkflow(nodes: TNode[], connections: TConnection[] = []): TWorkflow {
  return { ...createWorkflow(), nodes, connections };
}

/**
 * Build a workflow of `nodeTypes` (ids 1..n) with connections given as
 * `[sourceIndex, targetIndex]` pairs (1-based, matching the ids).
 */
export function makeGraph(nodeTypes: string[], edges: Array<[number, number]> = []): TWorkflow {
  const nodes = nodeTypes.map((nodeType, i) => makeNode(i + 1, nodeType));
  const connections = edges.map(([from, to], i) => makeConnection(i + 1, testNodeId(from), testNodeId(to)));
  return makeWorkflow(nodes, connections);
}

/**
 * http-handler → service-call → send-message, fully configured.
 */
export function createCheckoutWorkflow(): TWorkflow {
  const handler = makeNode(1, 'http-handler', { name: 'Checkout', config: { path: '/checkout' } });
  const charge = makeNode(2, 'service-call', { name: 'Charge', config: { service: 'payments' } });
  const notify = makeNode(3, 'send-message', { name: 'Notify', config: { target: 'mailer' } });
  return makeWorkflow(
    [handler, charge, notify],
    [makeConnection(1, handler.id, charge.id), makeConnection(2, charge.id, notify.id)],
  );
}
