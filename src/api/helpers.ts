/**
 * Helper utilities for API manipulation operations
 * Provides immutability via Immer
 */

import { produce, type Draft } from 'immer';
import type { TNode, TNodeId, TPosition, TWorkflow } from '../ast/types.js';

/**
 * Wrapper for every mutation in the manipulation API.
 *
 * The operation mutates a draft as if it were mutable; Immer returns a new
 * immutable workflow that shares every untouched subtree with the input.
 * This is what makes undo snapshots cheap: a snapshot is just the previous
 * root.
 *
 * No structural validation runs here. Cosmetic edits (positions, flags,
 * config) must keep working while a workflow is incomplete, and the only
 * structural mutation (adding a connection) does its own checks first.
 *
 * @example
 * ```typescript
 * const next = withoutValidation(workflow, (draft) => {
 *   const node = draft.nodes.find((n) => n.id === nodeId);
 *   if (node) node.selected = true;
 * });
 * ```
 */
export function withoutValidation<T extends TWorkflow>(
  workflow: T,
  operation: (draft: Draft<T>) => void,
): T {
  return produce(workflow, operation);
}

/**
 * Apply `update` to the node with `nodeId`. Unknown ids return the input
 * workflow untouched (same reference).
 */
export function updateNodeWhere(
  workflow: TWorkflow,
  nodeId: TNodeId,
  update: (node: Draft<TNode>) => void,
): TWorkflow {
  if (!workflow.nodes.some((n) => n.id === nodeId)) {
    return workflow;
  }
  return withoutValidation(workflow, (draft) => {
    const node = draft.nodes.find((n) => n.id === nodeId);
    if (node) update(node);
  });
}

export function getNodePositions(workflow: TWorkflow): TPosition[] {
  return workflow.nodes.map((n) => ({ x: n.x, y: n.y }));
}
