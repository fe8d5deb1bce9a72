/**
 * Node operations for workflow manipulation
 */

import type { TNode, TNodeId, TWorkflow } from '../../ast/types.js';
import { PLACEMENT_STEP, VIEWPORT_CENTER } from '../../constants.js';
import { applyDragDelta, findSafePosition, screenToModel, toPlacementCoordinate } from '../../diagram/geometry.js';
import { getNodeMetadata } from '../../node-types.js';
import { createNodeId } from '../../types/branded-ids.js';
import { getNodePositions, updateNodeWhere, withoutValidation } from '../helpers.js';

export type TAddNodeResult = {
  workflow: TWorkflow;
  nodeId: TNodeId;
};

export type TAddNodeOptions = {
  /** Use this id instead of generating one */
  id?: TNodeId;
};

export type TNodeExecutionState = Partial<Pick<TNode, 'executing' | 'skipped' | 'error'>>;

/**
 * Build a node of `nodeType` at `(x, y)`. Unknown node types get the
 * "Unknown Node" metadata; this never fails.
 */
export function createNode(nodeType: string, x: number, y: number, ordinal: number, id: TNodeId = createNodeId()): TNode {
  const { category, icon, label } = getNodeMetadata(nodeType);
  return {
    id,
    name: `${nodeType} ${ordinal}`,
    description: label,
    nodeType,
    category,
    icon,
    x,
    y,
    config: {},
    lastOutput: null,
    selected: false,
    executing: false,
    skipped: false,
    error: null,
  };
}

/**
 * Add a node near `(x, y)`.
 *
 * The node is nudged diagonally by 30 units until it no longer sits on top
 * of an existing node. Non-finite coordinates are replaced by 0 and the rest
 * are clamped to ±100000 first. Its display name is `"<nodeType> <n>"` where `n` is
 * the new node count.
 *
 * @example
 * ```typescript
 * const { workflow: next, nodeId } = addNode(workflow, 'http-handler', 100, 100);
 * ```
 */
export function addNode(
  workflow: TWorkflow,
  nodeType: string,
  x: number,
  y: number,
  options: TAddNodeOptions = {},
): TAddNodeResult {
  const position = findSafePosition(
    getNodePositions(workflow),
    toPlacementCoordinate(x),
    toPlacementCoordinate(y),
    PLACEMENT_STEP,
  );
  const node = createNode(nodeType, position.x, position.y, workflow.nodes.length + 1, options.id);

  const next = withoutValidation(workflow, (draft) => {
    draft.nodes.push(node);
  });
  return { workflow: next, nodeId: node.id };
}

/**
 * Add a node under the fixed screen point the editor treats as the middle of
 * the canvas, converted to model space through the current viewport.
 */
export function addNodeAtViewportCenter(workflow: TWorkflow, nodeType: string): TAddNodeResult {
  const { x, y } = screenToModel(VIEWPORT_CENTER, workflow.viewport);
  return addNode(workflow, nodeType, x, y);
}

/**
 * Remove a node and every connection that starts or ends at it.
 * Unknown ids are a no-op.
 */
export function removeNode(workflow: TWorkflow, nodeId: TNodeId): TWorkflow {
  if (!workflow.nodes.some((n) => n.id === nodeId)) {
    return workflow;
  }
  return withoutValidation(workflow, (draft) => {
    draft.nodes = draft.nodes.filter((n) => n.id !== nodeId);
    draft.connections = draft.connections.filter((c) => c.source !== nodeId && c.target !== nodeId);
    draft.executionQueue = draft.executionQueue.filter((id) => id !== nodeId);
  });
}

/**
 * Move a node by `(dx, dy)` and snap it to the 10-unit grid.
 * Non-finite deltas and unknown ids leave the workflow unchanged.
 */
export function moveNode(workflow: TWorkflow, nodeId: TNodeId, dx: number, dy: number): TWorkflow {
  return updateNodeWhere(workflow, nodeId, (node) => {
    const next = applyDragDelta(node.x, node.y, dx, dy);
    node.x = next.x;
    node.y = next.y;
  });
}

/**
 * Replace a node's configuration document.
 */
export function setNodeConfig(workflow: TWorkflow, nodeId: TNodeId, config: Record<string, unknown>): TWorkflow {
  return updateNodeWhere(workflow, nodeId, (node) => {
    node.config = { ...config };
  });
}

/**
 * Record the output of the node's last execution (`null` clears it).
 * Immer auto-freezes the result, `output` included.
 */
export function setNodeOutput(workflow: TWorkflow, nodeId: TNodeId, output: unknown): TWorkflow {
  return updateNodeWhere(workflow, nodeId, (node) => {
    node.lastOutput = output;
  });
}

export function setNodeExecutionState(
  workflow: TWorkflow,
  nodeId: TNodeId,
  state: TNodeExecutionState,
): TWorkflow {
  return updateNodeWhere(workflow, nodeId, (node) => {
    if (state.executing !== undefined) node.executing = state.executing;
    if (state.skipped !== undefined) node.skipped = state.skipped;
    if (state.error !== undefined) node.error = state.error;
  });
}

/**
 * Select a node. Without `additive` every other node is deselected first.
 */
export function selectNode(workflow: TWorkflow, nodeId: TNodeId, additive = false): TWorkflow {
  if (!workflow.nodes.some((n) => n.id === nodeId)) {
    return workflow;
  }
  return withoutValidation(workflow, (draft) => {
    for (const node of draft.nodes) {
      if (node.id === nodeId) {
        node.selected = true;
      } else if (!additive) {
        node.selected = false;
      }
    }
  });
}

export function deselectAll(workflow: TWorkflow): TWorkflow {
  return withoutValidation(workflow, (draft) => {
    for (const node of draft.nodes) {
      node.selected = false;
    }
  });
}
