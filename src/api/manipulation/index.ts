/**
 * @module api/manipulation
 *
 * # Manipulation API
 *
 * Immutable operations on a workflow. Every function returns a new workflow
 * (or the same reference when nothing changed) and never mutates its input.
 *
 * | Category    | Functions |
 * |-------------|-----------|
 * | Workflow    | `createWorkflow`, `cloneWorkflow`, `resetExecutionState` |
 * | Nodes       | `addNode`, `addNodeAtViewportCenter`, `removeNode`, `moveNode`, `setNodeConfig`, ... |
 * | Connections | `addConnectionChecked`, `addConnectionStrict`, `addConnection`, `removeConnection` |
 * | Viewport    | `zoomViewport`, `panViewport`, `fitView` |
 */

export { withoutValidation, updateNodeWhere, getNodePositions } from '../helpers.js';

export { createWorkflow, cloneWorkflow, resetExecutionState } from './workflow.js';

export {
  createNode,
  addNode,
  addNodeAtViewportCenter,
  removeNode,
  moveNode,
  setNodeConfig,
  setNodeOutput,
  setNodeExecutionState,
  selectNode,
  deselectAll,
  type TAddNodeResult,
  type TAddNodeOptions,
  type TNodeExecutionState,
} from './nodes.js';

export {
  addConnectionChecked,
  addConnectionStrict,
  addConnection,
  removeConnection,
  removeAllConnections,
  type TConnectionResult,
  type TConnectOutcome,
} from './connections.js';

export { zoomViewport, panViewport, fitView } from './viewport.js';
