/**
 * durable-canvas: the graph model behind a visual editor for durable workflows.
 */

export type {
  TNodeId,
  TPortName,
  TNodeCategory,
  TNode,
  TConnection,
  TViewport,
  TRunRecord,
  TWorkflow,
  TPosition,
  TRect,
  TValidationError,
} from './ast/types.js';
export { NODE_CATEGORIES } from './ast/types.js';

export * from './constants.js';
export * from './api/manipulation/index.js';
export * from './api/query.js';
export * from './api/serialize.js';
export { validateWorkflow, type TWorkflowValidationResult } from './api/validate.js';
export { WorkflowValidator, validator } from './validator.js';

export {
  clamp,
  roundHalfAwayFromZero,
  snapToGrid,
  calculateZoomDelta,
  calculatePanOffset,
  modelToScreen,
  screenToModel,
  getNodeBounds,
  calculateFitView,
  findSafePosition,
  toPlacementCoordinate,
  updateNodePosition,
  applyDragDelta,
  calculateRectCenter,
  calculateRectSize,
} from './diagram/geometry.js';
export {
  computeLayout,
  applyLayout,
  type TLayoutOptions,
  type TLayoutResult,
  type TLayoutOutcome,
} from './diagram/layout.js';

export { WorkflowEditor, type WorkflowEditorOptions } from './editor/workflow-editor.js';
export { SnapshotStack } from './editor/history.js';

export * from './node-types.js';
export * from './type-checker.js';
export { createNodeId, createConnectionId, toNodeId, portName } from './types/branded-ids.js';

export { ConnectionError, WorkflowParseError, type TConnectionErrorCode, type TParseIssue } from './errors.js';
export {
  getFriendlyError,
  getFriendlyConnectionError,
  formatFriendlyDiagnostics,
  type TFriendlyError,
} from './friendly-errors.js';
export { getErrorMessage, wrapError } from './utils/error-utils.js';
