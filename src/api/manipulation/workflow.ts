/**
 * Workflow-level operations for manipulation
 */

import type { TWorkflow } from '../../ast/types.js';
import { DEFAULT_VIEWPORT } from '../../constants.js';
import { withoutValidation } from '../helpers.js';

/**
 * Create an empty workflow: no nodes, identity viewport, empty run state.
 */
export function createWorkflow(): TWorkflow {
  return {
    nodes: [],
    connections: [],
    viewport: { ...DEFAULT_VIEWPORT },
    executionQueue: [],
    currentStep: 0,
    history: [],
  };
}

/**
 * Clone a workflow (creates a copy via Immer)
 *
 * @example
 * ```typescript
 * const copy = cloneWorkflow(original);
 * // copy !== original
 * ```
 */
export function cloneWorkflow(workflow: TWorkflow): TWorkflow {
  // Touch the top-level collections; without changes Immer hands back the
  // same object
  return withoutValidation(workflow, (draft) => {
    draft.nodes = [...draft.nodes];
    draft.connections = [...draft.connections];
    draft.viewport = { ...draft.viewport };
  });
}

/**
 * Reset the execution cursor. Queue contents are owned by the execution
 * subsystem; this only clears what it left behind.
 */
export function resetExecutionState(workflow: TWorkflow): TWorkflow {
  return withoutValidation(workflow, (draft) => {
    draft.executionQueue = [];
    draft.currentStep = 0;
    for (const node of draft.nodes) {
      node.executing = false;
      node.skipped = false;
      node.error = null;
    }
  });
}
