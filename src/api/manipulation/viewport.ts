/**
 * Viewport operations for workflow manipulation
 */

import type { TWorkflow } from '../../ast/types.js';
import { calculateFitView, calculatePanOffset, calculateZoomDelta } from '../../diagram/geometry.js';
import { getNodePositions, withoutValidation } from '../helpers.js';

/**
 * Zoom by `delta` around the screen point `(centerX, centerY)` (typically
 * the cursor), keeping that point over the same model position.
 */
export function zoomViewport(workflow: TWorkflow, delta: number, centerX: number, centerY: number): TWorkflow {
  const { x, y, zoom } = workflow.viewport;
  const newZoom = calculateZoomDelta(delta, zoom);
  const offset = calculatePanOffset(x, y, centerX, centerY, zoom, newZoom);

  return withoutValidation(workflow, (draft) => {
    draft.viewport = { x: offset.x, y: offset.y, zoom: newZoom };
  });
}

/**
 * Shift the pan offset by a screen-space delta. Non-finite deltas are ignored.
 */
export function panViewport(workflow: TWorkflow, dx: number, dy: number): TWorkflow {
  if (!Number.isFinite(dx) || !Number.isFinite(dy)) {
    return workflow;
  }
  return withoutValidation(workflow, (draft) => {
    draft.viewport.x += dx;
    draft.viewport.y += dy;
  });
}

/**
 * Fit every node into a `width × height` screen with `padding`.
 * An empty workflow (or unusable dimensions) keeps the current viewport.
 */
export function fitView(workflow: TWorkflow, width: number, height: number, padding: number): TWorkflow {
  const viewport = calculateFitView(getNodePositions(workflow), width, height, padding);
  if (!viewport) {
    return workflow;
  }
  return withoutValidation(workflow, (draft) => {
    draft.viewport = viewport;
  });
}
