import type { TPosition, TRect, TViewport } from '../ast/types.js';
import {
  COORDINATE_LIMIT,
  FIT_VIEW_ZOOM_LIMITS,
  GRID_SIZE,
  MAX_PLACEMENT_ATTEMPTS,
  NODE_HEIGHT,
  NODE_WIDTH,
  OVERLAP_TOLERANCE,
  ZOOM_LIMITS,
} from '../constants.js';

// ---- Scalars ----

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/** Round half away from zero (Math.round rounds -2.5 to -2). */
export function roundHalfAwayFromZero(value: number): number {
  const rounded = Math.sign(value) * Math.round(Math.abs(value));
  // Normalize -0
  return rounded === 0 ? 0 : rounded;
}

export function snapToGrid(value: number, grid: number = GRID_SIZE): number {
  return roundHalfAwayFromZero(value / grid) * grid;
}

function allFinite(...values: number[]): boolean {
  return values.every((value) => Number.isFinite(value));
}

function clampCoordinate(value: number): number {
  return clamp(value, -COORDINATE_LIMIT, COORDINATE_LIMIT);
}

/** Coordinate for a new node: non-finite becomes 0, then ±COORDINATE_LIMIT applies. */
export function toPlacementCoordinate(value: number): number {
  return Number.isFinite(value) ? clampCoordinate(value) : 0;
}

// ---- Zoom & pan ----

/**
 * Multiply the zoom by `1 + delta` and clamp it to the allowed range.
 * A non-finite delta keeps the current zoom; a broken current zoom resets to 1.
 */
export function calculateZoomDelta(delta: number, currentZoom: number): number {
  if (!Number.isFinite(delta)) {
    return clamp(currentZoom, ZOOM_LIMITS.MIN, ZOOM_LIMITS.MAX);
  }
  if (!Number.isFinite(currentZoom) || currentZoom <= 0) {
    return 1;
  }
  return clamp(currentZoom * (1 + delta), ZOOM_LIMITS.MIN, ZOOM_LIMITS.MAX);
}

/**
 * New pan offset that keeps the screen point `(centerX, centerY)` over the
 * same model point while the zoom changes from `oldZoom` to `newZoom`.
 * Invalid input leaves the offset where it was.
 */
export function calculatePanOffset(
  viewportX: number,
  viewportY: number,
  centerX: number,
  centerY: number,
  oldZoom: number,
  newZoom: number,
): TPosition {
  const unchanged = { x: viewportX, y: viewportY };
  if (!allFinite(viewportX, viewportY, centerX, centerY, oldZoom, newZoom) || oldZoom <= 0) {
    return unchanged;
  }

  const factor = newZoom / oldZoom;
  if (!Number.isFinite(factor)) return unchanged;

  const x = centerX - (centerX - viewportX) * factor;
  const y = centerY - (centerY - viewportY) * factor;
  if (!allFinite(x, y)) return unchanged;

  return { x, y };
}

export function modelToScreen(point: TPosition, viewport: TViewport): TPosition {
  return {
    x: point.x * viewport.zoom + viewport.x,
    y: point.y * viewport.zoom + viewport.y,
  };
}

export function screenToModel(point: TPosition, viewport: TViewport): TPosition {
  return {
    x: (point.x - viewport.x) / viewport.zoom,
    y: (point.y - viewport.y) / viewport.zoom,
  };
}

// ---- Bounds & fit ----

/** Bounding box of node footprints (top-left positions expanded by the node size). */
export function getNodeBounds(positions: readonly TPosition[]): TRect | null {
  if (positions.length === 0) return null;

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const { x, y } of positions) {
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x + NODE_WIDTH);
    maxY = Math.max(maxY, y + NODE_HEIGHT);
  }
  return { minX, minY, maxX, maxY };
}

/**
 * Viewport that centers all nodes in a `viewportWidth × viewportHeight` screen.
 * Returns `null` when there is nothing to fit or the input is unusable.
 */
export function calculateFitView(
  positions: readonly TPosition[],
  viewportWidth: number,
  viewportHeight: number,
  padding: number,
): TViewport | null {
  if (positions.length === 0) return null;
  if (!allFinite(viewportWidth, viewportHeight, padding)) return null;
  if (viewportWidth <= 0 || viewportHeight <= 0 || padding < 0) return null;
  if (positions.some(({ x, y }) => !allFinite(x, y))) return null;

  const bounds = getNodeBounds(positions);
  if (!bounds) return null;

  const { width, height } = calculateRectSize(bounds);
  const scaleX = (viewportWidth - padding) / Math.max(width, 1);
  const scaleY = (viewportHeight - padding) / Math.max(height, 1);
  const zoom = clamp(Math.min(scaleX, scaleY), FIT_VIEW_ZOOM_LIMITS.MIN, FIT_VIEW_ZOOM_LIMITS.MAX);

  const center = calculateRectCenter(bounds);
  return {
    x: viewportWidth / 2 - center.x * zoom,
    y: viewportHeight / 2 - center.y * zoom,
    zoom,
  };
}

// ---- Placement & drag ----

/**
 * Move `(desiredX, desiredY)` diagonally by `step` until no existing position
 * sits within the overlap tolerance of it. Gives up after
 * `MAX_PLACEMENT_ATTEMPTS` nudges, or once a nudge no longer changes the
 * candidate, and returns the last candidate.
 */
export function findSafePosition(
  existing: readonly TPosition[],
  desiredX: number,
  desiredY: number,
  step: number,
): TPosition {
  let x = desiredX;
  let y = desiredY;
  if (!Number.isFinite(step) || step === 0) return { x, y };

  const overlaps = (cx: number, cy: number): boolean =>
    existing.some((p) => Math.abs(p.x - cx) < OVERLAP_TOLERANCE && Math.abs(p.y - cy) < OVERLAP_TOLERANCE);

  for (let attempt = 0; attempt < MAX_PLACEMENT_ATTEMPTS && overlaps(x, y); attempt++) {
    const nextX = x + step;
    const nextY = y + step;
    if (nextX === x && nextY === y) break;
    x = nextX;
    y = nextY;
  }
  return { x, y };
}

/**
 * Position update with the numeric-safety guard: any non-finite input returns
 * `(x, y)` unchanged. Each axis becomes `round(value + delta / 10) * 10`, then
 * is clamped to ±100000.
 *
 * @example
 * ```typescript
 * updateNodePosition(100, 200, 10, 20); // { x: 1010, y: 2020 }
 * ```
 */
export function updateNodePosition(x: number, y: number, dx: number, dy: number): TPosition {
  if (!allFinite(x, y, dx, dy)) {
    return { x, y };
  }
  return {
    x: clampCoordinate(roundHalfAwayFromZero(x + dx / GRID_SIZE) * GRID_SIZE),
    y: clampCoordinate(roundHalfAwayFromZero(y + dy / GRID_SIZE) * GRID_SIZE),
  };
}

/**
 * Drag step used by the editor: add the delta, snap to the grid, clamp.
 * Non-finite input leaves the position unchanged.
 */
export function applyDragDelta(x: number, y: number, dx: number, dy: number): TPosition {
  if (!allFinite(x, y, dx, dy)) {
    return { x, y };
  }
  return {
    x: clampCoordinate(snapToGrid(x + dx)),
    y: clampCoordinate(snapToGrid(y + dy)),
  };
}

// ---- Rectangles ----

export function calculateRectCenter(rect: TRect): TPosition {
  return {
    x: (rect.minX + rect.maxX) / 2,
    y: (rect.minY + rect.maxY) / 2,
  };
}

export function calculateRectSize(rect: TRect): { width: number; height: number } {
  return {
    width: rect.maxX - rect.minX,
    height: rect.maxY - rect.minY,
  };
}
