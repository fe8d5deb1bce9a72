/**
 * # Canvas Constants
 *
 * Sizes, spacings and bounds shared by the layout engine, the viewport math
 * and the editor. Node footprints here must match what the renderer draws,
 * otherwise fit-to-view and auto-layout leave nodes overlapping or clipped.
 *
 * ```
 *   LEFT_PADDING
 *   ◄────────►┌──────── NODE_WIDTH ────────┐   NODE_SPACING   ┌────────────
 *             │                            │◄────────────────►│
 *             └────────────────────────────┘                  └────────────
 *                          ▲ LAYER_SPACING
 *                          ▼
 *             ┌────────────────────────────┐
 * ```
 */

import type { TViewport } from './ast/types.js';

export const NODE_WIDTH = 220;
export const NODE_HEIGHT = 68;

export const LAYOUT_DEFAULTS = {
  LAYER_SPACING: 140,
  NODE_SPACING: 60,
  LEFT_PADDING: 120,
  TOP_PADDING: 80,
  CROSSING_SWEEPS: 4,
} as const;

export const ZOOM_LIMITS = {
  MIN: 0.1,
  MAX: 5.0,
} as const;

/** Fit-to-view never zooms further out or in than this */
export const FIT_VIEW_ZOOM_LIMITS = {
  MIN: 0.15,
  MAX: 1.5,
} as const;

export const GRID_SIZE = 10;

/** Coordinates are clamped to ±COORDINATE_LIMIT after a drag */
export const COORDINATE_LIMIT = 100_000;

/** Two nodes closer than this on both axes are considered stacked */
export const OVERLAP_TOLERANCE = 10;

/** Nudge applied per attempt when a new node would land on an existing one */
export const PLACEMENT_STEP = 30;

/** Upper bound on diagonal nudges when placing a new node */
export const MAX_PLACEMENT_ATTEMPTS = 1000;

/** Screen point used by "add node at viewport center" */
export const VIEWPORT_CENTER = {
  x: 400,
  y: 300,
} as const;

export const UNDO_HISTORY_LIMIT = 60;

export const DEFAULT_VIEWPORT: Readonly<TViewport> = {
  x: 0,
  y: 0,
  zoom: 1,
};

