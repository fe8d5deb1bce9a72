import { describe, it, expect } from 'vitest';
import {
  applyDragDelta,
  calculateFitView,
  calculatePanOffset,
  calculateRectCenter,
  calculateRectSize,
  calculateZoomDelta,
  clamp,
  findSafePosition,
  getNodeBounds,
  modelToScreen,
  roundHalfAwayFromZero,
  screenToModel,
  snapToGrid,
  toPlacementCoordinate,
  updateNodePosition,
} from '../../../src/diagram/geometry.js';
import { NODE_HEIGHT, NODE_WIDTH } from '../../../src/constants.js';

describe('scalar helpers', () => {
  it('clamps into range', () => {
    expect(clamp(5, 0, 3)).toBe(3);
    expect(clamp(-1, 0, 3)).toBe(0);
    expect(clamp(2, 0, 3)).toBe(2);
  });

  it('rounds halves away from zero', () => {
    expect(roundHalfAwayFromZero(2.5)).toBe(3);
    expect(roundHalfAwayFromZero(-2.5)).toBe(-3);
    expect(roundHalfAwayFromZero(-2.4)).toBe(-2);
  });

  it('never returns negative zero', () => {
    expect(Object.is(roundHalfAwayFromZero(-0.4), 0)).toBe(true);
    expect(Object.is(snapToGrid(-4), 0)).toBe(true);
  });

  it('snaps to the 10-unit grid by default', () => {
    expect(snapToGrid(104)).toBe(100);
    expect(snapToGrid(105)).toBe(110);
    expect(snapToGrid(-105)).toBe(-110);
    expect(snapToGrid(7, 5)).toBe(5);
  });
});

describe('calculateZoomDelta', () => {
  it('scales the zoom by 1 + delta', () => {
    expect(calculateZoomDelta(0.1, 1)).toBeCloseTo(1.1, 10);
    expect(calculateZoomDelta(-0.5, 2)).toBeCloseTo(1, 10);
  });

  it('clamps to [0.1, 5]', () => {
    expect(calculateZoomDelta(10, 1)).toBe(5);
    expect(calculateZoomDelta(-0.99, 1)).toBe(0.1);
  });

  it('keeps the current zoom for a non-finite delta', () => {
    expect(calculateZoomDelta(NaN, 2)).toBe(2);
    expect(calculateZoomDelta(Infinity, 10)).toBe(5);
  });

  it('resets a broken current zoom to 1', () => {
    expect(calculateZoomDelta(0.1, 0)).toBe(1);
    expect(calculateZoomDelta(0.1, NaN)).toBe(1);
    expect(calculateZoomDelta(0.1, -2)).toBe(1);
  });

  it('stays within range for any finite input', () => {
    for (const delta of [-100, -1, -0.5, 0, 0.5, 3, 1e9]) {
      for (const zoom of [0.1, 0.5, 1, 4, 5]) {
        const result = calculateZoomDelta(delta, zoom);
        expect(result).toBeGreaterThanOrEqual(0.1);
        expect(result).toBeLessThanOrEqual(5);
      }
    }
  });
});

describe('calculatePanOffset', () => {
  it('keeps the model point under the cursor fixed', () => {
    const offset = calculatePanOffset(0, 0, 400, 300, 1, 2);
    expect(offset).toEqual({ x: -400, y: -300 });

    const before = screenToModel({ x: 400, y: 300 }, { x: 0, y: 0, zoom: 1 });
    const after = screenToModel({ x: 400, y: 300 }, { ...offset, zoom: 2 });
    expect(after.x).toBeCloseTo(before.x, 10);
    expect(after.y).toBeCloseTo(before.y, 10);
  });

  it('holds for an off-origin viewport', () => {
    const viewport = { x: 35, y: -20, zoom: 0.8 };
    const cursor = { x: 123, y: 456 };
    const newZoom = 1.7;
    const offset = calculatePanOffset(viewport.x, viewport.y, cursor.x, cursor.y, viewport.zoom, newZoom);

    const before = screenToModel(cursor, viewport);
    const after = screenToModel(cursor, { ...offset, zoom: newZoom });
    expect(after.x).toBeCloseTo(before.x, 9);
    expect(after.y).toBeCloseTo(before.y, 9);
  });

  it('returns the offset unchanged for invalid input', () => {
    expect(calculatePanOffset(10, 20, 400, 300, 0, 2)).toEqual({ x: 10, y: 20 });
    expect(calculatePanOffset(10, 20, NaN, 300, 1, 2)).toEqual({ x: 10, y: 20 });
    expect(calculatePanOffset(10, 20, 400, 300, 1, Infinity)).toEqual({ x: 10, y: 20 });
  });
});

describe('model/screen transforms', () => {
  it('applies screen = model * zoom + pan', () => {
    const viewport = { x: 5, y: -5, zoom: 2 };
    expect(modelToScreen({ x: 10, y: 20 }, viewport)).toEqual({ x: 25, y: 35 });
    expect(screenToModel({ x: 25, y: 35 }, viewport)).toEqual({ x: 10, y: 20 });
  });
});

describe('getNodeBounds', () => {
  it('returns null for no nodes', () => {
    expect(getNodeBounds([])).toBeNull();
  });

  it('expands top-left positions by the node footprint', () => {
    expect(
      getNodeBounds([
        { x: 0, y: 0 },
        { x: 100, y: 50 },
      ]),
    ).toEqual({ minX: 0, minY: 0, maxX: 100 + NODE_WIDTH, maxY: 50 + NODE_HEIGHT });
  });
});

describe('calculateFitView', () => {
  it('caps the zoom at 1.5 for a small graph and centers it', () => {
    // bounds 0,0 → 220,68; scale min(750/220, 550/68) > 1.5
    expect(calculateFitView([{ x: 0, y: 0 }], 800, 600, 50)).toEqual({ x: 235, y: 249, zoom: 1.5 });
  });

  it('fits the limiting axis', () => {
    const view = calculateFitView(
      [
        { x: 0, y: 0 },
        { x: 2000, y: 1000 },
      ],
      1000,
      500,
      100,
    );
    expect(view).not.toBeNull();
    if (!view) return;
    // bounds 2220 × 1068; vertical scale 400 / 1068 wins
    expect(view.zoom).toBeCloseTo(400 / 1068, 10);
    expect(view.x).toBeCloseTo(500 - 1110 * (400 / 1068), 9);
    expect(view.y).toBeCloseTo(50, 9);
  });

  it('keeps every node on screen when the zoom is not clamped', () => {
    const positions = [
      { x: -300, y: 40 },
      { x: 500, y: 900 },
      { x: 1200, y: -150 },
    ];
    const width = 1280;
    const height = 720;
    const view = calculateFitView(positions, width, height, 40);
    expect(view).not.toBeNull();
    if (!view) return;
    expect(view.zoom).toBeGreaterThan(0.15);

    for (const p of positions) {
      const topLeft = modelToScreen(p, view);
      const bottomRight = modelToScreen({ x: p.x + NODE_WIDTH, y: p.y + NODE_HEIGHT }, view);
      expect(topLeft.x).toBeGreaterThanOrEqual(-1e-9);
      expect(topLeft.y).toBeGreaterThanOrEqual(-1e-9);
      expect(bottomRight.x).toBeLessThanOrEqual(width + 1e-9);
      expect(bottomRight.y).toBeLessThanOrEqual(height + 1e-9);
    }
  });

  it('never zooms out past 0.15', () => {
    const view = calculateFitView(
      [
        { x: 0, y: 0 },
        { x: 100_000, y: 0 },
      ],
      100,
      100,
      0,
    );
    expect(view?.zoom).toBe(0.15);
  });

  it('gives the same viewport for the same input', () => {
    const positions = [
      { x: -120, y: 40 },
      { x: 610, y: 980 },
      { x: 300, y: 300 },
    ];
    expect(calculateFitView(positions, 1024, 768, 30)).toEqual(calculateFitView(positions, 1024, 768, 30));
  });

  it('returns null when there is nothing to fit or the screen is unusable', () => {
    expect(calculateFitView([], 800, 600, 50)).toBeNull();
    expect(calculateFitView([{ x: 0, y: 0 }], 0, 600, 50)).toBeNull();
    expect(calculateFitView([{ x: 0, y: 0 }], 800, 600, -1)).toBeNull();
    expect(calculateFitView([{ x: 0, y: 0 }], NaN, 600, 50)).toBeNull();
    expect(calculateFitView([{ x: NaN, y: 0 }], 800, 600, 50)).toBeNull();
  });
});

describe('findSafePosition', () => {
  it('keeps a free position', () => {
    expect(findSafePosition([], 100, 100, 30)).toEqual({ x: 100, y: 100 });
    expect(findSafePosition([{ x: 100, y: 200 }], 100, 100, 30)).toEqual({ x: 100, y: 100 });
  });

  it('steps diagonally past stacked nodes', () => {
    const existing = [
      { x: 100, y: 100 },
      { x: 130, y: 130 },
    ];
    expect(findSafePosition(existing, 100, 100, 30)).toEqual({ x: 160, y: 160 });
  });

  it('treats anything within the tolerance as overlapping', () => {
    expect(findSafePosition([{ x: 105, y: 95 }], 100, 100, 30)).toEqual({ x: 130, y: 130 });
  });

  it('gives up immediately for a zero step', () => {
    expect(findSafePosition([{ x: 100, y: 100 }], 100, 100, 0)).toEqual({ x: 100, y: 100 });
  });

  it('stops when a step no longer moves the candidate', () => {
    // 30 is below half the spacing between doubles near 1e18
    expect(findSafePosition([{ x: 1e18, y: 1e18 }], 1e18, 1e18, 30)).toEqual({ x: 1e18, y: 1e18 });
  });

  it('stops after a bounded number of nudges', () => {
    const stacked = Array.from({ length: 1100 }, (_, i) => ({ x: i * 30, y: i * 30 }));
    expect(findSafePosition(stacked, 0, 0, 30)).toEqual({ x: 30_000, y: 30_000 });
  });
});

describe('toPlacementCoordinate', () => {
  it('replaces non-finite values and clamps the rest', () => {
    expect(toPlacementCoordinate(NaN)).toBe(0);
    expect(toPlacementCoordinate(-Infinity)).toBe(0);
    expect(toPlacementCoordinate(200_000)).toBe(100_000);
    expect(toPlacementCoordinate(-42.5)).toBe(-42.5);
  });
});

describe('updateNodePosition', () => {
  it('computes round(v + d / 10) * 10 per axis', () => {
    expect(updateNodePosition(100, 200, 10, 20)).toEqual({ x: 1010, y: 2020 });
  });

  it('returns the input for any non-finite value', () => {
    expect(updateNodePosition(100, 200, NaN, 20)).toEqual({ x: 100, y: 200 });
    expect(updateNodePosition(100, 200, 10, Infinity)).toEqual({ x: 100, y: 200 });
    expect(updateNodePosition(NaN, 200, 10, 20)).toEqual({ x: NaN, y: 200 });
  });

  it('clamps to ±100000', () => {
    expect(updateNodePosition(20_000, -20_000, 0, 0)).toEqual({ x: 100_000, y: -100_000 });
  });
});

describe('applyDragDelta', () => {
  it('adds the delta and snaps to the grid', () => {
    expect(applyDragDelta(100, 200, 10, 20)).toEqual({ x: 110, y: 220 });
    expect(applyDragDelta(100, 100, 14, 16)).toEqual({ x: 110, y: 120 });
  });

  it('clamps to ±100000', () => {
    expect(applyDragDelta(99_990, -99_990, 100, -100)).toEqual({ x: 100_000, y: -100_000 });
  });

  it('ignores non-finite deltas', () => {
    expect(applyDragDelta(100, 200, Infinity, 0)).toEqual({ x: 100, y: 200 });
  });
});

describe('rectangles', () => {
  it('computes center and size', () => {
    const rect = { minX: 0, minY: 0, maxX: 100, maxY: 50 };
    expect(calculateRectCenter(rect)).toEqual({ x: 50, y: 25 });
    expect(calculateRectSize(rect)).toEqual({ width: 100, height: 50 });
  });
});
