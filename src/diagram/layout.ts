import type { TNodeId, TPosition, TWorkflow } from '../ast/types.js';
import { LAYOUT_DEFAULTS, NODE_HEIGHT, NODE_WIDTH } from '../constants.js';
import { withoutValidation } from '../api/helpers.js';
import { topologicalOrder } from '../api/query.js';

export interface TLayoutOptions {
  /** Vertical gap between layers, added to the node height */
  layerSpacing?: number;
  /** Minimum horizontal gap between neighbours in a layer */
  nodeSpacing?: number;
}

export type TLayoutResult =
  | {
      status: 'applied';
      /** Node ids per layer, in final left-to-right order */
      layers: TNodeId[][];
      positions: Map<TNodeId, TPosition>;
    }
  | { status: 'skipped'; reason: 'empty' | 'cyclic-graph' };

export type TLayoutOutcome = {
  workflow: TWorkflow;
  result: TLayoutResult;
};

/**
 * Layered DAG layout: topological sort, longest-path layering, barycenter
 * crossing minimization (4 downward sweeps), then coordinate assignment that
 * pulls each node under its parents, centers every layer against the widest
 * one and shifts the whole drawing to the top-left padding.
 *
 * Cyclic graphs are not laid out; the result says so instead.
 */
export function computeLayout(workflow: TWorkflow, options: TLayoutOptions = {}): TLayoutResult {
  if (workflow.nodes.length === 0) {
    return { status: 'skipped', reason: 'empty' };
  }

  const layerSpacing = options.layerSpacing ?? LAYOUT_DEFAULTS.LAYER_SPACING;
  const nodeSpacing = options.nodeSpacing ?? LAYOUT_DEFAULTS.NODE_SPACING;

  // Insertion order is the tie-break everywhere below
  const insertionOrder = new Map<TNodeId, number>();
  workflow.nodes.forEach((node, index) => insertionOrder.set(node.id, index));

  // Incoming adjacency. Parallel connections (different ports) count once each.
  const parents = new Map<TNodeId, TNodeId[]>();
  for (const node of workflow.nodes) {
    parents.set(node.id, []);
  }
  for (const conn of workflow.connections) {
    if (!insertionOrder.has(conn.source) || !insertionOrder.has(conn.target)) continue;
    parents.get(conn.target)?.push(conn.source);
  }
  const parentsOf = (id: TNodeId): TNodeId[] => parents.get(id) ?? [];

  const sorted = topologicalOrder(workflow);
  if (!sorted) {
    return { status: 'skipped', reason: 'cyclic-graph' };
  }

  // Longest-path layering: every edge points to a strictly higher layer
  const nodeLayer = new Map<TNodeId, number>();
  for (const id of sorted) {
    let layer = 0;
    for (const parent of parentsOf(id)) {
      const parentLayer = nodeLayer.get(parent);
      if (parentLayer !== undefined) {
        layer = Math.max(layer, parentLayer + 1);
      }
    }
    nodeLayer.set(id, layer);
  }

  const layers: TNodeId[][] = [];
  for (const id of sorted) {
    const layer = nodeLayer.get(id) ?? 0;
    while (layers.length <= layer) {
      layers.push([]);
    }
    layers[layer].push(id);
  }

  // Barycenter heuristic for crossing minimization. Layer 0 keeps its order.
  for (let sweep = 0; sweep < LAYOUT_DEFAULTS.CROSSING_SWEEPS; sweep++) {
    for (let l = 1; l < layers.length; l++) {
      layers[l] = sortLayerByBarycenter(layers[l], layers[l - 1], parentsOf, insertionOrder);
    }
  }

  // Coordinate assignment, top-down
  const xById = new Map<TNodeId, number>();
  const yById = new Map<TNodeId, number>();
  let maxLayerWidth = 0;

  layers.forEach((layer, layerIndex) => {
    const placed: number[] = [];
    for (const id of layer) {
      const parentXs = parentsOf(id)
        .map((parent) => xById.get(parent))
        .filter((x): x is number => x !== undefined);
      const preferredX = parentXs.length > 0 ? parentXs.reduce((a, b) => a + b, 0) / parentXs.length : 0;

      const previous = placed[placed.length - 1];
      const x = previous === undefined ? preferredX : Math.max(preferredX, previous + NODE_WIDTH + nodeSpacing);
      placed.push(x);
      xById.set(id, x);
    }

    maxLayerWidth = Math.max(maxLayerWidth, layerWidth(placed));

    const y = layerIndex * (NODE_HEIGHT + layerSpacing);
    for (const id of layer) {
      yById.set(id, y);
    }
  });

  // Center each layer against the widest one
  for (const layer of layers) {
    const xs = layer.map((id) => xById.get(id) ?? 0);
    const offset = (maxLayerWidth - layerWidth(xs)) / 2;
    for (const id of layer) {
      xById.set(id, (xById.get(id) ?? 0) + offset);
    }
  }

  // Normalize to the top-left padding
  let minX = Infinity;
  let minY = Infinity;
  for (const x of xById.values()) minX = Math.min(minX, x);
  for (const y of yById.values()) minY = Math.min(minY, y);
  const positions = new Map<TNodeId, TPosition>();
  for (const node of workflow.nodes) {
    positions.set(node.id, {
      x: (xById.get(node.id) ?? 0) - minX + LAYOUT_DEFAULTS.LEFT_PADDING,
      y: (yById.get(node.id) ?? 0) - minY + LAYOUT_DEFAULTS.TOP_PADDING,
    });
  }

  return { status: 'applied', layers, positions };
}

/**
 * Lay out `workflow` and write the positions back. Only node `x`/`y` change;
 * a skipped layout returns the input workflow untouched.
 */
export function applyLayout(workflow: TWorkflow, options: TLayoutOptions = {}): TLayoutOutcome {
  const result = computeLayout(workflow, options);
  if (result.status === 'skipped') {
    return { workflow, result };
  }

  const next = withoutValidation(workflow, (draft) => {
    for (const node of draft.nodes) {
      const position = result.positions.get(node.id);
      if (position) {
        node.x = position.x;
        node.y = position.y;
      }
    }
  });
  return { workflow: next, result };
}

function layerWidth(xs: readonly number[]): number {
  if (xs.length === 0) return 0;
  return Math.max(xs[xs.length - 1] - xs[0] + NODE_WIDTH, 0);
}

function sortLayerByBarycenter(
  layer: readonly TNodeId[],
  referenceLayer: readonly TNodeId[],
  parentsOf: (id: TNodeId) => TNodeId[],
  insertionOrder: ReadonlyMap<TNodeId, number>,
): TNodeId[] {
  const refPositions = new Map<TNodeId, number>();
  referenceLayer.forEach((id, i) => refPositions.set(id, i));

  const barycenters = new Map<TNodeId, number>();
  for (const nodeId of layer) {
    const neighbors: number[] = [];
    for (const parent of parentsOf(nodeId)) {
      const position = refPositions.get(parent);
      if (position !== undefined) neighbors.push(position);
    }
    barycenters.set(
      nodeId,
      neighbors.length > 0 ? neighbors.reduce((a, b) => a + b, 0) / neighbors.length : 0,
    );
  }

  const order = (id: TNodeId): number => insertionOrder.get(id) ?? Number.MAX_SAFE_INTEGER;
  return [...layer].sort(
    (a, b) => (barycenters.get(a) ?? 0) - (barycenters.get(b) ?? 0) || order(a) - order(b),
  );
}
