/**
 * Workflow graph model.
 *
 * A workflow is a directed graph where:
 * - `nodes` are steps of a durable-execution workflow, in insertion order
 * - `connections` link an output port of one node to an input port of another
 * - `viewport` is the pan/zoom transform the editor draws through
 *
 * ```
 * ┌──────────────────────────────────────────────────────────┐
 * │                        WORKFLOW                          │
 * │  ┌──────────────┐   source.port → target.port           │
 * │  │    NODES     │──────────────────────────────┐        │
 * │  │ (ordered)    │◄─────────── CONNECTIONS ─────┘        │
 * │  └──────────────┘                                       │
 * │  viewport: screen = model * zoom + pan                  │
 * └──────────────────────────────────────────────────────────┘
 * ```
 *
 * The connection graph is kept acyclic by the connectivity checks in
 * `api/manipulation/connections`; nothing else adds connections to a live
 * workflow.
 */

export declare const NodeIdBrand: unique symbol;
export declare const PortNameBrand: unique symbol;

/** Opaque node identifier (a UUID). */
export type TNodeId = string & { readonly [NodeIdBrand]: never };

/** Port name newtype. Ports compare by exact string equality. */
export type TPortName = string & { readonly [PortNameBrand]: never };

export const NODE_CATEGORIES = ['entry', 'durable', 'state', 'flow', 'timing', 'signal'] as const;

export type TNodeCategory = (typeof NODE_CATEGORIES)[number];

export type TNode = {
  id: TNodeId;
  /** Display name, e.g. "run 3" */
  name: string;
  description: string;
  /** Key into the node-type table (see node-types.ts) */
  nodeType: string;
  category: TNodeCategory;
  icon: string;
  x: number;
  y: number;
  /** Open configuration document edited by the node forms */
  config: Record<string, unknown>;
  /** Output of the last execution, if any */
  lastOutput?: unknown;
  // Transient UI flags
  selected: boolean;
  executing: boolean;
  skipped: boolean;
  error: string | null;
};

export type TConnection = {
  id: string;
  source: TNodeId;
  target: TNodeId;
  sourcePort: TPortName;
  targetPort: TPortName;
};

/** Affine transform from canvas space to screen space: `screen = model * zoom + (x, y)`. */
export type TViewport = {
  x: number;
  y: number;
  zoom: number;
};

/**
 * Record of a past run. Written by the execution subsystem; this package only
 * carries it so that documents round-trip.
 */
export type TRunRecord = {
  id: string;
  /** ISO-8601 timestamp */
  timestamp: string;
  results: Record<string, unknown>;
  success: boolean;
};

export type TWorkflow = {
  nodes: TNode[];
  connections: TConnection[];
  viewport: TViewport;
  executionQueue: TNodeId[];
  currentStep: number;
  history: TRunRecord[];
};

export type TPosition = {
  x: number;
  y: number;
};

/** Axis-aligned box as `(minX, minY, maxX, maxY)`. */
export type TRect = {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
};

export type TValidationError = {
  type: 'error' | 'warning';
  code: string;
  message: string;
  node?: TNodeId;
  connection?: TConnection;
};
