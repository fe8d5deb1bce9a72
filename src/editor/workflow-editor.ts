/**
 * WorkflowEditor: the single-writer owner of a live workflow.
 *
 * Wraps the pure manipulation API: each method computes the next workflow
 * and swaps it in. Undo points are explicit; call `saveUndoPoint()` before a
 * mutation the user should be able to revert.
 *
 * Snapshots are the frozen roots Immer produces, so keeping one costs only
 * what changed since. Nothing can mutate a snapshot after it is taken.
 */

import { freeze } from 'immer';
import type { TConnection, TNode, TNodeId, TPortName, TViewport, TWorkflow } from '../ast/types.js';
import { UNDO_HISTORY_LIMIT } from '../constants.js';
import {
  addConnectionChecked,
  addConnectionStrict,
  removeConnection,
  type TConnectionResult,
} from '../api/manipulation/connections.js';
import {
  addNode,
  addNodeAtViewportCenter,
  deselectAll,
  moveNode,
  removeNode,
  selectNode,
  setNodeConfig,
  setNodeExecutionState,
  setNodeOutput,
  type TNodeExecutionState,
} from '../api/manipulation/nodes.js';
import { fitView, panViewport, zoomViewport } from '../api/manipulation/viewport.js';
import { createWorkflow, resetExecutionState } from '../api/manipulation/workflow.js';
import { findNode } from '../api/query.js';
import { applyLayout, type TLayoutOptions, type TLayoutResult } from '../diagram/layout.js';
import { SnapshotStack } from './history.js';

export interface WorkflowEditorOptions {
  /** Maximum undo depth (default 60) */
  historyLimit?: number;
  /** Spacing used by `applyLayout()` when none is passed */
  layout?: TLayoutOptions;
}

export class WorkflowEditor {
  private current: TWorkflow;
  private readonly undoStack: SnapshotStack<TWorkflow>;
  private readonly redoStack: SnapshotStack<TWorkflow>;
  private readonly layoutOptions: TLayoutOptions;

  /** Deep-freezes `workflow` in place; pass a copy to keep editing the original. */
  constructor(workflow: TWorkflow = createWorkflow(), options: WorkflowEditorOptions = {}) {
    const limit = options.historyLimit ?? UNDO_HISTORY_LIMIT;
    this.current = freeze(workflow, true);
    this.undoStack = new SnapshotStack(limit);
    this.redoStack = new SnapshotStack(limit);
    this.layoutOptions = { ...options.layout };
  }

  // ---- State access ----

  get workflow(): TWorkflow {
    return this.current;
  }

  get nodes(): readonly TNode[] {
    return this.current.nodes;
  }

  get connections(): readonly TConnection[] {
    return this.current.connections;
  }

  get viewport(): Readonly<TViewport> {
    return this.current.viewport;
  }

  getNode(id: TNodeId): TNode | undefined {
    return findNode(this.current, id);
  }

  /**
   * Replace the live workflow (e.g. after loading a file) and drop all history.
   * `workflow` is deep-frozen in place.
   */
  load(workflow: TWorkflow): void {
    this.current = freeze(workflow, true);
    this.undoStack.clear();
    this.redoStack.clear();
  }

  // ---- Nodes ----

  addNode(nodeType: string, x: number, y: number): TNodeId {
    const { workflow, nodeId } = addNode(this.current, nodeType, x, y);
    this.current = workflow;
    return nodeId;
  }

  addNodeAtViewportCenter(nodeType: string): TNodeId {
    const { workflow, nodeId } = addNodeAtViewportCenter(this.current, nodeType);
    this.current = workflow;
    return nodeId;
  }

  removeNode(id: TNodeId): void {
    this.current = removeNode(this.current, id);
  }

  /** Move by `(dx, dy)`, snapped to the 10-unit grid. */
  updateNodePosition(id: TNodeId, dx: number, dy: number): void {
    this.current = moveNode(this.current, id, dx, dy);
  }

  setNodeConfig(id: TNodeId, config: Record<string, unknown>): void {
    this.current = setNodeConfig(this.current, id, config);
  }

  /** `output` becomes part of the frozen workflow and is frozen with it. */
  setNodeOutput(id: TNodeId, output: unknown): void {
    this.current = setNodeOutput(this.current, id, output);
  }

  setNodeExecutionState(id: TNodeId, state: TNodeExecutionState): void {
    this.current = setNodeExecutionState(this.current, id, state);
  }

  selectNode(id: TNodeId, additive = false): void {
    this.current = selectNode(this.current, id, additive);
  }

  deselectAll(): void {
    this.current = deselectAll(this.current);
  }

  resetExecutionState(): void {
    this.current = resetExecutionState(this.current);
  }

  // ---- Connections ----

  addConnectionChecked(
    source: TNodeId,
    target: TNodeId,
    sourcePort: TPortName,
    targetPort: TPortName,
  ): TConnectionResult {
    const { workflow, result } = addConnectionChecked(this.current, source, target, sourcePort, targetPort);
    this.current = workflow;
    return result;
  }

  addConnectionStrict(
    source: TNodeId,
    target: TNodeId,
    sourcePort: TPortName,
    targetPort: TPortName,
  ): TConnectionResult {
    const { workflow, result } = addConnectionStrict(this.current, source, target, sourcePort, targetPort);
    this.current = workflow;
    return result;
  }

  /** `true` when the connection was created (with or without a type warning). */
  addConnection(source: TNodeId, target: TNodeId, sourcePort: TPortName, targetPort: TPortName): boolean {
    return this.addConnectionChecked(source, target, sourcePort, targetPort).success;
  }

  removeConnection(connectionId: string): void {
    this.current = removeConnection(this.current, connectionId);
  }

  // ---- Layout & viewport ----

  applyLayout(options: TLayoutOptions = this.layoutOptions): TLayoutResult {
    const { workflow, result } = applyLayout(this.current, options);
    this.current = workflow;
    return result;
  }

  zoom(delta: number, centerX: number, centerY: number): void {
    this.current = zoomViewport(this.current, delta, centerX, centerY);
  }

  pan(dx: number, dy: number): void {
    this.current = panViewport(this.current, dx, dy);
  }

  fitView(width: number, height: number, padding: number): void {
    this.current = fitView(this.current, width, height, padding);
  }

  // ---- History ----

  get canUndo(): boolean {
    return !this.undoStack.isEmpty;
  }

  get canRedo(): boolean {
    return !this.redoStack.isEmpty;
  }

  /** Snapshot the live workflow onto the undo stack; clears the redo stack. */
  saveUndoPoint(): void {
    this.undoStack.push(this.current);
    this.redoStack.clear();
  }

  undo(): boolean {
    const previous = this.undoStack.pop();
    if (previous === undefined) return false;
    this.redoStack.push(this.current);
    this.current = previous;
    return true;
  }

  redo(): boolean {
    const next = this.redoStack.pop();
    if (next === undefined) return false;
    this.undoStack.push(this.current);
    this.current = next;
    return true;
  }

  clearHistory(): void {
    this.undoStack.clear();
    this.redoStack.clear();
  }
}
