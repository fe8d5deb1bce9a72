import { describe, it, expect } from 'vitest';
import { WorkflowEditor } from '../../../src/editor/workflow-editor.js';
import { portName } from '../../../src/types/branded-ids.js';
import { MAIN, createCheckoutWorkflow, makeGraph, testNodeId } from '../../helpers/test-fixtures.js';

describe('WorkflowEditor', () => {
  describe('nodes', () => {
    it('adds nodes and returns their ids', () => {
      const editor = new WorkflowEditor();
      const id = editor.addNode('http-handler', 100, 100);

      expect(editor.nodes).toHaveLength(1);
      expect(editor.getNode(id)).toMatchObject({ name: 'http-handler 1', x: 100, y: 100, category: 'entry' });
    });

    it('adds at the viewport center', () => {
      const editor = new WorkflowEditor();
      const id = editor.addNodeAtViewportCenter('run');
      expect(editor.getNode(id)).toMatchObject({ x: 400, y: 300 });
    });

    it('moves a node by a snapped delta', () => {
      const editor = new WorkflowEditor();
      const id = editor.addNode('run', 100, 100);
      editor.updateNodePosition(id, 10, 20);
      expect(editor.getNode(id)).toMatchObject({ x: 110, y: 120 });
    });

    it('removes a node with its connections', () => {
      const editor = new WorkflowEditor(createCheckoutWorkflow());
      editor.removeNode(testNodeId(2));
      expect(editor.nodes.map((n) => n.name)).toEqual(['Checkout', 'Notify']);
      expect(editor.connections).toHaveLength(0);
    });

    it('edits config, output, selection and execution state', () => {
      const editor = new WorkflowEditor(createCheckoutWorkflow());
      const id = testNodeId(2);

      editor.setNodeConfig(id, { service: 'billing' });
      editor.setNodeOutput(id, { charged: true });
      editor.selectNode(id);
      editor.setNodeExecutionState(id, { executing: true });

      expect(editor.getNode(id)).toMatchObject({
        config: { service: 'billing' },
        lastOutput: { charged: true },
        selected: true,
        executing: true,
      });

      editor.deselectAll();
      editor.resetExecutionState();
      expect(editor.getNode(id)).toMatchObject({ selected: false, executing: false });
    });
  });

  describe('connections', () => {
    it('reports success as a boolean', () => {
      const editor = new WorkflowEditor(makeGraph(['http-handler', 'run']));
      expect(editor.addConnection(testNodeId(1), testNodeId(2), MAIN, MAIN)).toBe(true);
      expect(editor.addConnection(testNodeId(1), testNodeId(2), MAIN, MAIN)).toBe(false);
      expect(editor.addConnection(testNodeId(2), testNodeId(1), MAIN, MAIN)).toBe(false);
      expect(editor.connections).toHaveLength(1);
    });

    it('returns the detailed result from the checked and strict paths', () => {
      const editor = new WorkflowEditor(makeGraph(['send-message', 'service-call', 'service-call']));

      const strict = editor.addConnectionStrict(testNodeId(1), testNodeId(2), MAIN, MAIN);
      expect(!strict.success && strict.error.code).toBe('TYPE_MISMATCH');
      expect(editor.connections).toHaveLength(0);

      const checked = editor.addConnectionChecked(testNodeId(1), testNodeId(2), MAIN, MAIN);
      expect(checked.success && checked.status).toBe('created-with-type-warning');
      expect(editor.connections).toHaveLength(1);
    });

    it('removes a connection by id', () => {
      const editor = new WorkflowEditor(makeGraph(['http-handler', 'run']));
      editor.addConnection(testNodeId(1), testNodeId(2), MAIN, portName('body'));
      editor.removeConnection(editor.connections[0].id);
      expect(editor.connections).toHaveLength(0);
    });
  });

  describe('layout and viewport', () => {
    it('uses the layout options given at construction', () => {
      const editor = new WorkflowEditor(createCheckoutWorkflow(), { layout: { layerSpacing: 32 } });
      const result = editor.applyLayout();

      expect(result.status).toBe('applied');
      expect(editor.nodes.map((n) => [n.x, n.y])).toEqual([
        [120, 80],
        [120, 180],
        [120, 280],
      ]);
    });

    it('leaves a cyclic workflow where it was', () => {
      const editor = new WorkflowEditor(
        makeGraph(['run', 'run'], [
          [1, 2],
          [2, 1],
        ]),
      );
      const before = editor.workflow;
      expect(editor.applyLayout()).toEqual({ status: 'skipped', reason: 'cyclic-graph' });
      expect(editor.workflow).toBe(before);
    });

    it('zooms, pans and fits', () => {
      const editor = new WorkflowEditor(makeGraph(['run']));
      editor.zoom(1, 400, 300);
      expect(editor.viewport).toEqual({ x: -400, y: -300, zoom: 2 });

      editor.pan(10, 10);
      expect(editor.viewport).toEqual({ x: -390, y: -290, zoom: 2 });

      editor.fitView(800, 600, 50);
      expect(editor.viewport).toEqual({ x: 235, y: 249, zoom: 1.5 });
    });
  });

  describe('undo / redo', () => {
    it('walks back and forth between saved points', () => {
      const editor = new WorkflowEditor();
      editor.saveUndoPoint();
      editor.addNode('http-handler', 100, 100);
      editor.saveUndoPoint();
      editor.addNode('run', 100, 300);

      expect(editor.undo()).toBe(true);
      expect(editor.nodes).toHaveLength(1);
      expect(editor.undo()).toBe(true);
      expect(editor.nodes).toHaveLength(0);
      expect(editor.undo()).toBe(false);

      expect(editor.redo()).toBe(true);
      expect(editor.nodes).toHaveLength(1);
      expect(editor.redo()).toBe(true);
      expect(editor.nodes).toHaveLength(2);
      expect(editor.redo()).toBe(false);
    });

    it('clears redo when a new undo point is saved', () => {
      const editor = new WorkflowEditor();
      editor.saveUndoPoint();
      editor.addNode('run', 0, 0);
      editor.undo();
      expect(editor.canRedo).toBe(true);

      editor.saveUndoPoint();
      expect(editor.canRedo).toBe(false);
      expect(editor.canUndo).toBe(true);
    });

    it('forgets the oldest snapshots past the history limit', () => {
      const editor = new WorkflowEditor(undefined, { historyLimit: 2 });
      for (let i = 0; i < 3; i++) {
        editor.saveUndoPoint();
        editor.addNode('run', i * 300, 0);
      }

      expect(editor.undo()).toBe(true);
      expect(editor.undo()).toBe(true);
      expect(editor.undo()).toBe(false);
      expect(editor.nodes).toHaveLength(1);
    });

    it('keeps snapshots unaffected by later edits', () => {
      const editor = new WorkflowEditor();
      const id = editor.addNode('run', 100, 100);
      const snapshot = editor.workflow;

      editor.updateNodePosition(id, 50, 50);
      expect(snapshot.nodes[0]).toMatchObject({ x: 100, y: 100 });
      expect(Object.isFrozen(snapshot.nodes[0])).toBe(true);
    });

    it('freezes the workflow it is given', () => {
      const workflow = createCheckoutWorkflow();
      new WorkflowEditor(workflow);
      expect(Object.isFrozen(workflow.nodes[0])).toBe(true);
    });

    it('drops history on load', () => {
      const editor = new WorkflowEditor();
      editor.saveUndoPoint();
      editor.addNode('run', 0, 0);

      editor.load(createCheckoutWorkflow());
      expect(editor.canUndo).toBe(false);
      expect(editor.nodes).toHaveLength(3);

      editor.saveUndoPoint();
      editor.clearHistory();
      expect(editor.canUndo).toBe(false);
    });
  });
});
