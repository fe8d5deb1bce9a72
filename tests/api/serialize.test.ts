/**
 * Tests for the persisted document format
 */

import { describe, it, expect } from 'vitest';
import {
  parseWorkflow,
  safeParseWorkflow,
  serializeWorkflow,
  workflowFromJson,
  workflowToJson,
} from '../../src/api/serialize.js';
import { WorkflowParseError } from '../../src/errors.js';
import { createCheckoutWorkflow, makeNode, testNodeId } from '../helpers/test-fixtures.js';

describe('serializeWorkflow', () => {
  it('writes snake_case field names', () => {
    const doc = serializeWorkflow(createCheckoutWorkflow());

    expect(Object.keys(doc)).toEqual(['nodes', 'connections', 'viewport', 'execution_queue', 'current_step', 'history']);
    expect(doc.nodes[0]).toMatchObject({ node_type: 'http-handler', last_output: null, config: { path: '/checkout' } });
    expect(doc.connections[0]).toEqual({
      id: '00000000-0000-4000-9000-000000000001',
      source: testNodeId(1),
      target: testNodeId(2),
      source_port: 'main',
      target_port: 'main',
    });
  });
});

describe('JSON round trip', () => {
  it('restores an equal workflow', () => {
    const workflow = {
      ...createCheckoutWorkflow(),
      viewport: { x: -40, y: 12.5, zoom: 0.75 },
      executionQueue: [testNodeId(2)],
      currentStep: 1,
      history: [{ id: 'run-1', timestamp: '2026-01-02T03:04:05.000Z', results: { charge: 'ok' }, success: true }],
    };
    workflow.nodes[1] = { ...workflow.nodes[1], lastOutput: { amount: 12 }, executing: true };

    expect(workflowFromJson(workflowToJson(workflow))).toEqual(workflow);
  });
});

describe('parseWorkflow', () => {
  it('fills in defaults for optional fields', () => {
    const workflow = parseWorkflow({
      nodes: [{ id: testNodeId(1), name: 'A', node_type: 'run', category: 'durable', icon: 'shield', x: 1, y: 2 }],
    });

    expect(workflow).toEqual({
      nodes: [makeNode(1, 'run', { name: 'A', description: '', x: 1, y: 2 })],
      connections: [],
      viewport: { x: 0, y: 0, zoom: 1 },
      executionQueue: [],
      currentStep: 0,
      history: [],
    });
  });

  it('accepts node types outside the built-in table', () => {
    const workflow = parseWorkflow({
      nodes: [{ id: testNodeId(1), name: 'X', node_type: 'legacy-step', category: 'durable', icon: 'box', x: 0, y: 0 }],
    });
    expect(workflow.nodes[0].nodeType).toBe('legacy-step');
  });

  it('rejects ids that are not UUIDs', () => {
    let caught: unknown;
    try {
      parseWorkflow({
        nodes: [{ id: 'node-1', name: 'A', node_type: 'run', category: 'durable', icon: 'shield', x: 0, y: 0 }],
      });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(WorkflowParseError);
    if (!(caught instanceof WorkflowParseError)) return;
    expect(caught.issues).toEqual([{ path: 'nodes.0.id', message: 'Invalid uuid' }]);
    expect(caught.message).toBe('Invalid workflow document:\n  - nodes.0.id: Invalid uuid');
  });

  it('rejects a non-positive zoom', () => {
    const result = safeParseWorkflow({ viewport: { x: 0, y: 0, zoom: 0 } });
    expect(result.success).toBe(false);
    expect(!result.success && result.error.issues.map((i) => i.path)).toEqual(['viewport.zoom']);
  });

  it('labels root-level problems', () => {
    const result = safeParseWorkflow(42);
    expect(!result.success && result.error.issues[0].path).toBe('(root)');
  });

  it('summarises at most three issues', () => {
    const result = safeParseWorkflow({ nodes: [{}] });
    expect(result.success).toBe(false);
    if (result.success) return;
    // id, name, node_type, category, icon, x, y
    expect(result.error.issues).toHaveLength(7);
    expect(result.error.message.split('\n')).toHaveLength(5);
    expect(result.error.message.endsWith('\n  ... and 4 more issues')).toBe(true);
  });
});

describe('workflowFromJson', () => {
  it('reports malformed JSON as a parse error', () => {
    expect(() => workflowFromJson('{')).toThrow(WorkflowParseError);
    expect(() => workflowFromJson('{')).toThrow(/^Invalid JSON: /);
  });
});
