/* eslint-disable no-console */
/**
 * Describe command - prints a workflow's nodes by layer and its connections
 */

import type { TNodeId, TWorkflow } from '../../ast/types.js';
import { findNode } from '../../api/query.js';
import { computeLayout } from '../../diagram/layout.js';
import { validator } from '../../validator.js';
import { readWorkflowFile } from '../utils/workflow-file.js';

export const DESCRIBE_FORMATS = ['text', 'json', 'mermaid'] as const;
export type TDescribeFormat = (typeof DESCRIBE_FORMATS)[number];

export interface DescribeOptions {
  format?: TDescribeFormat;
}

export interface NodeInfo {
  id: string;
  name: string;
  type: string;
  category: string;
  x: number;
  y: number;
}

export interface ConnectionInfo {
  from: string;
  to: string;
}

export interface DescribeOutput {
  nodes: NodeInfo[];
  connections: ConnectionInfo[];
  /** Node ids per layout layer; null when the connections contain a cycle */
  layers: string[][] | null;
  validation: {
    valid: boolean;
    errors: string[];
    warnings: string[];
  };
}

/**
 * Pure function to describe a workflow - no I/O, returns data
 */
export function describeWorkflow(workflow: TWorkflow): DescribeOutput {
  const nameOf = (id: TNodeId): string => findNode(workflow, id)?.name ?? id;

  const layout = computeLayout(workflow);
  let layers: string[][] | null;
  if (layout.status === 'applied') {
    layers = layout.layers.map((layer) => [...layer]);
  } else {
    layers = layout.reason === 'empty' ? [] : null;
  }

  const validation = validator.validate(workflow);

  return {
    nodes: workflow.nodes.map((node) => ({
      id: node.id,
      name: node.name,
      type: node.nodeType,
      category: node.category,
      x: node.x,
      y: node.y,
    })),
    connections: workflow.connections.map((c) => ({
      from: `${nameOf(c.source)}.${c.sourcePort}`,
      to: `${nameOf(c.target)}.${c.targetPort}`,
    })),
    layers,
    validation: {
      valid: validation.valid,
      errors: validation.errors.map((e) => e.message),
      warnings: validation.warnings.map((w) => w.message),
    },
  };
}

export function formatTextOutput(output: DescribeOutput): string {
  const byId = new Map(output.nodes.map((n) => [n.id, n]));
  const label = (id: string): string => {
    const node = byId.get(id);
    return node ? `${node.name} [${node.type}]` : id;
  };

  const lines: string[] = [];
  lines.push(`Nodes: ${output.nodes.length}`);
  lines.push(`Connections: ${output.connections.length}`);

  if (output.layers === null) {
    lines.push('');
    lines.push('Layers: unavailable (the connections contain a cycle)');
  } else if (output.layers.length > 0) {
    lines.push('');
    output.layers.forEach((layer, i) => lines.push(`Layer ${i}: ${layer.map(label).join(', ')}`));
  }

  if (output.connections.length > 0) {
    lines.push('');
    lines.push('Connections:');
    output.connections.forEach((c) => lines.push(`  ${c.from} -> ${c.to}`));
  }

  lines.push('');
  const { valid, errors, warnings } = output.validation;
  if (valid && warnings.length === 0) {
    lines.push('Validation: valid');
  } else {
    lines.push(`Validation: ${errors.length} error(s), ${warnings.length} warning(s)`);
    errors.forEach((e) => lines.push(`  error: ${e}`));
    warnings.forEach((w) => lines.push(`  warning: ${w}`));
  }

  return lines.join('\n');
}

export function generateMermaid(workflow: TWorkflow): string {
  const lines: string[] = ['graph TD'];
  const keys = new Map<string, string>();

  workflow.nodes.forEach((node, index) => {
    const key = `n${index}`;
    keys.set(node.id, key);
    const text = `${node.name} (${node.nodeType})`.replace(/"/g, '#quot;');
    lines.push(`  ${key}["${text}"]`);
  });

  // One edge per node pair, whatever the ports
  const seenEdges = new Set<string>();
  for (const conn of workflow.connections) {
    const from = keys.get(conn.source);
    const to = keys.get(conn.target);
    if (!from || !to) continue;
    const edgeKey = `${from}->${to}`;
    if (seenEdges.has(edgeKey)) continue;
    seenEdges.add(edgeKey);
    lines.push(`  ${from} --> ${to}`);
  }

  return lines.join('\n');
}

export function formatDescribeOutput(workflow: TWorkflow, format: TDescribeFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(describeWorkflow(workflow), null, 2);
    case 'mermaid':
      return generateMermaid(workflow);
    case 'text':
      return formatTextOutput(describeWorkflow(workflow));
  }
}

export async function describeCommand(input: string, options: DescribeOptions = {}): Promise<void> {
  const { format = 'text' } = options;
  const workflow = readWorkflowFile(input);
  console.log(formatDescribeOutput(workflow, format));
}
