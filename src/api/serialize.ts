/**
 * Persisted document format.
 *
 * Documents use snake_case field names (`node_type`, `last_output`,
 * `source_port`, ...) and are what local storage, files and the CLI read and
 * write. The zod schema validates a document and maps it onto the in-memory
 * model; `serializeWorkflow` maps back.
 */

import { z } from 'zod';
import { NODE_CATEGORIES, type NodeIdBrand, type PortNameBrand, type TConnection, type TNode, type TRunRecord, type TWorkflow } from '../ast/types.js';
import { DEFAULT_VIEWPORT } from '../constants.js';
import { WorkflowParseError, type TParseIssue } from '../errors.js';
import { portName, toNodeId } from '../types/branded-ids.js';
import { getErrorMessage } from '../utils/error-utils.js';

const finiteNumber = z.number().finite();
const nodeIdSchema = z.string().uuid().transform(toNodeId);

const nodeSchema = z
  .object({
    id: nodeIdSchema,
    name: z.string(),
    description: z.string().default(''),
    node_type: z.string(),
    category: z.enum(NODE_CATEGORIES),
    icon: z.string(),
    x: finiteNumber,
    y: finiteNumber,
    config: z.record(z.unknown()).default({}),
    last_output: z.unknown().optional(),
    selected: z.boolean().default(false),
    executing: z.boolean().default(false),
    skipped: z.boolean().default(false),
    error: z.string().nullable().default(null),
  })
  .transform(
    (doc): TNode => ({
      id: doc.id,
      name: doc.name,
      description: doc.description,
      nodeType: doc.node_type,
      category: doc.category,
      icon: doc.icon,
      x: doc.x,
      y: doc.y,
      config: doc.config,
      lastOutput: doc.last_output ?? null,
      selected: doc.selected,
      executing: doc.executing,
      skipped: doc.skipped,
      error: doc.error,
    }),
  );

const connectionSchema = z
  .object({
    id: z.string().uuid(),
    source: nodeIdSchema,
    target: nodeIdSchema,
    source_port: z.string().transform(portName),
    target_port: z.string().transform(portName),
  })
  .transform(
    (doc): TConnection => ({
      id: doc.id,
      source: doc.source,
      target: doc.target,
      sourcePort: doc.source_port,
      targetPort: doc.target_port,
    }),
  );

const viewportSchema = z.object({
  x: finiteNumber,
  y: finiteNumber,
  zoom: finiteNumber.positive(),
});

const runRecordSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  results: z.record(z.unknown()),
  success: z.boolean(),
});

export const workflowDocumentSchema = z
  .object({
    nodes: z.array(nodeSchema).default([]),
    connections: z.array(connectionSchema).default([]),
    viewport: viewportSchema.default({ ...DEFAULT_VIEWPORT }),
    execution_queue: z.array(nodeIdSchema).default([]),
    current_step: z.number().int().nonnegative().default(0),
    history: z.array(runRecordSchema).default([]),
  })
  .transform(
    (doc): TWorkflow => ({
      nodes: doc.nodes,
      connections: doc.connections,
      viewport: doc.viewport,
      executionQueue: doc.execution_queue,
      currentStep: doc.current_step,
      history: doc.history,
    }),
  );

export type TNodeDocument = {
  id: string;
  name: string;
  description: string;
  node_type: string;
  category: TNode['category'];
  icon: string;
  x: number;
  y: number;
  config: Record<string, unknown>;
  last_output: unknown;
  selected: boolean;
  executing: boolean;
  skipped: boolean;
  error: string | null;
};

export type TConnectionDocument = {
  id: string;
  source: string;
  target: string;
  source_port: string;
  target_port: string;
};

export type TWorkflowDocument = {
  nodes: TNodeDocument[];
  connections: TConnectionDocument[];
  viewport: { x: number; y: number; zoom: number };
  execution_queue: string[];
  current_step: number;
  history: TRunRecord[];
};

export type TSafeParseResult =
  | { success: true; workflow: TWorkflow }
  | { success: false; error: WorkflowParseError };

function toParseIssues(error: z.ZodError): TParseIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

/**
 * Validate a document and convert it to the in-memory model.
 */
export function safeParseWorkflow(data: unknown): TSafeParseResult {
  const parsed = workflowDocumentSchema.safeParse(data);
  if (parsed.success) {
    return { success: true, workflow: parsed.data };
  }
  const issues = toParseIssues(parsed.error);
  const summary = issues
    .slice(0, 3)
    .map((i) => `  - ${i.path}: ${i.message}`)
    .join('\n');
  const more = issues.length > 3 ? `\n  ... and ${issues.length - 3} more issues` : '';
  return {
    success: false,
    error: new WorkflowParseError(`Invalid workflow document:\n${summary}${more}`, issues),
  };
}

/**
 * @throws {WorkflowParseError} If the document does not match the format
 */
export function parseWorkflow(data: unknown): TWorkflow {
  const result = safeParseWorkflow(data);
  if (!result.success) {
    throw result.error;
  }
  return result.workflow;
}

export function serializeWorkflow(workflow: TWorkflow): TWorkflowDocument {
  return {
    nodes: workflow.nodes.map((node) => ({
      id: node.id,
      name: node.name,
      description: node.description,
      node_type: node.nodeType,
      category: node.category,
      icon: node.icon,
      x: node.x,
      y: node.y,
      config: node.config,
      last_output: node.lastOutput ?? null,
      selected: node.selected,
      executing: node.executing,
      skipped: node.skipped,
      error: node.error,
    })),
    connections: workflow.connections.map((conn) => ({
      id: conn.id,
      source: conn.source,
      target: conn.target,
      source_port: conn.sourcePort,
      target_port: conn.targetPort,
    })),
    viewport: { ...workflow.viewport },
    execution_queue: [...workflow.executionQueue],
    current_step: workflow.currentStep,
    history: workflow.history.map((record) => ({ ...record })),
  };
}

/**
 * @throws {WorkflowParseError} On malformed JSON or an invalid document
 */
export function workflowFromJson(text: string): TWorkflow {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error: unknown) {
    throw new WorkflowParseError(`Invalid JSON: ${getErrorMessage(error)}`);
  }
  return parseWorkflow(data);
}

export function workflowToJson(workflow: TWorkflow, indent = 2): string {
  return JSON.stringify(serializeWorkflow(workflow), null, indent);
}
