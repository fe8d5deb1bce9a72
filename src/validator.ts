import type { TNode, TValidationError, TWorkflow } from './ast/types.js';
import { collectReachable, isAcyclic } from './api/query.js';
import { getNodeTypeDefinition, listNodeTypes, type TConfigRule } from './node-types.js';
import { suggestClosest } from './utils/string-distance.js';

// Re-export TValidationError for convenience
export type { TValidationError } from './ast/types.js';

export type TWorkflowValidationResult = {
  valid: boolean;
  errors: TValidationError[];
  warnings: TValidationError[];
};

function satisfiesRule(config: Record<string, unknown>, rule: TConfigRule): boolean {
  const value = config[rule.key];
  switch (rule.kind) {
    case 'text':
      return typeof value === 'string' && value.length > 0;
    case 'positive-number':
      return typeof value === 'number' && value > 0;
  }
}

/**
 * Structural checks over a whole workflow: entry points, reachability,
 * orphaned nodes, node configuration and connection integrity.
 *
 * Documents loaded from disk never went through the connectivity checks, so
 * dangling, duplicate and cyclic connections are reported here as well.
 */
export class WorkflowValidator {
  private errors: TValidationError[] = [];
  private warnings: TValidationError[] = [];

  validate(workflow: TWorkflow): TWorkflowValidationResult {
    this.errors = [];
    this.warnings = [];

    if (workflow.nodes.length === 0) {
      this.errors.push({ type: 'error', code: 'EMPTY_WORKFLOW', message: 'Workflow has no nodes' });
      return this.result();
    }

    this.validateEntryPoints(workflow);
    this.validateReachability(workflow);
    this.validateOrphanNodes(workflow);
    this.validateNodeConfig(workflow);
    this.validateConnections(workflow);
    this.validateCycles(workflow);

    return this.result();
  }

  private result(): TWorkflowValidationResult {
    return {
      valid: this.errors.length === 0,
      errors: [...this.errors],
      warnings: [...this.warnings],
    };
  }

  private validateEntryPoints(workflow: TWorkflow): void {
    if (!workflow.nodes.some((n) => n.category === 'entry')) {
      this.errors.push({
        type: 'error',
        code: 'MISSING_ENTRY_POINT',
        message: 'Workflow has no entry point (e.g., HTTP Handler, Kafka Handler)',
      });
    }
  }

  private validateReachability(workflow: TWorkflow): void {
    if (workflow.connections.length === 0) return;

    const entryIds = workflow.nodes.filter((n) => n.category === 'entry').map((n) => n.id);
    if (entryIds.length === 0) return;

    const reachable = collectReachable(workflow, entryIds);
    for (const node of workflow.nodes) {
      if (node.category === 'entry' || reachable.has(node.id)) continue;
      if (!this.hasIncoming(workflow, node)) {
        this.warnings.push({
          type: 'warning',
          code: 'UNREACHABLE_NODE',
          message: `Node '${node.name}' is not reachable from any entry point`,
          node: node.id,
        });
      }
    }
  }

  private validateOrphanNodes(workflow: TWorkflow): void {
    if (workflow.nodes.length < 2) return;

    for (const node of workflow.nodes) {
      if (node.category === 'entry') continue;

      const hasIncoming = this.hasIncoming(workflow, node);
      const hasOutgoing = workflow.connections.some((c) => c.source === node.id);

      if (!hasIncoming && !hasOutgoing) {
        this.warnings.push({
          type: 'warning',
          code: 'DISCONNECTED_NODE',
          message: `Node '${node.name}' is not connected to anything`,
          node: node.id,
        });
      } else if (!hasIncoming) {
        this.warnings.push({
          type: 'warning',
          code: 'NO_INCOMING_CONNECTION',
          message: `Node '${node.name}' has no incoming connections`,
          node: node.id,
        });
      }
    }
  }

  private validateNodeConfig(workflow: TWorkflow): void {
    for (const node of workflow.nodes) {
      const definition = getNodeTypeDefinition(node.nodeType);
      if (!definition) {
        const suggestion = suggestClosest(node.nodeType, listNodeTypes());
        const hint = suggestion ? ` Did you mean "${suggestion}"?` : '';
        this.errors.push({
          type: 'error',
          code: 'UNKNOWN_NODE_TYPE',
          message: `Unknown node type: ${node.nodeType}.${hint}`,
          node: node.id,
        });
        continue;
      }

      for (const rule of definition.configRules) {
        if (satisfiesRule(node.config, rule)) continue;
        if (rule.severity === 'error') {
          this.errors.push({ type: 'error', code: 'MISSING_REQUIRED_CONFIG', message: rule.message, node: node.id });
        } else {
          this.warnings.push({ type: 'warning', code: 'RECOMMENDED_CONFIG', message: rule.message, node: node.id });
        }
      }
    }
  }

  private validateConnections(workflow: TWorkflow): void {
    const nodeIds = new Set(workflow.nodes.map((n) => n.id));
    const seen = new Set<string>();

    for (const conn of workflow.connections) {
      if (!nodeIds.has(conn.source)) {
        this.errors.push({
          type: 'error',
          code: 'DANGLING_CONNECTION',
          message: 'Connection references non-existent source node',
          connection: conn,
        });
      }
      if (!nodeIds.has(conn.target)) {
        this.errors.push({
          type: 'error',
          code: 'DANGLING_CONNECTION',
          message: 'Connection references non-existent target node',
          connection: conn,
        });
      }

      const key = `${conn.source}.${conn.sourcePort}->${conn.target}.${conn.targetPort}`;
      if (seen.has(key)) {
        this.errors.push({
          type: 'error',
          code: 'DUPLICATE_CONNECTION',
          message: `Duplicate connection: ${key}`,
          connection: conn,
        });
      }
      seen.add(key);

      if (conn.source === conn.target) {
        this.errors.push({
          type: 'error',
          code: 'SELF_CONNECTION',
          message: 'Connection links a node to itself',
          connection: conn,
          node: conn.source,
        });
      }
    }
  }

  private validateCycles(workflow: TWorkflow): void {
    if (!isAcyclic(workflow)) {
      this.errors.push({
        type: 'error',
        code: 'CYCLE_DETECTED',
        message: 'Workflow connections contain a cycle; auto-layout and execution need a DAG',
      });
    }
  }

  private hasIncoming(workflow: TWorkflow, node: TNode): boolean {
    return workflow.connections.some((c) => c.target === node.id);
  }
}

export const validator = new WorkflowValidator();
