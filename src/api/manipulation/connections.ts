/**
 * Connection operations for workflow manipulation
 *
 * Every connection enters a workflow through `addConnectionChecked` or
 * `addConnectionStrict`. Together they keep the connection graph acyclic,
 * free of self-loops and free of duplicates.
 */

import type { TConnection, TNodeId, TPortName, TWorkflow } from '../../ast/types.js';
import { ConnectionError } from '../../errors.js';
import { checkNodeCompatibility, type TTypeCompatibility } from '../../type-checker.js';
import { createConnectionId } from '../../types/branded-ids.js';
import { withoutValidation } from '../helpers.js';
import { findNode, pathExists } from '../query.js';

export type TConnectionResult =
  | { success: true; status: 'created'; connection: TConnection }
  | { success: true; status: 'created-with-type-warning'; connection: TConnection; warning: string }
  | { success: false; error: ConnectionError };

export type TConnectOutcome = {
  /** The workflow with the connection appended, or the input workflow on failure */
  workflow: TWorkflow;
  result: TConnectionResult;
};

type TConnectionEndpoints = {
  source: TNodeId;
  target: TNodeId;
  sourcePort: TPortName;
  targetPort: TPortName;
};

/**
 * Structural checks shared by the lenient and strict paths, first failure
 * wins: self-connection, missing endpoint, cycle, duplicate.
 */
function checkStructure(workflow: TWorkflow, endpoints: TConnectionEndpoints): ConnectionError | null {
  const { source, target, sourcePort, targetPort } = endpoints;

  if (source === target) {
    return ConnectionError.selfConnection(source);
  }

  for (const id of [source, target]) {
    if (!findNode(workflow, id)) {
      return ConnectionError.unknownNode(id, source, target);
    }
  }

  // source → target closes a cycle exactly when target already reaches source
  if (pathExists(workflow, target, source)) {
    return ConnectionError.wouldCreateCycle(source, target);
  }

  const duplicate = workflow.connections.some(
    (c) =>
      c.source === source && c.target === target && c.sourcePort === sourcePort && c.targetPort === targetPort,
  );
  if (duplicate) {
    return ConnectionError.duplicate(source, target);
  }

  return null;
}

function checkTypes(workflow: TWorkflow, source: TNodeId, target: TNodeId): TTypeCompatibility | undefined {
  const sourceNode = findNode(workflow, source);
  const targetNode = findNode(workflow, target);
  if (!sourceNode || !targetNode) return undefined;
  return checkNodeCompatibility(sourceNode, targetNode);
}

function typeWarningMessage(workflow: TWorkflow, source: TNodeId, target: TNodeId, compat: TTypeCompatibility): string {
  const sourceName = findNode(workflow, source)?.name ?? source;
  const targetName = findNode(workflow, target)?.name ?? target;
  return `Type mismatch: ${compat.sourceType} output of '${sourceName}' is not compatible with ${compat.targetType} input of '${targetName}'`;
}

function appendConnection(workflow: TWorkflow, endpoints: TConnectionEndpoints): { workflow: TWorkflow; connection: TConnection } {
  const connection: TConnection = { id: createConnectionId(), ...endpoints };
  const next = withoutValidation(workflow, (draft) => {
    draft.connections.push(connection);
  });
  return { workflow: next, connection };
}

/**
 * Add a connection `source.sourcePort → target.targetPort` after checking it.
 *
 * Refused with SELF_CONNECTION, WOULD_CREATE_CYCLE or DUPLICATE (or
 * UNKNOWN_NODE for a missing endpoint); the workflow is returned unchanged.
 * Incompatible port types do not block: the connection is created and the
 * result carries a warning.
 *
 * @example
 * ```typescript
 * const { workflow: next, result } = addConnectionChecked(wf, a, b, portName('main'), portName('main'));
 * if (!result.success) console.warn(result.error.code);
 * ```
 */
export function addConnectionChecked(
  workflow: TWorkflow,
  source: TNodeId,
  target: TNodeId,
  sourcePort: TPortName,
  targetPort: TPortName,
): TConnectOutcome {
  const endpoints = { source, target, sourcePort, targetPort };
  const error = checkStructure(workflow, endpoints);
  if (error) {
    return { workflow, result: { success: false, error } };
  }

  const compat = checkTypes(workflow, source, target);
  const warning = compat && !compat.isCompatible ? typeWarningMessage(workflow, source, target, compat) : undefined;

  const appended = appendConnection(workflow, endpoints);
  const result: TConnectionResult = warning
    ? { success: true, status: 'created-with-type-warning', connection: appended.connection, warning }
    : { success: true, status: 'created', connection: appended.connection };
  return { workflow: appended.workflow, result };
}

/**
 * Strict variant of `addConnectionChecked`: an incompatible port-type pair
 * is refused with TYPE_MISMATCH instead of being created with a warning.
 */
export function addConnectionStrict(
  workflow: TWorkflow,
  source: TNodeId,
  target: TNodeId,
  sourcePort: TPortName,
  targetPort: TPortName,
): TConnectOutcome {
  const endpoints = { source, target, sourcePort, targetPort };
  const error = checkStructure(workflow, endpoints);
  if (error) {
    return { workflow, result: { success: false, error } };
  }

  const compat = checkTypes(workflow, source, target);
  if (compat && !compat.isCompatible) {
    return {
      workflow,
      result: {
        success: false,
        error: ConnectionError.typeMismatch(source, target, compat.sourceType, compat.targetType),
      },
    };
  }

  const appended = appendConnection(workflow, endpoints);
  return {
    workflow: appended.workflow,
    result: { success: true, status: 'created', connection: appended.connection },
  };
}

/**
 * Boolean form of `addConnectionChecked` for call sites that only need to
 * know whether the connection exists now.
 */
export function addConnection(
  workflow: TWorkflow,
  source: TNodeId,
  target: TNodeId,
  sourcePort: TPortName,
  targetPort: TPortName,
): { workflow: TWorkflow; added: boolean } {
  const outcome = addConnectionChecked(workflow, source, target, sourcePort, targetPort);
  return { workflow: outcome.workflow, added: outcome.result.success };
}

/**
 * Remove a connection by id. Unknown ids are a no-op.
 */
export function removeConnection(workflow: TWorkflow, connectionId: string): TWorkflow {
  if (!workflow.connections.some((c) => c.id === connectionId)) {
    return workflow;
  }
  return withoutValidation(workflow, (draft) => {
    draft.connections = draft.connections.filter((c) => c.id !== connectionId);
  });
}

/**
 * Remove every connection touching `nodeId`, optionally only those on one port.
 */
export function removeAllConnections(workflow: TWorkflow, nodeId: TNodeId, port?: TPortName): TWorkflow {
  return withoutValidation(workflow, (draft) => {
    draft.connections = draft.connections.filter((conn) => {
      const matchesSource = conn.source === nodeId && (!port || conn.sourcePort === port);
      const matchesTarget = conn.target === nodeId && (!port || conn.targetPort === port);
      return !matchesSource && !matchesTarget;
    });
  });
}
