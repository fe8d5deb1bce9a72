/**
 * Error types raised (or returned) by the workflow core.
 */

import type { TNodeId } from './ast/types.js';
import type { TPortType } from './node-types.js';

export type TConnectionErrorCode =
  | 'SELF_CONNECTION'
  | 'WOULD_CREATE_CYCLE'
  | 'DUPLICATE'
  | 'TYPE_MISMATCH'
  | 'UNKNOWN_NODE';

/**
 * Why a connection was refused. Returned as a value from the connection
 * operations; callers show it to the user and leave the workflow as it was.
 */
export class ConnectionError extends Error {
  constructor(
    public readonly code: TConnectionErrorCode,
    message: string,
    public readonly source?: TNodeId,
    public readonly target?: TNodeId,
    /** Set for TYPE_MISMATCH */
    public readonly sourceType?: TPortType,
    public readonly targetType?: TPortType,
  ) {
    super(message);
    this.name = 'ConnectionError';
  }

  static selfConnection(nodeId: TNodeId): ConnectionError {
    return new ConnectionError('SELF_CONNECTION', 'Cannot connect node to itself', nodeId, nodeId);
  }

  static wouldCreateCycle(source: TNodeId, target: TNodeId): ConnectionError {
    return new ConnectionError('WOULD_CREATE_CYCLE', 'Connection would create a cycle', source, target);
  }

  static duplicate(source: TNodeId, target: TNodeId): ConnectionError {
    return new ConnectionError('DUPLICATE', 'Connection already exists', source, target);
  }

  static typeMismatch(
    source: TNodeId,
    target: TNodeId,
    sourceType: TPortType,
    targetType: TPortType,
  ): ConnectionError {
    return new ConnectionError(
      'TYPE_MISMATCH',
      `Type mismatch: ${sourceType} output is not compatible with ${targetType} input`,
      source,
      target,
      sourceType,
      targetType,
    );
  }

  static unknownNode(nodeId: TNodeId, source: TNodeId, target: TNodeId): ConnectionError {
    return new ConnectionError('UNKNOWN_NODE', `Node ${nodeId} not found`, source, target);
  }
}

export type TParseIssue = {
  path: string;
  message: string;
};

/**
 * Thrown when a workflow document does not match the persisted format.
 */
export class WorkflowParseError extends Error {
  constructor(
    message: string,
    public readonly issues: TParseIssue[] = [],
  ) {
    super(message);
    this.name = 'WorkflowParseError';
  }
}
