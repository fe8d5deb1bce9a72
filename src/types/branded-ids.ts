/**
 * Branded Identifiers
 *
 * Node ids and port names are plain strings at runtime. The brands keep a
 * port name from being passed where a node id is expected (both are strings
 * in every call that creates a connection).
 */

import { randomUUID } from 'node:crypto';
import type { TNodeId, TPortName } from '../ast/types.js';

export function createNodeId(): TNodeId {
  return randomUUID() as TNodeId;
}

export function createConnectionId(): string {
  return randomUUID();
}

/**
 * Brand an existing string as a node id (documents read from disk, CLI args).
 */
export function toNodeId(value: string): TNodeId {
  return value as TNodeId;
}

/**
 * Wrap a port name. Port names are compared exactly, so no trimming or case
 * folding happens here.
 */
export function portName(value: string): TPortName {
  return value as TPortName;
}
