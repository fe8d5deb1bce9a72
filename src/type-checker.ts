/**
 * Port Type Checker
 *
 * Advisory compatibility between the output port of one node and the input
 * port of another. The result never blocks a connection on the lenient path;
 * it only decides whether a warning is attached.
 */

import type { TNode } from './ast/types.js';
import { getNodeTypeDefinition, type TPortType } from './node-types.js';

export type TTypeCompatibility = {
  isCompatible: boolean;
  reason: 'exact' | 'any' | 'request-payload' | 'no-input' | 'incompatible';
  sourceType: TPortType;
  targetType: TPortType;
};

export type TNodePortTypes = {
  input: TPortType;
  output: TPortType;
};

/**
 * Safe implicit conversions between port types: a request carries its body
 * as a payload.
 */
const SAFE_CONVERSIONS: [TPortType, TPortType][] = [['request', 'payload']];

export function isImplicitlyConvertible(sourceType: TPortType, targetType: TPortType): boolean {
  return SAFE_CONVERSIONS.some(([from, to]) => from === sourceType && to === targetType);
}

/** Declared port types of a node type, or `undefined` for types outside the table. */
export function getPortTypes(nodeType: string): TNodePortTypes | undefined {
  const definition = getNodeTypeDefinition(nodeType);
  if (!definition) return undefined;
  return { input: definition.inputType, output: definition.outputType };
}

export function checkPortCompatibility(sourceType: TPortType, targetType: TPortType): TTypeCompatibility {
  if (targetType === 'none') {
    return { isCompatible: false, reason: 'no-input', sourceType, targetType };
  }
  if (sourceType === 'any' || targetType === 'any') {
    return { isCompatible: true, reason: 'any', sourceType, targetType };
  }
  if (sourceType === targetType) {
    return { isCompatible: true, reason: 'exact', sourceType, targetType };
  }
  if (isImplicitlyConvertible(sourceType, targetType)) {
    return { isCompatible: true, reason: 'request-payload', sourceType, targetType };
  }
  return { isCompatible: false, reason: 'incompatible', sourceType, targetType };
}

/**
 * Check the connection `source → target` at node level.
 * Returns `undefined` when either node type has no declared port types.
 */
export function checkNodeCompatibility(source: TNode, target: TNode): TTypeCompatibility | undefined {
  const sourceTypes = getPortTypes(source.nodeType);
  const targetTypes = getPortTypes(target.nodeType);
  if (!sourceTypes || !targetTypes) return undefined;
  return checkPortCompatibility(sourceTypes.output, targetTypes.input);
}
