/**
 * Built-in node types.
 *
 * One closed table maps a node-type key to everything the core needs to know
 * about it: palette metadata (category, icon, label), the port types used by
 * the advisory compatibility check, and the config rules checked by the
 * structural validator. Unknown keys resolve to `UNKNOWN_NODE_TYPE` instead of
 * failing.
 */

import type { TNodeCategory } from './ast/types.js';

/**
 * Kind of value flowing through a port.
 * - `request`: the inbound invocation of an entry point
 * - `payload`: a JSON value produced by a step
 * - `unit`: the step produces nothing usable downstream
 * - `any`: pass-through (control-flow and timing nodes)
 * - `none`: the node accepts no input (entry points)
 */
export type TPortType = 'any' | 'none' | 'request' | 'payload' | 'unit';

export type TConfigRule = {
  key: string;
  /** `text` must be a non-empty string, `positive-number` a number > 0 */
  kind: 'text' | 'positive-number';
  severity: 'error' | 'warning';
  message: string;
};

export type TNodeTypeDefinition = {
  category: TNodeCategory;
  icon: string;
  label: string;
  inputType: TPortType;
  outputType: TPortType;
  configRules: readonly TConfigRule[];
};

export type TNodeMetadata = Pick<TNodeTypeDefinition, 'category' | 'icon' | 'label'>;

function required(key: string, message: string): TConfigRule {
  return { key, kind: 'text', severity: 'error', message };
}

function recommendedText(key: string, message: string): TConfigRule {
  return { key, kind: 'text', severity: 'warning', message };
}

function recommendedPositive(key: string, message: string): TConfigRule {
  return { key, kind: 'positive-number', severity: 'warning', message };
}

export const NODE_TYPES = {
  // Entry
  'http-handler': {
    category: 'entry', icon: 'globe', label: 'HTTP Handler',
    inputType: 'none', outputType: 'request',
    configRules: [required('path', 'HTTP Handler requires a path')],
  },
  'kafka-handler': {
    category: 'entry', icon: 'kafka', label: 'Kafka Consumer',
    inputType: 'none', outputType: 'request',
    configRules: [required('topic', 'Kafka Handler requires a topic')],
  },
  'cron-trigger': {
    category: 'entry', icon: 'clock', label: 'Cron Trigger',
    inputType: 'none', outputType: 'request',
    configRules: [required('schedule', 'Cron Trigger requires a schedule')],
  },
  'workflow-submit': {
    category: 'entry', icon: 'play-circle', label: 'Workflow Submit',
    inputType: 'none', outputType: 'request',
    configRules: [required('workflow_name', 'Workflow Submit requires a workflow name')],
  },

  // Durable
  run: {
    category: 'durable', icon: 'shield', label: 'Durable Step',
    inputType: 'any', outputType: 'payload',
    configRules: [],
  },
  'service-call': {
    category: 'durable', icon: 'arrow-right', label: 'Service Call',
    inputType: 'payload', outputType: 'payload',
    configRules: [required('service', 'Service Call requires a service name')],
  },
  'object-call': {
    category: 'durable', icon: 'box', label: 'Object Call',
    inputType: 'payload', outputType: 'payload',
    configRules: [required('object_name', 'Object Call requires an object name')],
  },
  'workflow-call': {
    category: 'durable', icon: 'workflow', label: 'Workflow Call',
    inputType: 'payload', outputType: 'payload',
    configRules: [required('workflow_name', 'Workflow Call requires a workflow name')],
  },
  'send-message': {
    category: 'durable', icon: 'send', label: 'Send Message',
    inputType: 'payload', outputType: 'unit',
    configRules: [required('target', 'Send Message requires a target')],
  },
  'delayed-send': {
    category: 'durable', icon: 'clock-send', label: 'Delayed Message',
    inputType: 'payload', outputType: 'unit',
    configRules: [
      required('target', 'Delayed Send requires a target'),
      recommendedPositive('delay_ms', 'Delayed Send should have a non-zero delay'),
    ],
  },

  // State
  'get-state': {
    category: 'state', icon: 'download', label: 'Get State',
    inputType: 'any', outputType: 'payload',
    configRules: [required('key', 'Get State requires a key')],
  },
  'set-state': {
    category: 'state', icon: 'upload', label: 'Set State',
    inputType: 'payload', outputType: 'unit',
    configRules: [required('key', 'Set State requires a key')],
  },
  'clear-state': {
    category: 'state', icon: 'eraser', label: 'Clear State',
    inputType: 'any', outputType: 'unit',
    configRules: [required('key', 'Clear State requires a key')],
  },

  // Flow
  condition: {
    category: 'flow', icon: 'git-branch', label: 'If / Else',
    inputType: 'any', outputType: 'any',
    configRules: [required('expression', 'Condition requires an expression')],
  },
  switch: {
    category: 'flow', icon: 'git-fork', label: 'Switch',
    inputType: 'any', outputType: 'any',
    configRules: [required('expression', 'Switch requires an expression')],
  },
  loop: {
    category: 'flow', icon: 'repeat', label: 'Loop / Iterate',
    inputType: 'any', outputType: 'any',
    configRules: [recommendedText('iterator', 'Loop should have an iterator expression')],
  },
  parallel: {
    category: 'flow', icon: 'layers', label: 'Parallel',
    inputType: 'any', outputType: 'any',
    configRules: [recommendedPositive('branches', 'Parallel should have at least one branch')],
  },
  compensate: {
    category: 'flow', icon: 'undo', label: 'Compensate',
    inputType: 'any', outputType: 'any',
    configRules: [],
  },

  // Timing
  sleep: {
    category: 'timing', icon: 'timer', label: 'Sleep / Timer',
    inputType: 'any', outputType: 'any',
    configRules: [recommendedPositive('duration_ms', 'Sleep should have a non-zero duration')],
  },
  timeout: {
    category: 'timing', icon: 'alarm', label: 'Timeout',
    inputType: 'any', outputType: 'any',
    configRules: [recommendedPositive('timeout_ms', 'Timeout should have a non-zero duration')],
  },

  // Signal
  'durable-promise': {
    category: 'signal', icon: 'sparkles', label: 'Durable Promise',
    inputType: 'any', outputType: 'payload',
    configRules: [required('promise_name', 'Durable Promise requires a promise name')],
  },
  awakeable: {
    category: 'signal', icon: 'bell', label: 'Awakeable',
    inputType: 'any', outputType: 'payload',
    configRules: [required('awakeable_id', 'Awakeable requires an awakeable ID')],
  },
  'resolve-promise': {
    category: 'signal', icon: 'check-circle', label: 'Resolve Promise',
    inputType: 'payload', outputType: 'unit',
    configRules: [required('promise_name', 'Resolve Promise requires a promise name')],
  },
  'signal-handler': {
    category: 'signal', icon: 'radio', label: 'Signal Handler',
    inputType: 'none', outputType: 'request',
    configRules: [required('signal_name', 'Signal Handler requires a signal name')],
  },
} as const satisfies Record<string, TNodeTypeDefinition>;

export type TBuiltInNodeType = keyof typeof NODE_TYPES;

export const UNKNOWN_NODE_METADATA: Readonly<TNodeMetadata> = {
  category: 'durable',
  icon: 'help-circle',
  label: 'Unknown Node',
};

export function isBuiltInNodeType(nodeType: string): nodeType is TBuiltInNodeType {
  return Object.prototype.hasOwnProperty.call(NODE_TYPES, nodeType);
}

export function getNodeTypeDefinition(nodeType: string): TNodeTypeDefinition | undefined {
  return isBuiltInNodeType(nodeType) ? NODE_TYPES[nodeType] : undefined;
}

/** Palette metadata for a node type; unknown types get the "Unknown Node" entry. */
export function getNodeMetadata(nodeType: string): TNodeMetadata {
  const definition = getNodeTypeDefinition(nodeType);
  if (!definition) {
    return { ...UNKNOWN_NODE_METADATA };
  }
  return { category: definition.category, icon: definition.icon, label: definition.label };
}

export function listNodeTypes(): TBuiltInNodeType[] {
  return Object.keys(NODE_TYPES).filter(isBuiltInNodeType);
}
