/**
 * Friendly error messages for validator diagnostics and refused connections.
 *
 * Maps error codes to short explanations with the node names pulled out of
 * the original message.
 */

import type { ConnectionError, TConnectionErrorCode } from './errors.js';

export interface TFriendlyError {
  /** Short title (3-5 words) */
  title: string;
  /** Contextual explanation with node names from the error */
  explanation: string;
  /** Actionable suggestion for fixing the issue */
  fix: string;
  /** Original error code */
  code: string;
}

interface ValidatorError {
  code: string;
  message: string;
  node?: string;
}

function extractQuoted(message: string): string[] {
  const matches = message.match(/'([^']+)'/g);
  return matches ? matches.map((m) => m.slice(1, -1)) : [];
}

function extractSuggestion(message: string): string | null {
  const match = message.match(/Did you mean "([^"]+)"\?/);
  return match ? match[1] : null;
}

// ── Validator codes ────────────────────────────────────────────────────

type ErrorMapper = (error: ValidatorError) => TFriendlyError;

const errorMappers: Record<string, ErrorMapper> = {
  EMPTY_WORKFLOW(error) {
    return {
      title: 'Empty Workflow',
      explanation: 'The workflow has no nodes, so there is nothing to run.',
      fix: 'Add an entry node such as an HTTP Handler and build the flow from there.',
      code: error.code,
    };
  },

  MISSING_ENTRY_POINT(error) {
    return {
      title: 'No Entry Point',
      explanation: 'Nothing starts this workflow. Every workflow needs at least one handler or trigger node.',
      fix: 'Add an HTTP Handler, Kafka Handler, Cron Trigger, Workflow Submit or Signal Handler node.',
      code: error.code,
    };
  },

  UNREACHABLE_NODE(error) {
    const nodeName = extractQuoted(error.message)[0] || error.node || 'unknown';
    return {
      title: 'Unreachable Node',
      explanation: `Node '${nodeName}' can never run because no path leads to it from an entry point.`,
      fix: `Connect an upstream node to '${nodeName}', or remove it.`,
      code: error.code,
    };
  },

  DISCONNECTED_NODE(error) {
    const nodeName = extractQuoted(error.message)[0] || error.node || 'unknown';
    return {
      title: 'Disconnected Node',
      explanation: `Node '${nodeName}' has no connections at all.`,
      fix: `Wire '${nodeName}' into the flow, or delete it if it is left over.`,
      code: error.code,
    };
  },

  NO_INCOMING_CONNECTION(error) {
    const nodeName = extractQuoted(error.message)[0] || error.node || 'unknown';
    return {
      title: 'No Incoming Connection',
      explanation: `Node '${nodeName}' has outgoing connections but nothing feeds into it.`,
      fix: `Connect an upstream node to '${nodeName}'.`,
      code: error.code,
    };
  },

  UNKNOWN_NODE_TYPE(error) {
    const typeMatch = error.message.match(/Unknown node type: ([^.\s]+)/);
    const nodeType = typeMatch ? typeMatch[1] : 'unknown';
    const suggestion = extractSuggestion(error.message);
    return {
      title: 'Unknown Node Type',
      explanation: `Node type '${nodeType}' is not one of the built-in node types.`,
      fix: suggestion
        ? `Change the node type to '${suggestion}'.`
        : 'Use one of the built-in node types, e.g. run, service-call or sleep.',
      code: error.code,
    };
  },

  MISSING_REQUIRED_CONFIG(error) {
    return {
      title: 'Missing Configuration',
      explanation: error.message,
      fix: 'Open the node settings and fill in the required field.',
      code: error.code,
    };
  },

  RECOMMENDED_CONFIG(error) {
    return {
      title: 'Incomplete Configuration',
      explanation: error.message,
      fix: 'Review the node settings; the default value is unlikely to be what you want.',
      code: error.code,
    };
  },

  DANGLING_CONNECTION(error) {
    return {
      title: 'Dangling Connection',
      explanation: `${error.message}. The document was probably edited by hand.`,
      fix: 'Remove the connection or restore the missing node.',
      code: error.code,
    };
  },

  DUPLICATE_CONNECTION(error) {
    return {
      title: 'Duplicate Connection',
      explanation: 'The same two ports are connected more than once.',
      fix: 'Remove the extra connection.',
      code: error.code,
    };
  },

  SELF_CONNECTION(error) {
    return {
      title: 'Self Connection',
      explanation: 'A node is connected to itself, which would loop forever.',
      fix: 'Remove the connection.',
      code: error.code,
    };
  },

  CYCLE_DETECTED(error) {
    return {
      title: 'Circular Dependency Found',
      explanation: 'The connections form a loop, so the workflow has no start-to-end order.',
      fix: 'Break the cycle by removing one of the connections in the loop.',
      code: error.code,
    };
  },
};

export function getFriendlyError(error: ValidatorError): TFriendlyError | null {
  const mapper = errorMappers[error.code];
  if (!mapper) return null;
  return mapper(error);
}

// ── Connection codes ───────────────────────────────────────────────────

const connectionMappers: Record<TConnectionErrorCode, (error: ConnectionError) => Omit<TFriendlyError, 'code'>> = {
  SELF_CONNECTION: () => ({
    title: 'Self Connection',
    explanation: 'A node cannot feed its own input.',
    fix: 'Drag the connection to a different node.',
  }),
  WOULD_CREATE_CYCLE: () => ({
    title: 'Would Create Loop',
    explanation: 'The target already leads back to the source, so this connection would close a loop.',
    fix: 'Connect to a node further down the flow instead.',
  }),
  DUPLICATE: () => ({
    title: 'Already Connected',
    explanation: 'These two ports are already connected.',
    fix: 'Nothing to do; the existing connection stays.',
  }),
  TYPE_MISMATCH: (error) => ({
    title: 'Type Mismatch',
    explanation: `A ${error.sourceType ?? 'unknown'} output cannot feed a ${error.targetType ?? 'unknown'} input.`,
    fix: 'Insert a Run node between them to reshape the value, or pick a different target.',
  }),
  UNKNOWN_NODE: () => ({
    title: 'Node Not Found',
    explanation: 'One end of the connection refers to a node that is not in the workflow.',
    fix: 'Reload the workflow; the node may have been deleted.',
  }),
};

export function getFriendlyConnectionError(error: ConnectionError): TFriendlyError {
  return { ...connectionMappers[error.code](error), code: error.code };
}

/**
 * Format all validation errors/warnings with friendly messages.
 * Falls back to the original message for unmapped error codes.
 */
export function formatFriendlyDiagnostics(
  errors: Array<{ code: string; message: string; node?: string; type: 'error' | 'warning' }>,
): string {
  if (errors.length === 0) return '';

  const lines: string[] = [];

  for (const error of errors) {
    const friendly = getFriendlyError(error);
    const severity = error.type === 'error' ? 'ERROR' : 'WARNING';

    if (friendly) {
      lines.push(`[${severity}] ${friendly.title}`);
      lines.push(`  ${friendly.explanation}`);
      lines.push(`  How to fix: ${friendly.fix}`);
      lines.push(`  Code: ${friendly.code}`);
    } else {
      lines.push(`[${severity}] ${error.code}`);
      lines.push(`  ${error.message}`);
    }

    lines.push('');
  }

  return lines.join('\n');
}
