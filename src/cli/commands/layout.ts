/**
 * Layout command - rearranges a workflow file with the layered DAG layout
 */

import * as path from 'path';
import { applyLayout } from '../../diagram/layout.js';
import { logger } from '../utils/logger.js';
import { readWorkflowFile, writeWorkflowFile } from '../utils/workflow-file.js';

export interface LayoutOptions {
  /** Write here instead of overwriting the input */
  output?: string;
  layerSpacing?: number;
  nodeSpacing?: number;
}

export async function layoutCommand(input: string, options: LayoutOptions = {}): Promise<void> {
  const { output, layerSpacing, nodeSpacing } = options;
  const workflow = readWorkflowFile(input);

  const { workflow: laidOut, result } = applyLayout(workflow, { layerSpacing, nodeSpacing });

  if (result.status === 'skipped') {
    if (result.reason === 'cyclic-graph') {
      throw new Error(`Cannot lay out ${path.basename(input)}: the connections contain a cycle`);
    }
    logger.warn(`${path.basename(input)} has no nodes; nothing to lay out`);
    return;
  }

  const written = writeWorkflowFile(output ?? input, laidOut);
  logger.success(
    `Laid out ${laidOut.nodes.length} node(s) in ${result.layers.length} layer(s) → ${path.basename(written)}`,
  );
}
