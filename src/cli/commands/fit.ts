/**
 * Fit command - sets a workflow's viewport so every node fits a screen size
 */

import * as path from 'path';
import { fitView } from '../../api/manipulation/viewport.js';
import { logger } from '../utils/logger.js';
import { readWorkflowFile, writeWorkflowFile } from '../utils/workflow-file.js';

export const DEFAULT_FIT_PADDING = 50;

export interface FitOptions {
  width: number;
  height: number;
  padding?: number;
  output?: string;
}

export async function fitCommand(input: string, options: FitOptions): Promise<void> {
  const { width, height, padding = DEFAULT_FIT_PADDING, output } = options;
  const workflow = readWorkflowFile(input);

  if (workflow.nodes.length === 0) {
    logger.warn(`${path.basename(input)} has no nodes; viewport left as is`);
    return;
  }

  const fitted = fitView(workflow, width, height, padding);
  const written = writeWorkflowFile(output ?? input, fitted);
  const { x, y, zoom } = fitted.viewport;
  logger.success(`Viewport set to x=${x}, y=${y}, zoom=${zoom} → ${path.basename(written)}`);
}
