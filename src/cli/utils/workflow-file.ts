import * as fs from 'fs';
import * as path from 'path';
import type { TWorkflow } from '../../ast/types.js';
import { workflowFromJson, workflowToJson } from '../../api/serialize.js';
import { isNodeError, wrapError } from '../../utils/error-utils.js';

/**
 * Read and parse a workflow document.
 *
 * @throws {WorkflowParseError} When the file is not a valid document
 */
export function readWorkflowFile(filePath: string): TWorkflow {
  const resolved = path.resolve(filePath);
  let text: string;
  try {
    text = fs.readFileSync(resolved, 'utf8');
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new Error(`File not found: ${resolved}`);
    }
    throw wrapError(error, `Failed to read ${resolved}`);
  }
  return workflowFromJson(text);
}

export function writeWorkflowFile(filePath: string, workflow: TWorkflow): string {
  const resolved = path.resolve(filePath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, `${workflowToJson(workflow)}\n`, 'utf8');
  return resolved;
}
