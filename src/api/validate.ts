import type { TWorkflow } from '../ast/types.js';
import { validator, type TWorkflowValidationResult } from '../validator.js';

export type { TWorkflowValidationResult } from '../validator.js';

/**
 * Run the structural checks over a workflow.
 */
export function validateWorkflow(workflow: TWorkflow): TWorkflowValidationResult {
  return validator.validate(workflow);
}
