/* eslint-disable no-console */
/**
 * Validate command - runs the structural checks over workflow files
 */

import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import type { TValidationError } from '../../ast/types.js';
import { validator } from '../../validator.js';
import { getFriendlyError } from '../../friendly-errors.js';
import { logger } from '../utils/logger.js';
import { readWorkflowFile } from '../utils/workflow-file.js';
import { getErrorMessage } from '../../utils/error-utils.js';

export interface ValidateOptions {
  json?: boolean;
}

export interface JsonValidationItem {
  message: string;
  severity: 'error' | 'warning';
  nodeId?: string;
  code?: string;
}

export interface JsonValidationResult {
  file: string;
  valid: boolean;
  errors: JsonValidationItem[];
  warnings: JsonValidationItem[];
}

function toJsonItem(item: TValidationError): JsonValidationItem {
  return {
    message: item.message,
    severity: item.type,
    ...(item.node !== undefined ? { nodeId: item.node } : {}),
    code: item.code,
  };
}

/**
 * A directory expands to every `.json` file below it; anything else is
 * treated as a glob pattern (a plain file path matches itself).
 */
export async function resolveWorkflowFiles(input: string): Promise<string[]> {
  let pattern = input;
  if (fs.existsSync(input) && fs.statSync(input).isDirectory()) {
    pattern = path.join(input, '**/*.json');
  }
  const files = await glob(pattern, { absolute: true, nodir: true });
  return files.sort();
}

/**
 * Validate one file. Unreadable or malformed documents become a single
 * PARSE_ERROR entry.
 */
export function validateFile(file: string): JsonValidationResult {
  try {
    const result = validator.validate(readWorkflowFile(file));
    return {
      file,
      valid: result.valid,
      errors: result.errors.map(toJsonItem),
      warnings: result.warnings.map(toJsonItem),
    };
  } catch (error: unknown) {
    return {
      file,
      valid: false,
      errors: [{ message: getErrorMessage(error), severity: 'error', code: 'PARSE_ERROR' }],
      warnings: [],
    };
  }
}

function printResult(result: JsonValidationResult): void {
  const fileName = path.basename(result.file);

  for (const warning of result.warnings) {
    logger.warn(`  ${warning.message}`);
  }

  if (result.errors.length === 0) {
    logger.success(`${fileName} is valid`);
    return;
  }

  logger.error(`Validation errors in ${fileName}:`);
  for (const err of result.errors) {
    const friendly = err.code ? getFriendlyError({ code: err.code, message: err.message }) : null;
    if (friendly) {
      logger.error(`  ${friendly.title}: ${friendly.explanation}`);
      logger.info(`    How to fix: ${friendly.fix}`);
    } else {
      logger.error(`  - ${err.message}`);
    }
  }
}

/**
 * @throws {Error} When no file matches or any file has errors
 */
export async function validateCommand(input: string, options: ValidateOptions = {}): Promise<JsonValidationResult[]> {
  const { json = false } = options;

  const files = await resolveWorkflowFiles(input);
  if (files.length === 0) {
    throw new Error(`No files found matching pattern: ${input}`);
  }

  if (!json) {
    logger.section('Validating Workflows');
    logger.info(`Found ${files.length} file(s)`);
    logger.newline();
  }

  const results: JsonValidationResult[] = [];
  for (let i = 0; i < files.length; i++) {
    const result = validateFile(files[i]);
    results.push(result);
    if (!json) {
      logger.progress(i + 1, files.length, path.basename(files[i]));
      printResult(result);
    }
  }

  const totalErrors = results.reduce((sum, r) => sum + r.errors.length, 0);
  const totalWarnings = results.reduce((sum, r) => sum + r.warnings.length, 0);

  if (json) {
    console.log(JSON.stringify(results, null, 2));
  } else {
    logger.newline();
    logger.info(`${totalErrors} error(s), ${totalWarnings} warning(s)`);
  }

  if (totalErrors > 0) {
    const failed = results.filter((r) => !r.valid).length;
    throw new Error(`Validation failed: ${totalErrors} error(s) in ${failed} file(s)`);
  }

  return results;
}
