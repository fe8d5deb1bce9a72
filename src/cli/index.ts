#!/usr/bin/env node
/**
 * durable-canvas CLI
 * Lays out, validates and inspects workflow documents on disk
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { Command, InvalidArgumentError, Option } from 'commander';
import { describeCommand, DESCRIBE_FORMATS, type TDescribeFormat } from './commands/describe.js';
import { fitCommand } from './commands/fit.js';
import { layoutCommand } from './commands/layout.js';
import { validateCommand } from './commands/validate.js';
import { logger } from './utils/logger.js';
import { getErrorMessage } from '../utils/error-utils.js';

function readVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(
      fs.readFileSync(fileURLToPath(new URL('../../package.json', import.meta.url)), 'utf8'),
    );
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version);
    }
  } catch (error: unknown) {
    logger.debug(`Could not read package version: ${getErrorMessage(error)}`);
  }
  return '0.0.0-dev';
}

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
}

function parseNonNegativeNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a number >= 0.');
  }
  return parsed;
}

async function run(action: () => Promise<unknown>): Promise<void> {
  try {
    await action();
  } catch (error: unknown) {
    logger.error(`Command failed: ${getErrorMessage(error)}`);
    process.exit(1);
  }
}

const program = new Command();

program
  .name('durable-canvas')
  .description('Lay out, validate and inspect durable workflow documents')
  .version(readVersion(), '-v, --version', 'Output the current version');

program.configureOutput({
  writeErr: (str) => {
    const trimmed = str.replace(/^error:\s*/i, '').trimEnd();
    if (trimmed) {
      logger.error(trimmed);
    }
  },
  writeOut: (str) => process.stdout.write(str),
});

program
  .command('layout <file>')
  .description('Arrange nodes in layers from the entry points down')
  .option('-o, --output <path>', 'Write to this file instead of overwriting the input')
  .option('--layer-spacing <n>', 'Vertical gap between layers', parseNonNegativeNumber)
  .option('--node-spacing <n>', 'Horizontal gap between nodes in a layer', parseNonNegativeNumber)
  .action(async (file: string, options: { output?: string; layerSpacing?: number; nodeSpacing?: number }) => {
    await run(() => layoutCommand(file, options));
  });

program
  .command('validate <input>')
  .description('Check workflow files (a file, directory or glob) for structural problems')
  .option('--json', 'Output results as JSON', false)
  .action(async (input: string, options: { json: boolean }) => {
    await run(() => validateCommand(input, options));
  });

program
  .command('fit <file>')
  .description('Set the viewport so every node fits a screen of the given size')
  .requiredOption('--width <n>', 'Screen width', parsePositiveNumber)
  .requiredOption('--height <n>', 'Screen height', parsePositiveNumber)
  .option('--padding <n>', 'Padding around the nodes', parseNonNegativeNumber)
  .option('-o, --output <path>', 'Write to this file instead of overwriting the input')
  .action(async (file: string, options: { width: number; height: number; padding?: number; output?: string }) => {
    await run(() => fitCommand(file, options));
  });

program
  .command('describe <file>')
  .description('Print nodes by layer, connections and validation results')
  .addOption(new Option('-f, --format <format>', 'Output format').choices(DESCRIBE_FORMATS).default('text'))
  .action(async (file: string, options: { format: TDescribeFormat }) => {
    await run(() => describeCommand(file, options));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(getErrorMessage(error));
  process.exit(1);
});
