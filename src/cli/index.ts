#!/usr/bin/env node
/**
 * yxmd2pandas CLI
 * Command-line interface for converting and inspecting workflow documents
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { Command, Option } from 'commander';
import { convertCommand, type ConvertOptions } from './commands/convert.js';
import { describeCommand, type DescribeOptions } from './commands/describe.js';
import { validateCommand, type ValidateOptions } from './commands/validate.js';
import { logger } from './utils/logger.js';
import { getErrorMessage } from '../utils/error-utils.js';

// Sources run from src/cli, the build from dist/src/cli; walk up to the manifest
function readVersion(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) {
      const manifest: unknown = JSON.parse(fs.readFileSync(candidate, 'utf8'));
      if (typeof manifest === 'object' && manifest !== null && 'version' in manifest) {
        return String(manifest.version);
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) return '0.0.0-dev';
    dir = parent;
  }
}

const parseInteger = (value: string): number => Number.parseInt(value, 10);

const program = new Command();

program
  .name('yxmd2pandas')
  .description('Convert workflow documents (.yxmd) into pandas scripts')
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

// Convert command
program
  .command('convert <input>')
  .description('Convert workflow files (a file, directory or glob) into Python scripts')
  .option('-o, --output <dir>', 'Directory for generated scripts (default: beside each input)')
  .option('--dry-run', 'Print the scripts instead of writing them', false)
  .option('--prefix <name>', 'Variable name prefix')
  .option('--entry <name>', 'Name of the generated entry function')
  .option('--indent <n>', 'Spaces per indentation level', parseInteger)
  .option('--timestamp', 'Write the generation time into the script header')
  .option('-c, --config <path>', 'Config file to use')
  .option('-q, --quiet', 'Only print warnings and errors', false)
  .action(async (input: string, options: ConvertOptions) => {
    try {
      const summary = await convertCommand(input, options);
      if (summary.failed.length > 0) {
        process.exit(1);
      }
    } catch (error) {
      logger.error(`Command failed: ${getErrorMessage(error)}`);
      process.exit(1);
    }
  });

// Describe command
program
  .command('describe <input>')
  .description('Print the tools, connections and execution order of a workflow')
  .addOption(new Option('-f, --format <format>', 'Output format').choices(['text', 'json']).default('text'))
  .option('-n, --node <id>', 'Focus on a specific tool')
  .action(async (input: string, options: DescribeOptions) => {
    try {
      await describeCommand(input, options);
    } catch (error) {
      logger.error(`Command failed: ${getErrorMessage(error)}`);
      process.exit(1);
    }
  });

// Validate command
program
  .command('validate <input>')
  .description('Check workflow files for structural problems')
  .option('--json', 'Output results as JSON', false)
  .option('--strict', 'Treat warnings as errors', false)
  .option('-q, --quiet', 'Suppress warnings', false)
  .action(async (input: string, options: ValidateOptions) => {
    try {
      const summary = await validateCommand(input, options);
      if (!summary.valid) {
        process.exit(1);
      }
    } catch (error) {
      logger.error(`Command failed: ${getErrorMessage(error)}`);
      process.exit(1);
    }
  });

program.parse(process.argv);

// Show help if no command specified
if (!process.argv.slice(2).length) {
  program.outputHelp();
}
