/* eslint-disable no-console */
/**
 * Validate command - checks workflow documents without converting them
 */

import * as fs from 'fs';
import * as path from 'path';
import type { TValidationError } from '../../ast/types.js';
import { parseWorkflowDocument } from '../../api/parse.js';
import { validator } from '../../validator.js';
import { getFriendlyError } from '../../friendly-errors.js';
import { getErrorMessage } from '../../utils/error-utils.js';
import { expandInputFiles } from '../utils/files.js';
import { logger } from '../utils/logger.js';

export interface ValidateOptions {
  quiet?: boolean;
  json?: boolean;
  /** Treat warnings as failures */
  strict?: boolean;
}

interface JsonValidationItem {
  message: string;
  severity: 'error' | 'warning';
  nodeId?: string;
  code: string;
}

interface JsonValidationResult {
  file: string;
  valid: boolean;
  errors: JsonValidationItem[];
  warnings: JsonValidationItem[];
}

export interface ValidateSummary {
  valid: boolean;
  totalFiles: number;
  totalErrors: number;
  totalWarnings: number;
  results: JsonValidationResult[];
}

function toJsonItem(item: { type: 'error' | 'warning'; code: string; message: string; node?: string }): JsonValidationItem {
  const json: JsonValidationItem = { message: item.message, severity: item.type, code: item.code };
  if (item.node) json.nodeId = item.node;
  return json;
}

function report(items: TValidationError[], print: (message: string) => void): void {
  items.forEach((item) => {
    const friendly = getFriendlyError(item);
    if (friendly) {
      print(`  ${friendly.title}: ${friendly.explanation}`);
      logger.info(`    How to fix: ${friendly.fix}`);
    } else {
      print(`  - ${item.message}${item.node ? ` (node: ${item.node})` : ''}`);
    }
  });
}

export async function validateCommand(input: string, options: ValidateOptions = {}): Promise<ValidateSummary> {
  const { quiet = false, json = false, strict = false } = options;
  logger.setQuiet(quiet || json);

  const files = await expandInputFiles(input);
  if (files.length === 0) {
    throw new Error(`No files found matching pattern: ${input}`);
  }

  logger.section('Validating Workflows');
  logger.info(`Found ${files.length} file(s)`);
  logger.newline();

  let totalErrors = 0;
  let totalWarnings = 0;
  const results: JsonValidationResult[] = [];

  for (let i = 0; i < files.length; i++) {
    const file = files[i];
    const fileName = path.basename(file);
    logger.progress(i + 1, files.length, fileName);

    try {
      const parsed = parseWorkflowDocument(await fs.promises.readFile(file));

      if (!parsed.ok) {
        const errors = parsed.errors.map((e) => toJsonItem({ ...e, type: 'error' }));
        results.push({ file, valid: false, errors, warnings: [] });
        if (!json) {
          logger.error(`Parse errors in ${fileName}:`);
          parsed.errors.forEach((e) => logger.error(`  ${e.message}`));
        }
        totalErrors += errors.length;
        continue;
      }

      const validation = validator.validate(parsed.workflow, { strictMode: strict });
      const warnings = [...parsed.warnings, ...validation.warnings];

      results.push({
        file,
        valid: validation.valid && (!strict || parsed.warnings.length === 0),
        errors: validation.errors.map(toJsonItem),
        warnings: warnings.map(toJsonItem),
      });

      if (!json && validation.errors.length > 0) {
        logger.error(`Validation errors in ${fileName}:`);
        report(validation.errors, (m) => logger.error(m));
      }
      if (!json && !quiet && warnings.length > 0) {
        logger.warn(`Warnings in ${fileName}:`);
        report(warnings, (m) => logger.warn(m));
      }

      totalErrors += validation.errors.length;
      totalWarnings += warnings.length;
    } catch (error) {
      results.push({
        file,
        valid: false,
        errors: [{ message: getErrorMessage(error), severity: 'error', code: 'READ_FAILED' }],
        warnings: [],
      });
      if (!json) {
        logger.error(`Failed to validate ${fileName}: ${getErrorMessage(error)}`);
      }
      totalErrors++;
    }
  }

  const summary: ValidateSummary = {
    valid: results.every((r) => r.valid),
    totalFiles: files.length,
    totalErrors,
    totalWarnings,
    results,
  };

  if (json) {
    console.log(JSON.stringify(summary, null, 2));
  } else {
    logger.newline();
    if (summary.valid) {
      logger.success(`${files.length} file(s) valid${totalWarnings > 0 ? ` with ${totalWarnings} warning(s)` : ''}`);
    } else {
      logger.error(`Found ${totalErrors} error(s) and ${totalWarnings} warning(s)`);
    }
  }

  return summary;
}
