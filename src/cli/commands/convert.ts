/**
 * Convert command - turns workflow documents into pandas scripts
 */

import * as fs from 'fs';
import * as path from 'path';
import { parseWorkflowDocument } from '../../api/parse.js';
import { generateScript } from '../../api/generate.js';
import { loadConfig, toGenerateOptions } from '../../config/loader.js';
import { getFriendlyError } from '../../friendly-errors.js';
import { getErrorMessage, wrapError } from '../../utils/error-utils.js';
import { commonDirectory, expandInputFiles, scriptPathFor } from '../utils/files.js';
import { logger } from '../utils/logger.js';

export interface ConvertOptions {
  /** Directory for generated scripts; defaults to beside each input */
  output?: string;
  /** Print scripts instead of writing them */
  dryRun?: boolean;
  prefix?: string;
  entry?: string;
  indent?: number;
  timestamp?: boolean;
  /** Explicit config file */
  config?: string;
  quiet?: boolean;
  /** Directory searched for a config file @default process.cwd() */
  cwd?: string;
}

export interface ConvertedFile {
  input: string;
  /** Written script, null on a dry run */
  output: string | null;
  nodes: number;
  warnings: string[];
}

export interface ConvertSummary {
  converted: ConvertedFile[];
  failed: Array<{ input: string; error: string }>;
}

export async function convertCommand(input: string, options: ConvertOptions = {}): Promise<ConvertSummary> {
  const { output, dryRun = false, quiet = false } = options;
  logger.setQuiet(quiet);

  const config = await loadConfig(
    { prefix: options.prefix, entry: options.entry, indent: options.indent, timestamp: options.timestamp },
    { configPath: options.config, cwd: options.cwd }
  );
  const generateOptions = toGenerateOptions(config);

  const files = await expandInputFiles(input);
  if (files.length === 0) {
    throw new Error(`No files found matching pattern: ${input}`);
  }

  const root = commonDirectory(files);

  logger.section('Converting Workflows');
  logger.info(`Found ${files.length} file(s)`);
  logger.newline();

  const summary: ConvertSummary = { converted: [], failed: [] };

  for (let i = 0; i < files.length; i++) {
    const file = files[i];
    const fileName = path.basename(file);
    logger.progress(i + 1, files.length, fileName);

    try {
      const raw = await fs.promises.readFile(file);
      const parsed = parseWorkflowDocument(raw);

      if (!parsed.ok) {
        const [first] = parsed.errors;
        const friendly = getFriendlyError(first);
        logger.error(`  ${fileName}: ${friendly ? friendly.title : first.code}`);
        logger.error(`    ${first.message}`);
        summary.failed.push({ input: file, error: first.message });
        continue;
      }

      const result = generateScript(parsed.workflow, generateOptions);
      const warnings = [...parsed.warnings.map((w) => w.message), ...result.warnings];
      warnings.forEach((w) => logger.warn(`  ${w}`));
      if (result.manualNodes.length > 0) {
        logger.info(`  Needs manual completion: ${result.manualNodes.join(', ')}`);
      }

      let written: string | null = null;
      if (dryRun) {
        logger.log(result.code);
      } else {
        written = scriptPathFor(file, output, root);
        try {
          await fs.promises.mkdir(path.dirname(written), { recursive: true });
          await fs.promises.writeFile(written, result.code, 'utf8');
        } catch (error) {
          throw wrapError(error, `Cannot write ${written}`);
        }
        logger.success(`  ${fileName} → ${path.relative(process.cwd(), written) || written}`);
      }

      summary.converted.push({
        input: file,
        output: written,
        nodes: parsed.workflow.nodes.length,
        warnings,
      });
    } catch (error) {
      logger.error(`  Failed to convert ${fileName}: ${getErrorMessage(error)}`);
      summary.failed.push({ input: file, error: getErrorMessage(error) });
    }
  }

  logger.newline();
  if (summary.failed.length === 0) {
    logger.success(`Converted ${summary.converted.length} file(s)`);
  } else {
    logger.error(`${summary.failed.length} of ${files.length} file(s) failed to convert`);
  }

  return summary;
}
