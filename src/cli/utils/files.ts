/**
 * Input expansion shared by the CLI commands
 */

import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';

export const WORKFLOW_FILE_PATTERN = '**/*.yxmd';

/**
 * Resolve a CLI input to workflow files, sorted by path.
 * A directory expands to every workflow file beneath it; anything else is
 * treated as a file path or glob pattern.
 */
export async function expandInputFiles(input: string): Promise<string[]> {
  let pattern = input;
  if (fs.existsSync(input) && fs.statSync(input).isDirectory()) {
    pattern = path.join(input, WORKFLOW_FILE_PATTERN);
  }

  // glob patterns use forward slashes, even on Windows
  const matches = await glob(pattern.split(path.sep).join('/'), { absolute: true, nodir: true });
  return matches.sort();
}

/** Deepest directory containing every file */
export function commonDirectory(files: string[]): string {
  if (files.length === 0) return '';
  let common = path.dirname(files[0]).split(path.sep);
  for (const file of files.slice(1)) {
    const parts = path.dirname(file).split(path.sep);
    let i = 0;
    while (i < common.length && i < parts.length && common[i] === parts[i]) i++;
    common = common.slice(0, i);
  }
  return common.join(path.sep) || path.sep;
}

/**
 * `<name>.py` for a workflow file, next to it unless `outputDir` is set.
 * Under `outputDir` the file keeps its path relative to `root`, so inputs
 * with the same name in different directories do not collide.
 */
export function scriptPathFor(file: string, outputDir?: string, root: string = path.dirname(file)): string {
  const name = path.basename(file, path.extname(file));
  if (outputDir === undefined) {
    return path.join(path.dirname(file), `${name}.py`);
  }
  return path.join(outputDir, path.relative(root, path.dirname(file)), `${name}.py`);
}
