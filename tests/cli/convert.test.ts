/**
 * Tests for the convert command
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { convertCommand } from '../../src/cli/commands/convert.js';
import { commonDirectory } from '../../src/cli/utils/files.js';
import { SIMPLE_PIPELINE_SCRIPT, WORKFLOW_FIXTURES_DIR, workflowFixture } from '../helpers/fixtures.js';

const TEMP_DIR = path.join(os.tmpdir(), `yxmd2pandas-convert-${process.pid}`);

beforeAll(() => fs.mkdirSync(TEMP_DIR, { recursive: true }));
afterAll(() => fs.rmSync(TEMP_DIR, { recursive: true, force: true }));

let logSpy: MockInstance<typeof console.log>;

beforeEach(() => {
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('convertCommand', () => {
  it('writes a script into the output directory', async () => {
    const outDir = path.join(TEMP_DIR, 'single');
    const summary = await convertCommand(workflowFixture('simple-pipeline.yxmd'), {
      output: outDir,
      quiet: true,
      cwd: TEMP_DIR,
    });

    const written = path.join(outDir, 'simple-pipeline.py');
    expect(summary).toEqual({
      converted: [{ input: workflowFixture('simple-pipeline.yxmd'), output: written, nodes: 4, warnings: [] }],
      failed: [],
    });
    expect(fs.readFileSync(written, 'utf8')).toBe(SIMPLE_PIPELINE_SCRIPT);
  });

  it('writes beside the input by default', async () => {
    const dir = path.join(TEMP_DIR, 'beside');
    fs.mkdirSync(dir, { recursive: true });
    const input = path.join(dir, 'flow.yxmd');
    fs.copyFileSync(workflowFixture('simple-pipeline.yxmd'), input);

    const summary = await convertCommand(input, { quiet: true, cwd: TEMP_DIR });
    expect(summary.converted[0].output).toBe(path.join(dir, 'flow.py'));
    expect(fs.existsSync(path.join(dir, 'flow.py'))).toBe(true);
  });

  it('converts every workflow in a directory and reports failures', async () => {
    const outDir = path.join(TEMP_DIR, 'all');
    const summary = await convertCommand(WORKFLOW_FIXTURES_DIR, { output: outDir, quiet: true, cwd: TEMP_DIR });

    expect(summary.converted.map((c) => path.basename(c.input))).toEqual([
      'cycle.yxmd',
      'join.yxmd',
      'simple-pipeline.yxmd',
    ]);
    expect(summary.failed.map((f) => path.basename(f.input))).toEqual(['malformed.yxmd']);
    expect(summary.converted[0].warnings).toEqual(['Execution order is incomplete; a cycle blocks nodes: 2, 3']);
    expect(fs.readdirSync(outDir).sort()).toEqual(['cycle.py', 'join.py', 'simple-pipeline.py']);
  });

  it('keeps same-named inputs apart under the output directory', async () => {
    const inputRoot = path.join(TEMP_DIR, 'nested', 'in');
    const outDir = path.join(TEMP_DIR, 'nested', 'out');
    for (const dir of ['a', 'b']) {
      fs.mkdirSync(path.join(inputRoot, dir), { recursive: true });
      fs.copyFileSync(workflowFixture('simple-pipeline.yxmd'), path.join(inputRoot, dir, 'flow.yxmd'));
    }

    const summary = await convertCommand(inputRoot, { output: outDir, quiet: true, cwd: TEMP_DIR });

    expect(summary.converted.map((c) => c.output)).toEqual([
      path.join(outDir, 'a', 'flow.py'),
      path.join(outDir, 'b', 'flow.py'),
    ]);
    expect(fs.readFileSync(path.join(outDir, 'a', 'flow.py'), 'utf8')).toBe(SIMPLE_PIPELINE_SCRIPT);
    expect(fs.readFileSync(path.join(outDir, 'b', 'flow.py'), 'utf8')).toBe(SIMPLE_PIPELINE_SCRIPT);
  });

  it('prints instead of writing on a dry run', async () => {
    const outDir = path.join(TEMP_DIR, 'dry');
    const summary = await convertCommand(workflowFixture('simple-pipeline.yxmd'), {
      output: outDir,
      dryRun: true,
      quiet: true,
      cwd: TEMP_DIR,
    });

    expect(summary.converted[0].output).toBeNull();
    expect(fs.existsSync(outDir)).toBe(false);
    expect(logSpy).toHaveBeenCalledWith(SIMPLE_PIPELINE_SCRIPT);
  });

  it('applies naming options', async () => {
    const outDir = path.join(TEMP_DIR, 'named');
    await convertCommand(workflowFixture('simple-pipeline.yxmd'), {
      output: outDir,
      prefix: 'tbl',
      entry: 'run',
      indent: 2,
      quiet: true,
      cwd: TEMP_DIR,
    });
    const code = fs.readFileSync(path.join(outDir, 'simple-pipeline.py'), 'utf8');
    expect(code).toContain("\n  tbl_1 = pd.read_csv('sales.csv')\n");
    expect(code.endsWith("if __name__ == '__main__':\n  run()\n")).toBe(true);
  });

  it('rejects invalid options before reading files', async () => {
    await expect(
      convertCommand(workflowFixture('simple-pipeline.yxmd'), { prefix: 'not valid', quiet: true, cwd: TEMP_DIR })
    ).rejects.toThrow('Invalid configuration in command line');
  });

  it('fails when nothing matches', async () => {
    const pattern = path.join(TEMP_DIR, 'nothing-here', '*.yxmd');
    await expect(convertCommand(pattern, { quiet: true, cwd: TEMP_DIR })).rejects.toThrow(
      `No files found matching pattern: ${pattern}`
    );
  });
});

describe('commonDirectory', () => {
  it('finds the deepest shared directory', () => {
    const root = path.join(TEMP_DIR, 'x');
    expect(
      commonDirectory([path.join(root, 'a', 'one.yxmd'), path.join(root, 'a', 'b', 'two.yxmd'), path.join(root, 'c.yxmd')])
    ).toBe(root);
    expect(commonDirectory([path.join(root, 'a', 'one.yxmd')])).toBe(path.join(root, 'a'));
  });
});
