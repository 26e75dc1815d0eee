/**
 * Tests for the validate command
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { validateCommand } from '../../src/cli/commands/validate.js';
import { workflowFixture } from '../helpers/fixtures.js';
import { inputTool, workflowXml } from '../helpers/workflow-documents.js';

const TEMP_DIR = path.join(os.tmpdir(), `yxmd2pandas-validate-${process.pid}`);
const UNUSED_TOOL_FILE = path.join(TEMP_DIR, 'unused.yxmd');

beforeAll(() => {
  fs.mkdirSync(TEMP_DIR, { recursive: true });
  fs.writeFileSync(UNUSED_TOOL_FILE, workflowXml({ tools: [inputTool('1', 'a.csv'), inputTool('2', 'b.csv')] }));
});
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

describe('validateCommand', () => {
  it('passes a clean workflow', async () => {
    const summary = await validateCommand(workflowFixture('simple-pipeline.yxmd'));
    expect(summary).toMatchObject({ valid: true, totalFiles: 1, totalErrors: 0, totalWarnings: 0 });
  });

  it('fails a cyclic workflow', async () => {
    const summary = await validateCommand(workflowFixture('cycle.yxmd'));
    expect(summary.valid).toBe(false);
    expect(summary.totalErrors).toBe(1);
    expect(summary.results[0].errors).toEqual([
      {
        message: 'Circular dependency detected in workflow. Nodes that cannot be scheduled: 2, 3',
        severity: 'error',
        code: 'CYCLIC_GRAPH',
      },
    ]);
  });

  it('reports a malformed document as a failure', async () => {
    const summary = await validateCommand(workflowFixture('malformed.yxmd'));
    expect(summary.valid).toBe(false);
    expect(summary.results[0].errors.map((e) => e.code)).toEqual(['DOCUMENT_MALFORMED']);
  });

  it('only fails on warnings in strict mode', async () => {
    const lenient = await validateCommand(UNUSED_TOOL_FILE);
    expect(lenient.valid).toBe(true);
    expect(lenient.totalWarnings).toBe(2);

    const strict = await validateCommand(UNUSED_TOOL_FILE, { strict: true });
    expect(strict.valid).toBe(false);
    expect(strict.results[0].warnings.map((w) => [w.code, w.nodeId])).toEqual([
      ['UNUSED_NODE', '1'],
      ['UNUSED_NODE', '2'],
    ]);
  });

  it('prints a JSON summary', async () => {
    await validateCommand(workflowFixture('cycle.yxmd'), { json: true });

    expect(logSpy).toHaveBeenCalledTimes(1);
    const printed: unknown = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(printed).toMatchObject({ valid: false, totalFiles: 1, totalErrors: 1, totalWarnings: 0 });
  });

  it('fails when nothing matches', async () => {
    await expect(validateCommand(path.join(TEMP_DIR, 'missing.yxmd'))).rejects.toThrow(
      'No files found matching pattern'
    );
  });
});
