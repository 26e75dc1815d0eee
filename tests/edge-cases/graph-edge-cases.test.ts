/**
 * Graphs that are not clean pipelines: dangling connections, cycles,
 * duplicates and empty documents.
 */

import { generateScript } from '../../src/api/generate.js';
import { parseWorkflowDocument } from '../../src/api/parse.js';
import type { TWorkflowAST } from '../../src/ast/types.js';
import { filterTool, inputTool, outputTool, workflowXml, type TestDocument } from '../helpers/workflow-documents.js';

function parse(doc: TestDocument): TWorkflowAST {
  const result = parseWorkflowDocument(workflowXml(doc));
  if (!result.ok) throw new Error(result.errors[0].message);
  return result.workflow;
}

describe('dangling connections', () => {
  const workflow = parse({
    tools: [inputTool('1', 'a.csv'), filterTool('2', '[A] &gt; 1')],
    connections: [
      { from: '99', to: '2' },
      { from: '1', to: '2' },
      { from: '2', to: '42' },
    ],
  });

  it('keeps them in the workflow', () => {
    expect(workflow.connections).toHaveLength(3);
  });

  it('ignores them for ordering and sources', () => {
    const result = generateScript(workflow);
    expect(result.order.order).toEqual(['1', '2']);
    expect(result.code).toContain("    df_2 = df_1[df_1['A'] > 1]\n");
    expect(result.bindings).toEqual([
      ['1', 'df_1'],
      ['2', 'df_2'],
    ]);
  });
});

describe('cycles', () => {
  const workflow = parse({
    tools: [inputTool('1', 'a.csv'), filterTool('2', '[A] &gt; 1'), filterTool('3', '[B] &gt; 2'), outputTool('4', 'b.csv')],
    connections: [
      { from: '1', to: '2' },
      { from: '2', to: '3' },
      { from: '3', to: '2' },
      { from: '3', to: '4' },
    ],
  });

  it('emits the schedulable nodes and a warning comment', () => {
    const result = generateScript(workflow);
    expect(result.order).toEqual({ order: ['1'], unscheduled: ['2', '3', '4'], complete: false });
    expect(result.warnings).toEqual(['Execution order is incomplete; a cycle blocks nodes: 2, 3, 4']);

    const lines = result.code.split('\n');
    expect(lines.slice(3, 7)).toEqual([
      '"""',
      '',
      '# WARNING: cyclic dependencies, nodes not emitted: 2, 3, 4',
      '',
    ]);
    expect(result.code).toContain('    # Tool 1 (Type: input_data, ID: 1)\n');
    expect(result.code).not.toContain('ID: 2)');
  });

  it('still produces a runnable entry point', () => {
    expect(generateScript(workflow).code.endsWith("    return True\n\n\nif __name__ == '__main__':\n    main()\n")).toBe(
      true
    );
  });
});

describe('duplicate connections', () => {
  it('passes through a source connected twice', () => {
    const workflow = parse({
      tools: [inputTool('1', 'a.csv'), { id: '2' }],
      connections: [
        { from: '1', to: '2' },
        { from: '1', to: '2' },
      ],
    });
    const result = generateScript(workflow);
    expect(result.order.order).toEqual(['1', '2']);
    expect(result.code).toContain('    df_2 = df_1.copy()\n');
  });
});

describe('empty documents', () => {
  it('generates a script with an empty body', () => {
    const result = generateScript(parse({ tools: [] }));
    expect(result.code).toBe(
      [
        '"""',
        'Auto-generated pandas script from workflow document',
        'Workflow version: Unknown',
        '"""',
        '',
        '',
        'def main():',
        '    """Main workflow execution function"""',
        '',
        '    return True',
        '',
        '',
        "if __name__ == '__main__':",
        '    main()',
        '',
      ].join('\n')
    );
  });
});

describe('tools without inputs', () => {
  it('emits placeholders for tools that need a source', () => {
    const result = generateScript(parse({ tools: [filterTool('5', '[A] &gt; 1'), outputTool('6', 'b.csv')] }));
    expect(result.code).toContain('    # Filter tool: No source data\n');
    expect(result.code).toContain('    # Output tool: No source data\n');
    expect(result.manualNodes).toEqual(['5', '6']);
  });
});
