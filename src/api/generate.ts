import type { TExecutionOrder, TNodeAST, TWorkflowAST } from '../ast/types.js';
import type { TPythonImport } from '../constants.js';
import { determineExecutionOrder } from '../generator/control-flow.js';
import { configString, VariableBindings } from '../generator/code-utils.js';
import { commentText, type EmitContext, type TEmitSettings } from '../generator/fragment.js';
import { emitNode } from '../generator/registry.js';
import { ConversionError } from '../utils/error-utils.js';

export interface GenerateOptions {
  /**
   * Prefix of every node variable: `<prefix>_<nodeId>`
   * @default 'df'
   */
  variablePrefix?: string;
  /**
   * Name of the generated entry-point function
   * @default 'main'
   */
  entryFunction?: string;
  /**
   * Spaces per indentation level
   * @default 4
   */
  indent?: number;
  /**
   * `random_state` passed to sample tools
   * @default 42
   */
  sampleSeed?: number;
  /**
   * Rows printed by browse tools
   * @default 10
   */
  previewRows?: number;
  /**
   * Generation time written into the header. Omitted when not given, which
   * keeps the output identical across runs.
   */
  timestamp?: Date;
}

export const DEFAULT_GENERATE_OPTIONS = {
  variablePrefix: 'df',
  entryFunction: 'main',
  indent: 4,
  sampleSeed: 42,
  previewRows: 10,
} as const;

export interface GenerateResult {
  code: string;
  order: TExecutionOrder;
  /** `[nodeId, variable]` pairs in first-reference order */
  bindings: Array<[string, string]>;
  /** Files read by input tools, in emission order */
  inputFiles: string[];
  /** Files written by output tools, in emission order */
  outputFiles: string[];
  /** Nodes whose statements contain placeholders */
  manualNodes: string[];
  warnings: string[];
}

const PYTHON_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const BANNER_RULE = '-'.repeat(60);

/**
 * Generate a pandas script from a workflow
 *
 * Nodes are emitted in execution order. Nodes a cycle keeps out of the order
 * are not emitted; the script starts with a WARNING comment naming them.
 *
 * @throws {ConversionError} If the prefix or entry function is not a valid identifier
 *
 * @example
 * ```typescript
 * const result = generateScript(workflow, { entryFunction: 'run' });
 * fs.writeFileSync('workflow.py', result.code);
 * ```
 */
export function generateScript(ast: TWorkflowAST, options: GenerateOptions = {}): GenerateResult {
  const prefix = options.variablePrefix ?? DEFAULT_GENERATE_OPTIONS.variablePrefix;
  const entry = options.entryFunction ?? DEFAULT_GENERATE_OPTIONS.entryFunction;
  assertIdentifier('variable prefix', prefix);
  assertIdentifier('entry function', entry);

  const settings: TEmitSettings = {
    indent: ' '.repeat(options.indent ?? DEFAULT_GENERATE_OPTIONS.indent),
    sampleSeed: options.sampleSeed ?? DEFAULT_GENERATE_OPTIONS.sampleSeed,
    previewRows: options.previewRows ?? DEFAULT_GENERATE_OPTIONS.previewRows,
  };
  const ind = settings.indent;

  const order = determineExecutionOrder(ast);
  const bindings = new VariableBindings(prefix);
  const nodesById = new Map(ast.nodes.map((n) => [n.id, n]));
  const sourcesByNode = indexSources(ast, nodesById);
  const imports = new Set<TPythonImport>();
  const inputFiles: string[] = [];
  const outputFiles: string[] = [];
  const manualNodes: string[] = [];
  const warnings: string[] = [];
  const body: string[] = [];

  for (const nodeId of order.order) {
    const node = nodesById.get(nodeId);
    if (!node) continue;

    const fragment = emitNode(createEmitContext(node, sourcesByNode.get(nodeId) ?? [], bindings, settings));
    fragment.imports.forEach((i) => imports.add(i));
    if (fragment.reads !== undefined) inputFiles.push(fragment.reads);
    if (fragment.writes !== undefined) outputFiles.push(fragment.writes);
    if (fragment.needsManualCompletion) manualNodes.push(nodeId);

    const label = commentText(node.annotation ?? `Tool ${node.id}`);
    body.push(
      `${ind}# ${BANNER_RULE}`,
      `${ind}# ${label} (Type: ${commentText(node.toolType)}, ID: ${commentText(node.id)})`,
      `${ind}# ${BANNER_RULE}`,
      ...fragment.lines.map((line) => ind + line),
      ''
    );
  }

  const lines = generateHeader(ast, options.timestamp);
  if (!order.complete) {
    const unscheduled = order.unscheduled.join(', ');
    warnings.push(`Execution order is incomplete; a cycle blocks nodes: ${unscheduled}`);
    lines.push('', `# WARNING: cyclic dependencies, nodes not emitted: ${commentText(unscheduled)}`);
  }
  if (imports.size > 0) {
    lines.push('', ...[...imports].sort().map((i) => `import ${i}`));
  }
  lines.push(
    '',
    '',
    `def ${entry}():`,
    `${ind}"""Main workflow execution function"""`,
    '',
    ...body,
    `${ind}return True`,
    '',
    '',
    "if __name__ == '__main__':",
    `${ind}${entry}()`,
    ''
  );

  return {
    code: lines.join('\n'),
    order,
    bindings: bindings.toEntries(),
    inputFiles,
    outputFiles,
    manualNodes,
    warnings,
  };
}

function assertIdentifier(label: string, value: string): void {
  if (!PYTHON_IDENTIFIER.test(value)) {
    throw new ConversionError('GENERATION_FAILED', `Invalid ${label} "${value}"`);
  }
}

function generateHeader(ast: TWorkflowAST, timestamp: Date | undefined): string[] {
  const { version, author, description } = ast.metadata;
  const lines = [
    '"""',
    'Auto-generated pandas script from workflow document',
    `Workflow version: ${docText(version)}`,
  ];
  if (author) lines.push(`Author: ${docText(author)}`);
  if (description) lines.push(`Description: ${docText(description)}`);
  if (timestamp) {
    lines.push(`Generated: ${timestamp.toISOString().slice(0, 19).replace('T', ' ')} UTC`);
  }
  lines.push('"""');
  return lines;
}

/** Text safe inside a triple-quoted docstring */
function docText(value: string): string {
  return commentText(value).replace(/\\/g, '\\\\').replace(/"""/g, '\\"\\"\\"');
}

/**
 * Source ids of each node, in connection-list order. Connections from unknown
 * nodes are left out.
 */
function indexSources(ast: TWorkflowAST, nodesById: Map<string, TNodeAST>): Map<string, string[]> {
  const sources = new Map<string, string[]>();
  for (const conn of ast.connections) {
    if (!nodesById.has(conn.sourceId)) continue;
    const list = sources.get(conn.destinationId);
    if (list) {
      list.push(conn.sourceId);
    } else {
      sources.set(conn.destinationId, [conn.sourceId]);
    }
  }
  return sources;
}

function createEmitContext(
  node: TNodeAST,
  sourceIds: readonly string[],
  bindings: VariableBindings,
  settings: TEmitSettings
): EmitContext {
  return {
    node,
    variable: bindings.bind(node.id),
    settings,
    primarySource: () => {
      const [first] = sourceIds;
      return first === undefined ? undefined : bindings.bind(first);
    },
    allSources: () => sourceIds.map((id) => bindings.bind(id)),
    configString: (aliases) => configString(node.config, aliases),
  };
}
