import type { TExecutionOrder, TToolType, TWorkflowAST } from '../ast/types.js';
import { determineExecutionOrder } from '../generator/control-flow.js';
import { findDanglingConnections, findIsolatedNodes } from './query.js';

export interface WorkflowAnalysis {
  version: string;
  totalTools: number;
  totalConnections: number;
  /** Tool counts keyed by tool type, keys in ascending order */
  toolTypes: Record<string, number>;
  /** Node ids of tools that bring data in */
  inputs: string[];
  /** Node ids of tools that write data out */
  outputs: string[];
  /** Node ids of every other tool */
  transformations: string[];
  isolated: string[];
  danglingConnections: number;
  executionOrder: TExecutionOrder;
}

const INPUT_TOOL_TYPES: ReadonlySet<TToolType> = new Set(['input_data', 'text_input']);
const OUTPUT_TOOL_TYPES: ReadonlySet<TToolType> = new Set(['output_data']);

/**
 * Summarize a workflow's structure. Lists are in document order.
 */
export function analyzeWorkflow(ast: TWorkflowAST): WorkflowAnalysis {
  const counts = new Map<string, number>();
  const inputs: string[] = [];
  const outputs: string[] = [];
  const transformations: string[] = [];

  for (const node of ast.nodes) {
    counts.set(node.toolType, (counts.get(node.toolType) ?? 0) + 1);
    if (INPUT_TOOL_TYPES.has(node.toolType)) {
      inputs.push(node.id);
    } else if (OUTPUT_TOOL_TYPES.has(node.toolType)) {
      outputs.push(node.id);
    } else {
      transformations.push(node.id);
    }
  }

  const toolTypes: Record<string, number> = {};
  for (const key of [...counts.keys()].sort()) {
    toolTypes[key] = counts.get(key) ?? 0;
  }

  return {
    version: ast.metadata.version,
    totalTools: ast.nodes.length,
    totalConnections: ast.connections.length,
    toolTypes,
    inputs,
    outputs,
    transformations,
    isolated: findIsolatedNodes(ast).map((n) => n.id),
    danglingConnections: findDanglingConnections(ast).length,
    executionOrder: determineExecutionOrder(ast),
  };
}
