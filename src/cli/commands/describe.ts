/* eslint-disable no-console */
/**
 * Describe command - prints a workflow's structure
 */

import * as fs from 'fs';
import * as path from 'path';
import type { TWorkflowAST } from '../../ast/types.js';
import { analyzeWorkflow, type WorkflowAnalysis } from '../../api/analyze.js';
import { parseWorkflowDocument } from '../../api/parse.js';
import { getConnectionsFrom, getConnectionsInto, getNode } from '../../api/query.js';
import { logger } from '../utils/logger.js';

export interface DescribeOptions {
  format?: 'text' | 'json';
  /** Describe a single tool and its neighbours */
  node?: string;
}

export interface ConnectionInfo {
  from: string;
  to: string;
  port: string;
}

export interface FocusedNodeOutput {
  focusNode: string;
  toolType: string;
  annotation: string | null;
  incoming: ConnectionInfo[];
  outgoing: ConnectionInfo[];
}

export type DescribeOutput = { file: string } & (WorkflowAnalysis | FocusedNodeOutput);

export function describeNode(ast: TWorkflowAST, nodeId: string): FocusedNodeOutput {
  const node = getNode(ast, nodeId);
  if (!node) {
    throw new Error(`Node not found: ${nodeId}`);
  }
  const toInfo = (c: { sourceId: string; destinationId: string; portName: string }): ConnectionInfo => ({
    from: c.sourceId,
    to: c.destinationId,
    port: c.portName,
  });
  return {
    focusNode: node.id,
    toolType: node.toolType,
    annotation: node.annotation ?? null,
    incoming: getConnectionsInto(ast, nodeId).map(toInfo),
    outgoing: getConnectionsFrom(ast, nodeId).map(toInfo),
  };
}

function printAnalysis(fileName: string, analysis: WorkflowAnalysis): void {
  logger.section(fileName);
  logger.field('Version', analysis.version);
  logger.field('Tools', analysis.totalTools);
  logger.field('Connections', analysis.totalConnections);
  for (const [toolType, count] of Object.entries(analysis.toolTypes)) {
    logger.field(`  ${toolType}`, count);
  }
  logger.field('Inputs', analysis.inputs.join(', ') || '-');
  logger.field('Outputs', analysis.outputs.join(', ') || '-');
  logger.field('Order', analysis.executionOrder.order.join(' → ') || '-');
  if (!analysis.executionOrder.complete) {
    logger.warn(`Cycle keeps these tools out of the order: ${analysis.executionOrder.unscheduled.join(', ')}`);
  }
  if (analysis.isolated.length > 0) {
    logger.warn(`Unconnected tools: ${analysis.isolated.join(', ')}`);
  }
  if (analysis.danglingConnections > 0) {
    logger.warn(`${analysis.danglingConnections} connection(s) reference unknown tools`);
  }
}

function printFocused(focused: FocusedNodeOutput): void {
  logger.section(`Tool ${focused.focusNode}`);
  logger.field('Type', focused.toolType);
  if (focused.annotation) logger.field('Annotation', focused.annotation);
  logger.field('Incoming', focused.incoming.map((c) => `${c.from} (${c.port})`).join(', ') || '-');
  logger.field('Outgoing', focused.outgoing.map((c) => `${c.to} (${c.port})`).join(', ') || '-');
}

export async function describeCommand(input: string, options: DescribeOptions = {}): Promise<DescribeOutput> {
  const { format = 'text', node } = options;
  const file = path.resolve(input);
  logger.setQuiet(false);

  if (!fs.existsSync(file)) {
    throw new Error(`File not found: ${file}`);
  }

  const parsed = parseWorkflowDocument(await fs.promises.readFile(file));
  if (!parsed.ok) {
    throw new Error(`Cannot describe ${path.basename(file)}: ${parsed.errors[0].message}`);
  }

  const output: DescribeOutput = node
    ? { file, ...describeNode(parsed.workflow, node) }
    : { file, ...analyzeWorkflow(parsed.workflow) };

  if (format === 'json') {
    console.log(JSON.stringify(output, null, 2));
  } else if ('focusNode' in output) {
    printFocused(output);
  } else {
    printAnalysis(path.basename(file), output);
  }

  return output;
}
