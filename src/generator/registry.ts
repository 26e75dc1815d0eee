/**
 * Tool generator registry.
 * Maps a resolved tool type to the generator that emits its statements.
 */

import type { TToolType } from '../ast/types.js';
import { commentText, fragment, type EmitContext, type TCodeFragment, type ToolGenerator } from './fragment.js';
import { browseGenerator, inputDataGenerator, outputDataGenerator } from './tools/io.js';
import {
  filterGenerator,
  formulaGenerator,
  recordIdGenerator,
  sampleGenerator,
  selectGenerator,
  sortGenerator,
  uniqueGenerator,
} from './tools/row-ops.js';
import { joinGenerator, unionGenerator } from './tools/combine.js';
import {
  crossTabGenerator,
  summarizeGenerator,
  textToColumnsGenerator,
  transposeGenerator,
} from './tools/reshape.js';

/**
 * All registered generators
 */
export const toolGenerators: ToolGenerator[] = [
  inputDataGenerator,
  outputDataGenerator,
  selectGenerator,
  filterGenerator,
  formulaGenerator,
  joinGenerator,
  unionGenerator,
  sortGenerator,
  summarizeGenerator,
  uniqueGenerator,
  sampleGenerator,
  recordIdGenerator,
  textToColumnsGenerator,
  crossTabGenerator,
  transposeGenerator,
  browseGenerator,
];

const generatorsByType = new Map<string, ToolGenerator>(toolGenerators.map((g) => [g.toolType, g]));

/**
 * Get the generator for a tool type, or undefined when the type falls back
 * to {@link generateGeneric}.
 */
export function getToolGenerator(toolType: TToolType): ToolGenerator | undefined {
  return generatorsByType.get(toolType);
}

/**
 * Fallback for `unknown`, `text_input` and macro tools: pass the primary
 * source through unchanged and leave a note for whoever finishes the script.
 */
export function generateGeneric(ctx: EmitContext): TCodeFragment {
  const toolType = commentText(ctx.node.toolType);
  const source = ctx.primarySource();
  const lines = [`# Tool type '${toolType}' - requires manual implementation`];
  if (source) {
    lines.push(`${ctx.variable} = ${source}.copy()`, `# TODO: Implement ${toolType} logic`);
  } else {
    lines.push('# No source data available');
  }
  return fragment(lines, { needsManualCompletion: true });
}

export function emitNode(ctx: EmitContext): TCodeFragment {
  const generator = getToolGenerator(ctx.node.toolType);
  return generator ? generator.generate(ctx) : generateGeneric(ctx);
}
