import { parser, type TParseResult } from '../parser.js';

export type { TParseResult };

/**
 * Parse a workflow document into a workflow AST
 *
 * Malformed input is reported in the result, never thrown. Duplicate node ids
 * come back as warnings.
 *
 * @param raw - Document bytes (UTF-8) or decoded text
 *
 * @example
 * ```typescript
 * const result = parseWorkflowDocument(fs.readFileSync('flow.yxmd'));
 * if (!result.ok) {
 *   console.error(result.errors[0].message);
 * } else {
 *   console.log(`${result.workflow.nodes.length} tools`);
 * }
 * ```
 */
export function parseWorkflowDocument(raw: Uint8Array | string): TParseResult {
  return parser.parse(raw);
}
