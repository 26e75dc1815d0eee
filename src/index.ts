/**
 * yxmd2pandas
 *
 * Reads workflow documents (.yxmd) and generates equivalent pandas scripts.
 */

export * from './api/index.js';
export type * from './ast/types.js';
export { CANONICAL_TOOL_TYPES } from './ast/types.js';
export { WorkflowBuilder, type TNodeSpec } from './ast/builder.js';
export { classifyToolType, isMacroToolType } from './classifier.js';
export { WorkflowDocumentParser, parser } from './parser.js';
export { WorkflowValidator, validator } from './validator.js';
export {
  buildControlFlowGraph,
  performKahnsTopologicalSort,
  determineExecutionOrder,
  type ControlFlowGraph,
} from './generator/control-flow.js';
export { translateExpression, type TTranslatedExpression } from './generator/expression-translator.js';
export { toolGenerators, getToolGenerator } from './generator/registry.js';
export type { EmitContext, TCodeFragment, ToolGenerator } from './generator/fragment.js';
export { getFriendlyError, formatFriendlyDiagnostics, type TFriendlyError } from './friendly-errors.js';
export { loadConfig, toGenerateOptions } from './config/loader.js';
export type { ConverterConfig, PartialConverterConfig } from './config/types.js';
export { ConversionError, ConfigError, getErrorMessage, wrapError } from './utils/error-utils.js';
export type { TDocumentError } from './xml/document-loader.js';
