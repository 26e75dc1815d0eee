export { parseWorkflowDocument, type TParseResult } from './parse.js';
export {
  generateScript,
  DEFAULT_GENERATE_OPTIONS,
  type GenerateOptions,
  type GenerateResult,
} from './generate.js';
export { WorkflowSession } from './session.js';
export { analyzeWorkflow, type WorkflowAnalysis } from './analyze.js';
export * from './query.js';
