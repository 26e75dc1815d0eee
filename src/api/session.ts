import type { TExecutionOrder, TNodeAST, TValidationError, TWorkflowAST } from '../ast/types.js';
import { determineExecutionOrder } from '../generator/control-flow.js';
import type { TDocumentError } from '../xml/document-loader.js';
import { ConversionError } from '../utils/error-utils.js';
import { generateScript, type GenerateOptions, type GenerateResult } from './generate.js';
import { parseWorkflowDocument } from './parse.js';
import { getDownstreamNodeIds, getNode, getUpstreamNodeIds } from './query.js';

/**
 * Stateful facade for a UI or application layer: parse a document once, then
 * query and generate against the published workflow.
 *
 * A failed `parse` publishes nothing. Whatever workflow was published before
 * stays in place, and the failure is kept in `lastErrors`.
 *
 * One session per conversion run; sessions share no state.
 *
 * @example
 * ```typescript
 * const session = new WorkflowSession();
 * if (!session.parse(bytes)) {
 *   showErrors(session.lastErrors);
 * } else {
 *   editor.setValue(session.generate());
 * }
 * ```
 */
export class WorkflowSession {
  private published: TWorkflowAST | null = null;
  private errors: TDocumentError[] = [];
  private parseWarnings: TValidationError[] = [];

  constructor(private readonly options: GenerateOptions = {}) {}

  /** Parse a document and publish the workflow on success. */
  parse(raw: Uint8Array | string): boolean {
    const result = parseWorkflowDocument(raw);
    if (!result.ok) {
      this.errors = result.errors;
      return false;
    }
    this.published = result.workflow;
    this.errors = [];
    this.parseWarnings = result.warnings;
    return true;
  }

  get workflow(): TWorkflowAST | null {
    return this.published;
  }

  /** Errors from the most recent failed `parse`; empty after a success */
  get lastErrors(): readonly TDocumentError[] {
    return this.errors;
  }

  /** Warnings from the most recent successful `parse` */
  get warnings(): readonly TValidationError[] {
    return this.parseWarnings;
  }

  /**
   * @throws {ConversionError} NO_WORKFLOW when nothing has been parsed yet
   */
  generate(): string {
    return this.generateWithDetails().code;
  }

  generateWithDetails(): GenerateResult {
    return generateScript(this.requireWorkflow(), this.options);
  }

  getNode(nodeId: string): TNodeAST | undefined {
    return this.published ? getNode(this.published, nodeId) : undefined;
  }

  getUpstreamNodeIds(nodeId: string): string[] {
    return this.published ? getUpstreamNodeIds(this.published, nodeId) : [];
  }

  getDownstreamNodeIds(nodeId: string): string[] {
    return this.published ? getDownstreamNodeIds(this.published, nodeId) : [];
  }

  getExecutionOrder(): TExecutionOrder {
    return determineExecutionOrder(this.requireWorkflow());
  }

  private requireWorkflow(): TWorkflowAST {
    if (!this.published) {
      throw new ConversionError('NO_WORKFLOW', 'No workflow has been parsed');
    }
    return this.published;
  }
}
