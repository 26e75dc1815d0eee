import type { TConnectionAST, TToolType, TValidationError, TWorkflowAST } from './ast/types.js';
import { isMacroToolType } from './classifier.js';
import { determineExecutionOrder } from './generator/control-flow.js';

// Re-export TValidationError for convenience
export type { TValidationError } from './ast/types.js';

/** Tool types whose statements read from an upstream variable */
const SOURCE_CONSUMING_TOOL_TYPES: ReadonlySet<TToolType> = new Set([
  'output_data',
  'browse',
  'select',
  'filter',
  'formula',
  'union',
  'sort',
  'summarize',
  'unique',
  'sample',
  'record_id',
  'text_to_columns',
  'cross_tab',
  'transpose',
]);

/**
 * Structural checks on a parsed workflow.
 *
 * Parsing and generation tolerate every condition reported here; the
 * validator only makes them visible. Only a cycle is an error, because it
 * keeps nodes out of the generated script.
 */
export class WorkflowValidator {
  private errors: TValidationError[] = [];
  private warnings: TValidationError[] = [];

  validate(
    workflow: TWorkflowAST,
    options?: { strictMode?: boolean }
  ): {
    valid: boolean;
    errors: TValidationError[];
    warnings: TValidationError[];
  } {
    this.errors = [];
    this.warnings = [];
    const knownIds = new Set(workflow.nodes.map((n) => n.id));

    this.validateConnections(workflow, knownIds);
    this.validateDuplicateConnections(workflow);
    this.validateCycles(workflow);
    this.validateToolTypes(workflow);
    this.validateSources(workflow, knownIds);
    this.detectUnusedNodes(workflow);

    const strict = options?.strictMode ?? false;
    return {
      valid: this.errors.length === 0 && (!strict || this.warnings.length === 0),
      errors: this.errors,
      warnings: this.warnings,
    };
  }

  private validateConnections(workflow: TWorkflowAST, knownIds: Set<string>): void {
    workflow.connections.forEach((conn) => {
      const missing = [conn.sourceId, conn.destinationId].filter((id) => !knownIds.has(id));
      if (missing.length === 0) return;
      this.warnings.push({
        type: 'warning',
        code: 'DANGLING_CONNECTION',
        message: `Connection ${describeConnection(conn)} references unknown node${
          missing.length > 1 ? 's' : ''
        } ${missing.map((id) => `"${id}"`).join(', ')} and is ignored`,
        connection: conn,
      });
    });
  }

  private validateDuplicateConnections(workflow: TWorkflowAST): void {
    const seen = new Set<string>();
    for (const conn of workflow.connections) {
      const key = `${conn.sourceId}.${conn.portName}->${conn.destinationId}`;
      if (seen.has(key)) {
        this.warnings.push({
          type: 'warning',
          code: 'DUPLICATE_CONNECTION',
          message: `Duplicate connection: ${describeConnection(conn)}`,
          connection: conn,
        });
      }
      seen.add(key);
    }
  }

  private validateCycles(workflow: TWorkflowAST): void {
    const { complete, unscheduled } = determineExecutionOrder(workflow);
    if (complete) return;
    this.errors.push({
      type: 'error',
      code: 'CYCLIC_GRAPH',
      message: `Circular dependency detected in workflow. Nodes that cannot be scheduled: ${unscheduled.join(', ')}`,
    });
  }

  private validateToolTypes(workflow: TWorkflowAST): void {
    workflow.nodes.forEach((node) => {
      if (node.toolType === 'unknown') {
        this.warnings.push({
          type: 'warning',
          code: 'UNRESOLVED_TOOL_TYPE',
          message: `Tool "${node.id}" (plugin "${node.pluginRef || 'none'}") has no recognized tool type; its code is a pass-through stub`,
          node: node.id,
        });
      } else if (isMacroToolType(node.toolType)) {
        this.warnings.push({
          type: 'warning',
          code: 'MACRO_TOOL',
          message: `Tool "${node.id}" runs macro "${node.macroRef ?? ''}", which cannot be converted`,
          node: node.id,
        });
      }
    });
  }

  private validateSources(workflow: TWorkflowAST, knownIds: Set<string>): void {
    workflow.nodes.forEach((node) => {
      const sources = workflow.connections.filter(
        (c) => c.destinationId === node.id && knownIds.has(c.sourceId)
      ).length;
      if (node.toolType === 'join' && sources < 2) {
        this.warnings.push({
          type: 'warning',
          code: 'INSUFFICIENT_JOIN_INPUTS',
          message: `Join "${node.id}" needs two inputs but has ${sources}`,
          node: node.id,
        });
      } else if (SOURCE_CONSUMING_TOOL_TYPES.has(node.toolType) && sources === 0) {
        this.warnings.push({
          type: 'warning',
          code: 'MISSING_SOURCE',
          message: `Tool "${node.id}" (${node.toolType}) has no incoming connection`,
          node: node.id,
        });
      }
    });
  }

  private detectUnusedNodes(workflow: TWorkflowAST): void {
    const usedNodes = new Set<string>();
    workflow.connections.forEach((conn) => {
      usedNodes.add(conn.sourceId);
      usedNodes.add(conn.destinationId);
    });
    // Single-node workflows are fine on their own
    if (workflow.nodes.length < 2) return;
    workflow.nodes.forEach((node) => {
      if (!usedNodes.has(node.id)) {
        this.warnings.push({
          type: 'warning',
          code: 'UNUSED_NODE',
          message: `Tool "${node.id}" is not connected to anything`,
          node: node.id,
        });
      }
    });
  }
}

function describeConnection(conn: TConnectionAST): string {
  return `"${conn.sourceId}" -> "${conn.destinationId}"`;
}

export const validator = new WorkflowValidator();
