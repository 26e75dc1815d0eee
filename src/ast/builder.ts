import type {
  TConfigMap,
  TConnectionAST,
  TGuiPosition,
  TNodeAST,
  TWorkflowAST,
  TWorkflowMetadata,
} from './types.js';
import { classifyToolType } from '../classifier.js';
import { DEFAULT_PORT_NAME, UNKNOWN_VERSION } from '../constants.js';

/** Everything a node carries before its tool type is resolved. */
export type TNodeSpec = {
  id: string;
  pluginRef?: string;
  macroRef?: string;
  config?: TConfigMap;
  annotation?: string;
  guiPosition?: TGuiPosition;
};

/**
 * Fluent builder for constructing TWorkflowAST programmatically.
 * The document parser and the tests both go through it, so every node's
 * tool type is classified here and nowhere else.
 *
 * @example
 * ```typescript
 * const workflow = new WorkflowBuilder()
 *   .version('2023.1')
 *   .addNode({ id: '1', pluginRef: 'AlteryxBasePluginsEngine.dll', config: { File: 'a.csv' } })
 *   .addNode({ id: '2', pluginRef: 'AlteryxBasePluginsEngine.dll', config: { Filter: '[A] > 1' } })
 *   .connect('1', '2')
 *   .build();
 * ```
 */
export class WorkflowBuilder {
  private ast: TWorkflowAST;
  private ids = new Set<string>();

  constructor() {
    this.ast = {
      type: 'Workflow',
      metadata: {
        version: UNKNOWN_VERSION,
        author: null,
        description: null,
        creationDate: null,
      },
      nodes: [],
      connections: [],
    };
  }
  version(version: string): this {
    this.ast.metadata.version = version;
    return this;
  }
  metadata(metadata: Partial<TWorkflowMetadata>): this {
    this.ast.metadata = { ...this.ast.metadata, ...metadata };
    return this;
  }
  hasNode(id: string): boolean {
    return this.ids.has(id);
  }
  /**
   * Add a node, classifying its tool type.
   * @throws {Error} If a node with the same id was already added
   */
  addNode(spec: TNodeSpec): this {
    if (this.ids.has(spec.id)) {
      throw new Error(`Duplicate node id "${spec.id}"`);
    }
    const pluginRef = spec.pluginRef ?? '';
    const config = spec.config ?? {};
    const node: TNodeAST = {
      type: 'Node',
      id: spec.id,
      toolType: classifyToolType({ pluginRef, macroRef: spec.macroRef, config }),
      pluginRef,
      config,
    };
    if (spec.macroRef) node.macroRef = spec.macroRef;
    if (spec.annotation) node.annotation = spec.annotation;
    if (spec.guiPosition) node.guiPosition = spec.guiPosition;
    this.ids.add(spec.id);
    this.ast.nodes.push(node);
    return this;
  }
  connect(sourceId: string, destinationId: string, portName: string = DEFAULT_PORT_NAME): this {
    const connection: TConnectionAST = { type: 'Connection', sourceId, destinationId, portName };
    this.ast.connections.push(connection);
    return this;
  }
  /** Build and return the final TWorkflowAST */
  build(): TWorkflowAST {
    return this.ast;
  }
}
