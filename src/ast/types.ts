/**
 * Workflow AST - The in-memory form of a parsed workflow document.
 *
 * A workflow is a directed graph where:
 * - `nodes` are the tools placed on the canvas, in document order
 * - `connections` link an origin tool to a destination tool
 * - `metadata` is whatever the document says about itself
 *
 * ```
 * ┌──────────────────────────────────────────────────────────┐
 * │                        WORKFLOW                          │
 * │  ┌──────────────┐   connection    ┌──────────────┐       │
 * │  │ Node "1"     │ ──────────────► │ Node "2"     │ ...   │
 * │  │ input_data   │   (Output)      │ filter       │       │
 * │  └──────────────┘                 └──────────────┘       │
 * │  metadata { version, author, description, creationDate } │
 * └──────────────────────────────────────────────────────────┘
 * ```
 *
 * @example
 * ```typescript
 * const workflow: TWorkflowAST = {
 *   type: 'Workflow',
 *   metadata: { version: '2023.1', author: null, description: null, creationDate: null },
 *   nodes: [...],
 *   connections: [{ type: 'Connection', sourceId: '1', destinationId: '2', portName: 'Output' }],
 * };
 * ```
 */
export type TWorkflowAST = {
  type: 'Workflow';
  metadata: TWorkflowMetadata;
  /** Nodes in document order. Ids are unique. */
  nodes: TNodeAST[];
  /** Connections in document order. Endpoints may name ids absent from `nodes`. */
  connections: TConnectionAST[];
};

export type TWorkflowMetadata = {
  /** Document version, "Unknown" when the document does not say */
  version: string;
  author: string | null;
  description: string | null;
  creationDate: string | null;
};

/** Attributes of a configuration leaf that carries no text. */
export type TAttributeSet = { readonly [name: string]: string };

/**
 * Nested configuration keyed by element tag.
 * Same-named sibling elements overwrite each other; the last one wins.
 */
export type TConfigMap = { [key: string]: TConfigValue };

export type TConfigValue = string | TConfigMap | TAttributeSet | null;

export type TGuiPosition = {
  x: number;
  y: number;
};

export type TNodeAST = {
  type: 'Node';
  /** Tool id from the document, unique within the workflow */
  id: string;
  /** Resolved once while building the graph */
  readonly toolType: TToolType;
  /** Engine plugin path (e.g. "AlteryxBasePluginsEngine.dll"), "" when absent */
  pluginRef: string;
  macroRef?: string;
  config: TConfigMap;
  annotation?: string;
  guiPosition?: TGuiPosition;
};

export type TConnectionAST = {
  type: 'Connection';
  sourceId: string;
  destinationId: string;
  /** Named origin port, "Output" unless the document says otherwise */
  portName: string;
};

export const CANONICAL_TOOL_TYPES = [
  'input_data',
  'output_data',
  'text_input',
  'browse',
  'select',
  'filter',
  'formula',
  'join',
  'union',
  'sort',
  'summarize',
  'unique',
  'sample',
  'record_id',
  'text_to_columns',
  'cross_tab',
  'transpose',
  'unknown',
] as const;

export type TCanonicalToolType = (typeof CANONICAL_TOOL_TYPES)[number];

export type TMacroToolType = `macro:${string}`;

/** Canonical tag identifying a node's processing semantics. */
export type TToolType = TCanonicalToolType | TMacroToolType;

/**
 * Linear schedule produced by the execution-order resolver.
 * `unscheduled` is non-empty exactly when the node graph has a cycle.
 */
export type TExecutionOrder = {
  order: string[];
  unscheduled: string[];
  complete: boolean;
};

export type TValidationError = {
  type: 'error' | 'warning';
  code: string;
  message: string;
  node?: string;
  connection?: TConnectionAST;
};
