/**
 * @module parser
 *
 * Graph builder: walks a loaded document and produces the workflow AST.
 *
 * Missing optional elements are never errors. A node without a tool id and a
 * connection without both endpoints are dropped without a trace; they are
 * decorative markup as far as the graph is concerned.
 */

import type {
  TConfigMap,
  TGuiPosition,
  TValidationError,
  TWorkflowAST,
  TWorkflowMetadata,
} from './ast/types.js';
import { WorkflowBuilder, type TNodeSpec } from './ast/builder.js';
import {
  DEFAULT_PORT_NAME,
  DOCUMENT_ATTRIBUTES,
  DOCUMENT_TAGS,
  META_INFO_FIELDS,
  UNKNOWN_VERSION,
} from './constants.js';
import {
  findAllDescendants,
  findChild,
  findDescendant,
  loadDocument,
  trimmedText,
  type TDocumentError,
  type TXmlElement,
} from './xml/document-loader.js';

export type TParseResult =
  | { ok: true; workflow: TWorkflowAST; warnings: TValidationError[] }
  | { ok: false; errors: TDocumentError[] };

export class WorkflowDocumentParser {
  /**
   * Parse raw document bytes into a workflow.
   * Malformed documents come back as `{ ok: false }`; nothing is thrown.
   */
  parse(raw: Uint8Array | string): TParseResult {
    const loaded = loadDocument(raw);
    if (!loaded.ok) {
      return { ok: false, errors: [loaded.error] };
    }
    return this.buildWorkflow(loaded.root);
  }

  /** Build a workflow from an already loaded document root. */
  buildWorkflow(root: TXmlElement): { ok: true; workflow: TWorkflowAST; warnings: TValidationError[] } {
    const warnings: TValidationError[] = [];
    const builder = new WorkflowBuilder().metadata(extractMetadata(root));

    for (const element of findAllDescendants(root, DOCUMENT_TAGS.NODE)) {
      const spec = extractNodeSpec(element);
      if (!spec) continue;
      if (builder.hasNode(spec.id)) {
        warnings.push({
          type: 'warning',
          code: 'DUPLICATE_NODE_ID',
          message: `Node id "${spec.id}" appears more than once; only the first occurrence is kept`,
          node: spec.id,
        });
        continue;
      }
      builder.addNode(spec);
    }

    for (const element of findAllDescendants(root, DOCUMENT_TAGS.CONNECTION)) {
      const sourceId = endpointId(findDescendant(element, DOCUMENT_TAGS.ORIGIN));
      const destinationId = endpointId(findDescendant(element, DOCUMENT_TAGS.DESTINATION));
      if (!sourceId || !destinationId) continue;
      builder.connect(sourceId, destinationId, portNameOf(element));
    }

    return { ok: true, workflow: builder.build(), warnings };
  }
}

export const parser = new WorkflowDocumentParser();

// =============================================================================
// Metadata
// =============================================================================

function extractMetadata(root: TXmlElement): TWorkflowMetadata {
  const metadata: TWorkflowMetadata = {
    version:
      nonEmpty(root.attributes[DOCUMENT_ATTRIBUTES.VERSION]) ??
      nonEmpty(root.attributes[DOCUMENT_ATTRIBUTES.YXMD_VERSION]) ??
      UNKNOWN_VERSION,
    author: null,
    description: null,
    creationDate: null,
  };

  const properties = findChild(root, DOCUMENT_TAGS.PROPERTIES);
  const metaInfo = properties ? findDescendant(properties, DOCUMENT_TAGS.META_INFO) : undefined;
  if (!metaInfo) return metadata;

  for (const [tag, field] of Object.entries(META_INFO_FIELDS)) {
    metadata[field] = trimmedText(findChild(metaInfo, tag)) ?? null;
  }
  return metadata;
}

// =============================================================================
// Nodes
// =============================================================================

function extractNodeSpec(element: TXmlElement): TNodeSpec | null {
  const id = nonEmpty(element.attributes[DOCUMENT_ATTRIBUTES.TOOL_ID]?.trim());
  if (!id) return null;

  const engine = findDescendant(element, DOCUMENT_TAGS.ENGINE_SETTINGS);
  const properties = findDescendant(element, DOCUMENT_TAGS.PROPERTIES);
  const configuration = properties
    ? findDescendant(properties, DOCUMENT_TAGS.CONFIGURATION)
    : undefined;

  const spec: TNodeSpec = {
    id,
    pluginRef: engine?.attributes[DOCUMENT_ATTRIBUTES.ENGINE_DLL] ?? '',
    config: configuration ? extractConfig(configuration) : {},
  };

  const macroRef = nonEmpty(engine?.attributes[DOCUMENT_ATTRIBUTES.MACRO]);
  if (macroRef) spec.macroRef = macroRef;

  const annotation = properties ? extractAnnotation(properties) : undefined;
  if (annotation) spec.annotation = annotation;

  const guiPosition = extractGuiPosition(element);
  if (guiPosition) spec.guiPosition = guiPosition;

  return spec;
}

function extractAnnotation(properties: TXmlElement): string | undefined {
  const annotation = findDescendant(properties, DOCUMENT_TAGS.ANNOTATION);
  if (!annotation) return undefined;
  return trimmedText(findDescendant(annotation, DOCUMENT_TAGS.ANNOTATION_NAME));
}

function extractGuiPosition(node: TXmlElement): TGuiPosition | undefined {
  const gui = findDescendant(node, DOCUMENT_TAGS.GUI_SETTINGS);
  const position = gui ? findDescendant(gui, DOCUMENT_TAGS.POSITION) : undefined;
  if (!position) return undefined;
  return {
    x: toCoordinate(position.attributes.x),
    y: toCoordinate(position.attributes.y),
  };
}

function toCoordinate(value: string | undefined): number {
  const parsed = Number(value ?? 0);
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Extract a configuration subtree into nested maps.
 *
 * - element with child elements → nested map keyed by child tag
 * - leaf with non-empty text → trimmed text
 * - leaf with attributes only → attribute set
 * - bare leaf → null
 *
 * Same-named siblings overwrite; the last one wins. Uses an explicit stack so
 * arbitrarily deep documents cannot exhaust the call stack.
 */
export function extractConfig(configuration: TXmlElement): TConfigMap {
  const root: TConfigMap = {};
  const stack: Array<{ element: TXmlElement; into: TConfigMap }> = [
    { element: configuration, into: root },
  ];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;

    for (const child of frame.element.children) {
      if (child.children.length > 0) {
        const nested: TConfigMap = {};
        frame.into[child.tag] = nested;
        stack.push({ element: child, into: nested });
        continue;
      }
      const text = trimmedText(child);
      if (text !== undefined) {
        frame.into[child.tag] = text;
      } else if (Object.keys(child.attributes).length > 0) {
        frame.into[child.tag] = { ...child.attributes };
      } else {
        frame.into[child.tag] = null;
      }
    }
  }

  return root;
}

// =============================================================================
// Connections
// =============================================================================

function endpointId(endpoint: TXmlElement | undefined): string | undefined {
  if (!endpoint) return undefined;
  return trimmedText(endpoint) ?? nonEmpty(endpoint.attributes[DOCUMENT_ATTRIBUTES.TOOL_ID]?.trim());
}

function portNameOf(connection: TXmlElement): string {
  const origin = findDescendant(connection, DOCUMENT_TAGS.ORIGIN);
  return (
    nonEmpty(connection.attributes[DOCUMENT_ATTRIBUTES.CONNECTION_NAME]) ??
    nonEmpty(origin?.attributes[DOCUMENT_ATTRIBUTES.ORIGIN_PORT]) ??
    DEFAULT_PORT_NAME
  );
}

function nonEmpty(value: string | undefined): string | undefined {
  return value ? value : undefined;
}
