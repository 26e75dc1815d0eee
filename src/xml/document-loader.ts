/**
 * @module xml/document-loader
 *
 * Turns raw document bytes into a plain element tree.
 *
 * fast-xml-parser does the lexing (in order-preserving mode, so sibling order
 * survives); this module only reshapes its output into {@link TXmlElement}
 * values and reports malformed input as a value instead of throwing.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { getErrorMessage } from '../utils/error-utils.js';

export type TXmlElement = {
  tag: string;
  attributes: Record<string, string>;
  children: TXmlElement[];
  /** Concatenated direct text content, untrimmed ("" when none) */
  text: string;
};

export type TDocumentError = {
  code: 'DOCUMENT_MALFORMED';
  message: string;
  line?: number;
  column?: number;
};

export type TLoadResult =
  | { ok: true; root: TXmlElement }
  | { ok: false; error: TDocumentError };

const TEXT_KEY = '#text';
const ATTRIBUTES_KEY = ':@';

/**
 * Deepest element nesting accepted. fast-xml-parser rejects anything deeper
 * (its own default is 100, which real configurations can exceed).
 */
export const MAX_NESTED_TAGS = 1000;

const parserOptions = {
  maxNestedTags: MAX_NESTED_TAGS,
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  parseTagValue: false,
  parseAttributeValue: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  trimValues: false,
};

const xmlParser = new XMLParser(parserOptions);

const utf8Decoder = new TextDecoder('utf-8');

/**
 * Parse a workflow document.
 * Never throws; failures come back as `{ ok: false }`.
 */
export function loadDocument(raw: Uint8Array | string): TLoadResult {
  const xml = typeof raw === 'string' ? raw.replace(/^\uFEFF/, '') : utf8Decoder.decode(raw);

  if (xml.trim().length === 0) {
    return malformed('Document is empty');
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    return malformed(msg, line, col);
  }

  let parsed: unknown;
  try {
    parsed = xmlParser.parse(xml);
  } catch (error) {
    return malformed(getErrorMessage(error));
  }

  // Trailing text never reaches the parsed output, so look at the raw tail too
  if (hasTopLevelText(parsed) || xml.slice(xml.lastIndexOf('>') + 1).trim() !== '') {
    return malformed('Text outside the root element');
  }
  const roots = toElements(parsed);
  if (roots.length === 0) {
    return malformed('Document has no root element');
  }
  if (roots.length > 1) {
    return malformed(`Document has ${roots.length} root elements`);
  }
  return { ok: true, root: roots[0] };
}

function malformed(message: string, line?: number, column?: number): TLoadResult {
  const error: TDocumentError = { code: 'DOCUMENT_MALFORMED', message };
  if (line !== undefined) error.line = line;
  if (column !== undefined) error.column = column;
  return { ok: false, error };
}

function hasTopLevelText(parsed: unknown): boolean {
  if (!Array.isArray(parsed)) return false;
  return parsed.some(
    (entry) => isRecord(entry) && TEXT_KEY in entry && scalarToString(entry[TEXT_KEY]).trim() !== ''
  );
}

type TPendingList = { entries: unknown; into: TXmlElement[]; owner: TXmlElement | null };

/**
 * Reshape fast-xml-parser's ordered output into elements.
 * Ordered output is a list of single-key objects: `{ tag: [...children], ':@': {...attrs} }`
 * for elements and `{ '#text': '...' }` for text. Walks with an explicit stack.
 */
function toElements(parsed: unknown): TXmlElement[] {
  const roots: TXmlElement[] = [];
  const stack: TPendingList[] = [{ entries: parsed, into: roots, owner: null }];

  while (stack.length > 0) {
    const pending = stack.pop();
    if (!pending || !Array.isArray(pending.entries)) continue;

    for (const entry of pending.entries) {
      if (!isRecord(entry)) continue;

      if (TEXT_KEY in entry) {
        if (pending.owner) pending.owner.text += scalarToString(entry[TEXT_KEY]);
        continue;
      }

      const tag = Object.keys(entry).find((key) => key !== ATTRIBUTES_KEY);
      if (tag === undefined || tag.startsWith('?') || tag.startsWith('!')) continue;

      const element: TXmlElement = {
        tag,
        attributes: readAttributes(entry[ATTRIBUTES_KEY]),
        children: [],
        text: '',
      };
      pending.into.push(element);
      stack.push({ entries: entry[tag], into: element.children, owner: element });
    }
  }

  return roots;
}

function readAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(value)) return attributes;
  for (const [name, attrValue] of Object.entries(value)) {
    attributes[name] = scalarToString(attrValue);
  }
  return attributes;
}

function scalarToString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// Element queries
// =============================================================================

/**
 * First descendant with the given tag, in document (pre-)order.
 * The element itself is not considered.
 */
export function findDescendant(element: TXmlElement, tag: string): TXmlElement | undefined {
  const stack = [...element.children].reverse();
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    if (current.tag === tag) return current;
    for (let i = current.children.length - 1; i >= 0; i--) {
      stack.push(current.children[i]);
    }
  }
  return undefined;
}

/** Every descendant with the given tag, in document (pre-)order. */
export function findAllDescendants(element: TXmlElement, tag: string): TXmlElement[] {
  const found: TXmlElement[] = [];
  const stack = [...element.children].reverse();
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    if (current.tag === tag) found.push(current);
    for (let i = current.children.length - 1; i >= 0; i--) {
      stack.push(current.children[i]);
    }
  }
  return found;
}

export function findChild(element: TXmlElement, tag: string): TXmlElement | undefined {
  return element.children.find((child) => child.tag === tag);
}

/** Trimmed text, or undefined when the element has none */
export function trimmedText(element: TXmlElement | undefined): string | undefined {
  const text = element?.text.trim();
  return text ? text : undefined;
}
