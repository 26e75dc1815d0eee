import type { TConfigMap, TConfigValue } from '../ast/types.js';

/**
 * Replace every character that is not legal in a Python identifier.
 * The result is only used after a prefix, so a leading digit is fine.
 */
export function sanitizeIdentifierPart(nodeId: string): string {
  return nodeId.replace(/[^a-zA-Z0-9_]/g, '_');
}

/**
 * Per-run table mapping node ids to script variable names.
 *
 * Names are `<prefix>_<id>` with illegal characters replaced. Two ids that
 * sanitize to the same name get `_2`, `_3`, ... in first-reference order, so
 * the table stays bijective. A binding never changes once handed out.
 */
export class VariableBindings {
  private readonly byId = new Map<string, string>();
  private readonly taken = new Set<string>();

  constructor(private readonly prefix: string) {}

  /** Binding for `nodeId`, created on first reference */
  bind(nodeId: string): string {
    const existing = this.byId.get(nodeId);
    if (existing !== undefined) return existing;

    const base = `${this.prefix}_${sanitizeIdentifierPart(nodeId)}`;
    let name = base;
    for (let suffix = 2; this.taken.has(name); suffix++) {
      name = `${base}_${suffix}`;
    }
    this.byId.set(nodeId, name);
    this.taken.add(name);
    return name;
  }

  get(nodeId: string): string | undefined {
    return this.byId.get(nodeId);
  }

  /**
   * `[nodeId, variable]` pairs in first-reference order. Not a plain object:
   * integer-like keys would be reordered.
   */
  toEntries(): Array<[string, string]> {
    return [...this.byId];
  }
}

// =============================================================================
// Python literals
// =============================================================================

/** Body of a single-quoted Python string literal, without the quotes */
export function pyStringBody(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
}

export function pyString(value: string): string {
  return `'${pyStringBody(value)}'`;
}

/** Literal text placed inside an f-string: braces are doubled. */
export function pyFStringText(value: string): string {
  return pyStringBody(value).replace(/\{/g, '{{').replace(/\}/g, '}}');
}

// =============================================================================
// Config lookup
// =============================================================================

/**
 * Follow a dotted path through nested config maps and attribute sets.
 * `lookupConfig(config, 'OrderFields.Field.order')`
 */
export function lookupConfig(config: TConfigMap, path: string): TConfigValue | undefined {
  let current: TConfigValue | undefined = config;
  for (const key of path.split('.')) {
    if (current === null || current === undefined || typeof current === 'string') {
      return undefined;
    }
    current = Object.prototype.hasOwnProperty.call(current, key) ? current[key] : undefined;
  }
  return current;
}

/** First non-empty string found among the alias paths, in order */
export function configString(config: TConfigMap, aliases: readonly string[]): string | undefined {
  for (const alias of aliases) {
    const value = lookupConfig(config, alias);
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return undefined;
}

/**
 * Delimiters are stored as written in the document, so a tab arrives as the
 * two characters `\t`.
 */
export function unescapeDelimiter(value: string): string {
  return value === '\\t' ? '\t' : value;
}

export function fileExtension(path: string): string {
  const match = /\.([^./\\]+)$/.exec(path);
  return match ? match[1].toLowerCase() : '';
}
