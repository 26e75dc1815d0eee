import type { TCanonicalToolType, TNodeAST } from '../ast/types.js';
import type { TPythonImport } from '../constants.js';

/**
 * Script settings every generator can see.
 */
export type TEmitSettings = {
  /** One indentation level, e.g. four spaces */
  indent: string;
  sampleSeed: number;
  previewRows: number;
};

/**
 * What a generator knows about the node it is emitting.
 */
export interface EmitContext {
  node: TNodeAST;
  /** This node's variable binding */
  variable: string;
  settings: TEmitSettings;
  /** Binding of the first known upstream node, by connection order */
  primarySource(): string | undefined;
  /** Bindings of every known upstream node, by connection order */
  allSources(): string[];
  /** First non-empty config string among the alias paths */
  configString(aliases: readonly string[]): string | undefined;
}

/**
 * Statements emitted for one node, before indentation.
 */
export type TCodeFragment = {
  lines: string[];
  imports: TPythonImport[];
  /** True when the emitted code contains placeholders a person must fill in */
  needsManualCompletion: boolean;
  /** File the statements read, if any */
  reads?: string;
  /** File the statements write, if any */
  writes?: string;
};

export interface ToolGenerator {
  toolType: TCanonicalToolType;
  /** Display name used in comments, e.g. "Record ID" */
  label: string;
  generate: (ctx: EmitContext) => TCodeFragment;
}

export function fragment(
  lines: string[],
  extra: Partial<Omit<TCodeFragment, 'lines'>> = {}
): TCodeFragment {
  const result: TCodeFragment = {
    lines,
    imports: extra.imports ?? [],
    needsManualCompletion: extra.needsManualCompletion ?? false,
  };
  if (extra.reads !== undefined) result.reads = extra.reads;
  if (extra.writes !== undefined) result.writes = extra.writes;
  return result;
}

/** The single comment emitted when a tool has nothing to read from. */
export function noSourceFragment(label: string): TCodeFragment {
  return fragment([`# ${label} tool: No source data`], { needsManualCompletion: true });
}

/** Text safe to place after `#` on a single line */
export function commentText(value: string): string {
  return value.replace(/[\r\n]+/g, ' ');
}
