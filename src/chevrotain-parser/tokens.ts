/**
 * @module chevrotain-parser/tokens
 *
 * Token definitions for workflow formula expressions.
 *
 * The lexer is total: every character of the input ends up in some token
 * (the catch-all `Other` takes whatever nothing else matches), and whitespace
 * is kept so the translated expression preserves the author's spacing.
 */

import { createToken, Lexer } from 'chevrotain';

// =============================================================================
// References & Literals
// =============================================================================

/** `[Field Name]` */
export const FieldRef = createToken({
  name: 'FieldRef',
  pattern: /\[[^\]]+\]/,
});

export const StringLiteral = createToken({
  name: 'StringLiteral',
  pattern: /"[^"]*"|'[^']*'/,
});

export const NumberLiteral = createToken({
  name: 'NumberLiteral',
  pattern: /\d+(?:\.\d+)?/,
});

export const Identifier = createToken({
  name: 'Identifier',
  pattern: /[A-Za-z_][A-Za-z0-9_]*/,
});

// =============================================================================
// Operators
// =============================================================================

export const AndAnd = createToken({
  name: 'AndAnd',
  pattern: /&&/,
});

export const OrOr = createToken({
  name: 'OrOr',
  pattern: /\|\|/,
});

/** `<>` */
export const NotEqual = createToken({
  name: 'NotEqual',
  pattern: /<>/,
});

/** Two-character comparisons that already read the same in the target */
export const Comparison = createToken({
  name: 'Comparison',
  pattern: /<=|>=|==|!=/,
});

/** A lone `=`, which workflow expressions use for equality */
export const Equals = createToken({
  name: 'Equals',
  pattern: /=/,
});

// =============================================================================
// Whitespace & Fallback
// =============================================================================

export const WhiteSpace = createToken({
  name: 'WhiteSpace',
  pattern: /\s+/,
  line_breaks: true,
});

/** Any single character no other token takes */
export const Other = createToken({
  name: 'Other',
  pattern: /[\s\S]/,
  line_breaks: true,
});

// =============================================================================
// Token Order
// =============================================================================

/**
 * All tokens in priority order.
 * Multi-character operators come before `Equals`; `Other` must be last.
 */
export const allTokens = [
  WhiteSpace,
  FieldRef,
  StringLiteral,
  AndAnd,
  OrOr,
  NotEqual,
  Comparison,
  Equals,
  NumberLiteral,
  Identifier,
  Other,
];

// =============================================================================
// Lexer Instance
// =============================================================================

/**
 * `safeMode` turns off first-character optimisation, which cannot analyse the
 * catch-all `Other` pattern and would leave most punctuation unmatched.
 */
export const ExpressionLexer = new Lexer(allTokens, { positionTracking: 'onlyOffset', safeMode: true });
