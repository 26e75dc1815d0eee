/**
 * @module generator/expression-translator
 *
 * Token-level rewrite of workflow formula expressions into pandas.
 *
 * This is not an expression parser. Field references, a fixed function table
 * and a few operators are rewritten; everything else passes through as
 * written, so the emitted code may need manual repair.
 */

import type { IToken } from 'chevrotain';
import {
  AndAnd,
  Equals,
  ExpressionLexer,
  FieldRef,
  Identifier,
  NotEqual,
  OrOr,
} from '../chevrotain-parser/tokens.js';
import { PYTHON_IMPORTS, type TPythonImport } from '../constants.js';
import { pyStringBody } from './code-utils.js';

export type TTranslatedExpression = {
  code: string;
  /** Imports the rewritten functions need */
  imports: TPythonImport[];
  /** Identifiers left as written, in first-seen order */
  untranslated: string[];
};

/** Workflow function names (uppercase) and their pandas counterparts */
const FUNCTION_TABLE: Readonly<Record<string, string>> = {
  TONUMBER: 'pd.to_numeric',
  TOSTRING: 'str',
  DATETIMENOW: 'pd.Timestamp.now',
  DATETIMEPARSE: 'pd.to_datetime',
  SUBSTRING: 'str.slice',
  LENGTH: 'str.len',
  TRIM: 'str.strip',
  UPPER: 'str.upper',
  UPPERCASE: 'str.upper',
  LOWER: 'str.lower',
  LOWERCASE: 'str.lower',
  CONTAINS: 'str.contains',
  ISNULL: 'isna',
  IF: 'np.where',
  IIF: 'np.where',
  AND: '&',
  OR: '|',
  NOT: '~',
};

const OPERATOR_TABLE = new Map([
  [AndAnd, '&'],
  [OrOr, '|'],
  [NotEqual, '!='],
  [Equals, '=='],
]);

/**
 * Translate `expression`, resolving `[Field]` references against `variable`.
 *
 * @example
 * translateExpression('[Amount] > 100', 'df_1').code
 * // "df_1['Amount'] > 100"
 */
export function translateExpression(expression: string, variable: string): TTranslatedExpression {
  const { tokens } = ExpressionLexer.tokenize(expression);
  const imports = new Set<TPythonImport>();
  const untranslated: string[] = [];
  let code = '';
  let cursor = 0;

  for (const token of tokens) {
    // Characters the lexer skipped are copied through as written
    if (token.startOffset > cursor) code += expression.slice(cursor, token.startOffset);
    code += rewriteToken(token, variable, imports, untranslated);
    cursor = token.startOffset + token.image.length;
  }
  code += expression.slice(cursor);

  return { code, imports: [...imports].sort(), untranslated };
}

function rewriteToken(
  token: IToken,
  variable: string,
  imports: Set<TPythonImport>,
  untranslated: string[]
): string {
  const { tokenType, image } = token;

  if (tokenType === FieldRef) {
    return `${variable}['${pyStringBody(image.slice(1, -1))}']`;
  }

  if (tokenType === Identifier) {
    const mapped = FUNCTION_TABLE[image.toUpperCase()];
    if (mapped === undefined) {
      if (!untranslated.includes(image)) untranslated.push(image);
      return image;
    }
    if (mapped.startsWith('pd.')) imports.add(PYTHON_IMPORTS.PANDAS);
    if (mapped.startsWith('np.')) imports.add(PYTHON_IMPORTS.NUMPY);
    return mapped;
  }

  return OPERATOR_TABLE.get(tokenType) ?? image;
}
