/**
 * Single-input tools that keep the shape of the data: filtering, computed
 * columns, ordering, de-duplication and sampling.
 */

import { pyString } from '../code-utils.js';
import { translateExpression } from '../expression-translator.js';
import { fragment, noSourceFragment, type ToolGenerator } from '../fragment.js';

const DEFAULT_SAMPLE_SIZE = 100;
const DEFAULT_RECORD_ID_FIELD = 'RecordID';

export const filterGenerator: ToolGenerator = {
  toolType: 'filter',
  label: 'Filter',
  generate: (ctx) => {
    const source = ctx.primarySource();
    if (!source) return noSourceFragment('Filter');

    const v = ctx.variable;
    const expression = ctx.configString(['Expression', 'Filter']);
    const counts = `print(f'Filter: {len(${v})} rows (from {len(${source})})')`;

    if (!expression) {
      return fragment(
        ['# Apply filter', '# TODO: Add filter condition', `${v} = ${source}.copy()`, counts],
        { needsManualCompletion: true }
      );
    }
    const translated = translateExpression(expression, source);
    return fragment(['# Apply filter', `${v} = ${source}[${translated.code}]`, counts], {
      imports: translated.imports,
    });
  },
};

export const formulaGenerator: ToolGenerator = {
  toolType: 'formula',
  label: 'Formula',
  generate: (ctx) => {
    const source = ctx.primarySource();
    if (!source) return noSourceFragment('Formula');

    const v = ctx.variable;
    const expression = ctx.configString([
      'Expression',
      'Formula',
      'FormulaFields.FormulaField.expression',
    ]);
    const field =
      ctx.configString(['Field', 'OutputField', 'FormulaFields.FormulaField.field']) ?? 'new_column';
    const lines = ['# Apply formula', `${v} = ${source}.copy()`];

    if (!expression) {
      lines.push('# TODO: Add formula expression', `${v}[${pyString(field)}] = None`);
      return fragment(lines, { needsManualCompletion: true });
    }
    // Field references resolve against the copy, not the source
    const translated = translateExpression(expression, v);
    lines.push(`${v}[${pyString(field)}] = ${translated.code}`);
    return fragment(lines, { imports: translated.imports });
  },
};

export const selectGenerator: ToolGenerator = {
  toolType: 'select',
  label: 'Select',
  generate: (ctx) => {
    const source = ctx.primarySource();
    if (!source) return noSourceFragment('Select');

    return fragment(
      [
        '# Select and configure fields',
        `${ctx.variable} = ${source}.copy()`,
        '# TODO: Apply field selections and type conversions',
      ],
      { needsManualCompletion: true }
    );
  },
};

export const sortGenerator: ToolGenerator = {
  toolType: 'sort',
  label: 'Sort',
  generate: (ctx) => {
    const source = ctx.primarySource();
    if (!source) return noSourceFragment('Sort');

    const v = ctx.variable;
    const field = ctx.configString(['SortInfo.Field.field', 'OrderFields.Field.field']);
    if (!field) {
      return fragment(
        [
          '# Sort data',
          '# TODO: Specify sort columns and order',
          `${v} = ${source}.sort_values('column_name', ascending=True)`,
        ],
        { needsManualCompletion: true }
      );
    }

    const order = ctx.configString(['SortInfo.Field.order', 'OrderFields.Field.order']) ?? '';
    const ascending = order.toLowerCase().startsWith('desc') ? 'False' : 'True';
    return fragment([
      '# Sort data',
      `${v} = ${source}.sort_values(${pyString(field)}, ascending=${ascending})`,
    ]);
  },
};

export const uniqueGenerator: ToolGenerator = {
  toolType: 'unique',
  label: 'Unique',
  generate: (ctx) => {
    const source = ctx.primarySource();
    if (!source) return noSourceFragment('Unique');

    const v = ctx.variable;
    return fragment([
      '# Remove duplicates',
      `${v} = ${source}.drop_duplicates()`,
      `print(f'Unique: {len(${v})} rows (from {len(${source})})')`,
    ]);
  },
};

export const sampleGenerator: ToolGenerator = {
  toolType: 'sample',
  label: 'Sample',
  generate: (ctx) => {
    const source = ctx.primarySource();
    if (!source) return noSourceFragment('Sample');

    const size = parseInteger(ctx.configString(['N']), DEFAULT_SAMPLE_SIZE);
    return fragment([
      '# Sample records',
      `${ctx.variable} = ${source}.sample(n=${size}, random_state=${ctx.settings.sampleSeed})`,
    ]);
  },
};

export const recordIdGenerator: ToolGenerator = {
  toolType: 'record_id',
  label: 'Record ID',
  generate: (ctx) => {
    const source = ctx.primarySource();
    if (!source) return noSourceFragment('Record ID');

    const v = ctx.variable;
    const field = ctx.configString(['FieldName']) ?? DEFAULT_RECORD_ID_FIELD;
    const start = parseInteger(ctx.configString(['StartValue']), 1);
    return fragment([
      '# Add record ID',
      `${v} = ${source}.copy()`,
      `${v}[${pyString(field)}] = range(${start}, len(${v}) + ${start})`,
    ]);
  },
};

/** Integers outside the safe range would print imprecisely (or as `1e+21`) */
function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || !/^-?\d+$/.test(value)) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : fallback;
}
