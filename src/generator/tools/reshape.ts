/**
 * Tools that change the shape of the data: aggregation, pivoting,
 * transposition and column splitting.
 */

import { PYTHON_IMPORTS } from '../../constants.js';
import { pyString, unescapeDelimiter } from '../code-utils.js';
import { fragment, noSourceFragment, type ToolGenerator } from '../fragment.js';

/** Workflow aggregation actions (lowercased) and their pandas names */
const AGGREGATIONS: Readonly<Record<string, string>> = {
  sum: 'sum',
  count: 'count',
  countdistinct: 'nunique',
  avg: 'mean',
  average: 'mean',
  min: 'min',
  max: 'max',
  first: 'first',
  last: 'last',
};

function toAggregation(action: string | undefined): string {
  const key = (action ?? 'sum').toLowerCase();
  return Object.prototype.hasOwnProperty.call(AGGREGATIONS, key) ? AGGREGATIONS[key] : key;
}

export const summarizeGenerator: ToolGenerator = {
  toolType: 'summarize',
  label: 'Summarize',
  generate: (ctx) => {
    const source = ctx.primarySource();
    if (!source) return noSourceFragment('Summarize');

    const v = ctx.variable;
    const i = ctx.settings.indent;
    const group = ctx.configString(['GroupBy.Field.field']);
    const value = ctx.configString(['Summarize.Field.field', 'SummarizeFields.SummarizeField.field']);

    if (!group || !value) {
      return fragment(
        [
          '# Summarize/Group by',
          '# TODO: Specify group by columns and aggregations',
          `${v} = ${source}.groupby('group_column').agg({`,
          `${i}'value_column': 'sum',`,
          `${i}'count_column': 'count'`,
          '}).reset_index()',
        ],
        { needsManualCompletion: true }
      );
    }

    const action = ctx.configString(['Summarize.Field.action', 'SummarizeFields.SummarizeField.action']);
    return fragment([
      '# Summarize/Group by',
      `${v} = ${source}.groupby(${pyString(group)}).agg({`,
      `${i}${pyString(value)}: ${pyString(toAggregation(action))}`,
      '}).reset_index()',
    ]);
  },
};

export const crossTabGenerator: ToolGenerator = {
  toolType: 'cross_tab',
  label: 'Cross Tab',
  generate: (ctx) => {
    const source = ctx.primarySource();
    if (!source) return noSourceFragment('Cross Tab');

    const v = ctx.variable;
    const i = ctx.settings.indent;
    const index = ctx.configString(['GroupFields.Field.field']);
    const columns = ctx.configString(['HeaderField.field']);
    const values = ctx.configString(['DataField.field']);
    const complete = Boolean(index && columns && values);
    const aggregation = toAggregation(ctx.configString(['Methods.Method.method']));

    const lines = ['# Create cross-tabulation'];
    if (!complete) lines.push('# TODO: Specify row, column, and value fields');
    lines.push(
      `${v} = pd.pivot_table(`,
      `${i}${source},`,
      `${i}values=${pyString(values ?? 'value_column')},`,
      `${i}index=${pyString(index ?? 'row_column')},`,
      `${i}columns=${pyString(columns ?? 'column_column')},`,
      `${i}aggfunc=${pyString(aggregation)}`,
      ').reset_index()'
    );
    return fragment(lines, {
      imports: [PYTHON_IMPORTS.PANDAS],
      needsManualCompletion: !complete,
    });
  },
};

export const transposeGenerator: ToolGenerator = {
  toolType: 'transpose',
  label: 'Transpose',
  generate: (ctx) => {
    const source = ctx.primarySource();
    if (!source) return noSourceFragment('Transpose');

    return fragment(['# Transpose data', `${ctx.variable} = ${source}.transpose()`]);
  },
};

export const textToColumnsGenerator: ToolGenerator = {
  toolType: 'text_to_columns',
  label: 'Text to Columns',
  generate: (ctx) => {
    const source = ctx.primarySource();
    if (!source) return noSourceFragment('Text to Columns');

    const v = ctx.variable;
    const delimiter = unescapeDelimiter(ctx.configString(['Delimiter', 'Delimeters.value']) ?? ',');
    const field = ctx.configString(['Field']);

    const lines = ['# Split text column', `${v} = ${source}.copy()`];
    if (!field) lines.push('# TODO: Specify column to split');
    lines.push(
      `split_cols = ${v}[${pyString(field ?? 'text_column')}].str.split(${pyString(delimiter)}, expand=True)`,
      `${v} = pd.concat([${v}, split_cols], axis=1)`
    );
    return fragment(lines, {
      imports: [PYTHON_IMPORTS.PANDAS],
      needsManualCompletion: !field,
    });
  },
};
