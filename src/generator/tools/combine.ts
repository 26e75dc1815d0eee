/**
 * Multi-input tools. Sources arrive in connection order; a join treats the
 * first two as left and right.
 */

import { PYTHON_IMPORTS } from '../../constants.js';
import { pyString } from '../code-utils.js';
import { fragment, noSourceFragment, type ToolGenerator } from '../fragment.js';

export const joinGenerator: ToolGenerator = {
  toolType: 'join',
  label: 'Join',
  generate: (ctx) => {
    const sources = ctx.allSources();
    if (sources.length < 2) {
      return fragment(['# Join tool: Insufficient source data'], { needsManualCompletion: true });
    }

    const [left, right] = sources;
    const v = ctx.variable;
    const i = ctx.settings.indent;
    const how = (ctx.configString(['JoinType']) ?? 'inner').toLowerCase();
    return fragment(
      [
        '# Join two datasets',
        '# TODO: Specify join keys',
        `${v} = pd.merge(`,
        `${i}${left},`,
        `${i}${right},`,
        `${i}on='key_column',  # Specify join column(s)`,
        `${i}how=${pyString(how)}`,
        ')',
        `print(f'Join: {len(${v})} rows')`,
      ],
      { imports: [PYTHON_IMPORTS.PANDAS], needsManualCompletion: true }
    );
  },
};

export const unionGenerator: ToolGenerator = {
  toolType: 'union',
  label: 'Union',
  generate: (ctx) => {
    const sources = ctx.allSources();
    if (sources.length === 0) return noSourceFragment('Union');

    const v = ctx.variable;
    const rows = `print(f'Union: {len(${v})} rows')`;
    if (sources.length === 1) {
      return fragment(['# Union multiple datasets', `${v} = ${sources[0]}.copy()`, rows]);
    }
    return fragment(
      [
        '# Union multiple datasets',
        `${v} = pd.concat([${sources.join(', ')}], ignore_index=True)`,
        rows,
      ],
      { imports: [PYTHON_IMPORTS.PANDAS] }
    );
  },
};
