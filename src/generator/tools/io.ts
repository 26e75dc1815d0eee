/**
 * Tools that touch the outside world: reading, writing and previewing data.
 */

import { PYTHON_IMPORTS, type TPythonImport } from '../../constants.js';
import { fileExtension, pyFStringText, pyString, unescapeDelimiter } from '../code-utils.js';
import { commentText, fragment, noSourceFragment, type ToolGenerator } from '../fragment.js';

const EXCEL_EXTENSIONS = new Set(['xlsx', 'xls']);

export const inputDataGenerator: ToolGenerator = {
  toolType: 'input_data',
  label: 'Input',
  generate: (ctx) => {
    const file = ctx.configString(['File', 'FileName']) ?? 'input.csv';
    const v = ctx.variable;
    const imports: TPythonImport[] = [PYTHON_IMPORTS.PANDAS];
    const lines = [`# Read input file: ${commentText(file)}`];

    const extension = fileExtension(file);
    if (extension === 'csv') {
      lines.push(`${v} = pd.read_csv(${pyString(file)})`);
    } else if (EXCEL_EXTENSIONS.has(extension)) {
      imports.push(PYTHON_IMPORTS.OPENPYXL);
      lines.push(`${v} = pd.read_excel(${pyString(file)})`);
    } else if (extension === 'txt') {
      const delimiter = unescapeDelimiter(ctx.configString(['Delimeter', 'Delimiter']) ?? '\\t');
      lines.push(`${v} = pd.read_csv(${pyString(file)}, delimiter=${pyString(delimiter)})`);
    } else {
      lines.push(`${v} = pd.read_csv(${pyString(file)})  # Adjust read method as needed`);
    }
    lines.push(`print(f'Loaded {len(${v})} rows from ${pyFStringText(file)}')`);

    return fragment(lines, { imports, reads: file });
  },
};

export const outputDataGenerator: ToolGenerator = {
  toolType: 'output_data',
  label: 'Output',
  generate: (ctx) => {
    const source = ctx.primarySource();
    if (!source) return noSourceFragment('Output');

    const file = ctx.configString(['File', 'FileName_Out']) ?? 'output.csv';
    const imports: TPythonImport[] = [];
    const lines = [`# Write output file: ${commentText(file)}`];

    if (EXCEL_EXTENSIONS.has(fileExtension(file))) {
      imports.push(PYTHON_IMPORTS.OPENPYXL);
      lines.push(`${source}.to_excel(${pyString(file)}, index=False)`);
    } else {
      lines.push(`${source}.to_csv(${pyString(file)}, index=False)`);
    }
    lines.push(`print(f'Wrote {len(${source})} rows to ${pyFStringText(file)}')`);

    return fragment(lines, { imports, writes: file });
  },
};

export const browseGenerator: ToolGenerator = {
  toolType: 'browse',
  label: 'Browse',
  generate: (ctx) => {
    const source = ctx.primarySource();
    if (!source) return noSourceFragment('Browse');

    const rows = ctx.settings.previewRows;
    return fragment([
      '# Display data (Browse equivalent)',
      `print(f'\\nBrowse - First ${rows} rows:')`,
      `print(${source}.head(${rows}))`,
      `print(f'\\nShape: {${source}.shape}')`,
    ]);
  },
};
