import * as path from 'path';
import { fileURLToPath } from 'url';

export const WORKFLOW_FIXTURES_DIR = fileURLToPath(new URL('../fixtures/workflows/', import.meta.url));

export const workflowFixture = (name: string): string => path.join(WORKFLOW_FIXTURES_DIR, name);

const RULE = '-'.repeat(60);

/** Script generated from simple-pipeline.yxmd with default options */
export const SIMPLE_PIPELINE_SCRIPT = [
  '"""',
  'Auto-generated pandas script from workflow document',
  'Workflow version: 2023.1',
  'Author: Test Author',
  'Description: Large sales, sorted',
  '"""',
  '',
  'import pandas as pd',
  '',
  '',
  'def main():',
  '    """Main workflow execution function"""',
  '',
  `    # ${RULE}`,
  '    # Read sales (Type: input_data, ID: 1)',
  `    # ${RULE}`,
  '    # Read input file: sales.csv',
  "    df_1 = pd.read_csv('sales.csv')",
  "    print(f'Loaded {len(df_1)} rows from sales.csv')",
  '',
  `    # ${RULE}`,
  '    # Large sales (Type: filter, ID: 2)',
  `    # ${RULE}`,
  '    # Apply filter',
  "    df_2 = df_1[df_1['Amount'] > 100]",
  "    print(f'Filter: {len(df_2)} rows (from {len(df_1)})')",
  '',
  `    # ${RULE}`,
  '    # Tool 3 (Type: sort, ID: 3)',
  `    # ${RULE}`,
  '    # Sort data',
  "    df_3 = df_2.sort_values('Amount', ascending=False)",
  '',
  `    # ${RULE}`,
  '    # Write results (Type: output_data, ID: 4)',
  `    # ${RULE}`,
  '    # Write output file: top_sales.csv',
  "    df_3.to_csv('top_sales.csv', index=False)",
  "    print(f'Wrote {len(df_3)} rows to top_sales.csv')",
  '',
  '    return True',
  '',
  '',
  "if __name__ == '__main__':",
  '    main()',
  '',
].join('\n');
