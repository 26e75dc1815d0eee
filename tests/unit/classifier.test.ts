import { classifyToolType, isMacroToolType } from '../../src/classifier.js';
import type { TConfigMap } from '../../src/ast/types.js';

const ENGINE = 'AlteryxBasePluginsEngine.dll';

const engine = (config: TConfigMap) => classifyToolType({ pluginRef: ENGINE, config });

describe('classifyToolType', () => {
  describe('file tools', () => {
    it('treats a File key as an input', () => {
      expect(engine({ File: 'sales.csv' })).toBe('input_data');
    });

    it('treats File plus FileName_Out as an output', () => {
      expect(engine({ File: 'out.csv', FileName_Out: 'out.csv' })).toBe('output_data');
    });

    it('treats File plus any key containing "output" as an output', () => {
      expect(engine({ File: 'out.csv', OutputMode: 'Overwrite' })).toBe('output_data');
    });

    it('checks the File key before any engine marker', () => {
      expect(engine({ File: 'in.csv', Mode: 'Filter' })).toBe('input_data');
    });

    it('applies to plugins outside both families', () => {
      expect(classifyToolType({ pluginRef: '', config: { File: 'in.csv' } })).toBe('input_data');
    });

    it('only looks at the top-level File key', () => {
      expect(engine({ Source: { File: 'nested.csv' } })).toBe('unknown');
    });
  });

  describe('engine markers', () => {
    it.each<[TConfigMap, string]>([
      [{ Mode: 'Filter', Expression: '[A] > 1' }, 'filter'],
      [{ JoinInfo: { Field: { field: 'Id' } } }, 'join'],
      [{ SortInfo: { Field: { field: 'Amount', order: 'Descending' } } }, 'sort'],
      [{ Summarize: { Field: { field: 'Amount', action: 'Sum' } } }, 'summarize'],
      [{ GroupBy: { Field: { field: 'Region' } } }, 'summarize'],
      [{ FormulaFields: { FormulaField: { field: 'Total', expression: '[A] * 2' } } }, 'formula'],
      [{ SelectFields: { SelectField: { field: 'A', selected: 'True' } } }, 'select'],
      [{ UniqueFields: { Field: { field: 'Id' } } }, 'unique'],
      [{ Mode: 'Sample', N: '5' }, 'sample'],
      [{ FieldName: 'RecordID', StartValue: '1' }, 'record_id'],
    ])('classifies %j', (config, expected) => {
      expect(engine(config)).toBe(expected);
    });

    it('matches markers case-insensitively in keys and values', () => {
      expect(engine({ Mode: 'FILTER' })).toBe('filter');
      expect(engine({ note: 'unique rows' })).toBe('unique');
    });

    it('resolves a config with several markers to the earliest rule', () => {
      // A formula whose output field mentions sorting is taken for a sort
      const config = { FormulaFields: { FormulaField: { field: 'SortKey', expression: '[A]' } } };
      expect(engine(config)).toBe('sort');
    });

    it('falls back to unknown when nothing matches', () => {
      expect(engine({ Mode: 'Custom' })).toBe('unknown');
    });
  });

  describe('gui plugins', () => {
    it('detects browse tools by plugin name', () => {
      expect(
        classifyToolType({ pluginRef: 'AlteryxBasePluginsGui.BrowseV2.BrowseV2', config: {} })
      ).toBe('browse');
    });

    it('detects text input tools by plugin name', () => {
      expect(
        classifyToolType({ pluginRef: 'AlteryxBasePluginsGui.TextInput.TextInput', config: {} })
      ).toBe('text_input');
    });

    it('does not search the config of gui plugins', () => {
      expect(classifyToolType({ pluginRef: 'AlteryxBasePluginsGui.Other', config: { Mode: 'Filter' } })).toBe(
        'unknown'
      );
    });
  });

  describe('macros', () => {
    it('uses the macro name when no other rule applies', () => {
      expect(classifyToolType({ pluginRef: '', macroRef: 'Cleanse.yxmc', config: {} })).toBe(
        'macro:Cleanse.yxmc'
      );
    });

    it('prefers an engine marker over the macro', () => {
      expect(classifyToolType({ pluginRef: ENGINE, macroRef: 'm.yxmc', config: { Mode: 'Sample' } })).toBe(
        'sample'
      );
    });

    it('is used for engine plugins without a marker', () => {
      expect(classifyToolType({ pluginRef: ENGINE, macroRef: 'm.yxmc', config: {} })).toBe('macro:m.yxmc');
    });
  });

  it('returns unknown for an empty signature', () => {
    expect(classifyToolType({ pluginRef: '', config: {} })).toBe('unknown');
  });
});

describe('isMacroToolType', () => {
  it('recognizes the macro prefix', () => {
    expect(isMacroToolType('macro:x.yxmc')).toBe(true);
    expect(isMacroToolType('filter')).toBe(false);
    expect(isMacroToolType('unknown')).toBe(false);
  });
});
