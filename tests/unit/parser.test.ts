/**
 * Tests for the workflow document parser
 */

import { describe, it, expect } from 'vitest';
import { parser } from '../../src/parser.js';
import { parseWorkflowDocument } from '../../src/api/parse.js';
import type { TWorkflowAST } from '../../src/ast/types.js';
import {
  ENGINE_PLUGIN,
  SIMPLE_PIPELINE,
  inputTool,
  workflowXml,
} from '../helpers/workflow-documents.js';

function parseOk(xml: string): { workflow: TWorkflowAST; warnings: Array<{ code: string; message: string }> } {
  const result = parser.parse(xml);
  if (!result.ok) {
    throw new Error(`expected a workflow, got: ${result.errors[0].message}`);
  }
  return result;
}

describe('WorkflowDocumentParser', () => {
  describe('metadata', () => {
    it('reads the version and MetaInfo fields', () => {
      const { workflow } = parseOk(
        workflowXml({ version: '2023.1', author: 'Test Author', description: 'Quarterly numbers', tools: [] })
      );
      expect(workflow.metadata).toEqual({
        version: '2023.1',
        author: 'Test Author',
        description: 'Quarterly numbers',
        creationDate: null,
      });
    });

    it('prefers the version attribute over yxmdVer', () => {
      const { workflow } = parseOk(
        '<AlteryxDocument version="10.0" yxmdVer="2023.1"><Nodes /></AlteryxDocument>'
      );
      expect(workflow.metadata.version).toBe('10.0');
    });

    it('falls back to Unknown without a version', () => {
      const { workflow } = parseOk('<AlteryxDocument />');
      expect(workflow.metadata.version).toBe('Unknown');
      expect(workflow.nodes).toEqual([]);
      expect(workflow.connections).toEqual([]);
    });

    it('reads the creation date and ignores blank fields', () => {
      const { workflow } = parseOk(
        '<AlteryxDocument><Properties><MetaInfo><Author>  </Author><CreationDate>2024-01-02</CreationDate></MetaInfo></Properties></AlteryxDocument>'
      );
      expect(workflow.metadata.author).toBeNull();
      expect(workflow.metadata.creationDate).toBe('2024-01-02');
    });
  });

  describe('nodes', () => {
    it('builds nodes in document order with resolved tool types', () => {
      const { workflow } = parseOk(workflowXml(SIMPLE_PIPELINE));
      expect(workflow.nodes.map((n) => [n.id, n.toolType])).toEqual([
        ['1', 'input_data'],
        ['2', 'filter'],
        ['3', 'output_data'],
      ]);
      expect(workflow.nodes[0].pluginRef).toBe(ENGINE_PLUGIN);
    });

    it('reads the macro, annotation and position', () => {
      const { workflow } = parseOk(
        workflowXml({
          tools: [
            {
              id: '7',
              plugin: '',
              macro: 'Cleanse.yxmc',
              annotation: 'Clean up names',
              position: { x: 54, y: 'abc' },
            },
          ],
        })
      );
      const [node] = workflow.nodes;
      expect(node.toolType).toBe('macro:Cleanse.yxmc');
      expect(node.macroRef).toBe('Cleanse.yxmc');
      expect(node.annotation).toBe('Clean up names');
      expect(node.guiPosition).toEqual({ x: 54, y: 0 });
    });

    it('leaves optional fields off when the document has none', () => {
      const { workflow } = parseOk('<AlteryxDocument><Nodes><Node ToolID="1" /></Nodes></AlteryxDocument>');
      expect(workflow.nodes).toEqual([
        { type: 'Node', id: '1', toolType: 'unknown', pluginRef: '', config: {} },
      ]);
    });

    it('skips nodes without a tool id', () => {
      const { workflow } = parseOk(
        '<AlteryxDocument><Nodes><Node /><Node ToolID=" " /><Node ToolID="2" /></Nodes></AlteryxDocument>'
      );
      expect(workflow.nodes.map((n) => n.id)).toEqual(['2']);
    });

    it('keeps the first of two nodes sharing an id and warns', () => {
      const { workflow, warnings } = parseOk(
        workflowXml({ tools: [inputTool('1', 'first.csv'), inputTool('1', 'second.csv')] })
      );
      expect(workflow.nodes).toHaveLength(1);
      expect(workflow.nodes[0].config).toEqual({ File: 'first.csv' });
      expect(warnings).toEqual([
        {
          type: 'warning',
          code: 'DUPLICATE_NODE_ID',
          message: 'Node id "1" appears more than once; only the first occurrence is kept',
          node: '1',
        },
      ]);
    });
  });

  describe('configuration', () => {
    it('maps elements, text, attributes and empty leaves', () => {
      const { workflow } = parseOk(
        workflowXml({
          tools: [
            {
              id: '1',
              plugin: ENGINE_PLUGIN,
              configuration:
                '<Mode> Custom </Mode><SortInfo><Field field="Amount" order="Descending" /></SortInfo><Empty /><Both a="1">text</Both>',
            },
          ],
        })
      );
      expect(workflow.nodes[0].config).toEqual({
        Mode: 'Custom',
        SortInfo: { Field: { field: 'Amount', order: 'Descending' } },
        Empty: null,
        Both: 'text',
      });
    });

    it('lets the last of same-named siblings win', () => {
      const { workflow } = parseOk(
        workflowXml({
          tools: [
            {
              id: '1',
              configuration: '<Fields><Field name="a" /><Field name="b" /></Fields><N>1</N><N>2</N>',
            },
          ],
        })
      );
      expect(workflow.nodes[0].config).toEqual({ Fields: { Field: { name: 'b' } }, N: '2' });
    });

    it('handles deeply nested configuration', () => {
      const depth = 500;
      const inner = `${'<L>'.repeat(depth)}leaf${'</L>'.repeat(depth)}`;
      const { workflow } = parseOk(workflowXml({ tools: [{ id: '1', configuration: inner }] }));

      let current = workflow.nodes[0].config.L;
      let levels = 1;
      while (current !== null && typeof current === 'object' && 'L' in current) {
        current = current.L;
        levels++;
      }
      expect(levels).toBe(depth);
      expect(current).toBe('leaf');
    });
  });

  describe('connections', () => {
    it('reads endpoints from ToolID attributes and ports from the Origin', () => {
      const { workflow } = parseOk(
        workflowXml({
          tools: [{ id: '1' }, { id: '2' }],
          connections: [{ from: '1', to: '2', originPort: 'True' }],
        })
      );
      expect(workflow.connections).toEqual([
        { type: 'Connection', sourceId: '1', destinationId: '2', portName: 'True' },
      ]);
    });

    it('prefers the connection name over the origin port', () => {
      const { workflow } = parseOk(
        workflowXml({
          tools: [{ id: '1' }, { id: '2' }],
          connections: [{ from: '1', to: '2', name: 'Left', originPort: 'Output' }],
        })
      );
      expect(workflow.connections[0].portName).toBe('Left');
    });

    it('reads endpoints from element text and defaults the port', () => {
      const { workflow } = parseOk(
        '<AlteryxDocument><Connections><Connection><Origin> 1 </Origin><Destination>2</Destination></Connection></Connections></AlteryxDocument>'
      );
      expect(workflow.connections).toEqual([
        { type: 'Connection', sourceId: '1', destinationId: '2', portName: 'Output' },
      ]);
    });

    it('drops connections missing an endpoint', () => {
      const { workflow } = parseOk(
        '<AlteryxDocument><Connections><Connection><Origin ToolID="1" /></Connection><Connection><Destination ToolID="2" /></Connection></Connections></AlteryxDocument>'
      );
      expect(workflow.connections).toEqual([]);
    });

    it('keeps connections to unknown nodes', () => {
      const { workflow } = parseOk(
        workflowXml({ tools: [{ id: '1' }], connections: [{ from: '1', to: '99' }] })
      );
      expect(workflow.connections.map((c) => c.destinationId)).toEqual(['99']);
    });
  });

  describe('malformed documents', () => {
    it('returns the load error instead of throwing', () => {
      const result = parseWorkflowDocument('<AlteryxDocument><Nodes></AlteryxDocument>');
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].code).toBe('DOCUMENT_MALFORMED');
    });
  });
});
