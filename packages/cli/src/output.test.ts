import { describe, it, expect } from 'vitest';
import { parseFormat, render, renderTable } from './output.js';

describe('output', () => {
  describe('parseFormat', () => {
    it('falls back when no format is given', () => {
      expect(parseFormat(undefined, 'yaml')).toBe('yaml');
    });

    it('accepts any casing', () => {
      expect(parseFormat(' JSON ', 'table')).toBe('json');
    });

    it('rejects unknown formats', () => {
      expect(() => parseFormat('xml', 'table')).toThrow('Unknown format "xml". Use one of: json, yaml, table');
    });
  });

  describe('renderTable', () => {
    it('pads columns to the widest cell', () => {
      const table = renderTable(
        [
          { id: 'node', label: 'Content', extra: 'ignored' },
          { id: 'user', label: 'User' },
        ],
        [
          { key: 'id', label: 'ID' },
          { key: 'label', label: 'Label' },
        ]
      );

      expect(table).toBe(['ID    Label', '────  ───────', 'node  Content', 'user  User'].join('\n'));
    });

    it('derives columns from the first row', () => {
      expect(renderTable([{ a: 1, b: true }])).toBe(['a  b', '─  ────', '1  true'].join('\n'));
    });

    it('shows missing values as blanks and objects as JSON', () => {
      const table = renderTable([{ id: 'x', value: null, data: { n: 1 } }]);
      expect(table.split('\n')[2]).toBe('x          {"n":1}');
    });

    it('reports empty results', () => {
      expect(renderTable([])).toBe('(no results)');
    });
  });

  describe('render', () => {
    it('prints JSON with two-space indentation', () => {
      expect(render({ id: 'node' }, 'json')).toBe('{\n  "id": "node"\n}');
    });

    it('prints YAML without a trailing newline', () => {
      expect(render([{ id: 'node' }], 'yaml')).toBe('- id: node');
    });

    it('wraps a single object into a one-row table', () => {
      expect(render({ id: 'node' }, 'table')).toBe(['id', '────', 'node'].join('\n'));
    });
  });
});
