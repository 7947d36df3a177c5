import { describe, it, expect } from 'vitest';
import { parseDescriptor } from '../descriptor_parse.js';
import { ParseError } from '../errors.js';
import { buildParameterGrid, compareKeys, snapToGranularity } from '../grid.js';
import { loadTable } from '../table_load.js';
import { baseDoc } from './helpers/descriptors.js';

const twoAxis = parseDescriptor(
  baseDoc({
    columns: [{ name: 'ms' }, { name: 'mg' }, { name: 'xsec' }],
    parameters: [
      { column: 'ms', granularity: 50 },
      { column: 'mg', granularity: 50 },
    ],
    values: [{ column: 'xsec' }],
  })
);

function gridOf(content: string, duplicateKeys?: 'last-wins' | 'error') {
  const { table } = loadTable(twoAxis, content);
  return buildParameterGrid(table, twoAxis.parameters, duplicateKeys ? { duplicateKeys } : {});
}

describe('snapToGranularity', () => {
  it('should round to the nearest multiple', () => {
    expect(snapToGranularity(299.6, 1)).toBe(300);
    expect(snapToGranularity(1234, 50)).toBe(1250);
    expect(snapToGranularity(1224, 50)).toBe(1200);
  });

  it('should produce the same key for values equal up to round-off', () => {
    expect(snapToGranularity(0.1 * 3, 0.1)).toBe(0.3);
    expect(snapToGranularity(0.3, 0.1)).toBe(0.3);
  });

  it('should leave values alone without granularity', () => {
    expect(snapToGranularity(7.3, null)).toBe(7.3);
  });

  it('should never produce negative zero', () => {
    expect(Object.is(snapToGranularity(-0.2, 1), 0)).toBe(true);
  });
});

describe('compareKeys', () => {
  it('should order keys lexicographically by axis', () => {
    expect(compareKeys([1000, 1100], [1100, 1000])).toBeLessThan(0);
    expect(compareKeys([1000, 1100], [1000, 1000])).toBeGreaterThan(0);
    expect(compareKeys([1000, 1000], [1000, 1000])).toBe(0);
  });
});

describe('buildParameterGrid', () => {
  it('should list keys in ascending parameter order', () => {
    const { grid, messages } = gridOf('1100 1000 3\n1000 1100 2\n1000 1000 1\n');
    expect(messages).toEqual([]);
    expect(grid.keys()).toEqual([
      [1000, 1000],
      [1000, 1100],
      [1100, 1000],
    ]);
    expect(grid.size).toBe(3);
  });

  it('should expose sorted distinct values per axis', () => {
    const { grid } = gridOf('1100 1000 3\n1000 1100 2\n1000 1000 1\n');
    expect(grid.axisValues(0)).toEqual([1000, 1100]);
    expect(grid.axisValues(1)).toEqual([1000, 1100]);
    expect(() => grid.axisValues(2)).toThrow('axisValues: no axis 2');
  });

  it('should look rows up by exact key', () => {
    const { grid } = gridOf('1000 1000 1\n1000 1100 2\n');
    expect(grid.get([1000, 1100])?.xsec).toBe(2);
    expect(grid.has([1000, 1100])).toBe(true);
    expect(grid.get([1100, 1100])).toBeUndefined();
    expect(grid.keyOf([1010, 1090])).toEqual([1000, 1100]);
  });

  it('should keep the later row when two rows round to the same key', () => {
    const { grid, messages } = gridOf('1010 1000 1\n990 1000 2\n');
    expect(grid.size).toBe(1);
    expect(grid.get([1000, 1000])?.xsec).toBe(2);
    expect(messages).toEqual([
      {
        severity: 'info',
        code: 'XS_GRID_DUPLICATE_KEY',
        message: 'Row 1 replaces row 0 at (1000, 1000)',
        line: 2,
      },
    ]);
  });

  it('should reject duplicate keys in error mode', () => {
    let caught: unknown;
    try {
      gridOf('1010 1000 1\n990 1000 2\n', 'error');
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ParseError);
    if (!(caught instanceof ParseError)) return;
    expect(caught.code).toBe('XS_GRID_DUPLICATE_KEY');
    expect(caught.rowIndex).toBe(1);
  });

  it('should reject non-numeric parameter fields', () => {
    const labelled = parseDescriptor(
      baseDoc({
        columns: [{ name: 'process' }, { name: 'xsec' }],
        parameters: [{ column: 'process' }],
        values: [{ column: 'xsec' }],
      })
    );
    const { table } = loadTable(labelled, 'n1n2 1.5\n');
    expect(() => buildParameterGrid(table, labelled.parameters)).toThrow('Row 0: parameter process is not numeric: n1n2');
  });

  it('should map values while keeping keys', () => {
    const { grid } = gridOf('1000 1000 1\n1000 1100 2\n');
    const doubled = grid.map((row) => Number(row.xsec) * 2);
    expect(doubled.entries()).toEqual([
      [[1000, 1000], 2],
      [[1000, 1100], 4],
    ]);
  });
});
