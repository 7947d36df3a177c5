import { describe, it, expect } from 'vitest';
import { loadDataset, loadDatasetFiles } from '../dataset.js';
import { parseDescriptor } from '../descriptor_parse.js';
import { NotFoundError, OutOfRangeError, QueryInputError, SchemaError, UncertaintyConfigError } from '../errors.js';
import { baseDoc, fixturePath } from './helpers/descriptors.js';

const neutralino = () =>
  loadDatasetFiles(fixturePath('degenerate_neutralino.json'), fixturePath('degenerate_neutralino.txt'));
const squarkGluino = () => loadDatasetFiles(fixturePath('squark_gluino.yaml'), fixturePath('squark_gluino.csv'));

describe('loadDatasetFiles', () => {
  it('should answer exact queries by default', () => {
    const handle = neutralino();
    const r = handle.query(0, [300]);
    expect(r.centralValue).toBe(12.4);
    expect(r.lowerUncertainty).toBeCloseTo(0.62, 10);
    expect(r.upperUncertainty).toBeCloseTo(0.723, 3);
    expect(() => handle.query(0, [325])).toThrow(NotFoundError);
  });

  it('should interpolate when asked', () => {
    expect(neutralino().query(0, [325], 'linear').centralValue).toBeCloseTo(10.5, 10);
  });

  it('should read a YAML descriptor with a comma-separated table', () => {
    const handle = squarkGluino();
    expect(handle.table.rows).toHaveLength(4);
    expect(handle.grid.keys()).toEqual([
      [1000, 1000],
      [1000, 1100],
      [1100, 1000],
      [1100, 1100],
    ]);

    const lo = handle.query(0, [1000, 1100]);
    expect(lo.centralValue).toBe(0.15);
    expect(lo.lowerUncertainty).toBe(0);
    expect(lo.upperUncertainty).toBe(0);
    expect(lo.attributes.order).toBe('LO');
  });

  it('should route signed scale shifts and add the pdf band in quadrature', () => {
    const r = squarkGluino().query(1, { ms: 1000, mg: 1000 });
    expect(r.centralValue).toBe(0.3);
    expect(r.upperUncertainty).toBeCloseTo(Math.hypot(0.04, 0.02), 12);
    expect(r.lowerUncertainty).toBeCloseTo(Math.hypot(0.03, 0.02), 12);
    expect(r.unit).toBe('pb');
    expect(r.attributes.order).toBe('NLO');
    expect(r.attributes.processes).toEqual(['pp > go sq', 'pp > go sq~']);
  });

  it('should interpolate in two dimensions', () => {
    const r = squarkGluino().query(1, [1050, 1050], 'linear');
    const uppers = [Math.hypot(0.04, 0.02), Math.hypot(0.03, 0.01), Math.hypot(0.025, 0.01), Math.hypot(0.02, 0.01)];
    const lowers = [Math.hypot(0.03, 0.02), Math.hypot(0.02, 0.01), Math.hypot(0.02, 0.01), Math.hypot(0.01, 0.01)];
    const mean = (xs: number[]) => xs.reduce((a, b) => a + b, 0) / xs.length;
    expect(r.centralValue).toBeCloseTo(0.2075, 12);
    expect(r.upperUncertainty).toBeCloseTo(mean(uppers), 12);
    expect(r.lowerUncertainty).toBeCloseTo(mean(lowers), 12);
    expect(r.gridKey).toEqual([1050, 1050]);
  });

  it('should list value specifications with their attributes', () => {
    const specs = squarkGluino().valueSpecs();
    expect(specs.map((s) => s.column)).toEqual(['xsec_lo', 'xsec_nlo']);
    expect(specs.map((s) => s.attributes.order)).toEqual(['LO', 'NLO']);
    expect(specs.map((s) => s.unit)).toEqual(['pb', 'pb']);
    expect(specs.every((s) => s.error === undefined)).toBe(true);
  });

  it('should carry descriptor warnings into the handle messages', () => {
    expect(squarkGluino().messages).toEqual([
      {
        severity: 'warning',
        code: 'XS_SCHEMA_VALUE_NO_UNCERTAINTY',
        message: 'Value xsec_lo lacks uncertainties',
        field: 'values[0]',
      },
    ]);
  });
});

describe('loadDataset', () => {
  it('should report query failures through tryQuery', () => {
    const handle = squarkGluino();
    const miss = handle.tryQuery(1, [2000, 1000], 'linear');
    expect(miss.ok).toBe(false);
    if (miss.ok) return;
    expect(miss.error).toBeInstanceOf(OutOfRangeError);

    const hit = handle.tryQuery(1, [1000, 1000]);
    expect(hit.ok).toBe(true);
    if (!hit.ok) return;
    expect(hit.record.centralValue).toBe(0.3);
  });

  it('should reject unknown value specification indexes', () => {
    expect(() => neutralino().query(5, [300])).toThrow('No value specification at index 5');
    expect(() => neutralino().query(-1, [300])).toThrow(QueryInputError);
  });

  it('should keep other value specifications usable when one is misconfigured', () => {
    const d = parseDescriptor(
      baseDoc({
        columns: [{ name: 'mass' }, { name: 'xsec', unit: 'fb' }, { name: 'unc' }, { name: 'label' }],
        values: [
          { column: 'xsec', unc: [{ column: 'unc', type: 'relative' }] },
          { column: 'label', unc: [{ column: 'unc', type: 'relative' }] },
        ],
      })
    );
    const handle = loadDataset(d, '300 12.4 5 a\n');

    expect(handle.query(0, [300]).centralValue).toBe(12.4);
    expect(() => handle.query(1, [300])).toThrow(UncertaintyConfigError);
    const failed = handle.tryQuery(1, [300]);
    expect(failed.ok).toBe(false);

    const specs = handle.valueSpecs();
    expect(specs[0]?.error).toBeUndefined();
    expect(specs[1]?.error).toBeInstanceOf(UncertaintyConfigError);
    expect(handle.messages.map((m) => [m.severity, m.code, m.field])).toEqual([
      ['error', 'XS_UNCERTAINTY_CONFIG', 'values[1]'],
    ]);
  });

  it('should count rows skipped in lenient mode', () => {
    const d = parseDescriptor(baseDoc());
    const handle = loadDataset(d, '300 12.4 5\n400 4.8\n', { onMalformedRow: 'skip' });
    expect(handle.skippedRows).toBe(1);
    expect(handle.grid.size).toBe(1);
  });

  it('should apply default query options from load time', () => {
    const d = parseDescriptor(baseDoc());
    const handle = loadDataset(d, '400 4.8 5\n500 2.0 5\n', { query: { allowExtrapolation: true } });
    expect(handle.query(0, [600], 'linear').centralValue).toBeCloseTo(-0.8, 10);
    expect(() => handle.query(0, [600], 'linear', { allowExtrapolation: false })).toThrow(OutOfRangeError);
  });

  it('should accept a raw descriptor document and keep its warnings', () => {
    const handle = loadDataset(baseDoc({ values: [{ column: 'xsec' }] }), '300 12.4 5\n');
    expect(handle.query(0, [300]).centralValue).toBe(12.4);
    expect(handle.messages.map((m) => m.code)).toEqual(['XS_SCHEMA_VALUE_NO_UNCERTAINTY']);
  });

  it('should reject an invalid raw descriptor document', () => {
    expect(() => loadDataset(baseDoc({ parameters: [] }), '300 12.4 5\n')).toThrow(SchemaError);
  });

  it('should freeze the handle', () => {
    expect(Object.isFrozen(neutralino())).toBe(true);
  });
});
