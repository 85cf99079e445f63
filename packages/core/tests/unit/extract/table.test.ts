import { describe, expect, it } from 'vitest';
import { describe as describeColumn, numericColumns, quantile, renderSummary } from '../../../src/extract/statistics.js';
import { formatCell, renderTable } from '../../../src/extract/table.js';

describe('formatCell', () => {
  it('formats each cell type', () => {
    expect(formatCell(null)).toBe('NaN');
    expect(formatCell(true)).toBe('True');
    expect(formatCell(false)).toBe('False');
    expect(formatCell(2.5)).toBe('2.5');
    expect(formatCell('text')).toBe('text');
  });
});

describe('renderTable', () => {
  it('right-aligns columns with a leading index', () => {
    const table = renderTable({
      columns: ['Item', 'Qty'],
      index: ['0', '1'],
      rows: [
        ['Pen', 3],
        ['Ink', 12],
      ],
    });
    expect(table.split('\n')).toEqual(['   Item  Qty', '0   Pen    3', '1   Ink   12']);
  });

  it('left-aligns the index when asked', () => {
    const table = renderTable({
      columns: ['v'],
      index: ['a', 'bbb'],
      rows: [[1], [2]],
      indexAlign: 'left',
    });
    expect(table.split('\n')).toEqual(['     v', 'a    1', 'bbb  2']);
  });

  it('renders tables with hundreds of thousands of rows', () => {
    const count = 300_000;
    const table = renderTable({
      columns: ['n'],
      index: Array.from({ length: count }, (_, i) => String(i)),
      rows: Array.from({ length: count }, (_, i) => [i]),
    });

    const lines = table.split('\n');
    expect(lines).toHaveLength(count + 1);
    expect(lines[0]).toBe(`${' '.repeat(6)}       n`);
    expect(lines[count]).toBe('299999  299999');
  });
});

describe('statistics', () => {
  it('interpolates quantiles linearly', () => {
    expect(quantile([1, 2, 3, 4], 0.25)).toBe(1.75);
    expect(quantile([1, 2, 3, 4], 0.5)).toBe(2.5);
    expect(quantile([1, 2, 3, 4], 0.75)).toBe(3.25);
    expect(Number.isNaN(quantile([], 0.5))).toBe(true);
  });

  it('describes a column with the sample standard deviation', () => {
    const summary = describeColumn([4, 1, 3, 2]);
    expect(summary.count).toBe(4);
    expect(summary.mean).toBe(2.5);
    expect(summary.std.toFixed(6)).toBe('1.290994');
    expect(summary.min).toBe(1);
    expect(summary.max).toBe(4);
    expect(summary['25%']).toBe(1.75);
    expect(summary['75%']).toBe(3.25);
  });

  it('leaves std undefined for a single value', () => {
    expect(Number.isNaN(describeColumn([7]).std)).toBe(true);
  });

  it('finds columns that only hold numbers', () => {
    const rows = [
      ['a', 1, null, 2],
      ['b', 2, null, 'x'],
    ];
    expect(numericColumns(rows, 4)).toEqual([1]);
  });

  it('renders the summary table', () => {
    const lines = renderSummary(['Qty'], [describeColumn([3, 12])]).split('\n');
    expect(lines).toEqual([
      `${' '.repeat(13)}Qty`,
      'count   2.000000',
      'mean    7.500000',
      'std     6.363961',
      'min     3.000000',
      '25%     5.250000',
      '50%     7.500000',
      '75%     9.750000',
      'max    12.000000',
    ]);
  });

  it('shows undefined statistics as NaN', () => {
    const lines = renderSummary(['n'], [describeColumn([5])]).split('\n');
    expect(lines[3]).toBe('std         NaN');
  });
});
