import { describe, it, expect } from 'vitest';
import { parseCSV } from './csvs';

describe('parseCSV', () => {
  it('parses quoted fields with commas, quotes and newlines', () => {
    const rows = parseCSV('Item,Amount\n"Revenue, net","5,000"\n"Note ""A""","multi\nline"\n');
    expect(rows).toEqual([
      { rowNumber: 1, cells: ['Item', 'Amount'] },
      { rowNumber: 2, cells: ['Revenue, net', '5,000'] },
      { rowNumber: 3, cells: ['Note "A"', 'multi\nline'] },
    ]);
  });

  it('skips blank records but keeps their numbering', () => {
    const rows = parseCSV('a,b\r\n\r\n,\r\nc,d');
    expect(rows).toEqual([
      { rowNumber: 1, cells: ['a', 'b'] },
      { rowNumber: 4, cells: ['c', 'd'] },
    ]);
  });

  it('returns no rows for empty content', () => {
    expect(parseCSV('')).toEqual([]);
  });
});
