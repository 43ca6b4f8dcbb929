import { describe, it, expect } from 'vitest';
import {
  cleanPDFText,
  joinCells,
  normalizeNumericTokens,
  splitParagraphs,
  tokenize,
} from './text';

describe('tokenize', () => {
  it('lower-cases and splits on non-alphanumeric boundaries', () => {
    expect(tokenize('Revenue increased to $5M in Q1')).toEqual([
      'revenue',
      'increased',
      'to',
      '5m',
      'in',
      'q1',
    ]);
  });

  it('keeps grouped numbers as one term', () => {
    expect(tokenize('Total: 1,234,567.89')).toEqual(['total', '1234567', '89']);
  });

  it('keeps accented letters inside terms', () => {
    expect(tokenize('Bénéfice net')).toEqual(['bénéfice', 'net']);
  });

  it('returns nothing for punctuation only', () => {
    expect(tokenize(' -- ?! ')).toEqual([]);
  });
});

describe('normalizeNumericTokens', () => {
  it('only removes commas between digits', () => {
    expect(normalizeNumericTokens('a, b 1,000 and 2, 3')).toBe(
      'a, b 1000 and 2, 3'
    );
  });
});

describe('cleanPDFText', () => {
  it('strips page furniture and collapses spacing', () => {
    const raw = 'Income   Statement\r\nRevenue 5,000\n\n\n\nPage 2 of 9\n____\n- 2 -';
    expect(cleanPDFText(raw)).toBe('Income Statement\nRevenue 5,000');
  });

  it('joins words hyphenated across lines', () => {
    expect(cleanPDFText('year-\nend close')).toBe('yearend close');
  });

  it('keeps standalone figures', () => {
    expect(cleanPDFText('Net income\n42')).toBe('Net income\n42');
  });
});

describe('splitParagraphs', () => {
  it('splits on blank lines and drops empty paragraphs', () => {
    expect(splitParagraphs('First line\nsecond line\n\n  \n\nNext')).toEqual([
      'First line\nsecond line',
      'Next',
    ]);
  });
});

describe('joinCells', () => {
  it('joins non-empty cells with the delimiter', () => {
    expect(joinCells(['Revenue', null, ' 5,000 ', '', undefined])).toBe(
      'Revenue | 5,000'
    );
  });

  it('renders an all-empty row as an empty string', () => {
    expect(joinCells(['', '  ', null])).toBe('');
  });
});
