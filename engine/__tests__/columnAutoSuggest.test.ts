import { listLookupColumns, scoreNormalizedHeaders, suggestColumns } from '../columnAutoSuggest';
import { tableOf } from './helpers';

describe('scoreNormalizedHeaders', () => {
  test('exact match scores 1', () => {
    expect(scoreNormalizedHeaders('PART NUMBER', 'PART NUMBER')).toBe(1);
  });

  test('containment scores 0.6 plus a length-ratio bonus', () => {
    expect(scoreNormalizedHeaders('PN', 'PN CODE')).toBeCloseTo(0.6 + 0.3 * (2 / 7));
  });

  test('token overlap is 0.9 × Jaccard', () => {
    expect(scoreNormalizedHeaders('PART NO', 'PART NUMBER')).toBeCloseTo(0.3);
  });

  test('empty side scores 0', () => {
    expect(scoreNormalizedHeaders('', 'PN')).toBe(0);
    expect(scoreNormalizedHeaders('PN', '')).toBe(0);
  });
});

describe('suggestColumns', () => {
  test('ranks candidates highest first and keeps input order for ties', () => {
    const result = suggestColumns('Part Number', ['Description', 'PART_NUMBER', 'Part No', 'Qty']);

    expect(result.map((s) => s.candidate)).toEqual(['PART_NUMBER', 'Part No', 'Description', 'Qty']);
    expect(result[0].score).toBe(1);
    expect(result[1].score).toBeCloseTo(0.3);
    expect(result[2].score).toBe(0);
    expect(result[3].score).toBe(0);
  });

  test('every score is within [0, 1]', () => {
    const result = suggestColumns('pn', ['PN', 'pn code', 'x pn y', 'item', '']);
    for (const s of result) {
      expect(s.score).toBeGreaterThanOrEqual(0);
      expect(s.score).toBeLessThanOrEqual(1);
    }
  });

  test('empty candidate list gives no suggestions', () => {
    expect(suggestColumns('PN', [])).toEqual([]);
  });

  test('limit keeps the top N', () => {
    const result = suggestColumns('PN', ['DESC', 'PN', 'PN CODE'], { limit: 2 });
    expect(result.map((s) => s.candidate)).toEqual(['PN', 'PN CODE']);
  });

  test('a target made only of punctuation matches nothing', () => {
    const result = suggestColumns('---', ['PN', 'DESC']);
    expect(result).toEqual([
      { candidate: 'PN', score: 0 },
      { candidate: 'DESC', score: 0 }
    ]);
  });
});

describe('listLookupColumns', () => {
  test('skips the key position and stops at the range end', () => {
    const columns = ['KEY', ...Array.from({ length: 25 }, (_, i) => `C${i + 1}`)];
    const table = tableOf(columns, []);

    const result = listLookupColumns(table);
    expect(result).toHaveLength(21);
    expect(result[0]).toBe('C1');
    expect(result[20]).toBe('C21');
  });

  test('narrow tables return what exists', () => {
    const table = tableOf(['A', 'B', 'C'], []);
    expect(listLookupColumns(table)).toEqual(['B', 'C']);
    expect(listLookupColumns(table, { start: 0, end: 2 })).toEqual(['A', 'B']);
  });
});
