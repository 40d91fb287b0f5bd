import { lookupTable } from '../lookupEngine';
import { applyLookupToMaster } from '../masterUpdate';
import { snapshot, tableOf } from './helpers';

describe('applyLookupToMaster', () => {
  const master = tableOf(
    ['PN', 'DESC', 'QTY'],
    [['A 1', 'Wire', 1], ['Z 1', 'x', null], ['Z 1', 'y', null]]
  );
  const target = tableOf(
    ['PN', 'DESC', 'NOTE'],
    [
      ['a-1', 'Wire', null],
      ['N 7', 'New', 'n'],
      ['n-7', 'New again', null],
      ['z 1', 'q', null],
      [null, 'orphan', null]
    ]
  );

  test('appends new keys once and reports duplicates by source', () => {
    const lookup = lookupTable(master, target, 'PN', ['DESC']);
    expect(lookup.classifications).toEqual(['MATCH', 'INSERT', 'INSERT', 'DUPLICATE', 'UNKEYED']);

    const result = applyLookupToMaster(master, target, lookup);

    expect(result.table.columns).toEqual(['PN', 'DESC', 'QTY']);
    expect(result.table.rows).toHaveLength(4);
    expect(result.table.rows[3]).toEqual({ PN: 'N 7', DESC: 'New', QTY: null });

    expect(result.stats).toEqual({
      insertedCount: 1,
      unchangedCount: 1,
      duplicatesCount: 2,
      skippedCount: 1
    });

    expect(result.duplicates).toEqual([
      {
        key: 'N 7',
        source: 'TARGET',
        targetRow: 2,
        masterRows: [],
        record: { PN: 'n-7', DESC: 'New again', NOTE: null }
      },
      {
        key: 'Z 1',
        source: 'MASTER',
        targetRow: 3,
        masterRows: [1, 2],
        record: { PN: 'z 1', DESC: 'q', NOTE: null }
      }
    ]);
  });

  test('inserts onto a master with a "__proto__" column', () => {
    const odd = tableOf(['PN', '__proto__'], [['A 1', 'x']]);
    const incoming = tableOf(['PN'], [['B 2']]);

    const result = applyLookupToMaster(odd, incoming, lookupTable(odd, incoming, 'PN', []));

    expect(result.stats.insertedCount).toBe(1);
    expect(Object.entries(result.table.rows[1])).toEqual([['PN', 'B 2'], ['__proto__', null]]);
  });

  test('never mutates master or target', () => {
    const masterBefore = snapshot(master);
    const targetBefore = snapshot(target);

    applyLookupToMaster(master, target, lookupTable(master, target, 'PN', ['DESC']));

    expect(snapshot(master)).toEqual(masterBefore);
    expect(snapshot(target)).toEqual(targetBefore);
  });
});
