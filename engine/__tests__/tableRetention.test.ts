import { MemoryFileStore } from '../fileStore';
import { cleanupStoredTables } from '../tableRetention';

describe('cleanupStoredTables', () => {
  function seededStore(): MemoryFileStore {
    let clock = new Date('2024-01-01T00:00:00Z');
    const store = new MemoryFileStore({ now: () => clock });
    store.seed('bom-etl/tables/old.json', Buffer.from('{}'));
    store.seed('uploads/source.csv', Buffer.from('PN\n'));
    clock = new Date('2024-01-01T23:00:00Z');
    store.seed('bom-etl/tables/new.json', Buffer.from('{}'));
    return store;
  }

  const now = new Date('2024-01-02T01:00:00Z');

  test('deletes tables older than the max age under the prefix only', async () => {
    const store = seededStore();

    const summary = await cleanupStoredTables(store, {
      prefix: 'bom-etl/tables/',
      maxAgeHours: 24,
      dryRun: false,
      now
    });

    expect(summary).toEqual({
      dry_run: false,
      prefix: 'bom-etl/tables/',
      scanned: 2,
      eligible: 1,
      deleted: 1,
      would_delete: 0,
      sample_deleted: ['bom-etl/tables/old.json'],
      sample_kept: ['bom-etl/tables/new.json']
    });
    expect(store.has('bom-etl/tables/old.json')).toBe(false);
    expect(store.has('bom-etl/tables/new.json')).toBe(true);
    expect(store.has('uploads/source.csv')).toBe(true);
  });

  test('dry-run reports without deleting', async () => {
    const store = seededStore();

    const summary = await cleanupStoredTables(store, {
      prefix: 'bom-etl/tables/',
      maxAgeHours: 24,
      dryRun: true,
      now
    });

    expect(summary.deleted).toBe(0);
    expect(summary.would_delete).toBe(1);
    expect(store.has('bom-etl/tables/old.json')).toBe(true);
  });
});
