import { NotFoundError, WriteError } from '../errors';
import { MemoryFileStore } from '../fileStore';

describe('MemoryFileStore', () => {
  test('stores and fetches bytes', async () => {
    const store = new MemoryFileStore();

    const confirmation = await store.store('bom-etl/tables/a.json', Buffer.from('{}'), 'application/json');
    expect(confirmation).toEqual({
      identifier: 'bom-etl/tables/a.json',
      url: null,
      size: 2,
      contentType: 'application/json'
    });
    expect((await store.fetch('bom-etl/tables/a.json')).toString('utf8')).toBe('{}');
  });

  test('fetching a missing file fails with a retryable NotFoundError', async () => {
    const store = new MemoryFileStore();

    await expect(store.fetch('missing.csv')).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.fetch('missing.csv')).rejects.toMatchObject({
      code: 'E301',
      retryable: true,
      details: { identifier: 'missing.csv' }
    });
  });

  test('a read-only store refuses writes with WriteError', async () => {
    const store = new MemoryFileStore({ readOnly: true });

    await expect(store.store('x.json', Buffer.from('1'))).rejects.toBeInstanceOf(WriteError);
    await expect(store.store('x.json', Buffer.from('1'))).rejects.toMatchObject({ code: 'E302', retryable: true });
    expect(store.has('x.json')).toBe(false);
  });

  test('lists by prefix and removes', async () => {
    const store = new MemoryFileStore({ now: () => new Date('2024-01-01T00:00:00Z') });
    store.seed('bom-etl/tables/a.json', Buffer.from('a'));
    store.seed('uploads/b.csv', Buffer.from('bb'));

    expect(await store.list('bom-etl/tables/')).toEqual([
      {
        identifier: 'bom-etl/tables/a.json',
        url: null,
        size: 1,
        uploadedAt: new Date('2024-01-01T00:00:00Z')
      }
    ]);

    await store.remove('bom-etl/tables/a.json');
    expect(store.has('bom-etl/tables/a.json')).toBe(false);
    expect(store.has('uploads/b.csv')).toBe(true);
  });

  test('fetched bytes are a copy', async () => {
    const store = new MemoryFileStore();
    store.seed('a.csv', Buffer.from('abc'));

    const first = await store.fetch('a.csv');
    first[0] = 0x7a;

    expect((await store.fetch('a.csv')).toString('utf8')).toBe('abc');
  });
});
