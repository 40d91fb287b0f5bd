import { BlobError, BlobNotFoundError, del, head, put } from '@vercel/blob';
import { NotFoundError, WriteError } from '../errors';
import { BlobFileStore } from '../fileStore';

vi.mock('@vercel/blob', () => {
  class BlobError extends Error {}
  class BlobNotFoundError extends BlobError {
    constructor() {
      super('The requested blob does not exist');
    }
  }
  return {
    BlobError,
    BlobNotFoundError,
    put: vi.fn(),
    head: vi.fn(),
    list: vi.fn(),
    del: vi.fn()
  };
});

describe('BlobFileStore', () => {
  beforeEach(() => {
    vi.mocked(put).mockReset();
    vi.mocked(head).mockReset();
    vi.mocked(del).mockReset();
  });

  test('a missing blob becomes NotFoundError', async () => {
    vi.mocked(head).mockRejectedValue(new BlobNotFoundError());
    const store = new BlobFileStore({ token: 'test-secret' });

    await expect(store.fetch('uploads/missing.xlsx')).rejects.toBeInstanceOf(NotFoundError);
    expect(head).toHaveBeenCalledWith('uploads/missing.xlsx', { token: 'test-secret' });
  });

  test('a refused upload becomes WriteError with the cause attached', async () => {
    const denied = new BlobError('Access denied');
    vi.mocked(put).mockRejectedValue(denied);
    const store = new BlobFileStore({ token: 'test-secret' });

    const err = await store.store('bom-etl/tables/a.json', Buffer.from('{}')).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(WriteError);
    expect(err).toMatchObject({ code: 'E302', cause: denied });
  });

  test('unexpected upload failures are rethrown untouched', async () => {
    const boom = new Error('socket hang up');
    vi.mocked(put).mockRejectedValue(boom);
    const store = new BlobFileStore();

    await expect(store.store('a.json', Buffer.from('1'))).rejects.toBe(boom);
  });

  test('removing a missing blob is a no-op', async () => {
    vi.mocked(head).mockRejectedValue(new BlobNotFoundError());
    const store = new BlobFileStore();

    await store.remove('bom-etl/tables/gone.json');
    expect(del).not.toHaveBeenCalled();
  });
});
