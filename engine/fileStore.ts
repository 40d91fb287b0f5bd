// engine/fileStore.ts
//
// File source/sink used by the service layer.
//  - fetch(identifier)        → bytes              (NotFoundError when absent)
//  - store(identifier, bytes) → StoreConfirmation  (WriteError when refused)
//
// BlobFileStore talks to Vercel Blob; MemoryFileStore keeps everything in process.

import { BlobError, BlobNotFoundError, del, head, list, put } from '@vercel/blob';
import { NotFoundError, WriteError } from './errors';

export interface StoreConfirmation {
  identifier: string;
  /** Public URL where the store exposes one. */
  url: string | null;
  size: number;
  contentType: string;
}

export interface StoredFileInfo {
  identifier: string;
  url: string | null;
  size: number;
  uploadedAt: Date;
}

export interface FileSource {
  fetch(identifier: string): Promise<Buffer>;
}

export interface FileSink {
  store(identifier: string, bytes: Uint8Array, contentType?: string): Promise<StoreConfirmation>;
}

export interface FileStore extends FileSource, FileSink {
  list(prefix: string): Promise<StoredFileInfo[]>;
  remove(identifier: string): Promise<void>;
}

const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

// ------------------------------------------------------------
// Vercel Blob
// ------------------------------------------------------------

export interface BlobFileStoreOptions {
  /** Falls back to BLOB_READ_WRITE_TOKEN inside @vercel/blob when unset. */
  token?: string;
}

export class BlobFileStore implements FileStore {
  private readonly token: string | undefined;

  constructor(options: BlobFileStoreOptions = {}) {
    this.token = options.token;
  }

  async fetch(identifier: string): Promise<Buffer> {
    let url: string;
    try {
      const meta = await head(identifier, { token: this.token });
      url = meta.url;
    } catch (err) {
      if (err instanceof BlobNotFoundError) {
        throw new NotFoundError(identifier, { cause: err });
      }
      throw err;
    }

    const response = await fetch(url);
    if (response.status === 404) {
      throw new NotFoundError(identifier);
    }
    if (!response.ok) {
      throw new Error(`Blob download for "${identifier}" failed with status ${response.status}.`);
    }
    return Buffer.from(await response.arrayBuffer());
  }

  async store(
    identifier: string,
    bytes: Uint8Array,
    contentType: string = DEFAULT_CONTENT_TYPE
  ): Promise<StoreConfirmation> {
    try {
      const blob = await put(identifier, Buffer.from(bytes), {
        access: 'public',
        addRandomSuffix: false,
        contentType,
        token: this.token
      });
      return {
        identifier: blob.pathname,
        url: blob.url,
        size: bytes.byteLength,
        contentType
      };
    } catch (err) {
      if (err instanceof BlobError) {
        throw new WriteError(identifier, err.message, { cause: err });
      }
      throw err;
    }
  }

  async list(prefix: string): Promise<StoredFileInfo[]> {
    const files: StoredFileInfo[] = [];
    let cursor: string | undefined = undefined;

    do {
      const page: Awaited<ReturnType<typeof list>> = await list({
        prefix,
        cursor,
        limit: 1000,
        token: this.token
      });
      for (const blob of page.blobs) {
        files.push({
          identifier: blob.pathname,
          url: blob.url,
          size: blob.size,
          uploadedAt: new Date(blob.uploadedAt)
        });
      }
      cursor = page.hasMore ? page.cursor : undefined;
    } while (cursor);

    return files;
  }

  async remove(identifier: string): Promise<void> {
    const meta = await head(identifier, { token: this.token }).catch((err: unknown) => {
      if (err instanceof BlobNotFoundError) return null;
      throw err;
    });
    if (!meta) return;
    await del(meta.url, { token: this.token });
  }
}

// ------------------------------------------------------------
// In-memory
// ------------------------------------------------------------

interface MemoryEntry {
  bytes: Buffer;
  contentType: string;
  uploadedAt: Date;
}

export interface MemoryFileStoreOptions {
  /** Every store() fails with WriteError (simulates denied access). */
  readOnly?: boolean;
  now?: () => Date;
}

export class MemoryFileStore implements FileStore {
  private readonly entries = new Map<string, MemoryEntry>();
  private readonly readOnly: boolean;
  private readonly now: () => Date;

  constructor(options: MemoryFileStoreOptions = {}) {
    this.readOnly = options.readOnly ?? false;
    this.now = options.now ?? (() => new Date());
  }

  /** Place a file directly, bypassing readOnly. */
  seed(identifier: string, bytes: Uint8Array, contentType: string = DEFAULT_CONTENT_TYPE): void {
    this.entries.set(identifier, {
      bytes: Buffer.from(bytes),
      contentType,
      uploadedAt: this.now()
    });
  }

  has(identifier: string): boolean {
    return this.entries.has(identifier);
  }

  async fetch(identifier: string): Promise<Buffer> {
    const entry = this.entries.get(identifier);
    if (!entry) {
      throw new NotFoundError(identifier);
    }
    return Buffer.from(entry.bytes);
  }

  async store(
    identifier: string,
    bytes: Uint8Array,
    contentType: string = DEFAULT_CONTENT_TYPE
  ): Promise<StoreConfirmation> {
    if (this.readOnly) {
      throw new WriteError(identifier, 'store is read-only.');
    }
    this.seed(identifier, bytes, contentType);
    return { identifier, url: null, size: bytes.byteLength, contentType };
  }

  async list(prefix: string): Promise<StoredFileInfo[]> {
    const files: StoredFileInfo[] = [];
    for (const [identifier, entry] of this.entries) {
      if (!identifier.startsWith(prefix)) continue;
      files.push({
        identifier,
        url: null,
        size: entry.bytes.byteLength,
        uploadedAt: entry.uploadedAt
      });
    }
    return files;
  }

  async remove(identifier: string): Promise<void> {
    this.entries.delete(identifier);
  }
}
