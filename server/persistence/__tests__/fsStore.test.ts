import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { makeTestConfig } from '../../__tests__/helpers';
import { createFsBlobStore } from '../fsStore';

describe('createFsBlobStore', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'blob-test-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('uploads into nested folders and downloads the same bytes', async () => {
    const store = createFsBlobStore(makeTestConfig({ BLOB_STORE: 'fs', BLOB_ROOT: root }));

    await store.upload('reports/analysis-1.pdf', new Uint8Array([1, 2, 3]), 'application/pdf');

    await expect(fs.readFile(path.join(root, 'reports', 'analysis-1.pdf'))).resolves.toEqual(Buffer.from([1, 2, 3]));
    expect(Array.from(await store.download('reports/analysis-1.pdf'))).toEqual([1, 2, 3]);
  });

  it('reports a missing object by path', async () => {
    const store = createFsBlobStore(makeTestConfig({ BLOB_ROOT: root }));
    await expect(store.download('uploads/none.pdf')).rejects.toThrow('Blob not found: uploads/none.pdf');
  });

  it('rejects paths that leave the root', async () => {
    const store = createFsBlobStore(makeTestConfig({ BLOB_ROOT: root }));
    await expect(store.download('../outside.pdf')).rejects.toThrow(
      'Attempted to access object outside of blob root: ../outside.pdf',
    );
    await expect(store.upload('', new Uint8Array([1]), 'application/pdf')).rejects.toThrow(
      'Attempted to access object outside of blob root',
    );
  });
});
