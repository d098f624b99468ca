import fs from 'node:fs/promises';
import path from 'node:path';
import type { AppConfig } from '../../shared/config';
import type { BlobStore } from '../../shared/stores';

const ensureDir = async (dir: string) => {
  await fs.mkdir(dir, { recursive: true });
};

const resolveObject = (root: string, objectPath: string) => {
  const target = path.resolve(root, objectPath);
  const relative = path.relative(root, target);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`Attempted to access object outside of blob root: ${objectPath}`);
  }
  return target;
};

/**
 * Local-directory blob store for development. Object paths map to files under
 * `storage.blobRootDir`; the content type is not persisted.
 */
export const createFsBlobStore = (config: Pick<AppConfig, 'storage'>): BlobStore => {
  const root = config.storage.blobRootDir;

  const download = async (objectPath: string) => {
    const target = resolveObject(root, objectPath);
    try {
      return new Uint8Array(await fs.readFile(target));
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code === 'ENOENT') {
        throw new Error(`Blob not found: ${objectPath}`);
      }
      throw error;
    }
  };

  const upload = async (objectPath: string, content: Uint8Array) => {
    const target = resolveObject(root, objectPath);
    await ensureDir(path.dirname(target));
    await fs.writeFile(target, content);
  };

  return { download, upload };
};
