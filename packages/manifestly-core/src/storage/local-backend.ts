/**
 * StorageBackend over the local filesystem.
 *
 * Writes go to a temp file in the destination directory and are renamed
 * into place, so an interrupted write never leaves a partial file under
 * the final name.
 *
 * `stat` follows symlinks, so a root or manifest location may be a link.
 * `list` reports links inside the tree as `symlink` without following them.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { randomBytes } from 'node:crypto';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { OperationCancelledError, PathNotFoundError, toManifestlyError } from '../errors.js';
import type {
  ListOptions,
  ReadOptions,
  RemoveOptions,
  StorageBackend,
  StorageEntry,
  StorageEntryKind,
  StorageStat,
} from './types.js';

function kindOf(entry: fs.Dirent | fs.Stats): StorageEntryKind {
  if (entry.isSymbolicLink()) return 'symlink';
  if (entry.isDirectory()) return 'directory';
  if (entry.isFile()) return 'file';
  return 'other';
}

function isErrno(err: unknown, ...codes: string[]): boolean {
  if (err === null || typeof err !== 'object') {
    return false;
  }
  const code: unknown = Reflect.get(err, 'code');
  return typeof code === 'string' && codes.includes(code);
}

export class LocalStorageBackend implements StorageBackend {
  readonly scheme = 'file';

  async list(root: string, options: ListOptions = {}): Promise<StorageEntry[]> {
    const rootStat = await this.stat(root);
    if (rootStat === null || rootStat.kind !== 'directory') {
      throw new PathNotFoundError(root);
    }

    const results: StorageEntry[] = [];
    const pending: string[] = [''];

    while (pending.length > 0) {
      if (options.signal?.aborted) {
        throw new OperationCancelledError(`Listing ${root}`);
      }
      const subDir = pending.pop() ?? '';
      const absDir = subDir ? path.join(root, subDir) : root;

      let entries: fs.Dirent[];
      try {
        entries = await fs.promises.readdir(absDir, { withFileTypes: true });
      } catch (err) {
        if (subDir === '') {
          throw toManifestlyError(err, root);
        }
        options.onError?.(subDir, toManifestlyError(err, subDir));
        continue;
      }

      for (const entry of entries) {
        const relativePath = subDir ? `${subDir}/${entry.name}` : entry.name;
        const kind = kindOf(entry);
        results.push({ relativePath, kind });

        if (kind === 'directory' && !options.prune?.(relativePath)) {
          pending.push(relativePath);
        }
      }
    }

    return results;
  }

  async stat(location: string): Promise<StorageStat | null> {
    try {
      const stats = await fs.promises.stat(location);
      return { kind: kindOf(stats), size: stats.size };
    } catch (err) {
      if (isErrno(err, 'ENOENT', 'ENOTDIR')) {
        return null;
      }
      throw toManifestlyError(err, location);
    }
  }

  async exists(location: string): Promise<boolean> {
    return (await this.stat(location)) !== null;
  }

  async openRead(location: string, options: ReadOptions = {}): Promise<Readable> {
    // Open eagerly so a missing file fails here rather than mid-stream
    let handle: fs.promises.FileHandle;
    try {
      handle = await fs.promises.open(location, 'r');
    } catch (err) {
      throw toManifestlyError(err, location);
    }
    return handle.createReadStream({ highWaterMark: options.chunkSize, autoClose: true });
  }

  async read(location: string): Promise<Buffer> {
    try {
      return await fs.promises.readFile(location);
    } catch (err) {
      throw toManifestlyError(err, location);
    }
  }

  async write(location: string, data: Uint8Array | Readable): Promise<void> {
    const dir = path.dirname(location);
    const tempPath = path.join(dir, `.${path.basename(location)}.${randomBytes(6).toString('hex')}.tmp`);

    try {
      await fs.promises.mkdir(dir, { recursive: true });
      if (data instanceof Readable) {
        await pipeline(data, fs.createWriteStream(tempPath));
      } else {
        await fs.promises.writeFile(tempPath, data);
      }
      await fs.promises.rename(tempPath, location);
    } catch (err) {
      if (data instanceof Readable) {
        data.destroy();
      }
      // The temp file's directory may not exist, or may be a file
      await fs.promises.rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        if (!isErrno(cleanupErr, 'ENOTDIR')) {
          throw cleanupErr;
        }
      });
      throw toManifestlyError(err, location);
    }
  }

  async remove(location: string, options: RemoveOptions = {}): Promise<void> {
    try {
      await fs.promises.rm(location, { force: true });
    } catch (err) {
      throw toManifestlyError(err, location);
    }

    const stopAt = options.pruneEmptyParentsUpTo;
    if (stopAt === undefined) {
      return;
    }

    const boundary = path.resolve(stopAt);
    let dir = path.dirname(path.resolve(location));
    while (dir !== boundary && dir.startsWith(boundary + path.sep)) {
      try {
        await fs.promises.rmdir(dir);
      } catch (err) {
        if (isErrno(err, 'ENOTEMPTY', 'EEXIST', 'ENOENT')) {
          return;
        }
        throw toManifestlyError(err, dir);
      }
      dir = path.dirname(dir);
    }
  }

  async ensureDir(location: string): Promise<void> {
    try {
      await fs.promises.mkdir(location, { recursive: true });
    } catch (err) {
      throw toManifestlyError(err, location);
    }
  }

  join(base: string, ...segments: string[]): string {
    return path.join(base, ...segments);
  }

  dirname(location: string): string {
    return path.dirname(location);
  }

  basename(location: string): string {
    return path.basename(location);
  }
}
