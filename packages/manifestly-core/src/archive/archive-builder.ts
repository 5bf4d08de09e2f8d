/**
 * Change archives: a zip of every file a sync would copy, plus the diff
 * document under `.manifestly.diff`.
 *
 * Building streams each source file through fflate's deflater into the
 * output location; applying reads the archive into memory, writes its
 * files into a target tree and replays the recorded deletions.
 */

import { once } from 'node:events';
import { PassThrough } from 'node:stream';
import { Zip, ZipDeflate, unzipSync } from 'fflate';
import type { Logger } from 'pino';
import { DIFF_ENTRY_NAME } from '../config/types.js';
import { InvalidPathError, ManifestlyError, toManifestlyError } from '../errors.js';
import { encodeDiffDocument, parseDiffDocument, toDiffDocument } from '../diff/diff-engine.js';
import type { DiffDocument, DiffResult } from '../diff/types.js';
import { normalizeRelativePath, sortPaths } from '../paths.js';
import type { StorageResolver } from '../storage/resolver.js';

export interface ArchiveOptions {
  resolver: StorageResolver;
  logger: Logger;
  /** Modification time stamped on every entry (default: now) */
  mtime?: Date;
  /** Read chunk size for source files */
  chunkSize?: number;
}

export interface ArchiveResult {
  location: string;
  /** Archived file paths, in archive order (the diff entry excluded) */
  files: string[];
  bytesWritten: number;
}

export interface ApplyArchiveOptions {
  resolver: StorageResolver;
  logger: Logger;
}

export interface ApplyArchiveResult {
  written: string[];
  deleted: string[];
}

/**
 * Write a zip of `added ∪ changed` from `sourceRoot` to `output`.
 */
export async function buildArchive(
  diff: DiffResult,
  sourceRoot: string,
  output: string,
  options: ArchiveOptions,
): Promise<ArchiveResult> {
  const logger = options.logger.child({ component: 'archive-builder' });
  const mtime = options.mtime ?? new Date();
  const source = options.resolver.resolve(sourceRoot);
  const destination = options.resolver.resolve(output);
  const files = sortPaths([...diff.added, ...diff.changed]);

  const out = new PassThrough();
  let bytesWritten = 0;

  const zip = new Zip((err, chunk, final) => {
    if (err) {
      out.destroy(err);
      return;
    }
    bytesWritten += chunk.length;
    out.write(chunk);
    if (final) {
      out.end();
    }
  });

  const waitForDrain = async (): Promise<void> => {
    if (out.destroyed) {
      throw new ManifestlyError('IO_ERROR', `Archive output ${output} was closed`, { path: output });
    }
    if (out.writableNeedDrain) {
      await once(out, 'drain');
    }
  };

  const feed = async (): Promise<void> => {
    for (const relativePath of files) {
      const entry = new ZipDeflate(relativePath, { level: 6 });
      entry.mtime = mtime;
      zip.add(entry);

      const location = source.backend.join(source.path, relativePath);
      const input = await source.backend.openRead(location, { chunkSize: options.chunkSize });
      try {
        for await (const chunk of input) {
          entry.push(chunk instanceof Uint8Array ? chunk : Buffer.from(chunk));
          await waitForDrain();
        }
      } catch (err) {
        input.destroy();
        throw toManifestlyError(err, relativePath);
      }
      entry.push(new Uint8Array(0), true);
      logger.debug({ path: relativePath }, 'Archived');
    }

    const diffEntry = new ZipDeflate(DIFF_ENTRY_NAME, { level: 6 });
    diffEntry.mtime = mtime;
    zip.add(diffEntry);
    diffEntry.push(encodeDiffDocument(toDiffDocument(diff)), true);
    zip.end();
  };

  try {
    await Promise.all([destination.backend.write(destination.path, out), feed()]);
  } catch (err) {
    zip.terminate();
    out.destroy();
    throw err;
  }

  logger.info({ location: destination.uri, files: files.length, bytesWritten }, 'Archive written');
  return { location: destination.uri, files, bytesWritten };
}

/**
 * Extract a change archive into `targetRoot` and delete the paths its
 * diff document lists as removed. Every entry name is validated before
 * anything is written.
 *
 * @throws InvalidPathError if an entry would land outside the target
 */
export async function applyArchive(
  archive: string,
  targetRoot: string,
  options: ApplyArchiveOptions,
): Promise<ApplyArchiveResult> {
  const logger = options.logger.child({ component: 'archive-apply' });
  const source = options.resolver.resolve(archive);
  const target = options.resolver.resolve(targetRoot);

  const archiveBytes = await source.backend.read(source.path);
  let entries: Record<string, Uint8Array>;
  try {
    entries = unzipSync(archiveBytes);
  } catch (err) {
    throw new ManifestlyError('IO_ERROR', `Cannot read archive ${source.uri}: ${String(err)}`, {
      path: source.uri,
      cause: err,
    });
  }

  let document: DiffDocument = { added: [], removed: [], changed: [] };
  const files = new Map<string, Uint8Array>();

  for (const [name, bytes] of Object.entries(entries)) {
    if (name === DIFF_ENTRY_NAME) {
      document = parseDiffDocument(bytes, `${source.uri}:${DIFF_ENTRY_NAME}`);
      continue;
    }
    if (name.endsWith('/')) {
      continue;
    }
    const normalized = normalizeRelativePath(name);
    if (normalized !== name) {
      throw new InvalidPathError(name, 'archive entry names must be normalized relative paths');
    }
    files.set(normalized, bytes);
  }

  const written: string[] = [];
  for (const relativePath of sortPaths(files.keys())) {
    const bytes = files.get(relativePath);
    if (bytes === undefined) {
      continue;
    }
    await target.backend.write(target.backend.join(target.path, relativePath), bytes);
    written.push(relativePath);
  }

  const deleted: string[] = [];
  for (const relativePath of document.removed) {
    if (files.has(relativePath)) {
      continue;
    }
    await target.backend.remove(target.backend.join(target.path, relativePath), {
      pruneEmptyParentsUpTo: target.path,
    });
    deleted.push(relativePath);
  }

  logger.info({ archive: source.uri, written: written.length, deleted: deleted.length }, 'Archive applied');
  return { written, deleted };
}
