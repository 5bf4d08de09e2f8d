import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as crypto from 'node:crypto';
import { TreeScanner } from '../scan/tree-scanner.js';
import { ManifestIgnore } from '../ignore/manifest-ignore.js';
import { LocalStorageBackend } from '../storage/local-backend.js';
import { OperationCancelledError, PathNotFoundError } from '../errors.js';
import type { ReadOptions, StorageBackend } from '../storage/types.js';
import type { Readable } from 'node:stream';
import { makeTmpDir, silentLogger, writeTree } from './helpers.js';

const sha256 = (content: string): string => crypto.createHash('sha256').update(content).digest('hex');

function makeScanner(
  root: string,
  options: { backend?: StorageBackend; ignore?: ManifestIgnore; signal?: AbortSignal; concurrency?: number } = {},
): TreeScanner {
  return new TreeScanner({
    backend: options.backend ?? new LocalStorageBackend(),
    root,
    ignore: options.ignore ?? new ManifestIgnore({ manifestName: '.manifestly.json', ignoreFileName: '.manifestlyignore' }),
    algorithm: 'sha256',
    chunkSize: 8192,
    concurrency: options.concurrency ?? 4,
    logger: silentLogger,
    signal: options.signal,
  });
}

describe('TreeScanner', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTmpDir('manifestly-scan-test-');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should hash every file and sort entries by path', async () => {
    writeTree(tmpDir, { 'z.txt': 'last', 'a/b.txt': 'nested', 'A.txt': 'upper' });

    const result = await makeScanner(tmpDir).scan();

    expect(result.entries).toEqual([
      { path: 'A.txt', size: 5, hash: sha256('upper'), algorithm: 'sha256' },
      { path: 'a/b.txt', size: 6, hash: sha256('nested'), algorithm: 'sha256' },
      { path: 'z.txt', size: 4, hash: sha256('last'), algorithm: 'sha256' },
    ]);
    expect(result.failures).toEqual([]);
  });

  it('should give the same result for any pool size', async () => {
    const files: Record<string, string> = {};
    for (let i = 0; i < 40; i++) {
      files[`dir${i % 5}/file${i}.txt`] = `content ${i}`;
    }
    writeTree(tmpDir, files);

    const serial = await makeScanner(tmpDir, { concurrency: 1 }).scan();
    const parallel = await makeScanner(tmpDir, { concurrency: 16 }).scan();

    expect(parallel.entries).toEqual(serial.entries);
    expect(serial.entries).toHaveLength(40);
  });

  it('should exclude the manifest file and ignored paths', async () => {
    writeTree(tmpDir, { '.manifestly.json': '{}', 'keep.txt': 'k', 'build/out.js': 'x' });
    const ignore = new ManifestIgnore({
      manifestName: '.manifestly.json',
      ignoreFileName: '.manifestlyignore',
      excludePatterns: ['build/'],
    });

    const result = await makeScanner(tmpDir, { ignore }).scan();

    expect(result.entries.map((e) => e.path)).toEqual(['keep.txt']);
  });

  it('should skip symlinks and report them', async () => {
    writeTree(tmpDir, { 'real.txt': 'r' });
    fs.symlinkSync(path.join(tmpDir, 'real.txt'), path.join(tmpDir, 'alias.txt'));

    const result = await makeScanner(tmpDir).scan();

    expect(result.entries.map((e) => e.path)).toEqual(['real.txt']);
    expect(result.skipped).toEqual(['alias.txt']);
    expect(result.failures).toEqual([]);
  });

  it('should scan through a root that is a symlink to a directory', async () => {
    writeTree(tmpDir, { 'real/a.txt': 'one', 'real/sub/b.txt': 'two' });
    const link = path.join(tmpDir, 'link');
    fs.symlinkSync(path.join(tmpDir, 'real'), link);

    const result = await makeScanner(link).scan();

    expect(result.entries.map((e) => e.path)).toEqual(['a.txt', 'sub/b.txt']);
    expect(result.entries[0].hash).toBe(sha256('one'));
    expect(result.skipped).toEqual([]);
  });

  it('should collect per-file failures and keep scanning', async () => {
    writeTree(tmpDir, { 'ok.txt': 'fine', 'gone.txt': 'vanishes' });

    // gone.txt disappears between listing and hashing
    class VanishingBackend extends LocalStorageBackend {
      async openRead(location: string, options?: ReadOptions): Promise<Readable> {
        if (location.endsWith('gone.txt')) {
          fs.rmSync(location);
        }
        return super.openRead(location, options);
      }
    }

    const result = await makeScanner(tmpDir, { backend: new VanishingBackend() }).scan();

    expect(result.entries.map((e) => e.path)).toEqual(['ok.txt']);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0].path).toBe('gone.txt');
    expect(result.failures[0].error).toBeInstanceOf(PathNotFoundError);
  });

  it('should reject a missing root', async () => {
    await expect(makeScanner(path.join(tmpDir, 'missing')).scan()).rejects.toBeInstanceOf(PathNotFoundError);
  });

  it('should reject with OperationCancelledError when aborted', async () => {
    writeTree(tmpDir, { 'a.txt': '1', 'b.txt': '2' });
    const controller = new AbortController();
    controller.abort();

    await expect(makeScanner(tmpDir, { signal: controller.signal }).scan()).rejects.toBeInstanceOf(
      OperationCancelledError,
    );
  });
});
