import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as crypto from 'node:crypto';
import { Readable } from 'node:stream';
import { hashBuffer, hashFile, hashStream } from '../hash/file-hasher.js';
import { HashAlgorithmRegistry, defaultHashRegistry } from '../hash/registry.js';
import type { StreamingDigest } from '../hash/types.js';
import { PathNotFoundError, UnsupportedAlgorithmError } from '../errors.js';
import { makeTmpDir } from './helpers.js';

describe('HashAlgorithmRegistry', () => {
  it('should register every supported algorithm', () => {
    expect(defaultHashRegistry.names()).toEqual([
      'blake2b',
      'blake2s',
      'md5',
      'sha1',
      'sha224',
      'sha256',
      'sha3-224',
      'sha3-256',
      'sha3-384',
      'sha3-512',
      'sha384',
      'sha512',
      'shake128',
      'shake256',
    ]);
  });

  it('should resolve aliases case-insensitively', () => {
    expect(defaultHashRegistry.resolve('SHA256')).toBe('sha256');
    expect(defaultHashRegistry.resolve('sha-512')).toBe('sha512');
    expect(defaultHashRegistry.resolve('SHA3_384')).toBe('sha3-384');
    expect(defaultHashRegistry.resolve('shake_128')).toBe('shake128');
    expect(defaultHashRegistry.resolve('blake2b512')).toBe('blake2b');
  });

  it('should reject unknown names', () => {
    expect(defaultHashRegistry.has('crc32')).toBe(false);
    expect(() => defaultHashRegistry.resolve('crc32')).toThrow(UnsupportedAlgorithmError);
  });

  it('should accept custom algorithms', () => {
    const registry = new HashAlgorithmRegistry().register('length', (): StreamingDigest => {
      let total = 0;
      return {
        update: (chunk) => {
          total += chunk.length;
        },
        digest: () => String(total),
      };
    }, ['len']);

    expect(hashBuffer(Buffer.from('abcd'), 'LEN', registry).hash).toBe('4');
  });
});

describe('hashBuffer', () => {
  for (const algorithm of defaultHashRegistry.names()) {
    it(`should be deterministic and content-sensitive for ${algorithm}`, () => {
      const first = hashBuffer(Buffer.from('the same bytes'), algorithm);
      const second = hashBuffer(Buffer.from('the same bytes'), algorithm);
      const other = hashBuffer(Buffer.from('the same bytez'), algorithm);

      expect(first.hash).toBe(second.hash);
      expect(first.hash).not.toBe(other.hash);
      expect(first.hash).toMatch(/^[0-9a-f]+$/);
      expect(first.algorithm).toBe(algorithm);
    });
  }

  it('should produce 32-byte shake128 and 64-byte shake256 digests', () => {
    expect(hashBuffer(Buffer.from('x'), 'shake128').hash).toHaveLength(64);
    expect(hashBuffer(Buffer.from('x'), 'shake256').hash).toHaveLength(128);
  });

  it('should match node:crypto for sha256', () => {
    const expected = crypto.createHash('sha256').update('hello world').digest('hex');
    expect(hashBuffer(Buffer.from('hello world')).hash).toBe(expected);
  });
});

describe('hashStream', () => {
  it('should feed large chunks in chunkSize slices', async () => {
    const seen: number[] = [];
    const registry = new HashAlgorithmRegistry().register('probe', (): StreamingDigest => ({
      update: (chunk) => {
        seen.push(chunk.length);
      },
      digest: () => 'done',
    }));

    const result = await hashStream(Readable.from([Buffer.alloc(10), Buffer.alloc(3)]), 'probe', {
      chunkSize: 4,
      registry,
    });

    expect(seen).toEqual([4, 4, 2, 3]);
    expect(result.sizeBytes).toBe(13);
  });

  it('should give the same digest regardless of chunk size', async () => {
    const content = crypto.randomBytes(50_000);
    const small = await hashStream(Readable.from([content]), 'sha256', { chunkSize: 7 });
    const large = await hashStream(Readable.from([content]), 'sha256', { chunkSize: 65536 });
    expect(small.hash).toBe(large.hash);
    expect(small.hash).toBe(crypto.createHash('sha256').update(content).digest('hex'));
  });
});

describe('hashFile', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTmpDir('manifestly-hasher-test-');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should compute the MD5 hash of a file', async () => {
    const filePath = path.join(tmpDir, 'md5.txt');
    fs.writeFileSync(filePath, 'md5 test content');

    const result = await hashFile(filePath, 'md5');

    expect(result.hash).toBe(crypto.createHash('md5').update('md5 test content').digest('hex'));
    expect(result.algorithm).toBe('md5');
    expect(result.sizeBytes).toBe(16);
  });

  it('should hash empty files', async () => {
    const filePath = path.join(tmpDir, 'empty.txt');
    fs.writeFileSync(filePath, '');

    const result = await hashFile(filePath);

    expect(result.hash).toBe(crypto.createHash('sha256').update('').digest('hex'));
    expect(result.sizeBytes).toBe(0);
  });

  it('should throw PathNotFoundError for a missing file', async () => {
    await expect(hashFile(path.join(tmpDir, 'nope.txt'))).rejects.toBeInstanceOf(PathNotFoundError);
  });
});
