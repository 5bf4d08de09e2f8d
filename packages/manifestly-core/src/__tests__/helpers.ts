import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { Readable } from 'node:stream';
import { vi } from 'vitest';
import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
} from '@aws-sdk/client-s3';
import type { S3Client } from '@aws-sdk/client-s3';
import type { Logger } from 'pino';
import { resolveManifestConfig } from '../config/config.js';
import type { ManifestConfig, ManifestConfigOverrides } from '../config/types.js';
import type { ManifestContext } from '../manifest/types.js';
import { StorageResolver } from '../storage/resolver.js';

// Create a silent mock logger compatible with pino's Logger interface
const noop = (): void => {
  /* noop */
};
export const silentLogger = {
  level: 'silent',
  info: noop,
  error: noop,
  warn: noop,
  debug: noop,
  trace: noop,
  fatal: noop,
  child: () => silentLogger,
  silent: noop,
} as unknown as Logger;

export function makeTmpDir(prefix = 'manifestly-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Write a tree of files under `root`; keys are forward-slash relative paths */
export function writeTree(root: string, files: Record<string, string | Buffer>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, ...relativePath.split('/'));
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }
}

/** Read every regular file under `root` into a path -> content map */
export function readTree(root: string, skip: readonly string[] = []): Record<string, string> {
  const result: Record<string, string> = {};
  const walk = (dir: string, prefix: string): void => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        walk(path.join(dir, entry.name), relativePath);
      } else if (entry.isFile() && !skip.includes(entry.name)) {
        result[relativePath] = fs.readFileSync(path.join(dir, entry.name), 'utf-8');
      }
    }
  };
  walk(root, '');
  return result;
}

function s3Error(name: string, httpStatusCode: number): Error {
  const err = new Error(name);
  err.name = name;
  return Object.assign(err, { $metadata: { httpStatusCode } });
}

/**
 * In-memory stand-in for S3Client.send. Understands the commands the S3
 * backend issues; keys of every bucket share one map.
 */
export class FakeS3 {
  readonly objects = new Map<string, Buffer>();
  readonly calls: string[] = [];
  private readonly queuedFailures: Array<{ command: string; error: Error }> = [];

  constructor(private readonly pageSize = 1000) {}

  readonly send = vi.fn(async (command: unknown): Promise<unknown> => this.handle(command));

  get client(): S3Client {
    return this as unknown as S3Client;
  }

  /** Make the next `times` calls of `command` fail with `error` */
  failNext(command: string, error: Error, times = 1): void {
    for (let i = 0; i < times; i++) {
      this.queuedFailures.push({ command, error });
    }
  }

  static throttled(): Error {
    return s3Error('SlowDown', 503);
  }

  static accessDenied(): Error {
    return s3Error('AccessDenied', 403);
  }

  private async handle(command: unknown): Promise<unknown> {
    const name = this.commandName(command);
    this.calls.push(name);

    const failure = this.queuedFailures.findIndex((f) => f.command === name);
    if (failure !== -1) {
      const [queued] = this.queuedFailures.splice(failure, 1);
      throw queued.error;
    }

    if (command instanceof ListObjectsV2Command) {
      const prefix = command.input.Prefix ?? '';
      const keys = [...this.objects.keys()].filter((key) => key.startsWith(prefix)).sort();
      const start = Number(command.input.ContinuationToken ?? '0');
      const limit = Math.min(command.input.MaxKeys ?? 1000, this.pageSize);
      const page = keys.slice(start, start + limit);
      const truncated = start + limit < keys.length;
      return {
        Contents: page.map((key) => ({ Key: key, Size: this.objects.get(key)?.length ?? 0 })),
        KeyCount: page.length,
        IsTruncated: truncated,
        NextContinuationToken: truncated ? String(start + limit) : undefined,
      };
    }
    if (command instanceof HeadObjectCommand) {
      const body = this.objects.get(command.input.Key ?? '');
      if (!body) throw s3Error('NotFound', 404);
      return { ContentLength: body.length };
    }
    if (command instanceof GetObjectCommand) {
      const body = this.objects.get(command.input.Key ?? '');
      if (!body) throw s3Error('NoSuchKey', 404);
      return { Body: Readable.from([body]), ContentLength: body.length };
    }
    if (command instanceof PutObjectCommand) {
      const body = command.input.Body;
      if (!(body instanceof Uint8Array)) {
        throw new Error('FakeS3 only accepts Uint8Array bodies');
      }
      this.objects.set(command.input.Key ?? '', Buffer.from(body));
      return { ETag: '"fake"' };
    }
    if (command instanceof DeleteObjectCommand) {
      this.objects.delete(command.input.Key ?? '');
      return {};
    }
    throw new Error(`FakeS3 does not handle ${name}`);
  }

  private commandName(command: unknown): string {
    if (command !== null && typeof command === 'object') {
      return command.constructor.name.replace(/Command$/, '');
    }
    return String(command);
  }
}

export interface TestContext {
  config: Readonly<ManifestConfig>;
  resolver: StorageResolver;
  context: ManifestContext;
  s3: FakeS3;
}

/** Config, resolver (S3 routed to a FakeS3) and scan context for tests */
export function createTestContext(overrides: ManifestConfigOverrides = {}, s3 = new FakeS3()): TestContext {
  const config = resolveManifestConfig({ concurrency: 4, logLevel: 'silent', ...overrides });
  const resolver = new StorageResolver({
    config,
    logger: silentLogger,
    s3ClientFactory: () => s3.client,
    sleep: async () => {},
  });
  return { config, resolver, s3, context: { resolver, config, logger: silentLogger } };
}
