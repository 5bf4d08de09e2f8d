/**
 * Unified diff of every file a sync would copy.
 *
 * The old side is the target's content (or /dev/null for added files),
 * the new side the source's, so applying the patch to the target tree
 * with `patch -p1` brings text files up to date.
 */

import { createTwoFilesPatch } from 'diff';
import type { Logger } from 'pino';
import type { DiffResult } from '../diff/types.js';
import { sortPaths } from '../paths.js';
import type { StorageResolver } from '../storage/resolver.js';
import type { ResolvedLocation } from '../storage/types.js';

export const DEFAULT_MAX_PATCH_FILE_BYTES = 5 * 1024 * 1024;

/** Bytes inspected for NUL when deciding whether content is binary */
const BINARY_SNIFF_BYTES = 8000;

export type PatchFileKind = 'text' | 'binary' | 'too-large';

export interface PatchFile {
  path: string;
  kind: PatchFileKind;
}

export interface PatchResult {
  text: string;
  files: PatchFile[];
}

export interface PatchOptions {
  resolver: StorageResolver;
  /** Files larger than this are listed as differing, not rendered */
  maxFileBytes?: number;
  logger?: Logger;
}

type FileContent = { kind: 'text'; text: string } | { kind: 'binary' } | { kind: 'too-large' };

const utf8 = new TextDecoder('utf-8', { fatal: true });

export function isBinaryContent(bytes: Uint8Array): boolean {
  if (bytes.subarray(0, BINARY_SNIFF_BYTES).includes(0)) {
    return true;
  }
  try {
    utf8.decode(bytes);
    return false;
  } catch {
    return true;
  }
}

async function readContent(location: ResolvedLocation, relativePath: string, maxFileBytes: number): Promise<FileContent> {
  const filePath = location.backend.join(location.path, relativePath);
  const stat = await location.backend.stat(filePath);
  if (stat !== null && stat.size > maxFileBytes) {
    return { kind: 'too-large' };
  }

  const bytes = await location.backend.read(filePath);
  if (isBinaryContent(bytes)) {
    return { kind: 'binary' };
  }
  return { kind: 'text', text: bytes.toString('utf-8') };
}

/**
 * Render the differences of `added ∪ changed` between two roots.
 */
export async function buildPatch(
  diff: DiffResult,
  sourceRoot: string,
  targetRoot: string,
  options: PatchOptions,
): Promise<PatchResult> {
  const maxFileBytes = options.maxFileBytes ?? DEFAULT_MAX_PATCH_FILE_BYTES;
  const source = options.resolver.resolve(sourceRoot);
  const target = options.resolver.resolve(targetRoot);
  const added = new Set(diff.added);

  const parts: string[] = [];
  const files: PatchFile[] = [];

  for (const relativePath of sortPaths([...diff.added, ...diff.changed])) {
    const isAdded = added.has(relativePath);
    const newContent = await readContent(source, relativePath, maxFileBytes);
    const oldContent: FileContent = isAdded
      ? { kind: 'text', text: '' }
      : await readContent(target, relativePath, maxFileBytes);

    if (newContent.kind !== 'text' || oldContent.kind !== 'text') {
      const kind: PatchFileKind =
        newContent.kind === 'too-large' || oldContent.kind === 'too-large' ? 'too-large' : 'binary';
      parts.push(`Binary files a/${relativePath} and b/${relativePath} differ\n`);
      files.push({ path: relativePath, kind });
      continue;
    }

    parts.push(
      createTwoFilesPatch(
        isAdded ? '/dev/null' : `a/${relativePath}`,
        `b/${relativePath}`,
        oldContent.text,
        newContent.text,
      ),
    );
    files.push({ path: relativePath, kind: 'text' });
  }

  options.logger?.debug({ files: files.length }, 'Patch built');
  return { text: parts.join(''), files };
}
