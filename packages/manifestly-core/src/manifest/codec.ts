/**
 * JSON manifest codec.
 *
 * Output is stable: two-space indentation, files in path order, and a
 * trailing newline, so unchanged trees produce byte-identical manifests
 * apart from `generated_at`.
 */

import { MalformedManifestError } from '../errors.js';
import { comparePaths, normalizeRelativePath } from '../paths.js';
import type { ManifestCodec, ManifestDocument } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

export function encodeManifestDocument(document: ManifestDocument): Buffer {
  // Object.fromEntries defines keys such as "__proto__" as own properties
  const files: ManifestDocument['files'] = Object.fromEntries(
    Object.entries(document.files)
      .sort(([a], [b]) => comparePaths(a, b))
      .map(([filePath, { hash, size }]) => [filePath, { hash, size }]),
  );

  const ordered: ManifestDocument = {
    root: document.root,
    algorithm: document.algorithm,
    generated_at: document.generated_at,
    files,
  };
  return Buffer.from(JSON.stringify(ordered, null, 2) + '\n', 'utf-8');
}

export function decodeManifestDocument(bytes: Uint8Array, source: string): ManifestDocument {
  const text = Buffer.from(bytes).toString('utf-8');
  if (text.trim() === '') {
    throw new MalformedManifestError(source, 'file is empty');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new MalformedManifestError(source, 'invalid JSON', err);
  }

  if (!isRecord(parsed)) {
    throw new MalformedManifestError(source, 'expected a JSON object');
  }

  const { root, algorithm, generated_at: generatedAt, files } = parsed;

  if (root !== undefined && root !== null && typeof root !== 'string') {
    throw new MalformedManifestError(source, '"root" must be a string');
  }
  if (typeof algorithm !== 'string' || algorithm === '') {
    throw new MalformedManifestError(source, '"algorithm" must be a non-empty string');
  }
  if (typeof generatedAt !== 'string' || Number.isNaN(Date.parse(generatedAt))) {
    throw new MalformedManifestError(source, '"generated_at" must be an ISO-8601 timestamp');
  }
  if (!isRecord(files)) {
    throw new MalformedManifestError(source, '"files" must be an object');
  }

  const decoded = new Map<string, { hash: string; size: number }>();
  for (const [filePath, value] of Object.entries(files)) {
    let normalized: string;
    try {
      normalized = normalizeRelativePath(filePath);
    } catch (err) {
      throw new MalformedManifestError(source, `invalid path "${filePath}"`, err);
    }
    if (normalized !== filePath) {
      throw new MalformedManifestError(source, `path "${filePath}" is not normalized`);
    }
    if (!isRecord(value)) {
      throw new MalformedManifestError(source, `entry "${filePath}" must be an object`);
    }
    if (typeof value.hash !== 'string' || value.hash === '') {
      throw new MalformedManifestError(source, `entry "${filePath}" has no hash`);
    }
    if (!isNonNegativeInteger(value.size)) {
      throw new MalformedManifestError(source, `entry "${filePath}" must have a non-negative integer size`);
    }
    decoded.set(filePath, { hash: value.hash, size: value.size });
  }

  return {
    root: typeof root === 'string' ? root : null,
    algorithm,
    generated_at: generatedAt,
    files: Object.fromEntries(decoded),
  };
}

export const jsonManifestCodec: ManifestCodec = {
  encode: encodeManifestDocument,
  decode: decodeManifestDocument,
};
