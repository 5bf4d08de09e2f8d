export { hashStream, hashFile, hashBuffer } from './file-hasher.js';
export type { StreamHashOptions } from './file-hasher.js';
export { HashAlgorithmRegistry, createDefaultHashRegistry, defaultHashRegistry } from './registry.js';
export { DEFAULT_CHUNK_SIZE, DEFAULT_HASH_ALGORITHM } from './types.js';
export type {
  HashAlgorithmName,
  StreamingDigest,
  DigestFactory,
  FileHashResult,
  HashOptions,
} from './types.js';
