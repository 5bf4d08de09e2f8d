export { Manifest } from './manifest.js';
export { ManifestStore } from './manifest-store.js';
export type { ManifestStoreOptions, LoadOptions } from './manifest-store.js';
export { jsonManifestCodec, encodeManifestDocument, decodeManifestDocument } from './codec.js';
export type {
  ManifestEntry,
  ManifestDocument,
  ManifestContext,
  ManifestCodec,
  ManifestEqualityOptions,
} from './types.js';
