export {
  buildManifestConfig,
  validateManifestConfig,
  resolveManifestConfig,
  defaultConcurrency,
} from './config.js';
export type { Environment } from './config.js';
export {
  DEFAULT_MANIFEST_NAME,
  DEFAULT_IGNORE_FILE_NAME,
  DIFF_ENTRY_NAME,
  OUTPUT_FORMATS,
} from './types.js';
export type {
  ManifestConfig,
  ManifestConfigOverrides,
  OutputFormat,
  RetryConfig,
  S3BackendConfig,
} from './types.js';
