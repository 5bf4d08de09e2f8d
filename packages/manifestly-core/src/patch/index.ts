export { buildPatch, isBinaryContent, DEFAULT_MAX_PATCH_FILE_BYTES } from './patch-generator.js';
export type { PatchResult, PatchFile, PatchFileKind, PatchOptions } from './patch-generator.js';
