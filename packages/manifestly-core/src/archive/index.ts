export { buildArchive, applyArchive } from './archive-builder.js';
export type { ArchiveOptions, ArchiveResult, ApplyArchiveOptions, ApplyArchiveResult } from './archive-builder.js';
