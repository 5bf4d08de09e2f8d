export {
  diffManifests,
  isInSync,
  summarizeDiff,
  toDiffDocument,
  encodeDiffDocument,
  parseDiffDocument,
  fromDiffDocument,
} from './diff-engine.js';
export type { DiffResult, DiffDocument, DiffSummary, DiffableManifest } from './types.js';
