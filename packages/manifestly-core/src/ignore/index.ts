export { ManifestIgnore } from './manifest-ignore.js';
export { parsePattern, parsePatterns, checkIgnored } from './pattern-matcher.js';
export type { IgnoreRule, IgnoreRuleOrigin, IgnoreCheckResult, ManifestIgnoreOptions } from './types.js';
