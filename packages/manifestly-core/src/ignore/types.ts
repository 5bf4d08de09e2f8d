/**
 * Ignore rule model.
 *
 * Gitignore-style rules decide which paths a scan admits. Rules are kept
 * as an ordered list and evaluated last-match-wins, so later rules can
 * re-admit paths excluded by earlier ones.
 */

/** Where a rule came from, lowest precedence first */
export type IgnoreRuleOrigin = 'builtin' | 'ignore-file' | 'exclude' | 'include';

export interface IgnoreRule {
  /** The line as written, trimmed */
  pattern: string;
  /** Matches the path itself or anything below it */
  subtree: RegExp;
  /** Matches the path itself only */
  exact: RegExp;
  /** Leading `!`: a match re-admits the path */
  negated: boolean;
  /** Trailing `/` */
  directoryOnly: boolean;
  /** Where the line was read from ("builtin", an ignore file location, "--exclude") */
  source: string;
  origin: IgnoreRuleOrigin;
}

export interface IgnoreCheckResult {
  ignored: boolean;
  /** Last rule that matched, which decided the outcome */
  matchedRule?: IgnoreRule;
}

/** Options for building a ManifestIgnore */
export interface ManifestIgnoreOptions {
  /** Manifest file name, always ignored at any depth */
  manifestName: string;
  /** Ignore file name at the root (e.g. .manifestlyignore) */
  ignoreFileName: string;
  /** Additional file names treated like the manifest (e.g. a custom output file) */
  extraBuiltinNames?: readonly string[];
  /** Content of the ignore file, if one was found */
  ignoreFileContent?: string | null;
  /** Label used as the source of ignore file rules */
  ignoreFileSource?: string;
  /** Explicit exclude patterns */
  excludePatterns?: readonly string[];
  /** Explicit include patterns; compiled as re-inclusion rules */
  includePatterns?: readonly string[];
}
