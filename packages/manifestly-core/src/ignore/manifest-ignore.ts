/**
 * ManifestIgnore - the ordered rule set a scan is filtered through.
 *
 * Rules are assembled lowest precedence first:
 *   1. built-in rules (the manifest file name at any depth)
 *   2. the root ignore file (e.g. `.manifestlyignore`)
 *   3. explicit exclude patterns
 *   4. explicit include patterns, as re-inclusion rules
 * and evaluated last-match-wins, so a later class always overrides an
 * earlier one.
 *
 * Usage:
 * ```ts
 * const ignore = await ManifestIgnore.load(backend, '/data/photos', {
 *   manifestName: '.manifestly.json',
 *   ignoreFileName: '.manifestlyignore',
 *   excludePatterns: ['*.tmp'],
 * });
 *
 * if (!ignore.isIgnored('2024/beach.jpg')) {
 *   // hash it
 * }
 * ```
 */

import type { StorageBackend } from '../storage/types.js';
import type { IgnoreCheckResult, IgnoreRule, ManifestIgnoreOptions } from './types.js';
import { checkIgnored, parsePattern, parsePatterns } from './pattern-matcher.js';

export class ManifestIgnore {
  private readonly _rules: IgnoreRule[];
  private readonly ignoreFileName: string;
  private readonly hasReinclusion: boolean;

  constructor(options: ManifestIgnoreOptions) {
    this.ignoreFileName = options.ignoreFileName;

    const builtinNames = new Set([options.manifestName, ...(options.extraBuiltinNames ?? [])]);
    const rules: IgnoreRule[] = [];

    for (const name of builtinNames) {
      const rule = parsePattern(escapeLiteral(name), 'builtin', 'builtin');
      if (rule !== null) {
        rules.push(rule);
      }
    }

    if (options.ignoreFileContent) {
      rules.push(
        ...parsePatterns(options.ignoreFileContent, options.ignoreFileSource ?? options.ignoreFileName, 'ignore-file'),
      );
    }

    for (const pattern of options.excludePatterns ?? []) {
      const rule = parsePattern(pattern, '--exclude', 'exclude');
      if (rule !== null) {
        rules.push(rule);
      }
    }

    for (const pattern of options.includePatterns ?? []) {
      const trimmed = pattern.trim();
      const rule = parsePattern(trimmed.startsWith('!') ? trimmed : `!${trimmed}`, '--include', 'include');
      if (rule !== null) {
        rules.push(rule);
      }
    }

    this._rules = rules;
    this.hasReinclusion = rules.some((rule) => rule.negated);
  }

  /**
   * Build the rule set for `root`, reading the ignore file through the
   * backend. A missing ignore file contributes no rules.
   */
  static async load(
    backend: StorageBackend,
    root: string,
    options: Omit<ManifestIgnoreOptions, 'ignoreFileContent' | 'ignoreFileSource'>,
  ): Promise<ManifestIgnore> {
    const location = backend.join(root, options.ignoreFileName);
    let content: string | null = null;

    if (await backend.exists(location)) {
      content = (await backend.read(location)).toString('utf-8');
    }

    return new ManifestIgnore({ ...options, ignoreFileContent: content, ignoreFileSource: location });
  }

  /** All rules in evaluation order */
  get rules(): readonly IgnoreRule[] {
    return this._rules;
  }

  get ruleCount(): number {
    return this._rules.length;
  }

  /**
   * Check a path and get the detailed result including the deciding rule.
   *
   * The ignore file itself is exempt from the rules it contains, so only
   * an explicit exclude can drop it.
   */
  check(relativePath: string, isDirectory = false): IgnoreCheckResult {
    const rules =
      !isDirectory && relativePath === this.ignoreFileName
        ? this._rules.filter((rule) => rule.origin !== 'ignore-file' && rule.origin !== 'builtin')
        : this._rules;
    return checkIgnored(relativePath, rules, isDirectory);
  }

  isIgnored(relativePath: string, isDirectory = false): boolean {
    return this.check(relativePath, isDirectory).ignored;
  }

  /** True when a file path is admitted by the rule set */
  matches(relativePath: string): boolean {
    return !this.isIgnored(relativePath, false);
  }

  /**
   * Whether a directory's whole subtree can be skipped. Only safe when
   * nothing could re-include a path below it.
   */
  canPrune(relativeDir: string): boolean {
    return !this.hasReinclusion && this.isIgnored(relativeDir, true);
  }
}

/** Escape glob metacharacters so a file name matches literally. */
function escapeLiteral(name: string): string {
  return name.replace(/[*?[\]]/g, (char) => `[${char}]`);
}
