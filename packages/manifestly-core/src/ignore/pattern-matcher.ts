/**
 * Compiles ignore-file lines into rules and evaluates relative paths
 * against an ordered rule list.
 *
 * Glob syntax follows gitignore: `*` and `?` stay within one segment,
 * `**` crosses segments, `[...]` is a character class (`[!...]` negates),
 * a leading `!` re-admits, a trailing `/` restricts the rule to
 * directories and any other `/` anchors the rule at the root.
 */

import type { IgnoreRule, IgnoreCheckResult, IgnoreRuleOrigin } from './types.js';

const REGEX_SPECIALS = new Set(['.', '+', '^', '$', '{', '}', '(', ')', '|', '\\', ']']);

interface GlobShape {
  body: string;
  anchored: boolean;
}

export function parsePattern(
  line: string,
  source: string,
  origin: IgnoreRuleOrigin = 'ignore-file',
): IgnoreRule | null {
  const text = line.trim();
  if (text === '' || text.startsWith('#')) {
    return null;
  }

  const negated = text.startsWith('!');
  const withoutBang = negated ? text.slice(1) : text;
  const directoryOnly = withoutBang.endsWith('/');
  const glob = directoryOnly ? withoutBang.replace(/\/+$/, '') : withoutBang;
  if (glob === '') {
    return null;
  }

  const shape = classify(glob);
  const head = shape.anchored ? '^' : '(?:^|/)';
  const translated = translate(shape.body);

  return {
    pattern: text,
    subtree: new RegExp(`${head}${translated}(?:/.*)?$`),
    exact: new RegExp(`${head}${translated}$`),
    negated,
    directoryOnly,
    source,
    origin,
  };
}

export function parsePatterns(
  content: string,
  source: string,
  origin: IgnoreRuleOrigin = 'ignore-file',
): IgnoreRule[] {
  return content
    .split(/\r?\n/)
    .map((line) => parsePattern(line, source, origin))
    .filter((rule): rule is IgnoreRule => rule !== null);
}

/**
 * Evaluate `relativePath` against `rules`. The last matching rule decides;
 * a directory-only rule never matches a regular file of the same name,
 * though it still covers everything beneath that directory.
 */
export function checkIgnored(
  relativePath: string,
  rules: readonly IgnoreRule[],
  isDirectory = false,
): IgnoreCheckResult {
  const subject = relativePath.replace(/\\/g, '/').replace(/^\.?\/+/, '');
  let decisive: IgnoreRule | undefined;

  for (const rule of rules) {
    if (!rule.subtree.test(subject)) continue;
    if (rule.directoryOnly && !isDirectory && rule.exact.test(subject)) continue;
    decisive = rule;
  }

  return { ignored: decisive !== undefined && !decisive.negated, matchedRule: decisive };
}

function classify(glob: string): GlobShape {
  if (glob.startsWith('/')) {
    return { body: glob.slice(1), anchored: true };
  }
  // "**/x" is the same as an unanchored "x"
  if (glob.startsWith('**/')) {
    return { body: glob.slice(3), anchored: false };
  }
  return { body: glob, anchored: glob.includes('/') };
}

function translate(glob: string): string {
  const out: string[] = [];
  let pos = 0;

  while (pos < glob.length) {
    const ch = glob.charAt(pos);

    switch (ch) {
      case '*': {
        const double = glob.charAt(pos + 1) === '*';
        if (double && glob.charAt(pos + 2) === '/') {
          out.push('(?:.+/)?');
          pos += 3;
        } else if (double) {
          out.push('.*');
          pos += 2;
        } else {
          out.push('[^/]*');
          pos += 1;
        }
        break;
      }
      case '?':
        out.push('[^/]');
        pos += 1;
        break;
      case '[': {
        const range = readClass(glob, pos);
        out.push(range.source);
        pos = range.next;
        break;
      }
      default:
        out.push(REGEX_SPECIALS.has(ch) ? `\\${ch}` : ch);
        pos += 1;
    }
  }

  return out.join('');
}

/** A `]` directly after the opening bracket belongs to the class. */
function readClass(glob: string, open: number): { source: string; next: number } {
  const close = glob.indexOf(']', open + 2);
  if (close === -1) {
    return { source: '\\[', next: open + 1 };
  }
  const members = glob.slice(open + 1, close);
  const inverted = members.startsWith('!');
  const escaped = (inverted ? members.slice(1) : members).replace(/[\\\]]/g, '\\$&');
  return { source: `[${inverted ? '^' : ''}${escaped}]`, next: close + 1 };
}
