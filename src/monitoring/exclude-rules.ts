/**
 * Exclude Rules
 *
 * Compiles wildcard exclude expressions into path predicates.
 *
 * - `.` matches a literal dot
 * - `*` matches ONE or more characters (`app*.log` does not match `app.log`)
 * - `?` matches exactly one character
 * - everything else is literal
 *
 * Rules are unanchored and case-sensitive: a rule excludes a path when it
 * matches anywhere inside it.
 */

export interface ExcludeRule {
  /** Wildcard the rule was compiled from */
  readonly source: string;
  readonly regex: RegExp;
  matches(path: string): boolean;
}

const REGEX_SPECIALS = new Set(['\\', '^', '$', '+', '(', ')', '[', ']', '{', '}', '|']);

/**
 * Translate a wildcard into a regular expression source
 */
export function wildcardToRegexSource(wildcard: string): string {
  let source = '';

  for (const char of wildcard) {
    if (char === '.') {
      source += '\\.';
    } else if (char === '*') {
      source += '.+';
    } else if (char === '?') {
      source += '.';
    } else if (REGEX_SPECIALS.has(char)) {
      source += `\\${char}`;
    } else {
      source += char;
    }
  }

  return source;
}

export function compileExcludeRule(wildcard: string): ExcludeRule {
  const regex = new RegExp(wildcardToRegexSource(wildcard));

  return {
    source: wildcard,
    regex,
    matches: (path) => regex.test(path),
  };
}

export function compileExcludeRules(wildcards: readonly string[]): ExcludeRule[] {
  return wildcards.map(compileExcludeRule);
}

/**
 * First rule excluding the path, if any
 */
export function findExcludeRule(rules: readonly ExcludeRule[], path: string): ExcludeRule | undefined {
  return rules.find((rule) => rule.matches(path));
}
