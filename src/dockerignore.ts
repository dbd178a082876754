/**
 * @fileoverview .dockerignore parsing and exclusion pattern matching.
 * Patterns are matched against slash-separated paths relative to the build context.
 */

import * as path from 'node:path';

const UTF8_BOM = '\uFEFF';

/**
 * Reads exclusion patterns from the content of a .dockerignore file.
 *
 * Comment lines (starting with `#`) and blank lines are dropped, patterns are
 * cleaned and made relative to the context root. A leading `!` is kept to mark
 * an exception.
 *
 * @param content - Raw file content.
 * @returns Cleaned patterns in file order.
 */
export function readDockerignore(content: string): ReadonlyArray<string> {
  const [firstLine = '', ...otherLines] = content.split(/\r?\n/);
  const lines = [firstLine.startsWith(UTF8_BOM) ? firstLine.slice(UTF8_BOM.length) : firstLine, ...otherLines];

  return lines.flatMap((line) => {
    if (line.startsWith('#')) {
      return [];
    }
    let pattern = line.trim();
    if (pattern === '') {
      return [];
    }

    const invert = pattern.startsWith('!');
    if (invert) {
      pattern = pattern.slice(1).trim();
    }
    if (pattern.length > 0) {
      pattern = cleanPath(pattern);
      if (pattern.length > 1 && pattern.startsWith('/')) {
        pattern = pattern.slice(1);
      }
    }
    return [invert ? `!${pattern}` : pattern];
  });
}

/**
 * Lexically cleans a slash-separated path: collapses duplicate separators,
 * resolves `.` and `..` segments and drops any trailing slash.
 */
function cleanPath(value: string): string {
  if (value === '') {
    return '.';
  }
  const normalized = path.posix.normalize(value);
  return normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized;
}

type CompiledPattern = {
  readonly source: string;
  readonly exception: boolean;
  readonly regex: RegExp;
  readonly depth: number;
};

/**
 * Converts an exclusion pattern to a regular expression.
 * `*` matches within a path segment, `?` matches one non-separator character,
 * `**` matches any number of segments and `\` escapes the next character.
 * Character classes in brackets are passed through.
 *
 * @param pattern - Cleaned pattern without a leading `!`.
 */
function patternToRegex(pattern: string): RegExp {
  let regex = '^';
  const chars = [...pattern];

  for (let index = 0; index < chars.length; index++) {
    const ch = chars[index] ?? '';
    if (ch === '*') {
      if (chars[index + 1] === '*') {
        index++;
        // "**/" behaves as "**"
        if (chars[index + 1] === '/') {
          index++;
        }
        regex += index + 1 >= chars.length ? '.*' : '(.*/)?';
      } else {
        regex += '[^/]*';
      }
    } else if (ch === '?') {
      regex += '[^/]';
    } else if (ch === '\\') {
      const next = chars[index + 1];
      if (next === undefined) {
        regex += '\\\\';
      } else {
        regex += `\\${next}`;
        index++;
      }
    } else if (/[.+^${}()|]/.test(ch)) {
      regex += `\\${ch}`;
    } else {
      regex += ch;
    }
  }

  regex += '$';
  return new RegExp(regex);
}

function compilePattern(rawPattern: string): CompiledPattern | undefined {
  let pattern = rawPattern.trim();
  if (pattern === '') {
    return undefined;
  }

  let exception = false;
  if (pattern.startsWith('!')) {
    if (pattern.length === 1) {
      throw new Error('Illegal exclusion pattern: "!"');
    }
    exception = true;
    pattern = pattern.slice(1);
  }
  pattern = cleanPath(pattern);

  let regex: RegExp;
  try {
    regex = patternToRegex(pattern);
  } catch (patternError) {
    throw new Error(`Syntax error in exclusion pattern "${rawPattern}": ${patternError}`);
  }

  return { source: pattern, exception, regex, depth: pattern.split('/').length };
}

/**
 * Matches context-relative paths against an ordered list of exclusion patterns.
 * The last matching pattern decides; exception patterns (`!`) re-include paths.
 */
export class PatternMatcher {
  private readonly patterns: ReadonlyArray<CompiledPattern>;

  constructor(patterns: ReadonlyArray<string>) {
    this.patterns = patterns.flatMap((pattern) => {
      const compiled = compilePattern(pattern);
      return compiled ? [compiled] : [];
    });
  }

  /**
   * Whether any pattern is an exception.
   */
  get hasExceptions(): boolean {
    return this.patterns.some((pattern) => pattern.exception);
  }

  /**
   * Checks whether a context-relative path is excluded.
   * A pattern also excludes a path when it matches one of the path's parent directories.
   *
   * @param filePath - Path relative to the context root, using `/` or the platform separator.
   */
  matches(filePath: string): boolean {
    const file = cleanPath(filePath.split(path.sep).join('/'));
    const parentPath = path.posix.dirname(file);
    const parentDirs = parentPath.split('/');

    let matched = false;
    for (const pattern of this.patterns) {
      let match = pattern.regex.test(file);
      if (!match && parentPath !== '.' && pattern.depth <= parentDirs.length) {
        match = pattern.regex.test(parentDirs.slice(0, pattern.depth).join('/'));
      }
      if (match) {
        matched = !pattern.exception;
      }
    }
    return matched;
  }

  /**
   * Checks whether an excluded directory must still be walked because an
   * exception pattern lies beneath it.
   *
   * @param directory - Directory path relative to the context root.
   */
  mayContainExceptions(directory: string): boolean {
    const dirSlash = `${cleanPath(directory.split(path.sep).join('/'))}/`;
    return this.patterns.some((pattern) => pattern.exception && `${pattern.source}/`.startsWith(dirSlash));
  }
}

