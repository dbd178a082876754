import { PatternMatcher, readDockerignore } from '../src/dockerignore';

describe('dockerignore', () => {
  describe('readDockerignore', () => {
    it('drops comments and blank lines and cleans patterns', () => {
      const content = '\uFEFF# comment\nnode_modules\n\n  *.log  \n!important.log\n/build/\n./tmp//cache\n! keep \n';
      expect(readDockerignore(content)).toEqual(['node_modules', '*.log', '!important.log', 'build', 'tmp/cache', '!keep']);
    });

    it('only treats # in the first column as a comment', () => {
      expect(readDockerignore('  #notes\n#skipped')).toEqual(['#notes']);
    });

    it('handles CRLF line endings', () => {
      expect(readDockerignore('dist\r\ncoverage\r\n')).toEqual(['dist', 'coverage']);
    });

    it('returns no patterns for empty content', () => {
      expect(readDockerignore('')).toEqual([]);
    });
  });

  describe('PatternMatcher', () => {
    it('matches a star within one path segment', () => {
      const matcher = new PatternMatcher(['*.log']);
      expect(matcher.matches('debug.log')).toBe(true);
      expect(matcher.matches('logs/debug.log')).toBe(false);
    });

    it('matches files below an excluded directory', () => {
      const matcher = new PatternMatcher(['node_modules']);
      expect(matcher.matches('node_modules')).toBe(true);
      expect(matcher.matches('node_modules/pkg/index.js')).toBe(true);
      expect(matcher.matches('src/node_modules.ts')).toBe(false);
    });

    it('matches any depth with a double star', () => {
      const matcher = new PatternMatcher(['**/*.log']);
      expect(matcher.matches('c.log')).toBe(true);
      expect(matcher.matches('a/b/c.log')).toBe(true);
      expect(matcher.matches('a/b/c.txt')).toBe(false);
    });

    it('matches a single character with a question mark', () => {
      const matcher = new PatternMatcher(['file?.txt']);
      expect(matcher.matches('file1.txt')).toBe(true);
      expect(matcher.matches('file10.txt')).toBe(false);
    });

    it('matches parent directories up to the pattern depth', () => {
      const matcher = new PatternMatcher(['a/b']);
      expect(matcher.matches('a/b/c/d')).toBe(true);
      expect(matcher.matches('a/bc/d')).toBe(false);
    });

    it('treats an escaped star literally', () => {
      const matcher = new PatternMatcher(['\\*.txt']);
      expect(matcher.matches('*.txt')).toBe(true);
      expect(matcher.matches('a.txt')).toBe(false);
    });

    it('lets the last matching pattern decide', () => {
      const matcher = new PatternMatcher(['*', '!README.md']);
      expect(matcher.matches('README.md')).toBe(false);
      expect(matcher.matches('src')).toBe(true);
      expect(matcher.hasExceptions).toBe(true);
    });

    it('re-includes files below an excluded directory', () => {
      const matcher = new PatternMatcher(['docs', '!docs/keep.md']);
      expect(matcher.matches('docs/keep.md')).toBe(false);
      expect(matcher.matches('docs/other.md')).toBe(true);
      expect(matcher.mayContainExceptions('docs')).toBe(true);
      expect(matcher.mayContainExceptions('src')).toBe(false);
    });

    it('reports no exceptions for plain patterns', () => {
      const matcher = new PatternMatcher(['dist', '']);
      expect(matcher.hasExceptions).toBe(false);
      expect(matcher.mayContainExceptions('dist')).toBe(false);
    });

    it('rejects a lone exclamation mark', () => {
      expect(() => new PatternMatcher(['!'])).toThrow('Illegal exclusion pattern: "!"');
    });

    it('rejects patterns that do not compile', () => {
      expect(() => new PatternMatcher(['['])).toThrow('Syntax error in exclusion pattern "["');
    });
  });
});
