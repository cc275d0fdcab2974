import { describe, it, expect } from '@jest/globals';
import { globToRegex, matchesAnyGlob, matchesGlob } from '../../../src/filtering/glob.js';

describe('glob', () => {
  it('should match * and ? against whole names', () => {
    expect(matchesGlob('a.log', '*.log')).toBe(true);
    expect(matchesGlob('a.log.gz', '*.log')).toBe(false);
    expect(matchesGlob('a1.txt', 'a?.txt')).toBe(true);
    expect(matchesGlob('a12.txt', 'a?.txt')).toBe(false);
  });

  it('should be case-sensitive', () => {
    expect(matchesGlob('A.LOG', '*.log')).toBe(false);
  });

  it('should support classes, ranges and negation', () => {
    expect(matchesGlob('b.log', '[abc].log')).toBe(true);
    expect(matchesGlob('d.log', '[a-c].log')).toBe(false);
    expect(matchesGlob('d.log', '[!a-c].log')).toBe(true);
    expect(matchesGlob(']x', '[]]x')).toBe(true);
  });

  it('should treat regex metacharacters and an unterminated [ literally', () => {
    expect(matchesGlob('a+b(1).log', 'a+b(1).log')).toBe(true);
    expect(matchesGlob('aXlog', 'a.log')).toBe(false);
    expect(matchesGlob('[abc', '[abc')).toBe(true);
  });

  it('should let * cross newlines in names', () => {
    expect(matchesGlob('a\nb.log', '*.log')).toBe(true);
  });

  it('should anchor the generated expression', () => {
    expect(globToRegex('*.log').source).toBe('^.*\\.log$');
  });

  it('should match nothing for an invalid range', () => {
    expect(matchesGlob('a', '[z-a]')).toBe(false);
  });

  it('should treat empty and star-only sets as match-all', () => {
    expect(matchesAnyGlob('anything', [])).toBe(true);
    expect(matchesAnyGlob('anything', ['*'])).toBe(true);
    expect(matchesAnyGlob('b.txt', ['*.log', '*.txt'])).toBe(true);
    expect(matchesAnyGlob('c.bin', ['*.log', '*.txt'])).toBe(false);
  });
});
