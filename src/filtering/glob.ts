/**
 * Shell-style glob matching on file names (fnmatch semantics, case-sensitive).
 *
 *   *        any run of characters, including none
 *   ?        exactly one character
 *   [abc]    one of a, b, c; ranges like [a-z]
 *   [!abc]   any character except a, b, c
 *
 * Everything else, including an unterminated '[', is literal.
 */

import { isMatchAll } from '../core/domain.js';

/**
 * Index of the ']' closing the class opened at `start`, or -1.
 * A ']' directly after '[' or '[!' belongs to the class.
 */
function findClassEnd(glob: string, start: number): number {
  let j = start + 1;
  if (glob.charAt(j) === '!') j += 1;
  if (glob.charAt(j) === ']') j += 1;
  while (j < glob.length && glob.charAt(j) !== ']') j += 1;
  return j < glob.length ? j : -1;
}

/**
 * Convert a glob to an anchored RegExp.
 * @throws SyntaxError for an invalid class range such as [z-a]
 */
export function globToRegex(glob: string): RegExp {
  let source = '';

  for (let i = 0; i < glob.length; i += 1) {
    const ch = glob.charAt(i);

    if (ch === '*') {
      source += '.*';
    } else if (ch === '?') {
      source += '.';
    } else if (ch === '[') {
      const end = findClassEnd(glob, i);
      if (end === -1) {
        source += '\\[';
        continue;
      }
      let body = glob.slice(i + 1, end);
      const negate = body.startsWith('!');
      if (negate) body = body.slice(1);
      source += `[${negate ? '^' : ''}${body.replace(/[\\\]\[^]/g, '\\$&')}]`;
      i = end;
    } else {
      source += ch.replace(/[.+^${}()|\\/]/g, '\\$&');
    }
  }

  return new RegExp(`^${source}$`, 's');
}

/**
 * Check a file name against one glob. Invalid globs match nothing.
 */
export function matchesGlob(name: string, glob: string): boolean {
  if (glob === '*') {
    return true;
  }
  try {
    return globToRegex(glob).test(name);
  } catch {
    return false;
  }
}

/**
 * True when the name matches at least one glob. An empty or ['*'] set matches everything.
 */
export function matchesAnyGlob(name: string, globs: readonly string[]): boolean {
  if (isMatchAll(globs)) {
    return true;
  }
  return globs.some((glob) => matchesGlob(name, glob));
}
