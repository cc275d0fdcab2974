import { describe, it, expect } from '@jest/globals';
import { formatLocalTimestamp, formatTextLine } from '../../../src/logging/transports.js';

describe('transports', () => {
  it('should format local timestamps with comma millis', () => {
    expect(formatLocalTimestamp(new Date(2026, 1, 3, 4, 5, 6, 7))).toBe('2026-02-03 04:05:06,007');
  });

  it('should pad the level and include the component', () => {
    expect(formatTextLine('info', 'Transfer complete', 'transport', undefined, 'TS')).toBe(
      ' INFO TS [transport] Transfer complete'
    );
  });

  it('should omit an empty component and append the stack', () => {
    expect(formatTextLine('error', 'boom', '', 'Error: boom\n    at x', 'TS')).toBe(
      'ERROR TS boom\nError: boom\n    at x'
    );
  });
});
