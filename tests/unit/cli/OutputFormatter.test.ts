import { describe, it, expect, beforeAll, afterAll, afterEach, jest } from '@jest/globals';
import chalk from 'chalk';
import { OutputFormatter, formatPreview, formatReport } from '../../../src/cli/lib/OutputFormatter.js';
import { createCopyPlan } from '../../../src/core/domain.js';

describe('OutputFormatter', () => {
  const originalLevel = chalk.level;
  const plan = createCopyPlan({
    source: '/captures',
    destination: '/mnt/usb',
    filterConfig: { patterns: ['*.log'] },
  });

  beforeAll(() => {
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = originalLevel;
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should list previewed files and the total', () => {
    const text = formatPreview(plan, {
      files: [{ path: '/captures/a.log', name: 'a.log', size: 1536, modifiedAt: new Date(0) }],
      totalBytes: 1536,
    });

    expect(text.split('\n')).toEqual([
      'Source: /captures',
      'Filter: [Dir: All | Time: All Time | Type: *.log | Size: Any Size]',
      '',
      '     1.5 KiB  /captures/a.log',
      '',
      'Total: 1.5 KiB (1536 bytes)',
    ]);
  });

  it('should say when nothing matched', () => {
    expect(formatPreview(plan, { files: [], totalBytes: 0 })).toContain('  (no matching files)');
  });

  it('should show unknown free space', () => {
    const text = formatReport(plan, {
      backend: 'cloud',
      totalBytes: 0,
      freeBytes: -1,
      createdDestination: false,
      resume: true,
      verify: false,
    });

    expect(text.split('\n')).toContain('Free space:  unknown');
    expect(text.split('\n')).toContain('Backend:     cloud');
  });

  it('should print JSON in json mode', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    new OutputFormatter(true).output('ignored', { ok: 1 });

    expect(log).toHaveBeenCalledWith('{\n  "ok": 1\n}');
  });

  it('should print errors to stderr in text mode', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    new OutputFormatter(false).error('Copy failed: boom');

    expect(error).toHaveBeenCalledWith('✖ Copy failed: boom');
  });

  it('should print the text form in text mode', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    new OutputFormatter(false).output('Total: 0 B (0 bytes)', { ok: 1 });

    expect(log).toHaveBeenCalledWith('Total: 0 B (0 bytes)');
  });

  it('should report errors as JSON on stdout in json mode', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    new OutputFormatter(true).error('Copy failed: boom', { exitCode: 23 });

    expect(log).toHaveBeenCalledWith(
      '{\n  "success": false,\n  "error": "Copy failed: boom",\n  "details": {\n    "exitCode": 23\n  }\n}'
    );
  });
});
