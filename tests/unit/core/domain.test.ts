import { describe, it, expect } from '@jest/globals';
import {
  createCopyPlan,
  createFilterConfig,
  endpointFullPath,
  isMatchAll,
  planFromJob,
  planFromRecord,
  planToRecord,
  summarizeFilter,
} from '../../../src/core/domain.js';
import { parseSizeToBytes } from '../../../src/filtering/sizeParser.js';
import type { StorageEndpoint } from '../../../src/core/domain.js';
import { PlanValidationError } from '../../../src/core/errors.js';

function endpoint(overrides: Partial<StorageEndpoint>): StorageEndpoint {
  return { id: 'ep', name: 'Endpoint', backendKey: 'filesystem', address: '/mnt/usb', path: '', ...overrides };
}

describe('domain', () => {
  describe('createFilterConfig', () => {
    it('should apply defaults and freeze', () => {
      const config = createFilterConfig();
      expect(config).toEqual({
        id: 'default',
        name: 'All Files',
        includeDirs: ['*'],
        patterns: ['*'],
        timeRange: 'unlimited',
        sizeLimit: 'unlimited',
      });
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.patterns)).toBe(true);
    });

    it('should copy pattern arrays', () => {
      const patterns = ['*.log'];
      const config = createFilterConfig({ patterns });
      patterns.push('*.txt');
      expect(config.patterns).toEqual(['*.log']);
    });
  });

  it('should freeze plans', () => {
    const plan = createCopyPlan({ source: '/a', destination: '/b' });
    expect(Object.isFrozen(plan)).toBe(true);
    expect(plan.backendKey).toBeUndefined();
  });

  it('should treat empty and star-only sets as match-all', () => {
    expect(isMatchAll([])).toBe(true);
    expect(isMatchAll(['*', '*'])).toBe(true);
    expect(isMatchAll(['*.log'])).toBe(false);
  });

  describe('summarizeFilter', () => {
    it('should describe the default filter', () => {
      expect(summarizeFilter(createFilterConfig())).toBe('[Dir: All | Time: All Time | Type: All | Size: Any Size]');
    });

    it('should list explicit settings', () => {
      const config = createFilterConfig({
        includeDirs: ['2026*'],
        patterns: ['*.log', '*.txt'],
        timeRange: 'today',
        sizeLimit: '1M',
      });
      expect(summarizeFilter(config)).toBe('[Dir: 2026* | Time: today | Type: *.log,*.txt | Size: 1M]');
    });

    it('should show a zero size limit as any size', () => {
      expect(summarizeFilter(createFilterConfig({ sizeLimit: 0 }))).toContain('Size: Any Size]');
    });
  });

  describe('endpointFullPath', () => {
    it('should join cloud roots with one slash', () => {
      expect(endpointFullPath(endpoint({ backendKey: 'cloud', address: 'scheme://bucket/', path: '/logs' }))).toBe(
        'scheme://bucket/logs'
      );
    });

    it('should append remote paths after a colon', () => {
      expect(endpointFullPath(endpoint({ backendKey: 'remote', address: 'eng@10.0.0.5', path: '/data' }))).toBe(
        'eng@10.0.0.5:/data'
      );
    });

    it('should path-join local roots', () => {
      expect(endpointFullPath(endpoint({ address: '/mnt/usb', path: '/logs' }))).toBe('/mnt/usb/logs');
      expect(endpointFullPath(endpoint({ address: '/mnt/usb', path: '' }))).toBe('/mnt/usb');
    });
  });

  it('should build a plan from a job', () => {
    const plan = planFromJob({
      id: 'job-1',
      name: 'Nightly',
      source: endpoint({ address: '/captures' }),
      destination: endpoint({ backendKey: 'remote', address: 'eng@10.0.0.5', path: '/data' }),
      filterConfig: createFilterConfig({ patterns: ['*.pcap'] }),
    });
    expect(plan.source).toBe('/captures');
    expect(plan.destination).toBe('eng@10.0.0.5:/data');
    expect(plan.backendKey).toBe('remote');
    expect(plan.presetName).toBe('Nightly');
    expect(plan.filterConfig.patterns).toEqual(['*.pcap']);
  });

  describe('plan records', () => {
    it('should round-trip through the persisted form', () => {
      const plan = createCopyPlan({
        source: '~/captures',
        destination: 'scheme://bucket/p',
        backendKey: 'cloud',
        presetName: 'Archive',
        filterConfig: { id: 'f1', name: 'Logs', patterns: ['*.log'], timeRange: '1h', sizeLimit: '10M' },
      });
      expect(planFromRecord(planToRecord(plan))).toEqual(plan);
    });

    it('should fill filter defaults for a minimal record', () => {
      const plan = planFromRecord({ source: '/a', destination: '/b' });
      expect(plan.filterConfig).toEqual({
        id: 'default',
        name: 'All Files',
        includeDirs: ['*'],
        patterns: ['*'],
        timeRange: 'unlimited',
        sizeLimit: 'unlimited',
      });
      expect(plan.backendKey).toBeUndefined();
      expect(plan.presetName).toBeUndefined();
    });

    it('should name a stored filter without a name Custom Filter', () => {
      const plan = planFromRecord({ source: '/a', destination: '/b', filter_config: { patterns: ['*.log'] } });
      expect(plan.filterConfig.name).toBe('Custom Filter');
      expect(plan.filterConfig.patterns).toEqual(['*.log']);
    });

    it('should accept a negative size limit as no floor', () => {
      const plan = planFromRecord({ source: '/a', destination: '/b', filter_config: { size_limit: -1 } });
      expect(plan.filterConfig.sizeLimit).toBe(-1);
      expect(parseSizeToBytes(plan.filterConfig.sizeLimit)).toBe(0);
    });

    it('should list every issue', () => {
      let caught: unknown;
      try {
        planFromRecord({ source: '', backend_key: 'ftp' });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(PlanValidationError);
      const issues = caught instanceof PlanValidationError ? caught.issues : [];
      expect(issues).toHaveLength(3);
      expect(issues.some((issue) => issue.startsWith('source: '))).toBe(true);
      expect(issues.some((issue) => issue.startsWith('destination: '))).toBe(true);
      expect(issues.some((issue) => issue.startsWith('backend_key: '))).toBe(true);
    });

    it('should reject a non-object with a root issue', () => {
      expect(() => planFromRecord('just a string')).toThrow(/^Invalid copy plan: \(root\): /);
    });
  });
});
