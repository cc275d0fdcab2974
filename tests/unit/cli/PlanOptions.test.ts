import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { buildPlanFromOptions, resolvePlan, transferOverrides } from '../../../src/cli/lib/PlanOptions.js';
import { PlanValidationError } from '../../../src/core/errors.js';

describe('PlanOptions', () => {
  describe('buildPlanFromOptions', () => {
    it('should build a plan from inline options', () => {
      const plan = buildPlanFromOptions({
        source: '~/captures',
        dest: 'eng@10.0.0.5:/data',
        pattern: ['*.log', '*.txt'],
        timeRange: 'today',
        minSize: '10M',
        backend: 'remote',
        name: 'Nightly',
      });

      expect(plan).toEqual({
        source: '~/captures',
        destination: 'eng@10.0.0.5:/data',
        backendKey: 'remote',
        presetName: 'Nightly',
        filterConfig: {
          id: 'default',
          name: 'Nightly',
          includeDirs: ['*'],
          patterns: ['*.log', '*.txt'],
          timeRange: 'today',
          sizeLimit: '10M',
        },
      });
    });

    it('should use match-all defaults', () => {
      const plan = buildPlanFromOptions({ source: '/a', dest: '/b' });
      expect(plan.filterConfig.patterns).toEqual(['*']);
      expect(plan.filterConfig.timeRange).toBe('unlimited');
      expect(plan.filterConfig.sizeLimit).toBe('unlimited');
      expect(plan.backendKey).toBeUndefined();
    });

    it('should treat an all-digit size as bytes', () => {
      expect(buildPlanFromOptions({ source: '/a', dest: '/b', minSize: '2048' }).filterConfig.sizeLimit).toBe(2048);
    });

    it('should reject missing endpoints and unknown backends', () => {
      expect(() => buildPlanFromOptions({ source: '/a' })).toThrow(PlanValidationError);
      expect(() => buildPlanFromOptions({ source: '/a', dest: '/b', backend: 'ftp' })).toThrow(/backend_key: /);
    });
  });

  describe('resolvePlan', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ferry-cli-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should prefer the plan file over inline options', async () => {
      const file = path.join(dir, 'plan.yml');
      await fs.writeFile(file, 'source: /from-file\ndestination: /to-file\n');

      const plan = await resolvePlan(file, { source: '/inline', dest: '/inline-dest' });

      expect(plan.source).toBe('/from-file');
      expect(plan.destination).toBe('/to-file');
    });

    it('should fall back to inline options', async () => {
      expect((await resolvePlan(undefined, { source: '/a', dest: '/b' })).source).toBe('/a');
    });
  });

  describe('transferOverrides', () => {
    it('should only override flags the user flipped', () => {
      expect(transferOverrides({ resume: true })).toEqual({});
      expect(transferOverrides({ resume: false, verify: true })).toEqual({ resume: false, verify: true });
    });
  });
});
