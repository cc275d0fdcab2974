import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { loadPlanFile, parsePlan, serializePlan } from '../../../src/core/PlanLoader.js';
import { createCopyPlan } from '../../../src/core/domain.js';
import { PlanValidationError } from '../../../src/core/errors.js';

const YAML_PLAN = `
source: ~/captures
destination: eng@10.0.0.5:/data
backend_key: remote
preset_name: Nightly
filter_config:
  name: Logs
  include_dirs: ["2026*"]
  patterns: ["*.log", "*.txt"]
  time_range: today
  size_limit: 10M
`;

describe('PlanLoader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ferry-plan-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should load a YAML plan', async () => {
    const file = path.join(dir, 'nightly.yaml');
    await fs.writeFile(file, YAML_PLAN);

    const plan = await loadPlanFile(file);

    expect(plan).toEqual({
      source: '~/captures',
      destination: 'eng@10.0.0.5:/data',
      backendKey: 'remote',
      presetName: 'Nightly',
      filterConfig: {
        id: 'default',
        name: 'Logs',
        includeDirs: ['2026*'],
        patterns: ['*.log', '*.txt'],
        timeRange: 'today',
        sizeLimit: '10M',
      },
    });
  });

  it('should load a JSON plan by extension', async () => {
    const file = path.join(dir, 'plan.json');
    await fs.writeFile(file, JSON.stringify({ source: '/a', destination: '/b', filter_config: { size_limit: 1024 } }));

    const plan = await loadPlanFile(file);

    expect(plan.filterConfig.sizeLimit).toBe(1024);
    expect(plan.filterConfig.patterns).toEqual(['*']);
  });

  it('should report malformed YAML as a validation error', () => {
    expect(() => parsePlan('source: [unclosed', 'yaml')).toThrow(PlanValidationError);
  });

  it('should report schema violations', () => {
    expect(() => parsePlan('source: /a\nbackend_key: ftp\n', 'yaml')).toThrow(/destination: /);
  });

  it('should serialize to a form it can read back', () => {
    const plan = createCopyPlan({
      source: '/captures',
      destination: 'scheme://bucket/p',
      filterConfig: { patterns: ['*.pcap'], sizeLimit: 2048 },
    });
    expect(parsePlan(serializePlan(plan), 'yaml')).toEqual(plan);
    expect(parsePlan(serializePlan(plan, 'json'), 'json')).toEqual(plan);
  });
});
