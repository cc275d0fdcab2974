import { describe, it, expect } from '@jest/globals';
import { CloudBackend } from '../../../src/storage/CloudBackend.js';
import { createCopyPlan } from '../../../src/core/domain.js';

describe('CloudBackend', () => {
  it('should answer probes without I/O', async () => {
    const backend = new CloudBackend();
    expect(backend.kind).toBe('cloud');
    expect(await backend.connect()).toBe(true);
    expect(await backend.getFreeSpace('scheme://bucket/p')).toBe(-1);
    expect(await backend.listDirs('scheme://bucket/p')).toEqual([]);
    expect(await backend.exists('scheme://bucket/p')).toBe(true);
    await expect(backend.mkdir('scheme://bucket/p')).resolves.toBeUndefined();
  });

  it('should record transfer requests', async () => {
    const backend = new CloudBackend();
    const plan = createCopyPlan({ source: '/captures', destination: 'scheme://bucket/p' });

    await backend.transfer(plan, { resume: true, verify: false });

    expect(backend.recordedTransfers).toHaveLength(1);
    expect(backend.recordedTransfers[0]).toMatchObject({
      source: '/captures',
      destination: 'scheme://bucket/p',
      resumable: true,
      verify: false,
    });
    expect(backend.recordedTransfers[0]?.requestedAt).toBeInstanceOf(Date);
  });
});
