/**
 * Resolves the plan a preview/copy command works on: from a plan file, or
 * from inline options validated through the persisted plan schema.
 */

import type { CopyPlan, TransferOptions } from '../../core/domain.js';
import { planFromRecord } from '../../core/domain.js';
import { loadPlanFile } from '../../core/PlanLoader.js';
import type { CopyOptions, PlanOptions } from '../types/index.js';

const INTEGER = /^\d+$/;

/**
 * @throws PlanValidationError when required options are missing or invalid
 */
export function buildPlanFromOptions(options: PlanOptions): CopyPlan {
  const sizeLimit =
    options.minSize === undefined
      ? 'unlimited'
      : INTEGER.test(options.minSize)
        ? Number(options.minSize)
        : options.minSize;

  return planFromRecord({
    source: options.source,
    destination: options.dest,
    backend_key: options.backend ?? null,
    preset_name: options.name ?? null,
    filter_config: {
      name: options.name ?? 'Custom Filter',
      patterns: options.pattern && options.pattern.length > 0 ? options.pattern : ['*'],
      time_range: options.timeRange ?? 'unlimited',
      size_limit: sizeLimit,
    },
  });
}

export async function resolvePlan(planFile: string | undefined, options: PlanOptions): Promise<CopyPlan> {
  return planFile ? loadPlanFile(planFile) : buildPlanFromOptions(options);
}

/**
 * Only flags the user actually flipped override the configured defaults.
 */
export function transferOverrides(options: CopyOptions): Partial<TransferOptions> {
  const overrides: Partial<TransferOptions> = {};
  if (options.resume === false) {
    overrides.resume = false;
  }
  if (options.verify === true) {
    overrides.verify = true;
  }
  return overrides;
}
