/**
 * Reads copy plans from YAML or JSON files.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { planFromRecord, planToRecord, type CopyPlan } from './domain.js';
import { PlanValidationError } from './errors.js';

const YAML_EXTENSIONS = new Set(['.yaml', '.yml']);

export function parsePlan(content: string, format: 'yaml' | 'json'): CopyPlan {
  let data: unknown;
  try {
    data = format === 'yaml' ? yaml.load(content) : JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PlanValidationError([`(root): ${message}`]);
  }
  return planFromRecord(data);
}

export async function loadPlanFile(filePath: string): Promise<CopyPlan> {
  const content = await fs.readFile(filePath, 'utf-8');
  const format = YAML_EXTENSIONS.has(path.extname(filePath).toLowerCase()) ? 'yaml' : 'json';
  return parsePlan(content, format);
}

export function serializePlan(plan: CopyPlan, format: 'yaml' | 'json' = 'yaml'): string {
  const record = planToRecord(plan);
  return format === 'yaml' ? yaml.dump(record) : JSON.stringify(record, null, 2);
}
