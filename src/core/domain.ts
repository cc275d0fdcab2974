/**
 * Domain types for copy planning: CopyPlan, FilterConfig, StorageEndpoint, SyncJob.
 *
 * Runtime values use camelCase; the persisted form (planToRecord /
 * planFromRecord) uses the snake_case mapping shared with YAML/JSON plan files.
 */

import * as path from 'path';
import { z } from 'zod';
import { PlanValidationError } from './errors.js';

export const BACKEND_KEYS = ['filesystem', 'local', 'remote', 'cloud'] as const;
export type BackendKey = (typeof BACKEND_KEYS)[number];

export const TIME_RANGES = ['unlimited', 'today', '1h'] as const;
export type TimeRange = (typeof TIME_RANGES)[number];

/** Byte floor as a number, 'unlimited', or a size string such as '10M' */
export type SizeLimit = number | string;

export interface FilterConfig {
  readonly id: string;
  readonly name: string;
  readonly includeDirs: readonly string[];
  readonly patterns: readonly string[];
  /** One of TIME_RANGES; anything else means no time floor */
  readonly timeRange: string;
  readonly sizeLimit: SizeLimit;
}

export interface CopyPlan {
  readonly source: string;
  readonly destination: string;
  readonly filterConfig: FilterConfig;
  readonly backendKey?: BackendKey;
  readonly presetName?: string;
}

export interface StorageEndpoint {
  id: string;
  name: string;
  backendKey: BackendKey;
  address: string;
  path: string;
}

export interface SyncJob {
  id: string;
  name: string;
  source: StorageEndpoint;
  destination: StorageEndpoint;
  filterConfig: FilterConfig;
}

/** A candidate file found during preview */
export interface FileEntry {
  path: string;
  name: string;
  size: number;
  modifiedAt: Date;
}

export interface PreviewResult {
  files: FileEntry[];
  totalBytes: number;
}

export interface TransferOptions {
  resume: boolean;
  verify: boolean;
}

export function createFilterConfig(overrides: Partial<FilterConfig> = {}): FilterConfig {
  return Object.freeze({
    id: overrides.id ?? 'default',
    name: overrides.name ?? 'All Files',
    includeDirs: Object.freeze([...(overrides.includeDirs ?? ['*'])]),
    patterns: Object.freeze([...(overrides.patterns ?? ['*'])]),
    timeRange: overrides.timeRange ?? 'unlimited',
    sizeLimit: overrides.sizeLimit ?? 'unlimited',
  });
}

export function createCopyPlan(input: {
  source: string;
  destination: string;
  filterConfig?: Partial<FilterConfig>;
  backendKey?: BackendKey;
  presetName?: string;
}): CopyPlan {
  return Object.freeze({
    source: input.source,
    destination: input.destination,
    filterConfig: createFilterConfig(input.filterConfig),
    backendKey: input.backendKey,
    presetName: input.presetName,
  });
}

/**
 * True when a glob set selects everything: empty, or only '*'.
 */
export function isMatchAll(globs: readonly string[]): boolean {
  return globs.length === 0 || globs.every((glob) => glob === '*');
}

/**
 * One-line description, e.g. "[Dir: All | Time: today | Type: *.log | Size: 1M]".
 */
export function summarizeFilter(config: FilterConfig): string {
  const dirs = isMatchAll(config.includeDirs) ? 'All' : config.includeDirs.join(',');
  const types = isMatchAll(config.patterns) ? 'All' : config.patterns.join(',');
  const time = config.timeRange === 'unlimited' ? 'All Time' : config.timeRange;
  const size = ['unlimited', '0'].includes(String(config.sizeLimit)) ? 'Any Size' : String(config.sizeLimit);
  return `[Dir: ${dirs} | Time: ${time} | Type: ${types} | Size: ${size}]`;
}

/**
 * Full address of an endpoint: cloud roots get "/path", remote hosts ":path",
 * local roots a path join.
 */
export function endpointFullPath(endpoint: StorageEndpoint): string {
  if (!endpoint.path) {
    return endpoint.address;
  }
  if (endpoint.address.includes('://')) {
    return `${endpoint.address.replace(/\/+$/, '')}/${endpoint.path.replace(/^\/+/, '')}`;
  }
  if (endpoint.backendKey === 'remote') {
    return `${endpoint.address}:${endpoint.path}`;
  }
  return path.join(endpoint.address, endpoint.path.replace(/^\/+/, ''));
}

/**
 * Build the plan a saved job describes. The destination endpoint decides the backend.
 */
export function planFromJob(job: SyncJob): CopyPlan {
  return createCopyPlan({
    source: endpointFullPath(job.source),
    destination: endpointFullPath(job.destination),
    filterConfig: job.filterConfig,
    backendKey: job.destination.backendKey,
    presetName: job.name,
  });
}

// =============================================================================
// Persisted form
// =============================================================================

export const filterConfigRecordSchema = z.object({
  id: z.string().default('default'),
  name: z.string().default('Custom Filter'),
  include_dirs: z.array(z.string()).default(['*']),
  patterns: z.array(z.string()).default(['*']),
  time_range: z.string().default('unlimited'),
  size_limit: z.union([z.number().int(), z.string()]).default('unlimited'),
});

export const copyPlanRecordSchema = z.object({
  source: z.string().min(1),
  destination: z.string().min(1),
  backend_key: z.enum(BACKEND_KEYS).nullable().optional(),
  preset_name: z.string().nullable().optional(),
  filter_config: filterConfigRecordSchema.nullable().optional(),
});

export type FilterConfigRecord = z.output<typeof filterConfigRecordSchema>;
export type CopyPlanRecord = z.input<typeof copyPlanRecordSchema>;

export function planToRecord(plan: CopyPlan): CopyPlanRecord {
  const filter = plan.filterConfig;
  return {
    source: plan.source,
    destination: plan.destination,
    backend_key: plan.backendKey ?? null,
    preset_name: plan.presetName ?? null,
    filter_config: {
      id: filter.id,
      name: filter.name,
      include_dirs: [...filter.includeDirs],
      patterns: [...filter.patterns],
      time_range: filter.timeRange,
      size_limit: filter.sizeLimit,
    },
  };
}

/**
 * Validate and convert a persisted plan mapping.
 * @throws PlanValidationError listing every schema issue
 */
export function planFromRecord(data: unknown): CopyPlan {
  const parsed = copyPlanRecordSchema.safeParse(data);
  if (!parsed.success) {
    throw new PlanValidationError(
      parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    );
  }

  const record = parsed.data;
  return createCopyPlan({
    source: record.source,
    destination: record.destination,
    backendKey: record.backend_key ?? undefined,
    presetName: record.preset_name ?? undefined,
    filterConfig: record.filter_config ? filterConfigFromRecord(record.filter_config) : undefined,
  });
}

/**
 * A stored filter without a name is a user-defined one ("Custom Filter");
 * a plan without any filter gets the "All Files" default from createFilterConfig.
 */
function filterConfigFromRecord(filter: FilterConfigRecord): Partial<FilterConfig> {
  return {
    id: filter.id,
    name: filter.name,
    includeDirs: filter.include_dirs,
    patterns: filter.patterns,
    timeRange: filter.time_range,
    sizeLimit: filter.size_limit,
  };
}
