/**
 * Transfer Configuration
 *
 * Defaults for the transport pipeline, read from the environment once and
 * cached. Call resetTransferConfig() in tests after changing process.env.
 */

import type { ChecksumAlgorithm } from './checksum.js';

export interface TransferConfiguration {
  /** Default resume flag for execute() (FERRY_RESUME, default true) */
  resume: boolean;
  /** Default verify flag for execute() (FERRY_VERIFY, default false) */
  verify: boolean;
  /** Number of files listed by preview (FERRY_PREVIEW_LIMIT, default 50) */
  previewLimit: number;
  /** Private key handed to ssh (FERRY_SSH_KEY) */
  sshKey?: string;
  /** Digest used for post-copy verification (FERRY_CHECKSUM_ALGORITHM, default sha256) */
  checksumAlgorithm: ChecksumAlgorithm;
  /** ssh ConnectTimeout used by connect() probes, in seconds (FERRY_CONNECT_TIMEOUT, default 5) */
  connectTimeoutSeconds: number;
}

let cachedConfig: TransferConfiguration | null = null;

const TRUE_TOKENS = new Set(['1', 'true', 'yes', 'on']);
const FALSE_TOKENS = new Set(['0', 'false', 'no', 'off']);

export function parseBooleanFlag(value: string | undefined, fallback: boolean): boolean {
  const token = (value ?? '').trim().toLowerCase();
  if (TRUE_TOKENS.has(token)) return true;
  if (FALSE_TOKENS.has(token)) return false;
  return fallback;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseAlgorithm(value: string | undefined): ChecksumAlgorithm {
  return value?.trim().toLowerCase() === 'md5' ? 'md5' : 'sha256';
}

export function getTransferConfig(): TransferConfiguration {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    resume: parseBooleanFlag(process.env['FERRY_RESUME'], true),
    verify: parseBooleanFlag(process.env['FERRY_VERIFY'], false),
    previewLimit: parsePositiveInt(process.env['FERRY_PREVIEW_LIMIT'], 50),
    sshKey: process.env['FERRY_SSH_KEY'] || undefined,
    checksumAlgorithm: parseAlgorithm(process.env['FERRY_CHECKSUM_ALGORITHM']),
    connectTimeoutSeconds: parsePositiveInt(process.env['FERRY_CONNECT_TIMEOUT'], 5),
  };

  return cachedConfig;
}

export function resetTransferConfig(): void {
  cachedConfig = null;
}
