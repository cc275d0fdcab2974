/**
 * Common interface for all storage backends.
 *
 * Each medium (local filesystem, ssh host via rsync, cloud bucket) implements
 * this interface so the transport pipeline can run the same stages
 * regardless of where the data lives.
 *
 * connect, getFreeSpace, listDirs and exists are advisory probes: they never
 * reject, and a failure shows up as false, -1 or []. transfer is the
 * authoritative step and must reject on any failure.
 */

import type { CopyPlan, TransferOptions } from '../core/domain.js';

export type BackendKind = 'filesystem' | 'remote' | 'cloud';

export interface StorageBackend {
  readonly kind: BackendKind;

  /**
   * Best-effort reachability probe.
   */
  connect(): Promise<boolean>;

  /**
   * Free bytes available at `path`, or -1 when unknowable.
   */
  getFreeSpace(path: string): Promise<number>;

  /**
   * Names of the immediate child directories of `path`.
   */
  listDirs(path: string): Promise<string[]>;

  exists(path: string): Promise<boolean>;

  /**
   * Create the directory and any missing ancestors. No error if it already exists.
   */
  mkdir(path: string): Promise<void>;

  /**
   * Move the plan's data. Rejects on any failure; partial output stays in place.
   */
  transfer(plan: CopyPlan, options: TransferOptions): Promise<void>;
}
