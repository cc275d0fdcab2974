/**
 * CloudBackend
 *
 * Placeholder for object storage (scheme://bucket/prefix). It answers every
 * probe permissively and records transfer requests without any network I/O,
 * so the rest of the pipeline can run against cloud destinations.
 */

import type { CopyPlan, TransferOptions } from '../core/domain.js';
import { getLogger, registerComponent } from '../logging/index.js';
import type { BackendKind, StorageBackend } from './types.js';

registerComponent('storage.cloud', 'Cloud object storage placeholder');
const logger = getLogger('storage.cloud');

export interface CloudTransferIntent {
  source: string;
  destination: string;
  /** Resumable (checkpointed, chunked) upload requested */
  resumable: boolean;
  verify: boolean;
  requestedAt: Date;
}

export class CloudBackend implements StorageBackend {
  readonly kind: BackendKind = 'cloud';

  private readonly intents: CloudTransferIntent[] = [];

  get recordedTransfers(): readonly CloudTransferIntent[] {
    return this.intents;
  }

  async connect(): Promise<boolean> {
    return true;
  }

  /**
   * Bucket capacity is not a meaningful precondition, so it is always unknown.
   */
  async getFreeSpace(_path: string): Promise<number> {
    return -1;
  }

  async listDirs(_path: string): Promise<string[]> {
    return [];
  }

  async exists(_path: string): Promise<boolean> {
    return true;
  }

  async mkdir(_path: string): Promise<void> {
    // prefixes exist implicitly in object storage
  }

  async transfer(plan: CopyPlan, options: TransferOptions): Promise<void> {
    logger.info(`Cloud transfer recorded (no upload performed): ${plan.source} -> ${plan.destination}`);
    if (options.resume) {
      logger.info('Resumable chunked upload requested');
    }
    this.intents.push({
      source: plan.source,
      destination: plan.destination,
      resumable: options.resume,
      verify: options.verify,
      requestedAt: new Date(),
    });
  }
}
