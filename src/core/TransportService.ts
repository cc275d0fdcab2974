/**
 * TransportService
 *
 * Runs a copy plan through its stages:
 *   Preview -> Connect -> CapacityCheck -> EnsureDestination -> Transfer -> Done
 *
 * The backend is resolved before the first stage. Any failure stops the run
 * and propagates; data already transferred is left in place so a resumed run
 * can pick it up.
 */

import { buildStorage } from '../storage/registry.js';
import type { StorageBackend } from '../storage/types.js';
import { getLogger, registerComponent } from '../logging/index.js';
import { getTransferConfig } from './config.js';
import type { CopyPlan, PreviewResult, TransferOptions } from './domain.js';
import { CapacityError, ConnectionError } from './errors.js';
import { SourceScanService } from './SourceScanService.js';

registerComponent('transport', 'Copy plan execution');
const logger = getLogger('transport');

export enum TransportStage {
  PREVIEW = 'Preview',
  CONNECT = 'Connect',
  CAPACITY_CHECK = 'CapacityCheck',
  ENSURE_DESTINATION = 'EnsureDestination',
  TRANSFER = 'Transfer',
  DONE = 'Done',
}

export type StageListener = (stage: TransportStage, plan: CopyPlan) => void;

export interface TransportServiceOptions {
  scanService?: SourceScanService;
  storageFactory?: (plan: CopyPlan) => StorageBackend;
  resume?: boolean;
  verify?: boolean;
  onStage?: StageListener;
}

export interface TransportReport {
  backend: StorageBackend['kind'];
  totalBytes: number;
  /** -1 when the destination could not report free space */
  freeBytes: number;
  createdDestination: boolean;
  resume: boolean;
  verify: boolean;
}

export class TransportService {
  private readonly scanService: SourceScanService;
  private readonly storageFactory: (plan: CopyPlan) => StorageBackend;
  private readonly options: TransportServiceOptions;

  constructor(options: TransportServiceOptions = {}) {
    this.options = options;
    this.scanService = options.scanService ?? new SourceScanService();
    this.storageFactory = options.storageFactory ?? ((plan) => buildStorage(plan));
  }

  preview(plan: CopyPlan): Promise<PreviewResult> {
    return this.scanService.preview(plan);
  }

  /**
   * @throws ConnectionError, CapacityError, or whatever the backend raises
   */
  async execute(plan: CopyPlan, overrides: Partial<TransferOptions> = {}): Promise<TransportReport> {
    const storage = this.storageFactory(plan);
    const transferOptions = this.resolveTransferOptions(overrides);

    this.enter(TransportStage.PREVIEW, plan);
    const { totalBytes } = await this.preview(plan);

    this.enter(TransportStage.CONNECT, plan);
    if (!(await storage.connect())) {
      throw new ConnectionError(plan.destination);
    }

    this.enter(TransportStage.CAPACITY_CHECK, plan);
    const freeBytes = await storage.getFreeSpace(plan.destination);
    if (freeBytes >= 0 && freeBytes < totalBytes) {
      throw new CapacityError(totalBytes, freeBytes);
    }
    if (freeBytes < 0) {
      logger.warn(`Free space unknown for ${plan.destination}, skipping capacity check`);
    }

    this.enter(TransportStage.ENSURE_DESTINATION, plan);
    let createdDestination = false;
    if (!(await storage.exists(plan.destination))) {
      await storage.mkdir(plan.destination);
      createdDestination = true;
    }

    this.enter(TransportStage.TRANSFER, plan);
    await storage.transfer(plan, transferOptions);

    this.enter(TransportStage.DONE, plan);
    logger.info(`Transfer complete: ${plan.source} -> ${plan.destination} (${totalBytes} bytes previewed)`);

    return {
      backend: storage.kind,
      totalBytes,
      freeBytes,
      createdDestination,
      ...transferOptions,
    };
  }

  private resolveTransferOptions(overrides: Partial<TransferOptions>): TransferOptions {
    const defaults = getTransferConfig();
    return {
      resume: overrides.resume ?? this.options.resume ?? defaults.resume,
      verify: overrides.verify ?? this.options.verify ?? defaults.verify,
    };
  }

  private enter(stage: TransportStage, plan: CopyPlan): void {
    logger.debug(`Stage ${stage}`, { source: plan.source, destination: plan.destination });
    this.options.onStage?.(stage, plan);
  }
}
