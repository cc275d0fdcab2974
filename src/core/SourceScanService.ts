/**
 * Source scanning: previews the files a plan would select.
 */

import { FilterEngine } from '../filtering/FilterEngine.js';
import { getLogger } from '../logging/index.js';
import { AddressResolver } from './AddressResolver.js';
import { getTransferConfig } from './config.js';
import type { CopyPlan, PreviewResult } from './domain.js';

const logger = getLogger('filter');

export interface SourceScanServiceOptions {
  filterEngine?: FilterEngine;
  resolver?: AddressResolver;
  /** Defaults to FERRY_PREVIEW_LIMIT */
  displayLimit?: number;
}

export class SourceScanService {
  private readonly filterEngine: FilterEngine;
  private readonly resolver: AddressResolver;
  private readonly displayLimit: number;

  constructor(options: SourceScanServiceOptions = {}) {
    this.filterEngine = options.filterEngine ?? new FilterEngine();
    this.resolver = options.resolver ?? new AddressResolver();
    this.displayLimit = options.displayLimit ?? getTransferConfig().previewLimit;
  }

  /**
   * Remote and cloud sources are not listed locally and preview as empty.
   */
  async preview(plan: CopyPlan): Promise<PreviewResult> {
    if (this.resolver.kindOf(plan.source) !== 'local') {
      logger.debug(`Skipping preview of non-local source ${plan.source}`);
      return { files: [], totalBytes: 0 };
    }

    const { filterConfig } = plan;
    return this.filterEngine.preview(plan.source, {
      patterns: filterConfig.patterns,
      includeDirs: filterConfig.includeDirs,
      timeRange: filterConfig.timeRange,
      sizeLimit: filterConfig.sizeLimit,
      displayLimit: this.displayLimit,
    });
  }
}
