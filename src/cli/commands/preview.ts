/**
 * Preview Command
 *
 * Lists the files a plan would select and their total size.
 */

import { Command } from 'commander';
import { TransportService } from '../../core/TransportService.js';
import { PlanValidationError } from '../../core/errors.js';
import { OutputFormatter, formatPreview } from '../lib/OutputFormatter.js';
import { resolvePlan } from '../lib/PlanOptions.js';
import { addPlanOptions } from './shared.js';
import type { GlobalOptions, PlanOptions } from '../types/index.js';

export function registerPreviewCommand(program: Command): void {
  addPlanOptions(
    program
      .command('preview [plan-file]')
      .description('Show the files a copy plan selects')
  ).action(async (planFile: string | undefined, _options: PlanOptions, cmd: Command) => {
    const opts = cmd.optsWithGlobals<PlanOptions & GlobalOptions>();
    const formatter = new OutputFormatter(opts.json);

    try {
      const plan = await resolvePlan(planFile, opts);
      const result = await new TransportService().preview(plan);
      formatter.output(formatPreview(plan, result), {
        source: plan.source,
        totalBytes: result.totalBytes,
        files: result.files.map((f) => ({
          path: f.path,
          size: f.size,
          modifiedAt: f.modifiedAt.toISOString(),
        })),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      formatter.error(
        'Preview failed: ' + message,
        error instanceof PlanValidationError ? error.issues : undefined
      );
      process.exitCode = 1;
    }
  });
}
