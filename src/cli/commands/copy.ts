/**
 * Copy Command
 *
 * Runs a copy plan, showing the current stage on a spinner.
 */

import { Command } from 'commander';
import ora from 'ora';
import { TransportService, TransportStage } from '../../core/TransportService.js';
import { FerryError, PlanValidationError } from '../../core/errors.js';
import { OutputFormatter, formatReport } from '../lib/OutputFormatter.js';
import { resolvePlan, transferOverrides } from '../lib/PlanOptions.js';
import { addPlanOptions } from './shared.js';
import type { CopyOptions, GlobalOptions } from '../types/index.js';

const STAGE_TEXT: Record<TransportStage, string> = {
  [TransportStage.PREVIEW]: 'Scanning source...',
  [TransportStage.CONNECT]: 'Connecting to destination...',
  [TransportStage.CAPACITY_CHECK]: 'Checking free space...',
  [TransportStage.ENSURE_DESTINATION]: 'Preparing destination...',
  [TransportStage.TRANSFER]: 'Transferring...',
  [TransportStage.DONE]: 'Done',
};

export function registerCopyCommand(program: Command): void {
  addPlanOptions(
    program
      .command('copy [plan-file]')
      .description('Copy the source of a plan to its destination')
      .option('--no-resume', 'Do not keep partial files for resumption')
      .option('--verify', 'Compare checksums after the copy')
  ).action(async (planFile: string | undefined, _options: CopyOptions, cmd: Command) => {
    const opts = cmd.optsWithGlobals<CopyOptions & GlobalOptions>();
    const formatter = new OutputFormatter(opts.json);
    const spinner = ora({ text: 'Loading plan...', isSilent: opts.json === true });

    try {
      const plan = await resolvePlan(planFile, opts);
      spinner.start();
      const service = new TransportService({
        onStage: (stage) => {
          spinner.text = STAGE_TEXT[stage];
        },
      });
      const report = await service.execute(plan, transferOverrides(opts));
      spinner.succeed('Copy complete');
      formatter.output(formatReport(plan, report), { success: true, ...report });
    } catch (error) {
      spinner.stop();
      const message = error instanceof Error ? error.message : String(error);
      const details =
        error instanceof PlanValidationError
          ? error.issues
          : error instanceof FerryError
            ? { type: error.name }
            : undefined;
      formatter.error('Copy failed: ' + message, details);
      process.exitCode = 1;
    }
  });
}
