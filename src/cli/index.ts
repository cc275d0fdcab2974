#!/usr/bin/env node
/**
 * ferry CLI
 *
 * Previews and runs copy plans between local folders, ssh hosts and cloud
 * storage.
 *
 * Usage: ferry [options] <command> [arguments]
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { registerPreviewCommand } from './commands/preview.js';
import { registerCopyCommand } from './commands/copy.js';
import { registerAddressCommand } from './commands/address.js';
import { LogLevel, setGlobalLevel, shutdownLogging } from '../logging/index.js';
import type { GlobalOptions } from './types/index.js';

const VERSION = '0.1.0';

function createProgram(): Command {
  const program = new Command();

  program
    .name('ferry')
    .description('Filtered, resumable folder copies across local, ssh and cloud storage')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output');

  program.hook('preAction', () => {
    if (program.opts<GlobalOptions>().verbose) {
      setGlobalLevel(LogLevel.DEBUG);
    }
  });

  registerPreviewCommand(program);
  registerCopyCommand(program);
  registerAddressCommand(program);

  program.addHelpText(
    'after',
    `
${chalk.bold('Examples:')}
  ${chalk.gray('# Preview the logs a plan would copy')}
  $ ferry preview --source ~/captures --dest /mnt/backup --pattern "*.log"

  ${chalk.gray('# Push a folder to a host over ssh, verifying checksums')}
  $ ferry copy --source ~/captures --dest eng@10.0.0.5:/data --verify

  ${chalk.gray('# Run a saved plan')}
  $ ferry copy nightly.yaml
`
  );

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } finally {
    await shutdownLogging();
  }
}

main().catch((error: unknown) => {
  console.error(chalk.red('Fatal error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
