import { Command } from 'commander';

/**
 * Inline plan options shared by preview and copy.
 */
export function addPlanOptions(command: Command): Command {
  return command
    .option('-s, --source <address>', 'Source path or address')
    .option('-d, --dest <address>', 'Destination path or address')
    .option('-p, --pattern <glob...>', 'File name globs (default: *)')
    .option('-t, --time-range <range>', 'unlimited, today or 1h')
    .option('--min-size <size>', 'Minimum file size, e.g. 1048576 or 10M')
    .option('-b, --backend <key>', 'Backend key: filesystem, local, remote or cloud')
    .option('-n, --name <name>', 'Preset name');
}
