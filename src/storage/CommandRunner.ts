/**
 * External command execution.
 *
 * Backends never build shell strings for local execution: commands run
 * through execFile with an argument vector. Tests swap in a fake runner.
 */

import { execFile } from 'child_process';
import { getLogger } from '../logging/index.js';

const logger = getLogger('storage');

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  /**
   * Run a command to completion. Resolves with the exit code of a process
   * that ran; rejects when it could not be started or was killed by a signal.
   */
  run(command: string, args: readonly string[]): Promise<CommandResult>;
}

export class ExecFileRunner implements CommandRunner {
  constructor(private readonly maxBuffer: number = 64 * 1024 * 1024) {}

  run(command: string, args: readonly string[]): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      execFile(command, [...args], { maxBuffer: this.maxBuffer }, (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }
        if (typeof error.code === 'number') {
          resolve({ exitCode: error.code, stdout, stderr });
          return;
        }
        reject(error);
      });
    });
  }
}

/**
 * True when `<command> --version` runs and exits 0.
 */
export async function isCommandAvailable(runner: CommandRunner, command: string): Promise<boolean> {
  try {
    const result = await runner.run(command, ['--version']);
    return result.exitCode === 0;
  } catch (error) {
    logger.debug(`${command} is not available: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
}
