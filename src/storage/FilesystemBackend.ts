/**
 * FilesystemBackend
 *
 * Local disks and mounted removable media. Copies a directory source to
 * `<destination>/<basename>` and a file source into `<destination>/`, the
 * same layout `cp -r` and `rsync` produce without a trailing slash.
 *
 * With resume requested and rsync installed, the copy is delegated to
 * `rsync --partial`, which skips bytes already present on a re-run. Without
 * rsync it falls back to a plain overwriting recursive copy.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { expandHome } from '../core/AddressResolver.js';
import { computeChecksum } from '../core/checksum.js';
import type { ChecksumAlgorithm } from '../core/checksum.js';
import { getTransferConfig } from '../core/config.js';
import type { CopyPlan, TransferOptions } from '../core/domain.js';
import { TransferError, VerificationError } from '../core/errors.js';
import { getLogger, registerComponent } from '../logging/index.js';
import { ExecFileRunner, isCommandAvailable } from './CommandRunner.js';
import type { CommandResult, CommandRunner } from './CommandRunner.js';
import type { BackendKind, StorageBackend } from './types.js';

registerComponent('storage.filesystem', 'Local filesystem backend');
const logger = getLogger('storage.filesystem');

export interface FilesystemBackendOptions {
  runner?: CommandRunner;
  /** Digest used when verify is requested (default from configuration) */
  checksumAlgorithm?: ChecksumAlgorithm;
  /** Command used for resumable copies */
  rsyncCommand?: string;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function resolveLocal(target: string): string {
  return path.resolve(expandHome(target));
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Regular files under `root`, as paths relative to it, in name order.
 */
async function listFilesRecursive(root: string, prefix = ''): Promise<string[]> {
  const entries = await fs.readdir(path.join(root, prefix), { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const out: string[] = [];
  for (const entry of entries) {
    const relative = prefix ? path.join(prefix, entry.name) : entry.name;
    if (entry.isDirectory()) {
      out.push(...(await listFilesRecursive(root, relative)));
    } else if (entry.isFile()) {
      out.push(relative);
    }
  }
  return out;
}

export class FilesystemBackend implements StorageBackend {
  readonly kind: BackendKind = 'filesystem';

  private readonly runner: CommandRunner;
  private readonly checksumAlgorithm: ChecksumAlgorithm;
  private readonly rsyncCommand: string;

  constructor(options: FilesystemBackendOptions = {}) {
    this.runner = options.runner ?? new ExecFileRunner();
    this.checksumAlgorithm = options.checksumAlgorithm ?? getTransferConfig().checksumAlgorithm;
    this.rsyncCommand = options.rsyncCommand ?? 'rsync';
  }

  async connect(): Promise<boolean> {
    return true;
  }

  /**
   * Free bytes on the filesystem holding `target`. Walks up to the nearest
   * existing ancestor so not-yet-created destinations still get an answer.
   */
  async getFreeSpace(target: string): Promise<number> {
    try {
      let checkPath = resolveLocal(target);
      while (!(await pathExists(checkPath))) {
        const parent = path.dirname(checkPath);
        if (parent === checkPath) {
          logger.warn(`No existing ancestor for ${target}; free space unknown`);
          return -1;
        }
        checkPath = parent;
      }
      const stats = await fs.statfs(checkPath);
      return stats.bavail * stats.bsize;
    } catch (error) {
      logger.warn(`Free space probe failed for ${target}: ${describe(error)}`);
      return -1;
    }
  }

  async listDirs(target: string): Promise<string[]> {
    try {
      const entries = await fs.readdir(resolveLocal(target), { withFileTypes: true });
      return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
    } catch (error) {
      logger.debug(`Directory listing failed for ${target}: ${describe(error)}`);
      return [];
    }
  }

  async exists(target: string): Promise<boolean> {
    return pathExists(resolveLocal(target));
  }

  async mkdir(target: string): Promise<void> {
    await fs.mkdir(resolveLocal(target), { recursive: true });
  }

  async transfer(plan: CopyPlan, options: TransferOptions): Promise<void> {
    const source = resolveLocal(plan.source);
    const destination = resolveLocal(plan.destination);

    const sourceStat = await fs.stat(source).catch(() => null);
    if (!sourceStat) {
      throw new TransferError(`Source path does not exist: ${plan.source}`);
    }

    try {
      await fs.mkdir(destination, { recursive: true });
    } catch (error) {
      throw new TransferError(`Cannot create destination ${plan.destination}: ${describe(error)}`, { cause: error });
    }

    const target = path.join(destination, path.basename(source));

    if (options.resume && (await isCommandAvailable(this.runner, this.rsyncCommand))) {
      await this.resumableCopy(source, destination, options.verify);
    } else {
      if (options.resume) {
        logger.info(`${this.rsyncCommand} not available; falling back to a non-resumable copy`);
      }
      await this.plainCopy(source, target, sourceStat.isDirectory());
    }

    if (options.verify) {
      if (sourceStat.isDirectory()) {
        await this.verifyDirectory(source, target);
      } else {
        await this.verifyFile(source, target, path.basename(source));
      }
      logger.info(`Checksum verification passed [${this.checksumAlgorithm}]: ${target}`);
    }
  }

  private async resumableCopy(source: string, destination: string, verify: boolean): Promise<void> {
    const args = ['-a', '--partial'];
    if (verify) {
      args.push('--checksum');
    }
    args.push(source, destination);
    logger.debug(`Running local ${this.rsyncCommand} ${args.join(' ')}`);

    let result: CommandResult;
    try {
      result = await this.runner.run(this.rsyncCommand, args);
    } catch (error) {
      throw new TransferError(`Failed to start ${this.rsyncCommand}: ${describe(error)}`, { cause: error });
    }
    if (result.exitCode !== 0) {
      throw new TransferError(`${this.rsyncCommand} exited with code ${result.exitCode}: ${result.stderr.trim()}`, {
        exitCode: result.exitCode,
        stderr: result.stderr,
      });
    }
    logger.info(`Copied ${source} -> ${destination} (resumable)`);
  }

  private async plainCopy(source: string, target: string, isDirectory: boolean): Promise<void> {
    try {
      await fs.cp(source, target, {
        recursive: isDirectory,
        force: true,
        preserveTimestamps: true,
      });
    } catch (error) {
      throw new TransferError(`Copy failed ${source} -> ${target}: ${describe(error)}`, { cause: error });
    }
    logger.info(`${isDirectory ? 'Directory' : 'File'} copied: ${source} -> ${target}`);
  }

  /**
   * Compare every file that ended up under `destinationRoot` with the file
   * at the same relative path under `sourceRoot`.
   */
  private async verifyDirectory(sourceRoot: string, destinationRoot: string): Promise<void> {
    for (const relative of await listFilesRecursive(destinationRoot)) {
      await this.verifyFile(path.join(sourceRoot, relative), path.join(destinationRoot, relative), relative);
    }
  }

  private async verifyFile(sourceFile: string, destinationFile: string, relative: string): Promise<void> {
    logger.debug(`Verifying [${this.checksumAlgorithm}]: ${relative}`, { relativePath: relative });

    const destinationDigest = await computeChecksum(destinationFile, this.checksumAlgorithm);
    const sourceDigest = (await pathExists(sourceFile))
      ? await computeChecksum(sourceFile, this.checksumAlgorithm)
      : null;

    if (sourceDigest !== destinationDigest) {
      throw new VerificationError(relative, sourceDigest, destinationDigest, this.checksumAlgorithm);
    }
  }
}
