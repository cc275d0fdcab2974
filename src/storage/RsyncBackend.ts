/**
 * RsyncBackend
 *
 * Push to or pull from an ssh host with rsync. Exactly one side of the plan
 * must be a user@host:path address. Remote probes run one ssh command each;
 * probes on local paths go to the local backend.
 */

import * as path from 'path';
import { AddressResolver, expandHome } from '../core/AddressResolver.js';
import type { RemoteAddress } from '../core/AddressResolver.js';
import { getTransferConfig } from '../core/config.js';
import type { CopyPlan, TransferOptions } from '../core/domain.js';
import { TransferError, UnsupportedRouteError } from '../core/errors.js';
import { getLogger, registerComponent } from '../logging/index.js';
import { ExecFileRunner } from './CommandRunner.js';
import type { CommandResult, CommandRunner } from './CommandRunner.js';
import { FilesystemBackend } from './FilesystemBackend.js';
import { shellEscape, shellEscapePath } from './shellEscape.js';
import type { BackendKind, StorageBackend } from './types.js';

registerComponent('storage.rsync', 'rsync over ssh backend');
const logger = getLogger('storage.rsync');

export interface RsyncBackendOptions {
  /** Plan whose remote side connect() probes */
  plan?: CopyPlan;
  /** Private key passed to ssh with -i */
  sshKey?: string;
  runner?: CommandRunner;
  resolver?: AddressResolver;
  /** Backend for the non-remote side of the plan */
  local?: StorageBackend;
  connectTimeoutSeconds?: number;
  sshCommand?: string;
  rsyncCommand?: string;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class RsyncBackend implements StorageBackend {
  readonly kind: BackendKind = 'remote';

  private readonly plan?: CopyPlan;
  private readonly sshKey?: string;
  private readonly runner: CommandRunner;
  private readonly resolver: AddressResolver;
  private readonly local: StorageBackend;
  private readonly connectTimeoutSeconds: number;
  private readonly sshCommand: string;
  private readonly rsyncCommand: string;

  constructor(options: RsyncBackendOptions = {}) {
    const config = getTransferConfig();
    this.plan = options.plan;
    this.sshKey = options.sshKey ?? config.sshKey;
    this.runner = options.runner ?? new ExecFileRunner();
    this.resolver = options.resolver ?? new AddressResolver();
    this.local = options.local ?? new FilesystemBackend({ runner: this.runner });
    this.connectTimeoutSeconds = options.connectTimeoutSeconds ?? config.connectTimeoutSeconds;
    this.sshCommand = options.sshCommand ?? 'ssh';
    this.rsyncCommand = options.rsyncCommand ?? 'rsync';
  }

  /**
   * Run `true` on the remote side of the configured plan in batch mode.
   */
  async connect(): Promise<boolean> {
    const remoteSide = this.remoteSideOf(this.plan);
    if (!remoteSide) {
      logger.warn('No remote side to probe: the plan has no user@host:path address');
      return false;
    }

    const remote = this.parseRemote(remoteSide);
    if (!remote) {
      return false;
    }
    const result = await this.probe('connect', remote, [
      '-o',
      `ConnectTimeout=${this.connectTimeoutSeconds}`,
      `${remote.user}@${remote.host}`,
      'true',
    ]);
    return result?.exitCode === 0;
  }

  async exists(target: string): Promise<boolean> {
    if (!this.resolver.isRemote(target)) {
      return this.local.exists(target);
    }
    const remote = this.parseRemote(target);
    if (!remote) {
      return false;
    }
    const result = await this.probe('exists', remote, this.remoteCommand(remote, ['test', '-e', shellEscapePath(remote.path)]));
    return result?.exitCode === 0;
  }

  /**
   * A failed remote mkdir is only logged; the transfer that follows reports
   * the authoritative error.
   */
  async mkdir(target: string): Promise<void> {
    if (!this.resolver.isRemote(target)) {
      await this.local.mkdir(target);
      return;
    }
    const remote = this.resolver.splitRemote(target);
    const result = await this.probe('mkdir', remote, this.remoteCommand(remote, ['mkdir', '-p', shellEscapePath(remote.path)]));
    if (result && result.exitCode !== 0) {
      logger.warn(`Remote mkdir exited with code ${result.exitCode} for ${target}: ${result.stderr.trim()}`);
    }
  }

  /**
   * Available bytes from `df -Pk` (4th column of the last line, in KiB).
   */
  async getFreeSpace(target: string): Promise<number> {
    if (!this.resolver.isRemote(target)) {
      return this.local.getFreeSpace(target);
    }
    const remote = this.parseRemote(target);
    if (!remote) {
      return -1;
    }
    const result = await this.probe('df', remote, this.remoteCommand(remote, ['df', '-Pk', shellEscapePath(remote.path)]));
    if (!result || result.exitCode !== 0) {
      return -1;
    }

    const lines = result.stdout.split('\n').filter((line) => line.trim() !== '');
    const available = Number.parseInt(lines[lines.length - 1]?.trim().split(/\s+/)[3] ?? '', 10);
    if (!Number.isFinite(available)) {
      logger.warn(`Unparseable df output for ${target}`, { stdout: result.stdout });
      return -1;
    }
    return available * 1024;
  }

  async listDirs(target: string): Promise<string[]> {
    if (!this.resolver.isRemote(target)) {
      return this.local.listDirs(target);
    }
    const remote = this.parseRemote(target);
    if (!remote) {
      return [];
    }
    const result = await this.probe(
      'find',
      remote,
      this.remoteCommand(remote, ['find', shellEscapePath(remote.path), '-mindepth', '1', '-maxdepth', '1', '-type', 'd'])
    );
    if (!result || result.exitCode !== 0) {
      return [];
    }
    return result.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line !== '')
      .map((line) => path.posix.basename(line));
  }

  /**
   * Push when the destination is remote, pull when the source is.
   * @throws UnsupportedRouteError when neither or both sides are remote
   * @throws TransferError when rsync cannot start or exits non-zero
   */
  async transfer(plan: CopyPlan, options: TransferOptions): Promise<void> {
    const isPush = this.resolver.isRemote(plan.destination);
    const isPull = this.resolver.isRemote(plan.source);
    if (isPush === isPull) {
      throw new UnsupportedRouteError(plan.source, plan.destination);
    }

    const source = isPull ? this.remoteArgument(plan.source) : path.resolve(expandHome(plan.source));
    const destination = isPush ? this.remoteArgument(plan.destination) : path.resolve(expandHome(plan.destination));
    const args = this.buildTransferArgs(source, destination, options);

    logger.debug(`Running: ${this.rsyncCommand} ${args.join(' ')}`);
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
    logger.info(`rsync ${isPush ? 'push' : 'pull'} completed: ${plan.source} -> ${plan.destination}`);
  }

  /**
   * The -e value rsync hands to its remote shell; the key path is escaped
   * because rsync splits this string like a shell would.
   */
  sshCommandLine(): string {
    const parts = [this.sshCommand];
    if (this.sshKey) {
      parts.push('-i', shellEscape(this.sshKey));
    }
    return parts.join(' ');
  }

  buildTransferArgs(source: string, destination: string, options: TransferOptions): string[] {
    const args = ['-az'];
    if (options.resume) {
      args.push('--partial');
    }
    if (options.verify) {
      args.push('--checksum');
    }
    args.push('-e', this.sshCommandLine(), source, destination);
    return args;
  }

  private remoteSideOf(plan: CopyPlan | undefined): string | null {
    if (!plan) return null;
    if (this.resolver.isRemote(plan.destination)) return plan.destination;
    if (this.resolver.isRemote(plan.source)) return plan.source;
    return null;
  }

  /**
   * Re-validate and rebuild user@host:path for the rsync command line.
   */
  private remoteArgument(address: string): string {
    const remote = this.resolver.splitRemote(address);
    return `${remote.user}@${remote.host}:${remote.path}`;
  }

  private parseRemote(address: string): RemoteAddress | null {
    try {
      return this.resolver.splitRemote(address);
    } catch (error) {
      logger.warn(`Cannot probe malformed remote address: ${describe(error)}`);
      return null;
    }
  }

  private sshOptions(): string[] {
    const args = ['-o', 'BatchMode=yes'];
    if (this.sshKey) {
      args.push('-i', this.sshKey);
    }
    return args;
  }

  private remoteCommand(remote: RemoteAddress, command: string[]): string[] {
    return [`${remote.user}@${remote.host}`, ...command];
  }

  /**
   * Run one ssh command. Spawn failures are logged and reported as null.
   */
  private async probe(label: string, remote: RemoteAddress, sshArgs: string[]): Promise<CommandResult | null> {
    const args = [...this.sshOptions(), ...sshArgs];
    try {
      const result = await this.runner.run(this.sshCommand, args);
      if (result.exitCode !== 0) {
        logger.debug(`ssh ${label} probe on ${remote.host} exited with code ${result.exitCode}`, {
          stderr: result.stderr.trim(),
        });
      }
      return result;
    } catch (error) {
      logger.warn(`ssh ${label} probe on ${remote.host} failed: ${describe(error)}`);
      return null;
    }
  }
}
