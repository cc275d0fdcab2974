/**
 * Storage registry: maps backend keys to factories and picks the backend
 * for a plan.
 *
 * Selection order for plans without an explicit backend key:
 *   1. cloud       source or destination is a cloud address
 *   2. remote      destination is user@host:path
 *   3. filesystem  everything else
 */

import { AddressResolver } from '../core/AddressResolver.js';
import type { CopyPlan } from '../core/domain.js';
import { UnregisteredBackendError } from '../core/errors.js';
import { CloudBackend } from './CloudBackend.js';
import type { CommandRunner } from './CommandRunner.js';
import { FilesystemBackend } from './FilesystemBackend.js';
import type { ChecksumAlgorithm } from '../core/checksum.js';
import { RsyncBackend } from './RsyncBackend.js';
import type { StorageBackend } from './types.js';

export type StorageFactory = (plan: CopyPlan) => StorageBackend;

export class StorageRegistry {
  private readonly factories = new Map<string, StorageFactory>();

  constructor(private readonly resolver: AddressResolver = new AddressResolver()) {}

  register(key: string, factory: StorageFactory): this {
    this.factories.set(key, factory);
    return this;
  }

  has(key: string): boolean {
    return this.factories.has(key);
  }

  keys(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * @throws UnregisteredBackendError
   */
  get(key: string): StorageFactory {
    const factory = this.factories.get(key);
    if (!factory) {
      throw new UnregisteredBackendError(key, this.keys());
    }
    return factory;
  }

  /**
   * Instantiate the backend for a plan: explicit key first, then address classification.
   */
  build(plan: CopyPlan): StorageBackend {
    return this.get(this.resolveKey(plan))(plan);
  }

  resolveKey(plan: CopyPlan): string {
    if (plan.backendKey) {
      return plan.backendKey;
    }
    if (this.resolver.isCloud(plan.source) || this.resolver.isCloud(plan.destination)) {
      return 'cloud';
    }
    if (this.resolver.isRemote(plan.destination)) {
      return 'remote';
    }
    return 'filesystem';
  }
}

export interface DefaultRegistryOptions {
  resolver?: AddressResolver;
  runner?: CommandRunner;
  sshKey?: string;
  checksumAlgorithm?: ChecksumAlgorithm;
}

/**
 * Registry with the built-in keys: filesystem and local (same backend), remote, cloud.
 */
export function createDefaultRegistry(options: DefaultRegistryOptions = {}): StorageRegistry {
  const resolver = options.resolver ?? new AddressResolver();
  const filesystem = (): FilesystemBackend =>
    new FilesystemBackend({ runner: options.runner, checksumAlgorithm: options.checksumAlgorithm });

  return new StorageRegistry(resolver)
    .register('filesystem', filesystem)
    .register('local', filesystem)
    .register(
      'remote',
      (plan) =>
        new RsyncBackend({
          plan,
          sshKey: options.sshKey,
          runner: options.runner,
          resolver,
          local: filesystem(),
        })
    )
    .register('cloud', () => new CloudBackend());
}

/**
 * Build the backend for a plan with the given (or default) registry.
 */
export function buildStorage(
  plan: CopyPlan,
  options: { registry?: StorageRegistry; resolver?: AddressResolver } = {}
): StorageBackend {
  const registry = options.registry ?? createDefaultRegistry({ resolver: options.resolver });
  return registry.build(plan);
}
