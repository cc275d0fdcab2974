/**
 * Storage backends and their registry.
 */

export type { StorageBackend, BackendKind } from './types.js';
export { ExecFileRunner, isCommandAvailable } from './CommandRunner.js';
export type { CommandRunner, CommandResult } from './CommandRunner.js';
export { shellEscape, shellEscapePath } from './shellEscape.js';
export { FilesystemBackend } from './FilesystemBackend.js';
export type { FilesystemBackendOptions } from './FilesystemBackend.js';
export { RsyncBackend } from './RsyncBackend.js';
export type { RsyncBackendOptions } from './RsyncBackend.js';
export { CloudBackend } from './CloudBackend.js';
export type { CloudTransferIntent } from './CloudBackend.js';
export { StorageRegistry, createDefaultRegistry, buildStorage } from './registry.js';
export type { StorageFactory, DefaultRegistryOptions } from './registry.js';
