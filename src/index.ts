/**
 * ferry
 *
 * Filtered, resumable copies of folders between local paths, ssh hosts
 * (user@host:path) and cloud storage (scheme://bucket/prefix).
 */

export { AddressResolver, expandHome } from './core/AddressResolver.js';
export type { AddressKind, RemoteAddress } from './core/AddressResolver.js';
export * from './core/domain.js';
export * from './core/errors.js';
export { getTransferConfig, resetTransferConfig, parseBooleanFlag } from './core/config.js';
export type { TransferConfiguration } from './core/config.js';
export { computeChecksum } from './core/checksum.js';
export type { ChecksumAlgorithm } from './core/checksum.js';
export { loadPlanFile, parsePlan, serializePlan } from './core/PlanLoader.js';
export { SourceScanService } from './core/SourceScanService.js';
export type { SourceScanServiceOptions } from './core/SourceScanService.js';
export { TransportService, TransportStage } from './core/TransportService.js';
export type { TransportReport, TransportServiceOptions, StageListener } from './core/TransportService.js';
export * from './filtering/index.js';
export * from './storage/index.js';
