/**
 * FilterEngine
 *
 * Decides which files under a source qualify for transfer and totals their
 * size before anything is copied. A file qualifies when its base name matches
 * one of the patterns, its size reaches the size floor and its modification
 * time reaches the time floor; all three must hold.
 */

import type { Dirent, Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { expandHome } from '../core/AddressResolver.js';
import { isMatchAll } from '../core/domain.js';
import type { FileEntry, PreviewResult, SizeLimit } from '../core/domain.js';
import { getLogger, registerComponent } from '../logging/index.js';
import { matchesAnyGlob } from './glob.js';
import { parseSizeToBytes } from './sizeParser.js';

registerComponent('filter', 'File selection and preview');
const logger = getLogger('filter');

const ONE_HOUR_MS = 60 * 60 * 1000;

export interface PreviewOptions {
  patterns: readonly string[];
  timeRange: string;
  sizeLimit: SizeLimit;
  /** Maximum number of entries returned in `files`; totalBytes always covers every match */
  displayLimit: number;
  /** Globs for the first directory level below a directory source */
  includeDirs?: readonly string[];
}

export class FilterEngine {
  constructor(private readonly now: () => Date = () => new Date()) {}

  /**
   * Earliest modification time a file may have, or null for no floor.
   * Unrecognized ranges mean no floor.
   */
  resolveFloor(timeRange: string): Date | null {
    switch (timeRange) {
      case 'unlimited':
        return null;
      case 'today': {
        const now = this.now();
        return new Date(now.getFullYear(), now.getMonth(), now.getDate());
      }
      case '1h':
        return new Date(this.now().getTime() - ONE_HOUR_MS);
      default:
        logger.debug(`Unrecognized time range "${timeRange}", applying no time floor`);
        return null;
    }
  }

  matches(
    file: FileEntry,
    patterns: readonly string[],
    sizeFloor: number,
    mtimeFloor: Date | null
  ): boolean {
    if (!matchesAnyGlob(file.name, patterns)) {
      return false;
    }
    if (sizeFloor > 0 && file.size < sizeFloor) {
      return false;
    }
    if (mtimeFloor !== null && file.modifiedAt.getTime() < mtimeFloor.getTime()) {
      return false;
    }
    return true;
  }

  /**
   * Scan a local source and return the first `displayLimit` matches plus the
   * byte total of all matches. A missing source previews as empty.
   */
  async preview(source: string, options: PreviewOptions): Promise<PreviewResult> {
    const sourcePath = path.resolve(expandHome(source));

    let sourceStat: Stats;
    try {
      sourceStat = await fs.stat(sourcePath);
    } catch {
      logger.debug(`Preview source does not exist: ${sourcePath}`);
      return { files: [], totalBytes: 0 };
    }

    const sizeFloor = parseSizeToBytes(options.sizeLimit);
    const mtimeFloor = this.resolveFloor(options.timeRange);
    const files: FileEntry[] = [];
    let totalBytes = 0;
    let matched = 0;

    const consider = (entry: FileEntry): void => {
      if (!this.matches(entry, options.patterns, sizeFloor, mtimeFloor)) {
        return;
      }
      matched += 1;
      totalBytes += entry.size;
      if (files.length < options.displayLimit) {
        files.push(entry);
      }
    };

    if (sourceStat.isFile()) {
      consider(toFileEntry(sourcePath, sourceStat));
    } else if (sourceStat.isDirectory()) {
      const includeDirs = options.includeDirs ?? ['*'];
      for await (const entry of walkFiles(sourcePath, isMatchAll(includeDirs) ? null : includeDirs)) {
        consider(entry);
      }
    }

    logger.debug(`Preview of ${sourcePath}: ${matched} file(s), ${totalBytes} bytes`);
    return { files, totalBytes };
  }
}

function toFileEntry(filePath: string, stat: { size: number; mtime: Date }): FileEntry {
  return {
    path: filePath,
    name: path.basename(filePath),
    size: stat.size,
    modifiedAt: stat.mtime,
  };
}

async function readDirSorted(dir: string): Promise<Dirent[]> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (error) {
    logger.warn(`Skipping unreadable directory ${dir}: ${error instanceof Error ? error.message : String(error)}`);
    return [];
  }
}

/**
 * Stat a walked entry, following a symlink. Null unless the target is a regular file.
 */
async function statRegularFile(filePath: string, viaLink: boolean): Promise<Stats | null> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile() ? stat : null;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    if (viaLink) {
      logger.debug(`Skipping dangling link ${filePath}: ${reason}`);
    } else {
      logger.warn(`Skipping file that vanished during scan ${filePath}: ${reason}`);
    }
    return null;
  }
}

/**
 * Depth-first walk yielding regular files, entries of each directory in name order.
 * Symlinks to files are yielded with the target's size; symlinked directories are not entered.
 * With `topLevelDirs`, only first-level directories matching one of them are entered
 * and files directly under the root are skipped.
 */
async function* walkFiles(root: string, topLevelDirs: readonly string[] | null): AsyncGenerator<FileEntry> {
  async function* walk(dir: string, depth: number): AsyncGenerator<FileEntry> {
    for (const entry of await readDirSorted(dir)) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (depth === 0 && topLevelDirs && !matchesAnyGlob(entry.name, topLevelDirs)) {
          continue;
        }
        yield* walk(fullPath, depth + 1);
      } else if (entry.isFile() || entry.isSymbolicLink()) {
        if (depth === 0 && topLevelDirs) {
          continue;
        }
        const stat = await statRegularFile(fullPath, entry.isSymbolicLink());
        if (stat) {
          yield toFileEntry(fullPath, stat);
        }
      }
    }
  }

  yield* walk(root, 0);
}
