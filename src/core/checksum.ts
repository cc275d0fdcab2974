/**
 * File content digests for post-copy verification.
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import * as fs from 'fs/promises';

export type ChecksumAlgorithm = 'md5' | 'sha256';

/**
 * Hex digest of a file, streamed in chunks.
 * @throws Error when the path is not a regular file
 */
export async function computeChecksum(filePath: string, algorithm: ChecksumAlgorithm = 'sha256'): Promise<string> {
  const stat = await fs.stat(filePath).catch(() => null);
  if (!stat?.isFile()) {
    throw new Error(`File not found: ${filePath}`);
  }

  const hash = createHash(algorithm);
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}
