/**
 * File Hash Utilities
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';

/**
 * Stream a file through the given digest and return it as hex.
 */
export function hashFile(filePath: string, algorithm: 'md5' | 'sha256' = 'md5'): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash(algorithm);
    const stream = createReadStream(filePath);

    stream.on('data', chunk => hash.update(chunk));
    stream.on('error', reject);
    stream.on('end', () => resolve(hash.digest('hex')));
  });
}
