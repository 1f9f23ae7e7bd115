import crypto from 'crypto';
import { createReadStream } from 'fs';
import { Writable } from 'stream';
import { pipeline } from 'stream/promises';

export const HASH_ALGORITHM = 'sha256';
export const HASH_CHUNK_SIZE = 64 * 1024;

/**
 * Stream a file through SHA-256 in fixed-size chunks and return the hex digest.
 */
export async function hashFile(
  filePath: string,
  algorithm: string = HASH_ALGORITHM
): Promise<string> {
  const hash = crypto.createHash(algorithm);
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      hash.update(chunk);
      callback();
    },
  });
  await pipeline(
    createReadStream(filePath, { highWaterMark: HASH_CHUNK_SIZE }),
    sink
  );
  return hash.digest('hex');
}
