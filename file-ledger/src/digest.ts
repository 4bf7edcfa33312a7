import crypto from 'crypto';
import type { FileHandle } from 'fs/promises';
import { withRegularFile } from './attributes.js';

export const DIGEST_ALGORITHM = 'sha3-256';
export const DIGEST_BYTES = 32;

const CHUNK_BYTES = 64 * 1024;

/**
 * Stream a regular file through SHA3-256. Memory use is bounded by the read
 * chunk size regardless of file size.
 */
export function digestFile(filePath: string): Promise<Buffer> {
  return withRegularFile(filePath, (handle) => digestHandle(handle));
}

/** Hash everything readable from an open handle, from its current position. */
export async function digestHandle(handle: FileHandle): Promise<Buffer> {
  const hash = crypto.createHash(DIGEST_ALGORITHM);
  const stream = handle.createReadStream({ highWaterMark: CHUNK_BYTES, autoClose: false });
  for await (const chunk of stream) {
    hash.update(chunk);
  }
  return hash.digest();
}

export function digestBuffer(data: Buffer | string): Buffer {
  return crypto.createHash(DIGEST_ALGORITHM).update(data).digest();
}

export function digestsEqual(a: Buffer, b: Buffer): boolean {
  return a.length === b.length && a.equals(b);
}

export function digestHex(digest: Buffer): string {
  return digest.toString('hex');
}
