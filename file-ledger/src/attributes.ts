import { constants as fsConstants } from 'fs';
import type { Stats } from 'fs';
import { open } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { IoError, toIoError } from './errors.js';
import type { FileAttributes } from './types.js';

// O_NONBLOCK keeps a FIFO from blocking the open until a writer shows up.
const OPEN_FLAGS = fsConstants.O_RDONLY | (fsConstants.O_NONBLOCK ?? 0);

/**
 * Open `filePath` once, check that it is a regular file through the open
 * handle, and pass the handle and its stats to `fn`. The handle is closed on
 * every exit path; any failure surfaces as an IoError for `filePath`.
 */
export async function withRegularFile<T>(
  filePath: string,
  fn: (handle: FileHandle, stats: Stats) => Promise<T>
): Promise<T> {
  let handle: FileHandle;
  try {
    handle = await open(filePath, OPEN_FLAGS);
  } catch (err) {
    throw toIoError(filePath, err);
  }

  try {
    const stats = await handle.stat();
    if (stats.isDirectory()) {
      throw new IoError(filePath, 'EISDIR', 'is a directory');
    }
    if (!stats.isFile()) {
      throw new IoError(filePath, 'EINVAL', 'not a regular file');
    }
    return await fn(handle, stats);
  } catch (err) {
    throw toIoError(filePath, err);
  } finally {
    await handle.close();
  }
}

export function attributesFromStats(stats: Stats): FileAttributes {
  return {
    size: stats.size,
    modifiedMs: stats.mtimeMs,
    permissions: stats.mode & 0o7777,
  };
}

/**
 * Size, mtime and permission bits for a regular file. Advisory context for
 * the operator; change detection never relies on these.
 */
export function snapshotAttributes(filePath: string): Promise<FileAttributes> {
  return withRegularFile(filePath, async (_handle, stats) => attributesFromStats(stats));
}

export function sameAttributes(a: FileAttributes, b: FileAttributes): boolean {
  return a.size === b.size && a.modifiedMs === b.modifiedMs && a.permissions === b.permissions;
}
