import fs from 'fs/promises';
import path from 'path';
import { errnoCode } from './errors.js';
import { expandHome } from './utils.js';

const UNRESOLVABLE = new Set(['ENOENT', 'ENOTDIR', 'EACCES', 'EPERM', 'ELOOP']);
const MAX_LINK_HOPS = 40;

/**
 * Turn a user-supplied path into the store key: `~` expanded, made absolute
 * against `cwd`, symlinks resolved. A path that no longer exists is resolved
 * through its nearest existing ancestor so a vanished file keeps mapping to
 * the key it was tracked under. A symlink whose target vanished maps to the
 * target's key, not its own.
 */
export async function canonicalizePath(input: string, cwd: string = process.cwd()): Promise<string> {
  const absolute = path.resolve(cwd, expandHome(input));
  return resolveReal(absolute, 0);
}

async function resolveReal(absolute: string, hops: number): Promise<string> {
  try {
    return await fs.realpath(absolute);
  } catch (err) {
    if (!UNRESOLVABLE.has(errnoCode(err))) throw err;
  }
  const parent = path.dirname(absolute);
  if (parent === absolute) return absolute;
  const realParent = await resolveReal(parent, hops);
  const candidate = path.join(realParent, path.basename(absolute));
  const target = await readLink(candidate);
  if (target === null || hops >= MAX_LINK_HOPS) return candidate;
  return resolveReal(path.resolve(realParent, target), hops + 1);
}

/** Link text when `candidate` is a symlink, null when it is anything else or absent. */
async function readLink(candidate: string): Promise<string | null> {
  try {
    const stats = await fs.lstat(candidate);
    return stats.isSymbolicLink() ? await fs.readlink(candidate) : null;
  } catch (err) {
    if (UNRESOLVABLE.has(errnoCode(err))) return null;
    throw err;
  }
}
