import fs from 'fs';
import os from 'os';
import path from 'path';

export type ParsedArgs = { _: string[] } & Record<string, string | boolean | string[] | undefined>;

export interface ParseArgsOptions {
  /** Flags that never take a value, so the next token stays positional. */
  booleans?: string[];
}

export function parseArgs(argv: string[], options: ParseArgsOptions = {}): ParsedArgs {
  const args = Array.isArray(argv) ? argv : [];
  const booleans = new Set(options.booleans || []);
  const result: ParsedArgs = { _: [] };
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (token === '--') {
      result._.push(...args.slice(i + 1));
      break;
    }
    if (!token.startsWith('-') || token === '-') {
      result._.push(token);
      continue;
    }
    const isLong = token.startsWith('--');
    const key = isLong ? token.slice(2) : token.slice(1);
    if (!key) continue;
    const eq = key.indexOf('=');
    if (eq !== -1) {
      const name = key.slice(0, eq);
      const inline = key.slice(eq + 1);
      result[name] = booleans.has(name) ? parseBoolean(inline, true) : inline;
      continue;
    }
    const name = key;
    const next = args[i + 1];
    if (!booleans.has(name) && next && !next.startsWith('-')) {
      result[name] = next;
      i += 1;
    } else {
      result[name] = true;
    }
  }
  return result;
}

export function parseBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value !== 'string') return fallback;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return fallback;
}

export function ensureDir(dirPath: string) {
  if (!dirPath) return;
  fs.mkdirSync(dirPath, { recursive: true });
}

export function normalizeId(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

export function normalizeName(value: string, fallback: string): string {
  return String(value || '')
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, '_')
    .replace(/^_+|_+$/g, '') || fallback;
}

export function clampNumber(value: unknown, min: number, max: number, fallback: number): number {
  const num = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(num)) return fallback;
  return Math.min(Math.max(Math.trunc(num), min), max);
}

export function getHomeDir(): string {
  const home = process.env.HOME || process.env.USERPROFILE || os.homedir();
  return typeof home === 'string' && home.trim() ? home.trim() : os.homedir();
}

export function expandHome(target: string): string {
  if (target === '~') return getHomeDir();
  if (target.startsWith('~/')) return path.join(getHomeDir(), target.slice(2));
  return target;
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const root = normalizeId(env.FILE_LEDGER_STATE_ROOT);
  return root ? path.resolve(expandHome(root)) : path.join(getHomeDir(), '.config', 'file-ledger');
}

export function defaultConcurrency(): number {
  return clampNumber(os.availableParallelism(), 1, 64, 4);
}

/**
 * Map items through an async worker with at most `limit` calls in flight.
 * Results keep input order. The first rejection stops new work from starting
 * and is rethrown once in-flight calls settle.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const failures: unknown[] = [];
  let cursor = 0;

  const run = async () => {
    while (failures.length === 0 && cursor < items.length) {
      const index = cursor;
      cursor += 1;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        failures.push(error);
      }
    }
  };

  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, run));
  if (failures.length > 0) throw failures[0];
  return results;
}

export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) return '0 B';
  const units = ['B', 'KB', 'MB', 'GB'];
  let value = bytes;
  let idx = 0;
  while (value >= 1024 && idx < units.length - 1) {
    value /= 1024;
    idx += 1;
  }
  return `${value.toFixed(value >= 10 || idx === 0 ? 0 : 1)} ${units[idx]}`;
}

export function formatMode(permissions: number): string {
  return `0${(permissions & 0o7777).toString(8).padStart(3, '0')}`;
}
