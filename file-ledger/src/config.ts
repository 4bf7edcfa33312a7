import path from 'path';
import { z } from 'zod';
import {
  clampNumber,
  defaultConcurrency,
  expandHome,
  normalizeId,
  parseBoolean,
  resolveStateDir,
  type ParsedArgs,
} from './utils.js';

export const DB_FILE_NAME = 'ledger.db.sqlite';
export const MAX_CONCURRENCY = 64;

export const LedgerConfigSchema = z.object({
  dbPath: z.string().min(1),
  tolerant: z.boolean(),
  concurrency: z.number().int().min(1).max(MAX_CONCURRENCY),
  format: z.enum(['text', 'json']),
  verbose: z.boolean(),
});

export type LedgerConfig = z.infer<typeof LedgerConfigSchema>;

/** Flags that never consume the following token. */
export const BOOLEAN_FLAGS = ['tolerant', 't', 'json', 'verbose', 'v', 'help', 'h'];

/**
 * Store location: `--db`, then FILE_LEDGER_DB, then the state directory.
 */
export function resolveDbPath(args: ParsedArgs, env: NodeJS.ProcessEnv = process.env): string {
  const explicit = normalizeId(args.db) || normalizeId(args.d) || normalizeId(env.FILE_LEDGER_DB);
  if (explicit) return path.resolve(expandHome(explicit));
  return path.join(resolveStateDir(env), DB_FILE_NAME);
}

export function resolveConfig(args: ParsedArgs, env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const tolerantFlag = args.tolerant ?? args.t;
  const tolerant =
    tolerantFlag === undefined ? parseBoolean(env.FILE_LEDGER_TOLERANT, false) : parseBoolean(tolerantFlag, true);
  const concurrency = clampNumber(
    args.concurrency ?? env.FILE_LEDGER_CONCURRENCY,
    1,
    MAX_CONCURRENCY,
    defaultConcurrency()
  );
  const rawFormat = normalizeId(args.format) || (args.json ? 'json' : 'text');

  const parsed = LedgerConfigSchema.safeParse({
    dbPath: resolveDbPath(args, env),
    tolerant,
    concurrency,
    format: rawFormat,
    verbose: Boolean(args.verbose || args.v),
  });
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${detail.join('; ')}`);
  }
  return parsed.data;
}
