import type { IoError, PolicyError } from './errors.js';

export interface FileAttributes {
  size: number;
  /** Modification time in epoch milliseconds. */
  modifiedMs: number;
  /** Permission bits (mode & 0o7777). */
  permissions: number;
}

export interface Fingerprint {
  /** SHA3-256 of the file content, 32 bytes. */
  digest: Buffer;
  attributes: FileAttributes;
}

export interface LedgerRecord extends Fingerprint {
  /** Canonical absolute path, the store key. */
  path: string;
  /** ISO timestamp of the capture that produced this baseline. */
  recordedAt: string;
}

export type LedgerOperation = 'add' | 'verify' | 'verify-all' | 'accept' | 'remove';

interface OutcomeBase {
  /** Canonical path the outcome applies to. */
  path: string;
  /** Path as the caller supplied it. */
  input: string;
}

export type Outcome =
  | (OutcomeBase & { kind: 'added'; record: LedgerRecord })
  | (OutcomeBase & { kind: 'already-tracked'; matchesBaseline: boolean })
  | (OutcomeBase & { kind: 'unchanged' })
  | (OutcomeBase & { kind: 'changed'; expected: Fingerprint; observed: Fingerprint })
  | (OutcomeBase & { kind: 'accepted'; record: LedgerRecord; previous: Fingerprint })
  | (OutcomeBase & { kind: 'removed' })
  | (OutcomeBase & { kind: 'not-tracked'; tolerated: boolean })
  | (OutcomeBase & { kind: 'io-failure'; error: IoError })
  | (OutcomeBase & { kind: 'policy-error'; error: PolicyError });

export type OutcomeKind = Outcome['kind'];

export type OutputFormat = 'text' | 'json';
