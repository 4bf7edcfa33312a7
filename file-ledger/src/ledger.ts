import { resolve } from 'path';
import { attributesFromStats, withRegularFile } from './attributes.js';
import { digestHandle, digestsEqual } from './digest.js';
import { AlreadyTrackedError, IoError, NotTrackedError, toIoError } from './errors.js';
import { canonicalizePath } from './paths.js';
import type { RecordStore } from './storage.js';
import type { Fingerprint, LedgerRecord, Outcome } from './types.js';
import { defaultConcurrency, expandHome, mapWithConcurrency } from './utils.js';

export interface LedgerOptions {
  store: RecordStore;
  /** Downgrade already-tracked / not-tracked preconditions to outcomes. */
  tolerant?: boolean;
  /** Files captured in parallel. */
  concurrency?: number;
  /** Base directory for relative inputs. */
  cwd?: string;
}

type Located = { input: string; path: string };

type Capture =
  | (Located & { ok: true; fingerprint: Fingerprint })
  | (Located & { ok: false; error: IoError });

/**
 * Read the content digest and metadata of one file through a single open
 * handle, so both describe the same file.
 */
export function captureFingerprint(filePath: string): Promise<Fingerprint> {
  return withRegularFile(filePath, async (handle, stats) => ({
    digest: await digestHandle(handle),
    attributes: attributesFromStats(stats),
  }));
}

/**
 * Runs add / verify / verify-all / accept / remove against a record store.
 *
 * Each batch captures all files first (in parallel, bounded by
 * `concurrency`) and then applies the store step path by path in input
 * order. Per-path failures become outcomes; a StoreError rejects the batch.
 */
export class Ledger {
  private store: RecordStore;
  private tolerant: boolean;
  private concurrency: number;
  private cwd: string;

  constructor(options: LedgerOptions) {
    this.store = options.store;
    this.tolerant = options.tolerant ?? false;
    this.concurrency = Math.max(1, options.concurrency ?? defaultConcurrency());
    this.cwd = options.cwd ?? process.cwd();
  }

  async add(inputs: string[]): Promise<Outcome[]> {
    const captures = await this.captureAll(inputs);
    return captures.map((capture): Outcome => {
      if (!capture.ok) return ioFailure(capture);
      const { input, path } = capture;
      const record = toRecord(path, capture.fingerprint);
      const existing = this.store.insertIfAbsent(record);
      if (!existing) {
        return { kind: 'added', input, path, record };
      }
      if (!this.tolerant) {
        return { kind: 'policy-error', input, path, error: new AlreadyTrackedError(path) };
      }
      return {
        kind: 'already-tracked',
        input,
        path,
        matchesBaseline: digestsEqual(existing.digest, capture.fingerprint.digest),
      };
    });
  }

  async verify(inputs: string[]): Promise<Outcome[]> {
    const captures = await this.captureAll(inputs);
    return captures.map((capture): Outcome => {
      const record = this.store.get(capture.path);
      if (!record) {
        return { kind: 'not-tracked', input: capture.input, path: capture.path, tolerated: false };
      }
      return compare(record, capture);
    });
  }

  /**
   * Verify every tracked path. Records are read a page at a time, so a
   * concurrent accept or remove may or may not be observed.
   */
  async verifyAll(): Promise<Outcome[]> {
    const outcomes: Outcome[] = [];
    const chunkSize = this.concurrency * 4;
    let chunk: LedgerRecord[] = [];

    const flush = async () => {
      const captures = await mapWithConcurrency(chunk, this.concurrency, (record) =>
        this.capture({ input: record.path, path: record.path })
      );
      captures.forEach((capture, index) => outcomes.push(compare(chunk[index], capture)));
      chunk = [];
    };

    for (const record of this.store.iterate()) {
      chunk.push(record);
      if (chunk.length >= chunkSize) await flush();
    }
    if (chunk.length > 0) await flush();
    return outcomes;
  }

  async accept(inputs: string[]): Promise<Outcome[]> {
    const captures = await this.captureAll(inputs);
    return captures.map((capture): Outcome => {
      if (!capture.ok) return ioFailure(capture);
      const { input, path } = capture;
      const record = toRecord(path, capture.fingerprint);
      const previous = this.tolerant ? this.store.swap(record) : this.store.replaceExisting(record);
      if (previous) {
        return { kind: 'accepted', input, path, record, previous: toFingerprint(previous) };
      }
      if (this.tolerant) {
        return { kind: 'added', input, path, record };
      }
      return { kind: 'policy-error', input, path, error: new NotTrackedError(path) };
    });
  }

  async remove(inputs: string[]): Promise<Outcome[]> {
    const located = await mapWithConcurrency(inputs, this.concurrency, (input) => this.locate(input));
    return located.map(({ input, path }): Outcome => {
      if (this.store.delete(path)) {
        return { kind: 'removed', input, path };
      }
      if (this.tolerant) {
        return { kind: 'not-tracked', input, path, tolerated: true };
      }
      return { kind: 'policy-error', input, path, error: new NotTrackedError(path) };
    });
  }

  /** Tracked records in key order. */
  list(): LedgerRecord[] {
    return Array.from(this.store.iterate());
  }

  private captureAll(inputs: string[]): Promise<Capture[]> {
    return mapWithConcurrency(inputs, this.concurrency, async (input) => this.capture(await this.locate(input)));
  }

  private async locate(input: string): Promise<Located> {
    try {
      return { input, path: await canonicalizePath(input, this.cwd) };
    } catch {
      // realpath failed for a reason other than a missing component; the
      // capture step reports the error against the unresolved path.
      return { input, path: resolve(this.cwd, expandHome(input)) };
    }
  }

  private async capture(located: Located): Promise<Capture> {
    try {
      return { ...located, ok: true, fingerprint: await captureFingerprint(located.path) };
    } catch (err) {
      return { ...located, ok: false, error: toIoError(located.path, err) };
    }
  }
}

function compare(record: LedgerRecord, capture: Capture): Outcome {
  const { input, path } = capture;
  if (!capture.ok) return ioFailure(capture);
  if (digestsEqual(record.digest, capture.fingerprint.digest)) {
    return { kind: 'unchanged', input, path };
  }
  return { kind: 'changed', input, path, expected: toFingerprint(record), observed: capture.fingerprint };
}

function ioFailure(capture: Located & { error: IoError }): Outcome {
  return { kind: 'io-failure', input: capture.input, path: capture.path, error: capture.error };
}

function toRecord(filePath: string, fingerprint: Fingerprint): LedgerRecord {
  return {
    path: filePath,
    digest: fingerprint.digest,
    attributes: { ...fingerprint.attributes },
    recordedAt: new Date().toISOString(),
  };
}

function toFingerprint(record: LedgerRecord): Fingerprint {
  return { digest: record.digest, attributes: record.attributes };
}
