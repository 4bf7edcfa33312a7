import path from 'path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { DIGEST_BYTES } from './digest.js';
import { StoreError } from './errors.js';
import type { LedgerRecord } from './types.js';
import { ensureDir } from './utils.js';

export interface RecordStoreOptions {
  dbPath: string;
  /** How long a statement waits on another process's lock before failing. */
  busyTimeoutMs?: number;
  /** Rows fetched per page while iterating. */
  pageSize?: number;
}

const DbRowSchema = z.object({
  path: z.string().min(1),
  digest: z.instanceof(Buffer).refine((value) => value.length === DIGEST_BYTES, {
    message: `digest must be ${DIGEST_BYTES} bytes`,
  }),
  size: z.number().int().nonnegative(),
  modified_ms: z.number(),
  permissions: z.number().int().nonnegative(),
  recorded_at: z.string(),
});

type DbRow = z.infer<typeof DbRowSchema>;

/**
 * Persisted map from canonical path to baseline record, backed by SQLite.
 *
 * Every public method is a single statement or a single transaction, so a
 * record is always either the old or the new version. Iteration pages by key
 * and does not hold a read transaction open, so a concurrent writer may be
 * observed part-way through.
 */
export class RecordStore {
  private db: Database.Database;
  private dbPath: string;
  private pageSize: number;

  constructor(options: RecordStoreOptions) {
    this.dbPath = options.dbPath;
    this.pageSize = Math.max(1, options.pageSize ?? 256);
    this.db = this.guard('open', () => new Database(options.dbPath, { timeout: options.busyTimeoutMs ?? 5000 }));
    try {
      this.guard('open', () => {
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('synchronous = NORMAL');
        this.ensureSchema();
      });
    } catch (err) {
      this.db.close();
      throw err;
    }
  }

  ensureSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS records (
        path TEXT PRIMARY KEY,
        digest BLOB NOT NULL,
        size INTEGER NOT NULL,
        modified_ms REAL NOT NULL,
        permissions INTEGER NOT NULL,
        recorded_at TEXT NOT NULL
      ) WITHOUT ROWID;
    `);
  }

  getPath(): string {
    return this.dbPath;
  }

  get(filePath: string): LedgerRecord | null {
    return this.guard('read', () => {
      const row = this.db.prepare('SELECT * FROM records WHERE path = ?').get(filePath);
      return row === undefined ? null : this.fromDbRow(row);
    });
  }

  /** Insert or overwrite. */
  put(record: LedgerRecord): void {
    this.guard('write', () => {
      this.db
        .prepare(
          `INSERT INTO records (path, digest, size, modified_ms, permissions, recorded_at)
           VALUES (@path, @digest, @size, @modified_ms, @permissions, @recorded_at)
           ON CONFLICT(path) DO UPDATE SET
             digest = excluded.digest,
             size = excluded.size,
             modified_ms = excluded.modified_ms,
             permissions = excluded.permissions,
             recorded_at = excluded.recorded_at`
        )
        .run(this.toDbRow(record));
    });
  }

  /**
   * Insert only when the key is free. Returns the record already stored under
   * the key, or null when this call inserted.
   */
  insertIfAbsent(record: LedgerRecord): LedgerRecord | null {
    return this.transaction('write', () => {
      const existing = this.get(record.path);
      if (existing) return existing;
      this.put(record);
      return null;
    });
  }

  /**
   * Overwrite an existing key. Returns the replaced record, or null (and
   * writes nothing) when the key is not present.
   */
  replaceExisting(record: LedgerRecord): LedgerRecord | null {
    return this.transaction('write', () => {
      const previous = this.get(record.path);
      if (!previous) return null;
      this.put(record);
      return previous;
    });
  }

  /** Upsert, returning whatever was stored before. */
  swap(record: LedgerRecord): LedgerRecord | null {
    return this.transaction('write', () => {
      const previous = this.get(record.path);
      this.put(record);
      return previous;
    });
  }

  delete(filePath: string): boolean {
    return this.guard('delete', () => {
      const info = this.db.prepare('DELETE FROM records WHERE path = ?').run(filePath);
      return info.changes > 0;
    });
  }

  /** Lazily yields every record in key order. */
  *iterate(): Generator<LedgerRecord> {
    let after: string | null = null;
    for (;;) {
      const cursor: string | null = after;
      const page = this.guard('read', () => {
        const rows: unknown[] =
          cursor === null
            ? this.db.prepare('SELECT * FROM records ORDER BY path LIMIT ?').all(this.pageSize)
            : this.db.prepare('SELECT * FROM records WHERE path > ? ORDER BY path LIMIT ?').all(cursor, this.pageSize);
        return rows.map((row) => this.fromDbRow(row));
      });
      yield* page;
      if (page.length < this.pageSize) return;
      after = page[page.length - 1].path;
    }
  }

  count(): number {
    return this.guard('read', () => {
      const row = this.db.prepare('SELECT COUNT(*) AS count FROM records').get();
      const parsed = z.object({ count: z.number() }).safeParse(row);
      return parsed.success ? parsed.data.count : 0;
    });
  }

  close() {
    if (this.db.open) this.db.close();
  }

  private transaction<T>(action: string, fn: () => T): T {
    return this.guard(action, () => this.db.transaction(fn).immediate());
  }

  private guard<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof StoreError) throw err;
      throw new StoreError(this.dbPath, action, err);
    }
  }

  private fromDbRow(value: unknown): LedgerRecord {
    const parsed = DbRowSchema.safeParse(value);
    if (!parsed.success) {
      throw new StoreError(this.dbPath, 'decode', new Error(parsed.error.issues.map((issue) => issue.message).join('; ')));
    }
    const row = parsed.data;
    return {
      path: row.path,
      digest: Buffer.from(row.digest),
      attributes: {
        size: row.size,
        modifiedMs: row.modified_ms,
        permissions: row.permissions,
      },
      recordedAt: row.recorded_at,
    };
  }

  private toDbRow(record: LedgerRecord): DbRow {
    return {
      path: record.path,
      digest: record.digest,
      size: record.attributes.size,
      modified_ms: record.attributes.modifiedMs,
      permissions: record.attributes.permissions,
      recorded_at: record.recordedAt,
    };
  }
}

/**
 * Open the store, hand it to `fn`, and close it on every exit path.
 */
export async function withRecordStore<T>(
  options: RecordStoreOptions,
  fn: (store: RecordStore) => Promise<T> | T
): Promise<T> {
  try {
    ensureDir(path.dirname(options.dbPath));
  } catch (err) {
    throw new StoreError(options.dbPath, 'open', err);
  }
  const store = new RecordStore(options);
  try {
    return await fn(store);
  } finally {
    store.close();
  }
}
