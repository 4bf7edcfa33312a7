export type LedgerErrorCode = 'IO_ERROR' | 'ALREADY_TRACKED' | 'NOT_TRACKED' | 'STORE_ERROR';

export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LedgerError';
    this.code = code;
  }
}

/**
 * A file could not be opened, read or stat'ed. Scoped to one path; the batch
 * carries on.
 */
export class IoError extends LedgerError {
  public readonly path: string;
  /** errno code such as ENOENT or EACCES; EISDIR for directories, EINVAL for other non-regular files. */
  public readonly errno: string;

  constructor(filePath: string, errno: string, reason: string, options?: { cause?: unknown }) {
    super('IO_ERROR', `cannot read ${filePath}: ${reason}`, options);
    this.name = 'IoError';
    this.path = filePath;
    this.errno = errno;
  }
}

export abstract class PolicyError extends LedgerError {
  public readonly path: string;

  protected constructor(code: 'ALREADY_TRACKED' | 'NOT_TRACKED', filePath: string, message: string) {
    super(code, message);
    this.path = filePath;
  }
}

export class AlreadyTrackedError extends PolicyError {
  constructor(filePath: string) {
    super('ALREADY_TRACKED', filePath, `already tracked: ${filePath}`);
    this.name = 'AlreadyTrackedError';
  }
}

export class NotTrackedError extends PolicyError {
  constructor(filePath: string) {
    super('NOT_TRACKED', filePath, `not tracked: ${filePath}`);
    this.name = 'NotTrackedError';
  }
}

/**
 * The record store failed. Fatal for the invocation: the remaining batch is
 * abandoned and the error propagates.
 */
export class StoreError extends LedgerError {
  public readonly dbPath: string;

  constructor(dbPath: string, action: string, cause: unknown) {
    super('STORE_ERROR', `record store ${action} failed (${dbPath}): ${describeError(cause)}`, { cause });
    this.name = 'StoreError';
    this.dbPath = dbPath;
  }
}

export function errnoCode(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return 'EIO';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toIoError(filePath: string, error: unknown): IoError {
  if (error instanceof IoError) return error;
  const code = errnoCode(error);
  return new IoError(filePath, code, describeErrno(code, error), { cause: error });
}

function describeErrno(code: string, error: unknown): string {
  switch (code) {
    case 'ENOENT':
      return 'no such file (vanished?)';
    case 'EACCES':
    case 'EPERM':
      return 'permission denied';
    case 'EISDIR':
      return 'is a directory';
    case 'ENOTDIR':
      return 'a parent is not a directory';
    case 'ELOOP':
      return 'too many symbolic links';
    default:
      return describeError(error);
  }
}
