export { snapshotAttributes } from './attributes.js';
export { executeCommand, isLedgerCommand, LEDGER_COMMANDS } from './commands.js';
export type { CommandContext, CommandResult, LedgerCommand } from './commands.js';
export { LedgerConfigSchema, resolveConfig, resolveDbPath } from './config.js';
export type { LedgerConfig } from './config.js';
export { DIGEST_ALGORITHM, DIGEST_BYTES, digestBuffer, digestFile } from './digest.js';
export {
  AlreadyTrackedError,
  IoError,
  LedgerError,
  NotTrackedError,
  PolicyError,
  StoreError,
} from './errors.js';
export { captureFingerprint, Ledger } from './ledger.js';
export type { LedgerOptions } from './ledger.js';
export { canonicalizePath } from './paths.js';
export { exitStatus, formatOutcome, isFailure, outcomeToJson, renderOutcomes } from './report.js';
export { createLedgerServer } from './server.js';
export { RecordStore, withRecordStore } from './storage.js';
export type { RecordStoreOptions } from './storage.js';
export type * from './types.js';
