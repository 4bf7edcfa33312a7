import type { LedgerConfig } from './config.js';
import { Ledger } from './ledger.js';
import { EXIT_OK, exitStatus, renderOutcomes, renderRecords, summarize } from './report.js';
import { withRecordStore } from './storage.js';
import type { LedgerOperation, Outcome } from './types.js';

export type LedgerCommand = LedgerOperation | 'list';

export const LEDGER_COMMANDS: readonly LedgerCommand[] = ['add', 'verify', 'verify-all', 'accept', 'remove', 'list'];

export function isLedgerCommand(value: string): value is LedgerCommand {
  return LEDGER_COMMANDS.some((command) => command === value);
}

export interface CommandResult {
  exitCode: number;
  output: string;
  outcomes: Outcome[];
}

export interface CommandContext {
  config: LedgerConfig;
  cwd?: string;
  log?: (message: string) => void;
}

/**
 * Open the store, run one ledger command over `paths`, close the store.
 * Store errors propagate; everything per-path is in the outcomes.
 */
export async function executeCommand(
  command: LedgerCommand,
  paths: string[],
  context: CommandContext
): Promise<CommandResult> {
  const { config, cwd } = context;
  const log = context.log ?? (() => undefined);

  if (command !== 'list' && command !== 'verify-all' && paths.length === 0) {
    throw new Error(`${command} needs at least one file`);
  }

  const startedAt = Date.now();
  return withRecordStore({ dbPath: config.dbPath }, async (store) => {
    if (config.verbose) log(`store: ${store.getPath()}`);
    const ledger = new Ledger({ store, tolerant: config.tolerant, concurrency: config.concurrency, cwd });

    if (command === 'list') {
      const records = ledger.list();
      if (config.verbose) log(`${records.length} file(s) tracked`);
      return { exitCode: EXIT_OK, output: renderRecords(records, config.format, config.verbose), outcomes: [] };
    }

    const outcomes = await runOperation(ledger, command, paths);
    if (config.verbose) {
      const counts = Object.entries(summarize(outcomes))
        .filter(([, count]) => count > 0)
        .map(([kind, count]) => `${kind}=${count}`);
      log(`${command}: ${outcomes.length} path(s) in ${Date.now() - startedAt} ms${counts.length ? ` (${counts.join(', ')})` : ''}`);
    }
    return { exitCode: exitStatus(outcomes), output: renderOutcomes(outcomes, config.format), outcomes };
  });
}

export function runOperation(ledger: Ledger, operation: LedgerOperation, paths: string[]): Promise<Outcome[]> {
  switch (operation) {
    case 'add':
      return ledger.add(paths);
    case 'verify':
      return ledger.verify(paths);
    case 'verify-all':
      return ledger.verifyAll();
    case 'accept':
      return ledger.accept(paths);
    case 'remove':
      return ledger.remove(paths);
  }
}
