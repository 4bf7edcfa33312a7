#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { executeCommand, isLedgerCommand } from './commands.js';
import { BOOLEAN_FLAGS, resolveConfig } from './config.js';
import { EXIT_FATAL } from './report.js';
import { createLedgerServer } from './server.js';
import { normalizeName, parseArgs } from './utils.js';

const args = parseArgs(process.argv.slice(2), { booleans: BOOLEAN_FLAGS });
if (args.help || args.h) {
  printHelp();
  process.exit(0);
}

const [command = '', ...files] = args._;
const serverName = normalizeName(String(args.name || 'file_ledger'), 'file_ledger');

function log(message: string) {
  console.error(`[${serverName}] ${message}`);
}

async function main(): Promise<number> {
  const config = resolveConfig(args);

  if (command === 'serve') {
    const server = createLedgerServer({
      serverName,
      dbPath: config.dbPath,
      tolerant: config.tolerant,
      concurrency: config.concurrency,
    });
    const transport = new StdioServerTransport();
    await server.connect(transport);
    log(`Ledger MCP server ready (db=${config.dbPath}, policy=${config.tolerant ? 'tolerant' : 'strict'}).`);
    return 0;
  }

  if (!isLedgerCommand(command)) {
    printHelp();
    return EXIT_FATAL;
  }

  const result = await executeCommand(command, files, { config, log });
  if (result.output) console.log(result.output);
  return result.exitCode;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    log(`${command || 'command'} failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(EXIT_FATAL);
  });

function printHelp() {
  console.log(`Usage: file-ledger [options] <command> [files...]

Commands:
  add <files...>       Track files (record digest and metadata as baseline)
  verify <files...>    Compare files against their baseline
  verify-all           Verify every tracked file
  accept <files...>    Reset the baseline of files to their current content
  remove <files...>    Stop tracking files
  list                 List tracked files
  serve                Run as an MCP server over stdio

Options:
  -d, --db <path>          Ledger database (default: $FILE_LEDGER_DB or ~/.config/file-ledger/ledger.db.sqlite)
  -t, --tolerant           Report already-tracked / not-tracked instead of failing
  --concurrency <n>        Files hashed in parallel (default: CPU count, max 64)
  --json                   Emit JSON instead of text
  -v, --verbose            Log store location and timing to stderr
  --name <id>              Log prefix / MCP server name (default file_ledger)
  --help                   Show help

Exit status: 0 clean, 1 changes or per-file failures, 2 fatal error.`);
}
