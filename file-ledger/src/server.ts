import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { Ledger } from './ledger.js';
import { exitStatus, outcomeToJson, recordToJson, summarize } from './report.js';
import { withRecordStore } from './storage.js';
import type { LedgerOperation, Outcome } from './types.js';
import { runOperation } from './commands.js';

export interface LedgerServerOptions {
  serverName: string;
  dbPath: string;
  tolerant: boolean;
  concurrency: number;
}

type ToolResult = { content: { type: 'text'; text: string }[] };

/**
 * MCP tool surface over the ledger. Every call opens the store, runs one
 * batch and closes it again; nothing is held between calls.
 */
export function createLedgerServer(options: LedgerServerOptions) {
  const { serverName, dbPath, tolerant, concurrency } = options;

  const server = new McpServer({ name: serverName, version: '0.1.0' });
  const storeNote = `Ledger database: ${dbPath}.`;
  const policyNote = `Default policy: ${tolerant ? 'tolerant' : 'strict'}.`;

  const paths = z.array(z.string().min(1)).min(1).describe('Files to operate on (absolute, or relative to the server cwd).');
  const tolerantFlag = z
    .boolean()
    .optional()
    .describe('Report already-tracked / not-tracked as outcomes instead of errors.');

  const run = async (operation: LedgerOperation, inputs: string[], tolerantOverride?: boolean) => {
    const outcomes = await withRecordStore({ dbPath }, (store) =>
      runOperation(new Ledger({ store, tolerant: tolerantOverride ?? tolerant, concurrency }), operation, inputs)
    );
    return textResult(operationPayload(operation, outcomes));
  };

  server.registerTool(
    'ledger_add',
    {
      title: 'Track files',
      description: ['Record the content digest and metadata of files as their baseline.', storeNote, policyNote].join('\n'),
      inputSchema: { paths, tolerant: tolerantFlag },
    },
    async (input) => run('add', input.paths, input.tolerant)
  );

  server.registerTool(
    'ledger_verify',
    {
      title: 'Verify files',
      description: ['Compare the current digest of tracked files against their baseline. Never modifies the ledger.', storeNote].join('\n'),
      inputSchema: { paths },
    },
    async (input) => run('verify', input.paths)
  );

  server.registerTool(
    'ledger_verify_all',
    {
      title: 'Verify all tracked files',
      description: ['Verify every file in the ledger, in path order.', storeNote].join('\n'),
    },
    async () => run('verify-all', [])
  );

  server.registerTool(
    'ledger_accept',
    {
      title: 'Accept changes',
      description: ['Reset the baseline of tracked files to their current content.', storeNote, policyNote].join('\n'),
      inputSchema: { paths, tolerant: tolerantFlag },
    },
    async (input) => run('accept', input.paths, input.tolerant)
  );

  server.registerTool(
    'ledger_remove',
    {
      title: 'Stop tracking files',
      description: ['Delete the ledger records of files.', storeNote, policyNote].join('\n'),
      inputSchema: { paths, tolerant: tolerantFlag },
    },
    async (input) => run('remove', input.paths, input.tolerant)
  );

  server.registerTool(
    'ledger_list',
    {
      title: 'List tracked files',
      description: ['List every tracked file with its recorded digest and metadata.', storeNote].join('\n'),
    },
    async () => {
      const records = await withRecordStore({ dbPath }, (store) => Array.from(store.iterate()));
      return textResult({ count: records.length, records: records.map(recordToJson) });
    }
  );

  return server;
}

function operationPayload(operation: LedgerOperation, outcomes: Outcome[]): Record<string, unknown> {
  return {
    operation,
    exit_status: exitStatus(outcomes),
    summary: summarize(outcomes),
    outcomes: outcomes.map(outcomeToJson),
  };
}

function textResult(payload: Record<string, unknown>): ToolResult {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(payload, null, 2) }],
  };
}
