import { sameAttributes } from './attributes.js';
import { digestHex } from './digest.js';
import type { FileAttributes, Fingerprint, LedgerRecord, Outcome, OutputFormat } from './types.js';
import { formatBytes, formatMode } from './utils.js';

export const EXIT_OK = 0;
export const EXIT_FINDINGS = 1;
export const EXIT_FATAL = 2;

/**
 * Whether an outcome should make the invocation fail. Tolerated
 * precondition outcomes pass; an already-tracked file whose content drifted
 * from its baseline does not.
 */
export function isFailure(outcome: Outcome): boolean {
  switch (outcome.kind) {
    case 'added':
    case 'unchanged':
    case 'accepted':
    case 'removed':
      return false;
    case 'already-tracked':
      return !outcome.matchesBaseline;
    case 'not-tracked':
      return !outcome.tolerated;
    case 'changed':
    case 'io-failure':
    case 'policy-error':
      return true;
  }
}

export function exitStatus(outcomes: Outcome[]): number {
  return outcomes.some(isFailure) ? EXIT_FINDINGS : EXIT_OK;
}

export function summarize(outcomes: Outcome[]): Record<Outcome['kind'], number> {
  const counts: Record<Outcome['kind'], number> = {
    added: 0,
    'already-tracked': 0,
    unchanged: 0,
    changed: 0,
    accepted: 0,
    removed: 0,
    'not-tracked': 0,
    'io-failure': 0,
    'policy-error': 0,
  };
  outcomes.forEach((outcome) => {
    counts[outcome.kind] += 1;
  });
  return counts;
}

export function formatOutcome(outcome: Outcome): string {
  switch (outcome.kind) {
    case 'added':
      return `added: ${outcome.path}`;
    case 'already-tracked':
      return outcome.matchesBaseline
        ? `already tracked: ${outcome.path}`
        : `already tracked, content differs from baseline: ${outcome.path}`;
    case 'unchanged':
      return `unchanged: ${outcome.path}`;
    case 'changed':
      return [`CHANGED: ${outcome.path}`, ...formatDiff(outcome.expected, outcome.observed)].join('\n');
    case 'accepted':
      return `accepted: ${outcome.path}`;
    case 'removed':
      return `removed: ${outcome.path}`;
    case 'not-tracked':
      return `not tracked: ${outcome.path}`;
    case 'io-failure':
      return `ERROR: ${outcome.error.message}`;
    case 'policy-error':
      return `ERROR: ${outcome.error.message}`;
  }
}

function formatDiff(expected: Fingerprint, observed: Fingerprint): string[] {
  const lines = [
    `  digest       ${digestHex(expected.digest)} -> ${digestHex(observed.digest)}`,
  ];
  const before = expected.attributes;
  const after = observed.attributes;
  if (sameAttributes(before, after)) {
    lines.push('  attributes   unchanged');
    return lines;
  }
  if (before.size !== after.size) {
    lines.push(`  size         ${before.size} -> ${after.size}`);
  }
  if (before.modifiedMs !== after.modifiedMs) {
    lines.push(`  modified     ${formatTime(before.modifiedMs)} -> ${formatTime(after.modifiedMs)}`);
  }
  if (before.permissions !== after.permissions) {
    lines.push(`  permissions  ${formatMode(before.permissions)} -> ${formatMode(after.permissions)}`);
  }
  return lines;
}

function formatTime(ms: number): string {
  return new Date(ms).toISOString();
}

export function formatRecord(record: LedgerRecord, verbose = false): string {
  if (!verbose) return record.path;
  const { size, modifiedMs, permissions } = record.attributes;
  return [
    record.path,
    `  digest ${digestHex(record.digest)}`,
    `  ${formatBytes(size)}, ${formatMode(permissions)}, modified ${formatTime(modifiedMs)}, recorded ${record.recordedAt}`,
  ].join('\n');
}

function attributesToJson(attributes: FileAttributes) {
  return {
    size: attributes.size,
    modified: formatTime(attributes.modifiedMs),
    permissions: formatMode(attributes.permissions),
  };
}

function fingerprintToJson(fingerprint: Fingerprint) {
  return { digest: digestHex(fingerprint.digest), ...attributesToJson(fingerprint.attributes) };
}

export function recordToJson(record: LedgerRecord) {
  return { path: record.path, ...fingerprintToJson(record), recorded_at: record.recordedAt };
}

export function outcomeToJson(outcome: Outcome) {
  const base = { kind: outcome.kind, path: outcome.path, input: outcome.input, failure: isFailure(outcome) };
  switch (outcome.kind) {
    case 'added':
      return { ...base, record: recordToJson(outcome.record) };
    case 'accepted':
      return { ...base, record: recordToJson(outcome.record), previous: fingerprintToJson(outcome.previous) };
    case 'already-tracked':
      return { ...base, matches_baseline: outcome.matchesBaseline };
    case 'changed':
      return { ...base, expected: fingerprintToJson(outcome.expected), observed: fingerprintToJson(outcome.observed) };
    case 'not-tracked':
      return { ...base, tolerated: outcome.tolerated };
    case 'io-failure':
      return { ...base, error: { code: outcome.error.code, errno: outcome.error.errno, message: outcome.error.message } };
    case 'policy-error':
      return { ...base, error: { code: outcome.error.code, message: outcome.error.message } };
    case 'unchanged':
    case 'removed':
      return base;
  }
}

export function renderOutcomes(outcomes: Outcome[], format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(
      { outcomes: outcomes.map(outcomeToJson), summary: summarize(outcomes), exit_status: exitStatus(outcomes) },
      null,
      2
    );
  }
  return outcomes.map(formatOutcome).join('\n');
}

export function renderRecords(records: LedgerRecord[], format: OutputFormat, verbose = false): string {
  if (format === 'json') {
    return JSON.stringify({ records: records.map(recordToJson) }, null, 2);
  }
  return records.map((record) => formatRecord(record, verbose)).join('\n');
}
