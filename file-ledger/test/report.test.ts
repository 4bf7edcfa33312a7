import { describe, it } from 'node:test';
import assert from 'node:assert';
import { AlreadyTrackedError, IoError, NotTrackedError } from '../src/errors.js';
import {
  exitStatus,
  formatOutcome,
  formatRecord,
  isFailure,
  outcomeToJson,
  renderOutcomes,
  renderRecords,
  summarize,
} from '../src/report.js';
import type { Fingerprint, LedgerRecord, Outcome } from '../src/types.js';

const JAN_1 = Date.UTC(2024, 0, 1);
const AA = 'aa'.repeat(32);
const BB = 'bb'.repeat(32);

const expected: Fingerprint = {
  digest: Buffer.alloc(32, 0xaa),
  attributes: { size: 5, modifiedMs: JAN_1, permissions: 0o644 },
};

const record: LedgerRecord = {
  path: '/etc/app.conf',
  ...expected,
  recordedAt: '2026-01-01T00:00:00.000Z',
};

const at = (path: string) => ({ path, input: path });

describe('isFailure / exitStatus', () => {
  it('should pass clean and tolerated outcomes', () => {
    const outcomes: Outcome[] = [
      { kind: 'added', ...at('/a'), record },
      { kind: 'unchanged', ...at('/b') },
      { kind: 'removed', ...at('/c') },
      { kind: 'already-tracked', ...at('/d'), matchesBaseline: true },
      { kind: 'not-tracked', ...at('/e'), tolerated: true },
    ];
    assert.deepStrictEqual(outcomes.map(isFailure), [false, false, false, false, false]);
    assert.strictEqual(exitStatus(outcomes), 0);
  });

  it('should fail on changes, errors and untolerated outcomes', () => {
    const failing: Outcome[] = [
      { kind: 'changed', ...at('/a'), expected, observed: expected },
      { kind: 'io-failure', ...at('/b'), error: new IoError('/b', 'EACCES', 'permission denied') },
      { kind: 'policy-error', ...at('/c'), error: new NotTrackedError('/c') },
      { kind: 'already-tracked', ...at('/d'), matchesBaseline: false },
      { kind: 'not-tracked', ...at('/e'), tolerated: false },
    ];
    for (const outcome of failing) {
      assert.strictEqual(isFailure(outcome), true, outcome.kind);
      assert.strictEqual(exitStatus([{ kind: 'unchanged', ...at('/ok') }, outcome]), 1);
    }
  });

  it('should treat an empty batch as clean', () => {
    assert.strictEqual(exitStatus([]), 0);
  });
});

describe('formatOutcome', () => {
  it('should print one line per simple outcome', () => {
    assert.strictEqual(formatOutcome({ kind: 'added', ...at('/a'), record }), 'added: /a');
    assert.strictEqual(formatOutcome({ kind: 'unchanged', ...at('/a') }), 'unchanged: /a');
    assert.strictEqual(
      formatOutcome({ kind: 'already-tracked', ...at('/a'), matchesBaseline: false }),
      'already tracked, content differs from baseline: /a'
    );
    assert.strictEqual(
      formatOutcome({ kind: 'policy-error', ...at('/a'), error: new AlreadyTrackedError('/a') }),
      'ERROR: already tracked: /a'
    );
    assert.strictEqual(
      formatOutcome({ kind: 'io-failure', ...at('/a'), error: new IoError('/a', 'ENOENT', 'no such file (vanished?)') }),
      'ERROR: cannot read /a: no such file (vanished?)'
    );
  });

  it('should list only the attributes that differ', () => {
    const observed: Fingerprint = {
      digest: Buffer.alloc(32, 0xbb),
      attributes: { size: 6, modifiedMs: JAN_1, permissions: 0o600 },
    };
    assert.strictEqual(
      formatOutcome({ kind: 'changed', ...at('/etc/app.conf'), expected, observed }),
      [
        'CHANGED: /etc/app.conf',
        `  digest       ${AA} -> ${BB}`,
        '  size         5 -> 6',
        '  permissions  0644 -> 0600',
      ].join('\n')
    );
  });

  it('should say when only the content changed', () => {
    const observed: Fingerprint = { digest: Buffer.alloc(32, 0xbb), attributes: { ...expected.attributes } };
    assert.strictEqual(
      formatOutcome({ kind: 'changed', ...at('/etc/app.conf'), expected, observed }),
      ['CHANGED: /etc/app.conf', `  digest       ${AA} -> ${BB}`, '  attributes   unchanged'].join('\n')
    );
  });
});

describe('JSON rendering', () => {
  it('should serialize an outcome with hex digests and octal modes', () => {
    assert.deepStrictEqual(outcomeToJson({ kind: 'added', ...at('/etc/app.conf'), record }), {
      kind: 'added',
      path: '/etc/app.conf',
      input: '/etc/app.conf',
      failure: false,
      record: {
        path: '/etc/app.conf',
        digest: AA,
        size: 5,
        modified: '2024-01-01T00:00:00.000Z',
        permissions: '0644',
        recorded_at: '2026-01-01T00:00:00.000Z',
      },
    });
  });

  it('should carry error details', () => {
    const error = new IoError('/x', 'ENOENT', 'no such file (vanished?)');
    assert.deepStrictEqual(outcomeToJson({ kind: 'io-failure', ...at('/x'), error }), {
      kind: 'io-failure',
      path: '/x',
      input: '/x',
      failure: true,
      error: { code: 'IO_ERROR', errno: 'ENOENT', message: 'cannot read /x: no such file (vanished?)' },
    });
  });

  it('should render a batch with summary and exit status', () => {
    const outcomes: Outcome[] = [
      { kind: 'unchanged', ...at('/a') },
      { kind: 'not-tracked', ...at('/b'), tolerated: false },
    ];
    const parsed: unknown = JSON.parse(renderOutcomes(outcomes, 'json'));
    assert.deepStrictEqual(parsed, {
      outcomes: [
        { kind: 'unchanged', path: '/a', input: '/a', failure: false },
        { kind: 'not-tracked', path: '/b', input: '/b', failure: true, tolerated: false },
      ],
      summary: summarize(outcomes),
      exit_status: 1,
    });
    assert.strictEqual(summarize(outcomes)['not-tracked'], 1);
  });

  it('should render text as one block per outcome', () => {
    assert.strictEqual(
      renderOutcomes([{ kind: 'unchanged', ...at('/a') }, { kind: 'removed', ...at('/b') }], 'text'),
      'unchanged: /a\nremoved: /b'
    );
  });
});

describe('record listing', () => {
  it('should print paths, or details when verbose', () => {
    assert.strictEqual(renderRecords([record], 'text'), '/etc/app.conf');
    assert.strictEqual(
      formatRecord(record, true),
      [
        '/etc/app.conf',
        `  digest ${AA}`,
        '  5 B, 0644, modified 2024-01-01T00:00:00.000Z, recorded 2026-01-01T00:00:00.000Z',
      ].join('\n')
    );
  });
});
