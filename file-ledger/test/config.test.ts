import { describe, it } from 'node:test';
import assert from 'node:assert';
import { BOOLEAN_FLAGS, resolveConfig, resolveDbPath } from '../src/config.js';
import { parseArgs } from '../src/utils.js';

const argv = (...tokens: string[]) => parseArgs(tokens, { booleans: BOOLEAN_FLAGS });

describe('resolveDbPath', () => {
  it('should prefer --db over the environment', () => {
    assert.strictEqual(
      resolveDbPath(argv('--db', '/srv/one.sqlite'), { FILE_LEDGER_DB: '/srv/two.sqlite' }),
      '/srv/one.sqlite'
    );
    assert.strictEqual(resolveDbPath(argv('-d', '/srv/short.sqlite'), {}), '/srv/short.sqlite');
  });

  it('should fall back to FILE_LEDGER_DB, then the state root', () => {
    assert.strictEqual(resolveDbPath(argv(), { FILE_LEDGER_DB: '/srv/two.sqlite' }), '/srv/two.sqlite');
    assert.strictEqual(
      resolveDbPath(argv(), { FILE_LEDGER_STATE_ROOT: '/srv/state' }),
      '/srv/state/ledger.db.sqlite'
    );
  });
});

describe('resolveConfig', () => {
  const env = { FILE_LEDGER_DB: '/srv/ledger.sqlite' };

  it('should default to strict text output', () => {
    const config = resolveConfig(argv('verify', 'a'), { ...env, FILE_LEDGER_CONCURRENCY: '3' });
    assert.deepStrictEqual(config, {
      dbPath: '/srv/ledger.sqlite',
      tolerant: false,
      concurrency: 3,
      format: 'text',
      verbose: false,
    });
  });

  it('should read flags without eating positional paths', () => {
    const args = argv('-t', 'add', '--json', 'a.conf', '-v');
    const config = resolveConfig(args, env);
    assert.deepStrictEqual(args._, ['add', 'a.conf']);
    assert.strictEqual(config.tolerant, true);
    assert.strictEqual(config.format, 'json');
    assert.strictEqual(config.verbose, true);
  });

  it('should take the policy from FILE_LEDGER_TOLERANT', () => {
    assert.strictEqual(resolveConfig(argv(), { ...env, FILE_LEDGER_TOLERANT: 'yes' }).tolerant, true);
    assert.strictEqual(resolveConfig(argv(), { ...env, FILE_LEDGER_TOLERANT: 'off' }).tolerant, false);
  });

  it('should let an explicit flag override FILE_LEDGER_TOLERANT', () => {
    const tolerantEnv = { ...env, FILE_LEDGER_TOLERANT: '1' };
    assert.strictEqual(resolveConfig(argv('--tolerant=false', 'add', 'x'), tolerantEnv).tolerant, false);
    assert.strictEqual(resolveConfig(argv('-t=no', 'add', 'x'), tolerantEnv).tolerant, false);
    assert.strictEqual(resolveConfig(argv('--tolerant', 'add', 'x'), { ...env, FILE_LEDGER_TOLERANT: '0' }).tolerant, true);
  });

  it('should clamp concurrency', () => {
    assert.strictEqual(resolveConfig(argv('--concurrency', '500'), env).concurrency, 64);
    assert.strictEqual(resolveConfig(argv('--concurrency=0'), env).concurrency, 1);
  });

  it('should reject an unknown output format', () => {
    assert.throws(() => resolveConfig(argv('--format', 'yaml'), env), /Invalid configuration: format:/);
  });
});
