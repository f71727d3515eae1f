import test from 'node:test';
import assert from 'node:assert/strict';
import { parseArgs } from './cliArgs.js';

test('parseArgs: defaults', () => {
  assert.deepEqual(parseArgs([]), {
    configFile: 'game-config.yaml',
    dryRun: false,
    seed: undefined,
    ui: true,
    replay: undefined,
  });
});

test('parseArgs: flags, positional config and the npm separator', () => {
  const args = parseArgs(['--', 'my-game.yaml', '--dry-run', '--no-ui', '--seed', '42']);
  assert.equal(args.configFile, 'my-game.yaml');
  assert.equal(args.dryRun, true);
  assert.equal(args.ui, false);
  assert.equal(args.seed, 42);
});

test('parseArgs: --replay defaults to latest', () => {
  assert.equal(parseArgs(['--replay']).replay, 'latest');
  assert.equal(parseArgs(['--replay', '--no-ui']).replay, 'latest');
  assert.equal(parseArgs(['--replay', 'abc123']).replay, 'abc123');
});

test('parseArgs: rejects unknown flags and bad values', () => {
  assert.throws(() => parseArgs(['--turbo']), /Unknown argument: --turbo/);
  assert.throws(() => parseArgs(['--seed']), /Missing value for --seed/);
  assert.throws(() => parseArgs(['--seed', 'abc']), /Invalid seed "abc"/);
  assert.throws(() => parseArgs(['--config', '--dry-run']), /Missing value for --config/);
});
