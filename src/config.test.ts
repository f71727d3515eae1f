import test from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { loadConfig, parseGameConfig, withOverrides } from './config.js';
import { GameConfigError } from './errors.js';
import { logger } from './logger.js';

logger.setConsoleOutputEnabled(false);

test('parseGameConfig: fills defaults around the required fields', () => {
  const cfg = parseGameConfig({ word: ' beach ', category: 'nature' });
  assert.equal(cfg.word, 'beach');
  assert.equal(cfg.num_players, 6);
  assert.equal(cfg.num_imposters, 2);
  assert.equal(cfg.num_rounds, 3);
  assert.equal(cfg.model_strategy, 'mixed');
  assert.equal(cfg.voting_mode, 'sequential');
  assert.equal(cfg.vote_validation, 'strict');
  assert.equal(cfg.tie_breaker, 'random');
  assert.equal(cfg.enable_discussion, false);
});

test('parseGameConfig: reports every problem at once', () => {
  assert.throws(
    () => parseGameConfig({ word: '  ', category: 'nature', num_players: 2, num_rounds: 0 }),
    (err: unknown) => {
      assert.ok(err instanceof GameConfigError);
      assert.equal(err.code, 'config_invalid');
      assert.equal(err.phase, 'setup');
      assert.ok(err.issues.includes('word: word must not be empty'));
      assert.ok(err.issues.some(i => i.startsWith('num_players:')));
      assert.ok(err.issues.some(i => i.startsWith('num_rounds:')));
      return true;
    }
  );
});

test('parseGameConfig: imposters must be fewer than players', () => {
  assert.throws(
    () => parseGameConfig({ word: 'beach', category: 'nature', num_players: 4, num_imposters: 4 }),
    (err: unknown) => {
      assert.ok(err instanceof GameConfigError);
      assert.deepEqual(err.issues, ['num_imposters: num_imposters (4) must be smaller than num_players (4)']);
      return true;
    }
  );
});

test('withOverrides: re-validates the merged config', () => {
  const base = parseGameConfig({ word: 'beach', category: 'nature' });
  assert.equal(withOverrides(base, { seed: 9 }).seed, 9);
  assert.throws(() => withOverrides(base, { num_players: 2 }), GameConfigError);
});

test('loadConfig: reads YAML from disk', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'imposter-config-'));
  const file = path.join(dir, 'game.yaml');
  fs.writeFileSync(file, 'word: lighthouse\ncategory: places\nnum_players: 5\nnum_imposters: 1\ntie_breaker: first\n');
  try {
    const cfg = loadConfig(file);
    assert.equal(cfg.word, 'lighthouse');
    assert.equal(cfg.num_players, 5);
    assert.equal(cfg.tie_breaker, 'first');
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test('loadConfig: a missing file is a config error', () => {
  assert.throws(() => loadConfig(path.join(os.tmpdir(), 'does-not-exist-imposter.yaml')), GameConfigError);
});
