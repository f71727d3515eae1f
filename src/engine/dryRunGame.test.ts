import test from 'node:test';
import assert from 'node:assert/strict';
import { DryRunModelClient } from '../dryRunClient.js';
import { logger } from '../logger.js';
import type { GameConfigInput } from '../types.js';
import { GameEngine } from './gameEngine.js';

logger.setConsoleOutputEnabled(false);

const config: GameConfigInput = {
  word: 'beach',
  category: 'nature',
  num_players: 6,
  num_imposters: 2,
  num_rounds: 3,
  seed: 7,
};

test('dry-run harness: a full game completes without a provider', async () => {
  const engine = new GameEngine(config, { modelCaller: new DryRunModelClient(7), gameId: 'dry-run' });
  const result = await engine.run();

  assert.equal(result.clues.length, 18);
  assert.equal(new Set(result.clues.map(c => c.clue)).size, 18);
  assert.equal(result.totalRounds, 3);
  assert.ok(['civilians_win', 'imposters_win', 'undecided'].includes(result.outcome));
  assert.ok(result.eliminatedPlayers.length >= 1 && result.eliminatedPlayers.length <= 2);
  assert.equal(result.players.filter(p => p.role === 'imposter').length, 2);
  assert.equal(engine.phase, 'complete');
});

test('dry-run harness: same seed replays the same game', async () => {
  const play = async () => {
    const engine = new GameEngine(config, { modelCaller: new DryRunModelClient(7), gameId: 'dry-run' });
    return engine.run();
  };
  const a = await play();
  const b = await play();

  assert.deepEqual(a.actualImposters, b.actualImposters);
  assert.deepEqual(
    a.clues.map(c => [c.playerId, c.clue]),
    b.clues.map(c => [c.playerId, c.clue])
  );
  assert.deepEqual(
    a.votes.map(v => [v.voterId, v.targetId]),
    b.votes.map(v => [v.voterId, v.targetId])
  );
  assert.deepEqual(a.eliminatedPlayers, b.eliminatedPlayers);
  assert.equal(a.outcome, b.outcome);
});

test('dry-run harness: batch voting with discussion completes', async () => {
  const engine = new GameEngine(
    { ...config, voting_mode: 'batch', enable_discussion: true },
    { modelCaller: new DryRunModelClient(3) }
  );
  const result = await engine.run();

  assert.equal(result.discussion.length, 6);
  assert.equal(result.batchVotes.length, 6);
  assert.ok(result.batchVotes.every(b => b.targets.length >= 1 && b.targets.length <= 2));
  assert.ok(!result.batchVotes.some(b => b.targets.includes(b.voterId)));
});
