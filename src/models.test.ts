import test from 'node:test';
import assert from 'node:assert/strict';
import { assignModels, buildModelRegistry, resolveModelId } from './models.js';
import { mulberry32 } from './utils.js';

const ids = ['Player_1', 'Player_2', 'Player_3', 'Player_4'];

test('assignModels: single gives everyone the default model', () => {
  const out = assignModels({
    strategy: 'single',
    playerIds: ids,
    imposterIds: ['Player_2'],
    defaultModel: 'sonnet',
    roleModels: { imposter: 'haiku', non_imposter: 'gpt-4o' },
    rng: mulberry32(1),
  });
  assert.deepEqual(Object.values(out), ['sonnet', 'sonnet', 'sonnet', 'sonnet']);
});

test('assignModels: role-based splits by role', () => {
  const out = assignModels({
    strategy: 'role-based',
    playerIds: ids,
    imposterIds: ['Player_2', 'Player_4'],
    defaultModel: 'sonnet',
    roleModels: { imposter: 'haiku', non_imposter: 'gpt-4o' },
    rng: mulberry32(1),
  });
  assert.deepEqual(out, { Player_1: 'gpt-4o', Player_2: 'haiku', Player_3: 'gpt-4o', Player_4: 'haiku' });
});

test('assignModels: mixed pads a short distribution with the default model', () => {
  const out = assignModels({
    strategy: 'mixed',
    playerIds: ids,
    imposterIds: ['Player_1'],
    defaultModel: 'sonnet',
    distribution: { haiku: 1 },
    roleModels: { imposter: 'haiku', non_imposter: 'gpt-4o' },
    rng: mulberry32(7),
  });
  assert.deepEqual(Object.keys(out), ids);
  assert.deepEqual(Object.values(out).sort(), ['haiku', 'sonnet', 'sonnet', 'sonnet']);
});

test('assignModels: mixed truncates a long distribution to the seat count', () => {
  const out = assignModels({
    strategy: 'mixed',
    playerIds: ids,
    imposterIds: ['Player_1'],
    defaultModel: 'sonnet',
    distribution: { llama: 6 },
    roleModels: { imposter: 'haiku', non_imposter: 'gpt-4o' },
    rng: mulberry32(7),
  });
  assert.deepEqual(Object.values(out), ['llama', 'llama', 'llama', 'llama']);
});

test('assignModels: mixed is deterministic for the same seed', () => {
  const input = {
    strategy: 'mixed' as const,
    playerIds: ids,
    imposterIds: ['Player_1'],
    defaultModel: 'sonnet',
    roleModels: { imposter: 'haiku', non_imposter: 'gpt-4o' },
  };
  assert.deepEqual(assignModels({ ...input, rng: mulberry32(42) }), assignModels({ ...input, rng: mulberry32(42) }));
});

test('resolveModelId: aliases, raw gateway ids and config overrides', () => {
  const registry = buildModelRegistry({ cheap: 'openai/gpt-4.1-nano', haiku: 'anthropic/claude-haiku-4.5' });
  assert.equal(resolveModelId('gpt-4o-mini', registry), 'openai/gpt-4o-mini');
  assert.equal(resolveModelId('cheap', registry), 'openai/gpt-4.1-nano');
  assert.equal(resolveModelId('haiku', registry), 'anthropic/claude-haiku-4.5');
  assert.equal(resolveModelId('xai/grok-3', registry), 'xai/grok-3');
  assert.throws(() => resolveModelId('mystery', registry), /Unknown model "mystery"/);
});
