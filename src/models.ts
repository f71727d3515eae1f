import type { ModelStrategy } from './types.js';
import { shuffleInPlace, type Rng } from './utils.js';

/** Alias -> AI Gateway model id (`provider/model`). Configs may extend or override it. */
export const DEFAULT_MODEL_REGISTRY: Readonly<Record<string, string>> = {
  'gpt-4o-mini': 'openai/gpt-4o-mini',
  'gpt-4o': 'openai/gpt-4o',
  haiku: 'anthropic/claude-3.5-haiku',
  sonnet: 'anthropic/claude-sonnet-4',
  'gemini-flash': 'google/gemini-2.0-flash',
  llama: 'meta/llama-3.1-8b',
  mistral: 'mistral/mistral-small',
};

export const DEFAULT_MODEL_DISTRIBUTION: Readonly<Record<string, number>> = {
  'gpt-4o-mini': 2,
  'gemini-flash': 2,
  haiku: 1,
  llama: 1,
};

export function buildModelRegistry(overrides: Record<string, string> = {}): Record<string, string> {
  return { ...DEFAULT_MODEL_REGISTRY, ...overrides };
}

export function resolveModelId(model: string, registry: Readonly<Record<string, string>>): string {
  const resolved = registry[model] ?? model;
  if (!resolved.includes('/')) {
    throw new Error(
      `Unknown model "${model}". Use a registered alias (${Object.keys(registry).join(', ')}) or an AI Gateway id like "openai/gpt-4o".`
    );
  }
  return resolved;
}

export interface ModelAssignmentInput {
  strategy: ModelStrategy;
  playerIds: readonly string[];
  imposterIds: readonly string[];
  defaultModel: string;
  distribution?: Readonly<Record<string, number>>;
  roleModels: { imposter: string; non_imposter: string };
  rng: Rng;
}

/**
 * Assigns a model to every seat.
 *
 * - single: everyone gets `defaultModel`.
 * - mixed: a pool built from `distribution` (model -> count), padded with the
 *   default model or truncated to the player count, then shuffled. Model
 *   choice is independent of role.
 * - role-based: imposters get one model, everyone else another.
 */
export function assignModels(input: ModelAssignmentInput): Record<string, string> {
  const { playerIds } = input;

  if (input.strategy === 'single') {
    return Object.fromEntries(playerIds.map(id => [id, input.defaultModel]));
  }

  if (input.strategy === 'role-based') {
    const imposters = new Set(input.imposterIds);
    return Object.fromEntries(
      playerIds.map(id => [id, imposters.has(id) ? input.roleModels.imposter : input.roleModels.non_imposter])
    );
  }

  const pool: string[] = [];
  for (const [model, count] of Object.entries(input.distribution ?? DEFAULT_MODEL_DISTRIBUTION)) {
    for (let i = 0; i < count; i++) pool.push(model);
  }
  while (pool.length < playerIds.length) pool.push(input.defaultModel);
  pool.length = playerIds.length;
  shuffleInPlace(pool, input.rng);

  return Object.fromEntries(playerIds.map((id, i) => [id, pool[i]!]));
}
