import { DryRunModelClient } from './dryRunClient.js';
import { GameEngine } from './engine/gameEngine.js';
import { GameConfigError, errorMessage } from './errors.js';
import { GameHistory } from './history/gameHistory.js';
import { GatewayModelClient, type GenerateFn, type ModelCaller } from './modelClient.js';
import { buildModelRegistry, resolveModelId } from './models.js';
import type { GameConfig } from './types.js';

export interface SessionOptions {
  dryRun: boolean;
  dryRunSeed?: number;
  gameId?: string;
  logDir?: string;
  persist?: boolean;
  generate?: GenerateFn;
}

export function createModelCaller(config: GameConfig, opts: Pick<SessionOptions, 'dryRun' | 'dryRunSeed' | 'generate'>): ModelCaller {
  if (opts.dryRun) return new DryRunModelClient(opts.dryRunSeed ?? config.seed ?? 1);

  const registry = buildModelRegistry(config.models);
  let fallbackModels: string[];
  try {
    fallbackModels = config.fallback_models.map(m => resolveModelId(m, registry));
  } catch (error) {
    throw new GameConfigError([`fallback_models: ${errorMessage(error)}`]);
  }
  return new GatewayModelClient(
    { maxAttempts: config.max_attempts, timeoutMs: config.response_timeout_ms, fallbackModels },
    opts.generate
  );
}

/** An engine wired to its persisted history. Nothing runs until `engine.run()`. */
export function createSession(config: GameConfig, opts: SessionOptions): { engine: GameEngine; history: GameHistory } {
  const engine = new GameEngine(config, {
    modelCaller: createModelCaller(config, opts),
    gameId: opts.gameId,
  });
  const history = new GameHistory(engine.gameId, engine.config, { dir: opts.logDir, persist: opts.persist });
  history.attach(engine.events);
  return { engine, history };
}
