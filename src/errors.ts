import type { GamePhase } from './types.js';

export type EngineErrorCode =
  | 'config_invalid'
  | 'model_call_failed'
  | 'invalid_vote'
  | 'cancelled'
  | 'phase_order'
  | 'internal';

export interface EngineErrorContext {
  playerId?: string;
  phase?: GamePhase;
  cause?: unknown;
}

/**
 * Fatal engine error. Carries enough context (player, phase, cause) for an
 * observer to tell what went wrong without re-running the game.
 */
export class GameEngineError extends Error {
  readonly code: EngineErrorCode;
  readonly playerId?: string;
  readonly phase?: GamePhase;

  constructor(code: EngineErrorCode, message: string, ctx: EngineErrorContext = {}) {
    super(message, ctx.cause === undefined ? undefined : { cause: ctx.cause });
    this.name = 'GameEngineError';
    this.code = code;
    this.playerId = ctx.playerId;
    this.phase = ctx.phase;
  }
}

export class GameConfigError extends GameEngineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('config_invalid', `Invalid game config: ${issues.join('; ')}`, { phase: 'setup' });
    this.name = 'GameConfigError';
    this.issues = issues;
  }
}

export class InvalidVoteError extends GameEngineError {
  readonly rejectedVotes: string[];
  readonly eligibleTargets: string[];

  constructor(playerId: string, rejectedVotes: string[], eligibleTargets: string[]) {
    super(
      'invalid_vote',
      `${playerId} named an invalid target twice (${rejectedVotes.map(v => `"${v}"`).join(', ')}); eligible: ${eligibleTargets.join(', ')}`,
      { playerId, phase: 'voting' }
    );
    this.name = 'InvalidVoteError';
    this.rejectedVotes = rejectedVotes;
    this.eligibleTargets = eligibleTargets;
  }
}

export class GameCancelledError extends GameEngineError {
  constructor(phase: GamePhase, cause?: unknown) {
    super('cancelled', `Game cancelled during ${phase}`, { phase, cause });
    this.name = 'GameCancelledError';
  }
}

export class PhaseOrderError extends GameEngineError {
  constructor(from: GamePhase, to: GamePhase) {
    super('phase_order', `Cannot move from phase ${from} back to ${to}`, { phase: from });
    this.name = 'PhaseOrderError';
  }
}

/**
 * Raised by the model-calling transport once every attempt and fallback
 * model is exhausted (or a non-retryable error was hit).
 */
export class ModelCallError extends Error {
  readonly modelIds: string[];
  readonly attempts: number;
  readonly retryable: boolean;

  constructor(message: string, opts: { modelIds: string[]; attempts: number; retryable: boolean; cause?: unknown }) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'ModelCallError';
    this.modelIds = opts.modelIds;
    this.attempts = opts.attempts;
    this.retryable = opts.retryable;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
