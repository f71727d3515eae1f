import { randomUUID } from 'node:crypto';
import type { z } from 'zod';
import { parseGameConfig } from '../config.js';
import {
  GameCancelledError,
  GameConfigError,
  GameEngineError,
  PhaseOrderError,
  errorMessage,
} from '../errors.js';
import { EventBus } from '../events/eventBus.js';
import type { GameEvent, GameEventPayload } from '../events/types.js';
import { logger } from '../logger.js';
import { assignModels, buildModelRegistry, resolveModelId } from '../models.js';
import type { ModelCaller } from '../modelClient.js';
import { ClueRoundPhase } from '../phases/clueRoundPhase.js';
import { DiscussionPhase } from '../phases/discussionPhase.js';
import { BatchVotingPhase, VotingPhase } from '../phases/votingPhase.js';
import { Player } from '../player.js';
import type { ResponseKind } from '../schemas.js';
import {
  GAME_PHASES,
  type BatchVoteRecord,
  type ChatMessage,
  type ClueRecord,
  type DiscussionRecord,
  type EarlyTermination,
  type EliminationRecord,
  type GameConfig,
  type GameConfigInput,
  type GamePhase,
  type GameResult,
  type PublicClue,
  type SingleVoteRecord,
} from '../types.js';
import { mulberry32, sampleWithoutReplacement, type Rng } from '../utils.js';
import { checkWinCondition, resolveVoteTie, type WinCondition } from '../validator.js';

export interface GameEngineOptions {
  modelCaller: ModelCaller;
  gameId?: string;
  // Overrides the config seed. Drives imposter choice, model shuffling and random tie-breaks.
  rng?: Rng;
  // Alias -> gateway id, merged over the built-in registry and the config's `models`.
  models?: Record<string, string>;
  onEvent?: (event: GameEvent) => void;
}

/**
 * Runs one game from seating to result.
 *
 * Turns are strictly sequential: every request is built from the state left
 * by the previous turn, and the only await is the model call itself.
 */
export class GameEngine {
  readonly config: GameConfig;
  readonly gameId: string;
  readonly events = new EventBus<GameEvent>({
    onError: error => logger.log({ type: 'WARN', content: `Event subscriber failed: ${errorMessage(error)}` }),
  });
  readonly players: readonly Player[];
  readonly imposterIds: readonly string[];
  readonly rng: Rng;

  readonly clues: ClueRecord[] = [];
  readonly votes: SingleVoteRecord[] = [];
  readonly batchVotes: BatchVoteRecord[] = [];
  readonly discussion: DiscussionRecord[] = [];
  readonly eliminations: EliminationRecord[] = [];

  roundsPlayed = 0;
  termination?: EarlyTermination;

  private currentPhase: GamePhase = 'setup';
  private seq = 0;
  private started = false;
  private signal?: AbortSignal;
  private decided?: WinCondition;
  private readonly modelCaller: ModelCaller;
  private readonly modelIds: ReadonlyMap<string, string>;

  private clueRoundRunner = new ClueRoundPhase();
  private discussionRunner = new DiscussionPhase();
  private votingRunner = new VotingPhase();
  private batchVotingRunner = new BatchVotingPhase();

  constructor(config: GameConfigInput | GameConfig, opts: GameEngineOptions) {
    this.config = parseGameConfig(config);
    this.gameId = opts.gameId ?? randomUUID();
    this.modelCaller = opts.modelCaller;
    this.rng = opts.rng ?? (this.config.seed !== undefined ? mulberry32(this.config.seed) : Math.random);
    if (opts.onEvent) this.events.subscribe(opts.onEvent);

    const { num_players: n, num_imposters: k } = this.config;
    const playerIds = Array.from({ length: n }, (_, i) => `Player_${i + 1}`);
    this.imposterIds = sampleWithoutReplacement(playerIds, k, this.rng).sort(
      (a, b) => playerIds.indexOf(a) - playerIds.indexOf(b)
    );
    const imposters = new Set(this.imposterIds);

    const models = assignModels({
      strategy: this.config.model_strategy,
      playerIds,
      imposterIds: this.imposterIds,
      defaultModel: this.config.default_model,
      distribution: this.config.model_distribution,
      roleModels: this.config.role_models,
      rng: this.rng,
    });

    const registry = buildModelRegistry({ ...this.config.models, ...opts.models });
    const ids = new Map<string, string>();
    const problems: string[] = [];
    for (const id of playerIds) {
      const model = models[id] ?? this.config.default_model;
      try {
        ids.set(id, resolveModelId(model, registry));
      } catch (error) {
        problems.push(errorMessage(error));
      }
    }
    if (problems.length) throw new GameConfigError([...new Set(problems)]);
    this.modelIds = ids;

    this.players = playerIds.map(
      id =>
        new Player({
          id,
          role: imposters.has(id) ? 'imposter' : 'non_imposter',
          category: this.config.category,
          secretWord: this.config.word,
          model: models[id] ?? this.config.default_model,
          totalPlayers: n,
          numImposters: k,
        })
    );
  }

  get phase(): GamePhase {
    return this.currentPhase;
  }

  /** Moves the state machine forward. Re-entering the current phase is a no-op. */
  transition(to: GamePhase): void {
    const from = this.currentPhase;
    const delta = GAME_PHASES.indexOf(to) - GAME_PHASES.indexOf(from);
    if (delta < 0) throw new PhaseOrderError(from, to);
    this.currentPhase = to;
  }

  emit(payload: GameEventPayload): GameEvent {
    const event: GameEvent = {
      ...payload,
      seq: ++this.seq,
      gameId: this.gameId,
      timestamp: new Date().toISOString(),
    };
    this.events.emit(event);
    return event;
  }

  getPlayer(id: string): Player | undefined {
    return this.players.find(p => p.id === id);
  }

  eliminatedIds(): string[] {
    return this.eliminations.map(e => e.playerId);
  }

  activePlayers(): Player[] {
    const out = new Set(this.eliminatedIds());
    return this.players.filter(p => !out.has(p.id));
  }

  publicClues(): PublicClue[] {
    return this.clues.map(c => ({ round: c.round, playerId: c.playerId, clue: c.clue }));
  }

  isOver(): boolean {
    return this.termination !== undefined || this.decided?.gameOver === true;
  }

  eliminate(
    playerId: string,
    details: Omit<EliminationRecord, 'playerId' | 'wasImposter'> & {
      voteCounts?: Record<string, number>;
      tiedWith?: string[];
    }
  ): EliminationRecord {
    const { voteCounts, tiedWith, ...where } = details;
    const record: EliminationRecord = {
      playerId,
      wasImposter: this.imposterIds.includes(playerId),
      ...where,
    };
    this.eliminations.push(record);
    const out = new Set(this.eliminatedIds());
    this.emit({
      type: 'elimination',
      ...record,
      voteCounts,
      tiedWith,
      remainingImposters: this.imposterIds.filter(id => !out.has(id)).length,
    });
    return record;
  }

  checkWin(): WinCondition {
    const win = checkWinCondition({
      eliminatedPlayers: this.eliminatedIds(),
      allImposters: this.imposterIds,
      remainingPlayers: this.activePlayers().map(p => p.id),
      numCivilians: this.config.num_players - this.config.num_imposters,
    });
    if (win.gameOver) {
      this.decided = win;
      this.termination ??= {
        reason: 'win_decided',
        round: this.roundsPlayed,
        message: win.winner === 'civilians' ? 'All imposters were eliminated.' : 'Imposters outnumber the civilians.',
      };
    }
    return win;
  }

  spoil(termination: EarlyTermination): void {
    this.termination = termination;
  }

  breakTie(candidates: readonly string[]): string {
    return resolveVoteTie(candidates, this.config.tie_breaker, this.rng);
  }

  /** One model call for one player. Failures come back as engine errors. */
  async ask<T>(
    player: Player,
    kind: ResponseKind,
    messages: ChatMessage[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    temperature: number
  ): Promise<T> {
    this.throwIfCancelled();
    try {
      return await this.modelCaller.call({
        kind,
        messages,
        modelId: this.modelIds.get(player.id) ?? player.model,
        schema,
        temperature,
        maxTokens: this.config.max_tokens,
        signal: this.signal,
      });
    } catch (error) {
      if (this.signal?.aborted) throw new GameCancelledError(this.currentPhase, error);
      throw new GameEngineError(
        'model_call_failed',
        `${player.id} (${player.model}) could not answer the ${kind} request: ${errorMessage(error)}`,
        { playerId: player.id, phase: this.currentPhase, cause: error }
      );
    }
  }

  throwIfCancelled(): void {
    if (this.signal?.aborted) throw new GameCancelledError(this.currentPhase, this.signal.reason);
  }

  async run(signal?: AbortSignal): Promise<GameResult> {
    if (this.started) throw new GameEngineError('phase_order', `Game ${this.gameId} has already been run`);
    this.started = true;
    this.signal = signal;

    try {
      this.emit({
        type: 'game_start',
        category: this.config.category,
        numPlayers: this.config.num_players,
        numImposters: this.config.num_imposters,
        numRounds: this.config.num_rounds,
        votingMode: this.config.voting_mode,
        players: this.players.map(p => ({ id: p.id, model: p.model })),
      });

      await this.clueRoundRunner.run(this);

      if (!this.isOver() && this.config.enable_discussion) {
        this.transition('discussion');
        await this.discussionRunner.run(this);
      }

      if (!this.isOver()) {
        this.transition('voting');
        if (this.config.voting_mode === 'batch') await this.batchVotingRunner.run(this);
        else await this.votingRunner.run(this);
      }

      this.transition('reveal');
      const result = this.buildResult();
      this.transition('complete');
      this.emit({ type: 'game_complete', result });
      return result;
    } catch (error) {
      const failure =
        error instanceof GameEngineError
          ? error
          : new GameEngineError('internal', errorMessage(error), { phase: this.currentPhase, cause: error });
      this.emit({
        type: 'error',
        code: failure.code,
        message: failure.message,
        phase: failure.phase ?? this.currentPhase,
        playerId: failure.playerId,
        cause: failure.cause === undefined ? undefined : errorMessage(failure.cause),
      });
      throw failure;
    }
  }

  buildResult(): GameResult {
    const eliminated = this.eliminatedIds();
    const out = new Set(eliminated);
    const caught = this.imposterIds.filter(id => out.has(id)).length;
    const detectionAccuracy = this.imposterIds.length ? caught / this.imposterIds.length : 0;

    const base = {
      gameId: this.gameId,
      word: this.config.word,
      category: this.config.category,
      players: this.players.map(p => ({ id: p.id, role: p.role, model: p.model })),
      actualImposters: [...this.imposterIds],
      eliminatedPlayers: eliminated,
      eliminations: [...this.eliminations],
      detectionAccuracy,
      totalRounds: this.roundsPlayed,
      clues: [...this.clues],
      votes: [...this.votes],
      batchVotes: [...this.batchVotes],
      discussion: [...this.discussion],
    };

    if (this.termination?.reason === 'secret_word_spoiled') {
      return { ...base, winner: null, outcome: 'word_spoiled', endReason: this.termination.message };
    }

    const win = this.checkWin();
    if (win.winner === 'civilians') {
      return { ...base, winner: 'civilians', outcome: 'civilians_win', endReason: 'All imposters were eliminated.' };
    }
    if (win.winner === 'imposters') {
      return { ...base, winner: 'imposters', outcome: 'imposters_win', endReason: 'Imposters outnumber the civilians.' };
    }
    return {
      ...base,
      winner: null,
      outcome: 'undecided',
      endReason: `Voting ended with ${win.survivingImposters.length} imposter(s) still hidden.`,
    };
  }
}
