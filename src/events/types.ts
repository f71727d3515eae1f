import type { EngineErrorCode } from '../errors.js';
import type { ClueAdvisory, ClueRejection } from '../validator.js';
import type { EliminationKind, GamePhase, GameResult } from '../types.js';

export type PlayerAction = 'clue' | 'vote' | 'discussion';

// Where checked text came from: a clue, a discussion remark or the public reasoning of a vote.
export type SpokenSource = 'clue' | 'discussion' | 'vote_reasoning';

export type GameEventPayload =
  | {
      type: 'game_start';
      category: string;
      numPlayers: number;
      numImposters: number;
      numRounds: number;
      votingMode: 'sequential' | 'batch';
      // Roles stay hidden until game_complete.
      players: Array<{ id: string; model: string }>;
    }
  | { type: 'round_start'; round: number; totalRounds: number }
  | {
      type: 'player_thinking';
      playerId: string;
      action: PlayerAction;
      playerIndex: number;
      totalPlayers: number;
      round?: number;
      votingRound?: number;
    }
  | {
      type: 'clue';
      round: number;
      playerId: string;
      model: string;
      clue: string;
      thinking: string;
      confidence: number;
      wordHypothesis?: string;
    }
  | {
      type: 'validation_error';
      source: SpokenSource;
      round: number;
      playerId: string;
      text: string;
      reason: ClueRejection;
      message: string;
      // True when the game cannot continue (secret word spoiled).
      fatal: boolean;
    }
  | { type: 'clue_advisory'; round: number; playerId: string; clue: string; reason: ClueAdvisory; message: string }
  | {
      type: 'instant_reveal';
      source: Exclude<SpokenSource, 'vote_reasoning'>;
      round: number;
      playerId: string;
      text: string;
      message: string;
    }
  | { type: 'round_end'; round: number; cluesGiven: number }
  | { type: 'discussion'; turn: number; playerId: string; message: string; thinking: string; confidence: number }
  | { type: 'voting_start'; mode: 'sequential' | 'batch'; activePlayers: string[]; totalVotingRounds: number }
  | { type: 'voting_round_start'; votingRound: number; totalVotingRounds: number; activePlayers: string[] }
  | {
      type: 'vote';
      votingRound: number;
      voterId: string;
      targets: string[];
      reasoning: string;
      thinking: string;
      confidence: number;
      corrected: boolean;
      substituted: boolean;
      votesSoFar: Record<string, number>;
      totalVotesCast: number;
      totalActivePlayers: number;
    }
  | { type: 'vote_correction'; votingRound: number; voterId: string; rejected: string[]; eligibleTargets: string[] }
  | {
      type: 'elimination';
      playerId: string;
      kind: EliminationKind;
      wasImposter: boolean;
      round?: number;
      votingRound?: number;
      voteCounts?: Record<string, number>;
      tiedWith?: string[];
      remainingImposters: number;
    }
  | { type: 'game_complete'; result: GameResult }
  | { type: 'error'; code: EngineErrorCode; message: string; phase: GamePhase; playerId?: string; cause?: string };

export type GameEventType = GameEventPayload['type'];

export interface GameEventEnvelope {
  seq: number;
  gameId: string;
  timestamp: string;
}

export type GameEvent = GameEventPayload & GameEventEnvelope;

export type GameEventOf<T extends GameEventType> = Extract<GameEventPayload, { type: T }> & GameEventEnvelope;
