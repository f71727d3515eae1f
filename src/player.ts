import type {
  BatchVoteResponse,
  ClueResponse,
  DiscussionResponse,
  SingleVoteResponse,
} from './schemas.js';
import type { ChatMessage, DiscussionRecord, PublicClue, Role, SingleVoteRecord } from './types.js';
import {
  buildBatchVotePrompt,
  buildCluePrompt,
  buildDiscussionPrompt,
  buildSingleVotePrompt,
  buildSystemPrompt,
  buildVoteCorrectionPrompt,
} from './prompts.js';

export interface PlayerInit {
  id: string;
  role: Role;
  category: string;
  secretWord: string;
  model: string;
  totalPlayers: number;
  numImposters: number;
}

export interface ClueTurn {
  round: number;
  totalRounds: number;
  clues: readonly PublicClue[];
}

export interface VoteTurn {
  votingRound: number;
  totalVotingRounds: number;
  clues: readonly PublicClue[];
  eliminated: readonly string[];
  votesThisRound: readonly Pick<SingleVoteRecord, 'voterId' | 'targetId' | 'reasoning'>[];
  eligibleTargets: readonly string[];
  discussion?: readonly DiscussionRecord[];
}

export interface BatchVoteTurn {
  clues: readonly PublicClue[];
  eliminated: readonly string[];
  eligibleTargets: readonly string[];
  discussion?: readonly DiscussionRecord[];
}

export interface DiscussionTurn {
  turn: number;
  totalTurns: number;
  clues: readonly PublicClue[];
  discussion: readonly DiscussionRecord[];
}

/**
 * One seat at the table.
 *
 * Builds the message list for each request and keeps a private history of
 * its own answers. Only non-imposters ever hold the secret word; every
 * builder reads it from `secretWord`, which stays undefined for imposters.
 */
export class Player {
  readonly id: string;
  readonly role: Role;
  readonly category: string;
  readonly model: string;
  readonly secretWord?: string;

  // Latest reason this player gave for suspecting someone. Informational only.
  readonly suspicionNotes = new Map<string, string>();

  private readonly systemPrompt: string;
  private readonly history: ChatMessage[] = [];
  private readonly numImposters: number;

  constructor(init: PlayerInit) {
    this.id = init.id;
    this.role = init.role;
    this.category = init.category;
    this.model = init.model;
    this.numImposters = init.numImposters;
    if (init.role === 'non_imposter') this.secretWord = init.secretWord;

    this.systemPrompt = buildSystemPrompt({
      playerId: this.id,
      role: this.role,
      category: this.category,
      secretWord: this.secretWord,
      totalPlayers: init.totalPlayers,
      numImposters: init.numImposters,
    });
  }

  get isImposter(): boolean {
    return this.role === 'imposter';
  }

  getHistory(): readonly ChatMessage[] {
    return this.history;
  }

  buildClueRequest(turn: ClueTurn): ChatMessage[] {
    return this.withContext(
      buildCluePrompt({
        role: this.role,
        round: turn.round,
        totalRounds: turn.totalRounds,
        category: this.category,
        secretWord: this.secretWord,
        clues: turn.clues,
      })
    );
  }

  buildVoteRequest(turn: VoteTurn): ChatMessage[] {
    return this.withContext(
      buildSingleVotePrompt({
        role: this.role,
        category: this.category,
        secretWord: this.secretWord,
        ...turn,
      })
    );
  }

  buildBatchVoteRequest(turn: BatchVoteTurn): ChatMessage[] {
    return this.withContext(
      buildBatchVotePrompt({
        role: this.role,
        category: this.category,
        secretWord: this.secretWord,
        numImposters: this.numImposters,
        ...turn,
      })
    );
  }

  buildDiscussionRequest(turn: DiscussionTurn): ChatMessage[] {
    return this.withContext(
      buildDiscussionPrompt({
        role: this.role,
        category: this.category,
        secretWord: this.secretWord,
        ...turn,
      })
    );
  }

  /** Replays the rejected answer and asks once more for a valid target. */
  buildVoteCorrectionRequest(
    previous: readonly ChatMessage[],
    rejected: SingleVoteResponse | BatchVoteResponse,
    eligibleTargets: readonly string[]
  ): ChatMessage[] {
    const rejectedVotes = 'vote' in rejected ? [rejected.vote] : rejected.votes;
    return [
      ...previous,
      { role: 'assistant', content: JSON.stringify(rejected) },
      { role: 'user', content: buildVoteCorrectionPrompt(rejectedVotes, eligibleTargets) },
    ];
  }

  recordClue(response: ClueResponse): void {
    this.remember(response);
  }

  recordVote(response: SingleVoteResponse): void {
    this.suspicionNotes.set(response.vote, response.reasoning);
    this.remember(response);
  }

  recordBatchVote(response: BatchVoteResponse): void {
    for (const target of response.votes) {
      this.suspicionNotes.set(target, response.reasoningPerPlayer[target] ?? response.thinking);
    }
    this.remember(response);
  }

  recordDiscussion(response: DiscussionResponse): void {
    this.remember(response);
  }

  private withContext(prompt: string): ChatMessage[] {
    return [{ role: 'system', content: this.systemPrompt }, ...this.history, { role: 'user', content: prompt }];
  }

  private remember(response: object): void {
    this.history.push({ role: 'assistant', content: JSON.stringify(response) });
  }
}
