import type { GameEngine } from '../engine/gameEngine.js';
import { GameEngineError, InvalidVoteError } from '../errors.js';
import type { Player } from '../player.js';
import { BatchVoteResponseSchema, SingleVoteResponseSchema } from '../schemas.js';
import type { BatchVoteRecord, SingleVoteRecord } from '../types.js';
import { matchVoteTarget, tallyVotes, topCandidates, validateRemark } from '../validator.js';

export const WITHHELD_REASONING = '(reasoning withheld)';

function eligibleFor(voter: Player, active: readonly Player[]): string[] {
  return active.filter(p => p.id !== voter.id).map(p => p.id);
}

function requireTargets(engine: GameEngine, voter: Player, eligible: readonly string[]): void {
  if (eligible.length === 0) {
    throw new GameEngineError('internal', `${voter.id} has nobody to vote for`, {
      playerId: voter.id,
      phase: engine.phase,
    });
  }
}

/**
 * Canonical voting: one elimination per voting round, ballots cast in seat
 * order with every earlier ballot of the round visible to later voters.
 */
export class VotingPhase {
  async run(engine: GameEngine): Promise<void> {
    const totalVotingRounds = engine.config.num_imposters;
    engine.emit({
      type: 'voting_start',
      mode: 'sequential',
      activePlayers: engine.activePlayers().map(p => p.id),
      totalVotingRounds,
    });

    for (let votingRound = 1; votingRound <= totalVotingRounds; votingRound++) {
      if (engine.isOver()) return;
      await this.runVotingRound(engine, votingRound, totalVotingRounds);
      engine.checkWin();
    }
  }

  private async runVotingRound(engine: GameEngine, votingRound: number, totalVotingRounds: number): Promise<void> {
    const active = engine.activePlayers();
    engine.emit({ type: 'voting_round_start', votingRound, totalVotingRounds, activePlayers: active.map(p => p.id) });

    const cast: SingleVoteRecord[] = [];
    for (const [playerIndex, voter] of active.entries()) {
      engine.emit({
        type: 'player_thinking',
        playerId: voter.id,
        action: 'vote',
        playerIndex,
        totalPlayers: active.length,
        votingRound,
      });

      const record = await this.castVote(engine, voter, active, cast, votingRound, totalVotingRounds);
      cast.push(record);
      engine.votes.push(record);

      engine.emit({
        type: 'vote',
        votingRound,
        voterId: voter.id,
        targets: [record.targetId],
        reasoning: record.reasoning,
        thinking: record.thinking,
        confidence: record.confidence,
        corrected: record.corrected,
        substituted: record.substituted,
        votesSoFar: tallyVotes(cast.map(v => v.targetId)),
        totalVotesCast: cast.length,
        totalActivePlayers: active.length,
      });
    }

    const tally = tallyVotes(cast.map(v => v.targetId));
    const leaders = topCandidates(tally);
    const tied = leaders.length > 1;
    const target = tied ? engine.breakTie(leaders) : leaders[0];
    if (target === undefined) return;

    engine.eliminate(target, {
      kind: 'vote',
      votingRound,
      voteCounts: tally,
      tiedWith: tied ? leaders : undefined,
    });
  }

  private async castVote(
    engine: GameEngine,
    voter: Player,
    active: readonly Player[],
    cast: readonly SingleVoteRecord[],
    votingRound: number,
    totalVotingRounds: number
  ): Promise<SingleVoteRecord> {
    const { config } = engine;
    const eligible = eligibleFor(voter, active);
    requireTargets(engine, voter, eligible);

    const messages = voter.buildVoteRequest({
      votingRound,
      totalVotingRounds,
      clues: engine.publicClues(),
      eliminated: engine.eliminatedIds(),
      votesThisRound: cast,
      eligibleTargets: eligible,
      discussion: engine.discussion,
    });
    let response = await engine.ask(voter, 'vote', messages, SingleVoteResponseSchema, config.vote_temperature);
    let target = matchVoteTarget(response.vote, eligible);
    let corrected = false;
    let substituted = false;

    if (target === undefined) {
      const rejected = response;
      corrected = true;
      engine.emit({ type: 'vote_correction', votingRound, voterId: voter.id, rejected: [rejected.vote], eligibleTargets: eligible });

      const retry = voter.buildVoteCorrectionRequest(messages, rejected, eligible);
      response = await engine.ask(voter, 'vote', retry, SingleVoteResponseSchema, config.vote_temperature);
      target = matchVoteTarget(response.vote, eligible);

      if (target === undefined) {
        if (config.vote_validation === 'strict') {
          throw new InvalidVoteError(voter.id, [rejected.vote, response.vote], eligible);
        }
        target = eligible[0]!;
        substituted = true;
      }
    }

    voter.recordVote({ ...response, vote: target });
    return {
      votingRound,
      voterId: voter.id,
      targetId: target,
      reasoning: this.screenReasoning(engine, voter, response.reasoning),
      thinking: response.thinking,
      confidence: response.confidence,
      corrected,
      substituted,
    };
  }

  /** Later voters read this reasoning, so text naming the word is replaced before it is shared. */
  private screenReasoning(engine: GameEngine, voter: Player, reasoning: string): string {
    const verdict = validateRemark(reasoning, engine.config.word, voter.id, voter.role);
    if (verdict.valid) return reasoning;
    engine.emit({
      type: 'validation_error',
      source: 'vote_reasoning',
      round: engine.roundsPlayed,
      playerId: voter.id,
      text: reasoning,
      reason: verdict.reason === 'word_match' ? 'word_match' : 'partial_word_match',
      message: `${voter.id}'s vote reasoning gave away the secret word and was withheld.`,
      fatal: false,
    });
    return WITHHELD_REASONING;
  }
}

/**
 * Older single-ballot mode: everyone names up to K suspects without seeing
 * other ballots, then the most-voted players go out one at a time.
 */
export class BatchVotingPhase {
  async run(engine: GameEngine): Promise<void> {
    const k = engine.config.num_imposters;
    const active = engine.activePlayers();
    const activeIds = active.map(p => p.id);

    engine.emit({ type: 'voting_start', mode: 'batch', activePlayers: activeIds, totalVotingRounds: 1 });
    engine.emit({ type: 'voting_round_start', votingRound: 1, totalVotingRounds: 1, activePlayers: activeIds });

    const ballots: BatchVoteRecord[] = [];
    for (const [playerIndex, voter] of active.entries()) {
      engine.emit({
        type: 'player_thinking',
        playerId: voter.id,
        action: 'vote',
        playerIndex,
        totalPlayers: active.length,
        votingRound: 1,
      });

      const { record, substituted } = await this.castBallot(engine, voter, active, k);
      ballots.push(record);
      engine.batchVotes.push(record);

      engine.emit({
        type: 'vote',
        votingRound: 1,
        voterId: voter.id,
        targets: record.targets,
        reasoning: record.targets.map(t => record.reasoningPerPlayer[t]).filter(Boolean).join(' '),
        thinking: record.thinking,
        confidence: record.confidence,
        corrected: record.corrected,
        substituted,
        votesSoFar: tallyVotes(ballots.flatMap(b => b.targets)),
        totalVotesCast: ballots.length,
        totalActivePlayers: active.length,
      });
    }

    const tally = tallyVotes(ballots.flatMap(b => b.targets));
    const remaining = { ...tally };
    for (let n = 0; n < k && !engine.isOver(); n++) {
      const leaders = topCandidates(remaining);
      if (leaders.length === 0) return;
      const tied = leaders.length > 1;
      const target = tied ? engine.breakTie(leaders) : leaders[0]!;
      delete remaining[target];
      engine.eliminate(target, { kind: 'vote', votingRound: 1, voteCounts: tally, tiedWith: tied ? leaders : undefined });
      engine.checkWin();
    }
  }

  private async castBallot(
    engine: GameEngine,
    voter: Player,
    active: readonly Player[],
    k: number
  ): Promise<{ record: BatchVoteRecord; substituted: boolean }> {
    const { config } = engine;
    const eligible = eligibleFor(voter, active);
    requireTargets(engine, voter, eligible);

    // Valid ballots name 1..k distinct eligible players and nothing else.
    const sanitize = (votes: readonly string[]) => {
      const matched = votes.map(v => matchVoteTarget(v, eligible));
      const targets = [...new Set(matched.filter((t): t is string => t !== undefined))].slice(0, k);
      const ok = targets.length > 0 && matched.every(t => t !== undefined);
      return { targets, ok };
    };

    const messages = voter.buildBatchVoteRequest({
      clues: engine.publicClues(),
      eliminated: engine.eliminatedIds(),
      eligibleTargets: eligible,
      discussion: engine.discussion,
    });
    let response = await engine.ask(voter, 'batch_vote', messages, BatchVoteResponseSchema, config.vote_temperature);
    const first = sanitize(response.votes);
    let targets = first.targets;
    let corrected = false;
    let substituted = false;

    if (!first.ok) {
      const rejected = response;
      corrected = true;
      engine.emit({
        type: 'vote_correction',
        votingRound: 1,
        voterId: voter.id,
        rejected: rejected.votes.filter(v => matchVoteTarget(v, eligible) === undefined),
        eligibleTargets: eligible,
      });

      const retry = voter.buildVoteCorrectionRequest(messages, rejected, eligible);
      response = await engine.ask(voter, 'batch_vote', retry, BatchVoteResponseSchema, config.vote_temperature);
      targets = sanitize(response.votes).targets;

      if (targets.length === 0) {
        if (config.vote_validation === 'strict') {
          throw new InvalidVoteError(voter.id, [...rejected.votes, ...response.votes], eligible);
        }
        targets = [eligible[0]!];
        substituted = true;
      }
    }

    voter.recordBatchVote({ ...response, votes: targets });
    return {
      record: {
        voterId: voter.id,
        targets,
        reasoningPerPlayer: response.reasoningPerPlayer,
        thinking: response.thinking,
        confidence: response.confidence,
        corrected,
      },
      substituted,
    };
  }
}
