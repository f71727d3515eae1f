import type { GameResult } from '../types.js';
import { formatPercent } from '../utils.js';
import { formatVoteTally, tallyVotes } from '../validator.js';

export interface Ledger {
  gameId: string;
  word: string;
  category: string;
  rounds: Array<{ round: number; clues: Array<{ playerId: string; clue: string }> }>;
  rejectedClues: number;
  eliminations: Array<{ playerId: string; when: string; wasImposter: boolean }>;
  voteSummaries: Array<{ votingRound: number; tally: Record<string, number>; eliminated?: string }>;
  imposters: string[];
  accuracy: number;
  outcome: string;
}

/**
 * What happened, in order, for one game. Built from the final result plus the
 * raw event types (only used to count rejected clues).
 */
export function buildLedger(result: GameResult, events: readonly { type: string; source?: unknown }[] = []): Ledger {
  const rounds: Ledger['rounds'] = [];
  for (const c of result.clues) {
    let entry = rounds.find(r => r.round === c.round);
    if (!entry) {
      entry = { round: c.round, clues: [] };
      rounds.push(entry);
    }
    entry.clues.push({ playerId: c.playerId, clue: c.clue });
  }
  rounds.sort((a, b) => a.round - b.round);

  const eliminations = result.eliminations.map(e => ({
    playerId: e.playerId,
    when: e.kind === 'instant' ? `Round ${e.round ?? '?'} (said the word)` : `Vote ${e.votingRound ?? '?'}`,
    wasImposter: e.wasImposter,
  }));

  const voteSummaries: Ledger['voteSummaries'] = [];
  const votingRounds = [...new Set(result.votes.map(v => v.votingRound))].sort((a, b) => a - b);
  for (const votingRound of votingRounds) {
    const tally = tallyVotes(result.votes.filter(v => v.votingRound === votingRound).map(v => v.targetId));
    const eliminated = result.eliminations.find(e => e.kind === 'vote' && e.votingRound === votingRound)?.playerId;
    voteSummaries.push({ votingRound, tally, eliminated });
  }
  if (result.batchVotes.length) {
    voteSummaries.push({ votingRound: 1, tally: tallyVotes(result.batchVotes.flatMap(b => b.targets)) });
  }

  return {
    gameId: result.gameId,
    word: result.word,
    category: result.category,
    rounds,
    rejectedClues: events.filter(e => e.type === 'validation_error' && e.source === 'clue').length,
    eliminations,
    voteSummaries,
    imposters: [...result.actualImposters],
    accuracy: result.detectionAccuracy,
    outcome: result.endReason,
  };
}

export function formatLedger(ledger: Ledger): string {
  const lines: string[] = [`Game ${ledger.gameId}: "${ledger.word}" (${ledger.category})`];

  if (ledger.rounds.length > 0) {
    lines.push('\nClues:');
    for (const r of ledger.rounds) {
      lines.push(`  Round ${r.round}: ${r.clues.map(c => `${c.playerId} "${c.clue}"`).join(', ')}`);
    }
  }
  if (ledger.rejectedClues > 0) {
    lines.push(`  Rejected clues: ${ledger.rejectedClues}`);
  }

  if (ledger.voteSummaries.length > 0) {
    lines.push('\nVote History:');
    for (const v of ledger.voteSummaries) {
      const out = v.eliminated ? `Eliminated ${v.eliminated}` : 'Ballots';
      lines.push(`  Vote ${v.votingRound}: ${out} (${formatVoteTally(v.tally)})`);
    }
  }

  if (ledger.eliminations.length > 0) {
    lines.push('\nEliminated:');
    for (const e of ledger.eliminations) {
      lines.push(`  ${e.when}: ${e.playerId} (${e.wasImposter ? 'imposter' : 'not an imposter'})`);
    }
  }

  lines.push(`\nImposters: ${ledger.imposters.join(', ')}`);
  lines.push(`Detection accuracy: ${formatPercent(ledger.accuracy)}`);
  lines.push(ledger.outcome);

  return lines.join('\n');
}
