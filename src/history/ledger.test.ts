import test from 'node:test';
import assert from 'node:assert/strict';
import type { GameResult, SingleVoteRecord } from '../types.js';
import { buildLedger, formatLedger } from './ledger.js';

function ballot(voterId: string, targetId: string): SingleVoteRecord {
  return { votingRound: 1, voterId, targetId, reasoning: 'r', thinking: 't', confidence: 50, corrected: false, substituted: false };
}

const result: GameResult = {
  gameId: 'g1',
  word: 'beach',
  category: 'nature',
  players: [
    { id: 'Player_1', role: 'non_imposter', model: 'haiku' },
    { id: 'Player_2', role: 'imposter', model: 'haiku' },
    { id: 'Player_3', role: 'imposter', model: 'haiku' },
    { id: 'Player_4', role: 'non_imposter', model: 'haiku' },
  ],
  actualImposters: ['Player_2', 'Player_3'],
  eliminatedPlayers: ['Player_2', 'Player_3'],
  eliminations: [
    { playerId: 'Player_2', kind: 'instant', wasImposter: true, round: 1 },
    { playerId: 'Player_3', kind: 'vote', wasImposter: true, votingRound: 1 },
  ],
  detectionAccuracy: 1,
  totalRounds: 2,
  winner: 'civilians',
  outcome: 'civilians_win',
  endReason: 'All imposters were eliminated.',
  clues: [
    { round: 2, playerId: 'Player_1', clue: 'shell', model: 'haiku', role: 'non_imposter', thinking: 't', confidence: 50 },
    { round: 1, playerId: 'Player_1', clue: 'sand', model: 'haiku', role: 'non_imposter', thinking: 't', confidence: 50 },
    { round: 1, playerId: 'Player_3', clue: 'waves', model: 'haiku', role: 'imposter', thinking: 't', confidence: 50 },
  ],
  votes: [ballot('Player_1', 'Player_3'), ballot('Player_3', 'Player_1'), ballot('Player_4', 'Player_3')],
  batchVotes: [],
  discussion: [],
};

test('buildLedger: groups clues by round and summarizes each vote', () => {
  const ledger = buildLedger(result, [
    { type: 'clue' },
    { type: 'validation_error', source: 'clue' },
    { type: 'validation_error', source: 'discussion' },
  ]);
  assert.deepEqual(ledger.rounds, [
    { round: 1, clues: [{ playerId: 'Player_1', clue: 'sand' }, { playerId: 'Player_3', clue: 'waves' }] },
    { round: 2, clues: [{ playerId: 'Player_1', clue: 'shell' }] },
  ]);
  assert.equal(ledger.rejectedClues, 1);
  assert.deepEqual(ledger.voteSummaries, [
    { votingRound: 1, tally: { Player_3: 2, Player_1: 1 }, eliminated: 'Player_3' },
  ]);
});

test('formatLedger: renders the full game summary', () => {
  const text = formatLedger(buildLedger(result, [{ type: 'validation_error', source: 'clue' }]));
  assert.equal(
    text,
    [
      'Game g1: "beach" (nature)',
      '',
      'Clues:',
      '  Round 1: Player_1 "sand", Player_3 "waves"',
      '  Round 2: Player_1 "shell"',
      '  Rejected clues: 1',
      '',
      'Vote History:',
      '  Vote 1: Eliminated Player_3 (Player_3: 2, Player_1: 1)',
      '',
      'Eliminated:',
      '  Round 1 (said the word): Player_2 (imposter)',
      '  Vote 1: Player_3 (imposter)',
      '',
      'Imposters: Player_2, Player_3',
      'Detection accuracy: 100.0%',
      'All imposters were eliminated.',
    ].join('\n')
  );
});

test('formatLedger: batch ballots are listed without an elimination label', () => {
  const batch: GameResult = {
    ...result,
    votes: [],
    eliminations: [],
    eliminatedPlayers: [],
    detectionAccuracy: 0,
    batchVotes: [
      { voterId: 'Player_1', targets: ['Player_4'], reasoningPerPlayer: {}, thinking: 't', confidence: 40, corrected: false },
    ],
  };
  const text = formatLedger(buildLedger(batch));
  assert.ok(text.includes('\n  Vote 1: Ballots (Player_4: 1)\n'));
  assert.ok(text.includes('\nDetection accuracy: 0.0%\n'));
});
