import test from 'node:test';
import assert from 'node:assert/strict';
import { Player } from './player.js';
import { parseEligiblePlayers } from './prompts.js';

function seat(role: 'imposter' | 'non_imposter'): Player {
  return new Player({
    id: 'Player_3',
    role,
    category: 'nature',
    secretWord: 'beach',
    model: 'haiku',
    totalPlayers: 6,
    numImposters: 2,
  });
}

test('Player: imposters never receive the secret word', () => {
  const imposter = seat('imposter');
  assert.equal(imposter.secretWord, undefined);

  const requests = [
    imposter.buildClueRequest({ round: 1, totalRounds: 3, clues: [{ round: 1, playerId: 'Player_1', clue: 'sand' }] }),
    imposter.buildVoteRequest({
      votingRound: 1,
      totalVotingRounds: 2,
      clues: [],
      eliminated: [],
      votesThisRound: [],
      eligibleTargets: ['Player_1', 'Player_2'],
    }),
    imposter.buildBatchVoteRequest({ clues: [], eliminated: [], eligibleTargets: ['Player_1'] }),
    imposter.buildDiscussionRequest({ turn: 1, totalTurns: 1, clues: [], discussion: [] }),
  ];
  for (const messages of requests) {
    for (const m of messages) assert.equal(m.content.toLowerCase().includes('beach'), false);
  }
  assert.match(requests[0]![0]!.content, /Your role: IMPOSTER/);
});

test('Player: non-imposters are told the word in the system prompt', () => {
  const civilian = seat('non_imposter');
  const [system, user] = civilian.buildClueRequest({ round: 1, totalRounds: 3, clues: [] });
  assert.equal(system?.role, 'system');
  assert.match(system?.content ?? '', /Secret word: "beach"/);
  assert.match(system?.content ?? '', /You are Player_3 in/);
  assert.match(user?.content ?? '', /=== Round 1 of 3 ===/);
  assert.match(user?.content ?? '', /No clues yet - you're going first\./);
});

test('Player: answers are kept as assistant turns in later requests', () => {
  const p = seat('non_imposter');
  p.recordClue({ thinking: 'obvious', clue: 'sand', confidence: 80, wordHypothesis: undefined });
  const messages = p.buildClueRequest({
    round: 2,
    totalRounds: 3,
    clues: [{ round: 1, playerId: 'Player_3', clue: 'sand' }],
  });
  assert.equal(messages.length, 3);
  assert.deepEqual(messages[1], {
    role: 'assistant',
    content: JSON.stringify({ thinking: 'obvious', clue: 'sand', confidence: 80 }),
  });
  assert.match(messages[2]?.content ?? '', /Round 1:\n- Player_3: "sand"/);
});

test('Player: vote prompt shows earlier ballots and the eligible list', () => {
  const p = seat('non_imposter');
  const messages = p.buildVoteRequest({
    votingRound: 1,
    totalVotingRounds: 2,
    clues: [],
    eliminated: [],
    votesThisRound: [{ voterId: 'Player_1', targetId: 'Player_2', reasoning: 'vague' }],
    eligibleTargets: ['Player_1', 'Player_2'],
  });
  const prompt = messages[messages.length - 1]?.content ?? '';
  assert.match(prompt, /- Player_1 voted for Player_2: "vague"/);
  assert.deepEqual(parseEligiblePlayers(prompt), ['Player_1', 'Player_2']);
});

test('Player: correction request replays the rejected vote', () => {
  const p = seat('non_imposter');
  const first = p.buildVoteRequest({
    votingRound: 1,
    totalVotingRounds: 1,
    clues: [],
    eliminated: [],
    votesThisRound: [],
    eligibleTargets: ['Player_1', 'Player_2'],
  });
  const rejected = { thinking: 't', vote: 'Player_3', reasoning: 'r', confidence: 10 };
  const retry = p.buildVoteCorrectionRequest(first, rejected, ['Player_1', 'Player_2']);
  assert.equal(retry.length, first.length + 2);
  assert.deepEqual(retry[first.length], { role: 'assistant', content: JSON.stringify(rejected) });
  const correction = retry[retry.length - 1]?.content ?? '';
  assert.match(correction, /^Your vote "Player_3" is not valid/);
  assert.deepEqual(parseEligiblePlayers(correction), ['Player_1', 'Player_2']);
});

test('Player: recordVote keeps the latest suspicion per target', () => {
  const p = seat('non_imposter');
  p.recordVote({ thinking: 't', vote: 'Player_1', reasoning: 'first note', confidence: 40 });
  p.recordVote({ thinking: 't', vote: 'Player_1', reasoning: 'second note', confidence: 60 });
  assert.equal(p.suspicionNotes.get('Player_1'), 'second note');
  assert.equal(p.getHistory().length, 2);
});
