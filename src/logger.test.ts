import test from 'node:test';
import assert from 'node:assert/strict';
import { EventBus } from './events/eventBus.js';
import type { GameEvent, GameEventPayload } from './events/types.js';
import { describeEvent, GameLogger } from './logger.js';

const envelope = { seq: 1, gameId: 'g1', timestamp: '2024-01-01T00:00:00.000Z' };

function lines(payload: GameEventPayload): string[] {
  return describeEvent({ ...payload, ...envelope }).map(l => `${l.type}|${l.player ?? ''}|${l.content}`);
}

test('describeEvent: elimination shows the tally and tie', () => {
  assert.deepEqual(
    lines({
      type: 'elimination',
      playerId: 'Player_3',
      kind: 'vote',
      wasImposter: false,
      votingRound: 1,
      voteCounts: { Player_1: 2, Player_3: 2 },
      tiedWith: ['Player_1', 'Player_3'],
      remainingImposters: 2,
    }),
    ['ELIMINATION|Player_3|is eliminated and was not an imposter. Votes: Player_1: 2, Player_3: 2. Tie broken between Player_1, Player_3.']
  );
});

test('describeEvent: votes are public, reasoning is a private thought', () => {
  const out = describeEvent({
    type: 'vote',
    votingRound: 1,
    voterId: 'Player_1',
    targets: ['Player_2'],
    reasoning: 'too vague',
    thinking: 'hidden',
    confidence: 60,
    corrected: true,
    substituted: false,
    votesSoFar: { Player_2: 1 },
    totalVotesCast: 1,
    totalActivePlayers: 4,
    ...envelope,
  });
  assert.equal(out.length, 2);
  assert.equal(out[0]?.content, 'voted for Player_2 (corrected): too vague');
  assert.equal(out[0]?.metadata?.visibility, 'public');
  assert.equal(out[1]?.type, 'THOUGHT');
  assert.equal(out[1]?.metadata?.visibility, 'private');
});

test('describeEvent: thinking indicators produce no log lines', () => {
  assert.deepEqual(
    lines({ type: 'player_thinking', playerId: 'Player_1', action: 'clue', playerIndex: 0, totalPlayers: 4, round: 1 }),
    []
  );
});

test('GameLogger.follow: mirrors events and stops after unsubscribe', () => {
  const log = new GameLogger();
  log.setConsoleOutputEnabled(false);
  const bus = new EventBus<GameEvent>();
  const seen: string[] = [];
  log.subscribe(entry => seen.push(entry.type));

  const stop = log.follow(bus);
  bus.emit({ type: 'round_start', round: 1, totalRounds: 3, ...envelope });
  bus.emit({ type: 'round_end', round: 1, cluesGiven: 4, ...envelope, seq: 2 });
  stop();
  bus.emit({ type: 'round_start', round: 2, totalRounds: 3, ...envelope, seq: 3 });

  assert.deepEqual(
    log.getLogs().map(l => l.content),
    ['--- Round 1 of 3 ---', 'Round 1 complete (4 clues).']
  );
  assert.deepEqual(seen, ['SYSTEM', 'SYSTEM']);

  log.clear();
  assert.equal(log.getLogs().length, 0);
});
