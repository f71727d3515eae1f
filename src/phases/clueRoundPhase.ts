import type { GameEngine } from '../engine/gameEngine.js';
import type { Player } from '../player.js';
import { ClueResponseSchema } from '../schemas.js';
import type { ClueRecord } from '../types.js';
import { isClueRejection, validateClue } from '../validator.js';

// 'stop' ends the game: the word was spoiled, or a reveal decided it.
type TurnOutcome = 'clue' | 'rejected' | 'revealed' | 'stop';

export class ClueRoundPhase {
  async run(engine: GameEngine): Promise<void> {
    engine.transition('clue_round');
    const totalRounds = engine.config.num_rounds;

    for (let round = 1; round <= totalRounds; round++) {
      engine.roundsPlayed = round;
      engine.emit({ type: 'round_start', round, totalRounds });

      const seated = engine.activePlayers();
      let cluesGiven = 0;
      let stopped = false;

      for (const [playerIndex, player] of seated.entries()) {
        engine.emit({
          type: 'player_thinking',
          playerId: player.id,
          action: 'clue',
          playerIndex,
          totalPlayers: seated.length,
          round,
        });
        const turn = await this.playTurn(engine, player, round);
        if (turn === 'clue') cluesGiven++;
        if (turn === 'stop') {
          stopped = true;
          break;
        }
      }

      engine.emit({ type: 'round_end', round, cluesGiven });
      if (stopped) return;
    }
  }

  private async playTurn(
    engine: GameEngine,
    player: Player,
    round: number
  ): Promise<TurnOutcome> {
    const { config } = engine;
    const messages = player.buildClueRequest({ round, totalRounds: config.num_rounds, clues: engine.publicClues() });
    const response = await engine.ask(player, 'clue', messages, ClueResponseSchema, config.temperature);
    const clue = response.clue.trim();

    const verdict = validateClue(
      clue,
      config.word,
      player.id,
      player.role,
      engine.clues.map(c => c.clue)
    );
    const message = verdict.message ?? '';
    const rejected = { type: 'validation_error', source: 'clue', round, playerId: player.id, text: clue, message } as const;

    if (verdict.instantReveal) {
      engine.emit({ ...rejected, reason: 'word_match', fatal: false });
      engine.emit({ type: 'instant_reveal', source: 'clue', round, playerId: player.id, text: clue, message });
      engine.eliminate(player.id, { kind: 'instant', round });
      return engine.checkWin().gameOver ? 'stop' : 'revealed';
    }

    if (verdict.gameOver) {
      engine.emit({ ...rejected, reason: 'word_match', fatal: true });
      engine.spoil({ reason: 'secret_word_spoiled', playerId: player.id, round, message });
      return 'stop';
    }

    if (!verdict.valid) {
      const reason = isClueRejection(verdict.reason) ? verdict.reason : 'empty_clue';
      engine.emit({ ...rejected, reason, fatal: false });
      return 'rejected';
    }

    if (verdict.reason === 'long_clue') {
      engine.emit({ type: 'clue_advisory', round, playerId: player.id, clue, reason: 'long_clue', message });
    }

    const record: ClueRecord = {
      round,
      playerId: player.id,
      model: player.model,
      role: player.role,
      clue,
      thinking: response.thinking,
      confidence: response.confidence,
      wordHypothesis: response.wordHypothesis,
    };
    engine.clues.push(record);
    player.recordClue(response);
    engine.emit({
      type: 'clue',
      round,
      playerId: player.id,
      model: player.model,
      clue,
      thinking: response.thinking,
      confidence: response.confidence,
      wordHypothesis: response.wordHypothesis,
    });
    return 'clue';
  }
}
