import type { GameEngine } from '../engine/gameEngine.js';
import type { Player } from '../player.js';
import { DiscussionResponseSchema } from '../schemas.js';
import type { DiscussionRecord } from '../types.js';
import { validateRemark } from '../validator.js';

// 'stop' ends the game: the word was spoiled, or a reveal decided it.
type RemarkOutcome = 'spoken' | 'withheld' | 'revealed' | 'stop';

export class DiscussionPhase {
  async run(engine: GameEngine): Promise<void> {
    const totalTurns = engine.config.discussion_turns;

    for (let turn = 1; turn <= totalTurns; turn++) {
      const speakers = engine.activePlayers();

      for (const [playerIndex, player] of speakers.entries()) {
        engine.emit({
          type: 'player_thinking',
          playerId: player.id,
          action: 'discussion',
          playerIndex,
          totalPlayers: speakers.length,
        });

        if ((await this.speak(engine, player, turn, totalTurns)) === 'stop') return;
      }
    }
  }

  private async speak(engine: GameEngine, player: Player, turn: number, totalTurns: number): Promise<RemarkOutcome> {
    // Everyone sees the remarks made before them, this pass included.
    const messages = player.buildDiscussionRequest({
      turn,
      totalTurns,
      clues: engine.publicClues(),
      discussion: engine.discussion,
    });
    const response = await engine.ask(player, 'discussion', messages, DiscussionResponseSchema, engine.config.temperature);
    const text = response.message.trim();

    // Remarks reach every seat, imposters included, so they get the same word checks as clues.
    const round = engine.roundsPlayed;
    const verdict = validateRemark(text, engine.config.word, player.id, player.role);
    const message = verdict.message ?? '';
    const rejected = { type: 'validation_error', source: 'discussion', round, playerId: player.id, text, message } as const;

    if (verdict.instantReveal) {
      engine.emit({ ...rejected, reason: 'word_match', fatal: false });
      engine.emit({ type: 'instant_reveal', source: 'discussion', round, playerId: player.id, text, message });
      engine.eliminate(player.id, { kind: 'instant', round });
      return engine.checkWin().gameOver ? 'stop' : 'revealed';
    }

    if (verdict.gameOver) {
      engine.emit({ ...rejected, reason: 'word_match', fatal: true });
      engine.spoil({ reason: 'secret_word_spoiled', playerId: player.id, round, message });
      return 'stop';
    }

    if (!verdict.valid) {
      engine.emit({ ...rejected, reason: 'partial_word_match', fatal: false });
      return 'withheld';
    }

    const record: DiscussionRecord = {
      turn,
      playerId: player.id,
      message: text,
      thinking: response.thinking,
      confidence: response.confidence,
    };
    engine.discussion.push(record);
    player.recordDiscussion(response);
    engine.emit({ type: 'discussion', ...record });
    return 'spoken';
  }
}
