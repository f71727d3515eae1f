import * as fs from 'fs';
import * as path from 'path';
import type { EventBus, Unsubscribe } from '../events/eventBus.js';
import type { GameEvent } from '../events/types.js';
import type { GameConfig, GameResult } from '../types.js';
import { formatPercent } from '../utils.js';

export interface GameRecordFile {
  gameId: string;
  createdAt: string;
  config: GameConfig;
  events: GameEvent[];
  result: GameResult | null;
}

export function defaultLogDir(): string {
  return path.join(process.cwd(), 'logs');
}

/**
 * Public narrative of a game. Private reasoning (thinking, word guesses) and
 * roles before the reveal are left out.
 */
export function buildTranscript(events: readonly GameEvent[]): string {
  const lines: string[] = [];

  for (const e of events) {
    switch (e.type) {
      case 'game_start':
        lines.push(`[GAME] ${e.numPlayers} players, ${e.numImposters} imposters, category "${e.category}"`);
        break;
      case 'round_start':
        lines.push(`[ROUND ${e.round}/${e.totalRounds}]`);
        break;
      case 'clue':
        lines.push(`${e.playerId}: "${e.clue}"`);
        break;
      case 'validation_error':
      case 'clue_advisory':
        lines.push(`[RULE] ${e.message}`);
        break;
      case 'instant_reveal':
        lines.push(`[REVEAL] ${e.message}`);
        break;
      case 'discussion':
        lines.push(`${e.playerId} says: ${e.message}`);
        break;
      case 'voting_round_start':
        lines.push(`[VOTING ${e.votingRound}/${e.totalVotingRounds}]`);
        break;
      case 'vote':
        lines.push(`[VOTE] ${e.voterId} -> ${e.targets.join(', ')}: ${e.reasoning}`.trimEnd());
        break;
      case 'elimination':
        lines.push(`[OUT] ${e.playerId} (${e.wasImposter ? 'imposter' : 'not an imposter'})`);
        break;
      case 'game_complete':
        lines.push(`[END] ${e.result.endReason} Word: "${e.result.word}". Imposters: ${e.result.actualImposters.join(', ')}.`);
        lines.push(`[END] Detection accuracy: ${formatPercent(e.result.detectionAccuracy)}`);
        break;
      case 'error':
        lines.push(`[ERROR] ${e.code}: ${e.message}`);
        break;
      default:
        break;
    }
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Append-only record of one game. Follows the engine's event bus and
 * rewrites `game-<id>.json` and `transcript-<id>.txt` after every event.
 */
export class GameHistory {
  readonly gameId: string;
  readonly logFile: string;
  readonly transcriptFile: string;

  private readonly createdAt = new Date().toISOString();
  private readonly config: GameConfig;
  private readonly events: GameEvent[] = [];
  private result: GameResult | null = null;
  private persistenceEnabled: boolean;
  private dirReady = false;
  private readonly dir: string;

  constructor(gameId: string, config: GameConfig, opts?: { dir?: string; persist?: boolean }) {
    this.gameId = gameId;
    this.config = config;
    this.dir = opts?.dir ?? defaultLogDir();
    this.persistenceEnabled = opts?.persist ?? true;
    this.logFile = path.join(this.dir, `game-${gameId}.json`);
    this.transcriptFile = path.join(this.dir, `transcript-${gameId}.txt`);
  }

  setPersistenceEnabled(enabled: boolean) {
    this.persistenceEnabled = enabled;
  }

  attach(events: EventBus<GameEvent>): Unsubscribe {
    return events.subscribe(event => this.record(event));
  }

  record(event: GameEvent) {
    this.events.push(event);
    if (event.type === 'game_complete') this.result = event.result;
    this.flush();
  }

  getEvents(): GameEvent[] {
    return this.events.slice();
  }

  getResult(): GameResult | null {
    return this.result;
  }

  toFile(): GameRecordFile {
    return {
      gameId: this.gameId,
      createdAt: this.createdAt,
      config: this.config,
      events: this.events.slice(),
      result: this.result,
    };
  }

  private flush() {
    if (!this.persistenceEnabled) return;
    if (!this.dirReady) {
      fs.mkdirSync(this.dir, { recursive: true });
      this.dirReady = true;
    }
    fs.writeFileSync(this.logFile, JSON.stringify(this.toFile(), null, 2));
    fs.writeFileSync(this.transcriptFile, buildTranscript(this.events));
  }
}
