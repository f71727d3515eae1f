import { randomUUID } from 'node:crypto';
import chalk from 'chalk';
import type { GameEvent } from './events/types.js';
import { EventBus, type Unsubscribe } from './events/eventBus.js';
import type { Role } from './types.js';
import { envFlag, formatPercent } from './utils.js';
import { formatVoteTally } from './validator.js';

export type LogType = 'SYSTEM' | 'CLUE' | 'CHAT' | 'VOTE' | 'ELIMINATION' | 'WIN' | 'THOUGHT' | 'WARN' | 'ERROR';

export interface LogEntry {
  id: string;
  timestamp: string;
  type: LogType;
  player?: string;
  content: string;
  metadata?: {
    role?: Role;
    visibility?: 'public' | 'private';
    event?: GameEvent['type'];
    [key: string]: unknown;
  };
}

export type LogInput = Omit<LogEntry, 'id' | 'timestamp'>;

const ROLE_COLORS: Record<Role, (text: string) => string> = {
  imposter: chalk.red,
  non_imposter: chalk.green,
};

const TYPE_COLORS: Record<LogType, (text: string) => string> = {
  SYSTEM: chalk.gray,
  CLUE: chalk.white,
  CHAT: chalk.white,
  VOTE: chalk.blue,
  ELIMINATION: chalk.bgRed.white,
  WIN: chalk.green.bold,
  THOUGHT: chalk.gray.italic,
  WARN: chalk.yellow,
  ERROR: chalk.red.bold,
};

const PLAYER_COLOR = chalk.hex('#FFA500');

/**
 * Turns one engine event into the log lines a human reads. Private reasoning
 * comes out as THOUGHT entries so the console and TUI can hide it.
 */
export function describeEvent(event: GameEvent): LogInput[] {
  const meta = { event: event.type };
  const pub = { ...meta, visibility: 'public' as const };
  const priv = { ...meta, visibility: 'private' as const };

  switch (event.type) {
    case 'game_start':
      return [
        {
          type: 'SYSTEM',
          content: `New game: ${event.numPlayers} players, ${event.numImposters} imposters, ${event.numRounds} rounds. Category: ${event.category}.`,
          metadata: pub,
        },
        {
          type: 'SYSTEM',
          content: `Seats: ${event.players.map(p => `${p.id} (${p.model})`).join(', ')}`,
          metadata: pub,
        },
      ];
    case 'round_start':
      return [{ type: 'SYSTEM', content: `--- Round ${event.round} of ${event.totalRounds} ---`, metadata: pub }];
    case 'player_thinking':
      return [];
    case 'clue': {
      const lines: LogInput[] = [{ type: 'CLUE', player: event.playerId, content: `"${event.clue}"`, metadata: pub }];
      const guess = event.wordHypothesis ? ` [guess: ${event.wordHypothesis}]` : '';
      lines.push({ type: 'THOUGHT', player: event.playerId, content: `${event.thinking}${guess}`, metadata: priv });
      return lines;
    }
    case 'validation_error':
    case 'clue_advisory':
      return [{ type: 'WARN', player: event.playerId, content: event.message, metadata: pub }];
    case 'instant_reveal':
      return [{ type: 'ELIMINATION', player: event.playerId, content: event.message, metadata: pub }];
    case 'round_end':
      return [{ type: 'SYSTEM', content: `Round ${event.round} complete (${event.cluesGiven} clues).`, metadata: pub }];
    case 'discussion':
      return [
        { type: 'CHAT', player: event.playerId, content: event.message, metadata: pub },
        { type: 'THOUGHT', player: event.playerId, content: event.thinking, metadata: priv },
      ];
    case 'voting_start':
      return [{ type: 'SYSTEM', content: `--- Voting (${event.mode}) ---`, metadata: pub }];
    case 'voting_round_start':
      return [
        {
          type: 'SYSTEM',
          content: `--- Voting round ${event.votingRound} of ${event.totalVotingRounds} ---`,
          metadata: pub,
        },
      ];
    case 'vote': {
      const flag = event.substituted ? ' (substituted)' : event.corrected ? ' (corrected)' : '';
      return [
        {
          type: 'VOTE',
          player: event.voterId,
          content: `voted for ${event.targets.join(', ') || 'nobody'}${flag}: ${event.reasoning}`,
          metadata: pub,
        },
        { type: 'THOUGHT', player: event.voterId, content: event.thinking, metadata: priv },
      ];
    }
    case 'vote_correction':
      return [
        {
          type: 'WARN',
          player: event.voterId,
          content: `named an invalid target (${event.rejected.join(', ') || 'none'}); asked again`,
          metadata: pub,
        },
      ];
    case 'elimination': {
      const verdict = event.wasImposter ? 'was an imposter' : 'was not an imposter';
      const counts = event.voteCounts ? ` Votes: ${formatVoteTally(event.voteCounts)}.` : '';
      const tie = event.tiedWith?.length ? ` Tie broken between ${event.tiedWith.join(', ')}.` : '';
      return [
        {
          type: 'ELIMINATION',
          player: event.playerId,
          content: `is eliminated and ${verdict}.${counts}${tie}`,
          metadata: pub,
        },
      ];
    }
    case 'game_complete': {
      const r = event.result;
      return [
        { type: 'WIN', content: `Game over: ${r.endReason}`, metadata: pub },
        {
          type: 'SYSTEM',
          content: `Imposters were ${r.actualImposters.join(', ')}. Detection accuracy: ${formatPercent(r.detectionAccuracy)}.`,
          metadata: pub,
        },
      ];
    }
    case 'error':
      return [
        {
          type: 'ERROR',
          player: event.playerId,
          content: `${event.code} during ${event.phase}: ${event.message}`,
          metadata: pub,
        },
      ];
  }
}

export class GameLogger {
  private logs: LogEntry[] = [];
  private knownPlayers: Set<string> = new Set();
  private playerRoles: Map<string, Role> = new Map();
  private consoleOutputEnabled = true;
  private readonly entries = new EventBus<LogEntry>({
    onError: error => {
      if (this.consoleOutputEnabled) console.error(chalk.red(`log subscriber failed: ${String(error)}`));
    },
  });

  setConsoleOutputEnabled(enabled: boolean) {
    this.consoleOutputEnabled = enabled;
  }

  setKnownPlayers(ids: string[]) {
    this.knownPlayers = new Set(ids);
  }

  setPlayerRoles(roles: Record<string, Role>) {
    this.playerRoles = new Map(Object.entries(roles));
  }

  subscribe(cb: (entry: LogEntry) => void): Unsubscribe {
    return this.entries.subscribe(cb);
  }

  getLogs(): LogEntry[] {
    return this.logs.slice();
  }

  clear() {
    this.logs = [];
    this.knownPlayers.clear();
    this.playerRoles.clear();
  }

  log(entry: LogInput): LogEntry {
    const full: LogEntry = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      ...entry,
    };
    this.logs.push(full);
    this.entries.emit(full);
    this.print(full);
    return full;
  }

  /**
   * Mirrors a game's event stream into the log. Roles are learned from
   * `game_complete`, so nothing role-colored is printed before the reveal.
   */
  follow(events: EventBus<GameEvent>): Unsubscribe {
    return events.subscribe(event => {
      if (event.type === 'game_start') this.setKnownPlayers(event.players.map(p => p.id));
      if (event.type === 'game_complete') {
        this.setPlayerRoles(Object.fromEntries(event.result.players.map(p => [p.id, p.role])));
      }
      for (const line of describeEvent(event)) this.log(line);
    });
  }

  private print(entry: LogEntry) {
    if (!this.consoleOutputEnabled) return;
    if (entry.type === 'THOUGHT' && !envFlag('IMPOSTER_PRINT_THOUGHTS')) return;

    const timeStr = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
    const prefix = chalk.gray(`[${timeStr}]`);
    const typeStr = TYPE_COLORS[entry.type](`[${entry.type}]`);

    let playerInfo = '';
    if (entry.player) {
      const role = entry.metadata?.role ?? this.playerRoles.get(entry.player);
      const roleStr = role ? ` ${ROLE_COLORS[role](role)}` : '';
      playerInfo = ` <${PLAYER_COLOR(entry.player)}${roleStr}>`;
    }

    let content = entry.content;
    if (this.knownPlayers.size > 0) {
      const names = [...this.knownPlayers].map(n => n.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
      content = content.replace(new RegExp(`\\b(${names.join('|')})\\b`, 'g'), m => PLAYER_COLOR(m));
    }

    console.log(`${prefix} ${typeStr}${playerInfo}: ${content}`);
  }
}

export const logger = new GameLogger();
