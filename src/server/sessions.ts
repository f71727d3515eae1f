import type { GameEngine } from '../engine/gameEngine.js';
import { GameCancelledError, errorMessage } from '../errors.js';
import type { Unsubscribe } from '../events/eventBus.js';
import type { GameEvent } from '../events/types.js';
import type { GameHistory } from '../history/gameHistory.js';
import { logger } from '../logger.js';
import { createSession, type SessionOptions } from '../session.js';
import type { GameConfig, GameResult } from '../types.js';

export type SessionStatus = 'created' | 'running' | 'complete' | 'failed' | 'cancelled';

export interface GameSession {
  gameId: string;
  createdAt: string;
  engine: GameEngine;
  history: GameHistory;
  status: SessionStatus;
  result?: GameResult;
  error?: string;
  // Settles once the game has finished, failed or been cancelled.
  done?: Promise<void>;
}

export interface SessionStoreOptions extends Omit<SessionOptions, 'gameId'> {
  /** Games kept in memory before idle ones are evicted, oldest first. Defaults to 100. */
  maxGames?: number;
}

/**
 * Games created over HTTP. A game starts when its first stream attaches and
 * is cancelled once the last stream goes away before it finishes.
 *
 * Running games and games with a listener are never evicted. Once the store
 * holds more than `maxGames`, the oldest of the rest are dropped; their
 * history stays on disk when persistence is on.
 */
export class SessionStore {
  private readonly sessions = new Map<string, GameSession>();
  private readonly controllers = new Map<string, AbortController>();
  private readonly listeners = new Map<string, number>();
  private readonly opts: Omit<SessionOptions, 'gameId'>;
  private readonly maxGames: number;

  constructor({ maxGames = 100, ...opts }: SessionStoreOptions) {
    this.opts = opts;
    this.maxGames = maxGames;
  }

  create(config: GameConfig): GameSession {
    const { engine, history } = createSession(config, this.opts);
    const session: GameSession = {
      gameId: engine.gameId,
      createdAt: new Date().toISOString(),
      engine,
      history,
      status: 'created',
    };
    this.sessions.set(session.gameId, session);
    logger.log({ type: 'SYSTEM', content: `Created game ${session.gameId} (${config.num_players} players)` });
    this.prune(session.gameId);
    return session;
  }

  get(gameId: string): GameSession | undefined {
    return this.sessions.get(gameId);
  }

  list(): GameSession[] {
    return [...this.sessions.values()];
  }

  start(session: GameSession): void {
    if (session.status !== 'created') return;
    const controller = new AbortController();
    this.controllers.set(session.gameId, controller);
    session.status = 'running';

    session.done = session.engine
      .run(controller.signal)
      .then(
        result => {
          session.status = 'complete';
          session.result = result;
        },
        (error: unknown) => {
          session.status = error instanceof GameCancelledError ? 'cancelled' : 'failed';
          session.error = errorMessage(error);
          logger.log({ type: 'WARN', content: `Game ${session.gameId} ${session.status}: ${session.error}` });
        }
      )
      .finally(() => {
        this.controllers.delete(session.gameId);
        this.prune();
      });
  }

  /**
   * Replays the events recorded so far, then follows live ones. Detaching
   * the last listener of a running game cancels it.
   */
  attach(session: GameSession, onEvent: (event: GameEvent) => void): Unsubscribe {
    for (const event of session.history.getEvents()) onEvent(event);
    const unsubscribe = session.engine.events.subscribe(onEvent);
    this.listeners.set(session.gameId, (this.listeners.get(session.gameId) ?? 0) + 1);

    let detached = false;
    return () => {
      if (detached) return;
      detached = true;
      unsubscribe();
      const left = (this.listeners.get(session.gameId) ?? 1) - 1;
      if (left > 0) {
        this.listeners.set(session.gameId, left);
        return;
      }
      this.listeners.delete(session.gameId);
      // A stream closing on game_complete lands here before the run settles.
      if (session.status === 'running' && session.engine.phase !== 'complete') {
        this.controllers.get(session.gameId)?.abort(new Error('Client disconnected'));
      } else {
        this.prune();
      }
    };
  }

  /** Number of games currently running. */
  runningCount(): number {
    return this.list().filter(s => s.status === 'running').length;
  }

  cancel(gameId: string): boolean {
    const controller = this.controllers.get(gameId);
    if (!controller || this.sessions.get(gameId)?.status !== 'running') return false;
    controller.abort(new Error('Cancelled by request'));
    return true;
  }

  private prune(keep?: string): void {
    let excess = this.sessions.size - this.maxGames;
    // Map iteration is insertion order, so the oldest games go first.
    for (const [gameId, session] of this.sessions) {
      if (excess <= 0) return;
      if (gameId === keep || session.status === 'running' || this.listeners.has(gameId)) continue;
      this.sessions.delete(gameId);
      excess--;
      logger.log({ type: 'SYSTEM', content: `Evicted game ${gameId} (${session.status}) from memory` });
    }
  }
}
