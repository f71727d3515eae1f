import cors from 'cors';
import express, { type Express } from 'express';
import { parseGameConfig } from '../config.js';
import { GameConfigError, errorMessage } from '../errors.js';
import { loadReplay, listGames, resolveReplayPath } from '../history/loadReplay.js';
import { defaultLogDir } from '../history/gameHistory.js';
import { logger } from '../logger.js';
import { openSseStream } from './sse.js';
import { SessionStore, type SessionStoreOptions } from './sessions.js';

export const APP_VERSION = '0.1.0';

export interface ServerOptions extends SessionStoreOptions {
  keepaliveMs?: number;
}

export function createApp(opts: ServerOptions): { app: Express; store: SessionStore } {
  const app = express();
  const store = new SessionStore(opts);
  const logDir = opts.logDir ?? defaultLogDir();

  app.use(cors());
  app.use(express.json());

  app.get('/health', (_req, res) => res.json({ status: 'healthy' }));

  app.get('/api/status', (_req, res) =>
    res.json({ app: 'Imposter Arena', version: APP_VERSION, status: 'running', active_games: store.runningCount() })
  );

  app.post('/api/game/create', (req, res) => {
    try {
      const session = store.create(parseGameConfig(req.body));
      res.status(201).json({
        game_id: session.gameId,
        status: session.status,
        stream_url: `/api/game/${session.gameId}/stream`,
      });
    } catch (error) {
      if (error instanceof GameConfigError) {
        res.status(400).json({ error: error.message, issues: error.issues });
        return;
      }
      logger.log({ type: 'ERROR', content: `create failed: ${errorMessage(error)}` });
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  app.get('/api/game/:gameId/stream', (req, res) => {
    const session = store.get(req.params.gameId);
    if (!session) {
      res.status(404).json({ error: `Game ${req.params.gameId} not found` });
      return;
    }

    const stream = openSseStream(res, { keepaliveMs: opts.keepaliveMs });
    let finished = false;
    let detach: (() => void) | undefined;
    const finish = () => {
      finished = true;
      detach?.();
      stream.close();
    };

    // The replay runs inside attach(), before `detach` exists.
    detach = store.attach(session, event => {
      stream.send(event);
      if (event.type === 'game_complete' || event.type === 'error') finish();
    });
    if (finished) {
      finish();
      return;
    }
    req.on('close', finish);

    if (session.status === 'created') store.start(session);
  });

  app.post('/api/game/:gameId/cancel', (req, res) => {
    if (!store.cancel(req.params.gameId)) {
      res.status(409).json({ error: `Game ${req.params.gameId} is not running` });
      return;
    }
    res.json({ status: 'cancelling' });
  });

  app.get('/api/game/:gameId/history', (req, res) => {
    const session = store.get(req.params.gameId);
    if (session) {
      res.json({ ...session.history.toFile(), status: session.status });
      return;
    }
    try {
      res.json(loadReplay(resolveReplayPath(req.params.gameId, logDir)));
    } catch (error) {
      res.status(404).json({ error: errorMessage(error) });
    }
  });

  app.get('/api/games/list', (req, res) => {
    const raw = Number(req.query.limit ?? 10);
    const limit = Number.isInteger(raw) && raw > 0 ? Math.min(raw, 100) : 10;
    res.json({ games: listGames(limit, logDir) });
  });

  return { app, store };
}
