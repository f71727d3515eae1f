import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { GameConfigSchema, RoleSchema, type GameConfig, type GameResult } from '../types.js';
import { defaultLogDir } from './gameHistory.js';

const ClueRecordSchema = z.object({
  round: z.number(),
  playerId: z.string(),
  clue: z.string(),
  model: z.string(),
  role: RoleSchema,
  thinking: z.string(),
  confidence: z.number(),
  wordHypothesis: z.string().optional(),
});

export const GameResultSchema: z.ZodType<GameResult> = z.object({
  gameId: z.string(),
  word: z.string(),
  category: z.string(),
  players: z.array(z.object({ id: z.string(), role: RoleSchema, model: z.string() })),
  actualImposters: z.array(z.string()),
  eliminatedPlayers: z.array(z.string()),
  eliminations: z.array(
    z.object({
      playerId: z.string(),
      kind: z.enum(['instant', 'vote']),
      wasImposter: z.boolean(),
      round: z.number().optional(),
      votingRound: z.number().optional(),
    })
  ),
  detectionAccuracy: z.number(),
  totalRounds: z.number(),
  winner: z.enum(['civilians', 'imposters']).nullable(),
  outcome: z.enum(['civilians_win', 'imposters_win', 'undecided', 'word_spoiled']),
  endReason: z.string(),
  clues: z.array(ClueRecordSchema),
  votes: z.array(
    z.object({
      votingRound: z.number(),
      voterId: z.string(),
      targetId: z.string(),
      reasoning: z.string(),
      thinking: z.string(),
      confidence: z.number(),
      corrected: z.boolean(),
      substituted: z.boolean(),
    })
  ),
  batchVotes: z.array(
    z.object({
      voterId: z.string(),
      targets: z.array(z.string()),
      reasoningPerPlayer: z.record(z.string(), z.string()),
      thinking: z.string(),
      confidence: z.number(),
      corrected: z.boolean(),
    })
  ),
  discussion: z.array(
    z.object({
      turn: z.number(),
      playerId: z.string(),
      message: z.string(),
      thinking: z.string(),
      confidence: z.number(),
    })
  ),
});

// Event bodies are kept as written; only the envelope is checked.
const ReplayEventSchema = z
  .object({
    type: z.string(),
    seq: z.number(),
    gameId: z.string(),
    timestamp: z.string(),
  })
  .passthrough();
export type ReplayEvent = z.infer<typeof ReplayEventSchema>;

const ReplayFileSchema = z.object({
  gameId: z.string(),
  createdAt: z.string(),
  config: GameConfigSchema,
  events: z.array(ReplayEventSchema),
  result: GameResultSchema.nullable(),
});

export interface Replay {
  gameId: string;
  createdAt: string;
  config: GameConfig;
  events: ReplayEvent[];
  result: GameResult | null;
}

export interface GameSummary {
  gameId: string;
  createdAt: string;
  word: string;
  category: string;
  numPlayers: number;
  outcome: GameResult['outcome'] | 'in_progress';
  winner: GameResult['winner'];
  detectionAccuracy: number | null;
}

function listGameFiles(logDir: string): string[] {
  if (!fs.existsSync(logDir)) return [];
  return fs
    .readdirSync(logDir)
    .filter(f => f.startsWith('game-') && f.endsWith('.json'))
    .map(f => path.join(logDir, f))
    .sort((a, b) => fs.statSync(b).mtimeMs - fs.statSync(a).mtimeMs || b.localeCompare(a));
}

/**
 * Resolves a replay argument: 'latest', a game id, a file name inside the
 * log directory, or a path.
 */
export function resolveReplayPath(arg: string, logDir: string = defaultLogDir()): string {
  if (arg === 'latest') {
    if (!fs.existsSync(logDir)) {
      throw new Error(`Log directory not found: ${logDir}`);
    }
    const newest = listGameFiles(logDir)[0];
    if (!newest) throw new Error(`No game logs found in ${logDir}`);
    return newest;
  }

  if (fs.existsSync(arg)) return path.resolve(arg);

  const candidates = [
    path.join(logDir, arg),
    path.join(logDir, `${arg}.json`),
    path.join(logDir, `game-${arg}.json`),
  ];
  return candidates.find(c => fs.existsSync(c)) ?? path.resolve(process.cwd(), arg);
}

export function loadReplay(filePath: string): Replay {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Replay file not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new Error(`Failed to parse replay file: ${errorMessage(err)}`);
  }

  const parsed = ReplayFileSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first?.path.length ? `${first.path.join('.')}: ` : '';
    throw new Error(`Replay file ${filePath} is malformed: ${where}${first?.message ?? 'unknown problem'}`);
  }
  return parsed.data;
}

export function summarizeReplay(replay: Replay): GameSummary {
  return {
    gameId: replay.gameId,
    createdAt: replay.createdAt,
    word: replay.config.word,
    category: replay.config.category,
    numPlayers: replay.config.num_players,
    outcome: replay.result?.outcome ?? 'in_progress',
    winner: replay.result?.winner ?? null,
    detectionAccuracy: replay.result?.detectionAccuracy ?? null,
  };
}

/** Most recent games first. Unreadable files are logged and skipped. */
export function listGames(limit = 20, logDir: string = defaultLogDir()): GameSummary[] {
  const out: GameSummary[] = [];
  for (const file of listGameFiles(logDir)) {
    if (out.length >= limit) break;
    try {
      out.push(summarizeReplay(loadReplay(file)));
    } catch (err) {
      logger.log({
        type: 'WARN',
        content: `Skipping ${path.basename(file)}: ${errorMessage(err)}`,
        metadata: { visibility: 'private' },
      });
    }
  }
  return out;
}
