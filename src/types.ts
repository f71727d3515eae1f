import { z } from 'zod';

// --- Configuration Types ---

export const RoleSchema = z.enum(['imposter', 'non_imposter']);
export type Role = z.infer<typeof RoleSchema>;

export const ModelStrategySchema = z.enum(['single', 'mixed', 'role-based']);
export type ModelStrategy = z.infer<typeof ModelStrategySchema>;

export const TieBreakPolicySchema = z.enum(['random', 'first']);
export type TieBreakPolicy = z.infer<typeof TieBreakPolicySchema>;

const nonBlank = (field: string) =>
  z
    .string()
    .transform(s => s.trim())
    .refine(s => s.length > 0, { message: `${field} must not be empty` });

export const GameConfigSchema = z
  .object({
    word: nonBlank('word'),
    category: nonBlank('category'),
    num_players: z.number().int().min(3).default(6),
    num_imposters: z.number().int().min(1).default(2),
    num_rounds: z.number().int().min(1).default(3),

    // Model ids are AI Gateway ids (`provider/model`) or aliases from `models`.
    model_strategy: ModelStrategySchema.default('mixed'),
    default_model: z.string().min(1).default('gpt-4o-mini'),
    model_distribution: z.record(z.string(), z.number().int().nonnegative()).optional(),
    role_models: z
      .object({
        imposter: z.string().min(1),
        non_imposter: z.string().min(1),
      })
      .default({ imposter: 'haiku', non_imposter: 'gpt-4o-mini' }),
    models: z.record(z.string(), z.string()).default({}),
    fallback_models: z.array(z.string()).default([]),

    enable_discussion: z.boolean().default(false),
    discussion_turns: z.number().int().min(1).default(1),

    temperature: z.number().min(0).max(2).default(0.7),
    vote_temperature: z.number().min(0).max(2).default(0.5),
    max_tokens: z.number().int().positive().default(800),
    max_attempts: z.number().int().min(1).default(3),
    response_timeout_ms: z.number().int().nonnegative().default(90_000),

    // 'sequential' is the canonical mode; 'batch' keeps the older simultaneous ballot.
    voting_mode: z.enum(['sequential', 'batch']).default('sequential'),
    // 'lenient' substitutes the first eligible target after a failed correction.
    vote_validation: z.enum(['strict', 'lenient']).default('strict'),
    tie_breaker: TieBreakPolicySchema.default('random'),
    seed: z.number().int().optional(),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.num_imposters >= cfg.num_players) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['num_imposters'],
        message: `num_imposters (${cfg.num_imposters}) must be smaller than num_players (${cfg.num_players})`,
      });
    }
  });
export type GameConfig = z.infer<typeof GameConfigSchema>;
export type GameConfigInput = z.input<typeof GameConfigSchema>;

// --- Conversation Types ---

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string };

// --- Game State Types ---

export const GAME_PHASES = ['setup', 'clue_round', 'discussion', 'voting', 'reveal', 'complete'] as const;
export type GamePhase = (typeof GAME_PHASES)[number];

export interface PublicClue {
  round: number;
  playerId: string;
  clue: string;
}

export interface ClueRecord extends PublicClue {
  model: string;
  role: Role;
  thinking: string;
  confidence: number;
  wordHypothesis?: string;
}

export interface SingleVoteRecord {
  votingRound: number;
  voterId: string;
  targetId: string;
  reasoning: string;
  thinking: string;
  confidence: number;
  // True when the first answer named an invalid target and was re-prompted.
  corrected: boolean;
  // True when lenient validation picked the target instead of the agent.
  substituted: boolean;
}

export interface BatchVoteRecord {
  voterId: string;
  targets: string[];
  reasoningPerPlayer: Record<string, string>;
  thinking: string;
  confidence: number;
  corrected: boolean;
}

export interface DiscussionRecord {
  turn: number;
  playerId: string;
  message: string;
  thinking: string;
  confidence: number;
}

export type EliminationKind = 'instant' | 'vote';

export interface EliminationRecord {
  playerId: string;
  kind: EliminationKind;
  wasImposter: boolean;
  round?: number;
  votingRound?: number;
}

export type Winner = 'civilians' | 'imposters';

export type GameOutcome = 'civilians_win' | 'imposters_win' | 'undecided' | 'word_spoiled';

export interface PlayerSummary {
  id: string;
  role: Role;
  model: string;
}

export interface GameResult {
  gameId: string;
  word: string;
  category: string;
  players: PlayerSummary[];
  actualImposters: string[];
  eliminatedPlayers: string[];
  eliminations: EliminationRecord[];
  detectionAccuracy: number;
  totalRounds: number;
  winner: Winner | null;
  outcome: GameOutcome;
  endReason: string;
  clues: ClueRecord[];
  votes: SingleVoteRecord[];
  batchVotes: BatchVoteRecord[];
  discussion: DiscussionRecord[];
}

export interface EarlyTermination {
  reason: 'secret_word_spoiled' | 'win_decided';
  playerId?: string;
  round: number;
  message: string;
}
