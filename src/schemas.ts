import { z } from 'zod';

// Contracts for what an agent returns. They are enforced at the transport
// boundary, so the engine only ever sees parsed values.

const Confidence = z.number().int().min(0).max(100).describe('Confidence from 0 to 100');

export const ClueResponseSchema = z.object({
  thinking: z.string().min(1).max(4000).describe('Private strategic reasoning behind the clue'),
  clue: z.string().min(1).max(50).describe('A single word (hyphens allowed)'),
  confidence: Confidence,
  wordHypothesis: z
    .string()
    .nullish()
    .transform(v => (v ? v : undefined))
    .describe('Imposters only: current guess at the secret word'),
});
export type ClueResponse = z.infer<typeof ClueResponseSchema>;

export const SingleVoteResponseSchema = z.object({
  thinking: z.string().min(1).max(4000).describe('Analysis of the evidence'),
  vote: z.string().min(1).describe('Exactly one player id to eliminate'),
  reasoning: z.string().min(1).max(600).describe('One sentence explaining the vote'),
  confidence: Confidence,
});
export type SingleVoteResponse = z.infer<typeof SingleVoteResponseSchema>;

export const BatchVoteResponseSchema = z.object({
  thinking: z.string().min(1).max(4000),
  votes: z.array(z.string().min(1)).describe('Player ids suspected of being imposters'),
  confidence: Confidence,
  reasoningPerPlayer: z.record(z.string(), z.string()).default({}),
});
export type BatchVoteResponse = z.infer<typeof BatchVoteResponseSchema>;

export const DiscussionResponseSchema = z.object({
  thinking: z.string().min(1).max(4000),
  message: z.string().min(1).max(400).describe('Public remark to the table'),
  confidence: Confidence,
});
export type DiscussionResponse = z.infer<typeof DiscussionResponseSchema>;

export type ResponseKind = 'clue' | 'vote' | 'batch_vote' | 'discussion';
