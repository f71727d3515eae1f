import type { ModelCaller, ModelRequest } from './modelClient.js';
import { parseEligiblePlayers } from './prompts.js';
import type { ChatMessage } from './types.js';
import { fnv1a32 } from './utils.js';

const CLUE_WORDS = [
  'bright', 'cold', 'green', 'wave', 'stone', 'quiet', 'open', 'sharp', 'round', 'warm',
  'salt', 'shade', 'light', 'deep', 'soft', 'wild', 'gold', 'storm', 'calm', 'wind',
];

function lastUserPrompt(messages: readonly ChatMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const m = messages[i]!;
    if (m.role === 'user') return m.content;
  }
  return '';
}

function systemPrompt(messages: readonly ChatMessage[]): string {
  return messages.find(m => m.role === 'system')?.content ?? '';
}

function usedClues(prompt: string): Set<string> {
  return new Set([...prompt.matchAll(/^- [^:\n]+: "([^"]*)"/gm)].map(m => (m[1] ?? '').toLowerCase()));
}

/**
 * Offline stand-in for a model provider. Answers are a pure function of the
 * seed and the request, so a dry-run game replays identically.
 */
export class DryRunModelClient implements ModelCaller {
  private readonly seed: number;

  constructor(seed = 1) {
    this.seed = seed;
  }

  async call<T>(req: ModelRequest<T>): Promise<T> {
    const system = systemPrompt(req.messages);
    const prompt = lastUserPrompt(req.messages);
    const self = system.match(/You are (\S+) in/)?.[1] ?? '';
    const key = `${this.seed}|${req.modelId}|${self}|${req.messages.length}|${prompt}`;
    const h = fnv1a32(key);
    const confidence = 50 + (h % 51);

    switch (req.kind) {
      case 'clue': {
        const word = system.match(/Secret word: "([^"]+)"/)?.[1]?.toLowerCase();
        const used = usedClues(prompt);
        const options = CLUE_WORDS.filter(w => !used.has(w) && !(word && (w.includes(word) || word.includes(w))));
        const clue = options.length ? options[h % options.length]! : `clue${h % 1000}`;
        return req.schema.parse({
          thinking: `Dry run: ${self} picks "${clue}".`,
          clue,
          confidence,
          wordHypothesis: word ? undefined : 'unknown',
        });
      }
      case 'vote': {
        const eligible = parseEligiblePlayers(prompt).filter(p => p !== self);
        const vote = eligible.length ? eligible[h % eligible.length]! : '';
        return req.schema.parse({
          thinking: `Dry run: ${self} considers ${eligible.join(', ') || 'nobody'}.`,
          vote: vote || 'nobody',
          reasoning: vote ? `${vote}'s clues felt the least specific.` : 'No one is eligible.',
          confidence,
        });
      }
      case 'batch_vote': {
        const eligible = parseEligiblePlayers(prompt).filter(p => p !== self);
        const limit = Number(prompt.match(/Vote for up to (\d+)/)?.[1] ?? '1');
        const picks: string[] = [];
        for (let i = 0; i < eligible.length && picks.length < limit; i++) {
          const candidate = eligible[(h + i) % eligible.length]!;
          if (!picks.includes(candidate)) picks.push(candidate);
        }
        return req.schema.parse({
          thinking: `Dry run: ${self} suspects ${picks.join(', ') || 'nobody'}.`,
          votes: picks,
          confidence,
          reasoningPerPlayer: Object.fromEntries(picks.map(p => [p, 'Vague clues.'])),
        });
      }
      case 'discussion': {
        const others = [...prompt.matchAll(/^- (Player_\d+):/gm)].map(m => m[1] ?? '').filter(p => p && p !== self);
        const target = others.length ? others[h % others.length] : undefined;
        return req.schema.parse({
          thinking: `Dry run: ${self} comments.`,
          message: target ? `${target}'s clue could fit almost anything in this category.` : 'Nothing stands out to me yet.',
          confidence,
        });
      }
    }
  }
}
