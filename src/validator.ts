import type { Role, TieBreakPolicy, Winner } from './types.js';
import type { Rng } from './utils.js';

export type ClueRejection = 'empty_clue' | 'word_match' | 'partial_word_match' | 'duplicate_clue';
export type ClueAdvisory = 'long_clue';

export function isClueRejection(reason: ClueRejection | ClueAdvisory | undefined): reason is ClueRejection {
  return reason !== undefined && reason !== 'long_clue';
}

export interface ValidationResult {
  valid: boolean;
  reason?: ClueRejection | ClueAdvisory;
  // Imposter said the word: eliminate them, keep playing.
  instantReveal: boolean;
  // Non-imposter said the word: the secret is spoiled, stop the game.
  gameOver: boolean;
  message?: string;
}

// Containment is only checked for words longer than this.
const PARTIAL_MATCH_MIN_WORD_LENGTH = 3;
// Clues with more tokens than this are accepted but flagged.
const LONG_CLUE_TOKENS = 3;

function normalize(text: string): string {
  return text.trim().toLowerCase();
}

export function validateClue(
  clue: string,
  secretWord: string,
  playerId: string,
  role: Role,
  previousClues: readonly string[]
): ValidationResult {
  const c = normalize(clue);
  const w = normalize(secretWord);

  if (!c) {
    return {
      valid: false,
      reason: 'empty_clue',
      instantReveal: false,
      gameOver: false,
      message: `${playerId} gave an empty clue.`,
    };
  }

  if (c === w) {
    if (role === 'imposter') {
      return {
        valid: false,
        reason: 'word_match',
        instantReveal: true,
        gameOver: false,
        message: `${playerId} said "${clue.trim()}", the secret word. Imposter revealed and eliminated.`,
      };
    }
    return {
      valid: false,
      reason: 'word_match',
      instantReveal: false,
      gameOver: true,
      message: `${playerId} broke the rule by saying the secret word "${clue.trim()}". Game over.`,
    };
  }

  if (w.length > PARTIAL_MATCH_MIN_WORD_LENGTH && (c.includes(w) || w.includes(c))) {
    return {
      valid: false,
      reason: 'partial_word_match',
      instantReveal: false,
      gameOver: false,
      message: `${playerId}'s clue "${clue.trim()}" overlaps the secret word.`,
    };
  }

  if (previousClues.some(p => normalize(p) === c)) {
    return {
      valid: false,
      reason: 'duplicate_clue',
      instantReveal: false,
      gameOver: false,
      message: `${playerId} repeated the clue "${clue.trim()}".`,
    };
  }

  const tokenCount = c.split(/\s+/).length;
  if (tokenCount > LONG_CLUE_TOKENS) {
    return {
      valid: true,
      reason: 'long_clue',
      instantReveal: false,
      gameOver: false,
      message: `${playerId} gave a ${tokenCount}-word clue ("${clue.trim()}"). One word is standard.`,
    };
  }

  return { valid: true, instantReveal: false, gameOver: false };
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Word checks for free text another player will read (discussion remarks,
 * vote reasoning). Naming the word as a whole word follows the clue rules:
 * an imposter is revealed, anyone else spoils the game. A word that only
 * contains it is rejected. Duplicates and length do not apply.
 */
export function validateRemark(text: string, secretWord: string, playerId: string, role: Role): ValidationResult {
  const t = normalize(text).replace(/\s+/g, ' ');
  const w = normalize(secretWord).replace(/\s+/g, ' ');

  if (new RegExp(`(^|[^\\p{L}\\p{N}])${escapeRegExp(w)}($|[^\\p{L}\\p{N}])`, 'u').test(t)) {
    if (role === 'imposter') {
      return {
        valid: false,
        reason: 'word_match',
        instantReveal: true,
        gameOver: false,
        message: `${playerId} named the secret word "${w}" out loud. Imposter revealed and eliminated.`,
      };
    }
    return {
      valid: false,
      reason: 'word_match',
      instantReveal: false,
      gameOver: true,
      message: `${playerId} broke the rule by saying the secret word "${w}" out loud. Game over.`,
    };
  }

  if (w.length > PARTIAL_MATCH_MIN_WORD_LENGTH && t.includes(w)) {
    return {
      valid: false,
      reason: 'partial_word_match',
      instantReveal: false,
      gameOver: false,
      message: `${playerId} said something containing the secret word. It was withheld from the table.`,
    };
  }

  return { valid: true, instantReveal: false, gameOver: false };
}

export interface WinCheckInput {
  eliminatedPlayers: readonly string[];
  allImposters: readonly string[];
  remainingPlayers: readonly string[];
  numCivilians: number;
}

export interface WinCondition {
  gameOver: boolean;
  winner: Winner | null;
  reason: 'all_imposters_eliminated' | 'imposters_outnumber_civilians' | 'game_in_progress';
  eliminatedImposters: string[];
  survivingImposters: string[];
}

export function checkWinCondition(input: WinCheckInput): WinCondition {
  const imposters = new Set(input.allImposters);
  const eliminated = new Set(input.eliminatedPlayers);

  const eliminatedImposters = input.allImposters.filter(p => eliminated.has(p));
  const survivingImposters = input.allImposters.filter(p => !eliminated.has(p));

  if (survivingImposters.length === 0) {
    return {
      gameOver: true,
      winner: 'civilians',
      reason: 'all_imposters_eliminated',
      eliminatedImposters,
      survivingImposters: [],
    };
  }

  const eliminatedCivilians = input.eliminatedPlayers.filter(p => !imposters.has(p)).length;
  const remainingCivilians = Math.min(
    input.numCivilians - eliminatedCivilians,
    input.remainingPlayers.filter(p => !imposters.has(p)).length
  );

  if (survivingImposters.length >= remainingCivilians) {
    return {
      gameOver: true,
      winner: 'imposters',
      reason: 'imposters_outnumber_civilians',
      eliminatedImposters,
      survivingImposters,
    };
  }

  return {
    gameOver: false,
    winner: null,
    reason: 'game_in_progress',
    eliminatedImposters,
    survivingImposters,
  };
}

/**
 * Picks one player out of a tie.
 *
 * 'random' is a uniform choice from `rng`; 'first' is the lexicographically
 * smallest id and always returns the same player for the same set.
 */
export function resolveVoteTie(tiedPlayerIds: readonly string[], policy: TieBreakPolicy, rng: Rng = Math.random): string {
  if (tiedPlayerIds.length === 0) {
    throw new RangeError('resolveVoteTie needs at least one candidate');
  }
  if (policy === 'first') {
    return [...tiedPlayerIds].sort()[0]!;
  }
  const idx = Math.min(tiedPlayerIds.length - 1, Math.floor(rng() * tiedPlayerIds.length));
  return tiedPlayerIds[idx]!;
}

export function tallyVotes(targets: readonly string[]): Record<string, number> {
  const tally: Record<string, number> = {};
  for (const t of targets) tally[t] = (tally[t] ?? 0) + 1;
  return tally;
}

/** Targets sharing the highest count, in first-vote order. */
export function topCandidates(tally: Record<string, number>): string[] {
  const counts = Object.values(tally);
  if (counts.length === 0) return [];
  const max = Math.max(...counts);
  return Object.entries(tally)
    .filter(([, n]) => n === max)
    .map(([id]) => id);
}

/**
 * Maps a raw vote onto an eligible player id (trimmed, case-insensitive,
 * surrounding quotes dropped). Returns undefined when nothing matches.
 */
export function matchVoteTarget(rawVote: string, eligibleTargets: readonly string[]): string | undefined {
  const normalized = rawVote.trim().replace(/^["'`]+|["'`]+$/g, '').trim().toLowerCase();
  return eligibleTargets.find(t => t.toLowerCase() === normalized);
}

export function formatVoteTally(tally: Record<string, number>): string {
  const entries = Object.entries(tally).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
  if (entries.length === 0) return '(no votes)';
  return entries.map(([k, v]) => `${k}: ${v}`).join(', ');
}
