import type { DiscussionRecord, PublicClue, Role, SingleVoteRecord } from './types.js';

export interface SeatKnowledge {
  playerId: string;
  role: Role;
  category: string;
  // Present only for non-imposters.
  secretWord?: string;
  totalPlayers: number;
  numImposters: number;
}

export function buildSystemPrompt(k: SeatKnowledge): string {
  const setup = `
Setup:
- There are ${k.totalPlayers} players; ${k.numImposters} of them are imposters.
- Imposters only know the category. Everyone else also knows the secret word.
- Each round every player gives a one-word clue, in seat order. Later players see earlier clues.
- After the clue rounds the table votes players out, one elimination at a time.
`.trim();

  if (k.role === 'non_imposter' && k.secretWord !== undefined) {
    return `
You are ${k.playerId} in "Imposter", a social deduction word game.

Your role: NON-IMPOSTER. You know the secret word.
Secret word: "${k.secretWord}"
Category: ${k.category}

${setup}

Rules:
- Never say "${k.secretWord}" itself. A clue that contains it or is part of it is rejected.
- Never repeat a clue that was already given.
- Prove you know the word obliquely: other word-knowers should recognise your clue, imposters should not be able to reverse it.
- Watch for clues that are generic, only echo earlier clues, or drift away from the word. Those players are likely guessing.

Respond only with the requested JSON object.
`.trim();
  }

  return `
You are ${k.playerId} in "Imposter", a social deduction word game.

Your role: IMPOSTER. You do NOT know the secret word.
Category: ${k.category}

${setup}

You do not know who the other imposters are. Your goal is to avoid being voted out.

Rules:
- Infer the word from the clues others give and blend in with them.
- Give clues that fit the emerging pattern and sound confident. Generic clues that fit anything in "${k.category}" are a red flag.
- If your clue is exactly the secret word you are revealed and eliminated on the spot. Say something related, never your guess itself.
- Never repeat a clue that was already given.

Respond only with the requested JSON object.
`.trim();
}

export function formatClueLog(clues: readonly PublicClue[], eliminated: readonly string[] = []): string {
  if (clues.length === 0) return '';
  const out = new Set(eliminated);
  const byRound = new Map<number, PublicClue[]>();
  for (const c of clues) {
    const list = byRound.get(c.round) ?? [];
    list.push(c);
    byRound.set(c.round, list);
  }
  const lines: string[] = [];
  for (const round of [...byRound.keys()].sort((a, b) => a - b)) {
    lines.push(`Round ${round}:`);
    for (const c of byRound.get(round) ?? []) {
      lines.push(`- ${c.playerId}: "${c.clue}"${out.has(c.playerId) ? ' (eliminated)' : ''}`);
    }
  }
  return lines.join('\n');
}

export function buildCluePrompt(params: {
  role: Role;
  round: number;
  totalRounds: number;
  category: string;
  secretWord?: string;
  clues: readonly PublicClue[];
}): string {
  const log = formatClueLog(params.clues) || "No clues yet - you're going first.";

  const guidance =
    params.role === 'non_imposter'
      ? `
You know the word is "${params.secretWord ?? ''}".
- Look at the earlier clues together: how close are they to giving the word away?
- Pick a clue that proves you know the word without completing the puzzle for an imposter.

Respond with JSON:
- "thinking": your reasoning
- "clue": one word
- "confidence": 0-100, how well the clue proves knowledge without revealing the word`
      : `
You only know the category "${params.category}".
- What pattern do the earlier clues form? What word in the category fits all of them?
- Pick a clue someone who knows that word would give. Do not say the guessed word itself.

Respond with JSON:
- "thinking": your reasoning
- "clue": one word
- "wordHypothesis": your current best guess at the secret word
- "confidence": 0-100`;

  return `
=== Round ${params.round} of ${params.totalRounds} ===

Clues so far:
${log}
${guidance}
`.trim();
}

export function buildSingleVotePrompt(params: {
  role: Role;
  category: string;
  secretWord?: string;
  votingRound: number;
  totalVotingRounds: number;
  clues: readonly PublicClue[];
  eliminated: readonly string[];
  votesThisRound: readonly Pick<SingleVoteRecord, 'voterId' | 'targetId' | 'reasoning'>[];
  eligibleTargets: readonly string[];
  discussion?: readonly DiscussionRecord[];
}): string {
  const log = formatClueLog(params.clues, params.eliminated) || '(no clues were recorded)';
  const eliminatedLine = params.eliminated.length ? `Already eliminated: ${params.eliminated.join(', ')}\n` : '';
  const votes = params.votesThisRound.length
    ? `Votes cast this round:\n${params.votesThisRound.map(v => `- ${v.voterId} voted for ${v.targetId}: "${v.reasoning}"`).join('\n')}`
    : 'You are the first to vote this round.';
  const discussion = params.discussion?.length
    ? `\nDiscussion:\n${params.discussion.map(d => `- ${d.playerId}: ${d.message}`).join('\n')}\n`
    : '';

  const roleContext =
    params.role === 'non_imposter'
      ? `You know the word is "${params.secretWord ?? ''}". Who gave clues that only make sense for someone guessing from the category?`
      : `You do not know the word (category "${params.category}"). Vote convincingly; voting against someone who clearly knew the word looks suspicious.`;

  return `
=== Voting round ${params.votingRound} of ${params.totalVotingRounds} ===

Category: ${params.category}
${eliminatedLine}
All clues:
${log}
${discussion}
${votes}

${roleContext}

Eligible players: ${params.eligibleTargets.join(', ')}.

Vote for exactly ONE eligible player to eliminate.

Respond with JSON:
- "thinking": your analysis
- "vote": one player id from the eligible list
- "reasoning": one sentence explaining the vote
- "confidence": 0-100
`.trim();
}

export function buildBatchVotePrompt(params: {
  role: Role;
  category: string;
  secretWord?: string;
  numImposters: number;
  clues: readonly PublicClue[];
  eliminated: readonly string[];
  eligibleTargets: readonly string[];
  discussion?: readonly DiscussionRecord[];
}): string {
  const log = formatClueLog(params.clues, params.eliminated) || '(no clues were recorded)';
  const discussion = params.discussion?.length
    ? `\nDiscussion:\n${params.discussion.map(d => `- ${d.playerId}: ${d.message}`).join('\n')}\n`
    : '';
  const roleContext =
    params.role === 'non_imposter'
      ? `You know the word is "${params.secretWord ?? ''}".`
      : `You do not know the word, only the category "${params.category}".`;

  return `
=== Voting ===

All clues:
${log}
${discussion}
${roleContext}

Eligible players: ${params.eligibleTargets.join(', ')}.

Vote for up to ${params.numImposters} player(s) you believe are imposters.

Respond with JSON:
- "thinking": your analysis
- "votes": list of player ids from the eligible list
- "confidence": 0-100
- "reasoningPerPlayer": object mapping each voted id to a short reason
`.trim();
}

export function buildDiscussionPrompt(params: {
  role: Role;
  category: string;
  secretWord?: string;
  turn: number;
  totalTurns: number;
  clues: readonly PublicClue[];
  discussion: readonly DiscussionRecord[];
}): string {
  const log = formatClueLog(params.clues) || '(no clues were recorded)';
  const said = params.discussion.length
    ? params.discussion.map(d => `- ${d.playerId}: ${d.message}`).join('\n')
    : 'Nobody has spoken yet.';
  const roleContext =
    params.role === 'non_imposter'
      ? `You know the word is "${params.secretWord ?? ''}". Point out who does not seem to know it, without naming the word.`
      : `You only know the category "${params.category}". Blend in and deflect suspicion.`;

  return `
=== Discussion ${params.turn} of ${params.totalTurns} ===

All clues:
${log}

Discussion so far:
${said}

${roleContext}

Share ONE observation or suspicion (1-2 sentences).

Respond with JSON:
- "thinking": your reasoning
- "message": your public remark
- "confidence": 0-100
`.trim();
}

export function buildVoteCorrectionPrompt(rejected: readonly string[], eligibleTargets: readonly string[]): string {
  const shown = rejected.length ? rejected.map(v => `"${v}"`).join(', ') : '(none)';
  return `
Your vote ${shown} is not valid: you cannot vote for yourself, an eliminated player, or an unknown id.

Eligible players: ${eligibleTargets.join(', ')}.

Answer again with the same JSON format, naming only eligible players.
`.trim();
}

/** Parses the "Eligible players: A, B." line back out of a prompt. */
export function parseEligiblePlayers(prompt: string): string[] {
  const matches = [...prompt.matchAll(/Eligible players:\s*([^\n]+?)\.?\s*$/gim)];
  const last = matches[matches.length - 1];
  if (!last?.[1]) return [];
  return last[1]
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}
