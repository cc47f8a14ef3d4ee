/**
 * Fuzzy matcher
 *
 * Substring hits outrank subsequence hits. Scores are a pure function of the
 * query and the candidate fields.
 */

import type { Entry, ScoredEntry } from './types.js';

export const NEUTRAL_SCORE = 0;

const SUBSTRING_BASE = 1000;
const PREFIX_BONUS = 500;
const LENGTH_WEIGHT = 250;
const ALIAS_BONUS = 50;
const SUBSEQUENCE_BASE = 300;
const GAP_PENALTY = 5;

function substringScore(query: string, field: string): number | null {
  const index = field.indexOf(query);
  if (index === -1) return null;
  let score = SUBSTRING_BASE;
  if (index === 0) score += PREFIX_BONUS;
  score += Math.round((query.length / field.length) * LENGTH_WEIGHT);
  return score;
}

function subsequenceScore(query: string, field: string): number | null {
  const q = Array.from(query);
  let qi = 0;
  let gaps = 0;
  let started = false;

  for (const ch of field) {
    if (qi >= q.length) break;
    if (ch === q[qi]) {
      qi += 1;
      started = true;
    } else if (started) {
      gaps += 1;
    }
  }

  if (qi < q.length) return null;
  return Math.max(1, SUBSEQUENCE_BASE - gaps * GAP_PENALTY);
}

/**
 * Score `query` against the ordered candidate fields. The first field is
 * treated as the alias. Returns null when no field matches.
 */
export function score(query: string, fields: readonly string[]): number | null {
  const q = query.toLowerCase();
  if (q === '') return NEUTRAL_SCORE;

  let best: number | null = null;
  for (let i = 0; i < fields.length; i++) {
    const field = fields[i].toLowerCase();
    if (field === '') continue;
    let s = substringScore(q, field) ?? subsequenceScore(q, field);
    if (s === null) continue;
    if (i === 0) s += ALIAS_BONUS;
    if (best === null || s > best) best = s;
  }
  return best;
}

/** Ordered searchable fields: alias, description, tags, command. */
export function searchableFields(entry: Entry): string[] {
  return [entry.alias, entry.description, ...entry.tags, entry.command];
}

function compareScored(a: ScoredEntry, b: ScoredEntry): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.entry.alias < b.entry.alias) return -1;
  if (a.entry.alias > b.entry.alias) return 1;
  return 0;
}

/**
 * Score and sort `entries`, dropping those that do not match.
 */
export function rankEntries(entries: Iterable<Entry>, query: string): ScoredEntry[] {
  const ranked: ScoredEntry[] = [];
  for (const entry of entries) {
    const s = score(query, searchableFields(entry));
    if (s !== null) ranked.push({ entry, score: s });
  }
  return ranked.sort(compareScored);
}
