// engine/columnAutoSuggest.ts
// Lookup-key column suggestions.
//
// Rules (all comparisons on normalized headers):
//  - exact match                 → 1.0
//  - one header contains other   → 0.6 + 0.3 × (shorter / longer length), i.e. [0.6, 0.9)
//  - token overlap               → 0.9 × Jaccard(tokens)
//  - final score                 → max(containment, token overlap)
//
// Ties keep the caller's candidate order. The engine never picks a column itself.

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config';
import { createNormalizer, type Normalizer } from './normalizeFields';
import type { Table } from './types';

export interface ColumnSuggestion {
  candidate: string;
  score: number;
}

export interface SuggestOptions {
  /** Keep only the top N suggestions. */
  limit?: number;
  normalize?: Normalizer;
}

const CONTAINMENT_BASE = 0.6;
const CONTAINMENT_SPAN = 0.3;
const TOKEN_WEIGHT = 0.9;

function tokenJaccard(a: string, b: string): number {
  const left = new Set(a.split(' '));
  const right = new Set(b.split(' '));
  let shared = 0;
  for (const token of left) {
    if (right.has(token)) shared += 1;
  }
  const union = left.size + right.size - shared;
  return union === 0 ? 0 : shared / union;
}

/**
 * Similarity between two already-normalized headers, in [0, 1].
 */
export function scoreNormalizedHeaders(target: string, candidate: string): number {
  if (!target || !candidate) return 0;
  if (target === candidate) return 1;

  let containment = 0;
  if (target.includes(candidate) || candidate.includes(target)) {
    const shorter = Math.min(target.length, candidate.length);
    const longer = Math.max(target.length, candidate.length);
    containment = CONTAINMENT_BASE + CONTAINMENT_SPAN * (shorter / longer);
  }

  const tokens = TOKEN_WEIGHT * tokenJaccard(target, candidate);
  return Math.max(containment, tokens);
}

/**
 * Rank candidate headers against a target header, highest score first.
 * Empty candidate list → [].
 */
export function suggestColumns(
  targetHeader: string,
  candidates: readonly string[],
  options: SuggestOptions = {}
): ColumnSuggestion[] {
  const normalize = options.normalize ?? createNormalizer();
  const target = normalize(targetHeader);

  const ranked = candidates
    .map((candidate, index) => ({
      candidate,
      index,
      score: scoreNormalizedHeaders(target, normalize(candidate))
    }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map(({ candidate, score }) => ({ candidate, score }));

  if (options.limit !== undefined && options.limit >= 0) {
    return ranked.slice(0, options.limit);
  }
  return ranked;
}

/**
 * Master columns offered as lookup (value) columns: positions [start, end).
 * Position 0 is the key column in a cleaned master sheet and is skipped by default.
 */
export function listLookupColumns(
  table: Table,
  range: EngineConfig['lookupColumnRange'] = DEFAULT_ENGINE_CONFIG.lookupColumnRange
): string[] {
  const end = Math.min(range.end, table.columns.length);
  return table.columns.slice(range.start, end);
}
