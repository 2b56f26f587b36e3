/**
 * Outfit Engine - Ranking
 *
 * Deterministic order: score desc, then higher minimum item score,
 * then lower total price, then first generated.
 */

import type { OutfitCandidate } from './types';

/** Scores are compared at this resolution; anything finer is a tie */
export const SCORE_EPSILON = 1e-6;

/** Score in whole SCORE_EPSILON steps; ties are decided on these keys */
function scoreKey(score: number): number {
  return Math.round(score / SCORE_EPSILON);
}

export function compareOutfits(a: OutfitCandidate, b: OutfitCandidate): number {
  const scoreDiff = scoreKey(b.score) - scoreKey(a.score);
  if (scoreDiff !== 0) return scoreDiff;

  const minDiff = scoreKey(b.min_item_score) - scoreKey(a.min_item_score);
  if (minDiff !== 0) return minDiff;

  const priceDiff = a.total_price - b.total_price;
  if (priceDiff !== 0) return priceDiff;

  return a.sequence - b.sequence;
}

/**
 * Sort, drop repeated outfit ids (first in rank order wins), keep the top k.
 */
export function rankOutfits(candidates: readonly OutfitCandidate[], k: number): OutfitCandidate[] {
  const sorted = [...candidates].sort(compareOutfits);
  const seen = new Set<string>();
  const ranked: OutfitCandidate[] = [];

  for (const outfit of sorted) {
    if (ranked.length >= k) break;
    if (seen.has(outfit.id)) continue;
    seen.add(outfit.id);
    ranked.push(outfit);
  }
  return ranked;
}
