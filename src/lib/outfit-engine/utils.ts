/**
 * Outfit Engine - Utility Functions
 *
 * Raw per-dimension match values in [0, 1].
 * No side effects, no weights, just comparisons against resolved targets.
 */

import type { MatchKind } from './types';
import {
  canonicalSeason,
  colorRelation,
  formalityLevel,
  materialFamilies,
  normalizeTerm,
  relatedOccasions,
  seasonDistance,
  styleFamily,
  stylesAdjacent,
  tokenize,
} from './vocabulary';

// ============================================
// MATCH RESULT
// ============================================

export interface MatchResult {
  raw: number;
  kind: MatchKind;
}

/** Attribute present but nothing to compare against */
export const NO_SIGNAL: MatchResult = { raw: 0.5, kind: 'neutral' };

export const MATCH_VALUES = {
  occasion: { exact: 1, related: 0.75, mismatch: 0.15 },
  category: { exact: 1, overlap: 0.7, mismatch: 0.2 },
  style: { exact: 1, adjacent: 0.6, mismatch: 0.2 },
  color: { exact: 1, family: 0.8, compatible: 0.55, mismatch: 0.1 },
  material: { exact: 1, family: 0.8, mismatch: 0.2 },
  season: { exact: 1, allSeason: 0.8, adjacent: 0.4, opposite: 0 },
  price: { sweetSpot: 1, under: 0.8, nearLimit: 0.6, overStart: 0.5 },
} as const;

/**
 * Highest raw value wins; the first one seen on ties.
 */
function best(results: MatchResult[]): MatchResult | null {
  let winner: MatchResult | null = null;
  for (const result of results) {
    if (winner === null || result.raw > winner.raw) winner = result;
  }
  return winner;
}

function sharesToken(a: string, b: string): boolean {
  const tokensB = new Set(tokenize(b));
  return tokenize(a).some(token => tokensB.has(token));
}

// ============================================
// OCCASION
// ============================================

export function occasionMatch(
  values: readonly string[],
  targets: readonly string[],
  related: readonly string[]
): MatchResult {
  if (targets.length === 0) return NO_SIGNAL;
  const { exact, related: relatedValue, mismatch } = MATCH_VALUES.occasion;

  const results = values.map((value): MatchResult => {
    const term = normalizeTerm(value);
    if (targets.includes(term)) return { raw: exact, kind: 'exact' };
    if (related.includes(term) || relatedOccasions(term).some(r => targets.includes(r))) {
      return { raw: relatedValue, kind: 'partial' };
    }
    return { raw: mismatch, kind: 'mismatch' };
  });
  return best(results) ?? NO_SIGNAL;
}

// ============================================
// CATEGORY
// ============================================

/**
 * @param strict - mismatch scores low instead of neutral (activity-specific list)
 */
export function categoryMatch(
  values: readonly string[],
  preferred: readonly string[],
  strict: boolean
): MatchResult {
  if (preferred.length === 0) return NO_SIGNAL;
  const { exact, overlap, mismatch } = MATCH_VALUES.category;

  const results = values.map((value): MatchResult => {
    const term = normalizeTerm(value);
    if (preferred.includes(term)) return { raw: exact, kind: 'exact' };
    if (preferred.some(p => sharesToken(term, p))) return { raw: overlap, kind: 'partial' };
    return strict ? { raw: mismatch, kind: 'mismatch' } : NO_SIGNAL;
  });
  return best(results) ?? NO_SIGNAL;
}

// ============================================
// FORMALITY
// ============================================

/**
 * 1 - |diff| / 3, floored at 0. Unrecognized item terms carry no signal.
 */
export function formalityMatch(values: readonly string[], targetLevel: number | null): MatchResult {
  if (targetLevel === null) return NO_SIGNAL;

  const results: MatchResult[] = [];
  for (const value of values) {
    const level = formalityLevel(value);
    if (level === null) continue;
    const diff = Math.abs(level - targetLevel);
    const raw = Math.max(0, 1 - diff / 3);
    results.push({ raw, kind: diff === 0 ? 'exact' : raw > 0 ? 'partial' : 'mismatch' });
  }
  return best(results) ?? NO_SIGNAL;
}

// ============================================
// STYLE
// ============================================

export function styleMatch(values: readonly string[], targetFamilies: readonly string[]): MatchResult {
  if (targetFamilies.length === 0) return NO_SIGNAL;
  const { exact, adjacent, mismatch } = MATCH_VALUES.style;

  const results = values.map((value): MatchResult => {
    const family = styleFamily(value) ?? normalizeTerm(value);
    if (targetFamilies.includes(family)) return { raw: exact, kind: 'exact' };
    if (targetFamilies.some(target => stylesAdjacent(family, target))) {
      return { raw: adjacent, kind: 'compatible' };
    }
    return { raw: mismatch, kind: 'mismatch' };
  });
  return best(results) ?? NO_SIGNAL;
}

// ============================================
// COLOR
// ============================================

export function colorMatch(values: readonly string[], palette: readonly string[]): MatchResult {
  if (palette.length === 0) return NO_SIGNAL;
  const { exact, family, compatible, mismatch } = MATCH_VALUES.color;

  const results: MatchResult[] = [];
  for (const value of values) {
    for (const target of palette) {
      if (normalizeTerm(value) === normalizeTerm(target)) {
        results.push({ raw: exact, kind: 'exact' });
        continue;
      }
      const relation = colorRelation(value, target);
      if (relation === 'same') {
        results.push({ raw: family, kind: 'partial' });
      } else if (relation === 'neutral' || relation === 'compatible') {
        results.push({ raw: compatible, kind: 'compatible' });
      } else {
        results.push({ raw: mismatch, kind: 'mismatch' });
      }
    }
  }
  return best(results) ?? NO_SIGNAL;
}

// ============================================
// MATERIAL
// ============================================

export function materialMatch(values: readonly string[], targetFamilies: readonly string[]): MatchResult {
  if (targetFamilies.length === 0) return NO_SIGNAL;
  const { exact, family, mismatch } = MATCH_VALUES.material;

  const results = values.map((value): MatchResult => {
    const term = normalizeTerm(value);
    if (targetFamilies.includes(term)) return { raw: exact, kind: 'exact' };
    if (materialFamilies(term).some(f => targetFamilies.includes(f))) {
      return { raw: family, kind: 'partial' };
    }
    return { raw: mismatch, kind: 'mismatch' };
  });
  return best(results) ?? NO_SIGNAL;
}

// ============================================
// SEASON
// ============================================

export function seasonMatch(values: readonly string[], target: string | null): MatchResult {
  if (target === null) return NO_SIGNAL;
  const { exact, allSeason, adjacent, opposite } = MATCH_VALUES.season;

  const results: MatchResult[] = [];
  for (const value of values) {
    const season = canonicalSeason(value);
    if (season === null) continue;
    if (season === target) {
      results.push({ raw: exact, kind: 'exact' });
    } else if (season === 'all' || target === 'all') {
      results.push({ raw: allSeason, kind: 'compatible' });
    } else {
      const distance = seasonDistance(season, target);
      if (distance === 1) results.push({ raw: adjacent, kind: 'partial' });
      else results.push({ raw: opposite, kind: 'mismatch' });
    }
  }
  return best(results) ?? NO_SIGNAL;
}

// ============================================
// PRICE
// ============================================

/**
 * Price against budget. Sweet spot is 50-80% of budget;
 * above budget the value decays to 0 at 150%.
 */
export function priceMatch(price: number, budgetMax: number | null): MatchResult {
  if (budgetMax === null || budgetMax <= 0) return NO_SIGNAL;
  const { sweetSpot, under, nearLimit, overStart } = MATCH_VALUES.price;
  const ratio = price / budgetMax;

  if (ratio >= 0.5 && ratio <= 0.8) return { raw: sweetSpot, kind: 'exact' };
  if (ratio < 0.5) return { raw: under, kind: 'partial' };
  if (ratio <= 1) return { raw: nearLimit, kind: 'partial' };
  return { raw: Math.max(0, overStart * (1 - (ratio - 1) / 0.5)), kind: 'mismatch' };
}

// ============================================
// INTRINSIC
// ============================================

export function intrinsicMatch(value: number): MatchResult {
  return { raw: Math.min(1, Math.max(0, value)), kind: 'intrinsic' };
}
