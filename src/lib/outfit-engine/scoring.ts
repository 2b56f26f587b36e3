/**
 * Outfit Engine - Item Scoring Module
 *
 * score = 100 × Σ(raw × confidence × weight) / Σ(applied weight)
 *
 * A dimension applies when its weight is positive and the item carries the
 * attribute. Absent attributes leave the denominator; low-confidence ones stay in it.
 */

import { DIMENSIONS, DIMENSION_ATTRIBUTE, ROLES, createRoleRecord } from './config';
import { computeItemSignals } from './signals';
import type {
  CandidatePool,
  CatalogItem,
  Dimension,
  DimensionContribution,
  ItemScore,
  ScoredCandidate,
  ScoredPool,
  WeightProfile,
} from './types';

// ============================================
// CONFIDENCE
// ============================================

/**
 * Confidence for a dimension: the attribute's confidence, 1 when missing.
 * Intrinsic dimensions (popularity, recency, price) are always 1.
 */
export function dimensionConfidence(item: CatalogItem, dimension: Dimension): number {
  const attribute = DIMENSION_ATTRIBUTE[dimension];
  if (!attribute) return 1;
  const confidence = item.attribute_confidence[attribute];
  if (confidence === undefined) return 1;
  return Math.min(1, Math.max(0, confidence));
}

// ============================================
// ITEM SCORE
// ============================================

/**
 * Score one item against the weight profile (0-100).
 * Items with no applicable dimension score 0 and are unrankable.
 */
export function scoreItem(item: CatalogItem, profile: WeightProfile): ItemScore {
  const signals = computeItemSignals(item, profile);
  const dimensions: DimensionContribution[] = [];

  let weighted = 0;
  let appliedWeight = 0;

  for (const dimension of DIMENSIONS) {
    const signal = signals[dimension];
    const weight = profile.weights[dimension];
    const confidence = dimensionConfidence(item, dimension);
    const applied = signal.known && weight > 0;
    const contribution = applied ? signal.raw * confidence * weight : 0;

    if (applied) {
      weighted += contribution;
      appliedWeight += weight;
    }

    dimensions.push({
      dimension,
      raw: signal.raw,
      weight,
      confidence,
      contribution,
      applied,
      kind: signal.kind,
    });
  }

  const rankable = appliedWeight > 0;
  const score = rankable ? (100 * weighted) / appliedWeight : 0;

  return {
    item_id: item.id,
    role: item.role,
    score: Math.min(100, Math.max(0, score)),
    applied_weight: appliedWeight,
    rankable,
    dimensions,
  };
}

/**
 * Score every candidate in the pool, preserving filtered order.
 */
export function scoreCandidatePool(pool: CandidatePool, profile: WeightProfile): ScoredPool {
  const scored: ScoredPool = createRoleRecord<ScoredCandidate[]>(() => []);
  for (const role of ROLES) {
    scored[role] = pool.by_role[role].map((item, order) => ({
      item,
      score: scoreItem(item, profile),
      order,
    }));
  }
  return scored;
}

// ============================================
// EXPLAINABILITY
// ============================================

/**
 * Dimension contributing most to the score (null when nothing applied).
 */
export function getDominantDimension(score: ItemScore): Dimension | null {
  let dominant: DimensionContribution | null = null;
  for (const entry of score.dimensions) {
    if (!entry.applied) continue;
    if (dominant === null || entry.contribution > dominant.contribution) dominant = entry;
  }
  return dominant ? dominant.dimension : null;
}
