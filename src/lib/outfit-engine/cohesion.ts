/**
 * Outfit Engine - Cohesion & Penalties
 *
 * Outfit-level adjustments on top of the item scores:
 * - Cohesion bonus from pairwise agreement (color, style, occasion/formality),
 *   each pair weighted by its lowest attribute confidence, total capped.
 * - Penalty lines for rule violations (duplicate category, formality clash,
 *   color clash, over budget, stale items).
 *
 * Clash penalties fire only when both attributes are at minConfidence or above.
 */

import type { EngineConfig } from './config';
import {
  colorRelation,
  formalityLevel,
  normalizeTerm,
  relatedOccasions,
  styleFamily,
  stylesAdjacent,
} from './vocabulary';
import type {
  CatalogItem,
  CohesionBreakdown,
  PenaltyLine,
  WeightProfile,
} from './types';

// ============================================
// ITEM HELPERS
// ============================================

export function attributeConfidence(item: CatalogItem, attribute: string): number {
  const confidence = item.attribute_confidence[attribute];
  return confidence === undefined ? 1 : Math.min(1, Math.max(0, confidence));
}

function values(item: CatalogItem, attribute: string): readonly string[] {
  return item.attributes[attribute] ?? [];
}

/**
 * Highest resolvable formality level on the item (1-5), or null.
 */
export function itemFormalityLevel(item: CatalogItem): number | null {
  let level: number | null = null;
  for (const value of values(item, 'formality')) {
    const resolved = formalityLevel(value);
    if (resolved !== null && (level === null || resolved > level)) level = resolved;
  }
  return level;
}

interface ItemPair {
  a: CatalogItem;
  b: CatalogItem;
}

function allPairs(items: readonly CatalogItem[]): ItemPair[] {
  const pairs: ItemPair[] = [];
  for (let i = 0; i < items.length; i++) {
    for (let j = i + 1; j < items.length; j++) {
      pairs.push({ a: items[i], b: items[j] });
    }
  }
  return pairs;
}

// ============================================
// PAIR AGREEMENT (0-1)
// ============================================

const COLOR_AGREEMENT = { same: 1, neutral: 0.75, compatible: 0.75, unrelated: 0.25, clash: 0 } as const;

export function colorAgreement(a: CatalogItem, b: CatalogItem): number | null {
  const colorsA = values(a, 'color');
  const colorsB = values(b, 'color');
  if (colorsA.length === 0 || colorsB.length === 0) return null;

  let best = 0;
  for (const colorA of colorsA) {
    for (const colorB of colorsB) {
      best = Math.max(best, COLOR_AGREEMENT[colorRelation(colorA, colorB)]);
    }
  }
  return best;
}

export function styleAgreement(a: CatalogItem, b: CatalogItem): number | null {
  const stylesA = values(a, 'style').map(style => styleFamily(style) ?? normalizeTerm(style));
  const stylesB = values(b, 'style').map(style => styleFamily(style) ?? normalizeTerm(style));
  if (stylesA.length === 0 || stylesB.length === 0) return null;

  let best = 0;
  for (const familyA of stylesA) {
    for (const familyB of stylesB) {
      if (familyA === familyB) return 1;
      if (stylesAdjacent(familyA, familyB)) best = Math.max(best, 0.6);
    }
  }
  return best;
}

function occasionOverlap(a: CatalogItem, b: CatalogItem): number | null {
  const occasionsA = values(a, 'occasion');
  const occasionsB = values(b, 'occasion');
  if (occasionsA.length === 0 || occasionsB.length === 0) return null;

  if (occasionsA.some(occasion => occasionsB.includes(occasion))) return 1;
  const related = occasionsA.some(occasion =>
    relatedOccasions(occasion).some(r => occasionsB.includes(r))
  ) || occasionsB.some(occasion =>
    relatedOccasions(occasion).some(r => occasionsA.includes(r))
  );
  return related ? 0.6 : 0;
}

function formalityCloseness(a: CatalogItem, b: CatalogItem): number | null {
  const levelA = itemFormalityLevel(a);
  const levelB = itemFormalityLevel(b);
  if (levelA === null || levelB === null) return null;
  return Math.max(0, 1 - Math.abs(levelA - levelB) / 3);
}

/**
 * Mean of occasion overlap and formality closeness, whichever are available.
 */
export function occasionAgreement(a: CatalogItem, b: CatalogItem): number | null {
  const parts = [occasionOverlap(a, b), formalityCloseness(a, b)].filter(
    (part): part is number => part !== null
  );
  if (parts.length === 0) return null;
  return parts.reduce((sum, part) => sum + part, 0) / parts.length;
}

function pairConfidence(pair: ItemPair, attributes: readonly string[]): number {
  let confidence = 1;
  for (const attribute of attributes) {
    const hasBoth = values(pair.a, attribute).length > 0 && values(pair.b, attribute).length > 0;
    if (!hasBoth) continue;
    confidence = Math.min(
      confidence,
      attributeConfidence(pair.a, attribute),
      attributeConfidence(pair.b, attribute)
    );
  }
  return confidence;
}

/**
 * Confidence-weighted mean agreement over the pairs that carry data.
 */
function componentScore(
  pairs: readonly ItemPair[],
  agreement: (a: CatalogItem, b: CatalogItem) => number | null,
  attributes: readonly string[]
): number {
  let total = 0;
  let counted = 0;
  for (const pair of pairs) {
    const value = agreement(pair.a, pair.b);
    if (value === null) continue;
    total += value * pairConfidence(pair, attributes);
    counted++;
  }
  return counted === 0 ? 0 : total / counted;
}

// ============================================
// COHESION
// ============================================

export function computeCohesion(
  items: readonly CatalogItem[],
  profile: WeightProfile,
  config: EngineConfig
): CohesionBreakdown {
  const pairs = allPairs(items);
  const { colorHarmonyMax, styleCoherenceMax, occasionConsistencyMax } = config.cohesion;

  const colorHarmony = colorHarmonyMax * componentScore(pairs, colorAgreement, ['color']);
  const styleCoherence = styleCoherenceMax * componentScore(pairs, styleAgreement, ['style']);
  const occasionConsistency =
    occasionConsistencyMax * componentScore(pairs, occasionAgreement, ['occasion', 'formality']);

  const uncapped = colorHarmony + styleCoherence + occasionConsistency;

  return {
    color_harmony: colorHarmony,
    style_coherence: styleCoherence,
    occasion_consistency: occasionConsistency,
    uncapped,
    applied: Math.min(uncapped, Math.max(0, profile.cohesion_bonus_cap)),
  };
}

// ============================================
// PENALTIES
// ============================================

function duplicateCategoryPenalty(
  items: readonly CatalogItem[],
  config: EngineConfig
): PenaltyLine[] {
  const firstByCategory = new Map<string, string>();
  const lines: PenaltyLine[] = [];

  for (const item of items) {
    const category = values(item, 'category')[0];
    if (category === undefined) continue;
    const firstId = firstByCategory.get(category);
    if (firstId === undefined) {
      firstByCategory.set(category, item.id);
      continue;
    }
    lines.push({
      code: 'DUPLICATE_CATEGORY',
      amount: config.penalties.duplicateCategory,
      item_ids: [firstId, item.id],
      detail: `two items of category "${category}"`,
    });
  }
  return lines;
}

function formalityClashPenalty(
  pairs: readonly ItemPair[],
  config: EngineConfig
): PenaltyLine[] {
  const { formalityClash, formalityClashGap, minConfidence } = config.penalties;
  let worst: { pair: ItemPair; gap: number } | null = null;

  for (const pair of pairs) {
    if (attributeConfidence(pair.a, 'formality') < minConfidence) continue;
    if (attributeConfidence(pair.b, 'formality') < minConfidence) continue;
    const levelA = itemFormalityLevel(pair.a);
    const levelB = itemFormalityLevel(pair.b);
    if (levelA === null || levelB === null) continue;
    const gap = Math.abs(levelA - levelB);
    if (gap >= formalityClashGap && (worst === null || gap > worst.gap)) {
      worst = { pair, gap };
    }
  }

  if (worst === null) return [];
  return [
    {
      code: 'FORMALITY_CLASH',
      amount: formalityClash,
      item_ids: [worst.pair.a.id, worst.pair.b.id],
      detail: `formality levels ${worst.gap} apart`,
    },
  ];
}

function colorClashPenalty(pairs: readonly ItemPair[], config: EngineConfig): PenaltyLine[] {
  const { colorClash, minConfidence } = config.penalties;
  const ids: string[] = [];

  for (const pair of pairs) {
    if (attributeConfidence(pair.a, 'color') < minConfidence) continue;
    if (attributeConfidence(pair.b, 'color') < minConfidence) continue;
    const clashes = values(pair.a, 'color').some(colorA =>
      values(pair.b, 'color').some(colorB => colorRelation(colorA, colorB) === 'clash')
    );
    if (!clashes) continue;
    for (const id of [pair.a.id, pair.b.id]) {
      if (!ids.includes(id)) ids.push(id);
    }
  }

  if (ids.length === 0) return [];
  return [{ code: 'COLOR_CLASH', amount: colorClash, item_ids: ids, detail: 'clashing colors' }];
}

/**
 * base + perPercent × % over, capped. Applies whenever a budget is set;
 * independent of the price weight.
 */
export function overBudgetAmount(totalPrice: number, budgetMax: number, config: EngineConfig): number {
  if (budgetMax <= 0 || totalPrice <= budgetMax) return 0;
  const { overBudgetBase, overBudgetPerPercent, overBudgetMax } = config.penalties;
  const percentOver = ((totalPrice - budgetMax) / budgetMax) * 100;
  return Math.min(overBudgetMax, overBudgetBase + overBudgetPerPercent * percentOver);
}

function overBudgetPenalty(
  items: readonly CatalogItem[],
  profile: WeightProfile,
  config: EngineConfig
): PenaltyLine[] {
  const budgetMax = profile.constraints.budget_max;
  if (budgetMax === null) return [];
  const total = items.reduce((sum, item) => sum + item.price, 0);
  const amount = overBudgetAmount(total, budgetMax, config);
  if (amount === 0) return [];
  return [
    {
      code: 'OVER_BUDGET',
      amount,
      item_ids: items.map(item => item.id),
      detail: `total ${total} over budget ${budgetMax}`,
    },
  ];
}

function staleItemsPenalty(
  items: readonly CatalogItem[],
  profile: WeightProfile,
  config: EngineConfig
): PenaltyLine[] {
  const { staleItems, staleRecencyThreshold, freshnessWeightThreshold } = config.penalties;
  if (profile.weights.recency < freshnessWeightThreshold) return [];

  const stale = items.filter(
    item => item.recency_score !== undefined && item.recency_score < staleRecencyThreshold
  );
  if (stale.length === 0) return [];
  return [
    {
      code: 'STALE_ITEMS',
      amount: staleItems,
      item_ids: stale.map(item => item.id),
      detail: `${stale.length} stale item(s)`,
    },
  ];
}

export function computePenalties(
  items: readonly CatalogItem[],
  profile: WeightProfile,
  config: EngineConfig
): PenaltyLine[] {
  const pairs = allPairs(items);
  return [
    ...duplicateCategoryPenalty(items, config),
    ...formalityClashPenalty(pairs, config),
    ...colorClashPenalty(pairs, config),
    ...overBudgetPenalty(items, profile, config),
    ...staleItemsPenalty(items, profile, config),
  ];
}
