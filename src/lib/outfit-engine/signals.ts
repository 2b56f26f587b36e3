/**
 * Outfit Engine - Dimension Signal Computation
 *
 * Computes one signal per dimension for an item against the resolved targets.
 * Each signal carries a raw value in [0, 1] and a "known" flag.
 * Unknown = attribute absent on the item; the scorer drops it from the denominator.
 */

import { DIMENSION_ATTRIBUTE } from './config';
import {
  NO_SIGNAL,
  categoryMatch,
  colorMatch,
  formalityMatch,
  intrinsicMatch,
  materialMatch,
  occasionMatch,
  priceMatch,
  seasonMatch,
  styleMatch,
} from './utils';
import type { MatchResult } from './utils';
import type {
  CatalogItem,
  Dimension,
  DimensionSignal,
  ResolvedTargets,
  WeightProfile,
} from './types';

export type ItemSignals = Record<Dimension, DimensionSignal>;

const UNKNOWN: DimensionSignal = { raw: NO_SIGNAL.raw, known: false, kind: 'neutral' };

function known(result: MatchResult): DimensionSignal {
  return { raw: result.raw, known: true, kind: result.kind };
}

function attributeValues(item: CatalogItem, dimension: Dimension): readonly string[] {
  const attribute = DIMENSION_ATTRIBUTE[dimension];
  if (!attribute) return [];
  return item.attributes[attribute] ?? [];
}

/**
 * Category preference for a role: activity-specific list (strict) plus
 * explicit intent categories (lenient, they may target another role).
 */
function computeCategorySignal(
  item: CatalogItem,
  values: readonly string[],
  targets: ResolvedTargets
): MatchResult {
  const activityCategories = targets.categories_by_role[item.role] ?? [];
  if (activityCategories.length > 0) {
    const preferred = [...activityCategories, ...targets.categories];
    return categoryMatch(values, preferred, true);
  }
  return categoryMatch(values, targets.categories, false);
}

/**
 * Compute all dimension signals for one item.
 */
export function computeItemSignals(item: CatalogItem, profile: WeightProfile): ItemSignals {
  const { targets, constraints } = profile;

  const fromAttribute = (
    dimension: Dimension,
    match: (values: readonly string[]) => MatchResult
  ): DimensionSignal => {
    const values = attributeValues(item, dimension);
    return values.length > 0 ? known(match(values)) : UNKNOWN;
  };

  return {
    occasion: fromAttribute('occasion', values =>
      occasionMatch(values, targets.occasions, targets.related_occasions)
    ),
    category: fromAttribute('category', values => computeCategorySignal(item, values, targets)),
    formality: fromAttribute('formality', values => formalityMatch(values, targets.formality_level)),
    style: fromAttribute('style', values => styleMatch(values, targets.styles)),
    color: fromAttribute('color', values => colorMatch(values, targets.palette)),
    material: fromAttribute('material', values => materialMatch(values, targets.materials)),
    season: fromAttribute('season', values => seasonMatch(values, targets.season)),
    popularity:
      item.popularity_score !== undefined ? known(intrinsicMatch(item.popularity_score)) : UNKNOWN,
    recency: item.recency_score !== undefined ? known(intrinsicMatch(item.recency_score)) : UNKNOWN,
    price: known(priceMatch(item.price, constraints.budget_max)),
  };
}
