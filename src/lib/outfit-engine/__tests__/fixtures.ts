/**
 * Shared test helpers for the outfit engine suites.
 */

import { DEFAULT_ENGINE_CONFIG } from '../config';
import type { EngineConfig } from '../config';
import { filterCandidates } from '../candidate-filter';
import { scoreCandidatePool } from '../scoring';
import { resolveWeightProfile } from '../weights';
import type {
  CatalogItem,
  Intent,
  OutfitCandidate,
  ScoredPool,
  WeightProfile,
} from '../types';

export function createItem(overrides: Partial<CatalogItem> = {}): CatalogItem {
  return {
    id: 'item-1',
    role: 'top',
    price: 100,
    availability: { in_stock: true, sizes: ['m'] },
    attributes: {},
    attribute_confidence: {},
    ...overrides,
  };
}

export function createIntent(overrides: Partial<Intent> = {}): Intent {
  return {
    objectives: [],
    formality: 'unspecified',
    hard_exclusions: [],
    ...overrides,
  };
}

export function createProfile(
  overrides: Partial<Intent> = {},
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): WeightProfile {
  return resolveWeightProfile(createIntent(overrides), config);
}

export function createScoredPool(items: CatalogItem[], profile: WeightProfile): ScoredPool {
  return scoreCandidatePool(filterCandidates(items, profile), profile);
}

export function createOutfit(overrides: Partial<OutfitCandidate> = {}): OutfitCandidate {
  return {
    id: 'outfit-1',
    track: 'standard',
    items: [],
    score: 50,
    total_price: 100,
    min_item_score: 40,
    is_partial: false,
    missing_roles: [],
    breakdown: {
      items: [],
      base_score: 50,
      cohesion: {
        color_harmony: 0,
        style_coherence: 0,
        occasion_consistency: 0,
        uncapped: 0,
        applied: 0,
      },
      penalties: [],
      penalty_total: 0,
      unclipped_score: 50,
    },
    highlights: [],
    sequence: 0,
    ...overrides,
  };
}

/**
 * A small, complete catalog: 2 tops, 2 bottoms, 2 shoes, 1 outer, 2 accessories.
 */
export function createBasicCatalog(): CatalogItem[] {
  return [
    createItem({
      id: 'top-1',
      role: 'top',
      price: 60,
      attributes: { color: ['black'], style: ['classic'], occasion: ['work'], category: ['blouse'] },
    }),
    createItem({
      id: 'top-2',
      role: 'top',
      price: 40,
      attributes: { color: ['red'], style: ['casual'], occasion: ['weekend'], category: ['t-shirt'] },
    }),
    createItem({
      id: 'bottom-1',
      role: 'bottom',
      price: 80,
      attributes: { color: ['navy'], style: ['tailored'], occasion: ['work'], category: ['trousers'] },
    }),
    createItem({
      id: 'bottom-2',
      role: 'bottom',
      price: 50,
      attributes: { color: ['blue'], style: ['relaxed'], occasion: ['weekend'], category: ['jeans'] },
    }),
    createItem({
      id: 'shoes-1',
      role: 'shoes',
      price: 90,
      attributes: { color: ['black'], style: ['classic'], occasion: ['work'], category: ['loafers'] },
    }),
    createItem({
      id: 'shoes-2',
      role: 'shoes',
      price: 70,
      attributes: { color: ['white'], style: ['casual'], occasion: ['weekend'], category: ['sneakers'] },
    }),
    createItem({
      id: 'outer-1',
      role: 'outer',
      price: 150,
      attributes: { color: ['camel'], style: ['classic'], occasion: ['work'], category: ['coat'] },
    }),
    createItem({
      id: 'acc-1',
      role: 'accessory',
      price: 30,
      attributes: { color: ['black'], style: ['minimal'], category: ['belt'] },
    }),
    createItem({
      id: 'acc-2',
      role: 'accessory',
      price: 25,
      attributes: { color: ['grey'], style: ['casual'], category: ['scarf'] },
    }),
  ];
}
