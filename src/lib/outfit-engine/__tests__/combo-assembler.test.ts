/**
 * Combo Assembler Test Suite
 */

import { DEFAULT_ENGINE_CONFIG, mergeEngineConfig } from '../config';
import {
  assembleOutfits,
  evaluateOutfit,
  outfitId,
  selectTopCandidates,
} from '../combo-assembler';
import type { Role, TrackPlan } from '../types';
import {
  createBasicCatalog,
  createItem,
  createProfile,
  createScoredPool,
} from './fixtures';

const STANDARD: TrackPlan = { track: 'standard', roles: ['top', 'bottom', 'shoes'], missing_roles: [] };

function occasionItem(id: string, role: Role, occasion: string, price = 100) {
  return createItem({ id, role, price, attributes: { occasion: [occasion] } });
}

describe('evaluateOutfit', () => {
  // Only price applies: items carry no attributes
  const profile = createProfile({ budget_max: 1000 });
  const pool = createScoredPool(
    [
      createItem({ id: 'shoes', role: 'shoes', price: 200 }),
      createItem({ id: 'top', role: 'top', price: 600 }),
      createItem({ id: 'bottom', role: 'bottom', price: 100 }),
    ],
    profile
  );

  const outfit = evaluateOutfit(
    {
      track: 'standard',
      members: [pool.shoes[0], pool.top[0], pool.bottom[0]],
      missingRoles: [],
      sequence: 3,
    },
    profile,
    DEFAULT_ENGINE_CONFIG
  );

  it('orders items by canonical role', () => {
    expect(outfit.items.map(entry => entry.role)).toEqual(['top', 'bottom', 'shoes']);
  });

  it('builds the id from sorted item ids', () => {
    expect(outfit.id).toBe('bottom+shoes+top');
  });

  it('scores the role-weighted mean plus cohesion minus penalties', () => {
    // (1 × 100 + 1 × 80 + 0.8 × 80) / 2.8
    expect(outfit.breakdown.base_score).toBeCloseTo(87.142857, 5);
    expect(outfit.breakdown.cohesion.applied).toBe(0);
    expect(outfit.breakdown.penalties).toEqual([]);
    expect(outfit.score).toBeCloseTo(87.142857, 5);
  });

  it('reports price, minimum item score and sequence', () => {
    expect(outfit.total_price).toBe(900);
    expect(outfit.min_item_score).toBeCloseTo(80, 6);
    expect(outfit.sequence).toBe(3);
    expect(outfit.is_partial).toBe(false);
  });

  it('highlights budget fit and the dominant dimension', () => {
    expect(outfit.highlights).toEqual(['WITHIN_BUDGET', 'PRICE_MATCH']);
  });
});

describe('outfitId', () => {
  it('does not depend on input order', () => {
    expect(outfitId(['b', 'a', 'c'])).toBe(outfitId(['c', 'b', 'a']));
    expect(outfitId(['b', 'a', 'c'])).toBe('a+b+c');
  });
});

describe('selectTopCandidates', () => {
  const profile = createProfile({ occasion: 'work' });

  it('keeps the best M by score, then price', () => {
    const pool = createScoredPool(
      [
        occasionItem('weak', 'top', 'brunch'),
        occasionItem('strong-pricey', 'top', 'work', 120),
        occasionItem('strong-cheap', 'top', 'work', 80),
      ],
      profile
    );
    expect(selectTopCandidates(pool.top, 2).map(c => c.item.id)).toEqual([
      'strong-cheap',
      'strong-pricey',
    ]);
  });

  it('skips unrankable items when rankable ones exist', () => {
    const pool = createScoredPool(
      [createItem({ id: 'bare', price: 10 }), occasionItem('brunch-top', 'top', 'brunch')],
      profile
    );
    expect(selectTopCandidates(pool.top, 6).map(c => c.item.id)).toEqual(['brunch-top']);
  });

  it('falls back to unrankable items by price and order', () => {
    const pool = createScoredPool(
      [
        createItem({ id: 'b', price: 30 }),
        createItem({ id: 'a', price: 20 }),
        createItem({ id: 'c', price: 30 }),
      ],
      profile
    );
    expect(selectTopCandidates(pool.top, 6).map(c => c.item.id)).toEqual(['a', 'b', 'c']);
  });
});

describe('assembleOutfits', () => {
  const profile = createProfile({ occasion: 'work' });
  const noOptional = mergeEngineConfig(DEFAULT_ENGINE_CONFIG, { assembly: { optionalRoles: [] } });

  it('evaluates the full cross product of the core roles', () => {
    const scored = createScoredPool(createBasicCatalog(), profile);
    const result = assembleOutfits(scored, [STANDARD], profile, noOptional);

    expect(result.combinations_evaluated).toBe(8);
    expect(result.outfits).toHaveLength(8);
    expect(new Set(result.outfits.map(outfit => outfit.id)).size).toBe(8);
  });

  it('stops at maxCombinations', () => {
    const config = mergeEngineConfig(noOptional, { assembly: { maxCombinations: 5 } });
    const scored = createScoredPool(createBasicCatalog(), profile);
    const result = assembleOutfits(scored, [STANDARD], profile, config);

    expect(result.combinations_evaluated).toBe(5);
    expect(result.outfits).toHaveLength(5);
  });

  it('limits each role to the top M candidates', () => {
    const config = mergeEngineConfig(noOptional, { assembly: { topMPerRole: 1 } });
    const scored = createScoredPool(createBasicCatalog(), profile);
    const result = assembleOutfits(scored, [STANDARD], profile, config);

    expect(result.combinations_evaluated).toBe(1);
    expect(result.outfits[0].id).toBe('bottom-1+shoes-1+top-1');
  });

  it('drops outfits above a hard budget ceiling', () => {
    const hard = createProfile({ occasion: 'work', budget_max: 200, budget_strict: true });
    const scored = createScoredPool(createBasicCatalog(), hard);
    const result = assembleOutfits(scored, [STANDARD], hard, DEFAULT_ENGINE_CONFIG);

    expect(result.combinations_evaluated).toBe(8);
    expect(result.outfits).toHaveLength(5);
    for (const outfit of result.outfits) {
      expect(outfit.total_price).toBeLessThanOrEqual(200);
    }
  });

  it('keeps over-ceiling outfits once the budget was relaxed', () => {
    const hard = createProfile({ occasion: 'work', budget_max: 200, budget_strict: true });
    const scored = createScoredPool(createBasicCatalog(), hard);
    const result = assembleOutfits(scored, [STANDARD], hard, noOptional, { relaxed: ['budget'] });

    expect(result.outfits).toHaveLength(8);
  });

  it('adds optional items only while they raise the score, up to the accessory cap', () => {
    const scored = createScoredPool(
      [
        occasionItem('top', 'top', 'work'),
        occasionItem('bottom', 'bottom', 'work'),
        occasionItem('shoes', 'shoes', 'office'),
        occasionItem('acc-a', 'accessory', 'work', 10),
        occasionItem('acc-b', 'accessory', 'work', 20),
        occasionItem('acc-c', 'accessory', 'work', 30),
      ],
      profile
    );
    const [outfit] = assembleOutfits(scored, [STANDARD], profile, DEFAULT_ENGINE_CONFIG).outfits;

    expect(outfit.id).toBe('acc-a+acc-b+bottom+shoes+top');
    expect(outfit.items.map(entry => entry.role)).toEqual([
      'top',
      'bottom',
      'shoes',
      'accessory',
      'accessory',
    ]);
    // base (300 + 0.4 × 100) / 3.6, occasion cohesion 8 × 8.4 / 10
    expect(outfit.score).toBeCloseTo(94.444 + 6.72, 2);
  });

  it('does not add an optional item that leaves the score unchanged', () => {
    const scored = createScoredPool(
      [
        occasionItem('top', 'top', 'work'),
        occasionItem('bottom', 'bottom', 'work'),
        occasionItem('shoes', 'shoes', 'work'),
        occasionItem('acc', 'accessory', 'work'),
      ],
      profile
    );
    const [outfit] = assembleOutfits(scored, [STANDARD], profile, DEFAULT_ENGINE_CONFIG).outfits;

    expect(outfit.id).toBe('bottom+shoes+top');
    expect(outfit.score).toBeCloseTo(108, 6);
  });

  it('assembles the dress track from a dress and shoes', () => {
    const scored = createScoredPool(
      [occasionItem('dress', 'dress', 'work'), occasionItem('shoes', 'shoes', 'work')],
      profile
    );
    const plan: TrackPlan = { track: 'dress', roles: ['dress', 'shoes'], missing_roles: [] };
    const [outfit] = assembleOutfits(scored, [plan], profile, noOptional).outfits;

    expect(outfit.track).toBe('dress');
    expect(outfit.items.map(entry => entry.role)).toEqual(['dress', 'shoes']);
  });

  it('marks outfits from a track with omitted roles as partial', () => {
    const scored = createScoredPool(
      [occasionItem('top', 'top', 'work'), occasionItem('bottom', 'bottom', 'work')],
      profile
    );
    const plan: TrackPlan = { track: 'standard', roles: ['top', 'bottom'], missing_roles: ['shoes'] };
    const [outfit] = assembleOutfits(scored, [plan], profile, noOptional).outfits;

    expect(outfit.is_partial).toBe(true);
    expect(outfit.missing_roles).toEqual(['shoes']);
  });

  it('never repeats an item within an outfit', () => {
    const scored = createScoredPool(createBasicCatalog(), profile);
    for (const outfit of assembleOutfits(scored, [STANDARD], profile, DEFAULT_ENGINE_CONFIG).outfits) {
      const ids = outfit.items.map(entry => entry.item.id);
      expect(new Set(ids).size).toBe(ids.length);
    }
  });
});
