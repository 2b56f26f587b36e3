import { DEFAULT_ENGINE_CONFIG } from '../config';
import {
  colorAgreement,
  computeCohesion,
  computePenalties,
  occasionAgreement,
  overBudgetAmount,
  styleAgreement,
} from '../cohesion';
import type { CatalogItem } from '../types';
import { createItem, createProfile } from './fixtures';

const config = DEFAULT_ENGINE_CONFIG;
const profile = createProfile();

function blackClassicWork(id: string, role: CatalogItem['role']): CatalogItem {
  return createItem({
    id,
    role,
    attributes: { color: ['black'], style: ['classic'], occasion: ['work'] },
  });
}

describe('pair agreement', () => {
  it('rates colors by relation', () => {
    const black = createItem({ attributes: { color: ['black'] } });
    const white = createItem({ attributes: { color: ['white'] } });
    const red = createItem({ attributes: { color: ['red'] } });
    const pink = createItem({ attributes: { color: ['pink'] } });
    const plain = createItem();

    expect(colorAgreement(black, black)).toBe(1);
    expect(colorAgreement(black, white)).toBe(0.75);
    expect(colorAgreement(red, pink)).toBe(0);
    expect(colorAgreement(black, plain)).toBeNull();
  });

  it('rates styles by family', () => {
    const classic = createItem({ attributes: { style: ['classic'] } });
    const tailored = createItem({ attributes: { style: ['tailored'] } });
    const casual = createItem({ attributes: { style: ['casual'] } });
    const athletic = createItem({ attributes: { style: ['athletic'] } });

    expect(styleAgreement(classic, tailored)).toBe(1);
    expect(styleAgreement(casual, athletic)).toBe(0.6);
    expect(styleAgreement(classic, athletic)).toBe(0);
  });

  it('averages occasion overlap and formality closeness', () => {
    const a = createItem({ attributes: { occasion: ['work'], formality: ['business'] } });
    const b = createItem({ attributes: { occasion: ['office'], formality: ['casual'] } });

    // (0.6 + (1 - 2 / 3)) / 2
    expect(occasionAgreement(a, b)).toBeCloseTo(0.4667, 4);
  });
});

describe('computeCohesion', () => {
  it('caps the bonus at the configured cap', () => {
    const items = [
      blackClassicWork('a', 'top'),
      blackClassicWork('b', 'bottom'),
      blackClassicWork('c', 'shoes'),
    ];
    const cohesion = computeCohesion(items, profile, config);

    expect(cohesion.color_harmony).toBe(10);
    expect(cohesion.style_coherence).toBe(8);
    expect(cohesion.occasion_consistency).toBe(8);
    expect(cohesion.uncapped).toBe(26);
    expect(cohesion.applied).toBe(20);
  });

  it('weights each pair by its lowest attribute confidence', () => {
    const a = createItem({ id: 'a', attributes: { color: ['black'] } });
    const b = createItem({
      id: 'b',
      role: 'bottom',
      attributes: { color: ['black'] },
      attribute_confidence: { color: 0.5 },
    });
    expect(computeCohesion([a, b], profile, config).color_harmony).toBe(5);
  });

  it('is zero for a single item', () => {
    expect(computeCohesion([blackClassicWork('a', 'top')], profile, config).applied).toBe(0);
  });
});

describe('computePenalties', () => {
  it('penalizes a formality clash once', () => {
    const gown = createItem({ id: 'gown', role: 'dress', attributes: { formality: ['formal'] } });
    const sneakers = createItem({
      id: 'sneakers',
      role: 'shoes',
      attributes: { formality: ['athleisure'] },
    });

    expect(computePenalties([gown, sneakers], profile, config)).toEqual([
      {
        code: 'FORMALITY_CLASH',
        amount: 15,
        item_ids: ['gown', 'sneakers'],
        detail: 'formality levels 4 apart',
      },
    ]);
  });

  it('ignores a clash on low-confidence attributes', () => {
    const gown = createItem({
      id: 'gown',
      role: 'dress',
      attributes: { formality: ['formal'] },
      attribute_confidence: { formality: 0.4 },
    });
    const sneakers = createItem({
      id: 'sneakers',
      role: 'shoes',
      attributes: { formality: ['athleisure'] },
    });
    expect(computePenalties([gown, sneakers], profile, config)).toEqual([]);
  });

  it('penalizes a repeated category', () => {
    const belt1 = createItem({ id: 'belt-1', role: 'accessory', attributes: { category: ['belt'] } });
    const belt2 = createItem({ id: 'belt-2', role: 'accessory', attributes: { category: ['belt'] } });

    const [line] = computePenalties([belt1, belt2], profile, config);
    expect(line.code).toBe('DUPLICATE_CATEGORY');
    expect(line.amount).toBe(15);
    expect(line.item_ids).toEqual(['belt-1', 'belt-2']);
  });

  it('penalizes clashing colors', () => {
    const red = createItem({ id: 'red', attributes: { color: ['red'] } });
    const pink = createItem({ id: 'pink', role: 'bottom', attributes: { color: ['blush'] } });

    expect(computePenalties([red, pink], profile, config)).toEqual([
      { code: 'COLOR_CLASH', amount: 4, item_ids: ['red', 'pink'], detail: 'clashing colors' },
    ]);
  });

  it('penalizes an outfit over budget', () => {
    const budgetProfile = createProfile({ budget_max: 100 });
    const items = [
      createItem({ id: 'a', price: 60 }),
      createItem({ id: 'b', role: 'bottom', price: 60 }),
    ];
    const [line] = computePenalties(items, budgetProfile, config);

    expect(line.code).toBe('OVER_BUDGET');
    // 3 + 0.2 × 20%
    expect(line.amount).toBeCloseTo(7, 6);
    expect(line.detail).toBe('total 120 over budget 100');
  });

  it('penalizes stale items only when freshness is weighted', () => {
    const stale = createItem({ id: 'old', recency_score: 0.1 });
    const fresh = createItem({ id: 'new', role: 'bottom', recency_score: 0.9 });

    expect(computePenalties([stale, fresh], profile, config)).toEqual([]);

    const freshnessProfile = createProfile({ objectives: ['promote_new_arrivals'] });
    expect(computePenalties([stale, fresh], freshnessProfile, config)).toEqual([
      { code: 'STALE_ITEMS', amount: 3, item_ids: ['old'], detail: '1 stale item(s)' },
    ]);
  });
});

describe('overBudgetAmount', () => {
  it('grows with the overage and is capped', () => {
    expect(overBudgetAmount(3000, 3000, config)).toBe(0);
    expect(overBudgetAmount(3030, 3000, config)).toBeCloseTo(3.2, 6);
    expect(overBudgetAmount(3500, 3000, config)).toBeCloseTo(6.333, 3);
    expect(overBudgetAmount(6000, 3000, config)).toBe(15);
  });
});
