import {
  filterCandidates,
  filterRoleRelaxed,
  findExclusionHit,
  valueMatchesExclusion,
} from '../candidate-filter';
import { createItem, createProfile } from './fixtures';

describe('filterCandidates', () => {
  it('drops out-of-stock items', () => {
    const profile = createProfile();
    const pool = filterCandidates(
      [
        createItem({ id: 'a', availability: { in_stock: false, sizes: ['m'] } }),
        createItem({ id: 'b' }),
      ],
      profile
    );

    expect(pool.by_role.top.map(item => item.id)).toEqual(['b']);
    expect(pool.dropped.unavailable).toBe(1);
  });

  it('drops items without the requested size, keeping one-size items', () => {
    const profile = createProfile({ size: 'm' });
    const pool = filterCandidates(
      [
        createItem({ id: 'small', availability: { in_stock: true, sizes: ['s'] } }),
        createItem({ id: 'medium', availability: { in_stock: true, sizes: ['s', 'M'] } }),
        createItem({
          id: 'bag',
          role: 'accessory',
          availability: { in_stock: true, sizes: ['One Size'] },
        }),
      ],
      profile
    );

    expect(pool.by_role.top.map(item => item.id)).toEqual(['medium']);
    expect(pool.by_role.accessory.map(item => item.id)).toEqual(['bag']);
    expect(pool.dropped.size).toBe(1);
  });

  it('drops hard-excluded items including material synonyms', () => {
    const profile = createProfile({ hard_exclusions: ['leather'] });
    const pool = filterCandidates(
      [
        createItem({ id: 'suede', role: 'shoes', attributes: { material: ['suede'] } }),
        createItem({ id: 'faux', role: 'outer', attributes: { material: ['faux leather'] } }),
        createItem({ id: 'cotton', attributes: { material: ['cotton'] } }),
      ],
      profile
    );

    expect(pool.by_role.shoes).toEqual([]);
    expect(pool.by_role.outer).toEqual([]);
    expect(pool.by_role.top.map(item => item.id)).toEqual(['cotton']);
    expect(pool.dropped.excluded).toBe(2);
  });

  it('drops items above the ceiling only in hard budget mode', () => {
    const items = [
      createItem({ id: 'cheap', price: 80 }),
      createItem({ id: 'pricey', price: 150 }),
    ];

    const soft = filterCandidates(items, createProfile({ budget_max: 100 }));
    expect(soft.by_role.top.map(item => item.id)).toEqual(['cheap', 'pricey']);

    const hard = filterCandidates(items, createProfile({ budget_max: 100, budget_strict: true }));
    expect(hard.by_role.top.map(item => item.id)).toEqual(['cheap']);
    expect(hard.dropped.over_budget).toBe(1);
  });

  it('groups survivors by role in input order', () => {
    const pool = filterCandidates(
      [
        createItem({ id: 't2', role: 'top' }),
        createItem({ id: 'b1', role: 'bottom' }),
        createItem({ id: 't1', role: 'top' }),
      ],
      createProfile()
    );

    expect(pool.by_role.top.map(item => item.id)).toEqual(['t2', 't1']);
    expect(pool.by_role.bottom.map(item => item.id)).toEqual(['b1']);
    expect(pool.by_role.shoes).toEqual([]);
  });
});

describe('exclusion matching', () => {
  it('matches exact values and whole-word phrases', () => {
    expect(valueMatchesExclusion('pattern', 'animal print', 'animal print')).toBe(true);
    expect(valueMatchesExclusion('style', 'leather-look', 'leather')).toBe(true);
    expect(valueMatchesExclusion('material', 'pleather', 'leather')).toBe(false);
  });

  it('matches color families on the color attribute only', () => {
    expect(valueMatchesExclusion('color', 'burgundy', 'red')).toBe(true);
    expect(valueMatchesExclusion('color', 'red', 'burgundy')).toBe(false);
    expect(valueMatchesExclusion('pattern', 'burgundy', 'red')).toBe(false);
  });

  it('is case-insensitive', () => {
    const item = createItem({ attributes: { material: ['wool'] } });
    expect(findExclusionHit(item, ['WOOL'])).toBe('WOOL');
    expect(findExclusionHit(item, ['silk'])).toBeNull();
  });
});

describe('filterRoleRelaxed', () => {
  it('ignores size and budget but keeps stock and exclusions', () => {
    const profile = createProfile({
      size: 'm',
      budget_max: 100,
      budget_strict: true,
      hard_exclusions: ['leather'],
    });
    const items = [
      createItem({ id: 'wrong-size', role: 'shoes', availability: { in_stock: true, sizes: ['l'] } }),
      createItem({ id: 'pricey', role: 'shoes', price: 180 }),
      createItem({ id: 'sold-out', role: 'shoes', availability: { in_stock: false, sizes: ['m'] } }),
      createItem({ id: 'leather', role: 'shoes', attributes: { material: ['leather'] } }),
      createItem({ id: 'top', role: 'top' }),
    ];

    const result = filterRoleRelaxed(items, 'shoes', profile);

    expect(result.items.map(item => item.id)).toEqual(['wrong-size', 'pricey']);
    expect(result.relaxed).toEqual(['budget', 'size']);
  });

  it('reports only the constraints actually bypassed', () => {
    const profile = createProfile({ size: 'm' });
    const result = filterRoleRelaxed(
      [createItem({ id: 'l', role: 'shoes', availability: { in_stock: true, sizes: ['l'] } })],
      'shoes',
      profile
    );
    expect(result.relaxed).toEqual(['size']);
  });
});
