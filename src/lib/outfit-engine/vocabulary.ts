/**
 * Outfit Engine - Vocabulary
 *
 * Term tables (colors, materials, styles, occasions, activities) live in
 * data/vocabulary.json and are validated once at load time.
 * Every lookup here is pure and case-insensitive.
 */

import { z } from 'zod';

import vocabularyJson from './data/vocabulary.json';
import { isRole } from './config';
import type { Role } from './types';

// ============================================
// SCHEMA
// ============================================

const TermListSchema = z.array(z.string().min(1));
const FamilyMapSchema = z.record(TermListSchema);
const PairListSchema = z.array(z.tuple([z.string(), z.string()]));

const ActivityProfileSchema = z.object({
  performance: z.boolean(),
  materials: TermListSchema,
  categories: z.record(TermListSchema),
  formality: z.string(),
  occasions: TermListSchema,
  styles: TermListSchema,
});

const ObjectiveSchema = z.object({
  styles: TermListSchema.optional(),
  materials: TermListSchema.optional(),
  palette: TermListSchema.optional(),
});

const VocabularySchema = z.object({
  version: z.literal(1),
  colors: z.object({
    families: FamilyMapSchema,
    neutrals: TermListSchema,
    compatible: FamilyMapSchema,
    clashes: PairListSchema,
    palettes: FamilyMapSchema,
  }),
  materials: z.object({ families: FamilyMapSchema }),
  styles: z.object({ families: FamilyMapSchema, adjacent: PairListSchema }),
  occasions: z.object({ related: FamilyMapSchema, formal: TermListSchema }),
  formality: z.object({ levels: z.record(z.number().int().min(1).max(5)) }),
  seasons: z.object({ order: TermListSchema, aliases: z.record(z.string()) }),
  activities: z.record(ActivityProfileSchema),
  objectives: z.record(ObjectiveSchema),
});

export type ActivityProfile = z.infer<typeof ActivityProfileSchema>;
export type ObjectiveImplication = z.infer<typeof ObjectiveSchema>;

const VOCABULARY = VocabularySchema.parse(vocabularyJson);

// ============================================
// TERM HELPERS
// ============================================

export function normalizeTerm(term: string): string {
  return term.trim().toLowerCase().replace(/[_\s]+/g, ' ');
}

/**
 * Table lookup that only sees the table's own keys, so terms like
 * "constructor" never resolve to Object.prototype members.
 */
export function lookupOwn<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

export function tokenize(term: string): string[] {
  return normalizeTerm(term)
    .split(/[^a-z0-9]+/)
    .filter(token => token.length > 0);
}

/**
 * Build term → family lookup. A term may belong to several families
 * (e.g. "denim" is both a color and a material, "jersey" spans families).
 */
function buildReverseIndex(families: Record<string, string[]>): Map<string, string[]> {
  const index = new Map<string, string[]>();
  for (const [family, terms] of Object.entries(families)) {
    for (const term of [family, ...terms]) {
      const key = normalizeTerm(term);
      const existing = index.get(key);
      if (existing) {
        if (!existing.includes(family)) existing.push(family);
      } else {
        index.set(key, [family]);
      }
    }
  }
  return index;
}

/**
 * Families for a free-text value: exact phrase first, then each token.
 */
function lookupFamilies(index: Map<string, string[]>, value: string): string[] {
  const normalized = normalizeTerm(value);
  const exact = index.get(normalized);
  if (exact) return exact;

  const found: string[] = [];
  for (const token of tokenize(normalized)) {
    for (const family of index.get(token) ?? []) {
      if (!found.includes(family)) found.push(family);
    }
  }
  return found;
}

function pairKey(a: string, b: string): string {
  return [a, b].sort().join('|');
}

function buildPairSet(pairs: [string, string][]): Set<string> {
  return new Set(pairs.map(([a, b]) => pairKey(a, b)));
}

// ============================================
// COLORS
// ============================================

const COLOR_INDEX = buildReverseIndex(VOCABULARY.colors.families);
const NEUTRAL_FAMILIES = new Set(VOCABULARY.colors.neutrals);
const COLOR_CLASHES = buildPairSet(VOCABULARY.colors.clashes);

export function colorFamily(color: string): string | null {
  return lookupFamilies(COLOR_INDEX, color)[0] ?? null;
}

export function isNeutralColor(color: string): boolean {
  const family = colorFamily(color);
  return family !== null && NEUTRAL_FAMILIES.has(family);
}

/**
 * Expand palette keywords ("dark", "pastel") into color terms.
 * Plain color terms pass through unchanged. Order is preserved, duplicates removed.
 */
export function expandPalette(terms: readonly string[]): string[] {
  const expanded: string[] = [];
  for (const raw of terms) {
    const term = normalizeTerm(raw);
    const members = lookupOwn(VOCABULARY.colors.palettes, term) ?? [term];
    for (const member of members) {
      if (!expanded.includes(member)) expanded.push(member);
    }
  }
  return expanded;
}

export type ColorRelation = 'same' | 'neutral' | 'compatible' | 'clash' | 'unrelated';

export function colorRelation(a: string, b: string): ColorRelation {
  const familyA = colorFamily(a);
  const familyB = colorFamily(b);
  if (familyA === null || familyB === null) {
    return normalizeTerm(a) === normalizeTerm(b) ? 'same' : 'unrelated';
  }
  if (familyA === familyB) return 'same';
  if (COLOR_CLASHES.has(pairKey(familyA, familyB))) return 'clash';
  if (NEUTRAL_FAMILIES.has(familyA) || NEUTRAL_FAMILIES.has(familyB)) return 'neutral';

  const compatible = VOCABULARY.colors.compatible;
  if (
    lookupOwn(compatible, familyA)?.includes(familyB) ||
    lookupOwn(compatible, familyB)?.includes(familyA)
  ) {
    return 'compatible';
  }
  return 'unrelated';
}

// ============================================
// MATERIALS
// ============================================

const MATERIAL_INDEX = buildReverseIndex(VOCABULARY.materials.families);

/**
 * Material families for a value like "cotton-spandex blend" → ['cotton', 'stretch'].
 */
export function materialFamilies(material: string): string[] {
  return lookupFamilies(MATERIAL_INDEX, material);
}

// ============================================
// STYLES
// ============================================

const STYLE_INDEX = buildReverseIndex(VOCABULARY.styles.families);
const STYLE_ADJACENCY = buildPairSet(VOCABULARY.styles.adjacent);

export function styleFamily(style: string): string | null {
  return lookupFamilies(STYLE_INDEX, style)[0] ?? null;
}

export function stylesAdjacent(familyA: string, familyB: string): boolean {
  return STYLE_ADJACENCY.has(pairKey(familyA, familyB));
}

// ============================================
// OCCASIONS
// ============================================

const FORMAL_OCCASIONS = new Set(VOCABULARY.occasions.formal.map(normalizeTerm));

export function relatedOccasions(occasion: string): string[] {
  return lookupOwn(VOCABULARY.occasions.related, normalizeTerm(occasion)) ?? [];
}

export function isFormalOccasion(occasion: string): boolean {
  return FORMAL_OCCASIONS.has(normalizeTerm(occasion));
}

// ============================================
// FORMALITY
// ============================================

/**
 * Formality level (1-5 scale)
 * 1 = athleisure, 2 = casual, 3 = smart casual, 4 = elevated/business, 5 = formal/evening
 */
export function formalityLevel(term: string): number | null {
  const normalized = normalizeTerm(term);
  return lookupOwn(VOCABULARY.formality.levels, normalized) ?? null;
}

// ============================================
// SEASONS
// ============================================

/**
 * Canonical season ('spring' | 'summer' | 'fall' | 'winter' | 'all') or null.
 */
export function canonicalSeason(term: string): string | null {
  const normalized = normalizeTerm(term);
  const alias = lookupOwn(VOCABULARY.seasons.aliases, normalized);
  if (alias) return alias;
  return VOCABULARY.seasons.order.includes(normalized) ? normalized : null;
}

/**
 * Circular distance between two canonical seasons (0-2).
 */
export function seasonDistance(a: string, b: string): number | null {
  const order = VOCABULARY.seasons.order;
  const ia = order.indexOf(a);
  const ib = order.indexOf(b);
  if (ia < 0 || ib < 0) return null;
  const diff = Math.abs(ia - ib);
  return Math.min(diff, order.length - diff);
}

// ============================================
// ACTIVITIES & OBJECTIVES
// ============================================

/**
 * Activity profile by exact key, then by containment
 * ("hot yoga" → yoga, "run" ⊂ "running").
 */
export function activityProfile(activity: string): ActivityProfile | null {
  const normalized = normalizeTerm(activity);
  const activities = VOCABULARY.activities;
  const exact = lookupOwn(activities, normalized);
  if (exact) return exact;

  if (normalized.length < 3) return null;

  for (const [key, profile] of Object.entries(activities)) {
    if (normalized.includes(key) || key.includes(normalized)) {
      return profile;
    }
  }
  return null;
}

export function activityCategoriesByRole(profile: ActivityProfile): Partial<Record<Role, string[]>> {
  const byRole: Partial<Record<Role, string[]>> = {};
  for (const [role, categories] of Object.entries(profile.categories)) {
    if (isRole(role)) byRole[role] = categories.map(normalizeTerm);
  }
  return byRole;
}

export function objectiveImplication(objective: string): ObjectiveImplication | null {
  return lookupOwn(VOCABULARY.objectives, normalizeTerm(objective)) ?? null;
}
