/**
 * Outfit Engine - Candidate Filter
 *
 * Applies hard constraints and groups survivors by role.
 *
 * RULE: Availability and exclusions are filters, never weights.
 * An excluded item can never reach the scorer, so it can never appear in an outfit.
 */

import { shouldLogPipeline } from '../debug-config';
import { ROLES, createRoleRecord } from './config';
import { colorFamily, materialFamilies, normalizeTerm, tokenize } from './vocabulary';
import type {
  CandidatePool,
  CatalogItem,
  FilterDropReason,
  HardConstraints,
  RelaxableConstraint,
  Role,
  WeightProfile,
} from './types';

const ONE_SIZE_TERMS = new Set(['one size', 'one-size', 'os', 'onesize']);

// ============================================
// PREDICATES
// ============================================

function fitsSize(item: CatalogItem, size: string | null): boolean {
  if (size === null) return true;
  const requested = normalizeTerm(size);
  return item.availability.sizes.some(
    available => normalizeTerm(available) === requested || ONE_SIZE_TERMS.has(normalizeTerm(available))
  );
}

function withinCeiling(item: CatalogItem, ceiling: number | null): boolean {
  return ceiling === null || item.price <= ceiling;
}

function containsPhrase(value: string, phrase: string): boolean {
  const valueTokens = tokenize(value);
  const phraseTokens = tokenize(phrase);
  if (phraseTokens.length === 0) return false;
  return ` ${valueTokens.join(' ')} `.includes(` ${phraseTokens.join(' ')} `);
}

/**
 * Does an attribute value hit an exclusion term?
 * Exact, token/phrase, then family ("leather" excludes "suede").
 */
export function valueMatchesExclusion(attribute: string, value: string, exclusion: string): boolean {
  const term = normalizeTerm(exclusion);
  const normalized = normalizeTerm(value);
  if (normalized === term) return true;
  if (containsPhrase(normalized, term)) return true;

  if (attribute === 'material') return materialFamilies(normalized).includes(term);
  if (attribute === 'color') return colorFamily(normalized) === term;
  return false;
}

/**
 * First exclusion term the item hits, or null.
 */
export function findExclusionHit(item: CatalogItem, exclusions: readonly string[]): string | null {
  if (exclusions.length === 0) return null;
  for (const [attribute, values] of Object.entries(item.attributes)) {
    for (const value of values) {
      for (const exclusion of exclusions) {
        if (valueMatchesExclusion(attribute, value, exclusion)) return exclusion;
      }
    }
  }
  return null;
}

/**
 * Reason the item is dropped under these constraints, or null when it survives.
 */
export function dropReason(item: CatalogItem, constraints: HardConstraints): FilterDropReason | null {
  if (!item.availability.in_stock) return 'unavailable';
  if (!fitsSize(item, constraints.size)) return 'size';
  if (findExclusionHit(item, constraints.exclusions) !== null) return 'excluded';
  if (!withinCeiling(item, constraints.budget_ceiling)) return 'over_budget';
  return null;
}

// ============================================
// POOL
// ============================================

/**
 * Apply hard constraints and group survivors by role.
 * Input order is preserved within each role.
 */
export function filterCandidates(
  items: readonly CatalogItem[],
  profile: WeightProfile
): CandidatePool {
  const byRole = createRoleRecord<CatalogItem[]>(() => []);
  const dropped: Record<FilterDropReason, number> = {
    unavailable: 0,
    size: 0,
    excluded: 0,
    over_budget: 0,
  };

  for (const item of items) {
    const reason = dropReason(item, profile.constraints);
    if (reason !== null) {
      dropped[reason]++;
      continue;
    }
    byRole[item.role].push(item);
  }

  if (shouldLogPipeline()) {
    const counts = ROLES.map(role => `${role}=${byRole[role].length}`).join(' ');
    console.log(`[CandidateFilter] ${counts}`, dropped);
  }

  return { by_role: byRole, dropped };
}

// ============================================
// RELAXED PASS
// ============================================

export interface RelaxedRoleResult {
  items: CatalogItem[];
  /** Constraints the returned items actually bypass */
  relaxed: RelaxableConstraint[];
}

/**
 * Role-scoped pass with size and budget ignored.
 * Stock and exclusions still apply.
 */
export function filterRoleRelaxed(
  items: readonly CatalogItem[],
  role: Role,
  profile: WeightProfile
): RelaxedRoleResult {
  const { constraints } = profile;
  const survivors: CatalogItem[] = [];
  let bypassedSize = false;
  let bypassedBudget = false;

  for (const item of items) {
    if (item.role !== role) continue;
    if (!item.availability.in_stock) continue;
    if (findExclusionHit(item, constraints.exclusions) !== null) continue;

    if (!fitsSize(item, constraints.size)) bypassedSize = true;
    if (!withinCeiling(item, constraints.budget_ceiling)) bypassedBudget = true;
    survivors.push(item);
  }

  const relaxed: RelaxableConstraint[] = [];
  if (bypassedBudget) relaxed.push('budget');
  if (bypassedSize) relaxed.push('size');

  return { items: survivors, relaxed };
}
