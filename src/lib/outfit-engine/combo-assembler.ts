/**
 * Outfit Engine - Combo Assembler
 *
 * Builds complete outfits from scored candidates:
 * 1. Top-M candidates per role (score desc, price asc, first seen)
 * 2. Bounded cross product of the core roles per track
 *    - Standard track: TOP + BOTTOM + SHOES
 *    - Dress track: DRESS + SHOES
 * 3. Greedy optional roles (outer, accessories) while they raise the score
 * 4. Outfit score = role-weighted mean + cohesion (capped) - penalties, floored at 0
 *
 * Each catalog item appears at most once per outfit. Roles are never reassigned.
 */

import { shouldLogPipeline } from '../debug-config';
import { DIMENSIONS, ROLES } from './config';
import type { EngineConfig } from './config';
import { computeCohesion, computePenalties } from './cohesion';
import { SCORE_EPSILON } from './ranking';
import { getDominantDimension } from './scoring';
import type {
  CatalogItem,
  Dimension,
  HighlightCode,
  OutfitBreakdown,
  OutfitCandidate,
  OutfitEntry,
  OutfitTrack,
  RelaxableConstraint,
  Role,
  ScoredCandidate,
  ScoredPool,
  TrackPlan,
  WeightProfile,
} from './types';

// ============================================
// TYPES
// ============================================

export interface AssemblyOptions {
  /** Constraints bypassed by the fallback controller; relaxed budget lifts the outfit ceiling */
  relaxed: readonly RelaxableConstraint[];
}

export interface AssemblyResult {
  outfits: OutfitCandidate[];
  combinations_evaluated: number;
}

export interface OutfitDraft {
  track: OutfitTrack;
  members: ScoredCandidate[];
  missingRoles: Role[];
  sequence: number;
}

// ============================================
// CANDIDATE SELECTION
// ============================================

/**
 * Score desc, then price asc, then first seen.
 */
export function compareCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
  const scoreDiff = b.score.score - a.score.score;
  if (scoreDiff !== 0) return scoreDiff;
  const priceDiff = a.item.price - b.item.price;
  if (priceDiff !== 0) return priceDiff;
  return a.order - b.order;
}

/**
 * Top-M candidates for a role. Unrankable items are used only
 * when the role has nothing rankable.
 */
export function selectTopCandidates(
  candidates: readonly ScoredCandidate[],
  limit: number
): ScoredCandidate[] {
  const rankable = candidates.filter(candidate => candidate.score.rankable);
  const eligible = rankable.length > 0 ? rankable : [...candidates];
  return eligible.sort(compareCandidates).slice(0, limit);
}

// ============================================
// OUTFIT EVALUATION
// ============================================

function roleRank(role: Role): number {
  return ROLES.indexOf(role);
}

/**
 * Deterministic outfit id from sorted item ids.
 */
export function outfitId(itemIds: readonly string[]): string {
  return [...itemIds].sort().join('+');
}

const DIMENSION_HIGHLIGHTS: Record<Dimension, HighlightCode> = {
  occasion: 'OCCASION_MATCH',
  category: 'CATEGORY_MATCH',
  formality: 'FORMALITY_MATCH',
  style: 'STYLE_MATCH',
  color: 'COLOR_MATCH',
  material: 'MATERIAL_MATCH',
  season: 'SEASON_MATCH',
  popularity: 'POPULARITY_MATCH',
  recency: 'RECENCY_MATCH',
  price: 'PRICE_MATCH',
};

/** Component share of its max that counts as a highlight */
const COHESION_HIGHLIGHT_SHARE = 0.75;
/** Raw match a dominant dimension needs to be highlighted */
const DIMENSION_HIGHLIGHT_RAW = 0.8;
const MAX_HIGHLIGHTS = 4;

function computeHighlights(
  members: readonly ScoredCandidate[],
  breakdown: OutfitBreakdown,
  totalPrice: number,
  profile: WeightProfile,
  config: EngineConfig
): HighlightCode[] {
  const highlights: HighlightCode[] = [];
  const { cohesion } = breakdown;
  const maxes = config.cohesion;

  if (maxes.colorHarmonyMax > 0 && cohesion.color_harmony >= maxes.colorHarmonyMax * COHESION_HIGHLIGHT_SHARE) {
    highlights.push('COLOR_HARMONY');
  }
  if (maxes.styleCoherenceMax > 0 && cohesion.style_coherence >= maxes.styleCoherenceMax * COHESION_HIGHLIGHT_SHARE) {
    highlights.push('STYLE_COHERENCE');
  }
  if (
    maxes.occasionConsistencyMax > 0 &&
    cohesion.occasion_consistency >= maxes.occasionConsistencyMax * COHESION_HIGHLIGHT_SHARE
  ) {
    highlights.push('OCCASION_CONSISTENCY');
  }
  const budgetMax = profile.constraints.budget_max;
  if (budgetMax !== null && totalPrice <= budgetMax) {
    highlights.push('WITHIN_BUDGET');
  }

  const dominant = new Set<Dimension>();
  for (const member of members) {
    const dimension = getDominantDimension(member.score);
    if (dimension === null) continue;
    const entry = member.score.dimensions.find(d => d.dimension === dimension);
    if (entry && entry.raw >= DIMENSION_HIGHLIGHT_RAW) dominant.add(dimension);
  }
  for (const dimension of DIMENSIONS) {
    if (dominant.has(dimension)) highlights.push(DIMENSION_HIGHLIGHTS[dimension]);
  }

  return highlights.slice(0, MAX_HIGHLIGHTS);
}

/**
 * Score a set of members as one outfit.
 */
export function evaluateOutfit(
  draft: OutfitDraft,
  profile: WeightProfile,
  config: EngineConfig
): OutfitCandidate {
  const members = [...draft.members].sort((a, b) => roleRank(a.item.role) - roleRank(b.item.role));
  const items: CatalogItem[] = members.map(member => member.item);
  const { roleWeights } = config.assembly;

  let weightedSum = 0;
  let weightTotal = 0;
  for (const member of members) {
    const weight = roleWeights[member.item.role];
    weightedSum += weight * member.score.score;
    weightTotal += weight;
  }
  const baseScore = weightTotal > 0 ? weightedSum / weightTotal : 0;

  const cohesion = computeCohesion(items, profile, config);
  const penalties = computePenalties(items, profile, config);
  const penaltyTotal = penalties.reduce((sum, line) => sum + line.amount, 0);
  const unclipped = baseScore + cohesion.applied - penaltyTotal;
  const totalPrice = items.reduce((sum, item) => sum + item.price, 0);

  const breakdown: OutfitBreakdown = {
    items: members.map(member => member.score),
    base_score: baseScore,
    cohesion,
    penalties,
    penalty_total: penaltyTotal,
    unclipped_score: unclipped,
  };

  const entries: OutfitEntry[] = members.map(member => ({ role: member.item.role, item: member.item }));

  return {
    id: outfitId(items.map(item => item.id)),
    track: draft.track,
    items: entries,
    score: Math.max(0, unclipped),
    total_price: totalPrice,
    min_item_score: Math.min(...members.map(member => member.score.score)),
    is_partial: draft.missingRoles.length > 0,
    missing_roles: [...draft.missingRoles],
    breakdown,
    highlights: computeHighlights(members, breakdown, totalPrice, profile, config),
    sequence: draft.sequence,
  };
}

// ============================================
// CORE COMBINATIONS
// ============================================

/**
 * Cartesian product of role candidates, in candidate order, up to limit.
 */
function generateProductCombos(
  roleCandidates: ScoredCandidate[][],
  limit: number
): ScoredCandidate[][] {
  const combos: ScoredCandidate[][] = [];

  const iterate = (roleIdx: number, current: ScoredCandidate[]): void => {
    if (combos.length >= limit) return;

    if (roleIdx >= roleCandidates.length) {
      combos.push(current);
      return;
    }

    for (const candidate of roleCandidates[roleIdx]) {
      if (combos.length >= limit) return;
      if (current.some(c => c.item.id === candidate.item.id)) continue;
      iterate(roleIdx + 1, [...current, candidate]);
    }
  };

  iterate(0, []);
  return combos;
}

// ============================================
// OPTIONAL ROLES
// ============================================

function exceedsCeiling(outfit: OutfitCandidate, ceiling: number | null): boolean {
  return ceiling !== null && outfit.total_price > ceiling;
}

/**
 * Add optional-role items one at a time while they raise the score
 * by more than SCORE_EPSILON.
 * Accessories may repeat up to maxAccessories; other roles take one slot.
 */
function decorateWithOptionalRoles(
  base: OutfitCandidate,
  draft: OutfitDraft,
  optionalCandidates: ReadonlyMap<Role, ScoredCandidate[]>,
  ceiling: number | null,
  profile: WeightProfile,
  config: EngineConfig
): OutfitCandidate {
  let best = base;
  let members = draft.members;

  for (const role of config.assembly.optionalRoles) {
    const candidates = optionalCandidates.get(role) ?? [];
    const slots = role === 'accessory' ? config.assembly.maxAccessories : 1;

    for (let slot = 0; slot < slots; slot++) {
      let improved: { outfit: OutfitCandidate; members: ScoredCandidate[] } | null = null;

      for (const candidate of candidates) {
        if (members.some(member => member.item.id === candidate.item.id)) continue;
        const trialMembers = [...members, candidate];
        const trial = evaluateOutfit({ ...draft, members: trialMembers }, profile, config);
        if (exceedsCeiling(trial, ceiling)) continue;
        const bar = improved ? improved.outfit.score : best.score;
        if (trial.score > bar + SCORE_EPSILON) improved = { outfit: trial, members: trialMembers };
      }

      if (!improved) break;
      best = improved.outfit;
      members = improved.members;
    }
  }

  return best;
}

// ============================================
// MAIN ENTRY POINT
// ============================================

/**
 * Assemble outfits for every planned track.
 * Standard track first, then dress; both share the combination budget.
 */
export function assembleOutfits(
  scored: ScoredPool,
  plans: readonly TrackPlan[],
  profile: WeightProfile,
  config: EngineConfig,
  options: AssemblyOptions = { relaxed: [] }
): AssemblyResult {
  const { topMPerRole, maxCombinations } = config.assembly;
  const { budget_mode, budget_ceiling } = profile.constraints;
  const ceiling =
    budget_mode === 'hard' && !options.relaxed.includes('budget') ? budget_ceiling : null;

  const topByRole = new Map<Role, ScoredCandidate[]>();
  const topFor = (role: Role): ScoredCandidate[] => {
    let top = topByRole.get(role);
    if (!top) {
      top = selectTopCandidates(scored[role], topMPerRole);
      topByRole.set(role, top);
    }
    return top;
  };

  const optionalCandidates = new Map<Role, ScoredCandidate[]>();
  for (const role of config.assembly.optionalRoles) {
    optionalCandidates.set(role, topFor(role));
  }

  const seenIds = new Set<string>();
  const outfits: OutfitCandidate[] = [];
  let evaluated = 0;
  let sequence = 0;

  for (const plan of plans) {
    if (plan.roles.length === 0) continue;
    const remaining = maxCombinations - evaluated;
    if (remaining <= 0) break;

    const combos = generateProductCombos(plan.roles.map(topFor), remaining);
    evaluated += combos.length;

    for (const members of combos) {
      const draft: OutfitDraft = {
        track: plan.track,
        members,
        missingRoles: plan.missing_roles,
        sequence: sequence++,
      };

      const base = evaluateOutfit(draft, profile, config);
      if (exceedsCeiling(base, ceiling)) continue;

      const outfit = decorateWithOptionalRoles(base, draft, optionalCandidates, ceiling, profile, config);
      if (seenIds.has(outfit.id)) continue;
      seenIds.add(outfit.id);
      outfits.push(outfit);
    }
  }

  if (shouldLogPipeline()) {
    console.log('[ComboAssembler] Assembled', {
      tracks: plans.map(plan => plan.track),
      combinations_evaluated: evaluated,
      outfits: outfits.length,
    });
  }

  return { outfits, combinations_evaluated: evaluated };
}
