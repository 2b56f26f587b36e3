/**
 * Outfit Engine - Fallback Controller
 *
 * Decides which tracks to assemble when inventory is sparse.
 * - A complete track wins; incomplete tracks are dropped without notice.
 * - Otherwise each missing required role is omitted ("omit") or
 *   re-filtered with size and budget ignored ("relax", then omit on failure).
 *
 * Every decision becomes a FallbackNotice. Nothing here throws.
 */

import { shouldLogPipeline } from '../debug-config';
import { ROLES, createRoleRecord } from './config';
import type { EngineConfig } from './config';
import { filterRoleRelaxed } from './candidate-filter';
import type {
  CandidatePool,
  CatalogItem,
  FallbackNotice,
  RelaxableConstraint,
  Role,
  ScoredPool,
  TrackPlan,
  WeightProfile,
} from './types';

export interface FallbackResult {
  plans: TrackPlan[];
  /** Pool after any relaxed re-filtering */
  pool: CandidatePool;
  notices: FallbackNotice[];
  /** Constraints bypassed for at least one role */
  relaxed: RelaxableConstraint[];
}

/** Roles the dress replaces on the dress track */
const DRESS_REPLACES: readonly Role[] = ['top', 'bottom'];

// ============================================
// TRACK ROLES
// ============================================

export function standardTrackRoles(config: EngineConfig): Role[] {
  return [...config.assembly.requiredRoles];
}

/**
 * DRESS + the required roles a dress does not replace, or null when disabled.
 */
export function dressTrackRoles(config: EngineConfig): Role[] | null {
  if (!config.assembly.dressTrack) return null;
  const { requiredRoles } = config.assembly;
  if (!requiredRoles.some(role => DRESS_REPLACES.includes(role))) return null;
  return ['dress', ...requiredRoles.filter(role => !DRESS_REPLACES.includes(role))];
}

function missingRoles(pool: CandidatePool, roles: readonly Role[]): Role[] {
  return roles.filter(role => pool.by_role[role].length === 0);
}

export function isPoolEmpty(pool: CandidatePool): boolean {
  return ROLES.every(role => pool.by_role[role].length === 0);
}

function clonePool(pool: CandidatePool): CandidatePool {
  const byRole = createRoleRecord<CatalogItem[]>(() => []);
  for (const role of ROLES) {
    byRole[role] = [...pool.by_role[role]];
  }
  return { by_role: byRole, dropped: { ...pool.dropped } };
}

// ============================================
// PLANNING
// ============================================

/**
 * Plan assembly tracks, applying the fallback policy to missing required roles.
 *
 * @param items - the validated catalog, for the relaxed re-filter
 */
export function planTracks(
  pool: CandidatePool,
  items: readonly CatalogItem[],
  profile: WeightProfile,
  config: EngineConfig
): FallbackResult {
  const standardRoles = standardTrackRoles(config);
  const dressRoles = pool.by_role.dress.length > 0 ? dressTrackRoles(config) : null;

  const standardMissing = missingRoles(pool, standardRoles);
  const dressMissing = dressRoles ? missingRoles(pool, dressRoles) : null;

  // A complete track wins
  const complete: TrackPlan[] = [];
  if (standardMissing.length === 0) {
    complete.push({ track: 'standard', roles: standardRoles, missing_roles: [] });
  }
  if (dressRoles && dressMissing && dressMissing.length === 0) {
    complete.push({ track: 'dress', roles: dressRoles, missing_roles: [] });
  }
  if (complete.length > 0) {
    return { plans: complete, pool, notices: [], relaxed: [] };
  }

  const notices: FallbackNotice[] = [];
  const relaxed: RelaxableConstraint[] = [];
  const omitted: Role[] = [];
  const nextPool = clonePool(pool);

  for (const role of standardMissing) {
    if (config.fallbackPolicy === 'relax') {
      const result = filterRoleRelaxed(items, role, profile);
      if (result.items.length > 0) {
        nextPool.by_role[role] = result.items;
        for (const constraint of result.relaxed) {
          if (!relaxed.includes(constraint)) relaxed.push(constraint);
        }
        notices.push({
          code: 'CONSTRAINT_RELAXED',
          role,
          relaxed: result.relaxed,
          message: `No ${role} matched all constraints; relaxed ${result.relaxed.join(' and ')}`,
        });
        continue;
      }
      notices.push({
        code: 'RELAX_FAILED',
        role,
        message: `No ${role} available even with size and budget relaxed`,
      });
    }

    omitted.push(role);
    notices.push({
      code: 'ROLE_OMITTED',
      role,
      message: `No ${role} available; outfits are returned without ${role}`,
    });
  }

  const plans: TrackPlan[] = [];
  const standardRemaining = standardRoles.filter(role => !omitted.includes(role));
  if (standardRemaining.length > 0) {
    plans.push({ track: 'standard', roles: standardRemaining, missing_roles: [...omitted] });
  }
  if (dressRoles) {
    const dressRemaining = dressRoles.filter(role => !omitted.includes(role));
    plans.push({
      track: 'dress',
      roles: dressRemaining,
      missing_roles: omitted.filter(role => dressRoles.includes(role)),
    });
  }

  if (plans.length === 0) {
    notices.push({
      code: 'NO_REQUIRED_ROLES',
      message: 'Every required role is empty; no outfit can be assembled',
    });
  }

  if (shouldLogPipeline()) {
    console.log('[Fallback] Planned', {
      policy: config.fallbackPolicy,
      omitted,
      relaxed,
      tracks: plans.map(plan => plan.track),
    });
  }

  return { plans, pool: nextPool, notices, relaxed };
}

/**
 * Notice for each planned role whose candidates are all unrankable.
 */
export function unrankableNotices(scored: ScoredPool, plans: readonly TrackPlan[]): FallbackNotice[] {
  const roles: Role[] = [];
  for (const plan of plans) {
    for (const role of plan.roles) {
      if (!roles.includes(role)) roles.push(role);
    }
  }

  const notices: FallbackNotice[] = [];
  for (const role of ROLES) {
    if (!roles.includes(role)) continue;
    const candidates = scored[role];
    if (candidates.length > 0 && candidates.every(candidate => !candidate.score.rankable)) {
      notices.push({
        code: 'UNRANKABLE_ONLY',
        role,
        message: `Every ${role} candidate lacks scoreable attributes; chosen by price and order only`,
      });
    }
  }
  return notices;
}
