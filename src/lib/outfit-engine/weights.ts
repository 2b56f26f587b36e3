/**
 * Outfit Engine - Weight Profile Resolver
 *
 * Intent → WeightProfile (weights + hard constraints + resolved targets).
 *
 * Adaptive rules are data (config.adaptiveRules) evaluated in order.
 * A raise lifts the target dimension to its weight and draws the difference
 * from donors, each donor giving at most maxDonorShare of its current weight.
 * Weights are never negative.
 */

import { shouldLogPipeline } from '../debug-config';
import { DIMENSIONS, validateEngineConfig } from './config';
import type { AdaptiveRule, EngineConfig, RuleEffect, RuleTrigger } from './config';
import { ConfigurationError } from './errors';
import {
  activityCategoriesByRole,
  activityProfile,
  canonicalSeason,
  expandPalette,
  formalityLevel,
  isFormalOccasion,
  objectiveImplication,
  relatedOccasions,
  styleFamily,
} from './vocabulary';
import type { ActivityProfile } from './vocabulary';
import type {
  BudgetMode,
  DimensionWeights,
  HardConstraints,
  Intent,
  IntentFormality,
  ResolvedTargets,
  WeightProfile,
} from './types';

// ============================================
// TARGET RESOLUTION
// ============================================

const INTENT_FORMALITY_LEVELS: Record<IntentFormality, number | null> = {
  athleisure: 1,
  casual: 2,
  elevated: 4,
  unspecified: null,
};

/** Formal occasions missing from the formality table ("gala", "wedding") */
const FORMAL_OCCASION_DEFAULT_LEVEL = 4;

function pushUnique(target: string[], values: Iterable<string>): void {
  for (const value of values) {
    if (!target.includes(value)) target.push(value);
  }
}

function resolveFormalityLevel(intent: Intent, profile: ActivityProfile | null): number | null {
  const explicit = INTENT_FORMALITY_LEVELS[intent.formality];
  if (explicit !== null) return explicit;

  if (intent.occasion) {
    const fromOccasion = formalityLevel(intent.occasion);
    if (fromOccasion !== null) return fromOccasion;
    if (isFormalOccasion(intent.occasion)) return FORMAL_OCCASION_DEFAULT_LEVEL;
  }

  return profile ? formalityLevel(profile.formality) : null;
}

/**
 * Resolve comparison targets from the intent and vocabulary.
 * The scorer only ever compares against these.
 */
export function resolveTargets(intent: Intent): ResolvedTargets {
  const profile = intent.activity ? activityProfile(intent.activity) : null;

  const occasions: string[] = [];
  if (intent.occasion) occasions.push(intent.occasion);
  if (profile) {
    pushUnique(occasions, profile.occasions);
  } else if (intent.activity) {
    // Unknown activity still reads as an occasion term
    pushUnique(occasions, [intent.activity]);
  }

  const related: string[] = [];
  for (const occasion of occasions) {
    pushUnique(
      related,
      relatedOccasions(occasion).filter(term => !occasions.includes(term))
    );
  }

  const styles: string[] = [];
  const materials: string[] = [];
  let impliedPalette: string[] = [];
  if (profile) {
    pushUnique(styles, profile.styles);
    pushUnique(materials, profile.materials);
  }
  for (const objective of intent.objectives) {
    const implication = objectiveImplication(objective);
    if (!implication) continue;
    pushUnique(styles, implication.styles ?? []);
    pushUnique(materials, implication.materials ?? []);
    if (implication.palette) impliedPalette = [...impliedPalette, ...implication.palette];
  }

  const explicitPalette = intent.palette ?? [];
  const palette = expandPalette(explicitPalette.length > 0 ? explicitPalette : impliedPalette);

  return {
    palette,
    occasions,
    related_occasions: related,
    styles: styles.map(style => styleFamily(style) ?? style),
    materials,
    categories: intent.categories ?? [],
    categories_by_role: profile ? activityCategoriesByRole(profile) : {},
    formality_level: resolveFormalityLevel(intent, profile),
    season: intent.season ? canonicalSeason(intent.season) : null,
    performance_activity: profile?.performance ?? false,
  };
}

// ============================================
// RULE EVALUATION
// ============================================

/**
 * A strong signal is anything beyond merchandising objectives.
 */
export function hasStrongSignal(intent: Intent, targets: ResolvedTargets): boolean {
  return (
    intent.budget_max !== undefined ||
    targets.palette.length > 0 ||
    intent.activity !== undefined ||
    intent.occasion !== undefined ||
    intent.formality !== 'unspecified' ||
    targets.categories.length > 0
  );
}

function isFormalEvent(intent: Intent, targets: ResolvedTargets): boolean {
  if (intent.formality === 'elevated') return true;
  if (targets.occasions.some(isFormalOccasion)) return true;
  return (targets.formality_level ?? 0) >= 4;
}

export function evaluateTrigger(
  trigger: RuleTrigger,
  intent: Intent,
  targets: ResolvedTargets
): boolean {
  switch (trigger.kind) {
    case 'budget_set':
      return intent.budget_max !== undefined;
    case 'palette_present':
      return targets.palette.length > 0;
    case 'performance_activity':
      return targets.performance_activity;
    case 'formal_event':
      return isFormalEvent(intent, targets);
    case 'objective':
      return intent.objectives.includes(trigger.objective);
    case 'no_strong_signal':
      return !hasStrongSignal(intent, targets);
  }
}

function applyEffect(
  effect: RuleEffect,
  weights: DimensionWeights,
  maxDonorShare: number
): void {
  if (effect.kind === 'preset') {
    for (const dimension of DIMENSIONS) {
      const value = effect.weights[dimension];
      if (value !== undefined) weights[dimension] = value;
    }
    return;
  }

  const current = weights[effect.dimension];
  if (current >= effect.weight) return;

  // Shortfall the donors cannot cover is not reclaimed elsewhere
  let needed = effect.weight - current;
  for (const donor of effect.donors) {
    if (needed <= 0) break;
    if (donor === effect.dimension) continue;
    const taken = Math.min(needed, weights[donor] * maxDonorShare);
    weights[donor] = Math.max(0, weights[donor] - taken);
    needed -= taken;
  }
  weights[effect.dimension] = effect.weight;
}

function applyWeightAdjuster(
  config: EngineConfig,
  intent: Intent,
  weights: DimensionWeights
): void {
  if (!config.weightAdjuster) return;

  const overrides = config.weightAdjuster(intent, { ...weights });
  const issues: string[] = [];
  for (const dimension of DIMENSIONS) {
    const value = overrides[dimension];
    if (value === undefined) continue;
    if (!Number.isFinite(value) || value < 0) {
      issues.push(`weightAdjuster.${dimension}: must be a non-negative number (got ${value})`);
      continue;
    }
    weights[dimension] = value;
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
}

// ============================================
// CONSTRAINTS
// ============================================

function resolveConstraints(intent: Intent, config: EngineConfig): HardConstraints {
  const budgetMax = intent.budget_max ?? null;
  const { policy, hardCeilingMultiplier } = config.budget;

  let mode: BudgetMode = 'none';
  let ceiling: number | null = null;

  if (budgetMax !== null) {
    const isHard = policy === 'hard' || (policy === 'auto' && intent.budget_strict === true);
    mode = isHard ? 'hard' : 'soft';
    if (isHard) {
      ceiling = budgetMax * (hardCeilingMultiplier ?? 1);
    } else if (hardCeilingMultiplier !== null) {
      ceiling = budgetMax * hardCeilingMultiplier;
    }
  }

  return {
    require_availability: true,
    exclusions: [...intent.hard_exclusions],
    size: intent.size ?? null,
    budget_max: budgetMax,
    budget_mode: mode,
    budget_ceiling: ceiling,
  };
}

// ============================================
// MAIN ENTRY POINT
// ============================================

/**
 * Resolve the weight profile for one request.
 * @throws ConfigurationError for an invalid config or a negative adjuster weight
 */
export function resolveWeightProfile(intent: Intent, config: EngineConfig): WeightProfile {
  validateEngineConfig(config);

  const targets = resolveTargets(intent);
  const weights: DimensionWeights = { ...config.baselineWeights };
  const appliedRules: string[] = [];

  const rules: AdaptiveRule[] = config.adaptiveRules;
  for (const rule of rules) {
    if (!evaluateTrigger(rule.trigger, intent, targets)) continue;

    applyEffect(rule.effect, weights, config.maxDonorShare);
    if (rule.styleBias && !targets.styles.includes(rule.styleBias)) {
      targets.styles.push(rule.styleBias);
    }
    appliedRules.push(rule.id);
  }

  applyWeightAdjuster(config, intent, weights);

  const profile: WeightProfile = {
    weights,
    constraints: resolveConstraints(intent, config),
    cohesion_bonus_cap: config.cohesion.cap,
    targets,
    applied_rules: appliedRules,
  };

  if (shouldLogPipeline()) {
    console.log('[WeightProfile] Resolved', {
      applied_rules: appliedRules,
      weights,
      budget_mode: profile.constraints.budget_mode,
    });
  }

  return profile;
}
