/**
 * Outfit Engine - Configuration
 *
 * Baseline weights, adaptive rules, cohesion/penalty constants and assembly limits.
 * Configuration is passed explicitly into every stage; nothing here is mutated at runtime.
 * Remote tuning goes through mergeEngineConfig(), which validates the merged result.
 */

import { z } from 'zod';

import { ConfigurationError } from './errors';
import type {
  Dimension,
  DimensionWeights,
  FallbackPolicy,
  Intent,
  Role,
} from './types';

// ============================================
// ROLES & DIMENSIONS
// ============================================

export const ROLES: readonly Role[] = [
  'top',
  'bottom',
  'dress',
  'shoes',
  'outer',
  'accessory',
  'undergarment',
];

export function isRole(value: string): value is Role {
  return ROLES.some(role => role === value);
}

/**
 * One entry per role, each created fresh.
 */
export function createRoleRecord<T>(create: () => T): Record<Role, T> {
  return {
    top: create(),
    bottom: create(),
    dress: create(),
    shoes: create(),
    outer: create(),
    accessory: create(),
    undergarment: create(),
  };
}

/**
 * Upstream catalogs use plural or alternate names for roles.
 * Single source of truth for alias → role.
 */
export const ROLE_ALIASES: Readonly<Record<string, Role>> = {
  tops: 'top',
  bottoms: 'bottom',
  skirts: 'bottom',
  skirt: 'bottom',
  dresses: 'dress',
  shoe: 'shoes',
  footwear: 'shoes',
  outerwear: 'outer',
  accessories: 'accessory',
  bags: 'accessory',
  bag: 'accessory',
  underwear: 'undergarment',
  undergarments: 'undergarment',
};

export const DIMENSIONS: readonly Dimension[] = [
  'occasion',
  'category',
  'formality',
  'style',
  'color',
  'material',
  'season',
  'popularity',
  'recency',
  'price',
];

/**
 * Item attribute compared for each attribute-backed dimension.
 * popularity, recency and price read dedicated item fields instead.
 */
export const DIMENSION_ATTRIBUTE: Readonly<Partial<Record<Dimension, string>>> = {
  occasion: 'occasion',
  category: 'category',
  formality: 'formality',
  style: 'style',
  color: 'color',
  material: 'material',
  season: 'season',
};

// ============================================
// ADAPTIVE RULES
// ============================================

export type RuleTrigger =
  | { kind: 'budget_set' }
  | { kind: 'palette_present' }
  | { kind: 'performance_activity' }
  | { kind: 'formal_event' }
  | { kind: 'objective'; objective: string }
  | { kind: 'no_strong_signal' };

export type RuleEffect =
  | {
      /** Raise dimension to weight (never lowers it), drawing the difference from donors in order */
      kind: 'raise';
      dimension: Dimension;
      weight: number;
      donors: Dimension[];
    }
  | {
      /** Assign weights directly */
      kind: 'preset';
      weights: Partial<DimensionWeights>;
    };

export interface AdaptiveRule {
  id: string;
  trigger: RuleTrigger;
  effect: RuleEffect;
  /** Style family added to the style targets when the rule fires */
  styleBias?: string;
}

/**
 * Evaluated in order. New rules are added here as data.
 */
export const ADAPTIVE_RULES: AdaptiveRule[] = [
  {
    id: 'generalist',
    trigger: { kind: 'no_strong_signal' },
    effect: {
      kind: 'preset',
      weights: { occasion: 18, category: 20, style: 14, formality: 12, popularity: 8 },
    },
  },
  {
    id: 'budget',
    trigger: { kind: 'budget_set' },
    effect: { kind: 'raise', dimension: 'price', weight: 18, donors: ['recency', 'popularity', 'color'] },
  },
  {
    id: 'palette',
    trigger: { kind: 'palette_present' },
    effect: { kind: 'raise', dimension: 'color', weight: 18, donors: ['recency', 'popularity', 'season'] },
  },
  {
    id: 'performance_activity',
    trigger: { kind: 'performance_activity' },
    effect: { kind: 'raise', dimension: 'material', weight: 15, donors: ['recency'] },
  },
  {
    id: 'formal_event',
    trigger: { kind: 'formal_event' },
    effect: { kind: 'raise', dimension: 'formality', weight: 18, donors: ['recency', 'popularity', 'color'] },
    styleBias: 'elevated',
  },
  {
    id: 'objective_new_arrivals',
    trigger: { kind: 'objective', objective: 'promote_new_arrivals' },
    effect: { kind: 'raise', dimension: 'recency', weight: 10, donors: ['popularity'] },
  },
  {
    id: 'objective_quality',
    trigger: { kind: 'objective', objective: 'promote_quality' },
    effect: { kind: 'raise', dimension: 'popularity', weight: 12, donors: ['recency'] },
  },
  {
    id: 'objective_comfort',
    trigger: { kind: 'objective', objective: 'comfort' },
    effect: { kind: 'raise', dimension: 'material', weight: 12, donors: ['recency', 'popularity'] },
  },
];

// ============================================
// CONFIG TYPES
// ============================================

/**
 * Hook for learned weight profiles. Returned weights override the rule output.
 */
export type WeightAdjuster = (
  intent: Intent,
  weights: Readonly<DimensionWeights>
) => Partial<DimensionWeights>;

export type BudgetPolicy = 'auto' | 'soft' | 'hard';

export interface CohesionConfig {
  /** Upper bound on the total outfit-level bonus (0-100 scale) */
  cap: number;
  colorHarmonyMax: number;
  styleCoherenceMax: number;
  occasionConsistencyMax: number;
}

export interface PenaltyConfig {
  /** Two items of the same sub-category (e.g. two belts) */
  duplicateCategory: number;
  /** Formality levels too far apart (athleisure with formal) */
  formalityClash: number;
  /** Minimum level gap that counts as a clash */
  formalityClashGap: number;
  colorClash: number;
  overBudgetBase: number;
  overBudgetPerPercent: number;
  overBudgetMax: number;
  staleItems: number;
  /** recency_score below this is stale */
  staleRecencyThreshold: number;
  /** Stale penalty applies only when the recency weight reaches this */
  freshnessWeightThreshold: number;
  /** Attribute confidence required before a clash rule may fire */
  minConfidence: number;
}

export interface AssemblyConfig {
  /** Max scored candidates per role before the cross product */
  topMPerRole: number;
  maxAccessories: number;
  requiredRoles: Role[];
  optionalRoles: Role[];
  /** Generate DRESS + SHOES combinations alongside TOP + BOTTOM + SHOES */
  dressTrack: boolean;
  roleWeights: Record<Role, number>;
  /** Hard stop on core combinations evaluated per request */
  maxCombinations: number;
}

export interface BudgetConfig {
  /** auto = hard only when the shopper used a strict phrase */
  policy: BudgetPolicy;
  /** Item price cutoff as a multiple of budget_max; null = no cutoff in soft mode */
  hardCeilingMultiplier: number | null;
}

export interface EngineConfig {
  baselineWeights: DimensionWeights;
  adaptiveRules: AdaptiveRule[];
  /** Max share of a donor's current weight one rule may take */
  maxDonorShare: number;
  weightAdjuster?: WeightAdjuster;
  cohesion: CohesionConfig;
  penalties: PenaltyConfig;
  assembly: AssemblyConfig;
  budget: BudgetConfig;
  fallbackPolicy: FallbackPolicy;
  /** k: outfits returned */
  resultCount: number;
}

// ============================================
// DEFAULTS
// ============================================

export const BASELINE_WEIGHTS: DimensionWeights = {
  occasion: 22,
  category: 20,
  formality: 12,
  style: 12,
  color: 10,
  material: 8,
  season: 6,
  popularity: 6,
  recency: 4,
  price: 0,
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  baselineWeights: BASELINE_WEIGHTS,
  adaptiveRules: ADAPTIVE_RULES,
  maxDonorShare: 0.5,
  cohesion: {
    cap: 20,
    colorHarmonyMax: 10,
    styleCoherenceMax: 8,
    occasionConsistencyMax: 8,
  },
  penalties: {
    duplicateCategory: 15,
    formalityClash: 15,
    formalityClashGap: 3,
    colorClash: 4,
    overBudgetBase: 3,
    overBudgetPerPercent: 0.2,
    overBudgetMax: 15,
    staleItems: 3,
    staleRecencyThreshold: 0.2,
    freshnessWeightThreshold: 8,
    minConfidence: 0.5,
  },
  assembly: {
    topMPerRole: 6,
    maxAccessories: 2,
    requiredRoles: ['top', 'bottom', 'shoes'],
    optionalRoles: ['outer', 'accessory'],
    dressTrack: true,
    roleWeights: {
      top: 1,
      bottom: 1,
      dress: 2,
      shoes: 0.8,
      outer: 0.6,
      accessory: 0.4,
      undergarment: 0.2,
    },
    maxCombinations: 1000,
  },
  budget: {
    policy: 'auto',
    hardCeilingMultiplier: null,
  },
  fallbackPolicy: 'omit',
  resultCount: 5,
};

// ============================================
// VALIDATION
// ============================================

const RoleSchema = z.enum(['top', 'bottom', 'dress', 'shoes', 'outer', 'accessory', 'undergarment']);

const DimensionSchema = z.enum([
  'occasion',
  'category',
  'formality',
  'style',
  'color',
  'material',
  'season',
  'popularity',
  'recency',
  'price',
]);

const WeightSchema = z.number().finite().nonnegative();

const DimensionWeightsSchema = z.object({
  occasion: WeightSchema,
  category: WeightSchema,
  formality: WeightSchema,
  style: WeightSchema,
  color: WeightSchema,
  material: WeightSchema,
  season: WeightSchema,
  popularity: WeightSchema,
  recency: WeightSchema,
  price: WeightSchema,
});

const RuleTriggerSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('budget_set') }),
  z.object({ kind: z.literal('palette_present') }),
  z.object({ kind: z.literal('performance_activity') }),
  z.object({ kind: z.literal('formal_event') }),
  z.object({ kind: z.literal('objective'), objective: z.string().min(1) }),
  z.object({ kind: z.literal('no_strong_signal') }),
]);

const RuleEffectSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('raise'),
    dimension: DimensionSchema,
    weight: WeightSchema,
    donors: z.array(DimensionSchema),
  }),
  z.object({
    kind: z.literal('preset'),
    weights: DimensionWeightsSchema.partial(),
  }),
]);

const AdaptiveRuleSchema = z.object({
  id: z.string().min(1),
  trigger: RuleTriggerSchema,
  effect: RuleEffectSchema,
  styleBias: z.string().min(1).optional(),
});

const EngineConfigSchema = z
  .object({
    baselineWeights: DimensionWeightsSchema,
    adaptiveRules: z.array(AdaptiveRuleSchema),
    maxDonorShare: z.number().min(0).max(1),
    cohesion: z.object({
      cap: z.number().finite().nonnegative(),
      colorHarmonyMax: WeightSchema,
      styleCoherenceMax: WeightSchema,
      occasionConsistencyMax: WeightSchema,
    }),
    penalties: z.object({
      duplicateCategory: WeightSchema,
      formalityClash: WeightSchema,
      formalityClashGap: z.number().int().min(1).max(4),
      colorClash: WeightSchema,
      overBudgetBase: WeightSchema,
      overBudgetPerPercent: WeightSchema,
      overBudgetMax: WeightSchema,
      staleItems: WeightSchema,
      staleRecencyThreshold: z.number().min(0).max(1),
      freshnessWeightThreshold: WeightSchema,
      minConfidence: z.number().min(0).max(1),
    }),
    assembly: z.object({
      topMPerRole: z.number().int().min(1),
      maxAccessories: z.number().int().min(0),
      requiredRoles: z.array(RoleSchema).min(1),
      optionalRoles: z.array(RoleSchema),
      dressTrack: z.boolean(),
      roleWeights: z.object({
        top: WeightSchema,
        bottom: WeightSchema,
        dress: WeightSchema,
        shoes: WeightSchema,
        outer: WeightSchema,
        accessory: WeightSchema,
        undergarment: WeightSchema,
      }),
      maxCombinations: z.number().int().min(1),
    }),
    budget: z.object({
      policy: z.enum(['auto', 'soft', 'hard']),
      hardCeilingMultiplier: z.number().finite().min(1).nullable(),
    }),
    fallbackPolicy: z.enum(['omit', 'relax']),
    resultCount: z.number().int().min(1),
  })
  .superRefine((config, ctx) => {
    const { requiredRoles, optionalRoles } = config.assembly;
    for (const role of requiredRoles) {
      if (optionalRoles.includes(role)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['assembly', 'optionalRoles'],
          message: `role "${role}" cannot be both required and optional`,
        });
      }
    }
    if (requiredRoles.includes('dress')) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['assembly', 'requiredRoles'],
        message: 'dress is filled by the dress track, not listed as required',
      });
    }
    const ruleIds = new Set<string>();
    for (const rule of config.adaptiveRules) {
      if (ruleIds.has(rule.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['adaptiveRules'],
          message: `duplicate rule id "${rule.id}"`,
        });
      }
      ruleIds.add(rule.id);
    }
  });

export function formatIssuePath(path: (string | number)[]): string {
  return path.length > 0 ? path.join('.') : '(root)';
}

/**
 * Validate a full engine configuration.
 * @throws ConfigurationError listing every violation
 */
export function validateEngineConfig(config: EngineConfig): EngineConfig {
  const { weightAdjuster, ...data } = config;
  const issues: string[] = [];

  const result = EngineConfigSchema.safeParse(data);
  if (!result.success) {
    for (const issue of result.error.issues) {
      issues.push(`${formatIssuePath(issue.path)}: ${issue.message}`);
    }
  }

  if (weightAdjuster !== undefined && typeof weightAdjuster !== 'function') {
    issues.push('weightAdjuster: must be a function');
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return config;
}

// ============================================
// OVERRIDES
// ============================================

export interface EngineConfigOverrides {
  baselineWeights?: Partial<DimensionWeights>;
  adaptiveRules?: AdaptiveRule[];
  maxDonorShare?: number;
  weightAdjuster?: WeightAdjuster;
  cohesion?: Partial<CohesionConfig>;
  penalties?: Partial<PenaltyConfig>;
  assembly?: Partial<Omit<AssemblyConfig, 'roleWeights'>> & {
    roleWeights?: Partial<Record<Role, number>>;
  };
  budget?: Partial<BudgetConfig>;
  fallbackPolicy?: FallbackPolicy;
  resultCount?: number;
}

/**
 * Apply partial overrides (e.g. remote tuning) on top of a base config.
 * Sections merge one level deep; arrays replace.
 * @throws ConfigurationError when the merged config is invalid
 */
export function mergeEngineConfig(
  base: EngineConfig,
  overrides: EngineConfigOverrides
): EngineConfig {
  const merged: EngineConfig = {
    ...base,
    baselineWeights: { ...base.baselineWeights, ...overrides.baselineWeights },
    adaptiveRules: overrides.adaptiveRules ?? base.adaptiveRules,
    maxDonorShare: overrides.maxDonorShare ?? base.maxDonorShare,
    weightAdjuster: overrides.weightAdjuster ?? base.weightAdjuster,
    cohesion: { ...base.cohesion, ...overrides.cohesion },
    penalties: { ...base.penalties, ...overrides.penalties },
    assembly: {
      ...base.assembly,
      ...overrides.assembly,
      roleWeights: { ...base.assembly.roleWeights, ...overrides.assembly?.roleWeights },
    },
    budget: { ...base.budget, ...overrides.budget },
    fallbackPolicy: overrides.fallbackPolicy ?? base.fallbackPolicy,
    resultCount: overrides.resultCount ?? base.resultCount,
  };

  return validateEngineConfig(merged);
}
