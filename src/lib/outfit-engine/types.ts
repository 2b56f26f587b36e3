/**
 * Outfit Engine - Type Definitions
 *
 * Core types for the outfit scoring and assembly pipeline.
 * These types define the contract between all modules.
 */

// ============================================
// ROLES
// ============================================

/**
 * Canonical role of a catalog item inside an outfit.
 * A role is fixed at catalog time and never reassigned.
 * DRESS replaces TOP + BOTTOM on the dress track.
 */
export type Role =
  | 'top'
  | 'bottom'
  | 'dress'
  | 'shoes'
  | 'outer'
  | 'accessory'
  | 'undergarment';

export type OutfitTrack = 'standard' | 'dress';

// ============================================
// DIMENSIONS
// ============================================

export type Dimension =
  | 'occasion'
  | 'category'
  | 'formality'
  | 'style'
  | 'color'
  | 'material'
  | 'season'
  | 'popularity'
  | 'recency'
  | 'price';

export type DimensionWeights = Record<Dimension, number>;

// ============================================
// INTENT (INPUT)
// ============================================

export type IntentFormality = 'casual' | 'elevated' | 'athleisure' | 'unspecified';

/**
 * Structured shopping intent produced by the upstream parser.
 * Terms are lowercased and trimmed by normalizeIntent().
 */
export interface Intent {
  activity?: string;
  occasion?: string;
  budget_max?: number;
  /** Shopper used a strict phrase ("max", "no more than") */
  budget_strict?: boolean;
  objectives: string[];
  /** Ordered color terms, most preferred first */
  palette?: string[];
  formality: IntentFormality;
  size?: string;
  hard_exclusions: string[];
  season?: string;
  categories?: string[];
}

// ============================================
// CATALOG ITEM (INPUT)
// ============================================

/**
 * Attribute name → normalized values.
 * Known keys: color, material, style, season, occasion, formality, category, pattern.
 */
export type AttributeBag = Readonly<Record<string, readonly string[]>>;

/** Attribute name → confidence in [0, 1] */
export type ConfidenceBag = Readonly<Record<string, number>>;

export interface Availability {
  in_stock: boolean;
  sizes: readonly string[];
}

export interface CatalogItem {
  id: string;
  role: Role;
  price: number;
  availability: Availability;
  attributes: AttributeBag;
  attribute_confidence: ConfidenceBag;
  popularity_score?: number;
  recency_score?: number;
  title?: string;
}

// ============================================
// WEIGHT PROFILE
// ============================================

export type BudgetMode = 'none' | 'soft' | 'hard';

export interface HardConstraints {
  /** Always true: availability is a filter, never a weight */
  require_availability: true;
  exclusions: string[];
  size: string | null;
  budget_max: number | null;
  budget_mode: BudgetMode;
  /** Price above which items (and, in hard mode, whole outfits) are dropped */
  budget_ceiling: number | null;
}

/**
 * Comparison targets resolved from the intent and the vocabulary.
 * The scorer compares item attributes against these, never against raw intent text.
 */
export interface ResolvedTargets {
  palette: string[];
  occasions: string[];
  related_occasions: string[];
  styles: string[];
  materials: string[];
  categories: string[];
  categories_by_role: Partial<Record<Role, string[]>>;
  formality_level: number | null;
  season: string | null;
  performance_activity: boolean;
}

export interface WeightProfile {
  weights: DimensionWeights;
  constraints: HardConstraints;
  cohesion_bonus_cap: number;
  targets: ResolvedTargets;
  /** Ids of adaptive rules that fired, in evaluation order */
  applied_rules: string[];
}

// ============================================
// SCORE BREAKDOWN
// ============================================

export type MatchKind =
  | 'exact'
  | 'partial'
  | 'compatible'
  | 'mismatch'
  | 'neutral'
  | 'intrinsic';

export interface DimensionSignal {
  /** Raw match in [0, 1] */
  raw: number;
  /** false = attribute absent on the item, excluded from normalization */
  known: boolean;
  kind: MatchKind;
}

export interface DimensionContribution {
  dimension: Dimension;
  raw: number;
  weight: number;
  confidence: number;
  contribution: number;
  applied: boolean;
  kind: MatchKind;
}

export interface ItemScore {
  item_id: string;
  role: Role;
  /** 0-100 */
  score: number;
  applied_weight: number;
  /** false when no dimension applied (score is 0) */
  rankable: boolean;
  dimensions: DimensionContribution[];
}

export interface ScoredCandidate {
  item: CatalogItem;
  score: ItemScore;
  /** Position in the role's filtered list (first-seen tie-break) */
  order: number;
}

export type ScoredPool = Record<Role, ScoredCandidate[]>;

export interface CohesionBreakdown {
  color_harmony: number;
  style_coherence: number;
  occasion_consistency: number;
  uncapped: number;
  /** min(uncapped, cohesion_bonus_cap) */
  applied: number;
}

export type PenaltyCode =
  | 'DUPLICATE_CATEGORY'
  | 'FORMALITY_CLASH'
  | 'COLOR_CLASH'
  | 'OVER_BUDGET'
  | 'STALE_ITEMS';

export interface PenaltyLine {
  code: PenaltyCode;
  amount: number;
  item_ids: string[];
  detail: string;
}

export interface OutfitBreakdown {
  items: ItemScore[];
  /** Role-weighted mean of item scores */
  base_score: number;
  cohesion: CohesionBreakdown;
  penalties: PenaltyLine[];
  penalty_total: number;
  /** base + cohesion - penalties, before clipping */
  unclipped_score: number;
}

// ============================================
// OUTFITS
// ============================================

export interface OutfitEntry {
  role: Role;
  item: CatalogItem;
}

export type HighlightCode =
  | 'COLOR_HARMONY'
  | 'STYLE_COHERENCE'
  | 'OCCASION_CONSISTENCY'
  | 'WITHIN_BUDGET'
  | `${Uppercase<Dimension>}_MATCH`;

export interface OutfitCandidate {
  /** Deterministic from sorted item ids */
  id: string;
  track: OutfitTrack;
  /** Ordered by canonical role order */
  items: OutfitEntry[];
  score: number;
  total_price: number;
  min_item_score: number;
  is_partial: boolean;
  missing_roles: Role[];
  breakdown: OutfitBreakdown;
  highlights: HighlightCode[];
  /** Generation order, final tie-break */
  sequence: number;
}

// ============================================
// FALLBACK & WARNINGS
// ============================================

export type FallbackPolicy = 'omit' | 'relax';

export type RelaxableConstraint = 'budget' | 'size';

export type FallbackCode =
  | 'EMPTY_CANDIDATE_POOL'
  | 'ROLE_OMITTED'
  | 'CONSTRAINT_RELAXED'
  | 'RELAX_FAILED'
  | 'UNRANKABLE_ONLY'
  | 'NO_REQUIRED_ROLES';

export interface FallbackNotice {
  code: FallbackCode;
  role?: Role;
  relaxed?: RelaxableConstraint[];
  message: string;
}

export type DataWarningCode =
  | 'INVALID_ITEM'
  | 'DUPLICATE_ITEM'
  | 'VALUE_CLAMPED'
  | 'INVALID_INTENT_FIELD';

export interface DataWarning {
  code: DataWarningCode;
  item_id?: string;
  index?: number;
  field?: string;
  message: string;
}

// ============================================
// CANDIDATE POOL
// ============================================

export type FilterDropReason = 'unavailable' | 'size' | 'excluded' | 'over_budget';

export interface CandidatePool {
  by_role: Record<Role, CatalogItem[]>;
  dropped: Record<FilterDropReason, number>;
}

export interface TrackPlan {
  track: OutfitTrack;
  roles: Role[];
  missing_roles: Role[];
}

// ============================================
// RESULT
// ============================================

export interface EngineStats {
  input_items: number;
  invalid_items: number;
  dropped: Record<FilterDropReason, number>;
  candidates_by_role: Record<Role, number>;
  combinations_evaluated: number;
  outfits_returned: number;
}

export interface RankedResult {
  outfits: OutfitCandidate[];
  profile: WeightProfile;
  fallback_notices: FallbackNotice[];
  warnings: DataWarning[];
  stats: EngineStats;
}
