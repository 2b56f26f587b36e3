/**
 * Outfit Engine - Main Export
 *
 * A deterministic, rules-based engine that turns a structured shopping intent
 * and a product catalog into ranked, role-consistent outfits.
 *
 * Pipeline:
 * - Weight Profile Resolver: intent → weights, hard constraints, targets
 * - Candidate Filter: availability, size, exclusions, budget ceiling
 * - Item Scorer: confidence-adjusted weighted score (0-100)
 * - Outfit Assembler: top-M cross product, cohesion bonus, penalties
 * - Ranker & Fallback Controller: deterministic order, sparse-inventory notices
 */

// Types
export type {
  Role,
  OutfitTrack,
  Dimension,
  DimensionWeights,
  IntentFormality,
  Intent,
  AttributeBag,
  ConfidenceBag,
  Availability,
  CatalogItem,
  BudgetMode,
  HardConstraints,
  ResolvedTargets,
  WeightProfile,
  MatchKind,
  DimensionSignal,
  DimensionContribution,
  ItemScore,
  ScoredCandidate,
  ScoredPool,
  CohesionBreakdown,
  PenaltyCode,
  PenaltyLine,
  OutfitBreakdown,
  OutfitEntry,
  HighlightCode,
  OutfitCandidate,
  FallbackPolicy,
  RelaxableConstraint,
  FallbackCode,
  FallbackNotice,
  DataWarningCode,
  DataWarning,
  FilterDropReason,
  CandidatePool,
  TrackPlan,
  EngineStats,
  RankedResult,
} from './types';

// Config
export {
  ROLES,
  ROLE_ALIASES,
  DIMENSIONS,
  ADAPTIVE_RULES,
  BASELINE_WEIGHTS,
  DEFAULT_ENGINE_CONFIG,
  isRole,
  validateEngineConfig,
  mergeEngineConfig,
  type AdaptiveRule,
  type RuleTrigger,
  type RuleEffect,
  type WeightAdjuster,
  type BudgetPolicy,
  type CohesionConfig,
  type PenaltyConfig,
  type AssemblyConfig,
  type BudgetConfig,
  type EngineConfig,
  type EngineConfigOverrides,
} from './config';

// Errors
export { OutfitEngineError, ConfigurationError, isConfigurationError } from './errors';

// Validation
export {
  normalizeCatalogItems,
  normalizeIntent,
  resolveRole,
  type NormalizedCatalog,
  type NormalizedIntent,
} from './catalog-schema';

// Pipeline stages
export { resolveWeightProfile, resolveTargets } from './weights';
export { filterCandidates, filterRoleRelaxed, findExclusionHit } from './candidate-filter';
export { scoreItem, scoreCandidatePool, getDominantDimension } from './scoring';
export { computeCohesion, computePenalties } from './cohesion';
export { assembleOutfits, selectTopCandidates, type AssemblyResult } from './combo-assembler';
export { planTracks, unrankableNotices, type FallbackResult } from './fallback';
export { rankOutfits, compareOutfits } from './ranking';

// Main entry point
export { recommendOutfits } from './recommend';

// Analytics
export {
  setAnalyticsCallback,
  startNewSession,
  getSessionId,
  type OutfitEngineEvent,
  type EngineRunEvent,
  type FallbackEvent,
} from './analytics';
