/**
 * Outfit Engine - Recommendation Pipeline
 *
 * validate → resolve weights → filter → fallback plan → score → assemble → rank
 *
 * Only ConfigurationError is thrown. Bad records, bad intent fields and
 * sparse inventory all come back as warnings and notices on the result.
 */

import { shouldLogPipeline } from '../debug-config';
import { DEFAULT_ENGINE_CONFIG, ROLES, createRoleRecord } from './config';
import type { EngineConfig } from './config';
import { trackEngineRun, trackFallbacks } from './analytics';
import { filterCandidates } from './candidate-filter';
import { normalizeCatalogItems, normalizeIntent } from './catalog-schema';
import { assembleOutfits } from './combo-assembler';
import { isPoolEmpty, planTracks, unrankableNotices } from './fallback';
import { rankOutfits } from './ranking';
import { scoreCandidatePool } from './scoring';
import { resolveWeightProfile } from './weights';
import type {
  CandidatePool,
  DataWarning,
  EngineStats,
  FallbackNotice,
  OutfitCandidate,
  RankedResult,
  WeightProfile,
} from './types';

function countSkipped(warnings: readonly DataWarning[]): number {
  return warnings.filter(warning => warning.code === 'INVALID_ITEM' || warning.code === 'DUPLICATE_ITEM')
    .length;
}

function buildStats(
  validItems: number,
  invalidItems: number,
  pool: CandidatePool,
  combinationsEvaluated: number,
  outfitsReturned: number
): EngineStats {
  const candidatesByRole = createRoleRecord(() => 0);
  for (const role of ROLES) {
    candidatesByRole[role] = pool.by_role[role].length;
  }
  return {
    input_items: validItems + invalidItems,
    invalid_items: invalidItems,
    dropped: { ...pool.dropped },
    candidates_by_role: candidatesByRole,
    combinations_evaluated: combinationsEvaluated,
    outfits_returned: outfitsReturned,
  };
}

function finish(
  outfits: OutfitCandidate[],
  profile: WeightProfile,
  notices: FallbackNotice[],
  warnings: DataWarning[],
  stats: EngineStats,
  config: EngineConfig
): RankedResult {
  const result: RankedResult = {
    outfits,
    profile,
    fallback_notices: notices,
    warnings,
    stats,
  };

  trackEngineRun(result);
  trackFallbacks(result, config.fallbackPolicy);

  if (shouldLogPipeline()) {
    console.log('[OutfitEngine] Done', {
      outfits: outfits.map(outfit => ({ id: outfit.id, score: outfit.score })),
      notices: notices.map(notice => notice.code),
      warnings: warnings.length,
    });
  }

  return result;
}

/**
 * Recommend outfits for a parsed intent from raw catalog records.
 *
 * @param rawIntent - structured intent from the upstream parser
 * @param rawItems - catalog records; invalid ones are skipped with a warning
 * @throws ConfigurationError before any scoring when the config is invalid
 */
export function recommendOutfits(
  rawIntent: unknown,
  rawItems: Iterable<unknown>,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): RankedResult {
  const { intent, warnings: intentWarnings } = normalizeIntent(rawIntent);
  const profile = resolveWeightProfile(intent, config);

  const catalog = normalizeCatalogItems(rawItems);
  const warnings = [...intentWarnings, ...catalog.warnings];
  const invalidItems = countSkipped(catalog.warnings);

  const pool = filterCandidates(catalog.items, profile);

  // Under relax, an empty pool still gets a relaxed pass before giving up
  const fallback =
    isPoolEmpty(pool) && config.fallbackPolicy === 'omit'
      ? null
      : planTracks(pool, catalog.items, profile, config);

  if (fallback === null || isPoolEmpty(fallback.pool)) {
    const notice: FallbackNotice = {
      code: 'EMPTY_CANDIDATE_POOL',
      message: 'No catalog item passed the hard constraints',
    };
    const stats = buildStats(catalog.items.length, invalidItems, pool, 0, 0);
    return finish([], profile, [notice], warnings, stats, config);
  }

  const scored = scoreCandidatePool(fallback.pool, profile);
  const notices = [...fallback.notices, ...unrankableNotices(scored, fallback.plans)];

  const assembly = assembleOutfits(scored, fallback.plans, profile, config, {
    relaxed: fallback.relaxed,
  });
  const outfits = rankOutfits(assembly.outfits, config.resultCount);

  const stats = buildStats(
    catalog.items.length,
    invalidItems,
    fallback.pool,
    assembly.combinations_evaluated,
    outfits.length
  );
  return finish(outfits, profile, notices, warnings, stats, config);
}
