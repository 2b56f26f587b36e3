/**
 * Outfit Engine - Analytics Module
 *
 * Observe only. Events go to a registered callback; the engine never
 * waits on or reads back from the sink.
 */

import { shouldLogAnalytics } from '../debug-config';
import type {
  BudgetMode,
  FallbackCode,
  FallbackPolicy,
  RankedResult,
  RelaxableConstraint,
  Role,
} from './types';

// ============================================
// EVENT TYPES
// ============================================

export interface OutfitEngineEvent {
  name: string;
  properties: Record<string, unknown>;
  timestamp: string;
}

export interface EngineRunEvent extends OutfitEngineEvent {
  name: 'outfit_engine_run';
  properties: {
    session_id: string;
    applied_rules: string[];
    budget_mode: BudgetMode;
    input_items: number;
    invalid_items: number;
    candidates_total: number;
    combinations_evaluated: number;
    outfits_returned: number;
    top_score: number | null;
    partial_outfits: number;
    fallback_count: number;
    warning_count: number;
  };
}

export interface FallbackEvent extends OutfitEngineEvent {
  name: 'outfit_engine_fallback';
  properties: {
    session_id: string;
    code: FallbackCode;
    role: Role | null;
    relaxed: RelaxableConstraint[];
    policy: FallbackPolicy;
  };
}

// ============================================
// ANALYTICS TRACKER
// ============================================

type EventCallback = (event: OutfitEngineEvent) => void;

let eventCallback: EventCallback | null = null;
let sessionId: string = generateSessionId();

function generateSessionId(): string {
  return `oe_${Date.now()}_${Math.random().toString(36).slice(2, 9)}`;
}

/**
 * Set the callback for receiving analytics events.
 * Integrate with your analytics service here.
 */
export function setAnalyticsCallback(callback: EventCallback | null): void {
  eventCallback = callback;
}

/**
 * Start a new analytics session.
 */
export function startNewSession(): string {
  sessionId = generateSessionId();
  return sessionId;
}

export function getSessionId(): string {
  return sessionId;
}

/**
 * Deliver an event. A throwing callback is logged, never propagated
 * into the recommendation result.
 */
function trackEvent(event: OutfitEngineEvent): void {
  if (shouldLogAnalytics()) {
    console.log(`[OutfitEngine] ${event.name}`, event.properties);
  }

  if (!eventCallback) return;
  try {
    eventCallback(event);
  } catch (error) {
    console.warn(`[OutfitEngine] analytics callback failed for ${event.name}`, error);
  }
}

// ============================================
// TRACKING FUNCTIONS
// ============================================

/**
 * Track one completed run.
 */
export function trackEngineRun(result: RankedResult): void {
  const candidatesTotal = Object.values(result.stats.candidates_by_role).reduce(
    (sum, count) => sum + count,
    0
  );
  const top = result.outfits[0];

  const event: EngineRunEvent = {
    name: 'outfit_engine_run',
    timestamp: new Date().toISOString(),
    properties: {
      session_id: sessionId,
      applied_rules: result.profile.applied_rules,
      budget_mode: result.profile.constraints.budget_mode,
      input_items: result.stats.input_items,
      invalid_items: result.stats.invalid_items,
      candidates_total: candidatesTotal,
      combinations_evaluated: result.stats.combinations_evaluated,
      outfits_returned: result.outfits.length,
      top_score: top ? top.score : null,
      partial_outfits: result.outfits.filter(outfit => outfit.is_partial).length,
      fallback_count: result.fallback_notices.length,
      warning_count: result.warnings.length,
    },
  };
  trackEvent(event);
}

/**
 * Track each fallback notice of a run.
 */
export function trackFallbacks(result: RankedResult, policy: FallbackPolicy): void {
  for (const notice of result.fallback_notices) {
    const event: FallbackEvent = {
      name: 'outfit_engine_fallback',
      timestamp: new Date().toISOString(),
      properties: {
        session_id: sessionId,
        code: notice.code,
        role: notice.role ?? null,
        relaxed: notice.relaxed ?? [],
        policy,
      },
    };
    trackEvent(event);
  }
}
