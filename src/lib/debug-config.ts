/**
 * Debug Feature Flags
 *
 * These flags control debug logging throughout the engine.
 * Outside development (NODE_ENV !== 'development'), debug output is off
 * unless OUTFIT_ENGINE_DEBUG=true forces it on.
 */

const isDevelopment = process.env.NODE_ENV === 'development';
const isForced = process.env.OUTFIT_ENGINE_DEBUG === 'true';

export const DEBUG_FEATURES = {
  /**
   * Log per-stage summaries (profile, filter counts, assembly counts)
   */
  LOG_PIPELINE: isDevelopment,

  /**
   * Log analytics events to console before delivering them to the callback
   */
  LOG_ANALYTICS_EVENTS: isDevelopment,

  /**
   * Emergency flag for production debugging
   * Read once at module load
   */
  FORCE_DEBUG_MODE: isForced,
} as const;

/**
 * Helper to check if pipeline stages should log
 */
export const shouldLogPipeline = (): boolean =>
  DEBUG_FEATURES.LOG_PIPELINE || DEBUG_FEATURES.FORCE_DEBUG_MODE;

/**
 * Helper to check if analytics events should be echoed to console
 */
export const shouldLogAnalytics = (): boolean =>
  DEBUG_FEATURES.LOG_ANALYTICS_EVENTS || DEBUG_FEATURES.FORCE_DEBUG_MODE;
