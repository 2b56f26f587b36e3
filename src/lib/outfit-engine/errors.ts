/**
 * Outfit Engine - Errors
 *
 * Only configuration problems are thrown. Inventory sparsity and bad catalog
 * data are reported through FallbackNotice / DataWarning values instead.
 */

export type OutfitEngineErrorCode = 'CONFIGURATION_ERROR';

export class OutfitEngineError extends Error {
  readonly code: OutfitEngineErrorCode;

  constructor(code: OutfitEngineErrorCode, message: string) {
    super(message);
    this.name = 'OutfitEngineError';
    this.code = code;
  }
}

/**
 * Malformed engine configuration (negative weight, negative cap, bad override).
 * Raised before any scoring happens.
 */
export class ConfigurationError extends OutfitEngineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIGURATION_ERROR', `Invalid outfit engine configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
