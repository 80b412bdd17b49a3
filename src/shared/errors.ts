/**
 * Error types surfaced by the region list pipeline.
 *
 * Callers only need to catch RegionListingError; the subclasses narrow
 * the reason when it matters.
 */

/**
 * Raised when the region list cannot be produced.
 */
export class RegionListingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RegionListingError';
  }
}

/**
 * Raised when getRegionList options fail validation.
 */
export class InvalidRegionOptionsError extends RegionListingError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InvalidRegionOptionsError';
  }
}

/**
 * Raised when environment settings are invalid.
 */
export class RegionListingConfigError extends RegionListingError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RegionListingConfigError';
  }
}

/**
 * Renders any thrown value as a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
