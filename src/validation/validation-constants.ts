/**
 * Validation-specific constants
 */

/**
 * Limit for validation issue preview length (characters).
 */
export const PREVIEW_LIMIT = 140;

/**
 * Maximum number of per-character issues reported by `validateReflow()`.
 * The summary still counts every discrepancy.
 */
export const MAX_REPORTED_ISSUES = 50;
