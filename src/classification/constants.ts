/**
 * Constants for the Charge Classification Pipeline
 *
 * Rule tables carry their own priorities; the tiers below are the values the
 * curated tables use and the values assumed when a file leaves them out.
 */

// ============================================
// SENTINELS
// ============================================

/**
 * Returned by the extractors and the charge classifier when nothing matched.
 * A rule table may not use it as a label or charge type.
 */
export const UNCLASSIFIED = 'UNCLASSIFIED' as const;

// ============================================
// PRIORITY TIERS
// ============================================

/**
 * Lower value wins. Vendor-specific rules sit in the first tier so they
 * always beat a matching default rule.
 */
export const PRIORITY_TIERS = {
  VENDOR_SPECIFIC: 1,
  DEFAULT: 99,
} as const;

// ============================================
// NORMALIZATION
// ============================================

/**
 * Characters OCR output and vendor templates scatter through descriptions.
 * Replaced with spaces; "&", "/" and single hyphens carry meaning (C&D,
 * 2X/WEEK, ROLL-OFF) and are kept.
 */
export const NOISE_CHARACTERS = /[*_|=~"'`,;:()[\]{}#!?<>]/g;

/**
 * Periods, except a decimal point between two digits.
 */
export const NON_DECIMAL_PERIOD = /(?<!\d)\.|\.(?!\d)/g;

/**
 * Two or more hyphens in a row act as a separator ("TRASH--PICKUP").
 */
export const HYPHEN_RUN = /-{2,}/g;

// ============================================
// REPORTING
// ============================================

/**
 * How many unclassified descriptions the statistics keep for rule curation.
 */
export const TOP_UNCLASSIFIED_LIMIT = 20;

/**
 * Invoice ↔ billing amount tolerances (dollars) and the score each earns.
 */
export const AMOUNT_MATCH = {
  EXACT_TOLERANCE: 0.02,
  CLOSE_TOLERANCE: 1.0,
  EXACT_SCORE: 10,
  CLOSE_SCORE: 5,
  MIN_SCORE: 5,
} as const;
