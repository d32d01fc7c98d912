/**
 * Text Normalization for Charge Classification
 *
 * Vendors print the same charge in many surface forms. Normalizing first
 * lets one pattern cover all of them.
 *
 * Example transformations:
 * - "42 yd. Compactor -- Monthly Fee" → "42 YD COMPACTOR MONTHLY FEE"
 * - "Roll-Off Haul (P.O. #5521)" → "ROLL-OFF HAUL PO 5521"
 * - "Fuel/Env. Surcharge  2.5%" → "FUEL/ENV SURCHARGE 2.5%"
 */

import { HYPHEN_RUN, NOISE_CHARACTERS, NON_DECIMAL_PERIOD } from './constants';

/**
 * Normalizes a line-item description for pattern matching by:
 * 1. Converting to uppercase
 * 2. Dropping periods that are not decimal points
 * 3. Replacing noise characters and hyphen runs with spaces
 * 4. Collapsing whitespace and trimming
 * 5. Stripping hyphens left dangling at the edge of a token
 *
 * Idempotent: normalizeText(normalizeText(x)) === normalizeText(x).
 *
 * @example
 * normalizeText("  30yd compactor - trash disposal ") // "30YD COMPACTOR TRASH DISPOSAL"
 */
export function normalizeText(raw: string): string {
  if (!raw || typeof raw !== 'string') {
    return '';
  }

  const cleaned = raw
    .toUpperCase()
    .replace(NON_DECIMAL_PERIOD, '')
    .replace(NOISE_CHARACTERS, ' ')
    .replace(HYPHEN_RUN, ' ');

  return cleaned
    .split(/\s+/)
    .map((token) => token.replace(/^-+|-+$/g, ''))
    .filter((token) => token.length > 0)
    .join(' ');
}

/**
 * Key used wherever two names must compare as equal regardless of case or
 * spacing: vendor scopes, account identifiers, equipment/material labels.
 *
 * @example
 * toLookupKey(" Lawrence  waste ") // "LAWRENCE WASTE"
 */
export function toLookupKey(value: string | null | undefined): string {
  if (!value) return '';
  return value.trim().replace(/\s+/g, ' ').toUpperCase();
}

export default normalizeText;
