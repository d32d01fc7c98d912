/**
 * Charge Classification
 *
 * Resolves a line item to a standardized charge type using the first
 * matching rule among its vendor's candidates.
 */

import { UNCLASSIFIED } from './constants';
import { toLookupKey } from './normalizeText';
import type {
  ChargeClassification,
  CompiledChargeRule,
  CompiledChargeTable,
  ExtractedLabel,
  LineItem,
} from './types';

export interface ExtractedAttributes {
  equipment: ExtractedLabel;
  material: ExtractedLabel;
}

export const UNCLASSIFIED_CHARGE: Readonly<ChargeClassification> = Object.freeze({
  chargeType: UNCLASSIFIED,
  serviceType: null,
  matchTier: 'unclassified',
  ruleId: null,
});

/**
 * Rules for the vendor (exact match after trimming, case-insensitive) plus
 * the wildcard rules, in evaluation order.
 */
export function candidateRulesFor(
  vendorName: string,
  table: CompiledChargeTable
): readonly CompiledChargeRule[] {
  return table.candidatesByVendor.get(toLookupKey(vendorName)) ?? table.defaultCandidates;
}

function constraintHolds(expected: string | null, actual: ExtractedLabel | undefined): boolean {
  if (expected === null) return true;
  if (actual === undefined || actual === UNCLASSIFIED) return false;
  return toLookupKey(expected) === toLookupKey(actual);
}

/**
 * Classifies one line item. Never throws: an unmatched line yields the
 * UNCLASSIFIED outcome so it can be reported for rule-table maintenance.
 *
 * @param item - Only the vendor is read; the text comes pre-normalized
 * @param normalizedText - Output of normalizeText for the description
 * @param table - Compiled charge pattern table
 * @param extracted - Equipment/material labels, for rules that constrain them
 *
 * @example
 * classifyCharge({ vendorName: 'Lawrence Waste' }, '30YD COMPACTOR OCC HAUL', table)
 * // { chargeType: 'Empty & Return', matchTier: 'vendor-specific', ... }
 */
export function classifyCharge(
  item: Pick<LineItem, 'vendorName'>,
  normalizedText: string,
  table: CompiledChargeTable,
  extracted?: ExtractedAttributes
): ChargeClassification {
  if (!normalizedText) {
    return { ...UNCLASSIFIED_CHARGE };
  }

  for (const rule of candidateRulesFor(item.vendorName, table)) {
    if (!rule.expression.test(normalizedText)) continue;
    if (!constraintHolds(rule.equipment, extracted?.equipment)) continue;
    if (!constraintHolds(rule.material, extracted?.material)) continue;

    return {
      chargeType: rule.chargeType,
      serviceType: rule.serviceType,
      matchTier: rule.vendorScope.kind === 'vendor' ? 'vendor-specific' : 'default',
      ruleId: rule.id,
    };
  }

  return { ...UNCLASSIFIED_CHARGE };
}

export default classifyCharge;
