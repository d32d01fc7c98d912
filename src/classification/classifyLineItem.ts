/**
 * Line Item Classification Pipeline
 *
 * Flow, per item:
 * 1. Normalize the description
 * 2. Extract equipment and material (independently)
 * 3. Classify the charge (vendor rules, then defaults)
 * 4. Resolve the downstream service
 *
 * Pure: the result depends only on the item and the rule set snapshot.
 */

import { classifyCharge } from './classifyCharge';
import { extractEquipment, extractMaterial } from './extractAttribute';
import { normalizeText } from './normalizeText';
import { resolveService } from './resolveService';
import { summarizeClassifications } from './statistics';
import type { ClassificationBatchResult, ClassifiedLineItem, LineItem, RuleSet } from './types';

/**
 * Classifies one line item against a rule set snapshot.
 *
 * @example
 * classifyLineItem(
 *   { vendorName: 'Rumpke', accountIdentifier: 'A-1', rawDescription: '42YD COMPACTOR MONTHLY FEE', ... },
 *   ruleSet
 * );
 * // { parsedEquipment: '42YD Compactor', chargeType: 'Monthly Service Commercial', matchTier: 'default', ... }
 */
export function classifyLineItem(item: LineItem, ruleSet: RuleSet): ClassifiedLineItem {
  const normalizedDescription = normalizeText(item.rawDescription);
  const parsedEquipment = extractEquipment(normalizedDescription, ruleSet);
  const parsedMaterial = extractMaterial(normalizedDescription, ruleSet);

  const charge = classifyCharge(item, normalizedDescription, ruleSet.charges, {
    equipment: parsedEquipment,
    material: parsedMaterial,
  });

  const serviceResolution = resolveService(
    item.accountIdentifier,
    parsedEquipment,
    parsedMaterial,
    ruleSet.services
  );

  return {
    ...item,
    normalizedDescription,
    parsedEquipment,
    parsedMaterial,
    chargeType: charge.chargeType,
    serviceType: charge.serviceType,
    matchTier: charge.matchTier,
    matchedRuleId: charge.ruleId,
    serviceResolution,
    resolvedServiceId: serviceResolution.status === 'RESOLVED' ? serviceResolution.serviceId : null,
  };
}

/**
 * Classifies a batch with a single snapshot and summarizes the outcome.
 */
export function classifyLineItems(
  items: readonly LineItem[],
  ruleSet: RuleSet
): ClassificationBatchResult {
  const classified = items.map((item) => classifyLineItem(item, ruleSet));
  return { items: classified, stats: summarizeClassifications(classified) };
}

export default classifyLineItem;
