/**
 * Equipment and Material Extraction
 *
 * Both extractors run the same first-match-wins scan over an ordered alias
 * table. They are independent, so one description can yield both an
 * equipment label and a material label:
 *
 *   "30YD COMPACTOR TRASH DISPOSAL" → "30YD Compactor" + "Trash"
 */

import { UNCLASSIFIED } from './constants';
import type { CompiledAliasTable, ExtractedLabel, RuleSet } from './types';

function fillLabel(label: string, match: RegExpExecArray): string {
  return label
    .replace(/\{(\d+)\}/g, (_placeholder, group: string) => match[Number(group)] ?? '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Returns the label of the first rule with any expression found in the text,
 * or UNCLASSIFIED.
 *
 * @param normalizedText - Output of normalizeText
 *
 * @example
 * extractAttribute('42YD COMPACTOR MONTHLY FEE', ruleSet.equipment) // "42YD Compactor"
 */
export function extractAttribute(normalizedText: string, table: CompiledAliasTable): ExtractedLabel {
  if (!normalizedText) {
    return UNCLASSIFIED;
  }

  for (const rule of table.rules) {
    for (const expression of rule.expressions) {
      const match = expression.exec(normalizedText);
      if (match) {
        return fillLabel(rule.label, match) || UNCLASSIFIED;
      }
    }
  }

  return UNCLASSIFIED;
}

export function extractEquipment(normalizedText: string, ruleSet: Pick<RuleSet, 'equipment'>): ExtractedLabel {
  return extractAttribute(normalizedText, ruleSet.equipment);
}

export function extractMaterial(normalizedText: string, ruleSet: Pick<RuleSet, 'material'>): ExtractedLabel {
  return extractAttribute(normalizedText, ruleSet.material);
}
