/**
 * Charge Classification Pipeline
 *
 * Pure, deterministic functions that turn free-text vendor invoice line
 * items into the standardized charge taxonomy:
 * - Text normalization
 * - Equipment / material extraction (ordered alias tables)
 * - Charge classification (priority-ordered pattern rules)
 * - Service disambiguation (account service map)
 *
 * Usage:
 * ```typescript
 * import { buildRuleSet, classifyLineItem } from './classification';
 *
 * const ruleSet = buildRuleSet({ equipment, material, charges, services });
 * const result = classifyLineItem(lineItem, ruleSet);
 * console.log(result.matchTier); // 'vendor-specific' | 'default' | 'unclassified'
 * ```
 */

// Pipeline
export { classifyLineItem, classifyLineItems } from './classifyLineItem';

// Individual stages (for testing/debugging)
export { normalizeText, toLookupKey } from './normalizeText';
export { extractAttribute, extractEquipment, extractMaterial } from './extractAttribute';
export { classifyCharge, candidateRulesFor, UNCLASSIFIED_CHARGE } from './classifyCharge';
export type { ExtractedAttributes } from './classifyCharge';
export { resolveService } from './resolveService';
export { summarizeClassifications, createStatsAccumulator } from './statistics';
export type { StatsAccumulator } from './statistics';

// Rule tables
export { compileAliasTable } from './aliasRules';
export { compileChargeTable, toChargePatternRule, toVendorScope, CHARGE_TABLE_NAME } from './chargeRules';
export { compileServiceMap, SERVICE_MAP_NAME } from './serviceMap';
export { buildRuleSet, ruleSetVersion, EQUIPMENT_TABLE_NAME, MATERIAL_TABLE_NAME } from './ruleSet';
export { RuleTableError, describeIssue } from './errors';

// Constants
export { UNCLASSIFIED, PRIORITY_TIERS, TOP_UNCLASSIFIED_LIMIT } from './constants';

// Types
export type {
  LineItem,
  ExtractedLabel,
  AliasPattern,
  RawAliasRule,
  CompiledAliasTable,
  VendorScope,
  RawChargePatternRule,
  ChargePatternRule,
  CompiledChargeRule,
  CompiledChargeTable,
  MatchTier,
  ChargeClassification,
  AccountServiceEntry,
  CompiledServiceMap,
  ServiceResolution,
  ResolutionStatus,
  RuleSetSources,
  RuleSet,
  ClassifiedLineItem,
  ClassificationStats,
  ClassificationBatchResult,
  RuleTableIssue,
} from './types';
