/**
 * Charge Pattern Rule Table
 *
 * Rules are evaluated in the total order (priority ascending, declaration
 * order). Vendor scoping is a hard pre-filter: a rule scoped to one vendor is
 * never a candidate for another vendor's line items.
 */

import { z } from 'zod';
import { PRIORITY_TIERS, UNCLASSIFIED } from './constants';
import { RuleTableError } from './errors';
import { toLookupKey } from './normalizeText';
import { compilePattern, toTableIssues } from './patterns';
import type {
  ChargePatternRule,
  CompiledChargeRule,
  CompiledChargeTable,
  RawChargePatternRule,
  RuleTableIssue,
  VendorScope,
} from './types';

const optionalText = z.string().trim().nullable().optional();

const chargeRuleSchema = z.object({
  id: z.string().trim().min(1).optional(),
  vendor: optionalText,
  pattern: z.string().min(1, 'pattern is required'),
  chargeType: z.string().trim().min(1, 'chargeType is required'),
  serviceType: optionalText,
  priority: z.number().int('priority must be an integer').optional(),
  sampleCount: z.number().int().nonnegative().optional(),
  equipment: optionalText,
  material: optionalText,
});

export const chargeTableSchema = z.array(chargeRuleSchema);

export const CHARGE_TABLE_NAME = 'charge-patterns';

function blankToNull(value: string | null | undefined): string | null {
  return value ? value : null;
}

export function toVendorScope(vendor: string | null | undefined): VendorScope {
  const vendorName = vendor?.trim();
  return vendorName ? { kind: 'vendor', vendorName } : { kind: 'any' };
}

/**
 * Fills defaults: wildcard scope for a blank vendor, the vendor or default
 * priority tier, a positional id.
 */
export function toChargePatternRule(raw: RawChargePatternRule, index: number): ChargePatternRule {
  const vendorScope = toVendorScope(raw.vendor);
  const defaultPriority =
    vendorScope.kind === 'vendor' ? PRIORITY_TIERS.VENDOR_SPECIFIC : PRIORITY_TIERS.DEFAULT;

  return {
    id: raw.id ?? `${CHARGE_TABLE_NAME}#${index + 1}`,
    vendorScope,
    pattern: raw.pattern,
    chargeType: raw.chargeType,
    serviceType: blankToNull(raw.serviceType),
    priority: raw.priority ?? defaultPriority,
    sampleCount: raw.sampleCount ?? 0,
    equipment: blankToNull(raw.equipment),
    material: blankToNull(raw.material),
  };
}

function byEvaluationOrder(a: CompiledChargeRule, b: CompiledChargeRule): number {
  return a.priority - b.priority || a.declarationIndex - b.declarationIndex;
}

/**
 * Validates and compiles the charge pattern table, precomputing each vendor's
 * candidate list.
 *
 * @throws RuleTableError listing every malformed entry
 */
export function compileChargeTable(raw: unknown): CompiledChargeTable {
  const parsed = chargeTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RuleTableError(toTableIssues(CHARGE_TABLE_NAME, parsed.error.issues));
  }

  const issues: RuleTableIssue[] = [];
  const seenIds = new Set<string>();
  const compiled: CompiledChargeRule[] = [];

  parsed.data.forEach((entry, index) => {
    const rule = toChargePatternRule(entry, index);

    if (seenIds.has(rule.id)) {
      issues.push({ table: CHARGE_TABLE_NAME, index, path: 'id', message: `duplicate id "${rule.id}"` });
    }
    seenIds.add(rule.id);

    if (toLookupKey(rule.chargeType) === UNCLASSIFIED) {
      issues.push({
        table: CHARGE_TABLE_NAME,
        index,
        path: 'chargeType',
        message: `${UNCLASSIFIED} is reserved`,
      });
    }

    const expression = compilePattern(rule.pattern);
    if (typeof expression === 'string') {
      issues.push({ table: CHARGE_TABLE_NAME, index, path: 'pattern', message: `invalid regex: ${expression}` });
      return;
    }

    compiled.push(Object.freeze({ ...rule, expression, declarationIndex: index }));
  });

  if (issues.length > 0) {
    throw new RuleTableError(issues);
  }

  const rules = [...compiled].sort(byEvaluationOrder);
  const defaultCandidates = rules.filter((rule) => rule.vendorScope.kind === 'any');

  const candidatesByVendor = new Map<string, readonly CompiledChargeRule[]>();
  for (const rule of rules) {
    if (rule.vendorScope.kind !== 'vendor') continue;
    const vendorKey = toLookupKey(rule.vendorScope.vendorName);
    if (candidatesByVendor.has(vendorKey)) continue;

    candidatesByVendor.set(
      vendorKey,
      Object.freeze(
        rules.filter(
          (candidate) =>
            candidate.vendorScope.kind === 'any' ||
            toLookupKey(candidate.vendorScope.vendorName) === vendorKey
        )
      )
    );
  }

  return Object.freeze({
    rules: Object.freeze(rules),
    defaultCandidates: Object.freeze(defaultCandidates),
    candidatesByVendor,
  });
}
