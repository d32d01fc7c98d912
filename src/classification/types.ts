/**
 * Type Definitions for the Charge Classification Pipeline
 *
 * Raw* types describe rule tables as they arrive from files or the API.
 * Compiled* types are the validated, immutable forms the pipeline consumes.
 */

// ============================================
// INPUT TYPES
// ============================================

/**
 * One billed entry from a vendor invoice, as produced by the upstream
 * extraction step.
 */
export interface LineItem {
  vendorName: string;
  accountIdentifier: string;
  rawDescription: string;
  amount: number | null;
  quantity: number | null;
  unitPrice: number | null;
  /** Kept as printed on the invoice; formats vary by vendor */
  serviceDate: string | null;
  invoiceNumber?: string | null;
  invoiceDate?: string | null;
  /** Source document (Document AI md5, upload file name, ...) */
  documentId?: string | null;
}

/** A canonical label, or the sentinel when no rule matched */
export type ExtractedLabel = string;

// ============================================
// ALIAS TABLES (equipment / material)
// ============================================

export type AliasPattern = { contains: string } | { regex: string };

export interface RawAliasRule {
  /** Canonical label; may use {1}, {2}... for regex capture groups */
  label: string;
  patterns: AliasPattern[];
}

export interface CompiledAliasRule {
  label: string;
  /** Case-insensitive; substrings are compiled to escaped expressions */
  expressions: readonly RegExp[];
}

export interface CompiledAliasTable {
  name: string;
  rules: readonly CompiledAliasRule[];
}

// ============================================
// CHARGE PATTERN TABLE
// ============================================

export type VendorScope = { kind: 'vendor'; vendorName: string } | { kind: 'any' };

export interface RawChargePatternRule {
  id?: string;
  /** Missing, null or blank means the rule applies to every vendor */
  vendor?: string | null;
  pattern: string;
  chargeType: string;
  serviceType?: string | null;
  priority?: number;
  sampleCount?: number;
  equipment?: string | null;
  material?: string | null;
}

export interface ChargePatternRule {
  id: string;
  vendorScope: VendorScope;
  pattern: string;
  chargeType: string;
  serviceType: string | null;
  priority: number;
  sampleCount: number;
  equipment: string | null;
  material: string | null;
}

export interface CompiledChargeRule extends ChargePatternRule {
  expression: RegExp;
  declarationIndex: number;
}

export interface CompiledChargeTable {
  rules: readonly CompiledChargeRule[];
  /** Wildcard rules only, in evaluation order */
  defaultCandidates: readonly CompiledChargeRule[];
  /** Vendor key → vendor + wildcard rules, in evaluation order */
  candidatesByVendor: ReadonlyMap<string, readonly CompiledChargeRule[]>;
}

export type MatchTier = 'vendor-specific' | 'default' | 'unclassified';

export interface ChargeClassification {
  chargeType: string;
  serviceType: string | null;
  matchTier: MatchTier;
  ruleId: string | null;
}

// ============================================
// ACCOUNT SERVICE MAP
// ============================================

export interface AccountServiceEntry {
  accountIdentifier: string;
  equipment: string;
  material: string;
  serviceId: string;
}

export interface CompiledServiceMap {
  entryCount: number;
  /** Account key → entries in file order */
  byAccount: ReadonlyMap<string, readonly AccountServiceEntry[]>;
}

export type ServiceResolution =
  | { status: 'RESOLVED'; serviceId: string; matchedOn: 'equipment+material' | 'equipment' }
  | { status: 'AMBIGUOUS'; candidateServiceIds: string[] }
  | { status: 'NOT_FOUND' };

export type ResolutionStatus = ServiceResolution['status'];

// ============================================
// RULE SET SNAPSHOT
// ============================================

export interface RuleSetSources {
  equipment: unknown;
  material: unknown;
  charges: unknown;
  services: unknown;
}

export interface RuleSet {
  version: string;
  loadedAt: Date;
  equipment: CompiledAliasTable;
  material: CompiledAliasTable;
  charges: CompiledChargeTable;
  services: CompiledServiceMap;
}

// ============================================
// OUTPUT TYPES
// ============================================

export interface ClassifiedLineItem extends LineItem {
  normalizedDescription: string;
  parsedEquipment: ExtractedLabel;
  parsedMaterial: ExtractedLabel;
  chargeType: string;
  serviceType: string | null;
  matchTier: MatchTier;
  matchedRuleId: string | null;
  serviceResolution: ServiceResolution;
  resolvedServiceId: string | null;
}

export interface DescriptionCount {
  description: string;
  count: number;
}

export interface ClassificationStats {
  total: number;
  byTier: Record<MatchTier, number>;
  byResolution: Record<ResolutionStatus, number>;
  unclassifiedByVendor: Record<string, number>;
  ambiguousByAccount: Record<string, number>;
  ruleHits: Record<string, number>;
  topUnclassifiedDescriptions: DescriptionCount[];
}

export interface ClassificationBatchResult {
  items: ClassifiedLineItem[];
  stats: ClassificationStats;
}

/**
 * One problem found while compiling a rule table.
 */
export interface RuleTableIssue {
  table: string;
  /** Zero-based position in the table, when the issue belongs to one entry */
  index?: number;
  path?: string;
  message: string;
}
