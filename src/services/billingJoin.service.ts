/**
 * Billing Join Service
 *
 * Pairs extracted invoice lines with the charges billing recorded for the
 * same invoice document. The joined rows show how a vendor's wording maps to
 * the internal charge taxonomy, which is the raw material for new charge
 * pattern rules:
 *
 *   "MONTHLY EQUIPMENT FEE" $811.00 → "Monthly Service Commercial" $811.00
 *
 * SCORING (per candidate billing charge of the same document):
 * - Amount within $0.02: +10, within $1.00: +5
 * - +1 per distinct word both descriptions share
 * The first charge with the highest score wins; below 5 is no match.
 */

import { AMOUNT_MATCH } from '../classification/constants';
import { parseAmount } from '../utils/csv';

// ============================================
// Types
// ============================================

export type AmountInput = number | string | null | undefined;

export interface InvoiceLineInput {
  documentId: string;
  description: string;
  amount?: AmountInput;
  vendorName?: string | null;
  accountIdentifier?: string | null;
  invoiceDate?: string | null;
  parsedEquipment?: string | null;
  parsedMaterial?: string | null;
}

export interface BillingChargeInput {
  documentId: string;
  chargeDescription: string;
  cost?: AmountInput;
  price?: AmountInput;
  equipmentType?: string | null;
  material?: string | null;
  serviceType?: string | null;
  serviceId?: string | null;
}

interface InvoiceLineFields {
  documentId: string;
  vendorName: string | null;
  accountIdentifier: string | null;
  invoiceDate: string | null;
  invoiceDescription: string;
  parsedEquipment: string | null;
  parsedMaterial: string | null;
  invoiceAmount: number | null;
}

export interface JoinedMappingRow extends InvoiceLineFields {
  billingDescription: string;
  billingEquipmentType: string | null;
  billingMaterial: string | null;
  billingServiceType: string | null;
  billingServiceId: string | null;
  billingAmount: number | null;
  matchScore: number;
  amountVariance: number | null;
}

export type UnmatchedReason = 'NO_CONFIDENT_MATCH' | 'DOCUMENT_NOT_IN_BILLING';

export interface UnmatchedLineRow extends InvoiceLineFields {
  matchScore: number;
  reason: UnmatchedReason;
}

export interface JoinCounts {
  invoiceDocuments: number;
  billingDocuments: number;
  commonDocuments: number;
  joinedRows: number;
  unmatchedRows: number;
  exactAmountMatches: number;
}

export interface BillingJoinResult {
  joined: JoinedMappingRow[];
  unmatched: UnmatchedLineRow[];
  counts: JoinCounts;
}

export interface MappingPairCount {
  invoiceDescription: string;
  billingDescription: string;
  count: number;
}

export const DEFAULT_SUMMARY_LIMIT = 20;

// ============================================
// Helpers
// ============================================

export const toDocumentKey = (documentId: string): string => documentId.trim().toLowerCase();

export function toAmount(value: AmountInput): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  return parseAmount(value);
}

function descriptionWords(description: string): Set<string> {
  return new Set(description.toUpperCase().split(/\s+/).filter(Boolean));
}

function groupByDocument<T extends { documentId: string }>(items: readonly T[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = toDocumentKey(item.documentId);
    const group = groups.get(key) ?? [];
    group.push(item);
    groups.set(key, group);
  }
  return groups;
}

const billingAmountOf = (charge: BillingChargeInput): number | null =>
  toAmount(charge.cost) ?? toAmount(charge.price);

/**
 * Amount component of the match score. Zero or missing amounts never score.
 */
export function scoreAmount(invoiceAmount: number | null, billingAmount: number | null): number {
  if (!invoiceAmount || !billingAmount) return 0;

  const difference = Math.abs(invoiceAmount - billingAmount);
  if (difference < AMOUNT_MATCH.EXACT_TOLERANCE) return AMOUNT_MATCH.EXACT_SCORE;
  if (difference < AMOUNT_MATCH.CLOSE_TOLERANCE) return AMOUNT_MATCH.CLOSE_SCORE;
  return 0;
}

/**
 * Number of distinct words the two descriptions share
 */
export function scoreDescriptionOverlap(invoiceDescription: string, billingDescription: string): number {
  const invoiceWords = descriptionWords(invoiceDescription);
  let overlap = 0;
  for (const word of descriptionWords(billingDescription)) {
    if (invoiceWords.has(word)) overlap++;
  }
  return overlap;
}

function toLineFields(line: InvoiceLineInput, documentKey: string): InvoiceLineFields {
  return {
    documentId: documentKey,
    vendorName: line.vendorName ?? null,
    accountIdentifier: line.accountIdentifier ?? null,
    invoiceDate: line.invoiceDate ?? null,
    invoiceDescription: line.description,
    parsedEquipment: line.parsedEquipment ?? null,
    parsedMaterial: line.parsedMaterial ?? null,
    invoiceAmount: toAmount(line.amount),
  };
}

const roundCents = (value: number): number => Math.round(value * 100) / 100;

// ============================================
// Join
// ============================================

/**
 * Joins invoice lines to billing charges of the same document.
 *
 * @example
 * joinInvoiceToBilling(
 *   [{ documentId: 'abc', description: 'MONTHLY EQUIPMENT FEE', amount: 811 }],
 *   [{ documentId: 'ABC', chargeDescription: 'Monthly Service Commercial', cost: 811 }]
 * ).joined[0].matchScore // 10
 */
export function joinInvoiceToBilling(
  invoiceLines: readonly InvoiceLineInput[],
  billingCharges: readonly BillingChargeInput[]
): BillingJoinResult {
  const linesByDocument = groupByDocument(invoiceLines);
  const chargesByDocument = groupByDocument(billingCharges);

  const joined: JoinedMappingRow[] = [];
  const unmatched: UnmatchedLineRow[] = [];
  let commonDocuments = 0;

  for (const [documentKey, lines] of linesByDocument) {
    const charges = chargesByDocument.get(documentKey);

    if (!charges) {
      for (const line of lines) {
        unmatched.push({ ...toLineFields(line, documentKey), matchScore: 0, reason: 'DOCUMENT_NOT_IN_BILLING' });
      }
      continue;
    }

    commonDocuments++;

    for (const line of lines) {
      const fields = toLineFields(line, documentKey);
      let bestMatch: BillingChargeInput | null = null;
      let bestScore = 0;

      for (const charge of charges) {
        const score =
          scoreAmount(fields.invoiceAmount, billingAmountOf(charge)) +
          scoreDescriptionOverlap(line.description, charge.chargeDescription);

        if (score > bestScore) {
          bestScore = score;
          bestMatch = charge;
        }
      }

      if (!bestMatch || bestScore < AMOUNT_MATCH.MIN_SCORE) {
        unmatched.push({ ...fields, matchScore: bestScore, reason: 'NO_CONFIDENT_MATCH' });
        continue;
      }

      const billingAmount = billingAmountOf(bestMatch);
      joined.push({
        ...fields,
        billingDescription: bestMatch.chargeDescription,
        billingEquipmentType: bestMatch.equipmentType ?? null,
        billingMaterial: bestMatch.material ?? null,
        billingServiceType: bestMatch.serviceType ?? null,
        billingServiceId: bestMatch.serviceId ?? null,
        billingAmount,
        matchScore: bestScore,
        amountVariance:
          fields.invoiceAmount === null ? null : roundCents(fields.invoiceAmount - (billingAmount ?? 0)),
      });
    }
  }

  const exactAmountMatches = joined.filter(
    (row) => row.amountVariance !== null && Math.abs(row.amountVariance) < AMOUNT_MATCH.EXACT_TOLERANCE
  ).length;

  return {
    joined,
    unmatched,
    counts: {
      invoiceDocuments: linesByDocument.size,
      billingDocuments: chargesByDocument.size,
      commonDocuments,
      joinedRows: joined.length,
      unmatchedRows: unmatched.length,
      exactAmountMatches,
    },
  };
}

/**
 * Most frequent (invoice description → billing description) pairs
 */
export function summarizeJoinedMappings(
  rows: readonly JoinedMappingRow[],
  limit: number = DEFAULT_SUMMARY_LIMIT
): MappingPairCount[] {
  const counts = new Map<string, MappingPairCount>();

  for (const row of rows) {
    const key = `${row.invoiceDescription}\u0000${row.billingDescription}`;
    const existing = counts.get(key);
    if (existing) {
      existing.count++;
    } else {
      counts.set(key, {
        invoiceDescription: row.invoiceDescription,
        billingDescription: row.billingDescription,
        count: 1,
      });
    }
  }

  const compare = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

  return [...counts.values()]
    .sort(
      (a, b) =>
        b.count - a.count ||
        compare(a.invoiceDescription, b.invoiceDescription) ||
        compare(a.billingDescription, b.billingDescription)
    )
    .slice(0, limit);
}

export const billingJoinService = {
  joinInvoiceToBilling,
  summarizeJoinedMappings,
};
