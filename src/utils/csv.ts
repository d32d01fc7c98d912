/**
 * CSV Utilities for Line-Item Files
 *
 * Line-item extracts arrive as CSV (one row per invoice line). Parsing is
 * row-by-row so the batch worker can stream large files.
 */

import { parse, type Options, type Parser } from 'csv-parse';
import { parse as parseSync } from 'csv-parse/sync';
import type { LineItem } from '../classification/types';

// ============================================
// Types
// ============================================

/**
 * Raw CSV row from a line-item extract (headers lower-cased)
 */
export interface LineItemCsvRow {
  vendor_name?: string;
  account_number?: string;
  line_description?: string;
  line_amount?: string;
  line_quantity?: string;
  line_unit_price?: string;
  service_date?: string;
  invoice_number?: string;
  invoice_date?: string;
  json_md5?: string;
}

/**
 * Result of parsing a single row
 */
export type RowParseResult =
  | { success: true; data: LineItem; rowNumber: number }
  | { success: false; error: string; rowNumber: number };

/**
 * Required columns in the CSV file
 */
export const REQUIRED_COLUMNS = ['vendor_name', 'account_number', 'line_description'] as const;

// ============================================
// Validation Functions
// ============================================

/**
 * Validates that all required columns are present in the CSV headers
 */
export function validateCsvHeaders(headers: string[]): { valid: boolean; missing: string[] } {
  const normalizedHeaders = headers.map((h) => h.toLowerCase().trim());
  const missing = REQUIRED_COLUMNS.filter((col) => !normalizedHeaders.includes(col));

  return {
    valid: missing.length === 0,
    missing,
  };
}

/**
 * Parses a money or quantity string
 * Handles: "1234.56", "$1,234.56", "-500.00", "(25.00)" (credit)
 */
export function parseAmount(value: string | null | undefined): number | null {
  if (!value || value.trim() === '') {
    return null;
  }

  let cleaned = value.replace(/[$,\s]/g, '');
  let sign = 1;
  const accounting = cleaned.match(/^\((.*)\)$/);
  if (accounting) {
    cleaned = accounting[1];
    sign = -1;
  }

  if (!/^[-+]?(\d+\.?\d*|\.\d+)$/.test(cleaned)) {
    return null;
  }

  // Round to 2 decimal places to avoid floating point issues
  return (Math.round(parseFloat(cleaned) * 100) / 100) * sign;
}

const optionalText = (value: string | undefined): string | null => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

function parseOptionalNumber(
  row: LineItemCsvRow,
  column: 'line_amount' | 'line_quantity' | 'line_unit_price'
): { value: number | null; error?: string } {
  const raw = row[column];
  if (!raw || raw.trim() === '') {
    return { value: null };
  }
  const value = parseAmount(raw);
  return value === null ? { value, error: `Invalid ${column}: "${raw}"` } : { value };
}

/**
 * Parses and validates a single CSV row
 */
export function parseLineItemRow(row: LineItemCsvRow, rowNumber: number): RowParseResult {
  const vendorName = row.vendor_name?.trim();
  if (!vendorName) {
    return { success: false, error: 'Missing or empty vendor_name', rowNumber };
  }

  const accountIdentifier = row.account_number?.trim();
  if (!accountIdentifier) {
    return { success: false, error: 'Missing or empty account_number', rowNumber };
  }

  const rawDescription = row.line_description?.trim();
  if (!rawDescription) {
    return { success: false, error: 'Missing or empty line_description', rowNumber };
  }

  const amount = parseOptionalNumber(row, 'line_amount');
  const quantity = parseOptionalNumber(row, 'line_quantity');
  const unitPrice = parseOptionalNumber(row, 'line_unit_price');
  const numberError = amount.error ?? quantity.error ?? unitPrice.error;
  if (numberError) {
    return { success: false, error: numberError, rowNumber };
  }

  return {
    success: true,
    data: {
      vendorName,
      accountIdentifier,
      rawDescription,
      amount: amount.value,
      quantity: quantity.value,
      unitPrice: unitPrice.value,
      serviceDate: optionalText(row.service_date),
      invoiceNumber: optionalText(row.invoice_number),
      invoiceDate: optionalText(row.invoice_date),
      documentId: optionalText(row.json_md5),
    },
    rowNumber,
  };
}

// ============================================
// Parsers
// ============================================

const PARSE_OPTIONS: Options = {
  columns: (header: string[]) => header.map((column) => column.toLowerCase().trim()),
  skip_empty_lines: true,
  trim: true,
  bom: true,
};

/**
 * Flattens a parsed record to string cells.
 */
export function toStringRecord(value: unknown): Record<string, string> {
  if (typeof value !== 'object' || value === null) {
    return {};
  }
  return Object.fromEntries(
    Object.entries(value).map(([key, cell]) => [key, typeof cell === 'string' ? cell : String(cell ?? '')])
  );
}

/**
 * Streaming parser; pipe a file stream into it and iterate rows.
 *
 * @example
 * for await (const row of createReadStream(path).pipe(createLineItemParser())) { ... }
 */
export function createLineItemParser(): Parser {
  return parse(PARSE_OPTIONS);
}

/**
 * Parses a whole CSV document held in memory into string records.
 * Only for small inputs (rule tables, tests); line-item files are streamed.
 */
export function parseCsvRecords(content: string): Array<Record<string, string>> {
  const records: unknown = parseSync(content, PARSE_OPTIONS);
  return Array.isArray(records) ? records.map(toStringRecord) : [];
}
