/**
 * Document AI Invoice Parsing
 *
 * Turns the entity list of a Document AI invoice parse into line items.
 * Header fields come from top-level entities, line items from each
 * `line_item` entity's properties.
 *
 * Accepted shapes:
 * - { entities: [...] }              (Document object)
 * - { document: { entities: [...] } } (processor response)
 */

import { z } from 'zod';
import type { LineItem } from '../classification/types';
import { AppError } from './AppError';
import { parseAmount } from './csv';

// ============================================
// Schemas
// ============================================

const moneyValueSchema = z
  .object({
    units: z.union([z.string(), z.number()]).optional(),
    nanos: z.number().optional(),
  })
  .passthrough();

const normalizedValueSchema = z
  .object({
    moneyValue: moneyValueSchema.optional(),
    floatValue: z.number().optional(),
  })
  .passthrough();

const propertySchema = z
  .object({
    type: z.string().optional(),
    mentionText: z.string().optional(),
    normalizedValue: normalizedValueSchema.optional(),
  })
  .passthrough();

const entitySchema = propertySchema.extend({
  properties: z.array(propertySchema).optional(),
});

const entityListSchema = z.array(entitySchema);

const documentSchema = z.union([
  z
    .object({ entities: entityListSchema })
    .passthrough()
    .transform((document) => document.entities),
  z
    .object({ document: z.object({ entities: entityListSchema }).passthrough() })
    .passthrough()
    .transform((response) => response.document.entities),
]);

type DocumentEntity = z.infer<typeof entitySchema>;
type DocumentProperty = z.infer<typeof propertySchema>;

// ============================================
// Types
// ============================================

export interface InvoiceHeader {
  vendorName: string | null;
  accountIdentifier: string | null;
  invoiceNumber: string | null;
  invoiceDate: string | null;
  locationCode: string | null;
  serviceAddress: string | null;
}

export interface DocumentAiInvoice {
  header: InvoiceHeader;
  lineItems: LineItem[];
}

interface HeaderFieldRule {
  /** Checked first, in order */
  types: string[];
  /** Any other entity type that names the field (lower-cased) */
  matches: (type: string) => boolean;
}

/**
 * Processors name header entities differently ("account_number",
 * "customer_account_number", "vendor_name", ...).
 */
const HEADER_FIELDS: Record<keyof InvoiceHeader, HeaderFieldRule> = {
  vendorName: {
    types: ['supplier_name'],
    matches: (type) => (type.includes('supplier') || type.includes('vendor')) && !type.includes('address'),
  },
  accountIdentifier: {
    types: ['account_number', 'customer_id'],
    matches: (type) => type.includes('account') && type.includes('number'),
  },
  invoiceNumber: {
    types: ['invoice_number', 'invoice_id'],
    matches: (type) => type.includes('invoice') && (type.includes('number') || type.includes('id')),
  },
  invoiceDate: {
    types: ['invoice_date'],
    matches: (type) => type.includes('invoice') && type.includes('date'),
  },
  locationCode: {
    types: ['site_number', 'location_code'],
    matches: (type) => type.includes('location'),
  },
  serviceAddress: {
    types: ['service_address', 'ship_to_address'],
    matches: (type) => type.includes('service') && type.includes('address'),
  },
};

// ============================================
// Helpers
// ============================================

const mentionOf = (entity: DocumentProperty): string => entity.mentionText?.trim() ?? '';

function headerValue(entities: DocumentEntity[], rule: HeaderFieldRule): string | null {
  for (const type of rule.types) {
    const text = mentionOf(entities.find((entity) => entity.type === type) ?? {});
    if (text) return text;
  }
  for (const entity of entities) {
    const type = entity.type?.toLowerCase() ?? '';
    const text = mentionOf(entity);
    if (type !== 'line_item' && text && rule.matches(type)) return text;
  }
  return null;
}

const roundCents = (value: number): number => Math.round(value * 100) / 100;

/**
 * moneyValue (units + nanos) when the processor normalized it, else the text
 */
export function moneyValueOf(property: DocumentProperty): number | null {
  const money = property.normalizedValue?.moneyValue;
  if (money) {
    const units = Number(money.units ?? 0);
    const nanos = money.nanos ?? 0;
    return Number.isFinite(units) ? roundCents(units + nanos / 1e9) : null;
  }
  return parseAmount(property.mentionText);
}

function quantityOf(property: DocumentProperty): number | null {
  const floatValue = property.normalizedValue?.floatValue;
  return floatValue ?? parseAmount(property.mentionText);
}

/**
 * Strips dates, dollar amounts and trailing numbers from a line's full text
 *
 * @example
 * cleanDescription('30YD COMPACTOR HAUL 03/01/2024 $125.00') // "30YD COMPACTOR HAUL"
 */
export function cleanDescription(text: string): string {
  return text
    .replace(/\d{1,2}[/-]\d{1,2}[/-]\d{2,4}/g, '')
    .replace(/\$?\d[\d,]*\.\d{2}\b/g, '')
    .replace(/\b\d+\.\d+\b/g, '')
    .replace(/\s+\d+\s*$/, '')
    .replace(/\s+/g, ' ')
    .replace(/^[\s-]+|[\s-]+$/g, '');
}

interface LineItemFields {
  description: string;
  productCode: string;
  amount: number | null;
  quantity: number | null;
  unitPrice: number | null;
  serviceDate: string | null;
}

function readLineItemFields(entity: DocumentEntity): LineItemFields {
  const fields: LineItemFields = {
    description: '',
    productCode: '',
    amount: null,
    quantity: null,
    unitPrice: null,
    serviceDate: null,
  };

  for (const property of entity.properties ?? []) {
    const type = property.type?.toLowerCase() ?? '';

    if (type.includes('description')) {
      fields.description = fields.description || mentionOf(property);
    } else if (type === 'line_item/product_code') {
      fields.productCode = fields.productCode || mentionOf(property);
    } else if (type === 'line_item/amount') {
      fields.amount = fields.amount ?? moneyValueOf(property);
    } else if (type.includes('quantity')) {
      fields.quantity = fields.quantity ?? quantityOf(property);
    } else if (type.includes('unit_price')) {
      fields.unitPrice = fields.unitPrice ?? moneyValueOf(property);
    } else if (type.includes('date')) {
      fields.serviceDate = fields.serviceDate ?? (mentionOf(property) || null);
    }
  }

  return fields;
}

// ============================================
// Parser
// ============================================

/**
 * Parses one Document AI invoice JSON. A line item with neither a
 * description nor an amount is skipped.
 *
 * @param json - Parsed JSON document
 * @param documentId - Source identifier (the file's md5) copied onto each item
 * @throws AppError (400) when the document has no entity list
 */
export function parseDocumentAiInvoice(json: unknown, documentId: string | null = null): DocumentAiInvoice {
  const parsed = documentSchema.safeParse(json);
  if (!parsed.success) {
    throw AppError.badRequest(
      'Not a Document AI invoice: expected an entities array, at the top level or under "document"',
      parsed.error.issues.map((issue) => ({ field: issue.path.join('.'), message: issue.message }))
    );
  }

  const entities = parsed.data;

  const header: InvoiceHeader = {
    vendorName: headerValue(entities, HEADER_FIELDS.vendorName),
    accountIdentifier: headerValue(entities, HEADER_FIELDS.accountIdentifier),
    invoiceNumber: headerValue(entities, HEADER_FIELDS.invoiceNumber),
    invoiceDate: headerValue(entities, HEADER_FIELDS.invoiceDate),
    locationCode: headerValue(entities, HEADER_FIELDS.locationCode),
    serviceAddress: headerValue(entities, HEADER_FIELDS.serviceAddress),
  };

  const lineItems: LineItem[] = [];

  for (const entity of entities) {
    if (entity.type !== 'line_item') continue;

    const fields = readLineItemFields(entity);
    const description = (fields.description || fields.productCode || cleanDescription(mentionOf(entity)))
      .replace(/\s+/g, ' ')
      .trim();

    if (!description && !fields.amount) continue;

    lineItems.push({
      vendorName: header.vendorName ?? '',
      accountIdentifier: header.accountIdentifier ?? '',
      rawDescription: description,
      amount: fields.amount,
      quantity: fields.quantity,
      unitPrice: fields.unitPrice,
      serviceDate: fields.serviceDate,
      invoiceNumber: header.invoiceNumber,
      invoiceDate: header.invoiceDate,
      documentId,
    });
  }

  return { header, lineItems };
}
