/**
 * Classification Service
 *
 * Orchestration layer between routes, the classification pipeline and the
 * batch worker:
 * - Synchronous classification of line items and Document AI invoices
 * - Text inspection (normalized text, extracted equipment/material)
 * - Batch creation, progress and stored results
 *
 * Every call captures ruleSetService.current() once, so a request never
 * sees two rule set versions.
 */

import { createReadStream } from 'fs';
import { readFile, unlink } from 'fs/promises';
import { randomUUID } from 'crypto';
import { createInterface } from 'readline';
import { env } from '../config';
import {
  classifyLineItems,
  extractEquipment,
  extractMaterial,
  normalizeText,
  type ClassificationStats,
  type ClassifiedLineItem,
  type LineItem,
} from '../classification';
import { AppError, logger } from '../utils';
import { parseDocumentAiInvoice, type InvoiceHeader } from '../utils/documentAi';
import { getCachedBatchProgress, initBatchProgress, isRedisAvailable, type BatchProgress } from '../redis';
import { enqueueClassificationBatch } from '../workers/classification.queue';
import { getBatchResultPaths, parseBatchSummary, type BatchSummary } from '../workers/batchFiles';
import { paginateResults, type PaginatedResponse, type PaginationParams } from './pagination.service';
import { ruleSetService } from './ruleSet.service';

// ============================================
// Types
// ============================================

export interface ClassificationResponse {
  ruleSetVersion: string;
  items: ClassifiedLineItem[];
  stats: ClassificationStats;
}

export interface DocumentClassificationResponse extends ClassificationResponse {
  header: InvoiceHeader;
}

export interface TextInspection {
  ruleSetVersion: string;
  text: string;
  normalizedText: string;
  equipment: string;
  material: string;
}

export interface CreateBatchParams {
  filePath: string;
  fileName: string;
}

export interface BatchStatusResponse extends BatchProgress {
  batchId: string;
}

export interface BatchResultsResponse {
  summary: BatchSummary;
  items: PaginatedResponse<ClassifiedLineItem>;
}

// ============================================
// Synchronous Classification
// ============================================

export function classifyItems(items: LineItem[]): ClassificationResponse {
  const ruleSet = ruleSetService.current();
  const result = classifyLineItems(items, ruleSet);

  logger.debug(
    `Classified ${result.stats.total} line items with rules ${ruleSet.version} ` +
      `(${result.stats.byTier.unclassified} unclassified)`
  );

  return { ruleSetVersion: ruleSet.version, ...result };
}

/**
 * @throws AppError (400) when the body is not a Document AI invoice
 */
export function classifyDocument(document: unknown, documentId: string | null = null): DocumentClassificationResponse {
  const { header, lineItems } = parseDocumentAiInvoice(document, documentId);
  return { header, ...classifyItems(lineItems) };
}

export function inspectText(text: string): TextInspection {
  const ruleSet = ruleSetService.current();
  const normalizedText = normalizeText(text);

  return {
    ruleSetVersion: ruleSet.version,
    text,
    normalizedText,
    equipment: extractEquipment(normalizedText, ruleSet),
    material: extractMaterial(normalizedText, ruleSet),
  };
}

// ============================================
// Batch Management
// ============================================

/**
 * Queues an uploaded CSV for background classification
 *
 * @throws AppError (503) when Redis (and with it the queue) is unreachable
 */
export async function createBatch(params: CreateBatchParams): Promise<{ batchId: string; jobId: string }> {
  if (!isRedisAvailable()) {
    await unlink(params.filePath).catch((error: unknown) => {
      logger.warn(`Could not remove rejected upload: ${error instanceof Error ? error.message : 'Unknown error'}`);
    });
    throw AppError.serviceUnavailable('Batch processing unavailable: Redis is not connected');
  }

  const batchId = randomUUID();
  await initBatchProgress(batchId, params.fileName);
  const jobId = await enqueueClassificationBatch({ batchId, ...params });

  logger.info(`[${batchId}] Queued ${params.fileName} for classification`);
  return { batchId, jobId };
}

async function readBatchSummary(batchId: string): Promise<BatchSummary | null> {
  const { summary } = getBatchResultPaths(env.RESULTS_DIR, batchId);
  try {
    const content = await readFile(summary, 'utf-8');
    const parsed = parseBatchSummary(content);
    if (!parsed) {
      logger.error(`[${batchId}] Summary file is not a batch summary: ${summary}`);
      throw AppError.internal(`Unreadable summary for batch: ${batchId}`);
    }
    return parsed;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Progress from Redis; once Redis has expired or lost it, a finished batch
 * is still answered from its summary file.
 *
 * @throws AppError (404) for an unknown batch
 */
export async function getBatchProgress(batchId: string): Promise<BatchStatusResponse> {
  const cached = await getCachedBatchProgress(batchId);
  if (cached) {
    return { batchId, ...cached };
  }

  const summary = await readBatchSummary(batchId);
  if (!summary) {
    throw AppError.notFound(`Batch not found: ${batchId}`);
  }

  return {
    batchId,
    status: 'completed',
    fileName: summary.fileName,
    ruleSetVersion: summary.ruleSetVersion,
    processedCount: summary.processedCount,
    vendorSpecificCount: summary.stats.byTier['vendor-specific'],
    defaultCount: summary.stats.byTier.default,
    unclassifiedCount: summary.stats.byTier.unclassified,
    ambiguousCount: summary.stats.byResolution.AMBIGUOUS,
    invalidRowCount: summary.invalidRowCount,
    error: null,
  };
}

/**
 * Reads one page of classified items from a batch's JSON Lines file
 */
async function readResultPage(filePath: string, startLine: number, limit: number): Promise<ClassifiedLineItem[]> {
  const lines = createInterface({ input: createReadStream(filePath, { encoding: 'utf-8' }), crlfDelay: Infinity });
  const page: ClassifiedLineItem[] = [];
  let lineNumber = 0;

  try {
    for await (const line of lines) {
      if (lineNumber++ < startLine || line.trim() === '') continue;
      const item: ClassifiedLineItem = JSON.parse(line);
      page.push(item);
      // One extra record tells the caller another page exists
      if (page.length > limit) break;
    }
  } finally {
    lines.close();
  }

  return page;
}

/**
 * @throws AppError (404) until the batch has finished
 */
export async function getBatchResults(batchId: string, pagination: PaginationParams): Promise<BatchResultsResponse> {
  const summary = await readBatchSummary(batchId);
  if (!summary) {
    throw AppError.notFound(`No results for batch: ${batchId}`);
  }

  const startLine = pagination.cursor?.line ?? 0;
  const { items } = getBatchResultPaths(env.RESULTS_DIR, batchId);
  const records = await readResultPage(items, startLine, pagination.limit);

  return {
    summary,
    items: paginateResults(records, pagination.limit, startLine),
  };
}

export const classificationService = {
  classifyItems,
  classifyDocument,
  inspectText,
  createBatch,
  getBatchProgress,
  getBatchResults,
};
