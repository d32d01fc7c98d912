/**
 * On-disk layout of batch results
 *
 * {RESULTS_DIR}/{batchId}.jsonl         one ClassifiedLineItem per line
 * {RESULTS_DIR}/{batchId}.summary.json  written last; its presence marks a
 *                                       finished batch
 */

import path from 'path';
import { z } from 'zod';
import type { ClassificationStats } from '../classification';

export const MAX_RECORDED_ROW_ERRORS = 100;

export interface RowError {
  rowNumber: number;
  error: string;
}

export interface BatchSummary {
  batchId: string;
  fileName: string;
  ruleSetVersion: string;
  completedAt: string;
  processedCount: number;
  invalidRowCount: number;
  /** First MAX_RECORDED_ROW_ERRORS row errors */
  invalidRows: RowError[];
  stats: ClassificationStats;
}

const count = z.number().int().nonnegative();

const classificationStatsSchema: z.ZodType<ClassificationStats> = z.object({
  total: count,
  byTier: z.object({ 'vendor-specific': count, default: count, unclassified: count }),
  byResolution: z.object({ RESOLVED: count, AMBIGUOUS: count, NOT_FOUND: count }),
  unclassifiedByVendor: z.record(count),
  ambiguousByAccount: z.record(count),
  ruleHits: z.record(count),
  topUnclassifiedDescriptions: z.array(z.object({ description: z.string(), count })),
});

const batchSummarySchema: z.ZodType<BatchSummary> = z.object({
  batchId: z.string(),
  fileName: z.string(),
  ruleSetVersion: z.string(),
  completedAt: z.string(),
  processedCount: count,
  invalidRowCount: count,
  invalidRows: z.array(z.object({ rowNumber: z.number().int(), error: z.string() })),
  stats: classificationStatsSchema,
});

/**
 * Reads a summary file's content; null when it is not JSON or not a summary
 */
export function parseBatchSummary(content: string): BatchSummary | null {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch {
    return null;
  }
  const parsed = batchSummarySchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export interface BatchResultPaths {
  items: string;
  summary: string;
}

export function getBatchResultPaths(resultsDir: string, batchId: string): BatchResultPaths {
  return {
    items: path.join(resultsDir, `${batchId}.jsonl`),
    summary: path.join(resultsDir, `${batchId}.summary.json`),
  };
}
