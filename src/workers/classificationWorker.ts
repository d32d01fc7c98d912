/**
 * Classification Background Worker
 *
 * Classifies line-item CSV extracts in the background:
 * 1. STREAMING - rows are parsed as the file is read, never loaded whole
 * 2. CHUNKING - rows are classified BATCH_CHUNK_SIZE at a time, with
 *    progress mirrored to Redis after every chunk
 * 3. PERSISTENCE - BullMQ owns retries; results go to RESULTS_DIR
 *
 * A batch captures the current rule set once and uses it for every row, so a
 * reload in the middle of a batch never mixes rule versions.
 */

import { createReadStream, createWriteStream, type WriteStream } from 'fs';
import { mkdir, unlink, writeFile } from 'fs/promises';
import { once } from 'events';
import { finished } from 'stream/promises';
import { UnrecoverableError } from 'bullmq';
import { env } from '../config';
import {
  classifyLineItem,
  createStatsAccumulator,
  type ClassificationStats,
  type LineItem,
  type RuleSet,
} from '../classification';
import { ruleSetService } from '../services/ruleSet.service';
import { createLineItemParser, parseLineItemRow, toStringRecord, validateCsvHeaders } from '../utils/csv';
import { logger } from '../utils';
import { markBatchFailedInCache, setCachedBatchProgress } from '../redis';
import {
  MAX_RECORDED_ROW_ERRORS,
  getBatchResultPaths,
  type BatchSummary,
  type RowError,
} from './batchFiles';
import type { ClassificationJob } from './classification.queue';

// ============================================
// Types
// ============================================

export interface ChunkProgress {
  processedCount: number;
  invalidRowCount: number;
  stats: ClassificationStats;
}

export interface ClassifyFileOptions {
  batchId: string;
  fileName: string;
  filePath: string;
  resultsDir: string;
  ruleSet: RuleSet;
  chunkSize: number;
  onChunk?: (progress: ChunkProgress) => Promise<void>;
}

// ============================================
// Helper Functions
// ============================================

async function writeLine(output: WriteStream, line: string): Promise<void> {
  if (!output.write(line)) {
    await once(output, 'drain');
  }
}

/**
 * Streams a line-item CSV through the pipeline and writes the results
 *
 * @throws UnrecoverableError when required columns are missing
 */
export async function classifyLineItemFile(options: ClassifyFileOptions): Promise<BatchSummary> {
  const { batchId, fileName, filePath, resultsDir, ruleSet, chunkSize, onChunk } = options;
  const paths = getBatchResultPaths(resultsDir, batchId);
  await mkdir(resultsDir, { recursive: true });

  const accumulator = createStatsAccumulator();
  const invalidRows: RowError[] = [];
  let invalidRowCount = 0;
  let processedCount = 0;

  const source = createReadStream(filePath);
  const parser = createLineItemParser();
  // pipe() does not forward source errors (e.g. ENOENT)
  source.on('error', (error) => parser.destroy(error));
  source.pipe(parser);

  const output = createWriteStream(paths.items, { encoding: 'utf-8' });

  const flush = async (chunk: LineItem[]): Promise<void> => {
    for (const item of chunk) {
      const classified = classifyLineItem(item, ruleSet);
      accumulator.add(classified);
      await writeLine(output, `${JSON.stringify(classified)}\n`);
    }
    processedCount += chunk.length;
    if (onChunk) {
      await onChunk({ processedCount, invalidRowCount, stats: accumulator.snapshot() });
    }
  };

  try {
    let currentChunk: LineItem[] = [];
    let rowNumber = 0;

    for await (const record of parser) {
      const row = toStringRecord(record);
      rowNumber++;

      // Validate headers once
      if (rowNumber === 1) {
        const validation = validateCsvHeaders(Object.keys(row));
        if (!validation.valid) {
          throw new UnrecoverableError(`Missing required CSV columns: ${validation.missing.join(', ')}`);
        }
      }

      const result = parseLineItemRow(row, rowNumber);
      if (result.success) {
        currentChunk.push(result.data);
      } else {
        invalidRowCount++;
        if (invalidRows.length < MAX_RECORDED_ROW_ERRORS) {
          invalidRows.push({ rowNumber: result.rowNumber, error: result.error });
        }
      }

      if (currentChunk.length >= chunkSize) {
        await flush(currentChunk);
        currentChunk = [];
      }
    }

    if (currentChunk.length > 0) {
      await flush(currentChunk);
    }

    output.end();
    await finished(output);
  } catch (error) {
    source.destroy();
    output.destroy();
    throw error;
  }

  const summary: BatchSummary = {
    batchId,
    fileName,
    ruleSetVersion: ruleSet.version,
    completedAt: new Date().toISOString(),
    processedCount,
    invalidRowCount,
    invalidRows,
    stats: accumulator.snapshot(),
  };

  await writeFile(paths.summary, JSON.stringify(summary, null, 2), 'utf-8');
  return summary;
}

/**
 * The upload is kept while BullMQ may still retry the job
 */
function isFinalAttempt(job: ClassificationJob, error: unknown): boolean {
  return error instanceof UnrecoverableError || job.attemptsMade + 1 >= (job.opts.attempts ?? 1);
}

async function removeUpload(batchId: string, filePath: string): Promise<void> {
  try {
    await unlink(filePath);
    logger.debug(`[${batchId}] Cleaned up uploaded file`);
  } catch (error) {
    logger.warn(
      `[${batchId}] Could not remove uploaded file ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
}

// ============================================
// Main Worker Job Handler
// ============================================

export async function processClassificationJob(job: ClassificationJob): Promise<void> {
  const { batchId, filePath, fileName } = job.data;
  const startTime = Date.now();
  const ruleSet = ruleSetService.current();

  logger.info(`[${batchId}] Starting job ${job.id ?? batchId} for ${fileName} (rules ${ruleSet.version})`);

  const baseProgress = {
    fileName,
    ruleSetVersion: ruleSet.version,
    error: null,
  };

  try {
    await setCachedBatchProgress(batchId, {
      ...baseProgress,
      status: 'processing',
      processedCount: 0,
      vendorSpecificCount: 0,
      defaultCount: 0,
      unclassifiedCount: 0,
      ambiguousCount: 0,
      invalidRowCount: 0,
    });

    const summary = await classifyLineItemFile({
      batchId,
      fileName,
      filePath,
      resultsDir: env.RESULTS_DIR,
      ruleSet,
      chunkSize: env.BATCH_CHUNK_SIZE,
      onChunk: async ({ processedCount, invalidRowCount, stats }) => {
        await setCachedBatchProgress(batchId, {
          ...baseProgress,
          status: 'processing',
          processedCount,
          vendorSpecificCount: stats.byTier['vendor-specific'],
          defaultCount: stats.byTier.default,
          unclassifiedCount: stats.byTier.unclassified,
          ambiguousCount: stats.byResolution.AMBIGUOUS,
          invalidRowCount,
        });
        await job.updateProgress({ processedCount });
      },
    });

    await setCachedBatchProgress(batchId, {
      ...baseProgress,
      status: 'completed',
      processedCount: summary.processedCount,
      vendorSpecificCount: summary.stats.byTier['vendor-specific'],
      defaultCount: summary.stats.byTier.default,
      unclassifiedCount: summary.stats.byTier.unclassified,
      ambiguousCount: summary.stats.byResolution.AMBIGUOUS,
      invalidRowCount: summary.invalidRowCount,
    });
    await removeUpload(batchId, filePath);

    const duration = Date.now() - startTime;
    logger.info(
      `[${batchId}] ✅ Job ${job.id ?? batchId} complete: ${summary.processedCount} rows ` +
        `(${summary.stats.byTier.unclassified} unclassified, ${summary.invalidRowCount} invalid) in ${duration}ms`
    );
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'Unknown error';
    logger.error(`[${batchId}] ❌ Job ${job.id ?? batchId} failed: ${reason}`);

    if (isFinalAttempt(job, error)) {
      await markBatchFailedInCache(batchId, reason);
      await removeUpload(batchId, filePath);
    }
    throw error;
  }
}

export default processClassificationJob;
