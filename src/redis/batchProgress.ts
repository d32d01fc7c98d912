/**
 * Batch Progress Module
 *
 * Redis hash mirroring the progress of a background classification batch,
 * read by GET /classification/batches/:batchId.
 *
 * KEY FORMAT: classification-batch:{batchId}:progress
 */

import { safeRedisOperation, safeRedisWrite } from './client';

const CACHE_KEY_PREFIX = 'classification-batch:';
const CACHE_KEY_SUFFIX = ':progress';

/**
 * Cache TTL in seconds (24 hours); results stay on disk after it expires
 */
const CACHE_TTL_SECONDS = 24 * 60 * 60;

export type BatchStatus = 'queued' | 'processing' | 'completed' | 'failed';

const BATCH_STATUSES: readonly BatchStatus[] = ['queued', 'processing', 'completed', 'failed'];

/**
 * Batch progress data stored in Redis
 */
export interface BatchProgress {
  status: BatchStatus;
  fileName: string;
  ruleSetVersion: string;
  processedCount: number;
  vendorSpecificCount: number;
  defaultCount: number;
  unclassifiedCount: number;
  ambiguousCount: number;
  invalidRowCount: number;
  error: string | null;
}

export function getCacheKey(batchId: string): string {
  return `${CACHE_KEY_PREFIX}${batchId}${CACHE_KEY_SUFFIX}`;
}

const toCount = (value: string | undefined): number => {
  const parsed = parseInt(value ?? '0', 10);
  return Number.isNaN(parsed) ? 0 : parsed;
};

const toStatus = (value: string | undefined): BatchStatus =>
  BATCH_STATUSES.find((status) => status === value) ?? 'queued';

/**
 * Reads a progress hash back into a BatchProgress
 */
export function fromProgressHash(data: Record<string, string>): BatchProgress {
  return {
    status: toStatus(data.status),
    fileName: data.fileName ?? '',
    ruleSetVersion: data.ruleSetVersion ?? '',
    processedCount: toCount(data.processedCount),
    vendorSpecificCount: toCount(data.vendorSpecificCount),
    defaultCount: toCount(data.defaultCount),
    unclassifiedCount: toCount(data.unclassifiedCount),
    ambiguousCount: toCount(data.ambiguousCount),
    invalidRowCount: toCount(data.invalidRowCount),
    error: data.error ? data.error : null,
  };
}

/**
 * Flattens a BatchProgress into hash fields
 */
export function toProgressHash(progress: BatchProgress): Record<string, string> {
  return {
    status: progress.status,
    fileName: progress.fileName,
    ruleSetVersion: progress.ruleSetVersion,
    processedCount: progress.processedCount.toString(),
    vendorSpecificCount: progress.vendorSpecificCount.toString(),
    defaultCount: progress.defaultCount.toString(),
    unclassifiedCount: progress.unclassifiedCount.toString(),
    ambiguousCount: progress.ambiguousCount.toString(),
    invalidRowCount: progress.invalidRowCount.toString(),
    error: progress.error ?? '',
  };
}

/**
 * Gets cached batch progress, or null when unknown or Redis is down
 */
export async function getCachedBatchProgress(batchId: string): Promise<BatchProgress | null> {
  return safeRedisOperation(
    async (client) => {
      const data = await client.hgetall(getCacheKey(batchId));
      return Object.keys(data).length === 0 ? null : fromProgressHash(data);
    },
    null,
    `Batch progress GET (${batchId})`
  );
}

/**
 * Replaces the whole progress hash and refreshes its TTL
 */
export async function setCachedBatchProgress(batchId: string, progress: BatchProgress): Promise<void> {
  const cacheKey = getCacheKey(batchId);

  await safeRedisWrite(async (client) => {
    await client
      .multi()
      .hset(cacheKey, toProgressHash(progress))
      .expire(cacheKey, CACHE_TTL_SECONDS)
      .exec();
  }, `Batch progress SET (${batchId})`);
}

/**
 * Records a queued batch
 */
export async function initBatchProgress(batchId: string, fileName: string): Promise<void> {
  await setCachedBatchProgress(batchId, {
    status: 'queued',
    fileName,
    ruleSetVersion: '',
    processedCount: 0,
    vendorSpecificCount: 0,
    defaultCount: 0,
    unclassifiedCount: 0,
    ambiguousCount: 0,
    invalidRowCount: 0,
    error: null,
  });
}

/**
 * Marks batch as failed, keeping its counters
 */
export async function markBatchFailedInCache(batchId: string, reason: string): Promise<void> {
  const cacheKey = getCacheKey(batchId);

  await safeRedisWrite(async (client) => {
    await client.hset(cacheKey, { status: 'failed', error: reason });
  }, `Batch status FAILED (${batchId})`);
}
