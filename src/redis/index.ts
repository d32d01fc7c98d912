/**
 * Redis Module
 *
 * Redis is an OPTIONAL mirror of batch progress.
 * Classification works without it.
 */

export {
  getRedisClient,
  getRedisOptions,
  isRedisAvailable,
  disconnectRedis,
  safeRedisOperation,
  safeRedisWrite,
} from './client';

export {
  getCachedBatchProgress,
  setCachedBatchProgress,
  initBatchProgress,
  markBatchFailedInCache,
  type BatchProgress,
  type BatchStatus,
} from './batchProgress';
