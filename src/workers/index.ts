/**
 * Workers Module
 *
 * Background processing of uploaded line-item files.
 */

export { processClassificationJob, classifyLineItemFile } from './classificationWorker';
export {
  getClassificationQueue,
  enqueueClassificationBatch,
  closeClassificationQueue,
  setupClassificationWorker,
  CLASSIFICATION_QUEUE_NAME,
  type ClassificationJob,
  type ClassificationJobData,
} from './classification.queue';
export { getBatchResultPaths, type BatchSummary, type RowError } from './batchFiles';
