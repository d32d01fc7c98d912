import { Queue, Worker, type ConnectionOptions, type Job } from 'bullmq';
import { env } from '../config';
import { logger } from '../utils';

// ============================================
// Types
// ============================================

export interface ClassificationJobData {
  batchId: string;
  filePath: string;
  fileName: string;
}

export type ClassificationJob = Job<ClassificationJobData>;

// ============================================
// Redis Connection for BullMQ
// ============================================

function getConnection(): ConnectionOptions {
  return {
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    // BullMQ requires maxRetriesPerRequest to be null
    maxRetriesPerRequest: null,
  };
}

// ============================================
// Queue Definition
// ============================================

export const CLASSIFICATION_QUEUE_NAME = 'classification-batch-processing';

let classificationQueue: Queue<ClassificationJobData> | null = null;

/**
 * Created on first use so importing the module never opens a connection
 */
export function getClassificationQueue(): Queue<ClassificationJobData> {
  if (!classificationQueue) {
    classificationQueue = new Queue<ClassificationJobData>(CLASSIFICATION_QUEUE_NAME, {
      connection: getConnection(),
      defaultJobOptions: {
        attempts: 3,
        backoff: {
          type: 'exponential',
          delay: 1000,
        },
        removeOnComplete: true,
        removeOnFail: false,
      },
    });
  }
  return classificationQueue;
}

/**
 * Enqueues a batch; the batch id doubles as the job id
 */
export async function enqueueClassificationBatch(data: ClassificationJobData): Promise<string> {
  const job = await getClassificationQueue().add('classify-line-items', data, { jobId: data.batchId });
  return job.id ?? data.batchId;
}

export async function closeClassificationQueue(): Promise<void> {
  if (classificationQueue) {
    await classificationQueue.close();
    classificationQueue = null;
  }
}

// ============================================
// Worker Setup
// ============================================

export function setupClassificationWorker(
  processor: (job: ClassificationJob) => Promise<void>
): Worker<ClassificationJobData> {
  const worker = new Worker<ClassificationJobData>(CLASSIFICATION_QUEUE_NAME, processor, {
    connection: getConnection(),
    concurrency: env.WORKER_CONCURRENCY,
    // Large extracts take a while to stream
    lockDuration: 60000,
  });

  worker.on('completed', (job) => {
    logger.info(`[Job ${job.id}] Classification batch completed`);
  });

  worker.on('failed', (job, err) => {
    logger.error(`[Job ${job?.id ?? 'unknown'}] Classification batch failed: ${err.message}`);
  });

  worker.on('error', (err) => {
    logger.error(`Worker error: ${err.message}`);
  });

  return worker;
}
