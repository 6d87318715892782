/**
 * Extraction Queue
 *
 * The extract_financials queue between the extraction API (producer) and the
 * extractor worker (consumer). Documents travel by file:// URI; bytes never
 * go through Redis.
 */

import { Queue, Worker, type ConnectionOptions, type Job } from 'bullmq';
import { config } from './config';
import { logger } from './logger';
import type { ExtractionResult } from './types';

export const QUEUE_NAMES = {
  EXTRACT_FINANCIALS: 'extract_financials',
} as const;

/** document.uploaded, enqueued by POST /jobs */
export interface ExtractFinancialsJob {
  event_type: 'document.uploaded';
  correlation_id: string;
  document_id: string;
  document_uri: string;
  filename: string;
  declared_role?: string;
  format_hint?: string;
  enqueued_at: string;
}

export type ExtractQueue = Queue<ExtractFinancialsJob, ExtractionResult>;
export type ExtractWorker = Worker<ExtractFinancialsJob, ExtractionResult>;
export type ExtractProcessor = (job: Job<ExtractFinancialsJob, ExtractionResult>) => Promise<ExtractionResult>;

const DEFAULT_REDIS_PORT = 6379;

/**
 * Connection options from a redis:// or rediss:// URL, with credentials and
 * database index. Anything else falls back to REDIS_HOST/REDIS_PORT.
 */
export function getRedisConnection(redisUrl: string = config.redisUrl): ConnectionOptions {
  // BullMQ workers need maxRetriesPerRequest: null
  const fallback: ConnectionOptions = {
    host: config.redisHost,
    port: config.redisPort,
    maxRetriesPerRequest: null,
  };

  let url: URL;
  try {
    url = new URL(redisUrl);
  } catch (error) {
    logger.warn('Invalid REDIS_URL, using REDIS_HOST/REDIS_PORT', {
      error: error instanceof Error ? error.message : String(error),
    });
    return fallback;
  }
  if (url.protocol !== 'redis:' && url.protocol !== 'rediss:') return fallback;

  const db = url.pathname.replace(/^\//, '');
  return {
    host: url.hostname,
    port: url.port ? Number(url.port) : DEFAULT_REDIS_PORT,
    ...(url.username ? { username: decodeURIComponent(url.username) } : {}),
    ...(url.password ? { password: decodeURIComponent(url.password) } : {}),
    ...(/^\d+$/.test(db) ? { db: Number(db) } : {}),
    ...(url.protocol === 'rediss:' ? { tls: {} } : {}),
    maxRetriesPerRequest: null,
  };
}

export function createQueue(): ExtractQueue {
  return new Queue<ExtractFinancialsJob, ExtractionResult>(QUEUE_NAMES.EXTRACT_FINANCIALS, {
    connection: getRedisConnection(),
    defaultJobOptions: {
      attempts: config.maxJobAttempts,
      backoff: { type: 'exponential', delay: config.backoffBaseMs },
      removeOnComplete: 100,
      removeOnFail: 1000,
    },
  });
}

export function createWorker(
  processor: ExtractProcessor,
  concurrency: number = config.workerConcurrency
): ExtractWorker {
  const worker = new Worker<ExtractFinancialsJob, ExtractionResult>(QUEUE_NAMES.EXTRACT_FINANCIALS, processor, {
    connection: getRedisConnection(),
    concurrency,
  });

  worker.on('completed', (job, result) => {
    logger.info('Job completed', { jobId: job.id, document_id: job.data.document_id, status: result.status });
  });
  worker.on('failed', (job, err) => {
    logger.error('Job failed', err, {
      jobId: job?.id,
      document_id: job?.data.document_id,
      attempts: job?.attemptsMade,
    });
  });
  worker.on('error', (err) => {
    logger.error('Worker error', err);
  });

  logger.info('Worker started', { queue: QUEUE_NAMES.EXTRACT_FINANCIALS, concurrency });
  return worker;
}

export interface QueueCounts {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}

export async function getQueueMetrics(queue: Queue): Promise<QueueCounts> {
  const counts = await queue.getJobCounts('waiting', 'active', 'completed', 'failed', 'delayed');
  return {
    waiting: counts.waiting ?? 0,
    active: counts.active ?? 0,
    completed: counts.completed ?? 0,
    failed: counts.failed ?? 0,
    delayed: counts.delayed ?? 0,
  };
}

export interface Backpressure {
  /** Jobs not yet finished: waiting plus active */
  depth: number;
  shouldWarn: boolean;
  shouldReject: boolean;
}

export interface DepthLimits {
  warn: number;
  reject: number;
}

export function assessBackpressure(
  counts: Pick<QueueCounts, 'waiting' | 'active'>,
  limits: DepthLimits = { warn: config.maxQueueDepthWarning, reject: config.maxQueueDepthReject }
): Backpressure {
  const depth = counts.waiting + counts.active;
  return { depth, shouldWarn: depth >= limits.warn, shouldReject: depth >= limits.reject };
}

export async function checkBackpressure(queue: Queue): Promise<Backpressure> {
  return assessBackpressure(await getQueueMetrics(queue));
}
