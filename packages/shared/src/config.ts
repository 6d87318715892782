/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

import path from 'node:path';

export interface Config {
  // Redis
  redisHost: string;
  redisPort: number;
  redisUrl: string;

  // Queue & Worker
  workerConcurrency: number;
  maxJobAttempts: number;
  backoffBaseMs: number;

  // Backpressure Controls
  maxQueueDepthWarning: number;
  maxQueueDepthReject: number;

  // Service Ports
  apiPort: number;
  workerMetricsPort: number;
  maxUploadBytes: number;

  // Queued documents are read from under this directory only
  documentRoot: string;

  // LLM
  llmModel: string;
  llmRequestTimeoutMs: number;
  openaiApiKey: string;
  llmRateLimitCapacity: number;
  llmRateLimitPerSecond: number;

  // Extraction Engine
  extractionMaxAttempts: number;
  extractionBackoffBaseMs: number;
  extractionBackoffMaxMs: number;
  maxPromptChars: number;

  // Content Gate
  materialityThreshold: number;
  minMaterialValues: number;

  // Consistency
  consistencyTolerance: number;
}

export const config: Config = {
  // Redis
  redisHost: process.env.REDIS_HOST || 'redis',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),
  redisUrl: process.env.REDIS_URL || 'redis://redis:6379',

  // Queue & Worker
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '4', 10),
  maxJobAttempts: parseInt(process.env.BULLMQ_DEFAULT_ATTEMPTS || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '2000', 10),

  // Backpressure Controls
  maxQueueDepthWarning: parseInt(process.env.MAX_QUEUE_DEPTH_WARNING || '500', 10),
  maxQueueDepthReject: parseInt(process.env.MAX_QUEUE_DEPTH_REJECT || '2000', 10),

  // Service Ports
  apiPort: parseInt(process.env.PORT || '8080', 10),
  workerMetricsPort: parseInt(process.env.WORKER_METRICS_PORT || '9100', 10),
  maxUploadBytes: parseInt(process.env.MAX_UPLOAD_BYTES || String(20 * 1024 * 1024), 10),
  documentRoot: path.resolve(process.env.DOCUMENT_ROOT || '/data/documents'),

  // LLM
  llmModel: process.env.LLM_MODEL || 'gpt-4o-mini',
  llmRequestTimeoutMs: parseInt(process.env.LLM_REQUEST_TIMEOUT_MS || '60000', 10),
  openaiApiKey: process.env.OPENAI_API_KEY || '',
  llmRateLimitCapacity: parseInt(process.env.LLM_RATE_LIMIT_CAPACITY || '5', 10),
  llmRateLimitPerSecond: parseFloat(process.env.LLM_RATE_LIMIT_PER_SECOND || '2'),

  // Extraction Engine
  extractionMaxAttempts: parseInt(process.env.EXTRACTION_MAX_ATTEMPTS || '3', 10),
  extractionBackoffBaseMs: parseInt(process.env.EXTRACTION_BACKOFF_BASE_MS || '1000', 10),
  extractionBackoffMaxMs: parseInt(process.env.EXTRACTION_BACKOFF_MAX_MS || '8000', 10),
  maxPromptChars: parseInt(process.env.MAX_PROMPT_CHARS || '60000', 10),

  // Content Gate
  materialityThreshold: parseFloat(process.env.MATERIALITY_THRESHOLD || '100'),
  minMaterialValues: parseInt(process.env.MIN_MATERIAL_VALUES || '3', 10),

  // Consistency
  consistencyTolerance: parseFloat(process.env.CONSISTENCY_TOLERANCE || '1.00'),
};
