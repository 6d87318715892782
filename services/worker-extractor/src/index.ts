/**
 * Extractor Worker
 *
 * Consumes extract_financials jobs: reads the document, runs the extraction
 * pipeline and stores the ExtractionResult as the job's return value.
 */

import type { Job } from 'bullmq';
import {
  logger,
  config,
  runWithContextAsync,
  createWorker,
  serveMetrics,
  extractFinancials,
  QUEUE_NAMES,
  type ExtractFinancialsJob,
  type ExtractionResult,
  jobsProcessedCounter,
  jobDurationHistogram,
} from '@noi-extract/shared';
import { readDocumentBytes, toRawDocument } from './lib/documents';

/**
 * Process extract_financials job
 */
async function processExtractFinancials(
  job: Job<ExtractFinancialsJob, ExtractionResult>
): Promise<ExtractionResult> {
  const { correlation_id, document_id, document_uri, filename } = job.data;

  return runWithContextAsync({ correlationId: correlation_id, documentId: document_id }, async () => {
    const startTime = Date.now();

    logger.info('Processing extract_financials', {
      jobId: job.id,
      document_id,
      filename,
      attempt: job.attemptsMade + 1,
    });

    try {
      // Read failures are retried by BullMQ; pipeline failures come back as results
      const bytes = await readDocumentBytes(document_uri);
      const result = await extractFinancials(toRawDocument(job.data, bytes), {}, {
        documentId: document_id,
        correlationId: correlation_id,
      });

      const duration = (Date.now() - startTime) / 1000;
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_FINANCIALS, status: 'success' });
      jobDurationHistogram.observe({ queue: QUEUE_NAMES.EXTRACT_FINANCIALS, status: 'success' }, duration);

      logger.info('Extraction job finished', {
        document_id,
        status: result.status,
        overall_confidence: result.overall_confidence,
        extraction_method: result.extraction_method,
      });
      return result;
    } catch (error) {
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_FINANCIALS, status: 'failed' });
      throw error;
    }
  });
}

// Create and start the worker
const worker = createWorker(processExtractFinancials);

serveMetrics(config.workerMetricsPort);

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
