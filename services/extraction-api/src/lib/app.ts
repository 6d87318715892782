/**
 * Express application for the extraction API
 *
 * POST /extract        - Extract one document synchronously (base64 body)
 * POST /extract/batch  - Extract up to four documents concurrently
 * POST /jobs           - Enqueue a document by file:// URI for the worker
 * GET  /jobs/:id       - Job state and result
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { Queue } from 'bullmq';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  backpressureRejectionsCounter,
  checkBackpressure,
  reportQueueMetrics,
  QUEUE_NAMES,
  extractFinancials,
  extractDocumentSet,
  type ErrorEnvelope,
  type ExtractFinancialsJob,
  type ExtractionResult,
  type PipelineDependencies,
} from '@noi-extract/shared';
import { parseBatchRequest, parseExtractRequest, parseJobRequest } from './request';

export interface AppOptions {
  queue: Queue<ExtractFinancialsJob, ExtractionResult>;
  pipeline?: PipelineDependencies;
}

function sendError(res: Response, status: number, code: string, message: string): void {
  const envelope: ErrorEnvelope = {
    error: {
      code,
      message,
      correlation_id: getCorrelationId(),
    },
  };
  res.status(status).json(envelope);
}

/**
 * Abort the pipeline when the client goes away before the response is sent.
 */
function abortOnDisconnect(req: Request, res: Response): AbortSignal {
  const controller = new AbortController();
  req.on('close', () => {
    if (!res.writableEnded) controller.abort();
  });
  return controller.signal;
}

export function createApp({ queue, pipeline = {} }: AppOptions): Express {
  const app = express();

  // Base64 inflates by a third; a batch carries up to four documents
  app.use(express.json({ limit: Math.ceil(config.maxUploadBytes * 1.4) * 4 }));

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.get('x-correlation-id') || ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const path = req.route?.path || req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', async (req: Request, res: Response) => {
    try {
      // Check Redis connection via queue
      const metrics = await checkBackpressure(queue);

      res.json({
        status: 'healthy',
        service: 'extraction-api',
        queue_depth: metrics.depth,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: 'extraction-api',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response) => {
    await reportQueueMetrics([{ name: QUEUE_NAMES.EXTRACT_FINANCIALS, queue }]);
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  /**
   * POST /extract
   * Runs the pipeline inline and returns the ExtractionResult
   */
  app.post('/extract', async (req: Request, res: Response) => {
    const parsed = parseExtractRequest(req.body);
    if (!parsed.ok) {
      sendError(res, 400, 'invalid_request', parsed.message);
      return;
    }

    try {
      const result = await extractFinancials(parsed.value, {
        ...pipeline,
        signal: abortOnDisconnect(req, res),
      });
      res.json(result);
    } catch (error) {
      logger.error('Extraction failed', error);
      sendError(res, 500, 'internal_error', 'Extraction failed');
    }
  });

  /**
   * POST /extract/batch
   * Current, prior, budget and prior-year statements in one request
   */
  app.post('/extract/batch', async (req: Request, res: Response) => {
    const parsed = parseBatchRequest(req.body);
    if (!parsed.ok) {
      sendError(res, 400, 'invalid_request', parsed.message);
      return;
    }

    try {
      const results = await extractDocumentSet(parsed.value, {
        ...pipeline,
        signal: abortOnDisconnect(req, res),
      });
      res.json({ correlation_id: getCorrelationId(), results });
    } catch (error) {
      logger.error('Batch extraction failed', error);
      sendError(res, 500, 'internal_error', 'Batch extraction failed');
    }
  });

  /**
   * POST /jobs
   * Enqueue a document for the worker
   */
  app.post('/jobs', async (req: Request, res: Response) => {
    const parsed = parseJobRequest(req.body);
    if (!parsed.ok) {
      sendError(res, 400, 'invalid_request', parsed.message);
      return;
    }

    try {
      // Check backpressure
      const backpressure = await checkBackpressure(queue);

      if (backpressure.shouldReject) {
        backpressureRejectionsCounter.inc();
        logger.warn('Request rejected due to backpressure', {
          queue_depth: backpressure.depth,
        });
        sendError(res, 503, 'service_unavailable', 'System is under heavy load. Please retry later.');
        return;
      }

      if (backpressure.shouldWarn) {
        logger.warn('Queue depth approaching threshold', {
          queue_depth: backpressure.depth,
        });
      }

      const documentId = ulid();
      const job: ExtractFinancialsJob = {
        event_type: 'document.uploaded',
        correlation_id: getCorrelationId(),
        document_id: documentId,
        document_uri: parsed.value.documentUri,
        filename: parsed.value.filename,
        ...(parsed.value.role ? { declared_role: parsed.value.role } : {}),
        ...(parsed.value.formatHint ? { format_hint: parsed.value.formatHint } : {}),
        enqueued_at: new Date().toISOString(),
      };

      await queue.add('extract', job, { jobId: documentId });
      logger.info('Extraction job enqueued', { document_id: documentId, filename: job.filename });

      res.status(202).json({
        job_id: documentId,
        correlation_id: job.correlation_id,
      });
    } catch (error) {
      logger.error('Failed to enqueue job', error);
      sendError(res, 500, 'internal_error', 'Failed to enqueue job');
    }
  });

  /**
   * GET /jobs/:id
   */
  app.get('/jobs/:id', async (req: Request, res: Response) => {
    try {
      const job = await queue.getJob(req.params.id);
      if (!job) {
        sendError(res, 404, 'not_found', `Job ${req.params.id} not found`);
        return;
      }

      const state = await job.getState();
      res.json({
        job_id: job.id,
        state,
        attempts_made: job.attemptsMade,
        ...(job.failedReason ? { failed_reason: job.failedReason } : {}),
        ...(state === 'completed' ? { result: job.returnvalue } : {}),
      });
    } catch (error) {
      logger.error('Failed to read job', error, { job_id: req.params.id });
      sendError(res, 500, 'internal_error', 'Failed to read job');
    }
  });

  return app;
}
