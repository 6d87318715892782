/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export { logger, isLevelEnabled, formatLogLine, serializeError, type LogContext, type LogLevel } from './logger';

// Config
export { config, type Config } from './config';

// Types
export * from './types';

// Errors
export {
  PipelineError,
  UnsupportedFormatError,
  NoFinancialContentError,
  ExtractionTimeoutError,
  RateLimitedError,
  TransportFailureError,
  ModelRequestError,
  CancelledError,
  isPipelineError,
} from './errors';

// Field catalogue & money parsing
export * from './fields';
export { parseMoney, findMoneyTokens, isYearLike, roundCents, formatAmount, formatStatementAmount, type MoneyToken } from './money';

// Roles
export { inferDocumentRole, normalizeDocumentRole } from './roles';

// Document URIs
export { resolveDocumentPath, isWithinRoot } from './document-uri';

// Queues
export {
  QUEUE_NAMES,
  type ExtractFinancialsJob,
  type ExtractQueue,
  type ExtractWorker,
  type ExtractProcessor,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  assessBackpressure,
  checkBackpressure,
  type QueueCounts,
  type Backpressure,
  type DepthLimits,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  documentsProcessedCounter,
  pipelineDurationHistogram,
  extractionAttemptsCounter,
  patternFallbackCounter,
  consistencyCorrectionsCounter,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  backpressureRejectionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export { RECORD_JSON_SCHEMA, validateRecordPayload, validateExtraction, type ValidationResult } from './schemas';

// Preprocessing
export * from './preprocess';

// Content gate
export {
  validateFinancialContent,
  contentBodyLines,
  materialTokens,
  type ContentThresholds,
  type ContentValidation,
} from './validation/content-validator';

// Prompts
export { getTemplateForRole, type RoleTemplate } from './templates';
export {
  buildPrompt,
  strategyForAttempt,
  truncateContent,
  ATTEMPT_STRATEGIES,
  PROMPT_VERSION,
  type AttemptStrategy,
  type BuiltPrompt,
  type PromptOptions,
  type PromptStrategyName,
} from './prompts/prompt-builder';

// Extraction
export {
  ExtractionEngine,
  planNextStep,
  backoffDelay,
  defaultRetryPolicy,
  hasNonZeroPrimary,
  type AttemptOutcomeKind,
  type EngineResult,
  type EngineRunOptions,
  type ExtractionEngineOptions,
  type NextStep,
  type RetryPolicy,
} from './extraction/engine';
export {
  OpenAiModelClient,
  createDefaultModelClient,
  toPipelineError,
  type ModelClient,
  type ModelRequest,
  type ModelResponse,
  type OpenAiModelClientOptions,
} from './extraction/model-client';
export { parseModelResponse, findBalancedObject, type ParseMethod, type ParseOutcome } from './extraction/response-parser';
export {
  extractWithPatterns,
  amountAfterLabel,
  loneAmount,
  type PatternExtraction,
  type PatternMatch,
} from './extraction/pattern-extractor';
export { TokenBucketRateLimiter, getSharedRateLimiter, type RateLimiter } from './extraction/rate-limiter';
export { sleep } from './extraction/sleep';

// Audit, consistency, confidence
export { AuditTrail } from './audit/audit-trail';
export { validateConsistency, type ConsistencyOutcome } from './consistency/consistency-validator';
export {
  attributeModelValues,
  patternProvenance,
  unresolvedProvenance,
} from './confidence/provenance';
export {
  scoreFields,
  baseScore,
  calculatedScore,
  confidenceLevel,
  overallConfidence,
  CONFIDENCE_SCORES,
  CONFIDENCE_LEVELS,
} from './confidence/confidence-scorer';

// Pipeline
export {
  extractFinancials,
  extractDocumentSet,
  type PipelineDependencies,
  type PipelineRunOptions,
} from './pipeline';
