/**
 * Extraction Pipeline
 *
 * One invocation per document:
 *
 *   preprocess → content gate → extraction engine → (pattern fallback)
 *     → consistency validation → confidence scoring → ExtractionResult
 *
 * Every failure becomes a status and a structured diagnostic on the result;
 * nothing is thrown to the caller.
 */

import { ulid } from 'ulid';
import { AuditTrail } from './audit/audit-trail';
import { overallConfidence, scoreFields } from './confidence/confidence-scorer';
import { attributeModelValues, patternProvenance, unresolvedProvenance } from './confidence/provenance';
import { config } from './config';
import { validateConsistency } from './consistency/consistency-validator';
import { getCorrelationId, runWithContextAsync } from './context';
import { CancelledError, NoFinancialContentError, PipelineError } from './errors';
import { ExtractionEngine, type RetryPolicy } from './extraction/engine';
import { createDefaultModelClient, type ModelClient } from './extraction/model-client';
import { extractWithPatterns } from './extraction/pattern-extractor';
import { getSharedRateLimiter, type RateLimiter } from './extraction/rate-limiter';
import { PRIMARY_METRICS, emptyRecord, mapFields, type FinancialRecord } from './fields';
import { logger } from './logger';
import {
  consistencyCorrectionsCounter,
  documentsProcessedCounter,
  patternFallbackCounter,
  pipelineDurationHistogram,
} from './metrics';
import { preprocessDocument } from './preprocess';
import { validateExtraction } from './schemas';
import type {
  AttemptSummary,
  ConfidenceLevel,
  ConsistencyCorrection,
  ConsistencyWarning,
  Diagnostic,
  DocumentRole,
  ExtractionMethod,
  ExtractionResult,
  ExtractionStatus,
  FieldConfidence,
  PreprocessedContent,
  ProvenanceMap,
  RawDocument,
} from './types';
import { validateFinancialContent, type ContentThresholds } from './validation/content-validator';

export interface PipelineDependencies {
  /** Engine to use; null runs pattern extraction only */
  engine?: ExtractionEngine | null;
  /** Model client for a default engine; null runs pattern extraction only */
  client?: ModelClient | null;
  rateLimiter?: RateLimiter;
  policy?: Partial<RetryPolicy>;
  thresholds?: ContentThresholds;
  tolerance?: number;
  signal?: AbortSignal;
}

export interface PipelineRunOptions {
  documentId?: string;
  correlationId?: string;
}

let defaultClient: ModelClient | null | undefined;

function resolveEngine(deps: PipelineDependencies): ExtractionEngine | null {
  if (deps.engine !== undefined) return deps.engine;
  if (deps.client === undefined && defaultClient === undefined) {
    defaultClient = createDefaultModelClient();
  }
  const client = deps.client === undefined ? defaultClient : deps.client;
  if (!client) return null;
  return new ExtractionEngine({
    client,
    rateLimiter: deps.rateLimiter ?? getSharedRateLimiter(),
    policy: deps.policy,
  });
}

interface Extracted {
  record: FinancialRecord;
  provenance: ProvenanceMap;
  method: ExtractionMethod;
  fieldConfidence: FieldConfidence;
  overall: ConfidenceLevel;
  corrections: ConsistencyCorrection[];
  warnings: ConsistencyWarning[];
}

interface Outcome {
  status: ExtractionStatus;
  content: PreprocessedContent | null;
  extracted?: Extracted;
  diagnostic?: Diagnostic;
  attempts: AttemptSummary[];
}

class PipelineRun {
  readonly audit = new AuditTrail();
  private readonly startedAt = Date.now();

  constructor(
    readonly document: RawDocument,
    readonly documentId: string,
    private readonly deps: PipelineDependencies
  ) {}

  get signal(): AbortSignal | undefined {
    return this.deps.signal;
  }

  async execute(): Promise<ExtractionResult> {
    const { document } = this;
    this.audit.record('received', {
      filename: document.filename,
      declared_role: document.declaredRole,
      format_hint: document.formatHint,
      bytes: document.bytes.byteLength,
    });

    if (this.signal?.aborted) return this.cancelled(null, []);

    const { content, diagnostic } = await preprocessDocument(document.bytes, document.filename, document.formatHint);
    this.audit.record('preprocess', {
      format: content.format,
      characters: content.metadata.characterCount,
      line_items: content.lineItems.length,
      is_financial_statement: content.isFinancialStatement,
      structure_indicators: content.metadata.structureIndicators,
      ...(diagnostic ? { diagnostic: diagnostic.code } : {}),
    });
    if (diagnostic) {
      return this.finish({ status: 'unsupported_format', content, diagnostic, attempts: [] });
    }

    const gate = validateFinancialContent(content, this.deps.thresholds);
    this.audit.record('content_gate', {
      passed: gate.hasFinancialContent,
      reason: gate.reason,
      material_values: gate.materialValueCount,
      keyword_adjacent_values: gate.keywordAdjacentCount,
    });
    if (!gate.hasFinancialContent) {
      const error = new NoFinancialContentError(gate.reason, {
        material_values: gate.materialValueCount,
        keyword_adjacent_values: gate.keywordAdjacentCount,
      });
      return this.finish({ status: 'no_financial_content', content, diagnostic: error.toDiagnostic(), attempts: [] });
    }

    if (this.signal?.aborted) return this.cancelled(content, []);
    return this.extract(content);
  }

  private async extract(content: PreprocessedContent): Promise<ExtractionResult> {
    const engine = resolveEngine(this.deps);
    let attempts: AttemptSummary[] = [];
    let fallbackCause: Diagnostic;

    if (engine) {
      const result = await engine.extract(content, this.document.declaredRole, {
        audit: this.audit,
        signal: this.signal,
      });
      attempts = result.attempts;

      if (result.status === 'cancelled') return this.cancelled(content, attempts);
      if (result.status === 'accepted') {
        const provenance = attributeModelValues(result.record, content.text);
        return this.finish({
          status: 'extracted',
          content,
          attempts,
          extracted: this.finalize(result.record, provenance, 'model'),
        });
      }
      fallbackCause = { code: result.reason, message: result.message, details: { attempts: attempts.length } };
    } else {
      fallbackCause = { code: 'MODEL_REQUEST_FAILED', message: 'No model client configured' };
    }

    const pattern = extractWithPatterns(content.text);
    const fieldsFound = Object.keys(pattern.matches).length;
    this.audit.record('pattern_fallback', {
      cause: fallbackCause.code,
      fields_found: fieldsFound,
    });
    patternFallbackCounter.inc({ reason: fallbackCause.code.toLowerCase() });
    logger.warn('Falling back to pattern extraction', { cause: fallbackCause.code, fields_found: fieldsFound });

    const extracted = this.finalize(pattern.record, patternProvenance(pattern.matches), 'pattern_fallback');
    if (extracted.overall === 'UNCERTAIN') {
      return this.finish({
        status: 'uncertain',
        content,
        attempts,
        extracted,
        diagnostic: {
          code: 'UNCERTAIN_RESULT',
          message: 'Primary metrics could not be established with confidence',
          details: { cause: fallbackCause.code, cause_message: fallbackCause.message },
        },
      });
    }
    return this.finish({ status: 'extracted', content, attempts, extracted, diagnostic: fallbackCause });
  }

  private finalize(record: FinancialRecord, provenance: ProvenanceMap, method: ExtractionMethod): Extracted {
    const consistency = validateConsistency(record, provenance, this.deps.tolerance ?? config.consistencyTolerance);
    this.audit.record('consistency', {
      corrections: consistency.corrections,
      warnings: consistency.warnings.map((warning) => warning.code),
    });
    for (const correction of consistency.corrections) {
      consistencyCorrectionsCounter.inc({ field: correction.field, kind: correction.kind });
    }

    const fieldConfidence = scoreFields(consistency.record, consistency.provenance);
    const overall = overallConfidence(fieldConfidence);
    this.audit.record('confidence', {
      overall,
      primary: Object.fromEntries(PRIMARY_METRICS.map((field) => [field, fieldConfidence[field]])),
    });

    return {
      record: consistency.record,
      provenance: consistency.provenance,
      method,
      fieldConfidence,
      overall,
      corrections: consistency.corrections,
      warnings: consistency.warnings,
    };
  }

  /**
   * Result for an error no stage reported itself.
   */
  failed(error: unknown): ExtractionResult {
    const diagnostic: Diagnostic =
      error instanceof PipelineError
        ? error.toDiagnostic()
        : {
            code: 'UNCERTAIN_RESULT',
            message: 'Extraction failed unexpectedly',
            details: { error: error instanceof Error ? error.message : String(error) },
          };
    return this.finish({ status: 'uncertain', content: null, attempts: [], diagnostic });
  }

  private cancelled(content: PreprocessedContent | null, attempts: AttemptSummary[]): ExtractionResult {
    this.audit.record('cancelled', { stage: 'pipeline' });
    return this.finish({ status: 'cancelled', content, attempts, diagnostic: new CancelledError().toDiagnostic() });
  }

  private finish(outcome: Outcome): ExtractionResult {
    const { status, content, extracted, diagnostic, attempts } = outcome;
    const role: DocumentRole = this.document.declaredRole;
    const method: ExtractionMethod = extracted?.method ?? 'none';
    const overall: ConfidenceLevel = extracted?.overall ?? 'UNCERTAIN';

    this.audit.record('result', {
      status,
      overall_confidence: overall,
      extraction_method: method,
      ...(diagnostic ? { diagnostic: diagnostic.code } : {}),
    });

    const processingTimeMs = Date.now() - this.startedAt;
    const result: ExtractionResult = {
      schema_version: '1.0',
      correlation_id: getCorrelationId(),
      document_id: this.documentId,
      status,
      document: {
        filename: this.document.filename,
        role,
        format: content?.format ?? 'unknown',
        ...(content?.metadata.pageCount !== undefined ? { page_count: content.metadata.pageCount } : {}),
        ...(content?.metadata.sheetCount !== undefined ? { sheet_count: content.metadata.sheetCount } : {}),
        is_financial_statement: content?.isFinancialStatement ?? false,
      },
      record: extracted?.record ?? emptyRecord(),
      field_confidence: extracted?.fieldConfidence ?? mapFields(() => 0),
      field_provenance: extracted?.provenance ?? unresolvedProvenance(),
      overall_confidence: overall,
      extraction_method: method,
      ...(diagnostic ? { diagnostic } : {}),
      warnings: extracted?.warnings ?? [],
      corrections: extracted?.corrections ?? [],
      attempts,
      audit_trail: this.audit.getEntries(),
      processing_time_ms: processingTimeMs,
      created_at: new Date().toISOString(),
    };

    validateExtraction(result);
    documentsProcessedCounter.inc({ role, status, method });
    pipelineDurationHistogram.observe({ status }, processingTimeMs / 1000);
    logger.info('Extraction complete', {
      status,
      overall_confidence: overall,
      extraction_method: method,
      attempts: attempts.length,
      processing_time_ms: processingTimeMs,
    });
    return result;
  }
}

/**
 * Run one document through the pipeline. Always resolves with a result.
 */
export async function extractFinancials(
  document: RawDocument,
  deps: PipelineDependencies = {},
  options: PipelineRunOptions = {}
): Promise<ExtractionResult> {
  const documentId = options.documentId ?? ulid();
  const context = {
    correlationId: options.correlationId ?? getCorrelationId(),
    documentId,
    documentRole: document.declaredRole,
  };

  return runWithContextAsync(context, async () => {
    const run = new PipelineRun(document, documentId, deps);
    try {
      return await run.execute();
    } catch (error) {
      logger.error('Pipeline failed unexpectedly', error);
      return run.failed(error);
    }
  });
}

/**
 * Run a set of documents (current, prior, budget, ...) concurrently. Each
 * runs as its own invocation with its own correlation context.
 */
export async function extractDocumentSet(
  documents: RawDocument[],
  deps: PipelineDependencies = {}
): Promise<ExtractionResult[]> {
  const batchId = getCorrelationId();
  logger.info('Extracting document set', { batch_id: batchId, documents: documents.length });
  return Promise.all(documents.map((document) => extractFinancials(document, deps)));
}
