/**
 * ExtractionEngine
 *
 * Bounded attempt loop around the model. Each attempt builds a prompt for its
 * strategy, waits for a rate-limiter token, calls the model under a per-call
 * timeout and parses the response. An attempt is accepted when the parsed
 * record matches the schema and carries a nonzero primary metric.
 *
 * The decision after each attempt is made by planNextStep, a pure function:
 * transient failures (timeout, transport) back off exponentially before the
 * next attempt; rejected output retries at once with a more explicit prompt;
 * non-transient request errors stop the loop.
 */

import type { AuditTrail } from '../audit/audit-trail';
import { config } from '../config';
import { CancelledError, ExtractionTimeoutError, PipelineError } from '../errors';
import { PRIMARY_METRICS, type FinancialRecord } from '../fields';
import { logger } from '../logger';
import { extractionAttemptsCounter } from '../metrics';
import { buildPrompt } from '../prompts/prompt-builder';
import type { AttemptSummary, DiagnosticCode, DocumentRole, PreprocessedContent } from '../types';
import { toPipelineError, type ModelClient, type ModelRequest, type ModelResponse } from './model-client';
import type { RateLimiter } from './rate-limiter';
import { parseModelResponse, type ParseMethod } from './response-parser';
import { sleep } from './sleep';

// ============================================================================
// Step Planning
// ============================================================================

export type AttemptOutcomeKind =
  | 'accepted'
  | 'schema_mismatch'
  | 'all_zero'
  | 'timeout'
  | 'transport_failure'
  | 'fatal';

export interface RetryPolicy {
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  /** Per-call model timeout */
  timeoutMs: number;
}

export type NextStep =
  | { action: 'accept' }
  | { action: 'retry'; nextAttempt: number; delayMs: number }
  | { action: 'exhausted' };

const TRANSIENT_OUTCOMES: ReadonlySet<AttemptOutcomeKind> = new Set<AttemptOutcomeKind>([
  'timeout',
  'transport_failure',
]);

export function defaultRetryPolicy(): RetryPolicy {
  return {
    maxAttempts: config.extractionMaxAttempts,
    backoffBaseMs: config.extractionBackoffBaseMs,
    backoffMaxMs: config.extractionBackoffMaxMs,
    timeoutMs: config.llmRequestTimeoutMs,
  };
}

/**
 * Delay before the attempt that follows a transient failure of `attempt`:
 * base, 2·base, 4·base, ... capped at backoffMaxMs.
 */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.backoffBaseMs * 2 ** (attempt - 1), policy.backoffMaxMs);
}

export function planNextStep(attempt: number, outcome: AttemptOutcomeKind, policy: RetryPolicy): NextStep {
  if (outcome === 'accepted') return { action: 'accept' };
  if (outcome === 'fatal' || attempt >= policy.maxAttempts) return { action: 'exhausted' };
  return {
    action: 'retry',
    nextAttempt: attempt + 1,
    delayMs: TRANSIENT_OUTCOMES.has(outcome) ? backoffDelay(attempt, policy) : 0,
  };
}

const OUTCOME_CODES: Record<Exclude<AttemptOutcomeKind, 'accepted'>, DiagnosticCode> = {
  schema_mismatch: 'SCHEMA_MISMATCH',
  all_zero: 'ALL_ZERO_RESPONSE',
  timeout: 'EXTRACTION_TIMEOUT',
  transport_failure: 'TRANSPORT_FAILURE',
  fatal: 'MODEL_REQUEST_FAILED',
};

export function hasNonZeroPrimary(record: FinancialRecord): boolean {
  return PRIMARY_METRICS.some((field) => {
    const value = record[field];
    return value !== null && value !== 0;
  });
}

// ============================================================================
// Engine
// ============================================================================

export type EngineResult =
  | { status: 'accepted'; record: FinancialRecord; model: string; parseMethod: ParseMethod; attempts: AttemptSummary[] }
  | { status: 'exhausted'; reason: DiagnosticCode; message: string; attempts: AttemptSummary[] }
  | { status: 'cancelled'; attempts: AttemptSummary[] };

export interface EngineRunOptions {
  audit: AuditTrail;
  signal?: AbortSignal;
}

export interface ExtractionEngineOptions {
  client: ModelClient;
  rateLimiter?: RateLimiter;
  policy?: Partial<RetryPolicy>;
  maxPromptChars?: number;
}

interface AttemptResult {
  kind: AttemptOutcomeKind;
  problem: string;
  record?: FinancialRecord;
  model?: string;
  parseMethod?: ParseMethod;
  errors?: string[];
}

/**
 * Call the model, failing with ExtractionTimeoutError after timeoutMs and with
 * CancelledError as soon as the caller's signal aborts. Either way the
 * underlying request is aborted.
 */
async function completeWithTimeout(
  client: ModelClient,
  request: ModelRequest,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<ModelResponse> {
  if (signal?.aborted) throw new CancelledError();

  const controller = new AbortController();
  let rejectGuard: (error: PipelineError) => void = () => undefined;
  const guard = new Promise<never>((_, reject) => {
    rejectGuard = reject;
  });

  const timer = setTimeout(() => {
    controller.abort();
    rejectGuard(new ExtractionTimeoutError(timeoutMs));
  }, timeoutMs);
  const onAbort = () => {
    controller.abort();
    rejectGuard(new CancelledError());
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    return await Promise.race([client.complete({ ...request, signal: controller.signal }), guard]);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
}

export class ExtractionEngine {
  private readonly client: ModelClient;
  private readonly rateLimiter?: RateLimiter;
  private readonly policy: RetryPolicy;
  private readonly maxPromptChars?: number;

  constructor(options: ExtractionEngineOptions) {
    this.client = options.client;
    this.rateLimiter = options.rateLimiter;
    this.policy = { ...defaultRetryPolicy(), ...options.policy };
    this.maxPromptChars = options.maxPromptChars;
  }

  get model(): string {
    return this.client.model;
  }

  async extract(
    content: PreprocessedContent,
    role: DocumentRole,
    { audit, signal }: EngineRunOptions
  ): Promise<EngineResult> {
    const attempts: AttemptSummary[] = [];
    let attempt = 1;
    let previousProblem: string | undefined;

    for (;;) {
      if (signal?.aborted) {
        audit.record('cancelled', { attempt, stage: 'before_attempt' });
        return { status: 'cancelled', attempts };
      }

      const prompt = buildPrompt(content, role, attempt, {
        previousProblem,
        maxChars: this.maxPromptChars,
      });
      audit.record('prompt', {
        attempt,
        prompt_id: prompt.promptId,
        strategy: prompt.strategy.name,
        temperature: prompt.strategy.temperature,
        truncated: prompt.truncated,
      });

      const request: ModelRequest = {
        promptId: prompt.promptId,
        systemPrompt: prompt.systemPrompt,
        userPrompt: prompt.userPrompt,
        temperature: prompt.strategy.temperature,
      };
      const startedAt = Date.now();
      const result = await this.runAttempt(attempt, request, audit, signal);

      if (result === 'cancelled') {
        audit.record('cancelled', { attempt, stage: 'model_call' });
        return { status: 'cancelled', attempts };
      }

      const summary: AttemptSummary = {
        attempt,
        strategy: prompt.strategy.name,
        prompt_id: prompt.promptId,
        outcome: result.kind,
        duration_ms: Date.now() - startedAt,
        ...(result.parseMethod ? { parse_method: result.parseMethod } : {}),
        ...(result.errors && result.errors.length > 0 ? { errors: result.errors } : {}),
      };
      attempts.push(summary);
      extractionAttemptsCounter.inc({ strategy: prompt.strategy.name, outcome: result.kind });

      const step = planNextStep(attempt, result.kind, this.policy);
      if (step.action === 'accept' && result.record && result.parseMethod) {
        logger.info('Extraction attempt accepted', { attempt, prompt_id: prompt.promptId });
        return {
          status: 'accepted',
          record: result.record,
          model: result.model ?? this.client.model,
          parseMethod: result.parseMethod,
          attempts,
        };
      }

      if (step.action !== 'retry') {
        const reason = result.kind === 'accepted' ? 'MODEL_REQUEST_FAILED' : OUTCOME_CODES[result.kind];
        logger.warn('Extraction attempts exhausted', { attempts: attempt, reason, problem: result.problem });
        return { status: 'exhausted', reason, message: result.problem, attempts };
      }

      logger.warn('Extraction attempt rejected', {
        attempt,
        outcome: result.kind,
        problem: result.problem,
        next_attempt: step.nextAttempt,
        delay_ms: step.delayMs,
      });

      if (step.delayMs > 0) {
        audit.record('backoff', { after_attempt: attempt, delay_ms: step.delayMs });
        try {
          await sleep(step.delayMs, signal);
        } catch (error) {
          if (error instanceof CancelledError) {
            audit.record('cancelled', { attempt, stage: 'backoff' });
            return { status: 'cancelled', attempts };
          }
          throw error;
        }
      }

      previousProblem = result.problem;
      attempt = step.nextAttempt;
    }
  }

  private async runAttempt(
    attempt: number,
    request: ModelRequest,
    audit: AuditTrail,
    signal?: AbortSignal
  ): Promise<AttemptResult | 'cancelled'> {
    let response: ModelResponse;
    try {
      await this.rateLimiter?.acquire(signal);
      response = await completeWithTimeout(this.client, request, this.policy.timeoutMs, signal);
    } catch (error) {
      const failure = toPipelineError(error, this.policy.timeoutMs);
      audit.record('attempt', {
        attempt,
        prompt_id: request.promptId,
        error_code: failure.code,
        error: failure.message,
        retryable: failure.retryable,
      });
      if (failure instanceof CancelledError) return 'cancelled';
      return { kind: classifyFailure(failure), problem: failure.message };
    }

    audit.record('attempt', {
      attempt,
      prompt_id: request.promptId,
      model: response.model,
      request_id: response.requestId,
      raw_response: response.content,
    });

    const parsed = parseModelResponse(response.content);
    if (!parsed.ok) {
      audit.record('parse', { attempt, ok: false, reason: parsed.reason, method: parsed.method, errors: parsed.errors });
      return {
        kind: 'schema_mismatch',
        problem: `The response did not match the required JSON schema (${parsed.errors.slice(0, 3).join('; ')})`,
        parseMethod: parsed.method,
        errors: parsed.errors,
      };
    }

    audit.record('parse', {
      attempt,
      ok: true,
      method: parsed.method,
      unknown_keys: parsed.unknownKeys,
    });

    if (!hasNonZeroPrimary(parsed.record)) {
      return {
        kind: 'all_zero',
        problem: 'Every primary metric (gpr, egi, opex, noi) was zero or null',
        parseMethod: parsed.method,
      };
    }

    return {
      kind: 'accepted',
      problem: '',
      record: parsed.record,
      model: response.model,
      parseMethod: parsed.method,
    };
  }
}

function classifyFailure(failure: PipelineError): AttemptOutcomeKind {
  if (failure.code === 'EXTRACTION_TIMEOUT') return 'timeout';
  return failure.retryable ? 'transport_failure' : 'fatal';
}
