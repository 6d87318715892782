/**
 * Model Client
 *
 * The engine talks to the language model through ModelClient so tests can
 * substitute a scripted fake. OpenAiModelClient maps SDK failures onto the
 * pipeline taxonomy: timeouts, rate limits and 5xx/transport errors are
 * retryable, everything else ends the attempt loop.
 */

import OpenAI from 'openai';
import { config } from '../config';
import {
  CancelledError,
  ExtractionTimeoutError,
  ModelRequestError,
  PipelineError,
  RateLimitedError,
  TransportFailureError,
} from '../errors';
import { logger } from '../logger';
import { llmRequestDurationHistogram, llmRequestsCounter } from '../metrics';
import { RECORD_JSON_SCHEMA } from '../schemas';

export interface ModelRequest {
  promptId: string;
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  signal?: AbortSignal;
}

export interface ModelResponse {
  content: string;
  model: string;
  requestId: string;
}

export interface ModelClient {
  readonly model: string;
  complete(request: ModelRequest): Promise<ModelResponse>;
}

export interface OpenAiModelClientOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  baseURL?: string;
}

const RECORD_RESPONSE_FORMAT = {
  type: 'json_schema' as const,
  json_schema: {
    name: 'financial_record',
    strict: true,
    schema: RECORD_JSON_SCHEMA,
  },
};

export function toPipelineError(error: unknown, timeoutMs: number): PipelineError {
  if (error instanceof PipelineError) return error;
  if (error instanceof OpenAI.APIUserAbortError) return new CancelledError();
  if (error instanceof OpenAI.APIConnectionTimeoutError) return new ExtractionTimeoutError(timeoutMs);
  if (error instanceof OpenAI.RateLimitError) return new RateLimitedError(error.message);
  if (error instanceof OpenAI.APIConnectionError) return new TransportFailureError(error.message);
  if (error instanceof OpenAI.APIError) {
    const status = error.status ?? 0;
    if (status >= 500 || status === 408 || status === 409) {
      return new TransportFailureError(error.message, { status });
    }
    return new ModelRequestError(error.message, { status });
  }
  return new ModelRequestError(error instanceof Error ? error.message : String(error));
}

export class OpenAiModelClient implements ModelClient {
  readonly model: string;
  private readonly client: OpenAI;
  private readonly timeoutMs: number;

  constructor(options: OpenAiModelClientOptions) {
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      // Retries belong to the extraction engine
      maxRetries: 0,
    });
  }

  async complete(request: ModelRequest): Promise<ModelResponse> {
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: request.systemPrompt },
            { role: 'user', content: request.userPrompt },
          ],
          response_format: RECORD_RESPONSE_FORMAT,
          temperature: request.temperature,
        },
        { signal: request.signal, timeout: this.timeoutMs }
      );

      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model: this.model }, duration);
      llmRequestsCounter.inc({ model: this.model, status: 'success' });

      const requestId = response.id || `req_${Date.now()}`;
      logger.info('Model call complete', {
        model: this.model,
        request_id: requestId,
        prompt_id: request.promptId,
        duration_seconds: duration,
        tokens_used: response.usage?.total_tokens,
      });

      return {
        content: response.choices[0]?.message?.content ?? '',
        model: response.model || this.model,
        requestId,
      };
    } catch (error) {
      const duration = (Date.now() - startTime) / 1000;
      const failure = toPipelineError(error, this.timeoutMs);
      llmRequestDurationHistogram.observe({ model: this.model }, duration);
      llmRequestsCounter.inc({ model: this.model, status: failure.code.toLowerCase() });

      logger.error('Model call failed', error, {
        model: this.model,
        prompt_id: request.promptId,
        code: failure.code,
        retryable: failure.retryable,
      });

      throw failure;
    }
  }
}

/**
 * Client built from configuration, or null when no API key is configured
 * (the pipeline then goes straight to pattern extraction).
 */
export function createDefaultModelClient(): ModelClient | null {
  const apiKey = process.env.OPENAI_API_KEY || config.openaiApiKey;
  if (!apiKey) {
    logger.warn('OPENAI_API_KEY not set; extraction will use pattern matching only');
    return null;
  }
  return new OpenAiModelClient({
    apiKey,
    model: process.env.LLM_MODEL || config.llmModel,
    timeoutMs: config.llmRequestTimeoutMs,
  });
}
