/**
 * Test Helpers
 *
 * In-process stand-ins for the model provider and small builders for
 * documents and records.
 */

import {
  emptyRecord,
  mapFields,
  type DocumentRole,
  type FieldProvenance,
  type FinancialField,
  type FinancialRecord,
  type ModelClient,
  type ModelRequest,
  type ModelResponse,
  type PreprocessedContent,
  type ProvenanceMap,
  type RawDocument,
  type RetryPolicy,
} from '@noi-extract/shared';

export type ScriptStep = string | Error | 'hang';

/**
 * Model client that replays a script, one step per call. The last step
 * repeats once the script runs out; 'hang' never resolves.
 */
export class ScriptedModelClient implements ModelClient {
  readonly model = 'scripted-model';
  readonly requests: ModelRequest[] = [];

  constructor(private readonly script: ScriptStep[]) {}

  get calls(): number {
    return this.requests.length;
  }

  async complete(request: ModelRequest): Promise<ModelResponse> {
    this.requests.push(request);
    const step = this.script[Math.min(this.requests.length, this.script.length) - 1];
    if (step === 'hang') return new Promise<ModelResponse>(() => undefined);
    if (step instanceof Error) throw step;
    return { content: step, model: this.model, requestId: `req-${this.requests.length}` };
  }
}

/** Retry policy with millisecond backoff so retry paths run quickly */
export const FAST_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffBaseMs: 1,
  backoffMaxMs: 4,
  timeoutMs: 1000,
};

export function textDocument(
  filename: string,
  text: string,
  declaredRole: DocumentRole = 'current'
): RawDocument {
  return { bytes: new TextEncoder().encode(text), filename, declaredRole };
}

export function recordWith(values: Partial<FinancialRecord>): FinancialRecord {
  return { ...emptyRecord(), ...values };
}

export function recordJson(values: Partial<FinancialRecord>): string {
  return JSON.stringify(recordWith(values));
}

export function provenanceWith(entries: Partial<Record<FinancialField, FieldProvenance>>): ProvenanceMap {
  return mapFields((field): FieldProvenance => entries[field] ?? { source: 'unresolved' });
}

/**
 * Content as a preprocessor would hand it over, for tests that start past
 * preprocessing.
 */
export function preprocessed(text: string, overrides: Partial<PreprocessedContent> = {}): PreprocessedContent {
  return {
    format: 'txt',
    text,
    lineItems: [],
    isFinancialStatement: false,
    blocks: [],
    metadata: {
      filename: 'statement.txt',
      tableCount: 0,
      characterCount: text.length,
      structureIndicators: [],
    },
    ...overrides,
  };
}
