/**
 * Shared TypeScript Types
 *
 * Types for the operating-statement extraction pipeline. The ExtractionResult
 * shape matches docs/contracts/extraction_result.schema.json.
 */

import type { FinancialField, FinancialRecord } from './fields';

// ============================================================================
// Documents
// ============================================================================

/** Which period/statement a document represents */
export type DocumentRole = 'current' | 'prior' | 'budget' | 'prior_year';

export const DOCUMENT_ROLES: readonly DocumentRole[] = ['current', 'prior', 'budget', 'prior_year'];

export type DocumentFormat = 'xlsx' | 'csv' | 'pdf' | 'txt';

/**
 * An uploaded document. Lives only for the duration of one invocation.
 */
export interface RawDocument {
  bytes: Uint8Array;
  filename: string;
  declaredRole: DocumentRole;
  /** File extension or MIME type supplied by the uploader */
  formatHint?: string;
}

// ============================================================================
// Preprocessed Content
// ============================================================================

export interface LineItem {
  category: string;
  value: number;
  /** Nearest preceding section heading, when the table has one */
  section?: string;
}

export interface TextBlock {
  kind: 'text';
  page?: number;
  lines: string[];
}

export interface TableBlock {
  kind: 'table';
  page?: number;
  sheet?: string;
  layout: 'financial_statement' | 'generic';
  headers: string[];
  rows: string[][];
}

export interface SectionBlock {
  kind: 'section';
  label: string;
  title: string;
  lines: string[];
}

export type ContentBlock = TextBlock | TableBlock | SectionBlock;

export interface ContentMetadata {
  filename: string;
  pageCount?: number;
  sheetCount?: number;
  tableCount: number;
  characterCount: number;
  /** Coarse structure hints ("financial_statement_format", "multiple_sheets", ...) */
  structureIndicators: string[];
}

/**
 * Format-normalized document content. `text` is the canonical prompt-ready
 * rendering with structural markers; the other members carry the structure
 * that was recovered while producing it.
 */
export interface PreprocessedContent {
  format: DocumentFormat | 'unknown';
  text: string;
  lineItems: LineItem[];
  isFinancialStatement: boolean;
  blocks: ContentBlock[];
  metadata: ContentMetadata;
}

// ============================================================================
// Diagnostics
// ============================================================================

export type DiagnosticCode =
  | 'UNSUPPORTED_FORMAT'
  | 'NO_FINANCIAL_CONTENT'
  | 'EXTRACTION_TIMEOUT'
  | 'TRANSPORT_FAILURE'
  | 'SCHEMA_MISMATCH'
  | 'ALL_ZERO_RESPONSE'
  | 'MODEL_REQUEST_FAILED'
  | 'UNCERTAIN_RESULT'
  | 'CANCELLED';

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// Provenance & Confidence
// ============================================================================

export type ProvenanceSource =
  | 'model_extracted'
  | 'model_inferred'
  | 'pattern_fallback'
  | 'calculated'
  | 'unresolved';

/** How tightly a value is tied to the source text */
export type MatchStrength = 'strong' | 'weak';

export interface FieldProvenance {
  source: ProvenanceSource;
  strength?: MatchStrength;
  /** Source line the value was read from or verified against */
  evidence?: string;
  /** Fields a calculated value was derived from */
  inputs?: FinancialField[];
}

export type ProvenanceMap = Record<FinancialField, FieldProvenance>;

export type ConfidenceLevel = 'HIGH' | 'MEDIUM' | 'LOW' | 'UNCERTAIN';

export type FieldConfidence = Record<FinancialField, number>;

// ============================================================================
// Audit
// ============================================================================

export type AuditStep =
  | 'received'
  | 'preprocess'
  | 'content_gate'
  | 'prompt'
  | 'attempt'
  | 'backoff'
  | 'parse'
  | 'pattern_fallback'
  | 'consistency'
  | 'confidence'
  | 'result'
  | 'cancelled';

export interface AuditEntry {
  timestamp: string;
  step: AuditStep;
  detail: Record<string, unknown>;
}

// ============================================================================
// Extraction Result (external contract, snake_case)
// ============================================================================

export type ExtractionStatus =
  | 'extracted'
  | 'uncertain'
  | 'no_financial_content'
  | 'unsupported_format'
  | 'cancelled';

export type ExtractionMethod = 'model' | 'pattern_fallback' | 'none';

export interface ConsistencyCorrection {
  field: FinancialField;
  kind: 'corrected' | 'derived' | 'confirmed';
  reported: number | null;
  calculated: number;
  inputs: FinancialField[];
}

export interface ConsistencyWarning {
  code: 'sign_normalized' | 'opex_components_mismatch' | 'other_income_components_mismatch';
  field: FinancialField;
  message: string;
  reported?: number;
  calculated?: number;
}

export interface AttemptSummary {
  attempt: number;
  strategy: string;
  prompt_id: string;
  outcome: string;
  duration_ms: number;
  parse_method?: string;
  errors?: string[];
}

export interface DocumentSummary {
  filename: string;
  role: DocumentRole;
  format: DocumentFormat | 'unknown';
  page_count?: number;
  sheet_count?: number;
  is_financial_statement: boolean;
}

export interface ExtractionResult {
  schema_version: '1.0';
  correlation_id: string;
  document_id: string;
  status: ExtractionStatus;
  document: DocumentSummary;
  record: FinancialRecord;
  field_confidence: FieldConfidence;
  field_provenance: ProvenanceMap;
  overall_confidence: ConfidenceLevel;
  extraction_method: ExtractionMethod;
  diagnostic?: Diagnostic;
  warnings: ConsistencyWarning[];
  corrections: ConsistencyCorrection[];
  attempts: AttemptSummary[];
  audit_trail: AuditEntry[];
  processing_time_ms: number;
  created_at: string;
}

// ============================================================================
// HTTP
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
