/**
 * DocumentPreprocessor
 *
 * Bytes + format hint → PreprocessedContent. Never throws: unreadable input
 * yields an empty-but-valid content object and an UNSUPPORTED_FORMAT
 * diagnostic.
 */

import { UnsupportedFormatError, isPipelineError } from '../errors';
import { logger } from '../logger';
import type { Diagnostic, DocumentFormat, PreprocessedContent } from '../types';
import { resolveFormat } from './format';
import { getPreprocessor } from './registry';

export interface PreprocessOutcome {
  content: PreprocessedContent;
  diagnostic?: Diagnostic;
}

export function emptyContent(filename: string, format: DocumentFormat | 'unknown' = 'unknown'): PreprocessedContent {
  return {
    format,
    text: '',
    lineItems: [],
    isFinancialStatement: false,
    blocks: [],
    metadata: { filename, tableCount: 0, characterCount: 0, structureIndicators: [] },
  };
}

export async function preprocessDocument(
  bytes: Uint8Array,
  filename: string,
  formatHint?: string
): Promise<PreprocessOutcome> {
  const resolution = resolveFormat(bytes, filename, formatHint);
  if (!resolution.supported) {
    logger.warn('Unsupported document format', { filename, formatHint, reason: resolution.reason });
    return {
      content: emptyContent(filename),
      diagnostic: new UnsupportedFormatError(resolution.reason, { filename, formatHint }).toDiagnostic(),
    };
  }

  const { format } = resolution;
  const preprocessor = getPreprocessor(format);
  if (!preprocessor) {
    return {
      content: emptyContent(filename, format),
      diagnostic: new UnsupportedFormatError(`No preprocessor registered for ${format}`, {
        filename,
      }).toDiagnostic(),
    };
  }

  try {
    const output = await preprocessor.preprocess(bytes, filename);
    const content: PreprocessedContent = {
      ...output,
      format,
      metadata: { ...output.metadata, filename, characterCount: output.text.length },
    };
    logger.info('Document preprocessed', {
      filename,
      format,
      resolvedBy: resolution.resolvedBy,
      characters: content.metadata.characterCount,
      lineItems: content.lineItems.length,
      isFinancialStatement: content.isFinancialStatement,
    });
    return { content };
  } catch (error) {
    const failure = isPipelineError(error)
      ? error
      : new UnsupportedFormatError('Document could not be parsed', {
          filename,
          reason: error instanceof Error ? error.message : String(error),
        });
    logger.warn('Document preprocessing failed', { filename, format, code: failure.code });
    return { content: emptyContent(filename, format), diagnostic: failure.toDiagnostic() };
  }
}

export { resolveFormat, type FormatResolution } from './format';
export {
  detectColumnRoles,
  isPlaceholderHeader,
  VALUE_COLUMN_NUMERIC_RATIO,
  PLACEHOLDER_KEEP_RATIO,
  type CellValue,
  type ColumnRoles,
  type ColumnProfile,
} from './columns';
export { buildTable, renderTable, findHeaderRow, type RawTable, type BuiltTable } from './tabular';
export { detectDelimiter, parseDelimited } from './csv';
export { groupIntoLines, segmentPage, type PositionedText, type PdfLine, type PageSegment } from './pdf';
export { sectionLabelFor, parseLabelValueLine } from './plain-text';
export { normalizeCellValue } from './spreadsheet';
export { registerPreprocessor, getPreprocessor, getRegisteredFormats } from './registry';
export type { FormatPreprocessor, PreprocessorOutput } from './types';
