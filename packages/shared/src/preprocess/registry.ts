/**
 * Preprocessor Registry
 *
 * Registry pattern for format-specific preprocessors.
 */

import { logger } from '../logger';
import type { DocumentFormat } from '../types';
import { csvPreprocessor } from './csv';
import { pdfPreprocessor } from './pdf';
import { plainTextPreprocessor } from './plain-text';
import { spreadsheetPreprocessor } from './spreadsheet';
import type { FormatPreprocessor } from './types';

const preprocessorRegistry = new Map<DocumentFormat, FormatPreprocessor>();

/**
 * Register a preprocessor for a format. Overwrites any existing one.
 */
export function registerPreprocessor(preprocessor: FormatPreprocessor): void {
  preprocessorRegistry.set(preprocessor.format, preprocessor);
  logger.debug('Registered preprocessor', { format: preprocessor.format });
}

export function getPreprocessor(format: DocumentFormat): FormatPreprocessor | undefined {
  return preprocessorRegistry.get(format);
}

export function getRegisteredFormats(): DocumentFormat[] {
  return Array.from(preprocessorRegistry.keys());
}

export function registerDefaultPreprocessors(): void {
  registerPreprocessor(spreadsheetPreprocessor);
  registerPreprocessor(csvPreprocessor);
  registerPreprocessor(pdfPreprocessor);
  registerPreprocessor(plainTextPreprocessor);
}

registerDefaultPreprocessors();
