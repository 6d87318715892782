import type { ContentMetadata, DocumentFormat, PreprocessedContent } from '../types';

/**
 * What a format-specific preprocessor produces. The registry completes the
 * metadata (filename, character count) and stamps the format.
 */
export interface PreprocessorOutput extends Omit<PreprocessedContent, 'format' | 'metadata'> {
  metadata: Omit<ContentMetadata, 'filename' | 'characterCount'>;
}

export interface FormatPreprocessor {
  format: DocumentFormat;
  preprocess(bytes: Uint8Array, filename: string): Promise<PreprocessorOutput>;
}
