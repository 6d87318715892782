/**
 * Delimited Text Preprocessing
 */

import { UnsupportedFormatError } from '../errors';
import type { CellValue } from './columns';
import { decodeText } from './text-decoding';
import { buildTable, renderTable } from './tabular';
import type { FormatPreprocessor } from './types';

const CANDIDATE_DELIMITERS = [',', ';', '\t', '|'] as const;

/**
 * Pick the delimiter that splits the first lines into the most consistent,
 * widest rows.
 */
export function detectDelimiter(text: string): string {
  const sample = text.split(/\r?\n/).filter((line) => line.trim() !== '').slice(0, 10);
  let best: string = ',';
  let bestScore = 0;
  for (const delimiter of CANDIDATE_DELIMITERS) {
    const widths = sample.map((line) => parseDelimited(line, delimiter)[0]?.length ?? 0);
    if (widths.length === 0) continue;
    const modeWidth = mostCommon(widths);
    if (modeWidth < 2) continue;
    const consistent = widths.filter((width) => width === modeWidth).length;
    const score = consistent * modeWidth;
    if (score > bestScore) {
      bestScore = score;
      best = delimiter;
    }
  }
  return best;
}

function mostCommon(values: number[]): number {
  const counts = new Map<number, number>();
  for (const value of values) counts.set(value, (counts.get(value) ?? 0) + 1);
  let result = 0;
  let resultCount = 0;
  for (const [value, count] of counts) {
    if (count > resultCount || (count === resultCount && value > result)) {
      result = value;
      resultCount = count;
    }
  }
  return result;
}

/**
 * Split delimited text into rows, honoring double-quoted fields (with ""
 * escapes and embedded newlines).
 */
export function parseDelimited(text: string, delimiter: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (quoted) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"' && field.trim() === '') {
      field = '';
      quoted = true;
    } else if (char === delimiter) {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += char;
    }
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

function toCell(field: string): CellValue {
  const trimmed = field.trim();
  return trimmed === '' ? null : trimmed;
}

export const csvPreprocessor: FormatPreprocessor = {
  format: 'csv',
  async preprocess(bytes, filename) {
    const text = decodeText(bytes);
    if (text === null) {
      throw new UnsupportedFormatError('File is not readable as delimited text', { filename });
    }

    const delimiter = detectDelimiter(text);
    const rows = parseDelimited(text, delimiter).map((fields) => fields.map(toCell));
    const built = buildTable({ rows });

    const lines = [`CSV DOCUMENT: ${filename}`];
    if (built) {
      lines.push(...renderTable(built));
    } else {
      lines.push('[EMPTY]');
    }
    lines.push('[DOCUMENT_END]');

    const isFinancialStatement = built?.block.layout === 'financial_statement';
    return {
      text: lines.join('\n'),
      lineItems: built?.lineItems ?? [],
      isFinancialStatement,
      blocks: built ? [built.block] : [],
      metadata: {
        tableCount: built ? 1 : 0,
        structureIndicators: isFinancialStatement ? ['financial_statement_format'] : ['table_format'],
      },
    };
  },
};
