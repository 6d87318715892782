/**
 * Plain Text Preprocessing
 *
 * Segments free text into labeled sections at heading lines and collects
 * "label … amount" lines as line items.
 */

import { UnsupportedFormatError } from '../errors';
import { hasFinancialKeyword, normalizeLabel } from '../fields';
import { findMoneyTokens, isYearLike } from '../money';
import type { ContentBlock, LineItem, SectionBlock, TextBlock } from '../types';
import { decodeText } from './text-decoding';
import type { FormatPreprocessor } from './types';

// First match wins: "Operating Expenses" is an expense heading
const SECTION_KEYWORDS: ReadonlyArray<[RegExp, string]> = [
  [/\brevenues?\b/, 'REVENUE'],
  [/\bincome\b/, 'INCOME'],
  [/\bexpenses?\b/, 'EXPENSE'],
  [/\boperating\b/, 'OPERATING'],
  [/\bproperty\b/, 'PROPERTY'],
  [/\btotals?\b/, 'TOTAL'],
];

const MAX_HEADING_WORDS = 6;

/** Minimum label/amount lines for the text to count as a paired statement */
const MIN_STATEMENT_LINES = 3;

/**
 * Section label for a heading line, or null when the line is not a heading.
 */
export function sectionLabelFor(line: string): string | null {
  const tokens = findMoneyTokens(line).filter((token) => !isYearLike(token));
  if (tokens.length > 0) return null;
  const normalized = normalizeLabel(line);
  if (!normalized || normalized.split(' ').length > MAX_HEADING_WORDS) return null;
  for (const [pattern, label] of SECTION_KEYWORDS) {
    if (pattern.test(normalized)) return label;
  }
  return null;
}

/**
 * Parse "Label ..... $1,234" / "Label: (500)" lines. The amount must end the line.
 */
export function parseLabelValueLine(line: string): { category: string; value: number } | null {
  const tokens = findMoneyTokens(line).filter((token) => !isYearLike(token));
  const last = tokens[tokens.length - 1];
  if (!last) return null;
  const tail = line.slice(last.index + last.raw.length).trim();
  if (tail !== '') return null;
  const category = line
    .slice(0, last.index)
    .replace(/[\s:.|–—-]+$/, '')
    .trim();
  if (!/[a-z]/i.test(category) || !hasFinancialKeyword(category)) return null;
  return { category, value: last.value };
}

export const plainTextPreprocessor: FormatPreprocessor = {
  format: 'txt',
  async preprocess(bytes, filename) {
    const decoded = decodeText(bytes);
    if (decoded === null) {
      throw new UnsupportedFormatError('File is not readable as text', { filename });
    }

    const sourceLines = decoded
      .split(/\r?\n/)
      .map((line) => line.replace(/\s+$/, ''))
      .filter((line) => line.trim() !== '');

    const lines = [`TEXT DOCUMENT: ${filename}`];
    const blocks: ContentBlock[] = [];
    const lineItems: LineItem[] = [];
    let current: SectionBlock | TextBlock | null = null;

    for (const line of sourceLines) {
      const label = sectionLabelFor(line);
      if (label) {
        current = { kind: 'section', label, title: line.trim(), lines: [] };
        blocks.push(current);
        lines.push(`[${label}_SECTION] ${line.trim()}`);
        continue;
      }

      if (!current) {
        current = { kind: 'text', lines: [] };
        blocks.push(current);
      }
      current.lines.push(line);
      lines.push(line);

      const item = parseLabelValueLine(line);
      if (item) {
        lineItems.push(current.kind === 'section' ? { ...item, section: current.title } : item);
      }
    }
    lines.push('[DOCUMENT_END]');

    const sectionCount = blocks.filter((block) => block.kind === 'section').length;
    const isFinancialStatement = lineItems.length >= MIN_STATEMENT_LINES;
    const structureIndicators: string[] = [];
    if (sectionCount > 0) structureIndicators.push('labeled_sections');
    if (isFinancialStatement) structureIndicators.push('label_value_lines');

    return {
      text: lines.join('\n'),
      lineItems,
      isFinancialStatement,
      blocks,
      metadata: { tableCount: 0, structureIndicators },
    };
  },
};
