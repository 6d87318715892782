/**
 * ContentValidator
 *
 * Gate between preprocessing and extraction: tells a statement with real
 * figures apart from an empty template (labels only, zeros, years, dates).
 */

import { config } from '../config';
import { hasFinancialKeyword } from '../fields';
import { findMoneyTokens, isYearLike, type MoneyToken } from '../money';
import type { PreprocessedContent } from '../types';

export interface ContentThresholds {
  /** A value counts as material when its magnitude exceeds this */
  materialityThreshold: number;
  /** Material values needed when none sits next to a financial keyword */
  minMaterialValues: number;
}

export interface ContentValidation {
  hasFinancialContent: boolean;
  reason: string;
  materialValueCount: number;
  keywordAdjacentCount: number;
}

// Structural lines written by the preprocessors; their numbers are counts, not money
const MARKER_LINE = /^\s*(\[[A-Z0-9_]+\]|(EXCEL|CSV|PDF|TEXT) DOCUMENT:|SHEETS:|PAGES:|COLUMN HEADERS:|LINE ITEMS:|DATA ROWS:)/;

// "[EXPENSE_SECTION] Total Operating Expenses": the heading text is still content
const SECTION_PREFIX = /^\s*\[[A-Z0-9_]+_SECTION\]\s*/;

/**
 * Body lines of the canonical text, without structural marker lines. Section
 * headings keep their text without the marker.
 */
export function contentBodyLines(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.replace(SECTION_PREFIX, ''))
    .filter((line) => line.trim() !== '' && !MARKER_LINE.test(line));
}

function isDateFragment(line: string, token: MoneyToken): boolean {
  const before = line[token.index - 1];
  const after = line[token.index + token.raw.length];
  return before === '/' || after === '/';
}

export function materialTokens(line: string, materialityThreshold: number): MoneyToken[] {
  return findMoneyTokens(line).filter(
    (token) =>
      !isYearLike(token) &&
      !isDateFragment(line, token) &&
      Math.abs(token.value) > materialityThreshold
  );
}

export function validateFinancialContent(
  content: PreprocessedContent,
  thresholds: ContentThresholds = {
    materialityThreshold: config.materialityThreshold,
    minMaterialValues: config.minMaterialValues,
  }
): ContentValidation {
  let materialValueCount = 0;
  let keywordAdjacentCount = 0;

  for (const line of contentBodyLines(content.text)) {
    const material = materialTokens(line, thresholds.materialityThreshold);
    if (material.length === 0) continue;
    materialValueCount += material.length;
    if (hasFinancialKeyword(line)) keywordAdjacentCount += material.length;
  }

  if (materialValueCount >= thresholds.minMaterialValues) {
    return {
      hasFinancialContent: true,
      reason: `Found ${materialValueCount} values above ${thresholds.materialityThreshold}`,
      materialValueCount,
      keywordAdjacentCount,
    };
  }
  if (keywordAdjacentCount > 0) {
    return {
      hasFinancialContent: true,
      reason: `Found ${keywordAdjacentCount} material values beside financial labels`,
      materialValueCount,
      keywordAdjacentCount,
    };
  }
  return {
    hasFinancialContent: false,
    reason:
      materialValueCount === 0
        ? 'No values above the materiality threshold; the document looks like an empty template'
        : `Only ${materialValueCount} material values and none beside a financial label`,
    materialValueCount,
    keywordAdjacentCount,
  };
}
