/**
 * Pattern Extraction
 *
 * Model-independent extraction over the canonical content text. For every
 * line the longest label variant decides the field; the first amount after
 * the label is taken (a strong match), or failing that a lone amount on the
 * following line (a weak match). The first strong match per field wins.
 */

import {
  containsLabelVariant,
  emptyRecord,
  matchFieldLabel,
  type FinancialField,
  type FinancialRecord,
} from '../fields';
import { findMoneyTokens, isYearLike, type MoneyToken } from '../money';
import type { MatchStrength } from '../types';
import { contentBodyLines } from '../validation/content-validator';

export interface PatternMatch {
  field: FinancialField;
  value: number;
  strength: MatchStrength;
  /** Line the label was found on */
  line: string;
}

export interface PatternExtraction {
  record: FinancialRecord;
  matches: Partial<Record<FinancialField, PatternMatch>>;
}

// Small bare integers next to a label are usually unit counts or line numbers
const MIN_BARE_AMOUNT = 100;

function looksMonetary(token: MoneyToken): boolean {
  return token.hasCurrency || token.hasSeparator || token.hasDecimal || Math.abs(token.value) >= MIN_BARE_AMOUNT;
}

/**
 * First amount on the line that follows the label variant.
 */
export function amountAfterLabel(line: string, variant: string): MoneyToken | null {
  const candidates = findMoneyTokens(line).filter(
    (token) => !isYearLike(token) && containsLabelVariant(line.slice(0, token.index), variant)
  );
  return candidates.find(looksMonetary) ?? candidates[0] ?? null;
}

/**
 * A line holding nothing but one amount ("$250,000", "  (1,200)").
 */
export function loneAmount(line: string): MoneyToken | null {
  if (matchFieldLabel(line)) return null;
  const tokens = findMoneyTokens(line).filter((token) => !isYearLike(token));
  if (tokens.length !== 1) return null;
  const [token] = tokens;
  const rest = (line.slice(0, token.index) + line.slice(token.index + token.raw.length)).replace(/[\s:|.]/g, '');
  return rest === '' ? token : null;
}

export function extractWithPatterns(text: string): PatternExtraction {
  const lines = contentBodyLines(text);
  const matches: Partial<Record<FinancialField, PatternMatch>> = {};

  lines.forEach((line, index) => {
    const label = matchFieldLabel(line);
    if (!label) return;

    let token = amountAfterLabel(line, label.variant);
    let strength: MatchStrength = 'strong';
    if (!token) {
      const next = lines[index + 1];
      token = next === undefined ? null : loneAmount(next);
      strength = 'weak';
    }
    if (!token) return;

    const existing = matches[label.field];
    if (existing && (existing.strength === 'strong' || strength === 'weak')) return;
    matches[label.field] = { field: label.field, value: token.value, strength, line: line.trim() };
  });

  const record = emptyRecord();
  for (const match of Object.values(matches)) {
    if (match) record[match.field] = match.value;
  }
  return { record, matches };
}
