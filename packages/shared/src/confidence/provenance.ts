/**
 * Field Provenance
 *
 * Where each value in a record came from. Model values are checked against
 * the amounts in the source text: a value found on a line labeled for the
 * field is a strong match, on an unlabeled line a weak one. A value found
 * nowhere, or only under another field's label, is model_inferred.
 */

import { mapFields, matchFieldLabel, type FinancialField, type FinancialRecord } from '../fields';
import type { PatternMatch } from '../extraction/pattern-extractor';
import { findMoneyTokens } from '../money';
import type { FieldProvenance, ProvenanceMap } from '../types';
import { contentBodyLines } from '../validation/content-validator';

const AMOUNT_EPSILON = 0.005;

interface SourceLine {
  text: string;
  field: FinancialField | null;
  amounts: number[];
}

function indexSourceLines(text: string): SourceLine[] {
  return contentBodyLines(text)
    .map((line) => ({
      text: line.trim(),
      field: matchFieldLabel(line)?.field ?? null,
      amounts: findMoneyTokens(line).map((token) => Math.abs(token.value)),
    }))
    .filter((line) => line.amounts.length > 0);
}

function containsAmount(line: SourceLine, value: number): boolean {
  const magnitude = Math.abs(value);
  return line.amounts.some((amount) => Math.abs(amount - magnitude) < AMOUNT_EPSILON);
}

export function unresolvedProvenance(): ProvenanceMap {
  return mapFields((): FieldProvenance => ({ source: 'unresolved' }));
}

/**
 * Attribute every non-null model value to the source line it appears on.
 * Sign is ignored: "(12,500)" in the source supports 12500 in the record.
 */
export function attributeModelValues(record: FinancialRecord, text: string): ProvenanceMap {
  const lines = indexSourceLines(text);

  return mapFields((field): FieldProvenance => {
    const value = record[field];
    if (value === null) return { source: 'unresolved' };

    const labeled = lines.find((line) => line.field === field && containsAmount(line, value));
    if (labeled) return { source: 'model_extracted', strength: 'strong', evidence: labeled.text };

    const unlabeled = lines.find((line) => line.field === null && containsAmount(line, value));
    if (unlabeled) return { source: 'model_extracted', strength: 'weak', evidence: unlabeled.text };

    return { source: 'model_inferred' };
  });
}

export function patternProvenance(matches: Partial<Record<FinancialField, PatternMatch>>): ProvenanceMap {
  return mapFields((field): FieldProvenance => {
    const match = matches[field];
    if (!match) return { source: 'unresolved' };
    return { source: 'pattern_fallback', strength: match.strength, evidence: match.line };
  });
}
