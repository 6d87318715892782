/**
 * ConfidenceScorer
 *
 * Per-field scores from provenance, and an overall level taken from the
 * weakest primary metric.
 */

import { FINANCIAL_FIELDS, PRIMARY_METRICS, mapFields, type FinancialField, type FinancialRecord } from '../fields';
import type { ConfidenceLevel, FieldConfidence, FieldProvenance, ProvenanceMap } from '../types';

export const CONFIDENCE_SCORES = {
  modelLabeled: 0.95,
  modelUnlabeled: 0.85,
  patternSameLine: 0.65,
  patternAdjacentLine: 0.55,
  modelInferred: 0.4,
  unresolved: 0,
} as const;

const CALCULATED_FACTOR = 0.9;
const CALCULATED_MIN = 0.6;
const CALCULATED_MAX = 0.8;

// Totals are scored before the identities that use them
const CALCULATION_ORDER: readonly FinancialField[] = ['opex', 'other_income', 'egi', 'noi'];

export const CONFIDENCE_LEVELS: ReadonlyArray<[number, ConfidenceLevel]> = [
  [0.8, 'HIGH'],
  [0.6, 'MEDIUM'],
  [0.4, 'LOW'],
];

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Score for a non-calculated provenance; null for calculated values, which
 * depend on their inputs.
 */
export function baseScore(provenance: FieldProvenance): number | null {
  switch (provenance.source) {
    case 'model_extracted':
      return provenance.strength === 'weak' ? CONFIDENCE_SCORES.modelUnlabeled : CONFIDENCE_SCORES.modelLabeled;
    case 'pattern_fallback':
      return provenance.strength === 'weak'
        ? CONFIDENCE_SCORES.patternAdjacentLine
        : CONFIDENCE_SCORES.patternSameLine;
    case 'model_inferred':
      return CONFIDENCE_SCORES.modelInferred;
    case 'unresolved':
      return CONFIDENCE_SCORES.unresolved;
    case 'calculated':
      return null;
  }
}

export function calculatedScore(inputScores: number[]): number {
  if (inputScores.length === 0) return CALCULATED_MIN;
  const scaled = Math.min(...inputScores) * CALCULATED_FACTOR;
  return round3(Math.min(CALCULATED_MAX, Math.max(CALCULATED_MIN, scaled)));
}

export function scoreFields(record: FinancialRecord, provenance: ProvenanceMap): FieldConfidence {
  const scores = mapFields((field) =>
    record[field] === null ? CONFIDENCE_SCORES.unresolved : (baseScore(provenance[field]) ?? 0)
  );

  const calculated = [
    ...CALCULATION_ORDER,
    ...FINANCIAL_FIELDS.filter((field) => !CALCULATION_ORDER.includes(field)),
  ].filter((field) => record[field] !== null && provenance[field].source === 'calculated');

  for (const field of calculated) {
    const inputs = (provenance[field].inputs ?? []).filter((input) => record[input] !== null);
    scores[field] = calculatedScore(inputs.map((input) => scores[input]));
  }
  return scores;
}

export function confidenceLevel(score: number): ConfidenceLevel {
  for (const [threshold, level] of CONFIDENCE_LEVELS) {
    if (score >= threshold) return level;
  }
  return 'UNCERTAIN';
}

export function overallConfidence(scores: FieldConfidence): ConfidenceLevel {
  return confidenceLevel(Math.min(...PRIMARY_METRICS.map((field) => scores[field])));
}
