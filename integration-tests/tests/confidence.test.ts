/**
 * Provenance attribution and confidence scoring tests
 */

import {
  CONFIDENCE_SCORES,
  attributeModelValues,
  baseScore,
  calculatedScore,
  confidenceLevel,
  overallConfidence,
  patternProvenance,
  scoreFields,
} from '@noi-extract/shared';
import { provenanceWith, recordWith } from './helpers';

const SOURCE = [
  'TEXT DOCUMENT: a.txt',
  'Gross Potential Rent: $250,000',
  'Vacancy Loss (12,500)',
  'Subtotal 237,500',
  '[DOCUMENT_END]',
].join('\n');

describe('attributeModelValues', () => {
  const provenance = attributeModelValues(
    recordWith({ gpr: 250000, vacancy_loss: 12500, egi: 237500, noi: 999, opex: 250000 }),
    SOURCE
  );

  it('should tie values to the line labeled for their field', () => {
    expect(provenance.gpr).toEqual({
      source: 'model_extracted',
      strength: 'strong',
      evidence: 'Gross Potential Rent: $250,000',
    });
    expect(provenance.vacancy_loss).toMatchObject({ source: 'model_extracted', strength: 'strong' });
  });

  it('should mark values found only on unlabeled lines as weak', () => {
    expect(provenance.egi).toEqual({ source: 'model_extracted', strength: 'weak', evidence: 'Subtotal 237,500' });
  });

  it('should mark values absent from the source, or under another label, as inferred', () => {
    expect(provenance.noi).toEqual({ source: 'model_inferred' });
    expect(provenance.opex).toEqual({ source: 'model_inferred' });
    expect(provenance.insurance).toEqual({ source: 'unresolved' });
  });
});

describe('patternProvenance', () => {
  it('should carry the match strength and line', () => {
    const provenance = patternProvenance({
      noi: { field: 'noi', value: 184500, strength: 'weak', line: 'Net Operating Income' },
    });

    expect(provenance.noi).toEqual({ source: 'pattern_fallback', strength: 'weak', evidence: 'Net Operating Income' });
    expect(provenance.gpr).toEqual({ source: 'unresolved' });
  });
});

describe('Confidence scoring', () => {
  it('should score each provenance', () => {
    expect(baseScore({ source: 'model_extracted', strength: 'strong' })).toBe(0.95);
    expect(baseScore({ source: 'model_extracted', strength: 'weak' })).toBe(0.85);
    expect(baseScore({ source: 'pattern_fallback', strength: 'strong' })).toBe(0.65);
    expect(baseScore({ source: 'pattern_fallback', strength: 'weak' })).toBe(0.55);
    expect(baseScore({ source: 'model_inferred' })).toBe(CONFIDENCE_SCORES.modelInferred);
    expect(baseScore({ source: 'unresolved' })).toBe(0);
    expect(baseScore({ source: 'calculated', inputs: ['gpr'] })).toBeNull();
  });

  it('should bound calculated scores by their weakest input', () => {
    expect(calculatedScore([])).toBe(0.6);
    expect(calculatedScore([0.95])).toBe(0.8);
    expect(calculatedScore([0.95, 0.7])).toBe(0.63);
    expect(calculatedScore([0.4])).toBe(0.6);
  });

  it('should map scores to levels', () => {
    expect(confidenceLevel(0.8)).toBe('HIGH');
    expect(confidenceLevel(0.79)).toBe('MEDIUM');
    expect(confidenceLevel(0.6)).toBe('MEDIUM');
    expect(confidenceLevel(0.5)).toBe('LOW');
    expect(confidenceLevel(0.39)).toBe('UNCERTAIN');
  });

  it('should score calculated totals after their inputs', () => {
    const scores = scoreFields(
      recordWith({ gpr: 30000, opex: 16000, egi: 30000, noi: 14000 }),
      provenanceWith({
        gpr: { source: 'pattern_fallback', strength: 'strong' },
        opex: { source: 'pattern_fallback', strength: 'strong' },
        egi: { source: 'calculated', inputs: ['gpr'] },
        noi: { source: 'calculated', inputs: ['egi', 'opex'] },
      })
    );

    expect(scores.gpr).toBe(0.65);
    expect(scores.egi).toBe(0.6);
    expect(scores.noi).toBe(0.6);
    expect(scores.vacancy_loss).toBe(0);
    expect(overallConfidence(scores)).toBe('MEDIUM');
  });

  it('should take the overall level from the weakest primary metric', () => {
    const scores = scoreFields(
      recordWith({ gpr: 250000, opex: 53000, noi: 197000, parking: 100 }),
      provenanceWith({
        gpr: { source: 'model_extracted', strength: 'strong' },
        opex: { source: 'model_extracted', strength: 'strong' },
        noi: { source: 'model_extracted', strength: 'strong' },
        parking: { source: 'model_inferred' },
      })
    );

    expect(scores.parking).toBe(0.4);
    expect(overallConfidence(scores)).toBe('UNCERTAIN');
  });
});
