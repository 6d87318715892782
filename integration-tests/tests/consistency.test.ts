/**
 * Consistency validation tests: identity checks, derivation, sign handling
 * and component totals
 */

import { validateConsistency, type FieldProvenance } from '@noi-extract/shared';
import { provenanceWith, recordWith } from './helpers';

const MODEL: FieldProvenance = { source: 'model_extracted', strength: 'strong' };
const PATTERN: FieldProvenance = { source: 'pattern_fallback', strength: 'strong' };

describe('validateConsistency', () => {
  it('should derive missing EGI and NOI', () => {
    const outcome = validateConsistency(
      recordWith({ gpr: 30000, opex: 16000 }),
      provenanceWith({ gpr: PATTERN, opex: PATTERN })
    );

    expect(outcome.record.egi).toBe(30000);
    expect(outcome.record.noi).toBe(14000);
    expect(outcome.corrections).toEqual([
      { field: 'egi', kind: 'derived', reported: null, calculated: 30000, inputs: ['gpr'] },
      { field: 'noi', kind: 'derived', reported: null, calculated: 14000, inputs: ['egi', 'opex'] },
    ]);
    expect(outcome.provenance.noi).toEqual({ source: 'calculated', inputs: ['egi', 'opex'] });
    expect(outcome.warnings).toEqual([]);
  });

  it('should overwrite a reported NOI outside the tolerance', () => {
    const outcome = validateConsistency(
      recordWith({ gpr: 100000, vacancy_loss: 5000, other_income: 2000, egi: 97000, opex: 40000, noi: 60000 }),
      provenanceWith({ gpr: MODEL, vacancy_loss: MODEL, other_income: MODEL, egi: MODEL, opex: MODEL, noi: MODEL })
    );

    expect(outcome.record.noi).toBe(57000);
    expect(outcome.corrections).toEqual([
      { field: 'noi', kind: 'corrected', reported: 60000, calculated: 57000, inputs: ['egi', 'opex'] },
    ]);
    expect(outcome.provenance.egi).toEqual(MODEL);
  });

  it('should leave values within the tolerance alone', () => {
    const record = recordWith({ gpr: 100000, egi: 100000, opex: 43000, noi: 57000.5 });
    const provenance = provenanceWith({ gpr: MODEL, egi: MODEL, opex: MODEL, noi: MODEL });

    expect(validateConsistency(record, provenance).corrections).toEqual([]);
    expect(validateConsistency(record, provenance, 0.1).corrections).toEqual([
      { field: 'noi', kind: 'corrected', reported: 57000.5, calculated: 57000, inputs: ['egi', 'opex'] },
    ]);
  });

  it('should confirm an inferred total that satisfies its identity', () => {
    const outcome = validateConsistency(
      recordWith({ gpr: 100000, vacancy_loss: 5000, other_income: 2000, egi: 97000 }),
      provenanceWith({ gpr: MODEL, vacancy_loss: MODEL, other_income: MODEL, egi: { source: 'model_inferred' } })
    );

    expect(outcome.corrections).toEqual([
      {
        field: 'egi',
        kind: 'confirmed',
        reported: 97000,
        calculated: 97000,
        inputs: ['gpr', 'vacancy_loss', 'other_income'],
      },
    ]);
    expect(outcome.provenance.egi).toEqual({ source: 'calculated', inputs: ['gpr', 'vacancy_loss', 'other_income'] });
  });

  it('should store deductions as magnitudes and keep a negative NOI', () => {
    const outcome = validateConsistency(
      recordWith({ vacancy_loss: -12500, noi: -3000 }),
      provenanceWith({ vacancy_loss: MODEL, noi: MODEL })
    );

    expect(outcome.record.vacancy_loss).toBe(12500);
    expect(outcome.record.noi).toBe(-3000);
    expect(outcome.warnings).toEqual([
      {
        code: 'sign_normalized',
        field: 'vacancy_loss',
        message: 'vacancy_loss was reported as -12500; stored as its magnitude',
        reported: -12500,
        calculated: 12500,
      },
    ]);
  });

  it('should derive missing totals from their components', () => {
    const outcome = validateConsistency(
      recordWith({ gpr: 100000, property_taxes: 30000, insurance: 8000, parking: 3600, laundry: 1400 }),
      provenanceWith({ gpr: MODEL, property_taxes: MODEL, insurance: MODEL, parking: MODEL, laundry: MODEL })
    );

    expect(outcome.corrections.map((correction) => `${correction.field}:${correction.kind}`)).toEqual([
      'opex:derived',
      'other_income:derived',
      'egi:derived',
      'noi:derived',
    ]);
    expect(outcome.record.opex).toBe(38000);
    expect(outcome.record.other_income).toBe(5000);
    expect(outcome.record.egi).toBe(105000);
    expect(outcome.record.noi).toBe(67000);
  });

  it('should warn when itemized expenses disagree with the total', () => {
    const outcome = validateConsistency(
      recordWith({ property_taxes: 30000, opex: 53000 }),
      provenanceWith({ property_taxes: MODEL, opex: MODEL })
    );

    expect(outcome.record.opex).toBe(53000);
    expect(outcome.warnings).toEqual([
      {
        code: 'opex_components_mismatch',
        field: 'opex',
        message: 'Itemized expenses sum to 30000 but the total is 53000',
        reported: 53000,
        calculated: 30000,
      },
    ]);
  });

  it('should change nothing when run on its own output', () => {
    const first = validateConsistency(
      recordWith({ gpr: 100000, vacancy_loss: -5000, property_taxes: 30000, insurance: 8000, noi: 70000 }),
      provenanceWith({ gpr: MODEL, vacancy_loss: MODEL, property_taxes: MODEL, insurance: MODEL, noi: MODEL })
    );
    const second = validateConsistency(first.record, first.provenance);

    expect(second.record).toEqual(first.record);
    expect(second.provenance).toEqual(first.provenance);
    expect(second.corrections).toEqual([]);
    expect(second.warnings).toEqual([]);
  });

  it('should not modify its inputs', () => {
    const record = recordWith({ gpr: 30000, opex: 16000 });
    validateConsistency(record, provenanceWith({ gpr: PATTERN, opex: PATTERN }));

    expect(record.egi).toBeNull();
  });
});
