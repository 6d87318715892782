/**
 * ConsistencyValidator
 *
 * Checks a record against the operating-statement identities and repairs it:
 *
 *   EGI = GPR − Vacancy Loss − Concessions − Bad Debt + Other Income
 *   NOI = EGI − OpEx
 *
 * A reported EGI/NOI further than the tolerance from its identity is
 * overwritten; a missing one is derived. Itemized expense and other-income
 * components are compared with their totals (warning only) and fill a total
 * that is missing. Running the validator on its own output changes nothing.
 */

import { config } from '../config';
import {
  INCOME_COMPONENT_FIELDS,
  OPEX_COMPONENT_FIELDS,
  SIGNED_FIELDS,
  FINANCIAL_FIELDS,
  type FinancialField,
  type FinancialRecord,
} from '../fields';
import { logger } from '../logger';
import { roundCents } from '../money';
import type { ConsistencyCorrection, ConsistencyWarning, ProvenanceMap } from '../types';

export interface ConsistencyOutcome {
  record: FinancialRecord;
  provenance: ProvenanceMap;
  corrections: ConsistencyCorrection[];
  warnings: ConsistencyWarning[];
}

const EGI_DEDUCTIONS: readonly FinancialField[] = ['vacancy_loss', 'concessions', 'bad_debt'];

interface IdentityCheck {
  field: FinancialField;
  calculated: number;
  inputs: FinancialField[];
}

class ConsistencyPass {
  readonly record: FinancialRecord;
  readonly provenance: ProvenanceMap;
  readonly corrections: ConsistencyCorrection[] = [];
  readonly warnings: ConsistencyWarning[] = [];

  constructor(
    record: FinancialRecord,
    provenance: ProvenanceMap,
    private readonly tolerance: number
  ) {
    this.record = { ...record };
    this.provenance = { ...provenance };
  }

  normalizeSigns(): void {
    for (const field of FINANCIAL_FIELDS) {
      const value = this.record[field];
      if (value === null || value >= 0 || SIGNED_FIELDS.has(field)) continue;
      this.record[field] = Math.abs(value);
      this.warnings.push({
        code: 'sign_normalized',
        field,
        message: `${field} was reported as ${value}; stored as its magnitude`,
        reported: value,
        calculated: Math.abs(value),
      });
    }
  }

  checkComponents(
    total: 'opex' | 'other_income',
    components: readonly FinancialField[],
    code: ConsistencyWarning['code']
  ): void {
    const present = components.filter((field) => this.record[field] !== null);
    if (present.length === 0) return;

    const sum = roundCents(present.reduce((acc, field) => acc + (this.record[field] ?? 0), 0));
    const reported = this.record[total];

    if (reported === null) {
      this.apply({ field: total, calculated: sum, inputs: present }, 'derived', null);
      return;
    }
    if (Math.abs(sum - reported) > this.tolerance) {
      this.warnings.push({
        code,
        field: total,
        message: `Itemized ${total === 'opex' ? 'expenses' : 'other income'} sum to ${sum} but the total is ${reported}`,
        reported,
        calculated: sum,
      });
    }
  }

  egiIdentity(): IdentityCheck | null {
    const gpr = this.record.gpr;
    if (gpr === null) return null;
    const deductions = EGI_DEDUCTIONS.reduce((acc, field) => acc + (this.record[field] ?? 0), 0);
    const calculated = roundCents(gpr - deductions + (this.record.other_income ?? 0));
    const inputs: FinancialField[] = ['gpr', ...EGI_DEDUCTIONS, 'other_income'];
    return { field: 'egi', calculated, inputs: inputs.filter((field) => this.record[field] !== null) };
  }

  noiIdentity(): IdentityCheck | null {
    const { egi, opex } = this.record;
    if (egi === null || opex === null) return null;
    return { field: 'noi', calculated: roundCents(egi - opex), inputs: ['egi', 'opex'] };
  }

  reconcile(check: IdentityCheck | null): void {
    if (!check) return;
    const reported = this.record[check.field];

    if (reported === null) {
      this.apply(check, 'derived', null);
    } else if (Math.abs(check.calculated - reported) > this.tolerance) {
      logger.warn('Consistency correction applied', {
        field: check.field,
        reported,
        calculated: check.calculated,
        difference: roundCents(reported - check.calculated),
      });
      this.apply(check, 'corrected', reported);
    } else if (this.provenance[check.field].source === 'model_inferred') {
      this.corrections.push({
        field: check.field,
        kind: 'confirmed',
        reported,
        calculated: check.calculated,
        inputs: check.inputs,
      });
      this.provenance[check.field] = { source: 'calculated', inputs: check.inputs };
    }
  }

  private apply(check: IdentityCheck, kind: 'derived' | 'corrected', reported: number | null): void {
    this.record[check.field] = check.calculated;
    this.provenance[check.field] = { source: 'calculated', inputs: check.inputs };
    this.corrections.push({ field: check.field, kind, reported, calculated: check.calculated, inputs: check.inputs });
  }
}

export function validateConsistency(
  record: FinancialRecord,
  provenance: ProvenanceMap,
  tolerance: number = config.consistencyTolerance
): ConsistencyOutcome {
  const pass = new ConsistencyPass(record, provenance, tolerance);

  pass.normalizeSigns();
  pass.checkComponents('opex', OPEX_COMPONENT_FIELDS, 'opex_components_mismatch');
  pass.checkComponents('other_income', INCOME_COMPONENT_FIELDS, 'other_income_components_mismatch');
  // EGI first: NOI is checked against the repaired EGI
  pass.reconcile(pass.egiIdentity());
  pass.reconcile(pass.noiIdentity());

  if (pass.corrections.length > 0 || pass.warnings.length > 0) {
    logger.info('Consistency validation complete', {
      corrections: pass.corrections.map((c) => `${c.field}:${c.kind}`),
      warnings: pass.warnings.map((w) => w.code),
    });
  }

  return {
    record: pass.record,
    provenance: pass.provenance,
    corrections: pass.corrections,
    warnings: pass.warnings,
  };
}
