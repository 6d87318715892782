/**
 * Document role resolution unit tests
 */

import { inferDocumentRole, normalizeDocumentRole } from '@noi-extract/shared';

describe('normalizeDocumentRole', () => {
  it('should accept canonical roles and common spellings', () => {
    expect(normalizeDocumentRole('budget')).toBe('budget');
    expect(normalizeDocumentRole('Current Month')).toBe('current');
    expect(normalizeDocumentRole('prior-year')).toBe('prior_year');
    expect(normalizeDocumentRole('PY')).toBe('prior_year');
    expect(normalizeDocumentRole('previous')).toBe('prior');
    expect(normalizeDocumentRole('forecast')).toBe('budget');
  });

  it('should return null for unknown roles', () => {
    expect(normalizeDocumentRole('quarterly')).toBeNull();
    expect(normalizeDocumentRole('')).toBeNull();
  });
});

describe('inferDocumentRole', () => {
  it('should infer the role from the filename', () => {
    expect(inferDocumentRole('2025_Budget.xlsx')).toBe('budget');
    expect(inferDocumentRole('T12_prior_year.csv')).toBe('prior_year');
    expect(inferDocumentRole('operating_statement_PY.pdf')).toBe('prior_year');
    expect(inferDocumentRole('previous_month.csv')).toBe('prior');
  });

  it('should default to the current period', () => {
    expect(inferDocumentRole('March 2025 P&L.xlsx')).toBe('current');
    expect(inferDocumentRole('happy_valley_statement.csv')).toBe('current');
  });
});
