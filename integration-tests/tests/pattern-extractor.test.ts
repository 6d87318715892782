/**
 * Pattern extraction unit tests
 */

import {
  FIELD_LABELS,
  FINANCIAL_FIELDS,
  amountAfterLabel,
  emptyRecord,
  extractWithPatterns,
  loneAmount,
  preprocessDocument,
  type FinancialRecord,
} from '@noi-extract/shared';

describe('extractWithPatterns', () => {
  it('should read amounts that follow their labels', () => {
    const { record, matches } = extractWithPatterns(
      'TEXT DOCUMENT: a.txt\nGross Potential Rent ........ $250,000.00\nTotal Operating Expenses: 53,000\n[DOCUMENT_END]'
    );

    expect(record.gpr).toBe(250000);
    expect(record.opex).toBe(53000);
    expect(record.noi).toBeNull();
    expect(matches.gpr).toEqual({
      field: 'gpr',
      value: 250000,
      strength: 'strong',
      line: 'Gross Potential Rent ........ $250,000.00',
    });
  });

  it('should take a lone amount on the next line as a weak match', () => {
    const { matches } = extractWithPatterns('Net Operating Income\n$184,500\nUnits: 120');

    expect(matches.noi).toMatchObject({ value: 184500, strength: 'weak', line: 'Net Operating Income' });
  });

  it('should let a same-line match replace a weak one', () => {
    const { matches } = extractWithPatterns(
      'Operating Expenses 2024\n48,000\nTotal Operating Expenses 51,000'
    );

    expect(matches.opex).toMatchObject({ value: 51000, strength: 'strong' });
  });

  it('should keep the first strong match for a field', () => {
    const { record } = extractWithPatterns('Net Operating Income 90,000\nNet Operating Income 95,000');

    expect(record.noi).toBe(90000);
  });

  it('should keep parenthesized amounts negative', () => {
    const { record } = extractWithPatterns('Vacancy Loss (12,500.00)');

    expect(record.vacancy_loss).toBe(-12500);
  });
});

describe('amountAfterLabel', () => {
  it('should prefer a monetary amount over a small count', () => {
    expect(amountAfterLabel('Gross Rent (12 units) $14,400', 'gross rent')?.value).toBe(14400);
  });

  it('should ignore amounts before the label', () => {
    expect(amountAfterLabel('4000 Insurance', 'insurance')).toBeNull();
  });
});

describe('loneAmount', () => {
  it('should accept a line holding only an amount', () => {
    expect(loneAmount('  (1,200)')?.value).toBe(-1200);
    expect(loneAmount('$5,000.00 |')?.value).toBe(5000);
  });

  it('should reject labeled lines and prose', () => {
    expect(loneAmount('Vacancy 5,000')).toBeNull();
    expect(loneAmount('Page 2')).toBeNull();
  });
});

describe('pattern extraction after preprocessing', () => {
  it('should read a heading-style label followed by its amount', async () => {
    const text = ['Rental Income 96,000', 'Total Operating Expenses', '$41,250', 'Net Operating Income', '$54,750'].join('\n');
    const { content } = await preprocessDocument(new TextEncoder().encode(text), 'summary.txt');
    const { matches } = extractWithPatterns(content.text);

    expect(content.text).toContain('[EXPENSE_SECTION] Total Operating Expenses');
    expect(matches.opex).toEqual({ field: 'opex', value: 41250, strength: 'weak', line: 'Total Operating Expenses' });
    expect(matches.noi).toEqual({ field: 'noi', value: 54750, strength: 'weak', line: 'Net Operating Income' });
  });

  it('should recover every catalogue field from a rendered statement', async () => {
    // Everything after the first row sits in the 1,900-2,102.50 range
    const expected: FinancialRecord = emptyRecord();
    FINANCIAL_FIELDS.forEach((field, index) => {
      expected[field] = index === 0 ? 250000 : 1900 + index * 7.5;
    });
    const csv = [
      'Line Item,Amount',
      ...FINANCIAL_FIELDS.map((field) => `${FIELD_LABELS[field].label},${expected[field]}`),
    ].join('\n');

    const { content, diagnostic } = await preprocessDocument(new TextEncoder().encode(csv), 'catalogue.csv');
    const { record } = extractWithPatterns(content.text);

    expect(diagnostic).toBeUndefined();
    expect(content.lineItems).toHaveLength(FINANCIAL_FIELDS.length);
    expect(content.text).toContain('  Property Taxes: 1960.00');
    for (const field of FINANCIAL_FIELDS) {
      expect(record[field]).toBeCloseTo(expected[field] ?? Number.NaN, 2);
    }
  });
});
