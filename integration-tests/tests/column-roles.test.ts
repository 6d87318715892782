/**
 * Column role detection and table building unit tests
 */

import { buildTable, detectColumnRoles, findHeaderRow, renderTable } from '@noi-extract/shared';

describe('detectColumnRoles', () => {
  it('should prefer a total column over monthly columns', () => {
    const roles = detectColumnRoles(
      ['Account', 'Description', 'Jan', 'Feb', 'Total'],
      [
        ['4000', '4100', '5000'],
        ['Rental Income', 'Parking Income', 'Property Taxes'],
        ['100', '200', '300'],
        ['100', '200', '300'],
        ['1,200', '2,400', '3,600'],
      ]
    );

    expect(roles.valueColumn).toBe(4);
    expect(roles.categoryColumn).toBe(1);
    expect(roles.usedFallback).toBe(false);
  });

  it('should drop empty placeholder columns', () => {
    const roles = detectColumnRoles(
      ['Category', 'Unnamed: 1', 'Amount'],
      [
        ['Rent', 'Taxes'],
        [null, null],
        ['5,000', '1,000'],
      ]
    );

    expect(roles.droppedColumns).toEqual([1]);
    expect(roles.valueColumn).toBe(2);
    expect(roles.categoryColumn).toBe(0);
  });

  it('should keep placeholder-named columns that hold numbers', () => {
    const roles = detectColumnRoles(
      ['Line Item', '2023', '2024'],
      [
        ['Rent', 'Taxes'],
        ['9,000', '800'],
        ['9,500', '850'],
      ]
    );

    expect(roles.droppedColumns).toEqual([]);
    expect(roles.valueColumn).toBe(1);
  });

  it('should take the first numeric column when no header names a total', () => {
    const roles = detectColumnRoles(
      ['GL Code', 'Line Item', 'Notes', 'Dec'],
      [
        ['4000', '4100', '5000'],
        ['Rental Income', 'Parking Income', 'Property Taxes'],
        ['', 'covered lot', ''],
        ['42,000', '1,950', '3,100'],
      ]
    );

    expect(roles.valueColumn).toBe(3);
    expect(roles.categoryColumn).toBe(1);
    expect(roles.usedFallback).toBe(false);
  });

  it('should fall back to the last column when none is numeric', () => {
    const roles = detectColumnRoles(
      ['Line Item', 'Notes'],
      [
        ['Rent', 'Taxes'],
        ['see note', 'pending'],
      ]
    );

    expect(roles.usedFallback).toBe(true);
    expect(roles.valueColumn).toBe(1);
    expect(roles.categoryColumn).toBe(0);
  });
});

describe('buildTable', () => {
  const statementRows = [
    ['Sunset Apartments', null, null],
    ['Operating Statement 2024', null, null],
    ['Category', 'Jan', 'Total'],
    ['Income', null, null],
    ['Rental Income', '10,000', '120,000'],
    ['Total Operating Expenses', '4,000', '48,000'],
  ];

  it('should find the header row below the report title', () => {
    expect(findHeaderRow(statementRows)).toBe(2);
  });

  it('should render a statement as paired line items with sections', () => {
    const built = buildTable({ rows: statementRows });

    expect(built).not.toBeNull();
    if (!built) return;
    expect(built.block.layout).toBe('financial_statement');
    expect(built.lineItems).toEqual([
      { category: 'Rental Income', value: 120000, section: 'Income' },
      { category: 'Total Operating Expenses', value: 48000, section: 'Income' },
    ]);
    expect(renderTable(built)).toEqual([
      'Sunset Apartments',
      'Operating Statement 2024',
      '[FINANCIAL_STATEMENT_FORMAT]',
      'LINE ITEMS:',
      '  SECTION: Income',
      '  Rental Income: 120000',
      '  Total Operating Expenses: 48000',
    ]);
  });

  it('should keep year-range amounts readable as money', () => {
    const built = buildTable({
      rows: [
        ['GL Code', 'Line Item', 'Notes', 'Dec'],
        ['4000', 'Rental Income', '', '42,000'],
        ['4100', 'Parking Income', 'covered lot', '1,950'],
        ['5000', 'Property Taxes', '', '3,100'],
      ],
    });

    expect(built).not.toBeNull();
    if (!built) return;
    expect(built.roles.valueColumn).toBe(3);
    expect(renderTable(built)).toEqual([
      '[FINANCIAL_STATEMENT_FORMAT]',
      'LINE ITEMS:',
      '  Rental Income: 42000',
      '  Parking Income: 1950.00',
      '  Property Taxes: 3100',
    ]);
  });

  it('should render other tables as headers and rows', () => {
    const built = buildTable({
      rows: [
        ['Unit', 'Tenant'],
        ['101', 'Smith'],
        ['102', 'Jones'],
      ],
    });

    expect(built).not.toBeNull();
    if (!built) return;
    expect(built.block.layout).toBe('generic');
    expect(built.lineItems).toEqual([]);
    expect(renderTable(built)).toEqual([
      '[TABLE_FORMAT]',
      'COLUMN HEADERS: Unit | Tenant',
      'DATA ROWS:',
      '  101 | Smith',
      '  102 | Jones',
    ]);
  });

  it('should return null for an empty grid', () => {
    expect(buildTable({ rows: [[null, ''], []] })).toBeNull();
  });
});
