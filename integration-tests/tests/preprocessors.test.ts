/**
 * Document preprocessing tests: format resolution and the CSV, workbook,
 * plain-text and PDF layout paths
 */

import ExcelJS from 'exceljs';
import {
  detectDelimiter,
  groupIntoLines,
  parseDelimited,
  parseLabelValueLine,
  preprocessDocument,
  resolveFormat,
  sectionLabelFor,
  segmentPage,
  type CellValue,
} from '@noi-extract/shared';

const encode = (text: string) => new TextEncoder().encode(text);

async function workbookBytes(sheets: Record<string, CellValue[][]>): Promise<Uint8Array> {
  const workbook = new ExcelJS.Workbook();
  for (const [name, rows] of Object.entries(sheets)) {
    const worksheet = workbook.addWorksheet(name);
    for (const row of rows) worksheet.addRow(row);
  }
  const buffer = await workbook.xlsx.writeBuffer();
  return new Uint8Array(buffer);
}

describe('resolveFormat', () => {
  it('should reject legacy and non-statement formats by extension', () => {
    expect(resolveFormat(encode('x'), 'rent_roll.xls')).toEqual({
      supported: false,
      reason: 'Legacy binary Excel workbooks (.xls) are not supported; save as .xlsx',
    });
    expect(resolveFormat(encode('x'), 'scan.jpg')).toEqual({
      supported: false,
      reason: 'Scanned images are not supported',
    });
  });

  it('should honor the uploader hint before the extension', () => {
    expect(resolveFormat(encode('x'), 'statement.bin', 'application/pdf')).toEqual({
      supported: true,
      format: 'pdf',
      resolvedBy: 'hint',
    });
    expect(resolveFormat(encode('x'), 'statement.txt', '.CSV')).toEqual({
      supported: true,
      format: 'csv',
      resolvedBy: 'hint',
    });
  });

  it('should sniff content when the name has no extension', () => {
    expect(resolveFormat(encode('%PDF-1.7'), 'upload')).toMatchObject({ format: 'pdf', resolvedBy: 'content' });
    expect(resolveFormat(new Uint8Array([0x50, 0x4b, 0x03, 0x04, 0x14]), 'upload')).toMatchObject({
      format: 'xlsx',
    });
    expect(resolveFormat(encode('Category,Amount\nRent,100'), 'upload')).toMatchObject({ format: 'csv' });
    expect(resolveFormat(encode('Rent collected in full'), 'upload')).toMatchObject({ format: 'txt' });
  });

  it('should reject empty and unknown binary content', () => {
    expect(resolveFormat(new Uint8Array(), 'a.csv')).toEqual({ supported: false, reason: 'Document is empty' });
    expect(resolveFormat(new Uint8Array([0xd0, 0xcf, 0x11, 0xe0, 0xa1]), 'upload')).toEqual({
      supported: false,
      reason: 'Unrecognized binary content',
    });
  });
});

describe('CSV preprocessing', () => {
  it('should detect the delimiter from the first lines', () => {
    expect(detectDelimiter('a;b;c\n1;2;3')).toBe(';');
    expect(detectDelimiter('a\tb\n1\t2')).toBe('\t');
    expect(detectDelimiter('single column')).toBe(',');
  });

  it('should honor quoted fields and escaped quotes', () => {
    expect(parseDelimited('name,amount\n"Repairs, HVAC","1,200"\n', ',')).toEqual([
      ['name', 'amount'],
      ['Repairs, HVAC', '1,200'],
    ]);
    expect(parseDelimited('"He said ""paid""",5', ',')).toEqual([['He said "paid"', '5']]);
  });

  it('should render a two-column statement as line items', async () => {
    const csv = 'Category,Amount\nRental Income – Commercial,30000.00\nTotal Operating Expenses,16000.00\n';
    const { content, diagnostic } = await preprocessDocument(encode(csv), 'scenario-a.csv');

    expect(diagnostic).toBeUndefined();
    expect(content.format).toBe('csv');
    expect(content.isFinancialStatement).toBe(true);
    expect(content.text).toBe(
      [
        'CSV DOCUMENT: scenario-a.csv',
        '[FINANCIAL_STATEMENT_FORMAT]',
        'LINE ITEMS:',
        '  Rental Income – Commercial: 30000',
        '  Total Operating Expenses: 16000',
        '[DOCUMENT_END]',
      ].join('\n')
    );
    expect(content.lineItems).toEqual([
      { category: 'Rental Income – Commercial', value: 30000 },
      { category: 'Total Operating Expenses', value: 16000 },
    ]);
    expect(content.metadata.structureIndicators).toEqual(['financial_statement_format']);
    expect(content.metadata.characterCount).toBe(content.text.length);
  });

  it('should strip a byte order mark and read semicolon files', async () => {
    const csv = '\uFEFFCategory;Amount\nInsurance;8000\nUtilities;4500\n';
    const { content } = await preprocessDocument(encode(csv), 'expenses.csv');

    expect(content.text.split('\n').slice(1, 5)).toEqual([
      '[FINANCIAL_STATEMENT_FORMAT]',
      'LINE ITEMS:',
      '  Insurance: 8000',
      '  Utilities: 4500',
    ]);
  });
});

describe('Workbook preprocessing', () => {
  it('should render every sheet between sheet markers', async () => {
    const bytes = await workbookBytes({
      T12: [
        ['Income Statement', null],
        ['Line Item', 'Total'],
        ['Gross Potential Rent', 120000],
        ['Total Operating Expenses', 45000],
        ['Net Operating Income', 75000],
      ],
      Notes: [['Prepared by', 'Accounting']],
    });

    const { content, diagnostic } = await preprocessDocument(bytes, 't12.xlsx');

    expect(diagnostic).toBeUndefined();
    expect(content.format).toBe('xlsx');
    expect(content.text).toBe(
      [
        'EXCEL DOCUMENT: t12.xlsx',
        'SHEETS: 2',
        '[SHEET_START] T12',
        'Income Statement',
        '[FINANCIAL_STATEMENT_FORMAT]',
        'LINE ITEMS:',
        '  Gross Potential Rent: 120000',
        '  Total Operating Expenses: 45000',
        '  Net Operating Income: 75000',
        '[SHEET_END]',
        '[SHEET_START] Notes',
        '[EMPTY]',
        '[SHEET_END]',
        '[DOCUMENT_END]',
      ].join('\n')
    );
    expect(content.metadata.sheetCount).toBe(2);
    expect(content.metadata.structureIndicators).toEqual(['multiple_sheets', 'financial_statement_format']);
    expect(content.lineItems).toHaveLength(3);
  });

  it('should report a corrupt workbook as unsupported', async () => {
    const { content, diagnostic } = await preprocessDocument(encode('not a workbook'), 'broken.xlsx');

    expect(content.format).toBe('xlsx');
    expect(content.text).toBe('');
    expect(diagnostic).toMatchObject({ code: 'UNSUPPORTED_FORMAT', message: 'Workbook could not be opened' });
  });
});

describe('Plain-text preprocessing', () => {
  it('should recognize section headings', () => {
    expect(sectionLabelFor('OPERATING EXPENSES')).toBe('EXPENSE');
    expect(sectionLabelFor('Revenue')).toBe('REVENUE');
    expect(sectionLabelFor('Rental Income 12,000')).toBeNull();
    expect(sectionLabelFor('Notes to the statement')).toBeNull();
  });

  it('should parse label and amount lines', () => {
    expect(parseLabelValueLine('Gross Potential Rent ........ $250,000.00')).toEqual({
      category: 'Gross Potential Rent',
      value: 250000,
    });
    expect(parseLabelValueLine('Vacancy Loss: (12,500)')).toEqual({ category: 'Vacancy Loss', value: -12500 });
    expect(parseLabelValueLine('Units 120 occupied')).toBeNull();
  });

  it('should mark sections and keep the source lines', async () => {
    const text = [
      'Maple Court Apartments',
      'Statement for December 2024',
      'INCOME',
      'Gross Potential Rent ........ $250,000.00',
      'Vacancy Loss (12,500.00)',
      'EXPENSES',
      'Property Taxes: 30,000',
      'Total Operating Expenses: 53,000',
      'Net Operating Income: 184,500',
    ].join('\n');

    const { content } = await preprocessDocument(encode(text), 'maple.txt');

    expect(content.text.split('\n')).toEqual([
      'TEXT DOCUMENT: maple.txt',
      'Maple Court Apartments',
      'Statement for December 2024',
      '[INCOME_SECTION] INCOME',
      'Gross Potential Rent ........ $250,000.00',
      'Vacancy Loss (12,500.00)',
      '[EXPENSE_SECTION] EXPENSES',
      'Property Taxes: 30,000',
      'Total Operating Expenses: 53,000',
      'Net Operating Income: 184,500',
      '[DOCUMENT_END]',
    ]);
    expect(content.lineItems[0]).toEqual({ category: 'Gross Potential Rent', value: 250000, section: 'INCOME' });
    expect(content.lineItems).toHaveLength(5);
    expect(content.isFinancialStatement).toBe(true);
    expect(content.metadata.structureIndicators).toEqual(['labeled_sections', 'label_value_lines']);
  });
});

describe('PDF layout recovery', () => {
  const items = [
    { str: '250,000', x: 400, y: 700.5, width: 40 },
    { str: 'Gross Potential Rent', x: 50, y: 700, width: 100 },
    { str: 'Operating', x: 50, y: 680, width: 45 },
    { str: 'Expenses', x: 97, y: 680, width: 40 },
    { str: '53,000', x: 400, y: 680, width: 35 },
    { str: ' ', x: 300, y: 660, width: 3 },
    { str: 'Prepared for the owner', x: 50, y: 650, width: 120 },
  ];

  it('should group items into lines and split cells at wide gaps', () => {
    const lines = groupIntoLines(items);

    expect(lines.map((line) => line.cells)).toEqual([
      ['Gross Potential Rent', '250,000'],
      ['Operating Expenses', '53,000'],
      ['Prepared for the owner'],
    ]);
    expect(lines[1].text).toBe('Operating Expenses 53,000');
  });

  it('should lift runs of amount-bearing lines into tables', () => {
    expect(segmentPage(groupIntoLines(items))).toEqual([
      {
        kind: 'table',
        rows: [
          ['Gross Potential Rent', '250,000'],
          ['Operating Expenses', '53,000'],
        ],
      },
      { kind: 'text', lines: ['Prepared for the owner'] },
    ]);
  });
});
