/**
 * Workbook Preprocessing
 *
 * Reads every worksheet with exceljs, normalizes cell values (rich text,
 * formulas, hyperlinks, dates) to strings and numbers, and renders each sheet
 * as a table.
 */

import ExcelJS from 'exceljs';
import type { CellValue as ExcelCellValue, Worksheet } from 'exceljs';
import { UnsupportedFormatError } from '../errors';
import { logger } from '../logger';
import type { ContentBlock, LineItem } from '../types';
import type { CellValue } from './columns';
import { buildTable, renderTable } from './tabular';
import type { FormatPreprocessor } from './types';

export function normalizeCellValue(value: ExcelCellValue): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return String(value);
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  if ('richText' in value) return value.richText.map((run) => run.text).join('');
  if ('hyperlink' in value) return value.text;
  if ('formula' in value || 'sharedFormula' in value) {
    return value.result === undefined ? null : normalizeCellValue(value.result);
  }
  return null;
}

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function readSheetRows(worksheet: Worksheet): CellValue[][] {
  const rows: CellValue[][] = [];
  for (let r = 1; r <= worksheet.rowCount; r++) {
    const row = worksheet.getRow(r);
    const cells: CellValue[] = [];
    for (let c = 1; c <= worksheet.columnCount; c++) {
      const cell = row.getCell(c);
      // Merged ranges report the master value in every cell; keep it once
      const isMergedCopy = cell.isMerged && cell.master.address !== cell.address;
      cells.push(isMergedCopy ? null : normalizeCellValue(cell.value));
    }
    rows.push(cells);
  }
  return rows;
}

export const spreadsheetPreprocessor: FormatPreprocessor = {
  format: 'xlsx',
  async preprocess(bytes, filename) {
    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.load(toBuffer(bytes));
    } catch (error) {
      throw new UnsupportedFormatError('Workbook could not be opened', {
        filename,
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    const lines = [`EXCEL DOCUMENT: ${filename}`, `SHEETS: ${workbook.worksheets.length}`];
    const blocks: ContentBlock[] = [];
    const lineItems: LineItem[] = [];
    let statementSheets = 0;

    for (const worksheet of workbook.worksheets) {
      lines.push(`[SHEET_START] ${worksheet.name}`);
      const built = buildTable({ sheet: worksheet.name, rows: readSheetRows(worksheet) });
      if (built) {
        lines.push(...renderTable(built));
        blocks.push(built.block);
        lineItems.push(...built.lineItems);
        if (built.block.layout === 'financial_statement') statementSheets++;
      } else {
        lines.push('[EMPTY]');
      }
      lines.push('[SHEET_END]');
    }
    lines.push('[DOCUMENT_END]');

    logger.debug('Workbook preprocessed', {
      filename,
      sheets: workbook.worksheets.length,
      statementSheets,
      lineItems: lineItems.length,
    });

    const structureIndicators: string[] = [];
    if (workbook.worksheets.length > 1) structureIndicators.push('multiple_sheets');
    structureIndicators.push(statementSheets > 0 ? 'financial_statement_format' : 'table_format');

    return {
      text: lines.join('\n'),
      lineItems,
      isFinancialStatement: statementSheets > 0,
      blocks,
      metadata: {
        sheetCount: workbook.worksheets.length,
        tableCount: blocks.length,
        structureIndicators,
      },
    };
  },
};
