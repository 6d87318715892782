/**
 * Table Building & Rendering
 *
 * Turns a raw grid of cells (a worksheet, a CSV file, a table recovered from
 * a PDF page) into a TableBlock plus line items, and renders TableBlocks into
 * the canonical content text.
 */

import { hasFinancialKeyword } from '../fields';
import { findMoneyTokens, formatAmount, formatStatementAmount, isYearLike, parseMoney } from '../money';
import type { LineItem, TableBlock } from '../types';
import { detectColumnRoles, isBlankCell, type CellValue, type ColumnRoles } from './columns';

export interface RawTable {
  sheet?: string;
  page?: number;
  rows: CellValue[][];
}

export type StatementRow =
  | { kind: 'item'; category: string; value: number }
  | { kind: 'section'; category: string };

export interface BuiltTable {
  block: TableBlock;
  lineItems: LineItem[];
  /** Item and section rows in source order, for the paired rendering */
  statementRows: StatementRow[];
  roles: ColumnRoles;
  /** Rows above the header (report titles, property names, periods) */
  preamble: string[];
}

export function cellText(cell: CellValue): string {
  if (cell === null) return '';
  if (typeof cell === 'number') return formatAmount(cell);
  return cell.replace(/\s+/g, ' ').trim();
}

function hasAmount(cell: CellValue): boolean {
  if (parseMoney(cell) === null) return false;
  if (typeof cell === 'number') return !(Number.isInteger(cell) && cell >= 1900 && cell <= 2099);
  return cell !== null && findMoneyTokens(cell).some((token) => !isYearLike(token));
}

function isEmptyRow(row: CellValue[]): boolean {
  return row.every(isBlankCell);
}

/**
 * Index of the header row: the last of the leading amount-free rows that has
 * at least two filled cells. -1 when the grid has no such row.
 */
export function findHeaderRow(rows: CellValue[][]): number {
  let header = -1;
  for (let r = 0; r < rows.length; r++) {
    const row = rows[r];
    if (row.some(hasAmount)) break;
    if (row.filter((cell) => !isBlankCell(cell)).length >= 2) header = r;
  }
  return header;
}

/**
 * Build a table from a grid. Returns null when the grid has no content.
 */
export function buildTable(table: RawTable): BuiltTable | null {
  const rows = table.rows.filter((row) => !isEmptyRow(row));
  if (rows.length === 0) return null;

  const width = Math.max(...rows.map((row) => row.length));
  const grid = rows.map((row) => Array.from({ length: width }, (_, c) => row[c] ?? null));

  const headerIndex = findHeaderRow(grid);
  const headerCells = headerIndex >= 0 ? grid[headerIndex] : null;
  const preamble = grid
    .slice(0, Math.max(headerIndex, 0))
    .map((row) => row.map(cellText).filter(Boolean).join(' '))
    .filter(Boolean);
  const body = grid.slice(headerIndex + 1);

  const headers = Array.from({ length: width }, (_, c) => {
    const cell = headerCells ? headerCells[c] : null;
    return isBlankCell(cell) ? null : cellText(cell);
  });
  const columns = Array.from({ length: width }, (_, c) => body.map((row) => row[c]));
  const roles = detectColumnRoles(headers, columns);

  const lineItems: LineItem[] = [];
  const statementRows: StatementRow[] = [];
  let section: string | undefined;
  let keywordCategories = 0;
  if (roles.categoryColumn !== null) {
    const categoryColumn = roles.categoryColumn;
    for (const row of body) {
      const category = cellText(row[categoryColumn]);
      if (!category) continue;
      if (hasFinancialKeyword(category)) keywordCategories++;
      const value = parseMoney(row[roles.valueColumn]);
      if (value !== null) {
        lineItems.push(section ? { category, value, section } : { category, value });
        statementRows.push({ kind: 'item', category, value });
      } else if (!row.some((cell, c) => c !== categoryColumn && hasAmount(cell))) {
        section = category;
        statementRows.push({ kind: 'section', category });
      }
    }
  }

  const dropped = new Set(roles.droppedColumns);
  const keptColumns = headers.map((_, c) => c).filter((c) => !dropped.has(c));
  const isFinancialStatement =
    keptColumns.length >= 2 && keywordCategories > 0 && lineItems.length > 0;

  const block: TableBlock = {
    kind: 'table',
    ...(table.sheet !== undefined ? { sheet: table.sheet } : {}),
    ...(table.page !== undefined ? { page: table.page } : {}),
    layout: isFinancialStatement ? 'financial_statement' : 'generic',
    headers: keptColumns.map((c) => headers[c] ?? `Column ${c + 1}`),
    rows: body.map((row) => keptColumns.map((c) => cellText(row[c]))),
  };

  return {
    block,
    lineItems: isFinancialStatement ? lineItems : [],
    statementRows,
    roles,
    preamble,
  };
}

/**
 * Render a table in the canonical text format.
 */
export function renderTable(built: BuiltTable): string[] {
  const lines: string[] = [...built.preamble];
  const { block } = built;

  if (block.rows.length === 0) {
    lines.push('[EMPTY]');
    return lines;
  }

  if (block.layout === 'financial_statement') {
    lines.push('[FINANCIAL_STATEMENT_FORMAT]', 'LINE ITEMS:');
    for (const row of built.statementRows) {
      lines.push(
        row.kind === 'item'
          ? `  ${row.category}: ${formatStatementAmount(row.value)}`
          : `  SECTION: ${row.category}`
      );
    }
    return lines;
  }

  lines.push('[TABLE_FORMAT]', `COLUMN HEADERS: ${block.headers.join(' | ')}`, 'DATA ROWS:');
  for (const row of block.rows) {
    lines.push(`  ${row.join(' | ')}`);
  }
  return lines;
}
