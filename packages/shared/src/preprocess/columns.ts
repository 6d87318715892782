/**
 * Column Role Detection
 *
 * Decides which column of a table holds the amounts and which holds the line
 * item labels. Pure: operates on a header row plus a matrix of column cells.
 */

import { parseMoney } from '../money';

export type CellValue = string | number | null;

/** A column qualifies as a value column above this share of numeric entries */
export const VALUE_COLUMN_NUMERIC_RATIO = 0.5;

/** Placeholder-named columns survive only at or above this share of numeric entries */
export const PLACEHOLDER_KEEP_RATIO = 0.1;

const PLACEHOLDER_HEADER = /^(unnamed(:?\s*_?\d+)?|column\s*\d+|__empty(_\d+)?|field\d+|_?\d+)$/i;
const IDENTIFIER_HEADER = /\b(account|acct|gl|code|id|number|no|#)\b/i;
const PREFERRED_VALUE_HEADER = /\b(total|ytd|annual|actual|actuals|amount|balance|current)\b/i;

export interface ColumnProfile {
  index: number;
  header: string | null;
  nonEmpty: number;
  numeric: number;
  text: number;
  numericRatio: number;
  placeholder: boolean;
}

export interface ColumnRoles {
  valueColumn: number;
  categoryColumn: number | null;
  droppedColumns: number[];
  /** True when no column met the numeric threshold and the last column was taken */
  usedFallback: boolean;
  profiles: ColumnProfile[];
}

export function isBlankCell(cell: CellValue): boolean {
  return cell === null || (typeof cell === 'string' && cell.trim() === '');
}

export function isPlaceholderHeader(header: string | null): boolean {
  if (header === null) return true;
  const trimmed = header.trim();
  return trimmed === '' || PLACEHOLDER_HEADER.test(trimmed);
}

export function profileColumn(index: number, header: string | null, cells: CellValue[]): ColumnProfile {
  let nonEmpty = 0;
  let numeric = 0;
  for (const cell of cells) {
    if (isBlankCell(cell)) continue;
    nonEmpty++;
    if (parseMoney(cell) !== null) numeric++;
  }
  return {
    index,
    header,
    nonEmpty,
    numeric,
    text: nonEmpty - numeric,
    numericRatio: nonEmpty === 0 ? 0 : numeric / nonEmpty,
    placeholder: isPlaceholderHeader(header),
  };
}

/**
 * Detect the value column, the category column and the columns to drop.
 *
 * `columns[c]` holds the body cells of column c (header excluded);
 * `headers[c]` is its header text, or null when the table has none.
 */
export function detectColumnRoles(headers: Array<string | null>, columns: CellValue[][]): ColumnRoles {
  const profiles = columns.map((cells, index) => profileColumn(index, headers[index] ?? null, cells));

  const droppedColumns = profiles
    .filter((profile) => profile.placeholder && profile.numericRatio < PLACEHOLDER_KEEP_RATIO)
    .map((profile) => profile.index);
  const dropped = new Set(droppedColumns);
  const kept = profiles.filter((profile) => !dropped.has(profile.index));

  const candidates = kept.filter(
    (profile) =>
      profile.nonEmpty > 0 &&
      profile.numericRatio > VALUE_COLUMN_NUMERIC_RATIO &&
      !(profile.header !== null && IDENTIFIER_HEADER.test(profile.header))
  );

  let valueColumn: number;
  let usedFallback = false;
  if (candidates.length > 0) {
    const preferred = candidates.find(
      (profile) => profile.header !== null && PREFERRED_VALUE_HEADER.test(profile.header)
    );
    valueColumn = (preferred ?? candidates[0]).index;
  } else {
    usedFallback = true;
    const last = kept.length > 0 ? kept[kept.length - 1] : profiles[profiles.length - 1];
    valueColumn = last ? last.index : 0;
  }

  let categoryColumn: number | null = null;
  let mostText = 0;
  for (const profile of kept) {
    if (profile.index === valueColumn) continue;
    if (profile.text > mostText) {
      mostText = profile.text;
      categoryColumn = profile.index;
    }
  }

  return { valueColumn, categoryColumn, droppedColumns, usedFallback, profiles };
}
