/**
 * PDF Preprocessing
 *
 * Extracts text from PDF files using pdfjs-dist, rebuilding lines from item
 * positions and lifting runs of amount-bearing, multi-cell lines into tables.
 */

import path from 'node:path';
import { createRequire } from 'node:module';
import { UnsupportedFormatError } from '../errors';
import { logger } from '../logger';
import { parseMoney } from '../money';
import type { ContentBlock, LineItem } from '../types';
import { buildTable, renderTable } from './tabular';
import type { FormatPreprocessor } from './types';

/** Items whose baselines differ by at most this much share a line */
const LINE_Y_TOLERANCE = 2;

/** A horizontal gap wider than this starts a new cell */
const CELL_GAP = 12;

/** Minimum consecutive tabular lines that form a table */
const MIN_TABLE_ROWS = 2;

export interface PositionedText {
  str: string;
  x: number;
  y: number;
  width: number;
}

export interface PdfLine {
  y: number;
  cells: string[];
  text: string;
}

export type PageSegment = { kind: 'text'; lines: string[] } | { kind: 'table'; rows: string[][] };

/**
 * Group positioned text items into lines (top to bottom) and split each line
 * into cells at wide horizontal gaps.
 */
export function groupIntoLines(items: PositionedText[]): PdfLine[] {
  const visible = items.filter((item) => item.str.trim() !== '');
  const sorted = [...visible].sort((a, b) => b.y - a.y || a.x - b.x);

  const rows: PositionedText[][] = [];
  for (const item of sorted) {
    const current = rows[rows.length - 1];
    if (current && Math.abs(current[0].y - item.y) <= LINE_Y_TOLERANCE) {
      current.push(item);
    } else {
      rows.push([item]);
    }
  }

  return rows.map((row) => {
    const ordered = row.sort((a, b) => a.x - b.x);
    const cells: string[] = [];
    let cell = '';
    let previousEnd: number | null = null;
    for (const item of ordered) {
      const gap = previousEnd === null ? 0 : item.x - previousEnd;
      if (previousEnd !== null && gap > CELL_GAP) {
        cells.push(cell.trim());
        cell = '';
      } else if (previousEnd !== null && gap > 0.5) {
        cell += ' ';
      }
      cell += item.str;
      previousEnd = item.x + item.width;
    }
    cells.push(cell.trim());
    const nonEmpty = cells.filter(Boolean);
    return { y: ordered[0].y, cells: nonEmpty, text: nonEmpty.join(' ') };
  });
}

function isTabularLine(line: PdfLine): boolean {
  return line.cells.length >= 2 && parseMoney(line.cells[line.cells.length - 1]) !== null;
}

/**
 * Split a page's lines into free-text and table segments, in page order.
 */
export function segmentPage(lines: PdfLine[]): PageSegment[] {
  const segments: PageSegment[] = [];
  let i = 0;
  while (i < lines.length) {
    let j = i;
    while (j < lines.length && isTabularLine(lines[j])) j++;
    if (j - i >= MIN_TABLE_ROWS) {
      segments.push({ kind: 'table', rows: lines.slice(i, j).map((line) => line.cells) });
      i = j;
      continue;
    }

    const end = Math.max(j, i + 1);
    const text = lines.slice(i, end).map((line) => line.text);
    const previous = segments[segments.length - 1];
    if (previous && previous.kind === 'text') {
      previous.lines.push(...text);
    } else {
      segments.push({ kind: 'text', lines: text });
    }
    i = end;
  }
  return segments;
}

async function loadPdfjs() {
  const pdfjsLib = await import('pdfjs-dist/legacy/build/pdf.mjs');
  const require = createRequire(import.meta.url);
  pdfjsLib.GlobalWorkerOptions.workerSrc = path.join(
    path.dirname(require.resolve('pdfjs-dist/package.json')),
    'legacy/build/pdf.worker.mjs'
  );
  return pdfjsLib;
}

export const pdfPreprocessor: FormatPreprocessor = {
  format: 'pdf',
  async preprocess(bytes, filename) {
    const pdfjsLib = await loadPdfjs();

    const pdf = await pdfjsLib
      .getDocument({ data: new Uint8Array(bytes), isEvalSupported: false })
      .promise.catch((error: unknown) => {
        throw new UnsupportedFormatError('PDF could not be opened', {
          filename,
          reason: error instanceof Error ? error.message : String(error),
        });
      });

    const pageCount = pdf.numPages;
    const lines = [`PDF DOCUMENT: ${filename}`, `PAGES: ${pageCount}`];
    const blocks: ContentBlock[] = [];
    const lineItems: LineItem[] = [];
    let tableCount = 0;
    let statementTables = 0;

    try {
      for (let pageNumber = 1; pageNumber <= pageCount; pageNumber++) {
        const page = await pdf.getPage(pageNumber);
        const textContent = await page.getTextContent();

        const items: PositionedText[] = [];
        for (const item of textContent.items) {
          if (!('str' in item)) continue;
          items.push({
            str: item.str,
            x: Number(item.transform[4]),
            y: Number(item.transform[5]),
            width: item.width,
          });
        }

        const segments = segmentPage(groupIntoLines(items));
        const textLines = segments.flatMap((segment) => (segment.kind === 'text' ? segment.lines : []));
        const tables = segments.flatMap((segment) => (segment.kind === 'table' ? [segment.rows] : []));

        lines.push(`[PAGE_START] ${pageNumber}`);
        if (textLines.length > 0) {
          lines.push('[TEXT_CONTENT]', ...textLines);
          blocks.push({ kind: 'text', page: pageNumber, lines: textLines });
        }
        if (tables.length > 0) {
          lines.push(`[TABLES_FOUND] ${tables.length}`);
          tables.forEach((rows, index) => {
            const built = buildTable({ page: pageNumber, rows });
            if (!built) return;
            tableCount++;
            lines.push(`[TABLE_${tableCount}]`, ...renderTable(built));
            blocks.push(built.block);
            lineItems.push(...built.lineItems);
            if (built.block.layout === 'financial_statement') statementTables++;
            logger.debug('PDF table recovered', { page: pageNumber, table: index + 1, rows: rows.length });
          });
        }
        if (textLines.length === 0 && tables.length === 0) {
          lines.push('[EMPTY]');
        }
        lines.push('[PAGE_END]');
        page.cleanup();
      }
    } finally {
      await pdf.destroy();
    }
    lines.push('[DOCUMENT_END]');

    const structureIndicators: string[] = [];
    if (pageCount > 1) structureIndicators.push('multiple_pages');
    if (tableCount > 0) {
      structureIndicators.push(statementTables > 0 ? 'financial_statement_format' : 'table_format');
    }

    return {
      text: lines.join('\n'),
      lineItems,
      isFinancialStatement: statementTables > 0,
      blocks,
      metadata: { pageCount, tableCount, structureIndicators },
    };
  },
};
