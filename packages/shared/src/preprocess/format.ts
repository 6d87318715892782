/**
 * Document Format Resolution
 *
 * Order: uploader hint (extension or MIME type), filename extension, magic
 * bytes, then a text sniff.
 */

import path from 'node:path';
import type { DocumentFormat } from '../types';
import { decodeText } from './text-decoding';

export type FormatResolution =
  | { supported: true; format: DocumentFormat; resolvedBy: 'hint' | 'extension' | 'content' }
  | { supported: false; reason: string };

const EXTENSION_FORMATS: Readonly<Record<string, DocumentFormat>> = {
  xlsx: 'xlsx',
  xlsm: 'xlsx',
  csv: 'csv',
  tsv: 'csv',
  pdf: 'pdf',
  txt: 'txt',
  text: 'txt',
};

const MIME_FORMATS: Readonly<Record<string, DocumentFormat>> = {
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet': 'xlsx',
  'text/csv': 'csv',
  'text/tab-separated-values': 'csv',
  'application/pdf': 'pdf',
  'text/plain': 'txt',
};

const UNSUPPORTED_EXTENSIONS: Readonly<Record<string, string>> = {
  xls: 'Legacy binary Excel workbooks (.xls) are not supported; save as .xlsx',
  doc: 'Word documents are not supported',
  docx: 'Word documents are not supported',
  png: 'Scanned images are not supported',
  jpg: 'Scanned images are not supported',
  jpeg: 'Scanned images are not supported',
};

function fromHint(hint: string): DocumentFormat | string | null {
  const normalized = hint.trim().toLowerCase().split(';')[0].trim();
  if (MIME_FORMATS[normalized]) return MIME_FORMATS[normalized];
  if (normalized === 'application/vnd.ms-excel') return UNSUPPORTED_EXTENSIONS.xls;
  const extension = normalized.replace(/^\./, '');
  return EXTENSION_FORMATS[extension] ?? UNSUPPORTED_EXTENSIONS[extension] ?? null;
}

function isDocumentFormat(value: string): value is DocumentFormat {
  return value === 'xlsx' || value === 'csv' || value === 'pdf' || value === 'txt';
}

function sniffContent(bytes: Uint8Array): DocumentFormat | null {
  const ascii = String.fromCharCode(...bytes.subarray(0, 5));
  if (ascii.startsWith('%PDF')) return 'pdf';
  // ZIP container: xlsx is the only zipped format accepted
  if (bytes[0] === 0x50 && bytes[1] === 0x4b && bytes[2] === 0x03 && bytes[3] === 0x04) return 'xlsx';
  if (bytes[0] === 0xd0 && bytes[1] === 0xcf && bytes[2] === 0x11 && bytes[3] === 0xe0) return null;

  const text = decodeText(bytes.subarray(0, 4096));
  if (text === null) return null;
  const lines = text.split(/\r?\n/).filter((line) => line.trim() !== '').slice(0, 5);
  const delimited =
    lines.length >= 2 && lines.every((line) => /[,;\t]/.test(line)) ? 'csv' : 'txt';
  return delimited;
}

export function resolveFormat(bytes: Uint8Array, filename: string, hint?: string): FormatResolution {
  if (bytes.length === 0) {
    return { supported: false, reason: 'Document is empty' };
  }

  if (hint) {
    const hinted = fromHint(hint);
    if (hinted !== null) {
      return isDocumentFormat(hinted)
        ? { supported: true, format: hinted, resolvedBy: 'hint' }
        : { supported: false, reason: hinted };
    }
  }

  const extension = path.extname(filename).replace(/^\./, '').toLowerCase();
  if (EXTENSION_FORMATS[extension]) {
    return { supported: true, format: EXTENSION_FORMATS[extension], resolvedBy: 'extension' };
  }
  if (UNSUPPORTED_EXTENSIONS[extension]) {
    return { supported: false, reason: UNSUPPORTED_EXTENSIONS[extension] };
  }

  const sniffed = sniffContent(bytes);
  if (sniffed) {
    return { supported: true, format: sniffed, resolvedBy: 'content' };
  }
  return { supported: false, reason: 'Unrecognized binary content' };
}
