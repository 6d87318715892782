/**
 * Request body parsing for the extraction API
 */

import path from 'node:path';
import {
  config,
  inferDocumentRole,
  normalizeDocumentRole,
  resolveDocumentPath,
  type DocumentRole,
  type RawDocument,
} from '@noi-extract/shared';

export const MAX_BATCH_DOCUMENTS = 4;

export type Parsed<T> = { ok: true; value: T } | { ok: false; message: string };

export interface JobRequest {
  documentUri: string;
  filename: string;
  role?: string;
  formatHint?: string;
}

type Body = { [key: string]: unknown };

function isBody(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(body: Body, key: string): Parsed<string | undefined> {
  const value = body[key];
  if (value === undefined || value === null) return { ok: true, value: undefined };
  if (typeof value !== 'string') return { ok: false, message: `${key} must be a string` };
  return { ok: true, value: value.trim() || undefined };
}

function resolveRole(declared: string | undefined, filename: string): Parsed<DocumentRole> {
  if (declared === undefined) return { ok: true, value: inferDocumentRole(filename) };
  const role = normalizeDocumentRole(declared);
  if (!role) {
    return { ok: false, message: `role must be one of current, prior, budget, prior_year (got "${declared}")` };
  }
  return { ok: true, value: role };
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export function decodeBase64(content: string): Uint8Array | null {
  const compact = content.replace(/\s+/g, '');
  if (compact.length % 4 === 1 || !BASE64_PATTERN.test(compact)) return null;
  return new Uint8Array(Buffer.from(compact, 'base64'));
}

/**
 * { filename, content_base64, role?, format_hint? } → RawDocument
 */
export function parseExtractRequest(body: unknown, maxBytes: number = config.maxUploadBytes): Parsed<RawDocument> {
  if (!isBody(body)) return { ok: false, message: 'Request body must be a JSON object' };

  const { filename, content_base64: content } = body;
  if (typeof filename !== 'string' || filename.trim() === '') {
    return { ok: false, message: 'filename is required' };
  }
  if (typeof content !== 'string' || content === '') {
    return { ok: false, message: 'content_base64 is required' };
  }

  const bytes = decodeBase64(content);
  if (!bytes) return { ok: false, message: 'content_base64 is not valid base64' };
  if (bytes.byteLength > maxBytes) {
    return { ok: false, message: `Document exceeds the ${maxBytes} byte upload limit` };
  }

  const role = optionalString(body, 'role');
  if (!role.ok) return role;
  const formatHint = optionalString(body, 'format_hint');
  if (!formatHint.ok) return formatHint;

  const declaredRole = resolveRole(role.value, filename);
  if (!declaredRole.ok) return declaredRole;

  return {
    ok: true,
    value: {
      bytes,
      filename: filename.trim(),
      declaredRole: declaredRole.value,
      ...(formatHint.value ? { formatHint: formatHint.value } : {}),
    },
  };
}

/**
 * { documents: [...] } with one to MAX_BATCH_DOCUMENTS entries
 */
export function parseBatchRequest(body: unknown, maxBytes: number = config.maxUploadBytes): Parsed<RawDocument[]> {
  const documents: unknown = isBody(body) ? body.documents : undefined;
  if (!Array.isArray(documents)) {
    return { ok: false, message: 'documents must be an array' };
  }
  if (documents.length === 0 || documents.length > MAX_BATCH_DOCUMENTS) {
    return { ok: false, message: `documents must hold between 1 and ${MAX_BATCH_DOCUMENTS} entries` };
  }

  const parsed: RawDocument[] = [];
  for (const [index, entry] of documents.entries()) {
    const result = parseExtractRequest(entry, maxBytes);
    if (!result.ok) return { ok: false, message: `documents[${index}]: ${result.message}` };
    parsed.push(result.value);
  }
  return { ok: true, value: parsed };
}

/**
 * { document_uri, filename?, role?, format_hint? }; only file:// URIs under the
 * document root are read by the worker.
 */
export function parseJobRequest(body: unknown, documentRoot: string = config.documentRoot): Parsed<JobRequest> {
  if (!isBody(body)) return { ok: false, message: 'Request body must be a JSON object' };

  const uri = body.document_uri;
  if (typeof uri !== 'string' || !uri.startsWith('file://')) {
    return { ok: false, message: 'document_uri must be a file:// URI' };
  }

  const filePath = resolveDocumentPath(uri, documentRoot);
  if (!filePath) {
    return { ok: false, message: 'document_uri must name a file inside the document root' };
  }

  const filename = optionalString(body, 'filename');
  if (!filename.ok) return filename;
  const role = optionalString(body, 'role');
  if (!role.ok) return role;
  const formatHint = optionalString(body, 'format_hint');
  if (!formatHint.ok) return formatHint;

  if (role.value !== undefined && !normalizeDocumentRole(role.value)) {
    return { ok: false, message: `role must be one of current, prior, budget, prior_year (got "${role.value}")` };
  }

  return {
    ok: true,
    value: {
      documentUri: uri,
      filename: filename.value ?? path.basename(filePath),
      ...(role.value ? { role: role.value } : {}),
      ...(formatHint.value ? { formatHint: formatHint.value } : {}),
    },
  };
}
