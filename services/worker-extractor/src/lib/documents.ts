/**
 * Document loading for queued jobs
 */

import fs from 'node:fs/promises';
import { UnrecoverableError } from 'bullmq';
import {
  config,
  inferDocumentRole,
  isWithinRoot,
  normalizeDocumentRole,
  resolveDocumentPath,
  type ExtractFinancialsJob,
  type RawDocument,
} from '@noi-extract/shared';

/**
 * Read the bytes behind a file:// URI. The path, with symlinks resolved, must
 * stay under the document root; anything else fails the job without retries.
 */
export async function readDocumentBytes(uri: string, root: string = config.documentRoot): Promise<Uint8Array> {
  const filePath = resolveDocumentPath(uri, root);
  if (!filePath) {
    throw new UnrecoverableError(`Document URI is outside the document root: ${uri}`);
  }

  const [realPath, realRoot] = await Promise.all([fs.realpath(filePath), fs.realpath(root)]);
  if (!isWithinRoot(realPath, realRoot)) {
    throw new UnrecoverableError(`Document URI is outside the document root: ${uri}`);
  }

  const data = await fs.readFile(realPath);
  return new Uint8Array(data);
}

/**
 * Build the pipeline input for a job. An unrecognized declared role falls back
 * to the role implied by the filename.
 */
export function toRawDocument(job: ExtractFinancialsJob, bytes: Uint8Array): RawDocument {
  const declared = job.declared_role ? normalizeDocumentRole(job.declared_role) : null;
  return {
    bytes,
    filename: job.filename,
    declaredRole: declared ?? inferDocumentRole(job.filename),
    ...(job.format_hint ? { formatHint: job.format_hint } : {}),
  };
}
