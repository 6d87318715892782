/**
 * Document URIs
 *
 * Queued jobs name their document by file:// URI. Only files under the
 * configured document root may be read.
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { config } from './config';

export function isWithinRoot(filePath: string, root: string): boolean {
  const relative = path.relative(path.resolve(root), path.resolve(filePath));
  return (
    relative !== '' &&
    relative !== '..' &&
    !relative.startsWith(`..${path.sep}`) &&
    !path.isAbsolute(relative)
  );
}

/**
 * Absolute path behind a file:// URI, or null when the URI is malformed or
 * points outside the document root.
 */
export function resolveDocumentPath(uri: string, root: string = config.documentRoot): string | null {
  if (!uri.startsWith('file://')) return null;

  let filePath: string;
  try {
    filePath = path.resolve(fileURLToPath(uri));
  } catch {
    return null;
  }
  return isWithinRoot(filePath, root) ? filePath : null;
}
