/**
 * Worker document loading tests
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { readDocumentBytes, toRawDocument } from '../../services/worker-extractor/src/lib/documents';

describe('readDocumentBytes', () => {
  let workspace: string;
  let root: string;

  beforeAll(async () => {
    workspace = await fs.mkdtemp(path.join(os.tmpdir(), 'noi-documents-'));
    root = path.join(workspace, 'documents');
    await fs.mkdir(root);
    await fs.writeFile(path.join(root, 'statement.csv'), 'Line Item,Amount\nRental Income,1000\n');
    await fs.writeFile(path.join(workspace, 'secret.txt'), 'test-secret');
    await fs.symlink(path.join(workspace, 'secret.txt'), path.join(root, 'linked.txt'));
  });

  afterAll(async () => {
    await fs.rm(workspace, { recursive: true, force: true });
  });

  it('should read a document under the root', async () => {
    const bytes = await readDocumentBytes(pathToFileURL(path.join(root, 'statement.csv')).href, root);

    expect(new TextDecoder().decode(bytes)).toBe('Line Item,Amount\nRental Income,1000\n');
  });

  it('should refuse a path that climbs out of the root', async () => {
    const uri = `${pathToFileURL(root).href}/../secret.txt`;

    await expect(readDocumentBytes(uri, root)).rejects.toThrow('Document URI is outside the document root');
  });

  it('should refuse a symlink that leads out of the root', async () => {
    const uri = pathToFileURL(path.join(root, 'linked.txt')).href;

    await expect(readDocumentBytes(uri, root)).rejects.toThrow('Document URI is outside the document root');
  });
});

describe('toRawDocument', () => {
  it('should fall back to the filename role for an unknown declared role', () => {
    const document = toRawDocument(
      {
        event_type: 'document.uploaded',
        correlation_id: 'corr-1',
        document_id: 'doc-1',
        document_uri: 'file:///data/documents/2025_budget.xlsx',
        filename: '2025_budget.xlsx',
        declared_role: 'quarterly',
        enqueued_at: '2026-01-01T00:00:00.000Z',
      },
      new Uint8Array([1, 2, 3])
    );

    expect(document.declaredRole).toBe('budget');
    expect(document.formatHint).toBeUndefined();
  });
});
